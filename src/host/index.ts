import type { Adapter } from "../adapters/types";
import { AdapterRegistry } from "../adapters/registry";
import { ShellAdapter } from "../adapters/shell/adapter";
import type { HandlerContext } from "../bot/context";
import { Dispatcher, type DispatchState } from "../bot/loop";
import { Mux } from "../bot/mux";
import type { ChatmuxConfig } from "../config";
import { registerBundledHandlers } from "../handlers";
import { configureLogger, logger } from "../logger";
import { HttpServer } from "../server/http-server";

export interface BotHostOptions {
  /** Used instead of the adapters enabled in the config. */
  adapters?: Adapter[];
  shellInput?: NodeJS.ReadableStream;
  shellOutput?: NodeJS.WritableStream;
}

export interface BotHostStatus {
  running: boolean;
  startedAt: Date | null;
  dispatch: DispatchState;
  adapters: string[];
  httpPort?: number;
}

/**
 * Wires a configured mux to its adapters and HTTP server and runs the
 * dispatch loop until `stop()` is called or the shell input closes.
 */
export class BotHost {
  readonly mux: Mux;
  private readonly registry = new AdapterRegistry();
  private controller: AbortController | null = null;
  private dispatcher: Dispatcher | null = null;
  private dispatching: Promise<void> = Promise.resolve();
  private httpServer: HttpServer | null = null;
  private startedAt: Date | null = null;

  constructor(
    private readonly config: ChatmuxConfig,
    private readonly options: BotHostOptions = {},
  ) {
    this.mux = registerBundledHandlers(
      new Mux({ name: config.bot.name, webHookPrefix: config.http.webHookPrefix }),
      config.handlers.enabled,
    );
  }

  async start(): Promise<void> {
    if (this.controller) {
      return;
    }
    configureLogger(this.config.logging?.level);

    const [primary, ...rest] = this.options.adapters ?? this.createAdapters();
    if (!primary) {
      throw new Error("No adapters enabled");
    }
    for (const adapter of [primary, ...rest]) {
      this.registry.register(adapter);
    }
    await this.registry.connectAll();

    const controller = new AbortController();
    this.controller = controller;
    const ctx: HandlerContext = { signal: controller.signal };

    const http = this.config.http;
    if (http.enabled) {
      this.httpServer = new HttpServer(
        { host: http.host, port: http.port, metricsPath: http.metricsPath },
        this.mux,
        ctx,
      );
      await this.httpServer.start();
      const port = this.httpServer.getPort() ?? http.port;
      this.mux.setUrl(new URL(http.baseUrl ?? `http://${http.host}:${port}`));
    }

    const dispatcher = new Dispatcher(this.mux, [primary, ...rest]);
    this.dispatcher = dispatcher;
    this.dispatching = dispatcher.run(ctx).catch((error: unknown) => {
      logger.error({ err: error }, "Dispatch loop failed");
    });
    this.startedAt = new Date();
    logger.info({ bot: this.mux.name, commands: this.mux.listCommands().length }, "chatmux started");
  }

  /** Resolves once the dispatch loop has stopped. */
  async wait(): Promise<void> {
    await this.dispatching;
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    this.controller = null;
    logger.info("Shutting down...");

    controller.abort();
    await this.dispatching;

    if (this.httpServer) {
      await this.httpServer.stop();
      this.httpServer = null;
    }
    await this.registry.disconnectAll();
    for (const adapter of this.registry.list()) {
      this.registry.unregister(adapter.id);
    }

    this.startedAt = null;
    logger.info("chatmux stopped");
  }

  getStatus(): BotHostStatus {
    return {
      running: this.controller !== null,
      startedAt: this.startedAt,
      dispatch: this.dispatcher?.state ?? "idle",
      adapters: this.registry.list().map((adapter) => adapter.id),
      httpPort: this.httpServer?.getPort(),
    };
  }

  private createAdapters(): Adapter[] {
    const adapters: Adapter[] = [];
    const shellConfig = this.config.adapters.shell;
    if (shellConfig.enabled) {
      const shell = new ShellAdapter({
        nick: this.config.bot.nick,
        user: shellConfig.user,
        prompt: shellConfig.prompt,
        input: this.options.shellInput,
        output: this.options.shellOutput,
      });
      // The shell is interactive: end of input ends the session.
      shell.on("status", (status) => {
        if (status === "disconnected" && this.controller) {
          this.stop().catch((error: unknown) => {
            logger.error({ err: error }, "Failed to stop after shell input closed");
          });
        }
      });
      adapters.push(shell);
    }
    return adapters;
  }
}

export { registerProcessErrorHandlers } from "./process-error-handlers";
