import type { IncomingMessage, ServerResponse } from "node:http";
import type { Adapter } from "../adapters/types";
import { CommandSet } from "./command-set";
import { backgroundContext, type HandlerContext } from "./context";
import {
  isBackgroundHandler,
  isCommandHandler,
  isHearsHandler,
  isRawHandler,
  isWebHookHandler,
  newCommandHandler,
  type BackgroundHandler,
  type CommandHandler,
  type Handler,
  type HearsHandler,
  type RawHandler,
  type WebHookHandler,
} from "./handler";
import { runBackgroundHandler, runCommandHandler, runHearsHandler, runRawHandler } from "./invoke";
import { Message } from "./message";
import { fail, success, type CommandError, type CommandOutcome } from "./outcome";
import { newNullResponseWriter, type ResponseWriter } from "./response-writer";
import { renderUsage } from "./usage";
import { logger } from "../logger";
import { writeJson } from "../utils/http";

export interface MuxOptions {
  name?: string;
  description?: string;
  /** Path under which web hooks are served, e.g. "/hooks". */
  webHookPrefix?: string;
}

const DEFAULT_WEBHOOK_PREFIX = "/hooks";

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/\/+$/, "");
  if (!trimmed) {
    return "";
  }
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/**
 * Registry of handlers that is itself a top-level handler.
 *
 * For each message the mux fires every raw handler, resolves a command when the
 * message is addressed to the bot, then runs every hears handler whose pattern
 * matches, unless the command asked to skip them. Background handlers start
 * with the loop, and web hooks are routed by name under the hook prefix.
 */
export class Mux implements RawHandler, BackgroundHandler, WebHookHandler {
  readonly name: string;
  readonly description: string;

  private readonly raws: RawHandler[] = [];
  private readonly hearsHandlers: HearsHandler[] = [];
  private readonly commands = new CommandSet();
  private readonly backgrounds: BackgroundHandler[] = [];
  private readonly hooks = new Map<string, WebHookHandler>();
  private readonly prefix: string;
  private baseUrl: URL | undefined;
  private adapter: Adapter | undefined;

  constructor(options: MuxOptions = {}) {
    this.name = options.name ?? "mux";
    this.description = options.description ?? "Dispatches messages to registered handlers";
    this.prefix = normalizePrefix(options.webHookPrefix ?? DEFAULT_WEBHOOK_PREFIX);
    this.commands.add(
      newCommandHandler("help", "provides help on commands", (ctx, w, m) => this.help(ctx, w, m)),
    );
  }

  /** Registers every capability `handler` has. */
  handle(handler: Handler): this {
    let registered = false;
    if (isRawHandler(handler)) {
      this.handleRaw(handler);
      registered = true;
    }
    if (isHearsHandler(handler)) {
      this.handleHears(handler);
      registered = true;
    }
    if (isCommandHandler(handler)) {
      this.handleCommand(handler);
      registered = true;
    }
    if (isBackgroundHandler(handler)) {
      this.handleBackground(handler);
      registered = true;
    }
    if (isWebHookHandler(handler)) {
      this.handleWebHook(handler);
      registered = true;
    }
    if (!registered) {
      throw new Error(`Handler ${handler.name} implements no known capability`);
    }
    return this;
  }

  handleRaw(handler: RawHandler): this {
    this.raws.push(handler);
    return this;
  }

  handleHears(handler: HearsHandler): this {
    this.hearsHandlers.push(handler);
    return this;
  }

  handleCommand(handler: CommandHandler): this {
    if (this.commands.has(handler.name)) {
      logger.warn({ handler: handler.name }, "Replacing registered command");
    }
    this.commands.add(handler);
    return this;
  }

  handleBackground(handler: BackgroundHandler): this {
    this.backgrounds.push(handler);
    return this;
  }

  handleWebHook(handler: WebHookHandler): this {
    if (this.hooks.has(handler.name)) {
      throw new Error(`Web hook ${handler.name} already registered`);
    }
    this.hooks.set(handler.name, handler);
    if (this.baseUrl) {
      handler.setUrl(this.hookUrl(this.baseUrl, handler.name));
    }
    if (this.adapter) {
      handler.setAdapter(this.adapter);
    }
    return this;
  }

  /** Registered commands in help order. */
  listCommands(): Array<{ name: string; description: string }> {
    return this.commands.list().map(({ name, description }) => ({ name, description }));
  }

  listWebHooks(): WebHookHandler[] {
    return Array.from(this.hooks.values());
  }

  async processMessage(ctx: HandlerContext, w: ResponseWriter, m: Message): Promise<void> {
    for (const raw of this.raws) {
      void runRawHandler(ctx, raw, w.copy(m), m.copy());
    }

    let failure: CommandError | undefined;
    if (m.toBot) {
      const outcome = await this.commands.nextCommand(ctx, w.copy(m), m);
      if (outcome.kind === "skip-remaining") {
        return;
      }
      if (outcome.kind === "failure") {
        failure = outcome.error;
      }
    }

    const heard = await Promise.all(
      this.hearsHandlers.map((handler) => runHearsHandler(ctx, handler, w.copy(m), m.copy())),
    );

    if (!failure) {
      return;
    }
    if (failure.kind === "unknown-command" && heard.includes(true)) {
      return;
    }
    await w.write(`error: ${failure.message}`);
  }

  async startBackground(ctx: HandlerContext, w: ResponseWriter): Promise<void> {
    await Promise.all(this.backgrounds.map((handler) => runBackgroundHandler(ctx, handler, w.copy())));
  }

  url(): URL | undefined {
    return this.baseUrl ? this.hookRoot(this.baseUrl) : undefined;
  }

  /** Sets the external base URL; every hook gets `<base><prefix>/<name>`. */
  setUrl(url: URL): void {
    this.baseUrl = url;
    for (const hook of this.hooks.values()) {
      hook.setUrl(this.hookUrl(url, hook.name));
    }
  }

  setAdapter(adapter: Adapter): void {
    this.adapter = adapter;
    for (const hook of this.hooks.values()) {
      hook.setAdapter(adapter);
    }
  }

  async serveHttp(
    req: IncomingMessage,
    res: ServerResponse,
    ctx: HandlerContext = backgroundContext(),
  ): Promise<void> {
    const name = this.hookNameFromPath(new URL(req.url ?? "/", "http://localhost").pathname);
    const hook = name === undefined ? undefined : this.hooks.get(name);
    if (!hook) {
      writeJson(res, 404, { error: "not_found" });
      return;
    }
    try {
      await hook.serveHttp(req, res, ctx);
    } catch (error) {
      logger.error({ err: error, handler: hook.name }, "Web hook failed");
      if (!res.headersSent) {
        writeJson(res, 500, { error: "internal_error" });
      } else {
        res.end();
      }
    }
  }

  private hookRoot(base: URL): URL {
    return new URL(`${base.href.replace(/\/+$/, "")}${this.prefix}`);
  }

  private hookUrl(base: URL, name: string): URL {
    return new URL(`${this.hookRoot(base).href}/${encodeURIComponent(name)}`);
  }

  private hookNameFromPath(pathname: string): string | undefined {
    const root = `${this.prefix}/`;
    if (!pathname.startsWith(root)) {
      return undefined;
    }
    const [segment] = pathname.slice(root.length).split("/");
    if (!segment) {
      return undefined;
    }
    try {
      return decodeURIComponent(segment);
    } catch {
      return undefined;
    }
  }

  private async help(ctx: HandlerContext, w: ResponseWriter, m: Message): Promise<CommandOutcome> {
    const parsed = m.parse();
    if (parsed.kind !== "success") {
      return parsed;
    }

    const [topic] = m.args;
    if (topic === undefined) {
      await w.write(this.renderCommandList());
      return success();
    }

    const resolution = this.commands.resolve(topic);
    if (resolution.kind === "failure") {
      return fail(resolution.error);
    }

    // Ask the command for its usage against a writer that discards any output.
    const target = resolution.handler;
    const probe = m.copy();
    probe.setArgs([target.name, "--help"]);
    await runCommandHandler(ctx, target, newNullResponseWriter(probe), probe);
    await w.write(renderUsage(target, target.name, probe.flags));
    return success();
  }

  private renderCommandList(): string {
    const entries = this.commands.list();
    const width = Math.max(...entries.map((entry) => entry.name.length));
    const lines = entries.map((entry) => `  ${entry.name.padEnd(width)}  ${entry.description}`);
    return ["Available commands:", ...lines].join("\n");
  }
}
