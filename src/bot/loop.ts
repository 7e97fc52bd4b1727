import type { Adapter } from "../adapters/types";
import type { HandlerContext } from "./context";
import {
  isBackgroundHandler,
  isCommandHandler,
  isHearsHandler,
  isRawHandler,
  isWebHookHandler,
  type CommandHandler,
  type Handler,
} from "./handler";
import { runBackgroundHandler, runCommandHandler, runHearsHandler, runRawHandler } from "./invoke";
import { Message } from "./message";
import { messagesReceived } from "./metrics";
import { newResponseWriter, type ResponseWriter } from "./response-writer";
import { logger } from "../logger";
import { ABORTED, raceAbort } from "../utils/abort";
import { AsyncQueue } from "../utils/async-queue";

export type DispatchState = "idle" | "starting" | "running" | "draining" | "stopped";

type Inbound = {
  adapter: Adapter;
  message: Message;
};

function writerFor(adapter: Adapter, message: Message): ResponseWriter {
  return newResponseWriter(adapter, message.copy(), adapter.id);
}

/**
 * Feeds messages from every adapter to one top-level handler.
 *
 * Each message fans out to the handler's raw, hears and command capabilities
 * as independent tasks. The dispatcher never awaits those tasks: cancelling
 * the context stops intake right away, and a handler that ignores the signal
 * keeps running on its own.
 */
export class Dispatcher {
  private current: DispatchState = "idle";

  constructor(
    private readonly handler: Handler,
    private readonly adapters: readonly [Adapter, ...Adapter[]],
  ) {}

  get state(): DispatchState {
    return this.current;
  }

  /** Resolves once `ctx.signal` has aborted and every forwarding task has stopped. */
  async run(ctx: HandlerContext): Promise<void> {
    if (this.current !== "idle") {
      throw new Error(`Dispatcher already ${this.current}`);
    }
    this.current = "starting";
    const [primary] = this.adapters;

    if (isBackgroundHandler(this.handler)) {
      void runBackgroundHandler(ctx, this.handler, newResponseWriter(primary, new Message(), primary.id));
    }
    if (isWebHookHandler(this.handler)) {
      this.handler.setAdapter(primary);
    }

    const merged = new AsyncQueue<Inbound>();
    const forwarders = this.adapters.map((adapter) => this.forward(ctx.signal, adapter, merged));

    this.current = "running";
    logger.info(
      { handler: this.handler.name, adapters: this.adapters.map((adapter) => adapter.id) },
      "Dispatch loop running",
    );

    for await (const inbound of merged.iterate(ctx.signal)) {
      if (ctx.signal.aborted) {
        break;
      }
      this.dispatch(ctx, inbound);
    }

    this.current = "draining";
    merged.close();
    await Promise.all(forwarders);
    this.current = "stopped";
    logger.info({ handler: this.handler.name }, "Dispatch loop stopped");
  }

  private async forward(signal: AbortSignal, adapter: Adapter, merged: AsyncQueue<Inbound>): Promise<void> {
    try {
      const iterator = adapter.receive(signal)[Symbol.asyncIterator]();
      while (!signal.aborted) {
        const next = await raceAbort(iterator.next(), signal);
        if (next === ABORTED) {
          void iterator.return?.().catch((error: unknown) => {
            logger.warn({ err: error, adapter: adapter.id }, "Failed to close adapter stream");
          });
          return;
        }
        if (next.done) {
          logger.info({ adapter: adapter.id }, "Adapter stream ended");
          return;
        }
        merged.enqueue({ adapter, message: next.value });
      }
    } catch (error) {
      logger.error({ err: error, adapter: adapter.id }, "Adapter receive failed; forwarding stopped");
    }
  }

  private dispatch(ctx: HandlerContext, { adapter, message }: Inbound): void {
    messagesReceived.labels(adapter.id, message.channel, message.from).inc();
    logger.debug(
      { adapter: adapter.id, channel: message.channel, from: message.from, text: message.text },
      "Message received",
    );

    const handler = this.handler;
    if (isRawHandler(handler)) {
      void runRawHandler(ctx, handler, writerFor(adapter, message), message.copy());
    }
    if (isHearsHandler(handler)) {
      void runHearsHandler(ctx, handler, writerFor(adapter, message), message.copy());
    }
    if (isCommandHandler(handler)) {
      void this.runCommand(ctx, handler, writerFor(adapter, message), message);
    }
  }

  private async runCommand(
    ctx: HandlerContext,
    handler: CommandHandler,
    w: ResponseWriter,
    message: Message,
  ): Promise<void> {
    const outcome = await runCommandHandler(ctx, handler, w, message);
    if (outcome.kind === "failure") {
      logger.debug(
        { handler: handler.name, kind: outcome.error.kind, error: outcome.error.message },
        "Command not handled",
      );
    }
  }
}

/**
 * Processes messages from `adapter` and `adapters` with `handler` until
 * `ctx.signal` aborts. Background and web hook capabilities use `adapter`.
 */
export async function loop(
  ctx: HandlerContext,
  handler: Handler,
  adapter: Adapter,
  ...adapters: Adapter[]
): Promise<void> {
  await new Dispatcher(handler, [adapter, ...adapters]).run(ctx);
}
