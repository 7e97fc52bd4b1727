import type { IncomingMessage, ServerResponse } from "node:http";
import type { Adapter } from "../adapters/types";
import type { CommandSet } from "./command-set";
import { backgroundContext, withAdapter, type HandlerContext } from "./context";
import type { Message } from "./message";
import { deferToSubCommands, type CommandOutcome } from "./outcome";
import type { ResponseWriter } from "./response-writer";
import { logger } from "../logger";

/**
 * Identity shared by every handler. The name keys command and web hook
 * registries; the description is shown in help output.
 */
export interface Handler {
  readonly name: string;
  readonly description: string;
}

/** Receives every message, unfiltered. */
export interface RawHandler extends Handler {
  processMessage(ctx: HandlerContext, w: ResponseWriter, m: Message): Promise<void>;
}

export type RawFunc = (ctx: HandlerContext, w: ResponseWriter, m: Message) => Promise<void>;

/** Called with every non-overlapping match of its pattern, each as `[full, ...groups]`. */
export interface HearsHandler extends Handler {
  hears(): RegExp;
  heard(ctx: HandlerContext, w: ResponseWriter, m: Message, submatches: string[][]): Promise<void>;
}

export type HeardFunc = (
  ctx: HandlerContext,
  w: ResponseWriter,
  m: Message,
  submatches: string[][],
) => Promise<void>;

/**
 * CLI style command. Before `command` runs, `m.args` holds the tokenized text
 * with `m.args[0]` being the name the command was invoked as, and `m.flags` is
 * a fresh parser scoped to this command. Handlers add options to `m.flags`
 * and call `m.parse()`.
 */
export interface CommandHandler extends Handler {
  command(ctx: HandlerContext, w: ResponseWriter, m: Message): Promise<CommandOutcome | void>;
}

export interface CommandWithSubsHandler extends CommandHandler {
  subCommands(): CommandSet;
}

export type CommandFunc = (
  ctx: HandlerContext,
  w: ResponseWriter,
  m: Message,
) => Promise<CommandOutcome | void>;

/** Started once with the dispatch loop, for output not tied to any inbound message. */
export interface BackgroundHandler extends Handler {
  startBackground(ctx: HandlerContext, w: ResponseWriter): Promise<void>;
}

export type BackgroundFunc = (ctx: HandlerContext, w: ResponseWriter) => Promise<void>;

/**
 * Exposed through the HTTP server. The mux assigns the external URL once the
 * hook is registered; `responseWriterFromContext(ctx)` gives a writer bound to
 * the hook's adapter.
 */
export interface WebHookHandler extends Handler {
  url(): URL | undefined;
  setUrl(url: URL): void;
  setAdapter(adapter: Adapter): void;
  serveHttp(req: IncomingMessage, res: ServerResponse, ctx?: HandlerContext): Promise<void>;
}

export type WebHookFunc = (
  ctx: HandlerContext,
  req: IncomingMessage,
  res: ServerResponse,
) => Promise<void>;

export function isRawHandler(handler: Handler): handler is RawHandler {
  return "processMessage" in handler && typeof handler.processMessage === "function";
}

export function isHearsHandler(handler: Handler): handler is HearsHandler {
  return (
    "hears" in handler &&
    typeof handler.hears === "function" &&
    "heard" in handler &&
    typeof handler.heard === "function"
  );
}

export function isCommandHandler(handler: Handler): handler is CommandHandler {
  return "command" in handler && typeof handler.command === "function";
}

export function hasSubCommands(handler: CommandHandler): handler is CommandWithSubsHandler {
  return "subCommands" in handler && typeof handler.subCommands === "function";
}

export function isBackgroundHandler(handler: Handler): handler is BackgroundHandler {
  return "startBackground" in handler && typeof handler.startBackground === "function";
}

export function isWebHookHandler(handler: Handler): handler is WebHookHandler {
  return (
    "serveHttp" in handler &&
    typeof handler.serveHttp === "function" &&
    "setUrl" in handler &&
    typeof handler.setUrl === "function"
  );
}

abstract class BaseHandler implements Handler {
  constructor(
    readonly name: string,
    readonly description: string,
  ) {}
}

class FuncRawHandler extends BaseHandler implements RawHandler {
  constructor(name: string, description: string, private readonly fn: RawFunc) {
    super(name, description);
  }

  processMessage(ctx: HandlerContext, w: ResponseWriter, m: Message): Promise<void> {
    return this.fn(ctx, w, m);
  }
}

export function newRawHandler(name: string, description: string, fn: RawFunc): RawHandler {
  return new FuncRawHandler(name, description, fn);
}

class FuncHearsHandler extends BaseHandler implements HearsHandler {
  constructor(
    name: string,
    description: string,
    private readonly pattern: RegExp,
    private readonly fn: HeardFunc,
  ) {
    super(name, description);
  }

  hears(): RegExp {
    return this.pattern;
  }

  heard(ctx: HandlerContext, w: ResponseWriter, m: Message, submatches: string[][]): Promise<void> {
    return this.fn(ctx, w, m, submatches);
  }
}

export function newHearsHandler(
  name: string,
  description: string,
  pattern: RegExp,
  fn: HeardFunc,
): HearsHandler {
  return new FuncHearsHandler(name, description, pattern, fn);
}

// Parses this command's flags, then lets the sub-commands take over.
const deferringCommand: CommandFunc = async (ctx, _w, m) => {
  const parsed = m.parse();
  if (parsed.kind !== "success") {
    return parsed;
  }
  return deferToSubCommands(ctx);
};

class FuncCommandHandler extends BaseHandler implements CommandHandler {
  constructor(name: string, description: string, private readonly fn: CommandFunc) {
    super(name, description);
  }

  command(ctx: HandlerContext, w: ResponseWriter, m: Message): Promise<CommandOutcome | void> {
    return this.fn(ctx, w, m);
  }
}

class FuncCommandWithSubsHandler extends FuncCommandHandler implements CommandWithSubsHandler {
  constructor(
    name: string,
    description: string,
    fn: CommandFunc,
    private readonly subs: CommandSet,
  ) {
    super(name, description, fn);
  }

  subCommands(): CommandSet {
    return this.subs;
  }
}

/**
 * Wraps `fn` as a command. With a sub-command set, `fn` may be omitted: the
 * default parses flags and defers to the sub-commands.
 */
export function newCommandHandler(name: string, description: string, fn: CommandFunc): CommandHandler;
export function newCommandHandler(
  name: string,
  description: string,
  fn: CommandFunc | undefined,
  subCommands: CommandSet,
): CommandWithSubsHandler;
export function newCommandHandler(
  name: string,
  description: string,
  fn: CommandFunc | undefined,
  subCommands?: CommandSet,
): CommandHandler {
  const body = fn ?? deferringCommand;
  if (subCommands) {
    return new FuncCommandWithSubsHandler(name, description, body, subCommands);
  }
  return new FuncCommandHandler(name, description, body);
}

class FuncBackgroundHandler extends BaseHandler implements BackgroundHandler {
  constructor(name: string, description: string, private readonly fn: BackgroundFunc) {
    super(name, description);
  }

  startBackground(ctx: HandlerContext, w: ResponseWriter): Promise<void> {
    return this.fn(ctx, w);
  }
}

export function newBackgroundHandler(
  name: string,
  description: string,
  fn: BackgroundFunc,
): BackgroundHandler {
  return new FuncBackgroundHandler(name, description, fn);
}

class FuncWebHookHandler extends BaseHandler implements WebHookHandler {
  private location: URL | undefined;
  private adapter: Adapter | undefined;

  constructor(name: string, description: string, private readonly fn: WebHookFunc) {
    super(name, description);
  }

  url(): URL | undefined {
    return this.location;
  }

  setUrl(url: URL): void {
    logger.debug({ handler: this.name, url: url.toString() }, "Web hook URL set");
    this.location = url;
  }

  setAdapter(adapter: Adapter): void {
    logger.debug({ handler: this.name, adapter: adapter.id }, "Web hook adapter set");
    this.adapter = adapter;
  }

  serveHttp(
    req: IncomingMessage,
    res: ServerResponse,
    ctx: HandlerContext = backgroundContext(),
  ): Promise<void> {
    const scoped = this.adapter ? withAdapter(ctx, this.adapter) : ctx;
    return this.fn(scoped, req, res);
  }
}

export function newWebHookHandler(name: string, description: string, fn: WebHookFunc): WebHookHandler {
  return new FuncWebHookHandler(name, description, fn);
}
