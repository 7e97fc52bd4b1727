import type { HandlerContext } from "./context";
import type { CommandHandler } from "./handler";
import { runCommandHandler } from "./invoke";
import type { Message } from "./message";
import { badCli, CommandError, fail, unknownCommand, type CommandOutcome } from "./outcome";
import type { ResponseWriter } from "./response-writer";

export interface CommandEntry {
  name: string;
  description: string;
  handler: CommandHandler;
}

export type CommandResolution =
  | { kind: "match"; handler: CommandHandler }
  | { kind: "failure"; error: CommandError };

const HELP = "help";

/**
 * Named command handlers. Tokens resolve to a handler by exact name, or by
 * unique prefix. Construct the set before dispatch starts; it is only read
 * while messages are being handled.
 */
export class CommandSet {
  private readonly handlers = new Map<string, CommandHandler>();

  /** Adds `handler` under its name, replacing any handler already registered as that name. */
  add(handler: CommandHandler): this {
    this.handlers.set(handler.name, handler);
    return this;
  }

  get(name: string): CommandHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  get size(): number {
    return this.handlers.size;
  }

  /** Entries sorted by name, with `help` always first. */
  list(): CommandEntry[] {
    const entries: CommandEntry[] = [];
    let help: CommandEntry | undefined;
    for (const handler of this.handlers.values()) {
      const entry = { name: handler.name, description: handler.description, handler };
      if (entry.name === HELP) {
        help = entry;
        continue;
      }
      entries.push(entry);
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return help ? [help, ...entries] : entries;
  }

  names(): string[] {
    return this.list().map((entry) => entry.name);
  }

  /**
   * Picks the handler for `token`. An exact name always wins, even when the
   * token is also a prefix of other names.
   */
  resolve(token: string): CommandResolution {
    const prefix: CommandEntry[] = [];
    const exact: CommandEntry[] = [];
    for (const entry of this.list()) {
      if (entry.name.startsWith(token)) {
        prefix.push(entry);
      }
      if (entry.name === token) {
        exact.push(entry);
      }
    }

    if (prefix.length === 0 && exact.length === 0) {
      return { kind: "failure", error: unknownCommand(token) };
    }
    if (exact.length > 1) {
      return {
        kind: "failure",
        error: new CommandError(
          "ambiguous-exact",
          `multiple exact matches for ${token}`,
          exact.map((entry) => entry.name),
        ),
      };
    }
    if (exact.length === 1) {
      return { kind: "match", handler: exact[0].handler };
    }
    if (prefix.length === 1) {
      return { kind: "match", handler: prefix[0].handler };
    }
    const names = prefix.map((entry) => entry.name);
    return {
      kind: "failure",
      error: new CommandError("ambiguous-command", `ambiguous command, ${token}: ${names.join(", ")}`, names),
    };
  }

  /** Runs the command named by the first argument of `m`. */
  async nextCommand(ctx: HandlerContext, w: ResponseWriter, m: Message): Promise<CommandOutcome> {
    const argv = m.ensureArgs();
    if (argv === null) {
      return fail(badCli());
    }
    if (argv.length === 0) {
      const names = this.names();
      return fail(
        new CommandError("missing-subcommand", `required sub-command missing: ${names.join(", ")}`, names),
      );
    }

    const resolution = this.resolve(argv[0]);
    if (resolution.kind === "failure") {
      return fail(resolution.error);
    }
    return runCommandHandler(ctx, resolution.handler, w, m);
  }
}
