import { Command, CommanderError } from "commander";
import {
  badCli,
  CommandError,
  fail,
  success,
  usageRequested,
  type CommandOutcome,
} from "./outcome";
import { tokenize } from "./shellwords";

export interface MessageInit {
  channel?: string;
  from?: string;
  to?: string;
  userId?: string;
  private?: boolean;
  toBot?: boolean;
  text?: string;
}

const HELP_CODES = new Set(["commander.helpDisplayed", "commander.help"]);

/**
 * Rewrites `-help` to `--help` within the leading flags only. Operands, and
 * anything after them or after `--`, are left as typed.
 */
function normalizeHelpFlag(flags: Command, args: readonly string[]): string[] {
  const result = [...args];
  for (let i = 0; i < result.length; i++) {
    const arg = result[i];
    if (arg === "--" || arg === "-" || !arg.startsWith("-")) {
      break;
    }
    if (arg === "-help") {
      result[i] = "--help";
      continue;
    }
    const option = flags.options.find((candidate) => candidate.short === arg || candidate.long === arg);
    const next = result[i + 1];
    if (option?.required || (option?.optional && next !== undefined && !next.startsWith("-"))) {
      i++;
    }
  }
  return result;
}

/**
 * A single chat utterance, inbound or outbound.
 *
 * When processed as a command the text is tokenized into `args` on first use,
 * and `flags` holds a commander parser scoped to the current command.
 */
export class Message {
  channel: string;
  from: string;
  to: string;
  userId: string;
  private: boolean;
  toBot: boolean;
  text: string;

  private argv: string[] | undefined;
  private flagSet: Command | undefined;
  private flagOutput = "";

  constructor(init: MessageInit = {}) {
    this.channel = init.channel ?? "";
    this.from = init.from ?? "";
    this.to = init.to ?? "";
    this.userId = init.userId ?? "";
    this.private = init.private ?? false;
    this.toBot = init.toBot ?? false;
    this.text = init.text ?? "";
  }

  /** Shallow copy of the envelope; the argument vector and flags are not carried over. */
  copy(): Message {
    return new Message({
      channel: this.channel,
      from: this.from,
      to: this.to,
      userId: this.userId,
      private: this.private,
      toBot: this.toBot,
      text: this.text,
    });
  }

  /** Current argument vector, empty until the message has been tokenized. */
  get args(): readonly string[] {
    return this.argv ?? [];
  }

  get hasArgs(): boolean {
    return this.argv !== undefined;
  }

  /**
   * Tokenizes `text` the first time it is called and returns the stored
   * vector afterwards. Returns null when the text is not a valid command line.
   */
  ensureArgs(): readonly string[] | null {
    if (this.argv === undefined) {
      const words = tokenize(this.text);
      if (words === null) {
        return null;
      }
      this.argv = words;
    }
    return this.argv;
  }

  setArgs(args: readonly string[]): void {
    this.argv = [...args];
  }

  /**
   * Flag parser for the command currently handling this message. Handlers add
   * options to it before calling `parse()`.
   */
  get flags(): Command {
    return this.flagSet ?? this.resetFlags(this.args[0] ?? "command");
  }

  /** Replaces the flag parser with a fresh one named after `name`. */
  resetFlags(name: string, description?: string): Command {
    this.flagOutput = "";
    const flags = new Command(name)
      .exitOverride()
      .passThroughOptions()
      .allowExcessArguments(true)
      .configureOutput({
        writeOut: (text) => {
          this.flagOutput += text;
        },
        writeErr: (text) => {
          this.flagOutput += text;
        },
      });
    if (description) {
      flags.description(description);
    }
    this.flagSet = flags;
    return flags;
  }

  /**
   * Parses leading flags out of the argument vector. Afterwards `args` holds
   * only the operands that followed the flags, so `args[0]` names the next
   * sub-command, if any.
   */
  parse(): CommandOutcome {
    const argv = this.ensureArgs();
    if (argv === null) {
      return fail(badCli());
    }
    const flags = this.flags;
    const operands = normalizeHelpFlag(flags, argv.slice(1));
    try {
      flags.parse(operands, { from: "user" });
    } catch (error) {
      if (error instanceof CommanderError) {
        if (HELP_CODES.has(error.code)) {
          return usageRequested();
        }
        const detail = this.flagOutput.trim() || error.message;
        return fail(new CommandError("invalid-flags", detail));
      }
      throw error;
    }
    this.argv = [...flags.args];
    return success();
  }
}
