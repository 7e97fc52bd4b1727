import type { HandlerContext } from "./context";

export type CommandErrorKind =
  | "bad-cli"
  | "unknown-command"
  | "ambiguous-command"
  | "ambiguous-exact"
  | "missing-subcommand"
  | "no-arguments"
  | "no-subcommands"
  | "invalid-flags"
  | "handler";

export class CommandError extends Error {
  readonly kind: CommandErrorKind;
  readonly candidates: string[];

  constructor(kind: CommandErrorKind, message: string, candidates: string[] = []) {
    super(message);
    this.name = "CommandError";
    this.kind = kind;
    this.candidates = candidates;
  }
}

export const badCli = () => new CommandError("bad-cli", "could not process as command line");

export const unknownCommand = (name?: string) =>
  new CommandError("unknown-command", name ? `unknown command: ${name}` : "unknown command");

/**
 * Result of invoking a command handler. Only `failure` is an error; the other
 * variants steer the caller.
 */
export type CommandOutcome =
  | { kind: "success" }
  | { kind: "usage-requested" }
  | { kind: "defer"; context: HandlerContext }
  | { kind: "skip-remaining" }
  | { kind: "failure"; error: CommandError };

export const success = (): CommandOutcome => ({ kind: "success" });

export const usageRequested = (): CommandOutcome => ({ kind: "usage-requested" });

/** Hands the (already advanced) message to the handler's sub-commands. */
export const deferToSubCommands = (context: HandlerContext): CommandOutcome => ({
  kind: "defer",
  context,
});

/** The command consumed the message; hears handlers should not run for it. */
export const skipRemaining = (): CommandOutcome => ({ kind: "skip-remaining" });

export function fail(error: CommandError | string): CommandOutcome {
  return {
    kind: "failure",
    error: typeof error === "string" ? new CommandError("handler", error) : error,
  };
}
