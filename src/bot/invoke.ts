import type { HandlerContext } from "./context";
import type { Message } from "./message";
import type { ResponseWriter } from "./response-writer";
import {
  hasSubCommands,
  type BackgroundHandler,
  type CommandHandler,
  type Handler,
  type HearsHandler,
  type RawHandler,
} from "./handler";
import {
  badCli,
  CommandError,
  fail,
  skipRemaining,
  success,
  type CommandOutcome,
} from "./outcome";
import { renderUsage } from "./usage";
import { logger } from "../logger";

// Every wrapper below contains whatever the handler throws: it is logged and
// the invocation ends as a no-op, so sibling invocations and the loop carry on.
function logContainedFailure(handler: Handler, capability: string, error: unknown): void {
  logger.error({ err: error, handler: handler.name, capability }, "Handler failed");
}

function isOutcome(value: CommandOutcome | void): value is CommandOutcome {
  return typeof value === "object" && value !== null;
}

/** All non-overlapping matches of `pattern` in `text`, or null when there are none. */
export function findSubmatches(pattern: RegExp, text: string): string[][] | null {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  const global = new RegExp(pattern.source, flags);
  const matches = Array.from(text.matchAll(global), (match) =>
    Array.from(match, (group) => group ?? ""),
  );
  return matches.length > 0 ? matches : null;
}

export async function runRawHandler(
  ctx: HandlerContext,
  handler: RawHandler,
  w: ResponseWriter,
  m: Message,
): Promise<void> {
  try {
    await handler.processMessage(ctx, w, m);
  } catch (error) {
    logContainedFailure(handler, "raw", error);
  }
}

/** Resolves to whether the handler's pattern matched; a miss is not an error. */
export async function runHearsHandler(
  ctx: HandlerContext,
  handler: HearsHandler,
  w: ResponseWriter,
  m: Message,
): Promise<boolean> {
  let submatches: string[][] | null;
  try {
    submatches = findSubmatches(handler.hears(), m.text);
  } catch (error) {
    logContainedFailure(handler, "hears", error);
    return false;
  }
  if (!submatches) {
    return false;
  }
  try {
    await handler.heard(ctx, w, m, submatches);
  } catch (error) {
    logContainedFailure(handler, "hears", error);
  }
  return true;
}

export async function runBackgroundHandler(
  ctx: HandlerContext,
  handler: BackgroundHandler,
  w: ResponseWriter,
): Promise<void> {
  logger.info({ handler: handler.name }, "Starting background handler");
  try {
    await handler.startBackground(ctx, w);
  } catch (error) {
    logContainedFailure(handler, "background", error);
  }
}

/**
 * Runs `handler` as a command for `m`. Used for top-level commands and for
 * every sub-command picked by a CommandSet.
 */
export async function runCommandHandler(
  ctx: HandlerContext,
  handler: CommandHandler,
  w: ResponseWriter,
  m: Message,
): Promise<CommandOutcome> {
  const argv = m.ensureArgs();
  if (argv === null) {
    return fail(badCli());
  }
  if (argv.length === 0) {
    return fail(new CommandError("no-arguments", "command handler called with no possible arguments"));
  }

  const name = argv[0];
  logger.debug({ handler: handler.name, args: argv }, "Running command handler");
  m.resetFlags(name, handler.description);

  try {
    const result = await handler.command(ctx, w, m);
    const outcome = isOutcome(result) ? result : success();
    if (outcome.kind === "usage-requested") {
      await w.write(renderUsage(handler, name, m.flags));
      return skipRemaining();
    }
    if (outcome.kind === "defer") {
      if (!hasSubCommands(handler)) {
        return fail(new CommandError("no-subcommands", `${name} has no sub-commands`));
      }
      return await handler.subCommands().nextCommand(outcome.context, w, m);
    }
    return outcome;
  } catch (error) {
    logContainedFailure(handler, "command", error);
    return success();
  }
}
