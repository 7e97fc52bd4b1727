import { CommandSet } from "../bot/command-set";
import { valueFrom, withValue } from "../bot/context";
import { newCommandHandler, type CommandFunc, type CommandWithSubsHandler } from "../bot/handler";
import { deferToSubCommands, fail } from "../bot/outcome";

const TIMES_KEY = "say.times";
const MAX_TIMES = 5;

function repeatFrom(transform: (text: string) => string): CommandFunc {
  return async (ctx, w, m) => {
    const parsed = m.parse();
    if (parsed.kind !== "success") {
      return parsed;
    }
    if (m.args.length === 0) {
      return fail("nothing to say");
    }
    const times = valueFrom(ctx, TIMES_KEY);
    const count = typeof times === "number" ? times : 1;
    const text = transform(m.args.join(" "));
    for (let i = 0; i < count; i += 1) {
      await w.write(text);
    }
  };
}

/** `say [-n count] echo|shout <words...>` */
export function newSayHandler(): CommandWithSubsHandler {
  const subs = new CommandSet()
    .add(newCommandHandler("echo", "repeats the words back", repeatFrom((text) => text)))
    .add(newCommandHandler("shout", "repeats the words back in capitals", repeatFrom((text) => text.toUpperCase())));

  return newCommandHandler(
    "say",
    "says things back to you",
    async (ctx, _w, m) => {
      m.flags.option("-n, --times <count>", `how many times to say it (1-${MAX_TIMES})`, "1");
      const parsed = m.parse();
      if (parsed.kind !== "success") {
        return parsed;
      }
      const raw: unknown = m.flags.opts().times;
      const times = Number(raw);
      if (!Number.isInteger(times) || times < 1 || times > MAX_TIMES) {
        return fail(`--times must be a whole number from 1 to ${MAX_TIMES}`);
      }
      return deferToSubCommands(withValue(ctx, TIMES_KEY, times));
    },
    subs,
  );
}
