import { newHearsHandler, type HearsHandler } from "../bot/handler";

export const FLIPPED_TABLE = "(╯°□°）╯︵ ┻━┻";
export const UNFLIPPED_TABLE = "┬─┬ノ( º _ ºノ)";

export function newTableflipHandler(): HearsHandler {
  return newHearsHandler(
    "tableflip",
    "puts flipped tables back",
    /\(╯°□°）╯︵ ┻━┻/,
    async (_ctx, w) => {
      await w.write(UNFLIPPED_TABLE);
    },
  );
}
