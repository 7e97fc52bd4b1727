import type { Mux } from "../bot/mux";
import type { Handler } from "../bot/handler";
import { newEchoHook } from "./echo-hook";
import { newPingHandler } from "./ping";
import { newSayHandler } from "./say";
import { newTableflipHandler } from "./tableflip";
import { newUptimeHandler } from "./uptime";

export const BUNDLED_HANDLERS = ["ping", "uptime", "tableflip", "say", "echo"] as const;

export type BundledHandlerName = (typeof BUNDLED_HANDLERS)[number];

const factories: Record<BundledHandlerName, () => Handler> = {
  ping: newPingHandler,
  uptime: () => newUptimeHandler(),
  tableflip: newTableflipHandler,
  say: newSayHandler,
  echo: newEchoHook,
};

export function createBundledHandler(name: BundledHandlerName): Handler {
  return factories[name]();
}

export function registerBundledHandlers(
  mux: Mux,
  names: readonly BundledHandlerName[] = BUNDLED_HANDLERS,
): Mux {
  for (const name of new Set(names)) {
    mux.handle(createBundledHandler(name));
  }
  return mux;
}

export { newEchoHook } from "./echo-hook";
export { newPingHandler } from "./ping";
export { newSayHandler } from "./say";
export { newTableflipHandler, FLIPPED_TABLE, UNFLIPPED_TABLE } from "./tableflip";
export { formatDuration, newUptimeHandler, type UptimeOptions } from "./uptime";
