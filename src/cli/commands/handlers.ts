import { Mux } from "../../bot/mux";
import { BUNDLED_HANDLERS, createBundledHandler, registerBundledHandlers } from "../../handlers";

export function listHandlers(): void {
  const handlers = BUNDLED_HANDLERS.map((name) => createBundledHandler(name));
  const width = Math.max(...handlers.map((handler) => handler.name.length));
  for (const handler of handlers) {
    console.log(`${handler.name.padEnd(width)}  ${handler.description}`);
  }
}

/** Chat commands a mux with every bundled handler answers to. */
export function listCommands(): void {
  for (const command of registerBundledHandlers(new Mux()).listCommands()) {
    console.log(command.name);
  }
}
