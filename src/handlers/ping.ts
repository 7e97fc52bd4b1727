import { newCommandHandler, type CommandHandler } from "../bot/handler";

export function newPingHandler(): CommandHandler {
  return newCommandHandler("ping", "responds to ping with PONG", async (_ctx, w, m) => {
    const parsed = m.parse();
    if (parsed.kind !== "success") {
      return parsed;
    }
    await w.write("PONG");
  });
}
