import { logger } from "../logger";

declare global {
  // eslint-disable-next-line no-var
  var __chatmuxProcessErrorHandlersRegistered: boolean | undefined;
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__chatmuxProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__chatmuxProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    logger.error({ err: reason }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ err: error }, "Uncaught exception");
    process.exitCode = 1;
  });
}
