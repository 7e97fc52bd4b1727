import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === "1" || process.env.NO_COLOR === "true") {
    return false;
  }
  return Boolean(process.stderr.isTTY);
}

// Logs go to stderr so the shell adapter keeps stdout for the conversation.
export const logger = pino({
  level: process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: shouldColorizeLogs(),
      destination: 2,
    },
  },
});

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if ((LOG_LEVELS as readonly string[]).includes(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, "Invalid logger level in config; keeping current level");
}
