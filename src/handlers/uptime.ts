import { newCommandHandler, type CommandHandler } from "../bot/handler";

const UNITS: Array<[suffix: string, ms: number]> = [
  ["d", 86_400_000],
  ["h", 3_600_000],
  ["m", 60_000],
  ["s", 1_000],
];

/** Renders a duration as e.g. `1d 2h 0m 5s`, starting at the largest non-zero unit. */
export function formatDuration(ms: number): string {
  let remaining = Math.max(0, Math.floor(ms));
  const parts: string[] = [];
  for (const [suffix, size] of UNITS) {
    const value = Math.floor(remaining / size);
    remaining -= value * size;
    if (value > 0 || parts.length > 0) {
      parts.push(`${value}${suffix}`);
    }
  }
  return parts.length > 0 ? parts.join(" ") : "0s";
}

export interface UptimeOptions {
  startedAt?: number;
  now?: () => number;
}

export function newUptimeHandler(options: UptimeOptions = {}): CommandHandler {
  const now = options.now ?? Date.now;
  const startedAt = options.startedAt ?? now();
  return newCommandHandler("uptime", "reports how long the bot has been running", async (_ctx, w, m) => {
    const parsed = m.parse();
    if (parsed.kind !== "success") {
      return parsed;
    }
    await w.write(`up ${formatDuration(now() - startedAt)}`);
  });
}
