import { describe, expect, it, vi } from "vitest";
import { MemoryAdapter } from "../../tests/harness/memory-adapter";
import { backgroundContext } from "../bot/context";
import { runCommandHandler } from "../bot/invoke";
import { Message } from "../bot/message";
import { newResponseWriter } from "../bot/response-writer";
import { newPingHandler } from "./ping";
import { formatDuration, newUptimeHandler } from "./uptime";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("formatDuration", () => {
  it("starts at the largest non-zero unit", () => {
    expect(formatDuration(0)).toBe("0s");
    expect(formatDuration(999)).toBe("0s");
    expect(formatDuration(42_000)).toBe("42s");
    expect(formatDuration(3_600_000)).toBe("1h 0m 0s");
    expect(formatDuration(90_061_000)).toBe("1d 1h 1m 1s");
  });
});

describe("uptime and ping", () => {
  it("reports the time since the handler was created", async () => {
    const adapter = new MemoryAdapter();
    const handler = newUptimeHandler({ startedAt: 1_000, now: () => 3_724_000 });

    await runCommandHandler(
      backgroundContext(),
      handler,
      newResponseWriter(adapter, new Message(), adapter.id),
      new Message({ text: "uptime" }),
    );

    expect(adapter.texts()).toEqual(["up 1h 2m 3s"]);
  });

  it("answers ping with PONG", async () => {
    const adapter = new MemoryAdapter();

    await runCommandHandler(
      backgroundContext(),
      newPingHandler(),
      newResponseWriter(adapter, new Message(), adapter.id),
      new Message({ text: "ping" }),
    );

    expect(adapter.texts()).toEqual(["PONG"]);
  });
});
