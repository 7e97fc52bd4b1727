import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryAdapter } from "../../tests/harness/memory-adapter";
import type { Adapter } from "./types";
import { AdapterRegistry } from "./registry";
import { logger } from "../logger";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("AdapterRegistry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("rejects duplicate ids", () => {
    const registry = new AdapterRegistry();
    registry.register(new MemoryAdapter("chat"));

    expect(() => registry.register(new MemoryAdapter("chat"))).toThrow(
      "Adapter with id chat already registered",
    );
  });

  it("connects the remaining adapters when one fails", async () => {
    const registry = new AdapterRegistry();
    const healthy = new MemoryAdapter("healthy");
    const broken: Adapter = {
      id: "broken",
      send: async () => {},
      receive: async function* () {},
      connect: async () => {
        throw new Error("refused");
      },
    };
    registry.register(broken);
    registry.register(healthy);

    await registry.connectAll();

    expect(healthy.getStatus()).toBe("connected");
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ adapter: "broken" }),
      "Failed to connect adapter",
    );
  });

  it("logs errors emitted by event-emitting adapters", () => {
    const registry = new AdapterRegistry();
    const adapter = new MemoryAdapter("noisy");
    registry.register(adapter);

    const error = new Error("socket reset");
    adapter.emit("error", error);

    expect(logger.error).toHaveBeenCalledWith({ err: error, adapter: "noisy" }, "Adapter error");
  });

  it("forgets unregistered adapters", () => {
    const registry = new AdapterRegistry();
    registry.register(new MemoryAdapter("chat"));
    registry.unregister("chat");

    expect(registry.get("chat")).toBeUndefined();
    expect(registry.list()).toEqual([]);
  });
});
