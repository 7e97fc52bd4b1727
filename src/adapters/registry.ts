import { EventEmitter } from "node:events";
import type { Adapter } from "./types";
import { logger } from "../logger";

export class AdapterRegistry {
  private adapters: Map<string, Adapter> = new Map();

  register(adapter: Adapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter with id ${adapter.id} already registered`);
    }
    this.adapters.set(adapter.id, adapter);

    if (adapter instanceof EventEmitter) {
      adapter.on("error", (error: Error) => {
        logger.error({ err: error, adapter: adapter.id }, "Adapter error");
      });
    }

    logger.info({ adapter: adapter.id }, "Adapter registered");
  }

  unregister(id: string): void {
    const adapter = this.adapters.get(id);
    if (adapter) {
      if (adapter instanceof EventEmitter) {
        adapter.removeAllListeners("error");
      }
      this.adapters.delete(id);
      logger.info({ adapter: id }, "Adapter unregistered");
    }
  }

  get(id: string): Adapter | undefined {
    return this.adapters.get(id);
  }

  list(): Adapter[] {
    return Array.from(this.adapters.values());
  }

  /** Connects every adapter; failures are logged and the remaining adapters still connect. */
  async connectAll(): Promise<void> {
    const adapters = this.list();
    const results = await Promise.allSettled(adapters.map((adapter) => adapter.connect?.()));

    results.forEach((result, i) => {
      if (result.status === "rejected") {
        logger.error({ err: result.reason, adapter: adapters[i].id }, "Failed to connect adapter");
      }
    });
  }

  async disconnectAll(): Promise<void> {
    const adapters = this.list();
    const results = await Promise.allSettled(adapters.map((adapter) => adapter.disconnect?.()));

    results.forEach((result, i) => {
      if (result.status === "rejected") {
        logger.error({ err: result.reason, adapter: adapters[i].id }, "Failed to disconnect adapter");
      }
    });
  }
}
