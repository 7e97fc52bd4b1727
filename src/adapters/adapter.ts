import { EventEmitter } from "node:events";
import type { Message } from "../bot/message";
import type { Adapter, AdapterStatus } from "./types";
import { AsyncQueue } from "../utils/async-queue";

// Base class with common functionality
export abstract class BaseAdapter extends EventEmitter implements Adapter {
  abstract readonly id: string;
  protected status: AdapterStatus = "disconnected";
  private readonly inbound = new AsyncQueue<Message>();

  abstract send(message: Message, signal?: AbortSignal): Promise<void>;

  receive(signal?: AbortSignal): AsyncIterable<Message> {
    return this.inbound.iterate(signal);
  }

  getStatus(): AdapterStatus {
    return this.status;
  }

  isConnected(): boolean {
    return this.status === "connected";
  }

  protected setStatus(status: AdapterStatus): void {
    this.status = status;
    this.emit("status", status);
  }

  protected emitMessage(message: Message): void {
    this.inbound.enqueue(message);
  }

  /** Ends the inbound stream once queued messages have been consumed. */
  protected closeInbound(): void {
    this.inbound.close();
  }
}
