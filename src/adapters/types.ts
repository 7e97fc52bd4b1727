import type { Message } from "../bot/message";

/** Anything a ResponseWriter can deliver messages through. */
export interface Sender {
  send(message: Message, signal?: AbortSignal): Promise<void>;
}

/**
 * Bridge between a chat network and the dispatch loop. `id` labels the
 * adapter in logs and metrics.
 */
export interface Adapter extends Sender {
  readonly id: string;
  /** Inbound messages in arrival order. The iterable ends when `signal` aborts or the adapter closes. */
  receive(signal?: AbortSignal): AsyncIterable<Message>;
  connect?(): Promise<void>;
  disconnect?(): Promise<void>;
}

export type AdapterStatus = "connected" | "connecting" | "disconnected" | "error";
