import type { Sender } from "../adapters/types";
import { Message } from "./message";
import { messagesSent } from "./metrics";

/**
 * Sends replies back through an adapter. Each writer is owned by one task;
 * hand other tasks a `copy()` rather than sharing it.
 */
export interface ResponseWriter extends Sender {
  /** Adapter label used for metrics. */
  readonly adapterLabel: string;
  /** Sends `text` as one complete message built from the current template. */
  write(text: string): Promise<void>;
  /** Forces messages to a certain channel */
  setChannel(channel: string): void;
  /** Forces messages to a certain user */
  setTo(to: string): void;
  /** Forces messages to a different sender or adapter */
  setSender(sender: Sender): void;
  /** Same sender and label, with an empty template unless one is given. */
  copy(template?: Message): ResponseWriter;
}

class BoundResponseWriter implements ResponseWriter {
  constructor(
    private sender: Sender,
    private readonly template: Message,
    readonly adapterLabel: string,
  ) {}

  async write(text: string): Promise<void> {
    const outbound = this.template.copy();
    outbound.text = text;
    await this.send(outbound);
  }

  setChannel(channel: string): void {
    this.template.channel = channel;
  }

  setTo(to: string): void {
    this.template.to = to;
  }

  setSender(sender: Sender): void {
    this.sender = sender;
  }

  async send(message: Message, signal?: AbortSignal): Promise<void> {
    messagesSent.labels(this.adapterLabel, message.channel, message.from).inc();
    await this.sender.send(message, signal);
  }

  copy(template?: Message): ResponseWriter {
    return new BoundResponseWriter(this.sender, template?.copy() ?? new Message(), this.adapterLabel);
  }
}

export function newResponseWriter(sender: Sender, template: Message, adapterLabel: string): ResponseWriter {
  return new BoundResponseWriter(sender, template, adapterLabel);
}

const nullSender: Sender = {
  async send(): Promise<void> {},
};

/** A writer that discards everything sent to it. */
export function newNullResponseWriter(template: Message = new Message()): ResponseWriter {
  return newResponseWriter(nullSender, template.copy(), "null");
}
