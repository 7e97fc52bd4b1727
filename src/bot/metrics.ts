import { Counter, Registry } from "prom-client";

// Kept apart from the prom-client global registry.
export const metricsRegistry = new Registry();

export const messagesReceived = new Counter({
  name: "chatmux_messages_received_total",
  help: "Number of messages received from adapters",
  labelNames: ["adapter", "channel", "user"],
  registers: [metricsRegistry],
});

export const messagesSent = new Counter({
  name: "chatmux_messages_sent_total",
  help: "Number of messages sent through response writers",
  labelNames: ["adapter", "channel", "user"],
  registers: [metricsRegistry],
});
