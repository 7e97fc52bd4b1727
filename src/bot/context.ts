import type { Adapter } from "../adapters/types";
import { Message } from "./message";
import { newResponseWriter, type ResponseWriter } from "./response-writer";

/**
 * Carried through every handler invocation. `signal` governs the lifetime of
 * the work; long-running handlers must stop when it aborts.
 */
export interface HandlerContext {
  readonly signal: AbortSignal;
  /** Adapter replies should go through when no writer was handed over (web hooks). */
  readonly adapter?: Adapter;
  readonly values?: Readonly<Record<string, unknown>>;
}

/** A context that is never cancelled. */
export function backgroundContext(): HandlerContext {
  return { signal: new AbortController().signal };
}

/** Derives a context that aborts with its parent or when `cancel` is called. */
export function withCancel(parent: HandlerContext): { context: HandlerContext; cancel: () => void } {
  const controller = new AbortController();
  if (parent.signal.aborted) {
    controller.abort(parent.signal.reason);
  } else {
    const onAbort = () => controller.abort(parent.signal.reason);
    parent.signal.addEventListener("abort", onAbort, { once: true });
    controller.signal.addEventListener(
      "abort",
      () => parent.signal.removeEventListener("abort", onAbort),
      { once: true },
    );
  }
  return {
    context: { ...parent, signal: controller.signal },
    cancel: () => controller.abort(),
  };
}

export function withAdapter(parent: HandlerContext, adapter: Adapter): HandlerContext {
  return { ...parent, adapter };
}

export function withValue(parent: HandlerContext, key: string, value: unknown): HandlerContext {
  return { ...parent, values: { ...parent.values, [key]: value } };
}

export function valueFrom(context: HandlerContext, key: string): unknown {
  return context.values?.[key];
}

/**
 * Builds a writer on the context's adapter. The template is empty, so a
 * channel must be set before anything is sent.
 */
export function responseWriterFromContext(context: HandlerContext): ResponseWriter | undefined {
  if (!context.adapter) {
    return undefined;
  }
  return newResponseWriter(context.adapter, new Message(), context.adapter.id);
}
