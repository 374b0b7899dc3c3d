// @filename: event.ts
/**
 * Constructors and helpers for the {@link Event} union.
 *
 * @module
 */
import type { Event as StreamEvent, EventHandler, Observer, TerminalEvent } from "./_types.ts";

const COMPLETED: TerminalEvent = Object.freeze({ kind: "completed" });

/**
 * Builders for the three event shapes.
 *
 * @example
 * ```ts
 * handler(Event.next(1));
 * handler(Event.completed());
 * ```
 */
export const Event = {
  next<T>(value: T): StreamEvent<T> {
    return { kind: "next", value };
  },

  error(error: unknown): TerminalEvent {
    return { kind: "error", error };
  },

  /** Completion carries no payload, so one frozen instance is shared. */
  completed(): TerminalEvent {
    return COMPLETED;
  },
} as const;

export type Event<T> = StreamEvent<T>;

/** True for `error` and `completed`. */
export function isTerminal<T>(event: StreamEvent<T>): event is TerminalEvent {
  return event.kind !== "next";
}

/**
 * Turns an observer object into the single handler function the sinks work
 * with.
 *
 * Missing callbacks are skipped. `fallbackError` receives errors when the
 * observer has no `error` callback of its own.
 */
export function toEventHandler<T>(
  observer: Observer<T>,
  fallbackError: (error: unknown) => void
): EventHandler<T> {
  return (event) => {
    switch (event.kind) {
      case "next":
        observer.next?.(event.value);
        return;
      case "error":
        if (typeof observer.error === "function") observer.error(event.error);
        else fallbackError(event.error);
        return;
      case "completed":
        observer.complete?.();
        return;
    }
  };
}
