// @filename: sink.ts
/**
 * The adapter between one activation and one subscriber.
 *
 * A {@link Sink} is the {@link Emitter} an activation function writes to. It
 * owns the subscription's {@link TerminalGuard} and its resources, and it is
 * the only place that decides whether an event still reaches the
 * subscriber:
 *
 * - `next` is forwarded while the guard is open and dropped afterwards,
 *   never queued or reordered;
 * - `error` / `complete` race for the guard's single `open -> terminated`
 *   transition; the winner forwards the event and then releases the
 *   resources, every loser is dropped;
 * - disposing the subscription moves the guard to `disposed` and releases
 *   the resources without forwarding anything.
 *
 * Events dropped after a terminal event are producer bugs and are reported
 * as contract violations. Events dropped after the consumer disposed are
 * an expected race and only logged at debug level.
 *
 * @module
 */
import type { EventHandler, Emitter, Subscription, Teardown } from "./_types.ts";
import type { Event } from "./event.ts";
import type { GuardState } from "./guard.ts";

import { DisposeBag } from "./bag.ts";
import { reportDropped, reportError, reportViolation } from "./diagnostics.ts";
import { TerminalGuard } from "./guard.ts";
import { Symbol } from "./symbol.ts";

export class Sink<T> implements Emitter<T> {
  readonly #guard = new TerminalGuard();
  readonly #resources = new DisposeBag();
  readonly #source: string;

  /** Nulled once the guard closes so the subscriber can be collected. */
  #handler: EventHandler<T> | null;

  /** The consumer's handle onto this sink. */
  readonly subscription: Subscription;

  /**
   * @param handler - The subscriber, already reduced to one function.
   * @param source - Name used when reporting drops and violations.
   */
  constructor(handler: EventHandler<T>, source = "Observable") {
    this.#handler = handler;
    this.#source = source;
    this.subscription = createSubscription(this);
  }

  get closed(): boolean {
    return !this.#guard.isOpen;
  }

  get state(): GuardState {
    return this.#guard.state;
  }

  next(value: T): void {
    if (!this.#guard.isOpen) {
      this.#drop("next", value);
      return;
    }

    this.#deliver({ kind: "next", value });
  }

  error(error: unknown): void {
    this.on({ kind: "error", error });
  }

  complete(): void {
    this.on({ kind: "completed" });
  }

  on(event: Event<T>): void {
    if (event.kind === "next") {
      this.next(event.value);
      return;
    }

    if (!this.#guard.stop("terminated")) {
      this.#drop(event.kind, event.kind === "error" ? event.error : undefined);
      return;
    }

    this.#deliver(event);
    this.#handler = null;
    this.#resources.dispose();
  }

  /**
   * Hands a resource to this subscription. Released together with the
   * subscription, or immediately if the subscription is already closed.
   */
  add(teardown: Teardown): void {
    this.#resources.insert(teardown);
  }

  /** Consumer-side cancellation. Idempotent. */
  dispose(): void {
    if (!this.#guard.stop("disposed")) return;

    this.#handler = null;
    this.#resources.dispose();
  }

  /**
   * Binds a value forwarder to the current subscriber.
   *
   * While the sink is open it behaves like {@link next}. After the consumer
   * disposes, it still hands values to the subscriber it was bound to: a
   * multicast source uses it for an emission that was already under way when
   * the disposal happened. After a terminal event nothing goes through.
   */
  forwarder(): (value: T) => void {
    const handler = this.#handler;

    return value => {
      if (this.#guard.state !== "disposed" || !handler) {
        this.next(value);
        return;
      }
      this.#invoke(handler, { kind: "next", value });
    };
  }

  #deliver(event: Event<T>): void {
    const handler = this.#handler;
    if (handler) this.#invoke(handler, event);
  }

  #invoke(handler: EventHandler<T>, event: Event<T>): void {
    try {
      handler(event);
    } catch (err) {
      // Consumer failures never reach the subscriber's own error channel.
      reportError(err, this.#source);
    }
  }

  #drop(kind: Event<T>["kind"], value: unknown): void {
    if (this.#guard.state === "terminated") reportViolation("event-after-terminal", this.#source, value);
    else reportDropped(this.#source, kind);
  }

  get [Symbol.toStringTag](): "Sink" { return "Sink"; }
}

/**
 * Builds the public {@link Subscription} facade over a sink.
 *
 * @internal
 */
function createSubscription<T>(sink: Sink<T>): Subscription {
  return {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },

    get closed() { return sink.closed; },

    get disposed() { return sink.closed; },

    dispose(): void { sink.dispose(); },

    unsubscribe(): void { sink.dispose(); },

    [Symbol.dispose]() {
      sink.dispose();
    },

    [Symbol.asyncDispose]() {
      sink.dispose();
      return Promise.resolve();
    },
  };
}
