// @filename: observable.ts
/**
 * The cold event stream: a lazily-activated source of values.
 *
 * An {@link Observable} stores one activation function and nothing else.
 * Every `subscribe()` runs that function again against a fresh
 * {@link Sink}, so two subscribers get two independent executions (two
 * sockets, two timers, two HTTP requests). Nobody subscribing means the
 * function never runs at all.
 *
 * ## Lifecycle
 * ```text
 * subscribe() ──> [ open ] ──error()/complete()──> [ terminated ]  (teardown runs once)
 *                    │
 *                    └──────── dispose() ────────> [ disposed ]    (teardown runs once)
 * ```
 *
 * ## Error propagation policy
 * 1. An `Error` event goes to the subscriber's `error` callback.
 * 2. Without an `error` callback it is host-reported (see `diagnostics.ts`):
 *    handed to `onUnhandledError`, or logged and re-thrown on the
 *    micro-task queue like an unhandled Promise rejection.
 * 3. An exception thrown by a subscriber callback is host-reported the same
 *    way. It never becomes a second terminal event.
 * 4. An activation that throws before returning is turned into an `Error`
 *    event; the subscription comes back already closed.
 *
 * ## Edge cases
 * - An activation may call `complete()` / `error()` before it returns its
 *   teardown. The teardown is still released, as soon as it is returned.
 * - `next()` after a terminal event is dropped and reported as a contract
 *   violation; `next()` racing the consumer's own `dispose()` is dropped
 *   quietly.
 * - Infinite streams hold their resources until disposed. Route long-lived
 *   subscriptions through a {@link DisposeBag} owned by whoever owns the
 *   scope.
 *
 * @example DOM-free event source
 * ```ts
 * const ticks = new Observable<number>(emitter => {
 *   let n = 0;
 *   const id = setInterval(() => emitter.next(n++), 1000);
 *   return () => clearInterval(id);
 * });
 *
 * const sub = ticks.subscribe(n => console.log("tick", n));
 * // later
 * sub.dispose();
 * ```
 *
 * @example Scope-bound lifetime
 * ```ts
 * const bag = new DisposeBag();
 * ticks.subscribeToBag(bag, n => render(n));
 * messages.subscribeToBag(bag, { next: show, error: fail });
 * bag.dispose(); // both subscriptions released
 * ```
 *
 * @example Pull mode
 * ```ts
 * for await (const value of Observable.of(1, 2, 3)) {
 *   console.log(value);
 * }
 * ```
 *
 * @module
 */
import type { ObservableProtocol, SpecObservable, SpecSubscription } from "./_spec.ts";
import type { Activation, Observer, Subscription, Teardown, TerminalEvent } from "./_types.ts";
import type { DisposeBag } from "./bag.ts";

import { reportError } from "./diagnostics.ts";
import { ObservableError } from "./error.ts";
import { toEventHandler } from "./event.ts";
import { createQueue, drain, enqueue, isEmpty, isFull } from "./queue.ts";
import { Sink } from "./sink.ts";
import { Symbol } from "./symbol.ts";

/**
 * Push-based stream of values over time.
 *
 * Guarantees, per subscription:
 * 1. the activation runs once per `subscribe()`, never before;
 * 2. events arrive in the order the activation produced them;
 * 3. at most one terminal event arrives, and nothing after it;
 * 4. the activation's resources are released exactly once, on termination
 *    or on disposal, whichever comes first.
 *
 * @typeParam T - Type of values emitted by this stream
 */
export class Observable<T> implements AsyncIterable<T>, SpecObservable<T>, ObservableProtocol<T> {
  /** Runs once per subscription */
  readonly #activate: Activation<T>;

  /** Label used when reporting errors and violations */
  readonly #name: string;

  /**
   * Stores the activation function. Nothing runs until `subscribe()`.
   *
   * The activation receives an {@link Emitter}:
   * - `emitter.next(value)` emits a value
   * - `emitter.error(err)` terminates with an error
   * - `emitter.complete()` terminates normally
   * - `emitter.closed` tells whether anything will still be delivered
   *
   * and returns whatever needs releasing (see {@link Teardown}).
   *
   * @param activation - Function run once per subscription
   * @param name - Label for diagnostics, defaults to the class name
   * @throws TypeError if `activation` is not a function
   *
   * @example
   * ```ts
   * const data = new Observable<Response>(emitter => {
   *   const controller = new AbortController();
   *   fetch("/api/data", { signal: controller.signal })
   *     .then(res => { emitter.next(res); emitter.complete(); })
   *     .catch(err => emitter.error(err));
   *   return () => controller.abort();
   * });
   * ```
   */
  constructor(activation: Activation<T>, name?: string) {
    if (typeof activation !== "function") {
      throw new TypeError("Observable activation must be a function");
    }

    this.#activate = activation;
    this.#name = name ?? new.target.name;
  }

  /** Returns this stream (TC39 interop). */
  [Symbol.observable](): Observable<T> { return this; }

  /**
   * Subscribes with an observer object.
   *
   * **What happens**: a sink is created → `observer.start(subscription)` →
   * the activation runs against the sink → its teardown is attached to the
   * subscription → the subscription is returned.
   *
   * @example
   * ```ts
   * const sub = stream.subscribe({
   *   next(value) { console.log("value", value); },
   *   error(err) { console.error(err); },
   *   complete() { console.log("done"); },
   * });
   * ```
   */
  subscribe(observer?: Observer<T> | null): Subscription;

  /**
   * Subscribes with up to three callbacks. Every callback is optional.
   *
   * @example
   * ```ts
   * stream.subscribe(
   *   value => console.log(value),
   *   err => console.error(err),
   *   () => console.log("done"),
   * );
   * ```
   */
  subscribe(
    next?: ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
    complete?: (() => void) | null,
  ): Subscription;

  subscribe(
    observerOrNext?: Observer<T> | ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
    complete?: (() => void) | null,
  ): Subscription {
    return this.#subscribe(toObserver(observerOrNext, error, complete));
  }

  /**
   * Subscribes and hands the subscription to `bag`, which then owns it.
   *
   * If the bag is already disposed the subscription is released right away.
   *
   * @returns the subscription, for callers that also want to end it early
   */
  subscribeToBag(bag: DisposeBag, observer?: Observer<T> | null): Subscription;
  subscribeToBag(
    bag: DisposeBag,
    next?: ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
    complete?: (() => void) | null,
  ): Subscription;
  subscribeToBag(
    bag: DisposeBag,
    observerOrNext?: Observer<T> | ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
    complete?: (() => void) | null,
  ): Subscription {
    const subscription = this.#subscribe(toObserver(observerOrNext, error, complete));
    bag.insert(subscription);
    return subscription;
  }

  #subscribe(observer: Observer<T>): Subscription {
    const name = this.#name;
    const sink = new Sink<T>(toEventHandler(observer, err => reportError(err, name)), name);
    const subscription = sink.subscription;

    if (typeof observer.start === "function") {
      try {
        observer.start(subscription);
      } catch (err) {
        reportError(err, name);
        sink.dispose();
        return subscription;
      }

      if (sink.closed) return subscription;
    }

    let teardown: Teardown;
    try {
      teardown = this.#activate.call(undefined, sink);
    } catch (err) {
      // Failed before handing back a teardown: surface it as the stream's error.
      sink.error(err);
      return subscription;
    }

    try {
      sink.add(teardown);
    } catch (err) {
      sink.error(err);
    }

    return subscription;
  }

  /**
   * Enables `for await (const value of stream)`; see {@link pull}.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> { yield* pull(this); }

  /**
   * Converts this stream into an async generator; see {@link pull}.
   */
  pull(opts?: PullOptions): AsyncGenerator<T, void, undefined> {
    return pull(this, opts);
  }

  /**
   * Builds a stream from values, iterables, promises or foreign
   * observables; see {@link from}.
   */
  static readonly from: typeof from = from;

  /**
   * Emits the given values synchronously, then completes; see {@link of}.
   */
  static readonly of: typeof of = of;

  /** Completes immediately without emitting. */
  static empty<T = never>(): Observable<T> {
    return new Observable<T>(EMPTY);
  }

  /** Never emits and never terminates. */
  static never<T = never>(): Observable<T> {
    return new Observable<T>(NEVER);
  }

  /** Terminates every subscription with `error` straight away. */
  static fail<T = never>(error: unknown): Observable<T> {
    return new Observable<T>(emitter => emitter.error(error));
  }

  get [Symbol.toStringTag](): "Observable" { return "Observable"; }
}

/**
 * Normalises the two `subscribe()` call shapes into one observer object.
 *
 * @throws TypeError if an observer method is present but not a function
 * @internal
 */
function toObserver<T>(
  observerOrNext: Observer<T> | ((value: T) => void) | null | undefined,
  error: ((error: unknown) => void) | null | undefined,
  complete: (() => void) | null | undefined,
): Observer<T> {
  if (typeof observerOrNext === "object" && observerOrNext !== null) {
    for (const key of ["start", "next", "error", "complete"] as const) {
      const method: unknown = observerOrNext[key];
      if (method !== undefined && typeof method !== "function") {
        throw new TypeError(`Observer.${key} must be a function`);
      }
    }
    return observerOrNext;
  }

  return {
    next: observerOrNext ?? undefined,
    error: error ?? undefined,
    complete: complete ?? undefined,
  };
}

/** @internal */
function EMPTY(emitter: { complete(): void }): void { emitter.complete(); }

/** @internal */
function NEVER(): void { }

/**
 * Creates a stream that synchronously emits `items` then completes.
 *
 * Stops early if the subscriber disposes during emission.
 *
 * @example
 * ```ts
 * of(1, 2, 3).subscribe({
 *   next: x => console.log(x),
 *   complete: () => console.log("done"),
 * });
 * // 1, 2, 3, done
 * ```
 */
export function of<T>(...items: T[]): Observable<T> {
  if (items.length === 0) return new Observable<T>(EMPTY);

  return new Observable<T>(emitter => {
    for (const item of items) {
      emitter.next(item);
      if (emitter.closed) return;
    }
    emitter.complete();
  });
}

/**
 * Converts a foreign observable, a promise, an iterable or an async iterable
 * into a stream.
 *
 * 1. `[Symbol.observable]()`: adopted; our own streams are returned as is.
 * 2. Promise-like: one value then completion, or the rejection as an error.
 * 3. Iterable: every value synchronously, then completion. The iterator is
 *    closed if the subscriber disposes early.
 * 4. Async iterable: values as they arrive, then completion.
 *
 * @throws TypeError if `input` is none of the above
 *
 * @example
 * ```ts
 * from(new Set(["a", "b"])).subscribe(x => console.log(x));
 * from(Promise.resolve(42)).subscribe(x => console.log(x));
 * ```
 */
export function from<T>(
  input: SpecObservable<T> | PromiseLike<T> | Iterable<T> | AsyncIterable<T>
): Observable<T> {
  if (input === null || input === undefined) {
    throw new TypeError("Cannot convert undefined or null to Observable");
  }

  // Strings are the only primitive iterables; `in` would throw on them.
  if (!isObjectLike(input)) {
    if (typeof input === "string") return fromIterable<T>(input);
    throw new TypeError("Input is not an Observable, Iterable, AsyncIterable or Promise");
  }

  if (Symbol.observable in input) {
    const foreign = input[Symbol.observable]();
    if (!foreign || typeof foreign.subscribe !== "function") {
      throw new TypeError("Object returned from [Symbol.observable]() does not implement subscribe");
    }
    if (foreign instanceof Observable) return foreign;

    return new Observable<T>(emitter => foreign.subscribe({
      next: value => emitter.next(value),
      error: err => emitter.error(err),
      complete: () => emitter.complete(),
    }));
  }

  if ("then" in input && typeof input.then === "function") {
    const promise = input;
    return new Observable<T>(emitter => {
      promise.then(
        value => {
          emitter.next(value);
          emitter.complete();
        },
        err => emitter.error(err)
      );
    });
  }

  if (Symbol.iterator in input) return fromIterable(input);

  if (Symbol.asyncIterator in input) {
    const iterable = input;
    return new Observable<T>(emitter => {
      const iterator = iterable[Symbol.asyncIterator]();

      const consume = async () => {
        for (let step = await iterator.next(); !step.done; step = await iterator.next()) {
          emitter.next(step.value);
          if (emitter.closed) return;
        }
        emitter.complete();
      };
      consume().catch((err: unknown) => emitter.error(err));

      return () => {
        iterator.return?.()?.then(undefined, (err: unknown) => reportError(err, "Observable.from"));
      };
    });
  }

  throw new TypeError("Input is not an Observable, Iterable, AsyncIterable or Promise");
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function fromIterable<T>(iterable: Iterable<T>): Observable<T> {
  return new Observable<T>(emitter => {
    const iterator = iterable[Symbol.iterator]();

    try {
      for (let step = iterator.next(); !step.done; step = iterator.next()) {
        emitter.next(step.value);

        // Disposed mid-way: hand back a teardown that closes the iterator.
        if (emitter.closed) return () => { iterator.return?.(); };
      }
    } catch (err) {
      emitter.error(err);
      return;
    }

    emitter.complete();
  });
}

/**
 * Options for {@link pull}.
 */
export interface PullOptions {
  /**
   * Values buffered while the consumer is busy. A push source cannot be
   * slowed down, so going past this terminates iteration with an
   * {@link ObservableError} instead of growing without bound.
   *
   * @default 1024
   */
  bufferSize?: number;
}

/**
 * Consumes a stream as an async generator.
 *
 * Values pushed while the consumer is busy wait in a bounded queue. A
 * terminal error is thrown only after the values buffered before it have
 * been yielded. Leaving the loop early (`break`, `return`, a throw)
 * disposes the subscription.
 *
 * @example
 * ```ts
 * for await (const message of pull(messages, { bufferSize: 64 })) {
 *   await save(message);
 * }
 * ```
 */
export async function* pull<T>(
  input: SpecObservable<T>,
  { bufferSize = 1024 }: PullOptions = {},
): AsyncGenerator<T, void, undefined> {
  const buffer = createQueue<T>(bufferSize);
  const state: {
    terminal: TerminalEvent | null;
    wake: (() => void) | null;
    subscription: SpecSubscription | null;
  } = { terminal: null, wake: null, subscription: null };

  const notify = () => {
    const wake = state.wake;
    state.wake = null;
    wake?.();
  };

  input[Symbol.observable]().subscribe({
    start(sub) { state.subscription = sub; },
    next(value) {
      if (isFull(buffer)) {
        state.terminal = {
          kind: "error",
          error: new ObservableError([], `pull buffer overflow: more than ${bufferSize} values waiting`, {
            source: "pull",
            tip: "raise bufferSize or consume faster",
          }),
        };
        state.subscription?.unsubscribe();
      } else {
        enqueue(buffer, value);
      }
      notify();
    },
    error(err) { state.terminal = { kind: "error", error: err }; notify(); },
    complete() { state.terminal = { kind: "completed" }; notify(); },
  });

  try {
    while (true) {
      if (!isEmpty(buffer)) {
        for (const value of drain(buffer)) yield value;
        continue;
      }

      const terminal = state.terminal;
      if (terminal?.kind === "error") {
        throw terminal.error instanceof Error ? terminal.error : ObservableError.from(terminal.error, "pull");
      }
      if (terminal?.kind === "completed") return;

      await new Promise<void>(resolve => { state.wake = resolve; });
    }
  } finally {
    state.subscription?.unsubscribe();
  }
}
