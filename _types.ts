// @filename: _types.ts
import type { SpecSubscription, SpecObserver } from "./_spec.ts";

/**
 * One notification travelling from a producer to a subscriber.
 *
 * Exactly one of three shapes. Once an `error` or `completed` event has been
 * delivered to a subscription, nothing else reaches it.
 *
 * @example
 * ```ts
 * function describe(event: Event<number>): string {
 *   switch (event.kind) {
 *     case "next": return `value ${event.value}`;
 *     case "error": return `failed: ${String(event.error)}`;
 *     case "completed": return "done";
 *   }
 * }
 * ```
 */
export type Event<T> =
  | { readonly kind: "next"; readonly value: T }
  | { readonly kind: "error"; readonly error: unknown }
  | { readonly kind: "completed" };

/** The two events that close a subscription for good. */
export type TerminalEvent = Extract<Event<never>, { kind: "error" | "completed" }>;

/**
 * A subscriber reduced to one function over the closed {@link Event} union.
 *
 * Every consumer shape accepted by `subscribe()` is normalised into one of
 * these before it reaches a sink.
 */
export type EventHandler<T> = (event: Event<T>) => void;

/**
 * Consumer-side observer.
 *
 * Extends the TC39 observer so that `start()` receives our richer
 * {@link Subscription}.
 *
 * @typeParam T - Type of values this observer can receive.
 */
export interface Observer<T> extends SpecObserver<T> {
  /**
   * Called with the new subscription before the producer is activated.
   * Disposing the subscription here prevents activation.
   */
  start?(subscription: Subscription): void;
}

/**
 * Producer-side capability handed to an activation function.
 *
 * `next` forwards a value while the subscription is open. The first of
 * `error` / `complete` to arrive closes it; every later call is dropped.
 *
 * @example
 * ```ts
 * new Observable<string>(emitter => {
 *   const socket = connect();
 *   socket.onmessage = msg => emitter.next(msg);
 *   socket.onclose = () => emitter.complete();
 *   return () => socket.close();
 * });
 * ```
 */
export interface Emitter<T> {
  next(value: T): void;
  error(error: unknown): void;
  complete(): void;

  /** Dispatches an already-built event. */
  on(event: Event<T>): void;

  /** True once a terminal event went through or the consumer disposed. */
  readonly closed: boolean;
}

/**
 * Idempotent release token.
 *
 * `dispose()` runs the underlying release action at most once, however many
 * times and from wherever it is called.
 */
export interface DisposableHandle extends Disposable {
  dispose(): void;
  readonly disposed: boolean;
}

/**
 * The handle returned by `subscribe()`.
 *
 * Disposing it stops delivery to this subscriber and releases what the
 * activation acquired; it never affects other subscriptions of the same
 * stream. `unsubscribe()` and `closed` are the TC39 names for the same
 * operation and state, kept for interop.
 *
 * @example
 * ```ts
 * const sub = stream.subscribe(value => console.log(value));
 * sub.closed;   // false
 * sub.dispose();
 * sub.closed;   // true
 * ```
 */
export interface Subscription extends DisposableHandle, SpecSubscription, AsyncDisposable {
  /**
   * True after `dispose()`, after an error and after completion.
   */
  readonly closed: boolean;

  unsubscribe(): void;

  readonly [Symbol.toStringTag]: "Subscription";
}

/**
 * What an activation function may hand back to describe its resources.
 *
 * - {@link DisposableHandle} or anything with `dispose()`.
 * - `() => void`, a plain release callback.
 * - `{ unsubscribe() }`, another library's subscription.
 * - `Disposable` / `AsyncDisposable`.
 * - nothing, when there is nothing to release.
 *
 * The release runs even if the activation terminated the subscription
 * synchronously before returning it.
 */
export type Teardown =
  | DisposableHandle
  | (() => void)
  | SpecSubscription
  | Disposable
  | AsyncDisposable
  | null
  | undefined
  | void;

/**
 * The function a stream runs once per attachment.
 */
export type Activation<T> = (emitter: Emitter<T>) => Teardown;

/**
 * Names where a {@link Scheduler} should run work. Opaque to the core;
 * `"main"` is the conventional UI / main-loop context.
 */
export type ExecutionContext = string;

/**
 * Moves work onto an execution context.
 *
 * The core never calls a scheduler; drivers and other consumers layered on
 * top of it do.
 */
export interface Scheduler {
  /**
   * Queues `work` on `context`. Disposing the returned handle before the
   * work runs cancels it.
   */
  schedule(context: ExecutionContext, work: () => void): DisposableHandle;
}

export type * from "./_spec.ts";
