/**
 * A small reactive core: push-based event streams with strict delivery and
 * release guarantees.
 *
 * A stream is a recipe. Nothing runs until someone subscribes; every
 * subscription runs the recipe again and gets its own, independent
 * lifecycle. What the library promises for every subscription:
 *
 * - values arrive in the order the producer sent them;
 * - at most one terminal event (`error` or `complete`) arrives, and nothing
 *   after it;
 * - whatever the producer acquired is released exactly once, whether the
 *   stream ended on its own or the consumer disposed first.
 *
 * ## Getting started
 *
 * ```ts
 * import { Observable } from "rivulet";
 *
 * const ticks = new Observable<number>(emitter => {
 *   let n = 0;
 *   const timer = setInterval(() => emitter.next(n++), 1000);
 *   return () => clearInterval(timer);
 * });
 *
 * const sub = ticks.subscribe({
 *   next: n => console.log("tick", n),
 *   error: err => console.error(err),
 *   complete: () => console.log("done"),
 * });
 *
 * sub.dispose(); // interval cleared, nothing more is delivered
 * ```
 *
 * Streams are also async-iterable:
 *
 * ```ts
 * for await (const n of Observable.of(1, 2, 3)) console.log(n);
 * ```
 *
 * ## Owning many subscriptions
 *
 * A {@link DisposeBag} collects subscriptions and releases them together,
 * typically from an owner's own teardown:
 *
 * ```ts
 * const bag = new DisposeBag();
 * clicks.subscribeToBag(bag, onClick);
 * keys.subscribeToBag(bag, onKey);
 * bag.dispose();
 * ```
 *
 * ## Hot streams
 *
 * {@link Subject}, {@link BehaviorSubject} and {@link ReplaySubject} multicast
 * what is pushed into them. Relays ({@link PublishRelay},
 * {@link BehaviorRelay}) do the same but can never terminate. {@link share}
 * and {@link shareReplay} turn one cold stream into a hot one.
 *
 * ## One value, or none
 *
 * {@link Single}, {@link Maybe} and {@link Completable} are streams with a
 * bounded number of values, each convertible to a promise.
 *
 * ## Binding to a view
 *
 * {@link asDriver} wraps a stream so it never errors, runs once, and
 * delivers through a {@link Scheduler}.
 *
 * ## When things go wrong
 *
 * Errors nobody handles and producers that break the delivery contract are
 * routed through {@link configure}:
 *
 * ```ts
 * configure({
 *   logger: appLogger,
 *   onUnhandledError: err => reporter.capture(err),
 *   onContractViolation: violation => appLogger.warn(violation.kind),
 * });
 * ```
 *
 * @module
 */
export * from "./observable.ts";
export * from "./bag.ts";
export * from "./disposable.ts";
export * from "./guard.ts";
export * from "./event.ts";
export * from "./sink.ts";
export * from "./subject.ts";
export * from "./relay.ts";
export * from "./single.ts";
export * from "./maybe.ts";
export * from "./completable.ts";
export * from "./share.ts";
export * from "./scheduler.ts";
export * from "./driver.ts";
export * from "./error.ts";
export * from "./diagnostics.ts";

export type { ToPromiseOptions } from "./_promise.ts";
export type {
  Activation,
  DisposableHandle,
  Emitter,
  EventHandler,
  ExecutionContext,
  Observer,
  Scheduler,
  Subscription,
  Teardown,
  TerminalEvent,
} from "./_types.ts";
export type * from "./_spec.ts";
