// @filename: driver.ts
/**
 * UI-safe streams.
 *
 * A {@link Driver} wraps a source so that it can be bound straight to a view:
 *
 * - it never errors: an error is replaced by the `fallback` value followed
 *   by completion, and logged at debug level;
 * - every event reaches subscribers through the given {@link Scheduler} on
 *   the given context (`"main"` by default);
 * - the source runs once while it has subscribers, however many attach, and
 *   the latest value is replayed to each new one. It is disconnected when
 *   the last subscriber leaves and restarted by the next one.
 *
 * @example
 * ```ts
 * const status = asDriver(connectionStatus(), { fallback: "offline" });
 * status.subscribe(text => label.textContent = text);
 * ```
 *
 * @module
 */
import type { Activation, ExecutionContext, Scheduler } from "./_types.ts";
import type { SpecObservable } from "./_spec.ts";

import { getConfiguration } from "./diagnostics.ts";
import { compositeDisposable } from "./disposable.ts";
import { Event } from "./event.ts";
import { from, Observable } from "./observable.ts";
import { microtaskScheduler } from "./scheduler.ts";
import { share } from "./share.ts";
import { BehaviorSubject, ReplaySubject } from "./subject.ts";
import type { Subject } from "./subject.ts";

export interface DriverOptions<T> {
  /** Emitted in place of an error, right before completion. */
  fallback: T;
  /** @default microtaskScheduler */
  scheduler?: Scheduler;
  /** @default "main" */
  context?: ExecutionContext;
  /**
   * Value every subscriber receives before the source produces one. When
   * left `undefined`, subscribers receive the latest value once there is one.
   */
  initial?: T;
}

export class Driver<T> extends Observable<T> {
  constructor(source: SpecObservable<T> | Observable<T>, options: DriverOptions<T>) {
    super(createActivation(source, options), "Driver");
  }
}

/** Shorthand for `new Driver(source, options)`. */
export function asDriver<T>(source: SpecObservable<T> | Observable<T>, options: DriverOptions<T>): Driver<T> {
  return new Driver(source, options);
}

function createActivation<T>(
  source: SpecObservable<T> | Observable<T>,
  options: DriverOptions<T>
): Activation<T> {
  const { fallback, scheduler = microtaskScheduler, context = "main" } = options;
  const upstream = from(source);

  const recovered = new Observable<T>(emitter => upstream.subscribe({
    next: value => emitter.next(value),
    error(err) {
      getConfiguration().logger.debug("[rivulet] Driver: error replaced by fallback value", err);
      emitter.next(fallback);
      emitter.complete();
    },
    complete: () => emitter.complete(),
  }), "Driver");

  const { initial } = options;
  const connector = (): Subject<T> => initial !== undefined
    ? new BehaviorSubject<T>(initial, "Driver")
    : new ReplaySubject<T>(1, "Driver");

  const shared = share(recovered, { connector, mode: "lazy", reset: true });

  return emitter => {
    // Work already handed to the scheduler, cancelled if the subscriber leaves.
    const pending = new Set<{ cancel(): void }>();

    const deliver = (event: Event<T>) => {
      const job = { ran: false, cancel: () => { } };
      const handle = scheduler.schedule(context, () => {
        job.ran = true;
        pending.delete(job);
        emitter.on(event);
      });

      if (job.ran) return;
      job.cancel = () => handle.dispose();
      pending.add(job);
    };

    const subscription = shared.subscribe({
      next: value => deliver(Event.next(value)),
      complete: () => deliver(Event.completed()),
    });

    return compositeDisposable(subscription, () => {
      for (const job of pending) job.cancel();
      pending.clear();
    });
  };
}
