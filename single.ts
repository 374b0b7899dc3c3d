// @filename: single.ts
/**
 * A stream that produces exactly one value or one error.
 *
 * A {@link Single} is a thin layer over {@link Observable}: `success(value)`
 * becomes `next(value)` followed by `complete()`, so guard and disposal
 * semantics are the ones every stream has. The first of `success` / `error`
 * settles the single; anything after it is dropped and reported to
 * diagnostics.
 *
 * @example
 * ```ts
 * const user = new Single<User>(emitter => {
 *   const controller = new AbortController();
 *   fetchUser(id, controller.signal).then(
 *     u => emitter.success(u),
 *     err => emitter.error(err),
 *   );
 *   return () => controller.abort();
 * });
 *
 * const profile = await user.toPromise();
 * ```
 *
 * @module
 */
import type { Emitter, Subscription, Teardown } from "./_types.ts";
import type { SpecObservable } from "./_spec.ts";
import type { ToPromiseOptions } from "./_promise.ts";

import { settle } from "./_promise.ts";
import { reportViolation } from "./diagnostics.ts";
import { SequenceError } from "./error.ts";
import { TerminalGuard } from "./guard.ts";
import { from, Observable } from "./observable.ts";
import { Symbol } from "./symbol.ts";

/** Producer-side capability of a {@link Single}. */
export interface SingleEmitter<T> {
  success(value: T): void;
  error(error: unknown): void;
  readonly closed: boolean;
}

export interface SingleObserver<T> {
  success?(value: T): void;
  error?(error: unknown): void;
}

export type SingleActivation<T> = (emitter: SingleEmitter<T>) => Teardown;

export class Single<T> implements SpecObservable<T> {
  readonly #source: Observable<T>;

  /**
   * @throws TypeError if `activation` is not a function
   */
  constructor(activation: SingleActivation<T>, name = "Single") {
    if (typeof activation !== "function") {
      throw new TypeError("Single activation must be a function");
    }

    this.#source = new Observable<T>(emitter => activation(toSingleEmitter(emitter, name)), name);
  }

  subscribe(observer?: SingleObserver<T> | null): Subscription;
  subscribe(
    success?: ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
  ): Subscription;
  subscribe(
    observerOrSuccess?: SingleObserver<T> | ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
  ): Subscription {
    const observer: SingleObserver<T> = typeof observerOrSuccess === "object" && observerOrSuccess !== null
      ? observerOrSuccess
      : { success: observerOrSuccess ?? undefined, error: error ?? undefined };

    const onError = observer.error;
    return this.#source.subscribe({
      next: value => observer.success?.(value),
      // Left undefined so an unhandled error takes the host-report path.
      error: typeof onError === "function" ? err => onError.call(observer, err) : undefined,
    });
  }

  /** Resolves with the value, rejects with the error. */
  toPromise(options?: ToPromiseOptions): Promise<T> {
    return settle<T>("Single", (resolve, reject) => this.subscribe(resolve, reject), options);
  }

  /** The underlying one-value stream. */
  asObservable(): Observable<T> {
    return this.#source;
  }

  [Symbol.observable](): Observable<T> {
    return this.#source;
  }

  /** Succeeds with `value` on every subscription. */
  static just<T>(value: T): Single<T> {
    return new Single<T>(emitter => emitter.success(value));
  }

  /** Fails with `error` on every subscription. */
  static fail<T = never>(error: unknown): Single<T> {
    return new Single<T>(emitter => emitter.error(error));
  }

  /**
   * Narrows a stream that is expected to produce exactly one value.
   *
   * Errors with a {@link SequenceError} if the source completes empty, or as
   * soon as it produces a second value (the source is then disposed).
   */
  static from<T>(source: SpecObservable<T> | PromiseLike<T>): Single<T> {
    return new Single<T>(emitter => {
      const state: { held: { value: T } | null; upstream: Subscription | null } = { held: null, upstream: null };

      return from(source).subscribe({
        start(subscription) {
          state.upstream = subscription;
        },
        next(value) {
          if (state.held) {
            state.upstream?.dispose();
            emitter.error(new SequenceError("Single source produced more than one value", { source: "Single.from", value }));
            return;
          }
          state.held = { value };
        },
        error: err => emitter.error(err),
        complete() {
          if (state.held) emitter.success(state.held.value);
          else emitter.error(new SequenceError("Single source completed without a value", { source: "Single.from" }));
        },
      });
    }, "Single.from");
  }

  get [Symbol.toStringTag](): "Single" { return "Single"; }
}

/**
 * Maps the single-shot emitter onto a stream emitter, with its own terminal
 * guard so a second settlement is reported rather than forwarded.
 */
function toSingleEmitter<T>(emitter: Emitter<T>, name: string): SingleEmitter<T> {
  const guard = new TerminalGuard();

  return {
    get closed() { return emitter.closed; },

    success(value) {
      if (!guard.stop("terminated")) {
        reportViolation("extra-value", name, value);
        return;
      }
      emitter.next(value);
      emitter.complete();
    },

    error(error) {
      if (!guard.stop("terminated")) {
        reportViolation("event-after-terminal", name, error);
        return;
      }
      emitter.error(error);
    },
  };
}
