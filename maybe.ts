// @filename: maybe.ts
/**
 * A stream that produces at most one value: a value, nothing, or an error.
 *
 * @example
 * ```ts
 * const cached = new Maybe<Entry>(emitter => {
 *   const entry = cache.get(key);
 *   if (entry) emitter.success(entry);
 *   else emitter.complete();
 * });
 *
 * const entry = await cached.toPromise(); // Entry | undefined
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

/** Producer-side capability of a {@link Maybe}. */
export interface MaybeEmitter<T> {
  success(value: T): void;
  complete(): void;
  error(error: unknown): void;
  readonly closed: boolean;
}

export interface MaybeObserver<T> {
  success?(value: T): void;
  complete?(): void;
  error?(error: unknown): void;
}

export type MaybeActivation<T> = (emitter: MaybeEmitter<T>) => Teardown;

export class Maybe<T> implements SpecObservable<T> {
  readonly #source: Observable<T>;

  constructor(activation: MaybeActivation<T>, name = "Maybe") {
    if (typeof activation !== "function") {
      throw new TypeError("Maybe activation must be a function");
    }

    this.#source = new Observable<T>(emitter => activation(toMaybeEmitter(emitter, name)), name);
  }

  subscribe(observer?: MaybeObserver<T> | null): Subscription;
  subscribe(
    success?: ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
    complete?: (() => void) | null,
  ): Subscription;
  subscribe(
    observerOrSuccess?: MaybeObserver<T> | ((value: T) => void) | null,
    error?: ((error: unknown) => void) | null,
    complete?: (() => void) | null,
  ): Subscription {
    const observer: MaybeObserver<T> = typeof observerOrSuccess === "object" && observerOrSuccess !== null
      ? observerOrSuccess
      : { success: observerOrSuccess ?? undefined, error: error ?? undefined, complete: complete ?? undefined };

    // A success is followed by an internal completion the observer must not see.
    const state = { succeeded: false };
    const onError = observer.error;

    return this.#source.subscribe({
      next(value) {
        state.succeeded = true;
        observer.success?.(value);
      },
      error: typeof onError === "function" ? err => onError.call(observer, err) : undefined,
      complete() {
        if (!state.succeeded) observer.complete?.();
      },
    });
  }

  /** Resolves with the value, or `undefined` when the maybe completes empty. */
  toPromise(options?: ToPromiseOptions): Promise<T | undefined> {
    return settle<T | undefined>(
      "Maybe",
      (resolve, reject) => this.subscribe(resolve, reject, () => resolve(undefined)),
      options
    );
  }

  asObservable(): Observable<T> {
    return this.#source;
  }

  [Symbol.observable](): Observable<T> {
    return this.#source;
  }

  static just<T>(value: T): Maybe<T> {
    return new Maybe<T>(emitter => emitter.success(value));
  }

  static empty<T = never>(): Maybe<T> {
    return new Maybe<T>(emitter => emitter.complete());
  }

  static fail<T = never>(error: unknown): Maybe<T> {
    return new Maybe<T>(emitter => emitter.error(error));
  }

  /**
   * Narrows a stream expected to produce zero or one value. A second value
   * disposes the source and errors with a {@link SequenceError}.
   */
  static from<T>(source: SpecObservable<T> | PromiseLike<T>): Maybe<T> {
    return new Maybe<T>(emitter => {
      const state: { held: { value: T } | null; upstream: Subscription | null } = { held: null, upstream: null };

      return from(source).subscribe({
        start(subscription) {
          state.upstream = subscription;
        },
        next(value) {
          if (state.held) {
            state.upstream?.dispose();
            emitter.error(new SequenceError("Maybe source produced more than one value", { source: "Maybe.from", value }));
            return;
          }
          state.held = { value };
        },
        error: err => emitter.error(err),
        complete() {
          if (state.held) emitter.success(state.held.value);
          else emitter.complete();
        },
      });
    }, "Maybe.from");
  }

  get [Symbol.toStringTag](): "Maybe" { return "Maybe"; }
}

function toMaybeEmitter<T>(emitter: Emitter<T>, name: string): MaybeEmitter<T> {
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

    complete() {
      if (!guard.stop("terminated")) {
        reportViolation("event-after-terminal", name);
        return;
      }
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
