// @filename: completable.ts
/**
 * A stream with no values: it only completes or fails.
 *
 * Suited to fire-and-forget work whose result is "done": a write, a flush,
 * a handshake.
 *
 * @example
 * ```ts
 * const save = new Completable(emitter => {
 *   store.write(doc).then(() => emitter.complete(), err => emitter.error(err));
 * });
 *
 * await save.toPromise();
 * ```
 *
 * @module
 */
import type { Emitter, Subscription, Teardown } from "./_types.ts";
import type { SpecObservable } from "./_spec.ts";
import type { ToPromiseOptions } from "./_promise.ts";

import { settle } from "./_promise.ts";
import { from, Observable } from "./observable.ts";
import { Symbol } from "./symbol.ts";

/** Producer-side capability of a {@link Completable}. */
export interface CompletableEmitter {
  complete(): void;
  error(error: unknown): void;
  readonly closed: boolean;
}

export interface CompletableObserver {
  complete?(): void;
  error?(error: unknown): void;
}

export type CompletableActivation = (emitter: CompletableEmitter) => Teardown;

export class Completable implements SpecObservable<never> {
  readonly #source: Observable<never>;

  constructor(activation: CompletableActivation, name = "Completable") {
    if (typeof activation !== "function") {
      throw new TypeError("Completable activation must be a function");
    }

    // The value channel is typed away; the stream guard covers the rest.
    this.#source = new Observable<never>(emitter => activation(toCompletableEmitter(emitter)), name);
  }

  subscribe(observer?: CompletableObserver | null): Subscription;
  subscribe(
    complete?: (() => void) | null,
    error?: ((error: unknown) => void) | null,
  ): Subscription;
  subscribe(
    observerOrComplete?: CompletableObserver | (() => void) | null,
    error?: ((error: unknown) => void) | null,
  ): Subscription {
    const observer: CompletableObserver = typeof observerOrComplete === "object" && observerOrComplete !== null
      ? observerOrComplete
      : { complete: observerOrComplete ?? undefined, error: error ?? undefined };

    const onError = observer.error;
    return this.#source.subscribe({
      error: typeof onError === "function" ? err => onError.call(observer, err) : undefined,
      complete: () => observer.complete?.(),
    });
  }

  toPromise(options?: ToPromiseOptions): Promise<void> {
    return settle<void>("Completable", (resolve, reject) => this.subscribe(() => resolve(), reject), options);
  }

  asObservable(): Observable<never> {
    return this.#source;
  }

  [Symbol.observable](): Observable<never> {
    return this.#source;
  }

  /** Completes immediately on every subscription. */
  static complete(): Completable {
    return new Completable(emitter => emitter.complete());
  }

  static fail(error: unknown): Completable {
    return new Completable(emitter => emitter.error(error));
  }

  /**
   * Completes when `source` completes, fails when it fails. Values are
   * ignored.
   */
  static from(source: SpecObservable<unknown> | PromiseLike<unknown>): Completable {
    return new Completable(emitter => from(source).subscribe({
      error: err => emitter.error(err),
      complete: () => emitter.complete(),
    }), "Completable.from");
  }

  get [Symbol.toStringTag](): "Completable" { return "Completable"; }
}

function toCompletableEmitter(emitter: Emitter<never>): CompletableEmitter {
  return {
    get closed() { return emitter.closed; },
    complete: () => emitter.complete(),
    error: error => emitter.error(error),
  };
}
