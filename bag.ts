// @filename: bag.ts
/**
 * Scope-bound ownership of many subscriptions.
 *
 * An owner keeps one {@link DisposeBag} as a field, routes every
 * subscription it makes through it, and disposes the bag in its own
 * teardown. Every handle collected so far is then released, exactly once.
 *
 * @example
 * ```ts
 * class PriceTicker {
 *   readonly #bag = new DisposeBag();
 *
 *   constructor(prices: Observable<number>, render: (p: number) => void) {
 *     prices.subscribeToBag(this.#bag, render);
 *   }
 *
 *   close(): void {
 *     this.#bag.dispose();
 *   }
 * }
 * ```
 *
 * @module
 */
import type { DisposableHandle, Teardown } from "./_types.ts";
import { disposeAll, toDisposable } from "./disposable.ts";
import { reportError } from "./diagnostics.ts";
import { DisposalError } from "./error.ts";
import { Symbol } from "./symbol.ts";

/** Size at which already-closed handles are first swept out. */
const PRUNE_THRESHOLD = 32;

export class DisposeBag implements DisposableHandle {
  #handles: DisposableHandle[] = [];
  #disposed = false;
  #pruneAt = PRUNE_THRESHOLD;

  get disposed(): boolean {
    return this.#disposed;
  }

  /** Number of handles currently held. Always zero once disposed. */
  get size(): number {
    return this.#handles.length;
  }

  /**
   * Takes ownership of `teardown`.
   *
   * If the bag is already disposed the handle is released right away and
   * never stored. A handle that is already closed, such as a subscription
   * that completed synchronously, is not stored either, and closed handles
   * are swept out whenever the bag doubles in size.
   *
   * @returns the normalised handle.
   */
  insert(teardown: Teardown): DisposableHandle {
    const handle = toDisposable(teardown);

    if (this.#disposed) {
      release([handle]);
      return handle;
    }

    if (handle.disposed) return handle;

    if (this.#handles.length >= this.#pruneAt) {
      this.#handles = this.#handles.filter(held => !held.disposed);
      this.#pruneAt = Math.max(PRUNE_THRESHOLD, this.#handles.length * 2);
    }

    this.#handles.push(handle);
    return handle;
  }

  /**
   * Releases every held handle. Idempotent.
   *
   * The collection is swapped out and the bag marked disposed before any
   * release action runs, so an action that touches the bag again (inserting,
   * or disposing it) sees the final state. Failing actions do not stop the
   * others; their errors are reported together as one {@link DisposalError}.
   */
  dispose(): void {
    if (this.#disposed) return;

    const handles = this.#handles;
    this.#handles = [];
    this.#disposed = true;

    release(handles);
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  get [Symbol.toStringTag](): "DisposeBag" { return "DisposeBag"; }
}

function release(handles: DisposableHandle[]): void {
  const errors = disposeAll(handles);
  if (errors.length > 0) {
    reportError(new DisposalError(errors, { source: "DisposeBag" }), "DisposeBag");
  }
}
