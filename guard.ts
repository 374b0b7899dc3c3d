// @filename: guard.ts
/**
 * The once-only latch behind "at most one terminal event".
 *
 * Every sink, every subject and every bounded-cardinality emitter owns one
 * {@link TerminalGuard}. It starts `open` and leaves that state exactly once,
 * through a compare-and-set; whoever loses the race sees the guard already
 * stopped and must not forward anything.
 *
 * The state lives in an `Int32Array` cell driven by `Atomics`, so the
 * transition stays linearizable even when the cell is backed by a
 * `SharedArrayBuffer` handed across worker threads.
 *
 * @example
 * ```ts
 * const guard = new TerminalGuard();
 * guard.stop("terminated"); // true, this caller forwards the terminal event
 * guard.stop("terminated"); // false, lost the race
 * guard.stop("disposed");   // false
 * guard.state;              // "terminated"
 * ```
 *
 * @module
 */

/** Where a guard can be. `open` is left at most once. */
export type GuardState = "open" | "terminated" | "disposed";

const OPEN = 0;
const TERMINATED = 1;
const DISPOSED = 2;

const CODES = { terminated: TERMINATED, disposed: DISPOSED } as const;
const STATES: readonly GuardState[] = ["open", "terminated", "disposed"];

export class TerminalGuard {
  readonly #cell: Int32Array;

  /**
   * @param buffer - Optional backing store, for a guard shared between
   *   workers. Must hold at least one 32-bit integer, initially zero.
   */
  constructor(buffer: ArrayBufferLike = new ArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.#cell = new Int32Array(buffer, 0, 1);
  }

  get state(): GuardState {
    return STATES[Atomics.load(this.#cell, 0)] ?? "open";
  }

  get isOpen(): boolean {
    return Atomics.load(this.#cell, 0) === OPEN;
  }

  /**
   * Attempts the `open -> reason` transition.
   *
   * @returns `true` for the single caller that won the transition.
   */
  stop(reason: Exclude<GuardState, "open">): boolean {
    return Atomics.compareExchange(this.#cell, 0, OPEN, CODES[reason]) === OPEN;
  }
}
