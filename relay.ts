// @filename: relay.ts
/**
 * Subjects that never terminate.
 *
 * A relay multicasts exactly like its subject counterpart, but it has no
 * `error()` or `complete()`: values go in through {@link PublishRelay.accept}
 * and the stream stays alive for as long as the relay does. A terminal event
 * pushed through `on()` is dropped and reported as a `terminal-on-relay`
 * violation.
 *
 * Useful for UI state and event buses where an error would silently kill
 * every downstream subscription.
 *
 * @module
 */
import type { Event } from "./event.ts";

import { reportViolation } from "./diagnostics.ts";
import { Observable } from "./observable.ts";
import { BehaviorSubject, Subject } from "./subject.ts";

/**
 * Relay over a publish {@link Subject}: subscribers see only what is
 * accepted after they attached.
 */
export class PublishRelay<T> extends Observable<T> {
  readonly #subject: Subject<T>;
  readonly #label: string;

  constructor(name?: string) {
    super(emitter => this.#subject.subscribe(emitter), name);
    this.#label = name ?? new.target.name;
    this.#subject = new Subject<T>(this.#label);
  }

  get observerCount(): number {
    return this.#subject.observerCount;
  }

  get hasObservers(): boolean {
    return this.#subject.hasObservers;
  }

  accept(value: T): void {
    this.#subject.next(value);
  }

  /** Accepts `next` events; terminal events are rejected. */
  on(event: Event<T>): void {
    if (event.kind === "next") {
      this.accept(event.value);
      return;
    }

    reportViolation("terminal-on-relay", this.#label, event.kind === "error" ? event.error : undefined);
  }

  asObservable(): Observable<T> {
    return this.#subject.asObservable();
  }
}

/**
 * Relay over a {@link BehaviorSubject}: always holds a current value, and
 * replays it to every new subscriber.
 *
 * @example
 * ```ts
 * const selection = new BehaviorRelay<string | null>(null);
 * selection.subscribe(id => highlight(id)); // called with null
 * selection.accept("row-3");                // called with "row-3"
 * selection.value;                          // "row-3"
 * ```
 */
export class BehaviorRelay<T> extends Observable<T> {
  readonly #subject: BehaviorSubject<T>;
  readonly #label: string;

  constructor(seed: T, name?: string) {
    super(emitter => this.#subject.subscribe(emitter), name);
    this.#label = name ?? new.target.name;
    this.#subject = new BehaviorSubject<T>(seed, this.#label);
  }

  /** The latest accepted value, or the seed. */
  get value(): T {
    return this.#subject.value;
  }

  get observerCount(): number {
    return this.#subject.observerCount;
  }

  get hasObservers(): boolean {
    return this.#subject.hasObservers;
  }

  accept(value: T): void {
    this.#subject.next(value);
  }

  on(event: Event<T>): void {
    if (event.kind === "next") {
      this.accept(event.value);
      return;
    }

    reportViolation("terminal-on-relay", this.#label, event.kind === "error" ? event.error : undefined);
  }

  asObservable(): Observable<T> {
    return this.#subject.asObservable();
  }
}
