// @filename: subject.ts
/**
 * Hot, multicast streams.
 *
 * A {@link Subject} is a stream and an emitter at once: values pushed into it
 * go to every subscriber attached at that moment. Its activation runs per
 * attachment but acquires nothing; it only registers the subscriber in the
 * subject's table.
 *
 * ## States
 * ```text
 * [ active ] ──error()/complete()──> [ terminated ]
 * ```
 * The transition goes through one subject-wide terminal guard, so exactly
 * one terminal event is ever multicast. On termination the table is cleared
 * and every later subscriber receives the same terminal event straight away,
 * without being registered.
 *
 * ## Emission
 * Each emission works on a snapshot of the table. Subscribers attached while
 * an emission is being delivered only see the next one. A subscriber that
 * is disposed during delivery still receives the in-flight value, and
 * nothing after it. If a subscriber terminates the subject from its
 * callback, the in-flight value goes no further.
 *
 * ## Variants
 * - {@link Subject}: a new subscriber sees only what is emitted after it attached.
 * - {@link BehaviorSubject}: a new subscriber first receives the latest value,
 *   or the seed if nothing was emitted yet.
 * - {@link ReplaySubject}: a new subscriber first receives the buffered values
 *   (all of them, or the last `bufferSize`), then the terminal event if any.
 *
 * @example
 * ```ts
 * const subject = new Subject<string>();
 * subject.next("a");                      // nobody listening, lost
 * subject.subscribe(v => console.log(v));
 * subject.next("b");                      // logs "b"
 * subject.complete();
 * ```
 *
 * @module
 */
import type { Emitter, Teardown, TerminalEvent } from "./_types.ts";
import type { Event } from "./event.ts";

import { reportViolation } from "./diagnostics.ts";
import { TerminalGuard } from "./guard.ts";
import { Observable } from "./observable.ts";
import { createQueue, enqueueEvicting, getSize, toArray } from "./queue.ts";
import type { Queue } from "./queue.ts";
import { Sink } from "./sink.ts";
import { Symbol } from "./symbol.ts";

interface Attachment<T> {
  readonly emitter: Emitter<T>;
  /** Delivers a value even if the subscriber was disposed mid-emission. */
  readonly forward: (value: T) => void;
}

/**
 * Publish subject: multicasts what it receives, replays nothing.
 *
 * @typeParam T - Type of values multicast by this subject
 */
export class Subject<T> extends Observable<T> implements Emitter<T> {
  /** Attached subscribers, keyed by a per-attach id */
  readonly #observers = new Map<number, Attachment<T>>();
  #nextId = 0;

  readonly #guard = new TerminalGuard();
  #terminal: TerminalEvent | null = null;
  readonly #label: string;

  constructor(name?: string) {
    super(emitter => this.#attach(emitter), name);
    this.#label = name ?? new.target.name;
  }

  /** True once the subject has terminated. */
  get closed(): boolean {
    return !this.#guard.isOpen;
  }

  get observerCount(): number {
    return this.#observers.size;
  }

  get hasObservers(): boolean {
    return this.#observers.size > 0;
  }

  /** The event the subject terminated with, or `null` while active. */
  protected get terminal(): TerminalEvent | null {
    return this.#terminal;
  }

  next(value: T): void {
    if (!this.#guard.isOpen) {
      reportViolation("event-after-terminal", this.#label, value);
      return;
    }

    this.onNext(value);

    for (const { forward } of [...this.#observers.values()]) {
      // A subscriber terminated the subject during this emission.
      if (!this.#guard.isOpen) return;
      forward(value);
    }
  }

  error(error: unknown): void {
    this.#terminate({ kind: "error", error });
  }

  complete(): void {
    this.#terminate({ kind: "completed" });
  }

  on(event: Event<T>): void {
    if (event.kind === "next") this.next(event.value);
    else this.#terminate(event);
  }

  /**
   * A read-only view: subscribing works, emitting does not.
   */
  asObservable(): Observable<T> {
    return new Observable<T>(emitter => this.#attach(emitter), this.#label);
  }

  /**
   * Called with every accepted value, before it is multicast. Variants keep
   * their replay state here.
   */
  protected onNext(_value: T): void { }

  /**
   * Called for every new subscriber, after it is registered so that values
   * emitted from a replay callback reach it too. Variants replay their state
   * here. `terminal` is set when the subject has already terminated; the
   * terminal event itself is delivered afterwards.
   */
  protected onAttach(_emitter: Emitter<T>, _terminal: TerminalEvent | null): void { }

  #attach(emitter: Emitter<T>): Teardown {
    const terminal = this.#terminal;
    if (terminal) {
      this.onAttach(emitter, terminal);
      if (!emitter.closed) emitter.on(terminal);
      return;
    }

    const id = this.#nextId++;
    const forward = emitter instanceof Sink ? emitter.forwarder() : (value: T) => emitter.next(value);
    this.#observers.set(id, { emitter, forward });
    const detach = () => { this.#observers.delete(id); };

    this.onAttach(emitter, null);

    // Disposed or terminated while the replay was being delivered
    if (emitter.closed) {
      detach();
      return;
    }
    return detach;
  }

  #terminate(event: TerminalEvent): void {
    if (!this.#guard.stop("terminated")) {
      reportViolation("event-after-terminal", this.#label, event.kind === "error" ? event.error : undefined);
      return;
    }

    this.#terminal = event;
    const snapshot = [...this.#observers.values()];
    this.#observers.clear();

    for (const { emitter } of snapshot) {
      emitter.on(event);
    }
  }

  /** Completes the subject, so `using` scopes end its subscribers too. */
  [Symbol.dispose](): void {
    if (this.#guard.isOpen) this.complete();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    this[Symbol.dispose]();
  }
}

/**
 * Replays the latest value (or the seed) to every new subscriber.
 *
 * @example
 * ```ts
 * const subject = new BehaviorSubject("x");
 * subject.subscribe(v => log1.push(v)); // "x"
 * subject.next("a");                    // log1: "a"
 * subject.subscribe(v => log2.push(v)); // "a"
 * subject.next("b");                    // both: "b"
 * ```
 */
export class BehaviorSubject<T> extends Subject<T> {
  #value: T;

  constructor(seed: T, name?: string) {
    super(name);
    this.#value = seed;
  }

  /**
   * The latest value.
   *
   * @throws the subject's error if it terminated with one
   */
  get value(): T {
    const terminal = this.terminal;
    if (terminal?.kind === "error") throw terminal.error;
    return this.#value;
  }

  protected override onNext(value: T): void {
    this.#value = value;
  }

  protected override onAttach(emitter: Emitter<T>, terminal: TerminalEvent | null): void {
    if (!terminal) emitter.next(this.#value);
  }
}

/**
 * Replays up to `bufferSize` of the latest values to every new subscriber,
 * followed by the terminal event once the subject has terminated.
 */
export class ReplaySubject<T> extends Subject<T> {
  readonly #buffer: Queue<T>;

  /**
   * @param bufferSize - How many of the latest values to keep (default: all)
   * @throws RangeError if `bufferSize` is not a positive integer or `Infinity`
   */
  constructor(bufferSize: number = Infinity, name?: string) {
    super(name);
    this.#buffer = createQueue<T>(bufferSize);
  }

  /** Number of values currently held for replay. */
  get bufferedCount(): number {
    return getSize(this.#buffer);
  }

  protected override onNext(value: T): void {
    enqueueEvicting(this.#buffer, value);
  }

  protected override onAttach(emitter: Emitter<T>): void {
    for (const value of toArray(this.#buffer)) {
      emitter.next(value);
      if (emitter.closed) return;
    }
  }
}
