import { afterEach, beforeEach, expect, test } from "vitest";

import type { Emitter } from "../_types.ts";
import { Observable } from "../observable.ts";
import { share, shareReplay } from "../share.ts";
import { ReplaySubject } from "../subject.ts";
import { captureDiagnostics } from "./_utils/_diagnostics.ts";
import type { CapturedDiagnostics } from "./_utils/_diagnostics.ts";

let diagnostics: CapturedDiagnostics;
beforeEach(() => { diagnostics = captureDiagnostics(); });
afterEach(() => { diagnostics.restore(); });

/** A cold source that counts its connections and hands out its emitter. */
function createSource<T>() {
  const state: { emitter: Emitter<T> | null; connections: number; disconnections: number } = {
    emitter: null,
    connections: 0,
    disconnections: 0,
  };

  const stream = new Observable<T>((emitter) => {
    state.connections++;
    state.emitter = emitter;
    return () => { state.disconnections++; };
  });

  return { state, stream };
}

test("share connects once for many subscribers", () => {
  const { state, stream } = createSource<number>();
  const shared = share(stream);
  const a: number[] = [];
  const b: number[] = [];

  shared.subscribe((v) => a.push(v));
  shared.subscribe((v) => b.push(v));
  state.emitter?.next(1);

  expect(state.connections).toBe(1);
  expect(a).toEqual([1]);
  expect(b).toEqual([1]);
});

test("lazy share disconnects when the last subscriber leaves", () => {
  const { state, stream } = createSource<number>();
  const shared = share(stream);

  const first = shared.subscribe({});
  const second = shared.subscribe({});

  first.dispose();
  expect(state.disconnections).toBe(0);

  second.dispose();
  expect(state.disconnections).toBe(1);

  shared.subscribe({});
  expect(state.connections).toBe(2);
});

test("nothing is connected before the first subscriber", () => {
  const { state, stream } = createSource<number>();
  share(stream);
  expect(state.connections).toBe(0);
});

test("eager share connects immediately and stays connected", () => {
  const { state, stream } = createSource<number>();
  const shared = share(stream, { mode: "eager" });

  expect(state.connections).toBe(1);

  const received: number[] = [];
  state.emitter?.next(1);
  const subscription = shared.subscribe((v) => received.push(v));
  state.emitter?.next(2);
  subscription.dispose();

  expect(received).toEqual([2]);
  expect(state.disconnections).toBe(0);
});

test("a synchronous source runs again for each reset connection", () => {
  const shared = share(Observable.of(1, 2));
  const first: number[] = [];
  const second: number[] = [];

  shared.subscribe((v) => first.push(v));
  shared.subscribe((v) => second.push(v));

  expect(first).toEqual([1, 2]);
  expect(second).toEqual([1, 2]);
  expect(diagnostics.violations).toEqual([]);
});

test("without reset a terminated subject keeps serving late subscribers", () => {
  const runs = { count: 0 };
  const stream = new Observable<number>((emitter) => {
    runs.count++;
    emitter.next(1);
    emitter.complete();
  });
  const shared = share(stream, { connector: () => new ReplaySubject<number>(), reset: false });

  const first: number[] = [];
  const second: string[] = [];
  shared.subscribe((v) => first.push(v));
  shared.subscribe({
    next: (v) => second.push(`next:${v}`),
    complete: () => second.push("complete"),
  });

  expect(runs.count).toBe(1);
  expect(first).toEqual([1]);
  expect(second).toEqual(["next:1", "complete"]);
});

test("shareReplay gives late subscribers the latest values", () => {
  const { state, stream } = createSource<number>();
  const shared = shareReplay(stream, { count: 1 });
  const early: number[] = [];
  const late: number[] = [];

  shared.subscribe((v) => early.push(v));
  state.emitter?.next(1);
  state.emitter?.next(2);
  shared.subscribe((v) => late.push(v));
  state.emitter?.next(3);

  expect(early).toEqual([1, 2, 3]);
  expect(late).toEqual([2, 3]);
  expect(state.connections).toBe(1);
});

test("shareReplay rejects an invalid count", () => {
  const { stream } = createSource<number>();
  expect(() => shareReplay(stream, { count: 0 })).toThrow(RangeError);
});

test("an upstream error reaches every subscriber", () => {
  const { state, stream } = createSource<number>();
  const shared = share(stream);
  const errors: unknown[] = [];
  const failure = new Error("upstream");

  shared.subscribe({ error: (e) => errors.push(e) });
  shared.subscribe({ error: (e) => errors.push(e) });
  state.emitter?.error(failure);

  expect(errors).toEqual([failure, failure]);
  expect(state.disconnections).toBe(1);
});
