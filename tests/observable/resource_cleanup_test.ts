import { afterEach, beforeEach, expect, test, vi } from "vitest";

import type { Emitter, Subscription } from "../../_types.ts";
import { Observable } from "../../observable.ts";
import { Symbol } from "../../symbol.ts";
import { captureDiagnostics } from "../_utils/_diagnostics.ts";
import type { CapturedDiagnostics } from "../_utils/_diagnostics.ts";

let diagnostics: CapturedDiagnostics;
beforeEach(() => { diagnostics = captureDiagnostics(); });
afterEach(() => { diagnostics.restore(); });

// -----------------------------------------------------------------------------
// Resource cleanup with Symbol.dispose
// -----------------------------------------------------------------------------

test("subscription supports Symbol.dispose", () => {
  const teardown = vi.fn();
  const subscription = new Observable(() => teardown).subscribe({});

  subscription[Symbol.dispose]();

  expect(teardown).toHaveBeenCalledTimes(1);
  expect(subscription.closed).toBe(true);
});

test("subscription supports Symbol.asyncDispose", async () => {
  const teardown = vi.fn();
  const subscription = new Observable(() => teardown).subscribe({});

  await subscription[Symbol.asyncDispose]();

  expect(teardown).toHaveBeenCalledTimes(1);
  expect(subscription.closed).toBe(true);
});

// -----------------------------------------------------------------------------
// Teardown timing
// -----------------------------------------------------------------------------

test("dispose() releases synchronously", () => {
  const events: string[] = [];
  const subscription = new Observable(() => () => { events.push("teardown"); }).subscribe({});

  events.push("before");
  subscription.dispose();
  events.push("after");

  expect(events).toEqual(["before", "teardown", "after"]);
});

test("error() releases right after the error is delivered", () => {
  const events: string[] = [];
  const state: { emitter: Emitter<number> | null } = { emitter: null };

  new Observable<number>((emitter) => {
    state.emitter = emitter;
    return () => { events.push("teardown"); };
  }).subscribe({ error: () => events.push("error") });

  state.emitter?.error(new Error("x"));

  expect(events).toEqual(["error", "teardown"]);
});

test("complete() releases right after completion is delivered", () => {
  const events: string[] = [];
  const state: { emitter: Emitter<number> | null } = { emitter: null };

  new Observable<number>((emitter) => {
    state.emitter = emitter;
    return () => { events.push("teardown"); };
  }).subscribe({ complete: () => events.push("complete") });

  state.emitter?.complete();

  expect(events).toEqual(["complete", "teardown"]);
});

test("a synchronously completing activation still has its teardown released", () => {
  const teardown = vi.fn();

  const subscription = new Observable<number>((emitter) => {
    emitter.next(1);
    emitter.complete();
    return teardown;
  }).subscribe({});

  expect(teardown).toHaveBeenCalledTimes(1);
  expect(subscription.closed).toBe(true);
});

test("the subscription is closed while the terminal callback runs", () => {
  const seen: boolean[] = [];
  const state: { subscription: Subscription | null } = { subscription: null };

  Observable.of(1).subscribe({
    start: (s) => { state.subscription = s; },
    complete: () => { seen.push(state.subscription?.closed ?? false); },
  });

  expect(seen).toEqual([true]);
});

test("emitter.closed reflects the subscription state", () => {
  const states: boolean[] = [];

  new Observable<number>((emitter) => {
    states.push(emitter.closed);
    emitter.complete();
    states.push(emitter.closed);
  }).subscribe({});

  expect(states).toEqual([false, true]);
});

test("multiple dispose calls run the teardown once", () => {
  const teardown = vi.fn();
  const subscription = new Observable(() => teardown).subscribe({});

  subscription.dispose();
  subscription.unsubscribe();
  subscription.dispose();

  expect(teardown).toHaveBeenCalledTimes(1);
});

// -----------------------------------------------------------------------------
// Teardown shapes
// -----------------------------------------------------------------------------

test("a foreign subscription can be returned as the teardown", () => {
  const unsubscribe = vi.fn();
  const subscription = new Observable(() => ({ unsubscribe })).subscribe({});

  subscription.dispose();

  expect(unsubscribe).toHaveBeenCalledTimes(1);
});

test("a throwing teardown is reported, other subscriptions are unaffected", () => {
  const failure = new Error("release failed");
  const stream = new Observable(() => () => { throw failure; });

  const first = stream.subscribe({});
  const second = stream.subscribe({});
  first.dispose();

  expect(first.closed).toBe(true);
  expect(second.closed).toBe(false);
  expect(diagnostics.errors).toHaveLength(1);
  expect(diagnostics.errors[0]).toMatchObject({ errors: [failure] });
});
