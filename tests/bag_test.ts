import { afterEach, beforeEach, expect, test, vi } from "vitest";

import { DisposeBag } from "../bag.ts";
import { DisposalError } from "../error.ts";
import { Observable } from "../observable.ts";
import { Subject } from "../subject.ts";
import { Symbol } from "../symbol.ts";
import { captureDiagnostics } from "./_utils/_diagnostics.ts";
import type { CapturedDiagnostics } from "./_utils/_diagnostics.ts";

let diagnostics: CapturedDiagnostics;
beforeEach(() => { diagnostics = captureDiagnostics(); });
afterEach(() => { diagnostics.restore(); });

test("dispose releases every handle in insertion order", () => {
  const bag = new DisposeBag();
  const order: number[] = [];

  bag.insert(() => { order.push(1); });
  bag.insert(() => { order.push(2); });
  bag.insert({ unsubscribe: () => { order.push(3); } });
  expect(bag.size).toBe(3);

  bag.dispose();

  expect(order).toEqual([1, 2, 3]);
  expect(bag.size).toBe(0);
  expect(bag.disposed).toBe(true);
});

test("dispose is idempotent", () => {
  const bag = new DisposeBag();
  const release = vi.fn();
  bag.insert(release);

  bag.dispose();
  bag.dispose();
  bag[Symbol.dispose]();

  expect(release).toHaveBeenCalledTimes(1);
});

test("a handle inserted after dispose is released immediately and not kept", () => {
  const bag = new DisposeBag();
  bag.dispose();

  const release = vi.fn();
  const handle = bag.insert(release);

  expect(release).toHaveBeenCalledTimes(1);
  expect(handle.disposed).toBe(true);
  expect(bag.size).toBe(0);
});

test("a release action that inserts into its own bag sees it disposed", () => {
  const bag = new DisposeBag();
  const late = vi.fn();

  bag.insert(() => { bag.insert(late); });
  bag.dispose();

  expect(late).toHaveBeenCalledTimes(1);
  expect(bag.size).toBe(0);
});

test("release continues past a throwing handle and reports a DisposalError", () => {
  const bag = new DisposeBag();
  const after = vi.fn();

  bag.insert(() => { throw new Error("x"); });
  bag.insert(after);
  bag.dispose();

  expect(after).toHaveBeenCalledTimes(1);
  expect(diagnostics.errors).toHaveLength(1);
  expect(diagnostics.errors[0]).toBeInstanceOf(DisposalError);
  expect(diagnostics.errors[0]).toMatchObject({
    source: "DisposeBag",
    errors: [expect.objectContaining({ message: "x" })],
  });
});

test("subscribeToBag hands the subscription to the bag", () => {
  const bag = new DisposeBag();
  const teardown = vi.fn();
  const values: number[] = [];

  const stream = new Observable<number>(emitter => {
    emitter.next(1);
    return teardown;
  });

  const subscription = stream.subscribeToBag(bag, value => values.push(value));
  expect(bag.size).toBe(1);

  bag.dispose();

  expect(values).toEqual([1]);
  expect(teardown).toHaveBeenCalledTimes(1);
  expect(subscription.closed).toBe(true);
});

test("subscribeToBag on a disposed bag releases the subscription straight away", () => {
  const bag = new DisposeBag();
  bag.dispose();

  const teardown = vi.fn();
  const subscription = new Observable<number>(() => teardown).subscribeToBag(bag, {});

  expect(teardown).toHaveBeenCalledTimes(1);
  expect(subscription.closed).toBe(true);
});

test("subscriptions that already ended are not kept", () => {
  const bag = new DisposeBag();

  for (let i = 0; i < 40; i++) Observable.of(i).subscribeToBag(bag);

  expect(bag.size).toBe(0);
});

test("closed handles are swept out as the bag grows", () => {
  const bag = new DisposeBag();
  const subject = new Subject<number>();

  for (let i = 0; i < 32; i++) subject.subscribeToBag(bag);
  expect(bag.size).toBe(32);

  subject.complete();
  bag.insert(() => { });

  expect(bag.size).toBe(1);
});
