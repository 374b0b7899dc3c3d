import { afterEach, beforeEach, expect, test } from "vitest";

import type { Emitter } from "../_types.ts";
import { asDriver, Driver } from "../driver.ts";
import { Observable } from "../observable.ts";
import { createQueueScheduler, immediateScheduler } from "../scheduler.ts";
import { captureDiagnostics, tick } from "./_utils/_diagnostics.ts";
import type { CapturedDiagnostics } from "./_utils/_diagnostics.ts";

let diagnostics: CapturedDiagnostics;
beforeEach(() => { diagnostics = captureDiagnostics(); });
afterEach(() => { diagnostics.restore(); });

function record<T>(log: string[]) {
  return {
    next: (value: T) => { log.push(`next:${value}`); },
    error: (err: unknown) => { log.push(`error:${String(err)}`); },
    complete: () => { log.push("complete"); },
  };
}

test("events wait for the scheduler", () => {
  const scheduler = createQueueScheduler();
  const log: string[] = [];

  asDriver(Observable.of(1, 2), { fallback: 0, scheduler }).subscribe(record<number>(log));

  expect(log).toEqual([]);
  expect(scheduler.pending("main")).toBe(3);

  expect(scheduler.flush("main")).toBe(3);
  expect(log).toEqual(["next:1", "next:2", "complete"]);
});

test("work lands on the requested context", () => {
  const scheduler = createQueueScheduler();
  const log: string[] = [];

  asDriver(Observable.of("x"), { fallback: "", scheduler, context: "render" }).subscribe(record<string>(log));

  expect(scheduler.flush("main")).toBe(0);
  expect(scheduler.flush("render")).toBe(2);
  expect(log).toEqual(["next:x", "complete"]);
});

test("an error becomes the fallback value followed by completion", () => {
  const scheduler = createQueueScheduler();
  const failure = new Error("down");
  const log: string[] = [];

  asDriver(Observable.fail<string>(failure), { fallback: "offline", scheduler }).subscribe(record<string>(log));
  scheduler.flush();

  expect(log).toEqual(["next:offline", "complete"]);
  expect(diagnostics.logger.debug).toHaveBeenCalledWith(
    "[rivulet] Driver: error replaced by fallback value",
    failure
  );
  expect(diagnostics.errors).toEqual([]);
});

test("the source runs once and late subscribers get the latest value", () => {
  const scheduler = createQueueScheduler();
  const source: { emitter: Emitter<number> | null; runs: number } = { emitter: null, runs: 0 };
  const driver = new Driver(new Observable<number>((emitter) => {
    source.runs++;
    source.emitter = emitter;
  }), { fallback: -1, scheduler });

  const a: string[] = [];
  const b: string[] = [];
  const late: string[] = [];

  driver.subscribe(record<number>(a));
  driver.subscribe(record<number>(b));
  source.emitter?.next(5);
  scheduler.flush();

  driver.subscribe(record<number>(late));
  scheduler.flush();

  expect(source.runs).toBe(1);
  expect(a).toEqual(["next:5"]);
  expect(b).toEqual(["next:5"]);
  expect(late).toEqual(["next:5"]);
});

test("the source is released once the last subscriber leaves", () => {
  const scheduler = createQueueScheduler();
  const source = { runs: 0, released: 0 };
  const driver = asDriver(new Observable<number>(() => {
    source.runs++;
    return () => { source.released++; };
  }), { fallback: 0, scheduler });

  const first = driver.subscribe({});
  const second = driver.subscribe({});

  first.dispose();
  expect(source.released).toBe(0);

  second.dispose();
  expect(source.released).toBe(1);

  driver.subscribe({});
  expect(source.runs).toBe(2);
});

test("an initial value reaches every subscriber", () => {
  const driver = asDriver(new Observable<number>(() => { }), {
    fallback: 0,
    initial: 10,
    scheduler: immediateScheduler,
  });
  const log: string[] = [];

  driver.subscribe(record<number>(log));

  expect(log).toEqual(["next:10"]);
});

test("disposing cancels work that has not run yet", () => {
  const scheduler = createQueueScheduler();
  const source: { emitter: Emitter<number> | null } = { emitter: null };
  const log: string[] = [];

  const subscription = asDriver(new Observable<number>((emitter) => { source.emitter = emitter; }), {
    fallback: 0,
    scheduler,
  }).subscribe(record<number>(log));

  source.emitter?.next(1);
  expect(scheduler.pending("main")).toBe(1);

  subscription.dispose();

  expect(scheduler.pending("main")).toBe(0);
  expect(scheduler.flush()).toBe(0);
  expect(log).toEqual([]);
});

test("the default scheduler delivers on the micro-task queue", async () => {
  const log: string[] = [];

  asDriver(Observable.of("a"), { fallback: "z" }).subscribe(record<string>(log));
  expect(log).toEqual([]);

  await tick();
  expect(log).toEqual(["next:a", "complete"]);
});
