import { expect, test } from "vitest";

import {
  ContractViolationError,
  DisposalError,
  isObservableError,
  ObservableError,
  SequenceError,
} from "../error.ts";

test("from wraps a non-Error value", () => {
  const wrapped = ObservableError.from("plain", "pull", 4);

  expect(wrapped.message).toBe("plain");
  expect(wrapped.source).toBe("pull");
  expect(wrapped.value).toBe(4);
  expect(wrapped.cause).toBe("plain");
  expect(wrapped.errors).toHaveLength(1);
  expect(wrapped.errors[0]).toBeInstanceOf(Error);
  expect(wrapped.errors[0].message).toBe("plain");
});

test("from keeps an Error's message and the Error itself", () => {
  const failure = new TypeError("bad input");
  const wrapped = ObservableError.from(failure, "Single");

  expect(wrapped.message).toBe("bad input");
  expect(wrapped.errors).toEqual([failure]);
  expect(wrapped.cause).toBe(failure);
});

test("from fills in a missing source and otherwise passes through", () => {
  const anonymous = new ObservableError([], "no source");
  const located = ObservableError.from(anonymous, "share");

  expect(located).not.toBe(anonymous);
  expect(located.source).toBe("share");
  expect(located.message).toBe("no source");

  expect(ObservableError.from(located, "other")).toBe(located);
});

test("toString lists source, value, errors and tip", () => {
  const error = new ObservableError(new Error("a"), "failed", { source: "s", value: 3, tip: "t" });

  expect(error.toString()).toBe(
    "ObservableError: failed\n  in: s\n  processing value: 3\n  with errors:\n    1) Error: a\n  tip: t"
  );
});

test("contract violations carry their kind and a tip", () => {
  const violation = new ContractViolationError("terminal-on-relay", "no", { source: "Clicks" });

  expect(violation.name).toBe("ContractViolationError");
  expect(violation.kind).toBe("terminal-on-relay");
  expect(violation.source).toBe("Clicks");
  expect(violation.tip).toBe("relays never terminate; use a Subject when the producer must end the stream");
  expect(violation.errors).toHaveLength(0);
  expect(isObservableError(violation)).toBe(true);
});

test("sequence and disposal errors", () => {
  const sequence = new SequenceError("too many", { source: "Maybe.from", value: 2 });
  expect(sequence).toBeInstanceOf(ObservableError);
  expect(sequence.name).toBe("SequenceError");

  const disposal = new DisposalError([new Error("one"), "two"]);
  expect(disposal.message).toBe("2 release action(s) failed");
  expect(disposal.errors[1].message).toBe("two");

  expect(isObservableError(new Error("plain"))).toBe(false);
});

test("toString survives a circular value", () => {
  const loop: { self?: unknown } = {};
  loop.self = loop;
  const error = new ObservableError([], "cycle", { value: loop });

  expect(error.toString()).toBe("ObservableError: cycle\n  processing value: [object Object]");
});

test("toString shortens large values", () => {
  const error = new ObservableError([], "big", { value: { text: "x".repeat(200) } });

  expect(error.toString()).toBe(`ObservableError: big\n  processing value: {"text":"${"x".repeat(91)}`);
});
