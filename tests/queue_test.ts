import { expect, test } from "vitest";

import {
  clear,
  createQueue,
  dequeue,
  drain,
  enqueue,
  enqueueEvicting,
  getSize,
  isEmpty,
  isFull,
  peek,
  toArray,
} from "../queue.ts";

test("elements leave in the order they arrived", () => {
  const queue = createQueue<string>();
  enqueue(queue, "a");
  enqueue(queue, "b");

  expect(peek(queue)).toBe("a");
  expect(dequeue(queue)).toBe(true);
  expect(peek(queue)).toBe("b");
  expect(getSize(queue)).toBe(1);
});

test("dequeue and peek on an empty queue", () => {
  const queue = createQueue<number>();

  expect(isEmpty(queue)).toBe(true);
  expect(peek(queue)).toBeUndefined();
  expect(dequeue(queue)).toBe(false);
});

test("the queue grows past its first allocation and keeps order across the wrap", () => {
  const queue = createQueue<number>();
  for (let i = 0; i < 10; i++) enqueue(queue, i);
  for (let i = 0; i < 8; i++) dequeue(queue);
  for (let i = 10; i < 30; i++) enqueue(queue, i);

  expect(toArray(queue)).toEqual(Array.from({ length: 22 }, (_, i) => i + 8));
});

test("a bounded queue refuses or evicts at capacity", () => {
  const queue = createQueue<number>(2);
  enqueue(queue, 1);
  enqueue(queue, 2);

  expect(isFull(queue)).toBe(true);
  expect(() => enqueue(queue, 3)).toThrow("Queue overflow: cannot add item, capacity 2 reached");

  enqueueEvicting(queue, 3);
  expect(toArray(queue)).toEqual([2, 3]);
});

test("drain empties the queue", () => {
  const queue = createQueue<string>();
  enqueue(queue, "x");
  enqueue(queue, "y");

  expect(drain(queue)).toEqual(["x", "y"]);
  expect(isEmpty(queue)).toBe(true);

  enqueue(queue, "z");
  clear(queue);
  expect(getSize(queue)).toBe(0);
});

test("capacity must be a positive integer", () => {
  expect(() => createQueue(0)).toThrow(RangeError);
  expect(() => createQueue(1.5)).toThrow("Queue capacity must be a positive integer, got 1.5");
});
