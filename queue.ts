/**
 * A small FIFO queue over a circular buffer, with O(1) enqueue and dequeue.
 *
 * Backs the replay buffer of `ReplaySubject` and the pull-mode buffer of
 * `pull()`. The backing array starts small and doubles as needed, up to an
 * optional fixed capacity.
 *
 * @example
 * ```ts
 * const recent = createQueue<string>(3);
 * enqueue(recent, "a");
 * enqueue(recent, "b");
 * toArray(recent);   // ["a", "b"]
 * drain(recent);     // ["a", "b"], queue now empty
 * ```
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Circular buffer state.
 *
 * @template T - The type of elements stored in the queue
 */
export interface Queue<T> {
  /** The backing array; its length is the currently allocated size */
  items: T[];
  /** Index of the front element (next to dequeue) */
  head: number;
  /** Current number of elements */
  size: number;
  /** Maximum number of elements, `Infinity` for unbounded */
  capacity: number;
}

const INITIAL_ALLOCATION = 16;

/**
 * Creates an empty queue.
 *
 * @param capacity - Maximum number of elements (default: unbounded)
 * @throws RangeError if capacity is not a positive integer or `Infinity`
 */
export function createQueue<T>(capacity: number = Infinity): Queue<T> {
  if (capacity !== Infinity && (!Number.isInteger(capacity) || capacity <= 0)) {
    throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
  }

  return {
    items: new Array<T>(Math.min(capacity, INITIAL_ALLOCATION)),
    head: 0,
    size: 0,
    capacity
  };
}

/////////////////////////
// Core Queue Operations //
/////////////////////////

/**
 * Adds an element to the back of the queue.
 *
 * @throws Error if the queue is at capacity
 */
export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (isFull(queue)) {
    throw new Error(`Queue overflow: cannot add item, capacity ${queue.capacity} reached`);
  }

  if (queue.size === queue.items.length) grow(queue);

  queue.items[(queue.head + queue.size) % queue.items.length] = item;
  queue.size++;
}

/**
 * Removes the front element.
 *
 * @returns `false` when the queue was already empty
 */
export function dequeue<T>(queue: Queue<T>): boolean {
  if (isEmpty(queue)) return false;

  delete queue.items[queue.head];  // release the reference
  queue.head = (queue.head + 1) % queue.items.length;
  queue.size--;
  return true;
}

/** The front element, or `undefined` when empty. */
export function peek<T>(queue: Queue<T>): T | undefined {
  return isEmpty(queue) ? undefined : queue.items[queue.head];
}

/**
 * Adds an element, discarding the oldest one first when the queue is full.
 */
export function enqueueEvicting<T>(queue: Queue<T>, item: T): void {
  if (isFull(queue)) dequeue(queue);
  enqueue(queue, item);
}

/**
 * Removes every element and returns them front to back.
 */
export function drain<T>(queue: Queue<T>): T[] {
  const result = toArray(queue);
  clear(queue);
  return result;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

export function isFull<T>(queue: Queue<T>): boolean {
  return queue.size >= queue.capacity;
}

export function getSize<T>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Empties the queue and drops the backing array back to its initial size.
 */
export function clear<T>(queue: Queue<T>): void {
  queue.items = new Array<T>(Math.min(queue.capacity, INITIAL_ALLOCATION));
  queue.head = 0;
  queue.size = 0;
}

/**
 * Copies the elements, front to back, into a new array.
 */
export function toArray<T>(queue: Queue<T>): T[] {
  const result: T[] = [];
  const allocated = queue.items.length;
  for (let i = 0; i < queue.size; i++) {
    result.push(queue.items[(queue.head + i) % allocated]);
  }
  return result;
}

/**
 * Doubles the backing array (bounded by capacity) and unwraps the ring so
 * the front sits at index 0.
 */
function grow<T>(queue: Queue<T>): void {
  const items = toArray(queue);
  const allocated = Math.min(queue.capacity, Math.max(INITIAL_ALLOCATION, queue.items.length * 2));
  items.length = allocated;
  queue.items = items;
  queue.head = 0;
}
