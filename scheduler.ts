// @filename: scheduler.ts
/**
 * Ready-made {@link Scheduler}s.
 *
 * The core never schedules anything itself; these exist for drivers and
 * other consumers that must move delivery onto a particular context.
 *
 * @module
 */
import type { DisposableHandle, ExecutionContext, Scheduler } from "./_types.ts";

import { reportError } from "./diagnostics.ts";
import { createDisposable, emptyDisposable } from "./disposable.ts";
import { createQueue, dequeue, enqueue, isEmpty, peek, toArray } from "./queue.ts";
import type { Queue } from "./queue.ts";

/** Runs work inline, on the caller's stack. Nothing is left to cancel. */
export const immediateScheduler: Scheduler = {
  schedule(_context: ExecutionContext, work: () => void): DisposableHandle {
    work();
    return emptyDisposable();
  },
};

/**
 * Runs work on the micro-task queue: after the current synchronous code, in
 * FIFO order. The context is ignored; Node.js has one loop.
 */
export const microtaskScheduler: Scheduler = {
  schedule(_context: ExecutionContext, work: () => void): DisposableHandle {
    const handle = createDisposable();

    queueMicrotask(() => {
      if (handle.disposed) return;
      handle.dispose();
      run(work, "microtaskScheduler");
    });

    return handle;
  },
};

/**
 * A scheduler whose work only runs when the host calls {@link flush}.
 *
 * Hosts that own a frame or render loop flush once per tick; tests flush to
 * step through delivery deterministically.
 */
export interface QueueScheduler extends Scheduler {
  /**
   * Runs queued work for `context` (every context when omitted) until none
   * is left, including work queued while flushing.
   *
   * @returns how many items ran
   */
  flush(context?: ExecutionContext): number;

  /** Number of queued, not yet cancelled, items. */
  pending(context?: ExecutionContext): number;
}

interface Job {
  readonly work: () => void;
  readonly handle: DisposableHandle;
}

export function createQueueScheduler(): QueueScheduler {
  const queues = new Map<ExecutionContext, Queue<Job>>();

  const queueFor = (context: ExecutionContext): Queue<Job> => {
    let queue = queues.get(context);
    if (!queue) {
      queue = createQueue<Job>();
      queues.set(context, queue);
    }
    return queue;
  };

  const flushOne = (queue: Queue<Job>): number => {
    let ran = 0;
    while (!isEmpty(queue)) {
      const job = peek(queue);
      dequeue(queue);
      if (!job || job.handle.disposed) continue;

      job.handle.dispose();
      run(job.work, "QueueScheduler");
      ran++;
    }
    return ran;
  };

  return {
    schedule(context, work) {
      const handle = createDisposable();
      enqueue(queueFor(context), { work, handle });
      return handle;
    },

    flush(context) {
      if (context !== undefined) {
        const queue = queues.get(context);
        return queue ? flushOne(queue) : 0;
      }

      let ran = 0;
      for (const queue of queues.values()) ran += flushOne(queue);
      return ran;
    },

    pending(context) {
      const selected = context !== undefined ? [queues.get(context)] : [...queues.values()];
      let count = 0;
      for (const queue of selected) {
        if (!queue) continue;
        count += toArray(queue).filter(job => !job.handle.disposed).length;
      }
      return count;
    },
  };
}

/** Scheduled work has no caller to throw to. */
function run(work: () => void, source: string): void {
  try {
    work();
  } catch (err) {
    reportError(err, source);
  }
}
