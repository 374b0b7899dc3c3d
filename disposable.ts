// @filename: disposable.ts
/**
 * Idempotent release tokens.
 *
 * A {@link DisposableHandle} wraps one release action and guarantees it runs
 * at most once, whichever caller gets there first. Handles compose: a
 * composite handle releases a fixed set of children.
 *
 * @example
 * ```ts
 * const timer = setInterval(tick, 1000);
 * const handle = createDisposable(() => clearInterval(timer));
 *
 * handle.dispose(); // clears the interval
 * handle.dispose(); // no-op
 * ```
 *
 * @module
 */
import type { DisposableHandle, SpecSubscription, Teardown } from "./_types.ts";
import { reportError } from "./diagnostics.ts";
import { DisposalError } from "./error.ts";
import { Symbol } from "./symbol.ts";

/**
 * Creates a handle around `action`.
 *
 * The `disposed` flag flips before the action runs, so a release action that
 * disposes its own handle again returns straight away. If the action throws,
 * the error propagates to the caller of that first `dispose()`.
 */
export function createDisposable(action?: (() => void) | null): DisposableHandle {
  let release = action ?? null;
  let disposed = false;

  return {
    get disposed() { return disposed; },

    dispose(): void {
      if (disposed) return;
      disposed = true;

      const run = release;
      release = null;
      run?.();
    },

    [Symbol.dispose]() {
      this.dispose();
    },
  };
}

/** A handle with nothing to release, already usable as a placeholder. */
export function emptyDisposable(): DisposableHandle {
  return createDisposable(null);
}

/**
 * Releases every child, in order, on its first `dispose()`.
 *
 * A child that throws does not stop the others; the failures are collected
 * and thrown together as a {@link DisposalError}.
 */
export function compositeDisposable(...children: Teardown[]): DisposableHandle {
  return createDisposable(() => {
    const errors = disposeAll(children.map(toDisposable));
    if (errors.length > 0) throw new DisposalError(errors, { source: "compositeDisposable" });
  });
}

/**
 * Normalises any {@link Teardown} into a {@link DisposableHandle}.
 *
 * Handles pass through unchanged; functions, `unsubscribe()` objects and
 * (async) disposables are wrapped. An async disposal's rejection is
 * reported as an unhandled error.
 *
 * @throws TypeError if `teardown` is none of the accepted shapes.
 */
export function toDisposable(teardown: Teardown): DisposableHandle {
  if (teardown === null || teardown === undefined) return emptyDisposable();
  if (isDisposableHandle(teardown)) return teardown;
  if (typeof teardown === "function") return createDisposable(teardown);

  if (typeof teardown === "object") {
    if (isSpecSubscription(teardown)) {
      const subscription = teardown;
      return createDisposable(() => subscription.unsubscribe());
    }

    if (isSyncDisposable(teardown)) {
      const resource = teardown;
      return createDisposable(() => resource[Symbol.dispose]());
    }

    if (isAsyncDisposable(teardown)) {
      const resource = teardown;
      return createDisposable(() => {
        resource[Symbol.asyncDispose]()
          .then(undefined, (err: unknown) => reportError(err, "asyncDispose"));
      });
    }
  }

  throw new TypeError(
    "Expected a teardown function, a disposable handle, an unsubscribe object, a [Symbol.dispose] or [Symbol.asyncDispose] disposable, or nothing"
  );
}

export function isDisposableHandle(value: unknown): value is DisposableHandle {
  return typeof value === "object" && value !== null &&
    typeof Reflect.get(value, "dispose") === "function" &&
    typeof Reflect.get(value, "disposed") === "boolean";
}

function isSpecSubscription(value: object): value is SpecSubscription {
  return typeof Reflect.get(value, "unsubscribe") === "function";
}

function isSyncDisposable(value: object): value is Disposable {
  return typeof Reflect.get(value, Symbol.dispose) === "function";
}

function isAsyncDisposable(value: object): value is AsyncDisposable {
  return typeof Reflect.get(value, Symbol.asyncDispose) === "function";
}

/**
 * Disposes each handle and collects what they throw.
 *
 * @internal
 */
export function disposeAll(handles: Iterable<DisposableHandle>): unknown[] {
  const errors: unknown[] = [];
  for (const handle of handles) {
    try {
      handle.dispose();
    } catch (err) {
      errors.push(err);
    }
  }
  return errors;
}
