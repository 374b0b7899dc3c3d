// @filename: _promise.ts
import type { Subscription } from "./_types.ts";
import { ObservableError } from "./error.ts";

/**
 * Options for the `toPromise()` conversions of the bounded variants.
 */
export interface ToPromiseOptions {
  /**
   * Cancels the wait: the subscription is disposed and the promise rejects
   * with the signal's reason.
   */
  signal?: AbortSignal;
}

/**
 * Bridges one settling subscription to a promise.
 *
 * `attach` subscribes with the given callbacks and returns the
 * subscription. Errors that are not `Error` instances are wrapped in an
 * {@link ObservableError} tagged with `source`.
 *
 * @internal
 */
export function settle<R>(
  source: string,
  attach: (resolve: (value: R) => void, reject: (error: unknown) => void) => Subscription,
  { signal }: ToPromiseOptions = {}
): Promise<R> {
  return new Promise<R>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const subscription = attach(
      value => {
        cleanup();
        resolve(value);
      },
      error => {
        cleanup();
        reject(error instanceof Error ? error : ObservableError.from(error, source));
      }
    );

    // Settled synchronously
    if (subscription.closed) return;

    signal?.addEventListener("abort", onAbort, { once: true });

    function onAbort() {
      subscription.dispose();
      reject(signal?.reason);
    }

    function cleanup() {
      signal?.removeEventListener("abort", onAbort);
    }
  });
}
