// @filename: share.ts
/**
 * Multicasting a cold stream.
 *
 * A cold stream runs its activation once per subscriber. {@link share}
 * runs it once for all of them: the source is connected to one
 * {@link Subject} and every subscriber attaches to that subject instead.
 *
 * ## Connection modes
 * - `"lazy"` (default) connects on the first subscriber. With `reset`
 *   (default) the source is disconnected when the last subscriber leaves, and
 *   the next subscriber starts over with a fresh subject.
 * - `"eager"` connects straight away and stays connected, like a flight
 *   recorder.
 *
 * A subject that has terminated is replaced on the next subscription when
 * `reset` is set; without it, later subscribers receive what the terminated
 * subject replays (its terminal event at least).
 *
 * @example
 * ```ts
 * const prices = share(pollPrices());   // one poller, however many views
 * const a = prices.subscribe(renderChart);
 * const b = prices.subscribe(renderTicker);
 * a.dispose();
 * b.dispose();                           // poller stops here
 *
 * const latest = shareReplay(loadConfig(), { count: 1 });
 * latest.subscribe(apply);               // triggers the load
 * latest.subscribe(apply);               // replayed, no second load
 * ```
 *
 * @module
 */
import type { Subscription } from "./_types.ts";
import type { SpecObservable } from "./_spec.ts";

import { from, Observable } from "./observable.ts";
import { ReplaySubject, Subject } from "./subject.ts";

export type ConnectMode = "lazy" | "eager";

export interface ShareOptions<T> {
  /** Builds the subject the source is connected to. @default () => new Subject() */
  connector?: () => Subject<T>;
  /** @default "lazy" */
  mode?: ConnectMode;
  /**
   * Start over once nobody is listening (lazy mode) or once the subject
   * has terminated. @default true
   */
  reset?: boolean;
}

export interface ShareReplayOptions {
  /** How many of the latest values to replay. @default Infinity */
  count?: number;
  /** @default "lazy" */
  mode?: ConnectMode;
  /** @default true */
  reset?: boolean;
}

interface Connection<T> {
  subject: Subject<T> | null;
  upstream: Subscription | null;
  subscribers: number;
}

export function share<T>(
  source: SpecObservable<T> | Observable<T>,
  { connector = () => new Subject<T>(), mode = "lazy", reset = true }: ShareOptions<T> = {}
): Observable<T> {
  const stream = from(source);
  const isEager = mode === "eager";
  const connection: Connection<T> = { subject: null, upstream: null, subscribers: 0 };

  const connect = (subject: Subject<T>) => {
    if (!connection.upstream) connection.upstream = stream.subscribe(subject);
  };

  const disconnect = () => {
    const upstream = connection.upstream;
    connection.upstream = null;
    connection.subject = null;
    upstream?.dispose();
  };

  if (isEager) {
    connection.subject = connector();
    connect(connection.subject);
  }

  return new Observable<T>(emitter => {
    if (reset && connection.subject?.closed) disconnect();

    const subject = connection.subject ?? (connection.subject = connector());
    connection.subscribers++;

    // Attach before connecting, so a synchronous source reaches this subscriber.
    const inner = subject.subscribe(emitter);
    connect(subject);

    return () => {
      inner.dispose();
      connection.subscribers--;

      if (!isEager && reset && connection.subscribers === 0) disconnect();
    };
  }, "share");
}

/**
 * {@link share} through a {@link ReplaySubject}: late subscribers first
 * receive up to `count` of the latest values.
 *
 * @throws RangeError if `count` is not a positive integer or `Infinity`
 */
export function shareReplay<T>(
  source: SpecObservable<T> | Observable<T>,
  { count = Infinity, mode = "lazy", reset = true }: ShareReplayOptions = {}
): Observable<T> {
  if (count !== Infinity && (!Number.isInteger(count) || count <= 0)) {
    throw new RangeError(`Replay count must be a positive integer, got ${count}`);
  }

  return share(source, { connector: () => new ReplaySubject<T>(count), mode, reset });
}
