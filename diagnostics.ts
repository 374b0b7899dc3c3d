// @filename: diagnostics.ts
/**
 * Library-wide configuration and the two reporting channels of the core.
 *
 * Errors that nobody handles (a terminal error without an `error` callback,
 * a consumer callback that throws, a release action that throws) go to
 * {@link reportError}. Producers that break the delivery contract go to
 * {@link reportViolation}. Both are counted, both can be intercepted through
 * {@link configure}.
 *
 * ## Unhandled errors
 * With an `onUnhandledError` hook the error is handed to it. Without one, it
 * is logged and re-thrown on the micro-task queue, the same timing and
 * visibility as an unhandled Promise rejection.
 *
 * ## Contract violations
 * The offending event has already been dropped by the terminal guard. The
 * violation is passed to `onContractViolation` and, unless `logViolations`
 * is off, logged as a warning.
 *
 * @example
 * ```ts
 * import { configure } from "./diagnostics.ts";
 *
 * configure({
 *   logger: myLogger,
 *   onUnhandledError: err => crashReporter.capture(err),
 *   onContractViolation: v => metrics.increment(`stream.violation.${v.kind}`),
 * });
 * ```
 *
 * @module
 */
import { ContractViolationError } from "./error.ts";
import type { ViolationKind } from "./error.ts";

/** The slice of `console` the library writes to. */
export type Logger = Pick<Console, "debug" | "warn" | "error">;

export interface Configuration {
  /** Where log lines go. @default console */
  logger: Logger;

  /** Whether contract violations are logged as warnings. @default true */
  logViolations: boolean;

  /** Receives every contract violation. */
  onContractViolation?: (violation: ContractViolationError) => void;

  /** Receives every unhandled error instead of the micro-task re-throw. */
  onUnhandledError?: (error: unknown) => void;
}

export interface DiagnosticsSnapshot {
  readonly violations: number;
  readonly unhandledErrors: number;
}

const PREFIX = "[rivulet]";

function defaults(): Configuration {
  return { logger: console, logViolations: true };
}

let config: Configuration = defaults();
let violations = 0;
let unhandledErrors = 0;

/**
 * Merges `options` into the current configuration.
 *
 * Passing `undefined` for a hook removes it.
 */
export function configure(options: Partial<Configuration>): void {
  config = { ...config, ...options };
}

/** Restores the default configuration. Counters are left untouched. */
export function resetConfiguration(): void {
  config = defaults();
}

export function getConfiguration(): Readonly<Configuration> {
  return config;
}

/** Counters since start-up or the last {@link resetDiagnostics}. */
export function getDiagnostics(): DiagnosticsSnapshot {
  return { violations, unhandledErrors };
}

export function resetDiagnostics(): void {
  violations = 0;
  unhandledErrors = 0;
}

/**
 * Host-report policy for errors with nowhere else to go.
 *
 * @param source - Component reporting the error, for the log line.
 */
export function reportError(error: unknown, source: string): void {
  unhandledErrors++;

  const hook = config.onUnhandledError;
  if (hook) {
    try {
      hook(error);
      return;
    } catch (hookError) {
      error = hookError;
    }
  }

  config.logger.error(`${PREFIX} unhandled error in ${source}:`, error);
  queueMicrotask(() => { throw error; });
}

/**
 * Records a contract violation. The offending event must already have been
 * dropped by the caller.
 */
export function reportViolation(kind: ViolationKind, source: string, value?: unknown): void {
  violations++;

  const violation = new ContractViolationError(kind, describe(kind, source), { source, value });

  if (config.logViolations) {
    config.logger.warn(`${PREFIX} ${violation.message}`);
  }

  const hook = config.onContractViolation;
  if (!hook) return;

  try {
    hook(violation);
  } catch (hookError) {
    reportError(hookError, "onContractViolation");
  }
}

/**
 * Notes an event that lost the race against the consumer's own disposal.
 * Expected under concurrency, so it is only logged at debug level.
 */
export function reportDropped(source: string, kind: string): void {
  config.logger.debug(`${PREFIX} ${source}: dropped "${kind}" after disposal`);
}

function describe(kind: ViolationKind, source: string): string {
  switch (kind) {
    case "event-after-terminal":
      return `${source} received an event after it had already terminated`;
    case "extra-value":
      return `${source} produced more values than its contract allows`;
    case "terminal-on-relay":
      return `${source} rejected a terminal event; relays cannot terminate`;
  }
}
