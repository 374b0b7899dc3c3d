// @filename: error.ts
/**
 * Error types raised by the stream core.
 *
 * @module
 */

/**
 * Base error of the library: an `AggregateError` that remembers where in the
 * stream machinery it was raised and with which value.
 *
 * Producer failures that are not already `Error` instances are wrapped in
 * one of these when they leave the push world (a rejected `toPromise()`, an
 * exception from `pull()`), so callers always catch an `Error`.
 */
export class ObservableError extends AggregateError {
  /** The component that raised or wrapped the error (`"Single.from"`, `"pull"`, ...). */
  readonly source?: string;

  /** The value being handled when the error occurred. */
  readonly value?: unknown;

  /** A hint at the likely fix. */
  readonly tip?: string;

  constructor(
    errors: unknown,
    message: string,
    options?: {
      source?: string;
      value?: unknown;
      cause?: unknown;
      tip?: string;
    }
  ) {
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = "ObservableError";
    this.source = options?.source;
    this.value = options?.value;
    this.tip = options?.tip;
  }

  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.source) {
      result += `\n  in: ${this.source}`;
    }

    if (this.value !== undefined) {
      result += `\n  processing value: ${describeValue(this.value)}`;
    }

    if (this.errors.length > 0) {
      result += "\n  with errors:";
      this.errors.forEach((err, i) => {
        result += `\n    ${i + 1}) ${err}`;
      });
    }

    if (this.tip) {
      result += `\n  tip: ${this.tip}`;
    }

    return result;
  }

  /**
   * Wraps `error` unless it already is an `ObservableError`, in which case a
   * missing `source` is filled in.
   */
  static from(error: unknown, source?: string, value?: unknown): ObservableError {
    if (error instanceof ObservableError) {
      if (!error.source && source) {
        return new ObservableError(error.errors, error.message, {
          source,
          value: error.value ?? value,
          cause: error.cause,
          tip: error.tip,
        });
      }
      return error;
    }

    return new ObservableError(
      error,
      error instanceof Error ? error.message : String(error),
      { source, value, cause: error }
    );
  }
}

/** Short form of a value for error output; circular objects fall back to `String()`. */
function describeValue(value: unknown): string {
  if (typeof value !== "object" || value === null) return String(value);

  try {
    return String(JSON.stringify(value)).slice(0, 100);
  } catch {
    return String(value);
  }
}

/**
 * The ways a producer can break the delivery contract.
 *
 * - `event-after-terminal`: an event arrived after the guard closed on an
 *   error or completion.
 * - `extra-value`: a bounded-cardinality emitter produced more values than
 *   its contract allows.
 * - `terminal-on-relay`: an error or completion was pushed into a relay.
 */
export type ViolationKind = "event-after-terminal" | "extra-value" | "terminal-on-relay";

/**
 * A caller bug, not a runtime condition: the event that triggered it has
 * already been dropped. Reported through `diagnostics.ts`, never delivered
 * to a subscriber.
 */
export class ContractViolationError extends ObservableError {
  readonly kind: ViolationKind;

  constructor(kind: ViolationKind, message: string, options?: { source?: string; value?: unknown }) {
    super([], message, {
      source: options?.source,
      value: options?.value,
      tip: kind === "terminal-on-relay"
        ? "relays never terminate; use a Subject when the producer must end the stream"
        : "a producer must stop emitting once it has sent an error or completion",
    });
    this.name = "ContractViolationError";
    this.kind = kind;
  }
}

/**
 * A conversion to a bounded-cardinality variant saw too many or too few
 * values. Delivered through the error channel of that conversion.
 */
export class SequenceError extends ObservableError {
  constructor(message: string, options?: { source?: string; value?: unknown }) {
    super([], message, options);
    this.name = "SequenceError";
  }
}

/**
 * One or more release actions threw while a bag or subscription was being
 * released. The other actions still ran.
 */
export class DisposalError extends ObservableError {
  constructor(errors: unknown[], options?: { source?: string }) {
    super(errors, `${errors.length} release action(s) failed`, options);
    this.name = "DisposalError";
  }
}

/** Narrowing check for {@link ObservableError} and its subclasses. */
export function isObservableError(value: unknown): value is ObservableError {
  return value instanceof ObservableError;
}
