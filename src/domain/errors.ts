/**
 * Error taxonomy for the dispatch layer.
 *
 * None of these reach the caller of a gateway method as a return value or a
 * throw, except `ReentrantDispatchError`. Everything else flows through the
 * `ErrorReporter` sink.
 */

export class AnalyticsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A payload or trait set could not be converted into a canonical value. */
export class SerializationError extends AnalyticsError {
  /** JSON path of the offending member, `$` for the root. */
  readonly path: string;

  constructor(message: string, path = '$', options?: ErrorOptions) {
    super(`${message} at ${path}`, options);
    this.path = path;
  }
}

/** A required event field is missing or empty. */
export class InvalidEventError extends AnalyticsError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid "${field}": ${message}`);
    this.field = field;
  }
}

/** An enrichment threw, or returned an event of a different kind. */
export class EnrichmentError extends AnalyticsError {
  /** Position of the failing enrichment in the applied chain. */
  readonly index: number;

  constructor(message: string, index: number, options?: ErrorOptions) {
    super(message, options);
    this.index = index;
  }
}

/** An enrichment called back into the gateway while the chain was running. */
export class ReentrantDispatchError extends AnalyticsError {
  constructor(method: string) {
    super(`"${method}" was called from inside an enrichment; enrichments must not emit events`);
  }
}

export class ConfigurationError extends AnalyticsError {}

/** Normalizes a thrown value into an Error instance. */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new AnalyticsError(typeof thrown === 'string' ? thrown : 'Non-error value thrown', { cause: thrown });
}
