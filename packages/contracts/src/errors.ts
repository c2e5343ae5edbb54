/**
 * @fileoverview Error taxonomy for the air quality pipeline.
 *
 * Every error carries a machine-readable code, structured data and an ISO
 * timestamp. "Not found" is deliberately absent: stores return null and the
 * cache reports a miss.
 *
 * @module @airwatch/contracts/errors
 */

/**
 * Base class for all pipeline errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new AirwatchError('CUSTOM_ERROR', 'Something went wrong', { target: 'Tuzla' });
 * ```
 */
export class AirwatchError extends Error {
  /** Machine-readable error code (e.g. 'FETCH_UNAVAILABLE') */
  readonly code: string;

  readonly data?: Record<string, unknown>;

  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AirwatchError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
    };
  }
}

export interface FetchUnavailableData {
  target: string;
  /** HTTP status when the upstream answered with one */
  statusCode?: number;
  [key: string]: unknown;
}

/**
 * Upstream fetch failed, timed out, or the upstream reported an error status.
 */
export class FetchUnavailableError extends AirwatchError {
  declare readonly data: FetchUnavailableData;

  constructor(message: string, data: FetchUnavailableData, cause?: unknown) {
    super('FETCH_UNAVAILABLE', message, data, cause);
    this.name = 'FetchUnavailableError';
  }
}

export interface MalformedPayloadData {
  target: string;
  /** One entry per missing or unparseable field */
  issues: string[];
  [key: string]: unknown;
}

/**
 * Fetch succeeded but required fields were missing or unparseable.
 */
export class MalformedPayloadError extends AirwatchError {
  declare readonly data: MalformedPayloadData;

  constructor(message: string, data: MalformedPayloadData) {
    super('MALFORMED_PAYLOAD', message, data);
    this.name = 'MalformedPayloadError';
  }
}

/**
 * Target has no known upstream identifier.
 */
export class NotConfiguredError extends AirwatchError {
  declare readonly data: { target: string; [key: string]: unknown };

  constructor(message: string, data: { target: string; [key: string]: unknown }) {
    super('NOT_CONFIGURED', message, data);
    this.name = 'NotConfiguredError';
  }
}

/**
 * Snapshot append did not happen.
 */
export class WriteFailureError extends AirwatchError {
  declare readonly data: { target: string; [key: string]: unknown };

  constructor(message: string, data: { target: string; [key: string]: unknown }, cause?: unknown) {
    super('WRITE_FAILURE', message, data, cause);
    this.name = 'WriteFailureError';
  }
}

export type ViewKind = 'live' | 'forecast';

/**
 * Read path found nothing cached and could not produce a fresh value.
 *
 * @example
 * ```typescript
 * new DataUnavailableError('Mostar', 'forecast').message;
 * // 'No cached forecast data available for Mostar.'
 * ```
 */
export class DataUnavailableError extends AirwatchError {
  declare readonly data: { target: string; kind: ViewKind };

  constructor(target: string, kind: ViewKind, cause?: unknown) {
    super('DATA_UNAVAILABLE', `No cached ${kind} data available for ${target}.`, { target, kind }, cause);
    this.name = 'DataUnavailableError';
  }
}

export function isAirwatchError(error: unknown): error is AirwatchError {
  return error instanceof AirwatchError;
}

export function isFetchUnavailableError(error: unknown): error is FetchUnavailableError {
  return error instanceof FetchUnavailableError;
}

export function isMalformedPayloadError(error: unknown): error is MalformedPayloadError {
  return error instanceof MalformedPayloadError;
}

export function isNotConfiguredError(error: unknown): error is NotConfiguredError {
  return error instanceof NotConfiguredError;
}

export function isWriteFailureError(error: unknown): error is WriteFailureError {
  return error instanceof WriteFailureError;
}

export function isDataUnavailableError(error: unknown): error is DataUnavailableError {
  return error instanceof DataUnavailableError;
}
