/**
 * Error taxonomy shared by the fetch client, cache, matcher and orchestrator.
 *
 * `retryable` marks errors the fetch client may retry locally; everything else
 * propagates to the route boundary in the scan orchestrator.
 */
export class MarketDataError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MarketDataError';
  }
}

/** Connection failure or a 502/503/504 from the upstream API. */
export class TransientNetworkError extends MarketDataError {
  constructor(
    public readonly endpoint: string,
    detail: string,
    public readonly status?: number
  ) {
    super(`Transient failure on ${endpoint}: ${detail}`, 'TRANSIENT_NETWORK', true);
    this.name = 'TransientNetworkError';
  }
}

/** Any non-retryable HTTP status. */
export class UpstreamRejectionError extends MarketDataError {
  constructor(
    public readonly endpoint: string,
    public readonly status: number
  ) {
    super(`Upstream rejected ${endpoint} with HTTP ${status}`, 'UPSTREAM_REJECTION');
    this.name = 'UpstreamRejectionError';
  }
}

export class FetchExhaustedError extends MarketDataError {
  constructor(
    public readonly endpoint: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      `Failed to GET ${endpoint} after ${attempts} attempts`,
      'FETCH_EXHAUSTED',
      false,
      { cause }
    );
    this.name = 'FetchExhaustedError';
  }
}

export class InvalidResponseError extends MarketDataError {
  constructor(
    public readonly endpoint: string,
    detail: string
  ) {
    super(`Malformed response from ${endpoint}: ${detail}`, 'INVALID_RESPONSE');
    this.name = 'InvalidResponseError';
  }
}

export class ValidationError extends MarketDataError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class PersistenceError extends MarketDataError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', false, { cause });
    this.name = 'PersistenceError';
  }
}

/** A single request or wait cancelled through an AbortSignal. */
export class AbortedError extends MarketDataError {
  constructor(operation: string) {
    super(`Aborted: ${operation}`, 'ABORTED');
    this.name = 'AbortedError';
  }
}

export class ScanAbortedError extends MarketDataError {
  constructor(
    public readonly scanId: string,
    public readonly completedRoutes: number
  ) {
    super(
      `Scan ${scanId} aborted after ${completedRoutes} completed routes`,
      'SCAN_ABORTED'
    );
    this.name = 'ScanAbortedError';
  }
}

export const errorCode = (error: unknown): string =>
  error instanceof MarketDataError ? error.code : 'UNKNOWN';

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
