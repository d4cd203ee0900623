/**
 * Base error class for all widget errors
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SyncError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    const captureStackTrace: unknown = Reflect.get(Error, 'captureStackTrace');
    if (typeof captureStackTrace === 'function') {
      captureStackTrace.call(Error, this, this.constructor);
    }
  }
}

/**
 * Thrown when an expected element is still missing after bounded retries
 */
export class NotFoundError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'NOT_FOUND', cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when a lookup fails at the network or HTTP level
 */
export class TransportError extends SyncError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly detail?: string,
    cause?: Error
  ) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

/**
 * Thrown when a lookup payload does not have the expected shape
 */
export class MalformedResponseError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'MALFORMED_RESPONSE', cause);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Raised when the assigned-secondary lookup fails (logged, never shown)
 */
export class SecondaryLookupError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'SECONDARY_LOOKUP_ERROR', cause);
    this.name = 'SecondaryLookupError';
  }
}

/**
 * Wrap any thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
