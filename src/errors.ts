/**
 * Base class for errors raised by the notifier pipeline
 */
export class NotifierError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotifierError';
    this.statusCode = statusCode;
  }
}

/**
 * 401 - Missing or mismatched webhook signature. Never retried.
 */
export class AuthError extends NotifierError {
  constructor(message: string = 'Invalid signature') {
    super(message, 401);
    this.name = 'AuthError';
  }
}

/**
 * 400 - Malformed payload, unsupported event, or unmonitored repository
 */
export class ValidationError extends NotifierError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

/**
 * 503 - Dedup store unavailable. The upstream is expected to redeliver.
 */
export class StoreError extends NotifierError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, { cause });
    this.name = 'StoreError';
  }
}

/**
 * Failure talking to the chat transport
 */
export class TransportError extends NotifierError {
  /** Whether another attempt may succeed (network failure, 5xx, 429) */
  public readonly retryable: boolean;
  /** Provider-requested wait before the next attempt */
  public readonly retryAfterMs?: number;
  /** HTTP status from the provider, if a response was received */
  public readonly status?: number;

  constructor(
    message: string,
    details: { retryable: boolean; retryAfterMs?: number; status?: number; cause?: unknown }
  ) {
    super(message, 502, { cause: details.cause });
    this.name = 'TransportError';
    this.retryable = details.retryable;
    this.retryAfterMs = details.retryAfterMs;
    this.status = details.status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
