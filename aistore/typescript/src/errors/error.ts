/**
 * Base error class for the AIStore client
 * @module aistore-client/errors/error
 */

/**
 * Parameters for creating an AisError
 */
export interface AisErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether repeating the request could succeed
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying cause
   */
  readonly cause?: Error;
}

/**
 * Base error class for all AIStore operations.
 *
 * Carries the HTTP status and a stable `code` so callers can branch on
 * `error.code === 'NotFound'` rather than on message text. The client never
 * retries; `isRetryable` is a hint for the caller's own policy.
 */
export class AisError extends Error {
  readonly type: string;
  readonly status?: number;
  readonly code?: string;
  readonly isRetryable: boolean;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(params: AisErrorParams) {
    super(params.message);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, AisError.prototype);

    this.name = 'AisError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.details = params.details;
    this.cause = params.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AisError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }

  override toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
