/**
 * Firebase Error Types
 *
 * Every failure surfaced by this package is a {@link FirebaseError}. The HTTP
 * client is the only place that turns raw HTTP or network failures into one
 * of these kinds; services let them propagate unchanged.
 */

/**
 * Discriminant for the error hierarchy.
 */
export type FirebaseErrorKind =
  | "validation"
  | "auth"
  | "permission"
  | "not_found"
  | "rate_limit"
  | "network"
  | "service";

/**
 * Options shared by every error kind.
 */
export interface FirebaseErrorOptions {
  /** Machine-readable code reported by the service */
  code?: string;
  /** HTTP status of the failed response */
  status?: number;
  /** Structured details from the service's error envelope */
  details?: unknown;
  /** Underlying error */
  cause?: unknown;
}

/**
 * Base Firebase error class.
 */
export class FirebaseError extends Error {
  public readonly kind: FirebaseErrorKind;
  public readonly code?: string;
  public readonly status?: number;
  public readonly details?: unknown;
  public readonly retryable: boolean;

  constructor(
    kind: FirebaseErrorKind,
    message: string,
    options: FirebaseErrorOptions & { retryable?: boolean } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "FirebaseError";
    this.kind = kind;
    this.code = options.code;
    this.status = options.status;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    Object.setPrototypeOf(this, FirebaseError.prototype);
  }

  /**
   * Renders as `[code] message`, or just the message without a code.
   */
  override toString(): string {
    return this.code ? `[${this.code}] ${this.message}` : this.message;
  }
}

/**
 * Bad caller input. Raised before any network call and never retried.
 */
export class ValidationError extends FirebaseError {
  public readonly field?: string;

  constructor(message: string, options?: FirebaseErrorOptions & { field?: string }) {
    super("validation", message, { code: "VALIDATION_ERROR", ...options });
    this.name = "ValidationError";
    this.field = options?.field;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Expired or invalid credential, or rejected user credentials.
 */
export class AuthError extends FirebaseError {
  constructor(message: string, options?: FirebaseErrorOptions) {
    super("auth", message, options);
    this.name = "AuthError";
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * The credential is valid but not allowed to perform the operation.
 */
export class PermissionError extends FirebaseError {
  constructor(message: string, options?: FirebaseErrorOptions) {
    super("permission", message, options);
    this.name = "PermissionError";
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

/**
 * The addressed resource does not exist.
 * Read operations soften this into a `null` result.
 */
export class NotFoundError extends FirebaseError {
  constructor(message: string, options?: FirebaseErrorOptions) {
    super("not_found", message, options);
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Too many requests (HTTP 429).
 */
export class RateLimitError extends FirebaseError {
  /** Seconds the service asked us to wait, when it said so */
  public readonly retryAfter?: number;

  constructor(message: string, options?: FirebaseErrorOptions & { retryAfter?: number }) {
    super("rate_limit", message, { ...options, retryable: true });
    this.name = "RateLimitError";
    this.retryAfter = options?.retryAfter;
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Transport-level failure (connection refused, DNS, TLS, timeout).
 */
export class NetworkError extends FirebaseError {
  public readonly reason: NetworkFailureReason;

  constructor(
    message: string,
    reason: NetworkFailureReason = "ConnectionFailed",
    options?: FirebaseErrorOptions
  ) {
    super("network", message, { code: "NETWORK_ERROR", ...options, retryable: true });
    this.name = "NetworkError";
    this.reason = reason;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

export type NetworkFailureReason =
  | "Timeout"
  | "DnsResolutionFailed"
  | "ConnectionFailed"
  | "TlsError";

/**
 * Any service error not covered by a more specific kind.
 */
export class ServiceError extends FirebaseError {
  constructor(message: string, options?: FirebaseErrorOptions) {
    super("service", message, {
      ...options,
      retryable: options?.status !== undefined && options.status >= 500,
    });
    this.name = "ServiceError";
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

/**
 * Type guard for errors raised by this package.
 */
export function isFirebaseError(error: unknown): error is FirebaseError {
  return error instanceof FirebaseError;
}
