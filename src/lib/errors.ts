/**
 * Error classes shared by the Micropub, IndieAuth, WebMention and WebSub
 * endpoints. Handlers map them to HTTP responses by `status` and `code`
 * instead of matching on messages.
 */

/**
 * Base class for all errors raised by the hub
 */
export class IndieWebError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status = 400) {
    super(message);
    this.name = "IndieWebError";
    this.code = code;
    this.status = status;
  }

  /** RFC 6749 error body */
  toJSON(): { error: string; error_description: string } {
    return {
      error: this.code,
      error_description: this.message,
    };
  }
}

/**
 * The client identifier or its redirect URI cannot be trusted
 */
export class InvalidClientError extends IndieWebError {
  constructor(message = "Client authentication failed") {
    super(message, "invalid_client");
    this.name = "InvalidClientError";
  }
}

/**
 * The authorization code or refresh token is invalid, expired, or used
 */
export class InvalidGrantError extends IndieWebError {
  constructor(
    message = "The provided authorization grant is invalid, expired, or revoked"
  ) {
    super(message, "invalid_grant");
    this.name = "InvalidGrantError";
  }
}

export class InvalidScopeError extends IndieWebError {
  constructor(message = "The requested scope is invalid") {
    super(message, "invalid_scope");
    this.name = "InvalidScopeError";
  }
}

export class UnsupportedGrantTypeError extends IndieWebError {
  constructor(grantType: string) {
    super(`Unsupported grant type: ${grantType}`, "unsupported_grant_type");
    this.name = "UnsupportedGrantTypeError";
  }
}

/**
 * Missing, unknown, expired, or revoked bearer token
 */
export class UnauthorizedError extends IndieWebError {
  constructor(message = "The access token is invalid") {
    super(message, "invalid_token", 401);
    this.name = "UnauthorizedError";
  }
}

export class InsufficientScopeError extends IndieWebError {
  readonly scope: string;

  constructor(scope: string) {
    super(`The "${scope}" scope is required`, "insufficient_scope", 403);
    this.name = "InsufficientScopeError";
    this.scope = scope;
  }
}

/**
 * Error thrown for invalid request data
 */
export class InvalidRequestError extends IndieWebError {
  constructor(message = "Invalid request") {
    super(message, "invalid_request");
    this.name = "InvalidRequestError";
  }
}

/**
 * The WebSub topic is not a feed published by this site
 */
export class InvalidTopicError extends InvalidRequestError {
  constructor(topic: string) {
    super(`Topic is not published by this hub: ${topic}`);
    this.name = "InvalidTopicError";
  }
}

/**
 * Error thrown when a requested resource is not found
 */
export class NotFoundError extends IndieWebError {
  constructor(message = "Resource not found") {
    super(message, "not_found", 404);
    this.name = "NotFoundError";
  }
}

/**
 * Error thrown when a URL doesn't belong to the configured site
 */
export class UrlOwnershipError extends IndieWebError {
  constructor(message = "URL does not belong to this site") {
    super(message, "forbidden", 403);
    this.name = "UrlOwnershipError";
  }
}

export class ConflictError extends IndieWebError {
  constructor(message = "Resource conflict") {
    super(message, "conflict", 409);
    this.name = "ConflictError";
  }
}

/**
 * 449 Retry With: the receiver wants a `vouch` URL
 */
export class VouchRequiredError extends IndieWebError {
  constructor(message = "The webmention does not contain a vouch URL") {
    super(message, "vouch_required", 449);
    this.name = "VouchRequiredError";
  }
}

/**
 * Content judgment: the source does not support the claim
 */
export class VerificationFailedError extends IndieWebError {
  constructor(message: string) {
    super(message, "verification_failed");
    this.name = "VerificationFailedError";
  }
}

/**
 * Network failure or timeout while talking to another site
 */
export class TransportError extends IndieWebError {
  readonly retryable = true;
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${url})`, "transport_error", 502);
    this.name = "TransportError";
    this.url = url;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Type guard to check if an error is any IndieWebError
 */
export function isIndieWebError(error: unknown): error is IndieWebError {
  return error instanceof IndieWebError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
