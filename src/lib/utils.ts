import { ZodError } from "zod";
import { isIndieWebError, UnauthorizedError, InsufficientScopeError } from "./errors.js";
import { describeError, type Logger } from "./logger.js";

/**
 * Validate that a URL is absolute
 */
export function isAbsoluteUrl(url: string): boolean {
  return URL.canParse(url);
}

/**
 * Get the appropriate CORS origin based on the request origin and allowed origins list
 */
export function getCorsOrigin(
  requestOrigin: string | null,
  allowedOrigins: string[] = ["*"]
): string {
  if (allowedOrigins.includes("*")) {
    return "*";
  }

  if (requestOrigin && allowedOrigins.includes(requestOrigin)) {
    return requestOrigin;
  }

  // Non-browser requests or mismatched origins
  return allowedOrigins[0] || "*";
}

/**
 * Create RFC 6750 compliant error response
 */
export function createAuthError(
  status: 401 | 403,
  error: string,
  errorDescription?: string,
  scope?: string,
  requestOrigin?: string | null,
  allowedOrigins?: string[]
): Response {
  let wwwAuthenticate = `Bearer realm="indiehub", error="${error}"`;

  if (errorDescription) {
    wwwAuthenticate += `, error_description="${errorDescription.replace(/"/g, "'")}"`;
  }

  if (scope) {
    wwwAuthenticate += `, scope="${scope}"`;
  }

  const origin = getCorsOrigin(requestOrigin ?? null, allowedOrigins);

  return new Response(
    JSON.stringify({
      error,
      ...(errorDescription ? { error_description: errorDescription } : {}),
    }),
    {
      status,
      headers: {
        "Content-Type": "application/json",
        "WWW-Authenticate": wwwAuthenticate,
        "Access-Control-Allow-Origin": origin,
      },
    }
  );
}

/**
 * Create error response with JSON body
 */
export function createErrorResponse(
  status: number,
  error: string,
  errorDescription?: string,
  requestOrigin?: string | null,
  allowedOrigins?: string[]
): Response {
  const body = {
    error,
    ...(errorDescription ? { error_description: errorDescription } : {}),
  };

  const origin = getCorsOrigin(requestOrigin ?? null, allowedOrigins);

  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": origin,
    },
  });
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json",
      "Cache-Control": "no-store",
      ...headers,
    },
  });
}

/**
 * Map a thrown value to a response: hub errors by their status and code,
 * request validation failures to 400, anything else to a logged 500.
 */
export function errorToResponse(
  error: unknown,
  logger: Logger,
  cors: { requestOrigin?: string | null; allowedOrigins?: string[] } = {}
): Response {
  const { requestOrigin, allowedOrigins } = cors;

  if (error instanceof UnauthorizedError) {
    return createAuthError(401, error.code, error.message, undefined, requestOrigin, allowedOrigins);
  }
  if (error instanceof InsufficientScopeError) {
    return createAuthError(403, error.code, error.message, error.scope, requestOrigin, allowedOrigins);
  }
  if (isIndieWebError(error)) {
    return createErrorResponse(error.status, error.code, error.message, requestOrigin, allowedOrigins);
  }
  if (error instanceof ZodError) {
    const detail = error.issues
      .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
      .join("; ");
    return createErrorResponse(400, "invalid_request", detail, requestOrigin, allowedOrigins);
  }

  logger.error(`Unhandled error: ${describeError(error)}`);
  return createErrorResponse(500, "server_error", "Internal server error", requestOrigin, allowedOrigins);
}

/**
 * Add CORS headers to a response
 */
export function addCorsHeaders(
  response: Response,
  allowedOrigins: string[] = ["*"],
  requestOrigin?: string | null
): Response {
  const headers = new Headers(response.headers);

  const origin = getCorsOrigin(requestOrigin ?? null, allowedOrigins);
  headers.set("Access-Control-Allow-Origin", origin);
  headers.set("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  headers.set("Access-Control-Allow-Headers", "Authorization, Content-Type");

  if (origin !== "*") {
    headers.set("Access-Control-Allow-Credentials", "true");
  }

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

/**
 * Create CORS preflight response
 */
export function createCorsPreflightResponse(
  allowedOrigins: string[] = ["*"],
  requestOrigin?: string | null
): Response {
  const origin = getCorsOrigin(requestOrigin ?? null, allowedOrigins);

  return new Response(null, {
    status: 204,
    headers: {
      "Access-Control-Allow-Origin": origin,
      "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
      "Access-Control-Allow-Headers": "Authorization, Content-Type",
      "Access-Control-Max-Age": "86400", // 24 hours
      ...(origin !== "*" && { "Access-Control-Allow-Credentials": "true" }),
    },
  });
}
