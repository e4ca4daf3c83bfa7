import type { TokenService } from '../services/token-service.js';
import type { TokenVerificationResult } from '../types/micropub.js';
import { UnauthorizedError } from './errors.js';

/**
 * Extract Bearer token from Authorization header
 */
export function extractToken(request: Request): string | null {
  const authHeader = request.headers.get('authorization');
  if (authHeader?.toLowerCase().startsWith('bearer ')) {
    return authHeader.substring(7).trim() || null;
  }
  return null;
}

/**
 * Verify a token against the local token store
 */
export async function verifyToken(
  token: string,
  tokens: TokenService
): Promise<TokenVerificationResult | null> {
  try {
    const verified = await tokens.verify(token);
    return {
      active: true,
      me: verified.me,
      client_id: verified.clientId,
      scope: verified.scope,
      exp: Math.floor(verified.expiresAt.getTime() / 1000),
      iat: Math.floor(verified.issuedAt.getTime() / 1000),
    };
  } catch (error) {
    if (error instanceof UnauthorizedError) {
      return null;
    }
    throw error;
  }
}

/**
 * Middleware to verify authorization and populate request context
 */
export async function withAuth(
  request: Request,
  tokens: TokenService
): Promise<{
  authorized: boolean;
  verification?: TokenVerificationResult;
  error?: string;
}> {
  const token = extractToken(request);

  if (!token) {
    return {
      authorized: false,
      error: 'invalid_token',
    };
  }

  const verification = await verifyToken(token, tokens);

  if (!verification) {
    return {
      authorized: false,
      error: 'invalid_token',
    };
  }

  return {
    authorized: true,
    verification,
  };
}

/**
 * Like `withAuth`, but throws the error the endpoint should answer with
 */
export async function requireAuth(
  request: Request,
  tokens: TokenService
): Promise<TokenVerificationResult> {
  const result = await withAuth(request, tokens);
  if (!result.authorized || !result.verification) {
    throw new UnauthorizedError(
      extractToken(request) === null ? 'Missing bearer token' : 'The access token is invalid'
    );
  }
  return result.verification;
}
