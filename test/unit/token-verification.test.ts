import { describe, it, expect } from 'vitest';
import { UnauthorizedError } from '../../src/lib/errors.js';
import { extractToken, requireAuth, verifyToken, withAuth } from '../../src/lib/token-verification.js';
import { CLIENT_ID, SITE, createTestIndieWeb, issueToken } from '../helpers.js';

function bearer(token: string): Request {
  return new Request('https://example.com/micropub', {
    headers: { Authorization: `Bearer ${token}` },
  });
}

describe('extractToken', () => {
  it('reads a bearer token case-insensitively', () => {
    const request = new Request('https://example.com/micropub', {
      headers: { Authorization: 'bearer test-token ' },
    });
    expect(extractToken(request)).toBe('test-token');
  });

  it('ignores other schemes and a missing header', () => {
    const basic = new Request('https://example.com/micropub', {
      headers: { Authorization: 'Basic dGVzdDp0ZXN0' },
    });
    expect(extractToken(basic)).toBeNull();
    expect(extractToken(new Request('https://example.com/micropub'))).toBeNull();
  });
});

describe('verifyToken', () => {
  const { indieweb, clock } = createTestIndieWeb();

  it('resolves an issued token to its grant', async () => {
    const issued = await issueToken(indieweb, 'create media');
    const result = await verifyToken(issued.access_token, indieweb.tokens);

    expect(result).toEqual({
      active: true,
      me: SITE,
      client_id: CLIENT_ID,
      scope: 'create media',
      exp: Math.floor(clock.now().getTime() / 1000) + 3600,
      iat: Math.floor(clock.now().getTime() / 1000),
    });
  });

  it('returns null for unknown and expired tokens', async () => {
    expect(await verifyToken('not-a-token', indieweb.tokens)).toBeNull();

    const issued = await issueToken(indieweb);
    clock.advance(3600);
    expect(await verifyToken(issued.access_token, indieweb.tokens)).toBeNull();
  });

  it('returns null once the token is revoked', async () => {
    const issued = await issueToken(indieweb);
    await indieweb.tokens.revoke(issued.access_token);

    expect(await verifyToken(issued.access_token, indieweb.tokens)).toBeNull();
  });
});

describe('withAuth and requireAuth', () => {
  const { indieweb } = createTestIndieWeb();

  it('authorizes a valid bearer token', async () => {
    const issued = await issueToken(indieweb, 'update');
    const result = await withAuth(bearer(issued.access_token), indieweb.tokens);

    expect(result.authorized).toBe(true);
    expect(result.verification?.scope).toBe('update');
  });

  it('reports invalid_token without a usable token', async () => {
    expect(await withAuth(new Request('https://example.com/micropub'), indieweb.tokens)).toEqual({
      authorized: false,
      error: 'invalid_token',
    });
  });

  it('tells a missing token from a bad one', async () => {
    await expect(requireAuth(new Request('https://example.com/micropub'), indieweb.tokens)).rejects.toThrow(
      'Missing bearer token'
    );
    await expect(requireAuth(bearer('made-up'), indieweb.tokens)).rejects.toThrow(UnauthorizedError);
    await expect(requireAuth(bearer('made-up'), indieweb.tokens)).rejects.toThrow(
      'The access token is invalid'
    );
  });
});
