import { describe, expect, it } from 'vitest';
import type { IndieWeb, IndieWebDependencies } from '../../src/core.js';
import { handleAuthorizationRequest, handleProfileRedemption } from '../../src/routes/auth.js';
import { handleApproval } from '../../src/routes/auth-approve.js';
import { handleMetadata } from '../../src/routes/metadata.js';
import { handleIntrospection } from '../../src/routes/token-introspect.js';
import { handleRevocation } from '../../src/routes/token-revoke.js';
import { handleTokenRequest, handleTokenVerification, prefersForm } from '../../src/routes/token.js';
import { computeCodeChallenge } from '../../src/services/token-service.js';
import {
  CLIENT_ID,
  REDIRECT_URI,
  SITE,
  VERIFIER,
  createTestIndieWeb,
  formRequest,
  issueToken,
} from '../helpers.js';

const owner: IndieWebDependencies = { authenticateOwner: async () => true };

function authorizeUrl(scope: string): URL {
  const url = new URL('https://example.com/auth');
  url.search = new URLSearchParams({
    response_type: 'code',
    client_id: CLIENT_ID,
    redirect_uri: REDIRECT_URI,
    state: 'test-state',
    code_challenge: computeCodeChallenge(VERIFIER),
    code_challenge_method: 'S256',
    scope,
  }).toString();
  return url;
}

function call(
  handler: (runtime: IndieWeb, context: { request: Request; url: URL }) => Promise<Response>,
  indieweb: IndieWeb,
  request: Request
) {
  return handler(indieweb, { request, url: new URL(request.url) });
}

async function authorize(indieweb: IndieWeb, scope: string) {
  const url = authorizeUrl(scope);
  const response = await handleAuthorizationRequest(indieweb, { request: new Request(url), url });
  return { response, body: await response.json() };
}

describe('authorization endpoint', () => {
  it('shows the consent details to the owner', async () => {
    const { indieweb } = createTestIndieWeb({ dependencies: owner });

    const { response, body } = await authorize(indieweb, 'create update x-custom');

    expect(response.status).toBe(200);
    expect(body.client).toEqual({ clientId: CLIENT_ID, name: CLIENT_ID, url: CLIENT_ID, logo: null, redirectUris: [] });
    expect(body.scopes).toEqual({
      known: ['create', 'update'],
      unknown: ['x-custom'],
      other: ['draft', 'delete', 'undelete', 'media', 'profile', 'email', 'offline_access'],
    });
    expect(body.approve_url).toBe('https://example.com/auth/approve');
    expect(body.expires_at).toBe('2024-03-01T12:10:00.000Z');
  });

  it('sends a visitor to the login page, or answers 401 without one', async () => {
    const url = authorizeUrl('create');
    const withLogin = createTestIndieWeb({ overrides: { indieauth: { loginUrl: '/login' } } });

    const redirected = await handleAuthorizationRequest(withLogin.indieweb, { request: new Request(url), url });
    expect(redirected.status).toBe(302);
    const login = new URL('https://example.com/login');
    login.searchParams.set('redirect', url.href);
    expect(redirected.headers.get('location')).toBe(login.href);

    const { indieweb } = createTestIndieWeb();
    const denied = await handleAuthorizationRequest(indieweb, { request: new Request(url), url });
    expect(denied.status).toBe(401);
    expect((await denied.json()).error).toBe('access_denied');
  });

  it('hands the consent step to a custom renderer', async () => {
    const { indieweb } = createTestIndieWeb({
      dependencies: {
        ...owner,
        renderConsent: async (consent) => new Response(`Allow ${consent.request.clientId}?`),
      },
    });
    const url = authorizeUrl('create');

    const response = await handleAuthorizationRequest(indieweb, { request: new Request(url), url });

    expect(await response.text()).toBe(`Allow ${CLIENT_ID}?`);
  });

  it('rejects a request without PKCE', async () => {
    const { indieweb } = createTestIndieWeb({ dependencies: owner });
    const url = authorizeUrl('create');
    url.searchParams.delete('code_challenge');

    const response = await handleAuthorizationRequest(indieweb, { request: new Request(url), url });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'invalid_request', error_description: 'Missing code_challenge' });
  });

  it('runs the whole flow from consent to token', async () => {
    const { indieweb } = createTestIndieWeb({ dependencies: owner });
    const { body } = await authorize(indieweb, 'create update profile');
    const redirectTo: string = body.redirect_to;
    const code = new URL(redirectTo).searchParams.get('code') ?? '';

    const approval = await call(
      handleApproval,
      indieweb,
      formRequest(body.approve_url, { code, redirect_uri: redirectTo, scope: ['create', 'profile'] })
    );
    expect(approval.status).toBe(302);
    expect(approval.headers.get('location')).toBe(redirectTo);

    const token = await call(
      handleTokenRequest,
      indieweb,
      formRequest('https://example.com/token', {
        grant_type: 'authorization_code',
        code,
        redirect_uri: REDIRECT_URI,
        code_verifier: VERIFIER,
        client_id: CLIENT_ID,
      })
    );
    const issued = await token.json();

    expect(token.status).toBe(200);
    expect(token.headers.get('cache-control')).toBe('no-store');
    expect(issued).toMatchObject({
      token_type: 'Bearer',
      scope: 'create profile',
      me: SITE,
      profile: { url: SITE, name: 'Test Owner' },
    });
  });

  it('refuses an approval whose redirect does not carry the code', async () => {
    const { indieweb } = createTestIndieWeb({ dependencies: owner });
    const { body } = await authorize(indieweb, 'create');
    const code = new URL(body.redirect_to).searchParams.get('code') ?? '';

    const response = await call(
      handleApproval,
      indieweb,
      formRequest(body.approve_url, { code, redirect_uri: 'https://callback.example.net/steal' })
    );

    expect(response.status).toBe(400);
  });

  it('redeems a code for the profile URL', async () => {
    const { indieweb } = createTestIndieWeb();
    const grant = await indieweb.tokens.beginAuthorization({
      clientId: CLIENT_ID,
      redirectUri: REDIRECT_URI,
      scope: '',
      codeChallenge: computeCodeChallenge(VERIFIER),
      codeChallengeMethod: 'S256',
    });

    const response = await call(
      handleProfileRedemption,
      indieweb,
      formRequest('https://example.com/auth', {
        grant_type: 'authorization_code',
        code: grant.code,
        redirect_uri: REDIRECT_URI,
        code_verifier: VERIFIER,
      })
    );

    expect(await response.json()).toEqual({ me: SITE });
  });
});

describe('token endpoint', () => {
  it('answers form-encoded when the client prefers it', async () => {
    const { indieweb } = createTestIndieWeb();
    const issued = await issueToken(indieweb, 'create profile offline_access');

    const response = await call(
      handleTokenRequest,
      indieweb,
      formRequest(
        'https://example.com/token',
        { grant_type: 'refresh_token', refresh_token: issued.refresh_token ?? '' },
        { Accept: 'application/x-www-form-urlencoded, application/json;q=0.5' }
      )
    );
    const fields = new URLSearchParams(await response.text());

    expect(response.headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    expect(fields.get('token_type')).toBe('Bearer');
    expect(fields.get('expires_in')).toBe('3600');
    expect(fields.get('me')).toBe(SITE);
    expect(fields.has('profile')).toBe(false);
  });

  it('ranks media types by their order in Accept', () => {
    expect(prefersForm(null)).toBe(false);
    expect(prefersForm('application/json, application/x-www-form-urlencoded')).toBe(false);
    expect(prefersForm('application/x-www-form-urlencoded')).toBe(true);
  });

  it('rejects unknown grant types and bad codes', async () => {
    const { indieweb } = createTestIndieWeb();

    const unsupported = await call(
      handleTokenRequest,
      indieweb,
      formRequest('https://example.com/token', { grant_type: 'password' })
    );
    expect(await unsupported.json()).toEqual({
      error: 'unsupported_grant_type',
      error_description: 'Unsupported grant type: password',
    });

    const badCode = await call(
      handleTokenRequest,
      indieweb,
      formRequest('https://example.com/token', {
        grant_type: 'authorization_code',
        code: 'made-up',
        redirect_uri: REDIRECT_URI,
        code_verifier: VERIFIER,
      })
    );
    expect(badCode.status).toBe(400);
    expect((await badCode.json()).error).toBe('invalid_grant');
  });

  it('verifies the bearer token on GET', async () => {
    const { indieweb } = createTestIndieWeb();
    const issued = await issueToken(indieweb, 'create');

    const response = await call(
      handleTokenVerification,
      indieweb,
      new Request('https://example.com/token', { headers: { Authorization: `Bearer ${issued.access_token}` } })
    );

    expect(await response.json()).toEqual({ me: SITE, client_id: CLIENT_ID, scope: 'create' });
  });

  it('introspects for authenticated callers only', async () => {
    const { indieweb } = createTestIndieWeb();
    const issued = await issueToken(indieweb, 'create');

    const anonymous = await call(
      handleIntrospection,
      indieweb,
      formRequest('https://example.com/token/introspect', { token: issued.access_token })
    );
    expect(anonymous.status).toBe(401);

    const authorized = await call(
      handleIntrospection,
      indieweb,
      formRequest(
        'https://example.com/token/introspect',
        { token: 'not-a-token' },
        { Authorization: `Bearer ${issued.access_token}` }
      )
    );
    expect(await authorized.json()).toEqual({ active: false });
  });

  it('answers 200 to every revocation', async () => {
    const { indieweb } = createTestIndieWeb();
    const issued = await issueToken(indieweb);

    const known = await call(handleRevocation, indieweb, formRequest('https://example.com/token/revoke', { token: issued.access_token }));
    const unknown = await call(handleRevocation, indieweb, formRequest('https://example.com/token/revoke', { token: 'nope' }));

    expect([known.status, unknown.status]).toEqual([200, 200]);
    expect((await indieweb.tokens.introspect(issued.access_token)).active).toBe(false);
  });

  it('publishes server metadata', async () => {
    const { indieweb } = createTestIndieWeb();

    const response = await call(
      handleMetadata,
      indieweb,
      new Request('https://example.com/.well-known/oauth-authorization-server')
    );

    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    expect((await response.json()).authorization_endpoint).toBe('https://example.com/auth');
  });
});
