import { createIndieWeb, type IndieWeb, type IndieWebDependencies } from '../src/core.js';
import type { Fetch } from '../src/lib/http.js';
import type { Logger } from '../src/lib/logger.js';
import { computeCodeChallenge } from '../src/services/token-service.js';
import type { TokenResponse } from '../src/types/indieauth.js';
import type { IndieHubOptions } from '../src/validators/config.js';

export const SITE = 'https://example.com/';
export const CLIENT_ID = 'https://app.example.org/';
export const REDIRECT_URI = 'https://app.example.org/callback';
export const VERIFIER = 'test-verifier-0123456789-abcdefghijklmnopqrstuvwxyz';

export interface RecordedCall {
  method: string;
  url: string;
  headers: Headers;
  body: string;
}

export type FakeRoute = (request: Request) => Response | Promise<Response>;

/**
 * In-process stand-in for `fetch`. Routes are keyed by `METHOD url` or by
 * `url` for any method; anything else fails like an unreachable host.
 */
export function createFakeFetch(routes: Record<string, FakeRoute> = {}) {
  const calls: RecordedCall[] = [];

  const fetch: Fetch = async (input: RequestInfo | URL, init?: RequestInit) => {
    const request = new Request(input, init);
    calls.push({
      method: request.method,
      url: request.url,
      headers: request.headers,
      body: request.method === 'GET' || request.method === 'HEAD' ? '' : await request.clone().text(),
    });

    const withoutQuery = request.url.split('?')[0] ?? request.url;
    const route =
      routes[`${request.method} ${request.url}`] ??
      routes[request.url] ??
      routes[`${request.method} ${withoutQuery}`] ??
      routes[withoutQuery];
    if (!route) {
      throw new TypeError(`fetch failed: no route for ${request.method} ${request.url}`);
    }
    return route(request);
  };

  return {
    fetch,
    calls,
    callsTo(url: string): RecordedCall[] {
      return calls.filter((call) => call.url === url || call.url.startsWith(`${url}?`));
    },
  };
}

export function html(body: string, init: ResponseInit = {}): FakeRoute {
  return () =>
    new Response(body, {
      status: 200,
      ...init,
      headers: { 'Content-Type': 'text/html; charset=utf-8', ...init.headers },
    });
}

export function status(code: number, body = ''): FakeRoute {
  return () => new Response(body || null, { status: code });
}

export function createClock(start = '2024-03-01T12:00:00.000Z') {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance(seconds: number) {
      current += seconds * 1000;
    },
  };
}

export function createMemoryLogger() {
  const messages: Array<{ level: keyof Logger; message: string }> = [];
  const logger: Logger = {
    debug: (message) => messages.push({ level: 'debug', message }),
    info: (message) => messages.push({ level: 'info', message }),
    warn: (message) => messages.push({ level: 'warn', message }),
    error: (message) => messages.push({ level: 'error', message }),
  };
  return { logger, messages };
}

/**
 * Options for a throwaway hub on an in-memory database, retrying without delay
 */
export function testOptions(overrides: Omit<Partial<IndieHubOptions>, 'site'> = {}): IndieHubOptions {
  return {
    site: { me: SITE, name: 'Test Owner', email: 'owner@example.com' },
    database: { path: ':memory:' },
    ...overrides,
    webmention: { backoff: 0, ...overrides.webmention },
  };
}

export function createTestIndieWeb(
  options: {
    routes?: Record<string, FakeRoute>;
    overrides?: Omit<Partial<IndieHubOptions>, 'site'>;
    dependencies?: IndieWebDependencies;
  } = {}
) {
  const fake = createFakeFetch(options.routes);
  const clock = createClock();
  const { logger, messages } = createMemoryLogger();
  const indieweb = createIndieWeb(testOptions(options.overrides), {
    fetch: fake.fetch,
    now: clock.now,
    logger,
    ...options.dependencies,
  });
  return { indieweb, fake, clock, messages };
}

/**
 * Run the full authorization code flow and return the token response
 */
export async function issueToken(indieweb: IndieWeb, scope = 'create update delete'): Promise<TokenResponse> {
  const grant = await indieweb.tokens.beginAuthorization({
    clientId: CLIENT_ID,
    redirectUri: REDIRECT_URI,
    scope,
    codeChallenge: computeCodeChallenge(VERIFIER),
    codeChallengeMethod: 'S256',
    state: 'test-state',
  });
  return indieweb.tokens.exchangeCode({
    code: grant.code,
    redirectUri: REDIRECT_URI,
    codeVerifier: VERIFIER,
    clientId: CLIENT_ID,
  });
}

export function formRequest(url: string, fields: Record<string, string | string[]>, headers: Record<string, string> = {}): Request {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      body.append(key, item);
    }
  }
  return new Request(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...headers },
    body: body.toString(),
  });
}
