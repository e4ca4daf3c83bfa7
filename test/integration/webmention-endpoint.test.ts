import { describe, expect, it } from 'vitest';
import type { IndieWeb } from '../../src/core.js';
import { handleWebmention } from '../../src/routes/webmention.js';
import { handleWebmentionStatus } from '../../src/routes/webmention-status.js';
import { MESSAGES } from '../../src/services/webmention.js';
import { normalizeDomain } from '../../src/services/trusted-domains.js';
import { createTestIndieWeb, formRequest, html } from '../helpers.js';

const ENDPOINT = 'https://example.com/webmention';
const TARGET = 'https://example.com/entries/walk';
const SOURCE = 'https://friend.example.net/liked';

async function withEntry() {
  const setup = createTestIndieWeb({
    routes: { [SOURCE]: html(`<a class="u-like-of" href="${TARGET}">liked</a>`) },
  });
  await setup.indieweb.entries.create({ type: ['h-entry'], properties: { name: ['Walk'] } });
  await setup.indieweb.tasks.drain();
  return setup;
}

function status(indieweb: IndieWeb, location: string) {
  return handleWebmentionStatus(indieweb, { request: new Request(location), url: new URL(location) });
}

describe('webmention endpoint', () => {
  it('accepts a mention and points at its status', async () => {
    const { indieweb } = await withEntry();
    const request = formRequest(ENDPOINT, { source: SOURCE, target: TARGET });

    const response = await handleWebmention(indieweb, { request, url: new URL(ENDPOINT) });

    expect(response.status).toBe(201);
    const location = response.headers.get('location') ?? '';
    expect(location).toMatch(/^https:\/\/example\.com\/webmention\/[0-9a-f-]{36}$/);
    expect(await response.json()).toEqual({ status: 'pending', message: MESSAGES.processing });

    await indieweb.tasks.drain();
    const report = await status(indieweb, location);
    expect(await report.json()).toEqual({
      status: 'verified',
      message: MESSAGES.moderation,
      approved: false,
      last_modified_at: '2024-03-01T12:00:00.000Z',
    });
  });

  it('answers 400 for a target it does not host', async () => {
    const { indieweb } = await withEntry();
    const request = formRequest(ENDPOINT, { source: SOURCE, target: 'https://example.com/entries/nothing' });

    const response = await handleWebmention(indieweb, { request, url: new URL(ENDPOINT) });

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('invalid_request');
  });

  it('answers 400 when source is missing', async () => {
    const { indieweb } = await withEntry();
    const request = formRequest(ENDPOINT, { target: TARGET });

    const response = await handleWebmention(indieweb, { request, url: new URL(ENDPOINT) });

    expect(response.status).toBe(400);
  });

  it('answers 404 for an unknown status id', async () => {
    const { indieweb } = await withEntry();

    const response = await status(indieweb, `${ENDPOINT}/no-such-mention`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: 'not_found',
      error_description: 'Webmention not found: no-such-mention',
    });
  });
});

describe('trusted domains', () => {
  it('normalizes URLs and bare hosts to one domain', () => {
    expect(normalizeDomain('EXAMPLE.net')).toBe('example.net');
    expect(normalizeDomain('https://friend.example.net/post/1')).toBe('friend.example.net');
    expect(normalizeDomain('http://localhost:4321/')).toBe('localhost:4321');
    expect(() => normalizeDomain('  ')).toThrow('Not a domain');
  });

  it('stores each domain once and matches any URL on it', async () => {
    const { indieweb } = createTestIndieWeb();

    await indieweb.trustedDomains.add('https://Friend.example.net/about');
    await indieweb.trustedDomains.add('friend.example.net');
    await indieweb.trustedDomains.add('blog.example.org');

    expect(await indieweb.trustedDomains.list()).toEqual(['blog.example.org', 'friend.example.net']);
    expect(await indieweb.trustedDomains.has('https://friend.example.net/reply')).toBe(true);
    expect(await indieweb.trustedDomains.has('https://stranger.example.net/')).toBe(false);
    expect(await indieweb.trustedDomains.has('::::')).toBe(false);
  });
});
