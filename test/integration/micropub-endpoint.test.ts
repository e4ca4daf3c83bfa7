import { describe, expect, it } from 'vitest';
import type { IndieWeb } from '../../src/core.js';
import { handleMicropubPost, handleMicropubQuery } from '../../src/routes/micropub.js';
import { createTestIndieWeb, formRequest, issueToken } from '../helpers.js';

const ENDPOINT = 'https://example.com/micropub';

async function setup(scope = 'create update delete') {
  const { indieweb } = createTestIndieWeb();
  const { access_token } = await issueToken(indieweb, scope);
  return { indieweb, auth: { Authorization: `Bearer ${access_token}` } };
}

function post(indieweb: IndieWeb, request: Request) {
  return handleMicropubPost(indieweb, { request, url: new URL(request.url) });
}

function query(indieweb: IndieWeb, params: Record<string, string>, headers: Record<string, string>) {
  const url = new URL(ENDPOINT);
  for (const [key, value] of Object.entries(params)) url.searchParams.append(key, value);
  return handleMicropubQuery(indieweb, { request: new Request(url, { headers }), url });
}

function jsonRequest(body: unknown, headers: Record<string, string>) {
  return new Request(ENDPOINT, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

describe('Micropub endpoint', () => {
  it('demands a bearer token', async () => {
    const { indieweb } = createTestIndieWeb();

    const response = await post(indieweb, formRequest(ENDPOINT, { h: 'entry', content: 'Hi' }));

    expect(response.status).toBe(401);
    expect(response.headers.get('www-authenticate')).toBe(
      'Bearer realm="indiehub", error="invalid_token", error_description="Missing bearer token"'
    );
    expect(await response.json()).toEqual({ error: 'invalid_token', error_description: 'Missing bearer token' });
  });

  it('creates an entry from a form post', async () => {
    const { indieweb, auth } = await setup();

    const response = await post(
      indieweb,
      formRequest(ENDPOINT, { h: 'entry', content: 'Hello world', 'category[]': ['one', 'two'] }, auth)
    );

    expect(response.status).toBe(201);
    expect(response.headers.get('location')).toBe('https://example.com/entries/hello-world');
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    const entry = await indieweb.entries.getByLocation('https://example.com/entries/hello-world');
    expect(entry?.content).toEqual({
      type: ['h-entry'],
      properties: { content: ['Hello world'], category: ['one', 'two'] },
    });
  });

  it('creates an entry from JSON', async () => {
    const { indieweb, auth } = await setup();

    const response = await post(
      indieweb,
      jsonRequest({ type: ['h-entry'], properties: { name: ['JSON post'], content: [{ html: '<p>Hi</p>', value: 'Hi' }] } }, auth)
    );

    expect(response.status).toBe(201);
    expect(response.headers.get('location')).toBe('https://example.com/entries/json-post');
  });

  it('requires content, name or photo', async () => {
    const { indieweb, auth } = await setup();

    const response = await post(indieweb, formRequest(ENDPOINT, { h: 'entry', category: 'empty' }, auth));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'invalid_request',
      error_description: 'Post must have content, name, or photo',
    });
  });

  it('answers 400 for a malformed JSON entry', async () => {
    const { indieweb, auth } = await setup();

    const response = await post(indieweb, jsonRequest({ type: 'h-entry', properties: {} }, auth));

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('invalid_request');
  });

  it('refuses creation without the create scope', async () => {
    const { indieweb, auth } = await setup('update');

    const response = await post(indieweb, formRequest(ENDPOINT, { content: 'Hi' }, auth));

    expect(response.status).toBe(403);
    expect(response.headers.get('www-authenticate')).toContain('scope="create"');
  });

  it('turns posts from a draft-only token into drafts', async () => {
    const { indieweb, auth } = await setup('draft');

    const response = await post(indieweb, formRequest(ENDPOINT, { content: 'Not yet' }, auth));
    const body = await response.json();

    expect(response.status).toBe(202);
    expect(body['post-status']).toBe('draft');
    expect((await indieweb.entries.get(body.uuid))?.location).toBeNull();
  });

  it('updates, deletes and undeletes by URL', async () => {
    const { indieweb, auth } = await setup();
    await post(indieweb, formRequest(ENDPOINT, { content: 'Original', 'mp-slug': 'changing' }, auth));
    const url = 'https://example.com/entries/changing';

    const updated = await post(
      indieweb,
      jsonRequest({ action: 'update', url, replace: { content: ['Edited'] }, add: { category: ['new'] } }, auth)
    );
    expect(updated.status).toBe(204);
    expect(await indieweb.entries.getPost(url)).toEqual({
      type: ['h-entry'],
      properties: { content: ['Edited'], category: ['new'] },
    });

    expect((await post(indieweb, formRequest(ENDPOINT, { action: 'delete', url }, auth))).status).toBe(204);
    expect(await indieweb.entries.getPost(url)).toBeNull();

    expect((await post(indieweb, jsonRequest({ action: 'undelete', url }, auth))).status).toBe(204);
    expect(await indieweb.entries.getPost(url)).not.toBeNull();
  });

  it('checks the scope of each action', async () => {
    const { indieweb, auth } = await setup('create');
    await post(indieweb, formRequest(ENDPOINT, { content: 'Keep me', 'mp-slug': 'keep' }, auth));

    const response = await post(
      indieweb,
      formRequest(ENDPOINT, { action: 'delete', url: 'https://example.com/entries/keep' }, auth)
    );

    expect(response.status).toBe(403);
    expect((await response.json()).error).toBe('insufficient_scope');
  });

  it('answers 404 when updating an unknown URL', async () => {
    const { indieweb, auth } = await setup();

    const response = await post(
      indieweb,
      jsonRequest({ action: 'update', url: 'https://example.com/entries/none', replace: { content: ['x'] } }, auth)
    );

    expect(response.status).toBe(404);
  });

  describe('queries', () => {
    it('answers q=config and q=syndicate-to', async () => {
      const { indieweb, auth } = await setup();

      expect(await (await query(indieweb, { q: 'config' }, auth)).json()).toEqual({
        'syndicate-to': [],
        q: ['config', 'source', 'syndicate-to'],
      });
      expect(await (await query(indieweb, { q: 'syndicate-to' }, auth)).json()).toEqual({ 'syndicate-to': [] });
    });

    it('returns the source of a post, optionally filtered', async () => {
      const { indieweb, auth } = await setup();
      await post(indieweb, formRequest(ENDPOINT, { name: 'Sourced', content: 'Body' }, auth));
      const url = 'https://example.com/entries/sourced';

      expect(await (await query(indieweb, { q: 'source', url }, auth)).json()).toEqual({
        type: ['h-entry'],
        properties: { name: ['Sourced'], content: ['Body'] },
      });
      expect(await (await query(indieweb, { q: 'source', url, 'properties[]': 'name' }, auth)).json()).toEqual({
        type: ['h-entry'],
        properties: { name: ['Sourced'] },
      });
      expect((await query(indieweb, { q: 'source', url: 'https://example.com/entries/none' }, auth)).status).toBe(404);
    });

    it('lists recent posts with their URLs', async () => {
      const { indieweb, auth } = await setup();
      await post(indieweb, formRequest(ENDPOINT, { name: 'Listed' }, auth));

      expect(await (await query(indieweb, { q: 'source' }, auth)).json()).toEqual({
        items: [
          {
            type: ['h-entry'],
            properties: { name: ['Listed'], url: ['https://example.com/entries/listed'] },
          },
        ],
      });
    });

    it('rejects unknown queries', async () => {
      const { indieweb, auth } = await setup();

      const response = await query(indieweb, { q: 'everything' }, auth);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'invalid_request', error_description: 'Unknown query: everything' });
    });
  });
});
