import { describe, it, expect } from 'vitest';
import { discoveryLinks, discoveryLinkTags } from '../../src/lib/discovery.js';
import { findRelLink, htmlToText } from '../../src/lib/html.js';
import { discoverRel, extractUrls, linksTo, parseLinkHeader, replyTargets } from '../../src/lib/links.js';
import { validateConfig } from '../../src/validators/config.js';

describe('parseLinkHeader', () => {
  it('resolves targets and splits rel values', () => {
    const header = '<https://hub.example.net/>; rel="hub", </feed>; rel="self alternate"';

    expect(parseLinkHeader(header, 'https://example.com/blog/')).toEqual([
      { url: 'https://hub.example.net/', rel: ['hub'] },
      { url: 'https://example.com/feed', rel: ['self', 'alternate'] },
    ]);
  });

  it('returns nothing for a missing header', () => {
    expect(parseLinkHeader(null, 'https://example.com/')).toEqual([]);
  });
});

describe('discoverRel', () => {
  const page = '<html><head><link rel="webmention" href="/from-body"></head></html>';

  it('prefers the Link header over the body', () => {
    const response = {
      url: 'https://other.example.net/post',
      headers: new Headers({ Link: '</from-header>; rel="webmention"' }),
    };

    expect(discoverRel(response, page, 'webmention', 'https://other.example.net/post')).toBe(
      'https://other.example.net/from-header'
    );
  });

  it('falls back to the body, resolved against the final URL', () => {
    const response = { url: 'https://moved.example.net/post', headers: new Headers() };

    expect(discoverRel(response, page, 'webmention', 'https://other.example.net/post')).toBe(
      'https://moved.example.net/from-body'
    );
    expect(discoverRel(response, null, 'webmention', 'https://other.example.net/post')).toBeNull();
  });
});

describe('html helpers', () => {
  it('honours a base element when finding rel links', () => {
    const page = '<base href="https://cdn.example.net/site/"><a rel="me nofollow" href="profile">me</a>';
    expect(findRelLink(page, 'me', 'https://example.com/')).toBe('https://cdn.example.net/site/profile');
  });

  it('extracts visible text only', () => {
    expect(htmlToText('<p>Fish &amp; chips</p>\n<style>p{}</style><p>today</p>')).toBe('Fish & chips today');
  });
});

describe('extractUrls', () => {
  it('collects property URLs, HTML links and bare URLs in text', () => {
    const urls = extractUrls(
      {
        type: ['h-entry'],
        properties: {
          'in-reply-to': ['https://other.example.net/post/1'],
          content: [
            {
              value: 'See https://a.example.org/x.',
              html: '<p>See <a href="/local">here</a> and <a href="https://b.example.org/y">there</a></p>',
            },
          ],
        },
      },
      'https://example.com/entries/one'
    );

    expect(urls).toEqual([
      'https://other.example.net/post/1',
      'https://a.example.org/x',
      'https://example.com/local',
      'https://b.example.org/y',
    ]);
  });
});

describe('linksTo', () => {
  const target = 'https://example.com/entries/one';

  it('finds the target in HTML, JSON and plain text', () => {
    expect(linksTo(`<a href="${target}">reply</a>`, 'text/html', target, 'https://other.example.net/')).toBe(true);
    expect(
      linksTo(JSON.stringify({ items: [{ url: target }] }), 'application/json', target, 'https://other.example.net/')
    ).toBe(true);
    expect(linksTo(`replying to ${target}.`, 'text/plain', target, 'https://other.example.net/')).toBe(true);
  });

  it('matches on the host alone with domainOnly', () => {
    const body = '<a href="https://example.com/about">about</a>';

    expect(linksTo(body, 'text/html', target, 'https://other.example.net/')).toBe(false);
    expect(linksTo(body, 'text/html', target, 'https://other.example.net/', { domainOnly: true })).toBe(true);
  });

  it('treats malformed JSON as linking nowhere', () => {
    expect(linksTo('{"url":', 'application/json', target, 'https://other.example.net/')).toBe(false);
  });
});

describe('replyTargets', () => {
  it('reads plain, nested and value forms', () => {
    expect(
      replyTargets({
        type: ['h-entry'],
        properties: {
          'in-reply-to': [
            'https://a.example.org/1',
            { type: ['h-cite'], properties: { url: ['https://b.example.org/2'] } },
            { value: 'https://c.example.org/3' },
          ],
        },
      })
    ).toEqual(['https://a.example.org/1', 'https://b.example.org/2', 'https://c.example.org/3']);
  });
});

describe('discovery', () => {
  const config = validateConfig({ site: { me: 'https://example.com/' }, websub: { feeds: ['/feed.xml'] } });

  it('builds the Link header for every endpoint', () => {
    expect(discoveryLinks(config)).toBe(
      [
        '<https://example.com/micropub>; rel="micropub"',
        '<https://example.com/auth>; rel="authorization_endpoint"',
        '<https://example.com/token>; rel="token_endpoint"',
        '<https://example.com/.well-known/oauth-authorization-server>; rel="indieauth-metadata"',
        '<https://example.com/webmention>; rel="webmention"',
        '<https://example.com/websub>; rel="hub"',
      ].join(', ')
    );
  });

  it('leaves out the hub without feeds and honours the switches', () => {
    const noFeeds = validateConfig({ site: { me: 'https://example.com/' } });
    expect(discoveryLinkTags(noFeeds).split('\n')).toHaveLength(5);
    expect(discoveryLinkTags(noFeeds).split('\n')[0]).toBe('<link rel="micropub" href="https://example.com/micropub">');

    const headersOff = validateConfig({ site: { me: 'https://example.com/' }, discovery: { includeHeaders: false } });
    expect(discoveryLinks(headersOff)).toBe('');
    expect(discoveryLinkTags(headersOff)).not.toBe('');
  });
});
