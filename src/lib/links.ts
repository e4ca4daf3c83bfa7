import { extractHtmlLinks, findRelLink, resolveUrl } from './html.js';
import type { MicroformatsEntry } from '../types/micropub.js';

export interface HeaderLink {
  url: string;
  rel: string[];
}

/**
 * Parse an RFC 8288 `Link` header. Targets are resolved against `baseUrl`.
 */
export function parseLinkHeader(header: string | null, baseUrl: string): HeaderLink[] {
  if (!header) return [];

  const links: HeaderLink[] = [];
  const pattern = /<([^>]*)>((?:\s*;\s*[^;,]+(?:=(?:"[^"]*"|[^;,]*))?)*)/g;

  for (const match of header.matchAll(pattern)) {
    const [, target = '', params = ''] = match;
    const url = resolveUrl(target.trim(), baseUrl);
    if (url === null) continue;

    const relParam = /;\s*rel\s*=\s*(?:"([^"]*)"|([^;,\s]+))/i.exec(params);
    const relValue = relParam?.[1] ?? relParam?.[2] ?? '';
    links.push({
      url,
      rel: relValue.toLowerCase().split(/\s+/).filter(Boolean),
    });
  }

  return links;
}

export function findHeaderLink(
  header: string | null,
  rel: string,
  baseUrl: string
): string | null {
  return parseLinkHeader(header, baseUrl).find((link) => link.rel.includes(rel))?.url ?? null;
}

/**
 * Endpoint advertised for `rel`, from the `Link` header first and then
 * the first matching `<link>` or `<a>` in the body.
 */
export function discoverRel(
  response: { headers: Headers; url: string },
  body: string | null,
  rel: string,
  requestUrl: string
): string | null {
  const base = response.url || requestUrl;
  return (
    findHeaderLink(response.headers.get('link'), rel, base) ??
    (body === null ? null : findRelLink(body, rel, base))
  );
}

const BARE_URL = /\bhttps?:\/\/[^\s<>"')\]]+/g;

function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

function collect(value: unknown, baseUrl: string, into: Set<string>): void {
  if (typeof value === 'string') {
    for (const match of value.matchAll(BARE_URL)) {
      into.add(match[0].replace(/[.,;:!?]+$/, ''));
    }
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) collect(item, baseUrl, into);
    return;
  }
  if (typeof value !== 'object' || value === null) return;

  for (const [key, nested] of Object.entries(value)) {
    if (key === 'html' && typeof nested === 'string') {
      for (const link of extractHtmlLinks(nested, baseUrl)) {
        if (isHttpUrl(link.href)) into.add(link.href);
      }
    } else if (key !== 'type') {
      collect(nested, baseUrl, into);
    }
  }
}

/**
 * Every absolute http(s) URL an entry refers to: URL-valued properties,
 * links in HTML content, and bare URLs in text.
 */
export function extractUrls(entry: MicroformatsEntry, baseUrl: string): string[] {
  const urls = new Set<string>();
  collect(entry.properties, baseUrl, urls);
  for (const child of entry.children ?? []) {
    for (const url of extractUrls(child, baseUrl)) urls.add(url);
  }

  return [...urls].filter((url) => URL.canParse(url)).map((url) => new URL(url).href);
}

function jsonStrings(value: unknown, into: string[]): string[] {
  if (typeof value === 'string') {
    into.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) jsonStrings(item, into);
  } else if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) jsonStrings(nested, into);
  }
  return into;
}

function candidateUrls(body: string, contentType: string, baseUrl: string): string[] {
  if (contentType === 'text/html' || contentType === 'application/xhtml+xml') {
    return extractHtmlLinks(body, baseUrl).map((link) => link.href);
  }
  if (contentType === 'application/json' || contentType.endsWith('+json')) {
    try {
      return jsonStrings(JSON.parse(body), []);
    } catch {
      return [];
    }
  }
  return [...body.matchAll(BARE_URL)].map((match) => match[0].replace(/[.,;:!?]+$/, ''));
}

/**
 * Whether the document links to `target`: an `href`/`src` in HTML, a
 * string value in JSON, a bare URL in anything else. With `domainOnly`
 * any link to the target's host counts.
 */
export function linksTo(
  body: string,
  contentType: string,
  target: string,
  baseUrl: string,
  options: { domainOnly?: boolean } = {}
): boolean {
  const wanted = new URL(target);
  return candidateUrls(body, contentType, baseUrl).some((candidate) => {
    if (!URL.canParse(candidate)) return false;
    const url = new URL(candidate);
    return options.domainOnly ? url.host === wanted.host : url.href === wanted.href;
  });
}

/**
 * The `in-reply-to` targets of an entry, as plain URLs.
 */
export function replyTargets(entry: MicroformatsEntry): string[] {
  const targets: string[] = [];
  for (const value of entry.properties['in-reply-to'] ?? []) {
    if (typeof value === 'string') {
      targets.push(value);
    } else if (typeof value === 'object' && value !== null && 'properties' in value) {
      const nested = value.properties;
      if (typeof nested === 'object' && nested !== null && 'url' in nested && Array.isArray(nested.url)) {
        const [url] = nested.url;
        if (typeof url === 'string') targets.push(url);
      }
    } else if (typeof value === 'object' && value !== null && 'value' in value && typeof value.value === 'string') {
      targets.push(value.value);
    }
  }
  return targets;
}
