import { Parser } from 'htmlparser2';

const SKIPPED_TEXT = new Set(['script', 'style', 'template']);

/**
 * Visible text of an HTML fragment, whitespace collapsed.
 */
export function htmlToText(html: string): string {
  const chunks: string[] = [];
  let skipping = 0;

  const parser = new Parser(
    {
      onopentag(name) {
        if (SKIPPED_TEXT.has(name)) skipping++;
      },
      onclosetag(name) {
        if (SKIPPED_TEXT.has(name) && skipping > 0) skipping--;
      },
      ontext(text) {
        if (skipping === 0) chunks.push(text);
      },
    },
    { decodeEntities: true }
  );
  parser.write(html);
  parser.end();

  return chunks.join(' ').replace(/\s+/g, ' ').trim();
}

export interface HtmlLink {
  tag: string;
  href: string;
  rel: string[];
}

/**
 * Every `href` and `src` in the document, resolved against `baseUrl`.
 * Unresolvable values are skipped.
 */
export function extractHtmlLinks(html: string, baseUrl: string): HtmlLink[] {
  const links: HtmlLink[] = [];
  let base = baseUrl;

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        if (name === 'base' && attribs.href) {
          base = resolveUrl(attribs.href, baseUrl) ?? base;
          return;
        }
        const raw = attribs.href ?? attribs.src;
        if (raw === undefined) return;
        const href = resolveUrl(raw, base);
        if (href === null) return;
        links.push({
          tag: name,
          href,
          rel: (attribs.rel ?? '').toLowerCase().split(/\s+/).filter(Boolean),
        });
      },
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );
  parser.write(html);
  parser.end();

  return links;
}

/**
 * First `<link>` or `<a>` carrying `rel`, in document order.
 */
export function findRelLink(html: string, rel: string, baseUrl: string): string | null {
  const match = extractHtmlLinks(html, baseUrl).find(
    (link) => (link.tag === 'link' || link.tag === 'a') && link.rel.includes(rel)
  );
  return match?.href ?? null;
}

export function resolveUrl(value: string, base: string): string | null {
  if (!URL.canParse(value, base)) {
    return null;
  }
  return new URL(value, base).href;
}
