import type { ResolvedConfig } from '../types/config.js';

/**
 * Endpoints a page advertises so clients can find the site's protocols
 */
export function discoveryRels(config: ResolvedConfig): Array<{ rel: string; href: string }> {
  const rels = [
    { rel: 'micropub', href: config.micropub.endpoint },
    { rel: 'authorization_endpoint', href: config.indieauth.authorizationEndpoint },
    { rel: 'token_endpoint', href: config.indieauth.tokenEndpoint },
    { rel: 'indieauth-metadata', href: config.indieauth.metadataEndpoint },
    { rel: 'webmention', href: config.webmention.endpoint },
  ];
  if (config.websub.feeds.length > 0) {
    rels.push({ rel: 'hub', href: config.websub.endpoint });
  }
  return rels;
}

/**
 * `Link` header value for pages rendered by the host. Empty when
 * discovery headers are turned off.
 */
export function discoveryLinks(config: ResolvedConfig): string {
  if (!config.discovery.enabled || !config.discovery.includeHeaders) {
    return '';
  }
  return discoveryRels(config)
    .map(({ rel, href }) => `<${href}>; rel="${rel}"`)
    .join(', ');
}

/**
 * The same endpoints as `<link>` elements for the page head
 */
export function discoveryLinkTags(config: ResolvedConfig): string {
  if (!config.discovery.enabled) {
    return '';
  }
  return discoveryRels(config)
    .map(({ rel, href }) => `<link rel="${rel}" href="${href.replace(/"/g, '&quot;')}">`)
    .join('\n');
}
