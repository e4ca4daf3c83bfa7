import { mf2 } from "microformats-parser";
import { z } from "zod";
import type { ClientInfo } from "../types/indieauth.js";
import { parseLinkHeader } from "./links.js";
import { extractHtmlLinks, resolveUrl } from "./html.js";
import { contentTypeOf, readBody, type HttpClient } from "./http.js";
import { describeError, type Logger } from "./logger.js";

/**
 * JSON client metadata document (IndieAuth, 2022 revision)
 */
const clientMetadataSchema = z.object({
  client_id: z.string().optional(),
  client_name: z.string().optional(),
  client_uri: z.string().optional(),
  logo_uri: z.string().optional(),
  redirect_uris: z.array(z.string()).optional(),
});

/**
 * True when both URLs share scheme, host and port
 */
export function sameOrigin(a: string, b: string): boolean {
  if (!URL.canParse(a) || !URL.canParse(b)) {
    return false;
  }
  return new URL(a).origin === new URL(b).origin;
}

function fallbackInfo(clientId: string): ClientInfo {
  return {
    clientId,
    name: clientId,
    url: clientId,
    logo: null,
    redirectUris: [],
  };
}

function firstText(values: unknown[] | undefined): string | null {
  const [first] = values ?? [];
  if (typeof first === "string") return first;
  if (typeof first === "object" && first !== null && "value" in first && typeof first.value === "string") {
    return first.value;
  }
  return null;
}

function fromJson(clientId: string, body: string): ClientInfo {
  const metadata = clientMetadataSchema.parse(JSON.parse(body));
  return {
    clientId,
    name: metadata.client_name ?? clientId,
    url: resolveUrl(metadata.client_uri ?? clientId, clientId) ?? clientId,
    logo: metadata.logo_uri ? resolveUrl(metadata.logo_uri, clientId) : null,
    redirectUris: (metadata.redirect_uris ?? [])
      .map((uri) => resolveUrl(uri, clientId))
      .filter((uri): uri is string => uri !== null),
  };
}

function fromHtml(clientId: string, body: string, linkHeader: string | null): ClientInfo {
  const parsed = mf2(body, { baseUrl: clientId });
  const app = parsed.items.find((item) =>
    (item.type ?? []).some((type) => type === "h-app" || type === "h-x-app")
  );

  const name = firstText(app?.properties.name);
  const url = firstText(app?.properties.url);
  const logo = firstText(app?.properties.logo);

  const redirectUris = new Set<string>();
  for (const link of parseLinkHeader(linkHeader, clientId)) {
    if (link.rel.includes("redirect_uri")) redirectUris.add(link.url);
  }
  for (const link of extractHtmlLinks(body, clientId)) {
    if (link.tag === "link" && link.rel.includes("redirect_uri")) redirectUris.add(link.href);
  }

  return {
    clientId,
    name: name ?? clientId,
    url: (url ? resolveUrl(url, clientId) : null) ?? clientId,
    logo: logo ? resolveUrl(logo, clientId) : null,
    redirectUris: [...redirectUris],
  };
}

/**
 * Fetch what the client publishes about itself. Clients that cannot be
 * fetched are still allowed; they are shown by their URL and get no
 * extra redirect URIs.
 */
export async function fetchClientInfo(
  http: HttpClient,
  clientId: string,
  logger: Logger
): Promise<ClientInfo> {
  try {
    const response = await http.get(clientId, {
      headers: { Accept: "application/json, text/html;q=0.9" },
    });
    if (!response.ok) {
      logger.warn(`Client ${clientId} answered ${response.status}`);
      return fallbackInfo(clientId);
    }

    const body = await readBody(clientId, response);
    if (contentTypeOf(response) === "application/json") {
      return fromJson(clientId, body);
    }
    return fromHtml(clientId, body, response.headers.get("link"));
  } catch (error) {
    logger.warn(`Client discovery failed for ${clientId}: ${describeError(error)}`);
    return fallbackInfo(clientId);
  }
}
