import { asc, eq } from "drizzle-orm";
import type { IndieHubDatabase } from "../storage/database.js";
import { trustedDomains } from "../storage/schema.js";
import { InvalidRequestError } from "../lib/errors.js";

/**
 * `example.com`, `https://example.com/post` and `EXAMPLE.com` all name the
 * same domain. Ports are kept.
 */
export function normalizeDomain(value: string): string {
  const trimmed = value.trim();
  const candidate = trimmed.includes("://") ? trimmed : `https://${trimmed}`;
  if (!trimmed || !URL.canParse(candidate)) {
    throw new InvalidRequestError(`Not a domain: ${value}`);
  }
  return new URL(candidate).host.toLowerCase();
}

/**
 * Owner-maintained allow-list. Mentions from these domains are approved
 * without moderation, and pages on them can vouch for others.
 */
export class TrustedDomains {
  constructor(
    private readonly db: IndieHubDatabase,
    private readonly now: () => Date
  ) {}

  async add(domain: string): Promise<string> {
    const normalized = normalizeDomain(domain);
    this.db
      .insert(trustedDomains)
      .values({ domain: normalized, createdAt: this.now() })
      .onConflictDoNothing()
      .run();
    return normalized;
  }

  async has(domainOrUrl: string): Promise<boolean> {
    let domain: string;
    try {
      domain = normalizeDomain(domainOrUrl);
    } catch (error) {
      if (error instanceof InvalidRequestError) return false;
      throw error;
    }

    const row = this.db
      .select({ domain: trustedDomains.domain })
      .from(trustedDomains)
      .where(eq(trustedDomains.domain, domain))
      .get();
    return row !== undefined;
  }

  async list(): Promise<string[]> {
    const rows = this.db
      .select({ domain: trustedDomains.domain })
      .from(trustedDomains)
      .orderBy(asc(trustedDomains.domain))
      .all();
    return rows.map((row) => row.domain);
  }
}
