import { randomUUID } from "node:crypto";
import { and, desc, eq, sql, type SQL } from "drizzle-orm";
import { mf2 } from "microformats-parser";
import type { IndieHubDatabase } from "../storage/database.js";
import type { EntryStore } from "../storage/entry-store.js";
import {
  incomingWebmentions,
  outgoingWebmentions,
  type IncomingWebmentionRow,
  type OutgoingWebmentionRow,
} from "../storage/schema.js";
import { getVisibility } from "../lib/content.js";
import {
  InvalidRequestError,
  NotFoundError,
  TransportError,
  VerificationFailedError,
  VouchRequiredError,
  isTransportError,
} from "../lib/errors.js";
import type { EntryEvent } from "../lib/events.js";
import { extractHtmlLinks } from "../lib/html.js";
import {
  contentTypeOf,
  readBody,
  withRetry,
  type HttpClient,
  type RetryOptions,
} from "../lib/http.js";
import { discoverRel, extractUrls, linksTo, replyTargets } from "../lib/links.js";
import { describeError, type Logger } from "../lib/logger.js";
import type { BackgroundTasks } from "../lib/tasks.js";
import type { ResolvedConfig } from "../types/config.js";
import type { Entry } from "../types/entry.js";
import type { MicroformatsEntry } from "../types/micropub.js";
import type {
  IncomingMention,
  MentionStatus,
  MentionSubmission,
  OutgoingMention,
  ThreadNode,
} from "../types/webmention.js";
import { ThreadIndex } from "./thread-index.js";
import type { TrustedDomains } from "./trusted-domains.js";

export interface WebMentionOptions {
  config: Pick<ResolvedConfig, "site" | "webmention">;
  entries: EntryStore;
  trustedDomains: TrustedDomains;
  http: HttpClient;
  tasks: BackgroundTasks;
  now: () => Date;
  logger: Logger;
}

export const MESSAGES = {
  processing: "The webmention is being processed.",
  approved: "The webmention was verified and approved.",
  moderation:
    "The webmention was verified but needs moderation before it is displayed. " +
    "Resend it with a vouch URL to skip moderation.",
  noBacklink: "The source does not link to the target.",
  targetGone: "The target is no longer published.",
  noEndpoint: "no webmention endpoint",
  delivered: "The webmention was accepted by the receiver.",
  noVouch: "The receiver requires a vouch and none was found.",
  statusGaveUp: "Gave up waiting for the receiver's status page.",
} as const;

const VOUCH_CRAWL_LIMIT = 10;

type ParsedItem = ReturnType<typeof mf2>["items"][number];

function toIncoming(row: IncomingWebmentionRow): IncomingMention {
  return {
    uuid: row.uuid,
    source: row.source,
    target: row.target,
    vouch: row.vouch,
    status: row.status,
    message: row.message,
    content: row.content,
    attempts: row.attempts,
    approved: row.approved,
    createdAt: row.createdAt,
    lastModifiedAt: row.lastModifiedAt,
  };
}

function toOutgoing(row: OutgoingWebmentionRow): OutgoingMention {
  return {
    uuid: row.uuid,
    source: row.source,
    target: row.target,
    vouch: row.vouch,
    status: row.status,
    message: row.message,
    content: row.content,
    attempts: row.attempts,
    endpoint: row.endpoint,
    createdAt: row.createdAt,
    lastModifiedAt: row.lastModifiedAt,
  };
}

function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const { protocol } = new URL(value);
  return protocol === "http:" || protocol === "https:";
}

function itemToMicroformats(item: ParsedItem): MicroformatsEntry {
  const entry: MicroformatsEntry = {
    type: item.type ?? [],
    properties: { ...item.properties },
  };
  if (item.children && item.children.length > 0) {
    entry.children = item.children.map(itemToMicroformats);
  }
  return entry;
}

function flattenItems(items: ParsedItem[]): ParsedItem[] {
  return items.flatMap((item) => [item, ...flattenItems(item.children ?? [])]);
}

/**
 * The source's own h-entry about `target`, or a stub pointing at it
 */
export function mentionSnapshot(
  body: string,
  contentType: string,
  source: string,
  target: string
): MicroformatsEntry {
  if (contentType === "text/html" || contentType === "application/xhtml+xml") {
    const entries = flattenItems(mf2(body, { baseUrl: source }).items).filter((item) =>
      (item.type ?? []).includes("h-entry")
    );
    const match =
      entries.find((item) => JSON.stringify(item.properties).includes(target)) ?? entries[0];
    if (match) {
      return itemToMicroformats(match);
    }
  }

  return {
    type: ["h-entry"],
    properties: { url: [source], name: [source] },
  };
}

/**
 * Links an entry event should notify, and the source URL to notify them
 * about. New entries notify every link; edits only links that were added
 * or removed; deletions every link the entry had.
 */
export function outboundTargets(
  event: EntryEvent,
  me: string
): { source: string; targets: string[] } | null {
  const { entry } = event;
  if (entry.location === null || getVisibility(entry.content) === "private") {
    return null;
  }

  const current = linksOf(entry, me);
  switch (event.type) {
    case "entry:created":
    case "entry:undeleted":
    case "entry:deleted":
      return { source: entry.location, targets: current };

    case "entry:updated": {
      const { previous } = event;
      if (previous.location === null || getVisibility(previous.content) === "private") {
        return { source: entry.location, targets: current };
      }
      const before = linksOf(previous, me);
      const changed = [
        ...current.filter((url) => !before.includes(url)),
        ...before.filter((url) => !current.includes(url)),
      ];
      return { source: entry.location, targets: changed };
    }
  }
}

function linksOf(entry: Entry, me: string): string[] {
  const origin = new URL(me).origin;
  const base = entry.location ?? me;
  return extractUrls(entry.content, base).filter(
    (url) => new URL(url).origin !== origin && url !== entry.location
  );
}

/**
 * A fetched source must be a 2xx page that links to the target
 * @throws VerificationFailedError otherwise
 */
function assertBacklink(
  fetched: { status: number; body: string; contentType: string; url: string },
  target: string
): void {
  if (fetched.status < 200 || fetched.status >= 300) {
    throw new VerificationFailedError(`The source answered ${fetched.status}.`);
  }
  if (!linksTo(fetched.body, fetched.contentType, target, fetched.url)) {
    throw new VerificationFailedError(MESSAGES.noBacklink);
  }
}

/**
 * Receives, verifies and sends webmentions. Inbound verification and
 * outbound delivery run in the background; their outcome is recorded on
 * the mention rows.
 */
export class WebMentionPipeline {
  readonly threads: ThreadIndex;

  constructor(
    private readonly db: IndieHubDatabase,
    private readonly options: WebMentionOptions
  ) {
    this.threads = new ThreadIndex(() => this.listIncoming({ status: "verified" }));
  }

  private get settings() {
    return this.options.config.webmention;
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  /**
   * Record a submitted mention and schedule its verification. A second
   * submission of the same pair resets the existing row.
   * @throws InvalidRequestError before any fetch when the target is not a live entry
   * @throws VouchRequiredError when vouches are required and none was given
   */
  async receive(submission: MentionSubmission): Promise<IncomingMention> {
    const { source, target } = submission;
    const vouch = submission.vouch || null;

    if (!isHttpUrl(source)) {
      throw new InvalidRequestError("source must be an http(s) URL");
    }
    if (!URL.canParse(target)) {
      throw new InvalidRequestError("target must be an absolute URL");
    }
    if (new URL(source).href === new URL(target).href) {
      throw new InvalidRequestError("source and target must differ");
    }
    if (vouch !== null && !isHttpUrl(vouch)) {
      throw new InvalidRequestError("vouch must be an http(s) URL");
    }

    const entry = await this.options.entries.getByLocation(new URL(target).href);
    if (!entry) {
      throw new InvalidRequestError(`Target is not a published entry: ${target}`);
    }
    if (this.settings.requireVouch && vouch === null) {
      throw new VouchRequiredError();
    }

    const now = this.options.now();
    const row = this.db
      .insert(incomingWebmentions)
      .values({
        uuid: randomUUID(),
        source,
        target: entry.location ?? target,
        vouch,
        status: "pending",
        message: MESSAGES.processing,
        approved: false,
        content: null,
        attempts: 0,
        createdAt: now,
        lastModifiedAt: now,
      })
      .onConflictDoUpdate({
        target: [incomingWebmentions.source, incomingWebmentions.target],
        set: {
          vouch,
          status: "pending",
          message: MESSAGES.processing,
          approved: false,
          content: null,
          attempts: 0,
          lastModifiedAt: now,
        },
      })
      .returning()
      .get();

    this.threads.invalidate();
    this.options.tasks.run(`webmention verification ${row.uuid}`, () => this.verify(row.uuid));
    return toIncoming(row);
  }

  /**
   * Fetch the source and decide. Transport failures are retried with
   * backoff and end in `error`; everything else is `verified` or `rejected`.
   */
  async verify(uuid: string): Promise<IncomingMention> {
    const row = this.requireIncoming(uuid);
    const { source, target, vouch } = row;

    const entry = await this.options.entries.getByLocation(target);
    if (!entry) {
      return this.failIncoming(uuid, "rejected", MESSAGES.targetGone);
    }

    const trusted = await this.options.trustedDomains.has(source);
    if (trusted && this.settings.trustedDomainPolicy === "skip-backlink") {
      const verified = this.transitionIncoming(uuid, {
        status: "verified",
        message: MESSAGES.approved,
        approved: true,
        content: mentionSnapshot("", "", source, target),
      });
      await this.salmention(entry);
      return verified;
    }

    let fetched: { status: number; body: string; contentType: string; url: string };
    try {
      fetched = await withRetry(
        async () => {
          this.countAttempt(incomingWebmentions, uuid);
          const response = await this.options.http.get(source, {
            headers: { Accept: "text/html, application/json;q=0.9, */*;q=0.8" },
          });
          if (response.status >= 500) {
            throw new TransportError(source, `Source answered ${response.status}`);
          }
          return {
            status: response.status,
            body: response.ok ? await readBody(source, response) : "",
            contentType: contentTypeOf(response),
            url: response.url || source,
          };
        },
        this.retryOptions(`source ${source}`)
      );
    } catch (error) {
      if (isTransportError(error)) {
        return this.failIncoming(uuid, "error", error.message);
      }
      throw error;
    }

    try {
      assertBacklink(fetched, target);
    } catch (error) {
      if (error instanceof VerificationFailedError) {
        return this.failIncoming(uuid, "rejected", error.message);
      }
      throw error;
    }

    const approved = trusted || (await this.isVouchValid(vouch, source));
    const verified = this.transitionIncoming(uuid, {
      status: "verified",
      message: approved ? MESSAGES.approved : MESSAGES.moderation,
      approved,
      content: mentionSnapshot(fetched.body, fetched.contentType, fetched.url, target),
    });

    if (approved) {
      await this.salmention(entry);
    }
    return verified;
  }

  /**
   * Put a mention back to `pending` and verify it again now
   */
  async retryIncoming(uuid: string): Promise<IncomingMention> {
    this.requireIncoming(uuid);
    this.transitionIncoming(uuid, {
      status: "pending",
      message: MESSAGES.processing,
      approved: false,
      content: null,
      attempts: 0,
    });
    return this.verify(uuid);
  }

  /**
   * Owner approval of a verified mention held for moderation
   */
  async approve(uuid: string): Promise<IncomingMention> {
    const row = this.requireIncoming(uuid);
    if (row.status !== "verified") {
      throw new InvalidRequestError(`Only verified mentions can be approved (${row.status})`);
    }

    const approved = this.transitionIncoming(uuid, { approved: true, message: MESSAGES.approved });
    const entry = await this.options.entries.getByLocation(row.target);
    if (entry) {
      await this.salmention(entry);
    }
    return approved;
  }

  async getIncoming(uuid: string): Promise<IncomingMention | null> {
    const row = this.db
      .select()
      .from(incomingWebmentions)
      .where(eq(incomingWebmentions.uuid, uuid))
      .get();
    return row ? toIncoming(row) : null;
  }

  async listIncoming(
    filter: { target?: string; status?: MentionStatus; approved?: boolean } = {}
  ): Promise<IncomingMention[]> {
    const conditions: SQL[] = [];
    if (filter.target !== undefined) conditions.push(eq(incomingWebmentions.target, filter.target));
    if (filter.status !== undefined) conditions.push(eq(incomingWebmentions.status, filter.status));
    if (filter.approved !== undefined) {
      conditions.push(eq(incomingWebmentions.approved, filter.approved));
    }

    return this.db
      .select()
      .from(incomingWebmentions)
      .where(and(...conditions))
      .orderBy(desc(incomingWebmentions.lastModifiedAt))
      .all()
      .map(toIncoming);
  }

  async listOutgoing(filter: { source?: string; status?: MentionStatus } = {}): Promise<OutgoingMention[]> {
    const conditions: SQL[] = [];
    if (filter.source !== undefined) conditions.push(eq(outgoingWebmentions.source, filter.source));
    if (filter.status !== undefined) conditions.push(eq(outgoingWebmentions.status, filter.status));

    return this.db
      .select()
      .from(outgoingWebmentions)
      .where(and(...conditions))
      .orderBy(desc(outgoingWebmentions.lastModifiedAt))
      .all()
      .map(toOutgoing);
  }

  /**
   * Replies and mentions below `url`
   */
  thread(url: string): Promise<ThreadNode> {
    return this.threads.thread(url);
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  /**
   * Entry event listener: notify the links the change concerns
   */
  async handleEntryEvent(event: EntryEvent): Promise<OutgoingMention[]> {
    if (!this.settings.sendOutbound || event.entry.author !== this.options.config.site.me) {
      return [];
    }
    const plan = outboundTargets(event, this.options.config.site.me);
    if (plan === null) {
      return [];
    }
    return this.sendAll(plan.source, plan.targets);
  }

  /**
   * Deliver to every target concurrently; one failing target does not
   * affect the others.
   */
  async sendAll(source: string, targets: string[]): Promise<OutgoingMention[]> {
    const results = await Promise.allSettled(targets.map((target) => this.send(source, target)));

    const sent: OutgoingMention[] = [];
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        sent.push(result.value);
      } else {
        this.options.logger.error(
          `Webmention to ${targets[index]} failed: ${describeError(result.reason)}`
        );
      }
    });
    return sent;
  }

  async send(source: string, target: string): Promise<OutgoingMention> {
    const now = this.options.now();
    const row = this.db
      .insert(outgoingWebmentions)
      .values({
        uuid: randomUUID(),
        source,
        target,
        vouch: null,
        status: "pending",
        message: MESSAGES.processing,
        endpoint: null,
        content: null,
        attempts: 0,
        createdAt: now,
        lastModifiedAt: now,
      })
      .onConflictDoUpdate({
        target: [outgoingWebmentions.source, outgoingWebmentions.target],
        set: {
          vouch: null,
          status: "pending",
          message: MESSAGES.processing,
          attempts: 0,
          lastModifiedAt: now,
        },
      })
      .returning()
      .get();

    try {
      return await this.deliver(row.uuid, source, target);
    } catch (error) {
      if (isTransportError(error)) {
        this.options.logger.warn(`Webmention to ${target} gave up: ${error.message}`);
        return this.transitionOutgoing(row.uuid, { status: "error", message: error.message });
      }
      throw error;
    }
  }

  private async deliver(uuid: string, source: string, target: string): Promise<OutgoingMention> {
    const endpoint = await withRetry(
      () => this.discoverEndpoint(target),
      this.retryOptions(`endpoint discovery for ${target}`)
    );

    if (endpoint === null) {
      return this.transitionOutgoing(uuid, {
        status: "error",
        endpoint: null,
        message: MESSAGES.noEndpoint,
      });
    }
    this.transitionOutgoing(uuid, { endpoint });

    let vouch: string | null = null;
    let response = await this.post(uuid, endpoint, source, target, vouch);

    if (response.status === 449) {
      vouch = await this.findVouch(source, target);
      if (vouch === null) {
        return this.transitionOutgoing(uuid, { status: "rejected", message: MESSAGES.noVouch });
      }
      response = await this.post(uuid, endpoint, source, target, vouch);
    }

    const statusPage = response.status === 201 ? response.headers.get("location") : null;
    if (statusPage !== null && URL.canParse(statusPage, endpoint)) {
      return this.pollStatus(uuid, new URL(statusPage, endpoint).href, vouch);
    }

    if (response.ok) {
      return this.transitionOutgoing(uuid, {
        status: "verified",
        message: MESSAGES.delivered,
        vouch,
      });
    }

    const detail = (await readBody(endpoint, response)).slice(0, 500);
    return this.transitionOutgoing(uuid, {
      status: "rejected",
      message: `The receiver answered ${response.status}${detail ? `: ${detail}` : ""}`,
      vouch: null,
    });
  }

  /**
   * Follow the status page of a 201 until it answers 200. The mention
   * stays `pending` meanwhile.
   */
  private async pollStatus(uuid: string, statusPage: string, vouch: string | null): Promise<OutgoingMention> {
    this.transitionOutgoing(uuid, { status: "pending", message: MESSAGES.processing, vouch });

    try {
      await withRetry(async () => {
        const response = await this.options.http.get(statusPage, {
          headers: { Accept: "application/json, text/html;q=0.9" },
        });
        if (response.status !== 200) {
          throw new TransportError(statusPage, `Status page answered ${response.status}`);
        }
      }, this.retryOptions(`status page ${statusPage}`));
    } catch (error) {
      if (!isTransportError(error)) throw error;
      return this.transitionOutgoing(uuid, {
        status: "error",
        message: `${MESSAGES.statusGaveUp} ${error.message}`,
      });
    }

    return this.transitionOutgoing(uuid, { status: "verified", message: MESSAGES.delivered, vouch });
  }

  private post(
    uuid: string,
    endpoint: string,
    source: string,
    target: string,
    vouch: string | null
  ): Promise<Response> {
    const fields: Record<string, string> = { source, target };
    if (vouch !== null) {
      fields.vouch = vouch;
    }

    return withRetry(async () => {
      this.countAttempt(outgoingWebmentions, uuid);
      const response = await this.options.http.postForm(endpoint, fields);
      if (response.status >= 500) {
        throw new TransportError(endpoint, `Endpoint answered ${response.status}`);
      }
      return response;
    }, this.retryOptions(`delivery to ${endpoint}`));
  }

  /**
   * Webmention endpoint of `target`, or null when it advertises none
   */
  async discoverEndpoint(target: string): Promise<string | null> {
    const response = await this.options.http.get(target, {
      headers: { Accept: "text/html, */*;q=0.8" },
    });
    if (response.status >= 500) {
      throw new TransportError(target, `Target answered ${response.status}`);
    }
    if (!response.ok) {
      return null;
    }

    const contentType = contentTypeOf(response);
    const body =
      contentType === "text/html" || contentType === "application/xhtml+xml"
        ? await readBody(target, response)
        : null;
    const endpoint = discoverRel(response, body, "webmention", target);
    return endpoint !== null && isHttpUrl(endpoint) ? endpoint : null;
  }

  /**
   * Find a page that vouches for us to the target's site: a recent
   * verified mention source on a domain the target's site links to, which
   * still links back to our domain.
   */
  async findVouch(source: string, target: string): Promise<string | null> {
    const incoming = await this.listIncoming({ status: "verified" });
    const byDomain = new Map<string, string[]>();
    for (const mention of incoming) {
      const domain = new URL(mention.source).host;
      byDomain.set(domain, [...(byDomain.get(domain) ?? []), mention.source]);
    }
    if (byDomain.size === 0) {
      return null;
    }

    for await (const external of this.crawlExternalLinks(target)) {
      const candidates = byDomain.get(new URL(external).host);
      if (!candidates) continue;

      for (const candidate of candidates) {
        if (await this.linksBackToDomain(candidate, source)) {
          return candidate;
        }
      }
      byDomain.delete(new URL(external).host);
      if (byDomain.size === 0) break;
    }
    return null;
  }

  private async *crawlExternalLinks(target: string): AsyncGenerator<string> {
    const root = new URL("/", target).href;
    const host = new URL(target).host;
    const queue = [root, target];
    const visited = new Set<string>();
    const yielded = new Set<string>();

    while (queue.length > 0 && visited.size < VOUCH_CRAWL_LIMIT) {
      const page = queue.shift();
      if (page === undefined || visited.has(page)) continue;
      visited.add(page);

      let body: string;
      try {
        const response = await this.options.http.get(page);
        if (!response.ok || contentTypeOf(response) !== "text/html") continue;
        body = await readBody(page, response);
      } catch (error) {
        if (!isTransportError(error)) throw error;
        this.options.logger.debug(`Vouch crawl skipped ${page}: ${error.message}`);
        continue;
      }

      for (const link of extractHtmlLinks(body, page)) {
        if (!isHttpUrl(link.href)) continue;
        const linkHost = new URL(link.href).host;
        if (linkHost !== host) {
          if (!yielded.has(link.href)) {
            yielded.add(link.href);
            yield link.href;
          }
        } else if (link.tag === "a") {
          queue.push(link.href.split("#")[0] ?? link.href);
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * A vouch counts when it is on a trusted domain and links to the
   * source's domain.
   */
  private async isVouchValid(vouch: string | null, source: string): Promise<boolean> {
    if (vouch === null || !(await this.options.trustedDomains.has(vouch))) {
      return false;
    }
    return this.linksBackToDomain(vouch, source);
  }

  private async linksBackToDomain(page: string, domainOf: string): Promise<boolean> {
    try {
      const response = await this.options.http.get(page);
      if (!response.ok) return false;
      const body = await readBody(page, response);
      return linksTo(body, contentTypeOf(response), domainOf, response.url || page, {
        domainOnly: true,
      });
    } catch (error) {
      if (!isTransportError(error)) throw error;
      this.options.logger.debug(`Could not check ${page}: ${error.message}`);
      return false;
    }
  }

  /**
   * A reply that receives a mention re-sends its own mentions, so the
   * upstream thread learns about the new reply.
   */
  private async salmention(entry: Entry): Promise<void> {
    if (replyTargets(entry.content).length === 0) {
      return;
    }
    if (!this.settings.sendOutbound || entry.location === null) {
      return;
    }
    if (getVisibility(entry.content) === "private") {
      return;
    }

    await this.sendAll(entry.location, linksOf(entry, this.options.config.site.me));
  }

  private requireIncoming(uuid: string): IncomingWebmentionRow {
    const row = this.db
      .select()
      .from(incomingWebmentions)
      .where(eq(incomingWebmentions.uuid, uuid))
      .get();
    if (!row) {
      throw new NotFoundError(`Webmention not found: ${uuid}`);
    }
    return row;
  }

  private transitionIncoming(
    uuid: string,
    patch: Partial<Pick<IncomingWebmentionRow, "status" | "message" | "approved" | "content" | "attempts">>
  ): IncomingMention {
    const row = this.db
      .update(incomingWebmentions)
      .set({ ...patch, lastModifiedAt: this.options.now() })
      .where(eq(incomingWebmentions.uuid, uuid))
      .returning()
      .get();
    this.threads.invalidate();
    if (!row) {
      throw new NotFoundError(`Webmention not found: ${uuid}`);
    }
    return toIncoming(row);
  }

  /**
   * A mention that no longer verifies loses its approval and snapshot
   */
  private failIncoming(uuid: string, status: "rejected" | "error", message: string): IncomingMention {
    return this.transitionIncoming(uuid, { status, message, approved: false, content: null });
  }

  private transitionOutgoing(
    uuid: string,
    patch: Partial<Pick<OutgoingWebmentionRow, "status" | "message" | "endpoint" | "vouch">>
  ): OutgoingMention {
    const row = this.db
      .update(outgoingWebmentions)
      .set({ ...patch, lastModifiedAt: this.options.now() })
      .where(eq(outgoingWebmentions.uuid, uuid))
      .returning()
      .get();
    if (!row) {
      throw new NotFoundError(`Outgoing webmention not found: ${uuid}`);
    }
    return toOutgoing(row);
  }

  private countAttempt(
    table: typeof incomingWebmentions | typeof outgoingWebmentions,
    uuid: string
  ): void {
    if (table === incomingWebmentions) {
      this.db
        .update(incomingWebmentions)
        .set({ attempts: sql`${incomingWebmentions.attempts} + 1` })
        .where(eq(incomingWebmentions.uuid, uuid))
        .run();
    } else {
      this.db
        .update(outgoingWebmentions)
        .set({ attempts: sql`${outgoingWebmentions.attempts} + 1` })
        .where(eq(outgoingWebmentions.uuid, uuid))
        .run();
    }
  }

  private retryOptions(label: string): RetryOptions {
    return {
      attempts: this.settings.maxAttempts,
      backoff: this.settings.backoff,
      onRetry: (error: unknown, attempt: number) => {
        this.options.logger.warn(`Retrying ${label} after attempt ${attempt}: ${describeError(error)}`);
      },
    };
  }
}
