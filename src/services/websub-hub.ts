import { createHmac, randomBytes } from "node:crypto";
import { and, asc, eq, gt, sql } from "drizzle-orm";
import type { IndieHubDatabase } from "../storage/database.js";
import { subscriptions, type SubscriptionRow } from "../storage/schema.js";
import {
  InvalidRequestError,
  InvalidTopicError,
  TransportError,
  isTransportError,
} from "../lib/errors.js";
import { contentTypeOf, readBody, type HttpClient } from "../lib/http.js";
import { describeError, type Logger } from "../lib/logger.js";
import type { ResolvedConfig } from "../types/config.js";
import type {
  HubMode,
  PublishResult,
  SignatureAlgorithm,
  Subscription,
  SubscriptionRequest,
  SubscriptionResult,
  TopicRenderer,
} from "../types/websub.js";

export interface WebSubHubOptions {
  config: Pick<ResolvedConfig, "websub">;
  http: HttpClient;
  now: () => Date;
  logger: Logger;
  render?: TopicRenderer;
}

/** Subscriber secrets are capped by the protocol. */
const MAX_SECRET_BYTES = 200;

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    callback: row.callback,
    topic: row.topic,
    expiresAt: row.expiresAt,
    secret: row.secret,
    lastDeliveryAt: row.lastDeliveryAt,
    createdAt: row.createdAt,
  };
}

/**
 * `X-Hub-Signature` value for a delivery body
 */
export function signPayload(
  algorithm: SignatureAlgorithm,
  secret: string,
  body: string
): string {
  return `${algorithm}=${createHmac(algorithm, secret).update(body).digest("hex")}`;
}

/**
 * Default topic renderer: fetch the topic from the site, passing the
 * subscriber's last delivery as `since`.
 */
export function createFetchRenderer(http: HttpClient): TopicRenderer {
  return async (topic, { since }) => {
    const url = new URL(topic);
    if (since !== null) {
      url.searchParams.set("since", since.toISOString());
    }

    const response = await http.get(url.href);
    if (!response.ok) {
      throw new TransportError(topic, `Topic answered ${response.status}`);
    }
    return {
      body: await readBody(topic, response),
      contentType: response.headers.get("content-type") ?? "application/octet-stream",
    };
  };
}

/**
 * WebSub hub for the site's own feeds. Subscriptions are only stored after
 * the subscriber echoed the verification challenge.
 */
export class WebSubHub {
  private readonly render: TopicRenderer;

  constructor(
    private readonly db: IndieHubDatabase,
    private readonly options: WebSubHubOptions
  ) {
    this.render = options.render ?? createFetchRenderer(options.http);
  }

  private get settings() {
    return this.options.config.websub;
  }

  /**
   * A topic is published here when it is a configured feed, or lies under
   * a configured feed ending in `/`.
   */
  isPublishedTopic(topic: string): boolean {
    if (!URL.canParse(topic)) return false;
    const href = new URL(topic).href;
    return this.settings.feeds.some(
      (feed) => href === feed || (feed.endsWith("/") && href.startsWith(feed))
    );
  }

  /**
   * Synchronous checks on a subscription request, before any handshake
   * @throws InvalidTopicError when the topic is not one of our feeds
   */
  validateRequest(request: SubscriptionRequest): void {
    if (!URL.canParse(request.callback)) {
      throw new InvalidRequestError("hub.callback must be an absolute URL");
    }
    const { protocol } = new URL(request.callback);
    if (protocol !== "http:" && protocol !== "https:") {
      throw new InvalidRequestError("hub.callback must be an http(s) URL");
    }
    if (!this.isPublishedTopic(request.topic)) {
      throw new InvalidTopicError(request.topic);
    }
    if (
      request.leaseSeconds !== undefined &&
      request.leaseSeconds !== null &&
      (!Number.isFinite(request.leaseSeconds) || request.leaseSeconds <= 0)
    ) {
      throw new InvalidRequestError("hub.lease_seconds must be a positive number");
    }
    if (request.secret && Buffer.byteLength(request.secret) >= MAX_SECRET_BYTES) {
      throw new InvalidRequestError(`hub.secret must be shorter than ${MAX_SECRET_BYTES} bytes`);
    }
  }

  /** Requested lease, defaulted and clamped to the maximum */
  leaseFor(requested: number | null | undefined): number {
    const lease = requested ?? this.settings.defaultLeaseSeconds;
    return Math.min(Math.floor(lease), this.settings.maxLeaseSeconds);
  }

  /**
   * Verify intent with the subscriber, then create or renew the lease
   */
  async subscribe(request: SubscriptionRequest): Promise<SubscriptionResult> {
    this.validateRequest(request);
    const topic = new URL(request.topic).href;
    const lease = this.leaseFor(request.leaseSeconds);

    const denied = await this.verifyIntent("subscribe", request.callback, topic, lease);
    if (denied !== null) {
      this.options.logger.info(`Subscription of ${request.callback} to ${topic} not verified: ${denied}`);
      return { verified: false, subscription: null, reason: denied };
    }

    const now = this.options.now();
    const expiresAt = new Date(now.getTime() + lease * 1000);
    const secret = request.secret || null;
    const row = this.db
      .insert(subscriptions)
      .values({
        callback: request.callback,
        topic,
        expiresAt,
        secret,
        lastDeliveryAt: null,
        createdAt: now,
      })
      .onConflictDoUpdate({
        target: [subscriptions.callback, subscriptions.topic],
        set: { expiresAt, secret },
      })
      .returning()
      .get();

    return { verified: true, subscription: toSubscription(row) };
  }

  /**
   * Verify intent with the subscriber, then drop the subscription
   */
  async unsubscribe(request: Pick<SubscriptionRequest, "callback" | "topic">): Promise<SubscriptionResult> {
    this.validateRequest(request);
    const topic = new URL(request.topic).href;

    const denied = await this.verifyIntent("unsubscribe", request.callback, topic, null);
    if (denied !== null) {
      return { verified: false, subscription: null, reason: denied };
    }

    const row = this.db
      .delete(subscriptions)
      .where(and(eq(subscriptions.callback, request.callback), eq(subscriptions.topic, topic)))
      .returning()
      .get();
    return { verified: true, subscription: row ? toSubscription(row) : null };
  }

  /**
   * Push the current representation of `topic` to every active
   * subscriber. Deliveries are independent: failures are counted and
   * logged, never thrown.
   */
  async publish(topic: string): Promise<PublishResult> {
    if (!this.isPublishedTopic(topic)) {
      throw new InvalidTopicError(topic);
    }
    const href = new URL(topic).href;
    const active = await this.listSubscriptions(href);

    const results = await Promise.allSettled(active.map((subscription) => this.deliver(subscription)));

    let delivered = 0;
    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === "fulfilled" && result.value) {
        delivered++;
        return;
      }
      failed++;
      if (result.status === "rejected") {
        this.options.logger.error(
          `WebSub delivery to ${active[index]?.callback} failed: ${describeError(result.reason)}`
        );
      }
    });

    this.options.logger.debug(`Published ${href}: ${delivered} delivered, ${failed} failed`);
    return { topic: href, delivered, failed };
  }

  /**
   * Topics a configured feed stands for: the feed itself, or for a prefix
   * feed every topic under it that has an active subscriber.
   */
  async topicsFor(feed: string): Promise<string[]> {
    if (!feed.endsWith("/")) {
      return [feed];
    }

    return this.db
      .selectDistinct({ topic: subscriptions.topic })
      .from(subscriptions)
      .where(
        and(
          sql`substr(${subscriptions.topic}, 1, ${feed.length}) = ${feed}`,
          gt(subscriptions.expiresAt, this.options.now())
        )
      )
      .orderBy(asc(subscriptions.topic))
      .all()
      .map((row) => row.topic);
  }

  /**
   * Publish every topic of every configured feed, each once
   */
  async publishFeeds(): Promise<PublishResult[]> {
    const topics = new Set<string>();
    for (const feed of this.settings.feeds) {
      for (const topic of await this.topicsFor(feed)) {
        topics.add(topic);
      }
    }
    return Promise.all([...topics].map((topic) => this.publish(topic)));
  }

  /**
   * Subscriptions on a topic. Lapsed leases are kept for audit and only
   * returned with `includeExpired`.
   */
  async listSubscriptions(
    topic: string,
    options: { includeExpired?: boolean } = {}
  ): Promise<Subscription[]> {
    const byTopic = eq(subscriptions.topic, topic);
    const where = options.includeExpired
      ? byTopic
      : and(byTopic, gt(subscriptions.expiresAt, this.options.now()));

    return this.db
      .select()
      .from(subscriptions)
      .where(where)
      .orderBy(asc(subscriptions.createdAt))
      .all()
      .map(toSubscription);
  }

  private async deliver(subscription: Subscription): Promise<boolean> {
    const { callback, topic, secret } = subscription;

    try {
      const representation = await this.render(topic, { since: subscription.lastDeliveryAt });
      const headers: Record<string, string> = {
        "Content-Type": representation.contentType,
        Link: `<${this.settings.endpoint}>; rel="hub", <${topic}>; rel="self"`,
      };
      if (secret) {
        headers["X-Hub-Signature"] = signPayload(
          this.settings.signatureAlgorithm,
          secret,
          representation.body
        );
      }

      const response = await this.options.http.request(callback, {
        method: "POST",
        headers,
        body: representation.body,
      });
      if (!response.ok) {
        this.options.logger.warn(`WebSub delivery to ${callback} answered ${response.status}`);
        return false;
      }
    } catch (error) {
      if (!isTransportError(error)) throw error;
      this.options.logger.warn(`WebSub delivery to ${callback} failed: ${error.message}`);
      return false;
    }

    this.db
      .update(subscriptions)
      .set({ lastDeliveryAt: this.options.now() })
      .where(and(eq(subscriptions.callback, callback), eq(subscriptions.topic, topic)))
      .run();
    return true;
  }

  /**
   * Returns null when the subscriber confirmed, otherwise the reason it did not
   */
  private async verifyIntent(
    mode: HubMode,
    callback: string,
    topic: string,
    lease: number | null
  ): Promise<string | null> {
    const challenge = randomBytes(24).toString("base64url");
    const url = new URL(callback);
    url.searchParams.set("hub.mode", mode);
    url.searchParams.set("hub.topic", topic);
    url.searchParams.set("hub.challenge", challenge);
    if (lease !== null) {
      url.searchParams.set("hub.lease_seconds", String(lease));
    }

    try {
      const response = await this.options.http.get(url.href);
      if (!response.ok) {
        return `callback answered ${response.status}`;
      }
      const body = await readBody(url.href, response);
      if (body.trim() !== challenge) {
        const type = contentTypeOf(response);
        return `callback did not echo the challenge${type ? ` (${type})` : ""}`;
      }
      return null;
    } catch (error) {
      if (!isTransportError(error)) throw error;
      return error.message;
    }
  }
}
