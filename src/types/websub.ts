export type HubMode = 'subscribe' | 'unsubscribe';

export type SignatureAlgorithm = 'sha1' | 'sha256' | 'sha384' | 'sha512';

export interface Subscription {
  callback: string;
  topic: string;
  expiresAt: Date;
  secret: string | null;
  lastDeliveryAt: Date | null;
  createdAt: Date;
}

export interface SubscriptionRequest {
  callback: string;
  topic: string;
  leaseSeconds?: number | null;
  secret?: string | null;
}

export interface SubscriptionResult {
  verified: boolean;
  subscription: Subscription | null;
  reason?: string;
}

export interface TopicRepresentation {
  body: string;
  contentType: string;
}

/**
 * Produces the current representation of a topic. Feed formatting lives
 * with the host; the hub only ships bytes.
 */
export type TopicRenderer = (
  topic: string,
  options: { since: Date | null }
) => Promise<TopicRepresentation>;

export interface PublishResult {
  topic: string;
  delivered: number;
  failed: number;
}
