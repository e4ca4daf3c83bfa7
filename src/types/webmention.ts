import type { MicroformatsEntry } from './micropub.js';

/**
 * `pending` moves to `verified` or `rejected` on a content judgment, or to
 * `error` when the network gave out.
 */
export type MentionStatus = 'pending' | 'verified' | 'rejected' | 'error';

export type MentionDirection = 'incoming' | 'outgoing';

export interface Mention {
  uuid: string;
  source: string;
  target: string;
  vouch: string | null;
  status: MentionStatus;
  message: string | null;
  content: MicroformatsEntry | null;
  attempts: number;
  createdAt: Date;
  lastModifiedAt: Date;
}

export interface IncomingMention extends Mention {
  /** Verified mentions from untrusted, unvouched sources wait for the owner. */
  approved: boolean;
}

export interface OutgoingMention extends Mention {
  /** Discovered endpoint; null when the target advertises none. */
  endpoint: string | null;
}

export interface MentionSubmission {
  source: string;
  target: string;
  vouch?: string | null;
}

export interface ThreadNode {
  url: string;
  mention: string | null;
  children: ThreadNode[];
}
