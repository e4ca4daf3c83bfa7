import type { MicroformatsEntry } from './micropub.js';

export type Visibility = 'public' | 'unlisted' | 'private';

export type PostStatus = 'published' | 'draft';

/**
 * An `e-content` value: plain text, or text with its HTML rendering.
 */
export type ContentValue = string | { value: string; html?: string };

/**
 * The properties the store interprets. Anything else is carried in an
 * `opaque` property so that editing an entry never drops data.
 */
export type EntryProperty =
  | { kind: 'name'; values: string[] }
  | { kind: 'summary'; values: string[] }
  | { kind: 'content'; values: ContentValue[] }
  | { kind: 'category'; values: string[] }
  | { kind: 'in-reply-to'; values: string[] }
  | { kind: 'visibility'; value: Visibility }
  | { kind: 'post-status'; value: PostStatus }
  | { kind: 'opaque'; name: string; values: unknown[] };

export type EntryPropertyKind = EntryProperty['kind'];

export interface EntryDocument {
  type: string[];
  properties: EntryProperty[];
  children?: MicroformatsEntry[];
}

export interface Entry {
  uuid: string;
  author: string;
  location: string | null;
  content: MicroformatsEntry;
  deleted: boolean;
  createdAt: Date;
  lastModifiedAt: Date;
}

export interface ListEntriesOptions {
  limit?: number;
  offset?: number;
  includeDeleted?: boolean;
}
