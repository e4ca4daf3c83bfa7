import { sql } from 'drizzle-orm';
import {
  index,
  integer,
  primaryKey,
  sqliteTable,
  text,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';
import type { MicroformatsEntry } from '../types/micropub.js';
import type { MentionStatus } from '../types/webmention.js';

/** Published items, owned by the entry store. */
export const entries = sqliteTable(
  'entries',
  {
    uuid: text('uuid').primaryKey(),
    author: text('author').notNull(),
    location: text('location'),
    content: text('content', { mode: 'json' }).$type<MicroformatsEntry>().notNull(),
    deleted: integer('deleted', { mode: 'boolean' }).notNull().default(false),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    lastModifiedAt: integer('last_modified_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('idx_entries_live_location')
      .on(table.location)
      .where(sql`${table.deleted} = 0`),
    index('idx_entries_created_at').on(table.createdAt),
  ]
);

/** Codes are stored hashed; `used` flips exactly once. */
export const authorizationCodes = sqliteTable('oauth_authorization_codes', {
  codeHash: text('code_hash').primaryKey(),
  clientId: text('client_id').notNull(),
  redirectUri: text('redirect_uri').notNull(),
  scope: text('scope').notNull().default(''),
  codeChallenge: text('code_challenge').notNull(),
  codeChallengeMethod: text('code_challenge_method').notNull(),
  used: integer('used', { mode: 'boolean' }).notNull().default(false),
  expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

export const tokens = sqliteTable(
  'oauth_tokens',
  {
    accessTokenHash: text('access_token_hash').primaryKey(),
    refreshTokenHash: text('refresh_token_hash'),
    clientId: text('client_id').notNull(),
    tokenType: text('token_type').notNull().default('Bearer'),
    scope: text('scope').notNull(),
    expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
    refreshExpiresAt: integer('refresh_expires_at', { mode: 'timestamp_ms' }),
    lastRefreshAt: integer('last_refresh_at', { mode: 'timestamp_ms' }).notNull(),
    revokedAt: integer('revoked_at', { mode: 'timestamp_ms' }),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [uniqueIndex('idx_oauth_tokens_refresh').on(table.refreshTokenHash)]
);

export const incomingWebmentions = sqliteTable(
  'incoming_webmentions',
  {
    uuid: text('uuid').primaryKey(),
    source: text('source').notNull(),
    target: text('target').notNull(),
    vouch: text('vouch'),
    status: text('status').$type<MentionStatus>().notNull(),
    message: text('message'),
    approved: integer('approved', { mode: 'boolean' }).notNull().default(false),
    content: text('content', { mode: 'json' }).$type<MicroformatsEntry>(),
    attempts: integer('attempts').notNull().default(0),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    lastModifiedAt: integer('last_modified_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('idx_incoming_source_target').on(table.source, table.target),
    index('idx_incoming_target').on(table.target),
  ]
);

export const outgoingWebmentions = sqliteTable(
  'outgoing_webmentions',
  {
    uuid: text('uuid').primaryKey(),
    source: text('source').notNull(),
    target: text('target').notNull(),
    vouch: text('vouch'),
    status: text('status').$type<MentionStatus>().notNull(),
    message: text('message'),
    endpoint: text('endpoint'),
    content: text('content', { mode: 'json' }).$type<MicroformatsEntry>(),
    attempts: integer('attempts').notNull().default(0),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    lastModifiedAt: integer('last_modified_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [uniqueIndex('idx_outgoing_source_target').on(table.source, table.target)]
);

export const subscriptions = sqliteTable(
  'websub_subscriptions',
  {
    callback: text('callback').notNull(),
    topic: text('topic').notNull(),
    expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
    secret: text('secret'),
    lastDeliveryAt: integer('last_delivery_at', { mode: 'timestamp_ms' }),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.callback, table.topic] }),
    index('idx_websub_topic_expires').on(table.topic, table.expiresAt),
  ]
);

export const trustedDomains = sqliteTable('trusted_domains', {
  domain: text('domain').primaryKey(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

export const schema = {
  entries,
  authorizationCodes,
  tokens,
  incomingWebmentions,
  outgoingWebmentions,
  subscriptions,
  trustedDomains,
};

export type EntryRow = typeof entries.$inferSelect;
export type AuthorizationCodeRow = typeof authorizationCodes.$inferSelect;
export type TokenRow = typeof tokens.$inferSelect;
export type IncomingWebmentionRow = typeof incomingWebmentions.$inferSelect;
export type OutgoingWebmentionRow = typeof outgoingWebmentions.$inferSelect;
export type SubscriptionRow = typeof subscriptions.$inferSelect;
