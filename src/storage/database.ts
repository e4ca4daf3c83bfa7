import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { schema } from './schema.js';

export type IndieHubDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: IndieHubDatabase;
  sqlite: Database.Database;
  close(): void;
}

/**
 * Open (or create) the SQLite file and make sure every table exists.
 * Pass `:memory:` for a throwaway database.
 */
export function openDatabase(path: string): DatabaseHandle {
  const sqlite = new Database(path);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  ensureTables(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}

export function ensureTables(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "entries" (
      "uuid" TEXT PRIMARY KEY,
      "author" TEXT NOT NULL,
      "location" TEXT,
      "content" TEXT NOT NULL,
      "deleted" INTEGER NOT NULL DEFAULT 0,
      "created_at" INTEGER NOT NULL,
      "last_modified_at" INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS "idx_entries_live_location"
      ON "entries" ("location") WHERE "deleted" = 0;
    CREATE INDEX IF NOT EXISTS "idx_entries_created_at" ON "entries" ("created_at");
  `);

  sqlite.exec(`
    CREATE VIRTUAL TABLE IF NOT EXISTS "entries_fts" USING fts5(
      "uuid" UNINDEXED,
      "name",
      "summary",
      "content",
      "category"
    );
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "oauth_authorization_codes" (
      "code_hash" TEXT PRIMARY KEY,
      "client_id" TEXT NOT NULL,
      "redirect_uri" TEXT NOT NULL,
      "scope" TEXT NOT NULL DEFAULT '',
      "code_challenge" TEXT NOT NULL,
      "code_challenge_method" TEXT NOT NULL,
      "used" INTEGER NOT NULL DEFAULT 0,
      "expires_at" INTEGER NOT NULL,
      "created_at" INTEGER NOT NULL
    );
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "oauth_tokens" (
      "access_token_hash" TEXT PRIMARY KEY,
      "refresh_token_hash" TEXT,
      "client_id" TEXT NOT NULL,
      "token_type" TEXT NOT NULL DEFAULT 'Bearer',
      "scope" TEXT NOT NULL,
      "expires_at" INTEGER NOT NULL,
      "refresh_expires_at" INTEGER,
      "last_refresh_at" INTEGER NOT NULL,
      "revoked_at" INTEGER,
      "created_at" INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS "idx_oauth_tokens_refresh"
      ON "oauth_tokens" ("refresh_token_hash");
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "incoming_webmentions" (
      "uuid" TEXT PRIMARY KEY,
      "source" TEXT NOT NULL,
      "target" TEXT NOT NULL,
      "vouch" TEXT,
      "status" TEXT NOT NULL,
      "message" TEXT,
      "approved" INTEGER NOT NULL DEFAULT 0,
      "content" TEXT,
      "attempts" INTEGER NOT NULL DEFAULT 0,
      "created_at" INTEGER NOT NULL,
      "last_modified_at" INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS "idx_incoming_source_target"
      ON "incoming_webmentions" ("source", "target");
    CREATE INDEX IF NOT EXISTS "idx_incoming_target" ON "incoming_webmentions" ("target");
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "outgoing_webmentions" (
      "uuid" TEXT PRIMARY KEY,
      "source" TEXT NOT NULL,
      "target" TEXT NOT NULL,
      "vouch" TEXT,
      "status" TEXT NOT NULL,
      "message" TEXT,
      "endpoint" TEXT,
      "content" TEXT,
      "attempts" INTEGER NOT NULL DEFAULT 0,
      "created_at" INTEGER NOT NULL,
      "last_modified_at" INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS "idx_outgoing_source_target"
      ON "outgoing_webmentions" ("source", "target");
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "websub_subscriptions" (
      "callback" TEXT NOT NULL,
      "topic" TEXT NOT NULL,
      "expires_at" INTEGER NOT NULL,
      "secret" TEXT,
      "last_delivery_at" INTEGER,
      "created_at" INTEGER NOT NULL,
      PRIMARY KEY ("callback", "topic")
    );
    CREATE INDEX IF NOT EXISTS "idx_websub_topic_expires"
      ON "websub_subscriptions" ("topic", "expires_at");
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS "trusted_domains" (
      "domain" TEXT PRIMARY KEY,
      "created_at" INTEGER NOT NULL
    );
  `);
}
