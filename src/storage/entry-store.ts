import { randomUUID } from "node:crypto";
import type { RunResult } from "better-sqlite3";
import { and, desc, eq, sql } from "drizzle-orm";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import slugify from "slugify";
import type { EntryStorageAdapter } from "./adapter.js";
import type { IndieHubDatabase } from "./database.js";
import { entries, type EntryRow, type schema } from "./schema.js";
import {
  applyUpdates,
  contentText,
  entryText,
  firstString,
  getPostStatus,
  getProperty,
  toDocument,
  toMicroformats,
} from "../lib/content.js";
import type { EntryEvents } from "../lib/events.js";
import {
  ConflictError,
  InvalidRequestError,
  NotFoundError,
  UrlOwnershipError,
} from "../lib/errors.js";
import type { Entry, EntryDocument, ListEntriesOptions } from "../types/entry.js";
import type {
  MicroformatsEntry,
  PostMetadata,
  UpdateOperation,
} from "../types/micropub.js";

/** The database or an open transaction on it */
export type Queryable = BaseSQLiteDatabase<"sync", RunResult, typeof schema>;

export interface EntryStoreOptions {
  me: string;
  postPath: string;
  now: () => Date;
  events?: EntryEvents;
}

const MAX_LIST_LIMIT = 100;
const DEFAULT_LIST_LIMIT = 20;

function isEntryDocument(
  content: MicroformatsEntry | EntryDocument
): content is EntryDocument {
  return Array.isArray(content.properties);
}

function toEntry(row: EntryRow): Entry {
  return {
    uuid: row.uuid,
    author: row.author,
    location: row.location,
    content: row.content,
    deleted: row.deleted,
    createdAt: row.createdAt,
    lastModifiedAt: row.lastModifiedAt,
  };
}

/**
 * Micropub server commands (`mp-*`) steer the request and are not stored.
 */
function stripCommands(entry: MicroformatsEntry): MicroformatsEntry {
  const properties = Object.fromEntries(
    Object.entries(entry.properties).filter(([name]) => !name.startsWith("mp-"))
  );
  return { ...entry, properties };
}

/**
 * Entries live in SQLite. Every state change runs in one transaction and
 * then emits an entry event for the protocol subsystems.
 */
export class EntryStore implements EntryStorageAdapter {
  private readonly base: string;

  constructor(
    private readonly db: IndieHubDatabase,
    private readonly options: EntryStoreOptions
  ) {
    this.base = `${options.me.replace(/\/$/, "")}${options.postPath.replace(/\/$/, "")}`;
  }

  async create(
    content: MicroformatsEntry | EntryDocument,
    options: { author?: string } = {}
  ): Promise<Entry> {
    const submitted = isEntryDocument(content) ? toMicroformats(content) : content;
    const uuid = randomUUID();
    const slug = this.generateSlug(submitted, uuid);
    const stored = stripCommands(submitted);
    const now = this.options.now();

    const entry = this.db.transaction((tx) => {
      const location =
        getPostStatus(stored) === "draft" ? null : this.allocateLocation(tx, slug);

      const row = tx
        .insert(entries)
        .values({
          uuid,
          author: options.author ?? this.options.me,
          location,
          content: stored,
          deleted: false,
          createdAt: now,
          lastModifiedAt: now,
        })
        .returning()
        .get();

      this.index(tx, row.uuid, row.content);
      return toEntry(row);
    });

    this.options.events?.dispatch({ type: "entry:created", entry });
    return entry;
  }

  /**
   * Look up by UUID. Soft-deleted entries are returned too, so callers can
   * answer with a tombstone.
   */
  async get(uuid: string): Promise<Entry | null> {
    const row = this.db.select().from(entries).where(eq(entries.uuid, uuid)).get();
    return row ? toEntry(row) : null;
  }

  async getByLocation(
    url: string,
    options: { includeDeleted?: boolean } = {}
  ): Promise<Entry | null> {
    const live = this.db
      .select()
      .from(entries)
      .where(and(eq(entries.location, url), eq(entries.deleted, false)))
      .get();
    if (live) return toEntry(live);
    if (!options.includeDeleted) return null;

    const tombstone = this.db
      .select()
      .from(entries)
      .where(eq(entries.location, url))
      .orderBy(desc(entries.lastModifiedAt))
      .get();
    return tombstone ? toEntry(tombstone) : null;
  }

  async getDocument(uuid: string): Promise<EntryDocument | null> {
    const entry = await this.get(uuid);
    return entry ? toDocument(entry.content) : null;
  }

  async update(uuid: string, operations: UpdateOperation[]): Promise<Entry> {
    const now = this.options.now();

    const { entry, previous } = this.db.transaction((tx) => {
      const row = tx.select().from(entries).where(eq(entries.uuid, uuid)).get();
      if (!row || row.deleted) {
        throw new NotFoundError(`Entry not found: ${uuid}`);
      }

      const previous = toEntry(row);
      const requested = applyUpdates(row.content, operations);
      const content = stripCommands(requested);

      let location = row.location;
      if (location === null && getPostStatus(content) === "published") {
        location = this.allocateLocation(tx, this.generateSlug(requested, uuid));
      }

      const updated = tx
        .update(entries)
        .set({
          content,
          location,
          lastModifiedAt: this.bump(row.lastModifiedAt, now),
        })
        .where(eq(entries.uuid, uuid))
        .returning()
        .get();

      this.unindex(tx, uuid);
      this.index(tx, uuid, content);
      return { entry: toEntry(updated), previous };
    });

    this.options.events?.dispatch({ type: "entry:updated", entry, previous });
    return entry;
  }

  async delete(uuid: string): Promise<Entry> {
    const now = this.options.now();

    const result = this.db.transaction((tx) => {
      const row = tx.select().from(entries).where(eq(entries.uuid, uuid)).get();
      if (!row) {
        throw new NotFoundError(`Entry not found: ${uuid}`);
      }
      if (row.deleted) {
        return { entry: toEntry(row), changed: false };
      }

      const deleted = tx
        .update(entries)
        .set({ deleted: true, lastModifiedAt: this.bump(row.lastModifiedAt, now) })
        .where(eq(entries.uuid, uuid))
        .returning()
        .get();
      this.unindex(tx, uuid);
      return { entry: toEntry(deleted), changed: true };
    });

    if (result.changed) {
      this.options.events?.dispatch({ type: "entry:deleted", entry: result.entry });
    }
    return result.entry;
  }

  async undelete(uuid: string): Promise<Entry> {
    const now = this.options.now();

    const result = this.db.transaction((tx) => {
      const row = tx.select().from(entries).where(eq(entries.uuid, uuid)).get();
      if (!row) {
        throw new NotFoundError(`Entry not found: ${uuid}`);
      }
      if (!row.deleted) {
        return { entry: toEntry(row), changed: false };
      }
      if (row.location !== null && this.locationTaken(tx, row.location)) {
        throw new ConflictError(`Another entry now lives at ${row.location}`);
      }

      const restored = tx
        .update(entries)
        .set({ deleted: false, lastModifiedAt: this.bump(row.lastModifiedAt, now) })
        .where(eq(entries.uuid, uuid))
        .returning()
        .get();
      this.index(tx, uuid, restored.content);
      return { entry: toEntry(restored), changed: true };
    });

    if (result.changed) {
      this.options.events?.dispatch({ type: "entry:undeleted", entry: result.entry });
    }
    return result.entry;
  }

  /**
   * Newest first
   */
  async list(options: ListEntriesOptions = {}): Promise<Entry[]> {
    const limit = Math.min(Math.max(options.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
    const rows = this.db
      .select()
      .from(entries)
      .where(options.includeDeleted ? undefined : eq(entries.deleted, false))
      .orderBy(desc(entries.createdAt), desc(entries.uuid))
      .limit(limit)
      .offset(Math.max(options.offset ?? 0, 0))
      .all();
    return rows.map(toEntry);
  }

  /**
   * Full-text search over name, summary, content and category, best match
   * first. Every word of `query` must appear.
   */
  async search(query: string, options: { limit?: number } = {}): Promise<Entry[]> {
    const terms = query
      .split(/\s+/)
      .filter(Boolean)
      .map((term) => `"${term.replace(/"/g, '""')}"`);
    if (terms.length === 0) {
      return [];
    }

    const limit = Math.min(Math.max(options.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
    const matches = this.db.all<{ uuid: string }>(
      sql`SELECT "uuid" FROM "entries_fts" WHERE "entries_fts" MATCH ${terms.join(" ")} ORDER BY rank LIMIT ${limit}`
    );

    const results: Entry[] = [];
    for (const { uuid } of matches) {
      const entry = await this.get(uuid);
      if (entry && !entry.deleted) results.push(entry);
    }
    return results;
  }

  // EntryStorageAdapter

  async createPost(entry: MicroformatsEntry): Promise<PostMetadata> {
    return this.toMetadata(await this.create(entry));
  }

  async getPost(url: string, properties?: string[]): Promise<MicroformatsEntry | null> {
    const entry = await this.getByLocation(this.ownedUrl(url));
    if (!entry) {
      return null;
    }
    if (!properties || properties.length === 0) {
      return entry.content;
    }

    return {
      type: entry.content.type,
      properties: Object.fromEntries(
        Object.entries(entry.content.properties).filter(([name]) => properties.includes(name))
      ),
    };
  }

  async updatePost(url: string, operations: UpdateOperation[]): Promise<PostMetadata> {
    const entry = await this.requireByLocation(url, false);
    return this.toMetadata(await this.update(entry.uuid, operations));
  }

  async deletePost(url: string): Promise<void> {
    const entry = await this.requireByLocation(url, false);
    await this.delete(entry.uuid);
  }

  async undeletePost(url: string): Promise<void> {
    const entry = await this.requireByLocation(url, true);
    await this.undelete(entry.uuid);
  }

  private async requireByLocation(url: string, includeDeleted: boolean): Promise<Entry> {
    const entry = await this.getByLocation(this.ownedUrl(url), { includeDeleted });
    if (!entry) {
      throw new NotFoundError(`Post not found: ${url}`);
    }
    return entry;
  }

  private ownedUrl(url: string): string {
    if (!URL.canParse(url)) {
      throw new InvalidRequestError("URL must be absolute");
    }
    const candidate = new URL(url);
    const owner = new URL(this.options.me);
    if (candidate.origin !== owner.origin || !candidate.pathname.startsWith(owner.pathname)) {
      throw new UrlOwnershipError(`URL does not belong to this site: ${url}`);
    }
    return candidate.href;
  }

  private toMetadata(entry: Entry): PostMetadata {
    return {
      url: entry.location,
      uuid: entry.uuid,
      published: entry.createdAt,
      modified: entry.lastModifiedAt,
      deleted: entry.deleted,
    };
  }

  /**
   * Generate a URL-safe slug from entry properties
   */
  private generateSlug(entry: MicroformatsEntry, uuid: string): string {
    const candidates = [firstString(entry, "mp-slug"), firstString(entry, "name")];

    const content = getProperty(toDocument(entry), "content")?.values[0];
    if (content !== undefined) {
      candidates.push(contentText(content).substring(0, 50).trim());
    }

    for (const candidate of candidates) {
      const slug = candidate ? slugify(candidate, { lower: true, strict: true }) : "";
      if (slug) return slug;
    }
    return uuid;
  }

  /**
   * First free `{base}/{slug}`, `{base}/{slug}-1`, ... among live entries
   */
  private allocateLocation(tx: Queryable, slug: string): string {
    const baseUrl = `${this.base}/${slug}`;
    let location = baseUrl;
    let counter = 1;

    while (this.locationTaken(tx, location)) {
      location = `${baseUrl}-${counter}`;
      counter++;
    }
    return location;
  }

  private locationTaken(tx: Queryable, location: string): boolean {
    const row = tx
      .select({ uuid: entries.uuid })
      .from(entries)
      .where(and(eq(entries.location, location), eq(entries.deleted, false)))
      .get();
    return row !== undefined;
  }

  /** Modification times move strictly forward, even within one millisecond. */
  private bump(previous: Date, now: Date): Date {
    return new Date(Math.max(now.getTime(), previous.getTime() + 1));
  }

  private index(tx: Queryable, uuid: string, content: MicroformatsEntry): void {
    const text = entryText(content);
    tx.run(
      sql`INSERT INTO "entries_fts" ("uuid", "name", "summary", "content", "category") VALUES (${uuid}, ${text.name}, ${text.summary}, ${text.content}, ${text.category})`
    );
  }

  private unindex(tx: Queryable, uuid: string): void {
    tx.run(sql`DELETE FROM "entries_fts" WHERE "uuid" = ${uuid}`);
  }
}
