import Database from "better-sqlite3";
import { InvalidStateError, NotFoundError, PersistenceError, StoreError } from "@/lib/errors";
import { cloneDate, dedupKey } from "@/lib/item";
import { compareItems } from "@/lib/ordering";
import type { Item, ItemCandidate } from "@/lib/types";
import { SCHEMA, type ItemRow } from "./schema";
import type { Store, StoreOptions } from "./store";

interface ItemParams {
  feedUrl: string;
  guid: string;
  title: string;
  author: string;
  link: string;
  content: string;
  favourite: number;
  readAt: number | null;
  publishedAt: number | null;
  updatedAt: number | null;
  createdAt: number;
}

type UpdateParams = Pick<ItemParams, "title" | "author" | "link" | "content" | "publishedAt" | "updatedAt"> & {
  id: number;
};

interface FeedFilter {
  feedUrl: string;
  includeFavourites: number;
}

function prepareStatements(db: Database.Database) {
  return {
    insert: db.prepare<ItemParams>(
      `INSERT INTO items (feed_url, guid, title, author, link, content, favourite, read_at, published_at, updated_at, created_at)
       VALUES (@feedUrl, @guid, @title, @author, @link, @content, @favourite, @readAt, @publishedAt, @updatedAt, @createdAt)`
    ),
    update: db.prepare<UpdateParams>(
      `UPDATE items
       SET title = @title, author = @author, link = @link, content = @content,
           published_at = @publishedAt, updated_at = @updatedAt
       WHERE id = @id`
    ),
    selectAll: db.prepare<[], ItemRow>("SELECT * FROM items"),
    selectById: db.prepare<{ id: number }, ItemRow>("SELECT * FROM items WHERE id = @id"),
    selectKeys: db.prepare<[], Pick<ItemRow, "id" | "feed_url" | "guid">>(
      "SELECT id, feed_url, guid FROM items WHERE guid <> ''"
    ),
    selectFeedUrls: db.prepare<[], Pick<ItemRow, "feed_url">>(
      "SELECT feed_url FROM items GROUP BY feed_url ORDER BY MIN(id)"
    ),
    toggleRead: db.prepare<{ id: number; now: number }>(
      "UPDATE items SET read_at = CASE WHEN read_at IS NULL THEN @now ELSE NULL END WHERE id = @id"
    ),
    markRead: db.prepare<{ id: number; now: number }>(
      "UPDATE items SET read_at = COALESCE(read_at, @now) WHERE id = @id"
    ),
    markUnread: db.prepare<{ id: number }>("UPDATE items SET read_at = NULL WHERE id = @id"),
    markAllRead: db.prepare<{ now: number }>("UPDATE items SET read_at = @now WHERE read_at IS NULL"),
    toggleFavourite: db.prepare<{ id: number }>("UPDATE items SET favourite = 1 - favourite WHERE id = @id"),
    selectByFeed: db.prepare<FeedFilter, Pick<ItemRow, "feed_url" | "guid">>(
      "SELECT feed_url, guid FROM items WHERE feed_url = @feedUrl AND (@includeFavourites = 1 OR favourite = 0)"
    ),
    deleteByFeed: db.prepare<FeedFilter>(
      "DELETE FROM items WHERE feed_url = @feedUrl AND (@includeFavourites = 1 OR favourite = 0)"
    ),
    countUnread: db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM items WHERE read_at IS NULL")
  };
}

type Statements = ReturnType<typeof prepareStatements>;

/**
 * SQLite-backed store. A batch is one `BEGIN IMMEDIATE … COMMIT`
 * transaction on the connection, so a batch that never reaches `endBatch`
 * leaves the file as it was.
 *
 * `guidIndex` mirrors the `(feed_url, guid)` unique index in process so an
 * upsert costs one lookup and one write.
 */
export class SqliteStore implements Store {
  private readonly guidIndex = new Map<string, number>();
  private readonly statements: Statements;
  private readonly now: () => Date;
  private batching = false;

  private constructor(private readonly db: Database.Database, options: StoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    this.statements = prepareStatements(db);
    this.rebuildIndex();
  }

  static open(filename: string, options: StoreOptions = {}): SqliteStore {
    let db: Database.Database | undefined;
    try {
      db = new Database(filename);
      return new SqliteStore(db, options);
    } catch (error) {
      db?.close();
      throw new PersistenceError(`cannot open ${filename}: ${describe(error)}`, { cause: error });
    }
  }

  upsertItem(candidate: ItemCandidate): void {
    this.guard("upsertItem", () => {
      const key = dedupKey(candidate.feedUrl, candidate.guid);
      const existingId = key === null ? undefined : this.guidIndex.get(key);

      if (existingId !== undefined) {
        const { changes } = this.statements.update.run({
          id: existingId,
          title: candidate.title,
          author: candidate.author,
          link: candidate.link,
          content: candidate.content,
          publishedAt: toMillis(candidate.publishedAt),
          updatedAt: toMillis(candidate.updatedAt)
        });
        if (changes > 0) {
          return;
        }
      }

      const { lastInsertRowid } = this.statements.insert.run({
        feedUrl: candidate.feedUrl,
        guid: candidate.guid,
        title: candidate.title,
        author: candidate.author,
        link: candidate.link,
        content: candidate.content,
        favourite: candidate.favourite ? 1 : 0,
        readAt: toMillis(candidate.readAt ?? null),
        publishedAt: toMillis(candidate.publishedAt),
        updatedAt: toMillis(candidate.updatedAt),
        createdAt: this.now().getTime()
      });
      if (key !== null) {
        this.guidIndex.set(key, Number(lastInsertRowid));
      }
    });
  }

  beginBatch(): void {
    if (this.batching) {
      throw new InvalidStateError("batch already open");
    }
    this.guard("beginBatch", () => this.db.exec("BEGIN IMMEDIATE"));
    this.batching = true;
  }

  endBatch(): void {
    if (!this.batching) {
      throw new InvalidStateError("no batch open");
    }
    try {
      this.db.exec("COMMIT");
    } catch (error) {
      this.guard("endBatch", () => this.rollback());
      throw new PersistenceError(`endBatch: ${describe(error)}`, { cause: error });
    }
    this.batching = false;
  }

  abortBatch(): void {
    if (!this.batching) {
      throw new InvalidStateError("no batch open");
    }
    this.guard("abortBatch", () => this.rollback());
  }

  getAllItems(ordering?: string): Item[] {
    const rows = this.guard("getAllItems", () => this.statements.selectAll.all());
    return rows.map(toItem).sort(compareItems(ordering));
  }

  getItemById(id: number): Item {
    const row = this.guard("getItemById", () => this.statements.selectById.get({ id }));
    if (!row) {
      throw new NotFoundError(id);
    }
    return toItem(row);
  }

  getAllFeedUrls(): string[] {
    return this.guard("getAllFeedUrls", () => this.statements.selectFeedUrls.all().map((row) => row.feed_url));
  }

  toggleRead(id: number): void {
    this.updateOne("toggleRead", id, () => this.statements.toggleRead.run({ id, now: this.now().getTime() }));
  }

  markRead(id: number): void {
    this.updateOne("markRead", id, () => this.statements.markRead.run({ id, now: this.now().getTime() }));
  }

  markUnread(id: number): void {
    this.updateOne("markUnread", id, () => this.statements.markUnread.run({ id }));
  }

  markAllRead(): void {
    this.guard("markAllRead", () => this.statements.markAllRead.run({ now: this.now().getTime() }));
  }

  toggleFavourite(id: number): void {
    this.updateOne("toggleFavourite", id, () => this.statements.toggleFavourite.run({ id }));
  }

  deleteByFeedUrl(feedUrl: string, includeFavourites: boolean): void {
    const filter: FeedFilter = { feedUrl, includeFavourites: includeFavourites ? 1 : 0 };
    const removed = this.guard("deleteByFeedUrl", () =>
      this.db.transaction(() => {
        const rows = this.statements.selectByFeed.all(filter);
        this.statements.deleteByFeed.run(filter);
        return rows;
      })()
    );
    for (const row of removed) {
      const key = dedupKey(row.feed_url, row.guid);
      if (key !== null) {
        this.guidIndex.delete(key);
      }
    }
  }

  countUnread(): number {
    const row = this.guard("countUnread", () => this.statements.countUnread.get());
    return row?.count ?? 0;
  }

  close(): void {
    this.guard("close", () => {
      if (!this.db.open) {
        return;
      }
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
      this.db.close();
    });
    this.batching = false;
  }

  private updateOne(action: string, id: number, update: () => Database.RunResult): void {
    const { changes } = this.guard(action, update);
    if (changes === 0) {
      throw new NotFoundError(id);
    }
  }

  private rollback(): void {
    this.batching = false;
    if (this.db.inTransaction) {
      this.db.exec("ROLLBACK");
    }
    // inserts and deletes made during the batch touched the index
    this.rebuildIndex();
  }

  private rebuildIndex(): void {
    this.guidIndex.clear();
    for (const row of this.statements.selectKeys.all()) {
      const key = dedupKey(row.feed_url, row.guid);
      if (key !== null) {
        this.guidIndex.set(key, row.id);
      }
    }
  }

  private guard<T>(action: string, work: () => T): T {
    try {
      return work();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new PersistenceError(`${action}: ${describe(error)}`, { cause: error });
    }
  }
}

function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    author: row.author,
    title: row.title,
    favourite: row.favourite === 1,
    feedUrl: row.feed_url,
    link: row.link,
    guid: row.guid,
    content: row.content,
    readAt: fromMillis(row.read_at),
    publishedAt: fromMillis(row.published_at),
    updatedAt: fromMillis(row.updated_at),
    createdAt: new Date(row.created_at)
  };
}

function toMillis(value: Date | null): number | null {
  return cloneDate(value)?.getTime() ?? null;
}

function fromMillis(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
