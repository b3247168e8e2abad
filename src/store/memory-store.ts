import { InvalidStateError, NotFoundError } from "@/lib/errors";
import { cloneItem, dedupKey } from "@/lib/item";
import { compareItems } from "@/lib/ordering";
import type { Item, ItemCandidate } from "@/lib/types";
import type { Store, StoreOptions } from "./store";

interface Snapshot {
  items: Map<number, Item>;
  guidIndex: Map<string, number>;
  nextId: number;
}

/**
 * Store for preview sessions. Everything lives in this process and is gone
 * when it exits.
 */
export class MemoryStore implements Store {
  // insertion order is id order
  private items = new Map<number, Item>();
  private guidIndex = new Map<string, number>();
  private nextId = 1;
  private batch: Snapshot | null = null;
  private readonly now: () => Date;

  constructor(options: StoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  upsertItem(candidate: ItemCandidate): void {
    const key = dedupKey(candidate.feedUrl, candidate.guid);
    const existingId = key === null ? undefined : this.guidIndex.get(key);
    const existing = existingId === undefined ? undefined : this.items.get(existingId);

    if (existing) {
      this.items.set(
        existing.id,
        cloneItem({
          ...existing,
          title: candidate.title,
          author: candidate.author,
          content: candidate.content,
          link: candidate.link,
          publishedAt: candidate.publishedAt,
          updatedAt: candidate.updatedAt
        })
      );
      return;
    }

    const id = this.nextId++;
    this.items.set(
      id,
      cloneItem({
        id,
        author: candidate.author,
        title: candidate.title,
        favourite: candidate.favourite ?? false,
        feedUrl: candidate.feedUrl,
        link: candidate.link,
        guid: candidate.guid,
        content: candidate.content,
        readAt: candidate.readAt ?? null,
        publishedAt: candidate.publishedAt,
        updatedAt: candidate.updatedAt,
        createdAt: this.now()
      })
    );
    if (key !== null) {
      this.guidIndex.set(key, id);
    }
  }

  beginBatch(): void {
    if (this.batch) {
      throw new InvalidStateError("batch already open");
    }
    this.batch = this.snapshot();
  }

  endBatch(): void {
    if (!this.batch) {
      throw new InvalidStateError("no batch open");
    }
    this.batch = null;
  }

  abortBatch(): void {
    if (!this.batch) {
      throw new InvalidStateError("no batch open");
    }
    this.items = this.batch.items;
    this.guidIndex = this.batch.guidIndex;
    this.nextId = this.batch.nextId;
    this.batch = null;
  }

  getAllItems(ordering?: string): Item[] {
    return Array.from(this.items.values(), cloneItem).sort(compareItems(ordering));
  }

  getItemById(id: number): Item {
    return cloneItem(this.require(id));
  }

  getAllFeedUrls(): string[] {
    const urls = new Set<string>();
    for (const item of this.items.values()) {
      urls.add(item.feedUrl);
    }
    return Array.from(urls);
  }

  toggleRead(id: number): void {
    const item = this.require(id);
    item.readAt = item.readAt ? null : this.stamp();
  }

  markRead(id: number): void {
    const item = this.require(id);
    if (!item.readAt) {
      item.readAt = this.stamp();
    }
  }

  markUnread(id: number): void {
    this.require(id).readAt = null;
  }

  markAllRead(): void {
    const readAt = this.now().getTime();
    for (const item of this.items.values()) {
      if (!item.readAt) {
        item.readAt = new Date(readAt);
      }
    }
  }

  toggleFavourite(id: number): void {
    const item = this.require(id);
    item.favourite = !item.favourite;
  }

  deleteByFeedUrl(feedUrl: string, includeFavourites: boolean): void {
    for (const [id, item] of this.items) {
      if (item.feedUrl !== feedUrl || (item.favourite && !includeFavourites)) {
        continue;
      }
      this.items.delete(id);
      const key = dedupKey(item.feedUrl, item.guid);
      if (key !== null) {
        this.guidIndex.delete(key);
      }
    }
  }

  countUnread(): number {
    let count = 0;
    for (const item of this.items.values()) {
      if (!item.readAt) count++;
    }
    return count;
  }

  close(): void {
    if (this.batch) {
      this.abortBatch();
    }
  }

  // now() may hand out a shared instance
  private stamp(): Date {
    return new Date(this.now().getTime());
  }

  private require(id: number): Item {
    const item = this.items.get(id);
    if (!item) {
      throw new NotFoundError(id);
    }
    return item;
  }

  private snapshot(): Snapshot {
    return {
      items: new Map(Array.from(this.items, ([id, item]) => [id, cloneItem(item)] as const)),
      guidIndex: new Map(this.guidIndex),
      nextId: this.nextId
    };
  }
}
