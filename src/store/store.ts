import type { Item, ItemCandidate } from "@/lib/types";

/**
 * Operations every item backend implements. Calls are synchronous and a
 * store is owned by a single session; nothing here locks.
 *
 * Writes outside a batch are committed immediately. Inside
 * `beginBatch`/`endBatch` they become visible to other sessions only once
 * `endBatch` commits them.
 */
export interface Store {
  /**
   * Inserts the candidate, or refreshes the record that already carries its
   * `(feedUrl, guid)` key. Identifier, creation time, favourite flag and read
   * time of an existing record are kept.
   */
  upsertItem(candidate: ItemCandidate): void;
  /** @throws InvalidStateError when a batch is already open */
  beginBatch(): void;
  /** @throws InvalidStateError when no batch is open */
  endBatch(): void;
  /** Drops every write made since `beginBatch`. */
  abortBatch(): void;
  /** Anything other than `"desc"` sorts ascending. */
  getAllItems(ordering?: string): Item[];
  getItemById(id: number): Item;
  /** Distinct feed URLs in first-seen order. */
  getAllFeedUrls(): string[];
  toggleRead(id: number): void;
  markRead(id: number): void;
  markUnread(id: number): void;
  /** Only unread items are stamped; read items keep their read time. */
  markAllRead(): void;
  toggleFavourite(id: number): void;
  deleteByFeedUrl(feedUrl: string, includeFavourites: boolean): void;
  countUnread(): number;
  close(): void;
}

export interface StoreOptions {
  now?: () => Date;
}

export function withBatch<T>(store: Store, work: () => T): T {
  store.beginBatch();
  let result: T;
  try {
    result = work();
  } catch (error) {
    store.abortBatch();
    throw error;
  }
  store.endBatch();
  return result;
}
