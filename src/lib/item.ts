import type { Item } from "./types";

export function isRead(item: Pick<Item, "readAt">): boolean {
  return item.readAt !== null;
}

/**
 * Natural key used for deduplication. Entries without a GUID have no key and
 * are always stored as new records.
 */
export function dedupKey(feedUrl: string, guid: string): string | null {
  if (!guid) {
    return null;
  }
  return `${feedUrl}\u0000${guid}`;
}

export function cloneItem(item: Item): Item {
  return {
    ...item,
    readAt: cloneDate(item.readAt),
    publishedAt: cloneDate(item.publishedAt),
    updatedAt: cloneDate(item.updatedAt),
    createdAt: new Date(item.createdAt.getTime())
  };
}

/** Copies a date; an invalid date becomes null. */
export function cloneDate(value: Date | null): Date | null {
  if (!value || !Number.isFinite(value.getTime())) {
    return null;
  }
  return new Date(value.getTime());
}
