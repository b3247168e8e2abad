import { isRead } from "./item";
import type { FeedConfig, FeedGroup, Item } from "./types";

export interface ViewFilter {
  showRead: boolean;
  showFavourites: boolean;
}

/** Items from the store carry no feed name; configured names are joined here by URL. */
export function attachFeedNames(items: Item[], feeds: FeedConfig[]): Item[] {
  const names = new Map<string, string>();
  for (const feed of feeds) {
    if (feed.name) {
      names.set(feed.url, feed.name);
    }
  }
  return items.map((item) => {
    const feedName = names.get(item.feedUrl);
    return feedName ? { ...item, feedName } : item;
  });
}

export function filterItems(items: Item[], filter: ViewFilter): Item[] {
  return items.filter((item) => {
    if (filter.showFavourites && !item.favourite) {
      return false;
    }
    return filter.showRead || !isRead(item);
  });
}

export function groupByFeed(items: Item[]): FeedGroup[] {
  const groups = new Map<string, FeedGroup>();
  for (const item of items) {
    let group = groups.get(item.feedUrl);
    if (!group) {
      group = { feedUrl: item.feedUrl, feedName: item.feedName, items: [] };
      groups.set(item.feedUrl, group);
    }
    group.items.push(item);
  }
  return Array.from(groups.values());
}
