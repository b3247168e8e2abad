import Parser from "rss-parser";
import { withBatch, type Store } from "@/store/store";
import type { FeedConfig, ItemCandidate, RefreshResult } from "@/lib/types";

export interface FeedEntryExtras {
  id?: string;
  author?: unknown;
  updated?: string;
  summary?: string;
  "content:encoded"?: string;
}

export type FeedEntry = FeedEntryExtras & Parser.Item;

export type FeedFetcher = (url: string) => Promise<FeedEntry[]>;

export interface RefreshOptions {
  fetcher?: FeedFetcher;
  concurrency?: number;
  onProgress?: (result: RefreshResult, done: number, total: number) => void;
}

const rssParser = new Parser<Record<string, unknown>, FeedEntryExtras>({
  timeout: 10_000,
  headers: {
    "User-Agent": "feedkeeper/0.1"
  },
  customFields: {
    item: ["updated"]
  }
});

// Concurrency for feed fetching (override with env FEED_CONCURRENCY=10 etc.)
const FEED_CONCURRENCY = (() => {
  const v = Number(process.env.FEED_CONCURRENCY);
  if (Number.isFinite(v) && v >= 1) return Math.min(v, 16);
  return 6; // default
})();

export async function fetchFeedEntries(feedUrl: string): Promise<FeedEntry[]> {
  const feed = await rssParser.parseURL(feedUrl);
  return feed.items ?? [];
}

export function toCandidates(feedUrl: string, entries: FeedEntry[]): ItemCandidate[] {
  return entries.map((entry) => ({
    feedUrl,
    guid: entry.guid ?? entry.id ?? "",
    title: entry.title ?? "",
    author: entry.creator ?? (typeof entry.author === "string" ? entry.author : ""),
    link: entry.link ?? "",
    content: entry["content:encoded"] ?? entry.content ?? entry.summary ?? "",
    publishedAt: parseDate(entry.isoDate ?? entry.pubDate),
    updatedAt: parseDate(entry.updated)
  }));
}

/**
 * Fetches every feed, then writes all of their entries in one batch, one
 * feed after another in configured order. A feed that cannot be fetched is
 * reported in its result and skipped.
 */
export async function refreshFeeds(
  store: Store,
  feeds: FeedConfig[],
  options: RefreshOptions = {}
): Promise<RefreshResult[]> {
  const fetcher = options.fetcher ?? fetchFeedEntries;
  const fetched: Array<{ result: RefreshResult; candidates: ItemCandidate[] }> = new Array(feeds.length);
  let done = 0;

  await runPool(feeds, options.concurrency ?? FEED_CONCURRENCY, async (feed, idx) => {
    let entry: { result: RefreshResult; candidates: ItemCandidate[] };
    try {
      const candidates = toCandidates(feed.url, await fetcher(feed.url));
      entry = { result: { feedUrl: feed.url, count: candidates.length }, candidates };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      entry = { result: { feedUrl: feed.url, count: 0, error: message }, candidates: [] };
    }
    fetched[idx] = entry;
    done++;
    options.onProgress?.(entry.result, done, feeds.length);
  });

  withBatch(store, () => {
    for (const { candidates } of fetched) {
      for (const candidate of candidates) {
        store.upsertItem(candidate);
      }
    }
  });

  return fetched.map(({ result }) => result);
}

function parseDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date;
}

async function runPool<T>(items: T[], concurrency: number, worker: (item: T, index: number) => Promise<void>): Promise<void> {
  const size = items.length;
  if (size === 0) return;
  let cursor = 0;
  const runners: Promise<void>[] = [];
  const limit = Math.max(1, concurrency);
  for (let i = 0; i < Math.min(limit, size); i++) {
    runners.push((async function pump() {
      while (true) {
        const current = cursor++;
        if (current >= size) break;
        await worker(items[current], current);
      }
    })());
  }
  await Promise.all(runners);
}
