import YAML from "yaml";
import { formatItemDetail, formatListLine } from "@/lib/format-item";
import { addFeed, getFeeds } from "@/lib/load-config";
import { attachFeedNames, filterItems, groupByFeed } from "@/lib/views";
import type { FeedConfig, RefreshResult, Runtime } from "@/lib/types";
import { refreshFeeds, type RefreshOptions } from "./ingest";
import type { Store } from "./store/store";

export type Output = (line: string) => void;

export class Commands {
  constructor(
    private runtime: Runtime,
    private readonly store: Store,
    private readonly print: Output = (line) => console.log(line)
  ) {}

  /** Prints the visible items grouped by feed, in configured order. */
  list(): void {
    const { config } = this.runtime;
    const items = filterItems(
      attachFeedNames(this.store.getAllItems(config.ordering), getFeeds(this.runtime)),
      { showRead: config.showread, showFavourites: config.showfavourites }
    );
    if (items.length === 0) {
      this.print("No items.");
      return;
    }
    for (const group of groupByFeed(items)) {
      for (const item of group.items) {
        this.print(formatListLine(item, config.readicon));
      }
    }
  }

  countUnread(): number {
    return this.store.countUnread();
  }

  feeds(): void {
    const names = new Map(getFeeds(this.runtime).map((feed) => [feed.url, feed.name] as const));
    for (const url of this.store.getAllFeedUrls()) {
      const name = names.get(url);
      this.print(name ? `${name} <${url}>` : url);
    }
  }

  show(id: number): void {
    if (this.runtime.config.autoread) {
      this.store.markRead(id);
    }
    const [item] = attachFeedNames([this.store.getItemById(id)], getFeeds(this.runtime));
    this.print(formatItemDetail(item));
  }

  markRead(id: number): void {
    this.store.markRead(id);
  }

  markUnread(id: number): void {
    this.store.markUnread(id);
  }

  toggleRead(id: number): void {
    this.store.toggleRead(id);
  }

  toggleFavourite(id: number): void {
    this.store.toggleFavourite(id);
  }

  markAllRead(): void {
    this.store.markAllRead();
  }

  deleteFeed(feedUrl: string, includeFavourites: boolean): void {
    this.store.deleteByFeedUrl(feedUrl, includeFavourites);
  }

  refresh(options: RefreshOptions = {}): Promise<RefreshResult[]> {
    return refreshFeeds(this.store, getFeeds(this.runtime), options);
  }

  /** Prints the effective configuration; preview feeds replace the configured ones. */
  showConfig(): void {
    this.print(YAML.stringify({ ...this.runtime.config, feeds: getFeeds(this.runtime) }).trimEnd());
  }

  async add(feed: FeedConfig): Promise<void> {
    this.runtime = await addFeed(this.runtime, feed);
  }
}
