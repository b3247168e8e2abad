export type Ordering = "asc" | "desc";

export interface Item {
  id: number;
  author: string;
  title: string;
  favourite: boolean;
  feedUrl: string;
  // joined from config by the presentation layer, never stored
  feedName?: string;
  link: string;
  guid: string;
  content: string;
  readAt: Date | null;
  publishedAt: Date | null;
  updatedAt: Date | null;
  createdAt: Date;
}

export type ItemCandidate = Omit<Item, "id" | "createdAt" | "feedName" | "favourite" | "readAt"> & {
  favourite?: boolean;
  readAt?: Date | null;
};

export interface FeedConfig {
  url: string;
  name?: string;
}

export interface KeeperConfig {
  database: string;
  ordering: Ordering;
  showread: boolean;
  showfavourites: boolean;
  autoread: boolean;
  readicon: string;
  feeds: FeedConfig[];
}

export interface Runtime {
  configPath: string;
  configDir: string;
  previewFeeds: FeedConfig[];
  config: KeeperConfig;
}

export interface FeedGroup {
  feedUrl: string;
  feedName?: string;
  items: Item[];
}

export interface RefreshResult {
  feedUrl: string;
  count: number;
  error?: string;
}
