export const SCHEMA = `
CREATE TABLE IF NOT EXISTS items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,  -- AUTOINCREMENT: ids are never handed out twice
  feed_url TEXT NOT NULL,
  guid TEXT NOT NULL DEFAULT '',
  title TEXT NOT NULL DEFAULT '',
  author TEXT NOT NULL DEFAULT '',
  link TEXT NOT NULL DEFAULT '',
  content TEXT NOT NULL DEFAULT '',
  favourite INTEGER NOT NULL DEFAULT 0,
  read_at INTEGER,                       -- epoch ms, NULL = unread
  published_at INTEGER,
  updated_at INTEGER,
  created_at INTEGER NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_items_feed_url_guid ON items(feed_url, guid) WHERE guid <> '';
CREATE INDEX IF NOT EXISTS idx_items_feed_url ON items(feed_url);
CREATE INDEX IF NOT EXISTS idx_items_published_at ON items(published_at);
`;

export interface ItemRow {
  id: number;
  feed_url: string;
  guid: string;
  title: string;
  author: string;
  link: string;
  content: string;
  favourite: number;
  read_at: number | null;
  published_at: number | null;
  updated_at: number | null;
  created_at: number;
}
