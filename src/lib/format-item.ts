import { htmlToText } from "html-to-text";
import { GLYPHS } from "./log";
import { isRead } from "./item";
import type { Item } from "./types";

export function normaliseContent(html: string): string {
  if (!html) {
    return "";
  }
  return htmlToText(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" }
    ]
  })
    .replace(/\s+/g, " ")
    .trim();
}

export function formatDate(value: Date | null): string {
  return value ? value.toISOString().slice(0, 10) : "----------";
}

/**
 * One line per item: id, read marker, favourite marker, published date,
 * feed and title.
 */
export function formatListLine(item: Item, readIcon: string): string {
  const read = isRead(item) ? readIcon : " ";
  const favourite = item.favourite ? GLYPHS.favourite : " ";
  const feed = item.feedName || item.feedUrl;
  return `${String(item.id).padStart(5)} ${read}${favourite} ${formatDate(item.publishedAt)} [${feed}] ${item.title}`;
}

export function formatItemDetail(item: Item): string {
  const lines = [
    item.title,
    `${item.feedName || item.feedUrl} · ${formatDate(item.publishedAt)}`
  ];
  if (item.author) {
    lines.push(`by ${item.author}`);
  }
  if (item.link) {
    lines.push(item.link);
  }
  const text = normaliseContent(item.content);
  if (text) {
    lines.push("", text);
  }
  return lines.join("\n");
}
