import { DESCENDING_ORDERING } from "./constants";
import type { Item } from "./types";

type Comparator = (a: Item, b: Item) => number;

// "desc" flips both keys; anything else, unknown tokens included, sorts ascending.
export function compareItems(ordering?: string): Comparator {
  if (ordering === DESCENDING_ORDERING) {
    return (a, b) => publishedTime(b) - publishedTime(a) || b.id - a.id;
  }
  return (a, b) => publishedTime(a) - publishedTime(b) || a.id - b.id;
}

function publishedTime(item: Item): number {
  return item.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
}
