import type { Page } from '../types.js';
import { extractNumberFromName, stemOf, stripNumberPrefix } from '../utils.js';

interface SortKey {
  time: number;
  number: number | null;
  name: string;
}

function sortKey(page: Page): SortKey {
  const stem = stemOf(page.filename);
  return {
    time: page.date.getTime(),
    number: extractNumberFromName(stem),
    name: stripNumberPrefix(stem).toLowerCase()
  };
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Ascending: oldest first, unnumbered before numbered, lower numbers first,
 * then name.
 */
function compareAscending(a: SortKey, b: SortKey): number {
  if (a.time !== b.time) return a.time - b.time;
  if (a.number === null || b.number === null) {
    if (a.number !== b.number) return a.number === null ? -1 : 1;
  } else if (a.number !== b.number) {
    return a.number - b.number;
  }
  return compareText(a.name, b.name);
}

/**
 * Descending: newest first, numbered before unnumbered, higher numbers
 * first, then name in reverse.
 */
function compareDescending(a: SortKey, b: SortKey): number {
  if (a.time !== b.time) return b.time - a.time;
  if (a.number === null || b.number === null) {
    if (a.number !== b.number) return a.number === null ? 1 : -1;
  } else if (a.number !== b.number) {
    return b.number - a.number;
  }
  return compareText(b.name, a.name);
}

/**
 * Sort pages by date, then numeric filename prefix, then filename. The
 * order depends only on those keys, never on input order, except for pages
 * whose keys are all equal, which keep their relative order.
 */
export function sortPages(pages: readonly Page[], reverse = true): Page[] {
  const compare = reverse ? compareDescending : compareAscending;
  return pages
    .map((page) => ({ page, key: sortKey(page) }))
    .sort((a, b) => compare(a.key, b.key))
    .map(({ page }) => page);
}

/**
 * Ordered list of pages with the filters and listings templates use.
 */
export class PageCollection implements Iterable<Page> {
  private readonly pages: readonly Page[];
  /** Newest-first order, computed once. */
  private readonly descending: readonly Page[];

  constructor(pages: Iterable<Page>, descending?: readonly Page[]) {
    this.pages = Object.freeze([...pages]);
    this.descending = descending ?? Object.freeze(sortPages(this.pages, true));
  }

  [Symbol.iterator](): Iterator<Page> {
    return this.pages[Symbol.iterator]();
  }

  get length(): number {
    return this.pages.length;
  }

  // nunjucks' `length` filter counts the keys of anything tagged
  // `[object Object]`; a tag of our own makes it read `.length`.
  get [Symbol.toStringTag](): string {
    return 'PageCollection';
  }

  at(index: number): Page | undefined {
    return this.pages.at(index);
  }

  toArray(): Page[] {
    return [...this.pages];
  }

  group(name: string): PageCollection {
    return new PageCollection(this.pages.filter((page) => page.group === name));
  }

  withTag(tag: string): PageCollection {
    return new PageCollection(this.pages.filter((page) => page.tags.includes(tag)));
  }

  drafts(): PageCollection {
    return new PageCollection(this.pages.filter((page) => page.draft));
  }

  published(): PageCollection {
    return new PageCollection(this.pages.filter((page) => !page.draft));
  }

  /**
   * Pages sorted newest first (`reverse`, the default) or oldest first.
   */
  sorted(reverse = true): PageCollection {
    if (reverse) {
      // A newest-first list is its own newest-first order.
      return new PageCollection(this.descending, this.descending);
    }
    return new PageCollection(sortPages(this.pages, false));
  }

  /**
   * The `count` newest pages.
   */
  latest(count = 5): PageCollection {
    const newest = this.descending.slice(0, count);
    return new PageCollection(newest, newest);
  }
}

/**
 * Read-only mapping of tag name to the pages carrying it.
 */
export class TagCollection implements Iterable<[string, PageCollection]> {
  private readonly tags: ReadonlyMap<string, PageCollection>;

  constructor(mapping: Iterable<[string, Iterable<Page>]>) {
    const tags = new Map<string, PageCollection>();
    for (const [tag, pages] of mapping) {
      tags.set(tag, new PageCollection(pages));
    }
    this.tags = tags;
  }

  [Symbol.iterator](): Iterator<[string, PageCollection]> {
    return this.tags.entries();
  }

  get size(): number {
    return this.tags.size;
  }

  /** Same as `size`; read by the template `length` filter. */
  get length(): number {
    return this.tags.size;
  }

  get [Symbol.toStringTag](): string {
    return 'TagCollection';
  }

  get(tag: string): PageCollection | undefined {
    return this.tags.get(tag);
  }

  has(tag: string): boolean {
    return this.tags.has(tag);
  }

  keys(): string[] {
    return [...this.tags.keys()];
  }

  values(): PageCollection[] {
    return [...this.tags.values()];
  }

  entries(): [string, PageCollection][] {
    return [...this.tags.entries()];
  }
}

/**
 * Group pages by tag, preserving page order within each tag and first-seen
 * order of the tags.
 */
export function buildTagIndex(pages: Iterable<Page>): TagCollection {
  const index = new Map<string, Page[]>();
  for (const page of pages) {
    for (const tag of page.tags) {
      const existing = index.get(tag) ?? [];
      existing.push(page);
      index.set(tag, existing);
    }
  }
  return new TagCollection(index);
}
