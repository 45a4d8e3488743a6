import fs from 'node:fs';
import path from 'node:path';
import type { Page, SiteData } from '../types.js';
import { escapeHtml } from '../utils.js';

/** Default RSS channel title when `data.title` is unset. */
export const DEFAULT_FEED_TITLE = 'Inkwell Feed';

/**
 * A feed file derived from the page list. `render` returns `null` when the
 * feed cannot be produced (no `data.url`).
 */
export interface FeedGenerator {
  readonly filename: string;
  render(pages: readonly Page[], data: SiteData, now: Date): string | null;
}

function baseUrl(data: SiteData): string {
  const url = data.url;
  return typeof url === 'string' ? url.replace(/\/+$/, '') : '';
}

/**
 * RFC 822 date as used by RSS: `Mon, 15 Jan 2024 00:00:00 +0000`.
 */
export function rfc822(date: Date): string {
  return date.toUTCString().replace(/GMT$/, '+0000');
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * `sitemap.xml` listing every page with its date as `lastmod`.
 */
export function renderSitemap(pages: readonly Page[], data: SiteData): string | null {
  const base = baseUrl(data);
  if (!base) return null;
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">'
  ];
  for (const page of pages) {
    lines.push(`  <url><loc>${escapeHtml(base + page.url)}</loc><lastmod>${isoDay(page.date)}</lastmod></url>`);
  }
  lines.push('</urlset>');
  return lines.join('\n');
}

/**
 * RSS 2.0 feed of every page, newest first.
 */
export function renderRss(pages: readonly Page[], data: SiteData, now: Date = new Date()): string | null {
  const base = baseUrl(data);
  if (!base) return null;
  const title = typeof data.title === 'string' && data.title ? data.title : DEFAULT_FEED_TITLE;

  const items = [...pages]
    .sort((a, b) => b.date.getTime() - a.date.getTime())
    .map((page) => {
      const description = page.description || page.title;
      return (
        `<item><title>${escapeHtml(page.title)}</title><link>${escapeHtml(base + page.url)}</link>` +
        `<description>${escapeHtml(description)}</description>` +
        `<pubDate>${rfc822(page.date)}</pubDate></item>`
      );
    });

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0"><channel>',
    `<title>${escapeHtml(title)}</title>`,
    `<link>${escapeHtml(base)}</link>`,
    `<lastBuildDate>${rfc822(now)}</lastBuildDate>`,
    ...items,
    '</channel></rss>'
  ].join('\n');
}

export const DEFAULT_FEEDS: readonly FeedGenerator[] = [
  { filename: 'sitemap.xml', render: (pages, data) => renderSitemap(pages, data) },
  { filename: 'rss.xml', render: renderRss }
];

/**
 * Write every feed that can be produced; returns the filenames written.
 */
export function writeFeeds(
  outputDir: string,
  pages: readonly Page[],
  data: SiteData,
  feeds: readonly FeedGenerator[] = DEFAULT_FEEDS,
  now: Date = new Date()
): string[] {
  const written: string[] = [];
  for (const feed of feeds) {
    const content = feed.render(pages, data, now);
    if (content === null) continue;
    fs.writeFileSync(path.join(outputDir, feed.filename), content, 'utf8');
    written.push(feed.filename);
  }
  return written;
}
