import fs from 'node:fs';
import path from 'node:path';

/** Hashtag: letter start, three or more characters, optional `/segment` hierarchy. */
const HASHTAG_SOURCE = '#([a-zA-Z][a-zA-Z0-9]{2,}(?:/[a-zA-Z0-9]+)*)';

const URL_ATTR_RE = /(\b(?:href|src|action)=["'])([^"']+)(["'])/g;

const URL_SKIP_PREFIXES = ['http://', 'https://', '//', 'mailto:', 'tel:', '#', 'javascript:', 'data:', 'blob:'];

/**
 * Whether every string is a non-empty run of ASCII digits.
 */
function allDigits(parts: string[]): boolean {
  return parts.every((part) => /^\d+$/.test(part));
}

/**
 * Split a filename stem on `-` and drop a leading `YYYY-MM-DD` prefix when one
 * is followed by more segments.
 */
function withoutDatePrefix(stem: string): string[] {
  const parts = stem.split('-');
  if (parts.length >= 4 && allDigits(parts.slice(0, 3))) {
    return parts.slice(3);
  }
  return parts;
}

/**
 * Filename without its extension; `.html.jinja` counts as one extension.
 */
export function stemOf(filename: string): string {
  const base = path.posix.basename(filename.replaceAll('\\', '/'));
  if (base.toLowerCase().endsWith('.html.jinja')) return base.slice(0, -'.html.jinja'.length);
  const ext = path.posix.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Layout named by a `[name]` suffix in the stem (`contact[hero]` → `hero`).
 */
export function layoutFromStem(stem: string): string | null {
  const match = /\[([^\]]+)\]/.exec(stem);
  return match ? match[1] : null;
}

function withoutLayoutSuffix(stem: string): string {
  return stem.replace(/\[[^\]]*\]$/, '');
}

/**
 * Convert a filename stem to a URL slug, dropping any date prefix and
 * `[layout]` suffix.
 */
export function slugify(stem: string): string {
  const cleaned = withoutDatePrefix(withoutLayoutSuffix(stem))
    .join('-')
    .replace(/[^a-zA-Z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
  return cleaned || 'index';
}

/**
 * Turn a filename into a display title: `2024-01-15-hello-world.md` becomes
 * `Hello World`.
 */
export function titleize(filename: string): string {
  const base = withoutLayoutSuffix(withoutDatePrefix(stemOf(filename)).join('-'));
  const words = base.split(/[\s\-_]+/).filter(Boolean);
  const title = words.map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
  return title.join(' ') || 'Untitled';
}

/**
 * Parse a `YYYY-MM-DD` prefix of a filename stem as a UTC calendar date.
 * Returns `null` when there is no prefix or the date does not exist.
 */
export function extractDateFromName(stem: string): Date | null {
  const parts = stem.split('-');
  if (parts.length < 3 || !allDigits(parts.slice(0, 3))) return null;
  const [year, month, day] = parts.slice(0, 3).map((part) => Number.parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Leading sort number of a stem (`01-intro` → 1, `2024-01-01-3-post` → 3).
 */
export function extractNumberFromName(stem: string): number | null {
  const parts = stem.split('-');
  if (parts.length >= 4 && allDigits(parts.slice(0, 3))) {
    return /^\d+$/.test(parts[3]) ? Number.parseInt(parts[3], 10) : null;
  }
  if (/^\d+$/.test(parts[0])) return Number.parseInt(parts[0], 10);
  return null;
}

/**
 * Stem with date and number prefixes removed, used as the final sort key.
 */
export function stripNumberPrefix(stem: string): string {
  let parts = stem.split('-');
  if (parts.length >= 4 && allDigits(parts.slice(0, 3))) {
    parts = parts.slice(3);
    if (parts.length > 0 && /^\d+$/.test(parts[0])) parts = parts.slice(1);
  } else if (/^\d+$/.test(parts[0])) {
    parts = parts.slice(1);
  }
  return parts.length > 0 ? parts.join('-') : stem;
}

/**
 * All hashtags in the text without the `#`, deduplicated in first-seen order.
 */
export function extractTags(text: string): string[] {
  const seen: string[] = [];
  for (const match of text.matchAll(new RegExp(HASHTAG_SOURCE, 'g'))) {
    if (!seen.includes(match[1])) seen.push(match[1]);
  }
  return seen;
}

/**
 * Remove `#` from hashtags, keeping the tag words: `Hello #world` → `Hello world`.
 */
export function stripHashtags(text: string): string {
  return text.replace(new RegExp(HASHTAG_SOURCE, 'g'), '$1');
}

/**
 * Split text into trimmed, non-empty blank-line separated paragraphs.
 */
export function paragraphs(text: string): string[] {
  return text
    .split('\n\n')
    .map((para) => para.trim())
    .filter(Boolean);
}

/**
 * First paragraph as plain text: heading hashes, HTML tags and template
 * syntax removed, whitespace collapsed, cut to `limit` characters.
 */
export function firstParagraph(text: string, limit = 160): string {
  const first = paragraphs(text)[0];
  if (!first) return '';
  const plain = first
    .replace(/^[#\s]+/, '')
    .replace(/<[^>]+>/g, '')
    .replace(/\{[%#{][\s\S]*?[%#}]\}/g, '');
  return collapseWhitespace(plain).slice(0, limit);
}

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Escape `&`, `<`, `>` and `"` for HTML text and attributes.
 */
export function escapeHtml(text: string): string {
  return text
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;');
}

/**
 * Join a base URL and a path without doubling the slash.
 */
export function joinRootUrl(rootUrl: string, urlPath: string): string {
  if (!rootUrl) return urlPath;
  const base = rootUrl.replace(/\/+$/, '');
  const suffix = urlPath.startsWith('/') ? urlPath : `/${urlPath}`;
  return `${base}${suffix}`;
}

/**
 * Rewrite relative `href`, `src` and `action` attributes against `rootUrl`.
 * External URLs, anchors and `mailto:`/`tel:`/`javascript:`/`data:`/`blob:`
 * URLs are kept.
 */
export function absolutizeHtmlUrls(html: string, rootUrl: string): string {
  if (!rootUrl) return html;
  return html.replace(URL_ATTR_RE, (whole, prefix: string, url: string, suffix: string) => {
    if (URL_SKIP_PREFIXES.some((skip) => url.startsWith(skip))) return whole;
    return `${prefix}${joinRootUrl(rootUrl, url)}${suffix}`;
  });
}

/**
 * Whether a value is a plain key/value mapping (not an array or null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a platform path to forward slashes.
 */
export function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Whether `filePath` exists and is a regular file.
 */
export function isFile(filePath: string): boolean {
  return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
