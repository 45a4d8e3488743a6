import fs from 'node:fs';
import path from 'node:path';
import type { Page } from '../types.js';
import type { PageBuilder } from './page.js';
import { sourceTypeFor } from './render.js';

/**
 * Options for content discovery.
 */
export interface DiscoverOptions {
  /** Include `_`-prefixed draft files. */
  includeDrafts?: boolean;
}

/**
 * Recursively walk a directory and collect content files. Directories whose
 * name starts with `_` (layouts, partials, hidden folders) are never entered.
 */
function walk(dir: string, includeDrafts: boolean, out: string[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!entry.name.startsWith('_')) walk(full, includeDrafts, out);
      continue;
    }
    if (!entry.isFile()) continue;
    if (entry.name.startsWith('_') && !includeDrafts) continue;
    if (sourceTypeFor(full) !== 'unknown') out.push(full);
  }
}

/**
 * Discover all page sources (Markdown, templates, HTML) under `site/`,
 * sorted by path.
 */
export function discoverContentFiles(siteDir: string, options: DiscoverOptions = {}): string[] {
  if (!fs.existsSync(siteDir)) return [];
  const files: string[] = [];
  walk(siteDir, options.includeDrafts ?? false, files);
  return files.sort();
}

/**
 * Whether a source file is a draft (its filename starts with `_`).
 */
export function isDraft(filePath: string): boolean {
  return path.basename(filePath).startsWith('_');
}

/**
 * Discover and build every page under the builder's site directory.
 */
export function loadPages(builder: PageBuilder, options: DiscoverOptions = {}): Page[] {
  return discoverContentFiles(builder.siteDir, options).map((file) => builder.build(file, isDraft(file)));
}
