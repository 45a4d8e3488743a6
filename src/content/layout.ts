import path from 'node:path';
import { isFile, layoutFromStem, stemOf } from '../utils.js';

/** Suffixes tried for each layout candidate, in order. */
export const LAYOUT_SUFFIXES = ['.html.jinja', '.jinja', '.html', ''] as const;

/**
 * Top-level folder of a posix folder path (`posts/2024` → `posts`).
 */
export function groupFromFolder(folder: string): string {
  if (!folder) return '';
  return folder.split('/').filter(Boolean)[0] ?? '';
}

/**
 * Layout name for a source file.
 *
 * A `[name]` suffix in the filename wins outright. Otherwise the first
 * candidate with a file in `layoutsDir` is used: `folder/stem`, then the
 * group (or the bare stem for root files), then `default`. With no match the
 * result is still `default`; a missing default is dealt with at render time.
 */
export function resolveLayout(filePath: string, folder: string, layoutsDir: string): string {
  const stem = stemOf(filePath);
  const explicit = layoutFromStem(stem);
  if (explicit) return explicit;

  const candidates = folder ? [`${folder}/${stem}`, groupFromFolder(folder)] : [stem];
  candidates.push('default');

  for (const candidate of candidates) {
    for (const suffix of LAYOUT_SUFFIXES) {
      if (isFile(path.join(layoutsDir, `${candidate}${suffix}`))) {
        return candidate;
      }
    }
  }
  return 'default';
}

/**
 * Directory-style URL for a page from its posix path relative to `site/`.
 * The root `index.*` maps to `/`; an `index` slug maps to its folder.
 */
export function deriveUrl(relativePath: string, slug: string): string {
  const folder = path.posix.dirname(relativePath);
  const segments = folder === '.' ? [] : folder.split('/').filter(Boolean);
  if (segments.length === 0 && stemOf(relativePath) === 'index') return '/';

  const urlParts = slug === 'index' ? segments : [...segments, slug];
  const joined = urlParts.join('/');
  return joined ? `/${joined}/` : '/';
}
