import fs from 'node:fs';
import path from 'node:path';
import { toPosix } from '../utils.js';

/** Top-level directories whose contents feed a build. */
export const WATCHED_DIRS = ['site', 'assets', 'data'] as const;

/** `[relativePath, mtimeNs, size]` of one source file. */
export type SignatureEntry = readonly [string, bigint, number];

/**
 * Snapshot of the source tree used to skip rebuilds that would change
 * nothing. `null` when there are no source files.
 */
export type BuildSignature = readonly SignatureEntry[] | null;

function collect(dir: string, projectRoot: string, out: SignatureEntry[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    // Removed while walking.
    return;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      collect(full, projectRoot, out);
      continue;
    }
    let stat: fs.BigIntStats | undefined;
    try {
      stat = fs.statSync(full, { bigint: true, throwIfNoEntry: false });
    } catch {
      // Dangling or looping symlink, or no permission.
      continue;
    }
    if (!stat || stat.isDirectory()) continue;
    out.push([toPosix(path.relative(projectRoot, full)), stat.mtimeNs, Number(stat.size)]);
  }
}

/**
 * Signature of every regular file under `site/`, `assets/` and `data/`,
 * sorted by path. Entries that cannot be stat'ed are left out. Content is not hashed, so an edit that keeps both size and
 * mtime is not noticed.
 */
export function computeSignature(projectRoot: string): BuildSignature {
  const entries: SignatureEntry[] = [];
  for (const dir of WATCHED_DIRS) {
    const full = path.join(projectRoot, dir);
    if (fs.existsSync(full)) collect(full, projectRoot, entries);
  }
  if (entries.length === 0) return null;
  return entries.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Element-wise equality of two signatures.
 */
export function signaturesEqual(a: BuildSignature, b: BuildSignature): boolean {
  if (a === null || b === null) return a === b;
  if (a.length !== b.length) return false;
  return a.every((entry, i) => {
    const other = b[i];
    return entry[0] === other[0] && entry[1] === other[1] && entry[2] === other[2];
  });
}
