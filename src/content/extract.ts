import fs from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import {
  collapseWhitespace,
  extractDateFromName,
  extractTags,
  firstParagraph,
  isRecord,
  paragraphs,
  stemOf,
  stripHashtags,
  titleize
} from '../utils.js';

/** `---` block at byte 0; parsing itself is left to gray-matter. */
const FRONTMATTER_RE = /^---[ \t]*\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

/**
 * Everything the extractor pipeline learns about one source file.
 */
export interface ExtractedMetadata {
  frontmatter: Record<string, unknown>;
  /** Source text after the frontmatter block. */
  body: string;
  title: string;
  tags: string[];
  date: Date;
  description: string;
  excerpt: string;
  /** Set when a frontmatter block was present but could not be used. */
  frontmatterError?: string;
}

/**
 * A single extraction step. Receives the current body text (the raw file
 * for the first step) and the source path.
 */
export type Extractor = (text: string, filePath: string) => Partial<ExtractedMetadata>;

/**
 * Split off and parse a leading YAML frontmatter block. Invalid YAML or a
 * non-mapping document leaves the text untouched with empty frontmatter.
 */
export const extractFrontmatter: Extractor = (text) => {
  if (!FRONTMATTER_RE.test(text)) return { frontmatter: {}, body: text };
  try {
    // Any options object skips gray-matter's unbounded module-level cache.
    const parsed = matter(text, {});
    if (!isRecord(parsed.data)) {
      return { frontmatter: {}, body: text, frontmatterError: 'frontmatter is not a mapping' };
    }
    return { frontmatter: { ...parsed.data }, body: parsed.content };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { frontmatter: {}, body: text, frontmatterError: reason };
  }
};

/**
 * Title from the first `# ` heading line, else derived from the filename.
 */
export const extractTitle: Extractor = (text, filePath) => {
  for (const line of text.split(/\r?\n/)) {
    const stripped = line.trim();
    if (/^#\s+/.test(stripped)) {
      return { title: stripped.replace(/^#\s+/, '').trim() };
    }
  }
  return { title: titleize(path.basename(filePath)) };
};

export const extractTagList: Extractor = (text) => ({ tags: extractTags(text) });

/**
 * Date from the filename prefix, falling back to the file's mtime.
 */
export const extractDate: Extractor = (_text, filePath) => ({
  date: extractDateFromName(stemOf(filePath)) ?? fs.statSync(filePath).mtime
});

/**
 * First paragraph of a Markdown body that is actual prose: headings, images,
 * code fences and horizontal rules are skipped.
 */
export function extractExcerpt(text: string): string {
  for (const para of paragraphs(text)) {
    if (para.startsWith('#')) continue;
    if (para.startsWith('![') || para.startsWith('```') || para.startsWith('---')) continue;
    return collapseWhitespace(para);
  }
  return '';
}

export const extractDescription: Extractor = (text, filePath) => {
  const cleaned = stripHashtags(text);
  const isMarkdown = path.extname(filePath).toLowerCase() === '.md';
  return {
    description: firstParagraph(cleaned),
    excerpt: isMarkdown ? extractExcerpt(cleaned) : ''
  };
};

/** Default pipeline order. None of the default steps write the same key. */
export const DEFAULT_EXTRACTORS: readonly Extractor[] = [
  extractFrontmatter,
  extractTitle,
  extractTagList,
  extractDate,
  extractDescription
];

/**
 * Run the extractors in order and merge their results left to right. Steps
 * after the frontmatter see the body without the frontmatter block.
 */
export function extractMetadata(
  text: string,
  filePath: string,
  extractors: readonly Extractor[] = DEFAULT_EXTRACTORS
): ExtractedMetadata {
  let result: Partial<ExtractedMetadata> = {};
  for (const extractor of extractors) {
    result = { ...result, ...extractor(result.body ?? text, filePath) };
  }

  return {
    frontmatter: result.frontmatter ?? {},
    body: result.body ?? text,
    title: result.title ?? titleize(path.basename(filePath)),
    tags: result.tags ?? [],
    date: result.date ?? fs.statSync(filePath).mtime,
    description: result.description ?? '',
    excerpt: result.excerpt ?? '',
    frontmatterError: result.frontmatterError
  };
}
