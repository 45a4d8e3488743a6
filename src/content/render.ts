import path from 'node:path';
import type { Element, Root } from 'hast';
import { toString } from 'hast-util-to-string';
import rehypeHighlight from 'rehype-highlight';
import rehypeStringify from 'rehype-stringify';
import remarkGfm from 'remark-gfm';
import remarkParse from 'remark-parse';
import remarkRehype from 'remark-rehype';
import { unified, type Plugin } from 'unified';
import { visit } from 'unist-util-visit';
import type { Heading, SourceType } from '../types.js';
import { stripHashtags } from '../utils.js';

const HEADING_TAGS = new Map([
  ['h1', 1],
  ['h2', 2],
  ['h3', 3],
  ['h4', 4],
  ['h5', 5],
  ['h6', 6]
]);

const INLINE_IMG_RE = /(<img\s+[^>]*?\bsrc=")([^"]+)(")/gi;

/**
 * Output of a content renderer.
 */
export interface RenderedContent {
  html: string;
  /** Headings in document order; empty for non-Markdown sources. */
  toc: Heading[];
}

/**
 * Source type for a file, by suffix: `.md`, then `.jinja`/`.html.jinja`,
 * then plain `.html`.
 */
export function sourceTypeFor(filePath: string): SourceType {
  const name = path.basename(filePath).toLowerCase();
  if (name.endsWith('.md')) return 'markdown';
  if (name.endsWith('.jinja')) return 'jinja';
  if (name.endsWith('.html')) return 'html';
  return 'unknown';
}

/**
 * Anchor id for heading text: lowercase, punctuation dropped, spaces and
 * hyphen runs collapsed to a single `-`.
 */
export function headingId(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Map a relative image source to `/assets/images/<folder>/<src>`. Absolute,
 * root-relative, protocol-relative, fragment and templated sources are
 * returned unchanged.
 */
export function rewriteImagePath(src: string, folder: string): string {
  if (
    src.startsWith('/') ||
    src.startsWith('#') ||
    src.includes('{{') ||
    /^[a-z][a-z0-9+.-]*:/i.test(src)
  ) {
    return src;
  }
  return `/assets/images/${path.posix.join(folder, src)}`;
}

/**
 * Apply {@link rewriteImagePath} to every `<img src="...">` in rendered HTML.
 */
export function rewriteInlineImages(html: string, folder: string): string {
  return html.replace(
    INLINE_IMG_RE,
    (_whole, open: string, src: string, close: string) => `${open}${rewriteImagePath(src, folder)}${close}`
  );
}

interface PageStructureOptions {
  folder: string;
  /** Receives the headings found, in document order. */
  headings: Heading[];
}

/**
 * Assign unique ids to headings, record them, and rewrite image sources.
 * Headings that already carry an id (the footnotes label) are left alone.
 */
const rehypePageStructure: Plugin<[PageStructureOptions], Root> = (options) => (tree) => {
  const counts = new Map<string, number>();
  const issued = new Set<string>();

  visit(tree, 'element', (node: Element) => {
    const level = HEADING_TAGS.get(node.tagName);
    if (level !== undefined) {
      if (node.properties.id !== undefined) return;
      const text = toString(node);
      const base = headingId(text);
      let count = counts.get(base) ?? 0;
      let id = count === 0 ? base : `${base}-${count}`;
      // A heading whose own text ends in "-1" may already hold the id.
      while (issued.has(id)) {
        count++;
        id = `${base}-${count}`;
      }
      counts.set(base, count + 1);
      issued.add(id);
      node.properties.id = id;
      options.headings.push({ id, text, level });
      return;
    }
    if (node.tagName === 'img' && typeof node.properties.src === 'string') {
      node.properties.src = rewriteImagePath(node.properties.src, options.folder);
    }
  });
};

/**
 * Render Markdown to HTML with GFM (strikethrough, footnotes, tables,
 * autolinks), heading anchors and highlighted code fences. Raw HTML passes
 * through. Fences in a language the highlighter does not know stay as an
 * escaped `<pre><code class="language-x">` block.
 */
export function renderMarkdown(source: string, folder: string): RenderedContent {
  const headings: Heading[] = [];
  const file = unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypePageStructure, { folder, headings })
    .use(rehypeHighlight, { detect: false })
    .use(rehypeStringify, { allowDangerousHtml: true })
    .processSync(stripHashtags(source));

  return { html: String(file), toc: headings };
}

/**
 * Render a body according to its source type. HTML and templates pass
 * through unchanged (templates are evaluated at page-render time); unknown
 * types pass through as well.
 */
export function renderContent(sourceType: SourceType, body: string, folder: string): RenderedContent {
  switch (sourceType) {
    case 'markdown':
      return renderMarkdown(body, folder);
    case 'html':
    case 'jinja':
    case 'unknown':
      return { html: body, toc: [] };
  }
}
