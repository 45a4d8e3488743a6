import fs from 'node:fs';
import path from 'node:path';
import { BuildError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Page } from '../types.js';
import { slugify, stemOf, toPosix } from '../utils.js';
import { DEFAULT_EXTRACTORS, extractMetadata, type Extractor } from './extract.js';
import { deriveUrl, groupFromFolder, resolveLayout } from './layout.js';
import { renderContent, rewriteInlineImages, sourceTypeFor } from './render.js';

/**
 * Options for {@link PageBuilder}.
 */
export interface PageBuilderOptions {
  /** Absolute `site/` directory; pages are addressed relative to it. */
  siteDir: string;
  /** Extraction pipeline, defaults to {@link DEFAULT_EXTRACTORS}. */
  extractors?: readonly Extractor[];
  logger?: Logger;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Turns one source file into an immutable {@link Page}.
 */
export class PageBuilder {
  readonly siteDir: string;
  readonly layoutsDir: string;
  private readonly extractors: readonly Extractor[];
  private readonly logger?: Logger;

  constructor(options: PageBuilderOptions) {
    this.siteDir = path.resolve(options.siteDir);
    this.layoutsDir = path.join(this.siteDir, '_layouts');
    this.extractors = options.extractors ?? DEFAULT_EXTRACTORS;
    this.logger = options.logger;
  }

  /**
   * Build the page for `filePath`. Unreadable files and invalid UTF-8 raise a
   * {@link BuildError}; a broken frontmatter block only logs a warning.
   */
  build(filePath: string, draft = false): Page {
    const absolute = path.resolve(filePath);
    const raw = this.read(absolute);

    const relativePath = toPosix(path.relative(this.siteDir, absolute));
    const folder = path.posix.dirname(relativePath) === '.' ? '' : path.posix.dirname(relativePath);
    const filename = path.basename(absolute);

    const meta = extractMetadata(raw, absolute, this.extractors);
    if (meta.frontmatterError) {
      this.logger?.warn(
        { file: relativePath, reason: meta.frontmatterError },
        'Ignoring invalid frontmatter'
      );
    }

    const slug = slugify(stemOf(filename));
    const sourceType = sourceTypeFor(absolute);
    const rendered = renderContent(sourceType, meta.body, folder);

    const page: Page = {
      title: meta.title,
      body: meta.body,
      content: rewriteInlineImages(rendered.html, folder),
      description: meta.description,
      excerpt: meta.excerpt,
      url: deriveUrl(relativePath, slug),
      slug,
      date: meta.date,
      tags: Object.freeze([...meta.tags]),
      draft,
      layout: resolveLayout(absolute, folder, this.layoutsDir),
      group: groupFromFolder(folder),
      path: absolute,
      folder,
      filename,
      sourceType,
      frontmatter: Object.freeze({ ...meta.frontmatter }),
      toc: Object.freeze(rendered.toc.map((heading) => Object.freeze({ ...heading })))
    };
    return Object.freeze(page);
  }

  private read(filePath: string): string {
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(filePath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new BuildError(filePath, `Could not read file: ${reason}`, { cause: err });
    }
    try {
      return utf8.decode(bytes);
    } catch (err) {
      throw new BuildError(filePath, 'File is not valid UTF-8', { cause: err });
    }
  }
}
