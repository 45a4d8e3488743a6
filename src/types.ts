/**
 * Source file kinds understood by the content pipeline.
 */
export type SourceType = 'markdown' | 'html' | 'jinja' | 'unknown';

/**
 * A heading captured while rendering Markdown, used for the table of contents.
 */
export interface Heading {
  /** Anchor id, unique within its page (`intro`, `intro-1`, ...). */
  id: string;
  /** Plain text of the heading. */
  text: string;
  /** Heading level, 1 through 6. */
  level: number;
}

/**
 * A fully resolved site page. Built once per build and never mutated.
 */
export interface Page {
  /** Display title from the first `# ` heading or the filename. */
  readonly title: string;
  /** Raw source text after the frontmatter block. */
  readonly body: string;
  /** Rendered HTML (Markdown) or passthrough source (HTML, templates). */
  readonly content: string;
  /** First paragraph as plain text, at most 160 characters. */
  readonly description: string;
  /** Full first paragraph of a Markdown page; empty for other sources. */
  readonly excerpt: string;
  /** Directory-style URL (`/posts/first/`), `/` for the root index. */
  readonly url: string;
  readonly slug: string;
  /** Date from the `YYYY-MM-DD-` filename prefix, else the file mtime. */
  readonly date: Date;
  /** Hashtags found in the body, deduplicated in first-seen order. */
  readonly tags: readonly string[];
  readonly draft: boolean;
  /** Layout name (not a path), e.g. `default` or `posts`. */
  readonly layout: string;
  /** Top-level folder under `site/`, empty for root pages. */
  readonly group: string;
  /** Absolute path of the source file. */
  readonly path: string;
  /** Posix folder relative to `site/`, empty for root pages. */
  readonly folder: string;
  readonly filename: string;
  readonly sourceType: SourceType;
  readonly frontmatter: Readonly<Record<string, unknown>>;
  readonly toc: readonly Heading[];
}

/**
 * Site-wide data merged from `data/*.yaml`.
 */
export type SiteData = Record<string, unknown>;

/**
 * Result returned by a full site build.
 */
export interface BuildResult {
  /** Every page written during the build. */
  pages: Page[];
  /** Directory the site was written to. */
  outputDir: string;
  /** Site data made available to templates. */
  data: SiteData;
}
