import path from 'node:path';
import nunjucks, { type Environment, type runtime } from 'nunjucks';
import { PageCollection, TagCollection } from '../content/collections.js';
import { LAYOUT_SUFFIXES } from '../content/layout.js';
import type { Logger } from '../logger.js';
import type { Heading, Page, SiteData } from '../types.js';
import { escapeHtml, isFile, joinRootUrl } from '../utils.js';
import { AssetPathResolver } from './asset-resolver.js';
import { highlightCss } from './highlight.js';

const EXTERNAL_URL_RE = /^(https?:)?\/\//;

export interface TemplateEngineOptions {
  /** Absolute `site/` directory. */
  siteDir: string;
  data: SiteData;
  /** Base URL for `url_for`; falls back to `data.url`. */
  rootUrl?: string;
  /** Defaults to a resolver over `<siteDir>/../assets`. */
  assetResolver?: AssetPathResolver;
  logger?: Logger;
}

/**
 * Nested `<ul>` list of headings, deeper levels inside the previous item.
 */
export function renderTocHtml(headings: readonly Heading[]): string {
  const parts: string[] = [];
  const levels: number[] = [];

  for (const heading of headings) {
    while (levels.length > 0 && levels[levels.length - 1] > heading.level) {
      levels.pop();
      parts.push('</li></ul>');
    }
    if (levels.length > 0 && levels[levels.length - 1] === heading.level) {
      parts.push('</li>');
    } else {
      parts.push('<ul>');
      levels.push(heading.level);
    }
    parts.push(`<li><a href="#${escapeHtml(heading.id)}">${escapeHtml(heading.text)}</a>`);
  }
  for (let i = 0; i < levels.length; i++) parts.push('</li></ul>');
  return parts.join('');
}

/**
 * Table of contents for a page, already marked safe for templates.
 */
export function renderToc(page: Pick<Page, 'toc'>): runtime.SafeString {
  return new nunjucks.runtime.SafeString(renderTocHtml(page.toc));
}

/**
 * Renders pages through their layouts with nunjucks. Layouts are looked up
 * in `site/_layouts`, includes in `site/_partials`, then `site/` itself.
 */
export class TemplateEngine {
  readonly env: Environment;
  readonly data: SiteData;
  readonly rootUrl: string;
  private readonly searchPaths: string[];
  private readonly logger?: Logger;
  private pages = new PageCollection([]);
  private tags = new TagCollection([]);

  constructor(options: TemplateEngineOptions) {
    const siteDir = path.resolve(options.siteDir);
    this.data = options.data;
    const dataRootUrl = typeof options.data.root_url === 'string' ? options.data.root_url : '';
    this.rootUrl = options.rootUrl || dataRootUrl;
    this.logger = options.logger;
    this.searchPaths = [path.join(siteDir, '_layouts'), path.join(siteDir, '_partials'), siteDir];

    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(this.searchPaths, { noCache: true }), {
      autoescape: true
    });

    const assets =
      options.assetResolver ??
      new AssetPathResolver(path.join(path.dirname(siteDir), 'assets'), (urlPath) => this.urlFor(urlPath));

    this.env.addGlobal('data', this.data);
    this.env.addGlobal('pages', this.pages);
    this.env.addGlobal('tags', this.tags);
    this.env.addGlobal('url_for', (urlPath: string) => this.urlFor(urlPath));
    this.env.addGlobal('js_path', (name: string) => assets.jsPath(name));
    this.env.addGlobal('css_path', (name: string) => assets.cssPath(name));
    this.env.addGlobal('img_path', (name: string) => assets.imgPath(name));
    this.env.addGlobal('font_path', (name: string) => assets.fontPath(name));
    this.env.addGlobal('render_toc', renderToc);
    this.env.addGlobal('highlight_css', (theme?: string) => new nunjucks.runtime.SafeString(highlightCss(theme)));
  }

  /**
   * Replace the page and tag collections exposed to templates.
   */
  setCollections(pages: PageCollection, tags: TagCollection): void {
    this.pages = pages;
    this.tags = tags;
    this.env.addGlobal('pages', pages);
    this.env.addGlobal('tags', tags);
  }

  /**
   * URL for a site path, prefixed with the root URL (or `data.url`) when one
   * is set. External URLs are returned unchanged.
   */
  urlFor(urlPath: string): string {
    if (EXTERNAL_URL_RE.test(urlPath)) return urlPath;
    const normalized = urlPath.startsWith('/') ? urlPath : `/${urlPath}`;
    const dataUrl = typeof this.data.url === 'string' ? this.data.url : '';
    const base = this.rootUrl || dataUrl;
    return base ? joinRootUrl(base, normalized) : normalized;
  }

  /**
   * Render a page inside its layout. Template pages are evaluated first. With
   * no layout file at all the page body is returned on its own.
   */
  renderPage(page: Page): string {
    const context = {
      data: this.data,
      current_page: page,
      frontmatter: page.frontmatter,
      pages: this.pages,
      tags: this.tags,
      url_for: (urlPath: string) => this.urlFor(urlPath)
    };
    const body = page.sourceType === 'jinja' ? this.env.renderString(page.content, context) : page.content;

    const layout = this.findLayout(page.layout);
    if (layout === null) {
      this.logger?.warn({ page: page.url, layout: page.layout }, 'No layout found; rendering page body only');
      return body;
    }
    return this.env.render(layout, { ...context, page_content: new nunjucks.runtime.SafeString(body) });
  }

  renderString(source: string, context: object = {}): string {
    return this.env.renderString(source, context);
  }

  /**
   * Template name for a layout, falling back to the `default` layout.
   */
  findLayout(layout: string): string | null {
    const names = layout === 'default' ? ['default'] : [layout, 'default'];
    for (const name of names) {
      for (const suffix of LAYOUT_SUFFIXES) {
        const candidate = `${name}${suffix}`;
        if (this.searchPaths.some((dir) => isFile(path.join(dir, candidate)))) return candidate;
      }
    }
    return null;
  }
}
