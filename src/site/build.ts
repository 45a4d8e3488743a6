import fs from 'node:fs';
import path from 'node:path';
import { loadConfig } from '../config.js';
import { buildTagIndex, PageCollection } from '../content/collections.js';
import { loadPages } from '../content/discover.js';
import { PageBuilder } from '../content/page.js';
import { BuildError, formatErrorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { BuildResult, Page } from '../types.js';
import { absolutizeHtmlUrls } from '../utils.js';
import { AssetPipeline, type AssetPipelineOptions } from './asset-pipeline.js';
import { loadData } from './data.js';
import { writeFeeds } from './feeds.js';
import { TemplateEngine } from './templates.js';

/**
 * Options for {@link buildSite}.
 */
export interface BuildOptions {
  /** Build `_`-prefixed draft pages too. */
  includeDrafts?: boolean;
  /** Overrides `root_url` from the config. */
  rootUrl?: string;
  /** Empty the output directory first (default `true`). */
  cleanOutput?: boolean;
  /** Write here instead of the configured output directory. */
  outputDir?: string;
  logger?: Logger;
  /** Tool lookup and execution for the asset pipeline. */
  assets?: Pick<AssetPipelineOptions, 'findExecutable' | 'runCommand'>;
}

/**
 * Remove and recreate a directory.
 */
export function ensureCleanDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Write rendered HTML to `<outputDir>/<url>/index.html`.
 */
export function writePage(outputDir: string, page: Page, html: string): string {
  const urlPath = page.url.replace(/^\/+|\/+$/g, '');
  const target = path.join(outputDir, ...urlPath.split('/').filter(Boolean), 'index.html');
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, html, 'utf8');
  return target;
}

/**
 * Build the whole site under `projectRoot`: pages, assets and feeds.
 * The first page that fails to build or render aborts with a
 * {@link BuildError}.
 */
export async function buildSite(projectRoot: string, options: BuildOptions = {}): Promise<BuildResult> {
  const log = (options.logger ?? rootLogger).child({ module: 'build' });
  const root = path.resolve(projectRoot);
  const config = loadConfig(root);
  const rootUrl = options.rootUrl ?? config.rootUrl;
  const outputDir = options.outputDir ? path.resolve(options.outputDir) : config.outputDir;

  const data = loadData(root, log);
  if (rootUrl && data.root_url === undefined) data.root_url = rootUrl;

  if (options.cleanOutput ?? true) ensureCleanDir(outputDir);
  else fs.mkdirSync(outputDir, { recursive: true });

  const siteDir = path.join(root, 'site');
  if (!fs.existsSync(siteDir)) {
    throw new BuildError(siteDir, 'Expected a site directory');
  }

  const builder = new PageBuilder({ siteDir, logger: log });
  const pages = loadPages(builder, { includeDrafts: options.includeDrafts });
  const engine = new TemplateEngine({ siteDir, data, rootUrl, logger: log });
  engine.setCollections(new PageCollection(pages), buildTagIndex(pages));

  for (const page of pages) {
    let html: string;
    try {
      html = engine.renderPage(page);
    } catch (err) {
      if (err instanceof BuildError) throw err;
      throw new BuildError(page.path, formatErrorMessage(err), { cause: err });
    }
    if (rootUrl) html = absolutizeHtmlUrls(html, rootUrl);
    writePage(outputDir, page, html);
  }

  await new AssetPipeline({ projectRoot: root, outputDir, logger: log, ...options.assets }).run();
  const feeds = writeFeeds(outputDir, pages, data);

  log.info({ pages: pages.length, feeds, outputDir }, 'Site built');
  return { pages, outputDir, data };
}
