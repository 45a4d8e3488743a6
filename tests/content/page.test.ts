import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { discoverContentFiles, isDraft, loadPages } from '../../src/content/discover.js';
import { PageBuilder } from '../../src/content/page.js';
import { BuildError } from '../../src/errors.js';
import { captureLogger } from '../helpers/logger.js';
import { makeProject, removeProject } from '../helpers/project.js';

describe('content loading', () => {
  let root = '';
  let siteDir = '';
  const site = (relative: string): string => path.join(siteDir, relative);

  beforeAll(() => {
    root = makeProject({
      'site/index.md': '# Hello\n\nWorld',
      'site/posts/2024-03-01-first.md': '# First\n\nPost body #news\n',
      'site/posts/_hidden/secret.md': '# Secret\n',
      'site/_draft.md': '# Draft\n',
      'site/about.html.jinja': '<h1>About</h1>',
      'site/notes.txt': 'ignored',
      'site/broken.md': '---\ntitle: [unclosed\n---\nBody\n',
      'site/_layouts/default.html.jinja': '{{ page_content }}',
      'site/_partials/nav.html.jinja': '<nav></nav>'
    });
    siteDir = path.join(root, 'site');
  });

  afterAll(() => removeProject(root));

  it('discovers sources in sorted order, skipping underscore directories', () => {
    expect(discoverContentFiles(siteDir)).toEqual([
      site('about.html.jinja'),
      site('broken.md'),
      site('index.md'),
      site('posts/2024-03-01-first.md')
    ]);
  });

  it('includes draft files on request', () => {
    const files = discoverContentFiles(siteDir, { includeDrafts: true });
    expect(files[0]).toBe(site('_draft.md'));
    expect(files).not.toContain(site('posts/_hidden/secret.md'));
    expect(isDraft(site('_draft.md'))).toBe(true);
  });

  it('returns nothing for a missing site directory', () => {
    expect(discoverContentFiles(path.join(root, 'nope'))).toEqual([]);
  });

  it('builds an immutable page from a dated post', () => {
    const page = new PageBuilder({ siteDir }).build(site('posts/2024-03-01-first.md'));
    expect(page.url).toBe('/posts/first/');
    expect(page.slug).toBe('first');
    expect(page.date.toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(page.folder).toBe('posts');
    expect(page.group).toBe('posts');
    expect(page.filename).toBe('2024-03-01-first.md');
    expect(page.sourceType).toBe('markdown');
    expect(page.layout).toBe('default');
    expect(page.tags).toEqual(['news']);
    expect(page.content).toBe('<h1 id="first">First</h1>\n<p>Post body news</p>');
    expect(page.toc).toEqual([{ id: 'first', text: 'First', level: 1 }]);
    expect(page.draft).toBe(false);
    expect(Object.isFrozen(page)).toBe(true);
    expect(Object.isFrozen(page.tags)).toBe(true);
  });

  it('keeps template sources unrendered', () => {
    const page = new PageBuilder({ siteDir }).build(site('about.html.jinja'));
    expect(page.url).toBe('/about/');
    expect(page.sourceType).toBe('jinja');
    expect(page.content).toBe('<h1>About</h1>');
  });

  it('warns about invalid frontmatter and keeps going', () => {
    const { logger, records } = captureLogger();
    const page = new PageBuilder({ siteDir, logger }).build(site('broken.md'));
    expect(page.frontmatter).toEqual({});
    expect(records.map((record) => record.msg)).toEqual(['Ignoring invalid frontmatter']);
    expect(records[0].file).toBe('broken.md');
  });

  it('rejects files that are not valid UTF-8', () => {
    const bad = makeProject({ 'site/bad.md': Buffer.from([0x23, 0x20, 0xff, 0xfe]) });
    try {
      const builder = new PageBuilder({ siteDir: path.join(bad, 'site') });
      expect(() => builder.build(path.join(bad, 'site/bad.md'))).toThrow(BuildError);
      expect(() => builder.build(path.join(bad, 'site/bad.md'))).toThrow(/File is not valid UTF-8/);
    } finally {
      removeProject(bad);
    }
  });

  it('wraps read failures in BuildError', () => {
    const builder = new PageBuilder({ siteDir });
    expect(() => builder.build(site('missing.md'))).toThrow(/Could not read file/);
  });

  it('marks underscore files as drafts when loading', () => {
    const pages = loadPages(new PageBuilder({ siteDir }), { includeDrafts: true });
    expect(pages.map((page) => [page.url, page.draft])).toEqual([
      ['/draft/', true],
      ['/about/', false],
      ['/broken/', false],
      ['/', false],
      ['/posts/first/', false]
    ]);
  });
});
