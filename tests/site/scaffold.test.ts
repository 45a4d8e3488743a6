import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { createProgram } from '../../src/cli.js';
import { buildSite } from '../../src/site/build.js';
import { scaffoldProject } from '../../src/site/scaffold.js';
import { makeProject, readOutput, removeProject } from '../helpers/project.js';

describe('scaffoldProject', () => {
  let root = '';

  afterEach(() => {
    if (root) removeProject(root);
    root = '';
  });

  it('copies the starter project', () => {
    root = makeProject();
    const target = scaffoldProject(path.join(root, 'blog'));
    expect(target).toBe(path.join(root, 'blog'));
    for (const file of ['inkwell.yaml', 'data/site.yaml', 'site/index.md', 'site/_layouts/default.html.jinja']) {
      expect(fs.existsSync(path.join(target, file))).toBe(true);
    }
  });

  it('refuses non-empty directories', () => {
    root = makeProject({ 'blog/keep.txt': 'x' });
    const target = path.join(root, 'blog');
    expect(() => scaffoldProject(target)).toThrow(`Refusing to initialize into non-empty directory: ${target}`);
  });

  it('produces a site that builds', async () => {
    root = makeProject();
    const target = scaffoldProject(path.join(root, 'blog'));
    await buildSite(target, { assets: { findExecutable: () => null } });

    const index = readOutput(target, 'output/index.html');
    expect(index).toContain('<h1 id="welcome-to-inkwell">Welcome to Inkwell</h1>');
    expect(index).toContain('<link rel="stylesheet" href="https://example.com/assets/css/main.css">');
    expect(readOutput(target, 'output/posts/index.html')).toContain(
      '<li><a href="https://example.com/posts/my-post/">First Post</a></li>'
    );
    expect(fs.existsSync(path.join(target, 'output/about/index.html'))).toBe(true);
  });
});

describe('cli', () => {
  let root = '';

  afterEach(() => {
    if (root) removeProject(root);
    root = '';
  });

  it('creates a project relative to the working directory', async () => {
    root = makeProject();
    const lines: string[] = [];
    await createProgram(root, (line) => lines.push(line)).parseAsync(['new', 'blog'], { from: 'user' });
    expect(lines).toEqual([`New Inkwell site created at ${path.join(root, 'blog')}`]);
    expect(fs.existsSync(path.join(root, 'blog/site/index.md'))).toBe(true);
  });

  it('builds the project in the working directory', async () => {
    root = makeProject({ 'site/index.md': '# Home\n' });
    const lines: string[] = [];
    await createProgram(root, (line) => lines.push(line)).parseAsync(['build'], { from: 'user' });
    expect(lines).toEqual([`Built 1 pages into ${path.join(root, 'output')}`]);
    expect(readOutput(root, 'output/index.html')).toBe('<h1 id="home">Home</h1>');
  });
});
