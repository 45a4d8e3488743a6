import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { RebuildLoop, swapDirectories, type RebuildLoopOptions } from '../../src/server/rebuild.js';
import { computeSignature, type BuildSignature } from '../../src/server/signature.js';
import { captureLogger } from '../helpers/logger.js';
import { makeProject, readOutput, removeProject } from '../helpers/project.js';

describe('RebuildLoop', () => {
  let root = '';
  let loop: RebuildLoop | null = null;

  afterEach(async () => {
    await loop?.stop();
    loop = null;
    if (root) removeProject(root);
    root = '';
  });

  function setup(overrides: Partial<RebuildLoopOptions> = {}) {
    root = makeProject({ 'output/old.html': 'old', 'site/a.md': 'a' });
    const outputDir = path.join(root, 'output');
    const builds: string[] = [];
    let broadcasts = 0;
    let version = 1;
    const { logger, records } = captureLogger();
    const created = new RebuildLoop({
      outputDir,
      build: async (stagingDir) => {
        builds.push(stagingDir);
        fs.writeFileSync(path.join(stagingDir, 'index.html'), `build ${builds.length}`);
      },
      broadcast: async () => {
        broadcasts++;
      },
      computeSignature: (): BuildSignature => [['site/a.md', BigInt(version), 1]],
      debounceMs: 0,
      settleMs: 0,
      logger,
      ...overrides
    });
    loop = created;
    return {
      loop: created,
      outputDir,
      builds,
      records,
      source: path.join(root, 'site/a.md'),
      broadcasts: () => broadcasts,
      touch: () => {
        version++;
      }
    };
  }

  it('builds into staging and swaps it in', async () => {
    const ctx = setup();
    expect(ctx.loop.notify(ctx.source)).toBe(true);
    await ctx.loop.whenIdle();

    expect(ctx.builds).toEqual([`${ctx.outputDir}.staging`]);
    expect(readOutput(root, 'output/index.html')).toBe('build 1');
    expect(fs.existsSync(path.join(root, 'output/old.html'))).toBe(false);
    expect(fs.existsSync(`${ctx.outputDir}.staging`)).toBe(false);
    expect(ctx.broadcasts()).toBe(1);
    expect(ctx.loop.rebuildCount).toBe(1);
    expect(ctx.loop.state).toBe('idle');
  });

  it('coalesces a burst of changes into one rebuild', async () => {
    const ctx = setup({ debounceMs: 10_000 });
    expect(ctx.loop.notify(ctx.source)).toBe(true);
    expect(ctx.loop.notify(ctx.source)).toBe(true);
    await ctx.loop.whenIdle();

    expect(ctx.builds).toHaveLength(1);
    expect(ctx.broadcasts()).toBe(1);
    expect(ctx.records.map((record) => record.msg)).toContain('Change within debounce window; skipping');
  });

  it('skips rebuilds when the sources are unchanged', async () => {
    const ctx = setup({ initialSignature: [['site/a.md', 1n, 1]] });
    ctx.loop.notify(ctx.source);
    await ctx.loop.whenIdle();
    expect(ctx.builds).toEqual([]);

    ctx.touch();
    ctx.loop.notify(ctx.source);
    await ctx.loop.whenIdle();
    expect(ctx.builds).toHaveLength(1);
  });

  it('rebuilds every time without a signature', async () => {
    const ctx = setup({ computeSignature: () => null });
    ctx.loop.notify(ctx.source);
    await ctx.loop.whenIdle();
    ctx.loop.notify(ctx.source);
    await ctx.loop.whenIdle();
    expect(ctx.builds).toHaveLength(2);
  });

  it('rebuilds without a signature when computing one fails', async () => {
    let calls = 0;
    const ctx = setup({
      computeSignature: (): BuildSignature => {
        calls++;
        if (calls === 1) throw new Error('EACCES: permission denied');
        return [['site/a.md', 1n, 1]];
      }
    });
    ctx.loop.notify(ctx.source);
    await ctx.loop.whenIdle();
    ctx.loop.notify(ctx.source);
    await ctx.loop.whenIdle();

    expect(ctx.builds).toHaveLength(2);
    expect(ctx.records.map((record) => record.msg)).toContain('Could not compute source signature; rebuilding');
  });

  it('keeps the previous output when a build fails', async () => {
    const ctx = setup({
      build: async (stagingDir) => {
        fs.writeFileSync(path.join(stagingDir, 'partial.html'), 'partial');
        throw new Error('template exploded');
      }
    });
    ctx.loop.notify(ctx.source);
    await ctx.loop.whenIdle();

    expect(readOutput(root, 'output/old.html')).toBe('old');
    expect(fs.existsSync(`${ctx.outputDir}.staging`)).toBe(false);
    expect(ctx.broadcasts()).toBe(0);
    expect(ctx.loop.rebuildCount).toBe(1);
    expect(ctx.loop.state).toBe('idle');
    expect(ctx.records.map((record) => record.msg)).toContain('Rebuild failed; keeping the previous output');
  });

  it('drops changes while a rebuild is running', async () => {
    let release = (): void => {};
    let started = (): void => {};
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });
    const ctx = setup({
      build: (stagingDir) => {
        started();
        fs.writeFileSync(path.join(stagingDir, 'index.html'), 'slow');
        return new Promise<void>((resolve) => {
          release = resolve;
        });
      }
    });
    ctx.loop.notify(ctx.source);
    await running;

    expect(ctx.loop.state).toBe('rebuilding');
    expect(ctx.loop.notify(ctx.source)).toBe(false);
    release();
    await ctx.loop.whenIdle();
    expect(readOutput(root, 'output/index.html')).toBe('slow');
  });

  it('ignores generated and dependency paths', () => {
    const ctx = setup();
    expect(ctx.loop.isIgnored(path.join(ctx.outputDir, 'index.html'))).toBe(true);
    expect(ctx.loop.isIgnored(`${ctx.outputDir}.staging/index.html`)).toBe(true);
    expect(ctx.loop.isIgnored(`${ctx.outputDir}.previous`)).toBe(true);
    expect(ctx.loop.isIgnored(path.join(root, 'node_modules/pkg/index.js'))).toBe(true);
    expect(ctx.loop.isIgnored(ctx.source)).toBe(false);
    expect(ctx.loop.notify(path.join(ctx.outputDir, 'index.html'))).toBe(false);
  });

  it('accepts nothing after stopping', async () => {
    const ctx = setup();
    await ctx.loop.stop();
    expect(ctx.loop.notify(ctx.source)).toBe(false);
    await ctx.loop.whenIdle();
    expect(ctx.builds).toEqual([]);
  });
});

describe('RebuildLoop over a real source tree', () => {
  let root = '';
  let loop: RebuildLoop | null = null;

  afterEach(async () => {
    await loop?.stop();
    loop = null;
    if (root) removeProject(root);
    root = '';
  });

  function start(): { loop: RebuildLoop; builds: () => number; broadcasts: () => number } {
    let builds = 0;
    let broadcasts = 0;
    const projectRoot = root;
    const created = new RebuildLoop({
      outputDir: path.join(projectRoot, 'output'),
      build: async (stagingDir) => {
        builds++;
        fs.writeFileSync(path.join(stagingDir, 'index.html'), `build ${builds}`);
      },
      broadcast: async () => {
        broadcasts++;
      },
      computeSignature: () => computeSignature(projectRoot),
      debounceMs: 0,
      settleMs: 0
    });
    loop = created;
    return { loop: created, builds: () => builds, broadcasts: () => broadcasts };
  }

  it('rebuilds and reloads once for two events without a change in between', async () => {
    root = makeProject({ 'site/a.md': 'a' });
    const ctx = start();
    const source = path.join(root, 'site/a.md');
    expect(ctx.loop.notify(source)).toBe(true);
    expect(ctx.loop.notify(source)).toBe(true);
    await ctx.loop.whenIdle();

    expect(ctx.builds()).toBe(1);
    expect(ctx.broadcasts()).toBe(1);
    expect(readOutput(root, 'output/index.html')).toBe('build 1');
  });

  it('keeps handling changes next to a looping symlink', async () => {
    root = makeProject({ 'site/a.md': 'a' });
    fs.symlinkSync('loop', path.join(root, 'site/loop'));
    const ctx = start();
    const source = path.join(root, 'site/a.md');

    ctx.loop.notify(source);
    await ctx.loop.whenIdle();
    fs.rmSync(path.join(root, 'site/loop'));
    fs.writeFileSync(source, 'a changed');
    expect(ctx.loop.notify(source)).toBe(true);
    await ctx.loop.whenIdle();

    expect(ctx.builds()).toBe(2);
    expect(ctx.loop.state).toBe('idle');
  });
});

describe('swapDirectories', () => {
  let root = '';

  afterEach(() => {
    if (root) removeProject(root);
    root = '';
  });

  it('moves staging into place when there is no output yet', () => {
    root = makeProject({ 'staging/index.html': 'new' });
    swapDirectories(path.join(root, 'staging'), path.join(root, 'output'));
    expect(readOutput(root, 'output/index.html')).toBe('new');
    expect(fs.existsSync(path.join(root, 'staging'))).toBe(false);
    expect(fs.existsSync(path.join(root, 'output.previous'))).toBe(false);
  });

  it('restores the old output when staging is missing', () => {
    root = makeProject({ 'output/index.html': 'old' });
    expect(() => swapDirectories(path.join(root, 'staging'), path.join(root, 'output'))).toThrow();
    expect(readOutput(root, 'output/index.html')).toBe('old');
  });
});
