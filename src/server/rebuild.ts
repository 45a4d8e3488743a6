import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from '../logger.js';
import { sleep } from '../utils.js';
import { EventChannel } from './channel.js';
import { signaturesEqual, type BuildSignature } from './signature.js';

export type RebuildState = 'idle' | 'rebuilding';

export interface RebuildLoopOptions {
  /** Live output directory. */
  outputDir: string;
  /** Scratch directory for the next build, defaults to `<outputDir>.staging`. */
  stagingDir?: string;
  /** Build the whole site into the given directory. */
  build: (stagingDir: string) => Promise<unknown>;
  /** Tell connected browsers to reload. */
  broadcast: () => Promise<unknown>;
  computeSignature: () => BuildSignature;
  /** Signature of the build already being served. */
  initialSignature?: BuildSignature;
  /** Minimum gap after a finished rebuild before another is accepted. */
  debounceMs?: number;
  /** Pause between the swap and the reload broadcast. */
  settleMs?: number;
  /** Queue size; further events are dropped. */
  capacity?: number;
  now?: () => number;
  logger?: Logger;
}

/** Default minimum time between rebuilds. */
export const DEFAULT_DEBOUNCE_MS = 50;
/** Default delay before browsers are told to reload. */
export const DEFAULT_SETTLE_MS = 50;

function isWithin(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith(`..${path.sep}`) && relative !== '..' && !path.isAbsolute(relative));
}

/**
 * Empty (or create) the staging directory.
 */
export function prepareStagingDir(stagingDir: string): void {
  fs.rmSync(stagingDir, { recursive: true, force: true });
  fs.mkdirSync(stagingDir, { recursive: true });
}

/**
 * Replace `outputDir` with `stagingDir` using renames only. The old output
 * is parked at `<outputDir>.previous` and restored if the second rename
 * fails. Between the two renames `outputDir` does not exist, so a request
 * landing in that window gets a 404.
 */
export function swapDirectories(stagingDir: string, outputDir: string): void {
  const previous = `${outputDir}.previous`;
  fs.rmSync(previous, { recursive: true, force: true });
  const hadOutput = fs.existsSync(outputDir);
  if (hadOutput) fs.renameSync(outputDir, previous);
  try {
    fs.renameSync(stagingDir, outputDir);
  } catch (err) {
    if (hadOutput) fs.renameSync(previous, outputDir);
    throw err;
  }
  fs.rmSync(previous, { recursive: true, force: true });
}

/**
 * Turns file-change notifications into whole-site rebuilds, one at a time.
 *
 * Events go through a bounded queue drained by a single consumer. An event
 * is dropped when it comes from the output itself, while a rebuild is
 * running, within `debounceMs` of the previous rebuild, or when the source
 * signature has not changed. A rebuild goes to a staging directory that is
 * swapped in only on success, so a failed build leaves the served site as
 * it was.
 */
export class RebuildLoop {
  readonly outputDir: string;
  readonly stagingDir: string;
  private readonly options: RebuildLoopOptions;
  private readonly debounceMs: number;
  private readonly settleMs: number;
  private readonly now: () => number;
  private readonly events: EventChannel<string>;
  private readonly ignoredDirs: string[];
  private readonly consumer: Promise<void>;
  private currentState: RebuildState = 'idle';
  private lastRebuildAt = Number.NEGATIVE_INFINITY;
  private lastSignature: BuildSignature;
  private pending = 0;
  private idleWaiters: Array<() => void> = [];
  private stopping = false;
  private rebuilds = 0;

  constructor(options: RebuildLoopOptions) {
    this.options = options;
    this.outputDir = path.resolve(options.outputDir);
    this.stagingDir = path.resolve(options.stagingDir ?? `${this.outputDir}.staging`);
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.now = options.now ?? Date.now;
    this.lastSignature = options.initialSignature ?? null;
    this.events = new EventChannel<string>(options.capacity);
    this.ignoredDirs = [this.outputDir, this.stagingDir, `${this.outputDir}.previous`];
    this.consumer = this.consume();
  }

  get state(): RebuildState {
    return this.currentState;
  }

  /** Completed rebuilds, successful or not. */
  get rebuildCount(): number {
    return this.rebuilds;
  }

  /**
   * Record the signature of output produced outside the loop (the initial
   * build) so that an unchanged tree is not rebuilt again.
   */
  acceptSignature(signature: BuildSignature): void {
    this.lastSignature = signature;
  }

  /**
   * Whether a changed path can never trigger a rebuild.
   */
  isIgnored(filePath: string): boolean {
    const absolute = path.resolve(filePath);
    if (absolute.split(path.sep).includes('node_modules')) return true;
    return this.ignoredDirs.some((dir) => isWithin(absolute, dir));
  }

  /**
   * Report a changed path. Returns whether the event was queued.
   */
  notify(filePath: string): boolean {
    const log = this.options.logger;
    if (this.isIgnored(filePath)) {
      log?.debug({ file: filePath }, 'Ignoring change in generated or dependency files');
      return false;
    }
    if (this.currentState === 'rebuilding') {
      log?.debug({ file: filePath }, 'Rebuild in progress; dropping change');
      return false;
    }
    if (!this.events.push(filePath)) {
      log?.debug({ file: filePath }, 'Change queue full or closed; dropping change');
      return false;
    }
    this.pending++;
    return true;
  }

  /**
   * Resolves once every queued event has been handled.
   */
  whenIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop accepting events. A rebuild already running is allowed to finish;
   * events still queued are discarded.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.events.close();
    await this.consumer;
  }

  private async consume(): Promise<void> {
    for (;;) {
      const next = await this.events.next();
      if (next.done) return;
      if (!this.stopping) {
        try {
          await this.handle(next.value);
        } catch (err) {
          this.options.logger?.error({ err, file: next.value }, 'Could not process change');
        }
      }
      this.pending--;
      if (this.pending === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }

  private async handle(filePath: string): Promise<void> {
    const log = this.options.logger;
    if (this.now() - this.lastRebuildAt < this.debounceMs) {
      log?.debug({ file: filePath }, 'Change within debounce window; skipping');
      return;
    }
    let signature: BuildSignature;
    try {
      signature = this.options.computeSignature();
    } catch (err) {
      log?.warn({ err }, 'Could not compute source signature; rebuilding');
      signature = null;
    }
    if (signature !== null && signaturesEqual(signature, this.lastSignature)) {
      log?.debug({ file: filePath }, 'Sources unchanged; skipping rebuild');
      return;
    }

    this.currentState = 'rebuilding';
    log?.info({ file: filePath }, 'Change detected; rebuilding');
    try {
      prepareStagingDir(this.stagingDir);
      await this.options.build(this.stagingDir);
      swapDirectories(this.stagingDir, this.outputDir);
      this.lastSignature = signature;
      await sleep(this.settleMs);
      await this.options.broadcast();
      log?.info('Rebuild complete');
    } catch (err) {
      log?.error({ err }, 'Rebuild failed; keeping the previous output');
      fs.rmSync(this.stagingDir, { recursive: true, force: true });
    } finally {
      this.rebuilds++;
      this.currentState = 'idle';
      this.lastRebuildAt = this.now();
    }
  }
}
