import { execFile } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import sharp from 'sharp';
import type { Logger } from '../logger.js';
import { toPosix } from '../utils.js';

const execFileAsync = promisify(execFile);

/**
 * Result of one processing attempt. Anything but `succeeded` falls through to
 * the next strategy.
 */
export type StrategyOutcome = 'succeeded' | 'unavailable' | 'failed';

/**
 * One asset file to process.
 */
export interface AssetJob {
  source: string;
  dest: string;
  /** Posix path relative to `assets/`. */
  relativePath: string;
}

/**
 * A way of producing `dest` from `source`.
 */
export interface AssetStrategy {
  readonly name: string;
  matches(job: AssetJob): boolean;
  run(job: AssetJob): Promise<StrategyOutcome>;
}

/** Runs an external tool; rejects on a non-zero exit. */
export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export interface AssetPipelineOptions {
  projectRoot: string;
  outputDir: string;
  logger?: Logger;
  findExecutable?: (name: string, projectRoot: string) => string | null;
  runCommand?: CommandRunner;
}

const OPTIMIZED_IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.webp']);

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate a command on `PATH`, then in the project's `node_modules/.bin`.
 */
export function findExecutable(name: string, projectRoot: string): string | null {
  const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    if (isExecutable(candidate)) return candidate;
  }
  const local = path.join(projectRoot, 'node_modules', '.bin', name);
  return isExecutable(local) ? local : null;
}

const runCommand: CommandRunner = async (command, args) => {
  await execFileAsync(command, args);
};

function listFiles(dir: string): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) out.push(...listFiles(full));
    else if (entry.isFile()) out.push(full);
  }
  return out.sort();
}

/**
 * Copies `assets/` into `<output>/assets/`, compiling Tailwind CSS,
 * minifying scripts and re-encoding images on the way when the tools for it
 * are available.
 */
export class AssetPipeline {
  readonly assetsDir: string;
  readonly targetDir: string;
  private readonly projectRoot: string;
  private readonly logger?: Logger;
  private readonly find: (name: string, projectRoot: string) => string | null;
  private readonly exec: CommandRunner;
  private readonly strategies: readonly AssetStrategy[];
  /** Tools already reported missing in the current run. */
  private readonly reported = new Set<string>();

  constructor(options: AssetPipelineOptions) {
    this.projectRoot = options.projectRoot;
    this.assetsDir = path.join(options.projectRoot, 'assets');
    this.targetDir = path.join(options.outputDir, 'assets');
    this.logger = options.logger;
    this.find = options.findExecutable ?? findExecutable;
    this.exec = options.runCommand ?? runCommand;
    this.strategies = [
      this.toolStrategy(
        'tailwindcss',
        (job) => job.relativePath === 'css/main.css',
        (job) => ['-i', job.source, '-o', job.dest, '--minify', '--content', this.tailwindContent()]
      ),
      this.toolStrategy(
        'terser',
        (job) => path.extname(job.source).toLowerCase() === '.js',
        (job) => [job.source, '-c', '-m', '-o', job.dest]
      ),
      this.imageStrategy(),
      this.copyStrategy()
    ];
  }

  /**
   * Process every file under `assets/`. Does nothing without an `assets/`
   * directory.
   */
  async run(): Promise<void> {
    if (!fs.existsSync(this.assetsDir)) return;
    this.reported.clear();
    for (const source of listFiles(this.assetsDir)) {
      const relativePath = toPosix(path.relative(this.assetsDir, source));
      await this.process({ source, dest: path.join(this.targetDir, relativePath), relativePath });
    }
  }

  /**
   * Try each matching strategy in order until one succeeds.
   */
  async process(job: AssetJob): Promise<string> {
    fs.mkdirSync(path.dirname(job.dest), { recursive: true });
    for (const strategy of this.strategies) {
      if (!strategy.matches(job)) continue;
      const outcome = await strategy.run(job);
      if (outcome === 'succeeded') return strategy.name;
    }
    throw new Error(`No strategy could process ${job.relativePath}`);
  }

  private tailwindContent(): string {
    return [
      path.join(this.projectRoot, 'site', '**', '*.md'),
      path.join(this.projectRoot, 'site', '**', '*.jinja'),
      path.join(this.projectRoot, 'assets', '**', '*.js')
    ].join(',');
  }

  private toolStrategy(
    tool: string,
    matches: (job: AssetJob) => boolean,
    args: (job: AssetJob) => string[]
  ): AssetStrategy {
    return {
      name: tool,
      matches,
      run: async (job) => {
        const bin = this.find(tool, this.projectRoot);
        if (!bin) {
          if (!this.reported.has(tool)) {
            this.reported.add(tool);
            this.logger?.warn({ tool }, `${tool} not found; copying assets unprocessed`);
          }
          return 'unavailable';
        }
        try {
          await this.exec(bin, args(job));
          return 'succeeded';
        } catch (err) {
          this.logger?.warn({ tool, file: job.relativePath, err }, `${tool} failed; copying unprocessed`);
          return 'failed';
        }
      }
    };
  }

  private imageStrategy(): AssetStrategy {
    return {
      name: 'sharp',
      matches: (job) => OPTIMIZED_IMAGE_EXTENSIONS.has(path.extname(job.source).toLowerCase()),
      run: async (job) => {
        try {
          const optimized = await sharp(job.source).toBuffer();
          fs.writeFileSync(job.dest, optimized);
          return 'succeeded';
        } catch (err) {
          this.logger?.debug({ file: job.relativePath, err }, 'Image re-encode failed; copying');
          return 'failed';
        }
      }
    };
  }

  private copyStrategy(): AssetStrategy {
    return {
      name: 'copy',
      matches: () => true,
      run: async (job) => {
        fs.copyFileSync(job.source, job.dest);
        return 'succeeded';
      }
    };
  }
}
