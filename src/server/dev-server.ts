import fs from 'node:fs';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import type { WebSocketServer } from 'ws';
import { loadConfig } from '../config.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { buildSite, type BuildOptions } from '../site/build.js';
import { closeServer, createStaticApp, listen } from './http.js';
import { prepareStagingDir, RebuildLoop, swapDirectories } from './rebuild.js';
import { closeReloadServer, LiveReloadHub, startReloadServer } from './reload.js';
import { computeSignature, WATCHED_DIRS } from './signature.js';

export interface DevServerOptions {
  projectRoot: string;
  includeDrafts?: boolean;
  /** HTTP port; overrides `port` from the config. */
  port?: number;
  /** WebSocket port; defaults to the config value, or `port + 1` when `port` is given. */
  wsPort?: number;
  host?: string;
  debounceMs?: number;
  settleMs?: number;
  logger?: Logger;
  /** Tool lookup and execution for the asset pipeline. */
  assets?: BuildOptions['assets'];
}

function boundPort(address: string | AddressInfo | null, fallback: number): number {
  return typeof address === 'object' && address !== null ? address.port : fallback;
}

/**
 * Serves the built site, rebuilds it when sources change and tells browsers
 * to reload.
 */
export class DevServer {
  readonly projectRoot: string;
  readonly outputDir: string;
  private readonly options: DevServerOptions;
  private readonly log: Logger;
  private readonly requestedPort: number;
  private readonly requestedWsPort: number;
  private readonly hub: LiveReloadHub;
  private httpServer: Server | null = null;
  private wsServer: WebSocketServer | null = null;
  private loop: RebuildLoop | null = null;
  private watchers: FSWatcher[] = [];
  private httpPort = 0;
  private wsPortBound = 0;

  constructor(options: DevServerOptions) {
    this.options = options;
    this.projectRoot = path.resolve(options.projectRoot);
    const config = loadConfig(this.projectRoot);
    this.outputDir = config.outputDir;
    this.requestedPort = options.port ?? config.port;
    this.requestedWsPort = options.wsPort ?? (options.port !== undefined ? options.port + 1 : config.wsPort);
    this.log = (options.logger ?? rootLogger).child({ module: 'server' });
    this.hub = new LiveReloadHub(this.log);
  }

  get port(): number {
    return this.httpPort;
  }

  get wsPort(): number {
    return this.wsPortBound;
  }

  /** Base URL pages are built against while serving. */
  get rootUrl(): string {
    return `http://localhost:${this.httpPort}`;
  }

  get state(): RebuildLoop['state'] {
    return this.loop?.state ?? 'idle';
  }

  /**
   * Bind both listeners, build the site once and start watching sources.
   * On failure everything already bound is closed again.
   */
  async start(): Promise<void> {
    this.wsServer = await startReloadServer(this.hub, {
      port: this.requestedWsPort,
      host: this.options.host,
      logger: this.log
    });
    this.wsPortBound = boundPort(this.wsServer.address(), this.requestedWsPort);

    try {
      await this.serve();
    } catch (err) {
      if (this.loop) fs.rmSync(this.loop.stagingDir, { recursive: true, force: true });
      await this.stop();
      throw err;
    }
    this.log.info({ url: this.rootUrl, wsPort: this.wsPortBound, outputDir: this.outputDir }, 'Serving site');
  }

  /**
   * Close watchers and listeners; a rebuild in progress is allowed to finish.
   */
  async stop(): Promise<void> {
    await Promise.all(this.watchers.map((watcher) => watcher.close()));
    this.watchers = [];
    await this.loop?.stop();
    if (this.wsServer) await closeReloadServer(this.wsServer);
    if (this.httpServer) await closeServer(this.httpServer);
    this.wsServer = null;
    this.httpServer = null;
  }

  /** Queue a rebuild as if `filePath` had changed. */
  notify(filePath: string): boolean {
    return this.loop?.notify(filePath) ?? false;
  }

  whenIdle(): Promise<void> {
    return this.loop?.whenIdle() ?? Promise.resolve();
  }

  private async serve(): Promise<void> {
    const app = createStaticApp({ rootDir: this.outputDir, wsPort: this.wsPortBound, logger: this.log });
    this.httpServer = await listen(app, this.requestedPort, this.options.host);
    this.httpPort = boundPort(this.httpServer.address(), this.requestedPort);

    const loop = new RebuildLoop({
      outputDir: this.outputDir,
      build: (stagingDir) => this.buildInto(stagingDir),
      broadcast: () => this.hub.broadcast(),
      computeSignature: () => computeSignature(this.projectRoot),
      debounceMs: this.options.debounceMs,
      settleMs: this.options.settleMs,
      logger: this.log
    });
    this.loop = loop;

    prepareStagingDir(loop.stagingDir);
    await this.buildInto(loop.stagingDir);
    swapDirectories(loop.stagingDir, this.outputDir);
    loop.acceptSignature(computeSignature(this.projectRoot));

    this.startWatchers(loop);
  }

  private async buildInto(stagingDir: string): Promise<void> {
    await buildSite(this.projectRoot, {
      includeDrafts: this.options.includeDrafts,
      rootUrl: this.rootUrl,
      cleanOutput: true,
      outputDir: stagingDir,
      logger: this.log,
      assets: this.options.assets
    });
  }

  private startWatchers(loop: RebuildLoop): void {
    const onEvent = (event: string, filePath: string): void => {
      if (event === 'addDir' || event === 'unlinkDir') return;
      loop.notify(filePath);
    };
    const dirs = WATCHED_DIRS.map((dir) => path.join(this.projectRoot, dir)).filter((dir) => fs.existsSync(dir));

    const sources = watch(dirs, { ignoreInitial: true, ignored: (p) => loop.isIgnored(p) });
    // Top-level files such as inkwell.yaml or tailwind.config.js.
    const root = watch(this.projectRoot, { ignoreInitial: true, depth: 0, ignored: (p) => loop.isIgnored(p) });

    for (const watcher of [sources, root]) {
      watcher.on('all', onEvent);
      watcher.on('error', (err) => this.log.warn({ err }, 'File watcher error'));
    }
    this.watchers = [sources, root];
  }
}
