import fs from 'node:fs';
import type { Server } from 'node:http';
import path from 'node:path';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Logger } from '../logger.js';
import { isFile } from '../utils.js';
import { reloadScript } from './reload.js';

export const NO_CACHE = 'no-cache, no-store, must-revalidate';

export interface StaticAppOptions {
  /** Directory served at `/`. */
  rootDir: string;
  /** Port the reload script connects back to. */
  wsPort: number;
  logger?: Logger;
}

/**
 * Insert `script` before the closing body tag, or append it.
 */
export function injectReloadScript(html: string, script: string): string {
  return html.includes('</body>') ? html.replace('</body>', `${script}</body>`) : html + script;
}

/**
 * File under `rootDir` for a request path, or `null` when the path is
 * malformed or points outside the root.
 */
export function resolveRequestPath(rootDir: string, requestPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return null;
  }
  if (decoded.includes('\0')) return null;
  const root = path.resolve(rootDir);
  const target = path.join(root, decoded);
  const relative = path.relative(root, target);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) return null;
  return target;
}

/**
 * Express app serving a built site for local authoring: directory URLs map
 * to their `index.html`, HTML gets the live-reload script, nothing is cached
 * and directory listings are never shown.
 */
export function createStaticApp(options: StaticAppOptions): Express {
  const root = path.resolve(options.rootDir);
  const script = reloadScript(options.wsPort);
  const app = express();
  app.disable('x-powered-by');

  const sendHtml = (res: Response, filePath: string, status: number): void => {
    const html = fs.readFileSync(filePath, 'utf8');
    res.status(status).type('html').send(injectReloadScript(html, script));
  };

  const notFound = (res: Response): void => {
    const errorPage = path.join(root, '404.html');
    if (isFile(errorPage)) {
      sendHtml(res, errorPage, 404);
      return;
    }
    res.status(404).type('text').send('File not found');
  };

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.set('Cache-Control', NO_CACHE);
    next();
  });

  app.get('*', (req: Request, res: Response, next: NextFunction) => {
    let target = resolveRequestPath(root, req.path);
    if (target === null) {
      notFound(res);
      return;
    }
    const stat = fs.statSync(target, { throwIfNoEntry: false });
    if (stat?.isDirectory()) {
      target = path.join(target, 'index.html');
      if (!isFile(target)) {
        notFound(res);
        return;
      }
    } else if (!stat?.isFile()) {
      notFound(res);
      return;
    }

    if (target.endsWith('.html')) {
      sendHtml(res, target, 200);
      return;
    }
    res.sendFile(target, { cacheControl: false, dotfiles: 'allow' }, (err) => {
      if (err) next(err);
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    options.logger?.error({ err }, 'Failed to serve request');
    if (!res.headersSent) res.status(500).type('text').send('Internal server error');
  });

  return app;
}

/**
 * Listen on `port` and resolve once the server is accepting connections.
 */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

/**
 * Close a server, dropping idle keep-alive connections.
 */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
