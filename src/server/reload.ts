import { WebSocket, WebSocketServer } from 'ws';
import type { Logger } from '../logger.js';

/** Message telling browsers to reload. */
export const RELOAD_MESSAGE = JSON.stringify({ type: 'reload' });

/**
 * Anything that can receive a live-reload message.
 */
export interface ReloadClient {
  send(message: string): Promise<void>;
}

/**
 * Browser snippet that reloads the page when the server says so.
 */
export function reloadScript(wsPort: number): string {
  return `
<script>
(() => {
  const ws = new WebSocket('ws://' + location.hostname + ':${wsPort}');
  ws.onmessage = (event) => {
    const data = JSON.parse(event.data || '{}');
    if (data.type === 'reload') location.reload();
  };
})();
</script>
`;
}

/**
 * Set of connected live-reload clients.
 */
export class LiveReloadHub {
  private readonly clients = new Set<ReloadClient>();

  constructor(private readonly logger?: Logger) {}

  get size(): number {
    return this.clients.size;
  }

  add(client: ReloadClient): void {
    this.clients.add(client);
  }

  remove(client: ReloadClient): void {
    this.clients.delete(client);
  }

  /**
   * Send `message` to every client. Clients that fail are dropped; the rest
   * still receive it. Resolves to the number of successful deliveries.
   */
  async broadcast(message: string = RELOAD_MESSAGE): Promise<number> {
    const targets = [...this.clients];
    const results = await Promise.allSettled(targets.map((client) => client.send(message)));
    let delivered = 0;
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        delivered++;
        return;
      }
      this.clients.delete(targets[i]);
      this.logger?.warn({ err: result.reason }, 'Dropping live-reload client');
    });
    return delivered;
  }
}

/**
 * Wrap a `ws` socket as a {@link ReloadClient}.
 */
export function socketClient(socket: WebSocket): ReloadClient {
  return {
    send: (message) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error('WebSocket is not open'));
          return;
        }
        socket.send(message, (err) => (err ? reject(err) : resolve()));
      })
  };
}

export interface ReloadServerOptions {
  port: number;
  host?: string;
  logger?: Logger;
}

/**
 * Start a WebSocket server whose connections join `hub` until they close.
 */
export function startReloadServer(hub: LiveReloadHub, options: ReloadServerOptions): Promise<WebSocketServer> {
  return new Promise((resolve, reject) => {
    const wss = new WebSocketServer({ port: options.port, host: options.host });
    wss.on('connection', (socket) => {
      const client = socketClient(socket);
      hub.add(client);
      socket.on('close', () => hub.remove(client));
      socket.on('error', (err) => {
        options.logger?.debug({ err }, 'Live-reload socket error');
      });
    });
    wss.once('listening', () => resolve(wss));
    wss.once('error', reject);
  });
}

/**
 * Disconnect every client and close the server.
 */
export function closeReloadServer(wss: WebSocketServer): Promise<void> {
  for (const socket of wss.clients) socket.terminate();
  return new Promise((resolve, reject) => {
    wss.close((err) => (err ? reject(err) : resolve()));
  });
}
