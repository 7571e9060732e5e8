/**
 * HTTP surface sharing the relay's port: version endpoint, the static_request
 * hook, a status page and a 404 fallback. WebSocket upgrades never reach it.
 */

import type http from 'node:http';
import type { CallbackRegistry, StaticResponse } from '../callbacks/registry.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';

const log = createLogger('http');

export interface HttpHandlerConfig {
  callbacks: CallbackRegistry;
  version: string;
  staticDir?: string;
  /** Live status for the index page */
  status?: () => { clients: number; servers: number };
}

function page(title: string, body: string): string {
  return `<!doctype html><html><head><meta charset="utf-8"><title>${title}</title></head><body>${body}</body></html>`;
}

function send(res: http.ServerResponse, status: number, contentType: string, content: string | Buffer): void {
  res.writeHead(status, { 'Content-Type': contentType });
  res.end(content);
}

export function createHttpHandler(config: HttpHandlerConfig): http.RequestListener {
  async function route(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      send(res, 405, 'application/json', JSON.stringify({ error: 'Method not allowed' }));
      return;
    }

    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (path === '/api/version') {
      send(res, 200, 'application/json', JSON.stringify({ version: config.version }));
      return;
    }

    const file: StaticResponse | undefined = await config.callbacks.resolve('static_request')(path, config.staticDir);
    if (file) {
      send(res, file.status ?? 200, file.contentType, file.content);
      return;
    }

    if (path === '/') {
      const status = config.status?.();
      const detail = status ? `<p>${status.servers} servers, ${status.clients} clients connected</p>` : '';
      send(res, 200, 'text/html; charset=utf-8', page('Presence Relay', `<h1>Presence Relay</h1><p>v${config.version}</p>${detail}`));
      return;
    }

    send(res, 404, 'text/html; charset=utf-8', page('Not Found', '<h1>404 Not Found</h1>'));
  }

  return (req, res) => {
    route(req, res).catch((err) => {
      log.error(`${req.method} ${req.url}: ${errorMessage(err)}`);
      if (!res.headersSent) send(res, 500, 'application/json', JSON.stringify({ error: 'Internal server error' }));
      else res.end();
    });
  };
}
