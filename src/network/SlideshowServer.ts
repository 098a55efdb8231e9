/**
 * SlideshowServer - binds a request handler to `node:http`.
 */

import * as http from 'node:http';
import type { ManagerBase } from '../core/ManagerBase';
import { describeError } from '../core/errors';
import { Logger } from '../utils/Logger';
import type { HttpRequest, RequestHandler } from './types';

const log = new Logger('SlideshowServer');

/** Request bodies beyond this size are rejected with 413. */
const MAX_BODY_BYTES = 1024 * 1024;

class BodyTooLargeError extends Error {}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BodyTooLargeError());
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

export class SlideshowServer implements ManagerBase {
  private server: http.Server | null = null;

  constructor(private readonly handler: RequestHandler) {}

  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(port: number, host: string): Promise<number> {
    if (this.server) return Promise.reject(new Error('Server is already listening'));
    const server = http.createServer((req, res) => {
      this.respond(req, res).catch((err: unknown) => {
        log.error('Failed to write response:', err);
        res.destroy();
      });
    });
    this.server = server;
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once('error', onError);
      server.listen(port, host, () => {
        server.off('error', onError);
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        log.info(`Listening on http://${host}:${bound}`);
        resolve(bound);
      });
    });
  }

  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  dispose(): void {
    this.close().catch((err: unknown) => log.warn('Error while closing server:', err));
  }

  private async respond(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    let request: HttpRequest;
    try {
      request = {
        method: req.method ?? 'GET',
        path: req.url ?? '/',
        headers: req.headers,
        body: await readBody(req),
      };
    } catch (err) {
      const status = err instanceof BodyTooLargeError ? 413 : 400;
      res.writeHead(status, { 'content-type': 'application/json' });
      res.end(JSON.stringify({ error: status === 413 ? 'Request body too large' : describeError(err) }));
      return;
    }

    try {
      const response = await this.handler(request);
      res.writeHead(response.status, response.headers);
      res.end(response.body);
      log.debug(`${request.method} ${request.path} -> ${response.status}`);
    } catch (err) {
      log.error(`${request.method} ${request.path} failed:`, err);
      res.writeHead(500, { 'content-type': 'application/json' });
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  }
}
