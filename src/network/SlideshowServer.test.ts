/**
 * SlideshowServer tests - loopback only, on an ephemeral port.
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as http from 'node:http';
import { SlideshowServer } from './SlideshowServer';
import type { HttpRequest } from './types';

function request(
  port: number,
  method: string,
  path: string,
  body?: string
): Promise<{ status: number; headers: http.IncomingHttpHeaders; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.request({ host: '127.0.0.1', port, method, path }, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('end', () =>
        resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString() })
      );
    });
    req.on('error', reject);
    req.end(body);
  });
}

describe('SlideshowServer', () => {
  let server: SlideshowServer | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it('SRV-001: hands requests to the handler and writes its response', async () => {
    const seen: HttpRequest[] = [];
    server = new SlideshowServer(async (req) => {
      seen.push(req);
      return { status: 201, headers: { 'content-type': 'text/plain', 'x-test': 'yes' }, body: 'created' };
    });
    const port = await server.listen(0, '127.0.0.1');
    expect(server.listening).toBe(true);

    const response = await request(port, 'POST', '/api/control?x=1', '{"action":"navigate_next"}');
    expect(response.status).toBe(201);
    expect(response.headers['x-test']).toBe('yes');
    expect(response.body).toBe('created');
    expect(seen).toHaveLength(1);
    expect(seen[0]?.method).toBe('POST');
    expect(seen[0]?.path).toBe('/api/control?x=1');
    expect(seen[0]?.body).toBe('{"action":"navigate_next"}');
  });

  it('SRV-002: a throwing handler becomes a 500', async () => {
    server = new SlideshowServer(async () => {
      throw new Error('boom');
    });
    const port = await server.listen(0, '127.0.0.1');
    const response = await request(port, 'GET', '/api/status');
    expect(response.status).toBe(500);
    expect(JSON.parse(response.body)).toEqual({ error: 'Internal server error' });
  });

  it('SRV-003: refuses to listen twice and closes cleanly', async () => {
    server = new SlideshowServer(async () => ({ status: 204, headers: {}, body: '' }));
    await server.listen(0, '127.0.0.1');
    await expect(server.listen(0, '127.0.0.1')).rejects.toThrow('Server is already listening');
    await server.close();
    expect(server.listening).toBe(false);
  });
});
