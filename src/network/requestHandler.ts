/**
 * HTTP request handling for the web transport.
 *
 * Each request is tied to a session through the `slideshow_session` cookie
 * or the `x-session-id` header. A cookie must name a session the server
 * minted through `POST /api/session`; a header id is taken as given and
 * creates the session on first use.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { ActionParams } from '../actions/Action';
import type { ActionRegistry } from '../actions/ActionRegistry';
import { IMAGE_CONTENT_TYPES } from '../config/MediaConfig';
import type { SessionManager } from '../core/session/SessionManager';
import type { SessionState } from '../core/session/SessionState';
import { formatStatus } from '../core/session/TemplateVariables';
import type { ActionDispatcher, DispatchResult } from '../services/ActionDispatcher';
import { parseGestureSample } from '../utils/input/GestureDetector';
import { Logger } from '../utils/Logger';
import {
  SESSION_COOKIE,
  SESSION_HEADER,
  type ActionEntry,
  type ConfigPayload,
  type HttpHeaders,
  type HttpRequest,
  type HttpResponse,
  type ImageEntry,
  type RequestHandler,
  type StatusPayload,
} from './types';

const log = new Logger('RequestHandler');

export interface RequestHandlerDeps {
  dispatcher: ActionDispatcher;
  sessions: SessionManager;
  registry: ActionRegistry;
  galleryEnabled?: boolean;
  readFile?: (file: string) => Promise<Buffer>;
  generateId?: () => string;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function json(status: number, body: unknown, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

function fail(status: number, error: string): HttpResponse {
  return json(status, { error });
}

function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Value of one cookie from a `Cookie` header. */
export function readCookie(header: string | undefined, name: string): string | null {
  if (!header) return null;
  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    if (part.slice(0, eq).trim() === name) {
      const value = part.slice(eq + 1).trim();
      return value === '' ? null : value;
    }
  }
  return null;
}

/** Flatten a dispatch result into the JSON body the browser client reads. */
export function toResponseBody(result: DispatchResult): JsonObject {
  switch (result.status) {
    case 'ok':
      return { success: true, action: result.action, ...result.result };
    case 'error':
      return { success: false, action: result.action, ...result.result, error: result.error };
    case 'no-action':
      return { success: false, reason: result.reason };
  }
}

function statusOf(session: SessionState): StatusPayload {
  return {
    current_index: session.currentIndex,
    total_images: session.order.length,
    is_paused: session.paused,
    speed: session.speed,
    repeat: session.repeat,
    shuffle: session.shuffle,
    repeat_count: session.repeatCount,
    status_text: formatStatus(session),
  };
}

export function createRequestHandler(deps: RequestHandlerDeps): RequestHandler {
  const { dispatcher, sessions, registry } = deps;
  const readFile = deps.readFile ?? ((file: string) => fs.readFile(file));
  const generateId = deps.generateId ?? randomUUID;

  function resolveSession(headers: HttpHeaders): SessionState | null {
    const cookieId = readCookie(headerValue(headers, 'cookie'), SESSION_COOKIE);
    if (cookieId !== null) return sessions.get(cookieId) ?? null;
    const headerId = headerValue(headers, SESSION_HEADER)?.trim();
    if (headerId) return sessions.getOrCreate(headerId);
    return null;
  }

  function parseBody(body: string | undefined): { ok: true; value: JsonObject } | { ok: false; response: HttpResponse } {
    if (!body || body.trim() === '') return { ok: false, response: fail(400, 'No data') };
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return { ok: false, response: fail(400, 'Invalid JSON') };
    }
    if (!isRecord(parsed)) return { ok: false, response: fail(400, 'Expected a JSON object') };
    return { ok: true, value: parsed };
  }

  async function serveImage(session: SessionState, segment: string): Promise<HttpResponse> {
    if (!/^\d+$/.test(segment)) return fail(400, 'Invalid request');
    const position = Number(segment);
    const itemIndex = session.order[position];
    const item = itemIndex === undefined ? undefined : session.items[itemIndex];
    if (!item) return fail(404, 'Invalid image index');

    let data: Buffer;
    try {
      data = await readFile(item.absolutePath);
    } catch (err) {
      log.warn(`Cannot read ${item.absolutePath}:`, err);
      return fail(404, 'Image not found');
    }
    return {
      status: 200,
      headers: {
        'content-type': IMAGE_CONTENT_TYPES[path.extname(item.name).toLowerCase()] ?? 'application/octet-stream',
        'cache-control': 'max-age=3600',
      },
      body: data,
    };
  }

  async function post(session: SessionState, route: string, body: JsonObject): Promise<HttpResponse | null> {
    switch (route) {
      case '/api/control': {
        const action = body.action;
        if (typeof action !== 'string' || action === '') return fail(400, 'Missing action');
        const params: ActionParams = isRecord(body.params) ? body.params : {};
        return json(200, toResponseBody(await dispatcher.dispatch(session.id, action, params)));
      }
      case '/api/key':
        return json(200, toResponseBody(await dispatcher.handleKeyPayload(session.id, body)));
      case '/api/gesture': {
        if (typeof body.gesture === 'string') {
          return json(200, toResponseBody(await dispatcher.handleGestureName(session.id, body.gesture)));
        }
        const sample = parseGestureSample(body);
        if (!sample) return fail(400, 'Invalid gesture payload');
        return json(200, toResponseBody(await dispatcher.handleGesture(session.id, sample)));
      }
      default:
        return null;
    }
  }

  return async (request: HttpRequest): Promise<HttpResponse> => {
    const route = new URL(request.path, 'http://localhost').pathname;
    const method = request.method.toUpperCase();

    if (method === 'POST' && route === '/api/session') {
      const id = generateId();
      sessions.create(id);
      return json(200, { session_id: id }, { 'set-cookie': `${SESSION_COOKIE}=${id}; Path=/; HttpOnly` });
    }

    if (!route.startsWith('/api/')) return fail(404, 'Not Found');

    const session = resolveSession(request.headers);
    if (!session) return fail(401, 'No session');

    if (method === 'GET') {
      if (route === '/api/status') return json(200, statusOf(session));
      if (route === '/api/images') {
        const images: ImageEntry[] = [];
        session.order.forEach((itemIndex, index) => {
          const item = session.items[itemIndex];
          if (item) images.push({ index, name: item.name, path: item.path });
        });
        return json(200, { images });
      }
      if (route.startsWith('/api/image/')) return serveImage(session, route.slice('/api/image/'.length));
      if (route === '/api/config') {
        const config: ConfigPayload = {
          speed: session.speed,
          repeat: session.repeat,
          shuffle: session.shuffle,
          always_on_top: session.alwaysOnTop,
          gallery: deps.galleryEnabled ?? false,
        };
        return json(200, config);
      }
      if (route === '/api/actions') {
        const actions: ActionEntry[] = registry
          .list(dispatcher.context)
          .map(({ name, description }) => ({ name, description }));
        return json(200, { actions });
      }
      return fail(404, 'Not Found');
    }

    if (method === 'POST') {
      const parsed = parseBody(request.body);
      if (!parsed.ok) return parsed.response;
      return (await post(session, route, parsed.value)) ?? fail(404, 'Not Found');
    }

    return fail(404, 'Not Found');
  };
}
