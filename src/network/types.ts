/**
 * Web transport - Shared Type Definitions
 *
 * The request handler works on these plain shapes so it can be exercised
 * without a socket; `SlideshowServer` converts to and from `node:http`.
 */

// ---- Requests ----

/** Header names are lower-case, as `node:http` delivers them. */
export type HttpHeaders = Readonly<Record<string, string | string[] | undefined>>;

export interface HttpRequest {
  method: string;
  /** Path including any query string. */
  path: string;
  headers: HttpHeaders;
  body?: string;
}

// ---- Responses ----

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

export type RequestHandler = (request: HttpRequest) => Promise<HttpResponse>;

// ---- Payloads ----

export interface StatusPayload {
  current_index: number;
  total_images: number;
  is_paused: boolean;
  speed: number;
  repeat: boolean;
  shuffle: boolean;
  repeat_count: number;
  status_text: string;
}

export interface ConfigPayload {
  speed: number;
  repeat: boolean;
  shuffle: boolean;
  always_on_top: boolean;
  gallery: boolean;
}

export interface ImageEntry {
  /** Position in the session's playback order. */
  index: number;
  name: string;
  path: string;
}

export interface ActionEntry {
  name: string;
  description: string;
}

// ---- Session identity ----

export const SESSION_COOKIE = 'slideshow_session';
export const SESSION_HEADER = 'x-session-id';
