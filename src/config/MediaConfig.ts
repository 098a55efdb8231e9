/**
 * File types picked up by item discovery and external tool discovery.
 */

/** Image extensions recognized by discovery (compared case-insensitively). */
export const DEFAULT_IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.bmp',
  '.tiff',
  '.tif',
  '.webp',
  '.ico',
  '.svg',
];

/** Extensions treated as runnable even without the executable bit. */
export const SCRIPT_EXTENSIONS: readonly string[] = [
  '.sh',
  '.py',
  '.bat',
  '.cmd',
  '.exe',
  '.ps1',
  '.rb',
  '.pl',
];

/** Content types served by the web transport, keyed by lower-cased extension. */
export const IMAGE_CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.tiff': 'image/tiff',
  '.tif': 'image/tiff',
  '.webp': 'image/webp',
  '.ico': 'image/x-icon',
  '.svg': 'image/svg+xml',
};
