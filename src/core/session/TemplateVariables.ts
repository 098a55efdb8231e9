/**
 * Template variables describe the current item and playback state as strings.
 * They feed status lines, the web status endpoint and the environment of
 * external tools.
 */

import { STATUS_PRESETS } from '../../config/PlaybackConfig';
import type { SessionState } from './SessionState';

export const TEMPLATE_VARIABLE_DESCRIPTIONS = {
  img_idx: 'Current image index (1-based)',
  img_total: 'Total number of images',
  img_name: 'Image filename with extension',
  base_name: 'Image filename without extension',
  extension: 'File extension',
  img_path: 'Image path as given',
  full_path: 'Absolute image path',
  img_size: 'Image dimensions (WxH) when known',
  file_size: 'File size, human readable',
  file_bytes: 'File size in bytes',
  img_size_mb: 'File size in MB',
  speed: 'Current slideshow speed',
  paused: 'PAUSED when paused',
  repeat: 'REPEAT when repeat is on',
  repeat_count: 'Number of completed repeat cycles',
  always_on_top: 'TOP when always-on-top is on',
  shuffle: 'SHUFFLE when shuffle is on',
  progress_percent: 'Progress through the slideshow as a percentage',
} as const;

export type TemplateVariableName = keyof typeof TEMPLATE_VARIABLE_DESCRIPTIONS;

export type TemplateVariables = Record<TemplateVariableName, string>;

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/** Variables for the session's current item, or null when `order` is empty. */
export function computeTemplateVariables(session: SessionState): TemplateVariables | null {
  const item = session.currentItem();
  if (!item) return null;

  const total = session.order.length;
  const position = session.currentIndex + 1;
  const size = item.sizeBytes;

  return {
    img_idx: String(position),
    img_total: String(total),
    img_name: item.name,
    base_name: item.baseName,
    extension: item.extension,
    img_path: item.path,
    full_path: item.absolutePath,
    img_size: item.width !== undefined && item.height !== undefined ? `${item.width}x${item.height}` : 'N/A',
    file_size: size === undefined ? 'N/A' : formatFileSize(size),
    file_bytes: size === undefined ? 'N/A' : String(size),
    img_size_mb: size === undefined ? 'N/A' : (size / (1024 * 1024)).toFixed(2),
    speed: `${session.speed.toFixed(1)}s`,
    paused: session.paused ? 'PAUSED' : '',
    repeat: session.repeat ? 'REPEAT' : '',
    repeat_count: String(session.repeatCount),
    always_on_top: session.alwaysOnTop ? 'TOP' : '',
    shuffle: session.shuffle ? 'SHUFFLE' : '',
    progress_percent: String(Math.floor((position / total) * 100)),
  };
}

/** Replace every `{name}` with its value. Unknown placeholders are left as they are. */
export function formatTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? (vars[name] ?? match) : match
  );
}

/** Expand a `$1`..`$6` preset; anything else is returned unchanged. */
export function resolveStatusTemplate(format: string): string {
  return STATUS_PRESETS[format.trim()] ?? format;
}

/** The session's status line, or '' when there is no format or no current item. */
export function formatStatus(session: SessionState, format: string = session.statusFormat): string {
  if (!format) return '';
  const vars = computeTemplateVariables(session);
  if (!vars) return '';
  return formatTemplate(resolveStatusTemplate(format), vars);
}

/**
 * Environment handed to external tools: every variable upper-cased under a
 * `QSS_` prefix, plus the tool id and `QSS_IMG_INDEX` as an alias of the
 * 1-based position.
 */
export function toEnvironment(vars: TemplateVariables, toolId: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(vars)) {
    env[`QSS_${name.toUpperCase()}`] = value;
  }
  env.QSS_TOOL_ID = toolId;
  env.QSS_IMG_INDEX = vars.img_idx;
  return env;
}
