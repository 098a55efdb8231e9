/**
 * Centralized playback-related constants.
 *
 * Speed bounds, the speed step used by the speed actions, and the
 * default undo depth of a session.
 */

/** Slowest allowed auto-advance interval, in seconds. */
export const MAX_SPEED_SECONDS = 60.0;

/** Fastest allowed auto-advance interval, in seconds. */
export const MIN_SPEED_SECONDS = 0.5;

/** Interval used when neither configuration nor CLI provides one. */
export const DEFAULT_SPEED_SECONDS = 3.0;

/** Amount added or removed by `increase_speed` / `decrease_speed`. */
export const SPEED_STEP_SECONDS = 1.0;

/** Number of undoable actions kept per session before the oldest is dropped. */
export const DEFAULT_HISTORY_CAPACITY = 50;

/** Clamp a speed value into the allowed range. */
export function clampSpeed(seconds: number): number {
  return Math.min(MAX_SPEED_SECONDS, Math.max(MIN_SPEED_SECONDS, seconds));
}

/**
 * Built-in status line templates, selected with `$1`..`$6`.
 * Any other value is used as a literal template.
 */
export const STATUS_PRESETS: Readonly<Record<string, string>> = {
  $1: 'Media {img_idx}/{img_total} {progress_percent}%',
  $2: 'Media {img_idx}/{img_total} (r:{repeat_count})',
  $3: '{img_idx}/{img_total}: {progress_percent}% {full_path}',
  $4: 'Media {img_path} ({img_size_mb}mb): {img_idx}/{img_total}',
  $5: '{base_name}{extension} - {img_size} ({file_size}) - {speed}',
  $6: '{full_path} | {progress_percent}% complete',
};
