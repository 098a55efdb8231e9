/**
 * Centralized timing-related constants.
 *
 * Timeouts and sweep intervals used across the application.  Import from
 * here (or via `src/config`) rather than scattering magic numbers
 * throughout source files.
 */

/** External tools still running after this long (ms) are killed. */
export const TOOL_TIMEOUT_MS = 30_000;

/** Web sessions with no request for this long (ms) are evicted. */
export const SESSION_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

/** How often (ms) the server sweeps for idle sessions. */
export const SESSION_SWEEP_INTERVAL_MS = 60 * 1000;

/** A gesture episode with no event for this long (ms) is discarded. */
export const GESTURE_EPISODE_TIMEOUT_MS = 2000;
