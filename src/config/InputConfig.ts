/**
 * Gesture recognition defaults.
 *
 * Distances are in the same units as the contact coordinates the host
 * delivers (CSS pixels for browsers); durations are milliseconds.
 */

import { GESTURE_EPISODE_TIMEOUT_MS } from './TimingConfig';

export interface GestureThresholds {
  /** Minimum travel along the dominant axis for a swipe. */
  swipeThreshold: number;
  /** Minimum change of the two-finger distance for a pinch. */
  pinchThreshold: number;
  /** Minimum hold time for a long press. */
  longPressMs: number;
  /** Maximum gap between two taps that still makes a double tap. */
  doubleTapMs: number;
  /** Idle time after which an unfinished episode is discarded. */
  episodeTimeoutMs: number;
}

export const DEFAULT_GESTURE_THRESHOLDS: Readonly<GestureThresholds> = {
  swipeThreshold: 50,
  pinchThreshold: 30,
  longPressMs: 500,
  doubleTapMs: 300,
  episodeTimeoutMs: GESTURE_EPISODE_TIMEOUT_MS,
};
