/**
 * GestureDetector - classifies raw touch and mouse input into gestures.
 *
 * An episode runs from the first contact until the last point lifts. Each
 * episode yields at most one gesture; a single tap is held back until the
 * next tap decides whether it was a double tap.
 *
 * Two-finger distance math follows the pinch handling of the viewer's
 * pointer interaction: Euclidean distance between the first two contacts,
 * compared with the distance when the pair went down.
 */

import { DEFAULT_GESTURE_THRESHOLDS, type GestureThresholds } from '../../config/InputConfig';
import { Logger } from '../Logger';

const log = new Logger('GestureDetector');

export interface ContactPoint {
  x: number;
  y: number;
  id?: number;
}

export type GestureEventType = 'start' | 'move' | 'end';

export type MouseEventType = 'down' | 'move' | 'up';

export type GestureName =
  | 'swipe-left'
  | 'swipe-right'
  | 'swipe-up'
  | 'swipe-down'
  | 'double-tap'
  | 'long-press'
  | 'pinch-in'
  | 'pinch-out'
  | 'two-finger-swipe-left'
  | 'two-finger-swipe-right'
  | 'two-finger-swipe-up'
  | 'two-finger-swipe-down'
  | 'three-finger-tap';

export type DetectorState = 'idle' | 'touch' | 'multi-touch';

interface Episode {
  startTime: number;
  lastTime: number;
  startPoints: ContactPoint[];
  points: ContactPoint[];
  maxPoints: number;
  resolved: boolean;
}

/** Mouse presses are tracked as this single contact. */
export const MOUSE_POINT_ID = 0;

function distance(a: ContactPoint, b: ContactPoint): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export class GestureDetector {
  readonly thresholds: Readonly<GestureThresholds>;
  private episode: Episode | null = null;
  private lastTapTime: number | null = null;

  constructor(thresholds: Partial<GestureThresholds> = {}) {
    this.thresholds = { ...DEFAULT_GESTURE_THRESHOLDS, ...thresholds };
  }

  get state(): DetectorState {
    if (!this.episode) return 'idle';
    return this.episode.points.length > 1 ? 'multi-touch' : 'touch';
  }

  /**
   * Feed one event. `points` are the contacts currently down: for `end`,
   * the ones that remain after the lift.
   */
  process(type: GestureEventType, points: readonly ContactPoint[], timestamp: number): GestureName | null {
    this.expire(timestamp);
    switch (type) {
      case 'start':
        return this.onStart(points, timestamp);
      case 'move':
        return this.onMove(points, timestamp);
      case 'end':
        return this.onEnd(points, timestamp);
    }
  }

  /** Mouse input as one synthetic contact. `up` records the release position before ending. */
  processMouse(type: MouseEventType, x: number, y: number, timestamp: number): GestureName | null {
    const point: ContactPoint = { x, y, id: MOUSE_POINT_ID };
    switch (type) {
      case 'down':
        return this.process('start', [point], timestamp);
      case 'move':
        return this.process('move', [point], timestamp);
      case 'up': {
        const moved = this.process('move', [point], timestamp);
        const ended = this.process('end', [], timestamp);
        return moved ?? ended;
      }
    }
  }

  /** Drop an episode that has been idle longer than the episode timeout. */
  expire(now: number): boolean {
    if (!this.episode || now - this.episode.lastTime <= this.thresholds.episodeTimeoutMs) {
      return false;
    }
    log.debug('Discarding stale gesture episode');
    this.episode = null;
    return true;
  }

  reset(): void {
    this.episode = null;
    this.lastTapTime = null;
  }

  private onStart(points: readonly ContactPoint[], timestamp: number): GestureName | null {
    if (points.length === 0) return null;
    const snapshot = points.map((p) => ({ ...p }));

    if (points.length === 3) {
      // a three-finger tap closes the episode on the spot
      const alreadyResolved = this.episode?.resolved ?? false;
      this.episode = null;
      return alreadyResolved ? null : 'three-finger-tap';
    }

    const episode = this.episode;
    if (!episode) {
      this.episode = {
        startTime: timestamp,
        lastTime: timestamp,
        startPoints: snapshot,
        points: snapshot,
        maxPoints: points.length,
        resolved: false,
      };
      return null;
    }

    // another finger joined: new baseline for two-finger measurements
    episode.lastTime = timestamp;
    episode.maxPoints = Math.max(episode.maxPoints, points.length);
    episode.startPoints = snapshot;
    episode.points = snapshot;
    return null;
  }

  private onMove(points: readonly ContactPoint[], timestamp: number): GestureName | null {
    const episode = this.episode;
    if (!episode || points.length === 0) return null;
    episode.lastTime = timestamp;
    episode.points = points.map((p) => ({ ...p }));

    if (episode.resolved || points.length !== 2 || episode.startPoints.length !== 2) return null;
    const gesture = this.classifyTwoFinger(episode.startPoints, points);
    if (gesture) episode.resolved = true;
    return gesture;
  }

  private onEnd(points: readonly ContactPoint[], timestamp: number): GestureName | null {
    const episode = this.episode;
    if (!episode) return null;
    episode.lastTime = timestamp;
    if (points.length > 0) {
      episode.points = points.map((p) => ({ ...p }));
      return null;
    }

    this.episode = null;
    if (episode.resolved || episode.maxPoints !== 1) return null;
    return this.classifySingle(episode, timestamp);
  }

  private classifyTwoFinger(start: readonly ContactPoint[], current: readonly ContactPoint[]): GestureName | null {
    const [s0, s1] = start;
    const [c0, c1] = current;
    if (!s0 || !s1 || !c0 || !c1) return null;

    const { pinchThreshold, swipeThreshold } = this.thresholds;
    const startDistance = distance(s0, s1);
    const currentDistance = distance(c0, c1);
    if (Math.abs(currentDistance - startDistance) > pinchThreshold) {
      return currentDistance > startDistance ? 'pinch-out' : 'pinch-in';
    }

    const dx = (c0.x - s0.x + (c1.x - s1.x)) / 2;
    const dy = (c0.y - s0.y + (c1.y - s1.y)) / 2;
    if (Math.abs(dx) > swipeThreshold && Math.abs(dx) > Math.abs(dy)) {
      return dx > 0 ? 'two-finger-swipe-right' : 'two-finger-swipe-left';
    }
    if (Math.abs(dy) > swipeThreshold && Math.abs(dy) >= Math.abs(dx)) {
      return dy > 0 ? 'two-finger-swipe-down' : 'two-finger-swipe-up';
    }
    return null;
  }

  private classifySingle(episode: Episode, timestamp: number): GestureName | null {
    const start = episode.startPoints[0];
    const end = episode.points[0];
    if (!start || !end) return null;

    const { swipeThreshold, longPressMs, doubleTapMs } = this.thresholds;
    const dx = end.x - start.x;
    const dy = end.y - start.y;
    const horizontal = Math.abs(dx) >= Math.abs(dy);
    const travel = Math.max(Math.abs(dx), Math.abs(dy));
    const elapsed = timestamp - episode.startTime;

    if (elapsed > longPressMs && travel <= swipeThreshold) {
      return 'long-press';
    }
    if (travel > swipeThreshold) {
      if (horizontal) return dx > 0 ? 'swipe-right' : 'swipe-left';
      return dy > 0 ? 'swipe-down' : 'swipe-up';
    }

    if (this.lastTapTime !== null && timestamp - this.lastTapTime < doubleTapMs) {
      this.lastTapTime = null;
      return 'double-tap';
    }
    this.lastTapTime = timestamp;
    return null;
  }
}

/** One raw input event as a client reports it. */
export type GestureSample =
  | { kind: 'touch'; type: GestureEventType; points: ContactPoint[]; timestamp?: number }
  | { kind: 'mouse'; type: MouseEventType; x: number; y: number; timestamp?: number };

const TOUCH_TYPES: Readonly<Record<string, GestureEventType>> = {
  start: 'start',
  move: 'move',
  end: 'end',
  touchstart: 'start',
  touchmove: 'move',
  touchend: 'end',
  touchcancel: 'end',
};

const MOUSE_TYPES: Readonly<Record<string, MouseEventType>> = {
  mousedown: 'down',
  mousemove: 'move',
  mouseup: 'up',
};

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function parseContactPoint(value: unknown): ContactPoint | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('x' in value) || !isFiniteNumber(value.x) || !('y' in value) || !isFiniteNumber(value.y)) return null;
  const point: ContactPoint = { x: value.x, y: value.y };
  if ('id' in value && isFiniteNumber(value.id)) point.id = value.id;
  return point;
}

/**
 * Validate a client payload: `{ type: 'touchstart', touches: [{x, y, id}] }`
 * (`points` is accepted for `touches`) or `{ type: 'mousedown', x, y }`,
 * each with an optional millisecond `timestamp`.
 */
export function parseGestureSample(payload: unknown): GestureSample | null {
  if (typeof payload !== 'object' || payload === null) return null;
  if (!('type' in payload) || typeof payload.type !== 'string') return null;
  const timestamp = 'timestamp' in payload && isFiniteNumber(payload.timestamp) ? payload.timestamp : undefined;

  const mouseType = MOUSE_TYPES[payload.type];
  if (mouseType) {
    if (!('x' in payload) || !isFiniteNumber(payload.x) || !('y' in payload) || !isFiniteNumber(payload.y)) {
      return null;
    }
    return { kind: 'mouse', type: mouseType, x: payload.x, y: payload.y, timestamp };
  }

  const touchType = TOUCH_TYPES[payload.type];
  if (!touchType) return null;
  const raw = 'touches' in payload ? payload.touches : 'points' in payload ? payload.points : [];
  if (!Array.isArray(raw)) return null;
  const points: ContactPoint[] = [];
  for (const entry of raw) {
    const point = parseContactPoint(entry);
    if (!point) return null;
    points.push(point);
  }
  return { kind: 'touch', type: touchType, points, timestamp };
}
