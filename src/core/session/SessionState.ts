/**
 * SessionState - one client's private playback state over the shared sequence.
 *
 * State is never mutated field by field. Callers build a change set and hand
 * it to `apply()`, which validates the merged result against the invariants
 * and then commits it in one synchronous step, so a reader never observes a
 * half-applied update.
 */

import { InvariantError } from '../errors';
import { DEFAULT_HISTORY_CAPACITY, DEFAULT_SPEED_SECONDS, MAX_SPEED_SECONDS, MIN_SPEED_SECONDS } from '../../config/PlaybackConfig';
import { identityOrder } from '../../utils/shuffle';
import type { Item, ItemSequence } from '../sequence/ItemSequence';
import { ActionHistory } from './ActionHistory';

export type RepeatMode = 'fixed' | 'shuffle' | 'shuffle-each';

export interface SessionSnapshot {
  /** Positions into the item sequence, in playback order. */
  order: readonly number[];
  currentIndex: number;
  speed: number;
  paused: boolean;
  repeat: boolean;
  shuffle: boolean;
  alwaysOnTop: boolean;
  repeatCount: number;
  fullscreen: boolean;
  galleryMode: boolean;
  repeatMode: RepeatMode;
  statusFormat: string;
}

export type SessionChanges = Partial<SessionSnapshot>;

export interface SessionInit extends SessionChanges {
  historyCapacity?: number;
}

function validate(next: SessionSnapshot, total: number): void {
  const seen = new Set<number>();
  for (const idx of next.order) {
    if (!Number.isInteger(idx) || idx < 0 || idx >= total) {
      throw new InvariantError(`order entry ${idx} outside [0, ${total})`);
    }
    if (seen.has(idx)) {
      throw new InvariantError(`order entry ${idx} appears twice`);
    }
    seen.add(idx);
  }
  const len = next.order.length;
  const indexOk = len === 0 ? next.currentIndex === 0 : next.currentIndex >= 0 && next.currentIndex < len;
  if (!Number.isInteger(next.currentIndex) || !indexOk) {
    throw new InvariantError(`currentIndex ${next.currentIndex} outside order of length ${len}`);
  }
  if (!Number.isFinite(next.speed) || next.speed < MIN_SPEED_SECONDS || next.speed > MAX_SPEED_SECONDS) {
    throw new InvariantError(`speed ${next.speed} outside [${MIN_SPEED_SECONDS}, ${MAX_SPEED_SECONDS}]`);
  }
  if (!Number.isInteger(next.repeatCount) || next.repeatCount < 0) {
    throw new InvariantError(`repeatCount ${next.repeatCount} is not a non-negative integer`);
  }
}

export class SessionState {
  readonly history: ActionHistory;
  private state: SessionSnapshot;
  private _lastActivity: number;

  constructor(
    readonly id: string,
    readonly items: ItemSequence,
    init: SessionInit = {}
  ) {
    const { historyCapacity, ...changes } = init;
    this.history = new ActionHistory(historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    const initial: SessionSnapshot = {
      order: identityOrder(items.length),
      currentIndex: 0,
      speed: DEFAULT_SPEED_SECONDS,
      paused: false,
      repeat: false,
      shuffle: false,
      alwaysOnTop: false,
      repeatCount: 0,
      fullscreen: false,
      galleryMode: false,
      repeatMode: 'fixed',
      statusFormat: '',
    };
    const merged = { ...initial, ...changes };
    validate(merged, items.length);
    this.state = { ...merged, order: Object.freeze([...merged.order]) };
    this._lastActivity = Date.now();
  }

  get order(): readonly number[] {
    return this.state.order;
  }
  get currentIndex(): number {
    return this.state.currentIndex;
  }
  get speed(): number {
    return this.state.speed;
  }
  get paused(): boolean {
    return this.state.paused;
  }
  get repeat(): boolean {
    return this.state.repeat;
  }
  get shuffle(): boolean {
    return this.state.shuffle;
  }
  get alwaysOnTop(): boolean {
    return this.state.alwaysOnTop;
  }
  get repeatCount(): number {
    return this.state.repeatCount;
  }
  get fullscreen(): boolean {
    return this.state.fullscreen;
  }
  get galleryMode(): boolean {
    return this.state.galleryMode;
  }
  get repeatMode(): RepeatMode {
    return this.state.repeatMode;
  }
  get statusFormat(): string {
    return this.state.statusFormat;
  }
  get lastActivity(): number {
    return this._lastActivity;
  }

  /** Position in the item sequence of the current item, or null when `order` is empty. */
  currentItemIndex(): number | null {
    return this.state.order[this.state.currentIndex] ?? null;
  }

  currentItem(): Readonly<Item> | null {
    const idx = this.currentItemIndex();
    return idx === null ? null : (this.items[idx] ?? null);
  }

  /** A detached copy of the whole state. */
  snapshot(): SessionSnapshot {
    return { ...this.state, order: [...this.state.order] };
  }

  /**
   * Validate and commit a change set. Throws `InvariantError` (and commits
   * nothing) if the merged state would break an invariant.
   */
  apply(changes: SessionChanges): void {
    const next: SessionSnapshot = { ...this.state, ...changes };
    validate(next, this.items.length);
    this.state = { ...next, order: Object.freeze([...next.order]) };
  }

  touch(now: number = Date.now()): void {
    this._lastActivity = now;
  }
}
