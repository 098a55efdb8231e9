/**
 * SessionManager - owns every live session over one shared item sequence.
 *
 * Work on a session is funnelled through `run()`, which chains it onto that
 * session's promise queue. Two requests for the same session therefore
 * never interleave, while different sessions proceed independently.
 */

import { DEFAULT_GESTURE_THRESHOLDS, type GestureThresholds } from '../../config/InputConfig';
import { SESSION_IDLE_TIMEOUT_MS, SESSION_SWEEP_INTERVAL_MS } from '../../config/TimingConfig';
import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import { GestureDetector } from '../../utils/input/GestureDetector';
import { Logger } from '../../utils/Logger';
import { defaultRandom, identityOrder, shuffled, type RandomSource } from '../../utils/shuffle';
import { NotFoundError, SessionError, describeError } from '../errors';
import type { ManagerBase } from '../ManagerBase';
import type { ItemSequence } from '../sequence/ItemSequence';
import { SessionState, type SessionInit } from './SessionState';

const log = new Logger('SessionManager');

export type EvictionReason = 'idle' | 'explicit';

export interface SessionManagerEvents extends EventMap {
  sessionCreated: { id: string };
  sessionEvicted: { id: string; reason: EvictionReason };
}

export interface SessionManagerOptions {
  /** Initial state for every new session. */
  defaults?: SessionInit;
  gestureThresholds?: Partial<GestureThresholds>;
  idleTimeoutMs?: number;
  random?: RandomSource;
  clock?: () => number;
}

/** What a queued task gets to work with. */
export interface SessionHandle {
  state: SessionState;
  detector: GestureDetector;
}

interface SessionEntry extends SessionHandle {
  queue: Promise<void>;
}

export class SessionManager extends EventEmitter<SessionManagerEvents> implements ManagerBase {
  private sessions = new Map<string, SessionEntry>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private readonly defaults: SessionInit;
  private readonly thresholds: GestureThresholds;
  private readonly idleTimeoutMs: number;
  private readonly random: RandomSource;
  private readonly clock: () => number;

  constructor(
    readonly items: ItemSequence,
    options: SessionManagerOptions = {}
  ) {
    super();
    this.defaults = options.defaults ?? {};
    this.thresholds = { ...DEFAULT_GESTURE_THRESHOLDS, ...options.gestureThresholds };
    this.idleTimeoutMs = options.idleTimeoutMs ?? SESSION_IDLE_TIMEOUT_MS;
    this.random = options.random ?? defaultRandom;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Start a session. When shuffle or a shuffling repeat mode is configured,
   * the session gets its own random permutation.
   */
  create(id: string): SessionState {
    if (this.sessions.has(id)) {
      throw new SessionError(`Session ${id} already exists`);
    }
    const { defaults } = this;
    const shuffleOnStart = defaults.shuffle === true || (defaults.repeatMode ?? 'fixed') !== 'fixed';
    const order = shuffleOnStart ? shuffled(identityOrder(this.items.length), this.random) : undefined;

    const state = new SessionState(id, this.items, { ...defaults, ...(order ? { order } : {}) });
    state.touch(this.clock());
    this.sessions.set(id, {
      state,
      detector: new GestureDetector(this.thresholds),
      queue: Promise.resolve(),
    });
    log.info(`Created session ${id}`);
    this.emit('sessionCreated', { id });
    return state;
  }

  getOrCreate(id: string): SessionState {
    return this.sessions.get(id)?.state ?? this.create(id);
  }

  get(id: string): SessionState | undefined {
    return this.sessions.get(id)?.state;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /** The session's gesture detector; each session has its own. */
  detector(id: string): GestureDetector | undefined {
    return this.sessions.get(id)?.detector;
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }

  evict(id: string, reason: EvictionReason = 'explicit'): boolean {
    const entry = this.sessions.get(id);
    if (!entry) return false;
    this.sessions.delete(id);
    entry.state.history.dispose();
    log.info(`Evicted session ${id} (${reason})`);
    this.emit('sessionEvicted', { id, reason });
    return true;
  }

  touch(id: string): void {
    this.sessions.get(id)?.state.touch(this.clock());
  }

  /** Evict every session idle for longer than the timeout; returns their ids. */
  evictIdle(now: number = this.clock()): string[] {
    const stale = [...this.sessions.values()]
      .filter((entry) => now - entry.state.lastActivity > this.idleTimeoutMs)
      .map((entry) => entry.state.id);
    for (const id of stale) this.evict(id, 'idle');
    return stale;
  }

  /**
   * Run `task` once every earlier task on the same session has settled.
   * Rejects with NotFoundError for an unknown session. A task that throws
   * rejects its own promise only; later tasks still run.
   */
  run<T>(id: string, task: (session: SessionHandle) => T | Promise<T>): Promise<T> {
    const entry = this.sessions.get(id);
    if (!entry) {
      return Promise.reject(new NotFoundError('session', id));
    }
    entry.state.touch(this.clock());
    const handle: SessionHandle = { state: entry.state, detector: entry.detector };
    const result = entry.queue.then(() => task(handle));
    entry.queue = result.then(
      () => undefined,
      (err: unknown) => {
        log.debug(`Task on session ${id} failed:`, describeError(err));
      }
    );
    return result;
  }

  /** Sweep for idle sessions periodically until `dispose()`. */
  startIdleSweep(intervalMs: number = SESSION_SWEEP_INTERVAL_MS): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.evictIdle(), intervalMs);
    this.sweepTimer.unref();
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const entry of this.sessions.values()) {
      entry.state.history.dispose();
    }
    this.sessions.clear();
    this.removeAllListeners();
  }
}
