/**
 * PlaybackTimer - auto-advance for the desktop client.
 *
 * Each tick waits the session's current speed, then moves to the next item
 * through the dispatcher with `record: false`, so automatic advances never
 * crowd manual actions out of the undo history. A paused or empty session,
 * or one sitting on its last item without repeat, is left where it is and
 * the timer simply waits for the next tick.
 */

import type { SessionManager } from '../core/session/SessionManager';
import type { ManagerBase } from '../core/ManagerBase';
import type { ActionDispatcher, DispatchResult } from '../services/ActionDispatcher';
import { EventEmitter, type EventMap } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';

const log = new Logger('PlaybackTimer');

export interface PlaybackTimerEvents extends EventMap {
  advanced: DispatchResult;
  failed: unknown;
}

export interface PlaybackTimerDeps {
  sessionId: string;
  sessions: SessionManager;
  dispatcher: ActionDispatcher;
}

export class PlaybackTimer extends EventEmitter<PlaybackTimerEvents> implements ManagerBase {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private _running = false;

  constructor(private readonly deps: PlaybackTimerDeps) {
    super();
  }

  get running(): boolean {
    return this._running;
  }

  start(): void {
    if (this._running) return;
    this._running = true;
    this.schedule();
  }

  stop(): void {
    this._running = false;
    this.clear();
  }

  /** Restart the countdown, e.g. after the user moved manually. */
  reset(): void {
    if (!this._running) return;
    this.schedule();
  }

  dispose(): void {
    this.stop();
    this.removeAllListeners();
  }

  private clear(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(): void {
    this.clear();
    const session = this.deps.sessions.get(this.deps.sessionId);
    if (!session) {
      log.warn(`Session ${this.deps.sessionId} is gone, stopping`);
      this.stop();
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((err: unknown) => {
        this.stop();
        this.emit('failed', err);
      });
    }, session.speed * 1000);
  }

  private async tick(): Promise<void> {
    const session = this.deps.sessions.get(this.deps.sessionId);
    if (!session) {
      this.stop();
      return;
    }
    const empty = session.order.length === 0;
    const atEnd = session.currentIndex >= session.order.length - 1;
    if (!session.paused && !empty && !(atEnd && !session.repeat)) {
      const result = await this.deps.dispatcher.dispatch(this.deps.sessionId, 'navigate_next', {}, { record: false });
      this.emit('advanced', result);
    }
    if (this._running && this.timer === null) this.schedule();
  }
}
