/**
 * ActionHistory - per-session undo/redo tracking
 *
 * Keeps the most recent reversible actions together with the inverse
 * computed when each one ran. Recording a new action clears the redo stack.
 */

import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import type { ManagerBase } from '../ManagerBase';
import {
  failure,
  isReversible,
  success,
  type Action,
  type ActionOutcome,
  type ActionParams,
} from '../../actions/Action';
import { runAction } from '../../actions/runAction';
import type { SessionState } from './SessionState';

export interface HistoryEntry {
  id: number;
  action: Action;
  params: ActionParams;
  /** Action that reverts this entry, or null when it cannot be undone. */
  inverse: Action | null;
  timestamp: number;
}

export interface HistoryInfo {
  history_count: number;
  redo_count: number;
  max_history: number;
  can_undo: boolean;
  can_redo: boolean;
  last_action: string | null;
  next_redo: string | null;
}

export interface HistoryEvents extends EventMap {
  historyChanged: HistoryInfo;
}

export class ActionHistory extends EventEmitter<HistoryEvents> implements ManagerBase {
  private entries: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];
  private nextId = 0;

  constructor(private readonly maxLength: number) {
    super();
  }

  get capacity(): number {
    return this.maxLength;
  }

  /**
   * Run an action against the session and, if it succeeds, record it with
   * the inverse computed from the state just before it ran.
   */
  async executeAndRecord(
    action: Action,
    session: SessionState,
    params: ActionParams = {}
  ): Promise<ActionOutcome> {
    const before = session.snapshot();
    const outcome = await runAction(action, session, params);
    if (!outcome.ok) return outcome;

    const inverse = isReversible(action) ? action.inverse(before, params, outcome.result) : null;
    this.push({ id: this.nextId++, action, params, inverse, timestamp: Date.now() });
    this.redoStack = [];
    this.emit('historyChanged', this.info());
    return outcome;
  }

  /** Revert the most recent entry. */
  async undo(session: SessionState): Promise<ActionOutcome> {
    const entry = this.entries.pop();
    if (!entry) return failure('Nothing to undo');

    if (!entry.inverse) {
      // an entry without an inverse is dropped, matching a non-undoable step
      this.emit('historyChanged', this.info());
      return failure(`Action '${entry.action.name}' cannot be undone`);
    }

    const outcome = await runAction(entry.inverse, session);
    if (!outcome.ok) {
      this.entries.push(entry);
      return outcome;
    }
    this.redoStack.push(entry);
    this.emit('historyChanged', this.info());
    return success({ ...outcome.result, undone: entry.action.name });
  }

  /** Re-apply the most recently undone entry. */
  async redo(session: SessionState): Promise<ActionOutcome> {
    const entry = this.redoStack.pop();
    if (!entry) return failure('Nothing to redo');

    const before = session.snapshot();
    const outcome = await runAction(entry.action, session, entry.params);
    if (!outcome.ok) {
      this.redoStack.push(entry);
      return outcome;
    }
    const inverse = isReversible(entry.action)
      ? entry.action.inverse(before, entry.params, outcome.result)
      : null;
    this.push({ ...entry, inverse, timestamp: Date.now() });
    this.emit('historyChanged', this.info());
    return success({ ...outcome.result, redone: entry.action.name });
  }

  canUndo(): boolean {
    return this.entries.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  info(): HistoryInfo {
    return {
      history_count: this.entries.length,
      redo_count: this.redoStack.length,
      max_history: this.maxLength,
      can_undo: this.canUndo(),
      can_redo: this.canRedo(),
      last_action: this.entries[this.entries.length - 1]?.action.name ?? null,
      next_redo: this.redoStack[this.redoStack.length - 1]?.action.name ?? null,
    };
  }

  /** Names of the most recent actions, newest first. */
  recent(count = 10): string[] {
    return this.entries
      .slice(-count)
      .reverse()
      .map((e) => e.action.name);
  }

  clear(): void {
    this.entries = [];
    this.redoStack = [];
    this.emit('historyChanged', this.info());
  }

  dispose(): void {
    this.entries = [];
    this.redoStack = [];
    this.removeAllListeners();
  }

  private push(entry: HistoryEntry): void {
    this.entries.push(entry);
    // Trim history if it exceeds max length
    if (this.entries.length > this.maxLength) {
      this.entries = this.entries.slice(this.entries.length - this.maxLength);
    }
  }
}
