/**
 * ActionDispatcher - the single path from input to action execution.
 *
 * Keys, gestures and API calls are resolved to an action name here and run
 * inside the session's queue. Anything that does not lead to a runnable
 * action (unknown session, unbound key, action from the other context)
 * comes back as `no-action` rather than as an error.
 */

import {
  isApplicable,
  isReversible,
  type ActionContext,
  type ActionParams,
  type ActionResult,
} from '../actions/Action';
import type { ActionRegistry } from '../actions/ActionRegistry';
import { runAction } from '../actions/runAction';
import type { SessionHandle, SessionManager } from '../core/session/SessionManager';
import type { GestureResolver } from '../utils/input/GestureResolver';
import type { GestureName, GestureSample, MouseEventType } from '../utils/input/GestureDetector';
import type { HotkeyResolver } from '../utils/input/HotkeyResolver';
import { parseKeyPayload } from '../utils/input/KeyTokens';
import { Logger } from '../utils/Logger';

const log = new Logger('ActionDispatcher');

export type DispatchResult =
  | { status: 'ok'; action: string; result: ActionResult }
  | { status: 'error'; action: string; error: string; result?: ActionResult }
  | { status: 'no-action'; reason: string };

export interface DispatchOptions {
  /** Set to false to keep the action out of the undo history. */
  record?: boolean;
}

export interface ActionDispatcherDeps {
  context: ActionContext;
  registry: ActionRegistry;
  sessions: SessionManager;
  hotkeys: HotkeyResolver;
  gestures: GestureResolver;
  undoEnabled?: boolean;
  clock?: () => number;
}

function noAction(reason: string): DispatchResult {
  return { status: 'no-action', reason };
}

export class ActionDispatcher {
  readonly context: ActionContext;
  private readonly registry: ActionRegistry;
  private readonly sessions: SessionManager;
  private readonly hotkeys: HotkeyResolver;
  private readonly gestures: GestureResolver;
  private readonly undoEnabled: boolean;
  private readonly clock: () => number;

  constructor(deps: ActionDispatcherDeps) {
    this.context = deps.context;
    this.registry = deps.registry;
    this.sessions = deps.sessions;
    this.hotkeys = deps.hotkeys;
    this.gestures = deps.gestures;
    this.undoEnabled = deps.undoEnabled ?? true;
    this.clock = deps.clock ?? Date.now;
  }

  /** Run a named action on a session. */
  async dispatch(
    sessionId: string,
    actionName: string,
    params: ActionParams = {},
    options: DispatchOptions = {}
  ): Promise<DispatchResult> {
    if (!this.sessions.has(sessionId)) return noAction(`Unknown session: ${sessionId}`);
    return this.sessions.run(sessionId, (handle) => this.execute(handle, actionName, params, options));
  }

  handleKey(sessionId: string, key: string, modifiers: Iterable<string> = []): Promise<DispatchResult> {
    const actionName = this.hotkeys.resolve(key, modifiers);
    if (actionName === null) return Promise.resolve(noAction(`No binding for key ${key}`));
    return this.dispatch(sessionId, actionName);
  }

  /** Browser keyboard payload (`{ key, ctrlKey, ... }`). */
  handleKeyPayload(sessionId: string, payload: unknown): Promise<DispatchResult> {
    const press = parseKeyPayload(payload);
    if (!press) return Promise.resolve(noAction('Invalid key payload'));
    return this.handleKey(sessionId, press.key, press.modifiers);
  }

  /**
   * Feed a raw input sample to the session's gesture detector and run
   * whatever the classified gesture is bound to.
   */
  async handleGesture(sessionId: string, sample: GestureSample): Promise<DispatchResult> {
    if (!this.sessions.has(sessionId)) return noAction(`Unknown session: ${sessionId}`);
    const timestamp = sample.timestamp ?? this.clock();
    return this.sessions.run(sessionId, (handle) => {
      const gesture =
        sample.kind === 'mouse'
          ? handle.detector.processMouse(sample.type, sample.x, sample.y, timestamp)
          : handle.detector.process(sample.type, sample.points, timestamp);
      return this.runGesture(handle, gesture);
    });
  }

  handleMouse(
    sessionId: string,
    type: MouseEventType,
    x: number,
    y: number,
    timestamp?: number
  ): Promise<DispatchResult> {
    return this.handleGesture(sessionId, { kind: 'mouse', type, x, y, timestamp });
  }

  /** Run the action bound to an already classified gesture. */
  async handleGestureName(sessionId: string, gesture: string): Promise<DispatchResult> {
    const actionName = this.gestures.resolve(gesture);
    if (actionName === null) return noAction(`No binding for gesture ${gesture}`);
    return this.dispatch(sessionId, actionName);
  }

  private runGesture(handle: SessionHandle, gesture: GestureName | null): Promise<DispatchResult> | DispatchResult {
    if (gesture === null) return noAction('No gesture');
    const actionName = this.gestures.resolve(gesture);
    if (actionName === null) return noAction(`No binding for gesture ${gesture}`);
    log.debug(`Gesture ${gesture} -> ${actionName}`);
    return this.execute(handle, actionName, {}, {});
  }

  private async execute(
    { state }: SessionHandle,
    actionName: string,
    params: ActionParams,
    options: DispatchOptions
  ): Promise<DispatchResult> {
    const action = this.registry.get(actionName);
    if (!action) return noAction(`Unknown action: ${actionName}`);
    if (!isApplicable(action, this.context)) {
      return noAction(`Action ${actionName} is not available in ${this.context} mode`);
    }

    const record = options.record !== false && this.undoEnabled && isReversible(action);
    const outcome = record
      ? await state.history.executeAndRecord(action, state, params)
      : await runAction(action, state, params);

    if (outcome.ok) {
      log.debug(`${actionName} on ${state.id} succeeded`);
      return { status: 'ok', action: actionName, result: outcome.result };
    }
    return outcome.result
      ? { status: 'error', action: actionName, error: outcome.error, result: outcome.result }
      : { status: 'error', action: actionName, error: outcome.error };
  }
}
