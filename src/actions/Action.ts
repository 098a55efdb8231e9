/**
 * Action contracts shared by the registry, the history and the dispatcher.
 *
 * An action is a named operation over one session. `execute` never mutates
 * the session itself: it returns a change set that `runAction` validates
 * and commits.
 */

import type { SessionChanges, SessionSnapshot, SessionState } from '../core/session/SessionState';

/** Where a client runs: the single-user terminal client or a browser session. */
export type ActionContext = 'desktop' | 'web';

export type Applicability = ActionContext | 'both';

export const ACTION_CONTEXTS: readonly ActionContext[] = ['desktop', 'web'];

export type ResultValue = boolean | number | string;

/** Flat result map passed through unchanged to the transport. */
export type ActionResult = Record<string, ResultValue>;

export type ActionParams = Readonly<Record<string, unknown>>;

export type ActionOutcome =
  | { ok: true; result: ActionResult; changes?: SessionChanges }
  | { ok: false; error: string; result?: ActionResult };

export interface Action {
  readonly name: string;
  readonly description: string;
  readonly applicability: Applicability;
  execute(session: SessionState, params: ActionParams): ActionOutcome | Promise<ActionOutcome>;
}

/**
 * An action that can be undone. `inverse` is called after a successful
 * execution with the state captured just before it ran; returning null
 * means this particular execution cannot be undone.
 */
export interface ReversibleAction extends Action {
  inverse(before: SessionSnapshot, params: ActionParams, result: ActionResult): Action | null;
}

export function isReversible(action: Action): action is ReversibleAction {
  return 'inverse' in action && typeof action.inverse === 'function';
}

/** The single place where applicability is decided. */
export function isApplicable(action: Action, context: ActionContext): boolean {
  return action.applicability === 'both' || action.applicability === context;
}

export function success(result: ActionResult, changes?: SessionChanges): ActionOutcome {
  return changes ? { ok: true, result, changes } : { ok: true, result };
}

export function failure(error: string, result?: ActionResult): ActionOutcome {
  return result ? { ok: false, error, result } : { ok: false, error };
}

/** Read an optional string parameter; non-strings are rejected. */
export function stringParam(params: ActionParams, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}
