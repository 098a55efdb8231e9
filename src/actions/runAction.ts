import { AppError, InvariantError, describeError } from '../core/errors';
import type { SessionState } from '../core/session/SessionState';
import { Logger } from '../utils/Logger';
import { failure, type Action, type ActionOutcome, type ActionParams } from './Action';

const log = new Logger('runAction');

/**
 * Execute an action and commit its change set.
 *
 * This is the action-execution boundary: `AppError`s and unexpected
 * exceptions become error outcomes and leave the session untouched.
 * `InvariantError` is a defect and is re-thrown.
 */
export async function runAction(
  action: Action,
  session: SessionState,
  params: ActionParams = {}
): Promise<ActionOutcome> {
  let outcome: ActionOutcome;
  try {
    outcome = await action.execute(session, params);
  } catch (err) {
    if (err instanceof InvariantError) throw err;
    if (err instanceof AppError) {
      log.debug(`${action.name} failed: ${err.message}`);
      return failure(err.message);
    }
    log.error(`Unexpected error in action ${action.name}:`, err);
    return failure(describeError(err));
  }
  if (outcome.ok && outcome.changes) {
    session.apply(outcome.changes);
  }
  return outcome;
}
