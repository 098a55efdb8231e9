import type { SessionChanges, SessionSnapshot, SessionState } from '../../core/session/SessionState';
import { success, type Action } from '../Action';

export type PositionSnapshot = Pick<SessionSnapshot, 'order' | 'currentIndex' | 'repeatCount' | 'shuffle'>;

/**
 * Changes that drop the current item from `order`, keeping the cursor on
 * the item that slid into its place (or the new last item).
 */
export function removeCurrentChanges(session: SessionState): SessionChanges {
  const order = session.order.filter((_, i) => i !== session.currentIndex);
  return {
    order,
    currentIndex: Math.min(session.currentIndex, Math.max(0, order.length - 1)),
  };
}

/**
 * Changes that bring the session back to `target`. Items removed since the
 * snapshot stay removed; the cursor follows the item it pointed at. The
 * shuffle flag travels with the order; turning shuffle back off this way
 * leaves the order ascending.
 */
export function restorePositionChanges(session: SessionState, target: PositionSnapshot): SessionChanges {
  const present = new Set(session.order);
  const order = target.order.filter((i) => present.has(i));
  const kept = new Set(order);
  for (const i of session.order) {
    if (!kept.has(i)) order.push(i);
  }
  if (session.shuffle && !target.shuffle) order.sort((a, b) => a - b);
  const item = target.order[target.currentIndex];
  let currentIndex = item === undefined ? -1 : order.indexOf(item);
  if (currentIndex < 0) currentIndex = Math.min(target.currentIndex, Math.max(0, order.length - 1));
  return { order, currentIndex, repeatCount: target.repeatCount, shuffle: target.shuffle };
}

/** Inverse used by every action that only moves the cursor or reorders. */
export function restorePositionAction(target: PositionSnapshot): Action {
  const saved: PositionSnapshot = {
    order: [...target.order],
    currentIndex: target.currentIndex,
    repeatCount: target.repeatCount,
    shuffle: target.shuffle,
  };
  return {
    name: 'restore_position',
    description: 'Return to an earlier position',
    applicability: 'both',
    execute(session) {
      const changes = restorePositionChanges(session, saved);
      return success({ current_index: changes.currentIndex ?? 0 }, changes);
    },
  };
}
