import type { Action } from '../Action';

/** Reverts the session's most recent reversible action. */
export const undoAction: Action = {
  name: 'undo',
  description: 'Undo last action',
  applicability: 'both',
  execute(session) {
    return session.history.undo(session);
  },
};

export const redoAction: Action = {
  name: 'redo',
  description: 'Redo last undone action',
  applicability: 'both',
  execute(session) {
    return session.history.redo(session);
  },
};
