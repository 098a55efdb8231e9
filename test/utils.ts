/**
 * Test utilities and helpers
 */

import { sequenceFromPaths, type ItemSequence } from '../src/core/sequence/ItemSequence';
import { SessionState, type SessionInit } from '../src/core/session/SessionState';
import { SessionManager } from '../src/core/session/SessionManager';
import type { ActionContext } from '../src/actions/Action';
import { ActionRegistry } from '../src/actions/ActionRegistry';
import { registerDefaultActions } from '../src/actions/defaultActions';
import { MemoryRecordLog } from '../src/collaborators/FileRecordLog';
import { ActionDispatcher } from '../src/services/ActionDispatcher';
import type { BindingTable } from '../src/utils/input/BindingResolver';
import { GestureResolver } from '../src/utils/input/GestureResolver';
import { HotkeyResolver } from '../src/utils/input/HotkeyResolver';

/** `img0.png` .. `img{n-1}.png`, each with a distinct size. */
export function makeItems(n: number): ItemSequence {
  const paths = Array.from({ length: n }, (_, i) => `img${i}.png`);
  return sequenceFromPaths(paths, '/photos').map((item, i) => ({ ...item, sizeBytes: 1000 * (i + 1) }));
}

export function makeSession(n: number, init: SessionInit = {}, id = 'test-session'): SessionState {
  return new SessionState(id, makeItems(n), init);
}

/** Random source replaying the given values in a loop. */
export function sequenceRandom(values: readonly number[]): () => number {
  let i = 0;
  return () => {
    const v = values[i % values.length] ?? 0;
    i++;
    return v;
  };
}

export const TEST_BINDINGS: BindingTable = {
  common: {
    navigate_next: ['Right', 'PageDown'],
    navigate_previous: 'Left',
    toggle_pause: 'space',
    undo: 'ctrl+z',
    toggle_always_on_top: 't',
  },
  desktop: { quit: ['q', 'Escape'] },
};

export const TEST_GESTURES: BindingTable = {
  common: { navigate_next: 'swipe_left', navigate_previous: 'swipe_right' },
  web: { toggle_pause: 'double_tap', toggle_fullscreen: 'pinch_out' },
};

export interface DispatcherHarness {
  registry: ActionRegistry;
  sessions: SessionManager;
  dispatcher: ActionDispatcher;
  rememberLog: MemoryRecordLog;
  notesLog: MemoryRecordLog;
}

/** Default actions over `n` items, wired to a dispatcher for `context`. */
export function createDispatcherHarness(
  context: ActionContext,
  n = 3,
  options: { undoEnabled?: boolean } = {}
): DispatcherHarness {
  const registry = new ActionRegistry();
  const rememberLog = new MemoryRecordLog('remember.log');
  const notesLog = new MemoryRecordLog('notes.log');
  registerDefaultActions(registry, { rememberLog, notesLog });
  const sessions = new SessionManager(makeItems(n));
  const dispatcher = new ActionDispatcher({
    context,
    registry,
    sessions,
    hotkeys: new HotkeyResolver(context, TEST_BINDINGS),
    gestures: new GestureResolver(context, TEST_GESTURES),
    undoEnabled: options.undoEnabled,
  });
  return { registry, sessions, dispatcher, rememberLog, notesLog };
}
