import { describe, it, expect } from 'vitest';
import { createNavigateNextAction, goToAction, navigateNextAction, navigatePreviousAction } from './navigation';
import { runAction } from '../runAction';
import { makeSession, sequenceRandom } from '../../../test/utils';

describe('navigate_next', () => {
  it('NAV-001: moves forward by one', async () => {
    const session = makeSession(3);
    const outcome = await runAction(navigateNextAction, session);
    expect(outcome).toEqual({
      ok: true,
      result: { current_index: 1, repeat_count: 0 },
      changes: { currentIndex: 1 },
    });
    expect(session.currentIndex).toBe(1);
  });

  it('NAV-002: saturates at the last item without repeat', async () => {
    const session = makeSession(3, { currentIndex: 1 });
    for (let i = 0; i < 4; i++) await runAction(navigateNextAction, session);
    expect(session.currentIndex).toBe(2);
    expect(session.repeatCount).toBe(0);
  });

  it('NAV-003: N forward calls with repeat return to 0 and count one cycle', async () => {
    const n = 5;
    const session = makeSession(n, { repeat: true });
    for (let i = 0; i < n; i++) await runAction(navigateNextAction, session);
    expect(session.currentIndex).toBe(0);
    expect(session.repeatCount).toBe(1);
  });

  it('NAV-004: shuffle-each reshuffles on the wrap', async () => {
    const next = createNavigateNextAction(sequenceRandom([0]));
    const session = makeSession(3, { currentIndex: 2, repeat: true, repeatMode: 'shuffle-each' });
    await runAction(next, session);
    expect(session.order).toEqual([1, 2, 0]);
    expect(session.currentIndex).toBe(0);
    expect(session.repeatCount).toBe(1);
  });

  it('NAV-005: fixed repeat keeps the order on the wrap', async () => {
    const session = makeSession(3, { currentIndex: 2, repeat: true, order: [2, 0, 1] });
    await runAction(navigateNextAction, session);
    expect(session.order).toEqual([2, 0, 1]);
  });

  it('NAV-006: errors on an empty sequence without touching state', async () => {
    const session = makeSession(0);
    expect(await runAction(navigateNextAction, session)).toEqual({ ok: false, error: 'No images in slideshow' });
    expect(session.currentIndex).toBe(0);
  });
});

describe('navigate_previous', () => {
  it('NAV-010: moves back by one', async () => {
    const session = makeSession(3, { currentIndex: 2 });
    await runAction(navigatePreviousAction, session);
    expect(session.currentIndex).toBe(1);
  });

  it('NAV-011: stays at 0 without repeat, for one item or many', async () => {
    for (const n of [1, 4]) {
      const session = makeSession(n);
      await runAction(navigatePreviousAction, session);
      await runAction(navigatePreviousAction, session);
      expect(session.currentIndex).toBe(0);
    }
  });

  it('NAV-012: wraps to the last item with repeat, without counting', async () => {
    const session = makeSession(4, { repeat: true });
    const outcome = await runAction(navigatePreviousAction, session);
    expect(outcome.ok && outcome.result).toEqual({ current_index: 3 });
    expect(session.repeatCount).toBe(0);
  });

  it('NAV-013: errors on an empty sequence', async () => {
    expect((await runAction(navigatePreviousAction, makeSession(0))).ok).toBe(false);
  });
});

describe('navigation bounds', () => {
  it('NAV-020: any mix of next/previous without repeat stays inside the order', async () => {
    const session = makeSession(4);
    const steps = [1, 1, 1, 1, 1, -1, 1, -1, -1, -1, -1, -1, 1, 1, 1, 1, 1, 1];
    for (const step of steps) {
      await runAction(step > 0 ? navigateNextAction : navigatePreviousAction, session);
      expect(session.currentIndex).toBeGreaterThanOrEqual(0);
      expect(session.currentIndex).toBeLessThan(4);
    }
    expect(session.currentIndex).toBe(3);
  });
});

describe('go_to', () => {
  it('NAV-030: jumps to a valid index', async () => {
    const session = makeSession(5);
    await runAction(goToAction, session, { index: 3 });
    expect(session.currentIndex).toBe(3);
  });

  it('NAV-031: rejects out of range and non-integer indices', async () => {
    const session = makeSession(5, { currentIndex: 2 });
    expect(await runAction(goToAction, session, { index: 5 })).toEqual({
      ok: false,
      error: 'index 5 is outside 0..4',
    });
    expect(await runAction(goToAction, session, { index: 1.5 })).toEqual({
      ok: false,
      error: 'index must be an integer',
    });
    expect(await runAction(goToAction, session, { index: '1' })).toEqual({
      ok: false,
      error: 'index must be an integer',
    });
    expect(session.currentIndex).toBe(2);
  });

  it('NAV-032: undo returns to where the jump started', async () => {
    const session = makeSession(5, { currentIndex: 1 });
    await session.history.executeAndRecord(goToAction, session, { index: 4 });
    await session.history.undo(session);
    expect(session.currentIndex).toBe(1);
  });
});
