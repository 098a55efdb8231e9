import { describe, it, expect } from 'vitest';
import { createExternalToolAction } from './externalTool';
import { runAction } from '../runAction';
import { CollaboratorError } from '../../core/errors';
import type { ToolRunner } from '../../collaborators/types';
import { createMockToolRunner } from '../../../test/mocks';
import { makeSession } from '../../../test/utils';

describe('external tools', () => {
  it('ET-001: passes the QSS_ environment to the tool', async () => {
    const { runner, run } = createMockToolRunner({ stdout: 'done' });
    const session = makeSession(3, { currentIndex: 1 });
    await runAction(createExternalToolAction('3', '/tools/tool3.sh', runner), session);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(
      '/tools/tool3.sh',
      expect.objectContaining({
        QSS_IMG_NAME: 'img1.png',
        QSS_FULL_PATH: '/photos/img1.png',
        QSS_IMG_IDX: '2',
        QSS_IMG_INDEX: '2',
        QSS_IMG_TOTAL: '3',
        QSS_TOOL_ID: '3',
        QSS_PAUSED: '',
      })
    );
  });

  it('ET-002: exit 0 changes nothing', async () => {
    const { runner } = createMockToolRunner({ stdout: 'done' });
    const session = makeSession(3, { currentIndex: 1 });
    const outcome = await runAction(createExternalToolAction('3', '/t', runner), session);
    expect(outcome).toEqual({ ok: true, result: { tool: '3', output: 'done' } });
    expect(session.order).toEqual([0, 1, 2]);
  });

  it('ET-003: exit 1 removes the current item', async () => {
    const { runner } = createMockToolRunner({ exitCode: 1 });
    const session = makeSession(3, { currentIndex: 1 });
    const outcome = await runAction(createExternalToolAction('a', '/t', runner), session);
    expect(outcome.ok && outcome.result).toEqual({ action: 'removed', tool: 'a', removed_path: 'img1.png' });
    expect(session.order).toEqual([0, 2]);
    expect(session.currentIndex).toBe(1);
  });

  it('ET-004: removing the last item clamps the index', async () => {
    const { runner } = createMockToolRunner({ exitCode: 1 });
    const session = makeSession(3, { currentIndex: 2 });
    await runAction(createExternalToolAction('0', '/t', runner), session);
    expect(session.order).toEqual([0, 1]);
    expect(session.currentIndex).toBe(1);
  });

  it('ET-005: removing the only item leaves an empty order', async () => {
    const { runner } = createMockToolRunner({ exitCode: 1 });
    const session = makeSession(1);
    await runAction(createExternalToolAction('0', '/t', runner), session);
    expect(session.order).toEqual([]);
    expect(session.currentIndex).toBe(0);
  });

  it('ET-006: other exit codes are errors carrying stderr', async () => {
    const { runner } = createMockToolRunner({ exitCode: 2, stderr: 'boom' });
    const session = makeSession(2);
    expect(await runAction(createExternalToolAction('3', '/t', runner), session)).toEqual({
      ok: false,
      error: 'Tool 3 returned code 2',
      result: { tool: '3', exit_code: 2, stderr: 'boom' },
    });
    expect(session.order).toEqual([0, 1]);
  });

  it('ET-007: a runner failure becomes an error result', async () => {
    const runner: ToolRunner = {
      run: async () => {
        throw new CollaboratorError('Cannot run /t: ENOENT');
      },
    };
    expect(await runAction(createExternalToolAction('3', '/t', runner), makeSession(2))).toEqual({
      ok: false,
      error: 'Cannot run /t: ENOENT',
    });
  });

  it('ET-008: does not run the tool without items', async () => {
    const { runner, run } = createMockToolRunner();
    expect((await runAction(createExternalToolAction('3', '/t', runner), makeSession(0))).ok).toBe(false);
    expect(run).not.toHaveBeenCalled();
  });
});
