/**
 * `external_tool_<id>` runs a user script with the current item's details
 * in its environment. The exit code decides the outcome: 0 changes nothing,
 * 1 drops the current item from this session's order, anything else is an
 * error carrying the script's stderr.
 */

import type { ToolRunner } from '../../collaborators/types';
import { computeTemplateVariables, toEnvironment } from '../../core/session/TemplateVariables';
import { failure, success, type Action } from '../Action';
import { NO_ITEMS_ERROR } from './navigation';
import { removeCurrentChanges } from './position';

export const EXTERNAL_TOOL_PREFIX = 'external_tool_';

export const EXIT_REMOVE_ITEM = 1;

export function createExternalToolAction(toolId: string, toolPath: string, runner: ToolRunner): Action {
  return {
    name: `${EXTERNAL_TOOL_PREFIX}${toolId}`,
    description: `Execute external tool ${toolId}`,
    applicability: 'both',
    async execute(session) {
      const vars = computeTemplateVariables(session);
      const item = session.currentItem();
      if (!vars || !item) return failure(NO_ITEMS_ERROR);

      const { exitCode, stdout, stderr } = await runner.run(toolPath, toEnvironment(vars, toolId));

      if (exitCode === 0) {
        return success({ tool: toolId, output: stdout });
      }
      if (exitCode === EXIT_REMOVE_ITEM) {
        return success(
          { action: 'removed', tool: toolId, removed_path: item.path },
          removeCurrentChanges(session)
        );
      }
      return failure(`Tool ${toolId} returned code ${exitCode}`, {
        tool: toolId,
        exit_code: exitCode,
        stderr,
      });
    },
  };
}
