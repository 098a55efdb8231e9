/**
 * `remember` and `note` append a readable record about the current item to
 * a log collaborator. A write failure comes back as an error result.
 */

import type { RecordLog } from '../../collaborators/types';
import { failure, stringParam, success, type Action } from '../Action';
import { NO_ITEMS_ERROR } from './navigation';

export type Clock = () => Date;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatRecordTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createRememberAction(log: RecordLog, clock: Clock = () => new Date()): Action {
  return {
    name: 'remember',
    description: 'Save current image path to remember file',
    applicability: 'both',
    async execute(session) {
      const item = session.currentItem();
      if (!item) return failure(NO_ITEMS_ERROR);

      const timestamp = formatRecordTimestamp(clock());
      let record = `[${timestamp}] ${item.path}\n`;
      record += `  Index: ${session.currentIndex + 1}/${session.order.length}\n`;
      if (session.repeatCount > 0) record += `  Repeat: ${session.repeatCount}\n`;
      record += '\n';

      await log.append(record);
      return success({ remembered: item.path, file: log.location, timestamp });
    },
  };
}

/** The note text comes from the `note` parameter (or `note_text`). */
export function createNoteAction(log: RecordLog, clock: Clock = () => new Date()): Action {
  return {
    name: 'note',
    description: 'Add custom note about current image',
    applicability: 'both',
    async execute(session, params) {
      const item = session.currentItem();
      if (!item) return failure(NO_ITEMS_ERROR);

      const note = stringParam(params, 'note') ?? stringParam(params, 'note_text') ?? '';
      const timestamp = formatRecordTimestamp(clock());
      let record = `[${timestamp}] ${item.path}\n`;
      if (note) record += `  Note: ${note}\n`;
      record += '\n';

      await log.append(record);
      return success({ noted: item.path, note, file: log.location, timestamp });
    },
  };
}
