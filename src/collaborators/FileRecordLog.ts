import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { CollaboratorError, describeError } from '../core/errors';
import type { RecordLog } from './types';

/** Appends records to a UTF-8 text file, creating it (and its directory) on first use. */
export class FileRecordLog implements RecordLog {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async append(text: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      await fs.appendFile(this.location, text, 'utf8');
    } catch (err) {
      throw new CollaboratorError(`Cannot write ${this.location}: ${describeError(err)}`);
    }
  }
}

/** In-memory record log, used by tests and by hosts that only want the records. */
export class MemoryRecordLog implements RecordLog {
  readonly records: string[] = [];

  constructor(readonly location = 'memory') {}

  async append(text: string): Promise<void> {
    this.records.push(text);
  }

  get text(): string {
    return this.records.join('');
  }
}
