/**
 * Interfaces for the outside services actions depend on. Actions only ever
 * see these; the file- and process-backed implementations live beside them
 * and tests substitute in-memory fakes.
 */

/** Append-only, human readable log (remember list, notes). */
export interface RecordLog {
  /** Where the records go, reported back to the caller. */
  readonly location: string;
  append(text: string): Promise<void>;
}

export interface ToolRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Runs an external executable with extra environment variables. */
export interface ToolRunner {
  run(executable: string, env: Readonly<Record<string, string>>): Promise<ToolRunResult>;
}

/** Proof of a trashed file, enough to put it back. */
export interface TrashReceipt {
  trashName: string;
  originalPath: string;
  trashPath: string;
}

/** "Move file, remember origin". */
export interface TrashService {
  trash(filePath: string): Promise<TrashReceipt>;
  /** Put the file back and return the path it was restored to. */
  restore(receipt: TrashReceipt): Promise<string>;
}

/** The desktop's file manager, for showing where the current item lives. */
export interface FileManager {
  /** Platform name reported back with each result. */
  readonly platform: string;
  openFolder(folder: string): Promise<void>;
  /** Open the containing folder with the file selected, where the platform can. */
  reveal(file: string): Promise<void>;
}
