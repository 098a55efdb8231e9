import { spawn } from 'node:child_process';
import { CollaboratorError } from '../core/errors';
import { TOOL_TIMEOUT_MS } from '../config/TimingConfig';
import { Logger } from '../utils/Logger';
import type { ToolRunner, ToolRunResult } from './types';

const log = new Logger('ProcessToolRunner');

export interface ProcessToolRunnerOptions {
  timeoutMs?: number;
  cwd?: string;
}

function formatStderr(chunks: string[]): string {
  const text = chunks.join('').trim();
  return text ? `: ${text}` : '';
}

/**
 * Runs tools as child processes with the parent environment plus the
 * supplied variables. The exit code is returned as-is; only a spawn
 * failure, a signal or the timeout is an error.
 */
export class ProcessToolRunner implements ToolRunner {
  private readonly timeoutMs: number;

  constructor(private readonly options: ProcessToolRunnerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? TOOL_TIMEOUT_MS;
  }

  async run(executable: string, env: Readonly<Record<string, string>>): Promise<ToolRunResult> {
    log.debug(`Running ${executable}`);
    const child = spawn(executable, [], {
      cwd: this.options.cwd,
      env: { ...process.env, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    const stdoutChunks: string[] = [];
    const stderrChunks: string[] = [];
    child.stdout.on('data', (chunk) => stdoutChunks.push(String(chunk)));
    child.stderr.on('data', (chunk) => stderrChunks.push(String(chunk)));

    let settled = false;
    const settleOnce = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      fn();
    };

    return await new Promise<ToolRunResult>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        settleOnce(() => {
          child.kill('SIGKILL');
          reject(
            new CollaboratorError(
              `${executable} timed out after ${this.timeoutMs}ms${formatStderr(stderrChunks)}`,
              stderrChunks.join('')
            )
          );
        });
      }, this.timeoutMs);
      timeoutId.unref?.();

      child.once('error', (err) => {
        settleOnce(() => {
          clearTimeout(timeoutId);
          reject(new CollaboratorError(`Cannot run ${executable}: ${err.message}`));
        });
      });

      child.once('close', (code, signal) => {
        settleOnce(() => {
          clearTimeout(timeoutId);
          if (signal) {
            reject(
              new CollaboratorError(
                `${executable} exited with signal ${signal}${formatStderr(stderrChunks)}`,
                stderrChunks.join('')
              )
            );
            return;
          }
          resolve({
            exitCode: typeof code === 'number' ? code : -1,
            stdout: stdoutChunks.join(''),
            stderr: stderrChunks.join(''),
          });
        });
      });
    });
  }
}
