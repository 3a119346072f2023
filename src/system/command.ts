import { execFile } from 'child_process';
import { upstreamError } from '../handlers/errors.js';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], options: { timeoutMs: number }) => Promise<CommandResult>;

/**
 * Runs a binary without a shell. A non-zero exit is a result; failing to
 * start it or hitting the timeout is an upstream error.
 */
export const execFileRunner: CommandRunner = (file, args, { timeoutMs }) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { encoding: 'utf-8', timeout: timeoutMs, maxBuffer: 1024 * 1024 }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ code: 0, stdout, stderr });
        return;
      }
      if (err.killed) {
        reject(upstreamError(`${file} timed out after ${timeoutMs}ms`, err));
        return;
      }
      if (typeof err.code === 'number') {
        resolve({ code: err.code, stdout, stderr });
        return;
      }
      reject(upstreamError(`${file} failed: ${err.message}`, err));
    });
  });
