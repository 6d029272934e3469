import { spawn } from 'node:child_process';
import { ToolInvocationError } from './errors.js';
import { logger } from './logger.js';

const log = logger.child('process');

export interface ProcessOptions {
  input?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Spawns a command, feeds `input` on stdin and waits for it to exit.
 * Resolves with the exit status whatever it is; rejects only when the process
 * cannot be started. No timeout: a hung converter hangs the caller.
 */
export type ProcessRunner = (command: string, args: readonly string[], options?: ProcessOptions) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const outBufs: Buffer[] = [];
    const errBufs: Buffer[] = [];
    let settled = false;

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const fail = (error: Error) => {
      if (settled) return;
      settled = true;
      const detail = isErrnoException(error) && error.code === 'ENOENT'
        ? `not found in $PATH: ${command}`
        : error.message;
      reject(new ToolInvocationError(detail, command, { cause: error }));
    };

    child.on('error', fail);
    child.stdout.on('data', (chunk: Buffer) => outBufs.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => errBufs.push(chunk));

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      const stderr = Buffer.concat(errBufs).toString('utf8');
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(outBufs).toString('utf8'),
        stderr: signal && !stderr ? `terminated by ${signal}` : stderr,
      });
    });

    // A converter that exits without draining stdin raises EPIPE here; its exit status still decides.
    child.stdin.on('error', error => log.debug(`stdin closed early for ${command}`, error));
    child.stdin.end(options.input ?? '');
  });

function isErrnoException(error: Error): error is NodeJS.ErrnoException {
  return 'code' in error;
}
