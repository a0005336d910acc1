import { spawn } from 'node:child_process';
import { logger } from '../logger.js';
import { secondsToMs } from '../utils.js';
import { failure, success, type ProbeOutcome } from './types.js';

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  timeoutSeconds: number;
  signal?: AbortSignal;
}

/**
 * Runs one external program per call, without a shell. A non-zero exit is a
 * successful invocation; callers decide what the exit code means.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<ProbeOutcome<CommandOutput>>;
}

const MAX_CAPTURE_CHARS = 1024 * 1024;
const KILL_GRACE_MS = 200;

function appendBounded(existing: string, chunk: string): string {
  if (existing.length >= MAX_CAPTURE_CHARS) {
    return existing;
  }
  const remaining = MAX_CAPTURE_CHARS - existing.length;
  return existing + chunk.slice(0, remaining);
}

export class ProcessCommandRunner implements CommandRunner {
  run(
    command: string,
    args: readonly string[],
    options: RunOptions,
  ): Promise<ProbeOutcome<CommandOutput>> {
    const { timeoutSeconds, signal } = options;
    const label = [command, ...args].join(' ');

    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let aborted = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const finalize = (outcome: ProbeOutcome<CommandOutput>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      logger.debug(`Executing ${label}`, { timeoutSeconds });

      const child = spawn(command, [...args], {
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const terminate = (): void => {
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, KILL_GRACE_MS);
      };

      const onAbort = (): void => {
        aborted = true;
        terminate();
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, secondsToMs(timeoutSeconds));

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      // Decoded on the stream so a character split across chunks stays whole.
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (chunk: string) => {
        stdout = appendBounded(stdout, chunk);
      });

      child.stderr.on('data', (chunk: string) => {
        stderr = appendBounded(stderr, chunk);
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          finalize(failure('not_found', `Command not found: ${command}`));
          return;
        }
        if (error.code === 'EACCES') {
          finalize(failure('unknown', `Permission denied: ${command}`));
          return;
        }
        finalize(failure('unknown', error.message));
      });

      child.on('close', (code, closeSignal) => {
        if (timedOut) {
          finalize(failure('timeout', `${label} timed out after ${timeoutSeconds} seconds`));
          return;
        }
        if (aborted) {
          finalize(failure('unknown', `${label} aborted`));
          return;
        }
        if (code === null) {
          finalize(failure('unknown', `${label} terminated by ${closeSignal ?? 'unknown signal'}`));
          return;
        }
        finalize(success({ stdout, stderr, exitCode: code }));
      });
    });
  }
}
