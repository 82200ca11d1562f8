import { spawn } from 'child_process';
import { ToolNotFoundError } from './errors.js';
import { logger } from './logger.js';
import type { CommandOptions, CommandResult } from './types.js';

// Largest delay setTimeout accepts; anything above overflows to 1ms
export const MAX_TIMER_MS = 2_147_483_647;

// Time a child gets to exit after SIGTERM before it is sent SIGKILL
export const KILL_GRACE_MS = 2000;

/**
 * Spawn a command and collect its output.
 * Resolves on any exit status; rejects with ToolNotFoundError when the binary is missing.
 * With `timeoutMs` the child is sent SIGTERM once the limit passes, then SIGKILL after
 * KILL_GRACE_MS. A timed-out call resolves as soon as the child exits, even when a
 * grandchild still holds its output pipes.
 */
export function runCommand(
  command: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  logger.debug(`$ ${[command, ...args].join(' ')}`);

  return new Promise((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;
    let exit: { code: number | null; signal: NodeJS.Signals | null } | undefined;

    const child = spawn(command, args, {
      shell: process.platform === 'win32',
      stdio: ['ignore', 'pipe', 'pipe'],
      env: options.env || process.env
    });

    const settle = () => {
      clearTimeout(timer);
      clearTimeout(killTimer);
    };

    // Stop waiting for pipes that descendants may keep open
    const abandonPipes = (code: number | null, signal: NodeJS.Signals | null) => {
      settle();
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({ code, signal, stdout, stderr, timedOut });
    };

    const timer: NodeJS.Timeout | undefined = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          if (exit) {
            abandonPipes(exit.code, exit.signal);
            return;
          }
          child.kill('SIGTERM');
          killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
        }, Math.min(options.timeoutMs, MAX_TIMER_MS))
      : undefined;

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('exit', (code, signal) => {
      exit = { code, signal };
      if (timedOut) abandonPipes(code, signal);
    });

    child.on('close', (code, signal) => {
      settle();
      resolve({ code, signal, stdout, stderr, timedOut });
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      settle();
      reject(error.code === 'ENOENT' ? new ToolNotFoundError(command) : error);
    });
  });
}
