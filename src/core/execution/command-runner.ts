/**
 * External process invocation
 */

import { spawn } from 'child_process';
import { logger } from '../monitoring/logger.js';

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
}

/**
 * Runs a command and resolves with its exit code
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<number>;

/**
 * Default runner: output goes straight to the user's terminal
 */
export const runTransparentCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    logger.debug('Running command', {
      command: [command, ...args].join(' '),
      cwd: options.cwd,
    });

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: 'inherit',
    });

    child.on('error', reject);
    child.on('close', (code, signal) => {
      if (signal) {
        logger.warn('Command terminated by signal', { command, signal });
      }
      resolve(code ?? 1);
    });
  });
