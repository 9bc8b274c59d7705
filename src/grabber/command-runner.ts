/**
 * External command execution for git, npm and the guide grabber
 */

import { spawn } from 'child_process';
import { ExternalToolError } from '../utils/errors';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs a command to completion. Resolves on exit code 0, rejects with
 * ExternalToolError otherwise.
 */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<void>;

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

/**
 * Default runner: output goes straight to the terminal so grabber progress stays visible
 */
export const spawnCommand: CommandRunner = (command, args, options = {}) => {
  const description = describeCommand(command, args);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'inherit', 'inherit'],
      shell: process.platform === 'win32',
    });

    child.on('error', (error) => {
      reject(new ExternalToolError(description, `failed to start (${error.message})`));
    });

    child.on('exit', (code, signal) => {
      if (code === 0) {
        resolve();
      } else if (signal) {
        reject(new ExternalToolError(description, `terminated by ${signal}`, undefined, signal));
      } else {
        reject(new ExternalToolError(description, `exited with code ${code}`, code ?? undefined));
      }
    });
  });
};
