/**
 * Thin wrapper over child_process so backends can be exercised with a
 * fake runner in tests.
 */

import { execFileSync, spawn } from 'child_process';

export interface CommandRunner {
  /** Whether the command is on PATH */
  exists(command: string): boolean;
  /** Run to completion and return stdout */
  capture(command: string, args: readonly string[]): string;
  /** Start detached and return immediately */
  launch(command: string, args: readonly string[]): void;
}

export function createSystemRunner(onLaunchError: (command: string, error: Error) => void = () => {}): CommandRunner {
  return {
    exists(command) {
      try {
        execFileSync(process.platform === 'win32' ? 'where' : 'which', [command], { stdio: 'ignore', timeout: 2000 });
        return true;
      } catch {
        return false;
      }
    },

    capture(command, args) {
      return execFileSync(command, [...args], {
        encoding: 'utf-8',
        timeout: 5000,
        stdio: ['ignore', 'pipe', 'ignore'],
      });
    },

    launch(command, args) {
      const child = spawn(command, [...args], { detached: true, stdio: 'ignore' });
      child.on('error', (error) => onLaunchError(command, error));
      child.unref();
    },
  };
}
