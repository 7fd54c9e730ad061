/**
 * Filesystem adapter for the installer. Everything stateful the installer
 * touches goes through this interface.
 */

import { accessSync, appendFileSync, constants, existsSync, readFileSync } from 'fs';
import { dirname } from 'path';

export interface ProfileStore {
  exists(path: string): boolean;
  /** File contents, or null when the file does not exist */
  read(path: string): string | null;
  /** Whether the file (or, if absent, its directory) is writable */
  canWrite(path: string): boolean;
  /** Append in one write; creates the file when missing */
  append(path: string, content: string): void;
}

export const fsProfileStore: ProfileStore = {
  exists: (path) => existsSync(path),

  read(path) {
    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }
  },

  canWrite(path) {
    try {
      accessSync(existsSync(path) ? path : dirname(path), constants.W_OK);
      return true;
    } catch {
      return false;
    }
  },

  append(path, content) {
    appendFileSync(path, content, 'utf-8');
  },
};

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
