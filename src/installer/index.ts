/**
 * Environment Installer
 *
 * Wires CLAUDE_HOOK_MODE and CLAUDE_HOOK_VOICE into the user's shell
 * profile, once, and sets them for the current process.
 */

import { homedir } from 'os';
import { ENV } from '../config/loader.js';
import { PermissionError, PreconditionError } from '../errors.js';
import { getSettingsPath } from '../hooks/settings.js';
import { fsProfileStore, isErrnoException, type ProfileStore } from './profile-store.js';
import { detectShell, profilePathFor, type ShellKind } from './shell.js';

export { detectShell, profilePathFor, type ShellKind } from './shell.js';
export { fsProfileStore, type ProfileStore } from './profile-store.js';

export const INSTALL_DEFAULTS = {
  [ENV.MODE]: 'voice',
  [ENV.VOICE]: 'Kyoko',
} as const;

/** Presence of this name in a profile means the block is already there */
export const MARKER_VARIABLE = ENV.MODE;

export const PROFILE_BLOCK = [
  '',
  '# Claude Code voice announcements',
  `export ${ENV.MODE}="${INSTALL_DEFAULTS[ENV.MODE]}"`,
  `export ${ENV.VOICE}="${INSTALL_DEFAULTS[ENV.VOICE]}"`,
  '',
].join('\n');

export type InstallStatus = 'added' | 'already-configured' | 'unsupported-shell';

export interface InstallResult {
  status: InstallStatus;
  shell: ShellKind | null;
  profilePath: string | null;
  settingsPath: string;
  variables: Record<string, string>;
}

export interface InstallOptions {
  /** Environment to detect from and to update; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  home?: string;
  store?: ProfileStore;
}

/**
 * Run the installer.
 * @throws PreconditionError when the editor settings file is missing
 * @throws PermissionError when the profile cannot be written
 */
export function install(options: InstallOptions = {}): InstallResult {
  const env = options.env ?? process.env;
  const store = options.store ?? fsProfileStore;
  const settingsPath = getSettingsPath(env);

  if (!store.exists(settingsPath)) {
    throw new PreconditionError(
      `${settingsPath} not found. Run Claude Code at least once to create the settings file.`,
      settingsPath,
    );
  }

  const shell = detectShell(env);
  let status: InstallStatus = 'unsupported-shell';
  let profilePath: string | null = null;

  if (shell) {
    profilePath = profilePathFor(shell, options.home ?? homedir());
    status = updateProfile(store, profilePath);
  }

  const variables: Record<string, string> = { ...INSTALL_DEFAULTS };
  for (const [name, value] of Object.entries(variables)) {
    env[name] = value;
  }

  return { status, shell, profilePath, settingsPath, variables };
}

function updateProfile(store: ProfileStore, profilePath: string): InstallStatus {
  const existing = store.read(profilePath);
  if (existing !== null && existing.includes(MARKER_VARIABLE)) {
    return 'already-configured';
  }

  if (!store.canWrite(profilePath)) {
    throw new PermissionError(`${profilePath} is not writable`, profilePath);
  }

  try {
    store.append(profilePath, PROFILE_BLOCK);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM' || error.code === 'EROFS')) {
      throw new PermissionError(`${profilePath} is not writable (${error.code})`, profilePath);
    }
    throw error;
  }
  return 'added';
}
