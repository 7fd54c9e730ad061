/**
 * Editor settings inspection
 *
 * Reads the `hooks` section of settings.json, which binds event names and
 * optional tool matchers to commands:
 *
 *   { "hooks": { "PreToolUse": [{ "matcher": "Bash", "hooks": [{ "type": "command", "command": "..." }] }] } }
 *
 * The file belongs to the editor; this module only reads it.
 */

import { join } from 'path';
import { getConfigDir } from '../utils/config-dir.js';
import { readJsonFile } from '../utils/index.js';

export interface HookBinding {
  event: string;
  matcher?: string;
  command: string;
}

export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), 'settings.json');
}

/** True when a hook command runs this tool */
export function isAnnouncerHook(command: string): boolean {
  return /voice-hooks/i.test(command);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Every command hook in the settings that runs this tool */
export function findAnnouncerBindings(settings: unknown): HookBinding[] {
  if (!isRecord(settings) || !isRecord(settings.hooks)) return [];

  const bindings: HookBinding[] = [];
  for (const [event, groups] of Object.entries(settings.hooks)) {
    if (!Array.isArray(groups)) continue;
    for (const group of groups) {
      if (!isRecord(group) || !Array.isArray(group.hooks)) continue;
      for (const hook of group.hooks) {
        if (!isRecord(hook) || hook.type !== 'command' || typeof hook.command !== 'string') continue;
        if (!isAnnouncerHook(hook.command)) continue;
        bindings.push({
          event,
          matcher: typeof group.matcher === 'string' && group.matcher ? group.matcher : undefined,
          command: hook.command,
        });
      }
    }
  }
  return bindings;
}

export function readAnnouncerBindings(settingsPath: string): HookBinding[] | null {
  const settings = readJsonFile(settingsPath);
  return settings === null ? null : findAnnouncerBindings(settings);
}
