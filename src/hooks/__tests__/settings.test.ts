import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { findAnnouncerBindings, getSettingsPath, isAnnouncerHook, readAnnouncerBindings } from '../settings.js';

const TEST_DIR = join(tmpdir(), `voice-hooks-settings-test-${process.pid}`);

describe('isAnnouncerHook', () => {
  it('returns true for commands that run voice-hooks', () => {
    expect(isAnnouncerHook('voice-hooks announce')).toBe(true);
    expect(isAnnouncerHook('npx voice-hooks announce')).toBe(true);
    expect(isAnnouncerHook('node /opt/voice-hooks/dist/cli/index.js announce')).toBe(true);
  });

  it('is case-insensitive', () => {
    expect(isAnnouncerHook('VOICE-HOOKS announce')).toBe(true);
  });

  it('returns false for other hooks', () => {
    expect(isAnnouncerHook('node ~/.claude/hooks/other-plugin.mjs')).toBe(false);
    expect(isAnnouncerHook('python /usr/bin/custom-hook.py')).toBe(false);
  });
});

describe('findAnnouncerBindings', () => {
  it('lists every command hook that runs voice-hooks', () => {
    const settings = {
      hooks: {
        Notification: [{ hooks: [{ type: 'command', command: 'voice-hooks announce' }] }],
        PreToolUse: [
          {
            matcher: 'Bash|Edit',
            hooks: [
              { type: 'command', command: 'node ~/.claude/hooks/guard.mjs' },
              { type: 'command', command: 'voice-hooks announce' },
            ],
          },
        ],
        Stop: [{ matcher: '', hooks: [{ type: 'command', command: 'eslint --fix' }] }],
      },
    };

    expect(findAnnouncerBindings(settings)).toEqual([
      { event: 'Notification', matcher: undefined, command: 'voice-hooks announce' },
      { event: 'PreToolUse', matcher: 'Bash|Edit', command: 'voice-hooks announce' },
    ]);
  });

  it('skips malformed entries', () => {
    const settings = {
      hooks: {
        Notification: 'voice-hooks announce',
        Stop: [null, { hooks: 'x' }, { hooks: [{ type: 'prompt', command: 'voice-hooks announce' }] }],
      },
    };
    expect(findAnnouncerBindings(settings)).toEqual([]);
  });

  it('returns an empty list when there is no hooks section', () => {
    expect(findAnnouncerBindings({})).toEqual([]);
    expect(findAnnouncerBindings(null)).toEqual([]);
    expect(findAnnouncerBindings([])).toEqual([]);
  });
});

describe('readAnnouncerBindings', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('returns null when the settings file is missing', () => {
    expect(readAnnouncerBindings(join(TEST_DIR, 'settings.json'))).toBeNull();
  });

  it('reads bindings from the settings file', () => {
    mkdirSync(TEST_DIR, { recursive: true });
    const path = getSettingsPath({ CLAUDE_CONFIG_DIR: TEST_DIR });
    writeFileSync(
      path,
      JSON.stringify({ hooks: { Stop: [{ hooks: [{ type: 'command', command: 'voice-hooks announce' }] }] } }),
    );

    expect(path).toBe(join(TEST_DIR, 'settings.json'));
    expect(readAnnouncerBindings(path)).toEqual([{ event: 'Stop', matcher: undefined, command: 'voice-hooks announce' }]);
  });
});
