import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { statusCommand } from '../status.js';
import type { CommandRunner } from '../../audio/exec.js';

const TEST_DIR = join(tmpdir(), `voice-hooks-status-test-${process.pid}`);
const SETTINGS = join(TEST_DIR, 'settings.json');

const runner: CommandRunner = {
  exists: (command) => command === 'espeak',
  capture: () => '',
  launch: () => {},
};

describe('statusCommand', () => {
  let logSpy: MockInstance<typeof console.log>;
  let previousLevel: typeof chalk.level;

  const output = () => logSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    mkdirSync(TEST_DIR, { recursive: true });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = previousLevel;
    logSpy.mockRestore();
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('prints the effective configuration and backend availability', () => {
    statusCommand({ CLAUDE_CONFIG_DIR: TEST_DIR, CLAUDE_HOOK_MODE: 'both' }, runner);

    const lines = output();
    expect(lines).toContain('  mode:        both');
    expect(lines).toContain('  voice:       Kyoko');
    expect(lines).toContain('  language:    ja');
    expect(lines).toContain(`  sounds:      ${join(TEST_DIR, 'voice-hooks', 'sounds')} (beeps)`);
    expect(lines).toContain(`  log file:    ${join(TEST_DIR, 'logs', 'voice-hooks.jsonl')}`);
    expect(lines).toContain('  muted:       none');
    expect(lines).toContain('  ✘ say');
    expect(lines).toContain('  ✔ espeak');
  });

  it('reports a missing settings.json', () => {
    statusCommand({ CLAUDE_CONFIG_DIR: TEST_DIR }, runner);

    expect(output().at(-1)).toBe(`  ${SETTINGS} not found`);
  });

  it('reports settings without any voice-hooks binding', () => {
    writeFileSync(SETTINGS, JSON.stringify({ hooks: {} }));

    statusCommand({ CLAUDE_CONFIG_DIR: TEST_DIR }, runner);

    expect(output().at(-1)).toBe(`  No hook in ${SETTINGS} runs voice-hooks`);
  });

  it('lists the bindings that run voice-hooks', () => {
    writeFileSync(
      SETTINGS,
      JSON.stringify({
        hooks: {
          PreToolUse: [{ matcher: 'Bash', hooks: [{ type: 'command', command: 'voice-hooks announce' }] }],
          Stop: [{ hooks: [{ type: 'command', command: 'voice-hooks announce' }] }],
        },
      }),
    );

    statusCommand({ CLAUDE_CONFIG_DIR: TEST_DIR }, runner);

    expect(output().slice(-2)).toEqual(['  PreToolUse [Bash]: voice-hooks announce', '  Stop: voice-hooks announce']);
  });
});
