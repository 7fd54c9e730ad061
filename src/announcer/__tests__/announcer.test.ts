import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { announce, plannedActions } from '../index.js';
import type { LogRecord } from '../log.js';
import type { ActionOutcome, AnnouncerConfig, EventDescriptor } from '../../types.js';

const TEST_DIR = join(tmpdir(), `voice-hooks-announcer-test-${process.pid}`);
const LOG_FILE = join(TEST_DIR, 'logs', 'voice-hooks.jsonl');

function makeConfig(overrides: Partial<AnnouncerConfig> = {}): AnnouncerConfig {
  return {
    mode: 'voice',
    voiceName: 'Kyoko',
    language: 'ja',
    rate: 200,
    volume: 1,
    soundType: 'beeps',
    soundsDir: join(TEST_DIR, 'sounds'),
    logFile: LOG_FILE,
    debug: false,
    testMode: false,
    mutedEvents: [],
    ...overrides,
  };
}

function makeAudio() {
  return {
    speak: vi.fn<(text: string) => ActionOutcome>(() => ({ kind: 'speech', performed: true, backend: 'say' })),
    playSound: vi.fn<(sound: string) => ActionOutcome>(() => ({ kind: 'sound', performed: true, backend: 'afplay' })),
  };
}

function makeLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  };
}

const NOTIFICATION: EventDescriptor = { eventName: 'Notification' };
const COMMIT: EventDescriptor = { eventName: 'PreToolUse', toolName: 'Bash', commandText: 'git commit -m "wip"' };

describe('announce', () => {
  let audio: ReturnType<typeof makeAudio>;
  let logger: ReturnType<typeof makeLogger>;
  let appendLog: Mock<(record: LogRecord) => void>;

  beforeEach(() => {
    audio = makeAudio();
    logger = makeLogger();
    appendLog = vi.fn<(record: LogRecord) => void>();
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('speaks the resolved message in voice mode', () => {
    const result = announce(NOTIFICATION, makeConfig(), { audio, logger, appendLog });

    expect(audio.speak).toHaveBeenCalledWith('クロードが準備完了しました');
    expect(audio.playSound).not.toHaveBeenCalled();
    expect(result.kind).toBe('announced');
    if (result.kind === 'announced') {
      expect(result.actions).toEqual([{ kind: 'speech', performed: true, backend: 'say' }]);
      expect(result.suppressed).toBe(false);
    }
  });

  it('plays the rule sound in sound mode', () => {
    announce(COMMIT, makeConfig({ mode: 'sound' }), { audio, logger, appendLog });

    expect(audio.playSound).toHaveBeenCalledWith('commit');
    expect(audio.speak).not.toHaveBeenCalled();
  });

  it('speaks and then plays in both mode', () => {
    const result = announce(COMMIT, makeConfig({ mode: 'both' }), { audio, logger, appendLog });

    expect(audio.speak).toHaveBeenCalledWith('Gitコミットを作成しています');
    expect(audio.playSound).toHaveBeenCalledWith('commit');
    expect(result.kind === 'announced' && result.actions.map((a) => a.kind)).toEqual(['speech', 'sound']);
  });

  it('resolves Notification to the same message in every mode', () => {
    for (const mode of ['voice', 'sound', 'both'] as const) {
      const result = announce(NOTIFICATION, makeConfig({ mode }), { audio, logger, appendLog });
      expect(result.announcement.message).toBe('クロードが準備完了しました');
    }
  });

  it('suppresses audio in test mode but still resolves and logs', () => {
    const result = announce(COMMIT, makeConfig({ mode: 'both', testMode: true }), { audio, logger, appendLog });

    expect(audio.speak).not.toHaveBeenCalled();
    expect(audio.playSound).not.toHaveBeenCalled();
    expect(result.kind).toBe('announced');
    if (result.kind === 'announced') {
      expect(result.suppressed).toBe(true);
      expect(result.announcement.message).toBe('Gitコミットを作成しています');
      expect(result.actions).toEqual([
        { kind: 'speech', performed: false, detail: 'test mode' },
        { kind: 'sound', performed: false, detail: 'test mode' },
      ]);
    }
    expect(appendLog).toHaveBeenCalledTimes(1);
    expect(appendLog.mock.calls[0][0]).toMatchObject({
      event_name: 'PreToolUse',
      tool_name: 'Bash',
      rule: 'command:git-commit',
      message: 'Gitコミットを作成しています',
      mode: 'both',
      test_mode: true,
      muted: false,
    });
    expect(logger.info).toHaveBeenCalledWith('TEST MODE: would play commit and/or speak git_commit');
  });

  it('returns a no-op for muted events and logs them', () => {
    const result = announce(NOTIFICATION, makeConfig({ mutedEvents: ['Notification'] }), { audio, logger, appendLog });

    expect(result).toMatchObject({ kind: 'noop', eventName: 'Notification', reason: 'event muted' });
    expect(audio.speak).not.toHaveBeenCalled();
    expect(appendLog.mock.calls[0][0]).toMatchObject({ muted: true, actions: [] });
  });

  it('keeps going when the log cannot be written', () => {
    appendLog.mockImplementation(() => {
      throw new Error('disk full');
    });

    const result = announce(NOTIFICATION, makeConfig(), { audio, logger, appendLog });

    expect(result.kind).toBe('announced');
    expect(logger.error).toHaveBeenCalledWith('Failed to log event: disk full');
  });

  it('appends one JSON line per invocation to the log file', () => {
    const config = makeConfig({ testMode: true });
    announce(NOTIFICATION, config, { audio, logger });
    announce(COMMIT, config, { audio, logger });

    expect(existsSync(LOG_FILE)).toBe(true);
    const lines = readFileSync(LOG_FILE, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    const records: LogRecord[] = lines.map((line) => JSON.parse(line));
    expect(records.map((r) => r.event_name)).toEqual(['Notification', 'PreToolUse']);
    expect(records[1].message).toBe('Gitコミットを作成しています');
    expect(Number.isNaN(Date.parse(records[0].timestamp))).toBe(false);
  });

  it('appends to an existing log without rewriting it', () => {
    mkdirSync(join(TEST_DIR, 'logs'), { recursive: true });
    announce(NOTIFICATION, makeConfig({ testMode: true }), { audio, logger });
    const first = readFileSync(LOG_FILE, 'utf-8');

    announce(NOTIFICATION, makeConfig({ testMode: true }), { audio, logger });

    expect(readFileSync(LOG_FILE, 'utf-8').startsWith(first)).toBe(true);
  });

  it('gives the same result and side effects for the same input', () => {
    const config = makeConfig({ mode: 'both' });
    const first = announce(COMMIT, config, { audio, logger, appendLog });
    const second = announce(COMMIT, config, { audio, logger, appendLog });

    expect(second).toEqual(first);
    expect(audio.speak.mock.calls[0]).toEqual(audio.speak.mock.calls[1]);
    expect(audio.playSound.mock.calls[0]).toEqual(audio.playSound.mock.calls[1]);
  });
});

describe('plannedActions', () => {
  it('maps each mode to its channels', () => {
    expect(plannedActions('voice')).toEqual(['speech']);
    expect(plannedActions('sound')).toEqual(['sound']);
    expect(plannedActions('both')).toEqual(['speech', 'sound']);
  });
});
