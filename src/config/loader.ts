/**
 * Configuration loader
 *
 * Layers three sources into one frozen AnnouncerConfig:
 *   1. built-in defaults
 *   2. the optional JSON settings file (<configDir>/voice-hooks.json,
 *      or the path in CLAUDE_HOOK_CONFIG)
 *   3. CLAUDE_HOOK_* environment variables
 *
 * Invalid values never abort a hook; they are reported and the next
 * layer down is used instead.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { AnnouncerConfig, Language } from '../types.js';
import { getConfigDir } from '../utils/config-dir.js';
import { createLogger, type Logger } from '../utils/log.js';

export const ENV = {
  MODE: 'CLAUDE_HOOK_MODE',
  VOICE: 'CLAUDE_HOOK_VOICE',
  LANGUAGE: 'CLAUDE_HOOK_LANGUAGE',
  RATE: 'CLAUDE_HOOK_RATE',
  SOUND_TYPE: 'CLAUDE_HOOK_SOUND_TYPE',
  SOUNDS_DIR: 'CLAUDE_HOOK_SOUNDS_DIR',
  LOG_FILE: 'CLAUDE_HOOK_LOG_FILE',
  CONFIG: 'CLAUDE_HOOK_CONFIG',
  DEBUG: 'CLAUDE_HOOK_DEBUG',
  TEST: 'CLAUDE_HOOK_TEST',
} as const;

/** Default macOS voice per language */
export const DEFAULT_VOICES: Record<Language, string> = {
  ja: 'Kyoko',
  en: 'Samantha',
};

export const DEFAULT_RATE = 200;

const OutputModeSchema = z.enum(['voice', 'sound', 'both']);
const LanguageSchema = z.enum(['ja', 'en']);
const RateSchema = z.number().int().min(50).max(600);
const SoundTypeSchema = z.string().regex(/^[\w-]+$/, 'must be a plain directory name');

export const SettingsFileSchema = z.object({
  mode: OutputModeSchema.optional(),
  voice: z.string().min(1).optional(),
  language: LanguageSchema.optional(),
  rate: RateSchema.optional(),
  volume: z.number().min(0).max(1).optional(),
  soundType: SoundTypeSchema.optional(),
  soundsDir: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
  mutedEvents: z.array(z.string()).optional(),
});

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export function getSettingsFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV.CONFIG] || join(getConfigDir(env), 'voice-hooks.json');
}

/** Expand a leading ~ to the home directory */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function isTrue(value: string | undefined): boolean {
  return (value ?? '').trim().toLowerCase() === 'true';
}

/**
 * Read and validate the settings file. A missing file is an empty layer;
 * an unreadable or invalid one is reported and ignored.
 */
export function readSettingsFile(path: string, logger: Logger): SettingsFile {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse ${path}, ignoring it (${String(error)})`);
    return {};
  }

  const parsed = SettingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    logger.warn(`Invalid settings in ${path}, ignoring it: ${issues.join('; ')}`);
    return {};
  }
  return parsed.data;
}

function envValue<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T>,
  logger: Logger,
): T | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = schema.safeParse(raw.trim());
  if (!parsed.success) {
    logger.warn(`Ignoring ${name}="${raw}": ${parsed.error.issues[0]?.message ?? 'invalid value'}`);
    return undefined;
  }
  return parsed.data;
}

/**
 * Build the process configuration. Call once at startup and pass the
 * result down; nothing else reads CLAUDE_HOOK_* variables.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = createLogger(false),
): AnnouncerConfig {
  const file = readSettingsFile(getSettingsFilePath(env), logger);
  const configDir = getConfigDir(env);

  const language = envValue(env, ENV.LANGUAGE, LanguageSchema, logger) ?? file.language ?? 'ja';
  const rate = envValue(env, ENV.RATE, z.coerce.number().pipe(RateSchema), logger) ?? file.rate ?? DEFAULT_RATE;
  const soundsDir = env[ENV.SOUNDS_DIR] || file.soundsDir || join(configDir, 'voice-hooks', 'sounds');
  const logFile = env[ENV.LOG_FILE] || file.logFile || join(configDir, 'logs', 'voice-hooks.jsonl');

  return Object.freeze({
    mode: envValue(env, ENV.MODE, OutputModeSchema, logger) ?? file.mode ?? 'voice',
    voiceName: env[ENV.VOICE]?.trim() || file.voice || DEFAULT_VOICES[language],
    language,
    rate,
    volume: file.volume ?? 1.0,
    soundType: envValue(env, ENV.SOUND_TYPE, SoundTypeSchema, logger) ?? file.soundType ?? 'beeps',
    soundsDir: expandHome(soundsDir),
    logFile: expandHome(logFile),
    debug: isTrue(env[ENV.DEBUG]),
    testMode: isTrue(env[ENV.TEST]),
    mutedEvents: Object.freeze([...(file.mutedEvents ?? [])]),
  });
}
