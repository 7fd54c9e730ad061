/**
 * Speech synthesis backends: macOS `say` and Linux `espeak`.
 */

import { DEFAULT_RATE } from '../config/loader.js';
import type { Language } from '../types.js';
import type { CommandRunner } from './exec.js';

export interface SpeechOptions {
  /** Voice name; omitted means the system default voice */
  voice?: string;
  rate: number;
  language: Language;
}

export interface SpeechBackend {
  readonly name: string;
  isAvailable(): boolean;
  /** Installed voice names, or null when the backend cannot list them */
  listVoices(): string[] | null;
  speak(text: string, options: SpeechOptions): void;
}

/**
 * Parse `say -v ?` output. Each line looks like
 *   Kyoko               ja_JP    # こんにちは、私の名前はKyokoです。
 *   Sandy (Japanese (Japan)) ja_JP    # こんにちは、私の名前はSandyです。
 * Names are kept as listed, since `say -v` expects the full entry.
 */
export function parseSayVoices(output: string): string[] {
  const voices: string[] = [];
  for (const line of output.split('\n')) {
    const match = line.match(/^(.+?)\s+([a-z]{2,3}[_-][A-Za-z0-9]+)\s+#/);
    if (match) voices.push(match[1].trim());
  }
  return voices;
}

/** `Sandy (Japanese (Japan))` → `Sandy`; plain names are returned unchanged */
export function voiceBaseName(listed: string): string {
  const paren = listed.indexOf(' (');
  return paren === -1 ? listed : listed.slice(0, paren);
}

export class MacSayBackend implements SpeechBackend {
  readonly name = 'say';

  constructor(
    private readonly runner: CommandRunner,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  isAvailable(): boolean {
    return this.platform === 'darwin' && this.runner.exists('say');
  }

  listVoices(): string[] | null {
    try {
      return parseSayVoices(this.runner.capture('say', ['-v', '?']));
    } catch {
      return null;
    }
  }

  speak(text: string, options: SpeechOptions): void {
    const args: string[] = [];
    if (options.voice) args.push('-v', options.voice);
    if (options.rate !== DEFAULT_RATE) args.push('-r', String(options.rate));
    args.push(text);
    this.runner.launch('say', args);
  }
}

/** espeak picks voices by language code, so voice names do not apply */
export class EspeakBackend implements SpeechBackend {
  readonly name = 'espeak';

  constructor(private readonly runner: CommandRunner) {}

  isAvailable(): boolean {
    return this.runner.exists('espeak');
  }

  listVoices(): string[] | null {
    return null;
  }

  speak(text: string, options: SpeechOptions): void {
    this.runner.launch('espeak', ['-s', String(options.rate), '-v', options.language, text]);
  }
}

export interface VoiceChoice {
  voice?: string;
  degraded: boolean;
}

/**
 * Pick the voice to use, matching either the listed name or its part before
 * ` (`. An unknown voice degrades to the fallback, and to the system
 * default when the fallback is missing as well.
 */
export function resolveVoice(requested: string, available: readonly string[] | null, fallback: string): VoiceChoice {
  if (available === null) return { voice: requested, degraded: false };

  const find = (name: string) => {
    const target = name.toLowerCase();
    return available.find((v) => v.toLowerCase() === target || voiceBaseName(v).toLowerCase() === target);
  };
  const exact = find(requested);
  if (exact) return { voice: exact, degraded: false };

  return { voice: find(fallback), degraded: true };
}
