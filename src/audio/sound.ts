/**
 * Sound cue lookup and playback.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import type { CommandRunner } from './exec.js';

export const SOUND_EXTENSIONS = ['.wav', '.mp3', '.ogg', '.m4a', '.flac'] as const;

export interface SoundPlayer {
  readonly name: string;
  isAvailable(): boolean;
  play(soundPath: string, volume: number): void;
}

export function isSafeSoundName(name: string): boolean {
  return name.length > 0 && !name.includes('/') && !name.includes('\\') && !name.includes('..');
}

/** First existing <soundsDir>/<soundType>/<name><ext>, or null */
export function findSoundFile(
  soundsDir: string,
  soundType: string,
  name: string,
  exists: (path: string) => boolean = existsSync,
): string | null {
  if (!isSafeSoundName(name)) return null;
  for (const ext of SOUND_EXTENSIONS) {
    const candidate = join(soundsDir, soundType, `${name}${ext}`);
    if (exists(candidate)) return candidate;
  }
  return null;
}

function commandPlayer(
  runner: CommandRunner,
  command: string,
  buildArgs: (soundPath: string, volume: number) => string[],
): SoundPlayer {
  return {
    name: command,
    isAvailable: () => runner.exists(command),
    play: (soundPath, volume) => runner.launch(command, buildArgs(soundPath, volume)),
  };
}

/** Players in order of preference */
export function createSoundPlayers(runner: CommandRunner): SoundPlayer[] {
  return [
    commandPlayer(runner, 'afplay', (path, volume) => (volume < 1 ? [path, '-v', String(volume)] : [path])),
    commandPlayer(runner, 'play', (path, volume) => [path, 'vol', String(volume)]),
    commandPlayer(runner, 'paplay', (path, volume) => [`--volume=${Math.round(volume * 65536)}`, path]),
    commandPlayer(runner, 'aplay', (path) => ['-q', path]),
  ];
}

/** Last resort when no file or player is usable */
export class SystemBeep {
  readonly name = 'system-beep';

  constructor(
    private readonly runner: CommandRunner,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly writeBell: () => void = () => {
      process.stderr.write('\x07');
    },
  ) {}

  play(): void {
    if (this.platform === 'darwin') {
      this.runner.launch('osascript', ['-e', 'beep']);
    } else {
      this.writeBell();
    }
  }
}
