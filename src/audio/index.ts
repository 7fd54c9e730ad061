/**
 * Audio output
 *
 * Picks the first available speech backend and sound player at call time.
 * Backend failures are logged and reported in the returned outcome; they
 * never propagate to the announcer.
 */

import { DEFAULT_VOICES } from '../config/loader.js';
import { BackendUnavailableError, errorMessage } from '../errors.js';
import type { ActionOutcome, AnnouncerConfig } from '../types.js';
import type { Logger } from '../utils/log.js';
import { createSystemRunner, type CommandRunner } from './exec.js';
import { createSoundPlayers, findSoundFile, isSafeSoundName, SystemBeep, type SoundPlayer } from './sound.js';
import { EspeakBackend, MacSayBackend, resolveVoice, type SpeechBackend } from './speech.js';

export interface AudioOutput {
  speak(text: string): ActionOutcome;
  playSound(soundName: string): ActionOutcome;
}

type AudioSettings = Pick<AnnouncerConfig, 'voiceName' | 'language' | 'rate' | 'volume' | 'soundsDir' | 'soundType'>;

export interface SystemAudioOptions {
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  speechBackends?: SpeechBackend[];
  soundPlayers?: SoundPlayer[];
  beep?: SystemBeep;
  fileExists?: (path: string) => boolean;
}

export class SystemAudio implements AudioOutput {
  private readonly speechBackends: SpeechBackend[];
  private readonly soundPlayers: SoundPlayer[];
  private readonly beep: SystemBeep;
  private readonly fileExists?: (path: string) => boolean;

  constructor(
    private readonly settings: AudioSettings,
    private readonly logger: Logger,
    options: SystemAudioOptions = {},
  ) {
    const runner =
      options.runner ??
      createSystemRunner((command, error) => logger.warn(`Failed to start ${command}: ${error.message}`));
    const platform = options.platform ?? process.platform;
    this.speechBackends = options.speechBackends ?? [new MacSayBackend(runner, platform), new EspeakBackend(runner)];
    this.soundPlayers = options.soundPlayers ?? createSoundPlayers(runner);
    this.beep = options.beep ?? new SystemBeep(runner, platform);
    this.fileExists = options.fileExists;
  }

  speak(text: string): ActionOutcome {
    try {
      const backend = this.speechBackends.find((b) => b.isAvailable());
      if (!backend) {
        throw new BackendUnavailableError('No speech backend available (install say or espeak)', 'speech');
      }

      const { voiceName, language, rate } = this.settings;
      const choice = resolveVoice(voiceName, backend.listVoices(), DEFAULT_VOICES[language]);
      if (choice.degraded) {
        this.logger.warn(`Voice "${voiceName}" is not installed, using ${choice.voice ?? 'the system default voice'}`);
      }

      backend.speak(text, { voice: choice.voice, rate, language });
      this.logger.debug(`Spoke text using ${backend.name}`);
      return { kind: 'speech', performed: true, backend: backend.name, detail: choice.voice };
    } catch (error) {
      this.logger.warn(`Speech output skipped: ${errorMessage(error)}`);
      return { kind: 'speech', performed: false, detail: errorMessage(error) };
    }
  }

  playSound(soundName: string): ActionOutcome {
    if (!isSafeSoundName(soundName)) {
      this.logger.error(`Invalid sound name: ${soundName}`);
      return { kind: 'sound', performed: false, detail: `invalid sound name: ${soundName}` };
    }

    try {
      const { soundsDir, soundType, volume } = this.settings;
      const soundPath = findSoundFile(soundsDir, soundType, soundName, this.fileExists);
      if (!soundPath) {
        this.logger.warn(`Sound file not found: ${soundName}, using system beep`);
        return this.playBeep();
      }

      const player = this.soundPlayers.find((p) => p.isAvailable());
      if (!player) {
        this.logger.warn('No audio player available, using system beep');
        return this.playBeep();
      }

      player.play(soundPath, volume);
      this.logger.debug(`Played ${soundName} using ${player.name}`);
      return { kind: 'sound', performed: true, backend: player.name, detail: soundPath };
    } catch (error) {
      this.logger.warn(`Sound output skipped: ${errorMessage(error)}`);
      return { kind: 'sound', performed: false, detail: errorMessage(error) };
    }
  }

  private playBeep(): ActionOutcome {
    try {
      this.beep.play();
      return { kind: 'sound', performed: true, backend: this.beep.name };
    } catch (error) {
      throw new BackendUnavailableError(`System beep failed: ${errorMessage(error)}`, this.beep.name);
    }
  }
}

export function createSystemAudio(settings: AudioSettings, logger: Logger, options?: SystemAudioOptions): AudioOutput {
  return new SystemAudio(settings, logger, options);
}

/** Availability of every known backend, for diagnostics */
export function describeBackends(runner: CommandRunner = createSystemRunner()): Array<{ name: string; available: boolean }> {
  const speech: SpeechBackend[] = [new MacSayBackend(runner), new EspeakBackend(runner)];
  return [
    ...speech.map((b) => ({ name: b.name, available: b.isAvailable() })),
    ...createSoundPlayers(runner).map((p) => ({ name: p.name, available: p.isAvailable() })),
  ];
}
