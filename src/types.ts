/** Output channel selection */
export type OutputMode = 'voice' | 'sound' | 'both';

/** Languages with a complete message table */
export type Language = 'ja' | 'en';

/** One lifecycle occurrence reported by the editor */
export interface EventDescriptor {
  readonly eventName: string;
  readonly toolName?: string;
  readonly commandText?: string;
  readonly sessionId?: string;
}

/** Process-wide settings, captured once at startup */
export interface AnnouncerConfig {
  readonly mode: OutputMode;
  readonly voiceName: string;
  readonly language: Language;
  /** Speech rate in words per minute */
  readonly rate: number;
  /** Sound volume, 0.0 to 1.0 */
  readonly volume: number;
  /** Sound pack directory name under soundsDir */
  readonly soundType: string;
  readonly soundsDir: string;
  readonly logFile: string;
  readonly debug: boolean;
  readonly testMode: boolean;
  /** Event names that resolve but never produce audio */
  readonly mutedEvents: readonly string[];
}

/** Result of a single audio action */
export interface ActionOutcome {
  kind: 'speech' | 'sound';
  performed: boolean;
  backend?: string;
  detail?: string;
}
