/**
 * Event Announcer
 *
 * Resolves a descriptor to its announcement, drives the configured output
 * channel and appends one record to the diagnostic log.
 */

import type { AudioOutput } from '../audio/index.js';
import { errorMessage } from '../errors.js';
import type { ActionOutcome, AnnouncerConfig, EventDescriptor, OutputMode } from '../types.js';
import type { Logger } from '../utils/log.js';
import { appendLogRecord, type LogRecord } from './log.js';
import { resolveAnnouncement, type ResolvedAnnouncement } from './resolver.js';

export interface AnnouncedResult {
  kind: 'announced';
  eventName: string;
  announcement: ResolvedAnnouncement;
  actions: ActionOutcome[];
  /** True when test mode kept the backends from running */
  suppressed: boolean;
}

export interface NoOpResult {
  kind: 'noop';
  eventName: string;
  announcement: ResolvedAnnouncement;
  reason: string;
}

export type AnnounceOutcome = AnnouncedResult | NoOpResult;

export interface AnnouncerDeps {
  audio: AudioOutput;
  logger: Logger;
  /** Log sink; defaults to appending to config.logFile */
  appendLog?: (record: LogRecord) => void;
}

const CHANNELS: Record<OutputMode, ReadonlyArray<ActionOutcome['kind']>> = {
  voice: ['speech'],
  sound: ['sound'],
  both: ['speech', 'sound'],
};

export function plannedActions(mode: OutputMode): ReadonlyArray<ActionOutcome['kind']> {
  return CHANNELS[mode];
}

export function announce(descriptor: EventDescriptor, config: AnnouncerConfig, deps: AnnouncerDeps): AnnounceOutcome {
  const { audio, logger } = deps;
  const announcement = resolveAnnouncement(descriptor, config.language);
  logger.debug(`Resolved ${descriptor.eventName} via ${announcement.ruleId}`);

  const muted = config.mutedEvents.includes(descriptor.eventName);
  const actions: ActionOutcome[] = [];

  if (muted) {
    logger.debug(`${descriptor.eventName} is muted`);
  } else {
    for (const kind of plannedActions(config.mode)) {
      if (kind === 'speech') {
        logger.info(`Speaking: ${announcement.message}`);
        actions.push(config.testMode ? { kind, performed: false, detail: 'test mode' } : audio.speak(announcement.message));
      } else {
        logger.info(`Playing sound '${announcement.sound}' for event`);
        actions.push(config.testMode ? { kind, performed: false, detail: 'test mode' } : audio.playSound(announcement.sound));
      }
    }
    if (config.testMode) {
      logger.info(`TEST MODE: would play ${announcement.sound} and/or speak ${announcement.messageKey}`);
    }
  }

  const record: LogRecord = {
    timestamp: new Date().toISOString(),
    event_name: descriptor.eventName,
    tool_name: descriptor.toolName,
    session_id: descriptor.sessionId,
    rule: announcement.ruleId,
    message: announcement.message,
    mode: config.mode,
    actions,
    test_mode: config.testMode,
    muted,
  };

  try {
    (deps.appendLog ?? ((r: LogRecord) => appendLogRecord(config.logFile, r)))(record);
  } catch (error) {
    logger.error(`Failed to log event: ${errorMessage(error)}`);
  }

  if (muted) {
    return { kind: 'noop', eventName: descriptor.eventName, announcement, reason: 'event muted' };
  }
  return {
    kind: 'announced',
    eventName: descriptor.eventName,
    announcement,
    actions,
    suppressed: config.testMode,
  };
}
