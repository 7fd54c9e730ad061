/**
 * voice-hooks
 * Spoken and sound announcements for Claude Code hook events.
 */

// Core types
export type { ActionOutcome, AnnouncerConfig, EventDescriptor, Language, OutputMode } from './types.js';
export { BackendUnavailableError, InputError, PermissionError, PreconditionError } from './errors.js';

// Configuration
export { loadConfig, readSettingsFile, DEFAULT_VOICES, ENV, type SettingsFile } from './config/loader.js';

// Hook input and settings
export { parseEventDescriptor, toEventDescriptor } from './hooks/event-input.js';
export { findAnnouncerBindings, isAnnouncerHook, type HookBinding } from './hooks/settings.js';

// Announcer
export { announce, type AnnounceOutcome, type AnnouncedResult, type NoOpResult } from './announcer/index.js';
export { resolveAnnouncement, resolveRule, resolveFallback, type Resolution } from './announcer/resolver.js';
export { ANNOUNCEMENT_RULES, type AnnouncementRule } from './announcer/rules.js';
export { MESSAGES, messageFor, type MessageKey } from './announcer/messages.js';
export { appendLogRecord, type LogRecord } from './announcer/log.js';

// Audio
export { createSystemAudio, SystemAudio, type AudioOutput } from './audio/index.js';

// Installer
export { install, type InstallOptions, type InstallResult } from './installer/index.js';
