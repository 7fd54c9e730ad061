import type { EventDescriptor, Language } from '../types.js';
import { messageFor, type MessageKey } from './messages.js';
import { ANNOUNCEMENT_RULES, type AnnouncementRule, type RuleStage } from './rules.js';

export interface Resolution {
  ruleId: string;
  stage: RuleStage | 'fallback';
  sound: string;
  messageKey: MessageKey;
}

export interface ResolvedAnnouncement extends Resolution {
  message: string;
}

/** Compiled-in fallback; always matches */
export function resolveFallback(descriptor: EventDescriptor): Resolution {
  switch (descriptor.eventName) {
    case 'PreToolUse':
      return { ruleId: 'fallback:PreToolUse', stage: 'fallback', sound: 'task', messageKey: 'tool_use' };
    case 'PostToolUse':
      return { ruleId: 'fallback:PostToolUse', stage: 'fallback', sound: 'complete', messageKey: 'tool_done' };
    default:
      return { ruleId: 'fallback:event', stage: 'fallback', sound: 'ready', messageKey: 'generic' };
  }
}

/**
 * First matching rule, or the fallback. Pure: same descriptor and rule
 * list always give the same resolution.
 */
export function resolveRule(
  descriptor: EventDescriptor,
  rules: readonly AnnouncementRule[] = ANNOUNCEMENT_RULES,
): Resolution {
  const rule = rules.find((r) => r.matches(descriptor));
  if (!rule) return resolveFallback(descriptor);
  return { ruleId: rule.id, stage: rule.stage, sound: rule.sound, messageKey: rule.messageKey };
}

export function resolveAnnouncement(
  descriptor: EventDescriptor,
  language: Language,
  rules: readonly AnnouncementRule[] = ANNOUNCEMENT_RULES,
): ResolvedAnnouncement {
  const resolution = resolveRule(descriptor, rules);
  return { ...resolution, message: messageFor(resolution.messageKey, language) };
}
