/**
 * Announcement rules
 *
 * One ordered list, evaluated top to bottom; the first rule that matches
 * wins. Stages run in this order:
 *
 *   event    exact lifecycle event names
 *   tool     tool-name membership, tool-use events only
 *   command  shell command patterns, Bash tool-use events only
 *   shell    generic Bash announcement
 *
 * Anything left over is handled by the fallback in resolver.ts. Inside the
 * command stage, version-control patterns come before test runners, which
 * come before generic tool patterns, so `git commit -m "fix test"` is a
 * commit and `npm test` is a test run. The generic tool patterns only match
 * the program being run, not a mention in its arguments.
 */

import type { EventDescriptor } from '../types.js';
import type { MessageKey } from './messages.js';

export type RuleStage = 'event' | 'tool' | 'command' | 'shell';

export interface AnnouncementRule {
  readonly id: string;
  readonly stage: RuleStage;
  /** Sound cue name, resolved against the active sound pack */
  readonly sound: string;
  readonly messageKey: MessageKey;
  matches(descriptor: EventDescriptor): boolean;
}

export const TOOL_USE_EVENTS: ReadonlySet<string> = new Set(['PreToolUse', 'PostToolUse']);

/** The shell execution tool whose command text is inspected */
export const SHELL_TOOL = 'Bash';

export function isToolUseEvent(descriptor: EventDescriptor): boolean {
  return TOOL_USE_EVENTS.has(descriptor.eventName);
}

function eventRule(eventName: string, sound: string, messageKey: MessageKey): AnnouncementRule {
  return {
    id: `event:${eventName}`,
    stage: 'event',
    sound,
    messageKey,
    matches: (d) => d.eventName === eventName,
  };
}

function toolRule(toolNames: readonly string[], sound: string, messageKey: MessageKey): AnnouncementRule {
  const names = new Set(toolNames);
  return {
    id: `tool:${toolNames.join('|')}`,
    stage: 'tool',
    sound,
    messageKey,
    matches: (d) => isToolUseEvent(d) && d.toolName !== undefined && names.has(d.toolName),
  };
}

function commandRule(name: string, pattern: RegExp, sound: string, messageKey: MessageKey): AnnouncementRule {
  return {
    id: `command:${name}`,
    stage: 'command',
    sound,
    messageKey,
    matches: (d) =>
      isToolUseEvent(d) && d.toolName === SHELL_TOOL && d.commandText !== undefined && pattern.test(d.commandText),
  };
}

/** Matches `word` only where a command starts: line start or after `;`, `&`, `|` */
function commandStart(word: string): RegExp {
  return new RegExp(`(?:^|[;&|])\\s*${word}\\b`, 'im');
}

export const ANNOUNCEMENT_RULES: readonly AnnouncementRule[] = Object.freeze([
  eventRule('Notification', 'ready', 'Notification'),
  eventRule('Stop', 'complete', 'Stop'),
  eventRule('SubagentStop', 'complete', 'SubagentStop'),
  eventRule('UserPromptSubmit', 'prompt', 'UserPromptSubmit'),
  eventRule('SessionStart', 'ready', 'SessionStart'),
  eventRule('SessionEnd', 'complete', 'SessionEnd'),
  eventRule('PreCompact', 'list', 'PreCompact'),

  toolRule(['Edit'], 'edit', 'Edit'),
  toolRule(['MultiEdit'], 'edit', 'MultiEdit'),
  toolRule(['Write'], 'write', 'Write'),
  toolRule(['NotebookEdit'], 'edit', 'NotebookEdit'),
  toolRule(['TodoWrite'], 'list', 'TodoWrite'),
  toolRule(['Task'], 'task', 'Task'),
  toolRule(['exit_plan_mode', 'ExitPlanMode'], 'complete', 'ExitPlanMode'),
  toolRule(['Read'], 'read', 'Read'),
  toolRule(['Grep'], 'search', 'Grep'),
  toolRule(['LS'], 'list', 'LS'),
  toolRule(['Glob'], 'search', 'Glob'),
  toolRule(['WebFetch'], 'web', 'WebFetch'),
  toolRule(['WebSearch'], 'search', 'WebSearch'),

  commandRule('git-commit', /\bgit\s+commit\b/i, 'commit', 'git_commit'),
  commandRule('git-push', /\bgit\s+push\b/i, 'push', 'git_push'),
  commandRule('git-pull', /\bgit\s+pull\b/i, 'pull', 'git_pull'),
  commandRule('gh-pr', /\bgh\s+pr\b/i, 'pr', 'gh_pr'),
  commandRule('js-test', /\b(?:npm|yarn|pnpm)\s+(?:run\s+)?test\b/i, 'test', 'test'),
  commandRule('pytest', /\bpytest\b/i, 'test', 'test'),
  commandRule('python-test', /\bpython3?\b.*test/i, 'test', 'test'),
  commandRule('go-test', /\bgo\s+test\b/i, 'test', 'test'),
  commandRule('cargo-test', /\bcargo\s+test\b/i, 'test', 'test'),
  commandRule('make', commandStart('make'), 'build', 'build'),
  commandRule('docker', commandStart('docker'), 'docker', 'docker'),
  commandRule('npm', commandStart('npm'), 'npm', 'npm'),
  commandRule('python', commandStart('python3?'), 'python', 'python'),

  {
    id: 'shell:Bash',
    stage: 'shell',
    sound: 'bash',
    messageKey: 'Bash',
    matches: (d) => isToolUseEvent(d) && d.toolName === SHELL_TOOL,
  },
]);
