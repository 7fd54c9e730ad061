/**
 * Hook payload parsing.
 *
 * Claude Code writes one JSON object per hook invocation to stdin, using
 * snake_case keys. camelCase spellings are accepted too.
 */

import { z } from 'zod';
import { InputError } from '../errors.js';
import type { EventDescriptor } from '../types.js';

const ToolInputSchema = z.record(z.unknown());

const HookPayloadSchema = z
  .object({
    hook_event_name: z.string().optional(),
    hookEventName: z.string().optional(),
    tool_name: z.string().optional(),
    toolName: z.string().optional(),
    tool_input: ToolInputSchema.optional(),
    toolInput: ToolInputSchema.optional(),
    session_id: z.string().optional(),
    sessionId: z.string().optional(),
  })
  .passthrough();

/**
 * Normalize a decoded payload into an immutable EventDescriptor.
 * @throws InputError when the payload is not an object or has no event name
 */
export function toEventDescriptor(raw: unknown): EventDescriptor {
  const parsed = HookPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InputError(`Invalid hook payload${where}: ${issue?.message ?? 'unknown shape'}`);
  }

  const payload = parsed.data;
  const eventName = (payload.hook_event_name ?? payload.hookEventName ?? '').trim();
  if (!eventName) {
    throw new InputError('Hook payload has no hook_event_name');
  }

  const toolInput = payload.tool_input ?? payload.toolInput;
  const command = toolInput?.command;

  const descriptor: EventDescriptor = {
    eventName,
    toolName: payload.tool_name ?? payload.toolName,
    commandText: typeof command === 'string' ? command : undefined,
    sessionId: payload.session_id ?? payload.sessionId,
  };
  return Object.freeze(descriptor);
}

/**
 * Parse raw stdin text.
 * @throws InputError on empty input or malformed JSON
 */
export function parseEventDescriptor(text: string): EventDescriptor {
  if (!text.trim()) {
    throw new InputError('No hook payload received on stdin');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InputError(`Error parsing JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return toEventDescriptor(raw);
}
