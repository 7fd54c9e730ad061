/**
 * Diagnostic trail: one JSON object per line, append-only.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { ActionOutcome, OutputMode } from '../types.js';

export interface LogRecord {
  timestamp: string;
  event_name: string;
  tool_name?: string;
  session_id?: string;
  rule: string;
  message: string;
  mode: OutputMode;
  actions: ActionOutcome[];
  test_mode: boolean;
  muted: boolean;
}

/** Append one record as a single O_APPEND write; creates the directory */
export function appendLogRecord(logPath: string, record: LogRecord): void {
  mkdirSync(dirname(logPath), { recursive: true });
  appendFileSync(logPath, JSON.stringify(record) + '\n', { encoding: 'utf-8', flag: 'a' });
}
