import { homedir } from 'node:os';
import { join } from 'node:path';

/** Editor configuration directory (respects CLAUDE_CONFIG_DIR) */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CLAUDE_CONFIG_DIR || join(homedir(), '.claude');
}
