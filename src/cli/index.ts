#!/usr/bin/env node

/**
 * voice-hooks CLI
 *
 * Commands:
 * - announce: hook entry point, reads one event from stdin
 * - install: add the voice settings to the shell profile
 * - status: show configuration, audio backends and hook bindings
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../errors.js';
import { getRuntimePackageVersion } from '../lib/version.js';
import { announceCommand } from './announce.js';
import { installCommand } from './install.js';
import { statusCommand } from './status.js';

const program = new Command();

program
  .name('voice-hooks')
  .description('Spoken and sound announcements for Claude Code hook events')
  .version(getRuntimePackageVersion());

program
  .command('announce')
  .description('Announce the hook event read from stdin')
  .addHelpText('after', `
Configure it as a command hook in ~/.claude/settings.json:
  "Notification": [{ "hooks": [{ "type": "command", "command": "voice-hooks announce" }] }]

Environment:
  CLAUDE_HOOK_MODE    voice | sound | both (default: voice)
  CLAUDE_HOOK_VOICE   voice name (default: Kyoko)
  CLAUDE_HOOK_DEBUG   true to print debug output
  CLAUDE_HOOK_TEST    true to resolve and log without producing audio`)
  .action(async () => {
    process.exitCode = await announceCommand();
  });

program
  .command('install')
  .description('Add the voice settings to your shell profile')
  .action(() => {
    process.exitCode = installCommand();
  });

program
  .command('status')
  .description('Show configuration, audio backends and hook bindings')
  .action(() => {
    statusCommand();
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`[voice-hooks] ${errorMessage(error)}`));
  process.exitCode = 1;
});
