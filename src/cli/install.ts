import * as p from '@clack/prompts';
import chalk from 'chalk';
import { PermissionError, PreconditionError } from '../errors.js';
import { readAnnouncerBindings } from '../hooks/settings.js';
import { install, MARKER_VARIABLE, type InstallOptions, type InstallResult } from '../installer/index.js';

const MODES_HELP = [
  'voice  spoken announcements only',
  'sound  sound effects only',
  'both   spoken announcements and sounds',
].join('\n');

const VOICES_HELP = ['Kyoko (default), Eddy, Flo, Grandma, Grandpa', 'Reed, Rocko, Sandy, Shelley'].join('\n');

function reportStatus(result: InstallResult): void {
  if (!result.shell || !result.profilePath) {
    p.log.warn('Could not detect zsh or bash, no shell profile was changed');
    return;
  }
  p.log.info(`Detected ${result.shell} shell`);
  if (result.status === 'already-configured') {
    p.log.success(`${MARKER_VARIABLE} already in ${result.profilePath}`);
  } else {
    p.log.success(`Added to ${result.profilePath}`);
  }
}

export function installCommand(options: InstallOptions = {}): number {
  p.intro(chalk.bold('voice-hooks install'));

  let result: InstallResult;
  try {
    result = install(options);
  } catch (error) {
    if (error instanceof PreconditionError || error instanceof PermissionError) {
      p.log.error(error.message);
      p.outro(chalk.red('Setup failed.'));
      return 1;
    }
    throw error;
  }

  reportStatus(result);

  const bindings = readAnnouncerBindings(result.settingsPath);
  if (bindings !== null && bindings.length === 0) {
    p.log.warn(`No hook in ${result.settingsPath} runs voice-hooks yet. See settings.example.json.`);
  }

  p.note(
    Object.entries(result.variables)
      .map(([name, value]) => `${name}=${value}`)
      .join('\n'),
    'Current settings',
  );
  p.note(`${MODES_HELP}\n\nVoices:\n${VOICES_HELP}`, 'Available modes');
  p.note("export CLAUDE_HOOK_MODE='both'\nexport CLAUDE_HOOK_VOICE='Sandy'", 'To change settings');

  const source = result.profilePath ? `source ${result.profilePath}` : 'source ~/.zshrc (or ~/.bashrc)';
  p.outro(chalk.green(`Setup complete! Restart your terminal or run: ${source}`));
  return 0;
}
