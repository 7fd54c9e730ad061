import chalk from 'chalk';
import { describeBackends } from '../audio/index.js';
import { createSystemRunner, type CommandRunner } from '../audio/exec.js';
import { getSettingsFilePath, loadConfig } from '../config/loader.js';
import { getSettingsPath, readAnnouncerBindings } from '../hooks/settings.js';

export function statusCommand(
  env: NodeJS.ProcessEnv = process.env,
  runner: CommandRunner = createSystemRunner(),
): void {
  const config = loadConfig(env);

  console.log(chalk.blue('voice-hooks status\n'));

  console.log(chalk.bold('Configuration'));
  console.log(`  mode:        ${config.mode}`);
  console.log(`  voice:       ${config.voiceName}`);
  console.log(`  language:    ${config.language}`);
  console.log(`  rate:        ${config.rate}`);
  console.log(`  sounds:      ${config.soundsDir} (${config.soundType})`);
  console.log(`  log file:    ${config.logFile}`);
  console.log(`  test mode:   ${config.testMode}`);
  console.log(`  muted:       ${config.mutedEvents.length > 0 ? config.mutedEvents.join(', ') : 'none'}`);
  console.log(chalk.gray(`  settings file: ${getSettingsFilePath(env)}`));

  console.log(chalk.bold('\nAudio backends'));
  for (const backend of describeBackends(runner)) {
    const mark = backend.available ? chalk.green('✔') : chalk.red('✘');
    console.log(`  ${mark} ${backend.name}`);
  }

  console.log(chalk.bold('\nHook bindings'));
  const settingsPath = getSettingsPath(env);
  const bindings = readAnnouncerBindings(settingsPath);
  if (bindings === null) {
    console.log(chalk.yellow(`  ${settingsPath} not found`));
  } else if (bindings.length === 0) {
    console.log(chalk.yellow(`  No hook in ${settingsPath} runs voice-hooks`));
  } else {
    for (const binding of bindings) {
      const matcher = binding.matcher ? chalk.gray(` [${binding.matcher}]`) : '';
      console.log(`  ${binding.event}${matcher}: ${binding.command}`);
    }
  }
}
