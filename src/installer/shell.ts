import { homedir } from 'os';
import { basename, join } from 'path';

export type ShellKind = 'zsh' | 'bash';

const PROFILE_FILES: Record<ShellKind, string> = {
  zsh: '.zshrc',
  bash: '.bashrc',
};

/**
 * Detect the interactive shell. The shell's own version variables win;
 * $SHELL is the fallback since those are rarely exported to children.
 */
export function detectShell(env: NodeJS.ProcessEnv = process.env): ShellKind | null {
  if (env.ZSH_VERSION) return 'zsh';
  if (env.BASH_VERSION) return 'bash';

  const name = env.SHELL ? basename(env.SHELL) : '';
  if (name === 'zsh' || name === 'bash') return name;
  return null;
}

export function profilePathFor(shell: ShellKind, home: string = homedir()): string {
  return join(home, PROFILE_FILES[shell]);
}
