/**
 * Stderr logger with a fixed prefix. Hooks must keep stdout clean,
 * so everything goes to stderr.
 */

const PREFIX = '[voice-hooks]';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(debug: boolean, write: (line: string) => void = (line) => process.stderr.write(line)): Logger {
  const emit = (level: string, message: string) => write(`${PREFIX} ${level}: ${message}\n`);
  return {
    debug: (message) => {
      if (debug) emit('debug', message);
    },
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}
