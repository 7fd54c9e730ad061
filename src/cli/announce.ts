import { announce } from '../announcer/index.js';
import { createSystemAudio, type AudioOutput } from '../audio/index.js';
import { loadConfig } from '../config/loader.js';
import { errorMessage, InputError } from '../errors.js';
import { parseEventDescriptor } from '../hooks/event-input.js';
import { readStdin } from '../utils/index.js';
import { createLogger } from '../utils/log.js';

export interface AnnounceCommandOptions {
  /** Raw payload; read from stdin when omitted */
  input?: string;
  env?: NodeJS.ProcessEnv;
  audio?: AudioOutput;
  write?: (line: string) => void;
}

/**
 * Hook entry point. Returns the exit code: 1 for a malformed payload,
 * 0 otherwise so a failing announcement never interrupts the editor.
 */
export async function announceCommand(options: AnnounceCommandOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const config = loadConfig(env, createLogger(false, options.write));
  const logger = createLogger(config.debug, options.write);

  try {
    const text = options.input ?? (await readStdin(5000));
    const descriptor = parseEventDescriptor(text);
    const audio = options.audio ?? createSystemAudio(config, logger);
    announce(descriptor, config, { audio, logger });
    return 0;
  } catch (error) {
    if (error instanceof InputError) {
      logger.error(error.message);
      return 1;
    }
    logger.error(`Unexpected error: ${errorMessage(error)}`);
    return 0;
  }
}
