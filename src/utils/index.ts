import { existsSync, readFileSync } from 'fs';

export { getConfigDir } from './config-dir.js';
export { createLogger, type Logger } from './log.js';

/** Safely read and parse a JSON file, returns null on failure */
export function readJsonFile(path: string): unknown {
  try {
    if (!existsSync(path)) return null;
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return parsed;
  } catch {
    return null;
  }
}

/** Read stdin with timeout protection (prevents hangs on Linux/Windows) */
export function readStdin(timeoutMs = 5000, stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let settled = false;

    const finish = (text: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      stream.removeAllListeners();
      resolve(text);
    };

    const timeout = setTimeout(() => {
      finish(Buffer.concat(chunks).toString('utf-8'));
    }, timeoutMs);

    stream.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    });

    stream.on('end', () => {
      finish(Buffer.concat(chunks).toString('utf-8'));
    });

    stream.on('error', () => {
      finish('');
    });
  });
}
