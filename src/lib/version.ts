import { readFileSync } from 'fs';

/** Version from the package.json two levels above this module (src/ or dist/) */
export function getRuntimePackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Fall through
  }
  return '0.0.0';
}
