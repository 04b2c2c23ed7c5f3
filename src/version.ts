/**
 * Package version, read once from package.json.
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // fallback below
  }
  return '0.0.0';
}

export const VERSION = readVersion();
