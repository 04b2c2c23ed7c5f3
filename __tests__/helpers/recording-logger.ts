import type { Logger } from '../../src/logger.js';

export interface RecordingLogger extends Logger {
  lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; msg: string }>;
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  return {
    lines,
    debug: (msg) => lines.push({ level: 'debug', msg }),
    info: (msg) => lines.push({ level: 'info', msg }),
    warn: (msg) => lines.push({ level: 'warn', msg }),
    error: (msg) => lines.push({ level: 'error', msg }),
  };
}
