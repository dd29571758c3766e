import { destination, pino, type Logger } from 'pino';

import type { LogLevel } from './settings.ts';

export type { Logger };

export interface LoggerOptions {
  level: LogLevel;
  verbose?: boolean;
  quiet?: boolean;
}

export function effectiveLogLevel(options: LoggerOptions): LogLevel {
  if (options.quiet) return 'error';
  if (options.verbose) return 'debug';
  return options.level;
}

/**
 * JSON lines on stderr. stdout is reserved for what the user asked to see: dry-run
 * commands, `runcpu` output and result summaries.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: 'specer',
      level: effectiveLogLevel(options),
    },
    destination({ dest: 2, sync: true }),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
