/**
 * Process-wide pino logger
 *
 * Logging goes to a file only. The terminal belongs to the UI, so without
 * a log file the root logger is created disabled and every child logger
 * is silent.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  /** Append JSON lines to this file; logging is disabled when absent */
  logFile?: string;
  /** Defaults to LOG_LEVEL, then `info` */
  level?: string;
}

const REDACT_PATHS = [
  'password',
  'response',
  'sudoPassword',
  '*.password',
  '*.response',
  '*.sudoPassword',
];

let root: Logger = pino({ enabled: false });

export function createLogger(options: LoggerOptions = {}): Logger {
  if (!options.logFile) {
    return pino({ enabled: false });
  }

  return pino(
    {
      name: 'modegreet',
      level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: options.logFile, sync: true, append: true, mkdir: true }),
  );
}

/**
 * Install the root logger. Called once by the CLI before anything logs.
 */
export function initLogging(options: LoggerOptions = {}): Logger {
  root = createLogger(options);
  return root;
}

/**
 * Child logger for one module. Resolved at call time so modules pick up the
 * root installed by `initLogging`.
 */
export function getLogger(scope: string): Logger {
  return root.child({ scope });
}
