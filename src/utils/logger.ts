import pino from 'pino';

export type Logger = pino.Logger;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Create a pino logger that writes to stderr, leaving stdout to command output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'warn', name = 'notes-ledger' } = options;
  return pino({ level, name }, pino.destination(2));
}

function levelFromEnv(): LogLevel {
  const level = process.env['NOTES_LEDGER_LOG_LEVEL'];
  switch (level) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
    case 'silent':
      return level;
    default:
      return 'warn';
  }
}

export const logger: Logger = createLogger({ level: levelFromEnv() });
