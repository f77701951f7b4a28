import pino, { Logger } from 'pino';
import { errorMessage } from './errors';

export type { Logger };

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  /** Log file path; stderr when absent so stdout only carries results. */
  file?: string;
}

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  return { type: err.name, message: errorMessage(err), stack: err.stack };
}

/**
 * Build the run's logger. Created once at program entry and handed to every stage.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const destination = opts.file
    ? pino.destination({ dest: opts.file, mkdir: true, sync: true })
    : pino.destination({ dest: 2, sync: true });

  return pino(
    {
      level: opts.level ?? 'info',
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: serializeError },
    },
    destination,
  );
}

/** Logger that drops everything; used by tests and library callers that don't care. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
