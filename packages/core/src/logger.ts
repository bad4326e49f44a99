import pino, { type Logger } from 'pino';

export type { Logger };

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof logLevels)[number];

export type LoggerOptions = {
  level?: LogLevel;
  /** File descriptor or path the log lines are written to. Defaults to stderr. */
  destination?: number | string;
};

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some(level => level === value);
}

/**
 * Reads `TESSELLATE_LOG_LEVEL` from the given environment, falling back to `info`.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.TESSELLATE_LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return 'info';
}

/**
 * Creates a structured logger for one component. Output goes to stderr unless a
 * destination is given, so command output on stdout stays machine-readable.
 *
 * @example
 * ```typescript
 * const logger = createLogger('revision-service');
 * logger.info({ revisionId }, 'Stored transformation revision');
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const { level = resolveLogLevel(), destination = 2 } = options;
  return pino({ name: component, level }, pino.destination({ dest: destination, sync: true }));
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
