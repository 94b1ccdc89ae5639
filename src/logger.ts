import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Create a structured pino logger.
 *
 * Logs go to stderr so that CLI output on stdout stays parseable.
 */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  return pino(
    {
      name: options?.name ?? 'devsecrets',
      level: options?.level ?? process.env['LOG_LEVEL'] ?? 'warn',
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination(2),
  );
}

/** Shared logger used when a caller does not pass one. */
export const defaultLogger: Logger = createLogger();
