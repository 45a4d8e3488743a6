import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Create the process logger.
 *
 * Output is pretty-printed through `pino-pretty` on an interactive terminal
 * outside production and tests; otherwise pino writes JSON lines to stdout.
 * The level comes from `LOG_LEVEL` (default `info`).
 */
export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): Logger {
  const env = process.env.NODE_ENV ?? 'development';
  const pretty = Boolean(process.stdout.isTTY) && env !== 'production' && env !== 'test';

  return pino({
    level,
    base: { service: 'inkwell' },
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname,service'
          }
        }
      : undefined
  });
}

/** Process-wide logger; modules derive children with `logger.child({ module })`. */
export const logger = createLogger();
