import pino from 'pino';

import type { LoggingConfig } from '../config/schema.js';

export type Logger = pino.Logger;

/**
 * Create the process logger.
 *
 * Pretty output through pino-pretty unless JSON is requested (or running in
 * production). A silent logger never spawns the transport worker. Pretty output
 * always goes to stderr; JSON lines go to stdout unless `stderr` is set, which
 * the CLI does to keep stdout for reports.
 */
export function createLogger(config?: LoggingConfig, options: { stderr?: boolean } = {}): Logger {
  const level = config?.level ?? 'info';
  const isJson = config?.json ?? process.env['NODE_ENV'] === 'production';

  const transport =
    isJson || level === 'silent' || config?.file
      ? undefined
      : {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss', destination: 2 },
        };

  const loggerOptions: pino.LoggerOptions = {
    level,
    base: { service: 'accessaudit' },
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(loggerOptions, pino.destination({ dest: config.file, mkdir: true }));
  }
  if (options.stderr && !transport) {
    return pino(loggerOptions, pino.destination(2));
  }

  return pino(loggerOptions);
}

/**
 * Logger that drops everything; the default for library use and tests.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
