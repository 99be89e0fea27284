/**
 * Pino logger factory. Log lines go to stderr; stdout is left to the
 * run summary the scripts print.
 */

import pinoLib, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const STDERR_FD = 2;

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'sheet-report-pipeline',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance.
 *
 * @param stream - Writes JSON lines here instead of stderr; pretty output is skipped
 */
export const createLogger = (
  config: Partial<LoggerConfig> = {},
  stream?: DestinationStream
): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (stream !== undefined) {
    return pinoLib(options, stream);
  }

  // pino-pretty spawns a worker thread; a silent logger has nothing to print
  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR_FD,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(STDERR_FD));
};

/**
 * Creates a child logger with additional context
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

export { type Logger } from 'pino';
