/**
 * Shared start-up for the command-line entry points.
 */

import { createConfig, parseEnv, type AppConfig } from '../infra/config/index.js';
import { createLogger, type Logger } from '../infra/logger/index.js';
import {
  formatSanitizationError,
  loadRegionTable,
  type RegionTable,
  type RegionTableError,
  type SanitizeFileError,
} from '../modules/sanitization/index.js';

import type { BuildReportError } from '../modules/report/index.js';

export type CliError = SanitizeFileError | BuildReportError | RegionTableError;

export interface CliContext {
  config: AppConfig;
  logger: Logger;
  regionTable: RegionTable;
}

/**
 * Renders any error a script can end with as log lines.
 */
export const formatError = (error: CliError): string[] => {
  switch (error.type) {
    case 'SchemaError':
    case 'TypeCoercionError':
      return formatSanitizationError(error);
    case 'SchemaValidationError':
      return [error.message, ...error.details.map((detail) => `  - ${detail}`)];
    default:
      return [error.message];
  }
};

export const failWith = (logger: Logger, error: CliError): never => {
  logger.error({ errorType: error.type }, formatError(error).join('\n'));
  process.exit(1);
};

/**
 * Environment, logger and region table, in that order.
 */
export const bootstrap = async (): Promise<CliContext> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  const regionTable = await loadRegionTable(config.sanitization.regionTablePath);
  if (regionTable.isErr()) {
    return failWith(logger, regionTable.error);
  }
  logger.debug({ cities: regionTable.value.size }, 'Loaded region table');

  return { config, logger, regionTable: regionTable.value };
};
