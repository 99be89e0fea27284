import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors } from '../../../sanitization/index.js';
import { ReportFilterSchema, type ReportFilter } from '../../core/types.js';

import type { FilterFileError } from '../../core/errors.js';

const validator = TypeCompiler.Compile(ReportFilterSchema);

/**
 * Parses and validates filter file contents. YAML is a superset of JSON,
 * so both formats go through the same parser. An empty document is the
 * empty filter.
 */
export const parseReportFilter = (
  contents: string,
  source: string
): Result<ReportFilter, FilterFileError> => {
  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse filter file ${source}: ${(error as Error).message}`,
    });
  }

  const candidate = parsed ?? {};
  if (!validator.Check(candidate)) {
    return err({
      type: 'SchemaValidationError',
      message: `Invalid filter file ${source}`,
      details: formatSchemaErrors(validator.Errors(candidate)),
    });
  }

  return ok(candidate);
};

export const loadReportFilter = async (
  filePath: string
): Promise<Result<ReportFilter, FilterFileError>> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return err({ type: 'NotFound', message: `Filter file not found at ${filePath}` });
    }
    return err({
      type: 'ReadError',
      message: `Failed to read filter file ${filePath}: ${(error as Error).message}`,
    });
  }

  return parseReportFilter(contents, filePath);
};
