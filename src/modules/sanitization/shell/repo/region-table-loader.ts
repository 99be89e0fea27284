import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, type Result } from 'neverthrow';

import { formatSchemaErrors, type RegionTableError } from '../../core/errors.js';
import { createRegionTable } from '../../core/usecases/resolve-regions.js';
import { RegionTableFileSchema, type RegionTable } from '../../core/types.js';

const validator = TypeCompiler.Compile(RegionTableFileSchema);

/**
 * Loads the city -> region table once at start-up.
 * The result is immutable and passed explicitly to the pipeline.
 */
export const loadRegionTable = async (
  filePath: string
): Promise<Result<RegionTable, RegionTableError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Region table not found at ${filePath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read region table at ${filePath}: ${(error as Error).message}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${filePath}: ${(error as Error).message}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  return createRegionTable(parsed.entries);
};
