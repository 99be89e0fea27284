import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';

import type { PayloadWriteError } from '../../core/errors.js';
import type { ReportPayload } from '../../core/types.js';

/**
 * Writes the payload as pretty-printed JSON, via a temp file renamed into place.
 */
export const writeReportPayload = async (
  filePath: string,
  payload: ReportPayload
): Promise<Result<void, PayloadWriteError>> => {
  const tempPath = `${filePath}.${String(process.pid)}.tmp`;
  try {
    await fs.writeFile(tempPath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    return err({
      type: 'WriteError',
      message: `Failed to write report payload ${filePath}: ${(error as Error).message}`,
    });
  }

  return ok(undefined);
};
