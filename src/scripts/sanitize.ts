/**
 * Sanitizes a people/revenue sheet into the two-sheet workbook.
 *
 * Usage: npm run sanitize -- <input.xlsx|input.csv> [output.xlsx]
 */

import { bootstrap, failWith } from './cli-support.js';
import { formatRunSummary, summarizeRun } from '../modules/report/index.js';
import { sanitizeFile } from '../modules/sanitization/index.js';

const DEFAULT_OUTPUT = 'sanitized-data.xlsx';

const main = async (): Promise<void> => {
  const [inputPath, outputPath = DEFAULT_OUTPUT] = process.argv.slice(2);
  if (inputPath === undefined) {
    console.error('Usage: npm run sanitize -- <input.xlsx|input.csv> [output.xlsx]');
    process.exit(1);
  }

  const { config, logger, regionTable } = await bootstrap();

  const result = await sanitizeFile(
    { logger, regionTable, locale: config.sanitization.locale },
    { inputPath, outputPath }
  );
  if (result.isErr()) {
    failWith(logger, result.error);
    return;
  }

  const summary = summarizeRun(result.value, config.report.defaultMonthWindow);
  for (const line of formatRunSummary(summary)) {
    console.log(line);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
