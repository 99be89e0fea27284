/**
 * Builds the report payload from a sanitized workbook.
 *
 * Usage: npm run report -- <sanitized.xlsx> [report.json] [filter.yaml]
 */

import { bootstrap, failWith } from './cli-support.js';
import { buildReport, type BuildReportInput } from '../modules/report/index.js';

const DEFAULT_OUTPUT = 'report.json';

const main = async (): Promise<void> => {
  const [inputPath, outputPath = DEFAULT_OUTPUT, filterPath] = process.argv.slice(2);
  if (inputPath === undefined) {
    console.error('Usage: npm run report -- <sanitized.xlsx> [report.json] [filter.yaml]');
    process.exit(1);
  }

  const { config, logger, regionTable } = await bootstrap();

  const input: BuildReportInput = {
    inputPath,
    outputPath,
    ...(filterPath !== undefined && { filterPath }),
  };

  const result = await buildReport(
    {
      logger,
      regionTable,
      locale: config.sanitization.locale,
      monthWindow: config.report.defaultMonthWindow,
      topProfessions: config.report.topProfessions,
      histogramBins: config.report.histogramBins,
    },
    input
  );
  if (result.isErr()) {
    failWith(logger, result.error);
    return;
  }

  const { kpis } = result.value.snapshot;
  console.log(`Filter: ${result.value.filterDescription}`);
  console.log(`Headcount: ${String(kpis.headcount)} of ${String(kpis.totalHeadcount)}`);
  console.log(`Total revenue: ${String(kpis.totalRevenue)}`);
  console.log(`Wrote ${outputPath}`);
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
