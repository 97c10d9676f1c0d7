#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import dotenv from 'dotenv';
import { formatMoney } from './domain/money.js';
import { isAppError } from './domain/errors.js';
import { validateEnv } from './infra/env.js';
import { createLogger, logger, setLogger } from './infra/logger.js';
import { CommissionCalculator } from './services/CommissionCalculator.js';
import { ImportService } from './services/ImportService.js';
import { ReportService } from './services/ReportService.js';
import { parseCliArgs } from './cliOptions.js';

async function main(): Promise<void> {
  dotenv.config();
  const env = validateEnv();
  setLogger(createLogger(env));

  const options = parseCliArgs(process.argv.slice(2));
  const calculator = new CommissionCalculator();
  const importer = new ImportService(calculator, env.DEFAULT_COMMISSION_RATE);
  const reports = new ReportService(calculator, env.COMPANY_NAME);

  const result = importer.importFile(await readFile(options.file), {
    technicianId: options.technician,
    commissionRate: options.commissionRate,
  });
  for (const rowError of result.errors) {
    logger.warn('Row skipped', rowError);
  }

  const report = reports.buildReport(options.technician, result.jobs);
  const rendered = reports.render(report, options.format);
  await writeFile(options.output, rendered.body);

  const { summary } = report;
  const owes =
    summary.totalBalance > 0
      ? `${options.technician} owes the company ${formatMoney(summary.totalBalance)}`
      : summary.totalBalance < 0
        ? `The company owes ${options.technician} ${formatMoney(-summary.totalBalance)}`
        : 'Nothing is owed either way';

  logger.info('Report written', {
    output: options.output,
    jobs: summary.jobCount,
    skippedRows: result.errors.length,
    totalSales: formatMoney(summary.totalSales),
    techProfit: formatMoney(summary.totalTechProfit),
  });
  logger.info(owes);
}

main().catch((error: unknown) => {
  if (isAppError(error)) {
    logger.error(error.message, { code: error.code, details: error.details });
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
