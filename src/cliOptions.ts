import path from 'node:path';
import { parseArgs } from 'node:util';
import { parseRate } from './services/ImportService.js';
import { isReportFormat, type ReportFormat } from './services/ReportService.js';

export const USAGE = `Usage: commission-report <file> --technician <name> [--commission <rate>] [--output <path>] [--format xlsx|html]

  <file>              .xlsx, .xls or .csv with Date, Address, Total, Parts, Cash, CC, Check, %, FEE columns
  -t, --technician    technician name shown on the report
  -c, --commission    rate for every row: 0.5, 50 or 50%
  -o, --output        output path (default: <file>_report.<format>)
  -f, --format        xlsx (default) or html`;

export interface CliOptions {
  file: string;
  technician: string;
  commissionRate: number | undefined;
  output: string;
  format: ReportFormat;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      technician: { type: 'string', short: 't' },
      commission: { type: 'string', short: 'c' },
      output: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f', default: 'xlsx' },
    },
  });

  const [file] = positionals;
  if (!file || !values.technician) {
    throw new Error(USAGE);
  }

  const format = values.format ?? 'xlsx';
  if (!isReportFormat(format)) {
    throw new Error(`Unknown format "${format}"\n\n${USAGE}`);
  }

  let commissionRate: number | undefined;
  if (values.commission !== undefined) {
    const rate = parseRate(values.commission);
    if (rate === null) {
      throw new Error(`Invalid commission rate "${values.commission}"`);
    }
    commissionRate = rate;
  }

  const parsed = path.parse(file);
  return {
    file,
    technician: values.technician,
    commissionRate,
    output: values.output ?? path.join(parsed.dir, `${parsed.name}_report.${format}`),
    format,
  };
}
