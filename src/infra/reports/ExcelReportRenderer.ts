import { fromCents } from '../../domain/money.js';
import { formatUsDate } from '../../domain/calendarDate.js';
import { toReportLines, type CommissionReport } from '../../domain/entities/CommissionReport.js';
import { writeWorkbook, type CellValue, type SheetColumn } from '../spreadsheet.js';

const MONEY_FORMAT = '$#,##0.00;-$#,##0.00';

const COLUMNS: SheetColumn[] = [
  { header: 'Date', width: 12 },
  { header: 'Address', width: 40 },
  { header: '%', width: 8 },
  { header: 'Total', width: 12, numberFormat: MONEY_FORMAT },
  { header: 'Parts', width: 12, numberFormat: MONEY_FORMAT },
  { header: 'Cash', width: 12, numberFormat: MONEY_FORMAT },
  { header: 'CC', width: 12, numberFormat: MONEY_FORMAT },
  { header: 'Check', width: 12, numberFormat: MONEY_FORMAT },
  { header: 'FEE', width: 10, numberFormat: MONEY_FORMAT },
  { header: 'Tech Profit', width: 14, numberFormat: MONEY_FORMAT },
  { header: 'Balance', width: 14, numberFormat: MONEY_FORMAT },
];

/**
 * Single-sheet workbook: title block, one row per job, summary row.
 * Money cells are numbers in dollars; zero amounts in optional columns stay empty.
 */
export function renderExcelReport(report: CommissionReport): Buffer {
  const optional = (cents: number): CellValue => (cents === 0 ? null : fromCents(cents));

  const rows: CellValue[][] = toReportLines(report).map((line) => [
    line.date ? formatUsDate(line.date) : '',
    line.address,
    line.rate,
    fromCents(line.total),
    optional(line.parts),
    optional(line.cash),
    optional(line.cc),
    optional(line.check),
    optional(line.fee),
    fromCents(line.techProfit),
    fromCents(line.balance),
  ]);

  const { summary } = report;
  rows.push([
    `${summary.jobCount} Jobs`,
    '',
    '',
    fromCents(summary.totalSales),
    fromCents(summary.totalParts),
    fromCents(summary.totalCash),
    fromCents(summary.totalCc),
    fromCents(summary.totalCheck),
    fromCents(summary.totalFee),
    fromCents(summary.totalTechProfit),
    fromCents(summary.totalBalance),
  ]);

  const preamble: CellValue[][] = [
    [report.companyName],
    [`Technician: ${report.technicianName}`],
    [
      report.period
        ? `Period: ${formatUsDate(report.period.from)} - ${formatUsDate(report.period.to)}`
        : 'Period: -',
    ],
    [],
  ];

  return writeWorkbook([{ name: 'Commission Report', preamble, columns: COLUMNS, rows }]);
}
