import { formatUsDate } from '../../domain/calendarDate.js';
import { formatMoney, type Money } from '../../domain/money.js';
import { toReportLines, type CommissionReport } from '../../domain/entities/CommissionReport.js';

const STYLES = `
  body { font-family: Arial, sans-serif; font-size: 11px; margin: 20px; }
  .report-title { text-align: center; font-size: 16px; font-weight: bold; margin-bottom: 16px; }
  table { width: 100%; border-collapse: collapse; }
  th { background-color: #d3d3d3; border: 1px solid #999; padding: 4px; }
  td { border: 1px solid #ccc; padding: 4px; }
  .col-money, .col-percent { text-align: right; white-space: nowrap; }
  .owes-company { color: #1b5e20; }
  .owes-tech { color: #b71c1c; }
  .summary-row td { background-color: #f0f0f0; font-weight: bold; }
  @media print { body { margin: 0; } }
`;

const HEADERS = ['Date', 'Address', '%', 'Total', 'Parts', 'Cash', 'CC', 'Check', 'FEE', 'Tech Profit', 'Balance'];

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Title line: "<company> - <technician> - MM/DD/YYYY to MM/DD/YYYY"
 */
export function reportTitle(report: CommissionReport): string {
  const parts = [report.companyName, report.technicianName];
  if (report.period) {
    parts.push(`${formatUsDate(report.period.from)} to ${formatUsDate(report.period.to)}`);
  }
  return parts.join(' - ');
}

export function renderHtmlReport(report: CommissionReport): string {
  const title = escapeHtml(reportTitle(report));
  const { summary } = report;

  const rows = toReportLines(report).map((line) =>
    row('', [
      cell('col-date', line.date ? formatUsDate(line.date) : ''),
      cell('col-address', line.address),
      cell('col-percent', line.rate),
      money(line.total, true),
      money(line.parts),
      money(line.cash),
      money(line.cc),
      money(line.check),
      money(line.fee),
      money(line.techProfit, true),
      balance(line.balance),
    ])
  );

  rows.push(
    row('summary-row', [
      cell('col-date', `${summary.jobCount} Jobs`),
      cell('col-address', ''),
      cell('col-percent', ''),
      money(summary.totalSales, true),
      money(summary.totalParts, true),
      money(summary.totalCash, true),
      money(summary.totalCc, true),
      money(summary.totalCheck, true),
      money(summary.totalFee, true),
      money(summary.totalTechProfit, true),
      balance(summary.totalBalance),
    ])
  );

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8">',
    `<title>${title}</title>`,
    `<style>${STYLES}</style>`,
    '</head>',
    '<body>',
    `<div class="report-title">${title}</div>`,
    '<table>',
    `<thead><tr>${HEADERS.map((header) => `<th>${escapeHtml(header)}</th>`).join('')}</tr></thead>`,
    '<tbody>',
    ...rows,
    '</tbody>',
    '</table>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

function row(className: string, cells: string[]): string {
  const attr = className ? ` class="${className}"` : '';
  return `<tr${attr}>${cells.join('')}</tr>`;
}

function cell(className: string, text: string): string {
  return `<td class="${className}">${escapeHtml(text)}</td>`;
}

function money(value: Money, showZero = false): string {
  return cell('col-money', value === 0 && !showZero ? '' : formatMoney(value));
}

function balance(value: Money): string {
  const tone = value > 0 ? ' owes-company' : value < 0 ? ' owes-tech' : '';
  return `<td class="col-money${tone}">${escapeHtml(formatMoney(value))}</td>`;
}
