import type { CalendarDate } from '../calendarDate.js';
import { formatRate, type Money } from '../money.js';
import type { JobResult } from './JobResult.js';

export interface CommissionSummary {
  jobCount: number;
  totalSales: Money;
  totalParts: Money;
  totalCash: Money;
  totalCc: Money;
  /** Checks and bank transfers */
  totalCheck: Money;
  totalFee: Money;
  totalTechProfit: Money;
  totalBalance: Money;
}

export interface CommissionReport {
  companyName: string;
  technicianName: string;
  /** Earliest and latest job date; null when no job carries a date */
  period: { from: CalendarDate; to: CalendarDate } | null;
  results: JobResult[];
  summary: CommissionSummary;
}

/**
 * One report row. Payment columns hold the job total under the column of
 * the method used; transfers are reported under Check.
 */
export interface ReportLine {
  date: CalendarDate | null;
  address: string;
  /** "50%", or "Custom" for a fixed technician amount */
  rate: string;
  total: Money;
  parts: Money;
  cash: Money;
  cc: Money;
  check: Money;
  fee: Money;
  techProfit: Money;
  balance: Money;
}

export function toReportLines(report: CommissionReport): ReportLine[] {
  return report.results.map(({ job, techProfit, balance }) => ({
    date: job.date,
    address: job.address,
    rate: job.techAmount !== null ? 'Custom' : formatRate(job.commissionRate),
    total: job.total,
    parts: job.parts,
    cash: job.paymentMethod === 'cash' ? job.total : 0,
    cc: job.paymentMethod === 'cc' ? job.total : 0,
    check: job.paymentMethod === 'check' || job.paymentMethod === 'transfer' ? job.total : 0,
    fee: job.fee,
    techProfit,
    balance,
  }));
}
