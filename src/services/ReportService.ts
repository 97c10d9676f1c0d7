import type { CalendarDate } from '../domain/calendarDate.js';
import type { CommissionReport } from '../domain/entities/CommissionReport.js';
import type { Job } from '../domain/entities/Job.js';
import { renderHtmlReport } from '../infra/reports/HtmlReportRenderer.js';
import { renderExcelReport } from '../infra/reports/ExcelReportRenderer.js';
import type { CommissionCalculator } from './CommissionCalculator.js';

export const REPORT_FORMATS = ['html', 'xlsx'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface RenderedReport {
  contentType: string;
  extension: ReportFormat;
  body: string | Buffer;
}

export class ReportService {
  constructor(
    private readonly calculator: CommissionCalculator,
    private readonly companyName: string
  ) {}

  buildReport(technicianName: string, jobs: Job[]): CommissionReport {
    const results = this.calculator
      .calculateBatch(jobs)
      .sort((a, b) => (a.job.date ?? '').localeCompare(b.job.date ?? ''));

    const dates = results
      .map((result) => result.job.date)
      .filter((date): date is CalendarDate => date !== null)
      .sort();
    const from = dates[0];
    const to = dates[dates.length - 1];

    return {
      companyName: this.companyName,
      technicianName,
      period: from && to ? { from, to } : null,
      results,
      summary: this.calculator.summarize(results),
    };
  }

  render(report: CommissionReport, format: ReportFormat): RenderedReport {
    if (format === 'xlsx') {
      return {
        contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
        extension: 'xlsx',
        body: renderExcelReport(report),
      };
    }
    return { contentType: 'text/html; charset=utf-8', extension: 'html', body: renderHtmlReport(report) };
  }
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

