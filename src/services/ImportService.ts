import { calendarDateFromDate, type CalendarDate } from '../domain/calendarDate.js';
import { isAppError, MissingRequiredFieldError, ValidationError } from '../domain/errors.js';
import { toCents, type Money } from '../domain/money.js';
import { createJob, isPaymentMethod, type Job, type PaymentMethod } from '../domain/entities/Job.js';
import { readSheetRows, type SheetRow } from '../infra/spreadsheet.js';
import { logger } from '../infra/logger.js';
import { extractDate, extractPaymentMethod, parseAmount } from '../parser/fieldExtractors.js';
import type { CommissionCalculator } from './CommissionCalculator.js';

export interface ImportOptions {
  technicianId: string;
  /** Applied to every row, ignoring any rate column */
  commissionRate?: number;
}

export interface ImportRowError {
  /** 1-based sheet row; the header is row 1 */
  row: number;
  code: string;
  message: string;
}

export interface ImportResult {
  jobs: Job[];
  errors: ImportRowError[];
  rowCount: number;
}

const RATE_COLUMNS = ['%', 'commission', 'rate'];
const CC_COLUMNS = ['cc', 'credit card'];

/**
 * ImportService - maps spreadsheet rows to calculation-ready jobs.
 * A bad row is reported with its row number; the rest still import.
 */
export class ImportService {
  constructor(
    private readonly calculator: CommissionCalculator,
    private readonly defaultCommissionRate: number
  ) {}

  importFile(data: Buffer, options: ImportOptions): ImportResult {
    return this.importRows(readSheetRows(data), options);
  }

  importRows(rows: SheetRow[], options: ImportOptions): ImportResult {
    const jobs: Job[] = [];
    const errors: ImportRowError[] = [];
    let rowCount = 0;

    rows.forEach((raw, index) => {
      const row = normalizeHeaders(raw);
      if (Object.values(row).every(isBlank)) return;

      rowCount++;
      const rowNumber = sheetRowNumber(raw, index);
      try {
        jobs.push(this.mapRow(row, options));
      } catch (error) {
        if (!isAppError(error)) throw error;
        errors.push({ row: rowNumber, code: error.code, message: error.message });
      }
    });

    logger.info('Spreadsheet rows imported', {
      technicianId: options.technicianId,
      rows: rowCount,
      jobs: jobs.length,
      failed: errors.length,
    });

    return { jobs, errors, rowCount };
  }

  private mapRow(row: Record<string, unknown>, options: ImportOptions): Job {
    const total = readMoney(row, 'total');
    if (total === null) {
      throw new MissingRequiredFieldError('total');
    }

    const job = createJob({
      technicianId: options.technicianId,
      total,
      parts: readMoney(row, 'parts') ?? 0,
      fee: readMoney(row, 'fee') ?? 0,
      techAmount: readMoney(row, 'tech'),
      paymentMethod: readPaymentMethod(row),
      commissionRate: options.commissionRate ?? readRate(row) ?? this.defaultCommissionRate,
      date: readDate(row),
      address: readText(row, 'address'),
      phone: readText(row, 'phone').replace(/\D/g, ''),
      description: readText(row, 'description'),
      notes: readText(row, 'notes'),
    });

    const outcome = this.calculator.calculate(job);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return job;
  }
}

/**
 * Rows from readSheetRows carry SheetJS's 0-based __rowNum__, which counts
 * the blank rows it skipped; plain row arrays count from the header.
 */
function sheetRowNumber(row: SheetRow, index: number): number {
  const rowNum = row.__rowNum__;
  return typeof rowNum === 'number' ? rowNum + 1 : index + 2;
}

function normalizeHeaders(row: SheetRow): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [header, value] of Object.entries(row)) {
    normalized[header.trim().toLowerCase()] = value;
  }
  return normalized;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function readText(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  if (isBlank(value)) return '';
  if (value instanceof Date) return calendarDateFromDate(value) ?? '';
  return String(value).trim();
}

function readMoney(row: Record<string, unknown>, column: string): Money | null {
  const value = row[column];
  if (isBlank(value)) return null;

  let cents: Money | null = null;
  if (typeof value === 'number') {
    cents = toCents(value);
  } else if (typeof value === 'string') {
    cents = parseAmount(value);
  }

  if (cents === null) {
    throw new ValidationError(`Column "${column}" is not an amount`, { column, value: String(value) });
  }
  return cents;
}

function firstAmount(row: Record<string, unknown>, columns: string[]): Money {
  for (const column of columns) {
    const cents = readMoney(row, column);
    if (cents !== null && cents !== 0) return cents;
  }
  return 0;
}

/**
 * An explicit payment column wins; otherwise a nonzero company-bound
 * amount column (cc, then check, then transfer), otherwise cash.
 */
function readPaymentMethod(row: Record<string, unknown>): PaymentMethod {
  const explicit = readText(row, 'payment method') || readText(row, 'payment');
  if (explicit) {
    const lowered = explicit.toLowerCase();
    return isPaymentMethod(lowered) ? lowered : extractPaymentMethod(lowered);
  }

  if (firstAmount(row, CC_COLUMNS) !== 0) return 'cc';
  if (firstAmount(row, ['check']) !== 0) return 'check';
  if (firstAmount(row, ['transfer']) !== 0) return 'transfer';
  return 'cash';
}

/**
 * "50%" → 0.5, 50 → 0.5, 0.5 → 0.5
 */
export function parseRate(value: unknown): number | null {
  if (isBlank(value)) return null;

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return value > 1 ? value / 100 : value;
  }

  if (typeof value === 'string') {
    const text = value.trim();
    const percent = /^(\d+(?:\.\d+)?)\s*%$/.exec(text);
    if (percent) return Number(percent[1]) / 100;
    if (/^\d+(?:\.\d+)?$/.test(text)) return parseRate(Number(text));
  }

  return null;
}

function readRate(row: Record<string, unknown>): number | null {
  for (const column of RATE_COLUMNS) {
    const value = row[column];
    if (isBlank(value)) continue;
    const rate = parseRate(value);
    if (rate === null) {
      throw new ValidationError(`Column "${column}" is not a commission rate`, {
        column,
        value: String(value),
      });
    }
    return rate;
  }
  return null;
}

function readDate(row: Record<string, unknown>): CalendarDate | null {
  const value = row.date;
  if (isBlank(value)) return null;

  const date =
    value instanceof Date ? calendarDateFromDate(value) : extractDate(String(value).trim());
  if (date === null) {
    throw new ValidationError('Column "date" is not a date', { value: String(value) });
  }
  return date;
}
