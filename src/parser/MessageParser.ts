import { FormatUnrecognizedError, ParseFailureError } from '../domain/errors.js';
import type { CalendarDate } from '../domain/calendarDate.js';
import type { Money } from '../domain/money.js';
import type { PaymentMethod } from '../domain/entities/Job.js';
import type {
  MessageFormat,
  ParsedField,
  ParsedJob,
  ParsedJobFlag,
} from '../domain/entities/ParsedJob.js';
import { detectFormat, type DetectedFormat } from './formatDetector.js';
import {
  extractAddress,
  extractDate,
  extractDescription,
  extractLabeledAmount,
  extractLabeledValue,
  extractPaymentMethod,
  extractPhone,
  extractStandaloneAmount,
  findDate,
  hasAmountLabel,
  isAddressLine,
  isCurrencyLine,
  normalizePhone,
  splitLines,
  type LabeledAmount,
  type LabeledValue,
} from './fieldExtractors.js';

export const DEFAULT_JOB_MARKER = 'alpha job';

export type ParseOutcome =
  | { ok: true; format: MessageFormat; job: ParsedJob; missingFields: ParsedField[] }
  | {
      ok: false;
      format: DetectedFormat;
      error: ParseFailureError | FormatUnrecognizedError;
    };

export interface BlockParseOutcome {
  /** Raw text of the job block, for correcting a failed parse */
  block: string;
  outcome: ParseOutcome;
}

type ExtractedFields = {
  address: LabeledValue | null;
  phone: LabeledValue | null;
  description: LabeledValue | null;
  date: LabeledValue | null;
  total: LabeledAmount | null;
  parts: LabeledAmount | null;
  fee: LabeledAmount | null;
  techAmount: LabeledAmount | null;
  paymentMethod: PaymentMethod;
};

const OPTIONAL_FIELDS = ['address', 'phone', 'description', 'date'] as const;

/**
 * MessageParser - turns a job-closure message into a ParsedJob.
 * Stateless: the same text always yields the same outcome.
 */
export class MessageParser {
  private readonly markerPattern: RegExp;

  constructor(options: { jobMarker?: string } = {}) {
    const marker = (options.jobMarker ?? DEFAULT_JOB_MARKER).trim();
    const body = marker
      .split(/\s+/)
      .map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
      .join('\\s*');
    this.markerPattern = new RegExp(`\\b${body}\\b`, 'i');
  }

  parse(text: string): ParseOutcome {
    const format = detectFormat(text);
    if (format === 'unknown') {
      return { ok: false, format, error: new FormatUnrecognizedError(text) };
    }

    const lines = splitLines(text);
    const fields =
      format === 'labeled' ? this.extractLabeled(lines) : this.extractLineByLine(lines, format);

    const missingFields: ParsedField[] = OPTIONAL_FIELDS.filter((field) => fields[field] === null);

    if (!fields.total) {
      return {
        ok: false,
        format,
        error: new ParseFailureError(
          'total',
          ['total', ...missingFields],
          lines.map((line) => line.trim()).filter((line) => /\btotal\b|\$/i.test(line))
        ),
      };
    }

    return { ok: true, format, job: this.assemble(fields, fields.total), missingFields };
  }

  /**
   * Splits a pasted batch on the job marker line. Pricing lines right after a
   * marker belong to the job the marker closes.
   */
  parseBatch(text: string): BlockParseOutcome[] {
    const blocks: string[] = [];
    let current: string[] = [];
    let closing = false;

    for (const line of splitLines(text)) {
      if (closing) {
        if (line.trim() === '' || this.isPricingLine(line)) {
          current.push(line);
          continue;
        }
        blocks.push(current.join('\n'));
        current = [];
        closing = false;
      }

      current.push(line);
      if (this.markerPattern.test(line)) {
        closing = true;
      }
    }

    if (current.some((line) => line.trim() !== '')) {
      blocks.push(current.join('\n'));
    }

    return blocks
      .map((block) => block.trim())
      .filter((block) => block.length > 0)
      .map((block) => ({ block, outcome: this.parse(block) }));
  }

  private extractLabeled(lines: string[]): ExtractedFields {
    const dateValue = extractLabeledValue(lines, ['date']);
    const date = dateValue ? extractDate(dateValue.value) : null;
    const total = extractLabeledAmount(lines, 'total');

    return {
      address: extractAddress(lines, { labeled: true }),
      phone: extractPhone(lines, { labeled: true }),
      description: extractLabeledValue(lines, ['description', 'desc']),
      date: dateValue && date ? { value: date, line: dateValue.line } : null,
      total,
      parts: extractLabeledAmount(lines, 'parts'),
      fee: extractLabeledAmount(lines, 'fee'),
      techAmount: extractLabeledAmount(lines, 'tech'),
      paymentMethod: extractPaymentMethod(total?.context ?? null),
    };
  }

  private extractLineByLine(lines: string[], format: 'standard' | 'simple'): ExtractedFields {
    const address = extractAddress(lines, { labeled: false });
    const total =
      format === 'standard'
        ? this.findStandaloneTotal(lines, address)
        : extractLabeledAmount(lines, 'total');

    return {
      address,
      phone: extractPhone(lines, { labeled: false }),
      description: extractDescription(lines, address?.line ?? null, (line) =>
        this.isDataLine(line)
      ),
      date: findDate(lines),
      total,
      parts: extractLabeledAmount(lines, 'parts'),
      fee: extractLabeledAmount(lines, 'fee'),
      techAmount: extractLabeledAmount(lines, 'tech'),
      paymentMethod: extractPaymentMethod(total?.context ?? null),
    };
  }

  private findStandaloneTotal(
    lines: string[],
    address: LabeledValue | null
  ): LabeledAmount | null {
    const start = address ? lines.findIndex((line) => line.trim() === address.line) + 1 : 0;
    for (const line of lines.slice(start)) {
      const amount = extractStandaloneAmount(line);
      if (amount !== null) {
        return { amount, context: '', line: line.trim() };
      }
    }
    return null;
  }

  private assemble(fields: ExtractedFields, total: LabeledAmount): ParsedJob {
    const parts: Money = fields.parts?.amount ?? 0;
    const date: CalendarDate | null = fields.date?.value ?? null;

    const flags: ParsedJobFlag[] = [];
    if (parts > total.amount) {
      flags.push({
        code: 'parts_exceed_total',
        message: 'Parts cost is greater than the job total',
        line: fields.parts?.line ?? null,
      });
    }

    const sourceLines: Partial<Record<ParsedField, string>> = { total: total.line };
    for (const field of ['address', 'phone', 'description', 'date'] as const) {
      const found = fields[field];
      if (found) sourceLines[field] = found.line;
    }
    for (const field of ['parts', 'fee', 'techAmount'] as const) {
      const found = fields[field];
      if (found) sourceLines[field] = found.line;
    }

    return {
      address: fields.address?.value ?? null,
      phone: fields.phone?.value ?? null,
      description: fields.description?.value ?? null,
      date,
      total: total.amount,
      parts,
      fee: fields.fee?.amount ?? 0,
      techAmount: fields.techAmount?.amount ?? null,
      paymentMethod: fields.paymentMethod,
      flags,
      sourceLines,
    };
  }

  private isPricingLine(line: string): boolean {
    return isCurrencyLine(line) || hasAmountLabel(line);
  }

  private isDataLine(line: string): boolean {
    return (
      this.markerPattern.test(line) ||
      this.isPricingLine(line) ||
      isAddressLine(line) ||
      normalizePhone(line) !== null ||
      extractDate(line) !== null
    );
  }
}
