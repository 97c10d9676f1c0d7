import { toCalendarDate, type CalendarDate } from '../domain/calendarDate.js';
import { decimalToCents, type Money } from '../domain/money.js';
import type { PaymentMethod } from '../domain/entities/Job.js';

/**
 * Field extractors: each pulls one semantic field out of a message or a line.
 * They never throw; `null` means the field was not found.
 */

const AMOUNT = String.raw`\$?\s*(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?(?!\d|[.,]\d)\s*\$?`;

const AMOUNT_PATTERN = /^\$?\s*((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?)\s*\$?$/;
const STANDALONE_AMOUNT_PATTERN =
  /^\s*(?:\$\s*(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?|(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{1,2})?\s*\$)\s*$/;

const US_PHONE = /(?<!\d)(?:\+?1[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}(?!\d)/;
const PHONE_CANDIDATE = /\+?\(?\d[\d\s()-]*\d/g;
const PHONE_ONLY_LINE = /^[\d\s()+-]+$/;
const STREET_NUMBER_PREFIX = /^\s*\d+[A-Za-z]?\s+\S/;

const US_DATE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})\b/;
const ISO_DATE = /\b(\d{4})-(\d{2})-(\d{2})\b/;
const COMPACT_DATE = /^\s*(\d{4})(\d{2})(\d{2})\s*$/;

// Lines owned by another field; "Desc: rekey total 4 locks" is not a total
const FIELD_LABEL_LINE = /^\s*(?:date|ph|phone|addr|address|desc|description|occu)\s*:/i;
const CHANNEL_WORD = /\b(?:cash|cc|credit|card|che(?:ck|que)s?|transfer)\b/i;

export type AmountLabel = 'total' | 'parts' | 'fee' | 'tech';

const AMOUNT_LABEL_PATTERNS: Record<AmountLabel, RegExp> = {
  total: new RegExp(
    String.raw`\btotal\b\s*(?<context>[a-z][a-z ]*?)?\s*:?\s*(?<amount>${AMOUNT})`,
    'i'
  ),
  parts: new RegExp(String.raw`\bparts?\b\s*:?\s*(?<amount>${AMOUNT})`, 'i'),
  fee: new RegExp(String.raw`\bfee\b\s*:?\s*(?<amount>${AMOUNT})`, 'i'),
  tech: new RegExp(String.raw`^\s*tech\b\s*:?\s*(?<amount>${AMOUNT})\s*$`, 'i'),
};

export interface LabeledAmount {
  amount: Money;
  /** Words between the label and the amount, e.g. "cash" in "Total cash: 510" */
  context: string;
  line: string;
}

export interface LabeledValue {
  value: string;
  line: string;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * "$1,231.00", "510$", "446" → cents
 */
export function parseAmount(token: string): Money | null {
  const match = AMOUNT_PATTERN.exec(token.trim());
  if (!match) return null;
  return decimalToCents(match[1].replace(/,/g, ''));
}

/**
 * Amount standing alone on its line, marked with a leading or trailing "$"
 */
export function extractStandaloneAmount(line: string): Money | null {
  if (!STANDALONE_AMOUNT_PATTERN.test(line)) return null;
  return parseAmount(line);
}

export function isCurrencyLine(line: string): boolean {
  return STANDALONE_AMOUNT_PATTERN.test(line);
}

/**
 * First line carrying the label and a well-formed amount. For totals a line
 * naming the payment channel ("Total cash: 510") wins over a bare "Total 510".
 */
export function extractLabeledAmount(lines: string[], label: AmountLabel): LabeledAmount | null {
  const pattern = AMOUNT_LABEL_PATTERNS[label];
  let fallback: LabeledAmount | null = null;

  for (const line of lines) {
    if (FIELD_LABEL_LINE.test(line)) continue;

    const groups = pattern.exec(line)?.groups;
    if (!groups?.amount) continue;

    const amount = parseAmount(groups.amount);
    if (amount === null) continue;

    const found = { amount, context: (groups.context ?? '').trim(), line: line.trim() };
    if (label !== 'total' || CHANNEL_WORD.test(found.context)) {
      return found;
    }
    if (!fallback) fallback = found;
  }
  return fallback;
}

export function hasAmountLabel(line: string): boolean {
  return Object.values(AMOUNT_LABEL_PATTERNS).some((pattern) => pattern.test(line));
}

/**
 * Remainder of the first "Label: value" line for any of the given labels
 */
export function extractLabeledValue(lines: string[], labels: string[]): LabeledValue | null {
  const pattern = new RegExp(String.raw`\b(?:${labels.join('|')})\s*:\s*(.*)$`, 'i');
  for (const line of lines) {
    const value = pattern.exec(line)?.[1]?.trim();
    if (value) {
      return { value, line: line.trim() };
    }
  }
  return null;
}

/**
 * A 10-digit US number when there is one, otherwise the first run of 7–11
 * digits allowing "()", "-" and space separators; digits only
 */
export function normalizePhone(value: string): string | null {
  const us = US_PHONE.exec(value);
  if (us) {
    return us[0].replace(/\D/g, '');
  }

  for (const match of value.matchAll(PHONE_CANDIDATE)) {
    const digits = match[0].replace(/\D/g, '');
    if (digits.length >= 7 && digits.length <= 11) {
      return digits;
    }
  }
  return null;
}

export function isPhoneLine(line: string): boolean {
  return PHONE_ONLY_LINE.test(line.trim()) && normalizePhone(line) !== null;
}

/**
 * Street number first, then at least two comma-separated components
 */
export function isAddressLine(line: string): boolean {
  if (!STREET_NUMBER_PREFIX.test(line)) return false;
  if ((line.match(/,/g)?.length ?? 0) < 2) return false;
  return !isCurrencyLine(line) && !isPhoneLine(line);
}

export function extractPhone(lines: string[], options: { labeled: boolean }): LabeledValue | null {
  if (options.labeled) {
    const labeled = extractLabeledValue(lines, ['phone', 'ph']);
    if (!labeled) return null;
    const digits = normalizePhone(labeled.value);
    return digits ? { value: digits, line: labeled.line } : null;
  }

  for (const line of lines) {
    if (isAddressLine(line) || isCurrencyLine(line) || hasAmountLabel(line)) continue;
    if (extractDate(line) !== null) continue;

    const digits = normalizePhone(line);
    if (digits) {
      return { value: digits, line: line.trim() };
    }
  }
  return null;
}

export function extractAddress(lines: string[], options: { labeled: boolean }): LabeledValue | null {
  if (options.labeled) {
    return extractLabeledValue(lines, ['address', 'addr']);
  }

  const line = lines.find(isAddressLine);
  return line ? { value: line.trim(), line: line.trim() } : null;
}

/**
 * M/D/YY, M/D/YYYY, YYYY-MM-DD or YYYYMMDD → ISO calendar date.
 * Two-digit years are 20YY.
 */
export function extractDate(value: string): CalendarDate | null {
  const us = US_DATE.exec(value);
  if (us) {
    const year = us[3].length === 2 ? 2000 + Number(us[3]) : Number(us[3]);
    return toCalendarDate(year, Number(us[1]), Number(us[2]));
  }

  const iso = ISO_DATE.exec(value) ?? COMPACT_DATE.exec(value);
  if (iso) {
    return toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  return null;
}

export function findDate(lines: string[]): LabeledValue | null {
  for (const line of lines) {
    const date = extractDate(line);
    if (date) {
      return { value: date, line: line.trim() };
    }
  }
  return null;
}

/**
 * Payment channel named in an amount label; anything else is cash
 */
export function extractPaymentMethod(context: string | null): PaymentMethod {
  if (!context) return 'cash';
  if (/\b(?:cc|credit\s*card|credit|card)\b/i.test(context)) return 'cc';
  if (/\bche(?:ck|que)s?\b/i.test(context)) return 'check';
  if (/\btransfer\b/i.test(context)) return 'transfer';
  return 'cash';
}

/**
 * Free-text lines after the address, up to the first data line; at most three
 */
export function extractDescription(
  lines: string[],
  addressLine: string | null,
  isDataLine: (line: string) => boolean
): LabeledValue | null {
  if (!addressLine) return null;

  const start = lines.findIndex((line) => line.trim() === addressLine);
  if (start < 0) return null;

  const collected: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (isDataLine(line)) break;
    const trimmed = line.trim();
    if (trimmed) {
      collected.push(trimmed);
    }
  }

  if (collected.length === 0) return null;
  const value = collected.slice(0, 3).join(' | ');
  return { value, line: collected[0] };
}
