/**
 * Calendar date without time zone, kept as ISO "YYYY-MM-DD" so that it
 * sorts lexically and survives JSON unchanged.
 */
export type CalendarDate = string;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 1000 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return null;
  }
  if (day > daysInMonth(year, month)) {
    return null;
  }
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3])) === value;
}

/**
 * Uses the local calendar fields, which is what spreadsheet readers fill in
 */
export function calendarDateFromDate(date: Date): CalendarDate | null {
  if (Number.isNaN(date.getTime())) return null;
  return toCalendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

export function todayCalendarDate(now: Date = new Date()): CalendarDate {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

/**
 * "2026-01-05" → "01/05/2026"
 */
export function formatUsDate(date: CalendarDate): string {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) return date;
  return `${match[2]}/${match[3]}/${match[1]}`;
}

export function isWithinRange(
  date: CalendarDate | null,
  range: { from?: CalendarDate; to?: CalendarDate }
): boolean {
  if (!range.from && !range.to) return true;
  if (!date) return false;
  if (range.from && date < range.from) return false;
  if (range.to && date > range.to) return false;
  return true;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
