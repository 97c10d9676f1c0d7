import type { CalendarDate } from '../calendarDate.js';
import type { Money } from '../money.js';
import { createJob, type Job, type PaymentMethod } from './Job.js';

/**
 * ParsedJob - transient output of the message parser, reviewed by a human
 * before it is promoted to a Job. Never persisted.
 */
export type MessageFormat = 'labeled' | 'standard' | 'simple';

export type ParsedField =
  | 'address'
  | 'phone'
  | 'description'
  | 'date'
  | 'total'
  | 'parts'
  | 'fee'
  | 'techAmount';

export interface ParsedJobFlag {
  code: 'parts_exceed_total';
  message: string;
  line: string | null;
}

export interface ParsedJob {
  address: string | null;
  /** Digits only */
  phone: string | null;
  description: string | null;
  date: CalendarDate | null;
  total: Money;
  parts: Money;
  fee: Money;
  techAmount: Money | null;
  paymentMethod: PaymentMethod;
  /** Invariant violations kept as found, for the reviewer to correct */
  flags: ParsedJobFlag[];
  /** Raw line each extracted field came from */
  sourceLines: Partial<Record<ParsedField, string>>;
}

/**
 * Promote a user-confirmed ParsedJob; overrides carry the reviewer's edits
 */
export function promoteParsedJob(
  parsed: ParsedJob,
  params: {
    technicianId: string;
    commissionRate: number;
    overrides?: Partial<Omit<Job, 'technicianId' | 'commissionRate'>>;
  }
): Job {
  const base = createJob({
    technicianId: params.technicianId,
    commissionRate: params.commissionRate,
    total: parsed.total,
    parts: parsed.parts,
    fee: parsed.fee,
    paymentMethod: parsed.paymentMethod,
    address: parsed.address ?? '',
    phone: parsed.phone ?? '',
    description: parsed.description ?? '',
    date: parsed.date,
    techAmount: parsed.techAmount,
  });

  return { ...base, ...params.overrides };
}
