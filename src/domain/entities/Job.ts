import type { CalendarDate } from '../calendarDate.js';
import type { Money } from '../money.js';

/**
 * Job entity - validated, calculation-ready record of one service call
 */
export const PAYMENT_METHODS = ['cash', 'cc', 'check', 'transfer'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/**
 * Payment lands with the company first; the company then owes the technician
 */
export const COMPANY_PAYMENT_METHODS: readonly PaymentMethod[] = ['cc', 'check', 'transfer'];

export interface Job {
  technicianId: string;
  address: string;
  phone: string;
  description: string;
  date: CalendarDate | null;
  total: Money;
  parts: Money;
  fee: Money;
  paymentMethod: PaymentMethod;
  /** Fraction of the net amount, 0.5 = 50% */
  commissionRate: number;
  /** Fixed technician amount; replaces the rate-based commission when set */
  techAmount: Money | null;
  notes: string;
}

export function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.some((method) => method === value);
}

export function isCompanyPayment(method: PaymentMethod): boolean {
  return COMPANY_PAYMENT_METHODS.includes(method);
}

/**
 * Factory function to create a new Job
 */
export function createJob(params: {
  technicianId: string;
  total: Money;
  commissionRate: number;
  paymentMethod?: PaymentMethod;
  parts?: Money;
  fee?: Money;
  address?: string;
  phone?: string;
  description?: string;
  date?: CalendarDate | null;
  techAmount?: Money | null;
  notes?: string;
}): Job {
  return {
    technicianId: params.technicianId,
    address: params.address ?? '',
    phone: params.phone ?? '',
    description: params.description ?? '',
    date: params.date ?? null,
    total: params.total,
    parts: params.parts ?? 0,
    fee: params.fee ?? 0,
    paymentMethod: params.paymentMethod ?? 'cash',
    commissionRate: params.commissionRate,
    techAmount: params.techAmount ?? null,
    notes: params.notes ?? '',
  };
}
