import type { Job } from './Job.js';
import type { JobResult } from './JobResult.js';
import type { Money } from '../money.js';

/**
 * StoredJob - the durable record: Job fields, the computed split and metadata
 */
export interface StoredJob extends Job {
  id: string;
  techProfit: Money;
  balance: Money;
  isPaid: boolean;
  paidAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Shape accepted by the store; id and timestamps are assigned on first save
 */
export type UnsavedJob = Omit<StoredJob, 'id' | 'createdAt' | 'updatedAt'> &
  Partial<Pick<StoredJob, 'id' | 'createdAt' | 'updatedAt'>>;

export function toUnsavedJob(
  result: JobResult,
  payment: { isPaid: boolean; paidAt: Date | null } = { isPaid: false, paidAt: null }
): UnsavedJob {
  return {
    ...result.job,
    techProfit: result.techProfit,
    balance: result.balance,
    isPaid: payment.isPaid,
    paidAt: payment.paidAt,
  };
}

export function toJob(stored: StoredJob): Job {
  return {
    technicianId: stored.technicianId,
    address: stored.address,
    phone: stored.phone,
    description: stored.description,
    date: stored.date,
    total: stored.total,
    parts: stored.parts,
    fee: stored.fee,
    paymentMethod: stored.paymentMethod,
    commissionRate: stored.commissionRate,
    techAmount: stored.techAmount,
    notes: stored.notes,
  };
}
