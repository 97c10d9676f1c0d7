import type { Money } from '../money.js';
import type { Job } from './Job.js';

/**
 * Outcome of the commission calculation for one job
 */
export interface CommissionBreakdown {
  /** total − parts */
  netAmount: Money;
  techProfit: Money;
  /** Positive: technician owes company. Negative: company owes technician. */
  balance: Money;
}

/**
 * JobResult - derived on demand, never persisted on its own
 */
export interface JobResult extends CommissionBreakdown {
  job: Job;
}

export function techOwesCompany(result: CommissionBreakdown): boolean {
  return result.balance > 0;
}
