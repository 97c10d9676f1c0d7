import {
  InvalidAmountError,
  MissingRequiredFieldError,
  UnknownPaymentMethodError,
  ValidationError,
} from '../domain/errors.js';
import { applyRate, sumMoney, type Money } from '../domain/money.js';
import {
  isCompanyPayment,
  isPaymentMethod,
  type Job,
  type PaymentMethod,
} from '../domain/entities/Job.js';
import type { CommissionBreakdown, JobResult } from '../domain/entities/JobResult.js';
import type { CommissionSummary } from '../domain/entities/CommissionReport.js';
import { logger } from '../infra/logger.js';

export interface CommissionInput {
  total: Money | null | undefined;
  parts?: Money | null;
  paymentMethod: string;
  commissionRate: number;
  techAmount?: Money | null;
}

export interface CalculationWarning {
  code: 'rate_out_of_range';
  message: string;
  rate: number;
}

export type CalculationOutcome =
  | {
      ok: true;
      paymentMethod: PaymentMethod;
      breakdown: CommissionBreakdown;
      warnings: CalculationWarning[];
    }
  | { ok: false; error: ValidationError };

/**
 * CommissionCalculator - splits a job's money between technician and company.
 *
 * Cash: the technician holds the money, keeps the parts cost and the
 * commission on (total − parts), and owes the company the rest.
 * Company-bound (cc, check, transfer): the company holds the money and owes
 * the technician the commission plus the parts cost.
 *
 * The only inexact step is (total − parts) × rate, rounded once to cents;
 * the balance is derived from the rounded profit, so
 * cash: techProfit + balance === total − parts, company: balance === −techProfit.
 */
export class CommissionCalculator {
  /**
   * Pure calculation; failures come back as values, never thrown
   */
  calculate(input: CommissionInput): CalculationOutcome {
    if (input.total === null || input.total === undefined) {
      return { ok: false, error: new MissingRequiredFieldError('total') };
    }
    const paymentMethod = input.paymentMethod;
    if (!isPaymentMethod(paymentMethod)) {
      return { ok: false, error: new UnknownPaymentMethodError(paymentMethod) };
    }
    if (!Number.isFinite(input.commissionRate)) {
      return {
        ok: false,
        error: new ValidationError('Commission rate must be a finite number', {
          commissionRate: input.commissionRate,
        }),
      };
    }

    const total = input.total;
    const parts = input.parts ?? 0;
    const techAmount = input.techAmount ?? null;

    const amounts: Record<string, Money> = { total, parts };
    if (techAmount !== null) amounts.techAmount = techAmount;

    for (const [field, value] of Object.entries(amounts)) {
      if (!Number.isSafeInteger(value)) {
        return {
          ok: false,
          error: new ValidationError(`${field} must be a whole number of cents`, { field, value }),
        };
      }
      if (value < 0) {
        return {
          ok: false,
          error: new InvalidAmountError('negative_amount', `${field} cannot be negative`, {
            field,
            value,
          }),
        };
      }
    }

    if (parts > total) {
      return {
        ok: false,
        error: new InvalidAmountError('parts_exceed_total', 'Parts cost exceeds the job total', {
          total,
          parts,
        }),
      };
    }

    const warnings: CalculationWarning[] = [];
    if (input.commissionRate < 0 || input.commissionRate > 1) {
      warnings.push({
        code: 'rate_out_of_range',
        message: 'Commission rate is outside 0–100%',
        rate: input.commissionRate,
      });
    }

    const netAmount = total - parts;
    const commission = techAmount ?? applyRate(netAmount, input.commissionRate);
    if (!Number.isSafeInteger(commission + parts)) {
      return {
        ok: false,
        error: new ValidationError('Commission is too large to represent in cents', {
          commissionRate: input.commissionRate,
        }),
      };
    }

    const breakdown: CommissionBreakdown = isCompanyPayment(paymentMethod)
      ? { netAmount, techProfit: commission + parts, balance: 0 - (commission + parts) }
      : { netAmount, techProfit: commission, balance: netAmount - commission };

    return { ok: true, paymentMethod, breakdown, warnings };
  }

  /**
   * Calculate for an already-validated job; throws the carried error otherwise
   */
  calculateJob(job: Job): JobResult {
    const outcome = this.calculate(job);
    if (!outcome.ok) {
      throw outcome.error;
    }

    for (const warning of outcome.warnings) {
      logger.warn('Commission calculation warning', {
        code: warning.code,
        rate: warning.rate,
        technicianId: job.technicianId,
      });
    }

    return { job, ...outcome.breakdown };
  }

  calculateBatch(jobs: Job[]): JobResult[] {
    return jobs.map((job) => this.calculateJob(job));
  }

  summarize(results: JobResult[]): CommissionSummary {
    const totalFor = (methods: PaymentMethod[]) =>
      sumMoney(
        results.filter((r) => methods.includes(r.job.paymentMethod)).map((r) => r.job.total)
      );

    return {
      jobCount: results.length,
      totalSales: sumMoney(results.map((r) => r.job.total)),
      totalParts: sumMoney(results.map((r) => r.job.parts)),
      totalCash: totalFor(['cash']),
      totalCc: totalFor(['cc']),
      totalCheck: totalFor(['check', 'transfer']),
      totalFee: sumMoney(results.map((r) => r.job.fee)),
      totalTechProfit: sumMoney(results.map((r) => r.techProfit)),
      totalBalance: sumMoney(results.map((r) => r.balance)),
    };
  }
}
