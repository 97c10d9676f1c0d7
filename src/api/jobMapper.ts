import { fromCents } from '../domain/money.js';
import type { Job } from '../domain/entities/Job.js';
import type { CommissionBreakdown } from '../domain/entities/JobResult.js';
import type { ParsedJob } from '../domain/entities/ParsedJob.js';
import type { StoredJob } from '../domain/entities/StoredJob.js';
import type { Technician } from '../domain/entities/Technician.js';
import type { AppError } from '../domain/errors.js';

/**
 * Response shapes. Money goes out as dollars with two decimals.
 */
export function mapJobToResponse(job: Job) {
  return {
    technicianId: job.technicianId,
    address: job.address,
    phone: job.phone,
    description: job.description,
    date: job.date,
    total: fromCents(job.total),
    parts: fromCents(job.parts),
    fee: fromCents(job.fee),
    paymentMethod: job.paymentMethod,
    commissionRate: job.commissionRate,
    techAmount: job.techAmount === null ? null : fromCents(job.techAmount),
    notes: job.notes,
  };
}

export function mapStoredJobToResponse(job: StoredJob) {
  return {
    id: job.id,
    ...mapJobToResponse(job),
    techProfit: fromCents(job.techProfit),
    balance: fromCents(job.balance),
    isPaid: job.isPaid,
    paidAt: job.paidAt,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
  };
}

export function mapParsedJobToResponse(job: ParsedJob) {
  return {
    address: job.address,
    phone: job.phone,
    description: job.description,
    date: job.date,
    total: fromCents(job.total),
    parts: fromCents(job.parts),
    fee: fromCents(job.fee),
    techAmount: job.techAmount === null ? null : fromCents(job.techAmount),
    paymentMethod: job.paymentMethod,
    flags: job.flags,
    sourceLines: job.sourceLines,
  };
}

export function mapBreakdownToResponse(breakdown: CommissionBreakdown) {
  return {
    netAmount: fromCents(breakdown.netAmount),
    techProfit: fromCents(breakdown.techProfit),
    balance: fromCents(breakdown.balance),
    techOwesCompany: breakdown.balance > 0,
  };
}

export function mapTechnicianToResponse(technician: Technician) {
  return {
    id: technician.id,
    name: technician.name,
    commissionRate: technician.commissionRate,
    createdAt: technician.createdAt,
  };
}

export function mapErrorToResponse(error: AppError) {
  return {
    error: error.code,
    message: error.message,
    ...(error.details ? { details: error.details } : {}),
  };
}
