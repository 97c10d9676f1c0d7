import { isWithinRange, type CalendarDate } from '../domain/calendarDate.js';
import { sumMoney, type Money } from '../domain/money.js';
import type { Job } from '../domain/entities/Job.js';
import { promoteParsedJob, type ParsedJob } from '../domain/entities/ParsedJob.js';
import { toUnsavedJob, type StoredJob } from '../domain/entities/StoredJob.js';
import type { Technician } from '../domain/entities/Technician.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { TechnicianRepository } from '../infra/repositories/TechnicianRepository.js';
import { logger } from '../infra/logger.js';
import type { CommissionCalculator } from './CommissionCalculator.js';

export interface JobFilter {
  technicianId?: string;
  from?: CalendarDate;
  to?: CalendarDate;
  isPaid?: boolean;
}

export interface TechnicianStats {
  technicianId: string;
  jobCount: number;
  paidCount: number;
  unpaidCount: number;
  totalSales: Money;
  totalParts: Money;
  /** total − parts over unpaid jobs */
  unpaidNetAmount: Money;
  /** Positive: technician owes company */
  unpaidBalance: Money;
  totalBalance: Money;
}

/**
 * JobService - confirms parsed jobs and keeps stored jobs consistent with
 * their commission split. Every write recomputes the split.
 */
export class JobService {
  constructor(
    private jobRepo: JobRepository,
    private technicianRepo: TechnicianRepository,
    private calculator: CommissionCalculator,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Promote a reviewed ParsedJob; the rate falls back to the technician's own
   */
  async confirmParsedJob(params: {
    parsed: ParsedJob;
    technicianId: string;
    commissionRate?: number;
    overrides?: Partial<Omit<Job, 'technicianId' | 'commissionRate'>>;
  }): Promise<StoredJob> {
    const technician = await this.requireTechnician(params.technicianId);
    const job = promoteParsedJob(params.parsed, {
      technicianId: technician.id,
      commissionRate: params.commissionRate ?? technician.commissionRate,
      overrides: params.overrides,
    });
    return this.createJob(job);
  }

  async createJob(job: Job): Promise<StoredJob> {
    await this.requireTechnician(job.technicianId);
    const result = this.calculator.calculateJob(job);
    const saved = await this.jobRepo.save(toUnsavedJob(result));
    logger.info('Job created', {
      jobId: saved.id,
      technicianId: saved.technicianId,
      balance: saved.balance,
    });
    return saved;
  }

  /**
   * Calculates every job before saving any, so one bad job saves nothing
   */
  async createJobs(jobs: Job[]): Promise<StoredJob[]> {
    for (const technicianId of new Set(jobs.map((job) => job.technicianId))) {
      await this.requireTechnician(technicianId);
    }
    const results = this.calculator.calculateBatch(jobs);
    const saved = await this.jobRepo.saveMany(results.map((result) => toUnsavedJob(result)));
    logger.info('Jobs created', { count: saved.length });
    return saved;
  }

  /**
   * Full field replace; the paid state is kept
   */
  async replaceJob(id: string, job: Job): Promise<StoredJob> {
    await this.requireTechnician(job.technicianId);
    const result = this.calculator.calculateJob(job);
    const { saved, missing } = await this.jobRepo.modify([id], (existing) => ({
      ...toUnsavedJob(result, { isPaid: existing.isPaid, paidAt: existing.paidAt }),
      id,
    }));

    const [replaced] = saved;
    if (missing.length > 0 || !replaced) {
      throw new NotFoundError('Job', id);
    }
    logger.info('Job replaced', { jobId: id });
    return replaced;
  }

  async deleteJob(id: string): Promise<void> {
    const removed = await this.jobRepo.delete(id);
    if (!removed) {
      throw new NotFoundError('Job', id);
    }
    logger.info('Job deleted', { jobId: id });
  }

  async getJob(id: string): Promise<StoredJob> {
    const job = await this.jobRepo.getById(id);
    if (!job) {
      throw new NotFoundError('Job', id);
    }
    return job;
  }

  /**
   * Ordered by job date (undated last), then creation time
   */
  async listJobs(filter: JobFilter = {}): Promise<StoredJob[]> {
    const jobs = await this.jobRepo.list();
    return jobs
      .filter((job) => !filter.technicianId || job.technicianId === filter.technicianId)
      .filter((job) => filter.isPaid === undefined || job.isPaid === filter.isPaid)
      .filter((job) => isWithinRange(job.date, { from: filter.from, to: filter.to }))
      .sort(compareJobs);
  }

  /**
   * Marks jobs paid or unpaid. All ids must exist; nothing changes otherwise.
   */
  async setPaid(ids: string[], isPaid: boolean): Promise<StoredJob[]> {
    if (ids.length === 0) {
      throw new ValidationError('No job ids given');
    }

    const paidAt = this.now();
    const { saved, missing } = await this.jobRepo.modify(ids, (job) => ({
      ...job,
      isPaid,
      paidAt: isPaid ? (job.isPaid ? job.paidAt : paidAt) : null,
    }));
    if (missing.length > 0) {
      throw new NotFoundError('Job', missing[0]);
    }
    logger.info('Job payment state updated', { count: saved.length, isPaid });
    return saved;
  }

  async getTechnicianStats(technicianId: string): Promise<TechnicianStats> {
    await this.requireTechnician(technicianId);
    const jobs = await this.listJobs({ technicianId });
    const unpaid = jobs.filter((job) => !job.isPaid);

    return {
      technicianId,
      jobCount: jobs.length,
      paidCount: jobs.length - unpaid.length,
      unpaidCount: unpaid.length,
      totalSales: sumMoney(jobs.map((job) => job.total)),
      totalParts: sumMoney(jobs.map((job) => job.parts)),
      unpaidNetAmount: sumMoney(unpaid.map((job) => job.total - job.parts)),
      unpaidBalance: sumMoney(unpaid.map((job) => job.balance)),
      totalBalance: sumMoney(jobs.map((job) => job.balance)),
    };
  }

  private async requireTechnician(id: string): Promise<Technician> {
    const technician = await this.technicianRepo.getById(id);
    if (!technician) {
      throw new NotFoundError('Technician', id);
    }
    return technician;
  }
}

function compareJobs(a: StoredJob, b: StoredJob): number {
  if (a.date !== b.date) {
    if (a.date === null) return 1;
    if (b.date === null) return -1;
    return a.date < b.date ? -1 : 1;
  }
  return a.createdAt.getTime() - b.createdAt.getTime();
}
