import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { isCalendarDate } from '../../domain/calendarDate.js';
import { fromCents, toCents } from '../../domain/money.js';
import { PAYMENT_METHODS } from '../../domain/entities/Job.js';
import type { StoredJob, UnsavedJob } from '../../domain/entities/StoredJob.js';
import { StorageError } from '../../domain/errors.js';
import { JsonFileStore } from '../JsonFileStore.js';
import { logger } from '../logger.js';

const amount = z.number().finite();

const jobRecordSchema = z.object({
  technician_id: z.string(),
  address: z.string().default(''),
  phone: z.string().default(''),
  description: z.string().default(''),
  date: z.string().refine(isCalendarDate, { message: 'Expected YYYY-MM-DD' }).nullable(),
  total: amount,
  parts: amount.default(0),
  fee: amount.default(0),
  payment_method: z.enum(PAYMENT_METHODS),
  commission_rate: z.number().finite(),
  tech_amount: amount.nullable().default(null),
  notes: z.string().default(''),
  tech_profit: amount,
  balance: amount,
  is_paid: z.boolean().default(false),
  paid_at: z.string().datetime().nullable().default(null),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

type JobRecord = z.infer<typeof jobRecordSchema>;

/**
 * Jobs persisted as one JSON object keyed by job id. Amounts are stored as
 * decimal dollars with at most two fractional digits.
 */
export class JobRepository {
  private readonly store: JsonFileStore<JobRecord>;

  constructor(
    filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.store = new JsonFileStore(filePath, jobRecordSchema);
  }

  async list(): Promise<StoredJob[]> {
    const records = await this.store.read();
    return Object.entries(records).map(([id, record]) => this.fromRecord(id, record));
  }

  async getById(id: string): Promise<StoredJob | null> {
    const records = await this.store.read();
    const record = records[id];
    return record ? this.fromRecord(id, record) : null;
  }

  /**
   * Inserts or replaces a job. A new id is assigned when none is given;
   * createdAt survives replacement, updatedAt is always refreshed.
   */
  async save(job: UnsavedJob): Promise<StoredJob> {
    const [saved] = await this.saveMany([job]);
    if (!saved) {
      throw new StorageError('Job was not saved');
    }
    return saved;
  }

  async saveMany(jobs: UnsavedJob[]): Promise<StoredJob[]> {
    const saved = await this.store.update((records) =>
      jobs.map((job) => {
        const id = job.id ?? randomUUID();
        const existing = records[id];
        const timestamp = this.now();
        const record = this.toRecord(job, {
          createdAt: existing ? existing.created_at : (job.createdAt ?? timestamp).toISOString(),
          updatedAt: timestamp.toISOString(),
        });
        records[id] = record;
        return this.fromRecord(id, record);
      })
    );

    logger.debug('Jobs saved', { count: saved.length, file: this.store.path });
    return saved;
  }

  /**
   * Read-modify-write of existing jobs inside one serialized store update.
   * When any id is missing nothing changes and the missing ids come back.
   */
  async modify(
    ids: string[],
    change: (job: StoredJob) => UnsavedJob
  ): Promise<{ saved: StoredJob[]; missing: string[] }> {
    const result = await this.store.update((records) => {
      const missing = ids.filter((id) => !(id in records));
      if (missing.length > 0) {
        return { saved: [], missing };
      }

      const timestamp = this.now().toISOString();
      const saved = ids.map((id) => {
        const current = records[id];
        const record = this.toRecord(change(this.fromRecord(id, current)), {
          createdAt: current.created_at,
          updatedAt: timestamp,
        });
        records[id] = record;
        return this.fromRecord(id, record);
      });
      return { saved, missing };
    });

    logger.debug('Jobs modified', { count: result.saved.length, file: this.store.path });
    return result;
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.store.update((records) => {
      if (!(id in records)) return false;
      delete records[id];
      return true;
    });

    if (removed) {
      logger.debug('Job deleted', { jobId: id });
    }
    return removed;
  }

  private toRecord(job: UnsavedJob, stamps: { createdAt: string; updatedAt: string }): JobRecord {
    return {
      technician_id: job.technicianId,
      address: job.address,
      phone: job.phone,
      description: job.description,
      date: job.date,
      total: fromCents(job.total),
      parts: fromCents(job.parts),
      fee: fromCents(job.fee),
      payment_method: job.paymentMethod,
      commission_rate: job.commissionRate,
      tech_amount: job.techAmount === null ? null : fromCents(job.techAmount),
      notes: job.notes,
      tech_profit: fromCents(job.techProfit),
      balance: fromCents(job.balance),
      is_paid: job.isPaid,
      paid_at: job.paidAt ? job.paidAt.toISOString() : null,
      created_at: stamps.createdAt,
      updated_at: stamps.updatedAt,
    };
  }

  private fromRecord(id: string, record: JobRecord): StoredJob {
    const cents = (field: string, value: number) => {
      const parsed = toCents(value);
      if (parsed === null) {
        throw new StorageError(`Job ${id} has an unreadable ${field}`, { field, value });
      }
      return parsed;
    };

    return {
      id,
      technicianId: record.technician_id,
      address: record.address,
      phone: record.phone,
      description: record.description,
      date: record.date,
      total: cents('total', record.total),
      parts: cents('parts', record.parts),
      fee: cents('fee', record.fee),
      paymentMethod: record.payment_method,
      commissionRate: record.commission_rate,
      techAmount: record.tech_amount === null ? null : cents('tech_amount', record.tech_amount),
      notes: record.notes,
      techProfit: cents('tech_profit', record.tech_profit),
      balance: cents('balance', record.balance),
      isPaid: record.is_paid,
      paidAt: record.paid_at ? new Date(record.paid_at) : null,
      createdAt: new Date(record.created_at),
      updatedAt: new Date(record.updated_at),
    };
  }
}
