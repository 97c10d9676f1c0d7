import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { JobService } from '../../../src/services/JobService.js';
import { TechnicianService } from '../../../src/services/TechnicianService.js';
import { CommissionCalculator } from '../../../src/services/CommissionCalculator.js';
import { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { TechnicianRepository } from '../../../src/infra/repositories/TechnicianRepository.js';
import { MessageParser } from '../../../src/parser/MessageParser.js';
import { createJob } from '../../../src/domain/entities/Job.js';
import type { ParsedJob } from '../../../src/domain/entities/ParsedJob.js';
import type { Technician } from '../../../src/domain/entities/Technician.js';
import { InvalidAmountError, NotFoundError, ValidationError } from '../../../src/domain/errors.js';

const PAID_AT = new Date('2026-02-01T09:00:00.000Z');

function parse(text: string): ParsedJob {
  const outcome = new MessageParser().parse(text);
  if (!outcome.ok) throw outcome.error;
  return outcome.job;
}

describe('JobService', () => {
  let dir: string;
  let jobs: JobService;
  let technicians: TechnicianService;
  let dana: Technician;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'job-service-'));
    const technicianRepo = new TechnicianRepository(path.join(dir, 'technicians.json'));
    technicians = new TechnicianService(technicianRepo, 0.5);
    jobs = new JobService(
      new JobRepository(path.join(dir, 'jobs.json')),
      technicianRepo,
      new CommissionCalculator(),
      () => PAID_AT
    );
    dana = await technicians.createTechnician({ name: 'Dana', commissionRate: 0.4 });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('confirmParsedJob', () => {
    it('should store a parsed job at the technician rate', async () => {
      const stored = await jobs.confirmParsedJob({
        parsed: parse('date:1/5/26\nAddr: 1 Main St, Rye, NY\nTotal cash: 510$'),
        technicianId: dana.id,
      });

      expect(stored).toMatchObject({
        technicianId: dana.id,
        address: '1 Main St, Rye, NY',
        date: '2026-01-05',
        total: 51000,
        commissionRate: 0.4,
        techProfit: 20400,
        balance: 30600,
        isPaid: false,
      });
      expect(await jobs.getJob(stored.id)).toEqual(stored);
    });

    it('should apply reviewer overrides and an explicit rate', async () => {
      const stored = await jobs.confirmParsedJob({
        parsed: parse('Total cash: 100$\nParts: 150'),
        technicianId: dana.id,
        commissionRate: 0.5,
        overrides: { parts: 1500, paymentMethod: 'cc' },
      });

      expect(stored.parts).toBe(1500);
      expect(stored.paymentMethod).toBe('cc');
      expect(stored.techProfit).toBe(4250 + 1500);
      expect(stored.balance).toBe(-5750);
    });

    it('should refuse a flagged job nobody corrected', async () => {
      await expect(
        jobs.confirmParsedJob({ parsed: parse('Total cash: 100$\nParts: 150'), technicianId: dana.id })
      ).rejects.toBeInstanceOf(InvalidAmountError);
      expect(await jobs.listJobs()).toEqual([]);
    });

    it('should require a known technician', async () => {
      await expect(
        jobs.confirmParsedJob({ parsed: parse('Total cash: 100$'), technicianId: 'nobody' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('listJobs', () => {
    it('should filter by technician, date range and paid state', async () => {
      const sam = await technicians.createTechnician({ name: 'Sam' });
      const created = await jobs.createJobs([
        createJob({ technicianId: dana.id, date: '2026-01-10', total: 1000, commissionRate: 0.4 }),
        createJob({ technicianId: dana.id, date: '2026-01-02', total: 2000, commissionRate: 0.4 }),
        createJob({ technicianId: dana.id, total: 3000, commissionRate: 0.4 }),
        createJob({ technicianId: sam.id, date: '2026-01-05', total: 4000, commissionRate: 0.5 }),
      ]);
      await jobs.setPaid([created[0].id], true);

      const totals = async (filter: Parameters<JobService['listJobs']>[0]) =>
        (await jobs.listJobs(filter)).map((job) => job.total);

      expect(await totals({ technicianId: dana.id })).toEqual([2000, 1000, 3000]);
      expect(await totals({ technicianId: dana.id, from: '2026-01-05' })).toEqual([1000]);
      expect(await totals({ technicianId: dana.id, isPaid: false })).toEqual([2000, 3000]);
      expect(await totals({})).toEqual([2000, 4000, 1000, 3000]);
    });
  });

  describe('replaceJob', () => {
    it('should recompute the split and keep the paid state', async () => {
      const original = await jobs.createJob(
        createJob({ technicianId: dana.id, total: 10000, commissionRate: 0.4 })
      );
      await jobs.setPaid([original.id], true);

      const replaced = await jobs.replaceJob(
        original.id,
        createJob({ technicianId: dana.id, total: 20000, paymentMethod: 'check', commissionRate: 0.4 })
      );

      expect(replaced.id).toBe(original.id);
      expect(replaced.techProfit).toBe(8000);
      expect(replaced.balance).toBe(-8000);
      expect(replaced.isPaid).toBe(true);
      expect(replaced.paidAt).toEqual(PAID_AT);
      expect(replaced.createdAt).toEqual(original.createdAt);
    });

    it('should fail for an unknown job', async () => {
      await expect(
        jobs.replaceJob('missing', createJob({ technicianId: dana.id, total: 100, commissionRate: 0.4 }))
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should not lose a payment made while the job is replaced', async () => {
      const original = await jobs.createJob(
        createJob({ technicianId: dana.id, total: 10000, commissionRate: 0.4 })
      );

      await Promise.all([
        jobs.replaceJob(original.id, createJob({ technicianId: dana.id, total: 20000, commissionRate: 0.4 })),
        jobs.setPaid([original.id], true),
      ]);

      const stored = await jobs.getJob(original.id);
      expect(stored.total).toBe(20000);
      expect(stored.isPaid).toBe(true);
      expect(stored.paidAt).toEqual(PAID_AT);
    });
  });

  describe('setPaid', () => {
    it('should mark jobs paid and unpaid', async () => {
      const job = await jobs.createJob(createJob({ technicianId: dana.id, total: 100, commissionRate: 0.4 }));

      const [paid] = await jobs.setPaid([job.id], true);
      expect(paid.isPaid).toBe(true);
      expect(paid.paidAt).toEqual(PAID_AT);

      const [unpaid] = await jobs.setPaid([job.id], false);
      expect(unpaid.isPaid).toBe(false);
      expect(unpaid.paidAt).toBeNull();
    });

    it('should change nothing when an id is unknown', async () => {
      const job = await jobs.createJob(createJob({ technicianId: dana.id, total: 100, commissionRate: 0.4 }));

      await expect(jobs.setPaid([job.id, 'missing'], true)).rejects.toBeInstanceOf(NotFoundError);
      expect((await jobs.getJob(job.id)).isPaid).toBe(false);
    });

    it('should require at least one id', async () => {
      await expect(jobs.setPaid([], true)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  it('should delete jobs', async () => {
    const job = await jobs.createJob(createJob({ technicianId: dana.id, total: 100, commissionRate: 0.4 }));

    await jobs.deleteJob(job.id);
    await expect(jobs.getJob(job.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(jobs.deleteJob(job.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should summarize a technician', async () => {
    const created = await jobs.createJobs([
      createJob({ technicianId: dana.id, total: 10000, parts: 1000, commissionRate: 0.5 }),
      createJob({ technicianId: dana.id, total: 20000, paymentMethod: 'cc', commissionRate: 0.5 }),
      createJob({ technicianId: dana.id, total: 5000, commissionRate: 0.5 }),
    ]);
    await jobs.setPaid([created[2].id], true);

    expect(await jobs.getTechnicianStats(dana.id)).toEqual({
      technicianId: dana.id,
      jobCount: 3,
      paidCount: 1,
      unpaidCount: 2,
      totalSales: 35000,
      totalParts: 1000,
      unpaidNetAmount: 9000 + 20000,
      unpaidBalance: 4500 - 10000,
      totalBalance: 4500 - 10000 + 2500,
    });
  });
});

describe('TechnicianService', () => {
  let dir: string;
  let technicians: TechnicianService;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'technician-service-'));
    technicians = new TechnicianService(new TechnicianRepository(path.join(dir, 'technicians.json')), 0.5);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should default the rate and reject duplicate names', async () => {
    const created = await technicians.createTechnician({ name: ' Dana ' });

    expect(created.name).toBe('Dana');
    expect(created.commissionRate).toBe(0.5);
    await expect(technicians.createTechnician({ name: 'dana' })).rejects.toMatchObject({
      code: 'DUPLICATE_TECHNICIAN',
    });
  });

  it('should get or create by name', async () => {
    const first = await technicians.getOrCreateByName('Sam', 0.3);
    const second = await technicians.getOrCreateByName('SAM');

    expect(second).toEqual(first);
    expect(first.commissionRate).toBe(0.3);
    expect(await technicians.listTechnicians()).toHaveLength(1);
  });

  it('should update and delete', async () => {
    const created = await technicians.createTechnician({ name: 'Dana' });
    const updated = await technicians.updateTechnician(created.id, { name: 'Dana R', commissionRate: 0.6 });

    expect(updated).toEqual({ ...created, name: 'Dana R', commissionRate: 0.6 });
    await technicians.deleteTechnician(created.id);
    await expect(technicians.getTechnician(created.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
