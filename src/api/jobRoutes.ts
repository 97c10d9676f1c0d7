import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { createJob } from '../domain/entities/Job.js';
import type { JobService } from '../services/JobService.js';
import type { TechnicianService } from '../services/TechnicianService.js';
import { mapStoredJobToResponse } from './jobMapper.js';
import {
  confirmJobSchema,
  jobInputSchema,
  jobListQuerySchema,
  paymentUpdateSchema,
} from './schemas.js';

/**
 * Stored jobs route handler
 */
export function createJobRouter(jobService: JobService, technicianService: TechnicianService): Router {
  const router = Router();

  /**
   * GET /api/jobs?technicianId=&from=&to=&unpaid=
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = jobListQuerySchema.parse(req.query);
      const jobs = await jobService.listJobs({
        technicianId: query.technicianId,
        from: query.from,
        to: query.to,
        isPaid: query.unpaid === undefined ? undefined : !query.unpaid,
      });
      res.json({ jobs: jobs.map(mapStoredJobToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/jobs/confirm - store a reviewed parse result
   */
  router.post('/confirm', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = confirmJobSchema.parse(req.body);
      const job = await jobService.confirmParsedJob(body);
      res.status(201).json({ job: mapStoredJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/jobs/payments
   * Body: { ids: string[], isPaid: boolean }
   */
  router.post('/payments', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { ids, isPaid } = paymentUpdateSchema.parse(req.body);
      const jobs = await jobService.setPaid(ids, isPaid);
      res.json({ jobs: jobs.map(mapStoredJobToResponse) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await jobService.getJob(req.params.id);
      res.json({ job: mapStoredJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/jobs - create from explicit fields; the rate defaults to the technician's
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = jobInputSchema.parse(req.body);
      const commissionRate =
        input.commissionRate ??
        (await technicianService.getTechnician(input.technicianId)).commissionRate;
      const job = await jobService.createJob(createJob({ ...input, commissionRate }));
      res.status(201).json({ job: mapStoredJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/jobs/:id - full replace; omitted fields take their defaults
   */
  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = jobInputSchema.parse(req.body);
      const commissionRate =
        input.commissionRate ??
        (await technicianService.getTechnician(input.technicianId)).commissionRate;
      const job = await jobService.replaceJob(req.params.id, createJob({ ...input, commissionRate }));
      res.json({ job: mapStoredJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await jobService.deleteJob(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
