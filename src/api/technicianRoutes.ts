import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { fromCents } from '../domain/money.js';
import type { JobService } from '../services/JobService.js';
import type { TechnicianService } from '../services/TechnicianService.js';
import { mapTechnicianToResponse } from './jobMapper.js';
import { technicianInputSchema } from './schemas.js';

export function createTechnicianRouter(
  technicianService: TechnicianService,
  jobService: JobService
): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const technicians = await technicianService.listTechnicians();
      res.json({ technicians: technicians.map(mapTechnicianToResponse) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = technicianInputSchema.parse(req.body);
      const technician = await technicianService.createTechnician(input);
      res.status(201).json({ technician: mapTechnicianToResponse(technician) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const technician = await technicianService.getTechnician(req.params.id);
      res.json({ technician: mapTechnicianToResponse(technician) });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = technicianInputSchema.required().parse(req.body);
      const technician = await technicianService.updateTechnician(req.params.id, input);
      res.json({ technician: mapTechnicianToResponse(technician) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/technicians/:id - stored jobs keep the id
   */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await technicianService.deleteTechnician(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await jobService.getTechnicianStats(req.params.id);
      res.json({
        stats: {
          ...stats,
          totalSales: fromCents(stats.totalSales),
          totalParts: fromCents(stats.totalParts),
          unpaidNetAmount: fromCents(stats.unpaidNetAmount),
          unpaidBalance: fromCents(stats.unpaidBalance),
          totalBalance: fromCents(stats.totalBalance),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
