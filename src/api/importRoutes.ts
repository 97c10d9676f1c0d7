import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../domain/errors.js';
import type { ImportService } from '../services/ImportService.js';
import type { JobService } from '../services/JobService.js';
import type { TechnicianService } from '../services/TechnicianService.js';
import { mapJobToResponse, mapStoredJobToResponse } from './jobMapper.js';
import { importQuerySchema } from './schemas.js';

const SPREADSHEET_TYPES = [
  'application/octet-stream',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.ms-excel',
  'text/csv',
];

export function createImportRouter(deps: {
  importService: ImportService;
  jobService: JobService;
  technicianService: TechnicianService;
}): Router {
  const router = Router();

  /**
   * POST /api/imports?technicianId=&commissionRate=&dryRun=
   * Body: raw .xlsx/.xls/.csv bytes. Rows that fail are listed; the rest are stored
   * unless dryRun is set.
   */
  router.post(
    '/',
    express.raw({ type: SPREADSHEET_TYPES, limit: '10mb' }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = importQuerySchema.parse(req.query);
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body) || body.length === 0) {
          throw new ValidationError('Request body must be the spreadsheet file');
        }

        const technician = await deps.technicianService.getTechnician(query.technicianId);
        const result = deps.importService.importFile(body, {
          technicianId: technician.id,
          commissionRate: query.commissionRate ?? technician.commissionRate,
        });

        if (query.dryRun) {
          res.json({
            dryRun: true,
            rowCount: result.rowCount,
            jobs: result.jobs.map(mapJobToResponse),
            errors: result.errors,
          });
          return;
        }

        const stored = await deps.jobService.createJobs(result.jobs);
        res.status(201).json({
          dryRun: false,
          rowCount: result.rowCount,
          jobs: stored.map(mapStoredJobToResponse),
          errors: result.errors,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
