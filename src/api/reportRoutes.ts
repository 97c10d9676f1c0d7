import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { toJob } from '../domain/entities/StoredJob.js';
import type { JobService } from '../services/JobService.js';
import type { ReportService } from '../services/ReportService.js';
import type { TechnicianService } from '../services/TechnicianService.js';
import { reportQuerySchema } from './schemas.js';

export function createReportRouter(deps: {
  reportService: ReportService;
  jobService: JobService;
  technicianService: TechnicianService;
}): Router {
  const router = Router();

  /**
   * GET /api/reports/:technicianId?format=html|xlsx&from=&to=&unpaid=
   */
  router.get('/:technicianId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = reportQuerySchema.parse(req.query);
      const technician = await deps.technicianService.getTechnician(req.params.technicianId);
      const jobs = await deps.jobService.listJobs({
        technicianId: technician.id,
        from: query.from,
        to: query.to,
        isPaid: query.unpaid ? false : undefined,
      });

      const report = deps.reportService.buildReport(technician.name, jobs.map(toJob));
      const rendered = deps.reportService.render(report, query.format);

      res.type(rendered.contentType);
      if (rendered.extension === 'xlsx') {
        const fileName = `${technician.name.replace(/[^\w.-]+/g, '_')}_commission.xlsx`;
        res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
      }
      res.send(rendered.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
