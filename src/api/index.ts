import { Router } from 'express';
import { createMessageRouter } from './messageRoutes.js';
import { createCalculationRouter } from './calculationRoutes.js';
import { createJobRouter } from './jobRoutes.js';
import { createTechnicianRouter } from './technicianRoutes.js';
import { createImportRouter } from './importRoutes.js';
import { createReportRouter } from './reportRoutes.js';
import type { MessageParser } from '../parser/MessageParser.js';
import type { CommissionCalculator } from '../services/CommissionCalculator.js';
import type { JobService } from '../services/JobService.js';
import type { TechnicianService } from '../services/TechnicianService.js';
import type { ImportService } from '../services/ImportService.js';
import type { ReportService } from '../services/ReportService.js';

export interface ApiDependencies {
  parser: MessageParser;
  calculator: CommissionCalculator;
  jobService: JobService;
  technicianService: TechnicianService;
  importService: ImportService;
  reportService: ReportService;
}

/**
 * Main API router - composes all route handlers
 * Dependencies are injected from app.ts
 */
export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  router.use('/messages', createMessageRouter(deps.parser));
  router.use('/calculations', createCalculationRouter(deps.calculator));
  router.use('/jobs', createJobRouter(deps.jobService, deps.technicianService));
  router.use('/technicians', createTechnicianRouter(deps.technicianService, deps.jobService));
  router.use('/imports', createImportRouter(deps));
  router.use('/reports', createReportRouter(deps));

  return router;
}
