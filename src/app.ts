import path from 'node:path';
import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { Env } from './infra/env.js';
import { logger } from './infra/logger.js';
import { createRateLimiter } from './infra/rateLimiter.js';
import { JobRepository } from './infra/repositories/JobRepository.js';
import { TechnicianRepository } from './infra/repositories/TechnicianRepository.js';
import { MessageParser } from './parser/MessageParser.js';
import { CommissionCalculator } from './services/CommissionCalculator.js';
import { ImportService } from './services/ImportService.js';
import { JobService } from './services/JobService.js';
import { ReportService } from './services/ReportService.js';
import { TechnicianService } from './services/TechnicianService.js';
import { createApiRouter, type ApiDependencies } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';

export const JOBS_FILE = 'jobs.json';
export const TECHNICIANS_FILE = 'technicians.json';

/**
 * Wires repositories and services over the data directory
 */
export function createServices(
  env: Pick<Env, 'DATA_DIR' | 'DEFAULT_COMMISSION_RATE' | 'COMPANY_NAME' | 'JOB_MARKER'>
): ApiDependencies {
  const jobRepo = new JobRepository(path.join(env.DATA_DIR, JOBS_FILE));
  const technicianRepo = new TechnicianRepository(path.join(env.DATA_DIR, TECHNICIANS_FILE));
  const calculator = new CommissionCalculator();

  return {
    parser: new MessageParser({ jobMarker: env.JOB_MARKER }),
    calculator,
    jobService: new JobService(jobRepo, technicianRepo, calculator),
    technicianService: new TechnicianService(technicianRepo, env.DEFAULT_COMMISSION_RATE),
    importService: new ImportService(calculator, env.DEFAULT_COMMISSION_RATE),
    reportService: new ReportService(calculator, env.COMPANY_NAME),
  };
}

export function createApp(
  deps: ApiDependencies,
  env: Pick<Env, 'NODE_ENV' | 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX_REQUESTS'>
): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', { method: req.method, path: req.path, ip: req.ip });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(
    '/api',
    createRateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS }),
    createApiRouter(deps)
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(env));

  return app;
}
