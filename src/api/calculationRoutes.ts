import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { CommissionCalculator } from '../services/CommissionCalculator.js';
import { mapBreakdownToResponse } from './jobMapper.js';
import { calculationSchema } from './schemas.js';

export function createCalculationRouter(calculator: CommissionCalculator): Router {
  const router = Router();

  /**
   * POST /api/calculations - preview a split without storing anything
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = calculationSchema.parse(req.body);
      const outcome = calculator.calculate(input);
      if (!outcome.ok) {
        throw outcome.error;
      }
      res.json({
        paymentMethod: outcome.paymentMethod,
        ...mapBreakdownToResponse(outcome.breakdown),
        warnings: outcome.warnings,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
