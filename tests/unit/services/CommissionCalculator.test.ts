import { describe, it, expect } from 'vitest';
import { CommissionCalculator } from '../../../src/services/CommissionCalculator.js';
import { createJob } from '../../../src/domain/entities/Job.js';
import {
  InvalidAmountError,
  MissingRequiredFieldError,
  UnknownPaymentMethodError,
  ValidationError,
} from '../../../src/domain/errors.js';

describe('CommissionCalculator', () => {
  const calculator = new CommissionCalculator();

  describe('calculate', () => {
    it('should leave the technician owing the company on cash jobs', () => {
      const outcome = calculator.calculate({
        total: 100000,
        parts: 5000,
        paymentMethod: 'cash',
        commissionRate: 0.5,
      });

      expect(outcome).toEqual({
        ok: true,
        paymentMethod: 'cash',
        breakdown: { netAmount: 95000, techProfit: 47500, balance: 47500 },
        warnings: [],
      });
    });

    it('should leave the company owing the technician on credit card jobs', () => {
      const outcome = calculator.calculate({
        total: 100000,
        parts: 5000,
        paymentMethod: 'cc',
        commissionRate: 0.5,
      });

      expect(outcome.ok && outcome.breakdown).toEqual({
        netAmount: 95000,
        techProfit: 52500,
        balance: -52500,
      });
    });

    it('should treat check and transfer as company-bound', () => {
      for (const paymentMethod of ['check', 'transfer']) {
        const outcome = calculator.calculate({
          total: 20000,
          parts: 0,
          paymentMethod,
          commissionRate: 0.4,
        });
        expect(outcome.ok && outcome.breakdown).toEqual({
          netAmount: 20000,
          techProfit: 8000,
          balance: -8000,
        });
      }
    });

    it('should reject parts above total as a validation error', () => {
      const outcome = calculator.calculate({
        total: 10000,
        parts: 15000,
        paymentMethod: 'cash',
        commissionRate: 0.5,
      });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(InvalidAmountError);
      expect(outcome.error).toBeInstanceOf(ValidationError);
      expect(outcome.error.code).toBe('INVALID_AMOUNT');
      expect(outcome.error.details).toEqual({
        reason: 'parts_exceed_total',
        total: 10000,
        parts: 15000,
      });
    });

    it('should accept parts equal to total', () => {
      const outcome = calculator.calculate({
        total: 10000,
        parts: 10000,
        paymentMethod: 'cash',
        commissionRate: 0.5,
      });

      expect(outcome.ok && outcome.breakdown).toEqual({ netAmount: 0, techProfit: 0, balance: 0 });
    });

    it('should round the commission once and derive the balance from it', () => {
      const outcome = calculator.calculate({
        total: 1001,
        parts: 0,
        paymentMethod: 'cash',
        commissionRate: 0.5,
      });

      expect(outcome.ok && outcome.breakdown).toEqual({
        netAmount: 1001,
        techProfit: 501,
        balance: 500,
      });
    });

    it('should use a fixed technician amount instead of the rate', () => {
      const cash = calculator.calculate({
        total: 50000,
        parts: 5000,
        paymentMethod: 'cash',
        commissionRate: 0.5,
        techAmount: 20000,
      });
      const cc = calculator.calculate({
        total: 50000,
        parts: 5000,
        paymentMethod: 'cc',
        commissionRate: 0.5,
        techAmount: 20000,
      });

      expect(cash.ok && cash.breakdown).toEqual({ netAmount: 45000, techProfit: 20000, balance: 25000 });
      expect(cc.ok && cc.breakdown).toEqual({ netAmount: 45000, techProfit: 25000, balance: -25000 });
    });

    it('should report a missing total', () => {
      const outcome = calculator.calculate({ total: null, paymentMethod: 'cash', commissionRate: 0.5 });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(MissingRequiredFieldError);
    });

    it('should report an unknown payment method', () => {
      const outcome = calculator.calculate({ total: 100, paymentMethod: 'bitcoin', commissionRate: 0.5 });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(UnknownPaymentMethodError);
      expect(outcome.error.code).toBe('UNKNOWN_PAYMENT_METHOD');
    });

    it('should reject negative amounts', () => {
      const outcome = calculator.calculate({
        total: 10000,
        parts: -100,
        paymentMethod: 'cash',
        commissionRate: 0.5,
      });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(InvalidAmountError);
      expect(outcome.error.details).toEqual({
        reason: 'negative_amount',
        field: 'parts',
        value: -100,
      });
    });

    it('should reject fractional cents', () => {
      const outcome = calculator.calculate({ total: 10.5, paymentMethod: 'cash', commissionRate: 0.5 });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.code).toBe('VALIDATION_ERROR');
    });

    it('should warn about a rate outside 0-100% but still calculate', () => {
      const outcome = calculator.calculate({ total: 10000, paymentMethod: 'cash', commissionRate: 1.5 });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.warnings.map((warning) => warning.code)).toEqual(['rate_out_of_range']);
      expect(outcome.breakdown).toEqual({ netAmount: 10000, techProfit: 15000, balance: -5000 });
    });

    it('should return a failure for a commission too large to hold in cents', () => {
      const outcome = calculator.calculate({ total: 10000, paymentMethod: 'cash', commissionRate: 1e21 });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(ValidationError);
      expect(outcome.error.details).toEqual({ commissionRate: 1e21 });
    });

    it('should conserve the net amount on cash jobs and mirror it on company-bound jobs', () => {
      const rates = [0, 0.1, 0.333, 0.35, 0.5, 0.65, 1];
      const amounts: Array<[number, number]> = [
        [1, 0],
        [999, 0],
        [1001, 1],
        [51000, 4550],
        [123457, 9999],
      ];

      for (const rate of rates) {
        for (const [total, parts] of amounts) {
          const cash = calculator.calculate({ total, parts, paymentMethod: 'cash', commissionRate: rate });
          const cc = calculator.calculate({ total, parts, paymentMethod: 'cc', commissionRate: rate });
          if (!cash.ok || !cc.ok) throw new Error('calculation failed');

          expect(cash.breakdown.techProfit + cash.breakdown.balance).toBe(total - parts);
          expect(cc.breakdown.balance).toBe(-cc.breakdown.techProfit);
        }
      }
    });
  });

  describe('calculateJob', () => {
    it('should attach the job to the breakdown', () => {
      const job = createJob({ technicianId: 'tech-1', total: 51000, commissionRate: 0.5 });
      expect(calculator.calculateJob(job)).toEqual({
        job,
        netAmount: 51000,
        techProfit: 25500,
        balance: 25500,
      });
    });

    it('should throw the carried error for an invalid job', () => {
      const job = createJob({ technicianId: 'tech-1', total: 100, parts: 200, commissionRate: 0.5 });
      expect(() => calculator.calculateJob(job)).toThrow(InvalidAmountError);
    });
  });

  describe('summarize', () => {
    it('should total each column', () => {
      const results = calculator.calculateBatch([
        createJob({ technicianId: 't', total: 100000, parts: 5000, commissionRate: 0.5 }),
        createJob({
          technicianId: 't',
          total: 100000,
          parts: 5000,
          fee: 3000,
          paymentMethod: 'cc',
          commissionRate: 0.5,
        }),
        createJob({ technicianId: 't', total: 20000, paymentMethod: 'transfer', commissionRate: 0.5 }),
      ]);

      expect(calculator.summarize(results)).toEqual({
        jobCount: 3,
        totalSales: 220000,
        totalParts: 10000,
        totalCash: 100000,
        totalCc: 100000,
        totalCheck: 20000,
        totalFee: 3000,
        totalTechProfit: 47500 + 52500 + 10000,
        totalBalance: 47500 - 52500 - 10000,
      });
    });
  });
});
