import { z } from 'zod';
import { isCalendarDate } from '../domain/calendarDate.js';
import { toCents } from '../domain/money.js';
import { PAYMENT_METHODS } from '../domain/entities/Job.js';
import { parseAmount } from '../parser/fieldExtractors.js';

/**
 * Request schemas. Amounts travel as dollars (510, "510.00", "$1,231")
 * and come out of parsing as integer cents.
 */
export const moneySchema = z
  .union([z.number().finite(), z.string()])
  .transform((value, ctx) => {
    const cents = typeof value === 'number' ? toCents(value) : parseAmount(value);
    if (cents === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid amount' });
      return z.NEVER;
    }
    return cents;
  });

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a date as YYYY-MM-DD' });

export const commissionRateSchema = z.number().finite();

const jobFieldsShape = {
  address: z.string(),
  phone: z.string(),
  description: z.string(),
  date: calendarDateSchema.nullable(),
  total: moneySchema,
  parts: moneySchema,
  fee: moneySchema,
  paymentMethod: z.enum(PAYMENT_METHODS),
  techAmount: moneySchema.nullable(),
  notes: z.string(),
};

export const jobOverridesSchema = z.object(jobFieldsShape).partial();

export const jobInputSchema = z
  .object(jobFieldsShape)
  .partial()
  .extend({
    technicianId: z.string().min(1),
    total: moneySchema,
    commissionRate: commissionRateSchema.optional(),
  });

export const parsedJobSchema = z.object({
  address: z.string().nullable(),
  phone: z.string().nullable(),
  description: z.string().nullable(),
  date: calendarDateSchema.nullable(),
  total: moneySchema,
  parts: moneySchema.default(0),
  fee: moneySchema.default(0),
  techAmount: moneySchema.nullable().default(null),
  paymentMethod: z.enum(PAYMENT_METHODS).default('cash'),
  flags: z
    .array(
      z.object({
        code: z.literal('parts_exceed_total'),
        message: z.string(),
        line: z.string().nullable(),
      })
    )
    .default([]),
  sourceLines: z
    .record(
      z.enum(['address', 'phone', 'description', 'date', 'total', 'parts', 'fee', 'techAmount']),
      z.string()
    )
    .default({}),
});

export const confirmJobSchema = z.object({
  parsed: parsedJobSchema,
  technicianId: z.string().min(1),
  commissionRate: commissionRateSchema.optional(),
  overrides: jobOverridesSchema.optional(),
});

export const parseMessageSchema = z.object({
  text: z.string().min(1),
  batch: z.boolean().default(false),
});

export const calculationSchema = z.object({
  total: moneySchema,
  parts: moneySchema.optional(),
  paymentMethod: z.string().default('cash'),
  commissionRate: commissionRateSchema,
  techAmount: moneySchema.nullable().optional(),
});

const booleanQuery = z.enum(['true', 'false']).transform((value) => value === 'true');

export const jobListQuerySchema = z.object({
  technicianId: z.string().min(1).optional(),
  from: calendarDateSchema.optional(),
  to: calendarDateSchema.optional(),
  unpaid: booleanQuery.optional(),
});

export const paymentUpdateSchema = z.object({
  ids: z.array(z.string().min(1)).min(1),
  isPaid: z.boolean(),
});

export const technicianInputSchema = z.object({
  name: z.string().trim().min(1),
  commissionRate: commissionRateSchema.min(0).optional(),
});

export const importQuerySchema = z.object({
  technicianId: z.string().min(1),
  commissionRate: z.coerce.number().finite().optional(),
  dryRun: booleanQuery.default('false'),
});

export const reportQuerySchema = z.object({
  format: z.enum(['html', 'xlsx']).default('html'),
  from: calendarDateSchema.optional(),
  to: calendarDateSchema.optional(),
  unpaid: booleanQuery.optional(),
});
