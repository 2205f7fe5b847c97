import { z } from 'zod';
import { AccountType, PostingSide, TaxKind } from '@ledgerline/shared-types';
import { ValidationError } from './errors';

export const calendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Invalid calendar date');

export const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid timestamp');

export const currencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, 'Expected an ISO-4217 currency code');

export const minorUnitsSchema = z
  .number()
  .int('Amounts must be integers in minor units')
  .refine((value) => Number.isSafeInteger(value), 'Amount exceeds the safe integer range');

export const accountCodeSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[A-Za-z0-9._-]+$/, 'Account codes may contain letters, digits, dot, dash and underscore');

export const accountInputSchema = z.object({
  code: accountCodeSchema,
  name: z.string().trim().min(1).max(200),
  type: z.nativeEnum(AccountType),
  normalSide: z.nativeEnum(PostingSide).optional(),
  parentCode: accountCodeSchema.optional(),
});

export type AccountInput = z.infer<typeof accountInputSchema>;

export const postingSchema = z.object({
  accountCode: accountCodeSchema,
  amount: minorUnitsSchema.refine((value) => value !== 0, 'Posting amount cannot be zero'),
  side: z.nativeEnum(PostingSide),
  memo: z.string().max(500).optional(),
});

export const newTransactionSchema = z.object({
  id: z.string().min(1).max(128).optional(),
  timestamp: timestampSchema,
  description: z.string().max(500),
  currency: currencyCodeSchema.optional(),
  postings: z.array(postingSchema).min(2, 'A transaction needs at least two postings'),
  metadata: z.record(z.unknown()).optional(),
});

export const periodInputSchema = z
  .object({
    start: calendarDateSchema,
    end: calendarDateSchema,
    taxKind: z.nativeEnum(TaxKind),
    periodKey: z.string().min(1).max(32).optional(),
  })
  .refine((value) => value.start <= value.end, 'Period start must not be after its end');

/**
 * Parses `input` with `schema`, converting zod issues into a {@link ValidationError}.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
    throw new ValidationError(`Invalid ${what}: ${summary.join('; ')}`, issues);
  }
  return result.data;
}
