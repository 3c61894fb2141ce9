import {z} from 'zod';

// Amounts travel as decimal strings
export const amountSchema = z
  .string()
  .regex(/^-?\d+$/, 'Expected a whole number as a decimal string')
  .transform(value => BigInt(value));

export const orderIdSchema = z.coerce.number().int().positive();

export const discountTierSchema = z.object({
  unitsThreshold: amountSchema,
  discountBps: z.number().int(),
});

export const createOrderSchema = z.object({
  productId: z.string(),
  minUnits: amountSchema,
  initialPrice: amountSchema,
  discountTiers: z.array(discountTierSchema).default([]),
  deadline: z.number().int(),
  stakeAmount: amountSchema.optional(),
});

export const joinOrderSchema = z.object({
  units: amountSchema,
});

export const mintSchema = z.object({
  asset: z.enum(['payment', 'reward']),
  amount: amountSchema,
});

export const rateSchema = z.object({
  bps: z.number().int(),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
