import { z } from 'zod';
import { parseBasisPoints, parseMilli, parsePaise } from '../shared/money';
import { ValidationError } from './errors';

const decimalInput = z.union([z.number(), z.string()]);

function fixedField(parse: (value: unknown) => number | null, message: string) {
  return decimalInput.transform((value, ctx) => {
    const parsed = parse(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
    return parsed;
  });
}

/** Rupee amount in, non-negative paise out. */
export const moneyField = fixedField(parsePaise, 'Expected an amount with at most 2 decimal places.').refine(
  (paise) => paise >= 0,
  'Amount must not be negative.',
);

/** Percentage in, basis points out, within 0..100%. */
export const percentField = fixedField(parseBasisPoints, 'Expected a percentage with at most 2 decimal places.').refine(
  (bp) => bp >= 0 && bp <= 10_000,
  'Percentage must be between 0 and 100.',
);

/** Quantity in, thousandths out. */
export const quantityField = fixedField(parseMilli, 'Expected a quantity with at most 3 decimal places.').refine(
  (milli) => milli > 0,
  'Quantity must be greater than zero.',
);

export const optionalText = (max: number) =>
  z
    .union([z.string(), z.null()])
    .transform((value) => {
      const text = String(value ?? '').trim();
      return text || null;
    })
    .refine((value) => value === null || value.length <= max, `Must be at most ${max} characters.`);

export const requiredText = (max: number) => z.string().trim().min(1, 'This field is required.').max(max);

export const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date.');

export function parseOrThrow<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  message?: string,
): z.output<TSchema> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, message);
  }
  return parsed.data;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
