import { z } from 'zod';
import { isPlainObject, moneyField, optionalText, percentField, requiredText } from '../validation';

export const syncOperationSchema = z.object({
  operation: z.enum(['create', 'update', 'delete']).default('create'),
  id: z.string().trim().min(1).nullish(),
  entity_id: z.string().trim().min(1).nullish(),
  timestamp: z.unknown().optional(),
  data: z.record(z.unknown()).nullish(),
  payload: z.record(z.unknown()).nullish(),
});

export type SyncOperationEnvelope = z.output<typeof syncOperationSchema>;

export const entityIdSchema = z.string().uuid('Entity id must be a UUID.');

export const categoryPatchSchema = z.object({
  name: requiredText(100).optional(),
  description: optionalText(2000).optional(),
  is_active: z.boolean().optional(),
  sort_order: z.number().int().optional(),
});

export const categoryCreateSchema = categoryPatchSchema.extend({
  name: requiredText(100),
});

export type CategoryPatch = z.output<typeof categoryPatchSchema>;

const categoryIdsField = z.array(entityIdSchema).max(100);

export const itemPatchSchema = z.object({
  name: requiredText(200).optional(),
  description: optionalText(2000).optional(),
  price: moneyField.optional(),
  mrp_price: moneyField.nullable().optional(),
  price_type: z.enum(['exclusive', 'inclusive']).optional(),
  hsn_code: optionalText(20).optional(),
  hsn_gst_percentage: percentField.nullable().optional(),
  veg_nonveg: z.enum(['veg', 'non_veg']).nullable().optional(),
  stock_quantity: z.number().int().min(0).optional(),
  sku: optionalText(100).optional(),
  barcode: optionalText(100).optional(),
  is_active: z.boolean().optional(),
  sort_order: z.number().int().optional(),
  category_ids: categoryIdsField.optional(),
});

export const itemCreateSchema = itemPatchSchema.extend({
  name: requiredText(200),
  price: moneyField,
});

export type ItemPatch = z.output<typeof itemPatchSchema>;

/**
 * Mobile clients send `categories` as well as `category_ids`, sometimes as a bare id.
 */
export function normalizeItemPayload(data: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = { ...data };
  delete normalized.id;
  if (normalized.category_ids === undefined && normalized.categories !== undefined) {
    normalized.category_ids = normalized.categories;
  }
  delete normalized.categories;
  const ids = normalized.category_ids;
  if (ids !== undefined && ids !== null && !Array.isArray(ids)) {
    normalized.category_ids = [ids];
  }
  if (ids === null) {
    normalized.category_ids = [];
  }
  return normalized;
}

export function normalizeCategoryPayload(data: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = { ...data };
  delete normalized.id;
  return normalized;
}

/** A request body is one operation or an array of them. */
export function toOperationList(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (isPlainObject(body) && Array.isArray(body.operations)) return body.operations;
  return [body];
}
