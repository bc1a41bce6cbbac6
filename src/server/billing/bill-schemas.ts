import { z } from 'zod';
import { isoDate, isPlainObject, moneyField, optionalText, percentField, quantityField, requiredText } from '../validation';

const serverIssued = (field: string) =>
  z.null({ invalid_type_error: `${field} is issued by the server; leave it out.` }).optional();

const priceTypeField = z.enum(['exclusive', 'inclusive']);
const vegNonvegField = z.enum(['veg', 'non_veg']).nullable().optional();
const billingModeField = z.enum(['gst', 'non_gst']);
const taxSplitField = z.enum(['intra_state', 'inter_state']);
const paymentModeField = z.enum(['cash', 'upi', 'card', 'credit', 'other']);

const headerFields = {
  restaurant_name: optionalText(255).optional(),
  address: optionalText(2000).optional(),
  gstin: optionalText(50).optional(),
  fssai_license: optionalText(50).optional(),
  footer_note: optionalText(2000).optional(),
  customer_name: optionalText(255).optional(),
  customer_phone: optionalText(20).optional(),
  customer_email: optionalText(254).optional(),
  customer_address: optionalText(2000).optional(),
  payment_reference: optionalText(255).optional(),
  notes: optionalText(5000).optional(),
  table_number: optionalText(50).optional(),
  waiter_name: optionalText(255).optional(),
};

const snapshotFields = {
  item_description: optionalText(2000).optional(),
  mrp_price: moneyField.nullable().optional(),
  hsn_code: optionalText(20).optional(),
  veg_nonveg: vegNonvegField,
  unit: optionalText(50).optional(),
  batch_number: optionalText(100).optional(),
  expiry_date: isoDate.nullable().optional(),
};

/** A line on a bill the server prices: a catalog item reference or a full ad-hoc snapshot. */
export const pricedLineSchema = z
  .object({
    ...snapshotFields,
    item_id: z.string().uuid('item_id must be a UUID.').nullish(),
    item_name: requiredText(255).optional(),
    price: moneyField.optional(),
    price_type: priceTypeField.optional(),
    hsn_gst_percentage: percentField.nullable().optional(),
    quantity: quantityField.default(1),
  })
  .superRefine((line, ctx) => {
    if (line.item_id) return;
    if (line.item_name === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['item_name'], message: 'item_name is required without item_id.' });
    }
    if (line.price === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['price'], message: 'price is required without item_id.' });
    }
  });

export type PricedLineInput = z.output<typeof pricedLineSchema>;

export const createBillSchema = z.object({
  ...headerFields,
  invoice_number: serverIssued('invoice_number'),
  bill_number: serverIssued('bill_number'),
  device_id: optionalText(255).optional(),
  billing_mode: billingModeField.default('gst'),
  tax_split: taxSplitField.default('intra_state'),
  discount_percentage: percentField.optional(),
  payment_mode: paymentModeField.default('cash'),
  amount_paid: moneyField.nullable().optional(),
  items_data: z.array(pricedLineSchema).min(1, 'A bill needs at least one item.').max(500),
});

export type CreateBillInput = z.output<typeof createBillSchema>;

/** A line exactly as a device recorded it. */
export const syncedLineSchema = z.object({
  ...snapshotFields,
  original_item_id: z.string().trim().min(1).max(100).nullish(),
  item_name: requiredText(255),
  price: moneyField,
  price_type: priceTypeField.default('exclusive'),
  gst_percentage: percentField.default(0),
  quantity: quantityField.default(1),
  subtotal: moneyField.optional(),
  item_gst_amount: moneyField.optional(),
});

export type SyncedLineInput = z.output<typeof syncedLineSchema>;

export const syncedBillSchema = z.object({
  ...headerFields,
  id: z.string().uuid().nullish(),
  invoice_number: requiredText(100),
  bill_number: optionalText(100).optional(),
  bill_date: isoDate.optional(),
  billing_mode: billingModeField.default('gst'),
  tax_split: taxSplitField.default('intra_state'),
  subtotal: moneyField.optional(),
  discount_percentage: percentField.optional(),
  discount_amount: moneyField.optional(),
  total_tax: moneyField.optional(),
  cgst_amount: moneyField.optional(),
  sgst_amount: moneyField.optional(),
  igst_amount: moneyField.optional(),
  total_amount: moneyField.optional(),
  payment_mode: paymentModeField.default('cash'),
  amount_paid: moneyField.nullable().optional(),
  change_amount: moneyField.optional(),
  created_at: z.unknown().optional(),
  items_data: z.array(syncedLineSchema).max(500).default([]),
});

export type SyncedBillInput = z.output<typeof syncedBillSchema>;

export const billUpdateSchema = z.object({
  ...headerFields,
  payment_mode: paymentModeField.optional(),
  amount_paid: moneyField.nullable().optional(),
  discount_percentage: percentField.optional(),
  items_data: z.array(pricedLineSchema).min(1, 'A bill needs at least one item.').max(500).optional(),
});

export type BillUpdateInput = z.output<typeof billUpdateSchema>;

/** Fields fixed once a bill exists. */
export const IMMUTABLE_BILL_FIELDS = ['id', 'vendor_id', 'invoice_number', 'bill_number', 'billing_mode', 'tax_split'] as const;

const BILL_ALIASES: Record<string, string> = {
  items: 'items_data',
  cgst: 'cgst_amount',
  sgst: 'sgst_amount',
  igst: 'igst_amount',
  total: 'total_amount',
  discount: 'discount_amount',
};

const LINE_ALIASES: Record<string, string> = {
  name: 'item_name',
  item_gst: 'item_gst_amount',
  gst_amount: 'item_gst_amount',
};

function applyAliases(data: Record<string, unknown>, aliases: Record<string, string>): Record<string, unknown> {
  const normalized: Record<string, unknown> = { ...data };
  Object.entries(aliases).forEach(([alias, field]) => {
    if (normalized[field] === undefined && normalized[alias] !== undefined) {
      normalized[field] = normalized[alias];
    }
    delete normalized[alias];
  });
  return normalized;
}

/** Accepts `items` for `items_data`, leaving the lines themselves alone. */
export function normalizeBillPayload(data: Record<string, unknown>): Record<string, unknown> {
  return applyAliases(data, { items: 'items_data' });
}

/**
 * Devices write totals under short names (`cgst`, `total`, `item_gst`) and the catalog id of a line
 * under `item_id`.
 */
export function normalizeSyncedBillPayload(data: Record<string, unknown>): Record<string, unknown> {
  const normalized = applyAliases(data, BILL_ALIASES);
  const lines = normalized.items_data;
  if (Array.isArray(lines)) {
    normalized.items_data = lines.map((line: unknown) => {
      if (!isPlainObject(line)) return line;
      const withAliases = applyAliases(line, LINE_ALIASES);
      if (withAliases.original_item_id === undefined && withAliases.item_id !== undefined) {
        withAliases.original_item_id = withAliases.item_id;
      }
      delete withAliases.item_id;
      delete withAliases.id;
      return withAliases;
    });
  }
  return normalized;
}

export interface BillEnvelope {
  deviceId: string | null;
  data: unknown;
}

/**
 * A backup body is one bill or a list of them, each bare or wrapped as `{device_id, bill_data}`.
 */
export function toBillEnvelopes(body: unknown): { envelopes: BillEnvelope[]; single: boolean } {
  const unwrap = (entry: unknown): BillEnvelope => {
    if (isPlainObject(entry) && entry.bill_data !== undefined) {
      const rawDevice = entry.device_id;
      const deviceId = typeof rawDevice === 'string' && rawDevice.trim() ? rawDevice.trim() : null;
      return { deviceId, data: entry.bill_data };
    }
    return { deviceId: null, data: entry };
  };

  if (Array.isArray(body)) {
    return { envelopes: body.map(unwrap), single: false };
  }
  const wrapped = isPlainObject(body) ? body.bills : undefined;
  if (Array.isArray(wrapped)) {
    return { envelopes: wrapped.map(unwrap), single: false };
  }
  return { envelopes: [unwrap(body)], single: true };
}
