import type { PriceType, VegNonVeg } from './catalog';

export type { PriceType } from './catalog';

export type BillingMode = 'gst' | 'non_gst';

export type TaxSplitMode = 'intra_state' | 'inter_state';

export type PaymentMode = 'cash' | 'upi' | 'card' | 'credit' | 'other';

export interface BillHeader {
  restaurantName: string | null;
  address: string | null;
  gstin: string | null;
  fssaiLicense: string | null;
  footerNote: string | null;
}

export interface BillCustomer {
  name: string | null;
  phone: string | null;
  email: string | null;
  address: string | null;
}

export interface BillLine {
  id: string;
  billId: string;
  lineNo: number;
  itemId: string | null;
  originalItemId: string | null;
  itemName: string;
  itemDescription: string | null;
  pricePaise: number;
  mrpPricePaise: number | null;
  priceType: PriceType;
  hsnCode: string | null;
  gstBp: number;
  quantityMilli: number;
  subtotalPaise: number;
  gstPaise: number;
  vegNonveg: VegNonVeg | null;
  unit: string | null;
  batchNumber: string | null;
  expiryDate: string | null;
  createdAt: string;
}

export type NewBillLine = Omit<BillLine, 'id' | 'billId' | 'lineNo' | 'createdAt'>;

export interface BillPayment {
  paymentMode: PaymentMode;
  paymentReference: string | null;
  amountPaidPaise: number | null;
  changePaise: number;
}

export interface BillTotals {
  subtotalPaise: number;
  discountBp: number;
  discountPaise: number;
  totalTaxPaise: number;
  cgstPaise: number;
  sgstPaise: number;
  igstPaise: number;
  totalPaise: number;
}

export interface Bill extends BillTotals, BillPayment {
  id: string;
  vendorId: string;
  deviceId: string | null;
  invoiceNumber: string;
  billNumber: string | null;
  billDate: string;
  billingMode: BillingMode;
  taxSplit: TaxSplitMode;
  header: BillHeader;
  customer: BillCustomer;
  notes: string | null;
  tableNumber: string | null;
  waiterName: string | null;
  createdAt: string;
  syncedAt: string;
  updatedAt: string;
  lines: BillLine[];
}

export type NewBill = Omit<Bill, 'lines' | 'syncedAt' | 'updatedAt'> & { lines: NewBillLine[] };

export interface BillLineDto {
  id: string;
  item_id: string | null;
  original_item_id: string | null;
  item_name: string;
  item_description: string | null;
  price: string;
  mrp_price: string | null;
  price_type: PriceType;
  hsn_code: string | null;
  gst_percentage: string;
  quantity: string;
  subtotal: string;
  item_gst_amount: string;
  veg_nonveg: VegNonVeg | null;
  unit: string | null;
  batch_number: string | null;
  expiry_date: string | null;
  created_at: string;
}

export interface BillDto {
  id: string;
  vendor_id: string;
  device_id: string | null;
  invoice_number: string;
  bill_number: string | null;
  bill_date: string;
  billing_mode: BillingMode;
  tax_split: TaxSplitMode;
  restaurant_name: string | null;
  address: string | null;
  gstin: string | null;
  fssai_license: string | null;
  footer_note: string | null;
  customer_name: string | null;
  customer_phone: string | null;
  customer_email: string | null;
  customer_address: string | null;
  subtotal: string;
  discount_percentage: string;
  discount_amount: string;
  total_tax: string;
  cgst_amount: string;
  sgst_amount: string;
  igst_amount: string;
  total_amount: string;
  payment_mode: PaymentMode;
  payment_reference: string | null;
  amount_paid: string | null;
  change_amount: string;
  notes: string | null;
  table_number: string | null;
  waiter_name: string | null;
  created_at: string;
  synced_at: string;
  updated_at: string;
  items: BillLineDto[];
}

export interface BillIngestResult {
  bill: BillDto;
  created: boolean;
}

export interface BillIngestBatchResult {
  synced: number;
  bills: Array<BillDto & { created: boolean }>;
  errors: Array<{ index: number; invoice_number: string | null; error: { code: string; message: string; details?: unknown } }>;
}

export interface BillListFilter {
  since?: string | null;
  billingMode?: BillingMode | null;
  startDate?: string | null;
  endDate?: string | null;
  limit?: number;
}

export interface BillListResult {
  count: number;
  bills: BillDto[];
  server_time: string;
}
