import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import type {
  Bill,
  BillCustomer,
  BillHeader,
  BillingMode,
  BillLine,
  BillPayment,
  BillTotals,
  NewBill,
  NewBillLine,
  PaymentMode,
  PriceType,
  TaxSplitMode,
} from '../../shared/bills';
import type { VegNonVeg } from '../../shared/catalog';

interface BillRow {
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
  subtotal_paise: number;
  discount_bp: number;
  discount_paise: number;
  total_tax_paise: number;
  cgst_paise: number;
  sgst_paise: number;
  igst_paise: number;
  total_paise: number;
  payment_mode: PaymentMode;
  payment_reference: string | null;
  amount_paid_paise: number | null;
  change_paise: number;
  notes: string | null;
  table_number: string | null;
  waiter_name: string | null;
  created_at: string;
  synced_at: string;
  updated_at: string;
}

interface BillLineRow {
  id: string;
  bill_id: string;
  line_no: number;
  item_id: string | null;
  original_item_id: string | null;
  item_name: string;
  item_description: string | null;
  price_paise: number;
  mrp_price_paise: number | null;
  price_type: PriceType;
  hsn_code: string | null;
  gst_bp: number;
  quantity_milli: number;
  subtotal_paise: number;
  gst_paise: number;
  veg_nonveg: VegNonVeg | null;
  unit: string | null;
  batch_number: string | null;
  expiry_date: string | null;
  created_at: string;
}

export interface BillMetadataPatch {
  header?: Partial<BillHeader>;
  customer?: Partial<BillCustomer>;
  payment?: Partial<BillPayment>;
  notes?: string | null;
  tableNumber?: string | null;
  waiterName?: string | null;
}

export interface BillQuery {
  since: string | null;
  billingMode: BillingMode | null;
  startDate: string | null;
  endDate: string | null;
  limit: number;
}

const BILL_COLUMNS = `
  id, vendor_id, device_id, invoice_number, bill_number, bill_date, billing_mode, tax_split,
  restaurant_name, address, gstin, fssai_license, footer_note,
  customer_name, customer_phone, customer_email, customer_address,
  subtotal_paise, discount_bp, discount_paise, total_tax_paise, cgst_paise, sgst_paise, igst_paise,
  total_paise, payment_mode, payment_reference, amount_paid_paise, change_paise,
  notes, table_number, waiter_name, created_at, synced_at, updated_at
`;

const LINE_COLUMNS = `
  id, bill_id, line_no, item_id, original_item_id, item_name, item_description, price_paise,
  mrp_price_paise, price_type, hsn_code, gst_bp, quantity_milli, subtotal_paise, gst_paise,
  veg_nonveg, unit, batch_number, expiry_date, created_at
`;

function mapLineRow(row: BillLineRow): BillLine {
  return {
    id: row.id,
    billId: row.bill_id,
    lineNo: Number(row.line_no),
    itemId: row.item_id,
    originalItemId: row.original_item_id,
    itemName: row.item_name,
    itemDescription: row.item_description,
    pricePaise: Number(row.price_paise),
    mrpPricePaise: row.mrp_price_paise === null ? null : Number(row.mrp_price_paise),
    priceType: row.price_type,
    hsnCode: row.hsn_code,
    gstBp: Number(row.gst_bp),
    quantityMilli: Number(row.quantity_milli),
    subtotalPaise: Number(row.subtotal_paise),
    gstPaise: Number(row.gst_paise),
    vegNonveg: row.veg_nonveg,
    unit: row.unit,
    batchNumber: row.batch_number,
    expiryDate: row.expiry_date,
    createdAt: row.created_at,
  };
}

function mapBillRow(row: BillRow, lines: BillLine[]): Bill {
  return {
    id: row.id,
    vendorId: row.vendor_id,
    deviceId: row.device_id,
    invoiceNumber: row.invoice_number,
    billNumber: row.bill_number,
    billDate: row.bill_date,
    billingMode: row.billing_mode,
    taxSplit: row.tax_split,
    header: {
      restaurantName: row.restaurant_name,
      address: row.address,
      gstin: row.gstin,
      fssaiLicense: row.fssai_license,
      footerNote: row.footer_note,
    },
    customer: {
      name: row.customer_name,
      phone: row.customer_phone,
      email: row.customer_email,
      address: row.customer_address,
    },
    subtotalPaise: Number(row.subtotal_paise),
    discountBp: Number(row.discount_bp),
    discountPaise: Number(row.discount_paise),
    totalTaxPaise: Number(row.total_tax_paise),
    cgstPaise: Number(row.cgst_paise),
    sgstPaise: Number(row.sgst_paise),
    igstPaise: Number(row.igst_paise),
    totalPaise: Number(row.total_paise),
    paymentMode: row.payment_mode,
    paymentReference: row.payment_reference,
    amountPaidPaise: row.amount_paid_paise === null ? null : Number(row.amount_paid_paise),
    changePaise: Number(row.change_paise),
    notes: row.notes,
    tableNumber: row.table_number,
    waiterName: row.waiter_name,
    createdAt: row.created_at,
    syncedAt: row.synced_at,
    updatedAt: row.updated_at,
    lines,
  };
}

export class BillsRepository {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  billIdTaken(id: string): boolean {
    const row = this.db.prepare('SELECT 1 AS present FROM bills WHERE id = ? LIMIT 1').get(id) as
      | { present: number }
      | undefined;
    return Boolean(row);
  }

  /** Item ids from `ids` that exist in the vendor's catalog right now. */
  findLinkableItemIds(vendorId: string, ids: string[]): Set<string> {
    const unique = Array.from(new Set(ids));
    if (!unique.length) return new Set();
    const placeholders = unique.map(() => '?').join(', ');
    const rows = this.db
      .prepare(`SELECT id FROM catalog_items WHERE vendor_id = ? AND id IN (${placeholders})`)
      .all(vendorId, ...unique) as Array<{ id: string }>;
    return new Set(rows.map((row) => row.id));
  }

  insertBill(bill: NewBill, syncedAt: string): Bill {
    this.db.prepare(`
      INSERT INTO bills (${BILL_COLUMNS})
      VALUES (
        @id, @vendor_id, @device_id, @invoice_number, @bill_number, @bill_date, @billing_mode, @tax_split,
        @restaurant_name, @address, @gstin, @fssai_license, @footer_note,
        @customer_name, @customer_phone, @customer_email, @customer_address,
        @subtotal_paise, @discount_bp, @discount_paise, @total_tax_paise, @cgst_paise, @sgst_paise, @igst_paise,
        @total_paise, @payment_mode, @payment_reference, @amount_paid_paise, @change_paise,
        @notes, @table_number, @waiter_name, @created_at, @synced_at, @updated_at
      )
    `).run({
      id: bill.id,
      vendor_id: bill.vendorId,
      device_id: bill.deviceId,
      invoice_number: bill.invoiceNumber,
      bill_number: bill.billNumber,
      bill_date: bill.billDate,
      billing_mode: bill.billingMode,
      tax_split: bill.taxSplit,
      restaurant_name: bill.header.restaurantName,
      address: bill.header.address,
      gstin: bill.header.gstin,
      fssai_license: bill.header.fssaiLicense,
      footer_note: bill.header.footerNote,
      customer_name: bill.customer.name,
      customer_phone: bill.customer.phone,
      customer_email: bill.customer.email,
      customer_address: bill.customer.address,
      ...this.totalsParams(bill),
      payment_mode: bill.paymentMode,
      payment_reference: bill.paymentReference,
      amount_paid_paise: bill.amountPaidPaise,
      change_paise: bill.changePaise,
      notes: bill.notes,
      table_number: bill.tableNumber,
      waiter_name: bill.waiterName,
      created_at: bill.createdAt,
      synced_at: syncedAt,
      updated_at: syncedAt,
    });

    this.insertLines(bill.vendorId, bill.id, bill.lines, syncedAt);
    return this.requireBill(bill.vendorId, bill.id);
  }

  getBill(vendorId: string, billId: string): Bill | null {
    const row = this.db
      .prepare(`SELECT ${BILL_COLUMNS} FROM bills WHERE vendor_id = ? AND id = ? LIMIT 1`)
      .get(vendorId, billId) as BillRow | undefined;
    return row ? mapBillRow(row, this.listLines(row.id)) : null;
  }

  findByInvoiceNumber(vendorId: string, invoiceNumber: string): Bill | null {
    const row = this.db
      .prepare(`SELECT ${BILL_COLUMNS} FROM bills WHERE vendor_id = ? AND invoice_number = ? LIMIT 1`)
      .get(vendorId, invoiceNumber) as BillRow | undefined;
    return row ? mapBillRow(row, this.listLines(row.id)) : null;
  }

  updateMetadata(vendorId: string, billId: string, patch: BillMetadataPatch, updatedAt: string): Bill {
    const current = this.requireBill(vendorId, billId);
    const header = { ...current.header, ...patch.header };
    const customer = { ...current.customer, ...patch.customer };
    const payment: BillPayment = {
      paymentMode: patch.payment?.paymentMode ?? current.paymentMode,
      paymentReference:
        patch.payment?.paymentReference !== undefined ? patch.payment.paymentReference : current.paymentReference,
      amountPaidPaise:
        patch.payment?.amountPaidPaise !== undefined ? patch.payment.amountPaidPaise : current.amountPaidPaise,
      changePaise: patch.payment?.changePaise ?? current.changePaise,
    };

    this.db.prepare(`
      UPDATE bills SET
        restaurant_name = @restaurant_name,
        address = @address,
        gstin = @gstin,
        fssai_license = @fssai_license,
        footer_note = @footer_note,
        customer_name = @customer_name,
        customer_phone = @customer_phone,
        customer_email = @customer_email,
        customer_address = @customer_address,
        payment_mode = @payment_mode,
        payment_reference = @payment_reference,
        amount_paid_paise = @amount_paid_paise,
        change_paise = @change_paise,
        notes = @notes,
        table_number = @table_number,
        waiter_name = @waiter_name,
        updated_at = @updated_at
      WHERE vendor_id = @vendor_id AND id = @id
    `).run({
      vendor_id: vendorId,
      id: billId,
      restaurant_name: header.restaurantName,
      address: header.address,
      gstin: header.gstin,
      fssai_license: header.fssaiLicense,
      footer_note: header.footerNote,
      customer_name: customer.name,
      customer_phone: customer.phone,
      customer_email: customer.email,
      customer_address: customer.address,
      payment_mode: payment.paymentMode,
      payment_reference: payment.paymentReference,
      amount_paid_paise: payment.amountPaidPaise,
      change_paise: payment.changePaise,
      notes: patch.notes !== undefined ? patch.notes : current.notes,
      table_number: patch.tableNumber !== undefined ? patch.tableNumber : current.tableNumber,
      waiter_name: patch.waiterName !== undefined ? patch.waiterName : current.waiterName,
      updated_at: updatedAt,
    });
    return this.requireBill(vendorId, billId);
  }

  /** Swaps in a new line snapshot (or keeps the current one when `lines` is null) with fresh totals. */
  replaceLinesAndTotals(
    vendorId: string,
    billId: string,
    lines: NewBillLine[] | null,
    totals: BillTotals,
    updatedAt: string,
  ): Bill {
    if (lines !== null) {
      this.db.prepare('DELETE FROM bill_items WHERE bill_id = ?').run(billId);
      this.insertLines(vendorId, billId, lines, updatedAt);
    }
    this.db.prepare(`
      UPDATE bills SET
        subtotal_paise = @subtotal_paise,
        discount_bp = @discount_bp,
        discount_paise = @discount_paise,
        total_tax_paise = @total_tax_paise,
        cgst_paise = @cgst_paise,
        sgst_paise = @sgst_paise,
        igst_paise = @igst_paise,
        total_paise = @total_paise,
        updated_at = @updated_at
      WHERE vendor_id = @vendor_id AND id = @id
    `).run({ vendor_id: vendorId, id: billId, ...this.totalsParams(totals), updated_at: updatedAt });
    return this.requireBill(vendorId, billId);
  }

  /** Bills written after `since` (server stamp), oldest first. */
  listModifiedSince(vendorId: string, query: BillQuery): Bill[] {
    const rows = this.db
      .prepare(`
        SELECT ${BILL_COLUMNS}
        FROM bills
        WHERE vendor_id = @vendor_id
          AND (@since IS NULL OR updated_at > @since)
          AND (@billing_mode IS NULL OR billing_mode = @billing_mode)
          AND (@start_date IS NULL OR bill_date >= @start_date)
          AND (@end_date IS NULL OR bill_date <= @end_date)
        ORDER BY updated_at ASC, id ASC
        LIMIT @limit
      `)
      .all({
        vendor_id: vendorId,
        since: query.since,
        billing_mode: query.billingMode,
        start_date: query.startDate,
        end_date: query.endDate,
        limit: query.limit,
      }) as BillRow[];

    const linesByBill = this.listLinesForBills(rows.map((row) => row.id));
    return rows.map((row) => mapBillRow(row, linesByBill.get(row.id) ?? []));
  }

  private requireBill(vendorId: string, billId: string): Bill {
    const bill = this.getBill(vendorId, billId);
    if (!bill) {
      throw new Error(`Bill ${billId} vanished during write.`);
    }
    return bill;
  }

  private totalsParams(totals: BillTotals) {
    return {
      subtotal_paise: totals.subtotalPaise,
      discount_bp: totals.discountBp,
      discount_paise: totals.discountPaise,
      total_tax_paise: totals.totalTaxPaise,
      cgst_paise: totals.cgstPaise,
      sgst_paise: totals.sgstPaise,
      igst_paise: totals.igstPaise,
      total_paise: totals.totalPaise,
    };
  }

  private insertLines(vendorId: string, billId: string, lines: NewBillLine[], createdAt: string): void {
    const insert = this.db.prepare(`
      INSERT INTO bill_items (${LINE_COLUMNS}, vendor_id)
      VALUES (
        @id, @bill_id, @line_no, @item_id, @original_item_id, @item_name, @item_description, @price_paise,
        @mrp_price_paise, @price_type, @hsn_code, @gst_bp, @quantity_milli, @subtotal_paise, @gst_paise,
        @veg_nonveg, @unit, @batch_number, @expiry_date, @created_at, @vendor_id
      )
    `);

    lines.forEach((line, index) => {
      insert.run({
        id: randomUUID(),
        bill_id: billId,
        vendor_id: vendorId,
        line_no: index + 1,
        item_id: line.itemId,
        original_item_id: line.originalItemId,
        item_name: line.itemName,
        item_description: line.itemDescription,
        price_paise: line.pricePaise,
        mrp_price_paise: line.mrpPricePaise,
        price_type: line.priceType,
        hsn_code: line.hsnCode,
        gst_bp: line.gstBp,
        quantity_milli: line.quantityMilli,
        subtotal_paise: line.subtotalPaise,
        gst_paise: line.gstPaise,
        veg_nonveg: line.vegNonveg,
        unit: line.unit,
        batch_number: line.batchNumber,
        expiry_date: line.expiryDate,
        created_at: createdAt,
      });
    });
  }

  private listLines(billId: string): BillLine[] {
    const rows = this.db
      .prepare(`SELECT ${LINE_COLUMNS} FROM bill_items WHERE bill_id = ? ORDER BY line_no ASC`)
      .all(billId) as BillLineRow[];
    return rows.map(mapLineRow);
  }

  private listLinesForBills(billIds: string[]): Map<string, BillLine[]> {
    const byBill = new Map<string, BillLine[]>();
    if (!billIds.length) return byBill;
    const placeholders = billIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare(`
        SELECT ${LINE_COLUMNS}
        FROM bill_items
        WHERE bill_id IN (${placeholders})
        ORDER BY bill_id ASC, line_no ASC
      `)
      .all(...billIds) as BillLineRow[];
    rows.forEach((row) => {
      const list = byBill.get(row.bill_id) ?? [];
      list.push(mapLineRow(row));
      byBill.set(row.bill_id, list);
    });
    return byBill;
  }
}
