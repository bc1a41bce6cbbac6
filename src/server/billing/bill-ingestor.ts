import { randomUUID } from 'node:crypto';
import type {
  Bill,
  BillDto,
  BillIngestBatchResult,
  BillIngestResult,
  BillListFilter,
  BillListResult,
  BillingMode,
  NewBill,
  NewBillLine,
} from '../../shared/bills';
import { lineAmount, percentOf } from '../../shared/money';
import type { Vendor } from '../../shared/vendors';
import { createConsoleAuditLog, type AuditLog } from '../audit-log';
import type { CatalogRepository } from '../catalog/catalog-repository';
import { parseClientTimestamp } from '../catalog/client-timestamp';
import { MonotonicClock, type Clock } from '../clock';
import { DuplicateInvoiceError, NotFoundError, PosSyncError, ValidationError, isUniqueViolation, toErrorBody } from '../errors';
import { createConsoleLogger, type Logger } from '../logger';
import type { TaxEngine } from '../tax/tax-engine';
import { summarizeBill, type BillSummary } from '../tax/tax-engine';
import { isPlainObject, isoDate, parseOrThrow } from '../validation';
import type { VendorRepository } from '../vendors/vendor-repository';
import { toBillDto } from './bill-dto';
import {
  IMMUTABLE_BILL_FIELDS,
  billUpdateSchema,
  createBillSchema,
  normalizeBillPayload,
  normalizeSyncedBillPayload,
  syncedBillSchema,
  type BillEnvelope,
  type PricedLineInput,
  type SyncedBillInput,
} from './bill-schemas';
import type { BillsRepository } from './bills-repository';
import type { SequenceGenerator } from './sequence-generator';

export const DEFAULT_BILL_PAGE = 100;
export const MAX_BILL_PAGE = 500;

export interface BillIngestorDeps {
  bills: BillsRepository;
  catalog: CatalogRepository;
  vendors: VendorRepository;
  sequence: SequenceGenerator;
  tax: TaxEngine;
  clock?: Clock;
  logger?: Logger;
  audit?: AuditLog;
}

function changeFor(amountPaidPaise: number | null, totalPaise: number): number {
  return amountPaidPaise === null ? 0 : Math.max(0, amountPaidPaise - totalPaise);
}

function summaryLines(lines: Array<Pick<NewBillLine, 'subtotalPaise' | 'gstPaise' | 'priceType'>>) {
  return lines.map((line) => ({ subtotalPaise: line.subtotalPaise, taxPaise: line.gstPaise, priceType: line.priceType }));
}

function readInvoiceNumber(data: unknown): string | null {
  if (!isPlainObject(data)) return null;
  const value = data.invoice_number;
  if (typeof value !== 'string') return null;
  return value.trim() || null;
}

/**
 * Turns device bills and server-priced bill requests into stored bills. Server-created bills take
 * their number from the SequenceGenerator in the same transaction as the insert.
 */
export class BillIngestor {
  private readonly bills: BillsRepository;
  private readonly catalog: CatalogRepository;
  private readonly vendors: VendorRepository;
  private readonly sequence: SequenceGenerator;
  private readonly tax: TaxEngine;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly audit: AuditLog;

  constructor(deps: BillIngestorDeps) {
    this.bills = deps.bills;
    this.catalog = deps.catalog;
    this.vendors = deps.vendors;
    this.sequence = deps.sequence;
    this.tax = deps.tax;
    this.clock = deps.clock ?? new MonotonicClock();
    this.logger = deps.logger ?? createConsoleLogger('bills');
    this.audit = deps.audit ?? createConsoleAuditLog();
  }

  async createBill(vendorId: string, body: unknown, userId: string | null = null): Promise<BillDto> {
    const input = parseOrThrow(
      createBillSchema,
      isPlainObject(body) ? normalizeBillPayload(body) : body,
      'Invalid bill.',
    );
    const vendor = this.vendors.requireVendor(vendorId);
    const lines = this.priceLines(vendor, input.items_data, input.billing_mode);
    const totals = summarizeBill(summaryLines(lines), {
      billingMode: input.billing_mode,
      taxSplit: input.tax_split,
      discountBp: input.discount_percentage,
    });
    const amountPaidPaise = input.amount_paid ?? null;
    const now = this.clock.now();

    let attempted = '';
    let stored: Bill;
    try {
      stored = await this.sequence.issueWithin(
        vendorId,
        (numbers) => {
          attempted = numbers.invoiceNumber;
          const stamp = this.clock.now().toISOString();
          const bill: NewBill = {
            id: randomUUID(),
            vendorId,
            deviceId: input.device_id ?? null,
            invoiceNumber: numbers.invoiceNumber,
            billNumber: numbers.billNumber,
            billDate: now.toISOString().slice(0, 10),
            billingMode: input.billing_mode,
            taxSplit: input.tax_split,
            header: {
              restaurantName: input.restaurant_name ?? vendor.businessName,
              address: input.address ?? vendor.address,
              gstin: input.gstin ?? vendor.gstNo,
              fssaiLicense: input.fssai_license ?? vendor.fssaiLicense,
              footerNote: input.footer_note ?? vendor.footerNote,
            },
            customer: {
              name: input.customer_name ?? null,
              phone: input.customer_phone ?? null,
              email: input.customer_email ?? null,
              address: input.customer_address ?? null,
            },
            ...this.totalsFrom(totals),
            paymentMode: input.payment_mode,
            paymentReference: input.payment_reference ?? null,
            amountPaidPaise,
            changePaise: changeFor(amountPaidPaise, totals.totalPaise),
            notes: input.notes ?? null,
            tableNumber: input.table_number ?? null,
            waiterName: input.waiter_name ?? null,
            createdAt: now.toISOString(),
            lines,
          };
          return this.bills.insertBill(bill, stamp);
        },
        now,
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.error('issued invoice number already stored', { vendorId, invoiceNumber: attempted });
        throw new DuplicateInvoiceError(vendorId, attempted, error);
      }
      throw error;
    }

    this.audit.record('bill.created', {
      vendorId,
      userId,
      billId: stored.id,
      invoiceNumber: stored.invoiceNumber,
      totalPaise: stored.totalPaise,
    });
    return toBillDto(stored);
  }

  /**
   * Stores a bill a device already numbered. A repeat of the same invoice number returns the stored
   * bill untouched.
   */
  ingestSyncedBill(
    vendorId: string,
    invoiceNumber: string | null,
    payload: unknown,
    deviceId: string | null = null,
  ): BillIngestResult {
    if (!invoiceNumber) {
      throw new ValidationError(
        'invoice_number is required for synced bills; use POST /bills/ to have the server number a bill.',
        { field: 'invoice_number' },
      );
    }

    const existing = this.bills.findByInvoiceNumber(vendorId, invoiceNumber);
    if (existing) {
      return { bill: toBillDto(existing), created: false };
    }

    const data = isPlainObject(payload) ? { ...normalizeSyncedBillPayload(payload), invoice_number: invoiceNumber } : payload;
    const input = parseOrThrow(syncedBillSchema, data, 'Invalid synced bill.');
    this.vendors.requireVendor(vendorId);

    try {
      const bill = this.bills.transaction(() => {
        const stamp = this.clock.now().toISOString();
        return this.bills.insertBill(this.syncedBillFrom(vendorId, input, deviceId, stamp), stamp);
      });
      this.audit.record('bill.ingested', {
        vendorId,
        billId: bill.id,
        invoiceNumber,
        deviceId,
      });
      return { bill: toBillDto(bill), created: true };
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      const winner = this.bills.findByInvoiceNumber(vendorId, invoiceNumber);
      if (!winner) throw error;
      this.logger.info('synced bill lost an insert race; returning the stored copy', { vendorId, invoiceNumber });
      return { bill: toBillDto(winner), created: false };
    }
  }

  ingestBatch(vendorId: string, envelopes: BillEnvelope[]): BillIngestBatchResult {
    const result: BillIngestBatchResult = { synced: 0, bills: [], errors: [] };

    envelopes.forEach((envelope, index) => {
      const invoiceNumber = readInvoiceNumber(envelope.data);
      try {
        const ingested = this.ingestSyncedBill(vendorId, invoiceNumber, envelope.data, envelope.deviceId);
        result.synced += 1;
        result.bills.push({ ...ingested.bill, created: ingested.created });
      } catch (error) {
        if (!(error instanceof PosSyncError)) {
          this.logger.error('bill ingest failed', {
            vendorId,
            index,
            invoiceNumber,
            error: error instanceof Error ? error.stack ?? error.message : String(error),
          });
        }
        result.errors.push({ index, invoice_number: invoiceNumber, error: toErrorBody(error) });
      }
    });

    return result;
  }

  /** Single-bill ingest straight from a request body, bare or wrapped. */
  ingestOne(vendorId: string, envelope: BillEnvelope): BillIngestResult {
    return this.ingestSyncedBill(vendorId, readInvoiceNumber(envelope.data), envelope.data, envelope.deviceId);
  }

  getBill(vendorId: string, billId: string): BillDto {
    const bill = this.bills.getBill(vendorId, billId);
    if (!bill) {
      throw new NotFoundError(`Bill ${billId} not found.`);
    }
    return toBillDto(bill);
  }

  /**
   * Header, customer and payment details change in place. `items_data` replaces every line and the
   * totals are priced again; numbers and billing mode never change.
   */
  updateBill(vendorId: string, billId: string, body: unknown, userId: string | null = null): BillDto {
    const current = this.bills.getBill(vendorId, billId);
    if (!current) {
      throw new NotFoundError(`Bill ${billId} not found.`);
    }

    const raw = isPlainObject(body) ? normalizeBillPayload(body) : body;
    if (isPlainObject(raw)) {
      this.rejectImmutableChanges(current, raw);
    }
    const patch = parseOrThrow(
      billUpdateSchema,
      isPlainObject(raw) ? this.withoutImmutable(raw) : raw,
      'Invalid bill update.',
    );

    const vendor = this.vendors.requireVendor(vendorId);
    const newLines = patch.items_data ? this.priceLines(vendor, patch.items_data, current.billingMode) : null;
    const repriced = newLines !== null || patch.discount_percentage !== undefined;
    const totals = repriced
      ? summarizeBill(summaryLines(newLines ?? current.lines), {
          billingMode: current.billingMode,
          taxSplit: current.taxSplit,
          discountBp: patch.discount_percentage ?? current.discountBp,
        })
      : null;
    const amountPaidPaise = patch.amount_paid !== undefined ? patch.amount_paid : current.amountPaidPaise;
    const totalPaise = totals ? totals.totalPaise : current.totalPaise;

    const updated = this.bills.transaction(() => {
      const stamp = this.clock.now().toISOString();
      let bill = this.bills.updateMetadata(
        vendorId,
        billId,
        {
          header: {
            ...(patch.restaurant_name !== undefined ? { restaurantName: patch.restaurant_name } : {}),
            ...(patch.address !== undefined ? { address: patch.address } : {}),
            ...(patch.gstin !== undefined ? { gstin: patch.gstin } : {}),
            ...(patch.fssai_license !== undefined ? { fssaiLicense: patch.fssai_license } : {}),
            ...(patch.footer_note !== undefined ? { footerNote: patch.footer_note } : {}),
          },
          customer: {
            ...(patch.customer_name !== undefined ? { name: patch.customer_name } : {}),
            ...(patch.customer_phone !== undefined ? { phone: patch.customer_phone } : {}),
            ...(patch.customer_email !== undefined ? { email: patch.customer_email } : {}),
            ...(patch.customer_address !== undefined ? { address: patch.customer_address } : {}),
          },
          payment: {
            paymentMode: patch.payment_mode,
            paymentReference: patch.payment_reference,
            amountPaidPaise,
            changePaise: changeFor(amountPaidPaise, totalPaise),
          },
          notes: patch.notes,
          tableNumber: patch.table_number,
          waiterName: patch.waiter_name,
        },
        stamp,
      );
      if (totals) {
        bill = this.bills.replaceLinesAndTotals(vendorId, billId, newLines, this.totalsFrom(totals), stamp);
      }
      return bill;
    });

    this.audit.record('bill.updated', {
      vendorId,
      userId,
      billId,
      invoiceNumber: updated.invoiceNumber,
      linesReplaced: newLines !== null,
    });
    return toBillDto(updated);
  }

  listBillsForSync(vendorId: string, filter: BillListFilter = {}): BillListResult {
    const since = this.readSince(filter.since);
    const limit = filter.limit ?? DEFAULT_BILL_PAGE;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('limit must be a positive integer.', { field: 'limit' });
    }
    const startDate = this.readDate(filter.startDate, 'start_date');
    const endDate = this.readDate(filter.endDate, 'end_date');

    const page = Math.min(limit, MAX_BILL_PAGE);
    const bills = this.bills.listModifiedSince(vendorId, {
      since,
      billingMode: filter.billingMode ?? null,
      startDate,
      endDate,
      limit: page,
    });

    const last = bills[bills.length - 1];
    const serverTime = bills.length === page && last ? last.updatedAt : this.clock.now().toISOString();
    return { count: bills.length, bills: bills.map(toBillDto), server_time: serverTime };
  }

  private priceLines(vendor: Vendor, inputs: PricedLineInput[], billingMode: BillingMode): NewBillLine[] {
    return inputs.map((input, index) => {
      const item = input.item_id ? this.catalog.getItem(vendor.id, input.item_id) : null;
      if (input.item_id && !item) {
        throw new ValidationError(`Item ${input.item_id} is not in this vendor's catalog.`, {
          field: `items_data.${index}.item_id`,
        });
      }

      const pricePaise = input.price ?? item?.pricePaise ?? 0;
      const hsnCode = input.hsn_code !== undefined ? input.hsn_code : item?.hsnCode ?? null;
      const hsnRateBp = input.hsn_gst_percentage !== undefined ? input.hsn_gst_percentage : item?.hsnGstBp ?? null;
      const subtotalPaise = lineAmount(pricePaise, input.quantity);
      const lineTax =
        billingMode === 'gst'
          ? this.tax.computeLineTax(subtotalPaise, {
              serviceCode: vendor.serviceCode,
              serviceRateBp: vendor.serviceGstBp,
              hsnCode,
              hsnRateBp,
            })
          : null;

      return {
        itemId: item ? item.id : null,
        originalItemId: item ? item.id : null,
        itemName: input.item_name ?? item?.name ?? '',
        itemDescription: input.item_description !== undefined ? input.item_description : item?.description ?? null,
        pricePaise,
        mrpPricePaise: input.mrp_price !== undefined ? input.mrp_price : item?.mrpPricePaise ?? null,
        priceType: input.price_type ?? item?.priceType ?? 'exclusive',
        hsnCode,
        gstBp: lineTax ? lineTax.rateBp : 0,
        quantityMilli: input.quantity,
        subtotalPaise,
        gstPaise: lineTax ? lineTax.taxPaise : 0,
        vegNonveg: input.veg_nonveg !== undefined ? input.veg_nonveg : item?.vegNonveg ?? null,
        unit: input.unit ?? null,
        batchNumber: input.batch_number ?? null,
        expiryDate: input.expiry_date ?? null,
      };
    });
  }

  private syncedBillFrom(vendorId: string, input: SyncedBillInput, deviceId: string | null, stamp: string): NewBill {
    const linkable = this.bills.findLinkableItemIds(
      vendorId,
      input.items_data.flatMap((line) => (line.original_item_id ? [line.original_item_id] : [])),
    );

    const lines: NewBillLine[] = input.items_data.map((line) => {
      const subtotalPaise = line.subtotal ?? lineAmount(line.price, line.quantity);
      const originalItemId = line.original_item_id ?? null;
      return {
        itemId: originalItemId && linkable.has(originalItemId) ? originalItemId : null,
        originalItemId,
        itemName: line.item_name,
        itemDescription: line.item_description ?? null,
        pricePaise: line.price,
        mrpPricePaise: line.mrp_price ?? null,
        priceType: line.price_type,
        hsnCode: line.hsn_code ?? null,
        gstBp: line.gst_percentage,
        quantityMilli: line.quantity,
        subtotalPaise,
        gstPaise: line.item_gst_amount ?? percentOf(subtotalPaise, line.gst_percentage),
        vegNonveg: line.veg_nonveg ?? null,
        unit: line.unit ?? null,
        batchNumber: line.batch_number ?? null,
        expiryDate: line.expiry_date ?? null,
      };
    });

    const derived = summarizeBill(summaryLines(lines), {
      billingMode: input.billing_mode, taxSplit: input.tax_split, discountBp: input.discount_percentage },
    );
    const clientSplit =
      input.cgst_amount !== undefined || input.sgst_amount !== undefined || input.igst_amount !== undefined;
    const totalPaise = input.total_amount ?? derived.totalPaise;
    const amountPaidPaise = input.amount_paid ?? null;
    const createdAt = parseClientTimestamp(input.created_at)?.toISOString() ?? stamp;
    const id = input.id && !this.bills.billIdTaken(input.id) ? input.id : randomUUID();

    return {
      id,
      vendorId,
      deviceId,
      invoiceNumber: input.invoice_number,
      billNumber: input.bill_number ?? null,
      billDate: input.bill_date ?? createdAt.slice(0, 10),
      billingMode: input.billing_mode,
      taxSplit: input.tax_split,
      header: {
        restaurantName: input.restaurant_name ?? null,
        address: input.address ?? null,
        gstin: input.gstin ?? null,
        fssaiLicense: input.fssai_license ?? null,
        footerNote: input.footer_note ?? null,
      },
      customer: {
        name: input.customer_name ?? null,
        phone: input.customer_phone ?? null,
        email: input.customer_email ?? null,
        address: input.customer_address ?? null,
      },
      subtotalPaise: input.subtotal ?? derived.subtotalPaise,
      discountBp: derived.discountBp,
      discountPaise: input.discount_amount ?? derived.discountPaise,
      totalTaxPaise: input.total_tax ?? derived.totalTaxPaise,
      cgstPaise: clientSplit ? input.cgst_amount ?? 0 : derived.cgstPaise,
      sgstPaise: clientSplit ? input.sgst_amount ?? 0 : derived.sgstPaise,
      igstPaise: clientSplit ? input.igst_amount ?? 0 : derived.igstPaise,
      totalPaise,
      paymentMode: input.payment_mode,
      paymentReference: input.payment_reference ?? null,
      amountPaidPaise,
      changePaise: input.change_amount ?? changeFor(amountPaidPaise, totalPaise),
      notes: input.notes ?? null,
      tableNumber: input.table_number ?? null,
      waiterName: input.waiter_name ?? null,
      createdAt,
      lines,
    };
  }

  private totalsFrom(summary: BillSummary) {
    return {
      subtotalPaise: summary.subtotalPaise,
      discountBp: summary.discountBp,
      discountPaise: summary.discountPaise,
      totalTaxPaise: summary.totalTaxPaise,
      cgstPaise: summary.cgstPaise,
      sgstPaise: summary.sgstPaise,
      igstPaise: summary.igstPaise,
      totalPaise: summary.totalPaise,
    };
  }

  private rejectImmutableChanges(current: Bill, raw: Record<string, unknown>): void {
    const stored: Record<(typeof IMMUTABLE_BILL_FIELDS)[number], string | null> = {
      id: current.id,
      vendor_id: current.vendorId,
      invoice_number: current.invoiceNumber,
      bill_number: current.billNumber,
      billing_mode: current.billingMode,
      tax_split: current.taxSplit,
    };
    IMMUTABLE_BILL_FIELDS.forEach((field) => {
      const sent = raw[field];
      if (sent === undefined) return;
      if (sent !== stored[field]) {
        throw new ValidationError(`${field} cannot be changed once a bill exists.`, { field });
      }
    });
  }

  private withoutImmutable(raw: Record<string, unknown>): Record<string, unknown> {
    const rest: Record<string, unknown> = { ...raw };
    IMMUTABLE_BILL_FIELDS.forEach((field) => {
      delete rest[field];
    });
    return rest;
  }

  private readSince(value: string | null | undefined): string | null {
    if (value === undefined || value === null || value === '') return null;
    const parsed = parseClientTimestamp(value);
    if (!parsed) {
      throw new ValidationError('since must be an ISO-8601 timestamp.', { field: 'since' });
    }
    return parsed.toISOString();
  }

  private readDate(value: string | null | undefined, field: string): string | null {
    if (value === undefined || value === null || value === '') return null;
    if (!isoDate.safeParse(value).success) {
      throw new ValidationError(`${field} must be a YYYY-MM-DD date.`, { field });
    }
    return value;
  }
}
