import { randomUUID } from 'node:crypto';
import { beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import type { AuditLog } from '../audit-log';
import { CatalogRepository } from '../catalog/catalog-repository';
import { MonotonicClock } from '../clock';
import { NotFoundError, ValidationError } from '../errors';
import { RateTable } from '../tax/rate-table';
import { TaxEngine } from '../tax/tax-engine';
import { createMemoryDatabase, createMockLogger, seedVendor } from '../testing/test-db';
import { VendorRepository } from '../vendors/vendor-repository';
import { BillIngestor } from './bill-ingestor';
import { toBillEnvelopes } from './bill-schemas';
import { BillsRepository } from './bills-repository';
import { SequenceGenerator } from './sequence-generator';

const rates = new RateTable({ hsn: { '2106': 1800, '2202': 2800 } });

describe('BillIngestor', () => {
  let db: Database.Database;
  let vendorId: string;
  let catalog: CatalogRepository;
  let sequence: SequenceGenerator;
  let ingestor: BillIngestor;
  let audited: string[];

  function buildIngestor(): BillIngestor {
    const logger = createMockLogger();
    const audit: AuditLog = { record: (event) => audited.push(event) };
    return new BillIngestor({
      bills: new BillsRepository(db),
      catalog,
      vendors: new VendorRepository(db),
      sequence,
      tax: new TaxEngine(rates, logger),
      clock: new MonotonicClock(() => Date.parse('2026-03-04T10:15:00.000Z')),
      logger,
      audit,
    });
  }

  function seedItem(fields: { name: string; pricePaise: number; hsnCode: string | null }): string {
    const id = randomUUID();
    const stamp = '2026-03-01T09:00:00.000Z';
    catalog.insertItem(
      vendorId,
      id,
      {
        name: fields.name,
        description: null,
        pricePaise: fields.pricePaise,
        mrpPricePaise: null,
        priceType: 'exclusive',
        hsnCode: fields.hsnCode,
        hsnGstBp: null,
        vegNonveg: 'veg',
        stockQuantity: 0,
        sku: null,
        barcode: null,
        isActive: true,
        sortOrder: 0,
        categoryIds: [],
      },
      { updatedAt: stamp, serverModifiedAt: stamp },
    );
    return id;
  }

  function countLines(billId: string): number {
    const row = db.prepare('SELECT COUNT(*) AS total FROM bill_items WHERE bill_id = ?').get(billId) as { total: number };
    return row.total;
  }

  beforeEach(() => {
    db = createMemoryDatabase();
    vendorId = seedVendor(db, { billStartingNumber: 50 }).id;
    catalog = new CatalogRepository(db);
    sequence = new SequenceGenerator(db, { logger: createMockLogger() });
    audited = [];
    ingestor = buildIngestor();
  });

  describe('createBill', () => {
    const teaLine = { item_name: 'Masala Tea', price: '100', quantity: 2, hsn_code: '2106' };

    it('numbers bills from the starting number, one after another', async () => {
      const first = await ingestor.createBill(vendorId, { items_data: [teaLine] });
      const second = await ingestor.createBill(vendorId, { items: [teaLine] });

      expect(first.invoice_number).toBe('INV-2026-03-04-0050');
      expect(first.bill_number).toBe('INV-0050');
      expect(second.invoice_number).toBe('INV-2026-03-04-0051');
      expect(audited).toEqual(['bill.created', 'bill.created']);
    });

    it('adds exclusive tax to the total and splits it across CGST and SGST', async () => {
      const bill = await ingestor.createBill(vendorId, { items_data: [teaLine], amount_paid: '250' });

      expect(bill).toMatchObject({
        subtotal: '200.00',
        total_tax: '36.00',
        cgst_amount: '18.00',
        sgst_amount: '18.00',
        igst_amount: '0.00',
        total_amount: '236.00',
        amount_paid: '250.00',
        change_amount: '14.00',
        restaurant_name: 'Test Cafe',
      });
      expect(bill.items[0]).toMatchObject({ item_id: null, gst_percentage: '18.00', quantity: '2', item_gst_amount: '36.00' });
    });

    it('reports inclusive tax without adding it', async () => {
      const bill = await ingestor.createBill(vendorId, { items_data: [{ ...teaLine, price_type: 'inclusive' }] });
      expect(bill.total_tax).toBe('36.00');
      expect(bill.total_amount).toBe('200.00');
    });

    it('takes the discount off the subtotal only', async () => {
      const bill = await ingestor.createBill(vendorId, { items_data: [teaLine], discount_percentage: '10' });
      expect(bill.discount_amount).toBe('20.00');
      expect(bill.total_amount).toBe('216.00');
    });

    it('charges no tax on non-GST bills', async () => {
      const bill = await ingestor.createBill(vendorId, { billing_mode: 'non_gst', items_data: [teaLine] });
      expect(bill.total_tax).toBe('0.00');
      expect(bill.total_amount).toBe('200.00');
      expect(bill.items[0].gst_percentage).toBe('0.00');
    });

    it('snapshots catalog items and prices them from the rate table', async () => {
      const itemId = seedItem({ name: 'Cold Coffee', pricePaise: 4050, hsnCode: '2202' });
      const bill = await ingestor.createBill(vendorId, { items_data: [{ item_id: itemId, quantity: '1.5' }] });

      expect(bill.items[0]).toMatchObject({
        item_id: itemId,
        original_item_id: itemId,
        item_name: 'Cold Coffee',
        price: '40.50',
        quantity: '1.5',
        subtotal: '60.75',
        gst_percentage: '28.00',
        item_gst_amount: '17.01',
        veg_nonveg: 'veg',
      });
      expect(bill.total_amount).toBe('77.76');
    });

    it('applies the vendor service rate to every line', async () => {
      const serviceVendor = seedVendor(db, { serviceCode: '996331', serviceGstBp: 500 });
      const bill = await ingestor.createBill(serviceVendor.id, { items_data: [teaLine] });
      expect(bill.items[0].gst_percentage).toBe('5.00');
      expect(bill.total_tax).toBe('10.00');
    });

    it('rejects client invoice numbers without consuming a number', async () => {
      await expect(
        ingestor.createBill(vendorId, { invoice_number: 'INV-2026-03-04-0001', items_data: [teaLine] }),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(sequence.getNumberingConfig(vendorId).last_issued).toBe(0);
    });

    it('rejects unknown catalog items and ad-hoc lines without a price', async () => {
      await expect(ingestor.createBill(vendorId, { items_data: [{ item_id: randomUUID() }] })).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(ingestor.createBill(vendorId, { items_data: [{ item_name: 'Tea' }] })).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(ingestor.createBill(vendorId, { items_data: [] })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('ingestSyncedBill', () => {
    function deviceBill(invoiceNumber: string, itemId: string | null = null): Record<string, unknown> {
      return {
        invoice_number: invoiceNumber,
        bill_date: '2026-03-03',
        items: [{ name: 'Tea', price: '20', quantity: 2, gst_percentage: '5', item_gst: '2.00', item_id: itemId }],
        subtotal: '40',
        total_tax: '2.00',
        cgst: '1.00',
        sgst: '1.00',
        total: '42.00',
        payment_mode: 'upi',
      };
    }

    it('stores the device totals as sent and links known items', () => {
      const itemId = seedItem({ name: 'Tea', pricePaise: 2000, hsnCode: null });
      const result = ingestor.ingestSyncedBill(vendorId, 'DEV1-0001', deviceBill('DEV1-0001', itemId), 'tab-1');

      expect(result.created).toBe(true);
      expect(result.bill).toMatchObject({
        invoice_number: 'DEV1-0001',
        device_id: 'tab-1',
        bill_date: '2026-03-03',
        subtotal: '40.00',
        cgst_amount: '1.00',
        sgst_amount: '1.00',
        total_amount: '42.00',
        payment_mode: 'upi',
      });
      expect(result.bill.items[0]).toMatchObject({
        item_id: itemId,
        original_item_id: itemId,
        item_name: 'Tea',
        item_gst_amount: '2.00',
        quantity: '2',
      });
      expect(audited).toEqual(['bill.ingested']);
    });

    it('returns the stored bill when the same invoice arrives again', () => {
      const first = ingestor.ingestSyncedBill(vendorId, 'DEV1-0001', deviceBill('DEV1-0001'));
      const again = ingestor.ingestSyncedBill(vendorId, 'DEV1-0001', { ...deviceBill('DEV1-0001'), total: '99.00' });

      expect(again.created).toBe(false);
      expect(again.bill.id).toBe(first.bill.id);
      expect(again.bill.total_amount).toBe('42.00');
      expect(countLines(first.bill.id)).toBe(1);
    });

    it('derives missing totals from the lines', () => {
      const result = ingestor.ingestSyncedBill(vendorId, 'DEV1-0002', {
        items_data: [{ item_name: 'Tea', price: '10.00', quantity: '3', gst_percentage: '18' }],
      });

      expect(result.bill).toMatchObject({
        subtotal: '30.00',
        total_tax: '5.40',
        cgst_amount: '2.70',
        sgst_amount: '2.70',
        total_amount: '35.40',
      });
    });

    it('keeps the device item id when the catalog does not know it', () => {
      const unknown = randomUUID();
      const result = ingestor.ingestSyncedBill(vendorId, 'DEV1-0003', deviceBill('DEV1-0003', unknown));
      expect(result.bill.items[0].item_id).toBeNull();
      expect(result.bill.items[0].original_item_id).toBe(unknown);
    });

    it('points clients without an invoice number to bill creation', () => {
      expect(() => ingestor.ingestSyncedBill(vendorId, null, { items_data: [] })).toThrow(/POST \/bills\//);
    });
  });

  describe('ingestBatch', () => {
    it('applies each bill on its own and reports failures by index', () => {
      const { envelopes, single } = toBillEnvelopes([
        {
          device_id: 'tab-1',
          bill_data: { invoice_number: 'DEV2-0001', items_data: [{ item_name: 'Tea', price: '15' }] },
        },
        { items_data: [{ item_name: 'Tea', price: '15' }] },
      ]);
      expect(single).toBe(false);

      const result = ingestor.ingestBatch(vendorId, envelopes);

      expect(result.synced).toBe(1);
      expect(result.bills[0]).toMatchObject({ invoice_number: 'DEV2-0001', device_id: 'tab-1', created: true });
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({ index: 1, invoice_number: null, error: { code: 'VALIDATION_ERROR' } });
    });

    it('treats a bare object as a single bill', () => {
      expect(toBillEnvelopes({ invoice_number: 'X-1' })).toEqual({
        envelopes: [{ deviceId: null, data: { invoice_number: 'X-1' } }],
        single: true,
      });
    });
  });

  describe('updateBill', () => {
    const teaLine = { item_name: 'Masala Tea', price: '100', quantity: 2, hsn_code: '2106' };

    it('replaces every line and reprices the bill', async () => {
      const created = await ingestor.createBill(vendorId, { items_data: [teaLine] });
      const updated = ingestor.updateBill(vendorId, created.id, {
        customer_name: 'Asha',
        items_data: [{ item_name: 'Cold Coffee', price: '50', hsn_code: '2202' }],
      });

      expect(updated.invoice_number).toBe(created.invoice_number);
      expect(updated.customer_name).toBe('Asha');
      expect(updated.items).toHaveLength(1);
      expect(updated.items[0].item_name).toBe('Cold Coffee');
      expect(updated.total_tax).toBe('14.00');
      expect(updated.total_amount).toBe('64.00');
      expect(updated.updated_at > created.updated_at).toBe(true);
      expect(countLines(created.id)).toBe(1);
    });

    it('reprices the stored lines when only the discount changes', async () => {
      const created = await ingestor.createBill(vendorId, { items_data: [teaLine] });
      const updated = ingestor.updateBill(vendorId, created.id, { discount_percentage: '50' });
      expect(updated.discount_amount).toBe('100.00');
      expect(updated.total_amount).toBe('136.00');
      expect(updated.items[0].id).toBe(created.items[0].id);
    });

    it('refuses to change numbers but accepts them unchanged', async () => {
      const created = await ingestor.createBill(vendorId, { items_data: [teaLine] });
      expect(() => ingestor.updateBill(vendorId, created.id, { invoice_number: 'OTHER-1' })).toThrow(ValidationError);
      expect(() => ingestor.updateBill(vendorId, created.id, { billing_mode: 'non_gst' })).toThrow(ValidationError);
      expect(ingestor.updateBill(vendorId, created.id, { invoice_number: created.invoice_number, notes: 'ok' }).notes).toBe(
        'ok',
      );
    });

    it('fails for bills of another vendor', async () => {
      const created = await ingestor.createBill(vendorId, { items_data: [teaLine] });
      const other = seedVendor(db).id;
      expect(() => ingestor.updateBill(other, created.id, { notes: 'x' })).toThrow(NotFoundError);
      expect(() => ingestor.getBill(other, created.id)).toThrow(NotFoundError);
    });
  });

  it('keeps the line snapshot when its catalog item is deleted', async () => {
    const itemId = seedItem({ name: 'Cold Coffee', pricePaise: 4050, hsnCode: '2202' });
    const bill = await ingestor.createBill(vendorId, { items_data: [{ item_id: itemId }] });

    catalog.deleteItem(vendorId, itemId, '2026-03-05T00:00:00.000Z');

    const stored = ingestor.getBill(vendorId, bill.id);
    expect(stored.items[0]).toMatchObject({ item_id: null, original_item_id: itemId, item_name: 'Cold Coffee' });
  });

  describe('listBillsForSync', () => {
    function ingest(invoiceNumber: string, billingMode: 'gst' | 'non_gst' = 'gst') {
      return ingestor.ingestSyncedBill(vendorId, invoiceNumber, {
        billing_mode: billingMode,
        items_data: [{ item_name: 'Tea', price: '10' }],
      }).bill;
    }

    it('pages by server write time and resumes from the last row', () => {
      const first = ingest('P-1');
      const second = ingest('P-2');
      ingest('P-3');

      const page = ingestor.listBillsForSync(vendorId, { limit: 2 });
      expect(page.count).toBe(2);
      expect(page.bills.map((bill) => bill.invoice_number)).toEqual(['P-1', 'P-2']);
      expect(page.server_time).toBe(second.updated_at);

      const rest = ingestor.listBillsForSync(vendorId, { since: page.server_time, limit: 2 });
      expect(rest.bills.map((bill) => bill.invoice_number)).toEqual(['P-3']);

      ingestor.updateBill(vendorId, first.id, { notes: 'corrected' });
      const changed = ingestor.listBillsForSync(vendorId, { since: rest.server_time });
      expect(changed.bills.map((bill) => bill.invoice_number)).toEqual(['P-1']);
    });

    it('filters by billing mode', () => {
      ingest('M-1', 'gst');
      ingest('M-2', 'non_gst');
      const result = ingestor.listBillsForSync(vendorId, { billingMode: 'non_gst' });
      expect(result.bills.map((bill) => bill.invoice_number)).toEqual(['M-2']);
    });

    it('rejects a bad cursor or limit', () => {
      expect(() => ingestor.listBillsForSync(vendorId, { since: 'yesterday' })).toThrow(ValidationError);
      expect(() => ingestor.listBillsForSync(vendorId, { limit: 0 })).toThrow(ValidationError);
      expect(() => ingestor.listBillsForSync(vendorId, { startDate: '03/01/2026' })).toThrow(ValidationError);
    });
  });
});
