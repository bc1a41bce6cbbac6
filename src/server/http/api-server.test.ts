import { randomUUID } from 'node:crypto';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import type { AuditLog } from '../audit-log';
import { BillIngestor } from '../billing/bill-ingestor';
import { BillsRepository } from '../billing/bills-repository';
import { SequenceGenerator } from '../billing/sequence-generator';
import { CatalogRepository } from '../catalog/catalog-repository';
import { SyncReconciler } from '../catalog/sync-reconciler';
import { MonotonicClock } from '../clock';
import { RateTable } from '../tax/rate-table';
import { TaxEngine } from '../tax/tax-engine';
import { createMemoryDatabase, createMockLogger, seedVendor } from '../testing/test-db';
import { isPlainObject } from '../validation';
import { VendorRepository } from '../vendors/vendor-repository';
import { ApiServer, createApiServer } from './api-server';

interface CallResult {
  status: number;
  body: Record<string, unknown>;
}

describe('ApiServer', () => {
  let db: Database.Database;
  let api: ApiServer;
  let baseUrl: string;
  let vendors: VendorRepository;
  let vendorId: string;

  beforeEach(async () => {
    db = createMemoryDatabase();
    const logger = createMockLogger();
    const audit: AuditLog = { record: () => undefined };
    const clock = new MonotonicClock(() => Date.parse('2026-03-04T10:15:00.000Z'));
    const catalog = new CatalogRepository(db);
    vendors = new VendorRepository(db);
    const sequence = new SequenceGenerator(db, { logger });
    const reconciler = new SyncReconciler(catalog, { clock, logger, audit });
    const ingestor = new BillIngestor({
      bills: new BillsRepository(db),
      catalog,
      vendors,
      sequence,
      tax: new TaxEngine(new RateTable({ hsn: { '2106': 1800 } }), logger),
      clock,
      logger,
      audit,
    });

    vendorId = seedVendor(db, { ownerUserId: 'owner-1' }).id;
    vendors.addStaffMember(vendorId, 'cashier-1', 'owner-1');

    api = createApiServer({ vendors, reconciler, ingestor, sequence }, { logger, audit, maxBodyBytes: 4096 });
    const bound = await api.listen(0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${bound.port}`;
  });

  afterEach(async () => {
    await api.close();
    db.close();
  });

  async function call(method: string, path: string, options: { user?: string; body?: unknown } = {}): Promise<CallResult> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (options.user) headers['x-pos-user-id'] = options.user;
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body:
        options.body === undefined
          ? undefined
          : typeof options.body === 'string'
            ? options.body
            : JSON.stringify(options.body),
    });
    const json: unknown = await response.json();
    if (!isPlainObject(json)) {
      throw new Error(`Expected a JSON object from ${method} ${path}`);
    }
    return { status: response.status, body: json };
  }

  it('answers health checks without a user', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { ok: true, status: 'healthy' } });
  });

  it('maps missing users, unknown users and unapproved vendors to 401 and 403', async () => {
    const anonymous = await call('GET', '/vendor/numbering');
    expect(anonymous.status).toBe(401);
    expect(anonymous.body).toMatchObject({ ok: false, error: { code: 'UNAUTHORIZED' } });

    const stranger = await call('GET', '/vendor/numbering', { user: 'someone-else' });
    expect(stranger.status).toBe(403);
    expect(stranger.body).toMatchObject({ ok: false, error: { code: 'FORBIDDEN' } });

    seedVendor(db, { ownerUserId: 'owner-pending', isApproved: false });
    const pending = await call('GET', '/vendor/numbering', { user: 'owner-pending' });
    expect(pending.status).toBe(403);
    expect(pending.body).toMatchObject({ error: { message: 'Vendor account is pending approval.' } });
  });

  it('returns 404 for unknown routes', async () => {
    const result = await call('GET', '/nowhere', { user: 'owner-1' });
    expect(result.status).toBe(404);
    expect(result.body).toMatchObject({ ok: false, error: { code: 'NOT_FOUND' } });
  });

  it('pushes and pulls catalog changes', async () => {
    const categoryId = randomUUID();
    const categories = await call('POST', '/items/categories/sync', {
      user: 'cashier-1',
      body: { operation: 'create', timestamp: '2026-03-01T10:00:00Z', data: { id: categoryId, name: 'Drinks' } },
    });
    expect(categories.status).toBe(200);
    expect(categories.body).toMatchObject({ synced: 1, categories: [{ id: categoryId, name: 'Drinks' }] });

    const itemId = randomUUID();
    const items = await call('POST', '/items/sync', {
      user: 'cashier-1',
      body: [
        {
          operation: 'create',
          timestamp: '2026-03-01T10:00:00Z',
          data: { id: itemId, name: 'Lemonade', price: '30', category_ids: [categoryId] },
        },
        { operation: 'delete', id: randomUUID() },
      ],
    });
    expect(items.status).toBe(200);
    expect(items.body).toMatchObject({
      synced: 1,
      items: [{ id: itemId, price: '30.00', category_ids: [categoryId] }],
      errors: [{ status: 'error', error: { code: 'NOT_FOUND' } }],
    });

    const pulled = await call('GET', '/items/sync', { user: 'owner-1' });
    expect(pulled.body).toMatchObject({ count: 1, entities: [{ id: itemId }], deleted_ids: [] });

    const badCursor = await call('GET', '/items/categories/sync?since=later', { user: 'owner-1' });
    expect(badCursor.status).toBe(400);
  });

  it('creates, reads and updates bills', async () => {
    const created = await call('POST', '/bills/', {
      user: 'cashier-1',
      body: { items: [{ item_name: 'Masala Tea', price: '100', quantity: 2, hsn_code: '2106' }] },
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({
      invoice_number: 'INV-2026-03-04-0001',
      bill_number: 'INV-0001',
      total_amount: '236.00',
    });

    const billId = String(created.body.id);
    const fetched = await call('GET', `/bills/${billId}`, { user: 'owner-1' });
    expect(fetched.body).toMatchObject({ id: billId, items: [{ item_name: 'Masala Tea' }] });

    const patched = await call('PATCH', `/bills/${billId}`, { user: 'owner-1', body: { table_number: 'T4' } });
    expect(patched.status).toBe(200);
    expect(patched.body.table_number).toBe('T4');

    const renumbered = await call('PATCH', `/bills/${billId}`, { user: 'owner-1', body: { bill_number: 'X-1' } });
    expect(renumbered.status).toBe(400);

    const missing = await call('GET', `/bills/${randomUUID()}`, { user: 'owner-1' });
    expect(missing.status).toBe(404);

    const clientNumbered = await call('POST', '/bills', {
      user: 'owner-1',
      body: { invoice_number: 'INV-1', items_data: [{ item_name: 'Tea', price: '10' }] },
    });
    expect(clientNumbered.status).toBe(400);
    expect(clientNumbered.body).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('ingests device bills and serves them back by cursor', async () => {
    const single = await call('POST', '/backup/sync', {
      user: 'cashier-1',
      body: { device_id: 'tab-1', bill_data: { invoice_number: 'TAB1-0001', items_data: [{ item_name: 'Tea', price: '10' }] } },
    });
    expect(single.status).toBe(201);
    expect(single.body).toMatchObject({ synced: 1, bills: [{ invoice_number: 'TAB1-0001', device_id: 'tab-1', created: true }] });

    const batch = await call('POST', '/backup/sync', {
      user: 'cashier-1',
      body: [
        { invoice_number: 'TAB1-0001', items_data: [{ item_name: 'Tea', price: '10' }] },
        { invoice_number: 'TAB1-0002', items_data: [{ item_name: 'Tea', price: '12' }] },
      ],
    });
    expect(batch.status).toBe(201);
    expect(batch.body).toMatchObject({
      synced: 2,
      bills: [
        { invoice_number: 'TAB1-0001', created: false },
        { invoice_number: 'TAB1-0002', created: true },
      ],
      errors: [],
    });

    const unnumbered = await call('POST', '/backup/sync', { user: 'cashier-1', body: { items_data: [] } });
    expect(unnumbered.status).toBe(400);

    const firstPage = await call('GET', '/backup/sync?limit=1', { user: 'owner-1' });
    expect(firstPage.body).toMatchObject({ count: 1, bills: [{ invoice_number: 'TAB1-0001' }] });

    const nextPage = await call('GET', `/backup/sync?since=${encodeURIComponent(String(firstPage.body.server_time))}`, {
      user: 'owner-1',
    });
    expect(nextPage.body).toMatchObject({ count: 1, bills: [{ invoice_number: 'TAB1-0002' }] });

    const badMode = await call('GET', '/backup/sync?billing_mode=vat', { user: 'owner-1' });
    expect(badMode.status).toBe(400);
  });

  it('lets only the owner change numbering and locks the start after the first bill', async () => {
    const staff = await call('PATCH', '/vendor/numbering', { user: 'cashier-1', body: { prefix: 'shop' } });
    expect(staff.status).toBe(403);

    const updated = await call('PATCH', '/vendor/numbering', {
      user: 'owner-1',
      body: { prefix: 'shop', starting_number: 10 },
    });
    expect(updated.body).toEqual({ prefix: 'SHOP', starting_number: 10, last_issued: 0, next_number: 10, locked: false });

    const bill = await call('POST', '/bills/', { user: 'owner-1', body: { items_data: [{ item_name: 'Tea', price: '10' }] } });
    expect(bill.body.invoice_number).toBe('SHOP-2026-03-04-0010');

    const locked = await call('PATCH', '/vendor/numbering', { user: 'owner-1', body: { starting_number: 20 } });
    expect(locked.status).toBe(409);
    expect(locked.body).toMatchObject({ ok: false, error: { code: 'CONFIGURATION_LOCKED' } });

    const renamed = await call('PATCH', '/vendor/numbering', { user: 'owner-1', body: { prefix: 'cafe' } });
    expect(renamed.body).toMatchObject({ prefix: 'CAFE', starting_number: 10, last_issued: 10, locked: true });
  });

  it('registers a new vendor as pending approval', async () => {
    const registered = await call('POST', '/vendor', {
      user: 'new-owner',
      body: { business_name: ' Corner Cafe ', service_code: '996331', service_gst_percentage: '5', bill_prefix: 'cc' },
    });
    expect(registered.status).toBe(201);
    expect(registered.body).toMatchObject({
      business_name: 'Corner Cafe',
      is_approved: false,
      service_code: '996331',
      service_gst_percentage: '5.00',
      bill_prefix: 'cc',
      bill_starting_number: 1,
    });

    const pending = await call('GET', '/vendor/profile', { user: 'new-owner' });
    expect(pending.status).toBe(403);

    const again = await call('POST', '/vendor', { user: 'cashier-1', body: {} });
    expect(again.status).toBe(400);

    const anonymous = await call('POST', '/vendor', { body: {} });
    expect(anonymous.status).toBe(401);
  });

  it('lets the owner set the service tax code that new bills are charged at', async () => {
    const staff = await call('PATCH', '/vendor/profile', { user: 'cashier-1', body: { service_code: '996331' } });
    expect(staff.status).toBe(403);

    const numbering = await call('PATCH', '/vendor/profile', { user: 'owner-1', body: { bill_prefix: 'X' } });
    expect(numbering.status).toBe(400);

    const updated = await call('PATCH', '/vendor/profile', {
      user: 'owner-1',
      body: { service_code: '996331', service_gst_percentage: 5, phone: ' 080 1234 ' },
    });
    expect(updated.status).toBe(200);
    expect(updated.body).toMatchObject({
      id: vendorId,
      business_name: 'Test Cafe',
      phone: '080 1234',
      service_code: '996331',
      service_gst_percentage: '5.00',
    });

    const profile = await call('GET', '/vendor/profile', { user: 'cashier-1' });
    expect(profile.body.service_code).toBe('996331');

    const bill = await call('POST', '/bills/', {
      user: 'cashier-1',
      body: { items_data: [{ item_name: 'Table Service', price: '100', hsn_code: '2106' }] },
    });
    expect(bill.body).toMatchObject({ total_tax: '5.00', total_amount: '105.00' });
  });

  it('lets the owner add and remove staff', async () => {
    const denied = await call('POST', '/vendor/staff', { user: 'cashier-1', body: { user_id: 'cashier-2' } });
    expect(denied.status).toBe(403);

    const added = await call('POST', '/vendor/staff', { user: 'owner-1', body: { user_id: 'cashier-2' } });
    expect(added.status).toBe(201);
    expect(added.body).toMatchObject({ user_id: 'cashier-2', is_active: true });
    expect((await call('GET', '/vendor/numbering', { user: 'cashier-2' })).status).toBe(200);

    seedVendor(db, { ownerUserId: 'owner-elsewhere' });
    const taken = await call('POST', '/vendor/staff', { user: 'owner-1', body: { user_id: 'owner-elsewhere' } });
    expect(taken.status).toBe(400);

    const removed = await call('DELETE', '/vendor/staff/cashier-2', { user: 'owner-1' });
    expect(removed).toEqual({ status: 200, body: { user_id: 'cashier-2', is_active: false } });
    expect((await call('GET', '/vendor/numbering', { user: 'cashier-2' })).status).toBe(403);

    const unknown = await call('DELETE', '/vendor/staff/nobody', { user: 'owner-1' });
    expect(unknown.status).toBe(404);
  });

  it('rejects malformed and oversized bodies', async () => {
    const malformed = await call('POST', '/items/sync', { user: 'owner-1', body: '{"operation":' });
    expect(malformed.status).toBe(400);

    const oversized = await call('POST', '/items/sync', {
      user: 'owner-1',
      body: { operation: 'create', data: { name: 'x'.repeat(5000), price: '1' } },
    });
    expect(oversized.status).toBe(413);
    expect(oversized.body).toMatchObject({ error: { code: 'PAYLOAD_TOO_LARGE' } });
  });
});
