import { randomUUID } from 'node:crypto';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import type { AuditLog } from '../audit-log';
import { MonotonicClock } from '../clock';
import {
  createMemoryDatabase,
  createMockLogger,
  createTempDatabaseFile,
  seedVendor,
  type TempDatabaseFile,
} from '../testing/test-db';
import { CatalogRepository } from './catalog-repository';
import { SyncReconciler } from './sync-reconciler';

const T1 = '2026-03-01T10:00:00Z';
const T2 = '2026-03-01T11:00:00Z';
const T3 = '2026-03-01T12:00:00Z';

describe('SyncReconciler', () => {
  let db: Database.Database;
  let vendorId: string;
  let otherVendorId: string;
  let serverMs: number;
  let reconciler: SyncReconciler;
  let audited: string[];

  beforeEach(() => {
    db = createMemoryDatabase();
    vendorId = seedVendor(db).id;
    otherVendorId = seedVendor(db).id;
    serverMs = Date.parse('2026-03-02T00:00:00Z');
    audited = [];
    const audit: AuditLog = { record: (event) => audited.push(event) };
    reconciler = new SyncReconciler(new CatalogRepository(db), {
      clock: new MonotonicClock(() => serverMs),
      logger: createMockLogger(),
      audit,
    });
  });

  async function createCategory(owner: string, name: string, extra: Record<string, unknown> = {}): Promise<string> {
    const id = randomUUID();
    const result = await reconciler.reconcile(owner, 'category', {
      operation: 'create',
      timestamp: T1,
      data: { id, name, ...extra },
    });
    expect(result.errors).toEqual([]);
    return id;
  }

  describe('categories', () => {
    it('creates with the operation timestamp as the clock', async () => {
      const id = randomUUID();
      const result = await reconciler.reconcile(vendorId, 'category', {
        operation: 'create',
        timestamp: T1,
        data: { id, name: 'Drinks' },
      });

      expect(result.synced).toBe(1);
      expect(result.results[0]).toMatchObject({
        entity_id: id,
        operation: 'create',
        status: 'success',
        outcome: 'created',
        data: { id, name: 'Drinks', is_active: true, sort_order: 0, updated_at: '2026-03-01T10:00:00.000000Z' },
      });
      expect(audited).toEqual(['catalog.category.created']);
    });

    it('is idempotent for a replayed operation', async () => {
      const id = await createCategory(vendorId, 'Drinks');
      const op = { operation: 'update', timestamp: T2, data: { id, name: 'Cold Drinks' } };

      const first = await reconciler.reconcile(vendorId, 'category', op);
      const second = await reconciler.reconcile(vendorId, 'category', op);

      expect(first.results[0].outcome).toBe('updated');
      expect(second.results[0]).toMatchObject({ status: 'success', outcome: 'stale' });
      expect(second.results[0].data).toEqual(first.results[0].data);
    });

    it('never lets an older write overwrite a newer one', async () => {
      const id = await createCategory(vendorId, 'Drinks');
      const newer = { operation: 'update', timestamp: T3, data: { id, name: 'Newer' } };
      const older = { operation: 'update', timestamp: T2, data: { id, name: 'Older' } };

      const result = await reconciler.reconcile(vendorId, 'category', [newer, older]);

      expect(result.results.map((entry) => entry.outcome)).toEqual(['updated', 'stale']);
      expect(result.results[1].data?.name).toBe('Newer');
      expect(result.results[1].data?.updated_at).toBe('2026-03-01T12:00:00.000000Z');
    });

    it('orders writes inside the same millisecond by their microseconds', async () => {
      const id = randomUUID();
      const result = await reconciler.reconcile(vendorId, 'category', [
        { operation: 'create', timestamp: '2026-03-01T10:00:00.000100Z', data: { id, name: 'Drinks' } },
        { operation: 'update', timestamp: '2026-03-01T10:00:00.000900Z', data: { id, name: 'Cold Drinks' } },
        { operation: 'update', timestamp: '2026-03-01T10:00:00.000500Z', data: { id, name: 'Late Echo' } },
      ]);

      expect(result.results.map((entry) => entry.outcome)).toEqual(['created', 'updated', 'stale']);
      expect(result.results[2].data).toMatchObject({ name: 'Cold Drinks', updated_at: '2026-03-01T10:00:00.000900Z' });
    });

    it('treats an equal timestamp as stale', async () => {
      const id = await createCategory(vendorId, 'Drinks');
      const result = await reconciler.reconcile(vendorId, 'category', {
        operation: 'update',
        timestamp: T1,
        data: { id, name: 'Same Instant' },
      });
      expect(result.results[0].outcome).toBe('stale');
      expect(result.results[0].data?.name).toBe('Drinks');
    });

    it('uses server time when the timestamp is missing or unparseable', async () => {
      const id = await createCategory(vendorId, 'Drinks');
      const result = await reconciler.reconcile(vendorId, 'category', [
        { operation: 'update', timestamp: 'not-a-time', data: { id, description: 'Chilled' } },
      ]);
      expect(result.results[0]).toMatchObject({ outcome: 'updated', data: { description: 'Chilled' } });
      // The clock already handed out the create's instant, so this write is one millisecond later.
      expect(result.results[0].data?.updated_at).toBe('2026-03-02T00:00:00.001000Z');
    });

    it('applies a partial update over the stored fields', async () => {
      const id = await createCategory(vendorId, 'Drinks', { description: 'All drinks', sort_order: 4 });
      const result = await reconciler.reconcile(vendorId, 'category', {
        operation: 'update',
        timestamp: T2,
        data: { id, is_active: false },
      });
      expect(result.results[0].data).toMatchObject({
        name: 'Drinks',
        description: 'All drinks',
        sort_order: 4,
        is_active: false,
      });
    });

    it('rejects a duplicate name for the same vendor only', async () => {
      await createCategory(vendorId, 'Drinks');
      const duplicate = await reconciler.reconcile(vendorId, 'category', {
        operation: 'create',
        data: { id: randomUUID(), name: 'Drinks' },
      });
      expect(duplicate.errors[0].error?.code).toBe('VALIDATION_ERROR');

      const elsewhere = await reconciler.reconcile(otherVendorId, 'category', {
        operation: 'create',
        data: { id: randomUUID(), name: 'Drinks' },
      });
      expect(elsewhere.synced).toBe(1);
    });

    it('assigns an id when the operation carries none', async () => {
      const result = await reconciler.reconcile(vendorId, 'category', { data: { name: 'Snacks' } });
      const entityId = result.results[0].entity_id;
      expect(entityId).toMatch(/^[0-9a-f-]{36}$/);
      expect(result.results[0].data?.id).toBe(entityId);
    });
  });

  describe('items', () => {
    it('creates an item linked to the vendor categories', async () => {
      const categoryId = await createCategory(vendorId, 'Drinks');
      const id = randomUUID();
      const result = await reconciler.reconcile(vendorId, 'item', {
        operation: 'create',
        timestamp: T1,
        data: {
          id,
          name: 'Lime Soda',
          price: '40.5',
          hsn_code: '2202',
          hsn_gst_percentage: 28,
          categories: categoryId,
        },
      });

      expect(result.results[0].data).toMatchObject({
        id,
        price: '40.50',
        price_type: 'exclusive',
        hsn_gst_percentage: '28.00',
        category_ids: [categoryId],
        stock_quantity: 0,
      });
    });

    it('reports a validation error, not a stale outcome, for a bad payload', async () => {
      const result = await reconciler.reconcile(vendorId, 'item', {
        operation: 'create',
        data: { id: randomUUID(), name: 'No Price' },
      });
      expect(result.synced).toBe(0);
      expect(result.errors[0]).toMatchObject({ status: 'error', error: { code: 'VALIDATION_ERROR' } });
    });

    it('rejects amounts with more than two decimals', async () => {
      const result = await reconciler.reconcile(vendorId, 'item', {
        data: { id: randomUUID(), name: 'Odd', price: '10.005' },
      });
      expect(result.errors[0].error?.code).toBe('VALIDATION_ERROR');
    });

    it('rejects categories owned by another vendor or inactive ones', async () => {
      const foreign = await createCategory(otherVendorId, 'Theirs');
      const inactive = await createCategory(vendorId, 'Retired', { is_active: false });

      const result = await reconciler.reconcile(vendorId, 'item', [
        { data: { id: randomUUID(), name: 'A', price: 10, category_ids: [foreign] } },
        { data: { id: randomUUID(), name: 'B', price: 10, category_ids: [inactive] } },
        { data: { id: randomUUID(), name: 'C', price: 10 } },
      ]);

      expect(result.results.map((entry) => entry.status)).toEqual(['error', 'error', 'success']);
      expect(result.errors[0].error).toMatchObject({
        code: 'VALIDATION_ERROR',
        details: { category_ids: [foreign] },
      });
      expect(result.synced).toBe(1);
    });

    it('rejects an id that is not a UUID', async () => {
      const result = await reconciler.reconcile(vendorId, 'item', { data: { id: 'item-1', name: 'A', price: 1 } });
      expect(result.errors[0].error?.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('delete', () => {
    it('deletes regardless of timestamp and reports unknown ids', async () => {
      const id = await createCategory(vendorId, 'Drinks');
      const missing = randomUUID();

      const result = await reconciler.reconcile(vendorId, 'category', [
        { operation: 'delete', id, timestamp: '2000-01-01T00:00:00Z' },
        { operation: 'delete', id: missing },
      ]);

      expect(result.results[0]).toMatchObject({ status: 'success', outcome: 'deleted', entity_id: id });
      expect(result.results[1]).toMatchObject({ status: 'error', error: { code: 'NOT_FOUND' } });
    });

    it('recreates an entity from an update that arrives after its delete', async () => {
      const id = await createCategory(vendorId, 'Drinks');
      await reconciler.reconcile(vendorId, 'category', { operation: 'delete', id });

      const late = await reconciler.reconcile(vendorId, 'category', {
        operation: 'update',
        timestamp: T2,
        data: { id, name: 'Drinks Again' },
      });

      expect(late.results[0].outcome).toBe('created');
      const pulled = reconciler.pullChanges(vendorId, 'category', null);
      expect(pulled.deleted_ids).toEqual([]);
      expect(pulled.entities.map((entity) => entity.name)).toEqual(['Drinks Again']);
    });

    it('requires an id', async () => {
      const result = await reconciler.reconcile(vendorId, 'item', { operation: 'delete', data: {} });
      expect(result.errors[0].error?.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('cancellation', () => {
    it('skips every remaining operation once aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const id = randomUUID();

      const result = await reconciler.reconcile(
        vendorId,
        'category',
        [{ data: { id, name: 'Never' } }, { data: { id: randomUUID(), name: 'Never Either' } }],
        { signal: controller.signal },
      );

      expect(result.synced).toBe(0);
      expect(result.errors.map((entry) => entry.error?.code)).toEqual(['CANCELLED', 'CANCELLED']);
      expect(result.errors[0].entity_id).toBe(id);
      expect(reconciler.pullChanges(vendorId, 'category', null).count).toBe(0);
    });
  });

  describe('locked database', () => {
    let file: TempDatabaseFile | null = null;

    afterEach(() => {
      file?.cleanup();
      file = null;
    });

    it('reports a held write lock as a retryable BUSY error for that operation', async () => {
      file = createTempDatabaseFile();
      const holder = file.open({ busyTimeoutMs: 500 });
      const waiter = file.open({ busyTimeoutMs: 20 });
      const lockedVendorId = seedVendor(holder).id;
      const logger = createMockLogger();
      const lockedReconciler = new SyncReconciler(new CatalogRepository(waiter), {
        clock: new MonotonicClock(() => serverMs),
        logger,
        audit: { record: () => undefined },
      });

      holder.exec('BEGIN IMMEDIATE');
      try {
        const result = await lockedReconciler.reconcile(lockedVendorId, 'category', {
          operation: 'create',
          timestamp: T1,
          data: { id: randomUUID(), name: 'Drinks' },
        });
        expect(result.synced).toBe(0);
        expect(result.errors[0].error).toMatchObject({ code: 'BUSY', retryable: true });
        expect(logger.warn).toHaveBeenCalledWith('category operation hit a locked database', expect.anything());
        expect(logger.error).not.toHaveBeenCalled();
      } finally {
        holder.exec('ROLLBACK');
      }

      const retried = await lockedReconciler.reconcile(lockedVendorId, 'category', {
        operation: 'create',
        timestamp: T1,
        data: { name: 'Drinks' },
      });
      expect(retried.results[0]).toMatchObject({ status: 'success', outcome: 'created' });
    });
  });

  describe('pullChanges', () => {
    it('returns only changes after the cursor, with tombstones', async () => {
      const keep = await createCategory(vendorId, 'Keep');
      const drop = await createCategory(vendorId, 'Drop');
      const first = reconciler.pullChanges(vendorId, 'category', null);
      expect(first.count).toBe(2);

      serverMs += 60_000;
      await reconciler.reconcile(vendorId, 'category', [
        { operation: 'update', timestamp: T2, data: { id: keep, name: 'Kept' } },
        { operation: 'delete', id: drop },
      ]);

      const second = reconciler.pullChanges(vendorId, 'category', first.server_time);
      expect(second.entities.map((entity) => entity.id)).toEqual([keep]);
      expect(second.deleted_ids).toEqual([drop]);

      const third = reconciler.pullChanges(vendorId, 'category', second.server_time);
      expect(third).toMatchObject({ count: 0, entities: [], deleted_ids: [] });
    });

    it('re-sends items whose category was deleted', async () => {
      const categoryId = await createCategory(vendorId, 'Drinks');
      const itemId = randomUUID();
      await reconciler.reconcile(vendorId, 'item', {
        timestamp: T1,
        data: { id: itemId, name: 'Tea', price: 20, category_ids: [categoryId] },
      });
      const cursor = reconciler.pullChanges(vendorId, 'item', null).server_time;

      serverMs += 60_000;
      await reconciler.reconcile(vendorId, 'category', { operation: 'delete', id: categoryId });

      const pulled = reconciler.pullChanges(vendorId, 'item', cursor);
      expect(pulled.entities).toHaveLength(1);
      expect(pulled.entities[0].category_ids).toEqual([]);
    });

    it('rejects an unreadable cursor', () => {
      expect(() => reconciler.pullChanges(vendorId, 'item', 'last tuesday')).toThrow(/since/);
    });

    it('keeps vendors apart', async () => {
      await createCategory(otherVendorId, 'Theirs');
      expect(reconciler.pullChanges(vendorId, 'category', null).count).toBe(0);
    });
  });
});
