import { randomUUID } from 'node:crypto';
import { setImmediate as nextTurn } from 'node:timers/promises';
import type {
  CatalogCategory,
  CatalogEntityKind,
  CatalogItem,
  CategoryDto,
  CategoryFields,
  ItemDto,
  ItemFields,
  PullResult,
  SyncBatchResult,
  SyncOperationResult,
  SyncOperationType,
} from '../../shared/catalog';
import type { AuditLog } from '../audit-log';
import { createConsoleAuditLog } from '../audit-log';
import { MonotonicClock, type Clock } from '../clock';
import {
  BusyError,
  CancelledError,
  NotFoundError,
  PosSyncError,
  ValidationError,
  isSqliteBusy,
  toErrorBody,
} from '../errors';
import { createConsoleLogger, type Logger } from '../logger';
import { isPlainObject, parseOrThrow } from '../validation';
import { toCategoryDto, toItemDto } from './catalog-dto';
import type { CatalogRepository, WriteStamp } from './catalog-repository';
import { formatInstant, parseClientInstant, parseClientTimestamp } from './client-timestamp';
import {
  categoryCreateSchema,
  categoryPatchSchema,
  entityIdSchema,
  itemCreateSchema,
  itemPatchSchema,
  normalizeCategoryPayload,
  normalizeItemPayload,
  syncOperationSchema,
  toOperationList,
  type CategoryPatch,
  type ItemPatch,
} from './sync-schemas';

export interface ReconcileOptions {
  signal?: AbortSignal;
  userId?: string | null;
}

export interface SyncReconcilerOptions {
  clock?: Clock;
  logger?: Logger;
  audit?: AuditLog;
}

interface StoredEntity<TDto> {
  updatedAt: string;
  dto: TDto;
}

interface EntityHandler<TDto> {
  kind: CatalogEntityKind;
  load(vendorId: string, id: string): StoredEntity<TDto> | null;
  create(vendorId: string, id: string, data: Record<string, unknown>, stamp: WriteStamp): TDto;
  update(vendorId: string, id: string, data: Record<string, unknown>, stamp: WriteStamp): TDto;
  remove(vendorId: string, id: string, deletedAt: string): boolean;
}

type Applied<TDto> = { outcome: 'created' | 'updated' | 'stale'; data: TDto } | { outcome: 'deleted' };

function categoryFieldsFrom(patch: CategoryPatch, base: CatalogCategory | null): CategoryFields {
  return {
    name: patch.name ?? base?.name ?? '',
    description: patch.description !== undefined ? patch.description : base?.description ?? null,
    isActive: patch.is_active ?? base?.isActive ?? true,
    sortOrder: patch.sort_order ?? base?.sortOrder ?? 0,
  };
}

function itemFieldsFrom(patch: ItemPatch, base: CatalogItem | null): ItemFields {
  const pick = <T>(next: T | undefined, current: T | undefined, fallback: T): T =>
    next !== undefined ? next : current !== undefined ? current : fallback;

  return {
    name: pick(patch.name, base?.name, ''),
    description: pick(patch.description, base?.description, null),
    pricePaise: pick(patch.price, base?.pricePaise, 0),
    mrpPricePaise: pick(patch.mrp_price, base?.mrpPricePaise, null),
    priceType: pick(patch.price_type, base?.priceType, 'exclusive'),
    hsnCode: pick(patch.hsn_code, base?.hsnCode, null),
    hsnGstBp: pick(patch.hsn_gst_percentage, base?.hsnGstBp, null),
    vegNonveg: pick(patch.veg_nonveg, base?.vegNonveg, null),
    stockQuantity: pick(patch.stock_quantity, base?.stockQuantity, 0),
    sku: pick(patch.sku, base?.sku, null),
    barcode: pick(patch.barcode, base?.barcode, null),
    isActive: pick(patch.is_active, base?.isActive, true),
    sortOrder: pick(patch.sort_order, base?.sortOrder, 0),
    categoryIds: Array.from(new Set(pick(patch.category_ids, base?.categoryIds, []))),
  };
}

/**
 * Applies batches of device catalog operations with last-write-wins on the operation timestamp.
 * Each operation commits or fails on its own.
 */
export class SyncReconciler {
  private readonly repository: CatalogRepository;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly audit: AuditLog;
  private readonly items: EntityHandler<ItemDto>;
  private readonly categories: EntityHandler<CategoryDto>;

  constructor(repository: CatalogRepository, options: SyncReconcilerOptions = {}) {
    this.repository = repository;
    this.clock = options.clock ?? new MonotonicClock();
    this.logger = options.logger ?? createConsoleLogger('sync-reconciler');
    this.audit = options.audit ?? createConsoleAuditLog();
    this.items = this.createItemHandler();
    this.categories = this.createCategoryHandler();
  }

  reconcile(vendorId: string, kind: 'item', batch: unknown, options?: ReconcileOptions): Promise<SyncBatchResult<ItemDto>>;
  reconcile(
    vendorId: string,
    kind: 'category',
    batch: unknown,
    options?: ReconcileOptions,
  ): Promise<SyncBatchResult<CategoryDto>>;
  reconcile(
    vendorId: string,
    kind: CatalogEntityKind,
    batch: unknown,
    options: ReconcileOptions = {},
  ): Promise<SyncBatchResult<ItemDto> | SyncBatchResult<CategoryDto>> {
    return kind === 'item'
      ? this.run(vendorId, this.items, batch, options)
      : this.run(vendorId, this.categories, batch, options);
  }

  pullChanges(vendorId: string, kind: 'item', since: string | null): PullResult<ItemDto>;
  pullChanges(vendorId: string, kind: 'category', since: string | null): PullResult<CategoryDto>;
  pullChanges(
    vendorId: string,
    kind: CatalogEntityKind,
    since: string | null,
  ): PullResult<ItemDto> | PullResult<CategoryDto> {
    let cursor: string | null = null;
    if (since !== null && since !== '') {
      const parsed = parseClientTimestamp(since);
      if (!parsed) {
        throw new ValidationError('since must be an ISO-8601 timestamp.', { field: 'since' });
      }
      cursor = parsed.toISOString();
    }

    const serverTime = this.clock.now().toISOString();
    const deletedIds = this.repository.listTombstonesSince(vendorId, kind, cursor);

    if (kind === 'item') {
      const entities = this.repository.listItemsModifiedSince(vendorId, cursor).map(toItemDto);
      return { count: entities.length, entities, deleted_ids: deletedIds, server_time: serverTime };
    }
    const entities = this.repository.listCategoriesModifiedSince(vendorId, cursor).map(toCategoryDto);
    return { count: entities.length, entities, deleted_ids: deletedIds, server_time: serverTime };
  }

  private async run<TDto>(
    vendorId: string,
    handler: EntityHandler<TDto>,
    batch: unknown,
    options: ReconcileOptions,
  ): Promise<SyncBatchResult<TDto>> {
    const operations = toOperationList(batch);
    const results: SyncOperationResult<TDto>[] = [];

    for (let index = 0; index < operations.length; index += 1) {
      if (index > 0) {
        // Lets a client disconnect abort the rest of a long batch.
        await nextTurn();
      }
      results.push(this.applyOne(vendorId, handler, operations[index], options));
    }

    const errors = results.filter((result) => result.status === 'error');
    const synced = results.length - errors.length;
    if (errors.length) {
      this.logger.warn(`${handler.kind} batch finished with errors`, {
        vendorId,
        synced,
        failed: errors.length,
      });
    }
    return { synced, results, errors };
  }

  private applyOne<TDto>(
    vendorId: string,
    handler: EntityHandler<TDto>,
    raw: unknown,
    options: ReconcileOptions,
  ): SyncOperationResult<TDto> {
    let entityId: string | null = null;
    let operation: SyncOperationType | null = null;

    try {
      const envelope = parseOrThrow(syncOperationSchema, raw, 'Invalid sync operation.');
      operation = envelope.operation;
      const data = envelope.data ?? envelope.payload ?? {};
      const dataId = isPlainObject(data) && typeof data.id === 'string' ? data.id.trim() : '';
      entityId = dataId || envelope.entity_id || envelope.id || null;
      if (entityId !== null) {
        entityId = parseOrThrow(entityIdSchema, entityId, 'Invalid entity id.');
      }
      if (options.signal?.aborted) {
        throw new CancelledError();
      }

      const applied = this.applyOperation(vendorId, handler, operation, entityId, data, envelope.timestamp);
      if (applied.outcome === 'created' && entityId === null && 'data' in applied) {
        entityId = this.dtoId(applied.data);
      }

      const outcome = applied.outcome;
      if (outcome !== 'stale') {
        this.audit.record(`catalog.${handler.kind}.${outcome}`, {
          vendorId,
          entityId,
          userId: options.userId ?? null,
        });
      }

      return { entity_id: entityId, operation, status: 'success', ...applied };
    } catch (caught) {
      let error = caught;
      if (isSqliteBusy(caught)) {
        this.logger.warn(`${handler.kind} operation hit a locked database`, { vendorId, entityId, operation });
        error = new BusyError('Catalog is busy, retry the operation.', caught);
      }
      if (!(error instanceof PosSyncError)) {
        this.logger.error(`${handler.kind} operation failed`, {
          vendorId,
          entityId,
          operation,
          error: error instanceof Error ? error.stack ?? error.message : String(error),
        });
      }
      return { entity_id: entityId, operation, status: 'error', error: toErrorBody(error) };
    }
  }

  private applyOperation<TDto>(
    vendorId: string,
    handler: EntityHandler<TDto>,
    operation: SyncOperationType,
    entityId: string | null,
    data: Record<string, unknown>,
    rawTimestamp: unknown,
  ): Applied<TDto> {
    const serverNowMs = this.clock.now().getTime();
    const serverNow = new Date(serverNowMs).toISOString();

    if (operation === 'delete') {
      if (entityId === null) {
        throw new ValidationError(`${handler.kind} id is required for delete.`);
      }
      const id = entityId;
      const removed = this.repository.transaction(() => handler.remove(vendorId, id, serverNow));
      if (!removed) {
        throw new NotFoundError(`${handler.kind} ${id} not found.`);
      }
      return { outcome: 'deleted' };
    }

    const writeMicros = parseClientInstant(rawTimestamp)?.micros ?? serverNowMs * 1000;
    const updatedAt = formatInstant(writeMicros);
    const stamp: WriteStamp = { updatedAt, serverModifiedAt: serverNow };
    const id = entityId ?? randomUUID();

    return this.repository.transaction(() => {
      const existing = handler.load(vendorId, id);
      if (!existing) {
        return { outcome: 'created' as const, data: handler.create(vendorId, id, data, stamp) };
      }
      const storedMicros = parseClientInstant(existing.updatedAt)?.micros ?? Number.NEGATIVE_INFINITY;
      if (writeMicros <= storedMicros) {
        return { outcome: 'stale' as const, data: existing.dto };
      }
      return { outcome: 'updated' as const, data: handler.update(vendorId, id, data, stamp) };
    });
  }

  private dtoId(dto: unknown): string | null {
    return isPlainObject(dto) && typeof dto.id === 'string' ? dto.id : null;
  }

  private assertCategoriesUsable(vendorId: string, categoryIds: string[]): void {
    const unusable = this.repository.findUnusableCategoryIds(vendorId, categoryIds);
    if (unusable.length) {
      throw new ValidationError('One or more categories not found, inactive, or owned by another vendor.', {
        category_ids: unusable,
      });
    }
  }

  private assertCategoryNameFree(vendorId: string, name: string, id: string): void {
    if (this.repository.categoryNameTaken(vendorId, name, id)) {
      throw new ValidationError(`A category named "${name}" already exists.`, { field: 'name' });
    }
  }

  private createItemHandler(): EntityHandler<ItemDto> {
    const repository = this.repository;
    return {
      kind: 'item',
      load: (vendorId, id) => {
        const item = repository.getItem(vendorId, id);
        return item ? { updatedAt: item.updatedAt, dto: toItemDto(item) } : null;
      },
      create: (vendorId, id, data, stamp) => {
        const patch = parseOrThrow(itemCreateSchema, normalizeItemPayload(data), 'Invalid item.');
        const fields = itemFieldsFrom(patch, null);
        this.assertCategoriesUsable(vendorId, fields.categoryIds);
        return toItemDto(repository.insertItem(vendorId, id, fields, stamp));
      },
      update: (vendorId, id, data, stamp) => {
        const patch = parseOrThrow(itemPatchSchema, normalizeItemPayload(data), 'Invalid item.');
        const current = repository.getItem(vendorId, id);
        if (!current) {
          throw new NotFoundError(`item ${id} not found.`);
        }
        if (patch.category_ids !== undefined) {
          this.assertCategoriesUsable(vendorId, patch.category_ids);
        }
        return toItemDto(repository.updateItem(vendorId, id, itemFieldsFrom(patch, current), stamp));
      },
      remove: (vendorId, id, deletedAt) => repository.deleteItem(vendorId, id, deletedAt),
    };
  }

  private createCategoryHandler(): EntityHandler<CategoryDto> {
    const repository = this.repository;
    return {
      kind: 'category',
      load: (vendorId, id) => {
        const category = repository.getCategory(vendorId, id);
        return category ? { updatedAt: category.updatedAt, dto: toCategoryDto(category) } : null;
      },
      create: (vendorId, id, data, stamp) => {
        const patch = parseOrThrow(categoryCreateSchema, normalizeCategoryPayload(data), 'Invalid category.');
        const fields = categoryFieldsFrom(patch, null);
        this.assertCategoryNameFree(vendorId, fields.name, id);
        return toCategoryDto(repository.insertCategory(vendorId, id, fields, stamp));
      },
      update: (vendorId, id, data, stamp) => {
        const patch = parseOrThrow(categoryPatchSchema, normalizeCategoryPayload(data), 'Invalid category.');
        const current = repository.getCategory(vendorId, id);
        if (!current) {
          throw new NotFoundError(`category ${id} not found.`);
        }
        const fields = categoryFieldsFrom(patch, current);
        this.assertCategoryNameFree(vendorId, fields.name, id);
        return toCategoryDto(repository.updateCategory(vendorId, id, fields, stamp));
      },
      remove: (vendorId, id, deletedAt) => repository.deleteCategory(vendorId, id, deletedAt),
    };
  }
}
