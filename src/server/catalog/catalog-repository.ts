import Database from 'better-sqlite3';
import type {
  CatalogCategory,
  CatalogEntityKind,
  CatalogItem,
  CategoryFields,
  ItemFields,
  PriceType,
  VegNonVeg,
} from '../../shared/catalog';

interface CategoryRow {
  vendor_id: string;
  id: string;
  name: string;
  description: string | null;
  is_active: number;
  sort_order: number;
  created_at: string;
  updated_at: string;
  server_modified_at: string;
}

interface ItemRow {
  vendor_id: string;
  id: string;
  name: string;
  description: string | null;
  price_paise: number;
  mrp_price_paise: number | null;
  price_type: PriceType;
  hsn_code: string | null;
  hsn_gst_bp: number | null;
  veg_nonveg: VegNonVeg | null;
  stock_quantity: number;
  sku: string | null;
  barcode: string | null;
  is_active: number;
  sort_order: number;
  created_at: string;
  updated_at: string;
  server_modified_at: string;
}

export interface WriteStamp {
  updatedAt: string;
  serverModifiedAt: string;
}

const CATEGORY_COLUMNS = `
  vendor_id, id, name, description, is_active, sort_order, created_at, updated_at, server_modified_at
`;

const ITEM_COLUMNS = `
  vendor_id, id, name, description, price_paise, mrp_price_paise, price_type, hsn_code, hsn_gst_bp,
  veg_nonveg, stock_quantity, sku, barcode, is_active, sort_order, created_at, updated_at, server_modified_at
`;

function mapCategoryRow(row: CategoryRow): CatalogCategory {
  return {
    id: row.id,
    vendorId: row.vendor_id,
    name: row.name,
    description: row.description,
    isActive: row.is_active === 1,
    sortOrder: Number(row.sort_order),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    serverModifiedAt: row.server_modified_at,
  };
}

export class CatalogRepository {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Runs `fn` under `BEGIN IMMEDIATE` so the read-compare-write holds the write lock from the start. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  getCategory(vendorId: string, id: string): CatalogCategory | null {
    const row = this.db
      .prepare(`SELECT ${CATEGORY_COLUMNS} FROM catalog_categories WHERE vendor_id = ? AND id = ? LIMIT 1`)
      .get(vendorId, id) as CategoryRow | undefined;
    return row ? mapCategoryRow(row) : null;
  }

  categoryNameTaken(vendorId: string, name: string, exceptId: string | null): boolean {
    const row = this.db
      .prepare(`
        SELECT id FROM catalog_categories
        WHERE vendor_id = @vendor_id AND name = @name AND id <> @except_id
        LIMIT 1
      `)
      .get({ vendor_id: vendorId, name, except_id: exceptId ?? '' }) as { id: string } | undefined;
    return Boolean(row);
  }

  /** Ids from `ids` that are not active categories of this vendor. */
  findUnusableCategoryIds(vendorId: string, ids: string[]): string[] {
    if (!ids.length) return [];
    const placeholders = ids.map(() => '?').join(', ');
    const rows = this.db
      .prepare(`
        SELECT id FROM catalog_categories
        WHERE vendor_id = ? AND is_active = 1 AND id IN (${placeholders})
      `)
      .all(vendorId, ...ids) as Array<{ id: string }>;
    const usable = new Set(rows.map((row) => row.id));
    return ids.filter((id) => !usable.has(id));
  }

  insertCategory(vendorId: string, id: string, fields: CategoryFields, stamp: WriteStamp): CatalogCategory {
    this.db.prepare(`
      INSERT INTO catalog_categories (${CATEGORY_COLUMNS})
      VALUES (
        @vendor_id, @id, @name, @description, @is_active, @sort_order,
        @created_at, @updated_at, @server_modified_at
      )
    `).run({
      vendor_id: vendorId,
      id,
      name: fields.name,
      description: fields.description,
      is_active: fields.isActive ? 1 : 0,
      sort_order: fields.sortOrder,
      created_at: stamp.serverModifiedAt,
      updated_at: stamp.updatedAt,
      server_modified_at: stamp.serverModifiedAt,
    });
    this.clearTombstone(vendorId, 'category', id);
    return this.requireCategory(vendorId, id);
  }

  updateCategory(vendorId: string, id: string, fields: CategoryFields, stamp: WriteStamp): CatalogCategory {
    this.db.prepare(`
      UPDATE catalog_categories SET
        name = @name,
        description = @description,
        is_active = @is_active,
        sort_order = @sort_order,
        updated_at = @updated_at,
        server_modified_at = @server_modified_at
      WHERE vendor_id = @vendor_id AND id = @id
    `).run({
      vendor_id: vendorId,
      id,
      name: fields.name,
      description: fields.description,
      is_active: fields.isActive ? 1 : 0,
      sort_order: fields.sortOrder,
      updated_at: stamp.updatedAt,
      server_modified_at: stamp.serverModifiedAt,
    });
    return this.requireCategory(vendorId, id);
  }

  /**
   * Removes the category and its item links. Items that lose the link are re-stamped so pulls pick
   * up their new category list.
   */
  deleteCategory(vendorId: string, id: string, deletedAt: string): boolean {
    this.db.prepare(`
      UPDATE catalog_items SET server_modified_at = @server_modified_at
      WHERE vendor_id = @vendor_id AND id IN (
        SELECT item_id FROM catalog_item_categories WHERE vendor_id = @vendor_id AND category_id = @id
      )
    `).run({ vendor_id: vendorId, id, server_modified_at: deletedAt });

    const result = this.db
      .prepare('DELETE FROM catalog_categories WHERE vendor_id = ? AND id = ?')
      .run(vendorId, id);
    if (result.changes === 0) return false;
    this.recordTombstone(vendorId, 'category', id, deletedAt);
    return true;
  }

  getItem(vendorId: string, id: string): CatalogItem | null {
    const row = this.db
      .prepare(`SELECT ${ITEM_COLUMNS} FROM catalog_items WHERE vendor_id = ? AND id = ? LIMIT 1`)
      .get(vendorId, id) as ItemRow | undefined;
    if (!row) return null;
    return this.mapItemRow(row, this.listItemCategoryIds(vendorId, [id]).get(id) ?? []);
  }

  insertItem(vendorId: string, id: string, fields: ItemFields, stamp: WriteStamp): CatalogItem {
    this.db.prepare(`
      INSERT INTO catalog_items (${ITEM_COLUMNS})
      VALUES (
        @vendor_id, @id, @name, @description, @price_paise, @mrp_price_paise, @price_type, @hsn_code,
        @hsn_gst_bp, @veg_nonveg, @stock_quantity, @sku, @barcode, @is_active, @sort_order,
        @created_at, @updated_at, @server_modified_at
      )
    `).run({
      ...this.itemParams(vendorId, id, fields, stamp),
      created_at: stamp.serverModifiedAt,
    });
    this.replaceItemCategories(vendorId, id, fields.categoryIds);
    this.clearTombstone(vendorId, 'item', id);
    return this.requireItem(vendorId, id);
  }

  updateItem(vendorId: string, id: string, fields: ItemFields, stamp: WriteStamp): CatalogItem {
    this.db.prepare(`
      UPDATE catalog_items SET
        name = @name,
        description = @description,
        price_paise = @price_paise,
        mrp_price_paise = @mrp_price_paise,
        price_type = @price_type,
        hsn_code = @hsn_code,
        hsn_gst_bp = @hsn_gst_bp,
        veg_nonveg = @veg_nonveg,
        stock_quantity = @stock_quantity,
        sku = @sku,
        barcode = @barcode,
        is_active = @is_active,
        sort_order = @sort_order,
        updated_at = @updated_at,
        server_modified_at = @server_modified_at
      WHERE vendor_id = @vendor_id AND id = @id
    `).run(this.itemParams(vendorId, id, fields, stamp));
    this.replaceItemCategories(vendorId, id, fields.categoryIds);
    return this.requireItem(vendorId, id);
  }

  /** Bill lines keep their snapshot; only their link to the item is cleared. */
  deleteItem(vendorId: string, id: string, deletedAt: string): boolean {
    const result = this.db
      .prepare('DELETE FROM catalog_items WHERE vendor_id = ? AND id = ?')
      .run(vendorId, id);
    if (result.changes === 0) return false;
    this.db
      .prepare('UPDATE bill_items SET item_id = NULL WHERE vendor_id = ? AND item_id = ?')
      .run(vendorId, id);
    this.recordTombstone(vendorId, 'item', id, deletedAt);
    return true;
  }

  listCategoriesModifiedSince(vendorId: string, since: string | null): CatalogCategory[] {
    const rows = this.db
      .prepare(`
        SELECT ${CATEGORY_COLUMNS}
        FROM catalog_categories
        WHERE vendor_id = @vendor_id AND (@since IS NULL OR server_modified_at > @since)
        ORDER BY server_modified_at ASC, sort_order ASC, name ASC
      `)
      .all({ vendor_id: vendorId, since }) as CategoryRow[];
    return rows.map(mapCategoryRow);
  }

  listItemsModifiedSince(vendorId: string, since: string | null): CatalogItem[] {
    const rows = this.db
      .prepare(`
        SELECT ${ITEM_COLUMNS}
        FROM catalog_items
        WHERE vendor_id = @vendor_id AND (@since IS NULL OR server_modified_at > @since)
        ORDER BY server_modified_at ASC, sort_order ASC, name ASC
      `)
      .all({ vendor_id: vendorId, since }) as ItemRow[];
    const categoryIds = this.listItemCategoryIds(
      vendorId,
      rows.map((row) => row.id),
    );
    return rows.map((row) => this.mapItemRow(row, categoryIds.get(row.id) ?? []));
  }

  listTombstonesSince(vendorId: string, kind: CatalogEntityKind, since: string | null): string[] {
    const rows = this.db
      .prepare(`
        SELECT entity_id
        FROM catalog_tombstones
        WHERE vendor_id = @vendor_id AND entity_kind = @kind AND (@since IS NULL OR deleted_at > @since)
        ORDER BY deleted_at ASC
      `)
      .all({ vendor_id: vendorId, kind, since }) as Array<{ entity_id: string }>;
    return rows.map((row) => row.entity_id);
  }

  private requireCategory(vendorId: string, id: string): CatalogCategory {
    const category = this.getCategory(vendorId, id);
    if (!category) {
      throw new Error(`Category ${id} vanished during write.`);
    }
    return category;
  }

  private requireItem(vendorId: string, id: string): CatalogItem {
    const item = this.getItem(vendorId, id);
    if (!item) {
      throw new Error(`Item ${id} vanished during write.`);
    }
    return item;
  }

  private itemParams(vendorId: string, id: string, fields: ItemFields, stamp: WriteStamp) {
    return {
      vendor_id: vendorId,
      id,
      name: fields.name,
      description: fields.description,
      price_paise: fields.pricePaise,
      mrp_price_paise: fields.mrpPricePaise,
      price_type: fields.priceType,
      hsn_code: fields.hsnCode,
      hsn_gst_bp: fields.hsnGstBp,
      veg_nonveg: fields.vegNonveg,
      stock_quantity: fields.stockQuantity,
      sku: fields.sku,
      barcode: fields.barcode,
      is_active: fields.isActive ? 1 : 0,
      sort_order: fields.sortOrder,
      updated_at: stamp.updatedAt,
      server_modified_at: stamp.serverModifiedAt,
    };
  }

  private mapItemRow(row: ItemRow, categoryIds: string[]): CatalogItem {
    return {
      id: row.id,
      vendorId: row.vendor_id,
      name: row.name,
      description: row.description,
      pricePaise: Number(row.price_paise),
      mrpPricePaise: row.mrp_price_paise === null ? null : Number(row.mrp_price_paise),
      priceType: row.price_type,
      hsnCode: row.hsn_code,
      hsnGstBp: row.hsn_gst_bp === null ? null : Number(row.hsn_gst_bp),
      vegNonveg: row.veg_nonveg,
      stockQuantity: Number(row.stock_quantity),
      sku: row.sku,
      barcode: row.barcode,
      isActive: row.is_active === 1,
      sortOrder: Number(row.sort_order),
      categoryIds,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      serverModifiedAt: row.server_modified_at,
    };
  }

  private listItemCategoryIds(vendorId: string, itemIds: string[]): Map<string, string[]> {
    const byItem = new Map<string, string[]>();
    if (!itemIds.length) return byItem;

    // Chunked to stay under SQLite's bound-parameter limit.
    for (let offset = 0; offset < itemIds.length; offset += 500) {
      const chunk = itemIds.slice(offset, offset + 500);
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = this.db
        .prepare(`
          SELECT item_id, category_id
          FROM catalog_item_categories
          WHERE vendor_id = ? AND item_id IN (${placeholders})
          ORDER BY category_id ASC
        `)
        .all(vendorId, ...chunk) as Array<{ item_id: string; category_id: string }>;
      rows.forEach((row) => {
        const list = byItem.get(row.item_id) ?? [];
        list.push(row.category_id);
        byItem.set(row.item_id, list);
      });
    }
    return byItem;
  }

  private replaceItemCategories(vendorId: string, itemId: string, categoryIds: string[]): void {
    this.db
      .prepare('DELETE FROM catalog_item_categories WHERE vendor_id = ? AND item_id = ?')
      .run(vendorId, itemId);
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO catalog_item_categories (vendor_id, item_id, category_id)
      VALUES (@vendor_id, @item_id, @category_id)
    `);
    categoryIds.forEach((categoryId) => {
      insert.run({ vendor_id: vendorId, item_id: itemId, category_id: categoryId });
    });
  }

  private recordTombstone(vendorId: string, kind: CatalogEntityKind, id: string, deletedAt: string): void {
    this.db.prepare(`
      INSERT INTO catalog_tombstones (vendor_id, entity_kind, entity_id, deleted_at)
      VALUES (@vendor_id, @entity_kind, @entity_id, @deleted_at)
      ON CONFLICT(vendor_id, entity_kind, entity_id) DO UPDATE SET deleted_at = excluded.deleted_at
    `).run({ vendor_id: vendorId, entity_kind: kind, entity_id: id, deleted_at: deletedAt });
  }

  private clearTombstone(vendorId: string, kind: CatalogEntityKind, id: string): void {
    this.db
      .prepare('DELETE FROM catalog_tombstones WHERE vendor_id = ? AND entity_kind = ? AND entity_id = ?')
      .run(vendorId, kind, id);
  }
}
