export interface LocalMigration {
  version: number;
  name: string;
  sql: string;
}

export const POS_SYNC_MIGRATIONS: LocalMigration[] = [
  {
    version: 20261019090001,
    name: 'vendors_and_members',
    sql: `
      CREATE TABLE IF NOT EXISTS vendors (
        id TEXT PRIMARY KEY,
        owner_user_id TEXT NOT NULL UNIQUE,
        business_name TEXT,
        phone TEXT,
        address TEXT,
        gst_no TEXT UNIQUE,
        fssai_license TEXT,
        footer_note TEXT,
        is_approved INTEGER NOT NULL DEFAULT 0 CHECK(is_approved IN (0, 1)),
        service_code TEXT,
        service_gst_bp INTEGER CHECK(service_gst_bp IS NULL OR service_gst_bp >= 0),
        bill_prefix TEXT,
        bill_starting_number INTEGER NOT NULL DEFAULT 1 CHECK(bill_starting_number >= 1),
        last_bill_number INTEGER NOT NULL DEFAULT 0 CHECK(last_bill_number >= 0),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS vendor_members (
        id TEXT PRIMARY KEY,
        vendor_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        is_owner INTEGER NOT NULL DEFAULT 0 CHECK(is_owner IN (0, 1)),
        is_active INTEGER NOT NULL DEFAULT 1 CHECK(is_active IN (0, 1)),
        created_at TEXT NOT NULL,
        created_by TEXT,
        FOREIGN KEY (vendor_id) REFERENCES vendors(id) ON DELETE CASCADE
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_vendor_members_vendor_user
      ON vendor_members(vendor_id, user_id);

      CREATE INDEX IF NOT EXISTS idx_vendor_members_user_active
      ON vendor_members(user_id, is_active);
    `,
  },
  {
    version: 20261019090002,
    name: 'catalog_entities',
    sql: `
      CREATE TABLE IF NOT EXISTS catalog_categories (
        vendor_id TEXT NOT NULL,
        id TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        is_active INTEGER NOT NULL DEFAULT 1 CHECK(is_active IN (0, 1)),
        sort_order INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        server_modified_at TEXT NOT NULL,
        PRIMARY KEY (vendor_id, id),
        FOREIGN KEY (vendor_id) REFERENCES vendors(id) ON DELETE CASCADE
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_catalog_categories_vendor_name
      ON catalog_categories(vendor_id, name);

      CREATE INDEX IF NOT EXISTS idx_catalog_categories_vendor_modified
      ON catalog_categories(vendor_id, server_modified_at);

      CREATE TABLE IF NOT EXISTS catalog_items (
        vendor_id TEXT NOT NULL,
        id TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        price_paise INTEGER NOT NULL CHECK(price_paise >= 0),
        mrp_price_paise INTEGER CHECK(mrp_price_paise IS NULL OR mrp_price_paise >= 0),
        price_type TEXT NOT NULL DEFAULT 'exclusive' CHECK(price_type IN ('exclusive', 'inclusive')),
        hsn_code TEXT,
        hsn_gst_bp INTEGER CHECK(hsn_gst_bp IS NULL OR hsn_gst_bp >= 0),
        veg_nonveg TEXT CHECK(veg_nonveg IS NULL OR veg_nonveg IN ('veg', 'non_veg')),
        stock_quantity INTEGER NOT NULL DEFAULT 0 CHECK(stock_quantity >= 0),
        sku TEXT,
        barcode TEXT,
        is_active INTEGER NOT NULL DEFAULT 1 CHECK(is_active IN (0, 1)),
        sort_order INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        server_modified_at TEXT NOT NULL,
        PRIMARY KEY (vendor_id, id),
        FOREIGN KEY (vendor_id) REFERENCES vendors(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_catalog_items_vendor_modified
      ON catalog_items(vendor_id, server_modified_at);

      CREATE INDEX IF NOT EXISTS idx_catalog_items_vendor_barcode
      ON catalog_items(vendor_id, barcode);

      CREATE TABLE IF NOT EXISTS catalog_item_categories (
        vendor_id TEXT NOT NULL,
        item_id TEXT NOT NULL,
        category_id TEXT NOT NULL,
        PRIMARY KEY (vendor_id, item_id, category_id),
        FOREIGN KEY (vendor_id, item_id) REFERENCES catalog_items(vendor_id, id) ON DELETE CASCADE,
        FOREIGN KEY (vendor_id, category_id) REFERENCES catalog_categories(vendor_id, id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_catalog_item_categories_category
      ON catalog_item_categories(vendor_id, category_id);

      CREATE TABLE IF NOT EXISTS catalog_tombstones (
        vendor_id TEXT NOT NULL,
        entity_kind TEXT NOT NULL CHECK(entity_kind IN ('item', 'category')),
        entity_id TEXT NOT NULL,
        deleted_at TEXT NOT NULL,
        PRIMARY KEY (vendor_id, entity_kind, entity_id)
      );

      CREATE INDEX IF NOT EXISTS idx_catalog_tombstones_vendor_deleted
      ON catalog_tombstones(vendor_id, entity_kind, deleted_at);
    `,
  },
  {
    version: 20261019090003,
    name: 'bills_and_lines',
    sql: `
      CREATE TABLE IF NOT EXISTS bills (
        id TEXT PRIMARY KEY,
        vendor_id TEXT NOT NULL,
        device_id TEXT,
        invoice_number TEXT NOT NULL,
        bill_number TEXT,
        bill_date TEXT NOT NULL,
        billing_mode TEXT NOT NULL CHECK(billing_mode IN ('gst', 'non_gst')),
        tax_split TEXT NOT NULL CHECK(tax_split IN ('intra_state', 'inter_state')),
        restaurant_name TEXT,
        address TEXT,
        gstin TEXT,
        fssai_license TEXT,
        footer_note TEXT,
        customer_name TEXT,
        customer_phone TEXT,
        customer_email TEXT,
        customer_address TEXT,
        subtotal_paise INTEGER NOT NULL CHECK(subtotal_paise >= 0),
        discount_bp INTEGER NOT NULL DEFAULT 0 CHECK(discount_bp >= 0),
        discount_paise INTEGER NOT NULL DEFAULT 0 CHECK(discount_paise >= 0),
        total_tax_paise INTEGER NOT NULL DEFAULT 0 CHECK(total_tax_paise >= 0),
        cgst_paise INTEGER NOT NULL DEFAULT 0 CHECK(cgst_paise >= 0),
        sgst_paise INTEGER NOT NULL DEFAULT 0 CHECK(sgst_paise >= 0),
        igst_paise INTEGER NOT NULL DEFAULT 0 CHECK(igst_paise >= 0),
        total_paise INTEGER NOT NULL CHECK(total_paise >= 0),
        payment_mode TEXT NOT NULL DEFAULT 'cash',
        payment_reference TEXT,
        amount_paid_paise INTEGER CHECK(amount_paid_paise IS NULL OR amount_paid_paise >= 0),
        change_paise INTEGER NOT NULL DEFAULT 0 CHECK(change_paise >= 0),
        notes TEXT,
        table_number TEXT,
        waiter_name TEXT,
        created_at TEXT NOT NULL,
        synced_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (vendor_id) REFERENCES vendors(id) ON DELETE CASCADE
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_bills_vendor_invoice
      ON bills(vendor_id, invoice_number);

      CREATE INDEX IF NOT EXISTS idx_bills_vendor_updated
      ON bills(vendor_id, updated_at);

      CREATE INDEX IF NOT EXISTS idx_bills_vendor_date
      ON bills(vendor_id, bill_date);

      CREATE TABLE IF NOT EXISTS bill_items (
        id TEXT PRIMARY KEY,
        bill_id TEXT NOT NULL,
        vendor_id TEXT NOT NULL,
        line_no INTEGER NOT NULL,
        item_id TEXT,
        original_item_id TEXT,
        item_name TEXT NOT NULL,
        item_description TEXT,
        price_paise INTEGER NOT NULL CHECK(price_paise >= 0),
        mrp_price_paise INTEGER CHECK(mrp_price_paise IS NULL OR mrp_price_paise >= 0),
        price_type TEXT NOT NULL CHECK(price_type IN ('exclusive', 'inclusive')),
        hsn_code TEXT,
        gst_bp INTEGER NOT NULL DEFAULT 0 CHECK(gst_bp >= 0),
        quantity_milli INTEGER NOT NULL CHECK(quantity_milli >= 0),
        subtotal_paise INTEGER NOT NULL CHECK(subtotal_paise >= 0),
        gst_paise INTEGER NOT NULL DEFAULT 0 CHECK(gst_paise >= 0),
        veg_nonveg TEXT,
        unit TEXT,
        batch_number TEXT,
        expiry_date TEXT,
        created_at TEXT NOT NULL,
        FOREIGN KEY (bill_id) REFERENCES bills(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_bill_items_bill_line
      ON bill_items(bill_id, line_no);

      CREATE INDEX IF NOT EXISTS idx_bill_items_vendor_item
      ON bill_items(vendor_id, item_id);
    `,
  },
];
