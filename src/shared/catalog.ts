export type CatalogEntityKind = 'item' | 'category';

export type PriceType = 'exclusive' | 'inclusive';

export type VegNonVeg = 'veg' | 'non_veg';

export interface CategoryFields {
  name: string;
  description: string | null;
  isActive: boolean;
  sortOrder: number;
}

export interface CatalogCategory extends CategoryFields {
  id: string;
  vendorId: string;
  createdAt: string;
  updatedAt: string;
  serverModifiedAt: string;
}

export interface ItemFields {
  name: string;
  description: string | null;
  pricePaise: number;
  mrpPricePaise: number | null;
  priceType: PriceType;
  hsnCode: string | null;
  hsnGstBp: number | null;
  vegNonveg: VegNonVeg | null;
  stockQuantity: number;
  sku: string | null;
  barcode: string | null;
  isActive: boolean;
  sortOrder: number;
  categoryIds: string[];
}

export interface CatalogItem extends ItemFields {
  id: string;
  vendorId: string;
  createdAt: string;
  updatedAt: string;
  serverModifiedAt: string;
}

export interface CategoryDto {
  id: string;
  vendor_id: string;
  name: string;
  description: string | null;
  is_active: boolean;
  sort_order: number;
  created_at: string;
  updated_at: string;
}

export interface ItemDto {
  id: string;
  vendor_id: string;
  name: string;
  description: string | null;
  price: string;
  mrp_price: string | null;
  price_type: PriceType;
  hsn_code: string | null;
  hsn_gst_percentage: string | null;
  veg_nonveg: VegNonVeg | null;
  stock_quantity: number;
  sku: string | null;
  barcode: string | null;
  is_active: boolean;
  sort_order: number;
  category_ids: string[];
  created_at: string;
  updated_at: string;
}

export type SyncOperationType = 'create' | 'update' | 'delete';

export type SyncOutcome = 'created' | 'updated' | 'deleted' | 'stale';

export interface SyncErrorBody {
  code: string;
  message: string;
  details?: unknown;
  retryable?: true;
}

export interface SyncOperationResult<TDto> {
  entity_id: string | null;
  operation: SyncOperationType | null;
  status: 'success' | 'error';
  outcome?: SyncOutcome;
  data?: TDto;
  error?: SyncErrorBody;
}

export interface SyncBatchResult<TDto> {
  synced: number;
  results: SyncOperationResult<TDto>[];
  errors: SyncOperationResult<TDto>[];
}

export interface PullResult<TDto> {
  count: number;
  entities: TDto[];
  deleted_ids: string[];
  server_time: string;
}
