import type { CatalogCategory, CatalogItem, CategoryDto, ItemDto } from '../../shared/catalog';
import { formatBasisPoints, formatPaise } from '../../shared/money';

export function toCategoryDto(category: CatalogCategory): CategoryDto {
  return {
    id: category.id,
    vendor_id: category.vendorId,
    name: category.name,
    description: category.description,
    is_active: category.isActive,
    sort_order: category.sortOrder,
    created_at: category.createdAt,
    updated_at: category.updatedAt,
  };
}

export function toItemDto(item: CatalogItem): ItemDto {
  return {
    id: item.id,
    vendor_id: item.vendorId,
    name: item.name,
    description: item.description,
    price: formatPaise(item.pricePaise),
    mrp_price: item.mrpPricePaise === null ? null : formatPaise(item.mrpPricePaise),
    price_type: item.priceType,
    hsn_code: item.hsnCode,
    hsn_gst_percentage: item.hsnGstBp === null ? null : formatBasisPoints(item.hsnGstBp),
    veg_nonveg: item.vegNonveg,
    stock_quantity: item.stockQuantity,
    sku: item.sku,
    barcode: item.barcode,
    is_active: item.isActive,
    sort_order: item.sortOrder,
    category_ids: item.categoryIds.slice(),
    created_at: item.createdAt,
    updated_at: item.updatedAt,
  };
}
