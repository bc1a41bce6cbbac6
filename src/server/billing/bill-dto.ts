import type { Bill, BillDto, BillLine, BillLineDto } from '../../shared/bills';
import { formatBasisPoints, formatMilli, formatPaise } from '../../shared/money';

function toBillLineDto(line: BillLine): BillLineDto {
  return {
    id: line.id,
    item_id: line.itemId,
    original_item_id: line.originalItemId,
    item_name: line.itemName,
    item_description: line.itemDescription,
    price: formatPaise(line.pricePaise),
    mrp_price: line.mrpPricePaise === null ? null : formatPaise(line.mrpPricePaise),
    price_type: line.priceType,
    hsn_code: line.hsnCode,
    gst_percentage: formatBasisPoints(line.gstBp),
    quantity: formatMilli(line.quantityMilli),
    subtotal: formatPaise(line.subtotalPaise),
    item_gst_amount: formatPaise(line.gstPaise),
    veg_nonveg: line.vegNonveg,
    unit: line.unit,
    batch_number: line.batchNumber,
    expiry_date: line.expiryDate,
    created_at: line.createdAt,
  };
}

export function toBillDto(bill: Bill): BillDto {
  return {
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
    subtotal: formatPaise(bill.subtotalPaise),
    discount_percentage: formatBasisPoints(bill.discountBp),
    discount_amount: formatPaise(bill.discountPaise),
    total_tax: formatPaise(bill.totalTaxPaise),
    cgst_amount: formatPaise(bill.cgstPaise),
    sgst_amount: formatPaise(bill.sgstPaise),
    igst_amount: formatPaise(bill.igstPaise),
    total_amount: formatPaise(bill.totalPaise),
    payment_mode: bill.paymentMode,
    payment_reference: bill.paymentReference,
    amount_paid: bill.amountPaidPaise === null ? null : formatPaise(bill.amountPaidPaise),
    change_amount: formatPaise(bill.changePaise),
    notes: bill.notes,
    table_number: bill.tableNumber,
    waiter_name: bill.waiterName,
    created_at: bill.createdAt,
    synced_at: bill.syncedAt,
    updated_at: bill.updatedAt,
    items: bill.lines.map(toBillLineDto),
  };
}
