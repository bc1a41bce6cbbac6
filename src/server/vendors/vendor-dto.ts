import { formatBasisPoints } from '../../shared/money';
import type { Vendor, VendorProfileDto } from '../../shared/vendors';

export function toVendorProfileDto(vendor: Vendor): VendorProfileDto {
  return {
    id: vendor.id,
    business_name: vendor.businessName,
    phone: vendor.phone,
    address: vendor.address,
    gst_no: vendor.gstNo,
    fssai_license: vendor.fssaiLicense,
    footer_note: vendor.footerNote,
    is_approved: vendor.isApproved,
    service_code: vendor.serviceCode,
    service_gst_percentage: vendor.serviceGstBp === null ? null : formatBasisPoints(vendor.serviceGstBp),
    bill_prefix: vendor.billPrefix,
    bill_starting_number: vendor.billStartingNumber,
  };
}
