export interface Vendor {
  id: string;
  ownerUserId: string;
  businessName: string | null;
  phone: string | null;
  address: string | null;
  gstNo: string | null;
  fssaiLicense: string | null;
  footerNote: string | null;
  isApproved: boolean;
  serviceCode: string | null;
  serviceGstBp: number | null;
  billPrefix: string | null;
  billStartingNumber: number;
  lastBillNumber: number;
  createdAt: string;
  updatedAt: string;
}

export interface NewVendorInput {
  id?: string;
  ownerUserId: string;
  businessName?: string | null;
  phone?: string | null;
  address?: string | null;
  gstNo?: string | null;
  fssaiLicense?: string | null;
  footerNote?: string | null;
  isApproved?: boolean;
  serviceCode?: string | null;
  serviceGstBp?: number | null;
  billPrefix?: string | null;
  billStartingNumber?: number;
}

/** How the requesting user is attached to a vendor. */
export type VendorMembership =
  | { kind: 'owner'; vendor: Vendor }
  | { kind: 'staff'; vendor: Vendor; memberId: string }
  | { kind: 'none' };

export interface NumberingConfig {
  prefix: string;
  starting_number: number;
  last_issued: number;
  next_number: number;
  locked: boolean;
}

export interface NumberingConfigPatch {
  prefix?: string | null;
  startingNumber?: number;
}

export interface IssuedInvoiceNumber {
  invoiceNumber: string;
  billNumber: string;
  sequence: number;
}

export interface VendorProfileDto {
  id: string;
  business_name: string | null;
  phone: string | null;
  address: string | null;
  gst_no: string | null;
  fssai_license: string | null;
  footer_note: string | null;
  is_approved: boolean;
  service_code: string | null;
  service_gst_percentage: string | null;
  bill_prefix: string | null;
  bill_starting_number: number;
}

export interface StaffMemberDto {
  id: string;
  user_id: string;
  is_active: boolean;
}
