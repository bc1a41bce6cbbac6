import { z } from 'zod';
import type { NewVendorInput } from '../../shared/vendors';
import { optionalText, percentField, requiredText } from '../validation';
import type { VendorProfilePatch } from './vendor-repository';

const profileFields = {
  business_name: optionalText(200).optional(),
  phone: optionalText(20).optional(),
  address: optionalText(500).optional(),
  gst_no: optionalText(15).optional(),
  fssai_license: optionalText(20).optional(),
  footer_note: optionalText(500).optional(),
  service_code: optionalText(10).optional(),
  service_gst_percentage: percentField.nullable().optional(),
};

/** Numbering has its own route, so its fields are refused here rather than dropped. */
export const vendorProfilePatchSchema = z.object(profileFields).strict();

export const vendorRegistrationSchema = z.object({
  ...profileFields,
  bill_prefix: optionalText(20).optional(),
  bill_starting_number: z.number().int().min(1).optional(),
});

export const staffMemberSchema = z.object({
  user_id: requiredText(150),
});

export type VendorProfileInput = z.infer<typeof vendorProfilePatchSchema>;
export type VendorRegistrationInput = z.infer<typeof vendorRegistrationSchema>;

export function toProfilePatch(input: VendorProfileInput): VendorProfilePatch {
  return {
    businessName: input.business_name,
    phone: input.phone,
    address: input.address,
    gstNo: input.gst_no,
    fssaiLicense: input.fssai_license,
    footerNote: input.footer_note,
    serviceCode: input.service_code,
    serviceGstBp: input.service_gst_percentage,
  };
}

/** New vendors start unapproved; approval is granted outside this service. */
export function toNewVendor(ownerUserId: string, input: VendorRegistrationInput): NewVendorInput {
  return {
    ownerUserId,
    businessName: input.business_name,
    phone: input.phone,
    address: input.address,
    gstNo: input.gst_no,
    fssaiLicense: input.fssai_license,
    footerNote: input.footer_note,
    serviceCode: input.service_code,
    serviceGstBp: input.service_gst_percentage,
    billPrefix: input.bill_prefix,
    billStartingNumber: input.bill_starting_number,
    isApproved: false,
  };
}
