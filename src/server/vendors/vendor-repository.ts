import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import type { NewVendorInput, Vendor, VendorMembership } from '../../shared/vendors';
import { NotFoundError, ValidationError } from '../errors';

export interface VendorRow {
  id: string;
  owner_user_id: string;
  business_name: string | null;
  phone: string | null;
  address: string | null;
  gst_no: string | null;
  fssai_license: string | null;
  footer_note: string | null;
  is_approved: number;
  service_code: string | null;
  service_gst_bp: number | null;
  bill_prefix: string | null;
  bill_starting_number: number;
  last_bill_number: number;
  created_at: string;
  updated_at: string;
}

export interface VendorProfilePatch {
  businessName?: string | null;
  phone?: string | null;
  address?: string | null;
  gstNo?: string | null;
  fssaiLicense?: string | null;
  footerNote?: string | null;
  serviceCode?: string | null;
  serviceGstBp?: number | null;
}

export const VENDOR_COLUMNS = `
  id, owner_user_id, business_name, phone, address, gst_no, fssai_license, footer_note,
  is_approved, service_code, service_gst_bp, bill_prefix, bill_starting_number,
  last_bill_number, created_at, updated_at
`;

export function mapVendorRow(row: VendorRow): Vendor {
  return {
    id: row.id,
    ownerUserId: row.owner_user_id,
    businessName: row.business_name,
    phone: row.phone,
    address: row.address,
    gstNo: row.gst_no,
    fssaiLicense: row.fssai_license,
    footerNote: row.footer_note,
    isApproved: row.is_approved === 1,
    serviceCode: row.service_code,
    serviceGstBp: row.service_gst_bp,
    billPrefix: row.bill_prefix,
    billStartingNumber: Number(row.bill_starting_number),
    lastBillNumber: Number(row.last_bill_number),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function cleanText(value: string | null | undefined): string | null {
  const text = String(value ?? '').trim();
  return text || null;
}

export class VendorRepository {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  createVendor(input: NewVendorInput): Vendor {
    const ownerUserId = String(input.ownerUserId || '').trim();
    if (!ownerUserId) {
      throw new ValidationError('ownerUserId is required.');
    }
    const startingNumber = input.billStartingNumber ?? 1;
    if (!Number.isInteger(startingNumber) || startingNumber < 1) {
      throw new ValidationError('bill_starting_number must be an integer >= 1.');
    }

    const now = new Date().toISOString();
    const id = cleanText(input.id) || randomUUID();

    const tx = this.db.transaction(() => {
      this.db.prepare(`
        INSERT INTO vendors (
          id, owner_user_id, business_name, phone, address, gst_no, fssai_license, footer_note,
          is_approved, service_code, service_gst_bp, bill_prefix, bill_starting_number,
          last_bill_number, created_at, updated_at
        ) VALUES (
          @id, @owner_user_id, @business_name, @phone, @address, @gst_no, @fssai_license, @footer_note,
          @is_approved, @service_code, @service_gst_bp, @bill_prefix, @bill_starting_number,
          0, @created_at, @updated_at
        )
      `).run({
        id,
        owner_user_id: ownerUserId,
        business_name: cleanText(input.businessName),
        phone: cleanText(input.phone),
        address: cleanText(input.address),
        gst_no: cleanText(input.gstNo),
        fssai_license: cleanText(input.fssaiLicense),
        footer_note: cleanText(input.footerNote),
        is_approved: input.isApproved ? 1 : 0,
        service_code: cleanText(input.serviceCode),
        service_gst_bp: input.serviceGstBp ?? null,
        bill_prefix: cleanText(input.billPrefix),
        bill_starting_number: startingNumber,
        created_at: now,
        updated_at: now,
      });

      this.db.prepare(`
        INSERT INTO vendor_members (id, vendor_id, user_id, is_owner, is_active, created_at, created_by)
        VALUES (@id, @vendor_id, @user_id, 1, 1, @created_at, NULL)
      `).run({ id: randomUUID(), vendor_id: id, user_id: ownerUserId, created_at: now });
    });
    tx();

    return this.requireVendor(id);
  }

  getVendor(vendorId: string): Vendor | null {
    const row = this.db
      .prepare(`SELECT ${VENDOR_COLUMNS} FROM vendors WHERE id = ? LIMIT 1`)
      .get(vendorId) as VendorRow | undefined;
    return row ? mapVendorRow(row) : null;
  }

  requireVendor(vendorId: string): Vendor {
    const vendor = this.getVendor(vendorId);
    if (!vendor) {
      throw new NotFoundError(`Vendor ${vendorId} not found.`);
    }
    return vendor;
  }

  /**
   * Owner first, then an active staff membership. A user with neither gets `none`.
   */
  resolveMembership(userId: string): VendorMembership {
    const normalized = String(userId || '').trim();
    if (!normalized) return { kind: 'none' };

    const ownerRow = this.db
      .prepare(`SELECT ${VENDOR_COLUMNS} FROM vendors WHERE owner_user_id = ? LIMIT 1`)
      .get(normalized) as VendorRow | undefined;
    if (ownerRow) {
      return { kind: 'owner', vendor: mapVendorRow(ownerRow) };
    }

    const memberRow = this.db
      .prepare(`
        SELECT id, vendor_id
        FROM vendor_members
        WHERE user_id = ? AND is_active = 1 AND is_owner = 0
        ORDER BY created_at ASC
        LIMIT 1
      `)
      .get(normalized) as { id: string; vendor_id: string } | undefined;
    if (!memberRow) return { kind: 'none' };

    const vendor = this.getVendor(memberRow.vendor_id);
    if (!vendor) return { kind: 'none' };
    return { kind: 'staff', vendor, memberId: memberRow.id };
  }

  addStaffMember(vendorId: string, userId: string, createdBy: string | null = null): string {
    this.requireVendor(vendorId);
    const normalized = String(userId || '').trim();
    if (!normalized) {
      throw new ValidationError('userId is required.');
    }
    const current = this.resolveMembership(normalized);
    if (current.kind === 'owner' || (current.kind === 'staff' && current.vendor.id !== vendorId)) {
      throw new ValidationError('This user already belongs to a vendor.', { field: 'user_id' });
    }

    const id = randomUUID();
    this.db.prepare(`
      INSERT INTO vendor_members (id, vendor_id, user_id, is_owner, is_active, created_at, created_by)
      VALUES (@id, @vendor_id, @user_id, 0, 1, @created_at, @created_by)
      ON CONFLICT(vendor_id, user_id) DO UPDATE SET is_active = 1
    `).run({
      id,
      vendor_id: vendorId,
      user_id: normalized,
      created_at: new Date().toISOString(),
      created_by: createdBy,
    });

    const row = this.db
      .prepare('SELECT id FROM vendor_members WHERE vendor_id = ? AND user_id = ? LIMIT 1')
      .get(vendorId, normalized) as { id: string } | undefined;
    return row ? row.id : id;
  }

  setStaffMemberActive(vendorId: string, userId: string, active: boolean): boolean {
    const result = this.db.prepare(`
      UPDATE vendor_members
      SET is_active = @is_active
      WHERE vendor_id = @vendor_id AND user_id = @user_id AND is_owner = 0
    `).run({ vendor_id: vendorId, user_id: userId, is_active: active ? 1 : 0 });
    return result.changes > 0;
  }

  updateProfile(vendorId: string, patch: VendorProfilePatch): Vendor {
    const current = this.requireVendor(vendorId);
    if (patch.serviceGstBp !== undefined && patch.serviceGstBp !== null) {
      if (!Number.isInteger(patch.serviceGstBp) || patch.serviceGstBp < 0) {
        throw new ValidationError('service_gst_percentage must be a non-negative percentage.');
      }
    }

    const pick = (next: string | null | undefined, fallback: string | null) =>
      next === undefined ? fallback : cleanText(next);

    this.db.prepare(`
      UPDATE vendors SET
        business_name = @business_name,
        phone = @phone,
        address = @address,
        gst_no = @gst_no,
        fssai_license = @fssai_license,
        footer_note = @footer_note,
        service_code = @service_code,
        service_gst_bp = @service_gst_bp,
        updated_at = @updated_at
      WHERE id = @id
    `).run({
      id: vendorId,
      business_name: pick(patch.businessName, current.businessName),
      phone: pick(patch.phone, current.phone),
      address: pick(patch.address, current.address),
      gst_no: pick(patch.gstNo, current.gstNo),
      fssai_license: pick(patch.fssaiLicense, current.fssaiLicense),
      footer_note: pick(patch.footerNote, current.footerNote),
      service_code: pick(patch.serviceCode, current.serviceCode),
      service_gst_bp: patch.serviceGstBp === undefined ? current.serviceGstBp : patch.serviceGstBp,
      updated_at: new Date().toISOString(),
    });
    return this.requireVendor(vendorId);
  }
}
