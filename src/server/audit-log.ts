import { createConsoleLogger, type Logger } from './logger';

export type AuditEvent =
  | 'catalog.item.created'
  | 'catalog.item.updated'
  | 'catalog.item.deleted'
  | 'catalog.category.created'
  | 'catalog.category.updated'
  | 'catalog.category.deleted'
  | 'bill.created'
  | 'bill.ingested'
  | 'bill.updated'
  | 'vendor.numbering.updated'
  | 'vendor.registered'
  | 'vendor.profile.updated'
  | 'vendor.staff.added'
  | 'vendor.staff.removed';

export interface AuditLog {
  record(event: AuditEvent, details: Record<string, unknown>): void;
}

export function createConsoleAuditLog(logger: Logger = createConsoleLogger('audit')): AuditLog {
  return {
    record(event, details) {
      logger.info(event, { at: new Date().toISOString(), ...details });
    },
  };
}
