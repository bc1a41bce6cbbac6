import type { ZodError } from 'zod';

export type PosSyncErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'UNAUTHORIZED'
  | 'CONFIGURATION_LOCKED'
  | 'BUSY'
  | 'DUPLICATE_INVOICE'
  | 'CANCELLED'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL';

export interface ErrorBody {
  code: PosSyncErrorCode;
  message: string;
  details?: unknown;
  retryable?: true;
}

export class PosSyncError extends Error {
  readonly code: PosSyncErrorCode;
  readonly status: number;
  readonly retryable: boolean;
  readonly details?: unknown;

  constructor(
    code: PosSyncErrorCode,
    status: number,
    message: string,
    options: { retryable?: boolean; details?: unknown; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.retryable = options.retryable === true;
    this.details = options.details;
  }

  toBody(): ErrorBody {
    const body: ErrorBody = { code: this.code, message: this.message };
    if (this.details !== undefined) body.details = this.details;
    if (this.retryable) body.retryable = true;
    return body;
  }
}

export class ValidationError extends PosSyncError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', 400, message, { details });
  }

  static fromZod(error: ZodError, message = 'Invalid payload.'): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
}

export class NotFoundError extends PosSyncError {
  constructor(message: string) {
    super('NOT_FOUND', 404, message);
  }
}

export class ForbiddenError extends PosSyncError {
  constructor(message: string) {
    super('FORBIDDEN', 403, message);
  }
}

export class UnauthorizedError extends PosSyncError {
  constructor(message = 'Authentication required.') {
    super('UNAUTHORIZED', 401, message);
  }
}

export class ConfigurationLockedError extends PosSyncError {
  constructor(message: string) {
    super('CONFIGURATION_LOCKED', 409, message);
  }
}

export class BusyError extends PosSyncError {
  constructor(message: string, cause?: unknown) {
    super('BUSY', 503, message, { retryable: true, cause });
  }
}

export class DuplicateInvoiceError extends PosSyncError {
  constructor(vendorId: string, invoiceNumber: string, cause?: unknown) {
    super('DUPLICATE_INVOICE', 500, `Invoice ${invoiceNumber} already exists for vendor ${vendorId}.`, {
      cause,
      details: { vendor_id: vendorId, invoice_number: invoiceNumber },
    });
  }
}

export class CancelledError extends PosSyncError {
  constructor(message = 'Operation cancelled before it was applied.') {
    super('CANCELLED', 499, message, { retryable: true });
  }
}

export class PayloadTooLargeError extends PosSyncError {
  constructor(limitBytes: number) {
    super('PAYLOAD_TOO_LARGE', 413, `Payload exceeds ${limitBytes} bytes.`);
  }
}

export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof PosSyncError) return error.toBody();
  const message = error instanceof Error ? error.message : 'Internal server error';
  return { code: 'INTERNAL', message };
}

export function errorStatus(error: unknown): number {
  return error instanceof PosSyncError ? error.status : 500;
}

function sqliteCode(error: unknown): string | null {
  if (!(error instanceof Error) || !('code' in error)) return null;
  return typeof error.code === 'string' ? error.code : null;
}

export function isSqliteBusy(error: unknown): boolean {
  const code = sqliteCode(error);
  return code === 'SQLITE_BUSY' || code === 'SQLITE_BUSY_SNAPSHOT' || code === 'SQLITE_LOCKED';
}

export function isUniqueViolation(error: unknown): boolean {
  const code = sqliteCode(error);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}
