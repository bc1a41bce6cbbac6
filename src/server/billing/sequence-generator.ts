import Database from 'better-sqlite3';
import type { IssuedInvoiceNumber, NumberingConfig, NumberingConfigPatch } from '../../shared/vendors';
import { BusyError, ConfigurationLockedError, NotFoundError, ValidationError, isSqliteBusy } from '../errors';
import { createConsoleLogger, type Logger } from '../logger';

export const DEFAULT_BILL_PREFIX = 'INV';

export interface SequenceGeneratorOptions {
  lockRetries?: number;
  lockBackoffMs?: number;
  logger?: Logger;
}

interface CounterRow {
  bill_prefix: string | null;
  bill_starting_number: number;
  last_bill_number: number;
}

export function effectivePrefix(prefix: string | null | undefined): string {
  return String(prefix ?? '').trim().toUpperCase() || DEFAULT_BILL_PREFIX;
}

export function formatInvoiceNumbers(prefix: string, sequence: number, now: Date): IssuedInvoiceNumber {
  const padded = String(sequence).padStart(4, '0');
  const date = now.toISOString().slice(0, 10);
  return {
    invoiceNumber: `${prefix}-${date}-${padded}`,
    billNumber: `${prefix}-${padded}`,
    sequence,
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Issues vendor invoice numbers from the counter on the vendor row. Every read-modify-write of the
 * counter runs inside `BEGIN IMMEDIATE`, which holds the database write lock across processes.
 */
export class SequenceGenerator {
  private db: Database.Database;
  private readonly lockRetries: number;
  private readonly lockBackoffMs: number;
  private readonly logger: Logger;

  constructor(db: Database.Database, options: SequenceGeneratorOptions = {}) {
    this.db = db;
    this.lockRetries = Math.max(1, options.lockRetries ?? 3);
    this.lockBackoffMs = Math.max(0, options.lockBackoffMs ?? 100);
    this.logger = options.logger ?? createConsoleLogger('sequence');
  }

  async nextInvoiceNumber(vendorId: string, now: Date = new Date()): Promise<IssuedInvoiceNumber> {
    return this.issueWithin(vendorId, (numbers) => numbers, now);
  }

  /**
   * Runs `fn` in the transaction that advances the counter. If `fn` throws, the counter is rolled back
   * with it and no number is consumed.
   */
  async issueWithin<T>(vendorId: string, fn: (numbers: IssuedInvoiceNumber) => T, now: Date = new Date()): Promise<T> {
    const tx = this.db.transaction(() => {
      const numbers = this.advance(vendorId, now);
      return fn(numbers);
    });
    return this.withLockRetry(vendorId, () => tx.immediate());
  }

  getNumberingConfig(vendorId: string): NumberingConfig {
    const row = this.readCounter(vendorId);
    return this.toConfig(row, this.isLocked(vendorId, row));
  }

  async setNumberingConfig(vendorId: string, patch: NumberingConfigPatch): Promise<NumberingConfig> {
    if (patch.startingNumber !== undefined) {
      if (!Number.isInteger(patch.startingNumber) || patch.startingNumber < 1) {
        throw new ValidationError('starting_number must be an integer >= 1.', {
          field: 'starting_number',
        });
      }
    }

    const tx = this.db.transaction(() => {
      const row = this.readCounter(vendorId);
      const locked = this.isLocked(vendorId, row);
      const startingNumber = patch.startingNumber ?? row.bill_starting_number;

      if (startingNumber !== row.bill_starting_number && locked) {
        throw new ConfigurationLockedError(
          'starting_number cannot be changed after the first bill has been issued.',
        );
      }

      const prefix =
        patch.prefix === undefined ? row.bill_prefix : String(patch.prefix ?? '').trim().toUpperCase() || null;

      this.db.prepare(`
        UPDATE vendors
        SET bill_prefix = @bill_prefix,
            bill_starting_number = @bill_starting_number,
            updated_at = @updated_at
        WHERE id = @id
      `).run({
        id: vendorId,
        bill_prefix: prefix,
        bill_starting_number: startingNumber,
        updated_at: new Date().toISOString(),
      });

      return this.toConfig({ ...row, bill_prefix: prefix, bill_starting_number: startingNumber }, locked);
    });

    const config = await this.withLockRetry(vendorId, () => tx.immediate());
    this.logger.info('numbering config updated', { vendorId, prefix: config.prefix, startingNumber: config.starting_number });
    return config;
  }

  private advance(vendorId: string, now: Date): IssuedInvoiceNumber {
    const row = this.readCounter(vendorId);

    let last = Number(row.last_bill_number);
    if (last === 0 && row.bill_starting_number > 1) {
      last = row.bill_starting_number - 1;
    }
    last += 1;

    this.db.prepare('UPDATE vendors SET last_bill_number = @last WHERE id = @id').run({ id: vendorId, last });
    return formatInvoiceNumbers(effectivePrefix(row.bill_prefix), last, now);
  }

  private readCounter(vendorId: string): CounterRow {
    const row = this.db
      .prepare('SELECT bill_prefix, bill_starting_number, last_bill_number FROM vendors WHERE id = ? LIMIT 1')
      .get(vendorId) as CounterRow | undefined;
    if (!row) {
      throw new NotFoundError(`Vendor ${vendorId} not found.`);
    }
    return row;
  }

  private isLocked(vendorId: string, row: CounterRow): boolean {
    if (Number(row.last_bill_number) > 0) return true;
    const bills = this.db
      .prepare('SELECT 1 AS present FROM bills WHERE vendor_id = ? LIMIT 1')
      .get(vendorId) as { present: number } | undefined;
    return Boolean(bills);
  }

  private toConfig(row: CounterRow, locked: boolean): NumberingConfig {
    const last = Number(row.last_bill_number);
    const next = last === 0 ? Math.max(1, row.bill_starting_number) : last + 1;
    return {
      prefix: effectivePrefix(row.bill_prefix),
      starting_number: Number(row.bill_starting_number),
      last_issued: last,
      next_number: next,
      locked,
    };
  }

  private async withLockRetry<T>(vendorId: string, run: () => T): Promise<T> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.lockRetries; attempt += 1) {
      try {
        return run();
      } catch (error) {
        if (!isSqliteBusy(error)) throw error;
        lastError = error;
        this.logger.warn('counter lock busy', { vendorId, attempt, of: this.lockRetries });
        if (attempt < this.lockRetries) {
          await sleep(this.lockBackoffMs * 2 ** (attempt - 1));
        }
      }
    }

    this.logger.error('counter lock not acquired', { vendorId, attempts: this.lockRetries });
    throw new BusyError('Invoice counter is busy, retry the request.', lastError);
  }
}
