import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { parseBasisPoints } from '../../shared/money';

export const HSN_RATES_FILE = 'hsn-rates.json';
export const SAC_RATES_FILE = 'sac-rates.json';

const percentSchema = z.union([z.number(), z.string()]);

const rateFileSchema = z.record(
  z.string(),
  z.object({
    description: z.string().optional(),
    default: percentSchema.optional(),
    gst_percentage: percentSchema.optional(),
  }),
);

export interface RateTableSource {
  hsn?: Record<string, number>;
  service?: Record<string, number>;
}

export function normalizeTaxCode(code: string | null | undefined): string {
  return String(code ?? '').replace(/\s+/g, '').toUpperCase();
}

function toFrozenMap(entries: Record<string, number> | undefined): ReadonlyMap<string, number> {
  const map = new Map<string, number>();
  Object.entries(entries ?? {}).forEach(([code, rateBp]) => {
    const normalized = normalizeTaxCode(code);
    if (!normalized) return;
    if (!Number.isInteger(rateBp) || rateBp < 0) {
      throw new RangeError(`Invalid rate for tax code ${code}: ${rateBp}`);
    }
    map.set(normalized, rateBp);
  });
  return map;
}

/**
 * Static code-to-rate lookup in basis points. Built once and shared; never mutated after construction.
 */
export class RateTable {
  private readonly hsn: ReadonlyMap<string, number>;
  private readonly service: ReadonlyMap<string, number>;

  constructor(source: RateTableSource = {}) {
    this.hsn = toFrozenMap(source.hsn);
    this.service = toFrozenMap(source.service);
    Object.freeze(this);
  }

  /** Exact match only: `21069099` does not inherit the rate of heading `2106`. */
  hsnRate(code: string | null | undefined): number | null {
    const normalized = normalizeTaxCode(code);
    if (!normalized) return null;
    return this.hsn.get(normalized) ?? null;
  }

  serviceRate(code: string | null | undefined): number | null {
    const normalized = normalizeTaxCode(code);
    if (!normalized) return null;
    return this.service.get(normalized) ?? null;
  }

  get size(): { hsn: number; service: number } {
    return { hsn: this.hsn.size, service: this.service.size };
  }
}

export function parseRateFile(raw: unknown, fileLabel: string): Record<string, number> {
  const parsed = rateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid rate file ${fileLabel}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }

  const rates: Record<string, number> = {};
  Object.entries(parsed.data).forEach(([code, entry]) => {
    const percent = entry.default ?? entry.gst_percentage;
    if (percent === undefined) return;
    const rateBp = parseBasisPoints(percent);
    if (rateBp === null || rateBp < 0) {
      throw new Error(`Invalid rate for ${code} in ${fileLabel}: ${String(percent)}`);
    }
    rates[code] = rateBp;
  });
  return rates;
}

function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return {};
  const value: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return value;
}

export function loadRateTable(ratesDir: string): RateTable {
  const hsnPath = path.join(ratesDir, HSN_RATES_FILE);
  const sacPath = path.join(ratesDir, SAC_RATES_FILE);
  return new RateTable({
    hsn: parseRateFile(readJsonFile(hsnPath), HSN_RATES_FILE),
    service: parseRateFile(readJsonFile(sacPath), SAC_RATES_FILE),
  });
}
