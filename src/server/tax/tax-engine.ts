import { percentOf } from '../../shared/money';
import type { BillingMode, PriceType, TaxSplitMode } from '../../shared/bills';
import { createConsoleLogger, type Logger } from '../logger';
import { normalizeTaxCode, type RateTable } from './rate-table';

export type TaxSource = 'service' | 'hsn' | 'none';

export interface TaxContext {
  serviceCode?: string | null;
  serviceRateBp?: number | null;
  hsnCode?: string | null;
  hsnRateBp?: number | null;
}

export interface ResolvedRate {
  rateBp: number;
  source: TaxSource;
  unknownCode?: string;
}

export interface LineTax extends ResolvedRate {
  taxPaise: number;
}

export interface TaxSplit {
  cgstPaise: number;
  sgstPaise: number;
  igstPaise: number;
}

export interface SummaryLine {
  subtotalPaise: number;
  taxPaise: number;
  priceType: PriceType;
}

export interface SummaryOptions {
  billingMode: BillingMode;
  taxSplit: TaxSplitMode;
  discountBp?: number;
}

export interface BillSummary extends TaxSplit {
  subtotalPaise: number;
  discountBp: number;
  discountPaise: number;
  totalTaxPaise: number;
  totalPaise: number;
}

export function splitTax(totalTaxPaise: number, mode: TaxSplitMode): TaxSplit {
  if (mode === 'inter_state') {
    return { cgstPaise: 0, sgstPaise: 0, igstPaise: totalTaxPaise };
  }
  const cgstPaise = percentOf(totalTaxPaise, 5000);
  return { cgstPaise, sgstPaise: totalTaxPaise - cgstPaise, igstPaise: 0 };
}

/**
 * Totals a bill. Inclusive lines report tax without adding it; the discount comes off the subtotal only.
 */
export function summarizeBill(lines: SummaryLine[], options: SummaryOptions): BillSummary {
  const chargesTax = options.billingMode === 'gst';
  const discountBp = options.discountBp ?? 0;

  let subtotalPaise = 0;
  let totalTaxPaise = 0;
  let exclusiveTaxPaise = 0;

  lines.forEach((line) => {
    subtotalPaise += line.subtotalPaise;
    if (!chargesTax) return;
    totalTaxPaise += line.taxPaise;
    if (line.priceType === 'exclusive') {
      exclusiveTaxPaise += line.taxPaise;
    }
  });

  const discountPaise = Math.min(percentOf(subtotalPaise, discountBp), subtotalPaise);
  return {
    subtotalPaise,
    discountBp,
    discountPaise,
    totalTaxPaise,
    ...splitTax(totalTaxPaise, options.taxSplit),
    totalPaise: subtotalPaise - discountPaise + exclusiveTaxPaise,
  };
}

export class TaxEngine {
  private readonly rates: RateTable;
  private readonly logger: Logger;

  constructor(rates: RateTable, logger: Logger = createConsoleLogger('tax')) {
    this.rates = rates;
    this.logger = logger;
  }

  /**
   * A vendor service code wins over the item's HSN code. An explicit rate wins over the table.
   * A code missing from the table resolves to 0 and is reported through `unknownCode`.
   */
  resolveRate(context: TaxContext): ResolvedRate {
    const serviceCode = normalizeTaxCode(context.serviceCode);
    if (serviceCode) {
      if (context.serviceRateBp !== undefined && context.serviceRateBp !== null) {
        return { rateBp: context.serviceRateBp, source: 'service' };
      }
      const tableRate = this.rates.serviceRate(serviceCode);
      if (tableRate !== null) return { rateBp: tableRate, source: 'service' };
      return { rateBp: 0, source: 'service', unknownCode: serviceCode };
    }

    const hsnCode = normalizeTaxCode(context.hsnCode);
    if (hsnCode) {
      if (context.hsnRateBp !== undefined && context.hsnRateBp !== null) {
        return { rateBp: context.hsnRateBp, source: 'hsn' };
      }
      const tableRate = this.rates.hsnRate(hsnCode);
      if (tableRate !== null) return { rateBp: tableRate, source: 'hsn' };
      return { rateBp: 0, source: 'hsn', unknownCode: hsnCode };
    }

    return { rateBp: 0, source: 'none' };
  }

  computeLineTax(lineSubtotalPaise: number, context: TaxContext): LineTax {
    const resolved = this.resolveRate(context);
    if (resolved.unknownCode) {
      this.logger.warn('UnknownTaxCode', { source: resolved.source, code: resolved.unknownCode });
    }
    return { ...resolved, taxPaise: percentOf(lineSubtotalPaise, resolved.rateBp) };
  }
}
