// Money is paise (scale 2), quantities are thousandths (scale 3), rates are basis points (scale 2 on a percent).
export const MONEY_SCALE = 2;
export const QUANTITY_SCALE = 3;
export const PERCENT_SCALE = 2;

export const BASIS_POINTS_PER_UNIT = 10_000;
export const MILLI_PER_UNIT = 1_000;

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;
const MAX_INPUT_MAGNITUDE = 1e15;

/**
 * Parses a JSON number or decimal string into an integer scaled by `10^scale`.
 * Returns null when the value is not a plain decimal or carries non-zero digits
 * past `scale`.
 */
export function parseFixed(input: unknown, scale: number): number | null {
  let text: string;
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || Math.abs(input) >= MAX_INPUT_MAGNITUDE) return null;
    text = Number.isInteger(input) ? String(input) : input.toFixed(scale + 3);
  } else if (typeof input === 'string') {
    text = input.trim();
  } else {
    return null;
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) return null;

  const sign = match[1] === '-' ? -1 : 1;
  const whole = match[2] ?? '';
  const fraction = match[3] ?? '';
  if (!whole && !fraction) return null;

  const kept = fraction.slice(0, scale);
  const dropped = fraction.slice(scale);
  if (/[1-9]/.test(dropped)) return null;

  const digits = `${whole || '0'}${kept.padEnd(scale, '0')}`;
  const value = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(value)) return null;
  return value === 0 ? 0 : sign * value;
}

export function formatFixed(value: number, scale: number): string {
  const negative = value < 0;
  const abs = Math.abs(Math.trunc(value));
  const factor = 10 ** scale;
  const whole = Math.floor(abs / factor);
  const fraction = String(abs % factor).padStart(scale, '0');
  const body = scale > 0 ? `${whole}.${fraction}` : String(whole);
  return negative ? `-${body}` : body;
}

export function parsePaise(input: unknown): number | null {
  return parseFixed(input, MONEY_SCALE);
}

export function formatPaise(paise: number): string {
  return formatFixed(paise, MONEY_SCALE);
}

export function parseBasisPoints(input: unknown): number | null {
  return parseFixed(input, PERCENT_SCALE);
}

export function formatBasisPoints(bp: number): string {
  return formatFixed(bp, PERCENT_SCALE);
}

export function parseMilli(input: unknown): number | null {
  return parseFixed(input, QUANTITY_SCALE);
}

/** Renders a thousandths quantity without trailing zeros: 2000 -> "2", 1500 -> "1.5". */
export function formatMilli(milli: number): string {
  const text = formatFixed(milli, QUANTITY_SCALE);
  return text.replace(/\.?0+$/, '');
}

/**
 * `round_half_up(a * b / divisor)` on integers. Ties move away from zero.
 */
export function mulDivRoundHalfUp(a: number, b: number, divisor: number): number {
  if (divisor <= 0) {
    throw new RangeError('divisor must be positive');
  }
  const product = BigInt(Math.trunc(a)) * BigInt(Math.trunc(b));
  const d = BigInt(Math.trunc(divisor));
  const negative = product < 0n;
  const abs = negative ? -product : product;
  const quotient = (abs * 2n + d) / (2n * d);
  return Number(negative ? -quotient : quotient);
}

export function percentOf(paise: number, bp: number): number {
  return mulDivRoundHalfUp(paise, bp, BASIS_POINTS_PER_UNIT);
}

export function lineAmount(unitPaise: number, quantityMilli: number): number {
  return mulDivRoundHalfUp(unitPaise, quantityMilli, MILLI_PER_UNIT);
}
