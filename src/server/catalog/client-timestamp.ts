const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/** A device instant at microsecond precision. `micros` counts from the Unix epoch. */
export interface ClientInstant {
  micros: number;
  date: Date;
}

function parseOffsetMinutes(zone: string | undefined): number | null {
  if (!zone || zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2, 4), 10) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses a device timestamp. Accepts `Z`, a numeric offset, or no zone at all (read as UTC).
 * Fractional seconds past microseconds are truncated. Returns null for anything else.
 */
export function parseClientInstant(value: unknown): ClientInstant | null {
  if (typeof value !== 'string') return null;
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = second ? Number(second) : 0;
  const fractionMicros = fraction ? Number(fraction.slice(0, 6).padEnd(6, '0')) : 0;

  if (h > 23 || mi > 59 || s > 59) return null;

  const utcMs = Date.UTC(y, mo - 1, d, h, mi, s);
  const check = new Date(utcMs);
  if (check.getUTCFullYear() !== y || check.getUTCMonth() !== mo - 1 || check.getUTCDate() !== d) {
    return null;
  }

  const offset = parseOffsetMinutes(zone);
  if (offset === null) return null;
  const micros = (utcMs - offset * 60_000) * 1000 + fractionMicros;
  return { micros, date: new Date(Math.floor(micros / 1000)) };
}

/** Millisecond view of {@link parseClientInstant}, for cursors and date filters. */
export function parseClientTimestamp(value: unknown): Date | null {
  return parseClientInstant(value)?.date ?? null;
}

/** `YYYY-MM-DDTHH:mm:ss.ffffffZ`; fixed width, so stored values also sort as text. */
export function formatInstant(micros: number): string {
  const ms = Math.floor(micros / 1000);
  const rest = micros - ms * 1000;
  return `${new Date(ms).toISOString().slice(0, -1)}${String(rest).padStart(3, '0')}Z`;
}
