import { Decimal } from 'decimal.js';
import { DateTime } from 'luxon';

export const DATE_OUTPUT_FORMAT = 'dd/MM/yyyy';

const NUMERIC_TEXT = /^[+-]?\d+(?:\.\d+)?$/;
const COMPACT_DATE = /^\d{8}$/;
const COMPACT_DATE_FORMAT = 'yyyyMMdd';

/**
 * Epoch value to milliseconds, guessing the unit from the digit count:
 * up to 10 digits are seconds, 13 milliseconds, 16 microseconds, beyond that
 * nanoseconds.
 */
export function epochToMillis(value: number): number | null {
  if (!Number.isFinite(value)) {
    return null;
  }
  if (value === 0) {
    return 0;
  }

  const digits = Math.floor(Math.log10(Math.abs(value))) + 1;
  if (digits <= 10) {
    return Math.round(value * 1_000);
  }
  if (digits <= 13) {
    return Math.round(value);
  }
  if (digits <= 16) {
    return Math.round(value / 1_000);
  }
  return Math.round(value / 1_000_000);
}

const fromEpoch = (value: number): DateTime | null => {
  const millis = epochToMillis(value);
  return millis === null ? null : DateTime.fromMillis(millis, { zone: 'utc' });
};

function parseDateText(text: string): DateTime | null {
  if (COMPACT_DATE.test(text)) {
    const compact = DateTime.fromFormat(text, COMPACT_DATE_FORMAT, { zone: 'utc' });
    if (compact.isValid) {
      return compact;
    }
  }
  if (NUMERIC_TEXT.test(text)) {
    return fromEpoch(Number(text));
  }

  const candidates = [
    () => DateTime.fromISO(text, { setZone: true }),
    () => DateTime.fromRFC2822(text, { setZone: true }),
    () => DateTime.fromHTTP(text, { setZone: true }),
    () => DateTime.fromSQL(text, { setZone: true }),
    () => DateTime.fromFormat(text, DATE_OUTPUT_FORMAT),
  ];
  for (const candidate of candidates) {
    const parsed = candidate();
    if (parsed.isValid) {
      return parsed;
    }
  }
  return null;
}

export function parseDateCell(value: unknown): DateTime | null {
  if (value instanceof Date) {
    const parsed = DateTime.fromJSDate(value, { zone: 'utc' });
    return parsed.isValid ? parsed : null;
  }
  if (typeof value === 'number') {
    return fromEpoch(value);
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? parseDateText(trimmed) : null;
  }
  return null;
}

/** `DD/MM/YYYY` in the offset the value carries; unparsable input gives `null`. */
export function formatDateCell(value: unknown): string | null {
  const parsed = parseDateCell(value);
  return parsed ? parsed.toFormat(DATE_OUTPUT_FORMAT) : null;
}

export function parseAmountCell(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  try {
    const parsed = new Decimal(trimmed);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null;
  }
}

/** Plain-notation amount with a decimal comma, e.g. `1234.5` -> `"1234,5"`. */
export function formatAmountCell(value: unknown): string | null {
  const parsed = parseAmountCell(value);
  return parsed ? parsed.toFixed().replace('.', ',') : null;
}
