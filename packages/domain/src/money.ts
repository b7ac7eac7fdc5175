import { DomainError } from './errors';

// NUMERIC(10,2): at most eight integer digits.
const PRICE_PATTERN = /^(\d{1,8})(?:\.(\d{1,2}))?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Normalizes a price to its canonical two-decimal string, e.g. `12.5` → `"12.50"`.
 * Rejects negatives, more than two fractional digits and values above 99999999.99.
 */
export function parsePrice(input: string | number): string {
  let text: string;
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw invalidPrice(input, 'not a finite number');
    }
    if (Math.round(input * 100) / 100 !== input) {
      throw invalidPrice(input, 'more than two fractional digits');
    }
    text = input.toFixed(2);
  } else {
    text = input.trim();
  }

  if (text.startsWith('-')) {
    if (/^-0+(\.0+)?$/.test(text)) return '0.00';
    throw invalidPrice(input, 'negative');
  }

  const match = PRICE_PATTERN.exec(text);
  if (!match) {
    throw invalidPrice(input, 'not a decimal with at most two fractional digits');
  }

  const whole = match[1].replace(/^0+(?=\d)/, '');
  const fraction = (match[2] ?? '').padEnd(2, '0');
  return `${whole}.${fraction}`;
}

/** Calendar date in `YYYY-MM-DD`; a `Date` is read in UTC. */
export function parseListingDate(input: string | Date): string {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw invalidDate(String(input));
    }
    return input.toISOString().slice(0, 10);
  }

  const match = DATE_PATTERN.exec(input.trim());
  if (!match) throw invalidDate(input);

  const [, year, month, day] = match;
  const calendarDate = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    calendarDate.getUTCFullYear() !== Number(year) ||
    calendarDate.getUTCMonth() !== Number(month) - 1 ||
    calendarDate.getUTCDate() !== Number(day)
  ) {
    throw invalidDate(input);
  }
  return `${year}-${month}-${day}`;
}

function invalidPrice(input: string | number, reason: string): DomainError {
  return new DomainError('INVALID_PRICE', `Invalid price ${String(input)}: ${reason}`, {
    price: String(input),
    reason,
  });
}

function invalidDate(input: string): DomainError {
  return new DomainError('INVALID_INPUT', `Invalid listing date: ${input}`, {
    field: 'listingDate',
    value: input,
  });
}
