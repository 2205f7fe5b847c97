import { ValidationError } from './errors';

// ISO-4217 minor-unit exponents for currencies the ledger is expected to carry.
const MINOR_UNIT_DIGITS: Record<string, number> = {
  GBP: 2,
  EUR: 2,
  USD: 2,
  CHF: 2,
  SEK: 2,
  NOK: 2,
  DKK: 2,
  PLN: 2,
  JPY: 0,
  KRW: 0,
  BHD: 3,
  KWD: 3,
};

/** Exact rational rate, e.g. 20% is `{ numerator: 20, denominator: 100 }`. */
export interface Rate {
  numerator: number;
  denominator: number;
}

export function minorUnitDigits(currency: string): number {
  const digits = MINOR_UNIT_DIGITS[currency.toUpperCase()];
  if (digits === undefined) {
    throw new ValidationError(`Unsupported currency: ${currency}`);
  }
  return digits;
}

export function isMinorUnitAmount(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

export function assertMinorUnits(value: unknown, field: string): number {
  if (!isMinorUnitAmount(value)) {
    throw new ValidationError(`${field} must be an integer amount in minor units`, { field, value });
  }
  return value;
}

export function sumMinorUnits(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) {
    total += assertMinorUnits(value, 'amount');
  }
  return assertMinorUnits(total, 'total');
}

function assertRate(rate: Rate): void {
  if (!Number.isSafeInteger(rate.numerator) || !Number.isSafeInteger(rate.denominator) || rate.denominator <= 0) {
    throw new ValidationError('Rate must be a ratio of integers with a positive denominator', rate);
  }
}

/** Integer division rounding half away from zero. */
function divideHalfUp(dividend: bigint, divisor: bigint): bigint {
  const negative = dividend < 0n !== divisor < 0n;
  const absDividend = dividend < 0n ? -dividend : dividend;
  const absDivisor = divisor < 0n ? -divisor : divisor;
  let quotient = absDividend / absDivisor;
  const remainder = absDividend % absDivisor;
  if (remainder * 2n >= absDivisor) {
    quotient += 1n;
  }
  return negative ? -quotient : quotient;
}

function toSafeNumber(value: bigint): number {
  const result = Number(value);
  if (!Number.isSafeInteger(result)) {
    throw new ValidationError('Amount exceeds the safe integer range', { value: value.toString() });
  }
  return result;
}

/**
 * Applies a rate to a minor-unit amount, rounding once to the nearest minor unit (half-up).
 */
export function applyRate(amount: number, rate: Rate): number {
  assertMinorUnits(amount, 'amount');
  assertRate(rate);
  return toSafeNumber(divideHalfUp(BigInt(amount) * BigInt(rate.numerator), BigInt(rate.denominator)));
}

/**
 * Splits a tax-inclusive gross amount into net and tax parts; the tax part is rounded half-up
 * and the net part absorbs the remainder, so `net + tax === gross`.
 */
export function splitInclusiveAmount(gross: number, rate: Rate): { net: number; tax: number } {
  assertMinorUnits(gross, 'gross');
  assertRate(rate);
  const tax = toSafeNumber(
    divideHalfUp(BigInt(gross) * BigInt(rate.numerator), BigInt(rate.denominator) + BigInt(rate.numerator))
  );
  return { net: gross - tax, tax };
}

/**
 * Builds a rate from a percentage written as a decimal string or integer (`"17.5"`, `20`).
 */
export function rateFromPercent(percent: string | number): Rate {
  const text = String(percent).trim();
  const match = /^(\d+)(?:\.(\d+))?$/.exec(text);
  if (!match) {
    throw new ValidationError(`Invalid percentage: ${text}`);
  }
  const fraction = match[2] ?? '';
  const numerator = Number(`${match[1]}${fraction}`);
  return { numerator, denominator: 100 * 10 ** fraction.length };
}

/**
 * Parses a human-entered amount (`"£1,200.00"`, `"-12.5"`) into minor units without floating point.
 * Rejects more fractional digits than the currency carries instead of rounding them away.
 */
export function parseMinorUnits(text: string, currency: string): number {
  const digits = minorUnitDigits(currency);
  const cleaned = text.replace(/[\s,£$€]/g, '');
  const match = /^([+-])?(\d+)(?:\.(\d*))?$/.exec(cleaned);
  if (!match) {
    throw new ValidationError(`Invalid amount: ${text}`);
  }
  const fraction = match[3] ?? '';
  if (fraction.length > digits) {
    throw new ValidationError(`Amount ${text} has more than ${digits} decimal places for ${currency}`);
  }
  const magnitude = BigInt(`${match[2]}${fraction.padEnd(digits, '0')}`);
  return toSafeNumber(match[1] === '-' ? -magnitude : magnitude);
}

/** Formats minor units as a plain decimal string (`120000` GBP → `"1200.00"`). */
export function formatMinorUnits(amount: number, currency: string): string {
  assertMinorUnits(amount, 'amount');
  const digits = minorUnitDigits(currency);
  const negative = amount < 0;
  const absolute = String(Math.abs(amount)).padStart(digits + 1, '0');
  const whole = digits === 0 ? absolute : absolute.slice(0, absolute.length - digits);
  const fraction = digits === 0 ? '' : `.${absolute.slice(absolute.length - digits)}`;
  return `${negative ? '-' : ''}${whole}${fraction}`;
}

/** Rounds minor units to whole major units (half-up), still expressed in minor units. */
export function roundToMajorUnit(amount: number, currency: string): number {
  const factor = 10 ** minorUnitDigits(currency);
  return toSafeNumber(divideHalfUp(BigInt(amount), BigInt(factor)) * BigInt(factor));
}
