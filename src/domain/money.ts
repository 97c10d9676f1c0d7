/**
 * Money is an integer number of cents. Sums and differences stay exact;
 * the only inexact step, multiplying by a commission rate, goes through
 * bigint decimals and rounds once.
 */
export type Money = number;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d*))?$/;

type ExactDecimal = {
  units: bigint;
  scale: number;
};

/**
 * Parses a plain decimal string ("510", "1231.5", "-3.005") to cents,
 * rounding half away from zero past the second fractional digit.
 */
export function decimalToCents(text: string): Money | null {
  const match = DECIMAL_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  const padded = fraction.padEnd(3, '0');
  let cents = Number(whole) * 100 + Number(padded.slice(0, 2));
  if (Number(padded[2]) >= 5) {
    cents += 1;
  }
  if (!Number.isSafeInteger(cents)) return null;
  return sign && cents !== 0 ? -cents : cents;
}

/**
 * Converts a JS number (spreadsheet cell, JSON field) to cents through its
 * shortest decimal representation, so 4.35 becomes 435 and not 434.
 */
export function toCents(value: number): Money | null {
  if (!Number.isFinite(value)) return null;
  return decimalToCents(plainDecimal(value));
}

export function fromCents(cents: Money): number {
  return cents / 100;
}

export function sumMoney(values: Money[]): Money {
  return values.reduce((acc, value) => acc + value, 0);
}

/**
 * amount × rate, rounded half away from zero to whole cents
 */
export function applyRate(amount: Money, rate: number): Money {
  const { units, scale } = toExactDecimal(rate);
  const divisor = 10n ** BigInt(scale);
  const product = BigInt(amount) * units;
  const quotient = product / divisor;
  const remainder = product % divisor;
  const magnitude = remainder < 0n ? -remainder : remainder;

  if (magnitude * 2n >= divisor) {
    return Number(quotient + (product < 0n ? -1n : 1n));
  }
  return Number(quotient);
}

/**
 * "$1,234.50", "-$525.00"
 */
export function formatMoney(cents: Money): string {
  const magnitude = Math.abs(cents);
  const dollars = Math.trunc(magnitude / 100)
    .toString()
    .replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const fraction = String(magnitude % 100).padStart(2, '0');
  return `${cents < 0 ? '-' : ''}$${dollars}.${fraction}`;
}

/**
 * 0.5 → "50%", 0.375 → "37.5%"
 */
export function formatRate(rate: number): string {
  const { units, scale } = toExactDecimal(rate);
  const negative = units < 0n;
  const digits = (negative ? -units : units).toString();
  const shifted = scale - 2;

  let text: string;
  if (shifted <= 0) {
    text = digits + '0'.repeat(-shifted);
  } else {
    const padded = digits.padStart(shifted + 1, '0');
    text = `${padded.slice(0, -shifted)}.${padded.slice(-shifted)}`;
  }
  return `${negative ? '-' : ''}${text}%`;
}

function toExactDecimal(value: number): ExactDecimal {
  const match = DECIMAL_PATTERN.exec(plainDecimal(value));
  if (!match) {
    throw new RangeError(`Not a finite decimal: ${value}`);
  }
  const [, sign, whole, fraction = ''] = match;
  return {
    units: BigInt(`${sign ?? ''}${whole}${fraction}`),
    scale: fraction.length,
  };
}

/**
 * Shortest decimal text of a finite number without exponent notation:
 * 1e21 → "1000000000000000000000", 1.5e-7 → "0.00000015"
 */
function plainDecimal(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/i.exec(text);
  if (!match) return text;

  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
