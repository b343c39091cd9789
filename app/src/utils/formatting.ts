/**
 * Formatting utilities
 */

import { Price } from '../types';

// Exponents beyond this are printed in `e` notation
const MAX_PLAIN_EXPONENT = 64;

/**
 * Render `mantissa * 10^exponent` as an exact decimal string
 */
export function formatScaled(mantissa: bigint, exponent: number): string {
  const negative = mantissa < 0n;
  const digits = (negative ? -mantissa : mantissa).toString();
  let out: string;

  if (Math.abs(exponent) > MAX_PLAIN_EXPONENT) {
    out = `${digits}e${exponent}`;
  } else if (exponent >= 0) {
    out = mantissa === 0n ? '0' : digits + '0'.repeat(exponent);
  } else {
    const scale = -exponent;
    const padded = digits.padStart(scale + 1, '0');
    const whole = padded.slice(0, padded.length - scale);
    const fraction = padded.slice(padded.length - scale);
    out = `${whole}.${fraction}`;
  }

  return negative ? `-${out}` : out;
}

/**
 * Format a price as `price ± conf`
 */
export function formatPrice(price: Price): string {
  return `${formatScaled(price.price, price.exponent)} ± ${formatScaled(price.conf, price.exponent)}`;
}

/**
 * Format unix seconds to ISO string
 */
export function formatTimestamp(unixSeconds: bigint): string {
  const date = new Date(Number(unixSeconds) * 1000);
  // Outside the Date range (about ±273,790 years)
  if (Number.isNaN(date.getTime())) {
    return `${unixSeconds}s`;
  }
  return date.toISOString();
}
