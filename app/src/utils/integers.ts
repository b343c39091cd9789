/**
 * Fixed-width integer helpers
 */

import { IntegerLike } from '../types';
import { I64_MAX, I64_MIN, U64_MAX } from '../config/constants';

function toBigInt(value: IntegerLike, name: string): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${name} must be an integer, got ${value}`);
  }
  return BigInt(value);
}

/**
 * Convert to a signed 64-bit value, throwing RangeError when out of range
 */
export function toI64(value: IntegerLike, name: string = 'value'): bigint {
  const n = toBigInt(value, name);
  if (n < I64_MIN || n > I64_MAX) {
    throw new RangeError(`${name} does not fit in an i64: ${n}`);
  }
  return n;
}

/**
 * Convert to an unsigned 64-bit value, throwing RangeError when out of range
 */
export function toU64(value: IntegerLike, name: string = 'value'): bigint {
  const n = toBigInt(value, name);
  if (n < 0n || n > U64_MAX) {
    throw new RangeError(`${name} does not fit in a u64: ${n}`);
  }
  return n;
}

/**
 * i64 addition clamped to [I64_MIN, I64_MAX] instead of wrapping
 */
export function saturatingAddI64(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > I64_MAX) {
    return I64_MAX;
  }
  if (sum < I64_MIN) {
    return I64_MIN;
  }
  return sum;
}
