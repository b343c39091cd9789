/**
 * Price feed ids
 *
 * Feed ids are a 32 byte unique identifier for each price feed. They are often
 * written as a 64 character hex string, with or without a 0x prefix.
 */

import { FeedId, GetPriceError } from '../types';
import { FEED_ID_LEN } from '../config/constants';

const HEX_LEN = FEED_ID_LEN * 2;
const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * Get a FeedId from a hex string
 *
 * @example
 * const solUsd = getFeedIdFromHex('0xef0d8b6fda2ceba41da15d4095d1da392a0d2f8ed0c6c7bc0f4cfac8c280b56d');
 *
 * @throws GetPriceError `FeedIdMustBe32Bytes` when the length is neither 64 nor 66,
 * `FeedIdNonHexCharacter` when a character is not hexadecimal
 */
export function getFeedIdFromHex(input: string): FeedId {
  let hex: string;
  switch (Buffer.byteLength(input, 'utf8')) {
    case HEX_LEN + 2:
      if (!/^0[xX]/.test(input)) {
        throw new GetPriceError('FeedIdNonHexCharacter');
      }
      hex = input.slice(2);
      break;
    case HEX_LEN:
      hex = input;
      break;
    default:
      throw new GetPriceError('FeedIdMustBe32Bytes');
  }

  if (!HEX_PATTERN.test(hex)) {
    throw new GetPriceError('FeedIdNonHexCharacter');
  }

  return Uint8Array.from(Buffer.from(hex, 'hex'));
}

/**
 * Lowercase hex encoding of a feed id
 */
export function feedIdToHex(feedId: FeedId, options: { prefix?: boolean } = {}): string {
  const hex = Buffer.from(feedId).toString('hex');
  return (options.prefix ?? true) ? `0x${hex}` : hex;
}

/**
 * Byte-wise equality of two feed ids
 */
export function feedIdEquals(a: FeedId, b: FeedId): boolean {
  return Buffer.from(a).equals(Buffer.from(b));
}
