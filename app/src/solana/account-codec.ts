/**
 * Borsh layout of the receiver program accounts
 *
 * PriceUpdateV2:
 *   discriminator        [u8; 8]
 *   write_authority      Pubkey
 *   verification_level   enum { Partial { num_signatures: u8 } = 0, Full = 1 }
 *   price_message        feed_id [u8; 32], price i64, conf u64, exponent i32,
 *                        publish_time i64, prev_publish_time i64, ema_price i64, ema_conf u64
 *   posted_slot          u64
 *
 * All integers are little-endian. A Full level is one byte shorter than
 * Partial; the account is allocated at PriceUpdateV2.LEN and zero-padded.
 */

import { PublicKey } from '@solana/web3.js';
import { AccountDecodeError, ClockState, PriceFeedMessage, PriceUpdateData, VerificationLevel } from '../types';
import {
  CLOCK_SYSVAR_LEN,
  DISCRIMINATOR_LEN,
  FEED_ID_LEN,
  PRICE_UPDATE_V2_DISCRIMINATOR,
  PRICE_UPDATE_V2_LEN,
  PUBKEY_LEN,
  VERIFICATION_LEVEL_TAGS,
} from '../config/constants';
import { PriceUpdateV2 } from '../price-update/price-update';

/**
 * Encode u8 (unsigned 8-bit integer)
 */
function encodeU8(n: number): Buffer {
  const b = Buffer.alloc(1);
  b.writeUInt8(n);
  return b;
}

/**
 * Encode i32 (signed 32-bit integer)
 */
function encodeI32(n: number): Buffer {
  const b = Buffer.alloc(4);
  b.writeInt32LE(n);
  return b;
}

/**
 * Encode i64 (signed 64-bit integer as two's complement)
 */
function encodeI64(n: bigint): Buffer {
  const b = Buffer.alloc(8);
  b.writeBigInt64LE(n);
  return b;
}

/**
 * Encode u64 (unsigned 64-bit integer)
 */
function encodeU64(n: bigint): Buffer {
  const b = Buffer.alloc(8);
  b.writeBigUInt64LE(n);
  return b;
}

function encodeVerificationLevel(level: VerificationLevel): Buffer {
  switch (level.kind) {
    case 'Partial':
      return Buffer.concat([encodeU8(VERIFICATION_LEVEL_TAGS.Partial), encodeU8(level.numSignatures)]);
    case 'Full':
      return encodeU8(VERIFICATION_LEVEL_TAGS.Full);
  }
}

function encodePriceFeedMessage(message: PriceFeedMessage): Buffer {
  if (message.feedId.length !== FEED_ID_LEN) {
    throw new RangeError(`feedId must be ${FEED_ID_LEN} bytes, got ${message.feedId.length}`);
  }
  return Buffer.concat([
    Buffer.from(message.feedId),
    encodeI64(message.price),
    encodeU64(message.conf),
    encodeI32(message.exponent),
    encodeI64(message.publishTime),
    encodeI64(message.prevPublishTime),
    encodeI64(message.emaPrice),
    encodeU64(message.emaConf),
  ]);
}

/**
 * Serialize a price update into a PriceUpdateV2.LEN byte account buffer
 */
export function encodePriceUpdateAccount(update: PriceUpdateData): Buffer {
  const encoded = Buffer.concat([
    Buffer.from(PRICE_UPDATE_V2_DISCRIMINATOR),
    Buffer.from(update.writeAuthority.toBytes()),
    encodeVerificationLevel(update.verificationLevel),
    encodePriceFeedMessage(update.priceMessage),
    encodeU64(update.postedSlot),
  ]);
  const data = Buffer.alloc(PRICE_UPDATE_V2_LEN);
  encoded.copy(data);
  return data;
}

/**
 * Sequential little-endian reader over account data
 */
class AccountReader {
  private offset = 0;

  constructor(private readonly data: Buffer, private readonly label: string) {}

  private take(len: number): number {
    if (this.offset + len > this.data.length) {
      throw new AccountDecodeError(
        `${this.label} account data too short: need ${this.offset + len} bytes, got ${this.data.length}`
      );
    }
    const start = this.offset;
    this.offset += len;
    return start;
  }

  bytes(len: number): Buffer {
    const start = this.take(len);
    return Buffer.from(this.data.subarray(start, start + len));
  }

  u8(): number {
    return this.data.readUInt8(this.take(1));
  }

  i32(): number {
    return this.data.readInt32LE(this.take(4));
  }

  i64(): bigint {
    return this.data.readBigInt64LE(this.take(8));
  }

  u64(): bigint {
    return this.data.readBigUInt64LE(this.take(8));
  }
}

function decodeVerificationLevel(reader: AccountReader): VerificationLevel {
  const tag = reader.u8();
  switch (tag) {
    case VERIFICATION_LEVEL_TAGS.Partial:
      return { kind: 'Partial', numSignatures: reader.u8() };
    case VERIFICATION_LEVEL_TAGS.Full:
      return { kind: 'Full' };
    default:
      throw new AccountDecodeError(`Unknown verification level tag ${tag}`);
  }
}

function decodePriceFeedMessage(reader: AccountReader): PriceFeedMessage {
  return {
    feedId: Uint8Array.from(reader.bytes(FEED_ID_LEN)),
    price: reader.i64(),
    conf: reader.u64(),
    exponent: reader.i32(),
    publishTime: reader.i64(),
    prevPublishTime: reader.i64(),
    emaPrice: reader.i64(),
    emaConf: reader.u64(),
  };
}

/**
 * Deserialize PriceUpdateV2 account data
 *
 * @throws AccountDecodeError on a wrong discriminator, short data or an unknown verification level
 */
export function decodePriceUpdateAccount(data: Buffer): PriceUpdateV2 {
  const reader = new AccountReader(data, 'PriceUpdateV2');

  const discriminator = reader.bytes(DISCRIMINATOR_LEN);
  if (!discriminator.equals(Buffer.from(PRICE_UPDATE_V2_DISCRIMINATOR))) {
    throw new AccountDecodeError(
      `Not a PriceUpdateV2 account (discriminator ${discriminator.toString('hex')})`
    );
  }

  const writeAuthority = new PublicKey(reader.bytes(PUBKEY_LEN));
  const verificationLevel = decodeVerificationLevel(reader);
  const priceMessage = decodePriceFeedMessage(reader);
  const postedSlot = reader.u64();

  return new PriceUpdateV2({ writeAuthority, verificationLevel, priceMessage, postedSlot });
}

/**
 * Deserialize the clock sysvar
 */
export function decodeClock(data: Buffer): ClockState {
  if (data.length < CLOCK_SYSVAR_LEN) {
    throw new AccountDecodeError(
      `Clock sysvar data too short: need ${CLOCK_SYSVAR_LEN} bytes, got ${data.length}`
    );
  }
  const reader = new AccountReader(data, 'Clock');
  return {
    slot: reader.u64(),
    epochStartTimestamp: reader.i64(),
    epoch: reader.u64(),
    leaderScheduleEpoch: reader.u64(),
    unixTimestamp: reader.i64(),
  };
}
