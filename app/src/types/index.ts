/**
 * Type definitions for the price update receiver SDK
 */

import { PublicKey } from '@solana/web3.js';

/**
 * Id of a price feed (e.g. SOL/USD). Always 32 bytes.
 */
export type FeedId = Uint8Array;

/**
 * How much a price update has been verified.
 *
 * Price updates are bridged from the source chain with guardian signatures.
 * Checking two thirds of the guardian set is `Full`; a `Partial` update only had
 * `numSignatures` signatures checked.
 */
export type VerificationLevel =
  | { readonly kind: 'Partial'; readonly numSignatures: number }
  | { readonly kind: 'Full' };

/**
 * Attested price payload, as written by the receiver program
 */
export interface PriceFeedMessage {
  readonly feedId: FeedId;
  readonly price: bigint;
  readonly conf: bigint;
  readonly exponent: number;
  /** Timestamp of this update in seconds */
  readonly publishTime: bigint;
  /**
   * Timestamp of the previous update for the same feed. For any time t the
   * unique update is the one with prevPublishTime < t <= publishTime.
   *
   * Some updates may be missing while publishers migrate, and this can equal
   * publishTime when aggregation failed for that slot.
   */
  readonly prevPublishTime: bigint;
  readonly emaPrice: bigint;
  readonly emaConf: bigint;
}

/**
 * Fields of a price update account
 */
export interface PriceUpdateData {
  readonly writeAuthority: PublicKey;
  readonly verificationLevel: VerificationLevel;
  readonly priceMessage: PriceFeedMessage;
  readonly postedSlot: bigint;
}

/**
 * A price. The actual value is `(price ± conf) * 10^exponent`.
 */
export interface Price {
  price: bigint;
  conf: bigint;
  exponent: number;
  publishTime: bigint;
}

/**
 * Integer accepted where a 64-bit value is expected
 */
export type IntegerLike = bigint | number;

/**
 * Decoded clock sysvar
 */
export interface ClockState {
  slot: bigint;
  epochStartTimestamp: bigint;
  epoch: bigint;
  leaderScheduleEpoch: bigint;
  unixTimestamp: bigint;
}

/**
 * Which accessor the CLI should call
 */
export type PriceCheckMode = 'full' | 'partial' | 'unchecked';

/**
 * CLI configuration options
 */
export interface CliOptions {
  account: string | null;
  feedId: string | null;
  maxAge: string | null;
  partialSignatures: string | null;
  unchecked: boolean;
  rpcUrl: string | null;
  programId: string | null;
  verbose: boolean;
  logFile: string | null;
  help: boolean;
}

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Failure reasons of the price accessors and feed id parsing
 */
export type GetPriceErrorKind =
  | 'MismatchedFeedId'
  | 'InsufficientVerificationLevel'
  | 'PriceTooOld'
  | 'FeedIdMustBe32Bytes'
  | 'FeedIdNonHexCharacter';

const GET_PRICE_ERROR_MESSAGES: Record<GetPriceErrorKind, string> = {
  MismatchedFeedId: 'This price feed update has a different feed id than the one requested',
  InsufficientVerificationLevel:
    'This price feed update does not meet the required verification level',
  PriceTooOld: 'This price feed update is older than the maximum age allowed',
  FeedIdMustBe32Bytes: 'Feed id must be 32 bytes (64 hex characters, optionally 0x-prefixed)',
  FeedIdNonHexCharacter: 'Feed id contains a non-hexadecimal character',
};

/**
 * Custom error types
 */
export class ReceiverError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'ReceiverError';
  }
}

export class GetPriceError extends ReceiverError {
  constructor(public readonly kind: GetPriceErrorKind) {
    super(GET_PRICE_ERROR_MESSAGES[kind], 'GET_PRICE_ERROR');
    this.name = 'GetPriceError';
  }
}

export class VerificationLevelError extends ReceiverError {
  constructor(message: string) {
    super(message, 'VERIFICATION_LEVEL_ERROR');
    this.name = 'VerificationLevelError';
  }
}

export class AccountDecodeError extends ReceiverError {
  constructor(message: string) {
    super(message, 'DECODE_ERROR');
    this.name = 'AccountDecodeError';
  }
}

export class AccountNotFoundError extends ReceiverError {
  constructor(public readonly address: PublicKey) {
    super(`Account ${address.toBase58()} not found`, 'ACCOUNT_NOT_FOUND');
    this.name = 'AccountNotFoundError';
  }
}

export class AccountOwnerError extends ReceiverError {
  constructor(
    public readonly address: PublicKey,
    public readonly owner: PublicKey,
    public readonly expectedOwner: PublicKey
  ) {
    super(
      `Account ${address.toBase58()} is owned by ${owner.toBase58()}, expected ${expectedOwner.toBase58()}`,
      'ACCOUNT_OWNER_ERROR'
    );
    this.name = 'AccountOwnerError';
  }
}

export class ConfigurationError extends ReceiverError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}
