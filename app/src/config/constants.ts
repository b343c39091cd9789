/**
 * Application constants and configuration
 */

import { PublicKey } from '@solana/web3.js';

/**
 * Receiver program that owns price update accounts on Solana mainnet and devnet
 */
export const RECEIVER_PROGRAM_ID = new PublicKey('rec5EKMGg6MxZYaMdyBfgwp4d5rB9T1VQH5pJv5LtFJ');

/**
 * Account discriminator of PriceUpdateV2 (first 8 bytes of sha256("account:PriceUpdateV2"))
 */
export const PRICE_UPDATE_V2_DISCRIMINATOR = Uint8Array.from([34, 241, 35, 99, 157, 126, 244, 205]);

/**
 * Encoded sizes (bytes)
 */
export const DISCRIMINATOR_LEN = 8;
export const PUBKEY_LEN = 32;
export const FEED_ID_LEN = 32;
export const VERIFICATION_LEVEL_MAX_LEN = 2;
export const PRICE_FEED_MESSAGE_LEN = 32 + 8 + 8 + 4 + 8 + 8 + 8 + 8;
export const POSTED_SLOT_LEN = 8;

/**
 * Full PriceUpdateV2 account size, including discriminator
 */
export const PRICE_UPDATE_V2_LEN =
  DISCRIMINATOR_LEN + PUBKEY_LEN + VERIFICATION_LEVEL_MAX_LEN + PRICE_FEED_MESSAGE_LEN + POSTED_SLOT_LEN;

/**
 * Borsh enum tags of VerificationLevel
 */
export const VERIFICATION_LEVEL_TAGS = {
  Partial: 0,
  Full: 1,
} as const;

/**
 * Clock sysvar layout: slot, epoch_start_timestamp, epoch, leader_schedule_epoch, unix_timestamp
 */
export const CLOCK_SYSVAR_LEN = 40;

/**
 * 64-bit integer bounds
 */
export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;
export const U64_MAX = (1n << 64n) - 1n;

/**
 * Default RPC URL
 */
export const DEFAULT_RPC_URL = 'https://api.mainnet-beta.solana.com';

/**
 * Environment variable overriding the RPC URL
 */
export const RPC_URL_ENV_VAR = 'RECEIVER_RPC_URL';

/**
 * Default maximum age used by the CLI (seconds)
 */
export const DEFAULT_MAXIMUM_AGE = 60;
