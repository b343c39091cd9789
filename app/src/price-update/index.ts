/**
 * Price update receiver SDK
 */

export { VerificationLevel } from './verification-level';
export { getFeedIdFromHex, feedIdToHex, feedIdEquals } from './feed-id';
export { PriceUpdateV2 } from './price-update';
export {
  decodePriceUpdateAccount,
  encodePriceUpdateAccount,
  decodeClock,
} from '../solana/account-codec';
export { PriceUpdateReader } from '../solana/price-update-reader';
export type { AccountInfoProvider, PriceUpdateReaderOptions } from '../solana/price-update-reader';
export type {
  FeedId,
  Price,
  PriceFeedMessage,
  PriceUpdateData,
  ClockState,
  IntegerLike,
  GetPriceErrorKind,
} from '../types';
export {
  ReceiverError,
  GetPriceError,
  VerificationLevelError,
  AccountDecodeError,
  AccountNotFoundError,
  AccountOwnerError,
} from '../types';
export { RECEIVER_PROGRAM_ID } from '../config/constants';
