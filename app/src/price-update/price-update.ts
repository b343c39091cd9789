/**
 * Price update account
 *
 * Stores a verified price update from a price feed. Written by the receiver
 * program; this module only reads it.
 */

import { PublicKey } from '@solana/web3.js';
import {
  FeedId,
  GetPriceError,
  IntegerLike,
  Price,
  PriceFeedMessage,
  PriceUpdateData,
} from '../types';
import { I64_MAX, PRICE_UPDATE_V2_DISCRIMINATOR, PRICE_UPDATE_V2_LEN } from '../config/constants';
import { saturatingAddI64, toI64, toU64 } from '../utils/integers';
import { VerificationLevel } from './verification-level';
import { feedIdEquals } from './feed-id';

/**
 * A price update account.
 *
 * - `writeAuthority`: can close this account to reclaim rent, or overwrite it with
 *   a different price update.
 * - `verificationLevel`: how many guardian signatures have been verified for this update.
 * - `priceMessage`: the actual price update.
 * - `postedSlot`: the slot at which this update was posted.
 */
export class PriceUpdateV2 implements PriceUpdateData {
  static readonly LEN = PRICE_UPDATE_V2_LEN;
  static readonly DISCRIMINATOR = PRICE_UPDATE_V2_DISCRIMINATOR;

  readonly writeAuthority: PublicKey;
  readonly verificationLevel: VerificationLevel;
  readonly priceMessage: PriceFeedMessage;
  readonly postedSlot: bigint;

  constructor(data: PriceUpdateData) {
    this.writeAuthority = data.writeAuthority;
    this.verificationLevel = data.verificationLevel;
    this.priceMessage = data.priceMessage;
    this.postedSlot = data.postedSlot;
  }

  /**
   * Get the price for `feedId` without any recency or verification check.
   *
   * WARNING: this does not check how recent the price is, nor whether the
   * update has been verified. Using it without extra checks allows unverified
   * or outdated price updates to be consumed. Prefer getPriceNoOlderThan.
   *
   * @throws GetPriceError `MismatchedFeedId`
   */
  getPriceUnchecked(feedId: FeedId): Price {
    if (!feedIdEquals(this.priceMessage.feedId, feedId)) {
      throw new GetPriceError('MismatchedFeedId');
    }
    return {
      price: this.priceMessage.price,
      conf: this.priceMessage.conf,
      exponent: this.priceMessage.exponent,
      publishTime: this.priceMessage.publishTime,
    };
  }

  /**
   * Get the price for `feedId`, no older than `maximumAge` seconds at
   * `currentTime`, from an update verified at least to `verificationLevel`.
   *
   * Checks run in a fixed order and stop at the first failure:
   * verification level, then feed id, then age.
   *
   * WARNING: lowering the level from Full to Partial increases the risk of
   * using a malicious price update, since fewer guardians need to collude.
   *
   * @example
   * const price = update.getPriceNoOlderThanWithCustomVerificationLevel(
   *   clock.unixTimestamp,
   *   30,
   *   getFeedIdFromHex(SOL_USD),
   *   VerificationLevel.partial(5)
   * );
   *
   * @throws GetPriceError `InsufficientVerificationLevel`, `MismatchedFeedId` or `PriceTooOld`
   */
  getPriceNoOlderThanWithCustomVerificationLevel(
    currentTime: IntegerLike,
    maximumAge: IntegerLike,
    feedId: FeedId,
    verificationLevel: VerificationLevel
  ): Price {
    const now = toI64(currentTime, 'currentTime');
    const maxAge = toU64(maximumAge, 'maximumAge');

    if (!VerificationLevel.gte(this.verificationLevel, verificationLevel)) {
      throw new GetPriceError('InsufficientVerificationLevel');
    }

    const price = this.getPriceUnchecked(feedId);

    // u64 ages above i64::MAX mean "never stale"
    const age = maxAge > I64_MAX ? I64_MAX : maxAge;
    if (saturatingAddI64(price.publishTime, age) < now) {
      throw new GetPriceError('PriceTooOld');
    }

    return price;
  }

  /**
   * Get the price for `feedId`, no older than `maximumAge` seconds at
   * `currentTime`, from a fully verified update.
   *
   * @example
   * const MAXIMUM_AGE = 30;
   * const price = update.getPriceNoOlderThan(clock.unixTimestamp, MAXIMUM_AGE, getFeedIdFromHex(SOL_USD));
   *
   * @throws GetPriceError `InsufficientVerificationLevel`, `MismatchedFeedId` or `PriceTooOld`
   */
  getPriceNoOlderThan(currentTime: IntegerLike, maximumAge: IntegerLike, feedId: FeedId): Price {
    return this.getPriceNoOlderThanWithCustomVerificationLevel(
      currentTime,
      maximumAge,
      feedId,
      VerificationLevel.FULL
    );
  }
}
