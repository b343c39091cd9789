/**
 * Reads price update accounts over Solana RPC
 */

import { AccountInfo, Commitment, PublicKey, SYSVAR_CLOCK_PUBKEY } from '@solana/web3.js';
import { AccountNotFoundError, AccountOwnerError, ClockState, FeedId, IntegerLike, Price } from '../types';
import { RECEIVER_PROGRAM_ID } from '../config/constants';
import { PriceUpdateV2 } from '../price-update/price-update';
import { VerificationLevel } from '../price-update/verification-level';
import { feedIdToHex } from '../price-update/feed-id';
import { decodeClock, decodePriceUpdateAccount } from './account-codec';
import { Logger, getLogger } from '../utils/logger';

/**
 * The part of `Connection` the reader needs
 */
export interface AccountInfoProvider {
  getAccountInfo(publicKey: PublicKey, commitment?: Commitment): Promise<AccountInfo<Buffer> | null>;
}

export interface PriceUpdateReaderOptions {
  /** Owner expected for price update accounts */
  programId?: PublicKey;
  commitment?: Commitment;
  logger?: Logger;
}

/**
 * Fetches price update accounts and the chain clock, then applies the
 * price accessors of PriceUpdateV2 with the clock's unix timestamp.
 */
export class PriceUpdateReader {
  private connection: AccountInfoProvider;
  private programId: PublicKey;
  private commitment: Commitment;
  private logger: Logger;

  constructor(connection: AccountInfoProvider, options: PriceUpdateReaderOptions = {}) {
    this.connection = connection;
    this.programId = options.programId ?? RECEIVER_PROGRAM_ID;
    this.commitment = options.commitment ?? 'confirmed';
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Fetch and decode a price update account
   */
  async fetchPriceUpdate(address: PublicKey): Promise<PriceUpdateV2> {
    this.logger.debug(`Fetching price update ${address.toBase58()}`);
    const info = await this.connection.getAccountInfo(address, this.commitment);

    if (!info) {
      throw new AccountNotFoundError(address);
    }
    if (!info.owner.equals(this.programId)) {
      throw new AccountOwnerError(address, info.owner, this.programId);
    }

    const update = decodePriceUpdateAccount(info.data);
    this.logger.debug(
      `Decoded ${feedIdToHex(update.priceMessage.feedId)} posted at slot ${update.postedSlot}`,
      `(${VerificationLevel.format(update.verificationLevel)})`
    );
    return update;
  }

  /**
   * Fetch the clock sysvar
   */
  async fetchClock(): Promise<ClockState> {
    const info = await this.connection.getAccountInfo(SYSVAR_CLOCK_PUBKEY, this.commitment);
    if (!info) {
      throw new AccountNotFoundError(SYSVAR_CLOCK_PUBKEY);
    }
    const clock = decodeClock(info.data);
    this.logger.debug(`Clock at slot ${clock.slot}: unix timestamp ${clock.unixTimestamp}`);
    return clock;
  }

  /**
   * Fetch a price no older than `maximumAge` seconds by the chain clock.
   * Defaults to requiring Full verification.
   */
  async getPriceNoOlderThan(
    address: PublicKey,
    maximumAge: IntegerLike,
    feedId: FeedId,
    verificationLevel: VerificationLevel = VerificationLevel.FULL
  ): Promise<Price> {
    const [update, clock] = await Promise.all([this.fetchPriceUpdate(address), this.fetchClock()]);
    return update.getPriceNoOlderThanWithCustomVerificationLevel(
      clock.unixTimestamp,
      maximumAge,
      feedId,
      verificationLevel
    );
  }

  /**
   * Fetch a price with only the feed id checked.
   *
   * WARNING: no recency or verification check, see PriceUpdateV2.getPriceUnchecked.
   */
  async getPriceUnchecked(address: PublicKey, feedId: FeedId): Promise<Price> {
    const update = await this.fetchPriceUpdate(address);
    return update.getPriceUnchecked(feedId);
  }
}
