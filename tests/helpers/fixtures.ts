import { PublicKey } from "@solana/web3.js";
import { PriceUpdateV2 } from "../../app/src/price-update/price-update";
import { VerificationLevel } from "../../app/src/price-update/verification-level";
import { FeedId, GetPriceError, GetPriceErrorKind, PriceFeedMessage } from "../../app/src/types";

export const FEED_A: FeedId = Uint8Array.from(Buffer.alloc(32, 0xaa));
export const FEED_B: FeedId = Uint8Array.from(Buffer.alloc(32, 0xbb));
export const WRITE_AUTHORITY = new PublicKey(Buffer.alloc(32, 7));

export function makeMessage(overrides: Partial<PriceFeedMessage> = {}): PriceFeedMessage {
  return {
    feedId: FEED_A,
    price: 123456789n,
    conf: 5000n,
    exponent: -8,
    publishTime: 1000n,
    prevPublishTime: 998n,
    emaPrice: 123400000n,
    emaConf: 4800n,
    ...overrides,
  };
}

export function makeUpdate(
  options: {
    verificationLevel?: VerificationLevel;
    message?: Partial<PriceFeedMessage>;
    postedSlot?: bigint;
  } = {}
): PriceUpdateV2 {
  return new PriceUpdateV2({
    writeAuthority: WRITE_AUTHORITY,
    verificationLevel: options.verificationLevel ?? VerificationLevel.partial(3),
    priceMessage: makeMessage(options.message),
    postedSlot: options.postedSlot ?? 250_000_000n,
  });
}

/**
 * Kind of the GetPriceError thrown by `fn`, or null when it returns
 */
export function getPriceErrorKind(fn: () => unknown): GetPriceErrorKind | null {
  try {
    fn();
  } catch (error) {
    if (error instanceof GetPriceError) {
      return error.kind;
    }
    throw error;
  }
  return null;
}

/**
 * Error a promise rejects with, which must be an instance of `errorClass`
 */
export async function rejectionOf<E extends Error>(
  promise: Promise<unknown>,
  errorClass: new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof errorClass) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected promise to reject with ${errorClass.name}`);
}
