import { expect } from "chai";
import { PublicKey } from "@solana/web3.js";
import { decodeClock, decodePriceUpdateAccount, encodePriceUpdateAccount } from "../app/src/solana/account-codec";
import { VerificationLevel } from "../app/src/price-update/verification-level";
import { AccountDecodeError } from "../app/src/types";
import { FEED_A, WRITE_AUTHORITY, makeUpdate } from "./helpers/fixtures";

describe("account codec", () => {
  describe("encodePriceUpdateAccount", () => {
    it("lays out a Partial update", () => {
      const data = encodePriceUpdateAccount(makeUpdate({ verificationLevel: VerificationLevel.partial(3) }));
      expect(data.length).to.equal(134);
      expect(Array.from(data.subarray(0, 8))).to.deep.equal([34, 241, 35, 99, 157, 126, 244, 205]);
      expect(data.subarray(8, 40).equals(WRITE_AUTHORITY.toBuffer())).to.equal(true);
      expect(data[40]).to.equal(0);
      expect(data[41]).to.equal(3);
      expect(data.subarray(42, 74).equals(Buffer.from(FEED_A))).to.equal(true);
      expect(data.readBigInt64LE(74)).to.equal(123456789n);
      expect(data.readBigUInt64LE(82)).to.equal(5000n);
      expect(data.readInt32LE(90)).to.equal(-8);
      expect(data.readBigInt64LE(94)).to.equal(1000n);
      expect(data.readBigUInt64LE(126)).to.equal(250_000_000n);
    });

    it("lays out a Full update with one byte of padding", () => {
      const data = encodePriceUpdateAccount(makeUpdate({ verificationLevel: VerificationLevel.FULL }));
      expect(data.length).to.equal(134);
      expect(data[40]).to.equal(1);
      expect(data.subarray(41, 73).equals(Buffer.from(FEED_A))).to.equal(true);
      expect(data.readBigUInt64LE(125)).to.equal(250_000_000n);
      expect(data[133]).to.equal(0);
    });
  });

  describe("decodePriceUpdateAccount", () => {
    it("restores every field of a Partial update", () => {
      const original = makeUpdate({
        verificationLevel: VerificationLevel.partial(13),
        message: { price: -42n, emaPrice: -40n, prevPublishTime: 1000n },
      });
      const decoded = decodePriceUpdateAccount(encodePriceUpdateAccount(original));

      expect(decoded.writeAuthority.equals(WRITE_AUTHORITY)).to.equal(true);
      expect(decoded.verificationLevel).to.deep.equal({ kind: "Partial", numSignatures: 13 });
      expect(decoded.postedSlot).to.equal(250_000_000n);
      expect(Array.from(decoded.priceMessage.feedId)).to.deep.equal(Array.from(FEED_A));
      expect(decoded.priceMessage.price).to.equal(-42n);
      expect(decoded.priceMessage.conf).to.equal(5000n);
      expect(decoded.priceMessage.exponent).to.equal(-8);
      expect(decoded.priceMessage.publishTime).to.equal(1000n);
      expect(decoded.priceMessage.prevPublishTime).to.equal(1000n);
      expect(decoded.priceMessage.emaPrice).to.equal(-40n);
      expect(decoded.priceMessage.emaConf).to.equal(4800n);
    });

    it("decodes a Full update without its padding byte", () => {
      const data = encodePriceUpdateAccount(makeUpdate({ verificationLevel: VerificationLevel.FULL }));
      const decoded = decodePriceUpdateAccount(data.subarray(0, 133));
      expect(decoded.verificationLevel).to.deep.equal({ kind: "Full" });
      expect(decoded.postedSlot).to.equal(250_000_000n);
    });

    it("returns a record the accessors work on", () => {
      const data = encodePriceUpdateAccount(makeUpdate({ verificationLevel: VerificationLevel.FULL }));
      const price = decodePriceUpdateAccount(data).getPriceNoOlderThan(1010, 30, FEED_A);
      expect(price).to.deep.equal({ price: 123456789n, conf: 5000n, exponent: -8, publishTime: 1000n });
    });

    it("rejects another account type", () => {
      const data = encodePriceUpdateAccount(makeUpdate());
      data[0] = 0;
      expect(() => decodePriceUpdateAccount(data)).to.throw(
        AccountDecodeError,
        "Not a PriceUpdateV2 account (discriminator 00f123639d7ef4cd)"
      );
    });

    it("rejects truncated data", () => {
      const data = encodePriceUpdateAccount(makeUpdate());
      expect(() => decodePriceUpdateAccount(data.subarray(0, 100))).to.throw(
        AccountDecodeError,
        "PriceUpdateV2 account data too short: need 102 bytes, got 100"
      );
    });

    it("rejects an unknown verification level tag", () => {
      const data = encodePriceUpdateAccount(makeUpdate());
      data[40] = 2;
      expect(() => decodePriceUpdateAccount(data)).to.throw(AccountDecodeError, "Unknown verification level tag 2");
    });

    it("keeps the write authority as a public key", () => {
      const authority = new PublicKey(Buffer.alloc(32, 9));
      const data = encodePriceUpdateAccount({ ...makeUpdate(), writeAuthority: authority });
      expect(decodePriceUpdateAccount(data).writeAuthority.toBase58()).to.equal(authority.toBase58());
    });
  });

  describe("decodeClock", () => {
    it("reads the unix timestamp at offset 32", () => {
      const data = Buffer.alloc(40);
      data.writeBigUInt64LE(300_000_000n, 0);
      data.writeBigInt64LE(1_699_000_000n, 8);
      data.writeBigUInt64LE(700n, 16);
      data.writeBigUInt64LE(701n, 24);
      data.writeBigInt64LE(1_700_000_000n, 32);

      expect(decodeClock(data)).to.deep.equal({
        slot: 300_000_000n,
        epochStartTimestamp: 1_699_000_000n,
        epoch: 700n,
        leaderScheduleEpoch: 701n,
        unixTimestamp: 1_700_000_000n,
      });
    });

    it("rejects short clock data", () => {
      expect(() => decodeClock(Buffer.alloc(32))).to.throw(
        AccountDecodeError,
        "Clock sysvar data too short: need 40 bytes, got 32"
      );
    });
  });
});
