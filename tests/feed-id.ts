import { expect } from "chai";
import { feedIdEquals, feedIdToHex, getFeedIdFromHex } from "../app/src/price-update/feed-id";
import { getPriceErrorKind } from "./helpers/fixtures";

const SOL_USD = "ef0d8b6fda2ceba41da15d4095d1da392a0d2f8ed0c6c7bc0f4cfac8c280b56d";

describe("feed ids", () => {
  it("parses a 0x-prefixed id byte for byte", () => {
    const feedId = getFeedIdFromHex(`0x${SOL_USD}`);
    expect(feedId.length).to.equal(32);
    expect(feedId[0]).to.equal(0xef);
    expect(feedId[1]).to.equal(0x0d);
    expect(feedId[31]).to.equal(0x6d);
  });

  it("parses an id without prefix to the same bytes", () => {
    expect(feedIdEquals(getFeedIdFromHex(SOL_USD), getFeedIdFromHex(`0x${SOL_USD}`))).to.equal(true);
  });

  it("is case-insensitive", () => {
    const upper = getFeedIdFromHex(`0X${SOL_USD.toUpperCase()}`);
    expect(feedIdEquals(upper, getFeedIdFromHex(SOL_USD))).to.equal(true);
  });

  it("reproduces the bytes of its lowercase hex encoding", () => {
    const bytes = Uint8Array.from({ length: 32 }, (_, i) => (i * 37 + 11) % 256);
    const hex = feedIdToHex(bytes, { prefix: false });
    expect(hex).to.equal(hex.toLowerCase());
    expect(hex).to.have.length(64);
    expect(Array.from(getFeedIdFromHex(hex))).to.deep.equal(Array.from(bytes));
    expect(Array.from(getFeedIdFromHex(`0x${hex}`))).to.deep.equal(Array.from(bytes));
  });

  it("encodes with a 0x prefix by default", () => {
    expect(feedIdToHex(getFeedIdFromHex(SOL_USD))).to.equal(`0x${SOL_USD}`);
  });

  it("rejects lengths other than 64 or 66", () => {
    expect(getPriceErrorKind(() => getFeedIdFromHex(""))).to.equal("FeedIdMustBe32Bytes");
    expect(getPriceErrorKind(() => getFeedIdFromHex(SOL_USD.slice(1)))).to.equal("FeedIdMustBe32Bytes");
    expect(getPriceErrorKind(() => getFeedIdFromHex(`${SOL_USD}0`))).to.equal("FeedIdMustBe32Bytes");
    expect(getPriceErrorKind(() => getFeedIdFromHex(`0x${SOL_USD}0`))).to.equal("FeedIdMustBe32Bytes");
  });

  it("rejects non-hex characters", () => {
    const withG = `g${SOL_USD.slice(1)}`;
    expect(withG).to.have.length(64);
    expect(getPriceErrorKind(() => getFeedIdFromHex(withG))).to.equal("FeedIdNonHexCharacter");
    expect(getPriceErrorKind(() => getFeedIdFromHex(`0x${withG}`))).to.equal("FeedIdNonHexCharacter");
  });

  it("rejects a 66 character id without the 0x prefix", () => {
    expect(getPriceErrorKind(() => getFeedIdFromHex(`zz${SOL_USD}`))).to.equal("FeedIdNonHexCharacter");
  });

  it("compares ids byte-wise", () => {
    const a = getFeedIdFromHex(SOL_USD);
    const b = Uint8Array.from(a);
    b[31] = 0;
    expect(feedIdEquals(a, Uint8Array.from(a))).to.equal(true);
    expect(feedIdEquals(a, b)).to.equal(false);
  });
});
