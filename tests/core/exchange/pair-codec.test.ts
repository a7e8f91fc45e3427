import { describe, expect, it } from "vitest";
import {
  createBaseQuotePair,
  createRawPair,
  describePair,
  isPairDelimiter,
} from "../../../src/core/exchange/canonical-pair";
import { InvalidPairFormatError } from "../../../src/core/exchange/errors";
import { createPairCodec, isValidNativePair } from "../../../src/core/exchange/pair-codec";

// 只禁止 "/" 的交易所规则，用于验证规则按交易所生效。
const slashOnlyCodec = createPairCodec({ exchange: "binance", forbiddenDelimiters: ["/"] });

describe("createPairCodec", () => {
  it("applies the exchange specific forbidden set", () => {
    expect(slashOnlyCodec.isValid("BTC-USDT")).toBe(true);
    expect(slashOnlyCodec.isValid("BTC/USDT")).toBe(false);
    expect(slashOnlyCodec.decode("btc-usdt").pair).toBe("BTC-USDT");
  });

  it("strips only the forbidden delimiters", () => {
    expect(slashOnlyCodec.encode(createRawPair("binance", "btc/usdt_perp")).pair).toBe(
      "BTCUSDT_PERP"
    );
  });

  it("reports validity per rule set", () => {
    expect(isValidNativePair({ exchange: "binance", forbiddenDelimiters: [] }, "a-b_c/d")).toBe(
      true
    );
  });
});

describe("canonical pair constructors", () => {
  it("accepts only the allowed delimiters", () => {
    expect(isPairDelimiter("-")).toBe(true);
    expect(isPairDelimiter(":")).toBe(false);
    expect(() => createRawPair("binance", "BTC:USDT", ":")).toThrow(InvalidPairFormatError);
  });

  it("rejects empty pairs", () => {
    expect(() => createRawPair("binance", "")).toThrow(InvalidPairFormatError);
    expect(() => createBaseQuotePair("binance", "BTC", "")).toThrow(InvalidPairFormatError);
  });

  it("keeps the delimiter only when given", () => {
    expect(createRawPair("binance", "BTCUSDT")).toEqual({
      kind: "RAW",
      exchange: "binance",
      pair: "BTCUSDT",
    });
    expect(createRawPair("binance", "BTC_USDT", "_").delimiter).toBe("_");
  });

  it("describes both shapes", () => {
    expect(describePair(createBaseQuotePair("binance", "ETH", "BTC"))).toBe("ETH/BTC");
    expect(describePair(createRawPair("binance", "eth_btc", "_"))).toBe("eth_btc");
  });
});
