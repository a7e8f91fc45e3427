import { describe, expect, it } from "vitest";
import {
  hasLinkedWrappedPlatform,
  isWrappedToken,
  resolveWrappedCurrency,
} from "../../../src/core/currency/wrapped";
import { buildCurrency } from "../../fixtures/binance-symbols";

describe("isWrappedToken", () => {
  it("is case-insensitive on both name and symbol", () => {
    expect(isWrappedToken("Wrapped Ether", "WETH")).toBe(true);
    expect(isWrappedToken("wrapped ether", "weth")).toBe(true);
  });

  it("requires both conditions", () => {
    expect(isWrappedToken("Wrapped Ether", "ETH")).toBe(false);
    expect(isWrappedToken("Wonder", "WND")).toBe(false);
  });
});

describe("wrapped links", () => {
  const wrapped = buildCurrency("WBTC", "Wrapped Bitcoin");
  const bitcoin = buildCurrency("BTC", "Bitcoin", [
    {
      blockchain: "ETHEREUM",
      address: "0x2260",
      isWrapped: true,
      wrappedCurrency: { symbol: "WBTC", name: "Wrapped Bitcoin" },
    },
  ]);

  it("resolves a reference against the batch", () => {
    expect(
      resolveWrappedCurrency({ symbol: "WBTC", name: "Wrapped Bitcoin" }, [bitcoin, wrapped])
    ).toBe(wrapped);
    expect(resolveWrappedCurrency({ symbol: "WBTC", name: "Wrapped BTC" }, [wrapped])).toBeNull();
  });

  it("detects links from a native coin to its wrapped token", () => {
    expect(hasLinkedWrappedPlatform(bitcoin)).toBe(true);
    expect(hasLinkedWrappedPlatform(wrapped)).toBe(false);
    expect(
      hasLinkedWrappedPlatform(
        buildCurrency("WETH", "Wrapped Ether", [{ blockchain: "ETHEREUM", isWrapped: true }])
      )
    ).toBe(false);
  });

  it("ignores links whose target fails the wrapped heuristic", () => {
    const linkedToNative = buildCurrency("WBTC", "Wrapped Bitcoin", [
      {
        blockchain: "ETHEREUM",
        isWrapped: true,
        wrappedCurrency: { symbol: "BTC", name: "Bitcoin" },
      },
    ]);
    expect(hasLinkedWrappedPlatform(linkedToNative)).toBe(false);
  });
});
