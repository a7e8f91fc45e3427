import { describe, expect, it } from "vitest";
import {
  MissingEnvelopeFieldError,
  RecordDecodeError,
} from "../../../../src/core/exchange/errors";
import { unwrapBinanceSymbols } from "../../../../src/infra/exchange/binance/binance-symbols";
import { buildEnvelope, buildPlatform, buildSymbolRecord } from "../../../fixtures/binance-symbols";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

describe("unwrapBinanceSymbols", () => {
  it("decodes every record into camelCase fields", () => {
    const symbols = unwrapBinanceSymbols(
      buildEnvelope([
        buildSymbolRecord(),
        buildSymbolRecord({
          symbol: "WETH",
          name: "Wrapped Ether",
          max_supply: 21000000,
          platform: buildPlatform("Ethereum", "0xweth"),
        }),
      ])
    );

    expect(symbols).toHaveLength(2);
    const [first, second] = symbols;
    expect(first?.symbol).toBe("ABC");
    expect(first?.circulatingSupply.toString()).toBe("1000");
    expect(first?.maxSupply).toBeUndefined();
    expect(first?.platform).toBeUndefined();
    expect(first?.lastUpdated.toISOString()).toBe("2024-05-01T12:00:00.000Z");
    expect(first?.quote["USD"]?.price.toString()).toBe("1.25");
    expect(first?.quote["USD"]?.tvl).toBeUndefined();
    expect(second?.maxSupply?.toString()).toBe("21000000");
    expect(second?.platform).toEqual({
      symbol: "ETH",
      name: "Ethereum",
      tokenAddress: "0xweth",
      id: 1027,
      slug: "ethereum",
    });
  });

  it("accepts the raw response text", () => {
    const text = JSON.stringify(buildEnvelope([buildSymbolRecord()]));
    expect(unwrapBinanceSymbols(text).map((symbol) => symbol.name)).toEqual(["Alpha Coin"]);
  });

  it("fails the whole batch when one record is malformed", () => {
    const broken = buildSymbolRecord();
    delete broken["symbol"];
    const error = captureError(() =>
      unwrapBinanceSymbols(buildEnvelope([buildSymbolRecord(), broken, buildSymbolRecord()]))
    );
    expect(error).toBeInstanceOf(RecordDecodeError);
    expect(error).toMatchObject({ index: 1 });
  });

  it("rejects unparseable timestamps", () => {
    const error = captureError(() =>
      unwrapBinanceSymbols(buildEnvelope([buildSymbolRecord({ last_updated: "yesterday" })]))
    );
    expect(error).toBeInstanceOf(RecordDecodeError);
    expect(error).toMatchObject({ index: 0 });
  });

  it("reports a missing body segment", () => {
    const error = captureError(() => unwrapBinanceSymbols({ data: { data: [] } }));
    expect(error).toBeInstanceOf(MissingEnvelopeFieldError);
    expect(error).toMatchObject({ field: "body" });
  });
});
