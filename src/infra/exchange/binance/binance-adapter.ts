import type { EquivalenceReport } from "../../../core/currency/equivalence";
import { compareBatches, warnEquivalenceMismatch } from "../../../core/currency/equivalence";
import type { CanonicalCurrency } from "../../../core/currency/models";
import type {
  ExchangeNormalizerAdapter,
  NormalizeCurrenciesOptions,
} from "../../../core/exchange/adapter";
import type { CanonicalTradingType } from "../../../core/exchange/models";
import { parseTradingType } from "../../../core/exchange/trading-type";
import { normalizeBinanceSymbols } from "./binance-currency";
import { binancePairCodec } from "./binance-pair";
import { unwrapBinanceSymbols } from "./binance-symbols";

/**
 * Binance 归一化适配器。
 */
export class BinanceNormalizerAdapter implements ExchangeNormalizerAdapter {
  public readonly exchange = "binance" as const;
  public readonly pairs = binancePairCodec;

  public parseTradingType(token: string): CanonicalTradingType {
    return parseTradingType(token);
  }

  public normalizeCurrencies(
    document: unknown,
    options?: NormalizeCurrenciesOptions
  ): CanonicalCurrency[] {
    return normalizeBinanceSymbols(unwrapBinanceSymbols(document), options);
  }

  /**
   * 比对的是原始记录条数，而不是归一化后的条数。
   */
  public compareWithReference(
    document: unknown,
    reference: readonly CanonicalCurrency[]
  ): EquivalenceReport {
    const report = compareBatches(unwrapBinanceSymbols(document), reference);
    if (!report.equivalent) {
      warnEquivalenceMismatch(this.exchange, report);
    }
    return report;
  }
}
