import type { EquivalenceReport } from "../currency/equivalence";
import type { CanonicalCurrency } from "../currency/models";
import type { WrappedLinker } from "../currency/wrapped";
import type { CanonicalTradingType, CexExchange } from "./models";
import type { ExchangePairCodec } from "./pair-codec";

/**
 * 批量归一化参数。
 */
export interface NormalizeCurrenciesOptions {
  /** 批次内包装币关联，未提供时不做关联 */
  linkWrapped?: WrappedLinker;
}

/**
 * 交易所归一化适配器接口，屏蔽不同交易所差异。
 * 每个交易所一个实现，按交易所标识选择。
 */
export interface ExchangeNormalizerAdapter {
  readonly exchange: CexExchange;
  /** 交易对编解码 */
  readonly pairs: ExchangePairCodec;
  parseTradingType(token: string): CanonicalTradingType;
  /** 解包响应并归一化全部币种，任意记录失败则整批失败 */
  normalizeCurrencies(document: unknown, options?: NormalizeCurrenciesOptions): CanonicalCurrency[];
  /** 解包响应并与参考数据集比对，不一致时输出告警 */
  compareWithReference(
    document: unknown,
    reference: readonly CanonicalCurrency[]
  ): EquivalenceReport;
}
