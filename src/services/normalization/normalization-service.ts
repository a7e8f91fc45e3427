import type { EquivalenceReport } from "../../core/currency/equivalence";
import type { CanonicalCurrency } from "../../core/currency/models";
import type {
  ExchangeNormalizerAdapter,
  NormalizeCurrenciesOptions,
} from "../../core/exchange/adapter";
import type {
  CanonicalPair,
  CanonicalTradingType,
  CexExchange,
  NativePair,
} from "../../core/exchange/models";

/**
 * 适配器来源，默认由交易所工厂创建。
 */
export type AdapterFactory = (exchange: CexExchange) => ExchangeNormalizerAdapter;

/**
 * 归一化服务：按数据携带的交易所标识分派到对应适配器。
 */
export class NormalizationService {
  private readonly adapters = new Map<CexExchange, ExchangeNormalizerAdapter>();
  private readonly createAdapter: AdapterFactory;

  constructor(createAdapter: AdapterFactory) {
    this.createAdapter = createAdapter;
  }

  /**
   * 获取交易所适配器，同一交易所只创建一次。
   */
  public getAdapter(exchange: CexExchange): ExchangeNormalizerAdapter {
    const cached = this.adapters.get(exchange);
    if (cached) {
      return cached;
    }
    const adapter = this.createAdapter(exchange);
    this.adapters.set(exchange, adapter);
    return adapter;
  }

  public decodePair(exchange: CexExchange, value: string): NativePair {
    return this.getAdapter(exchange).pairs.decode(value);
  }

  /**
   * 统一交易对转为交易所格式，交易所取自交易对本身。
   */
  public encodePair(pair: CanonicalPair): NativePair {
    return this.getAdapter(pair.exchange).pairs.encode(pair);
  }

  public parseTradingType(exchange: CexExchange, token: string): CanonicalTradingType {
    return this.getAdapter(exchange).parseTradingType(token);
  }

  public normalizeCurrencies(
    exchange: CexExchange,
    document: unknown,
    options?: NormalizeCurrenciesOptions
  ): CanonicalCurrency[] {
    return this.getAdapter(exchange).normalizeCurrencies(document, options);
  }

  public compareWithReference(
    exchange: CexExchange,
    document: unknown,
    reference: readonly CanonicalCurrency[]
  ): EquivalenceReport {
    return this.getAdapter(exchange).compareWithReference(document, reference);
  }
}
