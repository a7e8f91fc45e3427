import type { ExchangeNormalizerAdapter } from "../../core/exchange/adapter";
import type { CexExchange } from "../../core/exchange/models";
import { BinanceNormalizerAdapter } from "./binance/binance-adapter";

/**
 * 交易所适配器工厂，按交易所标识创建对应的实现。
 */
export function createExchangeAdapter(exchange: CexExchange): ExchangeNormalizerAdapter {
  // 新增交易所在此分支扩展即可。
  switch (exchange) {
    case "binance":
      return new BinanceNormalizerAdapter();
  }
}
