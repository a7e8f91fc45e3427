import type { PairValidityRules } from "../../../core/exchange/pair-codec";
import { createPairCodec } from "../../../core/exchange/pair-codec";

/**
 * Binance 原生交易对为连续大写，如 BTCUSDT，不允许 - _ / 分隔符。
 */
export const binancePairRules: PairValidityRules = {
  exchange: "binance",
  forbiddenDelimiters: ["-", "_", "/"],
};

export const binancePairCodec = createPairCodec(binancePairRules);
