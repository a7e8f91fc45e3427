/**
 * 支持的交易所标识，新增交易所需在此扩展。
 */
export const CEX_EXCHANGES = ["binance"] as const;

export type CexExchange = (typeof CEX_EXCHANGES)[number];

/**
 * 交易对允许携带的分隔符。
 */
export const PAIR_DELIMITERS = ["-", "_", "/"] as const;

export type PairDelimiter = (typeof PAIR_DELIMITERS)[number];

/**
 * 显式给出 base/quote 的统一交易对。
 */
export interface BaseQuotePair {
  kind: "BASE_QUOTE";
  exchange: CexExchange;
  base: string;
  quote: string;
}

/**
 * 仅有原始字符串的统一交易对，分隔符可选。
 */
export interface RawPair {
  kind: "RAW";
  exchange: CexExchange;
  pair: string;
  delimiter?: PairDelimiter;
}

/**
 * 统一交易对：两种形态有且仅有一种。
 */
export type CanonicalPair = BaseQuotePair | RawPair;

/**
 * 交易所原生交易对，pair 为大写且不含分隔符。
 */
export interface NativePair {
  exchange: CexExchange;
  pair: string;
}

/**
 * 统一交易类型。
 */
export type CanonicalTradingType =
  | "SPOT"
  | "PERPETUAL"
  | "MARGIN"
  | "FUTURES"
  | "OPTION"
  | "OTHER";
