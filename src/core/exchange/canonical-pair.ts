import { InvalidPairFormatError } from "./errors";
import type { BaseQuotePair, CanonicalPair, CexExchange, PairDelimiter, RawPair } from "./models";
import { PAIR_DELIMITERS } from "./models";

/**
 * 判断字符是否为允许的分隔符。
 */
export function isPairDelimiter(value: string): value is PairDelimiter {
  return PAIR_DELIMITERS.some((delimiter) => delimiter === value);
}

/**
 * 构造 base/quote 形式的统一交易对。
 * 大小写保持原样，由调用方提前规整。
 */
export function createBaseQuotePair(
  exchange: CexExchange,
  base: string,
  quote: string
): BaseQuotePair {
  if (base.length === 0 || quote.length === 0) {
    throw new InvalidPairFormatError(`${base}/${quote}`, exchange, "base 与 quote 不能为空");
  }
  return { kind: "BASE_QUOTE", exchange, base, quote };
}

/**
 * 构造原始字符串形式的统一交易对。
 */
export function createRawPair(exchange: CexExchange, pair: string, delimiter?: string): RawPair {
  if (pair.length === 0) {
    throw new InvalidPairFormatError(pair, exchange, "交易对不能为空");
  }
  if (delimiter === undefined) {
    return { kind: "RAW", exchange, pair };
  }
  if (!isPairDelimiter(delimiter)) {
    throw new InvalidPairFormatError(pair, exchange, `不支持的分隔符 '${delimiter}'`);
  }
  return { kind: "RAW", exchange, pair, delimiter };
}

/**
 * 输出可读的交易对描述，用于日志与错误信息。
 */
export function describePair(pair: CanonicalPair): string {
  if (pair.kind === "BASE_QUOTE") {
    return `${pair.base}/${pair.quote}`;
  }
  return pair.pair;
}
