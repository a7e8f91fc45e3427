import { describePair } from "./canonical-pair";
import { InvalidPairFormatError } from "./errors";
import type { BaseQuotePair, CanonicalPair, CexExchange, NativePair, RawPair } from "./models";

/**
 * 交易所原生交易对的字符规则，不同交易所可定义不同的禁用字符集。
 */
export interface PairValidityRules {
  exchange: CexExchange;
  /** 原生交易对中不允许出现的分隔符 */
  forbiddenDelimiters: readonly string[];
}

/**
 * 交易对编解码接口，用于统一处理不同交易所的命名规则。
 */
export interface ExchangePairCodec {
  readonly exchange: CexExchange;
  /** 判断字符串是否满足交易所原生格式 */
  isValid(value: string): boolean;
  /** 将原生字符串转为交易所交易对，格式非法时抛出 InvalidPairFormatError */
  decode(value: string): NativePair;
  /** 将统一交易对转为交易所格式，按回退链依次尝试 */
  encode(pair: CanonicalPair): NativePair;
  /** 将原生交易对包装为统一交易对（无 base/quote 信息） */
  toCanonical(native: NativePair): RawPair;
  /** 使用已知的 base/quote 包装为统一交易对 */
  toCanonicalWith(native: NativePair, base: string, quote: string): BaseQuotePair;
  /** 判断统一交易对与原生字符串是否指向同一市场，无法编码时返回 false，不抛错 */
  isSameMarket(pair: CanonicalPair, exchangePair: string): boolean;
}

/**
 * 按规则判断原生交易对是否合法。
 */
export function isValidNativePair(rules: PairValidityRules, value: string): boolean {
  return rules.forbiddenDelimiters.every((delimiter) => !value.includes(delimiter));
}

/**
 * 去除全部禁用分隔符。
 */
function stripDelimiters(rules: PairValidityRules, value: string): string {
  return rules.forbiddenDelimiters.reduce((acc, delimiter) => acc.replaceAll(delimiter, ""), value);
}

/**
 * 按声明的分隔符拆分，结果不是恰好两段非空字符串时返回 null。
 */
function splitDelimitedParts(pair: RawPair, delimiter: string): [string, string] | null {
  const parts = pair.pair.split(delimiter);
  const [base, quote] = parts;
  if (parts.length !== 2 || !base || !quote) {
    return null;
  }
  return [base, quote];
}

/**
 * 按声明的分隔符拆分为两段并各自大写后拼接。
 * 拆分结果不是恰好两段非空字符串属于调用方违约，直接抛出普通错误。
 */
function joinDelimitedParts(pair: RawPair, delimiter: string): string {
  const parts = splitDelimitedParts(pair, delimiter);
  if (!parts) {
    throw new Error(
      `交易对 '${pair.pair}' 按分隔符 '${delimiter}' 拆分后应恰好为两段非空字符串`
    );
  }
  const [base, quote] = parts;
  return `${base.toUpperCase()}${quote.toUpperCase()}`;
}

/**
 * 基于字符规则创建交易对编解码器。
 */
export function createPairCodec(rules: PairValidityRules): ExchangePairCodec {
  const isValid = (value: string): boolean => isValidNativePair(rules, value);

  const decode = (value: string): NativePair => {
    if (!isValid(value)) {
      throw new InvalidPairFormatError(
        value,
        rules.exchange,
        `包含 ${rules.forbiddenDelimiters.map((d) => `'${d}'`).join(", ")} 之一`
      );
    }
    return { exchange: rules.exchange, pair: value.toUpperCase() };
  };

  const encode = (pair: CanonicalPair): NativePair => {
    if (pair.exchange !== rules.exchange) {
      throw new InvalidPairFormatError(
        describePair(pair),
        rules.exchange,
        `交易对属于交易所 ${pair.exchange}`
      );
    }
    // base/quote 最权威，直接拼接，不强制大小写。
    if (pair.kind === "BASE_QUOTE") {
      return { exchange: rules.exchange, pair: `${pair.base}${pair.quote}` };
    }
    if (isValid(pair.pair)) {
      return decode(pair.pair);
    }
    if (pair.delimiter !== undefined) {
      return { exchange: rules.exchange, pair: joinDelimitedParts(pair, pair.delimiter) };
    }
    // 最后手段：剔除全部分隔符后重试。
    const stripped = stripDelimiters(rules, pair.pair);
    if (stripped.length > 0 && isValid(stripped)) {
      return decode(stripped);
    }
    throw new InvalidPairFormatError(pair.pair, rules.exchange);
  };

  return {
    exchange: rules.exchange,
    isValid,
    decode,
    encode,
    toCanonical(native: NativePair): RawPair {
      return { kind: "RAW", exchange: native.exchange, pair: native.pair };
    },
    toCanonicalWith(native: NativePair, base: string, quote: string): BaseQuotePair {
      return { kind: "BASE_QUOTE", exchange: native.exchange, base, quote };
    },
    isSameMarket(pair: CanonicalPair, exchangePair: string): boolean {
      if (!isValid(exchangePair)) {
        return false;
      }
      // encode 会对违约的分隔符拆分抛错，这里先行判断，保证只返回布尔值。
      if (
        pair.kind === "RAW" &&
        pair.delimiter !== undefined &&
        !isValid(pair.pair) &&
        !splitDelimitedParts(pair, pair.delimiter)
      ) {
        return false;
      }
      try {
        // base/quote 拼接不改大小写，比较时统一为大写。
        return encode(pair).pair.toUpperCase() === decode(exchangePair).pair;
      } catch (error) {
        if (error instanceof InvalidPairFormatError) {
          return false;
        }
        throw error;
      }
    },
  };
}
