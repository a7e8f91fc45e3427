import { parseBlockchain } from "../../../core/currency/blockchain";
import { isEquivalentBatch } from "../../../core/currency/equivalence";
import type { BlockchainPlatform, CanonicalCurrency } from "../../../core/currency/models";
import { isWrappedToken } from "../../../core/currency/wrapped";
import type { NormalizeCurrenciesOptions } from "../../../core/exchange/adapter";
import type { BinanceSymbol } from "./binance-symbols";

/**
 * 输出 UTC 时间，毫秒为 0 时省略小数部分（2024-05-01T12:00:00Z）。
 */
function formatUtcTimestamp(date: Date): string {
  const iso = date.toISOString();
  return date.getUTCMilliseconds() === 0 ? iso.replace(/\.000Z$/, "Z") : iso;
}

/**
 * 状态字段目前由最后更新时间生成。
 */
export function formatBinanceStatus(symbol: BinanceSymbol): string {
  return `last updated: ${formatUtcTimestamp(symbol.lastUpdated)}`;
}

/**
 * 根据 platform 推断链信息；链名称无法识别时抛错，整条记录归一化失败。
 */
export function parseBinanceBlockchain(symbol: BinanceSymbol): BlockchainPlatform | null {
  if (!symbol.platform) {
    return null;
  }
  return {
    blockchain: parseBlockchain(symbol.platform.name),
    address: symbol.platform.tokenAddress,
    isWrapped: isWrappedToken(symbol.name, symbol.symbol),
  };
}

/**
 * 单条币种记录转为统一币种，结果连同链条目一并冻结。
 */
export function normalizeBinanceSymbol(symbol: BinanceSymbol): CanonicalCurrency {
  const platform = parseBinanceBlockchain(symbol);
  const blockchains: BlockchainPlatform[] = platform ? [Object.freeze(platform)] : [];
  Object.freeze(blockchains);
  const currency: CanonicalCurrency = {
    exchange: "binance",
    symbol: symbol.symbol,
    name: symbol.name,
    status: formatBinanceStatus(symbol),
    blockchains,
  };
  return Object.freeze(currency);
}

/**
 * 批量归一化，包装币关联交给 linkWrapped 处理，未提供时原样返回。
 */
export function normalizeBinanceSymbols(
  symbols: readonly BinanceSymbol[],
  options: NormalizeCurrenciesOptions = {}
): CanonicalCurrency[] {
  const normalized = symbols.map(normalizeBinanceSymbol);
  return options.linkWrapped ? options.linkWrapped(normalized) : normalized;
}

function samePlatform(left: BlockchainPlatform, right: BlockchainPlatform): boolean {
  return (
    left.blockchain === right.blockchain &&
    left.address === right.address &&
    left.isWrapped === right.isWrapped
  );
}

/**
 * 判断原始记录与统一币种是否一致，聚合阶段追加的包装链条目不参与比较。
 */
export function matchesCanonicalCurrency(
  symbol: BinanceSymbol,
  currency: CanonicalCurrency
): boolean {
  const platform = parseBinanceBlockchain(symbol);
  const expected = platform ? [platform] : [];
  const actual = currency.blockchains.filter((item) => item.wrappedCurrency === undefined);
  const equals =
    currency.exchange === "binance" &&
    currency.symbol === symbol.symbol &&
    currency.name === symbol.name &&
    currency.displayName === undefined &&
    currency.status === formatBinanceStatus(symbol) &&
    actual.length === expected.length &&
    actual.every((item, index) => {
      const other = expected[index];
      return other !== undefined && samePlatform(item, other);
    });

  if (!equals) {
    console.warn("Binance 币种与统一币种不一致", { symbol: symbol.symbol, name: symbol.name });
    console.warn("统一币种", currency);
  }
  return equals;
}

/**
 * 比对原始币种列表与参考数据集。
 */
export function isBinanceBatchEquivalent(
  symbols: readonly BinanceSymbol[],
  reference: readonly CanonicalCurrency[]
): boolean {
  return isEquivalentBatch("binance", symbols, reference);
}
