import type { CanonicalTradingType } from "./models";

/**
 * 交易类型别名表，键为小写。
 * linear/inverse 结算方式不同，这里统一归为永续，需要区分时由调用方保留原始值。
 */
const TRADING_TYPE_ALIASES = new Map<string, CanonicalTradingType>([
  ["spot", "SPOT"],
  ["perpetual", "PERPETUAL"],
  ["perp", "PERPETUAL"],
  ["swap", "PERPETUAL"],
  ["linear", "PERPETUAL"],
  ["inverse", "PERPETUAL"],
  ["futures", "FUTURES"],
  ["margin", "MARGIN"],
  ["option", "OPTION"],
]);

/**
 * 将交易所的交易类型字符串映射为统一枚举，未知值回退为 OTHER。
 */
export function parseTradingType(token: string): CanonicalTradingType {
  return TRADING_TYPE_ALIASES.get(token.trim().toLowerCase()) ?? "OTHER";
}
