import type { CanonicalCurrency, WrappedCurrencyRef } from "./models";

/**
 * 包装币启发式判断：名称含 wrapped 且代码以 w 开头（均不区分大小写）。
 */
export function isWrappedToken(name: string, symbol: string): boolean {
  return name.toLowerCase().includes("wrapped") && symbol.toLowerCase().startsWith("w");
}

/**
 * 判断币种是否关联了包装币：链条目标记为 isWrapped，且关联的币种本身满足包装币判断。
 * 关联方向为原生币指向包装币（如 ETH → WETH）。
 */
export function hasLinkedWrappedPlatform(currency: CanonicalCurrency): boolean {
  return currency.blockchains.some(
    (platform) =>
      platform.isWrapped &&
      platform.wrappedCurrency !== undefined &&
      isWrappedToken(platform.wrappedCurrency.name, platform.wrappedCurrency.symbol)
  );
}

/**
 * 在批次内按 symbol + name 查找被引用的币种，找不到时返回 null。
 */
export function resolveWrappedCurrency(
  ref: WrappedCurrencyRef,
  batch: readonly CanonicalCurrency[]
): CanonicalCurrency | null {
  return batch.find((currency) => currency.symbol === ref.symbol && currency.name === ref.name) ?? null;
}

/**
 * 批次内包装币关联的处理函数，由下游聚合逻辑提供。
 */
export type WrappedLinker = (currencies: CanonicalCurrency[]) => CanonicalCurrency[];
