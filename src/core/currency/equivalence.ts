import type { CanonicalCurrency, CurrencyIdentity } from "./models";
import { hasLinkedWrappedPlatform } from "./wrapped";

/**
 * 批次比对结果，mismatch 时用于日志输出。
 */
export interface EquivalenceReport {
  equivalent: boolean;
  localCount: number;
  referenceCount: number;
  /** 参考数据中由包装币展开出的条目数 */
  syntheticCount: number;
  /** 本地批次中缺失的参考条目 */
  missing: CurrencyIdentity[];
}

function identityKey(identity: CurrencyIdentity): string {
  return JSON.stringify([identity.name, identity.symbol]);
}

/**
 * 比对本地批次与参考数据集。
 * 规则：本地条数 = 参考条数 + 包装币展开条数，且参考中的每个 (name, symbol) 都出现在本地批次。
 */
export function compareBatches(
  local: readonly CurrencyIdentity[],
  reference: readonly CanonicalCurrency[]
): EquivalenceReport {
  const localKeys = new Set(local.map(identityKey));
  const syntheticCount = reference.filter(hasLinkedWrappedPlatform).length;
  const missing = reference
    .filter((currency) => !localKeys.has(identityKey(currency)))
    .map((currency) => ({ name: currency.name, symbol: currency.symbol }));
  return {
    equivalent: local.length === reference.length + syntheticCount && missing.length === 0,
    localCount: local.length,
    referenceCount: reference.length,
    syntheticCount,
    missing,
  };
}

/**
 * 输出批次不一致的告警。
 */
export function warnEquivalenceMismatch(exchange: string, report: EquivalenceReport): void {
  console.warn(`${exchange} 币种列表与参考数据不一致`, {
    localCount: report.localCount,
    referenceCount: report.referenceCount,
    syntheticCount: report.syntheticCount,
    missing: report.missing,
  });
}

/**
 * 判断两个批次是否等价，不一致时仅输出告警，不抛错。
 */
export function isEquivalentBatch(
  exchange: string,
  local: readonly CurrencyIdentity[],
  reference: readonly CanonicalCurrency[]
): boolean {
  const report = compareBatches(local, reference);
  if (!report.equivalent) {
    warnEquivalenceMismatch(exchange, report);
  }
  return report.equivalent;
}
