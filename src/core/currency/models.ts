import type { CexExchange } from "../exchange/models";
import type { Blockchain } from "./blockchain";

/**
 * 指向被包装币种的弱引用，仅作为查找键使用，按需在批次内解析。
 */
export interface WrappedCurrencyRef {
  symbol: string;
  name: string;
}

/**
 * 币种所在链的信息。
 */
export interface BlockchainPlatform {
  blockchain: Blockchain;
  /** 链上合约地址 */
  address?: string;
  isWrapped: boolean;
  /** 由聚合阶段填充，单条记录归一化时不设置 */
  wrappedCurrency?: WrappedCurrencyRef;
}

/**
 * 统一币种记录，构造后不再修改。
 */
export interface CanonicalCurrency {
  exchange: CexExchange;
  symbol: string;
  name: string;
  displayName?: string;
  /** 状态描述，目前由最后更新时间生成 */
  status: string;
  blockchains: BlockchainPlatform[];
}

/**
 * 币种的 (name, symbol) 标识，用于批次比对。
 */
export interface CurrencyIdentity {
  name: string;
  symbol: string;
}
