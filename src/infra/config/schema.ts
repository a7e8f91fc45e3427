import type { CexExchange } from "../../core/exchange/models";

/**
 * 一致性校验配置：读取原始响应，归一化后与参考数据比对。
 */
export interface ConformanceConfig {
  exchange: CexExchange;
  /** 原始币种响应 JSON 文件路径 */
  symbolsPath: string;
  /** 参考数据集 JSON 文件路径，未提供时只做归一化 */
  referencePath?: string;
  /** 归一化结果输出路径 */
  outputPath?: string;
}

/**
 * 调试配置。
 */
export interface DebugConfig {
  /** 是否逐条输出归一化后的币种 */
  currencyLog: boolean;
}

/**
 * 应用总配置。
 */
export interface AppConfig {
  conformance: ConformanceConfig;
  debug: DebugConfig;
}
