import { existsSync } from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { CEX_EXCHANGES } from "../../core/exchange/models";
import { formatZodError } from "../../shared/zod-error";
import type { AppConfig, ConformanceConfig, DebugConfig } from "./schema";

let loaded = false;

/**
 * 加载 .env 文件（若存在），用于本地开发环境。
 * 生产环境可直接通过环境变量注入，不强制要求文件存在。
 */
function ensureEnvLoaded(): void {
  if (loaded) {
    return;
  }
  const envPath = path.resolve(process.cwd(), ".env");
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  } else {
    dotenv.config();
  }
  loaded = true;
}

/**
 * 将空字符串规整为 undefined，便于统一默认值处理。
 */
function emptyToUndefined(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * 必填字符串字段校验。
 */
function requiredString(key: string) {
  const message = `缺少必要环境变量: ${key}`;
  return z.preprocess(
    (value) => {
      const normalized = emptyToUndefined(value);
      return normalized === undefined ? "" : normalized;
    },
    z.string().min(1, message)
  );
}

/**
 * 可选字符串字段校验。
 */
function optionalString() {
  return z.preprocess(emptyToUndefined, z.string().optional());
}

/**
 * 可选布尔字段校验，未提供时返回默认值。
 */
function optionalBooleanField(key: string, defaultValue: boolean) {
  return optionalString().transform((value, ctx) => {
    if (value === undefined) {
      return defaultValue;
    }
    const normalized = value.toLowerCase();
    if (normalized === "true" || normalized === "1") {
      return true;
    }
    if (normalized === "false" || normalized === "0") {
      return false;
    }
    ctx.addIssue({
      code: "custom",
      message: `环境变量 ${key} 不是有效布尔值: ${value}`,
    });
    return z.NEVER;
  });
}

/**
 * 交易所名称校验，统一为小写并提供默认值。
 */
function exchangeNameField() {
  return z
    .preprocess((value) => {
      const normalized = emptyToUndefined(value);
      return typeof normalized === "string" ? normalized.toLowerCase() : normalized;
    }, z.enum(CEX_EXCHANGES, "暂不支持交易所").optional())
    .transform((value) => value ?? "binance");
}

/**
 * 解析并校验环境变量，返回结构化的配置数据。
 */
const envSchema = z
  .object({
    EXCHANGE: exchangeNameField(),
    CONFORMANCE_SYMBOLS_PATH: requiredString("CONFORMANCE_SYMBOLS_PATH"),
    CONFORMANCE_REFERENCE_PATH: optionalString(),
    CONFORMANCE_OUTPUT_PATH: optionalString(),
    DEBUG_CURRENCY_LOG: optionalBooleanField("DEBUG_CURRENCY_LOG", false),
  })
  .superRefine((data, ctx) => {
    if (
      data.CONFORMANCE_OUTPUT_PATH &&
      path.resolve(data.CONFORMANCE_OUTPUT_PATH) === path.resolve(data.CONFORMANCE_SYMBOLS_PATH)
    ) {
      ctx.addIssue({
        code: "custom",
        message: "CONFORMANCE_OUTPUT_PATH 不能与 CONFORMANCE_SYMBOLS_PATH 相同",
        path: ["CONFORMANCE_OUTPUT_PATH"],
      });
    }
  });

type EnvValues = z.infer<typeof envSchema>;

/**
 * 校验给定的环境变量集合，失败时抛出汇总后的错误。
 */
export function parseEnv(env: Record<string, string | undefined>): EnvValues {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(formatZodError(result.error));
  }
  return result.data;
}

/**
 * 读取环境变量并转换为结构化配置。
 */
function readEnv(): EnvValues {
  ensureEnvLoaded();
  return parseEnv(process.env);
}

/**
 * 构建一致性校验配置。
 */
function loadConformanceConfig(env: EnvValues): ConformanceConfig {
  return {
    exchange: env.EXCHANGE,
    symbolsPath: env.CONFORMANCE_SYMBOLS_PATH,
    referencePath: env.CONFORMANCE_REFERENCE_PATH,
    outputPath: env.CONFORMANCE_OUTPUT_PATH,
  };
}

/**
 * 构建调试配置。
 */
function loadDebugConfig(env: EnvValues): DebugConfig {
  return {
    currencyLog: env.DEBUG_CURRENCY_LOG,
  };
}

/**
 * 由已校验的环境变量组装应用配置。
 */
export function buildAppConfig(env: EnvValues): AppConfig {
  return {
    conformance: loadConformanceConfig(env),
    debug: loadDebugConfig(env),
  };
}

/**
 * 加载应用配置，供启动流程统一使用。
 */
export function loadAppConfig(): AppConfig {
  return buildAppConfig(readEnv());
}
