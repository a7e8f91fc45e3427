import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { parseDocument } from "../core/document/envelope";
import type { EquivalenceReport } from "../core/currency/equivalence";
import type { CanonicalCurrency } from "../core/currency/models";
import { parseCanonicalCurrencies } from "../core/exchange/serialization";
import { loadAppConfig } from "../infra/config/env";
import type { AppConfig } from "../infra/config/schema";
import { createExchangeAdapter } from "../infra/exchange/factory";
import { NormalizationService } from "../services/normalization/normalization-service";

/**
 * 一致性校验结果。
 */
export interface ConformanceResult {
  exitCode: number;
  currencies: CanonicalCurrency[];
  report?: EquivalenceReport;
}

function readJsonFile(filePath: string): unknown {
  const resolved = path.resolve(process.cwd(), filePath);
  return parseDocument(readFileSync(resolved, "utf8"));
}

function writeJsonFile(filePath: string, value: unknown): void {
  const resolved = path.resolve(process.cwd(), filePath);
  mkdirSync(path.dirname(resolved), { recursive: true });
  writeFileSync(resolved, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

/**
 * 读取原始响应并归一化，提供参考数据时与之比对。
 * 返回码：0 表示一致或未比对，1 表示与参考数据不一致。
 */
export function runConformanceCheck(
  config: AppConfig,
  service: NormalizationService = new NormalizationService(createExchangeAdapter)
): ConformanceResult {
  const { exchange, symbolsPath, referencePath, outputPath } = config.conformance;
  const document = readJsonFile(symbolsPath);
  const currencies = service.normalizeCurrencies(exchange, document);
  console.info("币种归一化完成", { exchange, count: currencies.length });
  if (config.debug.currencyLog) {
    for (const currency of currencies) {
      console.info("归一化币种", currency);
    }
  }
  if (outputPath) {
    writeJsonFile(outputPath, currencies);
    console.info("归一化结果已写入", { path: outputPath });
  }
  if (!referencePath) {
    return { exitCode: 0, currencies };
  }

  const reference = parseCanonicalCurrencies(readJsonFile(referencePath));
  const report = service.compareWithReference(exchange, document, reference);
  if (report.equivalent) {
    console.info("与参考数据一致", {
      exchange,
      localCount: report.localCount,
      referenceCount: report.referenceCount,
      syntheticCount: report.syntheticCount,
    });
  }
  return { exitCode: report.equivalent ? 0 : 1, currencies, report };
}

/**
 * 启动一致性校验，负责配置加载与退出码设置。
 */
export function startConformanceApp(): void {
  try {
    const config = loadAppConfig();
    console.info("配置加载成功", config);
    const result = runConformanceCheck(config);
    process.exitCode = result.exitCode;
  } catch (error) {
    console.error("一致性校验失败", error);
    process.exitCode = 1;
  }
}
