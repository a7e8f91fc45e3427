import { z } from "zod";
import { blockchainSchema } from "../currency/blockchain";
import type { CanonicalCurrency } from "../currency/models";
import { SchemaMismatchError } from "./errors";
import type { CanonicalPair, NativePair } from "./models";
import { CEX_EXCHANGES, PAIR_DELIMITERS } from "./models";
import { formatZodError } from "../../shared/zod-error";

/**
 * 统一结构的 JSON 形态，字段名与领域模型一致。
 */
export const exchangeSchema = z.enum(CEX_EXCHANGES);

export const canonicalPairSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("BASE_QUOTE"),
    exchange: exchangeSchema,
    base: z.string().min(1),
    quote: z.string().min(1),
  }),
  z.object({
    kind: z.literal("RAW"),
    exchange: exchangeSchema,
    pair: z.string().min(1),
    delimiter: z.enum(PAIR_DELIMITERS).optional(),
  }),
]);

export const nativePairSchema = z.object({
  exchange: exchangeSchema,
  pair: z.string().min(1),
});

export const blockchainPlatformSchema = z.object({
  blockchain: blockchainSchema,
  address: z.string().optional(),
  isWrapped: z.boolean(),
  wrappedCurrency: z
    .object({
      symbol: z.string(),
      name: z.string(),
    })
    .optional(),
});

export const canonicalCurrencySchema = z.object({
  exchange: exchangeSchema,
  symbol: z.string(),
  name: z.string(),
  displayName: z.string().optional(),
  status: z.string(),
  blockchains: z.array(blockchainPlatformSchema),
});

/**
 * 读取统一币种列表（例如参考数据集）。
 */
export function parseCanonicalCurrencies(value: unknown): CanonicalCurrency[] {
  const result = z.array(canonicalCurrencySchema).safeParse(value);
  if (!result.success) {
    throw new SchemaMismatchError("$", `CanonicalCurrency[] (${formatZodError(result.error)})`);
  }
  return result.data;
}

/**
 * 读取统一交易对。
 */
export function parseCanonicalPair(value: unknown): CanonicalPair {
  const result = canonicalPairSchema.safeParse(value);
  if (!result.success) {
    throw new SchemaMismatchError("$", `CanonicalPair (${formatZodError(result.error)})`);
  }
  return result.data;
}

/**
 * 读取交易所原生交易对。
 */
export function parseNativePair(value: unknown): NativePair {
  const result = nativePairSchema.safeParse(value);
  if (!result.success) {
    throw new SchemaMismatchError("$", `NativePair (${formatZodError(result.error)})`);
  }
  return result.data;
}
