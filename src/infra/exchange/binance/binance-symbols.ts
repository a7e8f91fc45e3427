import { z } from "zod";
import { parseDocument, readEnvelopeArray } from "../../../core/document/envelope";
import { RecordDecodeError } from "../../../core/exchange/errors";
import { Decimal } from "../../../shared/number";
import { formatZodError } from "../../../shared/zod-error";

/**
 * Binance 带地址的币种列表接口，数组位于 data.body.data。
 */
export const BINANCE_SYMBOLS_PATH = ["data", "body", "data"] as const;

const decimalValue = z.number().transform((value) => Decimal(value));

const optionalDecimalValue = z
  .number()
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : Decimal(value)));

const timestampValue = z.string().transform((value, ctx) => {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    ctx.addIssue({
      code: "custom",
      message: `不是有效时间: ${value}`,
    });
    return z.NEVER;
  }
  return new Date(ms);
});

const platformSchema = z
  .object({
    symbol: z.string(),
    name: z.string(),
    token_address: z.string(),
    id: z.number().int(),
    slug: z.string(),
  })
  .transform((raw) => ({
    symbol: raw.symbol,
    name: raw.name,
    tokenAddress: raw.token_address,
    id: raw.id,
    slug: raw.slug,
  }));

const quoteSchema = z
  .object({
    price: decimalValue,
    volume_24h: decimalValue,
    volume_change_24h: decimalValue,
    percent_change_1h: decimalValue,
    percent_change_24h: decimalValue,
    percent_change_7d: decimalValue,
    percent_change_30d: decimalValue,
    percent_change_60d: decimalValue,
    percent_change_90d: decimalValue,
    market_cap: decimalValue,
    market_cap_dominance: decimalValue,
    fully_diluted_market_cap: decimalValue,
    tvl: optionalDecimalValue,
    last_updated: timestampValue,
  })
  .transform((raw) => ({
    price: raw.price,
    volume24h: raw.volume_24h,
    volumeChange24h: raw.volume_change_24h,
    percentChange1h: raw.percent_change_1h,
    percentChange24h: raw.percent_change_24h,
    percentChange7d: raw.percent_change_7d,
    percentChange30d: raw.percent_change_30d,
    percentChange60d: raw.percent_change_60d,
    percentChange90d: raw.percent_change_90d,
    marketCap: raw.market_cap,
    marketCapDominance: raw.market_cap_dominance,
    fullyDilutedMarketCap: raw.fully_diluted_market_cap,
    tvl: raw.tvl,
    lastUpdated: raw.last_updated,
  }));

/**
 * 单条币种记录，数值字段按原值透传为 Decimal。
 */
export const binanceSymbolSchema = z
  .object({
    id: z.number().int(),
    symbol: z.string(),
    name: z.string(),
    slug: z.string(),
    cmc_rank: z.number().int(),
    num_market_pairs: z.number().int(),
    circulating_supply: decimalValue,
    total_supply: decimalValue,
    max_supply: optionalDecimalValue,
    infinite_supply: z.boolean(),
    self_reported_circulating_supply: optionalDecimalValue,
    self_reported_market_cap: optionalDecimalValue,
    tvl_ratio: optionalDecimalValue,
    last_updated: timestampValue,
    date_added: timestampValue,
    tags: z.array(z.string()),
    platform: platformSchema.nullish().transform((value) => value ?? undefined),
    quote: z.record(z.string(), quoteSchema),
  })
  .transform((raw) => ({
    id: raw.id,
    symbol: raw.symbol,
    name: raw.name,
    slug: raw.slug,
    cmcRank: raw.cmc_rank,
    numMarketPairs: raw.num_market_pairs,
    circulatingSupply: raw.circulating_supply,
    totalSupply: raw.total_supply,
    maxSupply: raw.max_supply,
    infiniteSupply: raw.infinite_supply,
    selfReportedCirculatingSupply: raw.self_reported_circulating_supply,
    selfReportedMarketCap: raw.self_reported_market_cap,
    tvlRatio: raw.tvl_ratio,
    lastUpdated: raw.last_updated,
    dateAdded: raw.date_added,
    tags: raw.tags,
    platform: raw.platform,
    quote: raw.quote,
  }));

export type BinanceSymbol = z.output<typeof binanceSymbolSchema>;
export type BinanceSymbolPlatform = z.output<typeof platformSchema>;

/**
 * 从响应中提取全部币种记录，任意一条解析失败则整批失败。
 */
export function unwrapBinanceSymbols(document: unknown): BinanceSymbol[] {
  const source = typeof document === "string" ? parseDocument(document) : document;
  const items = readEnvelopeArray(source, BINANCE_SYMBOLS_PATH);
  return items.map((item, index) => {
    const result = binanceSymbolSchema.safeParse(item);
    if (!result.success) {
      throw new RecordDecodeError(index, formatZodError(result.error));
    }
    return result.data;
  });
}
