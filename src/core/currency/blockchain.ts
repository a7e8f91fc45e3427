import { z } from "zod";
import { UnrecognizedBlockchainError } from "../exchange/errors";
import blockchainAliases from "./blockchain-aliases.json";

/**
 * 已知链标识。
 */
export const BLOCKCHAINS = [
  "ALGORAND",
  "APTOS",
  "ARBITRUM",
  "AVALANCHE",
  "BASE",
  "BITCOIN",
  "BLAST",
  "BNB_BEACON_CHAIN",
  "BNB_SMART_CHAIN",
  "CARDANO",
  "CELO",
  "CHILIZ",
  "COSMOS",
  "CRONOS",
  "ETHEREUM",
  "FANTOM",
  "FLOW",
  "GNOSIS",
  "HARMONY",
  "HECO",
  "HEDERA",
  "INJECTIVE",
  "KAVA",
  "KLAYTN",
  "LINEA",
  "LITECOIN",
  "MANTLE",
  "MOONBEAM",
  "MOONRIVER",
  "NEAR",
  "NEO",
  "OPTIMISM",
  "OSMOSIS",
  "POLKADOT",
  "POLYGON",
  "SCROLL",
  "SOLANA",
  "STARKNET",
  "STELLAR",
  "SUI",
  "TEZOS",
  "TON",
  "TRON",
  "WAVES",
  "XRP_LEDGER",
  "ZKSYNC",
] as const;

export type Blockchain = (typeof BLOCKCHAINS)[number];

export const blockchainSchema = z.enum(BLOCKCHAINS);

/**
 * 链名称别名表：键为去除非字母数字后的小写名称。
 */
const aliasTable = new Map<string, Blockchain>(
  Object.entries(z.record(z.string(), blockchainSchema).parse(blockchainAliases))
);

/**
 * 统一链名称写法，例如 "BNB Smart Chain (BEP20)" -> "bnbsmartchainbep20"。
 */
export function normalizeChainName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * 解析链名称，未知名称抛出 UnrecognizedBlockchainError。
 */
export function parseBlockchain(name: string): Blockchain {
  const key = normalizeChainName(name);
  const fromAlias = aliasTable.get(key);
  if (fromAlias) {
    return fromAlias;
  }
  // 直接给出标识（如 "XRP_LEDGER"）时同样接受。
  const direct = blockchainSchema.safeParse(name.trim().toUpperCase());
  if (direct.success) {
    return direct.data;
  }
  throw new UnrecognizedBlockchainError(name);
}
