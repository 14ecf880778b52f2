import fs from 'fs';
import YAML from 'yaml';
import { getAddress, type Address } from 'viem';
import { z } from 'zod';
import { EvmAddressSchema } from '../infra/address';
import { ConfigurationError } from '../infra/errors';
import { log } from '../infra/logger';

export const DEFAULT_BRIDGEABLE_SYMBOLS = ['USDC', 'USDT', 'DAI', 'WETH', 'WBTC', 'USDC.e', 'LINK', 'UNI', 'AAVE', 'CRV'];

const ChecksummedAddress = EvmAddressSchema.transform((value) => getAddress(value));

const TokenSchema = z.object({
  address: ChecksummedAddress,
  decimals: z.number().int().min(0).max(36),
  stable: z.boolean().default(false),
  wrapped: z.boolean().default(false),
  native: z.boolean().default(false),
});

const ChainSchema = z.object({
  chainId: z.number().int().positive(),
  name: z.string().min(1),
  wrappedNative: z.string().min(1),
  usdReference: z.string().min(1),
  lender: ChecksummedAddress,
  quoter: ChecksummedAddress,
  routers: z.object({ uniswapV3: ChecksummedAddress }),
  tokens: z.record(z.string(), TokenSchema),
});

export const InventoryDocumentSchema = z.object({
  bridgeableSymbols: z.array(z.string().min(1)).default(DEFAULT_BRIDGEABLE_SYMBOLS),
  chains: z.array(ChainSchema).min(1),
});

export type InventoryDocument = z.input<typeof InventoryDocumentSchema>;

export type TokenData = {
  symbol: string;
  address: Address;
  decimals: number;
  stable: boolean;
  wrapped: boolean;
  native: boolean;
};

export type ChainInventory = {
  chainId: number;
  name: string;
  wrappedNative: string;
  usdReference: string;
  lender: Address;
  quoter: Address;
  routers: { uniswapV3: Address };
  tokens: ReadonlyMap<string, TokenData>;
};

/** Read-only token and venue data per chain. */
export interface TokenInventory {
  getChainConfig(chainId: number): ChainInventory | null;
  getAllChainIds(): number[];
  getTokenAddress(chainId: number, symbol: string): Address | null;
  getToken(chainId: number, symbol: string): TokenData | null;
  fetchAllChains(chainIds: number[]): Promise<Map<number, Map<string, TokenData>>>;
  bridgeableSymbols(): readonly string[];
}

export class StaticInventory implements TokenInventory {
  private readonly chains = new Map<number, ChainInventory>();
  private readonly symbols: readonly string[];

  constructor(doc: InventoryDocument) {
    const parsed = InventoryDocumentSchema.safeParse(doc);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid inventory: ${issues.join('; ')}`, { issues });
    }
    this.symbols = Object.freeze([...parsed.data.bridgeableSymbols]);
    for (const chain of parsed.data.chains) {
      if (this.chains.has(chain.chainId)) {
        throw new ConfigurationError(`Inventory lists chain ${chain.chainId} twice`);
      }
      const tokens = new Map<string, TokenData>();
      for (const [symbol, token] of Object.entries(chain.tokens)) {
        tokens.set(symbol, Object.freeze({ symbol, ...token }));
      }
      for (const required of [chain.wrappedNative, chain.usdReference]) {
        if (!tokens.has(required)) {
          throw new ConfigurationError(`Inventory chain ${chain.name} is missing token ${required}`);
        }
      }
      this.chains.set(chain.chainId, { ...chain, tokens });
    }
  }

  getChainConfig(chainId: number): ChainInventory | null {
    return this.chains.get(chainId) ?? null;
  }

  getAllChainIds(): number[] {
    return [...this.chains.keys()];
  }

  getTokenAddress(chainId: number, symbol: string): Address | null {
    return this.getToken(chainId, symbol)?.address ?? null;
  }

  getToken(chainId: number, symbol: string): TokenData | null {
    return this.chains.get(chainId)?.tokens.get(symbol) ?? null;
  }

  async fetchAllChains(chainIds: number[]): Promise<Map<number, Map<string, TokenData>>> {
    const out = new Map<number, Map<string, TokenData>>();
    for (const chainId of chainIds) {
      const chain = this.chains.get(chainId);
      if (!chain) continue;
      out.set(chainId, new Map(chain.tokens));
    }
    return out;
  }

  bridgeableSymbols(): readonly string[] {
    return this.symbols;
  }
}

export function loadInventory(filePath: string): StaticInventory {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Inventory missing at ${filePath}`);
  }
  const raw: unknown = YAML.parse(fs.readFileSync(filePath, 'utf8'));
  const parsed = InventoryDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid inventory at ${filePath}: ${issues.join('; ')}`, { issues });
  }
  const inventory = new StaticInventory(parsed.data);
  log.info(
    {
      path: filePath,
      chains: inventory.getAllChainIds().map((chainId) => ({
        chainId,
        tokens: inventory.getChainConfig(chainId)?.tokens.size ?? 0,
      })),
    },
    'inventory-loaded',
  );
  return inventory;
}
