import BigNumber from 'bignumber.js';
import { getAddress, type Address } from 'viem';
import { StaticInventory, type InventoryDocument } from '../arb_fabric/inventory';
import { FlashSource, SwapProtocol, type TradeSignal } from '../pipeline/types';

export const addr = (suffix: string): Address => getAddress(`0x${suffix.padStart(40, '0')}`);

export const USDC_137 = addr('a137');
export const USDC_1 = addr('a001');
export const USDC_42161 = addr('a421');
export const ROUTER = addr('e592');
export const EXECUTOR = addr('c0de');
export const TEST_PRIVATE_KEY = `0x${'11'.repeat(32)}`;

function chain(chainId: number, name: string, usdc: Address, wethSuffix: string, extra: InventoryDocument['chains'][number]['tokens'] = {}) {
  return {
    chainId,
    name,
    wrappedNative: 'WETH',
    usdReference: 'USDC',
    lender: addr('ba12'),
    quoter: addr('0e11'),
    routers: { uniswapV3: ROUTER },
    tokens: {
      USDC: { address: usdc, decimals: 6, stable: true },
      WETH: { address: addr(wethSuffix), decimals: 18, wrapped: true },
      ...extra,
    },
  };
}

export function testInventoryDocument(bridgeableSymbols: string[] = ['USDC', 'WETH']): InventoryDocument {
  return {
    bridgeableSymbols,
    chains: [
      chain(137, 'polygon', USDC_137, 'b137', { LINK: { address: addr('d137'), decimals: 18 } }),
      chain(1, 'ethereum', USDC_1, 'b001'),
      chain(42161, 'arbitrum', USDC_42161, 'b421'),
    ],
  };
}

export function testInventory(bridgeableSymbols?: string[]): StaticInventory {
  return new StaticInventory(testInventoryDocument(bridgeableSymbols));
}

export const HEALTHY_RPC_ENV = {
  RPC_POLYGON: 'https://polygon.rpc.example',
  RPC_ETHEREUM: 'https://ethereum.rpc.example',
  RPC_ARBITRUM: 'https://arbitrum.rpc.example',
};

export function makeSignal(overrides: Partial<TradeSignal> = {}): TradeSignal {
  return {
    chainId: 137,
    token: USDC_137,
    amount: 10_000_000_000n,
    flashSource: FlashSource.BalancerV3,
    hops: [{ protocol: SwapProtocol.UNIV3, router: ROUTER }],
    path: [USDC_137, USDC_1],
    extras: ['0x'],
    expectedProfitUsd: new BigNumber(25),
    estimatedSlippageBps: 10,
    confidence: 0.9,
    gasEstimate: 500_000,
    hints: {},
    ...overrides,
  };
}
