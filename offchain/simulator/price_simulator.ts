import BigNumber from 'bignumber.js';
import type { Address } from 'viem';
import type { ChainRegistry } from '../infra/chain_registry';
import { QuoteRevertError, errorMessage, withTimeout } from '../infra/errors';
import { instrumentRpc, metricTargetFromRpc } from '../infra/instrument';
import { log } from '../infra/logger';
import { getPublicClient } from '../infra/rpc_clients';
import { fromRawAmount } from '../pipeline/profit';
import type { TokenData, TokenInventory } from '../arb_fabric/inventory';

const QUOTER_ABI = [
  {
    type: 'function',
    name: 'quoteExactInputSingle',
    stateMutability: 'nonpayable',
    inputs: [
      {
        components: [
          { name: 'tokenIn', type: 'address' },
          { name: 'tokenOut', type: 'address' },
          { name: 'amountIn', type: 'uint256' },
          { name: 'fee', type: 'uint24' },
          { name: 'sqrtPriceLimitX96', type: 'uint160' },
        ],
        name: 'params',
        type: 'tuple',
      },
    ],
    outputs: [
      { name: 'amountOut', type: 'uint256' },
      { name: 'sqrtPriceX96After', type: 'uint160' },
      { name: 'initializedTicksCrossed', type: 'uint32' },
      { name: 'gasEstimate', type: 'uint256' },
    ],
  },
] as const;

export type QuoteRequest = {
  quoter: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  fee: number;
};

/** Read-only quote call; may throw on revert. */
export type QuoteCaller = (chainId: number, request: QuoteRequest) => Promise<bigint>;

export const USD_FEE_TIERS = [500, 3000] as const;

export function viemQuoteCaller(registry: ChainRegistry): QuoteCaller {
  return async (chainId, request) => {
    const endpoint = registry.endpoint(chainId);
    if (!endpoint) {
      throw new QuoteRevertError(`no validated RPC for ${registry.chainName(chainId)}`);
    }
    // simulateContract keeps the call read-only on a nonpayable quoter.
    const { result } = await instrumentRpc(
      'quoteExactInputSingle',
      () =>
        getPublicClient(endpoint).simulateContract({
          address: request.quoter,
          abi: QUOTER_ABI,
          functionName: 'quoteExactInputSingle',
          args: [
            {
              tokenIn: request.tokenIn,
              tokenOut: request.tokenOut,
              amountIn: request.amountIn,
              fee: request.fee,
              sqrtPriceLimitX96: 0n,
            },
          ],
        }),
      { target: metricTargetFromRpc(endpoint.rpcUrl) },
    );
    return result[0];
  };
}

export class PriceSimulator {
  private readonly simLog = log.child({ module: 'simulator.price' });

  constructor(
    private readonly inventory: TokenInventory,
    private readonly caller: QuoteCaller,
    private readonly timeoutMs: number,
  ) {}

  /** Expected output for one Uniswap-v3 hop; 0 when the quote reverts, times out or is unavailable. */
  async quoteSingleHopOutput(
    chainId: number,
    tokenIn: Address,
    tokenOut: Address,
    amountIn: bigint,
    feeTier: number,
  ): Promise<bigint> {
    if (amountIn <= 0n) return 0n;
    const chain = this.inventory.getChainConfig(chainId);
    if (!chain) return 0n;
    try {
      const amountOut = await withTimeout(
        this.caller(chainId, { quoter: chain.quoter, tokenIn, tokenOut, amountIn, fee: feeTier }),
        this.timeoutMs,
        'quoteExactInputSingle',
      );
      return amountOut > 0n ? amountOut : 0n;
    } catch (err) {
      const revert = new QuoteRevertError(errorMessage(err), { chainId, feeTier });
      this.simLog.debug(
        { chainId, tokenIn, tokenOut, amountIn: amountIn.toString(), feeTier, err: revert.message },
        'quote-single-hop-reverted',
      );
      return 0n;
    }
  }

  /**
   * USD value of `amount` base units. Stablecoins count at par; anything else
   * is quoted against the chain's USD reference token. `null` when unpriceable.
   */
  async valueInUsd(chainId: number, token: TokenData, amount: bigint): Promise<BigNumber | null> {
    if (amount === 0n) return new BigNumber(0);
    if (token.stable) return fromRawAmount(amount, token.decimals);
    const chain = this.inventory.getChainConfig(chainId);
    const reference = chain?.tokens.get(chain.usdReference);
    if (!reference) return null;
    for (const fee of USD_FEE_TIERS) {
      const out = await this.quoteSingleHopOutput(chainId, token.address, reference.address, amount, fee);
      if (out > 0n) return fromRawAmount(out, reference.decimals);
    }
    return null;
  }
}
