import { erc20Abi, type Address } from 'viem';
import type { ChainRegistry } from '../infra/chain_registry';
import { LiquidityError, TransportError, errorMessage, fail, ok, type Result } from '../infra/errors';
import { instrumentRpc, metricTargetFromRpc } from '../infra/instrument';
import { getPublicClient } from '../infra/rpc_clients';
import type { TokenInventory } from '../arb_fabric/inventory';

/** Borrowable balance of `token` at the chain's flash lender, in base units. */
export interface TvlLookup {
  lenderLiquidity(chainId: number, token: Address): Promise<Result<bigint>>;
}

export class LenderBalanceLookup implements TvlLookup {
  constructor(
    private readonly registry: ChainRegistry,
    private readonly inventory: TokenInventory,
    private readonly timeoutMs: number,
  ) {}

  async lenderLiquidity(chainId: number, token: Address): Promise<Result<bigint>> {
    const chain = this.inventory.getChainConfig(chainId);
    if (!chain) {
      return fail(new LiquidityError(`no lender configured for chain ${chainId}`, { chainId }));
    }
    const endpoint = this.registry.endpoint(chainId);
    if (!endpoint) {
      return fail(new LiquidityError(`no validated RPC for ${this.registry.chainName(chainId)}`, { chainId }));
    }
    try {
      const balance = await instrumentRpc(
        'lenderBalanceOf',
        () =>
          getPublicClient(endpoint).readContract({
            address: token,
            abi: erc20Abi,
            functionName: 'balanceOf',
            args: [chain.lender],
          }),
        { target: metricTargetFromRpc(endpoint.rpcUrl), timeoutMs: this.timeoutMs },
      );
      return ok(balance);
    } catch (err) {
      return fail(new TransportError(errorMessage(err), { chainId, token }));
    }
  }
}
