import BigNumber from 'bignumber.js';
import type { Address } from 'viem';
import type { ChainRegistry } from '../infra/chain_registry';
import type { GuardSettings } from '../infra/config';
import { log } from '../infra/logger';
import type { TvlLookup } from '../simulator/tvl';

export type LoanSizing =
  | { ok: true; amount: bigint; liquidity: bigint; cap: bigint; clamped: boolean }
  | {
      ok: false;
      amount: 0n;
      reason: 'chain-not-configured' | 'liquidity-unavailable' | 'liquidity-zero' | 'below-floor';
      detail: string;
    };

export const DEFAULT_GUARD_SETTINGS: GuardSettings = {
  maxShareFraction: new BigNumber('0.20'),
  minTokens: 500,
};

/** floor(value * fraction) without leaving integer arithmetic. */
export function applyShare(value: bigint, fraction: BigNumber): bigint {
  const [numerator, denominator] = fraction.toFraction();
  return (value * BigInt(numerator.toFixed(0))) / BigInt(denominator.toFixed(0));
}

/**
 * Sizes flash loans against live lender liquidity. No loan may exceed the
 * configured share of what the lender holds, and loans under the floor are
 * refused.
 */
export class LiquidityGuard {
  private readonly guardLog = log.child({ module: 'fabric.liquidity' });
  private readonly settings: GuardSettings;

  constructor(
    private readonly tvl: TvlLookup,
    private readonly registry: ChainRegistry,
    settings: Partial<GuardSettings> = {},
  ) {
    this.settings = { ...DEFAULT_GUARD_SETTINGS, ...settings };
  }

  /** Safe raw amount, 0 meaning abort. */
  async sizeSafeLoan(token: Address, targetRawAmount: bigint, decimals: number, chainId: number): Promise<bigint> {
    const sizing = await this.assess(token, targetRawAmount, decimals, chainId);
    return sizing.amount;
  }

  async assess(token: Address, targetRawAmount: bigint, decimals: number, chainId: number): Promise<LoanSizing> {
    const chain = this.registry.chainName(chainId);
    if (!this.registry.isConfigured(chainId)) {
      return this.abort(chain, token, 'chain-not-configured', 'chain not configured for execution');
    }

    const lookup = await this.tvl.lenderLiquidity(chainId, token);
    if (!lookup.ok) {
      return this.abort(chain, token, 'liquidity-unavailable', lookup.error.message);
    }
    const liquidity = lookup.value;
    if (liquidity <= 0n) {
      return this.abort(chain, token, 'liquidity-zero', 'lender reports zero liquidity');
    }

    const cap = applyShare(liquidity, this.settings.maxShareFraction);
    const clamped = targetRawAmount > cap;
    const amount = clamped ? cap : targetRawAmount;
    const floor = BigInt(this.settings.minTokens) * 10n ** BigInt(decimals);

    if (amount < floor) {
      return this.abort(
        chain,
        token,
        'below-floor',
        `amount ${amount} below floor ${floor} (liquidity ${liquidity}, cap ${cap}, requested ${targetRawAmount})`,
      );
    }

    if (clamped) {
      this.guardLog.info(
        {
          chain,
          token,
          requested: targetRawAmount.toString(),
          cap: cap.toString(),
          liquidity: liquidity.toString(),
          maxShare: this.settings.maxShareFraction.toFixed(),
        },
        'liquidity-loan-clamped',
      );
    }
    return { ok: true, amount, liquidity, cap, clamped };
  }

  private abort(
    chain: string,
    token: Address,
    reason: Extract<LoanSizing, { ok: false }>['reason'],
    detail: string,
  ): LoanSizing {
    this.guardLog.info({ chain, token, reason, detail }, 'liquidity-loan-abort');
    return { ok: false, amount: 0n, reason, detail };
  }
}
