import BigNumber from 'bignumber.js';
import type { Address } from 'viem';
import { applyShare, LiquidityGuard } from '../arb_fabric/liquidity_guard';
import { ChainRegistry } from '../infra/chain_registry';
import { TransportError, fail, ok, type Result } from '../infra/errors';
import type { TvlLookup } from '../simulator/tvl';
import { USDC_137 } from './fixtures';
import { test, expect, expectEqual } from './test_harness';

class FakeTvl implements TvlLookup {
  calls = 0;

  constructor(private readonly answer: Result<bigint>) {}

  async lenderLiquidity(_chainId: number, _token: Address): Promise<Result<bigint>> {
    this.calls += 1;
    return this.answer;
  }
}

const registry = new ChainRegistry({});
const settings = { maxShareFraction: new BigNumber('0.20'), minTokens: 500 };

test('share of liquidity is computed in integer arithmetic', () => {
  expectEqual(applyShare(1_000_000n, new BigNumber('0.2')), 200_000n);
  expectEqual(applyShare(7n, new BigNumber('0.5')), 3n);
});

test('loan clamped to the liquidity share still aborts below the floor', async () => {
  const guard = new LiquidityGuard(new FakeTvl(ok(1_000_000n)), registry, settings);
  const amount = await guard.sizeSafeLoan(USDC_137, 500_000n, 6, 137);
  expectEqual(amount, 0n);

  const sizing = await guard.assess(USDC_137, 500_000n, 6, 137);
  expect(!sizing.ok, 'sizing should abort');
  if (!sizing.ok) expectEqual(sizing.reason, 'below-floor');
});

test('request above the share is clamped to the cap', async () => {
  const guard = new LiquidityGuard(new FakeTvl(ok(10_000_000_000_000n)), registry, settings);
  const sizing = await guard.assess(USDC_137, 5_000_000_000_000n, 6, 137);
  expect(sizing.ok, 'sizing should succeed');
  if (sizing.ok) {
    expectEqual(sizing.amount, 2_000_000_000_000n);
    expectEqual(sizing.cap, 2_000_000_000_000n);
    expect(sizing.clamped, 'should report clamping');
  }
});

test('request within the share passes through unchanged', async () => {
  const guard = new LiquidityGuard(new FakeTvl(ok(1_000_000_000_000n)), registry, settings);
  expectEqual(await guard.sizeSafeLoan(USDC_137, 10_000_000_000n, 6, 137), 10_000_000_000n);
});

test('zero or unavailable liquidity aborts', async () => {
  const zero = new LiquidityGuard(new FakeTvl(ok(0n)), registry, settings);
  expectEqual(await zero.sizeSafeLoan(USDC_137, 10_000_000_000n, 6, 137), 0n);

  const failing = new LiquidityGuard(new FakeTvl(fail(new TransportError('rpc down'))), registry, settings);
  const sizing = await failing.assess(USDC_137, 10_000_000_000n, 6, 137);
  expect(!sizing.ok, 'failed lookup should abort');
  if (!sizing.ok) {
    expectEqual(sizing.reason, 'liquidity-unavailable');
    expectEqual(sizing.detail, 'rpc down');
  }
});

test('chains without execution permission are refused before any lookup', async () => {
  const tvl = new FakeTvl(ok(1_000_000_000_000n));
  const guard = new LiquidityGuard(tvl, registry, settings);
  const sizing = await guard.assess(USDC_137, 10_000_000_000n, 6, 10);
  expect(!sizing.ok, 'optimism is not configured');
  if (!sizing.ok) expectEqual(sizing.reason, 'chain-not-configured');
  expectEqual(tvl.calls, 0);
});
