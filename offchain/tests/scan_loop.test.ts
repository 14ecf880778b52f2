import fs from 'fs';
import os from 'os';
import path from 'path';
import BigNumber from 'bignumber.js';
import type { Address } from 'viem';
import { NoopForecaster, StaticOptimizer, TrendForecaster, type GasForecaster } from '../agent/advisors';
import type { BridgeQuoteProvider, BridgeRoute } from '../arb_fabric/bridge_broker';
import { LiquidityGuard } from '../arb_fabric/liquidity_guard';
import { OpportunityGraph } from '../arb_fabric/opportunity_graph';
import { ScanLoop, drainWithGrace, slippageBps, type ScanLoopDeps, type ScanLoopSettings } from '../arb_fabric/scan_loop';
import { PaperExecutor } from '../executor/execution_modes';
import { ChainRegistry } from '../infra/chain_registry';
import { ok } from '../infra/errors';
import { KillSwitch } from '../infra/kill_switch';
import { ZERO_ADDRESS } from '../infra/address';
import { ProfitEngine } from '../pipeline/profit';
import { TradeStatus } from '../pipeline/types';
import { PriceSimulator } from '../simulator/price_simulator';
import { HEALTHY_RPC_ENV, testInventory } from './fixtures';
import { test, expect, expectEqual } from './test_harness';

type RouteScript = (src: number, dst: number) => Promise<BridgeRoute | null>;

class ScriptedBridge implements BridgeQuoteProvider {
  constructor(private readonly script: RouteScript) {}

  getRoute(src: number, dst: number, _token: Address, _amount: bigint): Promise<BridgeRoute | null> {
    return this.script(src, dst);
  }
}

const profitableRoute: BridgeRoute = {
  bridgeName: 'test-bridge',
  estimatedOutput: 10_100_000_000n,
  feeUsd: new BigNumber(10),
};

const settings: ScanLoopSettings = {
  workers: 4,
  intervalMs: 0,
  idleMs: 0,
  holdMs: 0,
  taskTimeoutMs: 1_000,
  rpcTimeoutMs: 1_000,
  targetLoanTokens: 10_000,
  gasUnitsEstimate: 500_000,
  primaryChainId: 137,
};

async function buildDeps(script: RouteScript, extra: Partial<ScanLoopDeps> = {}): Promise<ScanLoopDeps> {
  const registry = new ChainRegistry(HEALTHY_RPC_ENV, { probe: async () => 1n });
  await registry.validateAllConfigured();
  const inventory = testInventory(['USDC']);
  return {
    registry,
    graph: await OpportunityGraph.build(inventory),
    inventory,
    guard: new LiquidityGuard({ lenderLiquidity: async () => ok(1_000_000_000_000n) }, registry, {
      maxShareFraction: new BigNumber('0.20'),
      minTokens: 500,
    }),
    // Gas is priced through WETH; 2 USDC for any quote.
    prices: new PriceSimulator(inventory, async () => 2_000_000n, 1_000),
    bridge: new ScriptedBridge(script),
    profit: new ProfitEngine(0),
    executor: new PaperExecutor({
      initialCapitalUsd: new BigNumber(100_000),
      slippageFactor: new BigNumber('0.998'),
      defaultGasUsd: new BigNumber(5),
    }),
    forecaster: new NoopForecaster(),
    optimizer: new StaticOptimizer(0.9),
    gasPrice: async () => 30_000_000_000n,
    userAddress: ZERO_ADDRESS,
    ...extra,
  };
}

test('profitable edge becomes a simulated paper trade', async () => {
  const deps = await buildDeps(async () => profitableRoute);
  const loop = new ScanLoop(deps, settings);
  const edge = [...deps.graph.enumerateCrossChainEdges()].find((e) => e.srcChain === 137 && e.dstChain === 42161);
  if (!edge) throw new Error('fixture edge missing');
  const outcome = await loop.evaluateEdge(edge, new Map([[137, 30_000_000_000n]]));
  expectEqual(outcome.kind, 'submitted');
  if (outcome.kind !== 'submitted') return;
  expectEqual(outcome.signal.amount, 10_000_000_000n);
  expectEqual(outcome.signal.expectedProfitUsd.toFixed(), '88');
  expectEqual(outcome.signal.estimatedSlippageBps, 0);
  expectEqual(outcome.signal.confidence, 0.9);
  expectEqual(outcome.signal.hints.gasCostUsd, 2);
  expectEqual(outcome.signal.hints.dstChainId, 42161);
  expectEqual(outcome.result.status, TradeStatus.SIMULATED);
  expectEqual(outcome.result.tradeId, 'PAPER_137_1');
});

test('a failing edge does not stop the rest of the cycle', async () => {
  const deps = await buildDeps(async (src, dst) => {
    if (src === 1 && dst === 42161) throw new Error('bridge api exploded');
    if (src === 42161 && dst === 1) return null;
    return profitableRoute;
  });
  const report = await new ScanLoop(deps, settings).runCycle();
  expectEqual(report.edges, 6);
  expectEqual(report.evaluated, 6);
  expectEqual(report.submitted, 4);
  expectEqual(report.discarded.error, 1);
  expectEqual(report.discarded['no-route'], 1);
  expectEqual(report.gas.get(137), 30_000_000_000n);
  expectEqual(deps.executor.summary().counters.trades, 4);
});

test('unprofitable routes are discarded', async () => {
  const deps = await buildDeps(async () => ({ ...profitableRoute, estimatedOutput: 10_005_000_000n }));
  const report = await new ScanLoop(deps, settings).runCycle();
  expectEqual(report.discarded.unprofitable, 6);
  expectEqual(report.submitted, 0);
});

test('slow edges are cut off at the task timeout', async () => {
  const deps = await buildDeps(
    (src, dst) =>
      src === 137 && dst === 1
        ? new Promise((resolve) => setTimeout(() => resolve(profitableRoute), 300))
        : Promise.resolve(null),
  );
  const report = await new ScanLoop(deps, { ...settings, taskTimeoutMs: 50 }).runCycle();
  expectEqual(report.discarded.timeout, 1);
  expectEqual(report.discarded['no-route'], 5);
  expectEqual(report.submitted, 0);
  // The late route must not reach the executor once the cycle gave up on it.
  await new Promise((resolve) => setTimeout(resolve, 350));
  expectEqual(deps.executor.summary().counters.trades, 0);
});

test('active kill switch holds the cycle', async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scan-kill-'));
  const file = path.join(dir, 'KILL');
  fs.writeFileSync(file, 'stop');
  try {
    const deps = await buildDeps(async () => profitableRoute, { killSwitch: new KillSwitch(file) });
    const report = await new ScanLoop(deps, settings).runCycle();
    expectEqual(report.held, 'kill-switch');
    expectEqual(report.edges, 0);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test('rising gas trend holds the cycle', async () => {
  const forecaster: GasForecaster = new TrendForecaster(12, 1.25);
  for (const gwei of [10, 10, 10, 10]) forecaster.ingestGas(gwei);
  const deps = await buildDeps(async () => profitableRoute, { forecaster, gasPrice: async () => 60_000_000_000n });
  const report = await new ScanLoop(deps, settings).runCycle();
  expectEqual(report.held, 'forecaster');
  expectEqual(report.edges, 0);
});

test('slippage is measured across decimals and never negative', () => {
  expectEqual(slippageBps(1_000_000n, 6, 990_000n, 6), 100);
  expectEqual(slippageBps(1_000_000n, 6, 999_500_000_000_000_000n, 18), 5);
  expectEqual(slippageBps(1_000_000n, 6, 1_100_000n, 6), 0);
  expect(slippageBps(0n, 6, 1n, 6) === 0, 'empty input has no slippage');
});

function pendingTimers(): number {
  return process.getActiveResourcesInfo().filter((resource) => resource === 'Timeout').length;
}

test('shutdown returns once the loop drains and leaves no grace timer behind', async () => {
  const controller = new AbortController();
  const loop = new Promise<void>((resolve) => controller.signal.addEventListener('abort', () => resolve(), { once: true }));
  const timersBefore = pendingTimers();
  const started = Date.now();
  const pending = drainWithGrace(loop, controller.signal, 10_000);
  controller.abort();
  expectEqual(await pending, true);
  expect(Date.now() - started < 1_000, 'drained loop should not wait out the grace period');
  await new Promise((resolve) => setImmediate(resolve));
  expect(pendingTimers() <= timersBefore, 'grace timer should be cancelled');
});

test('shutdown gives up on a stuck loop after the grace period', async () => {
  const controller = new AbortController();
  controller.abort();
  const stuck = new Promise<void>(() => undefined);
  expectEqual(await drainWithGrace(stuck, controller.signal, 20), false);
});

test('a loop that ends on its own counts as drained', async () => {
  expectEqual(await drainWithGrace(Promise.resolve(), new AbortController().signal, 10_000), true);
});
