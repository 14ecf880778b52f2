import { setTimeout as sleep } from 'timers/promises';
import BigNumber from 'bignumber.js';
import { formatGwei, type Address, type Hex } from 'viem';
import type { ChainRegistry } from '../infra/chain_registry';
import type { ScanSettings } from '../infra/config';
import { errorMessage } from '../infra/errors';
import { instrumentRpc, metricTargetFromRpc } from '../infra/instrument';
import type { KillSwitch } from '../infra/kill_switch';
import { log } from '../infra/logger';
import { counter, gauge, histogram } from '../infra/metrics';
import { getPublicClient } from '../infra/rpc_clients';
import { runPool } from '../pipeline/async_queue';
import { fromRawAmount, toRawAmount, type ProfitEngine } from '../pipeline/profit';
import { FlashSource, SwapProtocol, TradeStatus, type ExecutionResult, type TradeSignal } from '../pipeline/types';
import type { ExecutionOptimizer, GasForecaster } from '../agent/advisors';
import type { Executor } from '../executor/execution_modes';
import type { PriceSimulator } from '../simulator/price_simulator';
import type { BridgeQuoteProvider } from './bridge_broker';
import type { TokenInventory } from './inventory';
import type { LiquidityGuard } from './liquidity_guard';
import type { CrossChainEdge, OpportunityGraph } from './opportunity_graph';

export type DiscardReason =
  | 'chain-not-configured'
  | 'liquidity'
  | 'no-route'
  | 'unpriced'
  | 'unprofitable'
  | 'error'
  | 'timeout';

export type EdgeOutcome =
  | { kind: 'discarded'; reason: DiscardReason; detail?: string }
  | { kind: 'submitted'; signal: TradeSignal; result: ExecutionResult };

export type CycleReport = {
  startedAt: number;
  durationMs: number;
  held?: 'kill-switch' | 'forecaster';
  gas: Map<number, bigint>;
  edges: number;
  evaluated: number;
  discarded: Record<DiscardReason, number>;
  submitted: number;
  rejected: number;
};

/** Current gas price in wei. */
export type GasPriceSource = (chainId: number) => Promise<bigint>;

export function viemGasPriceSource(registry: ChainRegistry): GasPriceSource {
  return async (chainId) => {
    const endpoint = registry.endpoint(chainId);
    if (!endpoint) throw new Error(`no validated RPC for ${registry.chainName(chainId)}`);
    return instrumentRpc('getGasPrice', () => getPublicClient(endpoint).getGasPrice(), {
      target: metricTargetFromRpc(endpoint.rpcUrl),
    });
  };
}

export type ScanLoopDeps = {
  registry: ChainRegistry;
  graph: OpportunityGraph;
  inventory: TokenInventory;
  guard: LiquidityGuard;
  prices: PriceSimulator;
  bridge: BridgeQuoteProvider;
  profit: ProfitEngine;
  executor: Executor;
  forecaster: GasForecaster;
  optimizer: ExecutionOptimizer;
  gasPrice: GasPriceSource;
  userAddress: Address;
  killSwitch?: KillSwitch;
};

export type ScanLoopSettings = Pick<
  ScanSettings,
  | 'workers'
  | 'intervalMs'
  | 'idleMs'
  | 'holdMs'
  | 'taskTimeoutMs'
  | 'rpcTimeoutMs'
  | 'targetLoanTokens'
  | 'gasUnitsEstimate'
  | 'primaryChainId'
>;

const BPS = new BigNumber(10_000);
const TIMED_OUT = Symbol('timed-out');

function emptyDiscards(): Record<DiscardReason, number> {
  return {
    'chain-not-configured': 0,
    liquidity: 0,
    'no-route': 0,
    unpriced: 0,
    unprofitable: 0,
    error: 0,
    timeout: 0,
  };
}

async function raceTimeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
    timer.unref();
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Waits for `loop` to settle. Once `stop` fires it waits at most `graceMs`
 * longer; resolves true when the loop drained in time.
 */
export async function drainWithGrace(loop: Promise<void>, stop: AbortSignal, graceMs: number): Promise<boolean> {
  const graceCancel = new AbortController();
  let drained = false;
  const loopDone = loop
    .then(() => {
      drained = true;
    })
    .finally(() => graceCancel.abort());
  const stopped = new Promise<void>((resolve) => {
    if (stop.aborted) resolve();
    else stop.addEventListener('abort', () => resolve(), { once: true });
  });
  const graceExpired = stopped
    .then(() => sleep(graceMs, undefined, { signal: graceCancel.signal }))
    .catch((err) => {
      if (!graceCancel.signal.aborted) throw err;
    });
  await Promise.race([loopDone, graceExpired]);
  return drained;
}

/** Price drop across the bridge, in whole basis points (never negative). */
export function slippageBps(amountIn: bigint, decimalsIn: number, amountOut: bigint, decimalsOut: number): number {
  const sent = fromRawAmount(amountIn, decimalsIn);
  if (sent.isZero()) return 0;
  const received = fromRawAmount(amountOut, decimalsOut);
  const bps = sent.minus(received).div(sent).times(BPS);
  return bps.isNegative() ? 0 : bps.integerValue(BigNumber.ROUND_CEIL).toNumber();
}

/**
 * Drives the pipeline: gas snapshot, forecaster hold, then every bridge edge
 * through guard, quote, valuation and profit check on a bounded worker pool.
 * A cycle ends only when all of its edges finished or timed out.
 */
export class ScanLoop {
  private readonly scanLog = log.child({ module: 'fabric.scan' });
  private cycles = 0;

  constructor(
    private readonly deps: ScanLoopDeps,
    private readonly settings: ScanLoopSettings,
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    this.scanLog.info(
      { workers: this.settings.workers, edges: this.deps.graph.edgeCount(), primaryChainId: this.settings.primaryChainId },
      'scan-loop-started',
    );
    while (!signal.aborted) {
      let pauseMs = this.settings.intervalMs;
      try {
        const report = await this.runCycle(signal);
        if (report.held) pauseMs = this.settings.holdMs;
        else if (report.edges === 0) pauseMs = this.settings.idleMs;
      } catch (err) {
        this.scanLog.error({ err: errorMessage(err) }, 'scan-cycle-failed');
      }
      if (signal.aborted) break;
      try {
        await sleep(pauseMs, undefined, { signal });
      } catch {
        break;
      }
    }
    this.scanLog.info({ cycles: this.cycles }, 'scan-loop-stopped');
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const startedAt = Date.now();
    const endTimer = histogram.cycleDuration.startTimer();
    this.cycles += 1;
    const report: CycleReport = {
      startedAt,
      durationMs: 0,
      gas: new Map(),
      edges: 0,
      evaluated: 0,
      discarded: emptyDiscards(),
      submitted: 0,
      rejected: 0,
    };
    const finish = () => {
      report.durationMs = Date.now() - startedAt;
      endTimer();
      gauge.lastCycleEdges.set(report.evaluated);
      return report;
    };

    const killSwitch = this.deps.killSwitch;
    if (killSwitch?.isActive()) {
      this.scanLog.warn({ killSwitch: killSwitch.path() }, 'scan-kill-switch-active');
      counter.cyclesHeld.inc({ reason: 'kill-switch' });
      report.held = 'kill-switch';
      return finish();
    }

    report.gas = await this.fetchGasPrices();
    const primaryGas = report.gas.get(this.settings.primaryChainId);
    if (primaryGas !== undefined) {
      this.deps.forecaster.ingestGas(Number(formatGwei(primaryGas)));
    }
    if (this.deps.forecaster.shouldWait()) {
      this.scanLog.info(
        { primaryChainId: this.settings.primaryChainId, gasGwei: primaryGas === undefined ? null : formatGwei(primaryGas) },
        'scan-cycle-held-gas-trend',
      );
      counter.cyclesHeld.inc({ reason: 'forecaster' });
      report.held = 'forecaster';
      return finish();
    }

    const edges = this.deps.graph.enumerateCrossChainEdges();
    await runPool(
      edges,
      this.settings.workers,
      async (edge) => {
        if (signal?.aborted) return;
        report.edges += 1;
        const outcome = await this.evaluateWithTimeout(edge, report.gas);
        report.evaluated += 1;
        if (outcome.kind === 'discarded') {
          report.discarded[outcome.reason] += 1;
        } else if (outcome.result.status === TradeStatus.FAILED) {
          report.rejected += 1;
        } else {
          report.submitted += 1;
        }
      },
      (edge, err) => {
        report.discarded.error += 1;
        this.scanLog.error({ src: edge.srcChain, dst: edge.dstChain, token: edge.token, err: errorMessage(err) }, 'scan-edge-crashed');
      },
    );

    this.scanLog.info(
      {
        cycle: this.cycles,
        edges: report.edges,
        submitted: report.submitted,
        rejected: report.rejected,
        discarded: report.discarded,
        durationMs: Date.now() - startedAt,
      },
      'scan-cycle-complete',
    );
    return finish();
  }

  async evaluateWithTimeout(edge: CrossChainEdge, gas: Map<number, bigint>): Promise<EdgeOutcome> {
    const endTimer = histogram.edgeEvaluation.startTimer();
    const controller = new AbortController();
    let outcome: EdgeOutcome;
    try {
      const raced = await raceTimeout(this.evaluateEdge(edge, gas, controller.signal), this.settings.taskTimeoutMs);
      if (raced === TIMED_OUT) {
        controller.abort();
        outcome = { kind: 'discarded', reason: 'timeout', detail: `exceeded ${this.settings.taskTimeoutMs}ms` };
      } else {
        outcome = raced;
      }
    } catch (err) {
      outcome = { kind: 'discarded', reason: 'error', detail: errorMessage(err) };
    }
    counter.edgesEvaluated.inc({ src: this.chainName(edge.srcChain), dst: this.chainName(edge.dstChain) });
    if (outcome.kind === 'discarded') {
      counter.edgesDiscarded.inc({ chain: this.chainName(edge.srcChain), reason: outcome.reason });
      if (outcome.reason === 'error' || outcome.reason === 'timeout') {
        this.scanLog.warn(
          { src: this.chainName(edge.srcChain), dst: this.chainName(edge.dstChain), token: edge.token, reason: outcome.reason, detail: outcome.detail },
          'scan-edge-failed',
        );
      }
      endTimer({ outcome: outcome.reason });
    } else {
      endTimer({ outcome: outcome.result.status.toLowerCase() });
    }
    return outcome;
  }

  /** One edge, start to submission. `cancel` fires when the cycle stopped waiting. */
  async evaluateEdge(edge: CrossChainEdge, gas: Map<number, bigint>, cancel?: AbortSignal): Promise<EdgeOutcome> {
    const { registry, inventory, guard, prices, bridge, profit } = this.deps;
    const src = this.chainName(edge.srcChain);
    const dst = this.chainName(edge.dstChain);
    const ctx = { src, dst, token: edge.token };

    if (!registry.isConfigured(edge.srcChain)) {
      return { kind: 'discarded', reason: 'chain-not-configured' };
    }
    const tokenSrc = inventory.getToken(edge.srcChain, edge.token);
    const tokenDst = inventory.getToken(edge.dstChain, edge.token);
    const srcChain = inventory.getChainConfig(edge.srcChain);
    const dstChain = inventory.getChainConfig(edge.dstChain);
    if (!tokenSrc || !tokenDst || !srcChain || !dstChain) {
      return { kind: 'discarded', reason: 'unpriced', detail: 'token missing from inventory' };
    }

    const target = toRawAmount(this.settings.targetLoanTokens, edge.decimals);
    const sizing = await guard.assess(edge.tokenAddrSrc, target, edge.decimals, edge.srcChain);
    if (!sizing.ok) {
      this.scanLog.debug({ ...ctx, reason: sizing.reason }, 'scan-edge-liquidity-abort');
      return { kind: 'discarded', reason: 'liquidity', detail: sizing.reason };
    }
    const amount = sizing.amount;

    const route = await bridge.getRoute(
      edge.srcChain,
      edge.dstChain,
      edge.tokenAddrSrc,
      amount,
      this.deps.userAddress,
      edge.tokenAddrDst,
    );
    if (!route) {
      this.scanLog.debug({ ...ctx, amount: amount.toString() }, 'scan-edge-no-route');
      return { kind: 'discarded', reason: 'no-route' };
    }

    const gasPrice = gas.get(edge.srcChain);
    const wrappedNative = srcChain.tokens.get(srcChain.wrappedNative);
    const [loanUsd, outputUsd, gasUsd] = await Promise.all([
      prices.valueInUsd(edge.srcChain, tokenSrc, amount),
      prices.valueInUsd(edge.dstChain, tokenDst, route.estimatedOutput),
      gasPrice === undefined || !wrappedNative
        ? Promise.resolve(null)
        : prices.valueInUsd(edge.srcChain, wrappedNative, gasPrice * BigInt(this.settings.gasUnitsEstimate)),
    ]);
    if (!loanUsd || !outputUsd || !gasUsd) {
      this.scanLog.debug(
        { ...ctx, loanPriced: Boolean(loanUsd), outputPriced: Boolean(outputUsd), gasPriced: Boolean(gasUsd) },
        'scan-edge-unpriced',
      );
      return { kind: 'discarded', reason: 'unpriced' };
    }

    const breakdown = profit.evaluate(loanUsd, outputUsd, route.feeUsd, gasUsd);
    if (!breakdown.isProfitable) {
      this.scanLog.info(
        {
          ...ctx,
          bridge: route.bridgeName,
          loanUsd: loanUsd.toFixed(2),
          outputUsd: outputUsd.toFixed(2),
          bridgeFeeUsd: route.feeUsd.toFixed(2),
          gasUsd: gasUsd.toFixed(2),
          flashFeeUsd: breakdown.flashFeeCost.toFixed(2),
          netProfitUsd: breakdown.netProfit.toFixed(2),
        },
        'scan-edge-unprofitable',
      );
      return { kind: 'discarded', reason: 'unprofitable', detail: breakdown.netProfit.toFixed(2) };
    }

    const slippage = slippageBps(amount, edge.decimals, route.estimatedOutput, edge.decimalsDst);
    const advice = this.deps.optimizer.recommend(edge.srcChain, slippage / 10_000);
    const extra: Hex = route.txData ?? '0x';
    const signal: TradeSignal = Object.freeze({
      chainId: edge.srcChain,
      token: edge.tokenAddrSrc,
      amount,
      flashSource: FlashSource.BalancerV3,
      hops: [{ protocol: SwapProtocol.UNIV3, router: dstChain.routers.uniswapV3 }],
      path: [edge.tokenAddrSrc, edge.tokenAddrDst],
      extras: [extra],
      expectedProfitUsd: breakdown.netProfit,
      estimatedSlippageBps: slippage,
      confidence: Math.min(1, Math.max(0, advice.confidence)),
      gasEstimate: this.settings.gasUnitsEstimate,
      hints: {
        ...advice.hints,
        type: 'CROSS_CHAIN',
        bridge: route.bridgeName,
        dstChainId: edge.dstChain,
        gasCostUsd: gasUsd.decimalPlaces(6).toNumber(),
      },
    });
    counter.signalsBuilt.inc({ chain: src });
    histogram.netProfitUsd.observe({ chain: src }, breakdown.netProfit.toNumber());

    if (cancel?.aborted) {
      return { kind: 'discarded', reason: 'timeout', detail: 'cycle stopped waiting before submission' };
    }

    const result = await this.deps.executor.submitTrade(signal);
    this.scanLog.info(
      {
        ...ctx,
        amount: amount.toString(),
        netProfitUsd: breakdown.netProfit.toFixed(2),
        slippageBps: slippage,
        confidence: signal.confidence,
        status: result.status,
        tradeId: result.tradeId,
        reason: result.status === TradeStatus.FAILED ? result.reason : undefined,
      },
      'scan-edge-submitted',
    );
    return { kind: 'submitted', signal, result };
  }

  private async fetchGasPrices(): Promise<Map<number, bigint>> {
    const gas = new Map<number, bigint>();
    const chainIds = this.deps.registry.configuredChains().filter((chainId) => this.deps.registry.endpoint(chainId));
    await runPool(
      chainIds,
      this.settings.workers,
      async (chainId) => {
        const raced = await raceTimeout(this.deps.gasPrice(chainId), this.settings.rpcTimeoutMs);
        if (raced === TIMED_OUT) {
          this.scanLog.warn({ chain: this.chainName(chainId) }, 'scan-gas-price-timeout');
          return;
        }
        gas.set(chainId, raced);
        gauge.gasPriceGwei.set({ chain: this.chainName(chainId) }, Number(formatGwei(raced)));
      },
      (chainId, err) => {
        this.scanLog.warn({ chain: this.chainName(chainId), err: errorMessage(err) }, 'scan-gas-price-failed');
      },
    );
    return gas;
  }

  private chainName(chainId: number): string {
    return this.deps.registry.chainName(chainId);
  }
}
