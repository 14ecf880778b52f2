import BigNumber from 'bignumber.js';
import type { ChainRegistry } from '../infra/chain_registry';
import type { EnvSnapshot, ExecutionLimits, ExecutionModeName, ExecutionSettings, PaperSettings } from '../infra/config';
import { errorMessage } from '../infra/errors';
import { log } from '../infra/logger';
import { counter, gauge } from '../infra/metrics';
import { EvmAddressSchema } from '../infra/address';
import { credentialProblem, executorProblem } from '../infra/readiness';
import {
  TradeStatus,
  type ExecutionResult,
  type ExecutorReport,
  type FailedResult,
  type PerformanceCounters,
  type PreflightCheck,
  type SimulatedResult,
  type TradeSignal,
} from '../pipeline/types';
import type { InFlightStore, SignalChannel, TradeJournal } from './channels';

export type ExecutorSummary = {
  mode: ExecutionModeName;
  counters: PerformanceCounters;
  pending?: number;
  capitalUsd?: string;
  routes?: ExecutorSummary[];
};

export interface Executor {
  readonly mode: ExecutionModeName;
  submitTrade(signal: TradeSignal): Promise<ExecutionResult>;
  /** Applies an executor-reported outcome once; returns false for unknown or repeated deliveries. */
  recordExecutionResult(tradeId: string, report: ExecutorReport): Promise<boolean>;
  summary(): ExecutorSummary;
}

function emptyCounters(): PerformanceCounters {
  return { trades: 0, successes: 0, failures: 0, cumulativeProfitUsd: new BigNumber(0), cumulativeVolume: 0n };
}

function formatUsd(value: BigNumber): string {
  return `$${value.toFixed(2)}`;
}

/** First required field that is missing or empty, or null when the signal is complete. */
export function missingSignalField(signal: TradeSignal): string | null {
  if (!Number.isInteger(signal.chainId) || signal.chainId <= 0) return 'chainId';
  if (!signal.token || !EvmAddressSchema.safeParse(signal.token).success) return 'token';
  if (signal.amount <= 0n) return 'amount';
  if (signal.hops.length === 0 || signal.hops.some((hop) => !Number.isInteger(hop.protocol))) return 'protocols';
  if (signal.hops.some((hop) => !EvmAddressSchema.safeParse(hop.router).success)) return 'routers';
  if (signal.path.length === 0) return 'path';
  return null;
}

/** Recorded trade ids kept for duplicate detection. */
export const RECORDED_HISTORY = 1_024;

/** Simulated fills only. Never touches a network. */
export class PaperExecutor implements Executor {
  readonly mode = 'paper' as const;
  private readonly paperLog = log.child({ module: 'executor.paper' });
  private readonly counters = emptyCounters();
  private capital: BigNumber;
  private sequence = 0;

  constructor(
    private readonly settings: PaperSettings,
    private readonly journal: TradeJournal | null = null,
  ) {
    this.capital = settings.initialCapitalUsd;
    gauge.paperCapitalUsd.set(this.capital.toNumber());
  }

  async submitTrade(signal: TradeSignal): Promise<ExecutionResult> {
    const missing = missingSignalField(signal);
    if (missing) {
      const failed: FailedResult = {
        status: TradeStatus.FAILED,
        mode: 'paper',
        reason: `missing required field: ${missing}`,
        check: 'required-fields',
      };
      counter.submissions.inc({ mode: 'paper', status: failed.status });
      this.paperLog.warn({ chainId: signal.chainId, reason: failed.reason }, 'paper-trade-malformed');
      return failed;
    }

    this.sequence += 1;
    const tradeId = `PAPER_${signal.chainId}_${this.sequence}`;
    const gasCost = this.gasCostUsd(signal);
    const realized = signal.expectedProfitUsd.times(this.settings.slippageFactor).minus(gasCost);
    const profitable = realized.gt(0);

    this.capital = this.capital.plus(realized);
    this.counters.trades += 1;
    if (profitable) this.counters.successes += 1;
    else this.counters.failures += 1;
    this.counters.cumulativeProfitUsd = this.counters.cumulativeProfitUsd.plus(realized);
    this.counters.cumulativeVolume += signal.amount;
    gauge.paperCapitalUsd.set(this.capital.toNumber());

    const result: SimulatedResult = {
      status: TradeStatus.SIMULATED,
      mode: 'paper',
      tradeId,
      txHash: `SIMULATED_${tradeId}`,
      profitable,
      realizedProfitUsd: realized,
      capitalUsd: this.capital,
    };
    counter.submissions.inc({ mode: 'paper', status: result.status });
    this.paperLog.info(
      {
        tradeId,
        chainId: signal.chainId,
        token: signal.token,
        expectedProfitUsd: signal.expectedProfitUsd.toFixed(2),
        gasCostUsd: gasCost.toFixed(2),
        realizedProfitUsd: realized.toFixed(2),
        capitalUsd: this.capital.toFixed(2),
      },
      'paper-trade-simulated',
    );
    await this.journalTrade(result, signal);
    return result;
  }

  async recordExecutionResult(): Promise<boolean> {
    return false;
  }

  summary(): ExecutorSummary {
    return { mode: this.mode, counters: { ...this.counters }, capitalUsd: this.capital.toFixed(2) };
  }

  private gasCostUsd(signal: TradeSignal): BigNumber {
    const hinted = signal.hints.gasCostUsd;
    if (typeof hinted === 'number' && Number.isFinite(hinted) && hinted >= 0) {
      return new BigNumber(hinted);
    }
    return this.settings.defaultGasUsd;
  }

  private async journalTrade(result: SimulatedResult, signal: TradeSignal): Promise<void> {
    if (!this.journal) return;
    try {
      await this.journal.record({
        tradeId: result.tradeId,
        chainId: signal.chainId,
        token: signal.token,
        amount: signal.amount.toString(),
        expectedProfitUsd: signal.expectedProfitUsd.toFixed(),
        realizedProfitUsd: result.realizedProfitUsd.toFixed(),
        capitalUsd: result.capitalUsd.toFixed(),
        profitable: result.profitable,
        timestamp: Date.now(),
      });
    } catch (err) {
      this.paperLog.warn({ tradeId: result.tradeId, err: errorMessage(err) }, 'paper-journal-failed');
    }
  }
}

export type LiveExecutorDeps = {
  limits: ExecutionLimits;
  registry: ChainRegistry;
  env: EnvSnapshot;
  inFlight: InFlightStore | null;
  channel: SignalChannel | null;
};

/**
 * Real-capital path. Every pre-execution check must pass before the trade is
 * marked pending and forwarded; a failed check leaves no trace downstream.
 */
export class LiveExecutor implements Executor {
  readonly mode = 'live' as const;
  private readonly liveLog = log.child({ module: 'executor.live' });
  private readonly counters = emptyCounters();
  private readonly pending = new Map<string, TradeSignal>();
  private readonly recorded = new Set<string>();
  private sequence = 0;

  constructor(private readonly deps: LiveExecutorDeps) {}

  async submitTrade(signal: TradeSignal): Promise<ExecutionResult> {
    const rejection = await this.preflight(signal);
    if (rejection) return rejection;

    const channel = this.deps.channel;
    if (!channel) {
      return this.reject(signal, 'channel', 'forwarding channel unavailable: live execution has no signal channel');
    }

    this.sequence += 1;
    const tradeId = `LIVE_${signal.chainId}_${this.sequence}`;
    const limit = this.deps.limits.maxConcurrentTxs;
    let reserved = false;
    if (this.deps.inFlight) {
      try {
        if (!(await this.deps.inFlight.reserve(tradeId, limit))) {
          return this.reject(signal, 'concurrency', `in-flight transactions at ceiling ${limit}`, tradeId);
        }
        reserved = true;
      } catch (err) {
        this.liveLog.warn({ tradeId, err: errorMessage(err) }, 'live-inflight-reserve-skipped');
      }
    }

    this.pending.set(tradeId, signal);
    gauge.inFlightTxs.set(this.pending.size);
    try {
      await channel.forward(tradeId, signal);
    } catch (err) {
      this.pending.delete(tradeId);
      gauge.inFlightTxs.set(this.pending.size);
      if (reserved) await this.releaseInFlight(tradeId);
      return this.reject(signal, 'channel', `forwarding channel unavailable: ${errorMessage(err)}`, tradeId);
    }

    this.counters.trades += 1;
    this.counters.cumulativeVolume += signal.amount;
    counter.submissions.inc({ mode: 'live', status: TradeStatus.SUBMITTED });
    this.liveLog.info(
      {
        tradeId,
        chain: this.deps.registry.chainName(signal.chainId),
        token: signal.token,
        amount: signal.amount.toString(),
        expectedProfitUsd: signal.expectedProfitUsd.toFixed(2),
        channel: channel.name,
      },
      'live-trade-submitted',
    );
    return { status: TradeStatus.SUBMITTED, mode: 'live', tradeId, channel: channel.name };
  }

  async recordExecutionResult(tradeId: string, report: ExecutorReport): Promise<boolean> {
    if (this.recorded.has(tradeId)) {
      counter.resultsDuplicate.inc();
      this.liveLog.debug({ tradeId, status: report.status }, 'live-result-duplicate');
      return false;
    }
    if (!this.pending.delete(tradeId)) {
      // Not submitted by this process; only a stale in-flight marker is cleared.
      await this.releaseInFlight(tradeId);
      counter.resultsUnknown.inc();
      this.liveLog.debug({ tradeId, status: report.status }, 'live-result-unknown');
      return false;
    }
    this.remember(tradeId);
    gauge.inFlightTxs.set(this.pending.size);
    await this.releaseInFlight(tradeId);

    if (report.status === TradeStatus.CONFIRMED) {
      this.counters.successes += 1;
      this.counters.cumulativeProfitUsd = this.counters.cumulativeProfitUsd.plus(report.actualProfitUsd ?? 0);
    } else {
      this.counters.failures += 1;
    }
    counter.resultsRecorded.inc({ status: report.status });
    this.liveLog.info(
      {
        tradeId,
        status: report.status,
        txHash: report.txHash,
        actualProfitUsd: report.actualProfitUsd?.toFixed(2),
        err: report.error,
      },
      'live-result-recorded',
    );
    return true;
  }

  recordedTradeCount(): number {
    return this.recorded.size;
  }

  pendingTradeIds(): string[] {
    return [...this.pending.keys()];
  }

  summary(): ExecutorSummary {
    return { mode: this.mode, counters: { ...this.counters }, pending: this.pending.size };
  }

  private async preflight(signal: TradeSignal): Promise<FailedResult | null> {
    const { limits, registry } = this.deps;

    if (signal.expectedProfitUsd.lt(limits.minProfitUsd)) {
      const shortfall = limits.minProfitUsd.minus(signal.expectedProfitUsd);
      return this.reject(
        signal,
        'min-profit',
        `expected profit ${formatUsd(signal.expectedProfitUsd)} below minimum ${formatUsd(limits.minProfitUsd)} (short ${formatUsd(shortfall)})`,
      );
    }

    if (signal.estimatedSlippageBps > limits.maxSlippageBps) {
      return this.reject(
        signal,
        'max-slippage',
        `estimated slippage ${signal.estimatedSlippageBps} bps exceeds maximum ${limits.maxSlippageBps} bps`,
      );
    }

    if (this.deps.inFlight) {
      try {
        const inFlight = await this.deps.inFlight.count();
        if (inFlight >= limits.maxConcurrentTxs) {
          return this.reject(
            signal,
            'concurrency',
            `in-flight transactions ${inFlight} at ceiling ${limits.maxConcurrentTxs}`,
          );
        }
      } catch (err) {
        // Counter outage: skip only this check.
        this.liveLog.warn({ err: errorMessage(err) }, 'live-concurrency-check-skipped');
      }
    }

    const missing = missingSignalField(signal);
    if (missing) {
      return this.reject(signal, 'required-fields', `missing required field: ${missing}`);
    }

    const credential = credentialProblem(this.deps.env.PRIVATE_KEY);
    if (credential) {
      return this.reject(signal, 'credential', credential);
    }

    const chain = registry.chainName(signal.chainId);
    const executorIssue = executorProblem(registry.executorAddress(signal.chainId));
    if (executorIssue) {
      return this.reject(signal, 'executor-contract', `executor contract for ${chain} ${executorIssue}`);
    }

    if (!registry.isExecutionEnabled(signal.chainId)) {
      return this.reject(signal, 'chain-not-enabled', `execution not enabled on ${chain}`);
    }
    return null;
  }

  private reject(signal: TradeSignal, check: PreflightCheck, reason: string, tradeId?: string): FailedResult {
    counter.preflightRejected.inc({ check });
    counter.submissions.inc({ mode: 'live', status: TradeStatus.FAILED });
    this.liveLog.warn(
      {
        tradeId,
        chain: this.deps.registry.chainName(signal.chainId),
        token: signal.token,
        check,
        reason,
      },
      'live-preflight-rejected',
    );
    return { status: TradeStatus.FAILED, mode: 'live', reason, check, tradeId };
  }

  private remember(tradeId: string): void {
    this.recorded.add(tradeId);
    // Sets iterate in insertion order: the first entry is the oldest.
    for (const oldest of this.recorded) {
      if (this.recorded.size <= RECORDED_HISTORY) break;
      this.recorded.delete(oldest);
    }
  }

  private async releaseInFlight(tradeId: string): Promise<void> {
    if (!this.deps.inFlight) return;
    try {
      await this.deps.inFlight.release(tradeId);
    } catch (err) {
      this.liveLog.warn({ tradeId, err: errorMessage(err) }, 'live-inflight-release-failed');
    }
  }
}

/** Live when `confidence >= threshold`, paper otherwise. */
export class HybridExecutor implements Executor {
  readonly mode = 'hybrid' as const;
  private readonly hybridLog = log.child({ module: 'executor.hybrid' });

  constructor(
    private readonly paper: PaperExecutor,
    private readonly live: LiveExecutor,
    private readonly threshold = 0.85,
  ) {}

  route(signal: TradeSignal): Executor {
    return signal.confidence >= this.threshold ? this.live : this.paper;
  }

  async submitTrade(signal: TradeSignal): Promise<ExecutionResult> {
    const target = this.route(signal);
    this.hybridLog.debug(
      { chainId: signal.chainId, confidence: signal.confidence, threshold: this.threshold, route: target.mode },
      'hybrid-route',
    );
    return target.submitTrade(signal);
  }

  recordExecutionResult(tradeId: string, report: ExecutorReport): Promise<boolean> {
    return this.live.recordExecutionResult(tradeId, report);
  }

  summary(): ExecutorSummary {
    const paper = this.paper.summary();
    const live = this.live.summary();
    return {
      mode: this.mode,
      counters: {
        trades: paper.counters.trades + live.counters.trades,
        successes: paper.counters.successes + live.counters.successes,
        failures: paper.counters.failures + live.counters.failures,
        cumulativeProfitUsd: paper.counters.cumulativeProfitUsd.plus(live.counters.cumulativeProfitUsd),
        cumulativeVolume: paper.counters.cumulativeVolume + live.counters.cumulativeVolume,
      },
      pending: live.pending,
      capitalUsd: paper.capitalUsd,
      routes: [paper, live],
    };
  }
}

export type ExecutorDeps = Omit<LiveExecutorDeps, 'limits'> & {
  journal?: TradeJournal | null;
};

export function createExecutor(settings: ExecutionSettings, deps: ExecutorDeps): Executor {
  const paper = () => new PaperExecutor(settings.paper, deps.journal ?? null);
  const live = () => new LiveExecutor({ ...deps, limits: settings.limits });
  switch (settings.mode) {
    case 'live':
      return live();
    case 'hybrid':
      return new HybridExecutor(paper(), live(), settings.hybridThreshold);
    default:
      return paper();
  }
}

/** Log- and JSON-safe rendering of a summary. */
export function describeSummary(summary: ExecutorSummary): Record<string, unknown> {
  return {
    mode: summary.mode,
    trades: summary.counters.trades,
    successes: summary.counters.successes,
    failures: summary.counters.failures,
    cumulativeProfitUsd: summary.counters.cumulativeProfitUsd.toFixed(2),
    cumulativeVolume: summary.counters.cumulativeVolume.toString(),
    pending: summary.pending,
    capitalUsd: summary.capitalUsd,
    routes: summary.routes?.map(describeSummary),
  };
}
