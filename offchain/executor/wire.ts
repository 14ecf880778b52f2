import BigNumber from 'bignumber.js';
import { z } from 'zod';
import { TradeStatus, type ExecutorReport, type HintValue, type TradeSignal } from '../pipeline/types';

/** JSON body the execution service accepts for /execute and /simulate. */
export type WireSignal = {
  trade_id?: string;
  chainId: number;
  token: string;
  amount: string;
  flashSource: number;
  protocols: number[];
  routers: string[];
  path: string[];
  extras: string[];
  expected_profit: number;
  slippage_bps: number;
  confidence: number;
  gas_estimate: number;
  hints: Record<string, HintValue>;
};

export function serializeSignal(signal: TradeSignal, tradeId?: string): WireSignal {
  return {
    ...(tradeId ? { trade_id: tradeId } : {}),
    chainId: signal.chainId,
    token: signal.token,
    amount: signal.amount.toString(),
    flashSource: signal.flashSource,
    protocols: signal.hops.map((hop) => hop.protocol),
    routers: signal.hops.map((hop) => hop.router),
    path: [...signal.path],
    extras: [...signal.extras],
    expected_profit: signal.expectedProfitUsd.toNumber(),
    slippage_bps: signal.estimatedSlippageBps,
    confidence: signal.confidence,
    gas_estimate: signal.gasEstimate ?? 0,
    hints: { ...signal.hints },
  };
}

const NumericLike = z.union([z.number(), z.string()]);

export const HealthResponseSchema = z.object({
  status: z.string(),
  mode: z.string(),
  chains: z.array(z.union([z.number(), z.string()])).default([]),
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const ExecuteResponseSchema = z.object({
  success: z.boolean(),
  mode: z.string().default('unknown'),
  txHash: z.string().optional(),
  error: z.string().optional(),
});
export type ExecuteResponse = z.infer<typeof ExecuteResponseSchema>;

export const BatchResponseSchema = z.object({
  total: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  results: z.array(ExecuteResponseSchema),
});
export type BatchResponse = z.infer<typeof BatchResponseSchema>;

export const SimulateResponseSchema = z.object({
  success: z.boolean(),
  simulation: z.unknown().optional(),
  error: z.string().optional(),
});
export type SimulateResponse = z.infer<typeof SimulateResponseSchema>;

export const StatsResponseSchema = z.object({
  total_signals: z.number(),
  executed: z.number(),
  paper_executed: z.number(),
  failed: z.number(),
  total_profit: z.number(),
  uptime: z.number(),
});
export type StatsResponse = z.infer<typeof StatsResponseSchema>;

const StreamResultSchema = z
  .object({
    trade_id: z.string().optional(),
    tradeId: z.string().optional(),
    status: z.string().optional(),
    success: z.boolean().optional(),
    txHash: z.string().optional(),
    tx_hash: z.string().optional(),
    actual_profit: NumericLike.optional(),
    error: z.string().optional(),
  })
  .passthrough();

const StreamSignalSchema = z
  .object({
    trade_id: z.string().optional(),
    tradeId: z.string().optional(),
  })
  .passthrough();

export const StreamEventSchema = z.object({
  type: z.enum(['connected', 'execution_result', 'paper_execution', 'live_execution', 'pong', 'error']),
  signal: StreamSignalSchema.optional(),
  result: StreamResultSchema.optional(),
  txHash: z.string().optional(),
  message: z.string().optional(),
});
export type StreamEvent = z.infer<typeof StreamEventSchema>;
export type StreamResult = z.infer<typeof StreamResultSchema>;

export function parseStreamEvent(raw: string): StreamEvent | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = StreamEventSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

/**
 * Trade id and terminal report carried by a stream event, when it has both.
 * A `live_execution` broadcast has no `result`: it echoes the signal and
 * carries the transaction hash at the top level, which means the service
 * landed the trade.
 */
export function reportFromStream(event: StreamEvent): { tradeId: string; report: ExecutorReport } | null {
  const result = event.result;
  if (!result) {
    if (event.type !== 'live_execution' || !event.txHash) return null;
    const tradeId = event.signal?.trade_id ?? event.signal?.tradeId;
    if (!tradeId) return null;
    return { tradeId, report: { status: TradeStatus.CONFIRMED, txHash: event.txHash } };
  }
  const tradeId = result.trade_id ?? result.tradeId ?? event.signal?.trade_id ?? event.signal?.tradeId;
  if (!tradeId) return null;

  const status = result.status?.toUpperCase();
  let terminal: ExecutorReport['status'];
  if (status === TradeStatus.CONFIRMED || status === 'SUCCESS') {
    terminal = TradeStatus.CONFIRMED;
  } else if (status === TradeStatus.REVERTED) {
    terminal = TradeStatus.REVERTED;
  } else if (status === TradeStatus.FAILED) {
    terminal = TradeStatus.FAILED;
  } else if (result.success !== undefined) {
    terminal = result.success ? TradeStatus.CONFIRMED : TradeStatus.FAILED;
  } else {
    return null;
  }

  const profit = result.actual_profit === undefined ? undefined : new BigNumber(result.actual_profit);
  return {
    tradeId,
    report: {
      status: terminal,
      txHash: result.txHash ?? result.tx_hash ?? event.txHash,
      actualProfitUsd: profit && profit.isFinite() ? profit : undefined,
      error: result.error,
    },
  };
}
