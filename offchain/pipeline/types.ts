import type BigNumber from 'bignumber.js';
import type { Address, Hex } from 'viem';

export const FlashSource = {
  AaveV3: 0,
  BalancerV3: 1,
} as const;
export type FlashSource = (typeof FlashSource)[keyof typeof FlashSource];

export const SwapProtocol = {
  UNIV2: 1,
  UNIV3: 2,
  CURVE: 3,
} as const;
export type SwapProtocol = (typeof SwapProtocol)[keyof typeof SwapProtocol];

export const TradeStatus = {
  PENDING: 'PENDING',
  SIMULATED: 'SIMULATED',
  SUBMITTED: 'SUBMITTED',
  CONFIRMED: 'CONFIRMED',
  FAILED: 'FAILED',
  REVERTED: 'REVERTED',
} as const;
export type TradeStatus = (typeof TradeStatus)[keyof typeof TradeStatus];

export type TerminalStatus = typeof TradeStatus.CONFIRMED | typeof TradeStatus.FAILED | typeof TradeStatus.REVERTED;

export type TradeHop = Readonly<{
  protocol: SwapProtocol;
  router: Address;
}>;

export type HintValue = string | number | boolean;

export type TradeSignal = Readonly<{
  chainId: number;
  token: Address;
  /** Raw loan amount in token base units. */
  amount: bigint;
  flashSource: FlashSource;
  hops: readonly TradeHop[];
  path: readonly Address[];
  /** Opaque per-hop payloads; one entry per hop. */
  extras: readonly Hex[];
  expectedProfitUsd: BigNumber;
  estimatedSlippageBps: number;
  confidence: number;
  gasEstimate?: number;
  hints: Readonly<Record<string, HintValue>>;
}>;

export type ExecutionModeTag = 'paper' | 'live';

export type PreflightCheck =
  | 'min-profit'
  | 'max-slippage'
  | 'concurrency'
  | 'required-fields'
  | 'credential'
  | 'executor-contract'
  | 'chain-not-enabled'
  | 'channel';

export type SimulatedResult = {
  status: typeof TradeStatus.SIMULATED;
  mode: 'paper';
  tradeId: string;
  txHash: string;
  profitable: boolean;
  realizedProfitUsd: BigNumber;
  capitalUsd: BigNumber;
};

export type SubmittedResult = {
  status: typeof TradeStatus.SUBMITTED;
  mode: 'live';
  tradeId: string;
  channel: string;
};

export type FailedResult = {
  status: typeof TradeStatus.FAILED;
  mode: ExecutionModeTag;
  reason: string;
  check?: PreflightCheck;
  tradeId?: string;
};

export type ExecutionResult = SimulatedResult | SubmittedResult | FailedResult;

/** Outcome reported back by the external executor for a SUBMITTED trade. */
export type ExecutorReport = {
  status: TerminalStatus;
  txHash?: string;
  actualProfitUsd?: BigNumber;
  error?: string;
};

export type PerformanceCounters = {
  trades: number;
  successes: number;
  failures: number;
  cumulativeProfitUsd: BigNumber;
  cumulativeVolume: bigint;
};
