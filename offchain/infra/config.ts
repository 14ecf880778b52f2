import path from 'path';
import BigNumber from 'bignumber.js';
import { z } from 'zod';
import type { Address } from 'viem';
import { log } from './logger';
import { ConfigurationError } from './errors';
import { EvmAddressSchema, ZERO_ADDRESS } from './address';

export type ExecutionModeName = 'paper' | 'live' | 'hybrid';
export type LiveChannelKind = 'redis' | 'http';
export type ForecasterKind = 'none' | 'trend';

export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

export type ExecutionLimits = {
  minProfitUsd: BigNumber;
  maxSlippageBps: number;
  maxConcurrentTxs: number;
};

export type PaperSettings = {
  initialCapitalUsd: BigNumber;
  slippageFactor: BigNumber;
  defaultGasUsd: BigNumber;
};

export type ExecutionSettings = {
  mode: ExecutionModeName;
  limits: ExecutionLimits;
  hybridThreshold: number;
  paper: PaperSettings;
  liveChannel: LiveChannelKind;
};

export type ExecutionServiceSettings = {
  host: string;
  port: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
};

export type ScanSettings = {
  workers: number;
  intervalMs: number;
  idleMs: number;
  holdMs: number;
  taskTimeoutMs: number;
  rpcTimeoutMs: number;
  shutdownGraceMs: number;
  summaryIntervalMs: number;
  targetLoanTokens: number;
  gasUnitsEstimate: number;
  flashFeeRate: BigNumber;
  primaryChainId: number;
  forecaster: ForecasterKind;
};

export type GuardSettings = {
  maxShareFraction: BigNumber;
  minTokens: number;
};

export type BridgeSettings = {
  quoteUrl?: string;
  userAddress: Address;
};

export type AppConfig = {
  env: EnvSnapshot;
  execution: ExecutionSettings;
  service: ExecutionServiceSettings;
  scan: ScanSettings;
  guard: GuardSettings;
  bridge: BridgeSettings;
  redisUrl?: string;
  inventoryPath: string;
  promPort: number;
  killSwitch: { path?: string; pollMs: number };
};

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const int = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const num = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().finite().min(min).default(fallback));

const decimal = (fallback: string) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^\d+(\.\d+)?$/, 'expected a non-negative decimal')
      .default(fallback),
  );

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  EXECUTION_MODE: optionalString,
  MIN_PROFIT_USD: decimal('5.0'),
  MAX_SLIPPAGE_BPS: int(50).pipe(z.number().max(10_000)),
  MAX_CONCURRENT_TXS: int(3, 1),
  HYBRID_CONFIDENCE_THRESHOLD: num(0.85).pipe(z.number().max(1)),
  PAPER_INITIAL_CAPITAL_USD: decimal('100000'),
  PAPER_SLIPPAGE_FACTOR: decimal('0.998'),
  PAPER_DEFAULT_GAS_USD: decimal('5.0'),
  LIVE_CHANNEL: z.preprocess(blankToUndefined, z.enum(['redis', 'http']).default('redis')),

  EXECUTION_HOST: z.preprocess(blankToUndefined, z.string().default('127.0.0.1')),
  EXECUTION_PORT: int(8545, 1).pipe(z.number().max(65_535)),
  EXECUTION_TIMEOUT_MS: int(30_000, 1),
  EXECUTION_MAX_RETRIES: int(3, 1),
  EXECUTION_RETRY_DELAY_MS: int(1_000),

  REDIS_URL: optionalString,

  SCAN_WORKERS: int(20, 1),
  SCAN_INTERVAL_MS: int(1_000),
  SCAN_IDLE_MS: int(5_000),
  SCAN_HOLD_MS: int(2_000),
  SCAN_TASK_TIMEOUT_MS: int(15_000, 1),
  RPC_TIMEOUT_MS: int(8_000, 1),
  SHUTDOWN_GRACE_MS: int(10_000),
  SUMMARY_INTERVAL_MS: int(60_000, 1),
  TARGET_LOAN_TOKENS: int(10_000, 1),
  GAS_UNITS_ESTIMATE: int(500_000, 1),
  FLASH_FEE_RATE: decimal('0'),
  PRIMARY_CHAIN_ID: int(137, 1),
  FORECASTER: z.preprocess(blankToUndefined, z.enum(['none', 'trend']).default('none')),

  LIQUIDITY_MAX_SHARE: decimal('0.20'),
  LIQUIDITY_MIN_TOKENS: int(500),

  BRIDGE_QUOTE_URL: optionalString,
  BRIDGE_USER_ADDRESS: z.preprocess(
    blankToUndefined,
    EvmAddressSchema.default(ZERO_ADDRESS),
  ),

  INVENTORY_PATH: optionalString,
  PROM_PORT: int(9470, 1),
  KILL_SWITCH_FILE: optionalString,
  KILL_SWITCH_POLL_MS: int(1_000),
});

export function parseExecutionMode(raw: string | undefined): ExecutionModeName {
  const normalized = (raw ?? 'paper').trim().toLowerCase();
  if (normalized === 'paper' || normalized === 'live' || normalized === 'hybrid') {
    return normalized;
  }
  log.warn({ mode: raw }, 'execution-mode-unknown-defaulting-paper');
  return 'paper';
}

/**
 * Builds the one process-wide configuration object. Throws ConfigurationError
 * naming every offending key.
 */
export function loadAppConfig(env: EnvSnapshot = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const e = parsed.data;

  const maxShare = new BigNumber(e.LIQUIDITY_MAX_SHARE);
  if (maxShare.isZero() || maxShare.gt(1)) {
    throw new ConfigurationError('Invalid configuration: LIQUIDITY_MAX_SHARE must be in (0, 1]');
  }

  return {
    env: { ...env },
    execution: {
      mode: parseExecutionMode(e.EXECUTION_MODE),
      limits: {
        minProfitUsd: new BigNumber(e.MIN_PROFIT_USD),
        maxSlippageBps: e.MAX_SLIPPAGE_BPS,
        maxConcurrentTxs: e.MAX_CONCURRENT_TXS,
      },
      hybridThreshold: e.HYBRID_CONFIDENCE_THRESHOLD,
      paper: {
        initialCapitalUsd: new BigNumber(e.PAPER_INITIAL_CAPITAL_USD),
        slippageFactor: new BigNumber(e.PAPER_SLIPPAGE_FACTOR),
        defaultGasUsd: new BigNumber(e.PAPER_DEFAULT_GAS_USD),
      },
      liveChannel: e.LIVE_CHANNEL,
    },
    service: {
      host: e.EXECUTION_HOST,
      port: e.EXECUTION_PORT,
      timeoutMs: e.EXECUTION_TIMEOUT_MS,
      maxRetries: e.EXECUTION_MAX_RETRIES,
      retryDelayMs: e.EXECUTION_RETRY_DELAY_MS,
    },
    scan: {
      workers: e.SCAN_WORKERS,
      intervalMs: e.SCAN_INTERVAL_MS,
      idleMs: e.SCAN_IDLE_MS,
      holdMs: e.SCAN_HOLD_MS,
      taskTimeoutMs: e.SCAN_TASK_TIMEOUT_MS,
      rpcTimeoutMs: e.RPC_TIMEOUT_MS,
      shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
      summaryIntervalMs: e.SUMMARY_INTERVAL_MS,
      targetLoanTokens: e.TARGET_LOAN_TOKENS,
      gasUnitsEstimate: e.GAS_UNITS_ESTIMATE,
      flashFeeRate: new BigNumber(e.FLASH_FEE_RATE),
      primaryChainId: e.PRIMARY_CHAIN_ID,
      forecaster: e.FORECASTER,
    },
    guard: {
      maxShareFraction: maxShare,
      minTokens: e.LIQUIDITY_MIN_TOKENS,
    },
    bridge: {
      quoteUrl: e.BRIDGE_QUOTE_URL,
      userAddress: e.BRIDGE_USER_ADDRESS,
    },
    redisUrl: e.REDIS_URL,
    inventoryPath: e.INVENTORY_PATH ?? path.resolve(__dirname, '..', '..', 'config', 'inventory.yaml'),
    promPort: e.PROM_PORT,
    killSwitch: { path: e.KILL_SWITCH_FILE, pollMs: e.KILL_SWITCH_POLL_MS },
  };
}

export function logAppConfig(cfg: AppConfig): void {
  log.info(
    {
      mode: cfg.execution.mode,
      minProfitUsd: cfg.execution.limits.minProfitUsd.toFixed(),
      maxSlippageBps: cfg.execution.limits.maxSlippageBps,
      maxConcurrentTxs: cfg.execution.limits.maxConcurrentTxs,
      hybridThreshold: cfg.execution.hybridThreshold,
      liveChannel: cfg.execution.liveChannel,
      executionService: `${cfg.service.host}:${cfg.service.port}`,
      workers: cfg.scan.workers,
      redis: Boolean(cfg.redisUrl),
      bridgeQuotes: Boolean(cfg.bridge.quoteUrl),
    },
    'app-config-loaded',
  );
}
