import { EvmAddressSchema } from './address';
import { ExecutionState, type ChainHealth, type ChainRegistry } from './chain_registry';
import type { AppConfig } from './config';
import { ConfigurationError } from './errors';
import { log } from './logger';

export const PRIVATE_KEY_PLACEHOLDERS: ReadonlySet<string> = new Set([
  '0xYOUR_REAL_PRIVATE_KEY_HERE',
  'your_private_key_here',
]);
export const EXECUTOR_PLACEHOLDERS: ReadonlySet<string> = new Set(['0xYOUR_DEPLOYED_CONTRACT_ADDRESS_HERE']);

export type DiagnosticStatus = 'ok' | 'warn' | 'error';

export type Diagnostic = {
  component: string;
  status: DiagnosticStatus;
  message: string;
  hint?: string;
  meta?: Record<string, unknown>;
};

export type ReadinessReport = {
  ready: boolean;
  mode: AppConfig['execution']['mode'];
  diagnostics: Diagnostic[];
  chains: ChainHealth[];
};

/** Reason the signing credential is unusable, or null when it is usable. */
export function credentialProblem(privateKey: string | undefined): string | null {
  const value = privateKey?.trim();
  if (!value) return 'signing credential not configured';
  if (PRIVATE_KEY_PLACEHOLDERS.has(value)) return 'signing credential is a placeholder';
  return null;
}

export function executorProblem(address: string | null): string | null {
  if (!address) return 'not configured';
  if (EXECUTOR_PLACEHOLDERS.has(address)) return 'is a placeholder';
  if (!EvmAddressSchema.safeParse(address).success) return 'is not an address';
  return null;
}

/**
 * Start-up validation: chain RPC health, wallet and executor contracts when
 * real capital can move, and the safety limits.
 */
export async function checkReadiness(
  cfg: AppConfig,
  registry: ChainRegistry,
  options: { probe?: boolean } = {},
): Promise<ReadinessReport> {
  const diagnostics: Diagnostic[] = [];
  const record = (component: string, status: DiagnosticStatus, message: string, hint?: string, meta?: Record<string, unknown>) => {
    diagnostics.push({ component, status, message, hint, meta });
  };
  const mode = cfg.execution.mode;
  const realCapital = mode === 'live' || mode === 'hybrid';

  record('mode', 'ok', `execution mode ${mode}`);

  if (options.probe ?? true) {
    await registry.validateAllConfigured();
  }
  for (const chain of registry.healthSnapshot()) {
    if (chain.state === ExecutionState.DISABLED) continue;
    if (chain.healthy) {
      record(`chain:${chain.name}`, 'ok', `${chain.state} rpc healthy`, undefined, {
        blockNumber: chain.blockNumber?.toString(),
      });
    } else if (chain.state === ExecutionState.ENABLED) {
      record(`chain:${chain.name}`, 'error', 'execution enabled but rpc unhealthy', `set ${registry.describe(chain.chainId)?.rpcEnv}`, {
        err: chain.error,
      });
    } else {
      record(`chain:${chain.name}`, 'warn', 'configured chain rpc unhealthy', undefined, { err: chain.error });
    }
  }

  if (realCapital) {
    const privateKey = cfg.env.PRIVATE_KEY?.trim();
    const problem = credentialProblem(privateKey);
    if (problem) {
      record('wallet', 'error', problem, 'set PRIVATE_KEY');
    } else if (!/^0x[0-9a-fA-F]{64}$/.test(privateKey ?? '')) {
      record('wallet', 'error', 'signing credential is malformed', 'expected 0x followed by 64 hex characters');
    } else {
      record('wallet', 'ok', 'signing credential present');
    }
    for (const chainId of registry.enabledChains()) {
      const name = registry.chainName(chainId);
      const issue = executorProblem(registry.executorAddress(chainId));
      if (issue) {
        record(`executor:${name}`, 'error', `executor contract ${issue}`, `set ${registry.describe(chainId)?.executorEnv}`);
      } else {
        record(`executor:${name}`, 'ok', 'executor contract configured');
      }
    }
  } else {
    record('wallet', 'ok', 'paper mode: no signing credential required');
  }

  const limits = cfg.execution.limits;
  if (limits.minProfitUsd.isNegative()) {
    record('safety', 'error', 'MIN_PROFIT_USD must be >= 0');
  }
  if (limits.maxSlippageBps < 0 || limits.maxSlippageBps > 10_000) {
    record('safety', 'error', 'MAX_SLIPPAGE_BPS must be within 0..10000');
  }
  if (limits.maxConcurrentTxs < 1) {
    record('safety', 'error', 'MAX_CONCURRENT_TXS must be >= 1');
  }
  if (!diagnostics.some((d) => d.component === 'safety')) {
    record('safety', 'ok', 'limits within range', undefined, {
      minProfitUsd: limits.minProfitUsd.toFixed(),
      maxSlippageBps: limits.maxSlippageBps,
      maxConcurrentTxs: limits.maxConcurrentTxs,
    });
  }

  return {
    ready: !diagnostics.some((d) => d.status === 'error'),
    mode,
    diagnostics,
    chains: registry.healthSnapshot(),
  };
}

/** Refuses steady-state scanning while any ENABLED chain lacks a healthy RPC. */
export function assertExecutionReady(registry: ChainRegistry): void {
  const unhealthy = registry.enabledChains().filter((chainId) => !registry.isHealthy(chainId));
  if (unhealthy.length > 0) {
    throw new ConfigurationError(
      `no healthy RPC for enabled chain(s): ${unhealthy.map((chainId) => registry.chainName(chainId)).join(', ')}`,
      { chains: unhealthy },
    );
  }
}

export function logReadiness(report: ReadinessReport): void {
  for (const chain of report.chains) {
    log.info(
      { chain: chain.name, state: chain.state, healthy: chain.healthy, blockNumber: chain.blockNumber?.toString() },
      'readiness-chain',
    );
  }
  for (const d of report.diagnostics.filter((item) => item.status !== 'ok')) {
    log.warn({ component: d.component, status: d.status, hint: d.hint, ...d.meta }, d.message);
  }
  log.info(
    { ready: report.ready, mode: report.mode, errors: report.diagnostics.filter((d) => d.status === 'error').length },
    'readiness-summary',
  );
}
