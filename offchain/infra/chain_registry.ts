import type { EnvSnapshot } from './config';
import { errorMessage, withTimeout } from './errors';
import { instrumentRpc, metricTargetFromRpc } from './instrument';
import { log } from './logger';
import { gauge } from './metrics';
import { evictRpcClients, getPublicClient, type RpcEndpoint } from './rpc_clients';

export const ExecutionState = {
  ENABLED: 'ENABLED',
  CONFIGURED: 'CONFIGURED',
  DISABLED: 'DISABLED',
} as const;
export type ExecutionState = (typeof ExecutionState)[keyof typeof ExecutionState];

export type ChainDescriptor = Readonly<{
  id: number;
  name: string;
  native: string;
  rpcEnv: string;
  wssEnv: string;
  executorEnv: string;
}>;

export type ChainHealth = {
  chainId: number;
  name: string;
  state: ExecutionState;
  healthy: boolean;
  blockNumber?: bigint;
  checkedAt?: number;
  error?: string;
};

/** Returns the current block height reachable through `rpcUrl`. */
export type RpcProbe = (chainId: number, rpcUrl: string) => Promise<bigint>;

function descriptor(id: number, name: string, native: string): ChainDescriptor {
  const key = name.toUpperCase();
  return Object.freeze({
    id,
    name,
    native,
    rpcEnv: `RPC_${key}`,
    wssEnv: `WSS_${key}`,
    executorEnv: `EXECUTOR_ADDRESS_${key}`,
  });
}

const DESCRIPTORS: ReadonlyMap<number, ChainDescriptor> = new Map(
  [
    descriptor(1, 'ethereum', 'ETH'),
    descriptor(10, 'optimism', 'ETH'),
    descriptor(56, 'bsc', 'BNB'),
    descriptor(137, 'polygon', 'MATIC'),
    descriptor(8453, 'base', 'ETH'),
    descriptor(42161, 'arbitrum', 'ETH'),
    descriptor(43114, 'avalanche', 'AVAX'),
  ].map((d) => [d.id, d]),
);

// Execution permission is a deploy-time decision. Only chains listed here can
// ever be CONFIGURED or ENABLED.
const EXECUTION_STATES: ReadonlyMap<number, ExecutionState> = new Map<number, ExecutionState>([
  [137, ExecutionState.ENABLED],
  [1, ExecutionState.CONFIGURED],
  [42161, ExecutionState.CONFIGURED],
]);

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '0.0.0.0', '::1', '[::1]']);

const STATE_GAUGE: Record<ExecutionState, number> = {
  ENABLED: 2,
  CONFIGURED: 1,
  DISABLED: 0,
};

export type ChainRegistryOptions = {
  probe?: RpcProbe;
  rpcTimeoutMs?: number;
};

const defaultProbe: RpcProbe = (chainId, rpcUrl) => getPublicClient({ chainId, rpcUrl }).getBlockNumber();

export class ChainRegistry {
  private readonly registryLog = log.child({ module: 'infra.chains' });
  private readonly validatedRpc = new Map<number, string>();
  private readonly health = new Map<number, ChainHealth>();
  private readonly probe: RpcProbe;
  private readonly rpcTimeoutMs: number;

  constructor(
    private readonly env: EnvSnapshot,
    options: ChainRegistryOptions = {},
  ) {
    this.probe = options.probe ?? defaultProbe;
    this.rpcTimeoutMs = options.rpcTimeoutMs ?? 8_000;
    for (const chain of DESCRIPTORS.values()) {
      gauge.chainExecutionState.set({ chain: chain.name }, STATE_GAUGE[this.executionState(chain.id)]);
    }
  }

  describe(chainId: number): ChainDescriptor | undefined {
    return DESCRIPTORS.get(chainId);
  }

  chainName(chainId: number): string {
    return DESCRIPTORS.get(chainId)?.name ?? `chain-${chainId}`;
  }

  executionState(chainId: number): ExecutionState {
    return EXECUTION_STATES.get(chainId) ?? ExecutionState.DISABLED;
  }

  isExecutionEnabled(chainId: number): boolean {
    return this.executionState(chainId) === ExecutionState.ENABLED;
  }

  isConfigured(chainId: number): boolean {
    const state = this.executionState(chainId);
    return state === ExecutionState.ENABLED || state === ExecutionState.CONFIGURED;
  }

  enabledChains(): number[] {
    return [...EXECUTION_STATES.entries()]
      .filter(([, state]) => state === ExecutionState.ENABLED)
      .map(([chainId]) => chainId);
  }

  configuredChains(): number[] {
    return [...EXECUTION_STATES.keys()].filter((chainId) => this.isConfigured(chainId));
  }

  resolveRpcUrl(chainId: number): string | null {
    const chain = DESCRIPTORS.get(chainId);
    if (!chain) return null;
    return this.acceptUrl(chain, this.env[chain.rpcEnv], ['http:', 'https:']);
  }

  resolveWsUrl(chainId: number): string | null {
    const chain = DESCRIPTORS.get(chainId);
    if (!chain) return null;
    return this.acceptUrl(chain, this.env[chain.wssEnv], ['ws:', 'wss:']);
  }

  /** Raw configured value; placeholder screening belongs to the live executor. */
  executorAddress(chainId: number): string | null {
    const chain = DESCRIPTORS.get(chainId);
    if (!chain) return null;
    const value = (this.env[chain.executorEnv] ?? this.env.EXECUTOR_ADDRESS)?.trim();
    return value ? value : null;
  }

  /** Endpoint validated by the last successful health probe. */
  endpoint(chainId: number): RpcEndpoint | null {
    const rpcUrl = this.validatedRpc.get(chainId);
    if (!rpcUrl) return null;
    return { chainId, rpcUrl, wsUrl: this.resolveWsUrl(chainId) };
  }

  isHealthy(chainId: number): boolean {
    return this.health.get(chainId)?.healthy ?? false;
  }

  async validateHealth(chainId: number): Promise<boolean> {
    const name = this.chainName(chainId);
    const rpcUrl = this.resolveRpcUrl(chainId);
    if (!rpcUrl) {
      return this.record(chainId, false, { error: 'no usable RPC URL' });
    }
    try {
      const blockNumber = await instrumentRpc(
        'getBlockNumber',
        () => withTimeout(this.probe(chainId, rpcUrl), this.rpcTimeoutMs, `${name} health probe`),
        { target: metricTargetFromRpc(rpcUrl) },
      );
      this.validatedRpc.set(chainId, rpcUrl);
      this.registryLog.info({ chain: name, blockNumber: blockNumber.toString() }, 'chain-rpc-healthy');
      return this.record(chainId, true, { blockNumber });
    } catch (err) {
      const message = errorMessage(err);
      this.validatedRpc.delete(chainId);
      evictRpcClients(chainId);
      this.registryLog.warn({ chain: name, err: message }, 'chain-rpc-unhealthy');
      return this.record(chainId, false, { error: message });
    }
  }

  async validateAllConfigured(): Promise<Map<number, boolean>> {
    const chainIds = this.configuredChains();
    const outcomes = await Promise.all(chainIds.map((chainId) => this.validateHealth(chainId)));
    return new Map(chainIds.map((chainId, idx) => [chainId, outcomes[idx]]));
  }

  healthSnapshot(): ChainHealth[] {
    return [...DESCRIPTORS.values()].map((chain) => {
      const known = this.health.get(chain.id);
      return (
        known ?? {
          chainId: chain.id,
          name: chain.name,
          state: this.executionState(chain.id),
          healthy: false,
        }
      );
    });
  }

  summary(): { enabled: number; configured: number; healthy: number; chains: ChainHealth[] } {
    const chains = this.healthSnapshot();
    return {
      enabled: chains.filter((c) => c.state === ExecutionState.ENABLED).length,
      configured: chains.filter((c) => c.state !== ExecutionState.DISABLED).length,
      healthy: chains.filter((c) => c.healthy).length,
      chains,
    };
  }

  private record(chainId: number, healthy: boolean, extra: { blockNumber?: bigint; error?: string }): boolean {
    const name = this.chainName(chainId);
    this.health.set(chainId, {
      chainId,
      name,
      state: this.executionState(chainId),
      healthy,
      checkedAt: Date.now(),
      ...extra,
    });
    gauge.chainRpcHealthy.set({ chain: name }, healthy ? 1 : 0);
    return healthy;
  }

  private acceptUrl(chain: ChainDescriptor, raw: string | undefined, schemes: string[]): string | null {
    const value = raw?.trim();
    if (!value) return null;
    const lowered = value.toLowerCase();
    if (lowered.includes('localhost') || lowered.includes('127.0.0.1')) {
      this.registryLog.error({ chain: chain.name }, 'chain-rpc-url-rejected-loopback');
      return null;
    }
    let parsed: URL;
    try {
      parsed = new URL(value);
    } catch {
      this.registryLog.error({ chain: chain.name }, 'chain-rpc-url-rejected-unparseable');
      return null;
    }
    if (!schemes.includes(parsed.protocol)) {
      this.registryLog.error({ chain: chain.name, scheme: parsed.protocol }, 'chain-rpc-url-rejected-scheme');
      return null;
    }
    if (LOOPBACK_HOSTS.has(parsed.hostname)) {
      this.registryLog.error({ chain: chain.name }, 'chain-rpc-url-rejected-loopback');
      return null;
    }
    return value;
  }
}
