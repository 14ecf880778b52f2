import { ChainRegistry, ExecutionState, type RpcProbe } from '../infra/chain_registry';
import { EXECUTOR, HEALTHY_RPC_ENV } from './fixtures';
import { test, expect, expectDeepEqual, expectEqual } from './test_harness';

test('execution permissions come from the static whitelist', () => {
  const registry = new ChainRegistry({});
  expectEqual(registry.executionState(137), ExecutionState.ENABLED);
  expectEqual(registry.executionState(1), ExecutionState.CONFIGURED);
  expectEqual(registry.executionState(10), ExecutionState.DISABLED);
  expect(registry.isExecutionEnabled(137), 'polygon executes');
  expect(!registry.isExecutionEnabled(42161), 'arbitrum is scan-only');
  expect(registry.isConfigured(42161), 'arbitrum is configured');
  expect(!registry.isConfigured(8453), 'base is disabled');
  expectDeepEqual(registry.enabledChains(), [137]);
  expectDeepEqual(registry.configuredChains(), [137, 1, 42161]);
});

test('chain names fall back for unknown ids', () => {
  const registry = new ChainRegistry({});
  expectEqual(registry.chainName(42161), 'arbitrum');
  expectEqual(registry.chainName(999), 'chain-999');
});

test('loopback and malformed RPC URLs are rejected', () => {
  const cases: Array<[string, string | null]> = [
    ['http://localhost:8545', null],
    ['https://127.0.0.1/rpc', null],
    ['http://[::1]:8545', null],
    ['polygon-rpc.example', null],
    ['ftp://rpc.example/polygon', null],
    ['  https://rpc.example/polygon  ', 'https://rpc.example/polygon'],
  ];
  for (const [raw, expected] of cases) {
    const registry = new ChainRegistry({ RPC_POLYGON: raw });
    expectEqual(registry.resolveRpcUrl(137), expected, `unexpected result for ${raw}`);
  }
});

test('websocket URLs only accept ws schemes', () => {
  const registry = new ChainRegistry({ WSS_POLYGON: 'https://rpc.example', WSS_ETHEREUM: 'wss://rpc.example/ws' });
  expectEqual(registry.resolveWsUrl(137), null);
  expectEqual(registry.resolveWsUrl(1), 'wss://rpc.example/ws');
});

test('healthy probe validates the endpoint', async () => {
  const probed: string[] = [];
  const probe: RpcProbe = async (_chainId, rpcUrl) => {
    probed.push(rpcUrl);
    return 42n;
  };
  const registry = new ChainRegistry(HEALTHY_RPC_ENV, { probe });
  expect(!registry.isHealthy(137), 'unprobed chain is not healthy');
  expectEqual(registry.endpoint(137), null);

  expectEqual(await registry.validateHealth(137), true);
  expectDeepEqual(probed, ['https://polygon.rpc.example']);
  expectEqual(registry.endpoint(137)?.rpcUrl, 'https://polygon.rpc.example');
  const snapshot = registry.healthSnapshot().find((chain) => chain.chainId === 137);
  expectEqual(snapshot?.blockNumber, 42n);
  expectEqual(snapshot?.healthy, true);
});

test('failing probe marks the chain unhealthy without throwing', async () => {
  const registry = new ChainRegistry(HEALTHY_RPC_ENV, {
    probe: async () => {
      throw new Error('connection refused');
    },
  });
  expectEqual(await registry.validateHealth(1), false);
  expect(!registry.isHealthy(1), 'should be unhealthy');
  expectEqual(registry.endpoint(1), null);
  const snapshot = registry.healthSnapshot().find((chain) => chain.chainId === 1);
  expectEqual(snapshot?.error, 'connection refused');
});

test('missing RPC URL fails validation before probing', async () => {
  let calls = 0;
  const registry = new ChainRegistry({}, {
    probe: async () => {
      calls += 1;
      return 1n;
    },
  });
  expectEqual(await registry.validateHealth(137), false);
  expectEqual(calls, 0);
});

test('validating all configured chains reports each outcome', async () => {
  const registry = new ChainRegistry(
    { RPC_POLYGON: HEALTHY_RPC_ENV.RPC_POLYGON, RPC_ETHEREUM: 'http://localhost:8545' },
    { probe: async () => 7n },
  );
  const outcomes = await registry.validateAllConfigured();
  expectDeepEqual([...outcomes.entries()], [
    [137, true],
    [1, false],
    [42161, false],
  ]);
  const summary = registry.summary();
  expectEqual(summary.enabled, 1);
  expectEqual(summary.configured, 3);
  expectEqual(summary.healthy, 1);
});

test('per-chain executor address overrides the shared one', () => {
  const other = '0x000000000000000000000000000000000000beef';
  const registry = new ChainRegistry({ EXECUTOR_ADDRESS: EXECUTOR, EXECUTOR_ADDRESS_ETHEREUM: other });
  expectEqual(registry.executorAddress(137), EXECUTOR);
  expectEqual(registry.executorAddress(1), other);
  expectEqual(registry.executorAddress(999), null);
});
