import { ChainRegistry } from '../infra/chain_registry';
import { loadAppConfig } from '../infra/config';
import { ConfigurationError } from '../infra/errors';
import { assertExecutionReady, checkReadiness, credentialProblem, executorProblem } from '../infra/readiness';
import { EXECUTOR, HEALTHY_RPC_ENV, TEST_PRIVATE_KEY } from './fixtures';
import { test, expect, expectEqual, expectThrows } from './test_harness';

test('credential and executor screening', () => {
  expectEqual(credentialProblem(undefined), 'signing credential not configured');
  expectEqual(credentialProblem('  '), 'signing credential not configured');
  expectEqual(credentialProblem('your_private_key_here'), 'signing credential is a placeholder');
  expectEqual(credentialProblem(TEST_PRIVATE_KEY), null);

  expectEqual(executorProblem(null), 'not configured');
  expectEqual(executorProblem('0xYOUR_DEPLOYED_CONTRACT_ADDRESS_HERE'), 'is a placeholder');
  expectEqual(executorProblem('0x1234'), 'is not an address');
  expectEqual(executorProblem(EXECUTOR), null);
});

test('paper mode is ready once the enabled chain is healthy', async () => {
  const env = { RPC_POLYGON: HEALTHY_RPC_ENV.RPC_POLYGON };
  const registry = new ChainRegistry(env, { probe: async () => 5n });
  const report = await checkReadiness(loadAppConfig(env), registry);
  expect(report.ready, 'paper mode should be ready');
  expectEqual(report.mode, 'paper');
  const ethereum = report.diagnostics.find((d) => d.component === 'chain:ethereum');
  expectEqual(ethereum?.status, 'warn');
});

test('live mode demands a real credential and executor', async () => {
  const env = {
    EXECUTION_MODE: 'live',
    RPC_POLYGON: HEALTHY_RPC_ENV.RPC_POLYGON,
    PRIVATE_KEY: '0xYOUR_REAL_PRIVATE_KEY_HERE',
  };
  const registry = new ChainRegistry(env, { probe: async () => 5n });
  const report = await checkReadiness(loadAppConfig(env), registry);
  expect(!report.ready, 'live mode with placeholders is not ready');
  expectEqual(report.diagnostics.find((d) => d.component === 'wallet')?.message, 'signing credential is a placeholder');
  expectEqual(report.diagnostics.find((d) => d.component === 'executor:polygon')?.message, 'executor contract not configured');
});

test('live mode with real settings is ready', async () => {
  const env = {
    EXECUTION_MODE: 'live',
    RPC_POLYGON: HEALTHY_RPC_ENV.RPC_POLYGON,
    PRIVATE_KEY: TEST_PRIVATE_KEY,
    EXECUTOR_ADDRESS_POLYGON: EXECUTOR,
  };
  const registry = new ChainRegistry(env, { probe: async () => 5n });
  const report = await checkReadiness(loadAppConfig(env), registry);
  expect(report.ready, 'configured live mode should be ready');
});

test('scanning refuses to start without a healthy enabled chain', async () => {
  const registry = new ChainRegistry({});
  await registry.validateAllConfigured();
  const err = await expectThrows(() => assertExecutionReady(registry), 'unhealthy polygon should throw');
  expect(err instanceof ConfigurationError, 'should be a ConfigurationError');
  expectEqual(err.message, 'no healthy RPC for enabled chain(s): polygon');
});
