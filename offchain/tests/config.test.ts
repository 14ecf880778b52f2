import { ConfigurationError } from '../infra/errors';
import { ZERO_ADDRESS } from '../infra/address';
import { loadAppConfig, parseExecutionMode } from '../infra/config';
import { test, expect, expectEqual, expectThrows } from './test_harness';

test('defaults apply when the environment is empty', () => {
  const cfg = loadAppConfig({});
  expectEqual(cfg.execution.mode, 'paper');
  expectEqual(cfg.execution.limits.minProfitUsd.toFixed(2), '5.00');
  expectEqual(cfg.execution.limits.maxSlippageBps, 50);
  expectEqual(cfg.execution.limits.maxConcurrentTxs, 3);
  expectEqual(cfg.execution.hybridThreshold, 0.85);
  expectEqual(cfg.execution.liveChannel, 'redis');
  expectEqual(cfg.execution.paper.slippageFactor.toFixed(), '0.998');
  expectEqual(cfg.guard.maxShareFraction.toFixed(), '0.2');
  expectEqual(cfg.guard.minTokens, 500);
  expectEqual(cfg.bridge.userAddress, ZERO_ADDRESS);
  expectEqual(cfg.redisUrl, undefined);
  expectEqual(cfg.service.port, 8545);
  expect(cfg.inventoryPath.endsWith('inventory.yaml'), 'default inventory path should point at the bundled file');
});

test('blank values fall back to defaults', () => {
  const cfg = loadAppConfig({ MIN_PROFIT_USD: '  ', SCAN_WORKERS: '', REDIS_URL: '' });
  expectEqual(cfg.execution.limits.minProfitUsd.toFixed(), '5');
  expectEqual(cfg.scan.workers, 20);
  expectEqual(cfg.redisUrl, undefined);
});

test('explicit values are parsed and typed', () => {
  const cfg = loadAppConfig({
    EXECUTION_MODE: 'Hybrid',
    MIN_PROFIT_USD: '12.5',
    MAX_CONCURRENT_TXS: '7',
    HYBRID_CONFIDENCE_THRESHOLD: '0.9',
    LIVE_CHANNEL: 'http',
    FLASH_FEE_RATE: '0.0009',
    FORECASTER: 'trend',
  });
  expectEqual(cfg.execution.mode, 'hybrid');
  expectEqual(cfg.execution.limits.minProfitUsd.toFixed(), '12.5');
  expectEqual(cfg.execution.limits.maxConcurrentTxs, 7);
  expectEqual(cfg.execution.hybridThreshold, 0.9);
  expectEqual(cfg.execution.liveChannel, 'http');
  expectEqual(cfg.scan.flashFeeRate.toFixed(), '0.0009');
  expectEqual(cfg.scan.forecaster, 'trend');
});

test('unknown execution mode degrades to paper', () => {
  expectEqual(parseExecutionMode('turbo'), 'paper');
  expectEqual(parseExecutionMode(' LIVE '), 'live');
  expectEqual(parseExecutionMode(undefined), 'paper');
});

test('invalid values name the offending key', async () => {
  const err = await expectThrows(() => loadAppConfig({ MAX_CONCURRENT_TXS: '0' }), 'zero concurrency should throw');
  expect(err instanceof ConfigurationError, 'should be a ConfigurationError');
  expect(err.message.includes('MAX_CONCURRENT_TXS'), `message should name the key: ${err.message}`);
});

test('liquidity share must stay within (0, 1]', async () => {
  const err = await expectThrows(() => loadAppConfig({ LIQUIDITY_MAX_SHARE: '1.5' }), 'share above 1 should throw');
  expectEqual(err.message, 'Invalid configuration: LIQUIDITY_MAX_SHARE must be in (0, 1]');
  expectEqual(loadAppConfig({ LIQUIDITY_MAX_SHARE: '1' }).guard.maxShareFraction.toFixed(), '1');
});

test('malformed bridge user address is rejected', async () => {
  const err = await expectThrows(() => loadAppConfig({ BRIDGE_USER_ADDRESS: '0x1234' }), 'short address should throw');
  expect(err.message.includes('BRIDGE_USER_ADDRESS'), `message should name the key: ${err.message}`);
});
