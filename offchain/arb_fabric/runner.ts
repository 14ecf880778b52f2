import '../infra/env';
import { createForecaster, StaticOptimizer } from '../agent/advisors';
import { ChainRegistry } from '../infra/chain_registry';
import { loadAppConfig, logAppConfig, type AppConfig } from '../infra/config';
import { ConfigurationError, errorMessage } from '../infra/errors';
import { KillSwitch } from '../infra/kill_switch';
import { log } from '../infra/logger';
import { startMetricsServer } from '../infra/metrics_server';
import { assertExecutionReady, checkReadiness, logReadiness } from '../infra/readiness';
import { createRedis } from '../infra/redis';
import { ProfitEngine } from '../pipeline/profit';
import {
  ExecutionServiceChannel,
  RedisInFlightStore,
  RedisSignalChannel,
  RedisTradeJournal,
  type SignalChannel,
} from '../executor/channels';
import { ExecutionClient, ExecutionManager, routeStreamResults } from '../executor/execution_client';
import { createExecutor, describeSummary } from '../executor/execution_modes';
import { PriceSimulator, viemQuoteCaller } from '../simulator/price_simulator';
import { LenderBalanceLookup } from '../simulator/tvl';
import { HttpBridgeQuoteProvider, NoBridgeRoutes, type BridgeQuoteProvider } from './bridge_broker';
import { loadInventory } from './inventory';
import { LiquidityGuard } from './liquidity_guard';
import { OpportunityGraph } from './opportunity_graph';
import { ScanLoop, drainWithGrace, viemGasPriceSource } from './scan_loop';

function bridgeProvider(cfg: AppConfig): BridgeQuoteProvider {
  if (cfg.bridge.quoteUrl) {
    return new HttpBridgeQuoteProvider(cfg.bridge.quoteUrl, cfg.scan.rpcTimeoutMs);
  }
  log.warn('bridge-quote-url-missing-no-routes');
  return new NoBridgeRoutes();
}

async function main(): Promise<void> {
  const cfg = loadAppConfig();
  logAppConfig(cfg);

  const registry = new ChainRegistry(cfg.env, { rpcTimeoutMs: cfg.scan.rpcTimeoutMs });
  const readiness = await checkReadiness(cfg, registry);
  logReadiness(readiness);
  assertExecutionReady(registry);
  if (!readiness.ready && cfg.execution.mode !== 'paper') {
    throw new ConfigurationError(`readiness failed for ${cfg.execution.mode} mode`);
  }

  const inventory = loadInventory(cfg.inventoryPath);
  const graph = await OpportunityGraph.build(inventory);
  const redis = createRedis(cfg.redisUrl);

  let manager: ExecutionManager | null = null;
  let executionSettings = cfg.execution;
  if (cfg.execution.mode !== 'paper') {
    manager = new ExecutionManager(new ExecutionClient(cfg.service), cfg.service, cfg.execution.mode);
    await manager.initialize();
    executionSettings = { ...cfg.execution, mode: manager.mode };
  }

  let channel: SignalChannel | null = null;
  if (cfg.execution.liveChannel === 'http') {
    channel = manager ? new ExecutionServiceChannel(manager) : null;
  } else if (redis) {
    channel = new RedisSignalChannel(redis);
  }
  const executor = createExecutor(executionSettings, {
    registry,
    env: cfg.env,
    inFlight: redis ? new RedisInFlightStore(redis) : null,
    channel,
    journal: redis ? new RedisTradeJournal(redis) : null,
  });
  if (executor.mode !== 'paper' && !channel) {
    log.warn({ liveChannel: cfg.execution.liveChannel }, 'live-channel-unavailable-live-trades-will-fail');
  }
  const stream = manager?.isReady ? routeStreamResults(manager.client, executor) : null;

  const scan = new ScanLoop(
    {
      registry,
      graph,
      inventory,
      guard: new LiquidityGuard(new LenderBalanceLookup(registry, inventory, cfg.scan.rpcTimeoutMs), registry, cfg.guard),
      prices: new PriceSimulator(inventory, viemQuoteCaller(registry), cfg.scan.rpcTimeoutMs),
      bridge: bridgeProvider(cfg),
      profit: new ProfitEngine(cfg.scan.flashFeeRate),
      executor,
      forecaster: createForecaster(cfg.scan.forecaster),
      optimizer: new StaticOptimizer(),
      gasPrice: viemGasPriceSource(registry),
      userAddress: cfg.bridge.userAddress,
      killSwitch: new KillSwitch(cfg.killSwitch.path, cfg.killSwitch.pollMs),
    },
    cfg.scan,
  );

  const controller = new AbortController();
  const server = startMetricsServer(
    cfg.promPort,
    () => !controller.signal.aborted && registry.enabledChains().every((chainId) => registry.isHealthy(chainId)),
  );
  const summaryTimer = setInterval(() => {
    const chains = registry.summary();
    log.info(
      {
        enabled: chains.enabled,
        configured: chains.configured,
        healthy: chains.healthy,
        chains: chains.chains.map((c) => ({ chain: c.name, state: c.state, healthy: c.healthy })),
        executor: describeSummary(executor.summary()),
      },
      'runner-summary',
    );
  }, cfg.scan.summaryIntervalMs);
  summaryTimer.unref();

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      log.info({ signal: sig, graceMs: cfg.scan.shutdownGraceMs }, 'runner-shutdown-requested');
      controller.abort();
    });
  }

  const drained = await drainWithGrace(scan.run(controller.signal), controller.signal, cfg.scan.shutdownGraceMs);
  if (!drained) {
    log.warn({ graceMs: cfg.scan.shutdownGraceMs }, 'runner-shutdown-grace-expired');
  }

  clearInterval(summaryTimer);
  stream?.close();
  server.close();
  if (redis) await redis.quit().catch((err) => log.warn({ err: errorMessage(err) }, 'redis-quit-failed'));
  log.info({ executor: describeSummary(executor.summary()) }, 'runner-stopped');
  if (!drained) process.exit(0);
}

main().catch((err) => {
  log.error({ err: errorMessage(err) }, 'runner-fatal');
  process.exitCode = 1;
});
