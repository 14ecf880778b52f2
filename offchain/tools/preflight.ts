import '../infra/env';
import { ChainRegistry } from '../infra/chain_registry';
import { loadAppConfig } from '../infra/config';
import { errorMessage } from '../infra/errors';
import { KillSwitch } from '../infra/kill_switch';
import { log } from '../infra/logger';
import { checkReadiness, logReadiness } from '../infra/readiness';
import { createRedis } from '../infra/redis';
import { loadInventory } from '../arb_fabric/inventory';

async function checkRedis(url: string | undefined): Promise<boolean> {
  if (!url) {
    log.info('preflight-redis-not-configured');
    return true;
  }
  const redis = createRedis(url);
  if (!redis) return false;
  try {
    const pong = await redis.ping();
    log.info({ pong }, 'preflight-redis-ok');
    return true;
  } catch (err) {
    log.error({ err: errorMessage(err) }, 'preflight-redis-failed');
    return false;
  } finally {
    redis.disconnect();
  }
}

async function main() {
  const cfg = loadAppConfig();
  const registry = new ChainRegistry(cfg.env, { rpcTimeoutMs: cfg.scan.rpcTimeoutMs });
  const report = await checkReadiness(cfg, registry);
  logReadiness(report);

  let inventoryOk = true;
  try {
    const inventory = loadInventory(cfg.inventoryPath);
    const unknown = inventory.getAllChainIds().filter((chainId) => !registry.describe(chainId));
    if (unknown.length > 0) {
      log.warn({ chains: unknown }, 'preflight-inventory-unknown-chains');
    }
  } catch (err) {
    inventoryOk = false;
    log.error({ path: cfg.inventoryPath, err: errorMessage(err) }, 'preflight-inventory-failed');
  }

  const redisOk = await checkRedis(cfg.redisUrl);

  const killSwitch = new KillSwitch(cfg.killSwitch.path);
  const killSwitchOk = !killSwitch.isActive({ force: true });
  if (!killSwitchOk) {
    log.warn({ killSwitchFile: killSwitch.path() }, 'preflight-kill-switch-active');
  }

  if (!report.ready || !inventoryOk || !redisOk || !killSwitchOk) {
    log.error({ ready: report.ready, inventoryOk, redisOk, killSwitchOk }, 'preflight-failed');
    process.exit(1);
  }
  log.info({ mode: report.mode }, 'preflight-ok');
}

main().catch((err) => {
  log.error({ err: errorMessage(err) }, 'preflight-fatal');
  process.exit(1);
});
