import '../infra/env';
import { loadAppConfig } from '../infra/config';
import { errorMessage } from '../infra/errors';
import { log } from '../infra/logger';
import { ExecutionClient, ExecutionManager } from '../executor/execution_client';

async function main() {
  const cfg = loadAppConfig();
  const manager = new ExecutionManager(new ExecutionClient(cfg.service), cfg.service, cfg.execution.mode);
  const ready = await manager.initialize();
  const stats = await manager.statistics();
  log.info({ ready, mode: manager.mode, server: stats.server, client: stats.client }, 'execution-stats');
  if (!ready) process.exitCode = 1;
}

main().catch((err) => {
  log.error({ err: errorMessage(err) }, 'execution-stats-failed');
  process.exit(1);
});
