import './setup_env';
import { runAll } from './test_harness';

import './config.test';
import './metrics.test';
import './chain_registry.test';
import './readiness.test';
import './rpc_clients.test';
import './profit.test';
import './liquidity_guard.test';
import './price_simulator.test';
import './opportunity_graph.test';
import './bridge_broker.test';
import './advisors.test';
import './async_queue.test';
import './wire.test';
import './execution_modes.test';
import './execution_client.test';
import './scan_loop.test';

runAll().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
