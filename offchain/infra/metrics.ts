import client from 'prom-client';

export const registry = new client.Registry();

export const gauge = {
  chainRpcHealthy: new client.Gauge({
    name: 'chain_rpc_healthy',
    help: 'Latest RPC liveness probe outcome (1=healthy)',
    labelNames: ['chain'],
  }),
  chainExecutionState: new client.Gauge({
    name: 'chain_execution_state',
    help: 'Execution permission per chain (2=enabled, 1=configured, 0=disabled)',
    labelNames: ['chain'],
  }),
  inFlightTxs: new client.Gauge({ name: 'live_in_flight_txs', help: 'Live trades awaiting an executor result' }),
  paperCapitalUsd: new client.Gauge({ name: 'paper_capital_usd', help: 'Simulated capital held by the paper executor' }),
  lastCycleEdges: new client.Gauge({ name: 'scan_last_cycle_edges', help: 'Edges evaluated in the most recent scan cycle' }),
  gasPriceGwei: new client.Gauge({ name: 'chain_gas_price_gwei', help: 'Gas price sampled at cycle start', labelNames: ['chain'] }),
};
registry.registerMetric(gauge.chainRpcHealthy);
registry.registerMetric(gauge.chainExecutionState);
registry.registerMetric(gauge.inFlightTxs);
registry.registerMetric(gauge.paperCapitalUsd);
registry.registerMetric(gauge.lastCycleEdges);
registry.registerMetric(gauge.gasPriceGwei);

export const histogram = {
  rpcCallDuration: new client.Histogram({
    name: 'rpc_call_duration_seconds',
    help: 'Duration of RPC calls in seconds',
    labelNames: ['operation', 'status', 'target'],
  }),
  edgeEvaluation: new client.Histogram({
    name: 'scan_edge_evaluation_seconds',
    help: 'Time spent evaluating one bridge edge',
    labelNames: ['outcome'],
    buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  }),
  cycleDuration: new client.Histogram({
    name: 'scan_cycle_seconds',
    help: 'Wall time of one scan cycle, gas fetch through barrier',
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 20, 30],
  }),
  netProfitUsd: new client.Histogram({
    name: 'signal_net_profit_usd',
    help: 'Modeled net USD per trade signal',
    labelNames: ['chain'],
    buckets: [1, 2, 5, 10, 25, 50, 100, 250, 1000],
  }),
};
registry.registerMetric(histogram.rpcCallDuration);
registry.registerMetric(histogram.edgeEvaluation);
registry.registerMetric(histogram.cycleDuration);
registry.registerMetric(histogram.netProfitUsd);

export const counter = {
  edgesEvaluated: new client.Counter({ name: 'scan_edges_evaluated_total', help: 'Bridge edges evaluated', labelNames: ['src', 'dst'] }),
  edgesDiscarded: new client.Counter({
    name: 'scan_edges_discarded_total',
    help: 'Bridge edges discarded before submission by reason',
    labelNames: ['chain', 'reason'],
  }),
  cyclesHeld: new client.Counter({ name: 'scan_cycles_held_total', help: 'Cycles skipped on forecaster or kill switch', labelNames: ['reason'] }),
  signalsBuilt: new client.Counter({ name: 'signals_built_total', help: 'Trade signals constructed', labelNames: ['chain'] }),
  submissions: new client.Counter({
    name: 'executor_submissions_total',
    help: 'Trade submissions by execution mode and resulting status',
    labelNames: ['mode', 'status'],
  }),
  preflightRejected: new client.Counter({
    name: 'live_preflight_rejected_total',
    help: 'Live trades rejected by a pre-execution check',
    labelNames: ['check'],
  }),
  resultsRecorded: new client.Counter({
    name: 'executor_results_recorded_total',
    help: 'Executor results applied (duplicates excluded)',
    labelNames: ['status'],
  }),
  resultsDuplicate: new client.Counter({ name: 'executor_results_duplicate_total', help: 'Re-delivered executor results ignored' }),
  resultsUnknown: new client.Counter({
    name: 'executor_results_unknown_total',
    help: 'Executor results for trade ids this process never submitted',
  }),
  clientRequests: new client.Counter({
    name: 'execution_client_requests_total',
    help: 'Requests sent to the execution service',
    labelNames: ['endpoint', 'status'],
  }),
  clientRetries: new client.Counter({ name: 'execution_client_retries_total', help: 'Execution submissions retried' }),
  rpcErrors: new client.Counter({
    name: 'rpc_errors_total',
    help: 'Total RPC errors',
    labelNames: ['operation', 'target'],
  }),
};
registry.registerMetric(counter.edgesEvaluated);
registry.registerMetric(counter.edgesDiscarded);
registry.registerMetric(counter.cyclesHeld);
registry.registerMetric(counter.signalsBuilt);
registry.registerMetric(counter.submissions);
registry.registerMetric(counter.preflightRejected);
registry.registerMetric(counter.resultsRecorded);
registry.registerMetric(counter.resultsDuplicate);
registry.registerMetric(counter.resultsUnknown);
registry.registerMetric(counter.clientRequests);
registry.registerMetric(counter.clientRetries);
registry.registerMetric(counter.rpcErrors);

export function collectProcessMetrics(): void {
  client.collectDefaultMetrics({ register: registry });
}
