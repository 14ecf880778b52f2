import { counter, gauge, histogram, registry } from '../infra/metrics';
import { test, expect, expectEqual } from './test_harness';

test('every declared metric is registered once', async () => {
  const declared = Object.keys(gauge).length + Object.keys(histogram).length + Object.keys(counter).length;
  const names = (await registry.getMetricsAsJSON()).map((metric) => metric.name);
  expectEqual(names.length, declared);
  expectEqual(new Set(names).size, declared);
  expect(names.includes('executor_results_unknown_total'), 'unknown-result counter should be exported');
  expect(names.includes('live_in_flight_txs'), 'in-flight gauge should be exported');
});
