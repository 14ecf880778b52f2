import { NoopForecaster, StaticOptimizer, TrendForecaster, createForecaster } from '../agent/advisors';
import { test, expect, expectDeepEqual, expectEqual } from './test_harness';

test('trend forecaster waits on a spike above the rolling mean', () => {
  const forecaster = new TrendForecaster(12, 1.25);
  for (const gwei of [10, 10, 10]) forecaster.ingestGas(gwei);
  expect(!forecaster.shouldWait(), 'flat gas should not hold');
  forecaster.ingestGas(20);
  expect(forecaster.shouldWait(), '20 gwei exceeds 1.25 x mean 12.5');
});

test('trend forecaster needs three samples and ignores bad readings', () => {
  const forecaster = new TrendForecaster();
  forecaster.ingestGas(10);
  forecaster.ingestGas(50);
  expect(!forecaster.shouldWait(), 'two samples are not a trend');
  forecaster.ingestGas(Number.NaN);
  forecaster.ingestGas(-3);
  expect(!forecaster.shouldWait(), 'invalid samples are dropped');
});

test('trend window forgets old samples', () => {
  const forecaster = new TrendForecaster(3, 1.25);
  for (const gwei of [1, 1, 1, 10, 10, 10]) forecaster.ingestGas(gwei);
  expect(!forecaster.shouldWait(), 'window holds only the last three readings');
});

test('factory and static optimizer defaults', () => {
  expect(createForecaster('none') instanceof NoopForecaster, 'none means noop');
  expect(createForecaster('trend') instanceof TrendForecaster, 'trend forecaster');
  const advice = new StaticOptimizer().recommend();
  expectEqual(advice.confidence, 0.9);
  expectDeepEqual(advice.hints, {});
});
