import BigNumber from 'bignumber.js';
import { ValidationError } from '../infra/errors';
import { ProfitEngine, computeNetProfit, fromRawAmount, toRawAmount } from '../pipeline/profit';
import { test, expect, expectEqual, expectThrows } from './test_harness';

test('net profit subtracts bridge, gas and flash fees from the spread', () => {
  const breakdown = computeNetProfit(10_000, 10_100, 10, 2, '0.0009');
  expectEqual(breakdown.grossSpread.toFixed(), '100');
  expectEqual(breakdown.flashFeeCost.toFixed(), '9');
  expectEqual(breakdown.totalFees.toFixed(), '21');
  expectEqual(breakdown.netProfit.toFixed(), '79');
  expect(breakdown.isProfitable, 'positive net should be profitable');
});

test('exactly zero net profit is not profitable', () => {
  const breakdown = computeNetProfit(100, 110, 5, 5);
  expectEqual(breakdown.netProfit.toFixed(), '0');
  expect(!breakdown.isProfitable, 'zero must not count as profit');
});

test('losing round trip reports a negative net', () => {
  const breakdown = new ProfitEngine(0).evaluate(1_000, 990, 1, 1);
  expectEqual(breakdown.netProfit.toFixed(), '-12');
  expect(!breakdown.isProfitable, 'loss must not be profitable');
});

test('profit engine applies its configured flash fee rate', () => {
  const engine = new ProfitEngine(new BigNumber('0.0005'));
  const breakdown = engine.evaluate(20_000, 20_050, 0, 0);
  expectEqual(breakdown.flashFeeCost.toFixed(), '10');
  expectEqual(breakdown.netProfit.toFixed(), '40');
});

test('negative fee inputs are rejected', async () => {
  const err = await expectThrows(() => computeNetProfit(100, 120, -1, 0), 'negative bridge fee should throw');
  expect(err instanceof ValidationError, 'should be a ValidationError');
  expectEqual(err.message, 'bridgeFeeUsd must be a finite non-negative amount');
});

test('raw amount conversion follows token decimals', () => {
  expectEqual(toRawAmount(10_000, 6), 10_000_000_000n);
  expectEqual(toRawAmount('1.5', 18), 1_500_000_000_000_000_000n);
  expectEqual(fromRawAmount(1_500_000n, 6).toFixed(), '1.5');
});
