import { HttpBridgeQuoteProvider, NoBridgeRoutes, type FetchLike } from '../arb_fabric/bridge_broker';
import { ZERO_ADDRESS } from '../infra/address';
import { USDC_1, USDC_137 } from './fixtures';
import { test, expectEqual } from './test_harness';

function answering(status: number, body: unknown): { fetchImpl: FetchLike; urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    fetchImpl: async (input) => {
      urls.push(input);
      return new Response(body === undefined ? null : JSON.stringify(body), { status });
    },
  };
}

test('route quotes are requested with chain, token and amount parameters', async () => {
  const { fetchImpl, urls } = answering(200, { bridgeName: 'test-bridge', estimatedOutput: '9990000', feeUsd: '1.25', txData: '0xabcd' });
  const provider = new HttpBridgeQuoteProvider('https://bridge.example/quote', 1_000, fetchImpl);
  const route = await provider.getRoute(137, 1, USDC_137, 10_000_000n, ZERO_ADDRESS, USDC_1);
  expectEqual(route?.bridgeName, 'test-bridge');
  expectEqual(route?.estimatedOutput, 9_990_000n);
  expectEqual(route?.feeUsd.toFixed(), '1.25');
  expectEqual(route?.txData, '0xabcd');

  const params = new URL(urls[0]).searchParams;
  expectEqual(params.get('fromChainId'), '137');
  expectEqual(params.get('toChainId'), '1');
  expectEqual(params.get('toTokenAddress'), USDC_1);
  expectEqual(params.get('amount'), '10000000');
});

test('missing, failed or malformed quotes mean no route', async () => {
  const quote = (fetchImpl: FetchLike) =>
    new HttpBridgeQuoteProvider('https://bridge.example/quote', 1_000, fetchImpl).getRoute(137, 1, USDC_137, 1n, ZERO_ADDRESS);
  expectEqual(await quote(answering(404, { error: 'none' }).fetchImpl), null);
  expectEqual(await quote(answering(502, undefined).fetchImpl), null);
  expectEqual(await quote(answering(200, { bridgeName: 'x', estimatedOutput: '-5', feeUsd: 1 }).fetchImpl), null);
  expectEqual(await quote(answering(200, { bridgeName: 'x', estimatedOutput: '5', feeUsd: '-1' }).fetchImpl), null);
  expectEqual(
    await quote(async () => {
      throw new Error('ETIMEDOUT');
    }),
    null,
  );
  expectEqual(await new NoBridgeRoutes().getRoute(), null);
});
