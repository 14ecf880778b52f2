import BigNumber from 'bignumber.js';
import type { Address, Hex } from 'viem';
import { z } from 'zod';
import { errorMessage } from '../infra/errors';
import { log } from '../infra/logger';

export type BridgeRoute = {
  bridgeName: string;
  /** Raw amount delivered on the destination chain. */
  estimatedOutput: bigint;
  feeUsd: BigNumber;
  txData?: Hex;
};

/** Opaque cross-chain route source. `null` means no usable route right now. */
export interface BridgeQuoteProvider {
  getRoute(
    srcChain: number,
    dstChain: number,
    tokenAddress: Address,
    amountRaw: bigint,
    userAddress: Address,
    dstTokenAddress?: Address,
  ): Promise<BridgeRoute | null>;
}

export class NoBridgeRoutes implements BridgeQuoteProvider {
  async getRoute(): Promise<BridgeRoute | null> {
    return null;
  }
}

const RouteResponseSchema = z.object({
  bridgeName: z.string().min(1),
  estimatedOutput: z.union([z.string().regex(/^\d+$/), z.number().int().nonnegative()]),
  feeUsd: z.union([z.string(), z.number()]),
  txData: z
    .string()
    .regex(/^0x[0-9a-fA-F]*$/)
    .optional(),
});

function isHex(value: string | undefined): value is Hex {
  return value !== undefined && /^0x[0-9a-fA-F]*$/.test(value);
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Route aggregator reached over HTTP GET with query parameters. */
export class HttpBridgeQuoteProvider implements BridgeQuoteProvider {
  private readonly brokerLog = log.child({ module: 'fabric.bridge' });

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async getRoute(
    srcChain: number,
    dstChain: number,
    tokenAddress: Address,
    amountRaw: bigint,
    userAddress: Address,
    dstTokenAddress: Address = tokenAddress,
  ): Promise<BridgeRoute | null> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('fromChainId', String(srcChain));
    url.searchParams.set('toChainId', String(dstChain));
    url.searchParams.set('fromTokenAddress', tokenAddress);
    url.searchParams.set('toTokenAddress', dstTokenAddress);
    url.searchParams.set('amount', amountRaw.toString());
    url.searchParams.set('userAddress', userAddress);
    try {
      const res = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });
      if (res.status === 404 || res.status === 204) return null;
      if (!res.ok) {
        this.brokerLog.warn({ srcChain, dstChain, status: res.status, statusText: res.statusText }, 'bridge-quote-nok');
        return null;
      }
      const body: unknown = await res.json();
      if (body === null) return null;
      const parsed = RouteResponseSchema.safeParse(body);
      if (!parsed.success) {
        this.brokerLog.warn({ srcChain, dstChain, issues: parsed.error.issues.length }, 'bridge-quote-malformed');
        return null;
      }
      const feeUsd = new BigNumber(parsed.data.feeUsd);
      if (!feeUsd.isFinite() || feeUsd.isNegative()) return null;
      return {
        bridgeName: parsed.data.bridgeName,
        estimatedOutput: BigInt(parsed.data.estimatedOutput),
        feeUsd,
        txData: isHex(parsed.data.txData) ? parsed.data.txData : undefined,
      };
    } catch (err) {
      this.brokerLog.warn({ srcChain, dstChain, err: errorMessage(err) }, 'bridge-quote-failed');
      return null;
    }
  }
}
