import { createPublicClient, http, type PublicClient } from 'viem';
import { log } from './logger';

export type RpcEndpoint = {
  chainId: number;
  rpcUrl: string;
  wsUrl?: string | null;
};

const httpClients = new Map<string, PublicClient>();

function httpKey(endpoint: RpcEndpoint): string {
  return `${endpoint.chainId}:${endpoint.rpcUrl}`;
}

function createHttpClient(endpoint: RpcEndpoint): PublicClient {
  const client = createPublicClient({
    transport: http(endpoint.rpcUrl, {
      batch: {
        batchSize: Number(process.env.RPC_HTTP_BATCH_SIZE ?? 20),
        wait: Number(process.env.RPC_HTTP_BATCH_DELAY_MS ?? 10),
      },
    }),
  });
  log.info({ chainId: endpoint.chainId, rpc: endpoint.rpcUrl }, 'rpc-http-client-created');
  return client;
}

export function getPublicClient(endpoint: RpcEndpoint): PublicClient {
  const key = httpKey(endpoint);
  const cached = httpClients.get(key);
  if (cached) return cached;
  const client = createHttpClient(endpoint);
  httpClients.set(key, client);
  return client;
}

export function evictRpcClients(chainId: number): void {
  for (const key of httpClients.keys()) {
    if (key.startsWith(`${chainId}:`)) httpClients.delete(key);
  }
}

export function resetRpcClients(): void {
  httpClients.clear();
}
