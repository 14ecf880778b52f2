import type { Address } from 'viem';
import { log } from '../infra/logger';
import type { TokenData, TokenInventory } from './inventory';

export type TokenNode = Readonly<{
  key: string;
  chainId: number;
  symbol: string;
  address: Address;
  decimals: number;
  isNative: boolean;
  isWrapped: boolean;
  isStable: boolean;
}>;

/** Same asset on two chains. `weight` is reserved for cost-aware routing and stays 0. */
export type BridgeEdge = {
  readonly from: TokenNode;
  readonly to: TokenNode;
  weight: number;
};

export type CrossChainEdge = Readonly<{
  srcChain: number;
  dstChain: number;
  token: string;
  tokenAddrSrc: Address;
  tokenAddrDst: Address;
  decimals: number;
  decimalsDst: number;
}>;

export function nodeKey(chainId: number, symbol: string): string {
  return `${chainId}:${symbol}`;
}

function toNode(chainId: number, token: TokenData): TokenNode {
  return Object.freeze({
    key: nodeKey(chainId, token.symbol),
    chainId,
    symbol: token.symbol,
    address: token.address,
    decimals: token.decimals,
    isNative: token.native,
    isWrapped: token.wrapped,
    isStable: token.stable,
  });
}

export class OpportunityGraph {
  private readonly nodes = new Map<string, TokenNode>();
  private readonly adjacency = new Map<string, BridgeEdge[]>();
  private edges = 0;

  private constructor() {}

  static async build(inventory: TokenInventory, chainIds = inventory.getAllChainIds()): Promise<OpportunityGraph> {
    const graph = new OpportunityGraph();
    const bridgeable = new Set(inventory.bridgeableSymbols());
    const chains = await inventory.fetchAllChains(chainIds);

    const bySymbol = new Map<string, TokenNode[]>();
    for (const [chainId, tokens] of chains) {
      for (const token of tokens.values()) {
        const node = toNode(chainId, token);
        graph.nodes.set(node.key, node);
        if (!bridgeable.has(token.symbol)) continue;
        const holders = bySymbol.get(token.symbol) ?? [];
        holders.push(node);
        bySymbol.set(token.symbol, holders);
      }
    }

    for (const holders of bySymbol.values()) {
      for (let i = 0; i < holders.length; i += 1) {
        for (let j = i + 1; j < holders.length; j += 1) {
          graph.link(holders[i], holders[j]);
          graph.link(holders[j], holders[i]);
        }
      }
    }

    log.info({ nodes: graph.nodeCount(), edges: graph.edgeCount(), chains: chains.size }, 'opportunity-graph-built');
    return graph;
  }

  nodeCount(): number {
    return this.nodes.size;
  }

  edgeCount(): number {
    return this.edges;
  }

  node(chainId: number, symbol: string): TokenNode | undefined {
    return this.nodes.get(nodeKey(chainId, symbol));
  }

  outgoing(chainId: number, symbol: string): readonly BridgeEdge[] {
    return this.adjacency.get(nodeKey(chainId, symbol)) ?? [];
  }

  /** Every directed bridge edge; call again for a fresh pass. */
  *enumerateCrossChainEdges(): Generator<CrossChainEdge> {
    for (const edges of this.adjacency.values()) {
      for (const edge of edges) {
        yield {
          srcChain: edge.from.chainId,
          dstChain: edge.to.chainId,
          token: edge.from.symbol,
          tokenAddrSrc: edge.from.address,
          tokenAddrDst: edge.to.address,
          decimals: edge.from.decimals,
          decimalsDst: edge.to.decimals,
        };
      }
    }
  }

  private link(from: TokenNode, to: TokenNode): void {
    const list = this.adjacency.get(from.key) ?? [];
    list.push({ from, to, weight: 0 });
    this.adjacency.set(from.key, list);
    this.edges += 1;
  }
}
