import '../infra/env';
import { ChainRegistry } from '../infra/chain_registry';
import { loadAppConfig } from '../infra/config';
import { errorMessage } from '../infra/errors';
import { log } from '../infra/logger';
import { loadInventory } from '../arb_fabric/inventory';
import { OpportunityGraph } from '../arb_fabric/opportunity_graph';

type CensusRow = { route: string; tokens: string[] };

function parseChains(argv: string[]): number[] | undefined {
  for (const arg of argv) {
    if (!arg.startsWith('--chains=')) continue;
    const ids = arg
      .slice('--chains='.length)
      .split(',')
      .map((part) => Number(part.trim()))
      .filter((id) => Number.isInteger(id) && id > 0);
    return ids.length > 0 ? ids : undefined;
  }
  return undefined;
}

async function main() {
  const cfg = loadAppConfig();
  const registry = new ChainRegistry(cfg.env);
  const inventory = loadInventory(cfg.inventoryPath);
  const graph = await OpportunityGraph.build(inventory, parseChains(process.argv.slice(2)));

  const routes = new Map<string, Set<string>>();
  for (const edge of graph.enumerateCrossChainEdges()) {
    const route = `${registry.chainName(edge.srcChain)}->${registry.chainName(edge.dstChain)}`;
    const tokens = routes.get(route) ?? new Set<string>();
    tokens.add(edge.token);
    routes.set(route, tokens);
  }
  const rows: CensusRow[] = [...routes.entries()]
    .map(([route, tokens]) => ({ route, tokens: [...tokens].sort() }))
    .sort((a, b) => a.route.localeCompare(b.route));

  log.info(
    {
      nodes: graph.nodeCount(),
      edges: graph.edgeCount(),
      scanned: inventory.getAllChainIds().filter((chainId) => registry.isConfigured(chainId)).map((id) => registry.chainName(id)),
      routes: rows,
    },
    'graph-census',
  );
}

main().catch((err) => {
  log.error({ err: errorMessage(err) }, 'graph-census-failed');
  process.exit(1);
});
