import type { NodeId } from "./contracts";
import { AdjacencyNetwork } from "./network";
import { randomIndex, type RandomSource } from "./rng";

function pick<T>(rng: RandomSource, items: readonly T[]): T {
  return items[randomIndex(rng, items.length)];
}

// m distinct entries of `pool`, weighted by how often each appears in it.
function randomSubset(rng: RandomSource, pool: readonly NodeId[], m: number): NodeId[] {
  const chosen = new Set<NodeId>();
  while (chosen.size < m) chosen.add(pick(rng, pool));
  return [...chosen];
}

/**
 * Holme–Kim power-law graph with tunable clustering: preferential attachment
 * of `m` edges per new node, where each edge after the first closes a
 * triangle with probability `p`.
 *
 * Nodes are numbered 0..n-1.
 */
export function powerlawClusterGraph(n: number, m: number, p: number, rng: RandomSource): AdjacencyNetwork {
  if (!Number.isInteger(m) || m < 1 || m >= n) {
    throw new Error(`powerlawClusterGraph requires 1 <= m < n (got m=${m}, n=${n})`);
  }
  if (!(p >= 0 && p <= 1)) {
    throw new Error(`powerlawClusterGraph requires 0 <= p <= 1 (got p=${p})`);
  }

  const graph = AdjacencyNetwork.ofSize(n);
  const repeated: NodeId[] = Array.from({ length: m }, (_, i) => i);

  for (let source = m; source < n; source++) {
    const targets = randomSubset(rng, repeated, m);
    let target = targets.pop();
    if (target === undefined) break;
    graph.addEdge(source, target);
    repeated.push(target);

    let count = 1;
    while (count < m) {
      if (rng.float() < p) {
        const neighborhood = graph
          .neighbors(target)
          .filter((nbr) => nbr !== source && !graph.hasEdge(source, nbr));
        if (neighborhood.length) {
          const nbr = pick(rng, neighborhood);
          graph.addEdge(source, nbr);
          repeated.push(nbr);
          count++;
          continue;
        }
      }
      target = targets.pop();
      if (target === undefined) break;
      graph.addEdge(source, target);
      repeated.push(target);
      count++;
    }

    for (let k = 0; k < m; k++) repeated.push(source);
  }

  return graph;
}
