import type { ContactNetwork, Edge, Logger } from "./contracts";
import { normalizeEdges } from "./network";

export const DEFAULT_MIN_CONNECTIONS = 5;

/**
 * Edges to drop so that gatherings are capped at `maxSize`.
 *
 * Every individual with degree >= maxSize loses its first neighbours (ascending
 * id) until only `minConnections` remain. Pairs picked from both ends appear
 * once in the result. A negative `minConnections` is not rejected.
 */
export function connectionsToCancel(
  network: ContactNetwork,
  maxSize: number,
  minConnections: number = DEFAULT_MIN_CONNECTIONS
): Edge[] {
  const cancelled: Edge[] = [];
  for (const person of network.nodes()) {
    const nConnections = network.degree(person);
    if (nConnections < maxSize) continue;
    const neighbors = network.neighbors(person);
    for (let i = 0; i < neighbors.length; i++) {
      if (nConnections - i <= minConnections) break;
      cancelled.push([person, neighbors[i]]);
    }
  }
  return normalizeEdges(cancelled);
}

export function cancelConnections(network: ContactNetwork, edges: readonly Edge[], logger?: Logger) {
  const before = network.edgeCount;
  network.removeEdges(edges);
  logger?.(`cancelled ${before - network.edgeCount} connections (${network.edgeCount} remain)`);
}

/** Puts back exactly the given edges, without checking what changed since. */
export function restoreConnections(network: ContactNetwork, edges: readonly Edge[], logger?: Logger) {
  network.addEdges(edges);
  logger?.(`restored ${edges.length} connections (${network.edgeCount} total)`);
}
