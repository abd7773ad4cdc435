import type { ContactNetwork, Edge, NodeId } from "./contracts";

/** Normalised (lo, hi) key for an unordered pair. */
export function edgeKey(a: NodeId, b: NodeId): string {
  return a < b ? `${a}-${b}` : `${b}-${a}`;
}

export function normalizeEdges(pairs: Iterable<Edge>): Edge[] {
  const seen = new Map<string, Edge>();
  for (const [a, b] of pairs) {
    const key = edgeKey(a, b);
    if (!seen.has(key)) seen.set(key, a < b ? [a, b] : [b, a]);
  }
  return [...seen.values()].sort((x, y) => x[0] - y[0] || x[1] - y[1]);
}

export class AdjacencyNetwork implements ContactNetwork {
  private readonly adj = new Map<NodeId, Set<NodeId>>();
  private count = 0;

  constructor(nodeIds: Iterable<NodeId> = [], edges: Iterable<Edge> = []) {
    for (const id of nodeIds) this.addNode(id);
    this.addEdges(edges);
  }

  static ofSize(n: number): AdjacencyNetwork {
    return new AdjacencyNetwork(Array.from({ length: n }, (_, i) => i));
  }

  addNode(id: NodeId) {
    if (!this.adj.has(id)) this.adj.set(id, new Set());
  }

  nodes(): NodeId[] {
    return [...this.adj.keys()];
  }

  hasNode(id: NodeId): boolean {
    return this.adj.has(id);
  }

  degree(id: NodeId): number {
    return this.adj.get(id)?.size ?? 0;
  }

  neighbors(id: NodeId): NodeId[] {
    const set = this.adj.get(id);
    if (!set) return [];
    return [...set].sort((a, b) => a - b);
  }

  hasEdge(a: NodeId, b: NodeId): boolean {
    return this.adj.get(a)?.has(b) ?? false;
  }

  edges(): Edge[] {
    const out: Edge[] = [];
    for (const [a, set] of this.adj) {
      for (const b of set) if (a < b) out.push([a, b]);
    }
    return out.sort((x, y) => x[0] - y[0] || x[1] - y[1]);
  }

  get edgeCount(): number {
    return this.count;
  }

  addEdge(a: NodeId, b: NodeId) {
    if (a === b) throw new Error(`self-loop on ${a}`);
    this.addNode(a);
    this.addNode(b);
    const sa = this.adj.get(a);
    const sb = this.adj.get(b);
    if (!sa || !sb || sa.has(b)) return;
    sa.add(b);
    sb.add(a);
    this.count++;
  }

  addEdges(pairs: Iterable<Edge>): void {
    for (const [a, b] of pairs) this.addEdge(a, b);
  }

  /** Missing edges are ignored, so a pair listed twice is removed once. */
  removeEdges(pairs: Iterable<Edge>): void {
    for (const [a, b] of pairs) {
      const sa = this.adj.get(a);
      if (!sa?.has(b)) continue;
      sa.delete(b);
      this.adj.get(b)?.delete(a);
      this.count--;
    }
  }
}
