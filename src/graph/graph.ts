/**
 * Generic adjacency-list graph
 * Parallel edges are kept as separate entries, in insertion order
 */

export type NodeKey = string | number;

export interface Adjacency<TNode extends NodeKey, TEdge> {
  node: TNode;
  edge: TEdge;
}

/**
 * Orders node keys the way the shortest-path queue breaks ties
 */
export function compareNodeKeys(a: NodeKey, b: NodeKey): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class Graph<TNode extends NodeKey, TEdge> {
  private adjacency: Map<TNode, Array<Adjacency<TNode, TEdge>>> = new Map();
  readonly isDirected: boolean;

  constructor(directed: boolean = true) {
    this.isDirected = directed;
  }

  /**
   * Add a node (no-op if it already exists)
   */
  addNode(node: TNode): void {
    if (!this.adjacency.has(node)) {
      this.adjacency.set(node, []);
    }
  }

  /**
   * Add an edge, creating both endpoints if needed.
   * Undirected graphs also get the mirrored edge with the same payload.
   */
  addEdge(from: TNode, to: TNode, edge: TEdge): void {
    this.adjacencyOf(from).push({ node: to, edge });
    this.addNode(to);
    if (!this.isDirected) {
      this.adjacencyOf(to).push({ node: from, edge });
    }
  }

  /**
   * Remove a node along with every edge pointing at it
   */
  removeNode(node: TNode): void {
    this.adjacency.delete(node);
    for (const [id, entries] of this.adjacency) {
      this.adjacency.set(id, entries.filter(entry => entry.node !== node));
    }
  }

  /**
   * Remove every from -> to edge (and to -> from when undirected)
   */
  removeEdge(from: TNode, to: TNode): void {
    this.strip(from, to);
    if (!this.isDirected) {
      this.strip(to, from);
    }
  }

  /**
   * Neighbor ids in adjacency order; empty for an unknown node
   */
  getNeighbors(node: TNode): TNode[] {
    return this.getEdges(node).map(entry => entry.node);
  }

  /**
   * Outgoing (neighbor, edge) pairs in adjacency order
   */
  getEdges(node: TNode): ReadonlyArray<Adjacency<TNode, TEdge>> {
    return this.adjacency.get(node) ?? [];
  }

  hasNode(node: TNode): boolean {
    return this.adjacency.has(node);
  }

  size(): number {
    return this.adjacency.size;
  }

  /**
   * All node ids, in the order they were first added
   */
  nodes(): TNode[] {
    return Array.from(this.adjacency.keys());
  }

  /**
   * Iterate over every stored edge entry.
   * Undirected edges are visited once per direction.
   */
  forEachEdge(callback: (from: TNode, to: TNode, edge: TEdge) => void): void {
    for (const [from, entries] of this.adjacency) {
      for (const entry of entries) {
        callback(from, entry.node, entry.edge);
      }
    }
  }

  clear(): void {
    this.adjacency.clear();
  }

  private adjacencyOf(node: TNode): Array<Adjacency<TNode, TEdge>> {
    let entries = this.adjacency.get(node);
    if (!entries) {
      entries = [];
      this.adjacency.set(node, entries);
    }
    return entries;
  }

  private strip(from: TNode, to: TNode): void {
    const entries = this.adjacency.get(from);
    if (entries) {
      this.adjacency.set(from, entries.filter(entry => entry.node !== to));
    }
  }
}
