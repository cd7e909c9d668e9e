/**
 * Single-source shortest paths (Dijkstra) with lazy deletion
 *
 * Edge weights must be nonnegative. This is not checked; negative
 * weights produce wrong distances rather than an error.
 */

import { PriorityQueue } from '../utils/priority-queue.js';
import { compareNodeKeys, type Graph, type NodeKey } from './graph.js';

export interface WeightedEdge {
  weight: number;
}

export interface ShortestPathTree<TNode extends NodeKey> {
  readonly start: TNode;
  readonly dist: ReadonlyMap<TNode, number>;
  readonly parent: ReadonlyMap<TNode, TNode>;
  distanceTo(node: TNode): number;
  pathTo(target: TNode): TNode[];
}

interface QueueEntry<TNode extends NodeKey> {
  distance: number;
  node: TNode;
}

/**
 * Walk the parent map back from target. Empty when the target was not
 * reached or the chain never arrives at start.
 */
export function reconstructPath<TNode extends NodeKey>(
  dist: ReadonlyMap<TNode, number>,
  parent: ReadonlyMap<TNode, TNode>,
  start: TNode,
  target: TNode
): TNode[] {
  const distance = dist.get(target);
  if (distance === undefined || distance === Infinity) {
    return [];
  }

  const path: TNode[] = [];
  let current = target;
  while (current !== start) {
    path.push(current);
    const previous = parent.get(current);
    if (previous === undefined) {
      return [];
    }
    current = previous;
  }
  path.push(start);

  return path.reverse();
}

function computeShortestPaths<TNode extends NodeKey>(
  graph: Graph<TNode, WeightedEdge>,
  start: TNode,
  dist: Map<TNode, number>,
  parent: Map<TNode, TNode>
): void {
  for (const node of graph.nodes()) {
    dist.set(node, Infinity);
  }
  if (!graph.hasNode(start)) return;
  dist.set(start, 0);

  const queue = new PriorityQueue<QueueEntry<TNode>>((a, b) =>
    a.distance !== b.distance
      ? a.distance - b.distance
      : compareNodeKeys(a.node, b.node)
  );
  queue.push({ distance: 0, node: start });

  for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
    const { distance, node } = entry;
    // Stale entry: a shorter distance was found after this was queued
    if (distance !== dist.get(node)) continue;

    for (const { node: next, edge } of graph.getEdges(node)) {
      const candidate = distance + edge.weight;
      if (candidate < (dist.get(next) ?? Infinity)) {
        dist.set(next, candidate);
        parent.set(next, node);
        queue.push({ distance: candidate, node: next });
      }
    }
  }
}

/**
 * Compute distances and predecessors from `start`.
 * Returns a fresh result on every call.
 */
export function shortestPaths<TNode extends NodeKey>(
  graph: Graph<TNode, WeightedEdge>,
  start: TNode
): ShortestPathTree<TNode> {
  const dist = new Map<TNode, number>();
  const parent = new Map<TNode, TNode>();
  computeShortestPaths(graph, start, dist, parent);

  return {
    start,
    dist,
    parent,
    distanceTo: (node) => dist.get(node) ?? Infinity,
    pathTo: (target) => reconstructPath(dist, parent, start, target),
  };
}

/**
 * Reusable Dijkstra runner. `dist` and `parent` are cleared and rebuilt
 * by every `run`; they must not be read while a run is in progress, and
 * one instance must not run two queries at once.
 */
export class Dijkstra<TNode extends NodeKey> {
  readonly dist = new Map<TNode, number>();
  readonly parent = new Map<TNode, TNode>();

  run(graph: Graph<TNode, WeightedEdge>, start: TNode): void {
    this.dist.clear();
    this.parent.clear();
    computeShortestPaths(graph, start, this.dist, this.parent);
  }

  distanceTo(node: TNode): number {
    return this.dist.get(node) ?? Infinity;
  }

  getPathTo(start: TNode, target: TNode): TNode[] {
    return reconstructPath(this.dist, this.parent, start, target);
  }
}
