/**
 * Breadth-first and depth-first traversal over a Graph
 */

import type { Graph, NodeKey } from './graph.js';

export interface GraphTraversal<TNode extends NodeKey> {
  readonly name: string;

  /**
   * Visit the graph from `start` and return nodes in visitation order.
   * The start node is always emitted, even when the graph does not hold it.
   */
  run<TEdge>(graph: Graph<TNode, TEdge>, start: TNode): TNode[];
}

/**
 * Level-order traversal. Neighbors are marked visited when discovered,
 * so a node is enqueued at most once.
 *
 * Instances keep their visited set between calls and reset it on each
 * run; do not start a run while another is in progress on the same instance.
 */
export class BreadthFirstSearch<TNode extends NodeKey> implements GraphTraversal<TNode> {
  readonly name = 'bfs';
  private visited = new Set<TNode>();

  run<TEdge>(graph: Graph<TNode, TEdge>, start: TNode): TNode[] {
    this.visited.clear();
    const order: TNode[] = [];
    const queue: TNode[] = [start];
    this.visited.add(start);

    let head = 0;
    while (head < queue.length) {
      const node = queue[head++];
      if (node === undefined) break;
      order.push(node);

      for (const neighbor of graph.getNeighbors(node)) {
        if (!this.visited.has(neighbor)) {
          this.visited.add(neighbor);
          queue.push(neighbor);
        }
      }
    }

    return order;
  }
}

/**
 * Iterative depth-first traversal. The visited check happens on pop and
 * every neighbor is pushed, so a node may sit on the stack several times
 * and siblings come out in reverse adjacency order.
 *
 * Same reuse rules as BreadthFirstSearch.
 */
export class DepthFirstSearch<TNode extends NodeKey> implements GraphTraversal<TNode> {
  readonly name = 'dfs';
  private visited = new Set<TNode>();

  run<TEdge>(graph: Graph<TNode, TEdge>, start: TNode): TNode[] {
    this.visited.clear();
    const order: TNode[] = [];
    const stack: TNode[] = [start];

    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined) break;
      if (this.visited.has(node)) continue;

      order.push(node);
      this.visited.add(node);
      for (const neighbor of graph.getNeighbors(node)) {
        stack.push(neighbor);
      }
    }

    return order;
  }
}

export function breadthFirst<TNode extends NodeKey, TEdge>(
  graph: Graph<TNode, TEdge>,
  start: TNode
): TNode[] {
  return new BreadthFirstSearch<TNode>().run(graph, start);
}

export function depthFirst<TNode extends NodeKey, TEdge>(
  graph: Graph<TNode, TEdge>,
  start: TNode
): TNode[] {
  return new DepthFirstSearch<TNode>().run(graph, start);
}
