/**
 * Shortest transmission-time routing on top of the Dijkstra engine
 */

import { Graph } from '../../graph/graph.js';
import { shortestPaths, type WeightedEdge } from '../../graph/dijkstra.js';
import { linkCost, type Link } from '../link.js';
import type { LinkGraph, RouteResult, RoutingAlgorithm } from './types.js';

/**
 * Weight every link by the time it takes to carry `payloadBytes`.
 * The result is always directed: a two-way connection is two entries in
 * the link graph and stays two weighted edges here.
 */
export function toWeightedGraph(
  graph: LinkGraph,
  payloadBytes: number
): Graph<string, WeightedEdge> {
  const weighted = new Graph<string, WeightedEdge>(true);
  for (const node of graph.nodes()) {
    weighted.addNode(node);
  }
  graph.forEachEdge((from, to, link: Link) => {
    weighted.addEdge(from, to, { weight: linkCost(link, payloadBytes) });
  });
  return weighted;
}

export class DijkstraRouting implements RoutingAlgorithm {
  readonly name = 'dijkstra';

  route(graph: LinkGraph, src: string, dst: string, payloadBytes: number): string[] {
    return this.routeWithCost(graph, src, dst, payloadBytes).path;
  }

  /**
   * Same as route(), also reporting the total cost of the chosen path
   */
  routeWithCost(graph: LinkGraph, src: string, dst: string, payloadBytes: number): RouteResult {
    const tree = shortestPaths(toWeightedGraph(graph, payloadBytes), src);
    const path = tree.pathTo(dst);
    return {
      path,
      cost: path.length > 0 ? tree.distanceTo(dst) : Infinity,
    };
  }
}

export function createDijkstraRouting(): RoutingAlgorithm {
  return new DijkstraRouting();
}
