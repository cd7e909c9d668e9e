/**
 * A* routing over an ephemeral ngraph graph
 * With the default zero heuristic this finds the same optimal cost as
 * DijkstraRouting, though ties between equal-cost paths may break differently.
 */

import createGraph from 'ngraph.graph';
import { aStar } from 'ngraph.path';
import { linkCost } from '../link.js';
import type { LinkGraph, RoutingAlgorithm } from './types.js';

export class AStarRouting implements RoutingAlgorithm {
  readonly name = 'astar';

  route(graph: LinkGraph, src: string, dst: string, payloadBytes: number): string[] {
    if (!graph.hasNode(src) || !graph.hasNode(dst)) {
      return [];
    }

    // Multigraph so parallel links stay separate candidates
    const costs = createGraph<undefined, number>({ multigraph: true });
    costs.beginUpdate();
    for (const node of graph.nodes()) {
      costs.addNode(node);
    }
    graph.forEachEdge((from, to, link) => {
      costs.addLink(from, to, linkCost(link, payloadBytes));
    });
    costs.endUpdate();

    const pathFinder = aStar<undefined, number>(costs, {
      oriented: true,
      distance: (_fromNode, _toNode, link) => link.data,
    });

    // ngraph.path returns path from destination to source, so reverse it
    return pathFinder.find(src, dst).map(node => String(node.id)).reverse();
  }
}

export function createAStarRouting(): RoutingAlgorithm {
  return new AStarRouting();
}
