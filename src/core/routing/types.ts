/**
 * Routing algorithm interface for the network simulator
 */

import type { Graph } from '../../graph/graph.js';
import type { Link } from '../link.js';

export type LinkGraph = Graph<string, Link>;

export interface RoutingAlgorithm {
  readonly name: string;

  /**
   * Find the cheapest node sequence from src to dst for a payload of the
   * given size. Returns an empty array when dst cannot be reached.
   */
  route(graph: LinkGraph, src: string, dst: string, payloadBytes: number): string[];
}

export interface RouteResult {
  path: string[];
  cost: number; // seconds; Infinity when there is no path
}
