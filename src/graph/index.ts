/**
 * Graph module
 *
 * This module provides:
 * - Graph: generic adjacency-list container, directed or undirected
 * - BreadthFirstSearch / DepthFirstSearch: traversal engines
 * - Dijkstra / shortestPaths: single-source shortest paths
 * - TopologyPersistence: IndexedDB persistence layer using Dexie
 */

export {
  Graph,
  compareNodeKeys,
  type NodeKey,
  type Adjacency,
} from './graph.js';

export {
  BreadthFirstSearch,
  DepthFirstSearch,
  breadthFirst,
  depthFirst,
  type GraphTraversal,
} from './traversal.js';

export {
  Dijkstra,
  shortestPaths,
  reconstructPath,
  type WeightedEdge,
  type ShortestPathTree,
} from './dijkstra.js';

export {
  TopologyPersistence,
  type StoredDevice,
  type StoredLink,
  type TopologyPersistenceConfig,
} from './topology-persistence.js';
