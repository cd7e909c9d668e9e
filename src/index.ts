/**
 * Packetnet - packet-switched network route simulator
 * Main entry point
 */

// Core exports
export { NetworkSimulator } from './core/simulator.js';
export type {
  SimulatorConfig,
  SimulatorEvents,
  TopologySnapshot,
  TopologyLink,
  DeviceSummary,
} from './core/simulator.js';

export { InvalidArgumentError, NotFoundError } from './core/errors.js';

export {
  createLink,
  linkCost,
  UNUSABLE_LINK_COST,
} from './core/link.js';
export type { Link } from './core/link.js';

export {
  createPacket,
  decrementTtl,
  addHop,
  isExpired,
  DEFAULT_TTL,
} from './core/packet.js';
export type { Packet, PacketHeader, PacketMeta } from './core/packet.js';

export {
  createRouter,
  createSwitch,
  createHost,
  isNetworkDevice,
} from './core/device.js';
export type {
  Device,
  RouterDevice,
  SwitchDevice,
  HostDevice,
  NetworkDevice,
} from './core/device.js';

// Routing exports
export {
  DijkstraRouting,
  createDijkstraRouting,
  toWeightedGraph,
} from './core/routing/dijkstra-routing.js';
export { AStarRouting, createAStarRouting } from './core/routing/astar-routing.js';
export type {
  RoutingAlgorithm,
  RouteResult,
  LinkGraph,
} from './core/routing/types.js';

// Utility exports
export { TypedEventEmitter } from './utils/event-emitter.js';
export type { EventHandler } from './utils/event-emitter.js';

export { PriorityQueue } from './utils/priority-queue.js';
export type { Comparator } from './utils/priority-queue.js';

// Graph exports
export {
  Graph,
  compareNodeKeys,
  BreadthFirstSearch,
  DepthFirstSearch,
  breadthFirst,
  depthFirst,
  Dijkstra,
  shortestPaths,
  reconstructPath,
  TopologyPersistence,
} from './graph/index.js';
export type {
  NodeKey,
  Adjacency,
  GraphTraversal,
  WeightedEdge,
  ShortestPathTree,
  StoredDevice,
  StoredLink,
  TopologyPersistenceConfig,
} from './graph/index.js';
