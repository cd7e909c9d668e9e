/**
 * Network simulator: device registry, link topology, routing and
 * packet replay along a chosen path
 */

import { TypedEventEmitter } from '../utils/event-emitter.js';
import { Graph } from '../graph/graph.js';
import { InvalidArgumentError, NotFoundError } from './errors.js';
import { linkCost, UNUSABLE_LINK_COST, type Link } from './link.js';
import {
  addHop,
  createPacket,
  decrementTtl,
  isExpired,
  DEFAULT_TTL,
  type Packet,
} from './packet.js';
import type { Device } from './device.js';
import { DijkstraRouting } from './routing/dijkstra-routing.js';
import type { LinkGraph, RoutingAlgorithm } from './routing/types.js';

export interface SimulatorConfig {
  routing: RoutingAlgorithm;   // Used by findRoute when none is passed
  defaultTtl: number;          // TTL for packets made by createPacket
  missingLinkCost: number;     // Charged for a path step with no link
}

export interface TopologyLink {
  from: string;
  to: string;
  link: Link;
}

export interface TopologySnapshot {
  devices: Device[];
  links: TopologyLink[];
}

export interface DeviceSummary {
  name: string;
  kind: string;
}

export type SimulatorEvents = {
  'device:added': { device: Device };
  'device:removed': { name: string };
  'link:connected': { from: string; to: string; link: Link; bidirectional: boolean };
  'link:disconnected': { from: string; to: string; bidirectional: boolean };
  'packet:hop': { packet: Packet; from: string; to: string; cost: number };
  'packet:expired': { packet: Packet; at: string };
  'packet:sent': { packet: Packet; path: string[]; totalSeconds: number };
};

const DEFAULT_CONFIG: SimulatorConfig = {
  routing: new DijkstraRouting(),
  defaultTtl: DEFAULT_TTL,
  missingLinkCost: UNUSABLE_LINK_COST,
};

export class NetworkSimulator extends TypedEventEmitter<SimulatorEvents> {
  readonly config: SimulatorConfig;

  private readonly graph: LinkGraph = new Graph<string, Link>(true);
  // References only; device lifetime belongs to the caller
  private readonly devices: Map<string, Device> = new Map();

  constructor(config: Partial<SimulatorConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Read-only view of the link topology, for routing algorithms
   */
  get topology(): LinkGraph {
    return this.graph;
  }

  /**
   * Register a device under its name and make sure it has a graph node.
   * Registering a second device with the same name replaces the reference.
   */
  addDevice(device: Device | null | undefined): void {
    if (!device) {
      throw new InvalidArgumentError('Cannot register a null device');
    }

    this.devices.set(device.name, device);
    this.graph.addNode(device.name);
    this.emit('device:added', { device });
  }

  /**
   * Unregister a device and drop every link touching it
   */
  removeDevice(name: string): void {
    if (!this.devices.has(name)) {
      throw new NotFoundError(`Device ${name} is not registered`, name);
    }

    this.devices.delete(name);
    this.graph.removeNode(name);
    this.emit('device:removed', { name });
  }

  getDevice(name: string): Device | undefined {
    return this.devices.get(name);
  }

  hasDevice(name: string): boolean {
    return this.devices.has(name);
  }

  /**
   * Registered devices in registration order
   */
  listDevices(): DeviceSummary[] {
    return Array.from(this.devices.values(), device => ({
      name: device.name,
      kind: device.kind,
    }));
  }

  /**
   * Link a -> b, and b -> a as a separate entry when bidirectional
   */
  connect(a: string, b: string, link: Link, bidir: boolean = true): void {
    if (!this.graph.hasNode(a) || !this.graph.hasNode(b)) {
      const missing = this.graph.hasNode(a) ? b : a;
      throw new NotFoundError(`Unknown node in connect(): ${missing}`, missing);
    }

    this.graph.addEdge(a, b, link);
    if (bidir) {
      this.graph.addEdge(b, a, link);
    }
    this.emit('link:connected', { from: a, to: b, link, bidirectional: bidir });
  }

  /**
   * Remove every a -> b link (and b -> a when bidirectional)
   */
  disconnect(a: string, b: string, bidir: boolean = true): void {
    this.graph.removeEdge(a, b);
    if (bidir) {
      this.graph.removeEdge(b, a);
    }
    this.emit('link:disconnected', { from: a, to: b, bidirectional: bidir });
  }

  /**
   * First link from a to b in insertion order
   */
  getLink(a: string, b: string): Link | undefined {
    return this.graph.getEdges(a).find(entry => entry.node === b)?.edge;
  }

  /**
   * Find a route for a payload of the given size
   */
  findRoute(
    src: string,
    dst: string,
    payloadBytes: number,
    algorithm: RoutingAlgorithm = this.config.routing
  ): string[] {
    return algorithm.route(this.graph, src, dst, payloadBytes);
  }

  createPacket(source: string, destination: string, size: number, ttl?: number): Packet {
    return createPacket(source, destination, size, ttl ?? this.config.defaultTtl);
  }

  /**
   * Replay a packet along `path`, charging each hop the cost of the first
   * matching link (not the cheapest one when parallel links exist).
   * Decrements TTL and records hops; stops early once TTL runs out.
   * Returns the total transmission time in seconds.
   */
  sendPacket(path: readonly string[], packet: Packet): number {
    const [first] = path;
    if (path.length < 2 || first === undefined) {
      return 0;
    }

    let totalSeconds = 0;
    addHop(packet, first);

    for (let i = 1; i < path.length; i++) {
      const from = path[i - 1];
      const to = path[i];
      if (from === undefined || to === undefined) break;

      if (isExpired(packet)) {
        this.emit('packet:expired', { packet, at: from });
        break;
      }

      const link = this.getLink(from, to);
      let cost: number;
      if (link) {
        cost = linkCost(link, packet.header.size);
      } else {
        console.warn(`No link from ${from} to ${to}; charging ${this.config.missingLinkCost}s`);
        cost = this.config.missingLinkCost;
      }

      totalSeconds += cost;
      decrementTtl(packet);
      addHop(packet, to);
      this.emit('packet:hop', { packet, from, to, cost });
    }

    this.emit('packet:sent', { packet, path: [...path], totalSeconds });
    return totalSeconds;
  }

  // ============ Topology Snapshots ============

  /**
   * Capture devices and every directed link in adjacency order
   */
  exportTopology(): TopologySnapshot {
    const links: TopologyLink[] = [];
    this.graph.forEachEdge((from, to, link) => {
      links.push({ from, to, link: { ...link } });
    });

    return {
      devices: Array.from(this.devices.values()),
      links,
    };
  }

  /**
   * Replace the current topology with a snapshot. The snapshot is checked
   * first; a rejected snapshot leaves the current topology untouched.
   */
  importTopology(snapshot: TopologySnapshot): void {
    const names = new Set<string>();
    for (const device of snapshot.devices) {
      if (!device) {
        throw new InvalidArgumentError('Cannot register a null device');
      }
      names.add(device.name);
    }
    for (const { from, to } of snapshot.links) {
      const missing = !names.has(from) ? from : !names.has(to) ? to : undefined;
      if (missing !== undefined) {
        throw new NotFoundError(`Unknown node in snapshot link: ${missing}`, missing);
      }
    }

    this.clear();
    for (const device of snapshot.devices) {
      this.addDevice(device);
    }
    for (const { from, to, link } of snapshot.links) {
      this.connect(from, to, link, false);
    }
  }

  /**
   * Forget all devices and links. Emits `device:removed` for each device.
   */
  clear(): void {
    const removed = Array.from(this.devices.keys());
    this.devices.clear();
    this.graph.clear();
    for (const name of removed) {
      this.emit('device:removed', { name });
    }
  }
}
