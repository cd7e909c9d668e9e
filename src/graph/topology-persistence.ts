/**
 * IndexedDB persistence for simulator topologies using Dexie
 */

import Dexie, { type Table } from 'dexie';
import type { Device } from '../core/device.js';
import type { TopologySnapshot } from '../core/simulator.js';

export interface StoredDevice {
  seq?: number;         // auto-increment, keeps registration order
  name: string;
  kind: string;
  device: Device;
}

export interface StoredLink {
  seq?: number;         // auto-increment, keeps adjacency order
  from: string;
  to: string;
  latencyMs: number;
  bandwidthMbps: number;
  reliability: number;
}

export interface TopologyPersistenceConfig {
  dbName: string;
  indexedDB?: IDBFactory;
  IDBKeyRange?: typeof IDBKeyRange;
}

const DEFAULT_CONFIG: TopologyPersistenceConfig = {
  dbName: 'packetnet',
};

interface DexieOptions {
  indexedDB?: IDBFactory;
  IDBKeyRange?: typeof IDBKeyRange;
}

class TopologyDatabase extends Dexie {
  devices!: Table<StoredDevice, number>;
  links!: Table<StoredLink, number>;

  constructor(dbName: string, options?: DexieOptions) {
    super(dbName, options);

    this.version(1).stores({
      devices: '++seq, &name, kind',
      links: '++seq, from, to',
    });
  }
}

export class TopologyPersistence {
  private db: TopologyDatabase;
  private config: TopologyPersistenceConfig;

  constructor(config: Partial<TopologyPersistenceConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    const dexieOptions: DexieOptions = {};
    if (this.config.indexedDB) {
      dexieOptions.indexedDB = this.config.indexedDB;
    }
    if (this.config.IDBKeyRange) {
      dexieOptions.IDBKeyRange = this.config.IDBKeyRange;
    }
    this.db = new TopologyDatabase(
      this.config.dbName,
      Object.keys(dexieOptions).length > 0 ? dexieOptions : undefined
    );
  }

  async open(): Promise<void> {
    await this.db.open();
  }

  close(): void {
    this.db.close();
  }

  isOpen(): boolean {
    return this.db.isOpen();
  }

  /**
   * Replace everything stored with the given snapshot
   */
  async saveTopology(snapshot: TopologySnapshot): Promise<void> {
    const devices: StoredDevice[] = snapshot.devices.map(device => ({
      name: device.name,
      kind: device.kind,
      device,
    }));
    const links: StoredLink[] = snapshot.links.map(({ from, to, link }) => ({
      from,
      to,
      latencyMs: link.latencyMs,
      bandwidthMbps: link.bandwidthMbps,
      reliability: link.reliability,
    }));

    await this.db.transaction('rw', [this.db.devices, this.db.links], async () => {
      await this.db.devices.clear();
      await this.db.links.clear();
      await this.db.devices.bulkAdd(devices);
      await this.db.links.bulkAdd(links);
    });
  }

  /**
   * Load the stored topology in the order it was saved (primary key order).
   * Devices get `name` and `kind` from their indexed columns: the stored
   * clone only keeps own data properties, so accessors are lost.
   */
  async loadTopology(): Promise<TopologySnapshot> {
    const [devices, links] = await Promise.all([
      this.db.devices.toArray(),
      this.db.links.toArray(),
    ]);

    return {
      devices: devices.map(record => ({
        ...record.device,
        name: record.name,
        kind: record.kind,
      })),
      links: links.map(record => ({
        from: record.from,
        to: record.to,
        link: {
          latencyMs: record.latencyMs,
          bandwidthMbps: record.bandwidthMbps,
          reliability: record.reliability,
        },
      })),
    };
  }

  async getDeviceCount(): Promise<number> {
    return await this.db.devices.count();
  }

  async getLinkCount(): Promise<number> {
    return await this.db.links.count();
  }

  /**
   * Stored links leaving a device, in saved order
   */
  async getLinksFrom(name: string): Promise<StoredLink[]> {
    const links = await this.db.links.where('from').equals(name).toArray();
    return links.sort((a, b) => (a.seq ?? 0) - (b.seq ?? 0));
  }

  async clear(): Promise<void> {
    await Promise.all([
      this.db.devices.clear(),
      this.db.links.clear(),
    ]);
  }

  async deleteDatabase(): Promise<void> {
    await this.db.delete();
  }
}
