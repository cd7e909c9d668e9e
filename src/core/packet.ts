/**
 * Packet model for route replay
 */

export interface PacketHeader {
  id: string; // Unique packet ID
  source: string; // Originating device name
  destination: string; // Target device name
  ttl: number; // Decremented once per hop
  size: number; // Payload size in bytes
  timestamp: number; // Wall-clock time created
}

export interface PacketMeta {
  hops: string[]; // Device names the packet has passed through, append-only
  createdAt: number;
}

export interface Packet {
  header: PacketHeader;
  meta: PacketMeta;
}

export const DEFAULT_TTL = 8;

/**
 * Generate a unique packet ID
 */
function generatePacketId(): string {
  return `pkt_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Create a new packet with an empty hop history
 */
export function createPacket(
  source: string,
  destination: string,
  size: number,
  ttl: number = DEFAULT_TTL
): Packet {
  const now = Date.now();

  return {
    header: {
      id: generatePacketId(),
      source,
      destination,
      ttl,
      size,
      timestamp: now,
    },
    meta: {
      hops: [],
      createdAt: now,
    },
  };
}

export function decrementTtl(packet: Packet): void {
  packet.header.ttl--;
}

export function addHop(packet: Packet, nodeName: string): void {
  packet.meta.hops.push(nodeName);
}

export function isExpired(packet: Packet): boolean {
  return packet.header.ttl <= 0;
}
