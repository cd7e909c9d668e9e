import { describe, it, expect } from 'vitest';
import {
  createPacket,
  decrementTtl,
  addHop,
  isExpired,
  DEFAULT_TTL,
} from '@/core/packet.js';

describe('packet', () => {
  describe('createPacket', () => {
    it('should create packet with required fields', () => {
      const packet = createPacket('H1', 'H2', 1500, 3);

      expect(packet.header.source).toBe('H1');
      expect(packet.header.destination).toBe('H2');
      expect(packet.header.ttl).toBe(3);
      expect(packet.header.size).toBe(1500);
      expect(packet.meta.hops).toEqual([]);
    });

    it('should use the default TTL', () => {
      const packet = createPacket('H1', 'H2', 64);

      expect(packet.header.ttl).toBe(DEFAULT_TTL);
      expect(DEFAULT_TTL).toBe(8);
    });

    it('should generate unique packet IDs', () => {
      const packet1 = createPacket('H1', 'H2', 64);
      const packet2 = createPacket('H1', 'H2', 64);

      expect(packet1.header.id).not.toBe(packet2.header.id);
    });

    it('should set timestamp', () => {
      const before = Date.now();
      const packet = createPacket('H1', 'H2', 64);
      const after = Date.now();

      expect(packet.header.timestamp).toBeGreaterThanOrEqual(before);
      expect(packet.header.timestamp).toBeLessThanOrEqual(after);
      expect(packet.meta.createdAt).toBe(packet.header.timestamp);
    });
  });

  describe('TTL and hops', () => {
    it('should decrement TTL and record a hop', () => {
      const packet = createPacket('src', 'dst', 100, 3);

      decrementTtl(packet);
      addHop(packet, 'R1');

      expect(packet.header.ttl).toBe(2);
      expect(packet.meta.hops).toEqual(['R1']);
    });

    it('should track two hops', () => {
      const packet = createPacket('src', 'dst', 100, 3);

      decrementTtl(packet);
      addHop(packet, 'R1');
      decrementTtl(packet);
      addHop(packet, 'R2');

      expect(packet.header.ttl).toBe(1);
      expect(packet.meta.hops).toHaveLength(2);
      expect(packet.meta.hops[1]).toBe('R2');
    });

    it('should report expiry once TTL reaches zero', () => {
      const packet = createPacket('src', 'dst', 100, 1);

      expect(isExpired(packet)).toBe(false);
      decrementTtl(packet);
      expect(isExpired(packet)).toBe(true);
    });
  });
});
