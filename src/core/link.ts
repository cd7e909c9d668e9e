/**
 * Physical link characteristics and the transmission-time cost model
 */

export interface Link {
  latencyMs: number;      // one-way propagation delay
  bandwidthMbps: number;  // megabits per second
  reliability: number;    // 0-1, informational only
}

/**
 * Cost charged for serializing a payload over a zero-bandwidth link
 */
export const UNUSABLE_LINK_COST = 1e9;

const DEFAULT_LINK: Link = {
  latencyMs: 1.0,
  bandwidthMbps: 100.0,
  reliability: 0.999,
};

export function createLink(overrides: Partial<Link> = {}): Link {
  return { ...DEFAULT_LINK, ...overrides };
}

/**
 * Seconds needed to push `bytes` across the link: latency plus
 * serialization time. A link with no bandwidth costs at least
 * UNUSABLE_LINK_COST instead of dividing by zero.
 */
export function linkCost(link: Link, bytes: number): number {
  const latencySeconds = link.latencyMs / 1000;
  const payloadSeconds = link.bandwidthMbps > 0
    ? (bytes * 8) / (link.bandwidthMbps * 1_000_000)
    : UNUSABLE_LINK_COST;
  return latencySeconds + payloadSeconds;
}
