import { createHash } from 'node:crypto';
import type { NodeCandidate } from '@dhtwatch/shared';
import {
  NODE_CANDIDATE_LIMIT,
  NODE_IDLE_EVICTION_MS,
  NODE_MIN_BYTES,
  NODE_MIN_LIFETIME_SEC,
  NODE_MIN_PACKETS,
  NODE_MIN_SCORE,
  NODE_MIN_WINDOWS,
} from '@dhtwatch/shared';
import type { DirectionalCounters } from './TrafficAccumulator.js';

export interface PeerStats extends DirectionalCounters {
  address: string;
  firstSeen: number;
  lastSeen: number;
  windowsSeen: number;
}

export interface PeerTrackerOptions {
  minWindows?: number;
  minLifetimeSec?: number;
  minBytes?: number;
  minPackets?: number;
  minScore?: number;
  limit?: number;
  idleEvictionMs?: number;
}

export function hashAddress(address: string): { id: string; ipHash: string } {
  const ipHash = createHash('sha256').update(address, 'utf8').digest('hex');
  return { id: `node-${ipHash.slice(0, 8)}`, ipHash };
}

/**
 * Follows remote peers across capture windows and scores how likely each
 * one is a long-lived DHT node. Raw addresses never leave the tracker;
 * candidates carry a sha256 of the address instead.
 */
export class PeerTracker {
  private peers = new Map<string, PeerStats>();
  private minWindows: number;
  private minLifetimeSec: number;
  private minBytes: number;
  private minPackets: number;
  private minScore: number;
  private limit: number;
  private idleEvictionMs: number;

  constructor(options: PeerTrackerOptions = {}) {
    this.minWindows = options.minWindows ?? NODE_MIN_WINDOWS;
    this.minLifetimeSec = options.minLifetimeSec ?? NODE_MIN_LIFETIME_SEC;
    this.minBytes = options.minBytes ?? NODE_MIN_BYTES;
    this.minPackets = options.minPackets ?? NODE_MIN_PACKETS;
    this.minScore = options.minScore ?? NODE_MIN_SCORE;
    this.limit = options.limit ?? NODE_CANDIDATE_LIMIT;
    this.idleEvictionMs = options.idleEvictionMs ?? NODE_IDLE_EVICTION_MS;
  }

  get size(): number {
    return this.peers.size;
  }

  /** Fold in one window's per-remote traffic observed at `now` (epoch ms). */
  update(now: number, traffic: ReadonlyMap<string, DirectionalCounters>): void {
    for (const [address, counters] of traffic) {
      let peer = this.peers.get(address);
      if (!peer) {
        peer = {
          address,
          firstSeen: now,
          lastSeen: now,
          windowsSeen: 0,
          inBytes: 0,
          outBytes: 0,
          inPackets: 0,
          outPackets: 0,
        };
        this.peers.set(address, peer);
      } else {
        peer.lastSeen = now;
      }

      peer.windowsSeen += 1;
      peer.inBytes += counters.inBytes;
      peer.outBytes += counters.outBytes;
      peer.inPackets += counters.inPackets;
      peer.outPackets += counters.outPackets;
    }

    for (const [address, peer] of this.peers) {
      if (now - peer.lastSeen > this.idleEvictionMs) {
        this.peers.delete(address);
      }
    }
  }

  score(peer: PeerStats): number {
    if (peer.windowsSeen < 2) return 0;

    const lifetimeSec = Math.max(0, (peer.lastSeen - peer.firstSeen) / 1000);
    const totalBytes = peer.inBytes + peer.outBytes;
    const totalPackets = peer.inPackets + peer.outPackets;

    let score =
      0.3 * Math.min(peer.windowsSeen / this.minWindows, 1) +
      0.25 * Math.min(lifetimeSec / this.minLifetimeSec, 1) +
      0.25 * Math.min(totalBytes / this.minBytes, 1) +
      0.2 * Math.min(totalPackets / this.minPackets, 1);

    if (totalBytes < this.minBytes || totalPackets < this.minPackets) {
      score *= 0.3;
    }

    const hasIn = peer.inBytes > 0 && peer.inPackets > 0;
    const hasOut = peer.outBytes > 0 && peer.outPackets > 0;
    score *= hasIn && hasOut ? 1 : 0.2;

    return Math.min(Math.max(score, 0), 1);
  }

  candidates(): NodeCandidate[] {
    return [...this.peers.values()]
      .map((peer) => ({ peer, score: this.score(peer) }))
      .filter(({ score }) => score >= this.minScore)
      .sort((a, b) => b.score - a.score)
      .slice(0, this.limit)
      .map(({ peer, score }) => ({
        ...hashAddress(peer.address),
        score: Math.round(score * 1000) / 1000,
        lifetimeSec: Math.round((peer.lastSeen - peer.firstSeen) / 1000),
        windowsSeen: peer.windowsSeen,
        inBytes: peer.inBytes,
        outBytes: peer.outBytes,
        inPackets: peer.inPackets,
        outPackets: peer.outPackets,
      }));
  }
}
