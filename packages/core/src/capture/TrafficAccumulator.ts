import type { TopTalker } from '@dhtwatch/shared';
import type { CapturedPacket } from './lineParser.js';

export interface DirectionalCounters {
  inBytes: number;
  outBytes: number;
  inPackets: number;
  outPackets: number;
}

function compareTalkers(a: TopTalker, b: TopTalker): number {
  if (a.bytes !== b.bytes) return b.bytes - a.bytes;
  if (a.packets !== b.packets) return b.packets - a.packets;
  if (a.address < b.address) return -1;
  if (a.address > b.address) return 1;
  return 0;
}

/** Top `k` by bytes desc, then packets desc, then address asc. */
export function rankTopTalkers(talkers: Iterable<TopTalker>, k: number): TopTalker[] {
  return [...talkers].sort(compareTalkers).slice(0, Math.max(0, k));
}

/**
 * Reduces the packets of one capture window. Per-source counters drive
 * unique peers and top talkers; per-remote directional counters feed the
 * peer tracker.
 */
export class TrafficAccumulator {
  private sources = new Map<string, TopTalker>();
  private remotes = new Map<string, DirectionalCounters>();
  private localAddresses: ReadonlySet<string>;

  totalBytes = 0;
  totalPackets = 0;
  inBytes = 0;
  outBytes = 0;
  inPackets = 0;
  outPackets = 0;
  skippedLines = 0;

  constructor(localAddresses: Iterable<string>) {
    this.localAddresses = new Set(localAddresses);
  }

  add(packet: CapturedPacket): void {
    const source = this.sources.get(packet.src);
    if (source) {
      source.bytes += packet.length;
      source.packets += 1;
    } else {
      this.sources.set(packet.src, { address: packet.src, bytes: packet.length, packets: 1 });
    }

    this.totalBytes += packet.length;
    this.totalPackets += 1;

    if (this.localAddresses.has(packet.src)) {
      this.outBytes += packet.length;
      this.outPackets += 1;
      const remote = this.remote(packet.dst);
      remote.outBytes += packet.length;
      remote.outPackets += 1;
    } else if (this.localAddresses.has(packet.dst)) {
      this.inBytes += packet.length;
      this.inPackets += 1;
      const remote = this.remote(packet.src);
      remote.inBytes += packet.length;
      remote.inPackets += 1;
    }
  }

  skip(): void {
    this.skippedLines += 1;
  }

  get uniquePeers(): number {
    return this.sources.size;
  }

  sourceAddresses(): Set<string> {
    return new Set(this.sources.keys());
  }

  topTalkers(k: number): TopTalker[] {
    return rankTopTalkers(
      [...this.sources.values()].map((talker) => ({ ...talker })),
      k,
    );
  }

  directionalTraffic(): ReadonlyMap<string, DirectionalCounters> {
    return this.remotes;
  }

  private remote(address: string): DirectionalCounters {
    let counters = this.remotes.get(address);
    if (!counters) {
      counters = { inBytes: 0, outBytes: 0, inPackets: 0, outPackets: 0 };
      this.remotes.set(address, counters);
    }
    return counters;
  }
}
