import type { CaptureConfig, TrafficWindow } from '@dhtwatch/shared';
import { getLogger } from '@dhtwatch/shared';
import { parseCaptureLine } from './lineParser.js';
import { TrafficAccumulator } from './TrafficAccumulator.js';
import { PeerTracker } from './PeerTracker.js';
import { TsharkCapture } from './TsharkCapture.js';
import type { CaptureRunner } from './TsharkCapture.js';
import { resolveLocalAddresses } from './localAddresses.js';

const logger = getLogger();

export interface CaptureAggregatorOptions {
  runner: CaptureRunner;
  localAddresses: Iterable<string>;
  topTalkers: number;
  peerTracker?: PeerTracker;
  now?: () => number;
}

/**
 * Turns one bounded capture into a TrafficWindow. Churn and the peer
 * tracker carry state from one successful window to the next; a failed or
 * cancelled capture leaves both untouched.
 */
export class CaptureAggregator {
  private runner: CaptureRunner;
  private localAddresses: string[];
  private topTalkers: number;
  private peerTracker: PeerTracker;
  private now: () => number;
  private previousSources = new Set<string>();

  constructor(options: CaptureAggregatorOptions) {
    this.runner = options.runner;
    this.localAddresses = [...options.localAddresses];
    this.topTalkers = options.topTalkers;
    this.peerTracker = options.peerTracker ?? new PeerTracker();
    this.now = options.now ?? Date.now;
  }

  get trackedPeers(): number {
    return this.peerTracker.size;
  }

  async captureWindow(durationMs: number, signal?: AbortSignal): Promise<TrafficWindow> {
    const accumulator = new TrafficAccumulator(this.localAddresses);

    await this.runner.run(
      durationMs,
      (line) => {
        const parsed = parseCaptureLine(line);
        if (parsed.type === 'packet') {
          accumulator.add(parsed.packet);
        } else if (parsed.type === 'malformed') {
          accumulator.skip();
          logger.trace({ line: parsed.line }, 'Skipped malformed capture line');
        }
      },
      signal,
    );

    const endedAt = this.now();
    const sources = accumulator.sourceAddresses();
    let newPeers = 0;
    for (const address of sources) {
      if (!this.previousSources.has(address)) newPeers++;
    }
    let expiredPeers = 0;
    for (const address of this.previousSources) {
      if (!sources.has(address)) expiredPeers++;
    }
    this.previousSources = sources;

    this.peerTracker.update(endedAt, accumulator.directionalTraffic());

    if (accumulator.skippedLines > 0) {
      logger.warn({ skippedLines: accumulator.skippedLines }, 'Capture produced malformed lines');
    }

    const window: TrafficWindow = {
      timestamp: new Date(endedAt),
      windowMs: durationMs,
      uniquePeers: accumulator.uniquePeers,
      totalBytes: accumulator.totalBytes,
      totalPackets: accumulator.totalPackets,
      inBytes: accumulator.inBytes,
      outBytes: accumulator.outBytes,
      inPackets: accumulator.inPackets,
      outPackets: accumulator.outPackets,
      newPeers,
      expiredPeers,
      skippedLines: accumulator.skippedLines,
      topTalkers: accumulator.topTalkers(this.topTalkers),
      nodeCandidates: this.peerTracker.candidates(),
    };

    logger.debug(
      {
        uniquePeers: window.uniquePeers,
        totalBytes: window.totalBytes,
        totalPackets: window.totalPackets,
        newPeers,
        expiredPeers,
      },
      'Capture window aggregated',
    );

    return window;
  }
}

export function createCaptureAggregator(config: CaptureConfig): CaptureAggregator {
  const localAddresses = resolveLocalAddresses(config.interface, config.localAddresses);
  logger.info(
    { interface: config.interface, localAddresses },
    'Local addresses used for direction detection',
  );

  return new CaptureAggregator({
    runner: new TsharkCapture(config),
    localAddresses,
    topTalkers: config.topTalkers,
  });
}
