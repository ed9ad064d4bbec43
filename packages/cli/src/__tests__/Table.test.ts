import { describe, it, expect, vi } from 'vitest';
import type { StoredSample, StoredTrafficWindow } from '@dhtwatch/shared';

// Mock chalk to return plain text
vi.mock('chalk', () => {
  const handler: ProxyHandler<object> = {
    get() {
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable: unknown = new Proxy(function () {} as object, handler);

  return { default: chainable };
});

import { renderSampleTable, renderSummary, renderWindowTable } from '../ui/Table.js';

function makeWindow(overrides: Partial<StoredTrafficWindow> = {}): StoredTrafficWindow {
  return {
    kind: 'traffic',
    id: 1,
    timestamp: new Date('2026-01-10T12:00:00Z'),
    windowMs: 60_000,
    uniquePeers: 2,
    totalBytes: 2048,
    totalPackets: 2,
    inBytes: 1024,
    outBytes: 1024,
    inPackets: 1,
    outPackets: 1,
    newPeers: 2,
    expiredPeers: 0,
    skippedLines: 0,
    topTalkers: [
      { address: '10.0.0.2', bytes: 1024, packets: 1 },
      { address: '10.0.0.1', bytes: 1024, packets: 1 },
    ],
    nodeCandidates: [],
    ...overrides,
  };
}

function makeSample(overrides: Partial<StoredSample> = {}): StoredSample {
  return {
    kind: 'sample',
    id: 1,
    timestamp: new Date('2026-01-10T12:00:00Z'),
    cpuPercent: 25,
    memPercent: 50,
    diskPercent: null,
    memUsedBytes: 1024,
    memTotalBytes: 2048,
    diskUsedBytes: null,
    diskTotalBytes: null,
    ...overrides,
  };
}

describe('Table UI', () => {
  describe('renderWindowTable', () => {
    it('should render headers', () => {
      const output = renderWindowTable([]);

      expect(output).toContain('time');
      expect(output).toContain('peers');
      expect(output).toContain('top talker');
    });

    it('should render one row per window', () => {
      const output = renderWindowTable([makeWindow()]);

      expect(output).toContain('2026-01-10 12:00:00');
      expect(output).toContain('2 KB');
      expect(output).toContain('1 KB / 1 KB');
      expect(output).toContain('10.0.0.2 (1 KB)');
      expect(output).not.toContain('10.0.0.1');
    });

    it('should show a dash for a window without talkers', () => {
      const output = renderWindowTable([
        makeWindow({ uniquePeers: 0, totalBytes: 0, topTalkers: [] }),
      ]);

      expect(output).toContain(' - ');
    });
  });

  describe('renderSampleTable', () => {
    it('should render readings and dashes for missing metrics', () => {
      const output = renderSampleTable([makeSample()]);

      expect(output).toContain('25.0%');
      expect(output).toContain('50.0%');
      expect(output).toContain('1 KB');
      expect(output).toContain(' - ');
    });
  });

  describe('renderSummary', () => {
    it('should list counts, bounds and size', () => {
      const output = renderSummary(
        {
          counts: { sample: 3, traffic: 1200 },
          captureFailures: 1,
          earliest: new Date('2026-01-01T00:00:00Z'),
          latest: null,
          storageBytes: 4096,
        },
        '/var/lib/dhtwatch/dhtwatch.db',
      );

      expect(output).toContain('Path:             /var/lib/dhtwatch/dhtwatch.db');
      expect(output).toContain('Size:             4 KB');
      expect(output).toContain('Samples:          3');
      expect(output).toContain('Traffic windows:  1,200');
      expect(output).toContain('Capture failures: 1');
      expect(output).toContain('Earliest:         2026-01-01 00:00:00');
      expect(output).toContain('Latest:           -');
    });
  });
});
