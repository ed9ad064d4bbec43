import { describe, it, expect, vi } from 'vitest';
import type { NetworkInterfaceInfo } from 'node:os';
import { CaptureTimeoutError } from '@dhtwatch/shared';
import { CaptureAggregator } from '../capture/CaptureAggregator.js';
import { PeerTracker, hashAddress } from '../capture/PeerTracker.js';
import { resolveLocalAddresses } from '../capture/localAddresses.js';
import type { CaptureRunner } from '../capture/TsharkCapture.js';

const LOCAL = '192.168.1.10';

/** Replays one scripted capture per call; an Error entry fails that capture. */
function scriptedRunner(captures: Array<string[] | Error>): CaptureRunner {
  let call = 0;
  return {
    run: vi.fn(async (_durationMs: number, onLine: (line: string) => void) => {
      const next = captures[call++];
      if (next instanceof Error) throw next;
      for (const line of next ?? []) onLine(line);
    }),
  };
}

function packet(src: string, dst: string, length: number): string {
  return `${src}\t${dst}\t${length}`;
}

describe('CaptureAggregator', () => {
  it('should summarise a two-packet window', async () => {
    const aggregator = new CaptureAggregator({
      runner: scriptedRunner([
        [packet('10.0.0.1', LOCAL, 500), packet('10.0.0.2', LOCAL, 1500)],
      ]),
      localAddresses: [LOCAL],
      topTalkers: 10,
      now: () => 0,
    });

    const window = await aggregator.captureWindow(5000);

    expect(window.timestamp.getTime()).toBe(0);
    expect(window.windowMs).toBe(5000);
    expect(window.uniquePeers).toBe(2);
    expect(window.totalBytes).toBe(2000);
    expect(window.totalPackets).toBe(2);
    expect(window.inBytes).toBe(2000);
    expect(window.topTalkers).toEqual([
      { address: '10.0.0.2', bytes: 1500, packets: 1 },
      { address: '10.0.0.1', bytes: 500, packets: 1 },
    ]);
  });

  it('should count malformed lines and ignore status lines', async () => {
    const aggregator = new CaptureAggregator({
      runner: scriptedRunner([
        ["Capturing on 'any'", packet('10.0.0.1', LOCAL, 100), 'garbage', '', '10.0.0.1 x 5'],
      ]),
      localAddresses: [LOCAL],
      topTalkers: 10,
    });

    const window = await aggregator.captureWindow(5000);

    expect(window.skippedLines).toBe(2);
    expect(window.totalPackets).toBe(1);
  });

  it('should report an empty window when nothing was captured', async () => {
    const aggregator = new CaptureAggregator({
      runner: scriptedRunner([[]]),
      localAddresses: [LOCAL],
      topTalkers: 10,
    });

    const window = await aggregator.captureWindow(5000);

    expect(window.uniquePeers).toBe(0);
    expect(window.totalBytes).toBe(0);
    expect(window.topTalkers).toEqual([]);
  });

  it('should measure churn against the previous window', async () => {
    const aggregator = new CaptureAggregator({
      runner: scriptedRunner([
        [packet('10.0.0.1', LOCAL, 100), packet('10.0.0.2', LOCAL, 100)],
        [packet('10.0.0.2', LOCAL, 100), packet('10.0.0.3', LOCAL, 100)],
      ]),
      localAddresses: [LOCAL],
      topTalkers: 10,
    });

    const first = await aggregator.captureWindow(5000);
    const second = await aggregator.captureWindow(5000);

    expect([first.newPeers, first.expiredPeers]).toEqual([2, 0]);
    expect([second.newPeers, second.expiredPeers]).toEqual([1, 1]);
  });

  it('should keep churn state across a failed capture', async () => {
    const aggregator = new CaptureAggregator({
      runner: scriptedRunner([
        [packet('10.0.0.1', LOCAL, 100)],
        new CaptureTimeoutError(6000),
        [packet('10.0.0.1', LOCAL, 100)],
      ]),
      localAddresses: [LOCAL],
      topTalkers: 10,
    });

    await aggregator.captureWindow(5000);
    await expect(aggregator.captureWindow(5000)).rejects.toBeInstanceOf(CaptureTimeoutError);
    const third = await aggregator.captureWindow(5000);

    expect([third.newPeers, third.expiredPeers]).toEqual([0, 0]);
  });

  it('should embed node candidates from the peer tracker', async () => {
    let clock = 0;
    const exchange = [packet('10.0.0.5', LOCAL, 600), packet(LOCAL, '10.0.0.5', 600)];
    const aggregator = new CaptureAggregator({
      runner: scriptedRunner([exchange, exchange]),
      localAddresses: [LOCAL],
      topTalkers: 10,
      peerTracker: new PeerTracker({
        minWindows: 2,
        minLifetimeSec: 60,
        minBytes: 1000,
        minPackets: 2,
      }),
      now: () => clock,
    });

    const first = await aggregator.captureWindow(5000);
    clock = 60_000;
    const second = await aggregator.captureWindow(5000);

    expect(first.nodeCandidates).toEqual([]);
    expect(second.nodeCandidates).toHaveLength(1);
    expect(second.nodeCandidates[0]?.id).toBe(hashAddress('10.0.0.5').id);
    expect(second.nodeCandidates[0]?.score).toBe(1);
    expect(aggregator.trackedPeers).toBe(1);
  });

  it('should stamp the window with the time the capture ended', async () => {
    let clock = 1_000;
    const aggregator = new CaptureAggregator({
      runner: {
        run: async (durationMs: number) => {
          clock += durationMs;
        },
      },
      localAddresses: [],
      topTalkers: 10,
      now: () => clock,
    });

    const window = await aggregator.captureWindow(5000);

    expect(window.timestamp.getTime()).toBe(6_000);
  });

  it('should pass the abort signal to the runner', async () => {
    const runner = scriptedRunner([[]]);
    const aggregator = new CaptureAggregator({ runner, localAddresses: [], topTalkers: 10 });
    const controller = new AbortController();

    await aggregator.captureWindow(5000, controller.signal);

    expect(runner.run).toHaveBeenCalledWith(5000, expect.any(Function), controller.signal);
  });
});

function ipv4(address: string, internal = false): NetworkInterfaceInfo {
  return {
    address,
    netmask: '255.255.255.0',
    family: 'IPv4',
    mac: '00:00:00:00:00:00',
    internal,
    cidr: null,
  };
}

describe('resolveLocalAddresses', () => {
  const table = {
    eth0: [ipv4('192.168.1.10')],
    lo: [ipv4('127.0.0.1', true)],
  };

  it('should use every interface for any', () => {
    expect(resolveLocalAddresses('any', null, table)).toEqual(['192.168.1.10', '127.0.0.1']);
  });

  it('should use only the named interface', () => {
    expect(resolveLocalAddresses('eth0', null, table)).toEqual(['192.168.1.10']);
  });

  it('should return nothing for an unknown interface', () => {
    expect(resolveLocalAddresses('wlan9', null, table)).toEqual([]);
  });

  it('should prefer configured addresses', () => {
    expect(resolveLocalAddresses('any', ['10.1.1.1'], table)).toEqual(['10.1.1.1']);
  });
});
