import { describe, it, expect } from 'vitest';
import { TrafficAccumulator, rankTopTalkers } from '../capture/TrafficAccumulator.js';

const LOCAL = '192.168.1.10';

describe('TrafficAccumulator', () => {
  it('should summarise two inbound packets from distinct peers', () => {
    const acc = new TrafficAccumulator([LOCAL]);
    acc.add({ src: '10.0.0.1', dst: LOCAL, length: 500 });
    acc.add({ src: '10.0.0.2', dst: LOCAL, length: 1500 });

    expect(acc.uniquePeers).toBe(2);
    expect(acc.totalBytes).toBe(2000);
    expect(acc.totalPackets).toBe(2);
    expect(acc.inBytes).toBe(2000);
    expect(acc.outBytes).toBe(0);
    expect(acc.topTalkers(10)).toEqual([
      { address: '10.0.0.2', bytes: 1500, packets: 1 },
      { address: '10.0.0.1', bytes: 500, packets: 1 },
    ]);
  });

  it('should count unique peers by source address', () => {
    const acc = new TrafficAccumulator([LOCAL]);
    acc.add({ src: '10.0.0.1', dst: LOCAL, length: 100 });
    acc.add({ src: '10.0.0.1', dst: LOCAL, length: 100 });
    acc.add({ src: LOCAL, dst: '10.0.0.1', length: 100 });

    expect(acc.uniquePeers).toBe(2);
    expect([...acc.sourceAddresses()].sort()).toEqual(['10.0.0.1', LOCAL]);
  });

  it('should attribute outbound packets to the destination peer', () => {
    const acc = new TrafficAccumulator([LOCAL]);
    acc.add({ src: LOCAL, dst: '10.0.0.7', length: 300 });
    acc.add({ src: '10.0.0.7', dst: LOCAL, length: 200 });

    expect(acc.outBytes).toBe(300);
    expect(acc.inBytes).toBe(200);
    expect(acc.directionalTraffic().get('10.0.0.7')).toEqual({
      inBytes: 200,
      outBytes: 300,
      inPackets: 1,
      outPackets: 1,
    });
  });

  it('should leave traffic between two remote hosts out of the direction split', () => {
    const acc = new TrafficAccumulator([LOCAL]);
    acc.add({ src: '10.0.0.1', dst: '10.0.0.2', length: 400 });

    expect(acc.totalBytes).toBe(400);
    expect(acc.inBytes + acc.outBytes).toBe(0);
    expect(acc.directionalTraffic().size).toBe(0);
  });

  it('should count skipped lines', () => {
    const acc = new TrafficAccumulator([]);
    acc.skip();
    acc.skip();

    expect(acc.skippedLines).toBe(2);
  });

  it('should cap top talkers at k', () => {
    const acc = new TrafficAccumulator([]);
    for (let i = 1; i <= 5; i++) {
      acc.add({ src: `10.0.0.${i}`, dst: LOCAL, length: i * 100 });
    }

    expect(acc.topTalkers(3).map((t) => t.address)).toEqual([
      '10.0.0.5',
      '10.0.0.4',
      '10.0.0.3',
    ]);
  });
});

describe('rankTopTalkers', () => {
  it('should break byte ties by packets and then by address', () => {
    const ranked = rankTopTalkers(
      [
        { address: '10.0.0.9', bytes: 1000, packets: 2 },
        { address: '10.0.0.3', bytes: 1000, packets: 4 },
        { address: '10.0.0.1', bytes: 1000, packets: 2 },
        { address: '10.0.0.5', bytes: 2000, packets: 1 },
      ],
      10,
    );

    expect(ranked.map((t) => t.address)).toEqual(['10.0.0.5', '10.0.0.3', '10.0.0.1', '10.0.0.9']);
  });

  it('should return an empty list for k of zero', () => {
    expect(rankTopTalkers([{ address: '10.0.0.1', bytes: 1, packets: 1 }], 0)).toEqual([]);
  });
});
