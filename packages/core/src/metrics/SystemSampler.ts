import { cpus, freemem, totalmem } from 'node:os';
import type { CpuInfo } from 'node:os';
import { statfs } from 'node:fs/promises';
import type { StatsFs } from 'node:fs';
import type { MetricName, Sample } from '@dhtwatch/shared';
import { DEFAULT_DISK_PATH, MetricUnavailableError, getLogger } from '@dhtwatch/shared';

const logger = getLogger();

export interface SystemSources {
  cpus: () => CpuInfo[];
  totalmem: () => number;
  freemem: () => number;
  statfs: (path: string) => Promise<StatsFs>;
}

const defaultSources: SystemSources = { cpus, totalmem, freemem, statfs };

interface CpuTimes {
  idle: number;
  total: number;
}

interface Usage {
  percent: number;
  used: number;
  total: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function cpuTimes(info: CpuInfo[]): CpuTimes[] {
  return info.map((cpu) => ({
    idle: cpu.times.idle,
    total: cpu.times.user + cpu.times.nice + cpu.times.sys + cpu.times.idle + cpu.times.irq,
  }));
}

/**
 * Reads host CPU, memory and disk utilization. Each metric is read on its
 * own; a failing source leaves that field null instead of failing the
 * sample.
 */
export class SystemSampler {
  private sources: SystemSources;
  private diskPath: string;
  private lastCpuTimes: CpuTimes[];

  constructor(diskPath: string = DEFAULT_DISK_PATH, sources: Partial<SystemSources> = {}) {
    this.diskPath = diskPath;
    this.sources = { ...defaultSources, ...sources };
    this.lastCpuTimes = this.initCpuTimes();
  }

  async sample(): Promise<Sample> {
    const timestamp = new Date();
    const [cpu, memory, disk] = await Promise.allSettled([
      this.readCpu(),
      this.readMemory(),
      this.readDisk(),
    ]);

    const cpuPercent = this.settle('cpu', cpu);
    const mem = this.settle('memory', memory);
    const diskUsage = this.settle('disk', disk);

    return {
      timestamp,
      cpuPercent,
      memPercent: mem?.percent ?? null,
      memUsedBytes: mem?.used ?? null,
      memTotalBytes: mem?.total ?? null,
      diskPercent: diskUsage?.percent ?? null,
      diskUsedBytes: diskUsage?.used ?? null,
      diskTotalBytes: diskUsage?.total ?? null,
    };
  }

  private settle<T>(metric: MetricName, result: PromiseSettledResult<T>): T | null {
    if (result.status === 'fulfilled') return result.value;
    const err = new MetricUnavailableError(metric, { cause: result.reason });
    logger.warn({ err, metric }, 'System metric unavailable');
    return null;
  }

  private initCpuTimes(): CpuTimes[] {
    try {
      return cpuTimes(this.sources.cpus());
    } catch (err) {
      logger.debug({ err }, 'Initial CPU times unavailable');
      return [];
    }
  }

  private async readCpu(): Promise<number> {
    const current = cpuTimes(this.sources.cpus());
    if (current.length === 0) throw new Error('no CPUs reported');

    const previous = this.lastCpuTimes;
    this.lastCpuTimes = current;

    let busy = 0;
    let total = 0;
    current.forEach((now, i) => {
      const last = previous[i];
      if (!last) return;
      total += now.total - last.total;
      busy += now.total - last.total - (now.idle - last.idle);
    });

    return total > 0 ? round2((busy / total) * 100) : 0;
  }

  private async readMemory(): Promise<Usage> {
    const total = this.sources.totalmem();
    const free = this.sources.freemem();
    if (!(total > 0)) throw new Error(`invalid total memory: ${total}`);

    const used = total - free;
    return { percent: round2((used / total) * 100), used, total };
  }

  private async readDisk(): Promise<Usage> {
    const stats = await this.sources.statfs(this.diskPath);
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    const available = stats.bavail * stats.bsize;
    if (used + available <= 0) throw new Error(`no capacity reported for ${this.diskPath}`);

    return {
      percent: round2((used / (used + available)) * 100),
      used,
      total: stats.blocks * stats.bsize,
    };
  }
}
