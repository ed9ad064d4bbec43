import { execFile } from 'node:child_process';
import pidusage from 'pidusage';
import type { ProcessInfo } from '@dhtwatch/shared';
import { PROCESS_LOOKUP_TIMEOUT, getLogger } from '@dhtwatch/shared';

const logger = getLogger();

/** Resolve the pid of the oldest process whose name is exactly `name`. */
export function lookupPid(
  name: string,
  timeoutMs: number = PROCESS_LOOKUP_TIMEOUT,
): Promise<number | null> {
  return new Promise((resolve, reject) => {
    execFile('pgrep', ['-o', '-x', name], { timeout: timeoutMs }, (err, stdout) => {
      if (err) {
        // pgrep exits 1 when nothing matched
        if (err.code === 1) {
          resolve(null);
          return;
        }
        reject(err);
        return;
      }
      const pid = Number.parseInt(stdout.trim().split('\n')[0] ?? '', 10);
      resolve(Number.isNaN(pid) ? null : pid);
    });
  });
}

function notRunning(name: string): ProcessInfo {
  return {
    name,
    running: false,
    pid: null,
    cpuPercent: null,
    memoryBytes: null,
    uptimeSeconds: null,
  };
}

/**
 * Reports on the DHT daemon process running next to the monitor. Lookups
 * are bounded by a timeout; any failure reads as "not running".
 */
export class ProcessInspector {
  private name: string | null;
  private timeoutMs: number;

  constructor(name: string | null, timeoutMs: number = PROCESS_LOOKUP_TIMEOUT) {
    this.name = name;
    this.timeoutMs = timeoutMs;
  }

  async inspect(): Promise<ProcessInfo | null> {
    const name = this.name;
    if (name === null) return null;

    let pid: number | null;
    try {
      pid = await lookupPid(name, this.timeoutMs);
    } catch (err) {
      logger.warn({ err, process: name }, 'Process lookup failed');
      return notRunning(name);
    }
    if (pid === null) return notRunning(name);

    try {
      const stat = await pidusage(pid);
      return {
        name,
        running: true,
        pid,
        cpuPercent: Math.round(stat.cpu * 100) / 100,
        memoryBytes: stat.memory,
        uptimeSeconds: Math.floor(stat.elapsed / 1000),
      };
    } catch (err) {
      // process may have exited between lookup and measurement
      logger.debug({ err, pid }, 'Process usage unavailable');
      return { ...notRunning(name), running: true, pid };
    }
  }
}
