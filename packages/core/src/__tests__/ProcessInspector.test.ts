import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockPidusage = vi.fn();
vi.mock('pidusage', () => ({
  default: (...args: unknown[]) => mockPidusage(...args),
}));

const mockExecFile = vi.fn();
vi.mock('node:child_process', () => ({
  execFile: (...args: unknown[]) => mockExecFile(...args),
}));

import { ProcessInspector, lookupPid } from '../metrics/ProcessInspector.js';

type ExecCallback = (err: (Error & { code?: number }) | null, stdout: string, stderr: string) => void;

function pgrepReturns(stdout: string): void {
  mockExecFile.mockImplementation(
    (_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => cb(null, stdout, ''),
  );
}

function pgrepFails(code: number, message: string = 'Command failed: pgrep'): void {
  mockExecFile.mockImplementation(
    (_file: string, _args: string[], _opts: unknown, cb: ExecCallback) =>
      cb(Object.assign(new Error(message), { code }), '', ''),
  );
}

describe('lookupPid', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should run pgrep with an exact name match and timeout', async () => {
    pgrepReturns('812\n');

    await expect(lookupPid('dna-nodus', 1500)).resolves.toBe(812);
    expect(mockExecFile).toHaveBeenCalledWith(
      'pgrep',
      ['-o', '-x', 'dna-nodus'],
      { timeout: 1500 },
      expect.any(Function),
    );
  });

  it('should resolve null when no process matched', async () => {
    pgrepFails(1);

    await expect(lookupPid('dna-nodus')).resolves.toBeNull();
  });

  it('should reject on other pgrep failures', async () => {
    pgrepFails(2, 'pgrep: invalid option');

    await expect(lookupPid('dna-nodus')).rejects.toThrow('pgrep: invalid option');
  });
});

describe('ProcessInspector', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return null when no process is watched', async () => {
    const inspector = new ProcessInspector(null);

    await expect(inspector.inspect()).resolves.toBeNull();
    expect(mockExecFile).not.toHaveBeenCalled();
  });

  it('should report usage for a running process', async () => {
    pgrepReturns('812\n');
    mockPidusage.mockResolvedValue({ cpu: 3.456, memory: 52_428_800, elapsed: 90_500 });

    const info = await new ProcessInspector('dna-nodus').inspect();

    expect(mockPidusage).toHaveBeenCalledWith(812);
    expect(info).toEqual({
      name: 'dna-nodus',
      running: true,
      pid: 812,
      cpuPercent: 3.46,
      memoryBytes: 52_428_800,
      uptimeSeconds: 90,
    });
  });

  it('should report a missing process as not running', async () => {
    pgrepFails(1);

    const info = await new ProcessInspector('dna-nodus').inspect();

    expect(info).toEqual({
      name: 'dna-nodus',
      running: false,
      pid: null,
      cpuPercent: null,
      memoryBytes: null,
      uptimeSeconds: null,
    });
  });

  it('should treat a failed lookup as not running', async () => {
    pgrepFails(127, 'spawn pgrep ENOENT');

    const info = await new ProcessInspector('dna-nodus').inspect();

    expect(info?.running).toBe(false);
  });

  it('should keep the pid when usage cannot be read', async () => {
    pgrepReturns('812\n');
    mockPidusage.mockRejectedValue(new Error('No matching pid found'));

    const info = await new ProcessInspector('dna-nodus').inspect();

    expect(info).toMatchObject({ running: true, pid: 812, cpuPercent: null });
  });
});
