import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { ChildProcess } from 'node:child_process';
import {
  CaptureCancelledError,
  CaptureTimeoutError,
  CaptureToolUnavailableError,
} from '@dhtwatch/shared';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

import { spawn } from 'node:child_process';
import { TsharkCapture, buildCaptureArgs } from '../capture/TsharkCapture.js';

const spawnMock = vi.mocked(spawn);

interface MockCapture {
  child: ChildProcess;
  stdout: PassThrough;
  stderr: PassThrough;
  kill: ReturnType<typeof vi.fn>;
}

function createMockCapture(pid: number | undefined = 4242): MockCapture {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const kill = vi.fn().mockReturnValue(true);
  const child = Object.assign(new EventEmitter(), {
    pid,
    stdin: null,
    stdout,
    stderr,
    exitCode: null,
    signalCode: null,
    killed: false,
    kill,
  }) as unknown as ChildProcess;
  return { child, stdout, stderr, kill };
}

const OPTIONS = {
  tool: 'tshark',
  interface: 'any',
  filter: 'udp port 4000',
  graceMs: 1000,
  killTimeoutMs: 2000,
};

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('buildCaptureArgs', () => {
  it('should round the duration up to whole seconds', () => {
    const args = buildCaptureArgs({ interface: 'eth0', filter: 'udp port 4000' }, 4500);

    expect(args).toEqual([
      '-i',
      'eth0',
      '-f',
      'udp port 4000',
      '-a',
      'duration:5',
      '-T',
      'fields',
      '-e',
      'ip.src',
      '-e',
      'ip.dst',
      '-e',
      'frame.len',
      '-l',
      '-q',
    ]);
  });
});

describe('TsharkCapture', () => {
  let mock: MockCapture;

  beforeEach(() => {
    mock = createMockCapture();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(mock.child);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should spawn the configured tool with piped output', async () => {
    const capture = new TsharkCapture(OPTIONS);
    const promise = capture.run(5000, () => undefined);
    mock.stdout.end();
    mock.child.emit('close', 0, null);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith(
      'tshark',
      buildCaptureArgs(OPTIONS, 5000),
      { stdio: ['ignore', 'pipe', 'pipe'] },
    );
  });

  it('should stream every output line to the callback', async () => {
    const capture = new TsharkCapture(OPTIONS);
    const lines: string[] = [];
    const promise = capture.run(5000, (line) => lines.push(line));

    mock.stdout.write('10.0.0.1\t192.168.1.10\t500\n');
    mock.stdout.end('10.0.0.2\t192.168.1.10\t1500\n');
    mock.child.emit('close', 0, null);
    await promise;

    expect(lines).toEqual(['10.0.0.1\t192.168.1.10\t500', '10.0.0.2\t192.168.1.10\t1500']);
  });

  it('should reject when the tool cannot be spawned', async () => {
    mock = createMockCapture(undefined);
    spawnMock.mockReturnValue(mock.child);
    const capture = new TsharkCapture(OPTIONS);
    const promise = capture.run(5000, () => undefined);

    mock.child.emit('error', Object.assign(new Error('spawn tshark ENOENT'), { code: 'ENOENT' }));

    await expect(promise).rejects.toBeInstanceOf(CaptureToolUnavailableError);
    await expect(promise).rejects.toThrow('Capture tool unavailable (tshark): spawn tshark ENOENT');
  });

  it('should reject with the stderr tail on a non-zero exit', async () => {
    const capture = new TsharkCapture(OPTIONS);
    const promise = capture.run(5000, () => undefined);

    mock.stderr.write('tshark: You do not have permission to capture on that device.\n');
    await nextTurn();
    mock.stdout.end();
    mock.child.emit('close', 2, null);

    await expect(promise).rejects.toThrow(
      'Capture tool unavailable (tshark): exited with code 2: tshark: You do not have permission to capture on that device.',
    );
  });

  it('should terminate and reject when the capture overruns', async () => {
    vi.useFakeTimers();
    const capture = new TsharkCapture(OPTIONS);
    const promise = capture.run(5000, () => undefined);
    const assertion = expect(promise).rejects.toBeInstanceOf(CaptureTimeoutError);

    await vi.advanceTimersByTimeAsync(5999);
    expect(mock.kill).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(mock.kill).toHaveBeenCalledWith('SIGTERM');

    mock.child.emit('exit', null, 'SIGTERM');
    await assertion;
  });

  it('should time a fractional window from the whole seconds given to the tool', async () => {
    vi.useFakeTimers();
    const capture = new TsharkCapture(OPTIONS);
    const promise = capture.run(1500, () => undefined);
    const assertion = expect(promise).rejects.toThrow('3000ms');

    expect(spawnMock.mock.calls[0]?.[1]).toContain('duration:2');

    await vi.advanceTimersByTimeAsync(2999);
    expect(mock.kill).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(mock.kill).toHaveBeenCalledWith('SIGTERM');

    mock.child.emit('exit', null, 'SIGTERM');
    await assertion;
  });

  it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
    vi.useFakeTimers();
    const capture = new TsharkCapture(OPTIONS);
    const promise = capture.run(5000, () => undefined);
    const assertion = expect(promise).rejects.toBeInstanceOf(CaptureTimeoutError);

    await vi.advanceTimersByTimeAsync(6000 + 2000 + 500);

    expect(mock.kill.mock.calls).toEqual([['SIGTERM'], ['SIGKILL']]);
    await assertion;
  });

  it('should stop forwarding lines once the capture has timed out', async () => {
    vi.useFakeTimers();
    const capture = new TsharkCapture(OPTIONS);
    const lines: string[] = [];
    const promise = capture.run(5000, (line) => lines.push(line));
    const assertion = expect(promise).rejects.toBeInstanceOf(CaptureTimeoutError);

    await vi.advanceTimersByTimeAsync(6000);
    mock.stdout.write('10.0.0.1\t192.168.1.10\t500\n');
    await vi.advanceTimersByTimeAsync(0);
    mock.child.emit('exit', null, 'SIGTERM');
    await assertion;

    expect(lines).toEqual([]);
  });

  it('should cancel the capture when the signal aborts', async () => {
    const capture = new TsharkCapture(OPTIONS);
    const controller = new AbortController();
    const promise = capture.run(5000, () => undefined, controller.signal);

    controller.abort();
    expect(mock.kill).toHaveBeenCalledWith('SIGTERM');
    mock.child.emit('exit', null, 'SIGTERM');

    await expect(promise).rejects.toBeInstanceOf(CaptureCancelledError);
  });

  it('should not spawn when the signal is already aborted', async () => {
    const capture = new TsharkCapture(OPTIONS);
    const controller = new AbortController();
    controller.abort();

    await expect(capture.run(5000, () => undefined, controller.signal)).rejects.toBeInstanceOf(
      CaptureCancelledError,
    );
    expect(spawnMock).not.toHaveBeenCalled();
  });
});
