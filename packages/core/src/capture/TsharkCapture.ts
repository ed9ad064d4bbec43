import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { CaptureConfig } from '@dhtwatch/shared';
import {
  CaptureCancelledError,
  CaptureError,
  CaptureTimeoutError,
  CaptureToolUnavailableError,
  getLogger,
} from '@dhtwatch/shared';
import { gracefulShutdown } from '../process/GracefulShutdown.js';

const logger = getLogger();

const STDERR_TAIL_BYTES = 2048;

/** Runs one bounded capture and streams its output lines. */
export interface CaptureRunner {
  run(durationMs: number, onLine: (line: string) => void, signal?: AbortSignal): Promise<void>;
}

export type TsharkOptions = Pick<
  CaptureConfig,
  'tool' | 'interface' | 'filter' | 'graceMs' | 'killTimeoutMs'
>;

/** Whole seconds handed to the tool's duration stop condition. */
export function captureSeconds(durationMs: number): number {
  return Math.max(1, Math.ceil(durationMs / 1000));
}

export function buildCaptureArgs(
  options: Pick<CaptureConfig, 'interface' | 'filter'>,
  durationMs: number,
): string[] {
  return [
    '-i',
    options.interface,
    '-f',
    options.filter,
    '-a',
    `duration:${captureSeconds(durationMs)}`,
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
  ];
}

/**
 * tshark-backed capture. The returned promise settles only once the child
 * has exited (or the kill escalation gave up) and its stdout is drained.
 */
export class TsharkCapture implements CaptureRunner {
  private options: TsharkOptions;

  constructor(options: TsharkOptions) {
    this.options = options;
  }

  run(durationMs: number, onLine: (line: string) => void, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CaptureCancelledError());
    }

    const { tool, graceMs, killTimeoutMs } = this.options;
    const args = buildCaptureArgs(this.options, durationMs);
    const timeoutMs = captureSeconds(durationMs) * 1000 + graceMs;

    return new Promise<void>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(tool, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        reject(new CaptureToolUnavailableError(tool, message, { cause: err }));
        return;
      }

      logger.debug({ tool, args, pid: child.pid }, 'Capture started');

      let failure: CaptureError | null = null;
      let exitCode: number | null = null;
      let exitSignal: NodeJS.Signals | null = null;
      let exited = false;
      let drained = false;
      let settled = false;
      let stderrTail = '';

      const lines = child.stdout ? createInterface({ input: child.stdout }) : null;
      if (lines) {
        lines.on('line', (line) => {
          if (failure === null) onLine(line);
        });
        lines.on('close', () => {
          drained = true;
          settle();
        });
      } else {
        drained = true;
      }

      child.stderr?.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES);
      });

      const terminate = () => {
        gracefulShutdown(child, { timeout: killTimeoutMs })
          .then(() => {
            exited = true;
            drained = true;
            lines?.close();
            settle();
          })
          .catch((err: unknown) => {
            logger.error({ err, pid: child.pid }, 'Failed to terminate capture process');
          });
      };

      const timer = setTimeout(() => {
        if (failure === null) failure = new CaptureTimeoutError(timeoutMs);
        logger.warn({ pid: child.pid, timeoutMs }, 'Capture timed out');
        terminate();
      }, timeoutMs);

      const onAbort = () => {
        if (failure === null) failure = new CaptureCancelledError();
        terminate();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.on('error', (err) => {
        if (failure === null) {
          failure = new CaptureToolUnavailableError(tool, err.message, { cause: err });
        }
        if (child.pid === undefined) {
          // never started, so no exit or close will follow
          exited = true;
          drained = true;
          lines?.close();
        }
        settle();
      });

      child.on('close', (code, sig) => {
        exited = true;
        exitCode = code;
        exitSignal = sig;
        settle();
      });

      function settle(): void {
        if (settled || !exited || !drained) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);

        if (failure !== null) {
          reject(failure);
          return;
        }
        if (exitCode !== 0) {
          const status = exitCode === null ? `signal ${String(exitSignal)}` : `code ${exitCode}`;
          const tail = stderrTail.trim();
          reject(
            new CaptureToolUnavailableError(
              tool,
              tail ? `exited with ${status}: ${tail}` : `exited with ${status}`,
            ),
          );
          return;
        }
        logger.debug({ pid: child.pid }, 'Capture finished');
        resolve();
      }
    });
  }
}
