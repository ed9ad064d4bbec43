import type { ChildProcess } from 'node:child_process';
import { DEFAULT_KILL_TIMEOUT, getLogger } from '@dhtwatch/shared';

const logger = getLogger();

export interface ShutdownOptions {
  timeout?: number;
}

/**
 * Terminate a child process and wait until it has exited.
 *
 * Sequence:
 * 1. Send SIGTERM
 * 2. Wait for timeout
 * 3. Send SIGKILL
 * 4. Resolve on exit, or 500ms after SIGKILL at the latest
 */
export function gracefulShutdown(
  child: ChildProcess,
  options: ShutdownOptions = {},
): Promise<number | null> {
  const { timeout = DEFAULT_KILL_TIMEOUT } = options;

  return new Promise((resolve) => {
    let resolved = false;

    const done = (code: number | null) => {
      if (!resolved) {
        resolved = true;
        resolve(code);
      }
    };

    child.once('exit', (code: number | null) => done(code));

    if (child.exitCode !== null || child.signalCode !== null) {
      done(child.exitCode);
      return;
    }

    if (!signal(child, 'SIGTERM')) {
      done(null);
      return;
    }

    const killTimer = setTimeout(() => {
      if (resolved) return;
      signal(child, 'SIGKILL');
      // Give SIGKILL a moment to take effect
      setTimeout(() => done(null), 500).unref();
    }, timeout);

    killTimer.unref();
  });
}

function signal(child: ChildProcess, name: NodeJS.Signals): boolean {
  try {
    return child.kill(name);
  } catch (err) {
    logger.debug({ err, pid: child.pid, signal: name }, 'Failed to signal child process');
    return false;
  }
}
