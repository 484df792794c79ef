import fsp from 'node:fs/promises';
import { systemClock, type Clock } from '../utils/clock.js';

export const DEFAULT_FILE_WAIT_TIMEOUT_MS = 30000;
export const DEFAULT_FILE_POLL_INTERVAL_MS = 1000;

export interface FileWaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  /**
   * Number of consecutive polls that must report the same size after the
   * file first appears. 0 treats existence alone as completion.
   */
  stableChecks?: number;
  clock?: Clock;
}

export type FileWaitOutcome =
  | { status: 'arrived'; path: string; elapsedMs: number; sizeBytes: number }
  | { status: 'timed_out'; path: string; elapsedMs: number };

/**
 * Returns the file size, or null when nothing (or not a regular file) is at the path
 */
async function statSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fsp.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

/**
 * Polls for a file until it exists or the deadline passes.
 *
 * The first check runs immediately; after that one check per poll interval.
 * `timed_out` is only reported once the full timeout has elapsed.
 */
export async function awaitFile(filePath: string, options: FileWaitOptions = {}): Promise<FileWaitOutcome> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FILE_WAIT_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_FILE_POLL_INTERVAL_MS;
  const stableChecks = Math.max(0, options.stableChecks ?? 0);
  const clock = options.clock ?? systemClock;

  const startTime = clock.now();
  let lastSize: number | null = null;
  let stableCount = 0;

  for (;;) {
    const elapsedMs = clock.now() - startTime;
    const size = await statSize(filePath);

    if (size !== null) {
      if (stableChecks === 0) {
        return { status: 'arrived', path: filePath, elapsedMs, sizeBytes: size };
      }
      stableCount = size === lastSize ? stableCount + 1 : 0;
      lastSize = size;
      if (stableCount >= stableChecks) {
        return { status: 'arrived', path: filePath, elapsedMs, sizeBytes: size };
      }
    } else {
      lastSize = null;
      stableCount = 0;
    }

    if (elapsedMs >= timeoutMs) {
      return { status: 'timed_out', path: filePath, elapsedMs };
    }

    await clock.sleep(Math.min(pollIntervalMs, timeoutMs - elapsedMs));
  }
}
