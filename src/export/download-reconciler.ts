import fsp from 'node:fs/promises';
import type { Logger } from 'pino';
import { logger } from '../logger.js';
import type { ExportPortal } from '../portal/portal.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { ErrorCodes, type DownloadOutcome, type ExportJobEntry } from '../types.js';
import { deriveDownloadTarget } from './download-target.js';
import {
  awaitFile,
  DEFAULT_FILE_POLL_INTERVAL_MS,
  DEFAULT_FILE_WAIT_TIMEOUT_MS,
} from './file-waiter.js';

// The two newest exports sit right below the placeholder row
export const DEFAULT_DOWNLOAD_POSITIONS: readonly number[] = [1, 2];

export interface ReconcileOptions {
  positions?: readonly number[];
  timeoutMs?: number;
  pollIntervalMs?: number;
  stableChecks?: number;
  clock?: Clock;
  log?: Logger;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Downloads one export entry to its canonical path.
 * Never throws: every problem becomes a failed or timed_out outcome.
 */
async function downloadOne(
  portal: ExportPortal,
  entry: ExportJobEntry,
  owner: string,
  downloadDir: string,
  options: ReconcileOptions,
  parentLog: Logger
): Promise<DownloadOutcome> {
  const { rowIndex, rawName } = entry;
  const target = deriveDownloadTarget(rawName, owner, downloadDir);

  if (!target) {
    parentLog.error({ rowIndex, export_name: rawName }, 'Export name does not yield a file name');
    return {
      status: 'failed',
      rowIndex,
      rawName,
      error: {
        code: ErrorCodes.INVALID_ENTRY_NAME,
        message: `Export "${rawName}" has no usable name prefix`,
        retryable: false,
      },
    };
  }

  const log = parentLog.child({ rowIndex, export_name: target.baseName, file: target.fileName });

  try {
    // A leftover from an earlier run would satisfy the wait below on its own
    if (await fileExists(target.filePath)) {
      await fsp.rm(target.filePath, { force: true });
      log.info({ path: target.filePath }, 'Removed existing file before download');
    }

    const triggered = await portal.downloadEntry(rowIndex, downloadDir, target.fileName);
    if (!triggered.found) {
      log.error({ query: triggered.query }, 'Download button not found');
      return {
        status: 'failed',
        rowIndex,
        rawName,
        filePath: target.filePath,
        error: {
          code: ErrorCodes.UI_ELEMENT_NOT_FOUND,
          message: `Download control not found for "${rawName}" (${triggered.query})`,
          retryable: true,
        },
      };
    }

    const waitResult = await awaitFile(target.filePath, {
      timeoutMs: options.timeoutMs ?? DEFAULT_FILE_WAIT_TIMEOUT_MS,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_FILE_POLL_INTERVAL_MS,
      stableChecks: options.stableChecks,
      clock: options.clock ?? systemClock,
    });

    if (waitResult.status === 'timed_out') {
      log.warn({ elapsedMs: waitResult.elapsedMs }, 'Download timed out');
      return {
        status: 'timed_out',
        rowIndex,
        rawName,
        filePath: target.filePath,
        error: {
          code: ErrorCodes.DOWNLOAD_TIMEOUT,
          message: `${target.fileName} did not appear within ${waitResult.elapsedMs}ms`,
          retryable: true,
        },
      };
    }

    log.info(
      { path: target.filePath, sizeBytes: waitResult.sizeBytes, elapsedMs: waitResult.elapsedMs },
      'Downloaded export'
    );
    return { status: 'downloaded', rowIndex, rawName, filePath: target.filePath };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error({ error: message }, 'Download failed');
    return {
      status: 'failed',
      rowIndex,
      rawName,
      filePath: target.filePath,
      error: {
        code: ErrorCodes.DOWNLOAD_FAILED,
        message: `Download of "${rawName}" failed: ${message}`,
        retryable: true,
      },
    };
  }
}

/**
 * Downloads the entries at the configured list positions under their
 * canonical names, one at a time.
 *
 * Partial-failure tolerant: a timed-out or failed item is recorded and the
 * next one is still processed. Every `downloaded` outcome has a file at its
 * filePath when this resolves.
 */
export async function reconcileDownloads(
  portal: ExportPortal,
  entries: readonly ExportJobEntry[],
  owner: string,
  downloadDir: string,
  options: ReconcileOptions = {}
): Promise<DownloadOutcome[]> {
  const log = (options.log ?? logger).child({ step: 'download', owner });
  const positions = options.positions ?? DEFAULT_DOWNLOAD_POSITIONS;
  const outcomes: DownloadOutcome[] = [];

  for (const position of positions) {
    const entry = entries.find((candidate) => candidate.rowIndex === position);
    if (!entry) {
      log.warn({ rowIndex: position, listed: entries.length }, 'No export entry at position');
      outcomes.push({
        status: 'failed',
        rowIndex: position,
        error: {
          code: ErrorCodes.UI_ELEMENT_NOT_FOUND,
          message: `Export list has no entry at position ${position}`,
          retryable: true,
        },
      });
      continue;
    }

    outcomes.push(await downloadOne(portal, entry, owner, downloadDir, options, log));
  }

  const downloaded = outcomes.filter((outcome) => outcome.status === 'downloaded').length;
  log.info({ downloaded, attempted: outcomes.length }, 'Downloads reconciled');

  return outcomes;
}
