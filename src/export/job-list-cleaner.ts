import type { Logger } from 'pino';
import { logger } from '../logger.js';
import type { ExportPortal } from '../portal/portal.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { ErrorCodes, type CleanupReport } from '../types.js';

export const DEFAULT_CLEANUP_SETTLE_MS = 1000;

export interface CleanupOptions {
  settleMs?: number;
  clock?: Clock;
  log?: Logger;
}

/**
 * Removes export list rows totalCount..1, highest index first.
 *
 * The list re-indexes after every delete; going downwards keeps the indices
 * of the rows still to be processed valid. Each delete is verified by
 * reading the row again after the settle wait. Best effort: a failed delete
 * is recorded and the remaining rows are still attempted.
 */
export async function cleanupExportList(
  portal: ExportPortal,
  totalCount: number,
  options: CleanupOptions = {}
): Promise<CleanupReport> {
  const log = (options.log ?? logger).child({ step: 'cleanup' });
  const settleMs = options.settleMs ?? DEFAULT_CLEANUP_SETTLE_MS;
  const clock = options.clock ?? systemClock;

  const report: CleanupReport = { visited: [], removed: [], failures: [] };

  for (let rowIndex = totalCount; rowIndex >= 1; rowIndex--) {
    report.visited.push(rowIndex);

    let rawName: string | undefined;
    try {
      const name = await portal.readEntryName(rowIndex);
      if (!name.found) {
        log.warn({ rowIndex, query: name.query }, 'Export list row not found, skipping');
        report.failures.push({
          rowIndex,
          error: {
            code: ErrorCodes.CLEANUP_FAILURE,
            message: `Row ${rowIndex} not found (${name.query})`,
            retryable: true,
          },
        });
        continue;
      }
      rawName = name.value;

      const deleted = await portal.deleteEntry(rowIndex);
      if (!deleted.found) {
        log.warn({ rowIndex, export_name: rawName, query: deleted.query }, 'Delete button not found');
        report.failures.push({
          rowIndex,
          rawName,
          error: {
            code: ErrorCodes.CLEANUP_FAILURE,
            message: `Delete control not found for "${rawName}" (${deleted.query})`,
            retryable: true,
          },
        });
        continue;
      }

      await clock.sleep(settleMs);

      // Rows above this one are untouched, so a successful delete leaves the
      // index empty or holding a different entry
      const after = await portal.readEntryName(rowIndex);
      if (after.found && after.value === rawName) {
        log.warn({ rowIndex, export_name: rawName }, 'Export record still listed after delete');
        report.failures.push({
          rowIndex,
          rawName,
          error: {
            code: ErrorCodes.CLEANUP_FAILURE,
            message: `Row ${rowIndex} still lists "${rawName}" after delete`,
            retryable: true,
          },
        });
        continue;
      }

      report.removed.push(rawName);
      log.info({ rowIndex, export_name: rawName }, 'Removed export record');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn({ rowIndex, export_name: rawName, error: message }, 'Failed to remove export record');
      report.failures.push({
        rowIndex,
        rawName,
        error: {
          code: ErrorCodes.CLEANUP_FAILURE,
          message: `Removing row ${rowIndex} failed: ${message}`,
          retryable: true,
        },
      });
    }
  }

  log.info(
    { removed: report.removed.length, failed: report.failures.length, totalCount },
    'Export list cleanup finished'
  );

  return report;
}
