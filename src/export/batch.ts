import fsp from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { createChildLogger } from '../logger.js';
import type { ExportPortal } from '../portal/portal.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  AccountState,
  ErrorCodes,
  type AccountResult,
  type BatchSummary,
  type Config,
} from '../types.js';
import { buildDateRange } from './date-range.js';
import { runAccount } from './account-runner.js';

/**
 * The browser shared by every account. `reset` tears down whatever the
 * previous account left open and hands out a fresh portal whose downloads
 * go to downloadDir.
 */
export interface PortalSession {
  reset(downloadDir: string): Promise<ExportPortal>;
}

export interface BatchOptions {
  runId?: string;
  clock?: Clock;
  now?: Date;
}

/**
 * Resolves <download_path>/<owner>
 */
export function userDownloadDir(downloadPath: string, owner: string): string {
  return path.resolve(downloadPath, owner);
}

/**
 * Processes every configured account in order on one shared session.
 *
 * One account's failure never stops the loop; the summary counts accounts
 * that reached done against those that ended failed.
 */
export async function runBatch(
  session: PortalSession,
  config: Pick<Config, 'accounts' | 'settings'> &
    Partial<Pick<Config, 'downloadTimeoutMs' | 'downloadPollIntervalMs' | 'downloadStableChecks' | 'cleanupSettleMs'>>,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const runId = options.runId ?? uuidv4();
  const clock = options.clock ?? systemClock;
  const log = createChildLogger({ run_id: runId });
  const range = buildDateRange(config.settings.start_date, options.now);
  const { accounts } = config;

  await fsp.mkdir(config.settings.download_path, { recursive: true });
  log.info({ accounts: accounts.length, start: range.start, end: range.end }, 'Starting export run');

  const results: AccountResult[] = [];

  for (const [index, account] of accounts.entries()) {
    const accountLog = log.child({ owner: account.owner });
    const downloadDir = userDownloadDir(config.settings.download_path, account.owner);
    accountLog.info({ position: index + 1, total: accounts.length, downloadDir }, 'Processing account');

    let portal: ExportPortal;
    try {
      portal = await session.reset(downloadDir);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      accountLog.error({ error: message }, 'Could not prepare browser for account');
      results.push({
        owner: account.owner,
        state: AccountState.FAILED,
        transitions: [],
        error: { code: ErrorCodes.SESSION_RESET_FAILED, message, retryable: true },
        downloads: [],
      });
      continue;
    }

    const result = await runAccount(portal, account, {
      downloadDir,
      range,
      download: {
        timeoutMs: config.downloadTimeoutMs,
        pollIntervalMs: config.downloadPollIntervalMs,
        stableChecks: config.downloadStableChecks,
      },
      cleanupSettleMs: config.cleanupSettleMs,
      clock,
      log: accountLog,
    });
    results.push(result);
  }

  const succeeded = results.filter((result) => result.state === AccountState.DONE).length;
  const failed = results.length - succeeded;

  log.info({ succeeded, failed }, `Processing complete: ${succeeded} succeeded, ${failed} failed`);

  return { runId, succeeded, failed, results };
}
