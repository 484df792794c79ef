import type { Logger } from 'pino';
import { createChildLogger } from '../logger.js';
import { EXPORT_SEQUENCE, type ExportPortal } from '../portal/portal.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  AccountState,
  ErrorCodes,
  type AccountConfig,
  type AccountResult,
  type AccountStateType,
  type CleanupReport,
  type DateRange,
  type DownloadOutcome,
  type ExportError,
  type ExportJobEntry,
  type StateTransition,
} from '../types.js';
import { applyDateRange } from './date-range.js';
import { reconcileDownloads, type ReconcileOptions } from './download-reconciler.js';
import { cleanupExportList } from './job-list-cleaner.js';

// Pauses that give the portal time to react to UI actions
export const ACCOUNT_WAITS = {
  AFTER_LOGIN: 3000,
  AFTER_ORDER_LIST: 3000,
  AFTER_EXPORT: 2000,
  AFTER_EXPORT_LIST: 3000,
} as const;

// Allowed forward transitions; FAILED is reachable from every non-final state
const NEXT_STATE: Partial<Record<AccountStateType, AccountStateType>> = {
  [AccountState.IDLE]: AccountState.LOGGED_IN,
  [AccountState.LOGGED_IN]: AccountState.RANGE_SET,
  [AccountState.RANGE_SET]: AccountState.EXPORTED,
  [AccountState.EXPORTED]: AccountState.RECONCILED,
  [AccountState.RECONCILED]: AccountState.DONE,
};

export interface AccountRunOptions {
  downloadDir: string;
  range: DateRange;
  download?: Omit<ReconcileOptions, 'clock' | 'log'>;
  cleanupSettleMs?: number;
  clock?: Clock;
  log?: Logger;
}

/**
 * Thrown inside a step to end the account with a specific error
 */
class StepFailure extends Error {
  constructor(readonly error: ExportError) {
    super(error.message);
    this.name = 'StepFailure';
  }
}

function fail(code: ExportError['code'], message: string, retryable = true): never {
  throw new StepFailure({ code, message, retryable });
}

/**
 * Tracks the account's position in idle → logged_in → range_set → exported →
 * reconciled → done, with failed absorbing.
 */
class AccountStateMachine {
  private current: AccountStateType = AccountState.IDLE;
  readonly transitions: StateTransition[] = [];

  constructor(private readonly log: Logger) {}

  get state(): AccountStateType {
    return this.current;
  }

  advance(): void {
    const next = NEXT_STATE[this.current];
    if (!next) {
      throw new Error(`No transition out of state "${this.current}"`);
    }
    this.move(next);
  }

  failed(): void {
    if (this.current === AccountState.FAILED || this.current === AccountState.DONE) {
      return;
    }
    this.move(AccountState.FAILED);
  }

  private move(to: AccountStateType): void {
    this.transitions.push({ from: this.current, to, at: new Date().toISOString() });
    this.log.debug({ from: this.current, to }, 'Account state changed');
    this.current = to;
  }
}

/**
 * Runs the whole export cycle for one account on an already reset portal.
 *
 * Never throws: a failing step ends the account in the failed state and the
 * error is returned in the result. Download timeouts and cleanup problems
 * are reported but do not fail the account.
 */
export async function runAccount(
  portal: ExportPortal,
  account: AccountConfig,
  options: AccountRunOptions
): Promise<AccountResult> {
  const log = options.log ?? createChildLogger({ owner: account.owner });
  const clock = options.clock ?? systemClock;
  const machine = new AccountStateMachine(log);

  let downloads: DownloadOutcome[] = [];
  let cleanup: CleanupReport | undefined;
  let appliedRange: (DateRange & { verified: boolean }) | undefined;

  const finish = (error?: ExportError): AccountResult => {
    if (error) {
      machine.failed();
    }
    return {
      owner: account.owner,
      state: error ? AccountState.FAILED : AccountState.DONE,
      transitions: machine.transitions,
      error,
      range: appliedRange,
      downloads,
      cleanup,
    };
  };

  try {
    // Step 1: Log in
    log.info({ username: account.username }, 'Logging in');
    const login = await portal.login({ username: account.username, password: account.password });
    if (!login.found) {
      fail(ErrorCodes.UI_ELEMENT_NOT_FOUND, `Login form incomplete (${login.query})`);
    }
    await clock.sleep(ACCOUNT_WAITS.AFTER_LOGIN);
    if (!(await portal.isLoggedIn())) {
      fail(ErrorCodes.LOGIN_FAILED, `Login rejected for ${account.username}`, false);
    }
    log.info('Logged in');
    machine.advance();

    // Step 2: Filter the order list by date
    await portal.openOrderList();
    await clock.sleep(ACCOUNT_WAITS.AFTER_ORDER_LIST);
    const rangeResult = await applyDateRange(portal, options.range, { clock, log });
    if (!rangeResult.ok) {
      fail(rangeResult.error.code, rangeResult.error.message, rangeResult.error.retryable);
    }
    appliedRange = { ...(rangeResult.applied ?? rangeResult.requested), verified: rangeResult.verified };
    machine.advance();

    // Step 3: Trigger both exports
    for (const exportType of EXPORT_SEQUENCE) {
      log.info({ export_type: exportType }, 'Starting export');
      const triggered = await portal.triggerExport(exportType);
      if (!triggered.found) {
        fail(ErrorCodes.UI_ELEMENT_NOT_FOUND, `Export "${exportType}" control not found (${triggered.query})`);
      }
      await clock.sleep(ACCOUNT_WAITS.AFTER_EXPORT);
      try {
        await portal.closeExportDialog();
      } catch (err) {
        log.warn(
          { export_type: exportType, error: err instanceof Error ? err.message : String(err) },
          'Failed to close export dialog'
        );
      }
      await clock.sleep(ACCOUNT_WAITS.AFTER_EXPORT);
      log.info({ export_type: exportType }, 'Export started');
    }

    const listOpened = await portal.openExportList();
    if (!listOpened.found) {
      fail(ErrorCodes.UI_ELEMENT_NOT_FOUND, `Export list control not found (${listOpened.query})`);
    }
    await clock.sleep(ACCOUNT_WAITS.AFTER_EXPORT_LIST);
    machine.advance();

    // Step 4: Download the new files
    const entries: ExportJobEntry[] = await portal.listExportEntries();
    const totalCount = Math.max(0, entries.length - 1);
    log.info({ totalCount }, 'Export list loaded');

    downloads = await reconcileDownloads(portal, entries, account.owner, options.downloadDir, {
      ...options.download,
      clock,
      log,
    });
    machine.advance();

    // Step 5: Clear the export list
    cleanup = await cleanupExportList(portal, totalCount, {
      settleMs: options.cleanupSettleMs,
      clock,
      log,
    });
    machine.advance();

    log.info(
      {
        downloaded: downloads.filter((outcome) => outcome.status === 'downloaded').length,
        removed: cleanup.removed.length,
      },
      'Account export complete'
    );
    return finish();
  } catch (err) {
    const error: ExportError =
      err instanceof StepFailure
        ? err.error
        : {
            code: ErrorCodes.INTERNAL_ERROR,
            message: `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
            retryable: true,
          };

    log.error({ state: machine.state, code: error.code, error: error.message }, 'Account export failed');
    return finish(error);
  }
}
