import { z } from 'zod';

// Error codes for the export runner
export const ErrorCodes = {
  INVALID_CONFIG: 'INVALID_CONFIG',
  LOGIN_FAILED: 'LOGIN_FAILED',
  UI_ELEMENT_NOT_FOUND: 'UI_ELEMENT_NOT_FOUND',
  VERIFICATION_MISMATCH: 'VERIFICATION_MISMATCH',
  DOWNLOAD_TIMEOUT: 'DOWNLOAD_TIMEOUT',
  DOWNLOAD_FAILED: 'DOWNLOAD_FAILED',
  INVALID_ENTRY_NAME: 'INVALID_ENTRY_NAME',
  CLEANUP_FAILURE: 'CLEANUP_FAILURE',
  SESSION_RESET_FAILED: 'SESSION_RESET_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Error structure
export interface ExportError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

// Account processing states
export const AccountState = {
  IDLE: 'idle',
  LOGGED_IN: 'logged_in',
  RANGE_SET: 'range_set',
  EXPORTED: 'exported',
  RECONCILED: 'reconciled',
  DONE: 'done',
  FAILED: 'failed',
} as const;

export type AccountStateType = (typeof AccountState)[keyof typeof AccountState];

// ============================================================================
// config.json Schema
// ============================================================================

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be formatted as YYYY-MM-DD');

export const AccountConfigSchema = z.object({
  // Used as a directory name and inside file names, so a single path segment
  owner: z
    .string()
    .min(1)
    .refine((value) => !/[\\/]/.test(value) && value !== '.' && value !== '..', {
      message: 'must be a single path segment',
    }),
  username: z.string().min(1),
  password: z.string().min(1),
});

export type AccountConfig = z.infer<typeof AccountConfigSchema>;

export const SettingsSchema = z.object({
  browser_path: z.string().min(1).optional(),
  download_path: z.string().min(1),
  start_date: IsoDateSchema,
});

export type Settings = z.infer<typeof SettingsSchema>;

export const ConfigFileSchema = z
  .object({
    accounts: z.array(AccountConfigSchema).min(1, 'at least one account is required'),
    settings: SettingsSchema,
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.accounts.forEach((account, index) => {
      if (seen.has(account.owner)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['accounts', index, 'owner'],
          message: `duplicate owner "${account.owner}"`,
        });
      }
      seen.add(account.owner);
    });
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// Configuration
export interface Config {
  accounts: AccountConfig[];
  settings: Settings;
  portalBaseUrl: string;
  playwrightHeadless: boolean;
  playwrightTimeout: number;
  downloadTimeoutMs: number;
  downloadPollIntervalMs: number;
  // Consecutive equal-size polls required before a download counts as arrived
  downloadStableChecks: number;
  cleanupSettleMs: number;
}

// ============================================================================
// Export list and download results
// ============================================================================

/**
 * One row of the remote export job list. Row 0 is the table's placeholder
 * row; real entries start at 1 and shift down as rows are deleted.
 */
export interface ExportJobEntry {
  rawName: string;
  rowIndex: number;
}

export interface DownloadTarget {
  baseName: string;
  canonicalName: string;
  fileName: string;
  filePath: string;
}

export type DownloadOutcome =
  | {
      status: 'downloaded';
      rowIndex: number;
      rawName: string;
      filePath: string;
    }
  | {
      status: 'timed_out' | 'failed';
      rowIndex: number;
      rawName?: string;
      filePath?: string;
      error: ExportError;
    };

export interface CleanupFailure {
  rowIndex: number;
  rawName?: string;
  error: ExportError;
}

export interface CleanupReport {
  visited: number[];
  removed: string[];
  failures: CleanupFailure[];
}

export interface DateRange {
  start: string;
  end: string;
}

// State transition recorded by the account runner
export interface StateTransition {
  from: AccountStateType;
  to: AccountStateType;
  at: string;
}

export interface AccountResult {
  owner: string;
  state: typeof AccountState.DONE | typeof AccountState.FAILED;
  transitions: StateTransition[];
  error?: ExportError;
  range?: DateRange & { verified: boolean };
  downloads: DownloadOutcome[];
  cleanup?: CleanupReport;
}

export interface BatchSummary {
  runId: string;
  succeeded: number;
  failed: number;
  results: AccountResult[];
}
