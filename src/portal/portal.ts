import type { ExportJobEntry } from '../types.js';

/**
 * Result of a named element query. `query` names what was looked for so
 * the caller can log it without knowing the selector behind it.
 */
export type NotFound = { found: false; query: string };
export type Lookup<T> = { found: true; value: T } | NotFound;
export type Located = { found: true } | NotFound;

export const FOUND: Located = { found: true };

export function notFound(query: string): NotFound {
  return { found: false, query };
}

export type DateInputKind = 'start' | 'end';

export const ExportTypes = {
  ORDER_DETAILS: 'order_details',
  PRODUCT_DETAILS: 'product_details',
} as const;

export type ExportType = (typeof ExportTypes)[keyof typeof ExportTypes];

// Triggered in this order; the export list shows the newest entries first
export const EXPORT_SEQUENCE: readonly ExportType[] = [ExportTypes.ORDER_DETAILS, ExportTypes.PRODUCT_DETAILS];

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Everything the export flow needs from the portal's UI.
 *
 * Site coupling (URLs, selectors, label text) stays inside implementations;
 * callers only see named operations and Found/NotFound results. Unexpected
 * driver failures (crashed page, navigation timeout) are thrown.
 */
export interface ExportPortal {
  /** Fills and submits the login form */
  login(credentials: Credentials): Promise<Located>;

  /** True once the browser has left the login page */
  isLoggedIn(): Promise<boolean>;

  openOrderList(): Promise<void>;

  setDateInput(kind: DateInputKind, value: string): Promise<Located>;

  readDateInput(kind: DateInputKind): Promise<Lookup<string>>;

  submitSearch(): Promise<Located>;

  /** Opens the export menu and starts one export job */
  triggerExport(type: ExportType): Promise<Located>;

  /** Dismisses the "export started" dialog if one is showing */
  closeExportDialog(): Promise<void>;

  openExportList(): Promise<Located>;

  /** Current rows of the export list, placeholder row 0 included */
  listExportEntries(): Promise<ExportJobEntry[]>;

  readEntryName(rowIndex: number): Promise<Lookup<string>>;

  /** Starts the row's download and saves it as targetDir/fileName */
  downloadEntry(rowIndex: number, targetDir: string, fileName: string): Promise<Located>;

  deleteEntry(rowIndex: number): Promise<Located>;
}
