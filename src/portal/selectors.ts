/**
 * Portal UI Selectors and Locator Strategies
 *
 * Every selector, label and page path the export flow touches lives here.
 * When the portal UI changes, update this file and bump SELECTORS_VERSION.
 */

import type { Page, Locator } from 'playwright';
import { ExportTypes, type DateInputKind, type ExportType } from './portal.js';

export const SELECTORS_VERSION = '2024.2';

// ============================================================================
// TIMEOUTS (centralized for easy tuning)
// ============================================================================

export const TIMEOUTS = {
  // Default element visibility
  ELEMENT_VISIBLE: 10000,
  // Menu opened by hovering the export trigger
  MENU_OPEN: 2000,
  // Wait for the download event after clicking a row's download button
  DOWNLOAD_START: 30000,
  // Export dialog close button
  DIALOG_CLOSE: 1000,
  // Single quick existence probe
  PROBE: 1500,
} as const;

// ============================================================================
// PAGES
// ============================================================================

export const PATHS = {
  LOGIN: '/Login',
  ORDER_LIST: '/PM/orderList',
} as const;

// ============================================================================
// TEXT CONSTANTS (labels as the portal renders them)
// ============================================================================

export const TEXT = {
  EXPORT_ORDER_DETAILS: '导出订单明细',
  EXPORT_PRODUCT_DETAILS: '导出商品明细',
  EXPORT_LIST: '导出列表',
  DOWNLOAD: '下载',
  DELETE: '删除',
} as const;

const EXPORT_MENU_LABELS: Record<ExportType, string> = {
  [ExportTypes.ORDER_DETAILS]: TEXT.EXPORT_ORDER_DETAILS,
  [ExportTypes.PRODUCT_DETAILS]: TEXT.EXPORT_PRODUCT_DETAILS,
};

export function exportMenuLabel(type: ExportType): string {
  return EXPORT_MENU_LABELS[type];
}

// ============================================================================
// NAMED QUERIES
// ============================================================================

/**
 * Raw CSS/XPath strings, keyed by the name reported in NotFound results
 */
export const QUERIES = {
  loginUsername: 'input[name="username"]',
  loginPassword: 'input[type="password"]',
  loginSubmit: 'button[type="submit"], input[type="submit"]',
  searchButton: '.zen_btn.zen_btn-primary',
  dateStart: 'input.ZenDatePicker-input-start',
  dateEnd: 'input.ZenDatePicker-input-end',
  operateArea: 'div.operateArea',
  exportMenuTrigger: 'div.ZenDropMenu-trigger',
  exportMenuItem: 'span.ZenSelect-item-text',
  exportDialogClose: 'span.closeBtn',
  exportTableRows: 'div[class*="ZenTable-table-body"] > div',
  rowName: 'xpath=./div[1]//span',
  rowCell: 'div[class*="ZenTable-table-td"]',
} as const;

export type QueryName = keyof typeof QUERIES;

// ============================================================================
// LOGIN
// ============================================================================

export function getUsernameInput(page: Page): Locator {
  return page.locator(QUERIES.loginUsername).first();
}

export function getPasswordInput(page: Page): Locator {
  return page.locator(QUERIES.loginPassword).first();
}

export function getLoginSubmitButton(page: Page): Locator {
  return page.locator(QUERIES.loginSubmit).first();
}

// ============================================================================
// ORDER LIST FILTER
// ============================================================================

export function getDateInput(page: Page, kind: DateInputKind): Locator {
  return page.locator(kind === 'start' ? QUERIES.dateStart : QUERIES.dateEnd).first();
}

export function dateInputQuery(kind: DateInputKind): QueryName {
  return kind === 'start' ? 'dateStart' : 'dateEnd';
}

export function getSearchButton(page: Page): Locator {
  return page.locator(QUERIES.searchButton).first();
}

/**
 * Script that writes a date picker value and fires the events the picker
 * listens to. Returns true when the input exists.
 */
export function buildSetDateScript(kind: DateInputKind, value: string): string {
  const selector = kind === 'start' ? QUERIES.dateStart : QUERIES.dateEnd;
  return `(() => {
    const input = document.querySelector(${JSON.stringify(selector)});
    if (!input) return false;
    input.value = ${JSON.stringify(value)};
    input.dispatchEvent(new Event('change', { bubbles: true }));
    input.dispatchEvent(new Event('input', { bubbles: true }));
    return true;
  })()`;
}

// ============================================================================
// EXPORT MENU
// ============================================================================

/**
 * Gets the export drop-down trigger in the toolbar above the order table
 */
export function getExportMenuTrigger(page: Page): Locator {
  return page.locator(QUERIES.operateArea).locator(QUERIES.exportMenuTrigger).first();
}

/**
 * Gets an item of the opened export drop-down by its label
 */
export function getExportMenuItem(page: Page, type: ExportType): Locator {
  return page.locator(QUERIES.exportMenuItem).filter({ hasText: exportMenuLabel(type) }).first();
}

export function getExportDialogCloseButton(page: Page): Locator {
  return page.locator(QUERIES.exportDialogClose).first();
}

export function getExportListButton(page: Page): Locator {
  return page
    .locator(QUERIES.operateArea)
    .locator('button[type="button"]')
    .filter({ hasText: TEXT.EXPORT_LIST })
    .first();
}

// ============================================================================
// EXPORT LIST TABLE
// ============================================================================

/**
 * All rows of the export list table body, placeholder row included
 */
export function getExportRows(page: Page): Locator {
  return page.locator(QUERIES.exportTableRows);
}

export function getExportRow(page: Page, rowIndex: number): Locator {
  return getExportRows(page).nth(rowIndex);
}

export function getRowName(row: Locator): Locator {
  return row.locator(QUERIES.rowName).first();
}

export function getRowDownloadButton(row: Locator): Locator {
  return row.locator(QUERIES.rowCell).locator('span').filter({ hasText: TEXT.DOWNLOAD }).first();
}

export function getRowDeleteButton(row: Locator): Locator {
  return row.locator(QUERIES.rowCell).locator('span').filter({ hasText: TEXT.DELETE }).first();
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Waits briefly for a locator to be attached. False instead of a timeout error.
 */
export async function isPresent(locator: Locator, timeout: number = TIMEOUTS.PROBE): Promise<boolean> {
  try {
    await locator.waitFor({ state: 'attached', timeout });
    return true;
  } catch {
    return false;
  }
}
