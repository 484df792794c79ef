import path from 'node:path';
import type { Logger } from 'pino';
import type { Download, Page } from 'playwright';
import { logger } from '../logger.js';
import type { ExportJobEntry } from '../types.js';
import {
  FOUND,
  notFound,
  type Credentials,
  type DateInputKind,
  type ExportPortal,
  type ExportType,
  type Located,
  type Lookup,
} from './portal.js';
import {
  PATHS,
  TIMEOUTS,
  QUERIES,
  buildSetDateScript,
  dateInputQuery,
  exportMenuLabel,
  getDateInput,
  getExportDialogCloseButton,
  getExportListButton,
  getExportMenuItem,
  getExportMenuTrigger,
  getExportRow,
  getExportRows,
  getLoginSubmitButton,
  getPasswordInput,
  getRowDeleteButton,
  getRowDownloadButton,
  getRowName,
  getSearchButton,
  getUsernameInput,
  isPresent,
} from './selectors.js';

export type PendingDownload = Pick<Download, 'saveAs' | 'suggestedFilename'>;

/**
 * Starts copying a download to target and returns without waiting for it.
 * Completion is observed on disk by the file waiter, whose deadline bounds
 * the wait; a save that fails or finishes late is only logged.
 */
export function saveInBackground(download: PendingDownload, target: string, log: Logger = logger): void {
  void download
    .saveAs(target)
    .then(() => {
      log.debug({ suggested: download.suggestedFilename(), target }, 'Download saved');
    })
    .catch((err: unknown) => {
      log.warn(
        { target, error: err instanceof Error ? err.message : String(err) },
        'Download could not be saved'
      );
    });
}

/**
 * ExportPortal backed by a Playwright page
 */
export class PlaywrightPortal implements ExportPortal {
  constructor(
    private readonly page: Page,
    private readonly baseUrl: string
  ) {}

  private url(pagePath: string): string {
    return `${this.baseUrl}${pagePath}`;
  }

  async login(credentials: Credentials): Promise<Located> {
    await this.page.goto(this.url(PATHS.LOGIN), { waitUntil: 'domcontentloaded' });

    const username = getUsernameInput(this.page);
    if (!(await isPresent(username, TIMEOUTS.ELEMENT_VISIBLE))) {
      return notFound('loginUsername');
    }
    await username.fill(credentials.username);

    const password = getPasswordInput(this.page);
    if (!(await isPresent(password))) {
      return notFound('loginPassword');
    }
    await password.fill(credentials.password);

    const submit = getLoginSubmitButton(this.page);
    if (!(await isPresent(submit))) {
      return notFound('loginSubmit');
    }
    await submit.click();
    return FOUND;
  }

  async isLoggedIn(): Promise<boolean> {
    const { pathname } = new URL(this.page.url());
    if (pathname.toLowerCase().startsWith(PATHS.LOGIN.toLowerCase())) {
      return false;
    }
    // Still showing a password field means the form was rejected in place
    return !(await getPasswordInput(this.page).isVisible());
  }

  async openOrderList(): Promise<void> {
    await this.page.goto(this.url(PATHS.ORDER_LIST), { waitUntil: 'domcontentloaded' });
  }

  async setDateInput(kind: DateInputKind, value: string): Promise<Located> {
    const applied = await this.page.evaluate(buildSetDateScript(kind, value));
    return applied === true ? FOUND : notFound(dateInputQuery(kind));
  }

  async readDateInput(kind: DateInputKind): Promise<Lookup<string>> {
    const input = getDateInput(this.page, kind);
    if (!(await isPresent(input))) {
      return notFound(dateInputQuery(kind));
    }
    return { found: true, value: await input.inputValue() };
  }

  async submitSearch(): Promise<Located> {
    const button = getSearchButton(this.page);
    if (!(await isPresent(button))) {
      return notFound('searchButton');
    }
    await button.click();
    return FOUND;
  }

  async triggerExport(type: ExportType): Promise<Located> {
    const trigger = getExportMenuTrigger(this.page);
    if (!(await isPresent(trigger, TIMEOUTS.ELEMENT_VISIBLE))) {
      return notFound('exportMenuTrigger');
    }
    await trigger.hover();

    const item = getExportMenuItem(this.page, type);
    if (!(await isPresent(item, TIMEOUTS.MENU_OPEN))) {
      return notFound(`exportMenuItem[${exportMenuLabel(type)}]`);
    }
    await item.click();
    return FOUND;
  }

  async closeExportDialog(): Promise<void> {
    const close = getExportDialogCloseButton(this.page);
    if (await isPresent(close, TIMEOUTS.DIALOG_CLOSE)) {
      await close.click();
    }
  }

  async openExportList(): Promise<Located> {
    const button = getExportListButton(this.page);
    if (!(await isPresent(button, TIMEOUTS.ELEMENT_VISIBLE))) {
      return notFound('exportListButton');
    }
    await button.click();
    return FOUND;
  }

  async listExportEntries(): Promise<ExportJobEntry[]> {
    const rows = getExportRows(this.page);
    const count = await rows.count();
    const entries: ExportJobEntry[] = [];

    for (let rowIndex = 0; rowIndex < count; rowIndex++) {
      const name = getRowName(rows.nth(rowIndex));
      const rawName = (await name.count()) > 0 ? ((await name.textContent()) ?? '').trim() : '';
      entries.push({ rawName, rowIndex });
    }

    return entries;
  }

  async readEntryName(rowIndex: number): Promise<Lookup<string>> {
    const name = getRowName(getExportRow(this.page, rowIndex));
    if (!(await isPresent(name))) {
      return notFound(`${QUERIES.exportTableRows}[${rowIndex}]`);
    }
    return { found: true, value: ((await name.textContent()) ?? '').trim() };
  }

  async downloadEntry(rowIndex: number, targetDir: string, fileName: string): Promise<Located> {
    const button = getRowDownloadButton(getExportRow(this.page, rowIndex));
    if (!(await isPresent(button))) {
      return notFound(`download[${rowIndex}]`);
    }

    const [download] = await Promise.all([
      this.page.waitForEvent('download', { timeout: TIMEOUTS.DOWNLOAD_START }),
      button.click(),
    ]);

    saveInBackground(download, path.join(targetDir, fileName), logger.child({ rowIndex }));
    return FOUND;
  }

  async deleteEntry(rowIndex: number): Promise<Located> {
    const button = getRowDeleteButton(getExportRow(this.page, rowIndex));
    if (!(await isPresent(button))) {
      return notFound(`delete[${rowIndex}]`);
    }
    await button.click();
    return FOUND;
  }
}
