/**
 * Browser session shared by every account of a run.
 * One Chromium process; each account gets a fresh context and page.
 */

import fsp from 'node:fs/promises';
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import { logger } from '../logger.js';
import type { PortalSession } from '../export/batch.js';
import { PlaywrightPortal } from '../portal/playwright-portal.js';
import { SELECTORS_VERSION } from '../portal/selectors.js';
import type { ExportPortal } from '../portal/portal.js';

const BROWSER_ARGS = [
  '--disable-gpu',
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-software-rasterizer',
  '--window-size=1920,1080',
];

export interface SessionOptions {
  baseUrl: string;
  headless?: boolean;
  executablePath?: string;
  timeout?: number;
}

interface SessionState {
  browser: Browser | null;
  context: BrowserContext | null;
  page: Page | null;
}

export class BrowserSession implements PortalSession {
  private state: SessionState = {
    browser: null,
    context: null,
    page: null,
  };

  private readonly options: Required<Omit<SessionOptions, 'executablePath'>> &
    Pick<SessionOptions, 'executablePath'>;

  constructor(options: SessionOptions) {
    this.options = {
      baseUrl: options.baseUrl,
      headless: options.headless ?? true,
      executablePath: options.executablePath,
      timeout: options.timeout ?? 30000,
    };
  }

  /**
   * Launches the browser process. Later calls reuse it.
   */
  async launch(): Promise<Browser> {
    if (this.state.browser) {
      return this.state.browser;
    }

    logger.info(
      {
        headless: this.options.headless,
        executablePath: this.options.executablePath ?? 'bundled',
        selectorsVersion: SELECTORS_VERSION,
      },
      'Launching browser'
    );
    this.state.browser = await chromium.launch({
      headless: this.options.headless,
      executablePath: this.options.executablePath,
      args: BROWSER_ARGS,
    });
    return this.state.browser;
  }

  /**
   * Closes the previous account's page and context (best effort), then opens
   * a new context whose downloads are saved under downloadDir.
   */
  async reset(downloadDir: string): Promise<ExportPortal> {
    await this.teardownContext();

    await fsp.mkdir(downloadDir, { recursive: true });
    const browser = await this.launch();

    const context = await browser.newContext({
      acceptDownloads: true,
      viewport: { width: 1920, height: 1080 },
    });
    context.setDefaultTimeout(this.options.timeout);
    context.setDefaultNavigationTimeout(this.options.timeout);

    const page = await context.newPage();
    this.state = { browser, context, page };

    logger.info({ downloadDir }, 'Browser session reset for account');
    return new PlaywrightPortal(page, this.options.baseUrl);
  }

  private async teardownContext(): Promise<void> {
    const { page, context } = this.state;

    if (page) {
      try {
        await page.close();
        logger.debug('Closed previous page');
      } catch (err) {
        logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Failed to close previous page');
      }
    }

    if (context) {
      try {
        await context.close();
      } catch (err) {
        logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Failed to close previous context');
      }
    }

    this.state = { ...this.state, context: null, page: null };
  }

  /**
   * Close the browser session.
   */
  async close(): Promise<void> {
    await this.teardownContext();

    if (this.state.browser) {
      try {
        await this.state.browser.close();
        logger.info('Browser closed');
      } catch (err) {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Error while closing browser');
      }
    }

    this.state = { browser: null, context: null, page: null };
  }
}
