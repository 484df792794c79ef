#!/usr/bin/env node
import { BrowserSession } from './browser/session.js';
import { ConfigError, getConfig } from './config.js';
import { runBatch } from './export/batch.js';
import { closeLogFile, logger } from './logger.js';
import type { Config } from './types.js';

async function main(): Promise<number> {
  let config: Config;
  try {
    config = getConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ code: err.code, error: err.message }, 'Cannot start export run');
      return 1;
    }
    throw err;
  }

  const session = new BrowserSession({
    baseUrl: config.portalBaseUrl,
    headless: config.playwrightHeadless,
    executablePath: config.settings.browser_path,
    timeout: config.playwrightTimeout,
  });

  // Graceful shutdown: close the browser before exiting
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal');
    await session.close();
    await closeLogFile();
    process.exit(130);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await runBatch(session, config);
  } catch (err) {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Export run aborted');
  } finally {
    await session.close();
    logger.info('Export runner finished');
  }

  return 0;
}

main()
  .then(async (code) => {
    await closeLogFile();
    process.exitCode = code;
  })
  .catch(async (err: unknown) => {
    logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Fatal error');
    await closeLogFile();
    process.exitCode = 1;
  });
