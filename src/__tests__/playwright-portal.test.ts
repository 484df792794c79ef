import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import pino from 'pino';
import { reconcileDownloads } from '../export/download-reconciler.js';
import { saveInBackground } from '../portal/playwright-portal.js';
import { ErrorCodes } from '../types.js';
import { FakeClock } from './helpers/fake-clock.js';
import { FakePortal } from './helpers/fake-portal.js';

function stubDownload(saveAs: (target: string) => Promise<void>) {
  return { saveAs: vi.fn(saveAs), suggestedFilename: () => 'export.xlsx' };
}

describe('saveInBackground', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'portal-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns before the save completes', () => {
    const download = stubDownload(() => new Promise<void>(() => undefined));
    const target = join(dir, 'Orders_lab-a.xlsx');

    expect(saveInBackground(download, target)).toBeUndefined();
    expect(download.saveAs).toHaveBeenCalledWith(target);
  });

  it('leaves a stalled save to the file wait deadline', async () => {
    const clock = new FakeClock();
    const download = stubDownload(() => new Promise<void>(() => undefined));
    const portal = new FakePortal({
      rows: ['Orders-20240102-8'],
      onDownload: (target) => saveInBackground(download, target),
    });

    const outcomes = await reconcileDownloads(portal, await portal.listExportEntries(), 'lab-a', dir, {
      clock,
      positions: [1],
      timeoutMs: 30000,
      pollIntervalMs: 1000,
    });

    expect(outcomes[0]).toMatchObject({
      status: 'timed_out',
      rowIndex: 1,
      error: { code: ErrorCodes.DOWNLOAD_TIMEOUT },
    });
    expect(clock.now()).toBe(30000);
    expect(download.saveAs).toHaveBeenCalledWith(join(dir, 'Orders_lab-a.xlsx'));
  });

  it('reports a save that writes the file as downloaded', async () => {
    let saved: Promise<void> = Promise.resolve();
    const download = stubDownload((target) => {
      saved = writeFile(target, 'orders');
      return saved;
    });
    const portal = new FakePortal({
      rows: ['Orders-20240102-8'],
      onDownload: async (target) => {
        saveInBackground(download, target);
        await saved;
      },
    });

    const outcomes = await reconcileDownloads(portal, await portal.listExportEntries(), 'lab-a', dir, {
      clock: new FakeClock(),
      positions: [1],
    });

    expect(outcomes[0]).toMatchObject({ status: 'downloaded', filePath: join(dir, 'Orders_lab-a.xlsx') });
  });

  it('logs a failed save as a warning', async () => {
    const log = pino({ level: 'silent' });
    const warn = vi.spyOn(log, 'warn');
    const target = join(dir, 'Orders_lab-a.xlsx');

    saveInBackground(
      stubDownload(() => Promise.reject(new Error('download canceled'))),
      target,
      log
    );

    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledWith({ target, error: 'download canceled' }, 'Download could not be saved');
    });
  });
});
