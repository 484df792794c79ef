import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile, access } from 'node:fs/promises';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { reconcileDownloads } from '../export/download-reconciler.js';
import { ErrorCodes } from '../types.js';
import { FakeClock } from './helpers/fake-clock.js';
import { FakePortal } from './helpers/fake-portal.js';

describe('reconcileDownloads', () => {
  let dir: string;
  let clock: FakeClock;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reconcile-test-'));
    clock = new FakeClock();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function listed(portal: FakePortal) {
    return portal.listExportEntries();
  }

  it('downloads the entries at positions 1 and 2 under canonical names', async () => {
    const portal = new FakePortal({ rows: ['Products-20240102-9', 'Orders-20240102-8', 'Orders-20231201-1'] });

    const outcomes = await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, { clock });

    expect(outcomes).toEqual([
      {
        status: 'downloaded',
        rowIndex: 1,
        rawName: 'Products-20240102-9',
        filePath: join(dir, 'Products_lab-a.xlsx'),
      },
      {
        status: 'downloaded',
        rowIndex: 2,
        rawName: 'Orders-20240102-8',
        filePath: join(dir, 'Orders_lab-a.xlsx'),
      },
    ]);
    expect(portal.downloads.map((d) => d.rowIndex)).toEqual([1, 2]);
    await expect(access(join(dir, 'Orders_lab-a.xlsx'))).resolves.toBeUndefined();
  });

  it('removes a stale file before the new download starts', async () => {
    const stale = join(dir, 'Orders_lab-a.xlsx');
    await writeFile(stale, 'last month');
    const portal = new FakePortal({ rows: ['Orders-20240102-8', 'Products-20240102-9'] });

    await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, { clock });

    expect(portal.downloads[0]).toEqual({ rowIndex: 1, target: stale, existedBefore: false });
    expect(await readFile(stale, 'utf-8')).toBe('export of Orders-20240102-8');
  });

  it('does not accept a stale file as a finished download', async () => {
    const stale = join(dir, 'Orders_lab-a.xlsx');
    await writeFile(stale, 'last month');
    const portal = new FakePortal({
      rows: ['Orders-20240102-8'],
      onDownload: () => undefined,
    });

    const outcomes = await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, {
      clock,
      positions: [1],
    });

    expect(outcomes[0]?.status).toBe('timed_out');
    expect(existsSync(stale)).toBe(false);
  });

  it('records a timeout and continues with the next entry', async () => {
    const portal = new FakePortal({
      rows: ['Products-20240102-9', 'Orders-20240102-8'],
      onDownload: (target, rowIndex) => {
        if (rowIndex === 2) writeFileSync(target, 'orders');
      },
    });

    const outcomes = await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, {
      clock,
      timeoutMs: 30000,
      pollIntervalMs: 1000,
    });

    expect(outcomes[0]).toMatchObject({
      status: 'timed_out',
      rowIndex: 1,
      filePath: join(dir, 'Products_lab-a.xlsx'),
      error: { code: ErrorCodes.DOWNLOAD_TIMEOUT },
    });
    expect(outcomes[1]).toMatchObject({ status: 'downloaded', rowIndex: 2 });
    expect(clock.now()).toBe(30000);
  });

  it('accepts a file that arrives while waiting', async () => {
    const portal = new FakePortal({
      rows: ['Orders-20240102-8'],
      onDownload: (target) => {
        clock.at(clock.now() + 4200, () => writeFile(target, 'late'));
      },
    });

    const outcomes = await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, {
      clock,
      positions: [1],
    });

    expect(outcomes[0]?.status).toBe('downloaded');
    expect(clock.now()).toBe(5000);
  });

  it('turns a throwing download into a failed outcome', async () => {
    const portal = new FakePortal({
      rows: ['Products-20240102-9', 'Orders-20240102-8'],
      onDownload: (target, rowIndex) => {
        if (rowIndex === 1) throw new Error('download event never fired');
        writeFileSync(target, 'orders');
      },
    });

    const outcomes = await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, { clock });

    expect(outcomes[0]).toMatchObject({
      status: 'failed',
      rowIndex: 1,
      error: {
        code: ErrorCodes.DOWNLOAD_FAILED,
        message: 'Download of "Products-20240102-9" failed: download event never fired',
      },
    });
    expect(outcomes[1]?.status).toBe('downloaded');
  });

  it('reports positions missing from the listing', async () => {
    const portal = new FakePortal({ rows: ['Orders-20240102-8'] });

    const outcomes = await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, { clock });

    expect(outcomes).toHaveLength(2);
    expect(outcomes[0]?.status).toBe('downloaded');
    expect(outcomes[1]).toEqual({
      status: 'failed',
      rowIndex: 2,
      error: {
        code: ErrorCodes.UI_ELEMENT_NOT_FOUND,
        message: 'Export list has no entry at position 2',
        retryable: true,
      },
    });
  });

  it('fails an entry whose name has no prefix without downloading it', async () => {
    const portal = new FakePortal({ rows: ['-20240102', 'Orders-20240102-8'] });

    const outcomes = await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, { clock });

    expect(outcomes[0]).toMatchObject({ status: 'failed', error: { code: ErrorCodes.INVALID_ENTRY_NAME } });
    expect(outcomes[1]?.status).toBe('downloaded');
    expect(portal.downloads.map((d) => d.rowIndex)).toEqual([2]);
  });

  it('never downloads the placeholder row', async () => {
    const portal = new FakePortal({ rows: ['Orders-20240102-8', 'Products-20240102-9'] });

    await reconcileDownloads(portal, await listed(portal), 'lab-a', dir, { clock });

    expect(portal.calls.filter((call) => call.startsWith('download:'))).toEqual(['download:1', 'download:2']);
  });
});
