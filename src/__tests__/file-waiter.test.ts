import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, appendFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { awaitFile } from '../export/file-waiter.js';
import { FakeClock } from './helpers/fake-clock.js';

describe('awaitFile', () => {
  let dir: string;
  let clock: FakeClock;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'file-waiter-test-'));
    clock = new FakeClock();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports an existing file without waiting', async () => {
    const file = join(dir, 'ready.xlsx');
    await writeFile(file, 'data');

    const result = await awaitFile(file, { clock });

    expect(result).toEqual({ status: 'arrived', path: file, elapsedMs: 0, sizeBytes: 4 });
    expect(clock.sleeps).toEqual([]);
  });

  it('reports arrival at the first poll after the file appears', async () => {
    const file = join(dir, 'late.xlsx');
    clock.at(2500, () => writeFile(file, 'data'));

    const result = await awaitFile(file, { clock, timeoutMs: 30000, pollIntervalMs: 1000 });

    expect(result.status).toBe('arrived');
    expect(result.elapsedMs).toBe(3000);
  });

  it('times out exactly at the deadline when the file never appears', async () => {
    const file = join(dir, 'never.xlsx');

    const result = await awaitFile(file, { clock, timeoutMs: 30000, pollIntervalMs: 1000 });

    expect(result).toEqual({ status: 'timed_out', path: file, elapsedMs: 30000 });
    expect(clock.sleeps).toHaveLength(30);
    expect(clock.sleeps.every((ms) => ms === 1000)).toBe(true);
  });

  it('does not poll past a deadline that is not a multiple of the interval', async () => {
    const file = join(dir, 'never.xlsx');

    const result = await awaitFile(file, { clock, timeoutMs: 2500, pollIntervalMs: 1000 });

    expect(result.status).toBe('timed_out');
    expect(result.elapsedMs).toBe(2500);
    expect(clock.sleeps).toEqual([1000, 1000, 500]);
  });

  it('catches a file that appears on the last poll', async () => {
    const file = join(dir, 'edge.xlsx');
    clock.at(30000, () => writeFile(file, 'x'));

    const result = await awaitFile(file, { clock, timeoutMs: 30000, pollIntervalMs: 1000 });

    expect(result.status).toBe('arrived');
    expect(result.elapsedMs).toBe(30000);
  });

  it('treats a missing directory as not yet arrived', async () => {
    const file = join(dir, 'missing', 'nested.xlsx');

    const result = await awaitFile(file, { clock, timeoutMs: 3000, pollIntervalMs: 1000 });

    expect(result.status).toBe('timed_out');
  });

  it('does not count a directory at the path as arrived', async () => {
    const result = await awaitFile(dir, { clock, timeoutMs: 1000, pollIntervalMs: 1000 });

    expect(result.status).toBe('timed_out');
  });

  describe('with stableChecks', () => {
    it('waits for one unchanged size before reporting arrival', async () => {
      const file = join(dir, 'stable.xlsx');
      await writeFile(file, 'abc');

      const result = await awaitFile(file, { clock, pollIntervalMs: 1000, stableChecks: 1 });

      expect(result).toEqual({ status: 'arrived', path: file, elapsedMs: 1000, sizeBytes: 3 });
    });

    it('restarts the count while the file is still growing', async () => {
      const file = join(dir, 'growing.xlsx');
      await writeFile(file, 'abc');
      clock.at(500, () => appendFile(file, 'def'));

      const result = await awaitFile(file, { clock, pollIntervalMs: 1000, stableChecks: 1 });

      expect(result).toEqual({ status: 'arrived', path: file, elapsedMs: 2000, sizeBytes: 6 });
    });
  });
});
