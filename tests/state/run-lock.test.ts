import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RunLock } from '../../src/state/run-lock.js';
import { RunLockedError } from '../../src/errors.js';
import { makeLogger } from '../helpers/fake-stage-runner.js';

describe('RunLock', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = join(await mkdtemp(join(tmpdir(), 'stageline-lock-')), '.stageline');
  });

  afterEach(async () => {
    await rm(join(stateDir, '..'), { recursive: true, force: true });
  });

  it('should create the lock file holding the owner pid', async () => {
    const lock = new RunLock(stateDir, makeLogger(), { pid: 1234 });

    await lock.acquire();

    expect(lock.isHeld).toBe(true);
    expect(await readFile(lock.lockPath, 'utf-8')).toBe('1234\n');
  });

  it('should remove the lock file on release', async () => {
    const lock = new RunLock(stateDir, makeLogger(), { pid: 1234 });
    await lock.acquire();
    await lock.release();

    expect(lock.isHeld).toBe(false);
    await expect(access(lock.lockPath)).rejects.toThrow();
  });

  it('should refuse a lock held by a live process', async () => {
    const first = new RunLock(stateDir, makeLogger(), { pid: 1111, isPidAlive: () => true });
    const second = new RunLock(stateDir, makeLogger(), { pid: 2222, isPidAlive: () => true });
    await first.acquire();

    const err = await second.acquire().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RunLockedError);
    expect(err).toMatchObject({ pid: 1111, lockPath: join(stateDir, 'run.lock') });
    expect(second.isHeld).toBe(false);
  });

  it('should take over a lock whose owner is gone', async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, 'run.lock'), '99999\n');
    const logger = makeLogger();
    const lock = new RunLock(stateDir, logger, { pid: 2222, isPidAlive: () => false });

    await lock.acquire();

    expect(await readFile(lock.lockPath, 'utf-8')).toBe('2222\n');
    expect(logger.warn).toHaveBeenCalledWith(`Taking over stale run lock ${lock.lockPath}`, {
      data: { previousOwner: 99999 },
    });
  });

  it('should let only one of two processes take over the same stale lock', async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, 'run.lock'), '99999\n');
    const isPidAlive = (pid: number) => pid !== 99999;
    const first = new RunLock(stateDir, makeLogger(), { pid: 2222, isPidAlive });
    const second = new RunLock(stateDir, makeLogger(), { pid: 3333, isPidAlive });

    const results = await Promise.allSettled([first.acquire(), second.acquire()]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toBeInstanceOf(RunLockedError);

    const winner = first.isHeld ? first : second;
    expect([first.isHeld, second.isHeld].filter(Boolean)).toHaveLength(1);
    expect(await readFile(winner.lockPath, 'utf-8')).toBe(winner === first ? '2222\n' : '3333\n');
    await expect(access(join(stateDir, 'run.lock.takeover'))).rejects.toThrow();
  });

  it('should refuse a stale lock while another process is taking it over', async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, 'run.lock'), '99999\n');
    await writeFile(join(stateDir, 'run.lock.takeover'), '4444\n');
    const lock = new RunLock(stateDir, makeLogger(), { pid: 2222, isPidAlive: () => false });

    const err = await lock.acquire().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RunLockedError);
    expect(err).toMatchObject({ pid: 4444 });
    expect(await readFile(join(stateDir, 'run.lock'), 'utf-8')).toBe('99999\n');
  });

  it('should take over a lock file with unreadable content', async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, 'run.lock'), 'garbage');
    const lock = new RunLock(stateDir, makeLogger(), { pid: 2222, isPidAlive: () => true });

    await lock.acquire();

    expect(lock.isHeld).toBe(true);
  });

  it('should leave a lock that another process has taken over', async () => {
    const lock = new RunLock(stateDir, makeLogger(), { pid: 1111 });
    await lock.acquire();
    await writeFile(lock.lockPath, '3333\n');

    await lock.release();

    expect(await readFile(lock.lockPath, 'utf-8')).toBe('3333\n');
  });

  it('should release the lock when the guarded work throws', async () => {
    const lock = new RunLock(stateDir, makeLogger(), { pid: 1111 });

    await expect(
      lock.withLock(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.isHeld).toBe(false);
    await expect(access(lock.lockPath)).rejects.toThrow();
  });

  it('should treat the current process as alive by default', async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, 'run.lock'), `${process.pid}\n`);
    const lock = new RunLock(stateDir, makeLogger(), { pid: process.pid + 1 });

    await expect(lock.acquire()).rejects.toBeInstanceOf(RunLockedError);
  });
});
