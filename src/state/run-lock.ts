import { join } from 'node:path';
import { open, readFile, rm, type FileHandle } from 'node:fs/promises';
import { ensureDir, isErrnoCode } from '../util/fs.js';
import type { StructuredLogger } from '../logging/logger.js';
import { RunLockedError } from '../errors.js';

export const LOCK_FILE_NAME = 'run.lock';
const TAKEOVER_SUFFIX = '.takeover';

function defaultIsPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the pid exists but belongs to someone else.
    return isErrnoCode(err, 'EPERM');
  }
}

export interface RunLockOptions {
  /** Owner recorded in the lock file. */
  pid?: number;
  isPidAlive?: (pid: number) => boolean;
}

/**
 * Advisory single-writer lock for a state directory.
 *
 * The lock file is created with exclusive-create and holds the owner's pid.
 * A lock whose owner is gone is taken over under a second exclusive file, so
 * two processes that find the same stale lock cannot both end up holding it.
 */
export class RunLock {
  readonly lockPath: string;
  private readonly takeoverPath: string;
  private readonly pid: number;
  private readonly isPidAlive: (pid: number) => boolean;
  private held = false;

  constructor(
    private readonly stateDir: string,
    private readonly logger: StructuredLogger,
    options: RunLockOptions = {},
  ) {
    this.lockPath = join(stateDir, LOCK_FILE_NAME);
    this.takeoverPath = `${this.lockPath}${TAKEOVER_SUFFIX}`;
    this.pid = options.pid ?? process.pid;
    this.isPidAlive = options.isPidAlive ?? defaultIsPidAlive;
  }

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (this.held) return;
    await ensureDir(this.stateDir);

    // A pass ends early when the lock changed hands while it was being inspected.
    for (let pass = 0; pass < 3; pass++) {
      if (await this.createExclusive(this.lockPath)) {
        this.held = true;
        return;
      }

      const owner = await this.readOwner(this.lockPath);
      if (owner !== null && owner !== this.pid && this.isPidAlive(owner)) {
        throw new RunLockedError(
          `Run is locked by process ${owner} (${this.lockPath})`,
          this.lockPath,
          owner,
        );
      }

      if (await this.takeOver(owner)) {
        this.held = true;
        return;
      }
    }

    const owner = (await this.readOwner(this.lockPath)) ?? -1;
    throw new RunLockedError(`Could not acquire run lock ${this.lockPath}`, this.lockPath, owner);
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    const owner = await this.readOwner(this.lockPath);
    if (owner !== null && owner !== this.pid) {
      this.logger.warn(`Run lock ${this.lockPath} now belongs to process ${owner}; leaving it in place`);
      return;
    }
    await rm(this.lockPath, { force: true });
  }

  /**
   * Run `fn` while holding the lock.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Replace a lock whose owner is gone.
   *
   * Only the holder of the takeover file may remove the lock, and only while it
   * still names `staleOwner`. Returns false when the lock changed in between.
   */
  private async takeOver(staleOwner: number | null): Promise<boolean> {
    if (!(await this.createExclusive(this.takeoverPath))) {
      const taker = (await this.readOwner(this.takeoverPath)) ?? -1;
      throw new RunLockedError(
        `Run lock ${this.lockPath} is being taken over by process ${taker} (remove ${this.takeoverPath} if that process is gone)`,
        this.lockPath,
        taker,
      );
    }

    try {
      if ((await this.readOwner(this.lockPath)) !== staleOwner) return false;
      this.logger.warn(`Taking over stale run lock ${this.lockPath}`, {
        data: { previousOwner: staleOwner },
      });
      await rm(this.lockPath, { force: true });
      return await this.createExclusive(this.lockPath);
    } finally {
      await rm(this.takeoverPath, { force: true });
    }
  }

  /** Create `path` holding this pid; false when it already exists. */
  private async createExclusive(path: string): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await open(path, 'wx');
    } catch (err) {
      if (isErrnoCode(err, 'EEXIST')) return false;
      throw err;
    }
    try {
      await handle.writeFile(`${this.pid}\n`, 'utf-8');
    } finally {
      await handle.close();
    }
    return true;
  }

  private async readOwner(path: string): Promise<number | null> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return null;
      throw err;
    }
    const pid = Number.parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  }
}
