import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { ulid } from 'ulid';
import { hasErrorCode, ioError, PushRelayError } from '../errors.js';

/**
 * Replace a file in one step: write a sibling temp file, then rename it over
 * the target. Readers see either the old or the new content.
 */
export async function writeFileAtomic(file: string, content: string, mode: number): Promise<void> {
  const temp = path.join(path.dirname(file), `.${path.basename(file)}.${ulid()}.tmp`);
  try {
    await fs.promises.writeFile(temp, content, { mode });
    // the process umask applies to writeFile's mode
    await fs.promises.chmod(temp, mode);
    await fs.promises.rename(temp, file);
  } catch (err) {
    await fs.promises.rm(temp, { force: true });
    throw ioError('Failed to write', file, err);
  }
}

export async function ensureDir(dir: string, mode: number): Promise<void> {
  try {
    await fs.promises.mkdir(dir, { recursive: true, mode });
  } catch (err) {
    throw ioError('Failed to create directory', dir, err);
  }
}

export interface LockOptions {
  /** Give up after this many milliseconds. */
  timeout?: number;
  /** A lock file older than this is left over from a crashed process. */
  stale?: number;
  retryInterval?: number;
}

/**
 * Run `fn` while holding an exclusive lock file next to `target`.
 */
export async function withFileLock<T>(target: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
  const { timeout = 10000, stale = 30000, retryInterval = 25 } = options;
  const lockPath = `${target}.lock`;
  const deadline = Date.now() + timeout;

  let handle: FileHandle | undefined;
  while (!handle) {
    try {
      handle = await fs.promises.open(lockPath, 'wx', 0o600);
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) {
        throw ioError('Failed to lock', target, err);
      }
      if (await isStale(lockPath, stale)) {
        await breakLock(lockPath, stale);
        continue;
      }
      if (Date.now() >= deadline) {
        throw new PushRelayError('IOError', `Timed out waiting for lock on ${target} (${lockPath})`);
      }
      await sleep(retryInterval);
    }
  }

  const { ino } = await handle.stat();
  try {
    await handle.writeFile(`${process.pid}\n`);
    return await fn();
  } finally {
    await handle.close();
    await releaseLock(lockPath, ino);
  }
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(lockPath);
    return Date.now() - stat.mtimeMs > staleMs;
  } catch (err) {
    // released between our open and stat
    if (hasErrorCode(err, 'ENOENT')) return false;
    throw ioError('Failed to inspect lock', lockPath, err);
  }
}

/**
 * Remove a stale lock. The lock is moved aside first and checked again, so a
 * fresh lock another waiter took in the meantime is linked back into place.
 */
async function breakLock(lockPath: string, staleMs: number): Promise<void> {
  const aside = `${lockPath}.${ulid()}.stale`;
  try {
    await fs.promises.rename(lockPath, aside);
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return;
    throw ioError('Failed to break lock', lockPath, err);
  }

  try {
    const { mtimeMs } = await fs.promises.stat(aside);
    if (Date.now() - mtimeMs <= staleMs) {
      await fs.promises.link(aside, lockPath);
    }
  } catch (err) {
    // EEXIST: a third waiter already holds a newer lock
    if (!hasErrorCode(err, 'EEXIST')) {
      throw ioError('Failed to break lock', lockPath, err);
    }
  } finally {
    await fs.promises.rm(aside, { force: true });
  }
}

async function releaseLock(lockPath: string, ino: number): Promise<void> {
  try {
    const current = await fs.promises.stat(lockPath);
    if (current.ino !== ino) return;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return;
    throw ioError('Failed to release lock', lockPath, err);
  }
  await fs.promises.rm(lockPath, { force: true });
}
