import { promises as fs } from 'fs';
import {
  BaselineLockedError,
  StoreError,
  ensureDir,
  errorCode,
  removeIfExists,
} from '@filewarden/shared';

export function lockPathFor(dbPath: string): string {
  return `${dbPath}.lock`;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return errorCode(error) === 'EPERM';
  }
}

async function readOwner(lockPath: string): Promise<number | undefined> {
  try {
    const pid = Number.parseInt(await fs.readFile(lockPath, 'utf8'), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw new StoreError(`Cannot read lock file ${lockPath}`, { cause: error });
  }
}

async function tryCreate(lockPath: string): Promise<boolean> {
  try {
    await fs.writeFile(lockPath, String(process.pid), { flag: 'wx' });
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return false;
    }
    throw new StoreError(`Cannot create lock file ${lockPath}`, { cause: error });
  }
}

/**
 * Replaces a lock left by the dead process `stalePid`. Takeovers are serialized through
 * an exclusive `<lock>.reclaim` file, and the owner is read again inside it, so two
 * callers that saw the same stale pid cannot both end up holding the lock.
 */
async function reclaim(lockPath: string, stalePid: number): Promise<void> {
  const reclaimPath = `${lockPath}.reclaim`;
  if (!(await tryCreate(reclaimPath))) {
    throw new BaselineLockedError(lockPath, stalePid);
  }
  try {
    const owner = await readOwner(lockPath);
    if (owner !== stalePid) {
      throw new BaselineLockedError(lockPath, owner);
    }
    await removeIfExists(lockPath);
    if (!(await tryCreate(lockPath))) {
      throw new BaselineLockedError(lockPath, await readOwner(lockPath));
    }
  } finally {
    await removeIfExists(reclaimPath);
  }
}

async function acquire(lockPath: string): Promise<void> {
  await ensureDir(lockPath);
  if (await tryCreate(lockPath)) {
    return;
  }

  const owner = await readOwner(lockPath);
  // A lock without a readable pid may still be mid-write by its owner.
  if (owner === undefined || isProcessAlive(owner)) {
    throw new BaselineLockedError(lockPath, owner);
  }
  await reclaim(lockPath, owner);
}

/**
 * Runs `fn` while holding the advisory lock for `dbPath`. A lock left behind by a
 * process that no longer exists is taken over.
 *
 * @throws BaselineLockedError when another live process holds the lock
 */
export async function withBaselineLock<T>(dbPath: string, fn: () => Promise<T>): Promise<T> {
  const lockPath = lockPathFor(dbPath);
  await acquire(lockPath);
  try {
    return await fn();
  } finally {
    await removeIfExists(lockPath);
  }
}
