import { randomBytes } from 'node:crypto';
import { link, open, readFile, rename, stat, unlink } from 'node:fs/promises';
import { CacheIOError, errorMessage } from '../control-plane/errors.js';
import type { LockConfig } from '../config.js';

export interface LockHandle {
  path: string;
  token: string;
  release(): Promise<void>;
}

interface LockHolder {
  pid?: number;
  token?: string;
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function lockAgeMs(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return Date.now() - info.mtimeMs;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw new CacheIOError(path, `Cannot inspect lock file: ${errorMessage(err)}`, { cause: err });
  }
}

/** Holder recorded in a lock file; null when the file is gone. Unparsable contents yield `{}`. */
async function readHolder(path: string): Promise<LockHolder | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw new CacheIOError(path, `Cannot read lock file: ${errorMessage(err)}`, { cause: err });
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return {};
    const holder: LockHolder = {};
    if ('pid' in parsed && typeof parsed.pid === 'number') holder.pid = parsed.pid;
    if ('token' in parsed && typeof parsed.token === 'string') holder.token = parsed.token;
    return holder;
  } catch {
    return {};
  }
}

async function removeFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (!hasErrorCode(err, 'ENOENT')) {
      throw new CacheIOError(path, `Cannot remove lock file: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/**
 * Moves the stale lock aside before deleting it, so only one waiter can
 * break it. If the file moved aside is no longer the stale holder's (a
 * fresh lock replaced it in between), it is linked back.
 */
async function breakStaleLock(path: string, staleToken: string | undefined, token: string): Promise<void> {
  const aside = `${path}.${token}.stale`;
  try {
    await rename(path, aside);
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return;
    throw new CacheIOError(path, `Cannot break stale lock: ${errorMessage(err)}`, { cause: err });
  }

  const moved = await readHolder(aside);
  if (moved !== null && moved.token !== staleToken) {
    try {
      await link(aside, path);
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) {
        throw new CacheIOError(path, `Cannot restore lock file: ${errorMessage(err)}`, { cause: err });
      }
    }
  }
  await removeFile(aside);
}

async function releaseLock(path: string, token: string): Promise<void> {
  const holder = await readHolder(path);
  if (holder === null) return;
  if (holder.token !== token) {
    console.warn(`  [lock] ${path} was taken over by another run; leaving it in place`);
    return;
  }
  await removeFile(path);
}

/**
 * Exclusive lock file next to the cache document. Waits for the current
 * holder until `timeoutMs`; a lock older than `staleMs` is taken over.
 * Each holder writes its own token and only ever deletes a file carrying it.
 */
export async function acquireLock(path: string, config: LockConfig): Promise<LockHandle> {
  const startedAt = Date.now();
  const token = randomBytes(8).toString('hex');

  for (;;) {
    try {
      const handle = await open(path, 'wx');
      try {
        await handle.writeFile(
          JSON.stringify({ pid: process.pid, token, acquired_at: new Date().toISOString() })
        );
      } finally {
        await handle.close();
      }
      return { path, token, release: () => releaseLock(path, token) };
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) {
        throw new CacheIOError(path, `Cannot create lock file: ${errorMessage(err)}`, { cause: err });
      }
    }

    const holder = await readHolder(path);
    const age = await lockAgeMs(path);
    if (holder !== null && age !== null && age > config.staleMs) {
      console.warn(`  [lock] breaking stale lock ${path} (${Math.round(age)}ms old)`);
      await breakStaleLock(path, holder.token, token);
      continue;
    }

    if (Date.now() - startedAt >= config.timeoutMs) {
      throw new CacheIOError(path, `Timed out after ${config.timeoutMs}ms waiting for cache lock`);
    }
    await sleep(config.retryMs);
  }
}
