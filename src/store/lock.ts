import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConcurrentTransitionError } from '../types/errors.js';

const lockInfoSchema = z.object({
  pid: z.number().int(),
  operation: z.string(),
  acquired_at: z.string()
});

export type RunLockInfo = z.infer<typeof lockInfoSchema>;

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** process.kill(pid, 0) throws ESRCH for a dead pid, EPERM for someone else's live one */
export function pidIsAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

export function readRunLock(lockPath: string): RunLockInfo | null {
  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(fs.readFileSync(lockPath, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function uniqueSibling(lockPath: string, tag: string): string {
  return `${lockPath}.${tag}.${process.pid}.${crypto.randomBytes(4).toString('hex')}`;
}

/**
 * Create the lock file with its content in one step: the content goes to a
 * private temp file which is then hard-linked into place. link fails with
 * EEXIST when the lock is held, and a reader never sees an empty lock.
 */
function tryCreateLock(lockPath: string, info: RunLockInfo): boolean {
  const tmp = uniqueSibling(lockPath, 'new');
  fs.writeFileSync(tmp, JSON.stringify(info));
  try {
    fs.linkSync(tmp, lockPath);
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return false;
    }
    throw error;
  } finally {
    fs.rmSync(tmp, { force: true });
  }
}

/**
 * Move a dead holder's lock out of the way. Only one rename of a given file
 * can succeed, so two processes reclaiming the same stale lock cannot both
 * remove it. If what was moved turns out to be a live lock (another process
 * reclaimed and re-created it in between) it is linked back and the caller
 * loses.
 */
function reclaimStaleLock(lockPath: string, runId: string): void {
  const grave = uniqueSibling(lockPath, 'stale');
  try {
    fs.renameSync(lockPath, grave);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return;
    }
    throw error;
  }

  const moved = readRunLock(grave);
  if (moved && pidIsAlive(moved.pid)) {
    try {
      fs.linkSync(grave, lockPath);
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    } finally {
      fs.rmSync(grave, { force: true });
    }
    throw new ConcurrentTransitionError(runId, `${moved.operation} held by pid ${moved.pid}`);
  }
  fs.rmSync(grave, { force: true });
}

/**
 * Take the per-run lock with an exclusive create.
 *
 * A lock left behind by a dead process (or one that cannot be parsed) is
 * reclaimed and the create retried once.
 */
export function acquireRunLock(lockPath: string, runId: string, operation: string): void {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });
  const info: RunLockInfo = {
    pid: process.pid,
    operation,
    acquired_at: new Date().toISOString()
  };

  for (let attempt = 0; attempt < 2; attempt++) {
    if (tryCreateLock(lockPath, info)) {
      return;
    }
    const holder = readRunLock(lockPath);
    if (holder && pidIsAlive(holder.pid)) {
      throw new ConcurrentTransitionError(runId, `${holder.operation} held by pid ${holder.pid}`);
    }
    reclaimStaleLock(lockPath, runId);
  }

  throw new ConcurrentTransitionError(runId, 'lock could not be acquired');
}

export function releaseRunLock(lockPath: string): void {
  fs.rmSync(lockPath, { force: true });
}
