import fs from 'fs';
import os from 'os';
import path from 'path';

export const DEFAULT_LOCK_PATH = path.join(os.tmpdir(), 'push-to-dictate.lock');

export interface InstanceLock {
  path: string;
  release(): void;
}

/**
 * Take the single-instance lock file. Returns null while another live
 * process holds it; a lock left by a dead process is taken over.
 */
export function acquireInstanceLock(lockPath: string = DEFAULT_LOCK_PATH, pid: number = process.pid): InstanceLock | null {
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      fs.writeFileSync(lockPath, String(pid), { flag: 'wx' });
      return {
        path: lockPath,
        release: () => releaseLock(lockPath, pid),
      };
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
    }

    const holder = readLockPid(lockPath);
    if (holder !== null && holder !== pid && isProcessAlive(holder)) {
      return null;
    }
    console.log(`Removing stale lock ${lockPath}`);
    fs.rmSync(lockPath, { force: true });
  }
  return null;
}

function releaseLock(lockPath: string, pid: number): void {
  if (readLockPid(lockPath) === pid) {
    fs.rmSync(lockPath, { force: true });
  }
}

function readLockPid(lockPath: string): number | null {
  try {
    const pid = Number.parseInt(fs.readFileSync(lockPath, 'utf-8').trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
