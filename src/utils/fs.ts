import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { CacheDirectoryError } from '../errors.js';

export async function ensureDir(dir: string): Promise<string> {
  try {
    await fsp.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new CacheDirectoryError(dir, error);
  }
  return dir;
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fsp.access(target);
    return true;
  } catch {
    return false;
  }
}

// <dest>.part.<pid>.<timestamp>, unique per process so parallel runs never share a temp file
export function tempSiblingPath(destination: string): string {
  return `${destination}.part.${process.pid}.${Date.now()}`;
}

const BUSY_CODES = new Set(['EBUSY', 'EPERM', 'EACCES']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export async function removeWithRetry(target: string, attempts = 5, delayMs = 300): Promise<boolean> {
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      await fsp.rm(target, { force: true, recursive: true });
      return true;
    } catch (error) {
      const code = errorCode(error);
      if (!code || !BUSY_CODES.has(code) || attempt === attempts) {
        return false;
      }
      await sleep(delayMs);
    }
  }
  return false;
}

export async function atomicCopy(source: string, destination: string): Promise<string> {
  await ensureDir(path.dirname(destination));
  const tmp = tempSiblingPath(destination);
  try {
    await fsp.copyFile(source, tmp);
    await fsp.rename(tmp, destination);
  } finally {
    await removeWithRetry(tmp);
  }
  return destination;
}
