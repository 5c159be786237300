import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

/**
 * Write JSON through a temp file in the same directory and rename it over the
 * target, so readers never observe a half-written file.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
    await rename(tmpPath, path);
  } finally {
    await rm(tmpPath, { force: true });
  }
}

const fileLocks = new Map<string, Promise<void>>();

/**
 * Run `task` after every earlier task queued for the same path has settled.
 * Read-merge-write sequences on a shared file go through here.
 */
export async function withFileLock<T>(path: string, task: () => Promise<T>): Promise<T> {
  const previous = fileLocks.get(path) ?? Promise.resolve();
  const run = previous.then(task);
  const tail = run.then(
    () => undefined,
    () => undefined,
  );
  fileLocks.set(path, tail);
  try {
    return await run;
  } finally {
    if (fileLocks.get(path) === tail) fileLocks.delete(path);
  }
}

/** Same character policy for profile and scenario file names. */
export function safeFileName(name: string, fallback: string, maxLength?: number): string {
  const cleaned = (name.trim() || fallback).replace(/[^a-zA-Z0-9_.-]/g, '_');
  return maxLength === undefined ? cleaned : cleaned.slice(0, maxLength);
}
