// Document locks
//
// KeyedMutex serializes callers in this process; FileLock excludes other
// processes through an O_EXCL "<document>.lock" file. The store holds both
// around every read-modify-write.

import { open, stat, unlink, type FileHandle } from "node:fs/promises";
import { IOFailure, describeError, errnoCode } from "./errors.js";

export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;
export const STALE_LOCK_MS = 30_000;

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export interface FileLockOptions {
  timeoutMs?: number;
  retryDelayMs?: number;
  staleMs?: number;
}

export class FileLock {
  readonly lockPath: string;
  private handle: FileHandle | null = null;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly staleMs: number;

  constructor(filePath: string, options: FileLockOptions = {}) {
    this.lockPath = `${filePath}.lock`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.retryDelayMs = options.retryDelayMs ?? 25;
    this.staleMs = options.staleMs ?? STALE_LOCK_MS;
  }

  async acquire(): Promise<void> {
    const deadline = Date.now() + this.timeoutMs;
    for (;;) {
      const handle = await this.tryCreate();
      if (handle) {
        await this.stamp(handle);
        this.handle = handle;
        return;
      }

      if (await this.removeIfStale()) continue;

      if (Date.now() >= deadline) {
        throw new IOFailure(
          this.lockPath,
          new Error(`lock not acquired within ${this.timeoutMs}ms`)
        );
      }
      const delay = this.retryDelayMs * (1 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  async release(): Promise<void> {
    if (this.handle) {
      try {
        await this.handle.close();
      } finally {
        this.handle = null;
      }
    }
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw new IOFailure(this.lockPath, err);
    }
  }

  private async tryCreate(): Promise<FileHandle | undefined> {
    try {
      return await open(this.lockPath, "wx");
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return undefined;
      throw new IOFailure(this.lockPath, err);
    }
  }

  // A lock file we created but could not write is removed before failing.
  private async stamp(handle: FileHandle): Promise<void> {
    try {
      await handle.write(`${process.pid}\n`);
    } catch (err) {
      const cleanupErr = await handle
        .close()
        .then(() => unlink(this.lockPath))
        .then(
          () => undefined,
          (e: unknown) => (errnoCode(e) === "ENOENT" ? undefined : e)
        );
      if (cleanupErr !== undefined) {
        throw new IOFailure(
          this.lockPath,
          new Error(`${describeError(err)} (lock file left behind: ${describeError(cleanupErr)})`)
        );
      }
      throw new IOFailure(this.lockPath, err);
    }
  }

  // A holder that crashed leaves its lock file behind; reclaim it once old enough.
  private async removeIfStale(): Promise<boolean> {
    try {
      const info = await stat(this.lockPath);
      if (Date.now() - info.mtimeMs < this.staleMs) return false;
      await unlink(this.lockPath);
      return true;
    } catch (err) {
      // Released between our open() and stat(): retry immediately.
      if (errnoCode(err) === "ENOENT") return true;
      throw new IOFailure(this.lockPath, err);
    }
  }
}

export async function withFileLock<T>(
  filePath: string,
  options: FileLockOptions,
  fn: () => Promise<T>
): Promise<T> {
  const lock = new FileLock(filePath, options);
  await lock.acquire();
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
