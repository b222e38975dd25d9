// File helpers: bounded I/O and atomic JSON writes
//
// Writes go to a temp file beside the target and are renamed over it, so a
// reader sees either the old document or the new one.

import { copyFile, mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { IOFailure, describeError, errnoCode } from "./errors.js";

export const DEFAULT_IO_TIMEOUT_MS = 10_000;

let tempCounter = 0;

/** Reject with IOFailure if `op` does not settle within `ms`. */
export async function withTimeout<T>(
  op: Promise<T>,
  ms: number,
  path: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new IOFailure(path, new Error(`timed out after ${ms}ms`))),
      ms
    );
  });
  try {
    return await Promise.race([op, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Read a UTF-8 file. Resolves `undefined` when the file does not exist;
 * every other failure is an IOFailure.
 */
export async function readTextIfExists(
  filePath: string,
  timeoutMs: number = DEFAULT_IO_TIMEOUT_MS
): Promise<string | undefined> {
  try {
    return await withTimeout(readFile(filePath, "utf-8"), timeoutMs, filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return undefined;
    if (err instanceof IOFailure) throw err;
    throw new IOFailure(filePath, err);
  }
}

/**
 * Write `data` to a temp file and rename it over `filePath`.
 *
 * On timeout the write is aborted and awaited before this settles, so no
 * rename can land after the caller has released its locks. A write that
 * completes while being abandoned counts as done.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  timeoutMs: number = DEFAULT_IO_TIMEOUT_MS
): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.${++tempCounter}.tmp`;
  const controller = new AbortController();
  const write = (async () => {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, data, { encoding: "utf-8", signal: controller.signal });
    controller.signal.throwIfAborted();
    await rename(tempPath, filePath);
  })();
  try {
    await withTimeout(write, timeoutMs, filePath);
  } catch (err) {
    controller.abort();
    const landed = await write.then(
      () => true,
      () => false
    );
    if (landed) return;
    const cleanupErr = await unlink(tempPath).then(
      () => undefined,
      (e: unknown) => e
    );
    const cause = err instanceof IOFailure ? err.message : describeError(err);
    if (cleanupErr !== undefined && errnoCode(cleanupErr) !== "ENOENT") {
      throw new IOFailure(
        filePath,
        new Error(`${cause} (temp file ${tempPath} left behind: ${describeError(cleanupErr)})`)
      );
    }
    if (err instanceof IOFailure) throw err;
    throw new IOFailure(filePath, err);
  }
}

export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  timeoutMs: number = DEFAULT_IO_TIMEOUT_MS,
  space: number = 2
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space) + "\n", timeoutMs);
}

export async function copyInto(
  source: string,
  target: string,
  timeoutMs: number = DEFAULT_IO_TIMEOUT_MS
): Promise<void> {
  try {
    await withTimeout(
      (async () => {
        await mkdir(dirname(target), { recursive: true });
        await copyFile(source, target);
      })(),
      timeoutMs,
      target
    );
  } catch (err) {
    if (err instanceof IOFailure) throw err;
    throw new IOFailure(target, err);
  }
}
