import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileLock } from "../src/lock.js";
import { IOFailure } from "../src/errors.js";

const failNextWrite = vi.hoisted(() => ({ armed: false }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args);
      if (failNextWrite.armed) {
        failNextWrite.armed = false;
        vi.spyOn(handle, "write").mockRejectedValueOnce(new Error("disk full"));
      }
      return handle;
    },
  };
});

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ledger-lockwrite-"));
});

afterEach(async () => {
  failNextWrite.armed = false;
  await rm(dir, { recursive: true, force: true });
});

describe("FileLock.acquire when the pid cannot be written", () => {
  it("removes the lock file and fails with an IOFailure", async () => {
    const doc = join(dir, "doc.json");
    failNextWrite.armed = true;

    const lock = new FileLock(doc);
    const err: unknown = await lock.acquire().then(
      () => undefined,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(IOFailure);
    expect(err).toHaveProperty("message", `I/O failure on ${doc}.lock: disk full`);
    expect(await readdir(dir)).toEqual([]);
  });

  it("lets the next caller take the lock at once", async () => {
    const doc = join(dir, "doc.json");
    failNextWrite.armed = true;
    await expect(new FileLock(doc).acquire()).rejects.toThrow(IOFailure);

    const lock = new FileLock(doc, { timeoutMs: 0 });
    await lock.acquire();
    expect(await readdir(dir)).toEqual(["doc.json.lock"]);
    await lock.release();
    expect(await readdir(dir)).toEqual([]);
  });
});
