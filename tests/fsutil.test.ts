import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWriteFile, readTextIfExists, withTimeout } from "../src/fsutil.js";
import { IOFailure } from "../src/errors.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ledger-fsutil-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function settleIn(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("withTimeout", () => {
  it("passes through a result that arrives in time", async () => {
    expect(await withTimeout(Promise.resolve(7), 100, "x")).toBe(7);
  });

  it("rejects with an IOFailure naming the path", async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 1, "/data/doc.json")).rejects.toThrow(
      "I/O failure on /data/doc.json: timed out after 1ms"
    );
  });
});

describe("readTextIfExists", () => {
  it("reads a file and returns undefined for a missing one", async () => {
    await writeFile(join(dir, "a.txt"), "hello", "utf-8");
    expect(await readTextIfExists(join(dir, "a.txt"))).toBe("hello");
    expect(await readTextIfExists(join(dir, "missing.txt"))).toBeUndefined();
  });
});

describe("atomicWriteFile", () => {
  it("creates parent directories and leaves only the target", async () => {
    const target = join(dir, "nested", "doc.json");
    await atomicWriteFile(target, "new");
    expect(await readFile(target, "utf-8")).toBe("new");
    expect(await readdir(join(dir, "nested"))).toEqual(["doc.json"]);
  });

  it("never replaces the target after a timed-out write has settled", async () => {
    const target = join(dir, "doc.json");
    for (let i = 0; i < 20; i++) {
      await writeFile(target, "old", "utf-8");
      const outcome = await atomicWriteFile(target, "new", 0).then(
        () => "written",
        (err: unknown) => err
      );
      const atSettle = await readFile(target, "utf-8");
      if (outcome === "written") {
        expect(atSettle).toBe("new");
      } else {
        expect(outcome).toBeInstanceOf(IOFailure);
        expect(atSettle).toBe("old");
      }

      await settleIn(20);
      expect(await readFile(target, "utf-8")).toBe(atSettle);
      expect(await readdir(dir)).toEqual(["doc.json"]);
    }
  });
});
