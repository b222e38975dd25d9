import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { migrateDirectory, migrateFile } from "../src/batch.js";
import { DocumentParseError, ValidationError } from "../src/errors.js";
import { loadProject } from "../src/project.js";

const GOOD = [
  "1001 - A1 - STD - 2023.json",
  "1002 - B2 - CCR - 2022.json",
  "1003 - C3 - GSC - 2021.json",
];
const MALFORMED = ["broken-1.json", "broken-2.json"];

function legacyBody(comment: string): string {
  return JSON.stringify({
    site_properties: { "Facility Name": "Test Facility" },
    sources: [{ uuid: "src_00000001", comment }],
  });
}

let dir: string;
let input: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ledger-batch-"));
  input = join(dir, "in");
  await mkdir(input);
  for (const name of GOOD) await writeFile(join(input, name), legacyBody(name), "utf-8");
  await writeFile(join(input, MALFORMED[0]), "{ truncated", "utf-8");
  await writeFile(join(input, MALFORMED[1]), "[1, 2]", "utf-8");
  await writeFile(join(input, "readme.txt"), "not a project", "utf-8");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("migrateDirectory", () => {
  it("migrates every good file and tallies the malformed ones", async () => {
    const out = join(dir, "out");
    const report = await migrateDirectory({ inputDir: input, outputDir: out });

    expect(report.total).toBe(5);
    expect(report.succeeded).toBe(3);
    expect(report.failed).toBe(2);
    expect(report.skipped).toBe(1);
    expect(report.dryRun).toBe(false);
    expect(report.failures.map((f) => [f.file, f.kind])).toEqual([
      ["broken-1.json", "parse"],
      ["broken-2.json", "parse"],
    ]);
    expect(report.outputs).toEqual(GOOD.map((name) => join(out, name)));
    expect((await readdir(out)).sort()).toEqual(GOOD);
  });

  it("writes canonical files that load back", async () => {
    const out = join(dir, "out");
    await migrateDirectory({
      inputDir: input,
      outputDir: out,
      migrateOptions: { newProjectId: () => "proj-x" },
    });

    const record = await loadProject(join(out, GOOD[1]));
    expect(record.metadata).toEqual({
      project_id: "proj-x",
      project_type: "CCR",
      title: "1002 - B2 - CCR - 2022",
      file_path: `1002/2022/${GOOD[1]}`,
      requestor: "",
      request_year: "2022",
      relook: false,
    });
    expect(record.sources).toEqual([{ source_id: "src_00000001", usage_notes: GOOD[1] }]);
    expect(record.facilityInformation["facility name"]).toBe("Test Facility");
  });

  it("writes nothing on a dry run", async () => {
    const out = join(dir, "out");
    const report = await migrateDirectory({ inputDir: input, outputDir: out, dryRun: true });

    expect(report.succeeded).toBe(3);
    expect(report.failed).toBe(2);
    expect(report.outputs).toEqual([]);
    await expect(readdir(out)).rejects.toThrow();
  });

  it("backs up originals before migrating in place", async () => {
    const backup = join(dir, "backup");
    const report = await migrateDirectory({ inputDir: input, backupDir: backup });

    expect(report.succeeded).toBe(3);
    expect((await readdir(backup)).sort()).toEqual(GOOD);
    expect(await readFile(join(backup, GOOD[0]), "utf-8")).toBe(legacyBody(GOOD[0]));
    const migrated = await loadProject(join(input, GOOD[0]));
    expect(migrated.metadata.project_type).toBe("STD");
  });

  it("fails a second in-place pass instead of re-migrating", async () => {
    await migrateDirectory({ inputDir: input });
    const again = await migrateDirectory({ inputDir: input });

    expect(again.succeeded).toBe(0);
    expect(again.failures.map((f) => f.kind)).toEqual([
      "validation",
      "validation",
      "validation",
      "parse",
      "parse",
    ]);
  });

  it("walks subdirectories only when recursive", async () => {
    const nested = join(input, "2020");
    await mkdir(nested);
    await writeFile(join(nested, "1004 - D4 - FCR - 2020.json"), legacyBody("n"), "utf-8");
    await writeFile(join(nested, "notes.md"), "# notes", "utf-8");

    const flat = await migrateDirectory({
      inputDir: input,
      outputDir: join(dir, "flat"),
      dryRun: true,
    });
    const deep = await migrateDirectory({
      inputDir: input,
      outputDir: join(dir, "deep"),
      recursive: true,
    });

    expect(flat.total).toBe(5);
    expect(deep.total).toBe(6);
    expect(flat.skipped).toBe(1);
    expect(deep.skipped).toBe(2);
    expect(deep.outputs).toContain(join(dir, "deep", "2020", "1004 - D4 - FCR - 2020.json"));
  });

  it("records a validation failure and keeps going", async () => {
    await writeFile(
      join(input, "0999 - Z9 - STD - 2020.json"),
      JSON.stringify({ sources: [{ comment: "no uuid" }] }),
      "utf-8"
    );
    const report = await migrateDirectory({ inputDir: input, outputDir: join(dir, "out") });

    expect(report.total).toBe(6);
    expect(report.succeeded).toBe(3);
    expect(report.failures[0]).toEqual({
      file: "0999 - Z9 - STD - 2020.json",
      kind: "validation",
      message: "Source 0 has no uuid",
    });
  });

  it("raises an IOFailure for a missing input directory", async () => {
    await expect(migrateDirectory({ inputDir: join(dir, "missing") })).rejects.toThrow(
      "I/O failure on"
    );
  });
});

describe("migrateFile", () => {
  it("returns the validated canonical record", async () => {
    const canonical = await migrateFile(join(input, GOOD[0]), {
      migrateOptions: { newProjectId: () => "proj-1" },
    });
    expect(canonical.project_metadata.project_id).toBe("proj-1");
    expect(canonical.sources).toEqual([
      { uuid: "src_00000001", order: 1, usage_notes: GOOD[0] },
    ]);
  });

  it("rejects a non-object document", async () => {
    await expect(migrateFile(join(input, MALFORMED[1]))).rejects.toThrow(DocumentParseError);
  });

  it("rejects canonical input", async () => {
    await migrateDirectory({ inputDir: input });
    await expect(migrateFile(join(input, GOOD[0]))).rejects.toThrow(ValidationError);
  });
});
