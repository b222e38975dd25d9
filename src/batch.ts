// Directory-wide migration. One file's failure never stops the batch.

import { readFile, readdir, stat } from "node:fs/promises";
import { basename, extname, join, relative } from "node:path";
import type { CanonicalProjectFile, ErrorKind } from "./model.js";
import {
  DocumentParseError,
  IOFailure,
  ValidationError,
  describeError,
  errnoCode,
  toFailure,
} from "./errors.js";
import { DEFAULT_IO_TIMEOUT_MS, atomicWriteJSON, copyInto, withTimeout } from "./fsutil.js";
import { silentLogger, type Logger } from "./logger.js";
import { migrate, type MigrateOptions } from "./migrator.js";
import { loadProject } from "./project.js";
import { validateProject } from "./validator.js";

export interface BatchOptions {
  inputDir: string;
  /** Where migrated files go; defaults to overwriting the inputs in place. */
  outputDir?: string;
  extension?: string;
  recursive?: boolean;
  dryRun?: boolean;
  /** Existing output files are copied here before being overwritten. */
  backupDir?: string;
  logger?: Logger;
  ioTimeoutMs?: number;
  migrateOptions?: Omit<MigrateOptions, "logger">;
}

export interface BatchFailure {
  file: string;
  kind: ErrorKind;
  message: string;
}

export interface BatchReport {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  failures: BatchFailure[];
  outputs: string[];
  dryRun: boolean;
}

function isRawMap(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

interface FileListing {
  files: string[];
  /** Regular files passed over for not having the extension. */
  skipped: number;
}

async function listFiles(dir: string, extension: string, recursive: boolean): Promise<FileListing> {
  const entries = await readdir(dir, { withFileTypes: true });
  const listing: FileListing = { files: [], skipped: 0 };
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!recursive) continue;
      const nested = await listFiles(full, extension, recursive);
      listing.files.push(...nested.files);
      listing.skipped += nested.skipped;
    } else if (entry.isFile()) {
      if (extname(entry.name).toLowerCase() === extension.toLowerCase()) listing.files.push(full);
      else listing.skipped++;
    }
  }
  listing.files.sort();
  return listing;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw new IOFailure(path, err);
  }
}

export interface MigrateFileOptions {
  logger?: Logger;
  ioTimeoutMs?: number;
  migrateOptions?: Omit<MigrateOptions, "logger">;
}

/**
 * Read one legacy file, migrate it and validate the result. Validation
 * warnings are logged; errors throw ValidationError.
 */
export async function migrateFile(
  file: string,
  options: MigrateFileOptions = {}
): Promise<CanonicalProjectFile> {
  const log = (options.logger ?? silentLogger()).child({ component: "batch" });
  const text = await withTimeout(
    readFile(file, "utf-8"),
    options.ioTimeoutMs ?? DEFAULT_IO_TIMEOUT_MS,
    file
  );
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new DocumentParseError(file, describeError(err));
  }
  if (!isRawMap(data)) throw new DocumentParseError(file, "top level is not an object");

  const canonical = migrate(data, basename(file), {
    ...options.migrateOptions,
    logger: options.logger,
  });
  const result = validateProject(canonical);
  if (!result.isValid) {
    throw new ValidationError(`${basename(file)}: ${result.errors.join("; ")}`, result.errors);
  }
  for (const warning of result.warnings) log.warn({ file: basename(file) }, warning);
  return canonical;
}

export async function migrateDirectory(options: BatchOptions): Promise<BatchReport> {
  const {
    inputDir,
    outputDir = inputDir,
    extension = ".json",
    recursive = false,
    dryRun = false,
    backupDir,
    ioTimeoutMs = DEFAULT_IO_TIMEOUT_MS,
  } = options;
  const log = (options.logger ?? silentLogger()).child({ component: "batch" });

  let listing: FileListing;
  try {
    listing = await listFiles(inputDir, extension, recursive);
  } catch (err) {
    throw new IOFailure(inputDir, err);
  }
  const { files } = listing;
  log.info(
    { inputDir, files: files.length, skipped: listing.skipped, dryRun },
    "starting batch migration"
  );

  const report: BatchReport = {
    total: files.length,
    succeeded: 0,
    failed: 0,
    skipped: listing.skipped,
    failures: [],
    outputs: [],
    dryRun,
  };

  for (const file of files) {
    const rel = relative(inputDir, file);
    try {
      const canonical = await migrateFile(file, {
        logger: options.logger,
        ioTimeoutMs,
        migrateOptions: options.migrateOptions,
      });

      if (!dryRun) {
        const target = join(outputDir, rel);
        if (backupDir && (await exists(target))) {
          await copyInto(target, join(backupDir, rel), ioTimeoutMs);
        }
        await atomicWriteJSON(target, canonical, ioTimeoutMs, 4);
        // Reading the output back proves it loads as a canonical project.
        await loadProject(target, ioTimeoutMs);
        report.outputs.push(target);
      }
      report.succeeded++;
      log.info({ file: rel }, "migrated");
    } catch (err) {
      const failure = toFailure(err);
      report.failed++;
      report.failures.push({ file: rel, kind: failure.kind, message: failure.message });
      log.error({ file: rel, kind: failure.kind, err: failure.message }, "migration failed");
    }
  }

  log.info(
    {
      total: report.total,
      succeeded: report.succeeded,
      failed: report.failed,
      skipped: report.skipped,
      failedFiles: report.failures.map((f) => f.file),
    },
    "batch migration complete"
  );
  return report;
}
