// Regional store: one JSON document of shared source records per region

import { randomUUID } from "node:crypto";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type {
  NewSourceRecord,
  OperationFailure,
  OperationResult,
  Region,
  RegionDocument,
  RegionDocumentMetadata,
  RegionSources,
  RegionSummary,
  SourcePatch,
  SourceRecord,
} from "./model.js";
import { DEFAULT_REGIONS } from "./config.js";
import {
  DocumentParseError,
  IOFailure,
  NotFoundError,
  ValidationError,
  describeError,
  toFailure,
} from "./errors.js";
import { DEFAULT_IO_TIMEOUT_MS, atomicWriteJSON, readTextIfExists } from "./fsutil.js";
import { DEFAULT_LOCK_TIMEOUT_MS, KeyedMutex, withFileLock } from "./lock.js";
import { silentLogger, type Logger } from "./logger.js";
import { PathRouter } from "./router.js";

export const DOCUMENT_VERSION = "1.0";
export const SOURCE_ID_PREFIX = "src_";
export const MAX_ID_ATTEMPTS = 10;

export interface RegionalStoreOptions {
  /** Master-sources root; every region document lives directly under it. */
  root: string;
  regions?: readonly Region[];
  logger?: Logger;
  ioTimeoutMs?: number;
  lockTimeoutMs?: number;
  /** Candidate id source; collisions are retried, then a timestamp id is used. */
  idGenerator?: () => string;
  clock?: () => Date;
}

export function randomSourceId(): string {
  return SOURCE_ID_PREFIX + randomUUID().replace(/-/g, "").slice(0, 8);
}

const PATCH_FIELDS = [
  "title",
  "citation",
  "authors",
  "source_type",
  "publication_year",
  "url",
  "description",
  "notes",
] as const satisfies ReadonlyArray<Exclude<keyof SourcePatch, "extra">>;

/** Shallow, field-by-field merge; undefined values and `id` are never applied. */
export function applySourcePatch(record: SourceRecord, patch: SourcePatch): SourceRecord {
  const next: SourceRecord = { ...record };
  for (const field of PATCH_FIELDS) {
    const value = patch[field];
    if (value !== undefined) next[field] = value;
  }
  for (const [key, value] of Object.entries(patch.extra ?? {})) {
    if (key !== "id" && value !== undefined) next[key] = value;
  }
  return next;
}

const STRING_PATCH_FIELDS = [
  "title",
  "citation",
  "source_type",
  "url",
  "description",
  "notes",
] as const satisfies ReadonlyArray<(typeof PATCH_FIELDS)[number]>;

/**
 * Build a SourcePatch from untyped input (a CLI argument, a request body).
 * Named fields are type-checked; anything else lands in `extra`.
 */
export function parseSourcePatch(raw: Record<string, unknown>): SourcePatch {
  const patch: SourcePatch = {};
  const bad: string[] = [];
  const named = new Set<string>(PATCH_FIELDS);

  for (const field of STRING_PATCH_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value === "string") patch[field] = value;
    else bad.push(field);
  }

  const authors = raw["authors"];
  if (authors !== undefined) {
    if (Array.isArray(authors) && authors.every((a) => typeof a === "string")) {
      patch.authors = authors;
    } else {
      bad.push("authors");
    }
  }

  const year = raw["publication_year"];
  if (year !== undefined) {
    if (typeof year === "number" && Number.isInteger(year)) patch.publication_year = year;
    else bad.push("publication_year");
  }

  if ("id" in raw) bad.push("id");
  if (bad.length > 0) {
    throw new ValidationError(`Invalid patch field(s): ${bad.join(", ")}`, bad);
  }

  const extra = Object.fromEntries(Object.entries(raw).filter(([key]) => !named.has(key)));
  if (Object.keys(extra).length > 0) patch.extra = extra;
  return patch;
}

// --- Document parsing ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSourceRecord(value: unknown): value is SourceRecord {
  return isRecord(value) && typeof value["id"] === "string";
}

export function parseRegionDocument(
  text: string,
  file: string,
  regionName: string
): RegionDocument {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new DocumentParseError(file, describeError(err));
  }
  if (!isRecord(data)) throw new DocumentParseError(file, "top level is not an object");

  const rawSources = data["sources"] ?? [];
  if (!Array.isArray(rawSources))
    throw new DocumentParseError(file, "'sources' is not a list");

  const sources: SourceRecord[] = [];
  rawSources.forEach((entry: unknown, i) => {
    if (!isSourceRecord(entry))
      throw new DocumentParseError(file, `source ${i} is not an object with a string 'id'`);
    sources.push(entry);
  });

  const meta = isRecord(data["metadata"]) ? data["metadata"] : {};
  const metadata: RegionDocumentMetadata = {
    version: typeof meta["version"] === "string" ? meta["version"] : DOCUMENT_VERSION,
    region: typeof meta["region"] === "string" ? meta["region"] : regionName,
    last_updated: typeof meta["last_updated"] === "string" ? meta["last_updated"] : "",
    total_sources: sources.length,
  };
  return { sources, metadata };
}

// --- Store ---

export class RegionalStore {
  readonly root: string;
  readonly router: PathRouter;
  private readonly log: Logger;
  private readonly ioTimeoutMs: number;
  private readonly lockTimeoutMs: number;
  private readonly nextId: () => string;
  private readonly clock: () => Date;
  private readonly mutex = new KeyedMutex();
  private ready: Promise<void> | undefined;

  constructor(options: RegionalStoreOptions) {
    this.root = options.root;
    this.router = new PathRouter(options.regions ?? DEFAULT_REGIONS);
    this.log = (options.logger ?? silentLogger()).child({ component: "regional-store" });
    this.ioTimeoutMs = options.ioTimeoutMs ?? DEFAULT_IO_TIMEOUT_MS;
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.nextId = options.idGenerator ?? randomSourceId;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Create the master-sources root. Every operation awaits this first. */
  init(): Promise<void> {
    this.ready ??= mkdir(this.root, { recursive: true }).then(
      () => undefined,
      (err: unknown) => {
        this.ready = undefined;
        throw new IOFailure(this.root, err);
      }
    );
    return this.ready;
  }

  resolveRegion(projectPath: string): string {
    return this.router.resolveRegion(projectPath);
  }

  /** Unknown region names share the catch-all document. */
  regionConfig(regionName: string): Region {
    return this.router.findRegion(regionName) ?? this.router.catchAll;
  }

  sourceFilePath(regionName: string): string {
    return join(this.root, this.regionConfig(regionName).sourceFile);
  }

  async listSources(regionName: string): Promise<RegionSources> {
    const region = this.regionConfig(regionName);
    await this.init();
    try {
      const doc = await this.load(region);
      return { region: region.regionName, sources: doc?.sources ?? [] };
    } catch (err) {
      if (!(err instanceof DocumentParseError)) throw err;
      this.log.warn(
        { region: region.regionName, file: err.file, err: err.message },
        "region document unreadable, returning no sources"
      );
      return { region: region.regionName, sources: [] };
    }
  }

  async sourcesForProject(projectPath: string): Promise<RegionSources> {
    return this.listSources(this.resolveRegion(projectPath));
  }

  async getSource(regionName: string, sourceId: string): Promise<SourceRecord | undefined> {
    const { sources } = await this.listSources(regionName);
    return sources.find((s) => s.id === sourceId);
  }

  async addSource(
    regionName: string,
    record: NewSourceRecord | Record<string, unknown>
  ): Promise<OperationResult<SourceRecord>> {
    const region = this.regionConfig(regionName);
    try {
      const requested = record["id"];
      if (requested !== undefined && typeof requested !== "string") {
        throw new ValidationError(
          `Source id must be a string, got ${requested === null ? "null" : typeof requested}`,
          ["id"]
        );
      }
      const added = await this.mutate(region, (doc) => {
        const ids = new Set(doc.sources.map((s) => s.id));
        let id: string;
        if (requested === undefined || requested === "") {
          id = this.generateSourceId(ids);
        } else if (ids.has(requested)) {
          throw new ValidationError(
            `Source id '${requested}' already exists in region '${region.regionName}'`,
            ["id"]
          );
        } else {
          id = requested;
        }
        const source: SourceRecord = { ...record, id };
        doc.sources.push(source);
        return source;
      }, true);
      this.log.info({ region: region.regionName, id: added.id }, "source added");
      return { ok: true, value: added };
    } catch (err) {
      return this.fail("add", region, err);
    }
  }

  async updateSource(
    regionName: string,
    sourceId: string,
    patch: SourcePatch
  ): Promise<OperationResult<SourceRecord>> {
    const region = this.regionConfig(regionName);
    try {
      const updated = await this.mutate(region, (doc) => {
        const index = doc.sources.findIndex((s) => s.id === sourceId);
        if (index === -1) throw new NotFoundError("Source", sourceId);
        const next = applySourcePatch(doc.sources[index], patch);
        doc.sources[index] = next;
        return next;
      }, false);
      this.log.info({ region: region.regionName, id: sourceId }, "source updated");
      return { ok: true, value: updated };
    } catch (err) {
      return this.fail("update", region, err);
    }
  }

  async listRegions(): Promise<RegionSummary[]> {
    const summaries: RegionSummary[] = [];
    for (const region of this.router.regions) {
      let count = 0;
      try {
        await this.init();
        const doc = await this.load(region);
        count = doc?.sources.length ?? 0;
      } catch (err) {
        this.log.warn(
          { region: region.regionName, err: describeError(err) },
          "could not count region sources"
        );
      }
      summaries.push({
        region_name: region.regionName,
        display_name: region.displayName,
        description: region.description,
        source_count: count,
        source_file: region.sourceFile,
      });
    }
    return summaries;
  }

  // --- internals ---

  private async load(region: Region): Promise<RegionDocument | undefined> {
    const file = join(this.root, region.sourceFile);
    const text = await readTextIfExists(file, this.ioTimeoutMs);
    if (text === undefined) return undefined;
    return parseRegionDocument(text, file, region.regionName);
  }

  /**
   * Read-modify-write under the in-process mutex and the document's lock
   * file. `create` starts an empty document when none exists; otherwise a
   * missing document is NotFound and nothing is written.
   */
  private async mutate<T>(
    region: Region,
    edit: (doc: RegionDocument) => T,
    create: boolean
  ): Promise<T> {
    await this.init();
    const file = join(this.root, region.sourceFile);
    return this.mutex.run(file, () =>
      withFileLock(file, { timeoutMs: this.lockTimeoutMs }, async () => {
        const existing = await this.load(region);
        if (existing === undefined && !create) {
          throw new NotFoundError("Region document", region.regionName);
        }
        const doc = existing ?? this.emptyDocument(region);
        const result = edit(doc);
        doc.metadata = {
          ...doc.metadata,
          version: doc.metadata.version || DOCUMENT_VERSION,
          region: region.regionName,
          last_updated: this.clock().toISOString(),
          total_sources: doc.sources.length,
        };
        await atomicWriteJSON(file, doc, this.ioTimeoutMs);
        return result;
      })
    );
  }

  private emptyDocument(region: Region): RegionDocument {
    return {
      sources: [],
      metadata: {
        version: DOCUMENT_VERSION,
        region: region.regionName,
        last_updated: "",
        total_sources: 0,
      },
    };
  }

  private generateSourceId(existing: ReadonlySet<string>): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const candidate = this.nextId();
      if (!existing.has(candidate)) return candidate;
    }
    const base = `${SOURCE_ID_PREFIX}${Math.floor(this.clock().getTime() / 1000)}`;
    let id = base;
    for (let n = 1; existing.has(id); n++) id = `${base}_${n}`;
    this.log.warn({ id, attempts: MAX_ID_ATTEMPTS }, "random source ids collided, using timestamp id");
    return id;
  }

  private fail(op: "add" | "update", region: Region, err: unknown): OperationFailure {
    const failure = toFailure(err);
    const level = failure.kind === "not_found" ? "info" : "error";
    this.log[level](
      { op, region: region.regionName, kind: failure.kind, err: failure.message },
      `${op} source failed`
    );
    return failure;
  }
}
