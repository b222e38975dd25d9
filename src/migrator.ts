// Legacy -> canonical project migration. Pure: nothing here touches the disk.

import { basename } from "node:path";
import { v4 as uuidv4 } from "uuid";
import {
  PROJECT_TYPES,
  type CanonicalProjectFile,
  type FacilityInformation,
  type LegacyFilenameParts,
  type SourceLink,
} from "./model.js";
import { FilenameFormatError, ValidationError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

type RawMap = Record<string, unknown>;

export interface MigrateOptions {
  logger?: Logger;
  newProjectId?: () => string;
}

const KNOWN_PROJECT_TYPES = new Set<string>(PROJECT_TYPES);

// Filename-derived keys win over whatever the legacy file carried.
const DERIVED_SITE_KEYS = new Set(["facility id", "facility code"]);
const DROPPED_SITE_KEYS = new Set(["classification", "access date"]);
const RENAMED_SITE_KEYS = new Map([
  ["Facility Name", "facility name"],
  ["Facility Surrogate Key", "facility surrogate key"],
]);

function isRawMap(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string {
  return value === undefined || value === null ? "" : String(value);
}

function stripJsonExtension(filename: string): string {
  return basename(filename).replace(/\.json$/i, "");
}

/**
 * Split "<facility-id> - <suffix> - <project-type> - <year>.json".
 * Returns undefined for fewer than four segments; extra segments are ignored.
 */
export function parseLegacyFilename(filename: string): LegacyFilenameParts | undefined {
  const parts = stripJsonExtension(filename)
    .split(/\s+-\s+/)
    .map((p) => p.trim());
  if (parts.length < 4) return undefined;
  const [facilityId, suffix, projectType, year] = parts;
  return { facilityId, suffix, projectType, year };
}

/**
 * Decode legacy slide bit strings: bit i of a slide's string marks
 * ordering[i] as cited. Slides citing nothing are left out.
 */
export function parseSlideRefs(
  ordering: readonly string[],
  slideRefs: Readonly<Record<string, string>>
): Record<string, string[]> {
  const slides: Record<string, string[]> = {};
  for (const [slideId, bits] of Object.entries(slideRefs)) {
    const cited: string[] = [];
    for (let i = 0; i < bits.length && i < ordering.length; i++) {
      if (bits[i] === "1") cited.push(ordering[i]);
    }
    if (cited.length > 0) slides[slideId] = cited;
  }
  return slides;
}

/** Canonical files have project_metadata and no legacy site_properties. */
export function isCanonical(record: unknown): boolean {
  return (
    isRawMap(record) &&
    isRawMap(record["project_metadata"]) &&
    !("site_properties" in record)
  );
}

function migrateFacility(site: RawMap, parts: LegacyFilenameParts): FacilityInformation {
  const entries: Array<[string, unknown]> = [
    ["facility id", parts.facilityId],
    ["facility code", parts.suffix],
    ["facility name", ""],
    ["facility surrogate key", ""],
  ];
  for (const [key, value] of Object.entries(site)) {
    const lower = key.trim().toLowerCase();
    if (DROPPED_SITE_KEYS.has(lower) || DERIVED_SITE_KEYS.has(lower)) continue;
    entries.push([RENAMED_SITE_KEYS.get(key) ?? key, value]);
  }
  // own properties only: "__proto__" and "constructor" stay plain keys
  return Object.fromEntries(entries);
}

function migrateSources(raw: unknown): SourceLink[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) throw new ValidationError("'sources' is not a list", ["sources"]);
  return raw.map((entry: unknown, i) => {
    if (!isRawMap(entry) || !entry["uuid"]) {
      throw new ValidationError(`Source ${i} has no uuid`, [`sources[${i}].uuid`]);
    }
    return {
      uuid: String(entry["uuid"]),
      order: i + 1,
      usage_notes: str(entry["comment"]),
    };
  });
}

function migrateSlides(legacy: RawMap): Record<string, unknown> {
  if (isRawMap(legacy["slide_data"])) return legacy["slide_data"];
  const ordering = legacy["slide_refs_citation_ordering"];
  const refs = legacy["slide_refs"];
  if (!Array.isArray(ordering) || !isRawMap(refs)) return {};
  const bitStrings: Record<string, string> = {};
  for (const [slideId, bits] of Object.entries(refs)) {
    if (typeof bits === "string") bitStrings[slideId] = bits;
  }
  return parseSlideRefs(ordering.map(String), bitStrings);
}

/**
 * Map a legacy project file onto the canonical schema.
 *
 * A filename that does not parse leaves facility id, suffix, project type
 * and year empty and is logged; migration still completes. Canonical input
 * is rejected with ValidationError: migration is single-pass.
 */
export function migrate(
  legacy: RawMap,
  filename: string,
  options: MigrateOptions = {}
): CanonicalProjectFile {
  const log = (options.logger ?? silentLogger()).child({ component: "migrator" });

  if (isCanonical(legacy)) {
    throw new ValidationError(`${basename(filename)} is already in the canonical schema`, [
      "project_metadata",
    ]);
  }

  const parsed = parseLegacyFilename(filename);
  if (!parsed) {
    log.warn({ file: basename(filename) }, new FilenameFormatError(basename(filename)).message);
  }
  const parts = parsed ?? { facilityId: "", suffix: "", projectType: "", year: "" };
  if (parts.projectType && !KNOWN_PROJECT_TYPES.has(parts.projectType)) {
    log.warn({ file: basename(filename), projectType: parts.projectType }, "unknown project type");
  }

  const title = stripJsonExtension(filename);
  const site = isRawMap(legacy["site_properties"]) ? legacy["site_properties"] : {};
  const headers = Number(legacy["number_header_citations"] ?? 0);

  return {
    project_metadata: {
      project_id: (options.newProjectId ?? uuidv4)(),
      project_type: parts.projectType,
      title,
      file_path: [parts.facilityId, parts.year, basename(filename)].filter(Boolean).join("/"),
      requestor: str(legacy["requestor"]),
      request_year: parts.year,
      relook: legacy["relook"] === true,
    },
    team: "team" in legacy ? legacy["team"] : {},
    key_cites: "key_cites" in legacy ? legacy["key_cites"] : [],
    facility_information: migrateFacility(site, parts),
    slide_data: migrateSlides(legacy),
    sources: migrateSources(legacy["sources"]),
    powerpoint_file: str(legacy["powerpoint_file"]),
    number_header_citations: Number.isFinite(headers) ? headers : 0,
  };
}
