// Region configuration: built-in table, YAML loader, master-sources root

import { readFileSync } from "node:fs";
import { win32 } from "node:path";
import yaml from "js-yaml";
import { CATCH_ALL_PATTERN, RegionScope, type Region } from "./model.js";
import { IOFailure, ValidationError } from "./errors.js";
import { validateRegions } from "./validator.js";

export const DEFAULT_REGIONS: readonly Region[] = [
  {
    regionName: "ROW",
    directoryPatterns: ["**/ROW/**", "**/Right_of_Way/**", "**/ROW_Projects/**"],
    sourceFile: "ROW_sources.json",
    displayName: "Right of Way",
    description: "Sources specific to Right of Way projects",
    priority: 10,
    scope: RegionScope.Regional,
  },
  {
    regionName: "Other",
    directoryPatterns: ["**/Other_Projects/**", "**/Other/**", "**/Miscellaneous/**"],
    sourceFile: "Other_sources.json",
    displayName: "Other Projects",
    description: "General project sources",
    priority: 5,
    scope: RegionScope.Regional,
  },
  {
    regionName: "Downtown",
    directoryPatterns: ["**/Downtown/**", "**/Downtown_Projects/**", "**/Urban/**"],
    sourceFile: "Downtown_sources.json",
    displayName: "Downtown Projects",
    description: "Urban and downtown development sources",
    priority: 8,
    scope: RegionScope.Regional,
  },
  {
    regionName: "Regional",
    directoryPatterns: ["**/Regional/**", "**/Regional_Projects/**"],
    sourceFile: "Regional_sources.json",
    displayName: "Regional Standards",
    description: "Regional standards and specifications",
    priority: 7,
    scope: RegionScope.Regional,
  },
  {
    regionName: "General",
    directoryPatterns: [CATCH_ALL_PATTERN],
    sourceFile: "General_sources.json",
    displayName: "General Sources",
    description: "Default sources for unclassified projects",
    priority: 1,
    scope: RegionScope.Global,
  },
];

// --- Raw YAML helpers ---

type RawMap = Record<string, unknown>;

function isRawMap(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asStringArray(value: unknown): string[] {
  if (!value) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}

function asScope(value: unknown, regionName: string): RegionScope {
  if (value === undefined || value === null) return RegionScope.Regional;
  const scope = Object.values(RegionScope).find((s) => s === value);
  if (scope === undefined) {
    throw new ValidationError(
      `Region '${regionName}': unknown scope '${String(value)}' (expected: regional, global, project)`,
      ["scope"]
    );
  }
  return scope;
}

function parseRegion(raw: RawMap): Region {
  const regionName = String(raw["name"] ?? "");
  const priority = Number(raw["priority"] ?? 0);
  return {
    regionName,
    directoryPatterns: asStringArray(raw["patterns"]),
    sourceFile: String(raw["source_file"] ?? `${regionName}_sources.json`),
    displayName: String(raw["display_name"] ?? regionName),
    description: String(raw["description"] ?? ""),
    priority: Number.isFinite(priority) ? priority : 0,
    scope: asScope(raw["scope"], regionName),
  };
}

// --- Public API ---

/**
 * Build a region table from a plain object (js-yaml output).
 * Throws ValidationError when the table breaks the catch-all invariant.
 */
export function parseRegionConfig(data: unknown): Region[] {
  const rawRegions: unknown = isRawMap(data) ? data["regions"] : undefined;
  if (!Array.isArray(rawRegions)) {
    throw new ValidationError("Region config must contain a 'regions' list", ["regions"]);
  }
  const regions = rawRegions.filter(isRawMap).map(parseRegion);
  const result = validateRegions(regions);
  if (!result.isValid) {
    throw new ValidationError(
      `Invalid region config:\n${result.errors.join("\n")}`,
      ["regions"]
    );
  }
  return regions;
}

/** Load a region table from a YAML file (safe schema, no custom types). */
export function loadRegionConfig(filePath: string): Region[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new IOFailure(filePath, err);
  }
  return parseRegionConfig(yaml.load(raw, { schema: yaml.DEFAULT_SCHEMA }));
}

export const ROOT_ENV_VAR = "CITATION_LEDGER_ROOT";

/**
 * Master-sources root: explicit value, then CITATION_LEDGER_ROOT, then the
 * platform default.
 */
export function resolveMasterSourcesRoot(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  if (explicit) return explicit;
  const fromEnv = env[ROOT_ENV_VAR];
  if (fromEnv) return fromEnv;
  if (platform === "win32") {
    return win32.join(env["ProgramData"] ?? "C:\\ProgramData", "CitationLedger", "MasterSources");
  }
  return "/opt/citation-ledger/master_sources";
}
