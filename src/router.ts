// Path router: project path -> owning region

import { resolve } from "node:path";
import { minimatch } from "minimatch";
import type { Region } from "./model.js";
import { ValidationError } from "./errors.js";
import { isCatchAll, validateRegions } from "./validator.js";

// Absolute, forward-slashed, with the root ("/" or "C:/") stripped so that
// relative globs such as "**/ROW/**" apply.
export function normalizeProjectPath(projectPath: string): string {
  return resolve(projectPath)
    .replace(/\\/g, "/")
    .replace(/^[A-Za-z]:/, "")
    .replace(/^\/+/, "");
}

export class PathRouter {
  readonly regions: readonly Region[];
  private readonly ordered: readonly Region[];
  private readonly fallback: Region;

  constructor(regions: readonly Region[]) {
    const result = validateRegions(regions);
    if (!result.isValid) {
      throw new ValidationError(
        `Invalid region table:\n${result.errors.join("\n")}`,
        ["regions"]
      );
    }
    this.regions = regions;
    // Array.prototype.sort is stable, so equal priorities keep declaration order.
    this.ordered = [...regions].sort((a, b) => b.priority - a.priority);
    this.fallback = regions.find(isCatchAll) ?? this.ordered[this.ordered.length - 1];
  }

  regionFor(projectPath: string): Region {
    const normalized = normalizeProjectPath(projectPath);
    for (const region of this.ordered) {
      for (const pattern of region.directoryPatterns) {
        if (minimatch(normalized, pattern, { dot: true })) return region;
      }
    }
    return this.fallback;
  }

  resolveRegion(projectPath: string): string {
    return this.regionFor(projectPath).regionName;
  }

  findRegion(regionName: string): Region | undefined {
    return this.regions.find((r) => r.regionName === regionName);
  }

  get catchAll(): Region {
    return this.fallback;
  }
}
