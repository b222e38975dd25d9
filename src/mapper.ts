// Region -> MCP resource mapping: pure functions, no I/O

import type { Region, RegionScope, RegionSources, RegionSummary } from "./model.js";

export const LEDGER_SCHEME = "ledger";
export const REGION_INDEX_URI = `${LEDGER_SCHEME}://regions`;

// --- URI construction ---

export function toRegionSlug(regionName: string): string {
  return regionName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}

export function buildRegionUri(regionSlug: string): string {
  return `${REGION_INDEX_URI}/${regionSlug}`;
}

/** Inverse of buildRegionUri; undefined for URIs outside the region namespace. */
export function parseRegionUri(uri: string): string | undefined {
  const prefix = `${REGION_INDEX_URI}/`;
  if (!uri.startsWith(prefix)) return undefined;
  const slug = uri.slice(prefix.length);
  return slug && !slug.includes("/") ? slug : undefined;
}

// --- Priority from scope ---

const SCOPE_PRIORITY: Record<RegionScope, number> = {
  project: 1.0,
  regional: 0.8,
  global: 0.5,
};

export function scopePriority(scope: RegionScope): number {
  return SCOPE_PRIORITY[scope];
}

// --- Description construction ---

export function buildRegionDescription(region: Region, sourceCount: number): string {
  const parts: string[] = [region.description, ""];
  parts.push(`Scope: ${region.scope}`);
  parts.push(`Priority: ${region.priority}`);
  parts.push(`Patterns: ${region.directoryPatterns.join(", ")}`);
  parts.push(`Document: ${region.sourceFile}`);
  parts.push(`Sources: ${sourceCount}`);
  return parts.join("\n");
}

// --- MCP resource shapes ---
// Plain objects matching the protocol's resource schema

export interface McpResourceMeta {
  uri: string;
  name: string;
  title: string;
  description: string;
  mimeType: string;
  annotations: {
    audience: Array<"user" | "assistant">;
    priority: number;
  };
}

export function buildRegionResource(region: Region, sourceCount: number): McpResourceMeta {
  return {
    uri: buildRegionUri(toRegionSlug(region.regionName)),
    name: region.regionName,
    title: region.displayName,
    description: buildRegionDescription(region, sourceCount),
    mimeType: "application/json",
    annotations: {
      audience: ["user", "assistant"],
      priority: scopePriority(region.scope),
    },
  };
}

export function buildIndexResource(summaries: readonly RegionSummary[]): McpResourceMeta {
  const total = summaries.reduce((n, s) => n + s.source_count, 0);
  return {
    uri: REGION_INDEX_URI,
    name: "regions",
    title: "Source regions",
    description:
      `Index of ${summaries.length} region(s) holding ${total} shared source record(s). ` +
      `Read a region resource for its full source list.`,
    mimeType: "application/json",
    annotations: {
      audience: ["assistant", "user"],
      priority: 1.0,
    },
  };
}

// --- JSON payloads ---

export function regionsToJson(summaries: readonly RegionSummary[]): string {
  return JSON.stringify({ regions: summaries }, null, 2);
}

export function sourcesToJson(result: RegionSources): string {
  return JSON.stringify(
    { region: result.region, total_sources: result.sources.length, sources: result.sources },
    null,
    2
  );
}
