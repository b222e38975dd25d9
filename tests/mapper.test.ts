import { describe, it, expect } from "vitest";
import {
  REGION_INDEX_URI,
  buildIndexResource,
  buildRegionDescription,
  buildRegionResource,
  buildRegionUri,
  parseRegionUri,
  regionsToJson,
  scopePriority,
  sourcesToJson,
  toRegionSlug,
} from "../src/mapper.js";
import { DEFAULT_REGIONS } from "../src/config.js";
import type { RegionSummary } from "../src/model.js";

const [ROW] = DEFAULT_REGIONS;

function summary(name: string, count: number): RegionSummary {
  return {
    region_name: name,
    display_name: name,
    description: "",
    source_count: count,
    source_file: `${name}_sources.json`,
  };
}

describe("toRegionSlug", () => {
  it("lowercases and hyphenates", () => {
    expect(toRegionSlug("ROW")).toBe("row");
    expect(toRegionSlug("Right of Way")).toBe("right-of-way");
  });

  it("collapses runs of special chars and trims hyphens", () => {
    expect(toRegionSlug(" Downtown__Projects! ")).toBe("downtown-projects");
  });
});

describe("region URIs", () => {
  it("builds and parses region URIs", () => {
    expect(REGION_INDEX_URI).toBe("ledger://regions");
    expect(buildRegionUri("row")).toBe("ledger://regions/row");
    expect(parseRegionUri("ledger://regions/row")).toBe("row");
  });

  it("rejects URIs outside the region namespace", () => {
    expect(parseRegionUri("ledger://regions")).toBeUndefined();
    expect(parseRegionUri("ledger://regions/")).toBeUndefined();
    expect(parseRegionUri("ledger://regions/row/extra")).toBeUndefined();
    expect(parseRegionUri("knowledge://regions/row")).toBeUndefined();
  });
});

describe("scopePriority", () => {
  it("ranks project over regional over global", () => {
    expect(scopePriority("project")).toBe(1.0);
    expect(scopePriority("regional")).toBe(0.8);
    expect(scopePriority("global")).toBe(0.5);
  });
});

describe("buildRegionResource", () => {
  it("describes the region with its patterns and count", () => {
    expect(buildRegionDescription(ROW, 3)).toBe(
      [
        "Sources specific to Right of Way projects",
        "",
        "Scope: regional",
        "Priority: 10",
        "Patterns: **/ROW/**, **/Right_of_Way/**, **/ROW_Projects/**",
        "Document: ROW_sources.json",
        "Sources: 3",
      ].join("\n")
    );
  });

  it("maps a region onto an MCP resource", () => {
    const resource = buildRegionResource(ROW, 3);
    expect(resource.uri).toBe("ledger://regions/row");
    expect(resource.name).toBe("ROW");
    expect(resource.title).toBe("Right of Way");
    expect(resource.mimeType).toBe("application/json");
    expect(resource.annotations).toEqual({ audience: ["user", "assistant"], priority: 0.8 });
  });
});

describe("buildIndexResource", () => {
  it("totals sources across regions", () => {
    const resource = buildIndexResource([summary("A", 2), summary("B", 5)]);
    expect(resource.uri).toBe("ledger://regions");
    expect(resource.description).toBe(
      "Index of 2 region(s) holding 7 shared source record(s). " +
        "Read a region resource for its full source list."
    );
    expect(resource.annotations.priority).toBe(1.0);
  });
});

describe("JSON payloads", () => {
  it("wraps summaries in a regions key", () => {
    expect(JSON.parse(regionsToJson([summary("A", 1)]))).toEqual({
      regions: [summary("A", 1)],
    });
  });

  it("adds the source count to a region's payload", () => {
    const text = sourcesToJson({ region: "ROW", sources: [{ id: "src_1", title: "T" }] });
    expect(JSON.parse(text)).toEqual({
      region: "ROW",
      total_sources: 1,
      sources: [{ id: "src_1", title: "T" }],
    });
  });
});
