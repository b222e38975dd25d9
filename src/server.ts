// Ledger MCP server
// Exposes each region document as a read-only MCP resource.

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import {
  REGION_INDEX_URI,
  buildIndexResource,
  buildRegionResource,
  parseRegionUri,
  regionsToJson,
  sourcesToJson,
  toRegionSlug,
} from "./mapper.js";
import type { Region } from "./model.js";
import { NotFoundError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { RegionalStore } from "./store.js";

export interface LedgerServerOptions {
  logger?: Logger;
  name?: string;
}

export interface LedgerMcpServer {
  server: Server;
  store: RegionalStore;
}

/**
 * Create an MCP Server over a RegionalStore. Resources are listed fresh on
 * every request, so counts follow edits made through the store or by hand.
 */
export function createLedgerServer(
  store: RegionalStore,
  options: LedgerServerOptions = {}
): LedgerMcpServer {
  const log = (options.logger ?? silentLogger()).child({ component: "mcp" });

  const regionsBySlug = new Map<string, Region>(
    store.router.regions.map((r) => [toRegionSlug(r.regionName), r])
  );

  const server = new Server(
    { name: options.name ?? "citation-ledger", version: "0.1.0" },
    {
      capabilities: {
        resources: {},
      },
    }
  );

  log.info(
    { root: store.root, regions: regionsBySlug.size, index: REGION_INDEX_URI },
    "serving region documents"
  );

  // --- handlers ---

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    const summaries = await store.listRegions();
    const counts = new Map(summaries.map((s) => [s.region_name, s.source_count]));
    return {
      resources: [
        buildIndexResource(summaries),
        ...store.router.regions.map((r) =>
          buildRegionResource(r, counts.get(r.regionName) ?? 0)
        ),
      ],
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;

    if (uri === REGION_INDEX_URI) {
      return {
        contents: [
          { uri, mimeType: "application/json", text: regionsToJson(await store.listRegions()) },
        ],
      };
    }

    const slug = parseRegionUri(uri);
    const region = slug === undefined ? undefined : regionsBySlug.get(slug);
    if (!region) {
      log.warn({ uri }, "unknown resource requested");
      throw new NotFoundError("Resource", uri);
    }

    const result = await store.listSources(region.regionName);
    return {
      contents: [{ uri, mimeType: "application/json", text: sourcesToJson(result) }],
    };
  });

  return { server, store };
}
