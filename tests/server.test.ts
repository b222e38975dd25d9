import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createLedgerServer } from "../src/server.js";
import { RegionalStore } from "../src/store.js";
import { silentLogger } from "../src/logger.js";

let root: string;
let store: RegionalStore;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "ledger-server-"));
  store = new RegionalStore({ root, logger: silentLogger() });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

async function connectClient(): Promise<Client> {
  const { server } = createLedgerServer(store, { logger: silentLogger() });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.1.0" }, { capabilities: {} });
  await client.connect(clientTransport);
  return client;
}

async function readText(client: Client, uri: string): Promise<unknown> {
  const result = await client.readResource({ uri });
  expect(result.contents).toHaveLength(1);
  const [content] = result.contents;
  expect(content.mimeType).toBe("application/json");
  if (!("text" in content) || typeof content.text !== "string") {
    throw new Error(`no text content for ${uri}`);
  }
  return JSON.parse(content.text);
}

describe("resources/list", () => {
  it("returns the index plus one resource per region", async () => {
    const client = await connectClient();
    const { resources } = await client.listResources();

    expect(resources.map((r) => r.uri)).toEqual([
      "ledger://regions",
      "ledger://regions/row",
      "ledger://regions/other",
      "ledger://regions/downtown",
      "ledger://regions/regional",
      "ledger://regions/general",
    ]);
    await client.close();
  });

  it("reflects sources added after the server started", async () => {
    const client = await connectClient();
    await store.addSource("Downtown", { id: "src_d1", title: "D" });

    const { resources } = await client.listResources();
    const downtown = resources.find((r) => r.name === "Downtown");
    expect(downtown?.description?.endsWith("Sources: 1")).toBe(true);
    await client.close();
  });
});

describe("resources/read", () => {
  it("reads the region index", async () => {
    await store.addSource("ROW", { id: "src_r1" });
    const client = await connectClient();

    const data = await readText(client, "ledger://regions");
    expect(data).toMatchObject({
      regions: [
        { region_name: "ROW", source_count: 1 },
        { region_name: "Other", source_count: 0 },
        { region_name: "Downtown", source_count: 0 },
        { region_name: "Regional", source_count: 0 },
        { region_name: "General", source_count: 0 },
      ],
    });
    await client.close();
  });

  it("reads one region's sources", async () => {
    await store.addSource("ROW", { id: "src_r1", title: "Survey" });
    const client = await connectClient();

    expect(await readText(client, "ledger://regions/row")).toEqual({
      region: "ROW",
      total_sources: 1,
      sources: [{ id: "src_r1", title: "Survey" }],
    });
    await client.close();
  });

  it("throws on an unknown URI", async () => {
    const client = await connectClient();
    await expect(client.readResource({ uri: "ledger://regions/atlantis" })).rejects.toThrow();
    await expect(client.readResource({ uri: "knowledge://x/manifest" })).rejects.toThrow();
    await client.close();
  });
});
