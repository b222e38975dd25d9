// citation-ledger command dispatch, kept apart from the bin entry so it can be driven in-process

import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { DEFAULT_REGIONS, loadRegionConfig, resolveMasterSourcesRoot } from "./config.js";
import { LedgerError, ValidationError, describeError } from "./errors.js";
import { atomicWriteJSON } from "./fsutil.js";
import { createLogger, parseLevel, type Logger } from "./logger.js";
import { sourcesToJson } from "./mapper.js";
import { migrateDirectory, migrateFile } from "./batch.js";
import { loadProject } from "./project.js";
import { createLedgerServer } from "./server.js";
import { RegionalStore, parseSourcePatch } from "./store.js";

export const USAGE = `Usage: citation-ledger <command> [options]

Commands:
  regions                              List regions and their source counts
  resolve <project-path>               Print the region a project path routes to
  sources <region>                     List a region's shared sources
  sources --project <project-path>     List the sources for a project's region
  add-source <region> <json>           Add a source record
  update-source <region> <id> <json>   Patch a source record
  project <file>                       Summarize a canonical project file
  migrate <file> [--out <file>]        Migrate one legacy project file
  migrate-dir <dir> [--out <dir>] [--recursive] [--dry-run] [--backup <dir>]
                                       Migrate every legacy file in a directory
  serve                                Serve region documents as MCP resources over stdio

Options:
  --root <dir>          Master-sources root (default: $CITATION_LEDGER_ROOT or platform default)
  --regions <file>      Region table YAML (default: built-in table)
  --log-level <level>   fatal|error|warn|info|debug|trace|silent (default: $LOG_LEVEL or info)
  --help, -h            Show this help
`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Overrides the logger built from --log-level. */
  logger?: Logger;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
};

class UsageError extends Error {}

function parseJsonObject(text: string | undefined, what: string): Record<string, unknown> {
  if (text === undefined) throw new UsageError(`missing ${what}`);
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`${what} is not valid JSON: ${describeError(err)}`);
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ValidationError(`${what} must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(data));
}

function requireArg(value: string | undefined, what: string): string {
  if (!value) throw new UsageError(`missing ${what}`);
  return value;
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2) + "\n";
}

/**
 * Run one command. Returns the process exit code: 0 on success, 1 when an
 * operation or any file of a batch fails, 2 on a usage error.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: [...argv],
      options: {
        root: { type: "string" },
        regions: { type: "string" },
        "log-level": { type: "string" },
        project: { type: "string" },
        out: { type: "string" },
        backup: { type: "string" },
        recursive: { type: "boolean", default: false },
        "dry-run": { type: "boolean", default: false },
        help: { type: "boolean", default: false, short: "h" },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    io.stderr(`Error: ${describeError(err)}\n\n${USAGE}`);
    return 2;
  }
  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  if (values.help || command === undefined) {
    io.stderr(USAGE);
    return values.help ? 0 : 2;
  }

  const level = values["log-level"];
  if (level !== undefined && parseLevel(level) === undefined) {
    io.stderr(`Error: unknown log level '${level}'\n`);
    return 2;
  }
  const logger = io.logger ?? createLogger({ level: parseLevel(level) });

  try {
    const regions = values.regions ? loadRegionConfig(values.regions) : DEFAULT_REGIONS;
    const root = resolveMasterSourcesRoot(values.root, io.env);
    const store = new RegionalStore({ root, regions, logger });

    switch (command) {
      case "regions":
        io.stdout(json({ root, regions: await store.listRegions() }));
        return 0;

      case "resolve":
        io.stdout(store.resolveRegion(requireArg(args[0], "project path")) + "\n");
        return 0;

      case "sources": {
        const result = values.project
          ? await store.sourcesForProject(values.project)
          : await store.listSources(requireArg(args[0], "region name"));
        io.stdout(sourcesToJson(result) + "\n");
        return 0;
      }

      case "add-source": {
        const region = requireArg(args[0], "region name");
        const result = await store.addSource(region, parseJsonObject(args[1], "source JSON"));
        if (!result.ok) {
          io.stderr(`Error (${result.kind}): ${result.message}\n`);
          return 1;
        }
        io.stdout(json(result.value));
        return 0;
      }

      case "update-source": {
        const region = requireArg(args[0], "region name");
        const id = requireArg(args[1], "source id");
        const patch = parseSourcePatch(parseJsonObject(args[2], "patch JSON"));
        const result = await store.updateSource(region, id, patch);
        if (!result.ok) {
          io.stderr(`Error (${result.kind}): ${result.message}\n`);
          return 1;
        }
        io.stdout(json(result.value));
        return 0;
      }

      case "project": {
        const record = await loadProject(requireArg(args[0], "project file"));
        const dangling = record.danglingReferences();
        io.stdout(
          json({
            project_id: record.metadata.project_id,
            title: record.metadata.title,
            project_type: record.metadata.project_type,
            region: store.resolveRegion(record.metadata.file_path),
            sources: record.sources.length,
            citations: record.citations.length,
            dangling_references: dangling,
          })
        );
        return dangling.length > 0 ? 1 : 0;
      }

      case "migrate": {
        const canonical = await migrateFile(requireArg(args[0], "legacy file"), { logger });
        if (values.out) {
          await atomicWriteJSON(values.out, canonical, undefined, 4);
          io.stdout(values.out + "\n");
        } else {
          io.stdout(JSON.stringify(canonical, null, 4) + "\n");
        }
        return 0;
      }

      case "migrate-dir": {
        const report = await migrateDirectory({
          inputDir: requireArg(args[0], "input directory"),
          outputDir: values.out,
          recursive: values.recursive,
          dryRun: values["dry-run"],
          backupDir: values.backup,
          logger,
        });
        io.stdout(json(report));
        return report.failed > 0 ? 1 : 0;
      }

      case "serve": {
        await store.init();
        const { server } = createLedgerServer(store, { logger });
        await server.connect(new StdioServerTransport());
        return 0;
      }

      default:
        throw new UsageError(`unknown command '${command}'`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    const kind = err instanceof LedgerError ? err.kind : "io";
    logger.error({ command, kind, err: describeError(err) }, "command failed");
    io.stderr(`Error (${kind}): ${describeError(err)}\n`);
    return 1;
  }
}
