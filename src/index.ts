// citation-ledger: public library surface
// Import this to embed the regional source store, migrator or MCP server.

export { DEFAULT_REGIONS, loadRegionConfig, parseRegionConfig, resolveMasterSourcesRoot } from "./config.js";
export { PathRouter, normalizeProjectPath } from "./router.js";
export {
  RegionalStore,
  applySourcePatch,
  parseRegionDocument,
  parseSourcePatch,
  randomSourceId,
} from "./store.js";
export { ProjectRecord, loadProject, saveProject } from "./project.js";
export { migrate, parseLegacyFilename, parseSlideRefs, isCanonical } from "./migrator.js";
export { migrateDirectory, migrateFile } from "./batch.js";
export { validateRegions, validateProject } from "./validator.js";
export { createLedgerServer } from "./server.js";
export { createLogger, silentLogger } from "./logger.js";
export { runCli } from "./commands.js";
export {
  LedgerError,
  RoutingError,
  DocumentParseError,
  NotFoundError,
  FilenameFormatError,
  IOFailure,
  ValidationError,
  toFailure,
} from "./errors.js";
export {
  REGION_INDEX_URI,
  toRegionSlug,
  buildRegionUri,
  parseRegionUri,
  buildRegionResource,
  buildIndexResource,
} from "./mapper.js";
export { RegionScope, CATCH_ALL_PATTERN, PROJECT_TYPES } from "./model.js";
export type {
  Region,
  SourceRecord,
  NewSourceRecord,
  SourcePatch,
  RegionDocument,
  RegionSummary,
  RegionSources,
  ProjectMetadata,
  ProjectType,
  ProjectSource,
  ProjectCitation,
  CanonicalProjectFile,
  OperationResult,
  OperationFailure,
  ErrorKind,
  ValidationResult,
} from "./model.js";
export type { RegionalStoreOptions } from "./store.js";
export type { BatchOptions, BatchReport, BatchFailure } from "./batch.js";
export type { LedgerServerOptions, LedgerMcpServer } from "./server.js";
export type { CliIO } from "./commands.js";
export type { McpResourceMeta } from "./mapper.js";
export type { Logger } from "./logger.js";
