// Ledger data model: regions, shared source records, and project records

// --- Regions ---

export const RegionScope = {
  Regional: "regional",
  Global: "global",
  Project: "project",
} as const;

export type RegionScope = (typeof RegionScope)[keyof typeof RegionScope];

export const CATCH_ALL_PATTERN = "**";

export interface Region {
  regionName: string;
  directoryPatterns: string[];  // minimatch globs, matched against the absolute path
  sourceFile: string;           // document filename under the master-sources root
  displayName: string;
  description: string;
  priority: number;             // higher wins; the catch-all has the lowest
  scope: RegionScope;
}

// --- Shared source records ---

export type SourceRecord = { id: string } & Record<string, unknown>;

export type NewSourceRecord = { id?: string } & Record<string, unknown>;

export interface SourcePatch {
  title?: string;
  citation?: string;
  authors?: string[];
  source_type?: string;
  publication_year?: number;
  url?: string;
  description?: string;
  notes?: string;
  extra?: Record<string, unknown>;  // free-form fields, applied after the named ones
}

export interface RegionDocumentMetadata {
  version: string;
  region: string;
  last_updated: string;    // ISO 8601
  total_sources: number;
}

export interface RegionDocument {
  sources: SourceRecord[];
  metadata: RegionDocumentMetadata;
}

export interface RegionSummary {
  region_name: string;
  display_name: string;
  description: string;
  source_count: number;
  source_file: string;
}

export interface RegionSources {
  region: string;
  sources: SourceRecord[];
}

// --- Canonical project file ---

export const PROJECT_TYPES = ["CCR", "GSC", "STD", "FCR", "COM", "CRS", "OTH"] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

export interface ProjectMetadata {
  project_id: string;
  project_type: string;
  title: string;
  file_path: string;
  requestor: string;
  request_year: string;
  relook: boolean;
}

export interface CustomerInfo {
  key: string;
  name: string;
  number: string;
  suffix?: string | null;
}

export interface ProjectSource {
  source_id: string;              // id of a SourceRecord in the project's region
  usage_notes: string;
  user_description?: string;
  date_added?: string;
  added_by?: string;
  citation_format?: string | null;
}

export interface ProjectCitation {
  citation_id: string;
  title: string;
  content?: string | null;
  source_references: string[];
  slide_number?: number | null;
  date_created?: string;
  created_by?: string;
  last_modified?: string;
  modified_by?: string;
}

// On-disk form of a ProjectSource; order is rewritten from list position on save
export interface SourceLink {
  uuid: string;
  order: number;          // 1-based
  usage_notes: string;
  user_description?: string;
  date_added?: string;
  added_by?: string;
  citation_format?: string | null;
}

export type FacilityInformation = Record<string, unknown>;

export type SlideData = Record<string, unknown>;

export interface CanonicalProjectFile {
  project_metadata: ProjectMetadata;
  /** Carried over verbatim from the legacy file. */
  team: unknown;
  key_cites: unknown;
  facility_information: FacilityInformation;
  slide_data: SlideData;
  sources: SourceLink[];
  powerpoint_file: string;
  number_header_citations: number;
  customer?: CustomerInfo;
  citations?: ProjectCitation[];
}

// --- Legacy project file ---
// Legacy files are read as untyped maps; only the filename has a fixed shape.

export interface LegacyFilenameParts {
  facilityId: string;
  suffix: string;
  projectType: string;
  year: string;
}

// --- Results ---

export type ErrorKind = "parse" | "not_found" | "io" | "validation" | "filename";

export interface OperationFailure {
  ok: false;
  kind: ErrorKind;
  message: string;
}

export type OperationResult<T> = { ok: true; value: T } | OperationFailure;

export interface ValidationResult {
  errors: string[];
  warnings: string[];
  isValid: boolean;
}
