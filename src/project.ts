// Project record model: the canonical per-project document

import { readFile } from "node:fs/promises";
import { v4 as uuidv4 } from "uuid";
import type {
  CanonicalProjectFile,
  CustomerInfo,
  FacilityInformation,
  ProjectCitation,
  ProjectMetadata,
  ProjectSource,
  SlideData,
  SourceLink,
} from "./model.js";
import { DocumentParseError, IOFailure, NotFoundError, describeError, errnoCode } from "./errors.js";
import { DEFAULT_IO_TIMEOUT_MS, atomicWriteJSON, withTimeout } from "./fsutil.js";

type RawMap = Record<string, unknown>;

const KNOWN_KEYS = new Set([
  "project_metadata",
  "team",
  "key_cites",
  "facility_information",
  "slide_data",
  "sources",
  "powerpoint_file",
  "number_header_citations",
  "customer",
  "citations",
]);

export interface DanglingReference {
  citation_id: string;
  source_id: string;
}

// --- Raw helpers ---

function isRawMap(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown, fallback = ""): string {
  return value === undefined || value === null ? fallback : String(value);
}

function asMaps(value: unknown): RawMap[] {
  return Array.isArray(value) ? value.filter(isRawMap) : [];
}

/** Copy `key` into `target` only when `raw` has it, keeping an explicit null. */
function copyOptional<T extends object, K extends keyof T & string>(
  target: T,
  key: K,
  raw: RawMap,
  convert: (value: unknown) => T[K]
): void {
  if (key in raw) target[key] = convert(raw[key]);
}

function nullableString(value: unknown): string | null {
  return value === null ? null : String(value);
}

function nullableNumber(value: unknown): number | null {
  return value === null ? null : Number(value);
}

function parseMetadata(raw: RawMap): ProjectMetadata {
  return {
    project_id: str(raw["project_id"]),
    project_type: str(raw["project_type"]),
    title: str(raw["title"]),
    file_path: str(raw["file_path"]),
    requestor: str(raw["requestor"]),
    request_year: str(raw["request_year"]),
    relook: raw["relook"] === true,
  };
}

function parseCustomer(raw: RawMap): CustomerInfo {
  const customer: CustomerInfo = {
    key: str(raw["key"]),
    name: str(raw["name"]),
    number: str(raw["number"]),
  };
  copyOptional(customer, "suffix", raw, nullableString);
  return customer;
}

function parseSourceLink(raw: RawMap): ProjectSource {
  const source: ProjectSource = {
    source_id: str(raw["uuid"] ?? raw["source_id"]),
    usage_notes: str(raw["usage_notes"]),
  };
  copyOptional(source, "user_description", raw, String);
  copyOptional(source, "date_added", raw, String);
  copyOptional(source, "added_by", raw, String);
  copyOptional(source, "citation_format", raw, nullableString);
  return source;
}

function parseCitation(raw: RawMap): ProjectCitation {
  const refs = raw["source_references"];
  const citation: ProjectCitation = {
    citation_id: str(raw["citation_id"]),
    title: str(raw["title"]),
    source_references: Array.isArray(refs) ? refs.map(String) : [],
  };
  copyOptional(citation, "content", raw, nullableString);
  copyOptional(citation, "slide_number", raw, nullableNumber);
  copyOptional(citation, "date_created", raw, String);
  copyOptional(citation, "created_by", raw, String);
  copyOptional(citation, "last_modified", raw, String);
  copyOptional(citation, "modified_by", raw, String);
  return citation;
}

function toSourceLink(source: ProjectSource, index: number): SourceLink {
  const { source_id, usage_notes, ...rest } = source;
  return { uuid: source_id, order: index + 1, usage_notes, ...rest };
}

// --- Model ---

export interface NewProjectInit {
  project_type: string;
  title: string;
  file_path: string;
  requestor?: string;
  request_year?: string;
  customer?: CustomerInfo;
}

export class ProjectRecord {
  metadata: ProjectMetadata;
  customer?: CustomerInfo;
  sources: ProjectSource[] = [];
  citations: ProjectCitation[] = [];
  team: unknown = {};
  keyCites: unknown = [];
  facilityInformation: FacilityInformation = {};
  slideData: SlideData = {};
  powerpointFile = "";
  numberHeaderCitations = 0;
  /** Top-level keys this model does not know, written back unchanged. */
  extra: RawMap = {};

  constructor(metadata: ProjectMetadata) {
    this.metadata = metadata;
  }

  static create(init: NewProjectInit): ProjectRecord {
    const record = new ProjectRecord({
      project_id: uuidv4(),
      project_type: init.project_type,
      title: init.title,
      file_path: init.file_path,
      requestor: init.requestor ?? "",
      request_year: init.request_year ?? "",
      relook: false,
    });
    if (init.customer) record.customer = init.customer;
    return record;
  }

  /** Build from parsed canonical JSON. Throws DocumentParseError on a non-canonical shape. */
  static from(data: unknown, file = "<memory>"): ProjectRecord {
    if (!isRawMap(data)) throw new DocumentParseError(file, "top level is not an object");
    const meta = data["project_metadata"];
    if (!isRawMap(meta)) throw new DocumentParseError(file, "missing 'project_metadata'");

    const record = new ProjectRecord(parseMetadata(meta));
    if (isRawMap(data["customer"])) record.customer = parseCustomer(data["customer"]);
    record.sources = asMaps(data["sources"]).map(parseSourceLink);
    record.citations = asMaps(data["citations"]).map(parseCitation);
    if ("team" in data) record.team = data["team"];
    if ("key_cites" in data) record.keyCites = data["key_cites"];
    if (isRawMap(data["facility_information"]))
      record.facilityInformation = data["facility_information"];
    if (isRawMap(data["slide_data"])) record.slideData = data["slide_data"];
    record.powerpointFile = str(data["powerpoint_file"]);
    const headers = Number(data["number_header_citations"] ?? 0);
    record.numberHeaderCitations = Number.isFinite(headers) ? headers : 0;
    for (const [key, value] of Object.entries(data)) {
      if (!KNOWN_KEYS.has(key)) record.extra[key] = value;
    }
    return record;
  }

  toJSON(): CanonicalProjectFile {
    const file: CanonicalProjectFile = {
      project_metadata: { ...this.metadata },
      team: this.team,
      key_cites: this.keyCites,
      facility_information: this.facilityInformation,
      slide_data: this.slideData,
      sources: this.sources.map(toSourceLink),
      powerpoint_file: this.powerpointFile,
      number_header_citations: this.numberHeaderCitations,
    };
    if (this.customer) file.customer = { ...this.customer };
    if (this.citations.length > 0)
      file.citations = this.citations.map((c) => ({ ...c, source_references: [...c.source_references] }));
    return { ...this.extra, ...file };
  }

  // --- sources ---

  /** Replaces any entry with the same source_id; the new entry goes last. */
  addSource(source: ProjectSource): void {
    this.sources = this.sources.filter((s) => s.source_id !== source.source_id);
    this.sources.push(source);
  }

  removeSource(sourceId: string): boolean {
    const before = this.sources.length;
    this.sources = this.sources.filter((s) => s.source_id !== sourceId);
    return this.sources.length < before;
  }

  getSource(sourceId: string): ProjectSource | undefined {
    return this.sources.find((s) => s.source_id === sourceId);
  }

  // --- citations ---

  /** Replaces any entry with the same citation_id; the new entry goes last. */
  addCitation(citation: ProjectCitation): void {
    this.citations = this.citations.filter((c) => c.citation_id !== citation.citation_id);
    this.citations.push(citation);
  }

  removeCitation(citationId: string): boolean {
    const before = this.citations.length;
    this.citations = this.citations.filter((c) => c.citation_id !== citationId);
    return this.citations.length < before;
  }

  getCitation(citationId: string): ProjectCitation | undefined {
    return this.citations.find((c) => c.citation_id === citationId);
  }

  getCitationsBySource(sourceId: string): ProjectCitation[] {
    return this.citations.filter((c) => c.source_references.includes(sourceId));
  }

  /** Citation references to sources this project does not list. Not enforced on add. */
  danglingReferences(): DanglingReference[] {
    const known = new Set(this.sources.map((s) => s.source_id));
    const dangling: DanglingReference[] = [];
    for (const citation of this.citations) {
      for (const ref of citation.source_references) {
        if (!known.has(ref)) dangling.push({ citation_id: citation.citation_id, source_id: ref });
      }
    }
    return dangling;
  }
}

// --- Persistence ---

export async function loadProject(
  filePath: string,
  timeoutMs: number = DEFAULT_IO_TIMEOUT_MS
): Promise<ProjectRecord> {
  let text: string;
  try {
    text = await withTimeout(readFile(filePath, "utf-8"), timeoutMs, filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") throw new NotFoundError("Project file", filePath);
    if (err instanceof IOFailure) throw err;
    throw new IOFailure(filePath, err);
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new DocumentParseError(filePath, describeError(err));
  }
  return ProjectRecord.from(data, filePath);
}

export async function saveProject(
  filePath: string,
  record: ProjectRecord,
  timeoutMs: number = DEFAULT_IO_TIMEOUT_MS
): Promise<void> {
  await atomicWriteJSON(filePath, record.toJSON(), timeoutMs, 4);
}
