// Validation for region tables and canonical project files

import {
  CATCH_ALL_PATTERN,
  PROJECT_TYPES,
  type CanonicalProjectFile,
  type Region,
  type ValidationResult,
} from "./model.js";

const KNOWN_PROJECT_TYPES = new Set<string>(PROJECT_TYPES);

export function isCatchAll(region: Region): boolean {
  return region.directoryPatterns.includes(CATCH_ALL_PATTERN);
}

/**
 * A region table is valid when names are unique, every region has patterns
 * and a document, and exactly one catch-all region sits strictly below every
 * other priority.
 */
export function validateRegions(regions: readonly Region[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (regions.length === 0) {
    errors.push("Region table is empty");
    return { errors, warnings, isValid: false };
  }

  const names = new Set<string>();
  const files = new Set<string>();

  for (const region of regions) {
    const ctx = `Region '${region.regionName}'`;

    if (!region.regionName) {
      errors.push("A region is missing required field 'name'");
    } else if (names.has(region.regionName)) {
      errors.push(`Duplicate region name: '${region.regionName}'`);
    } else {
      names.add(region.regionName);
    }

    if (region.directoryPatterns.length === 0)
      errors.push(`${ctx}: no directory patterns`);
    if (!region.sourceFile) {
      errors.push(`${ctx}: missing required field 'source_file'`);
    } else if (files.has(region.sourceFile)) {
      warnings.push(`${ctx}: shares document '${region.sourceFile}' with another region`);
    } else {
      files.add(region.sourceFile);
    }
    if (region.sourceFile.includes("/") || region.sourceFile.includes("\\"))
      errors.push(`${ctx}: source_file must be a bare filename`);
  }

  const catchAll = regions.filter(isCatchAll);
  if (catchAll.length === 0) {
    errors.push(`No catch-all region (a region with pattern '${CATCH_ALL_PATTERN}')`);
  } else if (catchAll.length > 1) {
    errors.push(
      `More than one catch-all region: ${catchAll.map((r) => r.regionName).join(", ")}`
    );
  } else {
    const fallback = catchAll[0];
    for (const region of regions) {
      if (region !== fallback && region.priority <= fallback.priority) {
        errors.push(
          `Region '${region.regionName}' has priority ${region.priority}, ` +
            `not above the catch-all '${fallback.regionName}' (${fallback.priority})`
        );
      }
    }
  }

  return { errors, warnings, isValid: errors.length === 0 };
}

/**
 * Check a canonical project file before it is written. Missing identity
 * fields are errors; an empty or unknown project type and dangling citation
 * references are warnings.
 */
export function validateProject(project: CanonicalProjectFile): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const meta = project.project_metadata;

  if (!meta.project_id) errors.push("Missing project_metadata.project_id");
  if (!meta.title) errors.push("Missing project_metadata.title");
  if (!meta.file_path) {
    errors.push("Missing project_metadata.file_path");
  } else if (!/\.json$/i.test(meta.file_path)) {
    errors.push("project_metadata.file_path must end with .json");
  }

  if (!meta.project_type) {
    warnings.push("project_metadata.project_type is empty");
  } else if (!KNOWN_PROJECT_TYPES.has(meta.project_type)) {
    warnings.push(`Unknown project type '${meta.project_type}'`);
  }

  const seen = new Set<string>();
  project.sources.forEach((link, i) => {
    if (!link.uuid) {
      errors.push(`Source ${i} missing uuid`);
    } else if (seen.has(link.uuid)) {
      errors.push(`Duplicate source uuid: '${link.uuid}'`);
    } else {
      seen.add(link.uuid);
    }
    if (!Number.isInteger(link.order) || link.order < 1)
      errors.push(`Source ${i} has invalid order: ${link.order}`);
  });

  const citationIds = new Set<string>();
  for (const citation of project.citations ?? []) {
    if (!citation.citation_id) {
      errors.push("A citation is missing required field 'citation_id'");
    } else if (citationIds.has(citation.citation_id)) {
      errors.push(`Duplicate citation id: '${citation.citation_id}'`);
    } else {
      citationIds.add(citation.citation_id);
    }
    for (const ref of citation.source_references) {
      if (!seen.has(ref)) {
        warnings.push(
          `Citation '${citation.citation_id}' references unknown source '${ref}'`
        );
      }
    }
  }

  return { errors, warnings, isValid: errors.length === 0 };
}
