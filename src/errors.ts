// Ledger error kinds
// Store operations turn these into OperationResult failures; the migrator and
// config loader throw them.

import type { ErrorKind, OperationFailure } from "./model.js";

export class LedgerError extends Error {
  readonly kind: ErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(message: string, kind: ErrorKind, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.kind = kind;
    this.context = context;
  }
}

/** Routing is total for a valid region table; this exists for callers that build their own. */
export class RoutingError extends LedgerError {
  constructor(projectPath: string) {
    super(`No region matches path: ${projectPath}`, "not_found", { projectPath });
  }
}

export class DocumentParseError extends LedgerError {
  readonly file: string;

  constructor(file: string, detail: string) {
    super(`Could not parse ${file}: ${detail}`, "parse", { file });
    this.file = file;
  }
}

export class NotFoundError extends LedgerError {
  constructor(resource: string, identifier: string) {
    super(`${resource} '${identifier}' not found`, "not_found", {
      resource,
      identifier,
    });
  }
}

export class FilenameFormatError extends LedgerError {
  readonly filename: string;

  constructor(filename: string) {
    super(
      `Filename does not match "<facility-id> - <suffix> - <project-type> - <year>.json": ${filename}`,
      "filename",
      { filename }
    );
    this.filename = filename;
  }
}

export class IOFailure extends LedgerError {
  readonly path: string;
  readonly code?: string;

  constructor(path: string, cause: unknown) {
    super(`I/O failure on ${path}: ${describeError(cause)}`, "io", { path });
    this.path = path;
    this.code = errnoCode(cause);
  }
}

export class ValidationError extends LedgerError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message, "validation", { fields });
    this.fields = fields;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Map any throwable onto an OperationResult failure. */
export function toFailure(err: unknown): OperationFailure {
  if (err instanceof LedgerError) {
    return { ok: false, kind: err.kind, message: err.message };
  }
  return { ok: false, kind: "io", message: describeError(err) };
}
