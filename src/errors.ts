import type { ImportSummary, Issue } from "./types.js";

/**
 * Module: Error Kinds
 * Purpose: Typed failures surfaced by the catalog. Row-level parse problems are not
 * errors; they travel as `Issue`s inside the import summary.
 */
export type CatalogErrorCode =
  | "E_VALIDATION"
  | "E_NOT_FOUND"
  | "E_STORE"
  | "E_DUPLICATE_NAME"
  | "E_DUPLICATE_IDENTIFIER"
  | "E_HEADER_MISSING"
  | "E_SOURCE_READ"
  | "E_IMPORT_FAILED"
  | "E_USAGE";

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends CatalogError {
  readonly issues: Issue[];

  constructor(issues: Issue[]) {
    super("E_VALIDATION", issues.map((i) => `${i.field}: ${i.msg}`).join("; ") || "invalid input");
    this.issues = issues;
  }
}

export class NotFoundError extends CatalogError {
  constructor(entity: "component" | "category" | "link", key: string | number) {
    super("E_NOT_FOUND", `${entity} not found: ${key}`);
  }
}

export class StoreError extends CatalogError {
  constructor(message: string, cause?: unknown) {
    super("E_STORE", message, { cause });
  }
}

export class DuplicateNameError extends CatalogError {
  constructor(name: string) {
    super("E_DUPLICATE_NAME", `category name already exists: ${name}`);
  }
}

export class DuplicateIdentifierError extends CatalogError {
  constructor(identifier: string) {
    super("E_DUPLICATE_IDENTIFIER", `component identifier already exists: ${identifier}`);
  }
}

export class MissingHeaderError extends CatalogError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super("E_HEADER_MISSING", `header row must declare ITEM, PRICE, DESCRIPTION (missing: ${missing.join(", ")})`);
    this.missing = missing;
  }
}

export class SourceReadError extends CatalogError {
  constructor(source: string, cause?: unknown) {
    super("E_SOURCE_READ", `cannot read import source: ${source}`, { cause });
  }
}

export class ImportFailedError extends CatalogError {
  readonly summary: ImportSummary;
  readonly row: number;

  constructor(row: number, summary: ImportSummary, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("E_IMPORT_FAILED", `import halted at row ${row}: ${reason}`, { cause });
    this.summary = summary;
    this.row = row;
  }
}
