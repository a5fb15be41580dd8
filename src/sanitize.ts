import type { CandidateRecord, Issue, NewCategory, NewComponent } from "./types.js";

/**
 * Module: Field Sanitizers & Row Validation
 * Purpose: Normalize loosely-typed import cells and manual input into canonical values.
 * Features:
 * - Identifier and description trimming; empty description becomes absent (`null`).
 * - Price parsing that tolerates a leading `$` and either thousands commas (`1,250.50`)
 *   or, for sources that use it, a decimal comma (`0,05`).
 * - Issue codes shared by row skips (import) and `ValidationError` (manual input).
 */
const collapseWS = (s: string): string => s.replace(/\s+/g, " ").trim();
const cell = (v: unknown): string => (v === undefined || v === null ? "" : String(v)).trim();

export function sanitizeIdentifier(v: unknown): { value?: string; issues: Issue[] } {
  const s = cell(v);
  if (!s) return { issues: [{ field: "identifier", code: "E_IDENTIFIER_MISSING", msg: "identifier required", level: "error" }] };
  return { value: s, issues: [] };
}

export function sanitizeDescription(v: unknown): { value: string | null; issues: Issue[] } {
  const s = cell(v);
  return { value: s ? s : null, issues: [] };
}

export interface NumberFormat {
  // `,` marks decimals instead of thousands
  decimalComma?: boolean;
}

const THOUSANDS = /^[-+]?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;
const DECIMAL_COMMA = /^[-+]?\d*,\d+$/;

function normalizeNumeric(raw: string, { decimalComma }: NumberFormat): string {
  const s = raw.replace(/^\$\s*/, "");
  if (!s.includes(",")) return s;
  if (decimalComma) return DECIMAL_COMMA.test(s) ? s.replace(",", ".") : s;
  return THOUSANDS.test(s) ? s.replace(/,/g, "") : s;
}

export function sanitizeNumber(
  v: unknown,
  { gt, ge, decimalComma }: { gt?: number; ge?: number } & NumberFormat = {}
): { value?: number; issues: Issue[] } {
  const issues: Issue[] = [];
  if (typeof v === "number") {
    if (!Number.isFinite(v)) return { issues: [{ field: "number", code: "E_NUM", msg: "not a number", level: "error" }] };
    return boundsCheck(v, { gt, ge });
  }
  const raw = cell(v);
  if (!raw) return { issues };
  const cleaned = normalizeNumeric(raw, { decimalComma });
  const n = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i.test(cleaned) ? Number(cleaned) : NaN;
  if (!Number.isFinite(n)) {
    issues.push({ field: "number", code: "E_NUM", msg: "not a number", level: "error" });
    return { issues };
  }
  return boundsCheck(n, { gt, ge });
}

function boundsCheck(n: number, { gt, ge }: { gt?: number; ge?: number }): { value?: number; issues: Issue[] } {
  const issues: Issue[] = [];
  if (ge !== undefined && n < ge) issues.push({ field: "number", code: "E_NUM_GE", msg: `must be ≥ ${ge}`, level: "error" });
  if (gt !== undefined && n <= gt) issues.push({ field: "number", code: "E_NUM_GT", msg: `must be > ${gt}`, level: "error" });
  return issues.length ? { issues } : { value: n, issues };
}

export function sanitizePrice(v: unknown, format: NumberFormat = {}): { value?: number; issues: Issue[] } {
  if (cell(v) === "") return { issues: [{ field: "price", code: "E_PRICE_MISSING", msg: "price required", level: "error" }] };
  const { value, issues } = sanitizeNumber(v, { ge: 0, ...format });
  return { value, issues: issues.map((i) => ({ ...i, field: "price" })) };
}

export function sanitizeQuantity(v: unknown): { value?: number; issues: Issue[] } {
  if (cell(v) === "") return { value: 0, issues: [] };
  const { value, issues } = sanitizeNumber(v);
  if (value !== undefined && !Number.isInteger(value)) {
    return { issues: [{ field: "quantity", code: "E_NUM_INT", msg: "must be a whole number", level: "error" }] };
  }
  return { value, issues: issues.map((i) => ({ ...i, field: "quantity" })) };
}

export function sanitizeCategoryName(v: unknown): { value?: string; issues: Issue[] } {
  const s = collapseWS(cell(v));
  if (!s) return { issues: [{ field: "name", code: "E_NAME_MISSING", msg: "category name required", level: "error" }] };
  return { value: s, issues: [] };
}

/**
 * Sanitize one import row. Returns `record: null` with the blocking issues when the row
 * has to be skipped (missing identifier, missing or unparseable or negative price).
 */
export function sanitizeCandidate(
  raw: { identifier: unknown; price: unknown; description: unknown },
  format: NumberFormat = {}
): {
  record: CandidateRecord | null;
  issues: Issue[];
} {
  const id = sanitizeIdentifier(raw.identifier);
  const price = sanitizePrice(raw.price, format);
  const desc = sanitizeDescription(raw.description);
  const issues = [...id.issues, ...price.issues, ...desc.issues];
  if (id.value === undefined || price.value === undefined) return { record: null, issues };
  return { record: { identifier: id.value, price: price.value, description: desc.value }, issues };
}

/**
 * Validate manual component input before it reaches the store.
 */
export function sanitizeComponentInput(input: {
  identifier: unknown;
  price?: unknown;
  description?: unknown;
  quantity?: unknown;
}): { value?: NewComponent; issues: Issue[] } {
  const id = sanitizeIdentifier(input.identifier);
  // Manual entry defaults an omitted price to 0
  const price = cell(input.price) === "" ? { value: 0, issues: [] } : sanitizePrice(input.price);
  const desc = sanitizeDescription(input.description);
  const qty = sanitizeQuantity(input.quantity);
  const issues = [...id.issues, ...price.issues, ...desc.issues, ...qty.issues];
  if (id.value === undefined || price.value === undefined || qty.value === undefined) return { issues };
  return {
    value: { identifier: id.value, price: price.value, description: desc.value, quantity: qty.value },
    issues,
  };
}

export function sanitizeCategoryInput(input: { name: unknown; description?: unknown }): { value?: NewCategory; issues: Issue[] } {
  const name = sanitizeCategoryName(input.name);
  const desc = sanitizeDescription(input.description);
  if (name.value === undefined) return { issues: name.issues };
  return { value: { name: name.value, description: desc.value }, issues: [] };
}
