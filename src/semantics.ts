/**
 * Module: Header Semantics
 * Purpose: Resolve the columns of an import header to the three fields the catalog reads.
 * Labels match case-insensitively after trimming; unknown columns are ignored.
 */
import type { HeaderKey } from "./types.js";
import { MissingHeaderError } from "./errors.js";

interface HeaderDef {
  key: HeaderKey;
  label: string;
}

// Declared in the order the header carries them
const defs: HeaderDef[] = [
  { key: "identifier", label: "ITEM" },
  { key: "price", label: "PRICE" },
  { key: "description", label: "DESCRIPTION" },
];

const normalize = (s: string): string => s.replace(/^\uFEFF/, "").trim().toUpperCase();

export type HeaderColumns = Record<HeaderKey, number>;

/**
 * Map each required field to its column index. The first matching column wins when a
 * label repeats. Throws `MissingHeaderError` naming every absent label.
 */
export function resolveHeaderColumns(headers: string[]): HeaderColumns {
  const normalized = headers.map((h) => normalize(String(h ?? "")));
  const found: Partial<HeaderColumns> = {};
  const missing: string[] = [];
  for (const def of defs) {
    const idx = normalized.indexOf(def.label);
    if (idx === -1) missing.push(def.label);
    else found[def.key] = idx;
  }
  if (found.identifier === undefined || found.price === undefined || found.description === undefined) {
    throw new MissingHeaderError(missing);
  }
  return { identifier: found.identifier, price: found.price, description: found.description };
}

