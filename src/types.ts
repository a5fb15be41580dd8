/**
 * Module: Public Types & Engine Version
 * Purpose: Define the component/category contracts, candidate records produced by the
 * parser, reconciliation outcome tags and the import summary returned to callers.
 */
export interface Component {
  id: number;
  identifier: string;
  description: string | null;
  price: number;
  quantity: number;
  // Current category, derived from the link table (see linkManager.ts)
  categoryId: number | null;
  categoryName: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Category {
  id: number;
  name: string;
  description: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ComponentLink {
  componentId: number;
  categoryId: number;
}

// Fields accepted on insert; timestamps and ids are always assigned by the store
export interface NewComponent {
  identifier: string;
  description?: string | null;
  price: number;
  quantity?: number;
}

export interface ComponentUpdate {
  identifier?: string;
  description?: string | null;
  price?: number;
  quantity?: number;
}

export interface NewCategory {
  name: string;
  description?: string | null;
}

export interface CategoryUpdate {
  name?: string;
  description?: string | null;
}

// A parsed row not yet reconciled against the store
export interface CandidateRecord {
  identifier: string;
  price: number;
  description: string | null;
}

export type IssueLevel = "error" | "warn";
export type Issue = { field: string; code: string; msg: string; level: IssueLevel };

export type ParsedRow =
  | { kind: "candidate"; row: number; record: CandidateRecord }
  | { kind: "skip"; row: number; issues: Issue[] };

export type ReconcileOutcome = "inserted" | "overwritten" | "unchanged";
export type OutcomeTag = ReconcileOutcome | "skipped";

export interface RowOutcome {
  row: number;    // 1-based file row, header included
  identifier?: string;
  outcome: OutcomeTag;
  issues?: Issue[];
}

export interface ImportSummary {
  inserted: number;
  overwritten: number;
  unchanged: number;
  skipped: number;
  processed: number;   // Rows handled before completion or cancellation
  cancelled: boolean;
  outcomes?: RowOutcome[];
  engineVersion: string;
}

export interface ImportOptions {
  // Stop before the next row once aborted; mutations already applied are kept
  signal?: AbortSignal;
  includeOutcomes?: boolean;
  // Link newly inserted components to a standard category chosen by keyword rules
  autoCategorize?: boolean;
}

export type HeaderKey = "identifier" | "price" | "description";
export type Delimiter = "," | ";" | "\t" | "|";

export const ENGINE_VERSION = "0.1.0";
