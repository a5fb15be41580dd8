import type { ComponentStore } from "./store.js";
import type { CandidateRecord, Component, ComponentUpdate, ReconcileOutcome } from "./types.js";

/**
 * Module: Reconciliation Engine
 * Purpose: Decide the fate of one candidate record against the stored component with the
 * same identifier.
 *
 * Precedence over `(price, hasDescription)`:
 * - no stored component: insert, with or without a description;
 * - higher candidate price: overwrite price and description, even if that drops a stored
 *   description;
 * - equal price: fill in the description only when the stored one is absent;
 * - lower price, or nothing to add: leave the stored component as is.
 */
export type ReconcileDecision =
  | { action: "insert"; record: CandidateRecord }
  | { action: "overwrite"; fields: Required<Pick<ComponentUpdate, "price" | "description">> }
  | { action: "keep"; reason: "lower_price" | "equal_price_no_gain"; existing: Component };

export const hasDescription = (value: string | null | undefined): boolean =>
  typeof value === "string" && value.trim() !== "";

/**
 * Pure decision for a candidate given the stored component (or `undefined`).
 */
export function decideReconciliation(existing: Component | undefined, candidate: CandidateRecord): ReconcileDecision {
  if (!existing) return { action: "insert", record: candidate };

  if (candidate.price > existing.price) {
    return { action: "overwrite", fields: { price: candidate.price, description: candidate.description } };
  }
  if (candidate.price === existing.price) {
    if (!hasDescription(existing.description) && hasDescription(candidate.description)) {
      return { action: "overwrite", fields: { price: existing.price, description: candidate.description } };
    }
    return { action: "keep", reason: "equal_price_no_gain", existing };
  }
  return { action: "keep", reason: "lower_price", existing };
}

export interface ReconcileResult {
  outcome: ReconcileOutcome;
  component: Component;
}

/**
 * Look up, decide and apply: at most one store mutation per candidate. Later calls see
 * the effect of earlier ones, which is what makes duplicate rows within one file resolve
 * in file order.
 */
export function reconcileCandidate(store: ComponentStore, candidate: CandidateRecord): ReconcileResult {
  const existing = store.findComponent(candidate.identifier);
  const decision = decideReconciliation(existing, candidate);
  switch (decision.action) {
    case "insert":
      return {
        outcome: "inserted",
        component: store.insertComponent({
          identifier: decision.record.identifier,
          description: decision.record.description,
          price: decision.record.price,
        }),
      };
    case "overwrite":
      return { outcome: "overwritten", component: store.updateComponent(candidate.identifier, decision.fields) };
    case "keep":
      return { outcome: "unchanged", component: decision.existing };
  }
}
