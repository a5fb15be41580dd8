/**
 * Module: Catalog Core Entry Point
 * Purpose: Public API for the component catalog: import reconciliation, the SQLite
 * record store, link maintenance and manual catalog edits.
 * Notes:
 * - Importers accept text, `ArrayBuffer` (CSV or XLSX) or a file path.
 * - Per-row outcomes are opt-in through `includeOutcomes`.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./sanitize.js";
export type { ComponentStore } from "./store.js";
export { SqliteComponentStore } from "./sqliteStore.js";
export { CandidateSequence, parseCandidatesFromRows, parseCandidatesFromText } from "./parseRecords.js";
export { decideReconciliation, reconcileCandidate, type ReconcileDecision, type ReconcileResult } from "./reconcile.js";
export {
  importCandidates,
  importComponentsFile,
  importComponentsFromBuffer,
  importComponentsFromText,
} from "./importDriver.js";
export { LinkManager } from "./linkManager.js";
export { CatalogService, type ComponentEdit, type ComponentInput } from "./catalog.js";
export { STANDARD_CATEGORIES, categorizeComponent, type StandardCategoryName } from "./category.js";
export { loadConfig, loadConfigFromEnvFile, type CatalogConfig } from "./config.js";
export { createLogger, setLogLevel, type LogLevel, type Logger } from "./logger.js";
