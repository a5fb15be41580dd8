import { readFile } from "node:fs/promises";
import path from "node:path";
import { CatalogService } from "./catalog.js";
import { ImportFailedError, SourceReadError } from "./errors.js";
import { createLogger } from "./logger.js";
import { parseCandidatesFromRows, parseCandidatesFromText } from "./parseRecords.js";
import { reconcileCandidate } from "./reconcile.js";
import type { ComponentStore } from "./store.js";
import {
  ENGINE_VERSION,
  type ImportOptions,
  type ImportSummary,
  type ParsedRow,
  type ReconcileOutcome,
} from "./types.js";
import { readXlsxToRows } from "./xlsx.js";

/**
 * Module: Import Driver
 * Purpose: Run parsed rows through the reconciliation engine in file order and report
 * what happened to each.
 * Notes:
 * - Each row is applied in its own transaction; there is no whole-batch rollback.
 * - An aborted `signal` stops the batch before the next row and keeps what was applied.
 * - A store failure halts the batch with `ImportFailedError`, which carries the summary
 *   of the rows committed so far.
 */
const log = createLogger("import");

const emptySummary = (includeOutcomes: boolean): ImportSummary => ({
  inserted: 0,
  overwritten: 0,
  unchanged: 0,
  skipped: 0,
  processed: 0,
  cancelled: false,
  outcomes: includeOutcomes ? [] : undefined,
  engineVersion: ENGINE_VERSION,
});

export function importCandidates(rows: Iterable<ParsedRow>, store: ComponentStore, options: ImportOptions = {}): ImportSummary {
  const summary = emptySummary(options.includeOutcomes ?? false);
  const catalog = options.autoCategorize ? new CatalogService(store) : undefined;

  for (const parsed of rows) {
    if (options.signal?.aborted) {
      summary.cancelled = true;
      log.warn(`import cancelled after ${summary.processed} rows`);
      break;
    }

    if (parsed.kind === "skip") {
      summary.skipped++;
      summary.processed++;
      summary.outcomes?.push({ row: parsed.row, outcome: "skipped", issues: parsed.issues });
      log.debug(`row ${parsed.row} skipped: ${parsed.issues.map((i) => i.code).join(",")}`);
      continue;
    }

    const { record } = parsed;
    let outcome: ReconcileOutcome;
    try {
      outcome = store.transaction(() => {
        const result = reconcileCandidate(store, record);
        if (catalog && result.outcome === "inserted") catalog.autoCategorize(result.component);
        return result.outcome;
      });
    } catch (err) {
      log.error(`row ${parsed.row} (${record.identifier}) failed; ${summary.processed} rows kept`);
      throw new ImportFailedError(parsed.row, summary, err);
    }

    summary[outcome]++;
    summary.processed++;
    summary.outcomes?.push({ row: parsed.row, identifier: record.identifier, outcome });
  }
  return summary;
}

/**
 * Import delimited text. Header problems throw `MissingHeaderError` before any row runs.
 */
export function importComponentsFromText(text: string, store: ComponentStore, options?: ImportOptions): ImportSummary {
  const summary = importCandidates(parseCandidatesFromText(text), store, options);
  logSummary("text", summary);
  return summary;
}

/**
 * Import a file's bytes: `.xlsx` goes through the workbook reader, anything else is
 * decoded as UTF-8 delimited text.
 */
export function importComponentsFromBuffer(
  fileBytes: ArrayBuffer,
  filename: string,
  store: ComponentStore,
  options?: ImportOptions
): ImportSummary {
  const lower = filename.toLowerCase();
  let summary: ImportSummary;
  if (lower.endsWith(".xlsx")) {
    const { rows } = readXlsxToRows(fileBytes);
    summary = importCandidates(parseCandidatesFromRows(rows), store, options);
  } else {
    const text = new TextDecoder("utf-8").decode(fileBytes);
    summary = importCandidates(parseCandidatesFromText(text), store, options);
  }
  logSummary(filename, summary);
  return summary;
}

export async function importComponentsFile(
  filePath: string,
  store: ComponentStore,
  options?: ImportOptions
): Promise<ImportSummary> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    throw new SourceReadError(filePath, err);
  }
  return importComponentsFromBuffer(toArrayBuffer(bytes), path.basename(filePath), store, options);
}

function toArrayBuffer(bytes: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

function logSummary(source: string, s: ImportSummary): void {
  const status = s.cancelled ? "cancelled" : "done";
  log.info(
    `${source}: ${status} inserted=${s.inserted} overwritten=${s.overwritten} unchanged=${s.unchanged} skipped=${s.skipped}`
  );
}
