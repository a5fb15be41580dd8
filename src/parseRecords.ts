import { detectDelimiterFromText, iterateDsvRows, stripBom } from "./csv.js";
import { MissingHeaderError } from "./errors.js";
import { sanitizeCandidate } from "./sanitize.js";
import { resolveHeaderColumns, type HeaderColumns } from "./semantics.js";
import type { Delimiter, ParsedRow } from "./types.js";

/**
 * Module: Candidate Record Parser
 * Purpose: Turn tabular import rows into candidate records for reconciliation.
 * Design:
 * - The header is located and validated eagerly, so a structurally broken source fails
 *   before any row is reconciled.
 * - Data rows are parsed lazily; every iteration restarts from the first data row.
 * - Rows that cannot become a candidate are yielded as `skip` entries with their issues;
 *   purely blank rows are dropped without being reported.
 * - Row numbers are 1-based and count the header, so they match a spreadsheet view.
 * - Text sniffed as `;`, tab or `|` separated reads `,` in prices as the decimal mark.
 */
export class CandidateSequence implements Iterable<ParsedRow> {
  readonly columns: HeaderColumns;
  readonly delimiter?: Delimiter;
  private readonly headerIndex: number;

  private constructor(
    private readonly rows: () => Iterable<string[]>,
    meta: { columns: HeaderColumns; headerIndex: number; delimiter?: Delimiter }
  ) {
    this.columns = meta.columns;
    this.headerIndex = meta.headerIndex;
    this.delimiter = meta.delimiter;
  }

  static fromRows(rows: () => Iterable<string[]>, delimiter?: Delimiter): CandidateSequence {
    let index = 0;
    for (const row of rows()) {
      if (!isBlank(row)) {
        const columns = resolveHeaderColumns(row);
        return new CandidateSequence(rows, { columns, headerIndex: index, delimiter });
      }
      index++;
    }
    throw new MissingHeaderError(["ITEM", "PRICE", "DESCRIPTION"]);
  }

  *[Symbol.iterator](): Iterator<ParsedRow> {
    const { identifier, price, description } = this.columns;
    const format = { decimalComma: this.delimiter !== undefined && this.delimiter !== "," };
    let index = 0;
    for (const row of this.rows()) {
      const rowNumber = ++index;
      if (rowNumber <= this.headerIndex + 1 || isBlank(row)) continue;
      const { record, issues } = sanitizeCandidate(
        { identifier: row[identifier], price: row[price], description: row[description] },
        format
      );
      if (record) {
        yield { kind: "candidate", row: rowNumber, record };
      } else {
        yield { kind: "skip", row: rowNumber, issues };
      }
    }
  }
}

/**
 * Parse delimited text (CSV, semicolon, tab or pipe separated) into a candidate sequence.
 * The delimiter is sniffed from the header line.
 */
export function parseCandidatesFromText(text: string): CandidateSequence {
  const body = stripBom(text);
  const delimiter = detectDelimiterFromText(body);
  return CandidateSequence.fromRows(() => iterateDsvRows(body, delimiter), delimiter);
}

/**
 * Build a candidate sequence over array-of-arrays rows (header first), e.g. a worksheet.
 */
export function parseCandidatesFromRows(rows: string[][]): CandidateSequence {
  return CandidateSequence.fromRows(() => rows);
}

function isBlank(row: string[]): boolean {
  return row.every((v) => String(v ?? "").trim() === "");
}
