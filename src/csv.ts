import type { Delimiter } from "./types.js";

const DELIMITERS: Delimiter[] = [",", ";", "\t", "|"];

/**
 * Walk delimiter-separated text row by row using a small state machine that handles
 * quoted fields, doubled quotes and delimiters/newlines inside quotes. `\r` is ignored
 * outside quotes. Rows are produced lazily so callers can stop early.
 */
export function* iterateDsvRows(text: string, delim: Delimiter): Generator<string[]> {
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else if (c === `"`) {
      inQuotes = true;
    } else if (c === delim) {
      current.push(field);
      field = "";
    } else if (c === "\n") {
      current.push(field);
      field = "";
      yield current;
      current = [];
    } else if (c !== "\r") {
      field += c;
    }
  }
  current.push(field);
  // No trailing row when the text ends with a newline
  if (current.length > 1 || current[0] !== "") yield current;
}

/**
 * Parse delimiter-separated text into array-of-arrays, header row included.
 */
export function parseDsvRaw(text: string, delim: Delimiter): string[][] {
  return Array.from(iterateDsvRows(text, delim));
}

/**
 * Sniff the delimiter from the header line: the candidate that splits it into the most
 * columns wins, ties resolved in `, ; \t |` order. Quoted sections are not counted.
 */
export function detectDelimiterFromText(text: string): Delimiter {
  const firstLine = firstLogicalLine(text);
  let best: Delimiter = ",";
  let bestCount = 0;
  for (const d of DELIMITERS) {
    const count = countOutsideQuotes(firstLine, d);
    if (count > bestCount) {
      best = d;
      bestCount = count;
    }
  }
  return best;
}

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function firstLogicalLine(text: string): string {
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === `"`) inQuotes = !inQuotes;
    else if (c === "\n" && !inQuotes) return text.slice(0, i);
  }
  return text;
}

function countOutsideQuotes(line: string, delim: Delimiter): number {
  let inQuotes = false;
  let n = 0;
  for (const c of line) {
    if (c === `"`) inQuotes = !inQuotes;
    else if (c === delim && !inQuotes) n++;
  }
  return n;
}
