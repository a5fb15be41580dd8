import test from "node:test";
import assert from "node:assert/strict";
import { detectDelimiterFromText, iterateDsvRows, parseDsvRaw, stripBom } from "../src/csv.js";

test("splits plain comma-separated rows and ignores CR", () => {
  const rows = parseDsvRaw("ITEM,PRICE,DESCRIPTION\r\nR10K,0.05,resistor\r\n", ",");
  assert.deepEqual(rows, [
    ["ITEM", "PRICE", "DESCRIPTION"],
    ["R10K", "0.05", "resistor"],
  ]);
});

test("keeps delimiters, doubled quotes and newlines inside quoted fields", () => {
  const rows = parseDsvRaw('ITEM,PRICE,DESCRIPTION\nC1,"1,200.00","say ""hi""\nsecond line"\n', ",");
  assert.deepEqual(rows[1], ["C1", "1,200.00", 'say "hi"\nsecond line']);
  assert.equal(rows.length, 2);
});

test("emits the last row when the text has no trailing newline", () => {
  assert.deepEqual(parseDsvRaw("a;b\nc;d", ";"), [
    ["a", "b"],
    ["c", "d"],
  ]);
});

test("yields rows lazily", () => {
  const it = iterateDsvRows("h1,h2\n1,2\n3,4\n", ",");
  assert.deepEqual(it.next().value, ["h1", "h2"]);
  assert.deepEqual(it.next().value, ["1", "2"]);
});

test("sniffs the delimiter from the header line", () => {
  assert.equal(detectDelimiterFromText("ITEM;PRICE;DESCRIPTION\nR1;1,5;x"), ";");
  assert.equal(detectDelimiterFromText("ITEM\tPRICE\tDESCRIPTION\n"), "\t");
  assert.equal(detectDelimiterFromText("ITEM|PRICE|DESCRIPTION"), "|");
  assert.equal(detectDelimiterFromText("ITEM,PRICE,DESCRIPTION\nR1,1,\"a;b;c;d\""), ",");
});

test("ignores delimiters inside a quoted header cell", () => {
  assert.equal(detectDelimiterFromText('"ITEM;CODE",PRICE,DESCRIPTION'), ",");
});

test("falls back to comma for a single-column header", () => {
  assert.equal(detectDelimiterFromText("ITEM"), ",");
});

test("strips a UTF-8 byte order mark", () => {
  assert.equal(stripBom("\uFEFFITEM"), "ITEM");
  assert.equal(stripBom("ITEM"), "ITEM");
});
