import * as XLSX from "xlsx";

/**
 * Read an Excel workbook from `ArrayBuffer` and return its main sheet as array-of-arrays,
 * header row first. Cells are stringified; empty cells become `""`.
 * - Chooses the main sheet (prefers `Components`) and falls back to the first sheet.
 */
export function readXlsxToRows(fileBytes: ArrayBuffer): { rows: string[][]; sheetName?: string } {
  const data = new Uint8Array(fileBytes);
  const workbook = XLSX.read(data, { type: "array" });

  const mainSheetName = chooseMainSheet(workbook.SheetNames);
  if (!mainSheetName) return { rows: [] };
  const sheet = workbook.Sheets[mainSheetName];

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    blankrows: true,
  });
  const rows = matrix.map((row) => row.map((v) => (v === null || v === undefined ? "" : String(v))));
  return { rows, sheetName: mainSheetName };
}

function chooseMainSheet(sheetNames: string[]): string | undefined {
  const preferred = sheetNames.find((name) => name.toLowerCase() === "components");
  return preferred ?? sheetNames[0];
}
