import * as XLSX from "xlsx";
import type { GridCell } from "../src/excel/import/workbook-grid";

/** An .xlsx file with one sheet per entry, rows written as given. */
export function buildWorkbookBuffer(sheets: Record<string, GridCell[][]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }

  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return buffer;
}
