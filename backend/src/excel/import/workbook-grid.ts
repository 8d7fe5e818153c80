import * as XLSX from "xlsx";
import { parseDecimal } from "../../common/numbers";

export type GridCell = string | number | boolean | null;

export type SheetGrid = {
  name: string;
  rows: GridCell[][];
};

function toGridCell(cell: XLSX.CellObject | undefined): GridCell {
  if (!cell || cell.v === null || cell.v === undefined) {
    return null;
  }

  if (cell.v instanceof Date) {
    return cell.v.toISOString().slice(0, 10);
  }

  if (typeof cell.v === "string") {
    const trimmed = cell.v.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  return cell.v;
}

function readGrid(name: string, worksheet: XLSX.WorkSheet): SheetGrid {
  const rangeRef = worksheet["!ref"];
  if (!rangeRef) {
    return { name, rows: [] };
  }

  const range = XLSX.utils.decode_range(rangeRef);
  const rows: GridCell[][] = [];
  // rows before the range start are kept empty so row numbers match the sheet
  for (let row = 0; row <= range.e.r; row += 1) {
    const cells: GridCell[] = [];
    for (let col = 0; col <= range.e.c; col += 1) {
      const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r: row, c: col })];
      cells.push(toGridCell(cell));
    }
    rows.push(cells);
  }

  return { name, rows };
}

/**
 * Reads every worksheet as a 2-D grid of raw cell values. No schema is
 * imposed; sheet parsers decide what the cells mean.
 */
export function readWorkbookGrids(buffer: Buffer): SheetGrid[] {
  const workbook = XLSX.read(buffer, {
    type: "buffer",
    cellFormula: false,
    cellDates: true,
  });

  return workbook.SheetNames.flatMap((name) => {
    const worksheet = workbook.Sheets[name];
    return worksheet ? [readGrid(name, worksheet)] : [];
  });
}

export function cellText(cell: GridCell | undefined) {
  if (cell === null || cell === undefined) {
    return "";
  }

  return String(cell).trim();
}

export function cellNumber(cell: GridCell | undefined) {
  if (cell === undefined || typeof cell === "boolean") {
    return null;
  }

  return parseDecimal(cell);
}

export function isBlankCell(cell: GridCell | undefined) {
  return cellText(cell) === "";
}
