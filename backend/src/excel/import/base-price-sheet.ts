import { standardSheetLength } from "../../pricing/sheet-geometry";
import {
  type ParsedEntry,
  type ParsedSheet,
  cellAt,
  parseRow,
  requirePositive,
  requirePrice,
} from "./parsed-sheet";
import { BASE_COLUMNS, findColumn, missingColumns } from "./sheet-layout";
import { type SheetGrid, cellNumber, cellText, isBlankCell } from "./workbook-grid";

export type BasePriceSheetRow = {
  grade: string;
  surfaceFinish: string;
  thickness: number;
  width: number;
  length: number;
  price: number;
};

/**
 * Flat base-price table with a header in the first row. Every column but the
 * length is required; rows without a grade or without a price are skipped.
 */
export function parseBasePriceSheet(sheet: SheetGrid): ParsedSheet<BasePriceSheetRow> {
  const header = sheet.rows[0];
  const columns = {
    grade: findColumn(header, BASE_COLUMNS.grade),
    surfaceFinish: findColumn(header, BASE_COLUMNS.surfaceFinish),
    thickness: findColumn(header, BASE_COLUMNS.thickness),
    width: findColumn(header, BASE_COLUMNS.width),
    length: findColumn(header, BASE_COLUMNS.length),
    price: findColumn(header, BASE_COLUMNS.price),
  };

  if (columns.grade === null) {
    const available = (header ?? []).map(cellText).filter(Boolean).slice(0, 10);
    return {
      sheet: sheet.name,
      entries: [],
      warnings: [`${sheet.name}: no grade column found. Headers: ${available.join(", ")}`],
    };
  }
  const missing = missingColumns(columns, ["surfaceFinish", "thickness", "width", "price"]);
  if (missing.length > 0) {
    return {
      sheet: sheet.name,
      entries: [],
      warnings: [`${sheet.name}: missing required columns: ${missing.join(", ")}`],
    };
  }

  const entries: Array<ParsedEntry<BasePriceSheetRow>> = [];
  sheet.rows.forEach((row, index) => {
    if (index === 0) {
      return;
    }

    const rowNumber = index + 1;
    const entry = parseRow(rowNumber, (): BasePriceSheetRow | null => {
      const grade = cellText(cellAt(row, columns.grade));
      const priceCell = cellAt(row, columns.price);
      if (!grade || isBlankCell(priceCell)) {
        return null;
      }

      const width = requirePositive(rowNumber, "width", cellAt(row, columns.width));
      const length = cellNumber(cellAt(row, columns.length));

      return {
        grade,
        surfaceFinish: cellText(cellAt(row, columns.surfaceFinish)),
        thickness: requirePositive(rowNumber, "thickness", cellAt(row, columns.thickness)),
        width,
        length: length !== null && length > 0 ? length : standardSheetLength(width),
        price: requirePrice(rowNumber, priceCell),
      };
    });

    if (entry) {
      entries.push(entry);
    }
  });

  return { sheet: sheet.name, entries, warnings: [] };
}
