import { RowParseError, describeError } from "../../common/errors";
import { type GridCell, cellNumber, cellText, isBlankCell } from "./workbook-grid";

export type ParsedEntry<T> =
  | { ok: true; rowNumber: number; value: T }
  | { ok: false; rowNumber: number; error: string };

export type ParsedSheet<T> = {
  sheet: string;
  entries: Array<ParsedEntry<T>>;
  warnings: string[];
};

export function cellAt(row: GridCell[], column: number | null) {
  return column === null ? null : (row[column] ?? null);
}

export function requireNumber(rowNumber: number, label: string, cell: GridCell) {
  const value = cellNumber(cell);
  if (value === null) {
    throw new RowParseError(
      rowNumber,
      isBlankCell(cell) ? `Missing ${label}` : `Invalid ${label} '${cellText(cell)}'`
    );
  }

  return value;
}

export function requirePositive(rowNumber: number, label: string, cell: GridCell) {
  const value = requireNumber(rowNumber, label, cell);
  if (value <= 0) {
    throw new RowParseError(rowNumber, `${label} must be greater than 0, got ${value}`);
  }

  return value;
}

/** Non-negative; 0 is a valid price that blocks the combination. */
export function requirePrice(rowNumber: number, cell: GridCell) {
  const value = requireNumber(rowNumber, "price", cell);
  if (value < 0) {
    throw new RowParseError(rowNumber, `price cannot be negative, got ${value}`);
  }

  return value;
}

/**
 * Runs one row parser. `null` from the parser means the row carries no
 * price and is skipped; a thrown error becomes an error entry.
 */
export function parseRow<T>(rowNumber: number, parse: () => T | null): ParsedEntry<T> | null {
  try {
    const value = parse();
    return value === null ? null : { ok: true, rowNumber, value };
  } catch (error) {
    return { ok: false, rowNumber, error: describeError(error) };
  }
}
