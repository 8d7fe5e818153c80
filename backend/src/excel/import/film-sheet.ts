import { RowParseError } from "../../common/errors";
import { FILM_TYPES, type FilmType } from "../../price-store/price-store.types";
import {
  type ParsedEntry,
  type ParsedSheet,
  cellAt,
  parseRow,
  requirePositive,
  requirePrice,
} from "./parsed-sheet";
import { FILM_EXPORT_COLUMNS, findColumn, isExportFilmSheet, missingColumns } from "./sheet-layout";
import { type GridCell, type SheetGrid, cellNumber, cellText, isBlankCell } from "./workbook-grid";

export type FilmSheetRow = {
  filmType: FilmType;
  thickness: number;
  price: number;
};

/** Column titles used by the hand-kept film price list. */
const LEGACY_FILM_HEADERS: Record<string, FilmType> = {
  "cena FZ": "FOLIA_ZWYKLA",
  "cena FF": "FOLIA_FIBER",
  "FOLIA ZWYKŁA": "FOLIA_ZWYKLA",
  "FOLIA FIBER": "FOLIA_FIBER",
};

export function filmTypeOf(label: string): FilmType | null {
  const mapped = LEGACY_FILM_HEADERS[label];
  if (mapped) {
    return mapped;
  }

  const lower = label.toLowerCase();
  return FILM_TYPES.find((filmType) => filmType.toLowerCase() === lower) ?? null;
}

export function parseFilmSheet(sheet: SheetGrid): ParsedSheet<FilmSheetRow> {
  return isExportFilmSheet(sheet) ? parseExportLayout(sheet) : parseLegacyLayout(sheet);
}

function parseExportLayout(sheet: SheetGrid): ParsedSheet<FilmSheetRow> {
  const header = sheet.rows[0];
  const columns = {
    filmType: findColumn(header, FILM_EXPORT_COLUMNS.filmType),
    thickness: findColumn(header, FILM_EXPORT_COLUMNS.thickness),
    price: findColumn(header, FILM_EXPORT_COLUMNS.price),
  };

  const missing = missingColumns(columns, ["filmType", "thickness", "price"]);
  if (missing.length > 0) {
    return {
      sheet: sheet.name,
      entries: [],
      warnings: [`${sheet.name}: missing required columns: ${missing.join(", ")}`],
    };
  }

  const entries: Array<ParsedEntry<FilmSheetRow>> = [];
  sheet.rows.forEach((row, index) => {
    if (index === 0) {
      return;
    }

    const rowNumber = index + 1;
    const entry = parseRow(rowNumber, (): FilmSheetRow | null => {
      const label = cellText(cellAt(row, columns.filmType));
      const priceCell = cellAt(row, columns.price);
      if (!label || isBlankCell(priceCell)) {
        return null;
      }

      const filmType = filmTypeOf(label);
      if (!filmType) {
        throw new RowParseError(rowNumber, `Unknown film type '${label}'`);
      }

      return {
        filmType,
        thickness: requirePositive(rowNumber, "thickness", cellAt(row, columns.thickness)),
        price: requirePrice(rowNumber, priceCell),
      };
    });

    if (entry) {
      entries.push(entry);
    }
  });

  return { sheet: sheet.name, entries, warnings: [] };
}

function isLegacyHeader(row: GridCell[]) {
  return row.some((cell) => {
    const label = cellText(cell).toLowerCase();
    return label.includes("novacel") || label.includes("folia") || label.includes("nitto");
  });
}

/**
 * Thickness in the first column, one film type per column. The header row
 * is the first row naming a known film.
 */
function parseLegacyLayout(sheet: SheetGrid): ParsedSheet<FilmSheetRow> {
  const headerIndex = sheet.rows.findIndex(isLegacyHeader);
  const header = sheet.rows[headerIndex];
  if (headerIndex < 0 || !header) {
    return { sheet: sheet.name, entries: [], warnings: [`${sheet.name}: no film headers found`] };
  }

  const columns = header.flatMap((cell, index) => {
    const filmType = index === 0 ? null : filmTypeOf(cellText(cell));
    return filmType ? [{ index, filmType }] : [];
  });

  const entries: Array<ParsedEntry<FilmSheetRow>> = [];
  sheet.rows.slice(headerIndex + 1).forEach((row, offset) => {
    const thickness = cellNumber(row[0]);
    if (thickness === null || thickness <= 0) {
      return;
    }

    const rowNumber = headerIndex + offset + 2;
    for (const column of columns) {
      const cell = row[column.index] ?? null;
      if (isBlankCell(cell)) {
        continue;
      }

      const entry = parseRow(rowNumber, () => ({
        filmType: column.filmType,
        thickness,
        price: requirePrice(rowNumber, cell),
      }));
      if (entry) {
        entries.push(entry);
      }
    }
  });

  return { sheet: sheet.name, entries, warnings: [] };
}
