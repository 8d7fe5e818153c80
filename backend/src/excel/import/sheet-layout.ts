import { type GridCell, type SheetGrid, cellText } from "./workbook-grid";

export const BASE_SHEET_NAMES = ["cennik baza", "ceny bazowe", "base prices", "base"];
export const GRINDING_SHEET_NAMES = ["dane szlif", "cennik szlifu", "szlif", "grinding"];
export const FILM_SHEET_NAMES = ["dane folia", "cennik folii", "folia", "film"];

export const BASE_COLUMNS = {
  grade: ["gatunek", "grade", "material"],
  surfaceFinish: ["powierzchnia", "surface", "wykończenie", "wykoncznie", "finish", "wykonczenie"],
  thickness: ["grubość", "grubosc", "grubosc (mm)", "thickness"],
  width: ["szerokość", "szerokosc", "szerokosc (mm)", "width"],
  length: ["długość", "dlugosc", "dlugosc (mm)", "length"],
  price: ["z papierem", "cena pln/kg", "cena", "price", "pln/kg"],
};

export const GRINDING_EXPORT_COLUMNS = {
  provider: ["dostawca", "provider"],
  grit: ["granulacja", "grit"],
  thickness: ["grubosc (mm)", "grubosc", "grubość", "thickness"],
  price: ["cena pln/kg", "cena", "price"],
  withSb: ["z sb", "with_sb", "sb"],
  widthVariant: ["wariant szerokosci", "width_variant", "wariant"],
};

export const FILM_EXPORT_COLUMNS = {
  filmType: ["typ folii", "film_type", "typ"],
  thickness: ["grubosc (mm)", "grubosc", "grubość", "thickness"],
  price: ["cena pln/kg", "cena", "price"],
};

export type LocatedSheets = {
  base: SheetGrid | null;
  grinding: SheetGrid | null;
  film: SheetGrid | null;
};

function headerTexts(row: GridCell[] | undefined) {
  return (row ?? []).map((cell) => cellText(cell).toLowerCase());
}

function findByName(sheets: SheetGrid[], names: string[]) {
  for (const name of names) {
    const sheet = sheets.find((entry) => entry.name.trim().toLowerCase() === name);
    if (sheet) {
      return sheet;
    }
  }

  return null;
}

/**
 * Picks the three price sections by sheet name. The first sheet is taken as
 * the base-price sheet under any name when its first row has a grade header.
 */
export function locateSheets(sheets: SheetGrid[]): LocatedSheets {
  const grinding = findByName(sheets, GRINDING_SHEET_NAMES);
  const film = findByName(sheets, FILM_SHEET_NAMES);
  const first = sheets[0];
  const base =
    findByName(sheets, BASE_SHEET_NAMES) ??
    (first &&
    first !== grinding &&
    first !== film &&
    headerTexts(first.rows[0]).some((header) => header.includes("gatunek") || header.includes("grade"))
      ? first
      : null);

  return { base, grinding, film };
}

/**
 * Index of the first header cell equal (case-insensitively) to one of the
 * synonyms, tried in order.
 */
export function findColumn(headerRow: GridCell[] | undefined, synonyms: readonly string[]) {
  const headers = headerTexts(headerRow);
  for (const synonym of synonyms) {
    const index = headers.indexOf(synonym);
    if (index >= 0) {
      return index;
    }
  }

  return null;
}

/** Names of the `required` columns the header row lacks. */
export function missingColumns<K extends string>(
  columns: Record<K, number | null>,
  required: readonly K[]
): K[] {
  return required.filter((key) => columns[key] === null);
}

export function firstRowHeaders(sheet: SheetGrid) {
  return headerTexts(sheet.rows[0]).filter(Boolean);
}

export function isExportGrindingSheet(sheet: SheetGrid) {
  return firstRowHeaders(sheet).some((header) => header.includes("dostawca"));
}

export function isExportFilmSheet(sheet: SheetGrid) {
  return firstRowHeaders(sheet).some((header) => header.includes("typ folii"));
}
