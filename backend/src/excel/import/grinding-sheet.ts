import { RowParseError } from "../../common/errors";
import {
  BORYS_WIDTH_VARIANTS,
  type GrindingProvider,
  isGrindingProvider,
} from "../../price-store/price-store.types";
import {
  type ParsedEntry,
  type ParsedSheet,
  cellAt,
  parseRow,
  requirePositive,
  requirePrice,
} from "./parsed-sheet";
import { GRINDING_EXPORT_COLUMNS, findColumn, isExportGrindingSheet, missingColumns } from "./sheet-layout";
import { type GridCell, type SheetGrid, cellNumber, cellText, isBlankCell } from "./workbook-grid";

export type GrindingSheetRow = {
  provider: GrindingProvider;
  grit: string | null;
  widthVariant: string | null;
  withSb: boolean;
  thickness: number;
  price: number;
};

const SB_TRUE_VALUES = new Set(["tak", "yes", "true", "1"]);

export function parseGrindingSheet(sheet: SheetGrid): ParsedSheet<GrindingSheetRow> {
  return isExportGrindingSheet(sheet) ? parseExportLayout(sheet) : parseLegacyLayout(sheet);
}

function optionalText(cell: GridCell) {
  const value = cellText(cell);
  return value ? value : null;
}

function parseExportLayout(sheet: SheetGrid): ParsedSheet<GrindingSheetRow> {
  const header = sheet.rows[0];
  const columns = {
    provider: findColumn(header, GRINDING_EXPORT_COLUMNS.provider),
    grit: findColumn(header, GRINDING_EXPORT_COLUMNS.grit),
    thickness: findColumn(header, GRINDING_EXPORT_COLUMNS.thickness),
    price: findColumn(header, GRINDING_EXPORT_COLUMNS.price),
    withSb: findColumn(header, GRINDING_EXPORT_COLUMNS.withSb),
    widthVariant: findColumn(header, GRINDING_EXPORT_COLUMNS.widthVariant),
  };

  const missing = missingColumns(columns, ["provider", "thickness", "price"]);
  if (missing.length > 0) {
    return {
      sheet: sheet.name,
      entries: [],
      warnings: [`${sheet.name}: missing required columns: ${missing.join(", ")}`],
    };
  }

  const entries: Array<ParsedEntry<GrindingSheetRow>> = [];
  sheet.rows.forEach((row, index) => {
    if (index === 0) {
      return;
    }

    const rowNumber = index + 1;
    const entry = parseRow(rowNumber, (): GrindingSheetRow | null => {
      const provider = cellText(cellAt(row, columns.provider)).toUpperCase();
      const priceCell = cellAt(row, columns.price);
      if (!provider || isBlankCell(priceCell)) {
        return null;
      }
      if (!isGrindingProvider(provider)) {
        throw new RowParseError(rowNumber, `Unknown grinding provider '${provider}'`);
      }

      const sbCell = cellAt(row, columns.withSb);
      return {
        provider,
        grit: optionalText(cellAt(row, columns.grit)),
        widthVariant: optionalText(cellAt(row, columns.widthVariant)),
        withSb: sbCell === true || SB_TRUE_VALUES.has(cellText(sbCell).toLowerCase()),
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

export type LegacyPriceColumn = {
  index: number;
  grit: string | null;
  widthVariant: string | null;
  withSb: boolean;
};

/**
 * The legacy layout keeps its schema in row order: a provider name opens a
 * section, the next header row names the grit columns, and rows starting
 * with a thickness carry prices until the next section.
 */
export type LegacyParserState =
  | { kind: "idle" }
  | { kind: "awaiting_header"; provider: GrindingProvider }
  | { kind: "reading_prices"; provider: GrindingProvider; columns: LegacyPriceColumn[] };

function gritOf(label: string) {
  if (/320|400/.test(label)) {
    return "K320/K400";
  }
  if (/240|180/.test(label)) {
    return "K240/K180";
  }
  if (/K80|K120|\b80\b|\b120\b/.test(label)) {
    return "K80/K120";
  }
  return null;
}

function widthVariantOf(label: string) {
  const lower = label.toLowerCase();
  if (lower.includes("x1000") || lower.includes("x1250") || lower.includes("x1500")) {
    return BORYS_WIDTH_VARIANTS[0];
  }
  if (lower.includes("x2000")) {
    return BORYS_WIDTH_VARIANTS[1];
  }
  return null;
}

export function isSectionStart(row: GridCell[]) {
  const provider = cellText(row[0]).toUpperCase();
  return isGrindingProvider(provider) ? provider : null;
}

export function isGritHeader(row: GridCell[]) {
  if (!isBlankCell(row[0])) {
    return false;
  }

  return row.some((cell) => {
    const label = cellText(cell).toUpperCase();
    return gritOf(label) !== null || widthVariantOf(label) !== null;
  });
}

export function readHeaderColumns(row: GridCell[]): LegacyPriceColumn[] {
  const columns: LegacyPriceColumn[] = [];
  row.forEach((cell, index) => {
    const label = cellText(cell);
    if (index === 0 || !label) {
      return;
    }

    const upper = label.toUpperCase();
    const withSb = upper.includes("+SB") || upper.startsWith("SB");
    const widthVariant = widthVariantOf(label);
    const grit = widthVariant === null ? gritOf(upper) : null;

    if (grit !== null || widthVariant !== null || withSb) {
      columns.push({ index, grit, widthVariant, withSb });
    }
  });

  return columns;
}

/** Moves the parser on by one row. */
export function nextLegacyState(state: LegacyParserState, row: GridCell[]): LegacyParserState {
  const provider = isSectionStart(row);
  if (provider) {
    return { kind: "awaiting_header", provider };
  }

  if (state.kind !== "idle" && isGritHeader(row)) {
    return { kind: "reading_prices", provider: state.provider, columns: readHeaderColumns(row) };
  }

  return state;
}

function parseLegacyLayout(sheet: SheetGrid): ParsedSheet<GrindingSheetRow> {
  const entries: Array<ParsedEntry<GrindingSheetRow>> = [];
  let state: LegacyParserState = { kind: "idle" };

  sheet.rows.forEach((row, index) => {
    const next = nextLegacyState(state, row);
    if (next !== state) {
      state = next;
      return;
    }
    if (state.kind !== "reading_prices") {
      return;
    }

    const thickness = cellNumber(row[0]);
    if (thickness === null || thickness <= 0) {
      return;
    }

    const rowNumber = index + 1;
    for (const column of state.columns) {
      const cell = row[column.index] ?? null;
      if (isBlankCell(cell)) {
        continue;
      }

      const section = state;
      const entry = parseRow(rowNumber, () => ({
        provider: section.provider,
        grit: column.grit,
        widthVariant: column.widthVariant,
        withSb: column.withSb,
        thickness,
        price: requirePrice(rowNumber, cell),
      }));
      if (entry) {
        entries.push(entry);
      }
    }
  });

  const warnings =
    entries.length === 0 ? [`${sheet.name}: no grinding price sections found`] : [];
  return { sheet: sheet.name, entries, warnings };
}
