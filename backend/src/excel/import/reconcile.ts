import { roundTo } from "../../common/numbers";
import { type BasePriceSheetRow, parseBasePriceSheet } from "./base-price-sheet";
import { type FilmSheetRow, parseFilmSheet } from "./film-sheet";
import { type GrindingSheetRow, parseGrindingSheet } from "./grinding-sheet";
import type {
  DiffItem,
  ImportCounts,
  ImportDataType,
  NewPriceChange,
  PendingChange,
  PendingChangeDraft,
  RowError,
} from "./import.types";
import type { ParsedSheet } from "./parsed-sheet";
import {
  type PriceIndex,
  basePriceKey,
  filmPriceKey,
  grindingPriceKey,
} from "./price-index";
import { locateSheets } from "./sheet-layout";
import type { SheetGrid } from "./workbook-grid";

/** Prices closer than this are the same price. */
export const PRICE_TOLERANCE = 0.001;

export type Reconciliation = {
  counts: ImportCounts;
  diffItems: DiffItem[];
  errors: RowError[];
  warnings: string[];
  changes: PendingChange[];
};

type Existing = { id: string; pricePlnPerKg: number };

type SectionRules<T> = {
  dataType: ImportDataType;
  keyOf: (row: T) => string;
  existing: (row: T) => Existing | undefined;
  describe: (row: T) => Partial<DiffItem>;
  toAdd: (row: T) => NewPriceChange;
};

function emptyDiffItem(sheet: string, rowNumber: number, dataType: ImportDataType): DiffItem {
  return {
    rowNumber,
    sheet,
    changeType: "error",
    dataType,
    grade: null,
    surfaceFinish: null,
    thickness: null,
    width: null,
    provider: null,
    grit: null,
    widthVariant: null,
    withSb: null,
    filmType: null,
    currentPrice: null,
    newPrice: null,
    priceChange: null,
    errorMessage: null,
  };
}

class Reconciler {
  private readonly diffItems: DiffItem[] = [];
  private readonly errors: RowError[] = [];
  private readonly warnings: string[] = [];
  private readonly changes: PendingChange[] = [];
  private added = 0;
  private updated = 0;
  private unchanged = 0;

  addWarnings(warnings: string[]) {
    this.warnings.push(...warnings);
  }

  classify<T extends { price: number }>(parsed: ParsedSheet<T>, rules: SectionRules<T>) {
    this.warnings.push(...parsed.warnings);
    const firstSeen = new Map<string, number>();

    for (const entry of parsed.entries) {
      const base = emptyDiffItem(parsed.sheet, entry.rowNumber, rules.dataType);
      if (!entry.ok) {
        this.recordError(base, entry.error);
        continue;
      }

      const row = entry.value;
      const described = { ...base, ...rules.describe(row) };
      const key = rules.keyOf(row);
      const seenAt = firstSeen.get(key);
      if (seenAt !== undefined) {
        this.recordError(described, `Duplicate row, same key as row ${seenAt}`);
        continue;
      }
      firstSeen.set(key, entry.rowNumber);

      const existing = rules.existing(row);
      if (!existing) {
        this.added += 1;
        this.diffItems.push({ ...described, changeType: "added", newPrice: row.price });
        this.queue(rules.toAdd(row));
        continue;
      }

      const difference = row.price - existing.pricePlnPerKg;
      if (Math.abs(difference) <= PRICE_TOLERANCE) {
        this.unchanged += 1;
        continue;
      }

      this.updated += 1;
      this.diffItems.push({
        ...described,
        changeType: "updated",
        currentPrice: existing.pricePlnPerKg,
        newPrice: row.price,
        priceChange: roundTo(difference, 4),
      });
      this.queue({
        action: "update",
        dataType: rules.dataType,
        targetId: existing.id,
        price: row.price,
      });
    }
  }

  finish(): Reconciliation {
    const validRows = this.added + this.updated + this.unchanged;
    return {
      counts: {
        totalRows: validRows + this.errors.length,
        validRows,
        errorRows: this.errors.length,
        added: this.added,
        updated: this.updated,
        unchanged: this.unchanged,
      },
      diffItems: this.diffItems,
      errors: this.errors,
      warnings: this.warnings,
      changes: this.changes,
    };
  }

  private recordError(item: DiffItem, message: string) {
    this.diffItems.push({ ...item, changeType: "error", errorMessage: message });
    this.errors.push({ sheet: item.sheet, row: item.rowNumber, error: message });
  }

  private queue(change: PendingChangeDraft) {
    this.changes.push({ ...change, seq: this.changes.length + 1, applied: false });
  }
}

/**
 * Matches every priced row of the workbook against the current prices and
 * lists what applying it would change. Nothing is written.
 */
export function reconcileWorkbook(sheets: SheetGrid[], index: PriceIndex): Reconciliation {
  const reconciler = new Reconciler();
  const located = locateSheets(sheets);

  if (!located.base && !located.grinding && !located.film) {
    reconciler.addWarnings([
      `No price sheets recognised. Sheets in file: ${sheets.map((sheet) => sheet.name).join(", ")}`,
    ]);
    return reconciler.finish();
  }

  if (located.base) {
    reconciler.classify<BasePriceSheetRow>(parseBasePriceSheet(located.base), {
      dataType: "base_price",
      keyOf: basePriceKey,
      existing: (row) => index.basePrices.get(basePriceKey(row)),
      describe: (row) => ({
        grade: row.grade,
        surfaceFinish: row.surfaceFinish,
        thickness: row.thickness,
        width: row.width,
      }),
      toAdd: (row) => ({
        action: "add",
        dataType: "base_price",
        grade: row.grade,
        materialId: index.materialsByGrade.get(row.grade)?.id ?? null,
        surfaceFinish: row.surfaceFinish,
        thickness: row.thickness,
        width: row.width,
        length: row.length,
        price: row.price,
      }),
    });
  }

  if (located.grinding) {
    reconciler.classify<GrindingSheetRow>(parseGrindingSheet(located.grinding), {
      dataType: "grinding",
      keyOf: grindingPriceKey,
      existing: (row) => index.grindingPrices.get(grindingPriceKey(row)),
      describe: (row) => ({
        provider: row.provider,
        grit: row.grit,
        widthVariant: row.widthVariant,
        withSb: row.withSb,
        thickness: row.thickness,
      }),
      toAdd: (row) => ({ action: "add", dataType: "grinding", ...row }),
    });
  }

  if (located.film) {
    reconciler.classify<FilmSheetRow>(parseFilmSheet(located.film), {
      dataType: "film",
      keyOf: filmPriceKey,
      existing: (row) => index.filmPrices.get(filmPriceKey(row)),
      describe: (row) => ({ filmType: row.filmType, thickness: row.thickness }),
      toAdd: (row) => ({ action: "add", dataType: "film", ...row }),
    });
  }

  return reconciler.finish();
}
