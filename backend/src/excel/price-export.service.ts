import { Inject, Injectable, Logger } from "@nestjs/common";
import * as ExcelJS from "exceljs";
import type { ActingUser } from "../auth/acting-user";
import { describeError } from "../common/errors";
import {
  PRICE_STORE,
  type PriceStore,
  type PriceStoreSession,
  runInSession,
} from "../price-store/price-store";
import {
  type FilmType,
  type GrindingProvider,
  MATERIAL_CATEGORY_LABELS,
  type MaterialCategory,
} from "../price-store/price-store.types";

export const EXPORT_DATA_TYPES = ["base", "grinding", "film", "modifiers", "all"] as const;
export type ExportDataType = (typeof EXPORT_DATA_TYPES)[number];

export type ExportFilters = {
  categories?: MaterialCategory[];
  grades?: string[];
  providers?: GrindingProvider[];
  filmTypes?: FilmType[];
};

type SheetCell = string | number | null;

type SheetTable = {
  name: string;
  columns: Array<{ header: string; width: number }>;
  rows: SheetCell[][];
};

export function isExportDataType(value: string): value is ExportDataType {
  return (EXPORT_DATA_TYPES as readonly string[]).includes(value);
}

const HEADER_FILL: ExcelJS.FillPattern = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FF1F4E79" },
};

const THIN_BORDER: ExcelJS.Border = { style: "thin", color: { argb: "FFB4B4B4" } };

function includes(dataType: ExportDataType, section: Exclude<ExportDataType, "all">) {
  return dataType === "all" || dataType === section;
}

/**
 * Writes price tables in the layout the import reads back: one sheet per
 * section, header in the first row.
 */
@Injectable()
export class PriceExportService {
  private readonly logger = new Logger(PriceExportService.name);

  constructor(@Inject(PRICE_STORE) private readonly priceStore: PriceStore) {}

  async exportWorkbook(
    dataType: ExportDataType,
    filters: ExportFilters,
    actingUser: ActingUser
  ) {
    const label = `[export:${dataType}]`;
    const startedAt = Date.now();
    this.logger.log(`${label} started user=${actingUser.id}`);

    try {
      return await runInSession(this.priceStore, async (session) => {
        const tables = await this.collectTables(session, dataType, filters);
        const recordsCount = tables.reduce((sum, table) => sum + table.rows.length, 0);
        this.logger.debug(
          `${label} sheets=${tables.map((table) => `${table.name}:${table.rows.length}`).join(",")}`
        );

        const buffer = await this.renderWorkbook(tables);
        const fileName = `cennik-${dataType}-${new Date().toISOString().slice(0, 10)}.xlsx`;

        session.insertImportExportAudit({
          operationType: "export",
          fileName,
          fileType: "xlsx",
          dataType,
          filtersJson: JSON.stringify(filters),
          recordsCount,
          recordsAdded: 0,
          recordsUpdated: 0,
          recordsSkipped: 0,
          recordsFailed: 0,
          userId: actingUser.id,
          status: "success",
          errorMessage: null,
        });
        await session.commit();

        this.logger.log(
          `${label} finished in ${Date.now() - startedAt}ms records=${recordsCount} bytes=${buffer.byteLength}`
        );
        return { fileName, buffer, recordsCount };
      });
    } catch (error) {
      this.logger.error(
        `${label} failed after ${Date.now() - startedAt}ms (${describeError(error)})`
      );
      throw error;
    }
  }

  private async collectTables(
    session: PriceStoreSession,
    dataType: ExportDataType,
    filters: ExportFilters
  ) {
    const tables: SheetTable[] = [];

    if (includes(dataType, "base")) {
      const rows = await session.listBasePrices({
        activeOnly: true,
        categories: filters.categories,
        grades: filters.grades,
      });
      tables.push({
        name: "Ceny bazowe",
        columns: [
          { header: "Gatunek", width: 14 },
          { header: "Nazwa materialu", width: 28 },
          { header: "Kategoria", width: 18 },
          { header: "Powierzchnia", width: 14 },
          { header: "Grubosc (mm)", width: 14 },
          { header: "Szerokosc (mm)", width: 15 },
          { header: "Dlugosc (mm)", width: 14 },
          { header: "Cena PLN/kg", width: 13 },
        ],
        rows: rows.map((row) => [
          row.material.grade,
          row.material.name,
          MATERIAL_CATEGORY_LABELS[row.material.category],
          row.surfaceFinish,
          row.thickness,
          row.width,
          row.length,
          row.pricePlnPerKg,
        ]),
      });
    }

    if (includes(dataType, "grinding")) {
      const rows = await session.listGrindingPrices({
        activeOnly: true,
        providers: filters.providers,
      });
      tables.push({
        name: "Cennik szlifu",
        columns: [
          { header: "Dostawca", width: 12 },
          { header: "Granulacja", width: 14 },
          { header: "Wariant szerokosci", width: 20 },
          { header: "Z SB", width: 8 },
          { header: "Grubosc (mm)", width: 14 },
          { header: "Cena PLN/kg", width: 13 },
        ],
        rows: rows.map((row) => [
          row.provider,
          row.grit,
          row.widthVariant,
          row.withSb ? "tak" : "nie",
          row.thickness,
          row.pricePlnPerKg,
        ]),
      });
    }

    if (includes(dataType, "film")) {
      const rows = await session.listFilmPrices({
        activeOnly: true,
        filmTypes: filters.filmTypes,
      });
      tables.push({
        name: "Cennik folii",
        columns: [
          { header: "Typ folii", width: 16 },
          { header: "Grubosc (mm)", width: 14 },
          { header: "Cena PLN/kg", width: 13 },
        ],
        rows: rows.map((row) => [row.filmType, row.thickness, row.pricePlnPerKg]),
      });
    }

    if (includes(dataType, "modifiers")) {
      const [thicknessModifiers, widthModifiers] = await Promise.all([
        session.listThicknessModifiers(),
        session.listWidthModifiers(),
      ]);
      tables.push(
        {
          name: "Modyfikatory grubosci",
          columns: [
            { header: "Gatunek", width: 14 },
            { header: "Powierzchnia", width: 14 },
            { header: "Szerokosc bazowa (mm)", width: 22 },
            { header: "Grubosc (mm)", width: 14 },
            { header: "Modyfikator", width: 13 },
          ],
          rows: thicknessModifiers.map((modifier) => [
            modifier.grade,
            modifier.surfaceFinish,
            modifier.baseWidth,
            modifier.thickness,
            modifier.priceModifier,
          ]),
        },
        {
          name: "Modyfikatory szerokosci",
          columns: [
            { header: "Gatunek", width: 14 },
            { header: "Szerokosc (mm)", width: 15 },
            { header: "Modyfikator", width: 13 },
          ],
          rows: widthModifiers.map((modifier) => [
            modifier.grade,
            modifier.width,
            modifier.priceModifier,
          ]),
        }
      );
    }

    return tables;
  }

  private async renderWorkbook(tables: SheetTable[]): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    workbook.creator = "Price engine";
    workbook.created = new Date();

    for (const table of tables) {
      const ws = workbook.addWorksheet(table.name, {
        views: [{ state: "frozen", ySplit: 1 }],
      });
      ws.columns = table.columns.map((column) => ({ header: column.header, width: column.width }));

      const headerRow = ws.getRow(1);
      headerRow.font = { bold: true, color: { argb: "FFFFFFFF" } };
      headerRow.eachCell((cell) => {
        cell.fill = HEADER_FILL;
        cell.alignment = { vertical: "middle", horizontal: "center" };
      });

      for (const values of table.rows) {
        ws.addRow(values);
      }

      ws.eachRow((row) => {
        row.eachCell({ includeEmpty: true }, (cell) => {
          cell.border = {
            top: THIN_BORDER,
            left: THIN_BORDER,
            bottom: THIN_BORDER,
            right: THIN_BORDER,
          };
        });
      });
    }

    const arrayBuffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(arrayBuffer);
  }
}
