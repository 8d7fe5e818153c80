import { Inject, Injectable, Logger } from "@nestjs/common";
import { randomUUID } from "node:crypto";
import type { ActingUser } from "../auth/acting-user";
import { ImportNotFoundError, PriceValidationError, describeError } from "../common/errors";
import { parseJsonOrText } from "../common/json";
import { APP_CONFIG, type AppConfig } from "../config/app-config";
import {
  PRICE_STORE,
  type PricedTable,
  type PriceStore,
  type PriceStoreSession,
  runInSession,
} from "../price-store/price-store";
import { describeNewMaterial } from "../price-store/material-catalogue";
import { isImportMode, modeAllows } from "./import/import-mode";
import type {
  ImportAnalysis,
  ImportApplyResult,
  ImportDataType,
  ImportMode,
  ImportPreviewPage,
  PendingChange,
  PendingImport,
} from "./import/import.types";
import { loadPriceIndex } from "./import/price-index";
import { reconcileWorkbook } from "./import/reconcile";
import { type SheetGrid, readWorkbookGrids } from "./import/workbook-grid";
import { PENDING_IMPORT_STORE, type PendingImportStore } from "./pending-imports/pending-import.store";

export type UploadedWorkbookFile = {
  buffer?: Buffer;
  mimetype: string;
  size: number;
  originalname: string;
};

const ACCEPTED_EXCEL_MIME_TYPES = new Set([
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  "application/vnd.ms-excel",
]);

const TABLE_BY_DATA_TYPE: Record<ImportDataType, PricedTable> = {
  base_price: "base_prices",
  grinding: "grinding_prices",
  film: "film_prices",
};

type ApplyTally = {
  applied: ImportApplyResult["applied"];
  recordsAdded: number;
  recordsUpdated: number;
};

function importLabel(importId: string) {
  return `[import:${importId.slice(0, 8)}]`;
}

function fileTypeOf(fileName: string) {
  return fileName.toLowerCase().endsWith(".xls") ? "xls" : "xlsx";
}

function countApplied(tally: ApplyTally, dataType: ImportDataType) {
  if (dataType === "base_price") {
    tally.applied.basePrices += 1;
  } else if (dataType === "grinding") {
    tally.applied.grinding += 1;
  } else {
    tally.applied.film += 1;
  }
}

@Injectable()
export class ExcelImportService {
  private readonly logger = new Logger(ExcelImportService.name);

  constructor(
    @Inject(PRICE_STORE) private readonly priceStore: PriceStore,
    @Inject(PENDING_IMPORT_STORE) private readonly pendingImports: PendingImportStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig
  ) {}

  validateWorkbookFile(file: UploadedWorkbookFile) {
    const originalName = file.originalname.toLowerCase();
    const hasSupportedExtension = originalName.endsWith(".xlsx") || originalName.endsWith(".xls");
    const hasSupportedMimeType = ACCEPTED_EXCEL_MIME_TYPES.has(file.mimetype);

    if (!hasSupportedExtension && !hasSupportedMimeType) {
      throw new PriceValidationError("Only .xlsx or .xls files are allowed");
    }
    if (!file.buffer || file.buffer.byteLength === 0) {
      throw new PriceValidationError(`Upload failed for file '${file.originalname}': missing file content`);
    }

    return file.buffer;
  }

  async analyzeUpload(file: UploadedWorkbookFile, actingUser?: ActingUser) {
    const buffer = this.validateWorkbookFile(file);
    return this.analyzeWorkbook(buffer, file.originalname, actingUser);
  }

  /**
   * Reads the workbook, compares it with the current prices and keeps the
   * resulting change list for `applyImport`. Nothing is written to prices.
   */
  async analyzeWorkbook(
    buffer: Buffer,
    fileName: string,
    actingUser?: ActingUser
  ): Promise<ImportAnalysis> {
    const importId = randomUUID();
    const label = importLabel(importId);
    const startedAt = Date.now();
    this.logger.log(
      `${label} analyze started file=${fileName} bytes=${buffer.byteLength} user=${actingUser?.id ?? "anonymous"}`
    );

    let sheets: SheetGrid[];
    try {
      sheets = readWorkbookGrids(buffer);
    } catch (error) {
      this.logger.warn(`${label} unreadable workbook: ${describeError(error)}`);
      throw new PriceValidationError(`Unable to read workbook '${fileName}': ${describeError(error)}`);
    }

    const index = await runInSession(this.priceStore, (session) => loadPriceIndex(session));
    const reconciliation = reconcileWorkbook(sheets, index);

    const createdAt = new Date();
    const expiresAt = new Date(createdAt.getTime() + this.config.pendingImportTtlMinutes * 60_000);
    const analysis: ImportAnalysis = {
      importId,
      fileName,
      counts: reconciliation.counts,
      diffItems: reconciliation.diffItems,
      errors: reconciliation.errors,
      warnings: reconciliation.warnings,
    };

    await this.pendingImports.save({
      ...analysis,
      changes: reconciliation.changes,
      createdAt: createdAt.toISOString(),
      expiresAt: expiresAt.toISOString(),
    });

    const { counts } = reconciliation;
    this.logger.log(
      `${label} analyze finished in ${Date.now() - startedAt}ms sheets=${sheets.length} rows=${counts.totalRows} added=${counts.added} updated=${counts.updated} unchanged=${counts.unchanged} errors=${counts.errorRows}`
    );

    return analysis;
  }

  async getImportPreview(
    importId: string,
    page = 1,
    perPage = this.config.importPreviewPageSize
  ): Promise<ImportPreviewPage> {
    if (!Number.isInteger(page) || page < 1 || !Number.isInteger(perPage) || perPage < 1) {
      throw new PriceValidationError("page and perPage must be positive integers");
    }

    const pending = await this.requirePendingImport(importId);
    const offset = (page - 1) * perPage;

    return {
      importId: pending.importId,
      fileName: pending.fileName,
      counts: pending.counts,
      errors: pending.errors,
      warnings: pending.warnings,
      items: pending.diffItems.slice(offset, offset + perPage),
      page,
      perPage,
      totalPages: Math.max(1, Math.ceil(pending.diffItems.length / perPage)),
      expiresAt: pending.expiresAt,
    };
  }

  async cancelImport(importId: string) {
    await this.requirePendingImport(importId);
    await this.pendingImports.delete(importId);
    this.logger.log(`${importLabel(importId)} cancelled`);

    return { cancelled: true, importId };
  }

  /**
   * Replays the pending changes of an analysis that `mode` admits and were
   * not applied before. A failing change is recorded and the rest continue;
   * everything that succeeded is committed together.
   */
  async applyImport(
    importId: string,
    mode: string,
    confirm: boolean,
    actingUser: ActingUser
  ): Promise<ImportApplyResult> {
    if (!confirm) {
      throw new PriceValidationError("Import must be confirmed before it is applied");
    }
    if (!isImportMode(mode)) {
      throw new PriceValidationError(`Unknown import mode '${mode}'`);
    }
    const importMode: ImportMode = mode;

    const pending = await this.requirePendingImport(importId);
    const label = importLabel(importId);
    const startedAt = Date.now();
    this.logger.log(`${label} apply started mode=${importMode} user=${actingUser.id}`);

    try {
      const result = await runInSession(this.priceStore, async (session) => {
        const tally: ApplyTally = {
          applied: { basePrices: 0, grinding: 0, film: 0, materialsCreated: 0 },
          recordsAdded: 0,
          recordsUpdated: 0,
        };
        const appliedSeqs = new Set<number>();
        const errors: ImportApplyResult["errors"] = [];
        let recordsSkipped = 0;

        for (const change of pending.changes) {
          if (change.applied) {
            continue;
          }
          if (!modeAllows(importMode, change.action)) {
            recordsSkipped += 1;
            continue;
          }

          try {
            await this.applyChange(session, change, tally, pending.fileName);
            appliedSeqs.add(change.seq);
          } catch (error) {
            errors.push({ seq: change.seq, error: describeError(error) });
            this.logger.debug(`${label} change ${change.seq} failed: ${describeError(error)}`);
          }
        }

        session.insertImportExportAudit({
          operationType: "import",
          fileName: pending.fileName,
          fileType: fileTypeOf(pending.fileName),
          dataType: "all",
          filtersJson: JSON.stringify({ mode: importMode }),
          recordsCount: pending.counts.totalRows,
          recordsAdded: tally.recordsAdded,
          recordsUpdated: tally.recordsUpdated,
          recordsSkipped,
          recordsFailed: errors.length,
          userId: actingUser.id,
          status: errors.length === 0 ? "success" : appliedSeqs.size > 0 ? "partial" : "failed",
          errorMessage:
            errors.length > 0
              ? errors
                  .slice(0, 5)
                  .map((entry) => `#${entry.seq}: ${entry.error}`)
                  .join("; ")
              : null,
        });

        await session.commit();

        return { tally, appliedSeqs, errors, recordsSkipped };
      });

      const changes: PendingChange[] = pending.changes.map((change) =>
        result.appliedSeqs.has(change.seq) ? { ...change, applied: true } : change
      );
      const remaining = changes.filter((change) => !change.applied).length;
      if (remaining === 0) {
        await this.pendingImports.delete(importId);
      } else {
        await this.pendingImports.save({ ...pending, changes });
      }

      this.logger.log(
        `${label} apply finished in ${Date.now() - startedAt}ms added=${result.tally.recordsAdded} updated=${result.tally.recordsUpdated} skipped=${result.recordsSkipped} failed=${result.errors.length} remaining=${remaining}`
      );

      return {
        success: result.errors.length === 0,
        importId,
        mode: importMode,
        applied: result.tally.applied,
        recordsAdded: result.tally.recordsAdded,
        recordsUpdated: result.tally.recordsUpdated,
        recordsSkipped: result.recordsSkipped,
        recordsFailed: result.errors.length,
        remaining,
        errors: result.errors,
      };
    } catch (error) {
      this.logger.error(`${label} apply failed after ${Date.now() - startedAt}ms: ${describeError(error)}`);
      throw error;
    }
  }

  async getImportExportHistory(
    limit: number,
    offset: number,
    operationType?: "import" | "export"
  ) {
    return runInSession(this.priceStore, async (session) => {
      const page = await session.listImportExportAudits({ limit, offset, operationType });
      const items = page.items.map((audit) => ({
        ...audit,
        filters: audit.filtersJson === null ? null : parseJsonOrText(audit.filtersJson),
      }));

      return { items, total: page.total, limit, offset };
    });
  }

  private async requirePendingImport(importId: string): Promise<PendingImport> {
    const pending = await this.pendingImports.get(importId);
    if (!pending) {
      throw new ImportNotFoundError(importId);
    }

    return pending;
  }

  private async applyChange(
    session: PriceStoreSession,
    change: PendingChange,
    tally: ApplyTally,
    fileName: string
  ) {
    if (change.action === "update") {
      const table = TABLE_BY_DATA_TYPE[change.dataType];
      if (!(await session.priceRowExists(table, change.targetId))) {
        throw new Error(`Price ${change.targetId} no longer exists`);
      }
      session.setPrice(table, change.targetId, change.price);
      tally.recordsUpdated += 1;
      countApplied(tally, change.dataType);
      return;
    }

    switch (change.dataType) {
      case "base_price": {
        const known =
          (change.materialId ? await session.findMaterialById(change.materialId) : null) ??
          (await session.findMaterialByGrade(change.grade));
        const material = known ?? session.insertMaterial(describeNewMaterial(change.grade));
        if (!known) {
          tally.applied.materialsCreated += 1;
        }

        session.insertBasePrice({
          materialId: material.id,
          surfaceFinish: change.surfaceFinish,
          thickness: change.thickness,
          width: change.width,
          length: change.length,
          pricePlnPerKg: change.price,
          validFrom: new Date().toISOString(),
          validTo: null,
          isActive: true,
          notes: `Import ${fileName}`,
        });
        break;
      }
      case "grinding":
        session.insertGrindingPrice({
          provider: change.provider,
          grit: change.grit,
          widthVariant: change.widthVariant,
          thickness: change.thickness,
          pricePlnPerKg: change.price,
          withSb: change.withSb,
          isActive: true,
        });
        break;
      case "film":
        session.insertFilmPrice({
          filmType: change.filmType,
          thickness: change.thickness,
          pricePlnPerKg: change.price,
          isActive: true,
        });
        break;
    }

    tally.recordsAdded += 1;
    countApplied(tally, change.dataType);
  }
}
