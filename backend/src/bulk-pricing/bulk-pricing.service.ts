import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ActingUser } from "../auth/acting-user";
import { PriceValidationError, describeError } from "../common/errors";
import { parseJsonOrText } from "../common/json";
import { roundTo, roundTo2, sameNumber } from "../common/numbers";
import { PRICE_STORE, type PriceStore, runInSession } from "../price-store/price-store";
import { matchesBasePriceQuery } from "../price-store/price-store.queries";
import {
  MATERIAL_CATEGORIES,
  MATERIAL_CATEGORY_LABELS,
  type BasePriceRow,
} from "../price-store/price-store.types";
import {
  type BulkPriceFilters,
  type FacetName,
  hasFacetSelection,
  serializeFilters,
  toBasePriceQuery,
} from "./bulk-filters";
import type {
  ApplyResult,
  AuditEntry,
  BulkChange,
  FilterOptions,
  PreviewItem,
  PreviewPage,
} from "./bulk-pricing.types";
import { MAX_ROUND_TO, calculateNewPrice, isChangeType } from "./price-formula";

function assertChange(change: BulkChange) {
  if (!isChangeType(change.changeType)) {
    throw new PriceValidationError(`Unknown change type '${String(change.changeType)}'`);
  }
  if (!Number.isFinite(change.changeValue)) {
    throw new PriceValidationError("changeValue must be a finite number");
  }
  if (!Number.isInteger(change.roundTo) || change.roundTo < 0 || change.roundTo > MAX_ROUND_TO) {
    throw new PriceValidationError(`roundTo must be an integer between 0 and ${MAX_ROUND_TO}`);
  }
}

function toPreviewItem(row: BasePriceRow, change: BulkChange): PreviewItem {
  const newPrice = calculateNewPrice(
    row.pricePlnPerKg,
    change.changeType,
    change.changeValue,
    change.roundTo
  );

  return {
    id: row.id,
    materialId: row.materialId,
    grade: row.material.grade,
    materialName: row.material.name,
    category: row.material.category,
    groupName: row.group?.name ?? null,
    surfaceFinish: row.surfaceFinish,
    thickness: row.thickness,
    width: row.width,
    length: row.length,
    currentPrice: row.pricePlnPerKg,
    newPrice,
    changeAmount: roundTo(newPrice - row.pricePlnPerKg, change.roundTo),
    willChange: !sameNumber(newPrice, row.pricePlnPerKg),
  };
}

function sortedUnique<T extends string | number>(values: T[]) {
  return [...new Set(values)].sort((left, right) =>
    typeof left === "number" && typeof right === "number"
      ? left - right
      : String(left).localeCompare(String(right))
  );
}

@Injectable()
export class BulkPricingService {
  private readonly logger = new Logger(BulkPricingService.name);

  constructor(@Inject(PRICE_STORE) private readonly priceStore: PriceStore) {}

  async previewBulkChange(change: BulkChange, page: number, perPage: number): Promise<PreviewPage> {
    assertChange(change);
    if (!Number.isInteger(page) || page < 1 || !Number.isInteger(perPage) || perPage < 1) {
      throw new PriceValidationError("page and perPage must be positive integers");
    }
    const query = toBasePriceQuery(change.filters);

    return runInSession(this.priceStore, async (session) => {
      const rows = await session.listBasePrices(query);
      const items = rows.map((row) => toPreviewItem(row, change));

      const currentTotal = items.reduce((sum, item) => sum + item.currentPrice, 0);
      const newTotal = items.reduce((sum, item) => sum + item.newPrice, 0);
      const offset = (page - 1) * perPage;

      return {
        items: items.slice(offset, offset + perPage),
        total: items.length,
        page,
        perPage,
        totalPages: Math.max(1, Math.ceil(items.length / perPage)),
        changedCount: items.filter((item) => item.willChange).length,
        totals: {
          currentTotal: roundTo2(currentTotal),
          newTotal: roundTo2(newTotal),
          difference: roundTo2(newTotal - currentTotal),
        },
      };
    });
  }

  async applyBulkChange(
    change: BulkChange,
    actingUser: ActingUser,
    notes?: string
  ): Promise<ApplyResult> {
    assertChange(change);
    const query = toBasePriceQuery(change.filters);
    const changeType = `bulk_${change.changeType}`;
    const label = `[bulk:${change.changeType}]`;
    const startedAt = Date.now();

    this.logger.log(
      `${label} apply started user=${actingUser.id} value=${change.changeValue} roundTo=${change.roundTo}`
    );

    try {
      return await runInSession(this.priceStore, async (session) => {
        const rows = await session.listBasePrices(query);

        let updatedCount = 0;
        let skippedCount = 0;
        let totalPrevious = 0;
        let totalNew = 0;

        for (const row of rows) {
          const item = toPreviewItem(row, change);
          if (!item.willChange) {
            skippedCount += 1;
            continue;
          }

          session.setPrice("base_prices", row.id, item.newPrice);
          updatedCount += 1;
          totalPrevious += item.currentPrice;
          totalNew += item.newPrice;
          this.logger.debug(`${label} ${row.id} ${item.currentPrice} -> ${item.newPrice}`);
        }

        const audit = session.insertPriceChangeAudit({
          changeType,
          filtersJson: serializeFilters(change.filters),
          changeValue: change.changeValue,
          affectedCount: updatedCount,
          previousTotal: roundTo2(totalPrevious),
          newTotal: roundTo2(totalNew),
          userId: actingUser.id,
          notes: notes?.trim() ? notes.trim() : null,
        });

        await session.commit();

        this.logger.log(
          `${label} apply finished in ${Date.now() - startedAt}ms updated=${updatedCount} skipped=${skippedCount}`
        );

        return {
          success: true,
          updatedCount,
          skippedCount,
          totalPrevious: roundTo2(totalPrevious),
          totalNew: roundTo2(totalNew),
          changeType,
          changeValue: change.changeValue,
          auditId: audit.id,
        };
      });
    } catch (error) {
      this.logger.error(`${label} apply failed: ${describeError(error)}`);
      throw error;
    }
  }

  /**
   * Facet values for the filter panel. Each enumerable facet is computed with
   * every other facet selection applied and its own ignored; the thickness
   * bounds never narrow the options, so the range spans every row the facet
   * selections leave.
   */
  async filterOptions(filters: BulkPriceFilters): Promise<FilterOptions> {
    const facetFilters: BulkPriceFilters = {
      ...filters,
      thicknessMin: undefined,
      thicknessMax: undefined,
    };
    const fullQuery = toBasePriceQuery(facetFilters);
    const narrowed = hasFacetSelection(facetFilters);

    return runInSession(this.priceStore, async (session) => {
      const [rows, groups] = await Promise.all([
        session.listBasePrices({ activeOnly: true, positiveOnly: true }),
        session.listMaterialGroups(),
      ]);

      const rowsFor = (facet: FacetName) => {
        const query = toBasePriceQuery(facetFilters, facet);
        return rows.filter((row) => matchesBasePriceQuery(row, query));
      };

      const categoriesPresent = new Set(rowsFor("categories").map((row) => row.material.category));
      const groupsPresent = new Set(rowsFor("groups").map((row) => row.material.groupId));
      const thicknesses = rows
        .filter((row) => matchesBasePriceQuery(row, fullQuery))
        .map((row) => row.thickness);

      return {
        categories: MATERIAL_CATEGORIES.filter(
          (category) => !narrowed || categoriesPresent.has(category)
        ).map((category) => ({ value: category, label: MATERIAL_CATEGORY_LABELS[category] })),
        groups: groups
          .filter((group) => group.isActive && (!narrowed || groupsPresent.has(group.id)))
          .sort((left, right) => left.displayOrder - right.displayOrder)
          .map((group) => ({ id: group.id, name: group.name, category: group.category })),
        grades: sortedUnique(rowsFor("grades").map((row) => row.material.grade)),
        surfaceFinishes: sortedUnique(rowsFor("surfaceFinishes").map((row) => row.surfaceFinish)),
        widths: sortedUnique(rowsFor("widths").map((row) => row.width)),
        thicknessRange: {
          min: thicknesses.length > 0 ? Math.min(...thicknesses) : 0,
          max: thicknesses.length > 0 ? Math.max(...thicknesses) : 0,
        },
      };
    });
  }

  async getAuditHistory(limit: number, offset: number, changeType?: string) {
    return runInSession(this.priceStore, async (session) => {
      const page = await session.listPriceChangeAudits({ limit, offset, changeType });
      const items: AuditEntry[] = page.items.map((audit) => ({
        id: audit.id,
        changeType: audit.changeType,
        filters: parseJsonOrText(audit.filtersJson),
        changeValue: audit.changeValue,
        affectedCount: audit.affectedCount,
        previousTotal: audit.previousTotal,
        newTotal: audit.newTotal,
        userId: audit.userId,
        notes: audit.notes,
        createdAt: audit.createdAt,
      }));

      return { items, total: page.total, limit, offset };
    });
  }
}
