import { PriceValidationError } from "../common/errors";
import type { BasePriceQuery } from "../price-store/price-store.queries";
import { isMaterialCategory, type MaterialCategory } from "../price-store/price-store.types";

export type BulkPriceFilters = {
  categories?: string[];
  groupIds?: string[];
  grades?: string[];
  surfaceFinishes?: string[];
  thicknessMin?: number;
  thicknessMax?: number;
  widths?: number[];
};

export type FacetName = "categories" | "groups" | "grades" | "surfaceFinishes" | "widths";

function validCategories(categories: string[] | undefined): MaterialCategory[] | undefined {
  if (!categories || categories.length === 0) {
    return undefined;
  }

  const unknown = categories.filter((category) => !isMaterialCategory(category));
  if (unknown.length > 0) {
    throw new PriceValidationError(`Unknown material categories: ${unknown.join(", ")}`);
  }

  return categories.filter(isMaterialCategory);
}

/**
 * Turns a filter set into a store query. Blocked (non-positive) and inactive
 * prices are always excluded.
 */
export function toBasePriceQuery(filters: BulkPriceFilters, skip?: FacetName): BasePriceQuery {
  if (
    filters.thicknessMin !== undefined &&
    filters.thicknessMax !== undefined &&
    filters.thicknessMin > filters.thicknessMax
  ) {
    throw new PriceValidationError(
      `thicknessMin (${filters.thicknessMin}) is greater than thicknessMax (${filters.thicknessMax})`
    );
  }

  return {
    activeOnly: true,
    positiveOnly: true,
    categories: skip === "categories" ? undefined : validCategories(filters.categories),
    groupIds: skip === "groups" ? undefined : filters.groupIds,
    grades: skip === "grades" ? undefined : filters.grades,
    surfaceFinishes: skip === "surfaceFinishes" ? undefined : filters.surfaceFinishes,
    thicknessMin: filters.thicknessMin,
    thicknessMax: filters.thicknessMax,
    widths: skip === "widths" ? undefined : filters.widths,
  };
}

/** Stable serialisation stored on the audit row. */
export function serializeFilters(filters: BulkPriceFilters) {
  return JSON.stringify({
    categories: filters.categories ?? [],
    groupIds: filters.groupIds ?? [],
    grades: filters.grades ?? [],
    surfaceFinishes: filters.surfaceFinishes ?? [],
    thicknessMin: filters.thicknessMin ?? null,
    thicknessMax: filters.thicknessMax ?? null,
    widths: filters.widths ?? [],
  });
}

export function hasFacetSelection(filters: BulkPriceFilters) {
  return [filters.categories, filters.groupIds, filters.grades, filters.surfaceFinishes, filters.widths].some(
    (values) => values !== undefined && values.length > 0
  );
}
