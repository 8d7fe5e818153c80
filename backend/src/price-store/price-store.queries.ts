import type {
  BasePriceRow,
  FilmPrice,
  FilmType,
  GrindingPrice,
  GrindingProvider,
  MaterialCategory,
} from "./price-store.types";

export type BasePriceQuery = {
  activeOnly?: boolean;
  /** Skip blocked rows (price <= 0). */
  positiveOnly?: boolean;
  materialIds?: string[];
  categories?: MaterialCategory[];
  groupIds?: string[];
  grades?: string[];
  surfaceFinishes?: string[];
  thicknessMin?: number;
  thicknessMax?: number;
  widths?: number[];
  widthMin?: number;
  widthMax?: number;
};

/**
 * `undefined` leaves a column unfiltered, `null` matches an empty column.
 */
export type GrindingPriceQuery = {
  activeOnly?: boolean;
  providers?: GrindingProvider[];
  thickness?: number;
  thicknessMin?: number;
  thicknessMax?: number;
  grit?: string | null;
  widthVariant?: string | null;
  withSb?: boolean;
};

export type FilmPriceQuery = {
  activeOnly?: boolean;
  filmTypes?: FilmType[];
  thickness?: number;
  thicknessMin?: number;
  thicknessMax?: number;
};

export type AuditHistoryQuery = {
  limit: number;
  offset: number;
  changeType?: string;
};

export type ImportExportHistoryQuery = {
  limit: number;
  offset: number;
  operationType?: "import" | "export";
};

function hasValues<T>(values: T[] | undefined): values is T[] {
  return values !== undefined && values.length > 0;
}

export function matchesBasePriceQuery(row: BasePriceRow, query: BasePriceQuery) {
  if (query.activeOnly && !row.isActive) {
    return false;
  }
  if (query.positiveOnly && !(row.pricePlnPerKg > 0)) {
    return false;
  }
  if (hasValues(query.materialIds) && !query.materialIds.includes(row.materialId)) {
    return false;
  }
  if (hasValues(query.categories) && !query.categories.includes(row.material.category)) {
    return false;
  }
  if (
    hasValues(query.groupIds) &&
    (row.material.groupId === null || !query.groupIds.includes(row.material.groupId))
  ) {
    return false;
  }
  if (hasValues(query.grades) && !query.grades.includes(row.material.grade)) {
    return false;
  }
  if (hasValues(query.surfaceFinishes) && !query.surfaceFinishes.includes(row.surfaceFinish)) {
    return false;
  }
  if (query.thicknessMin !== undefined && row.thickness < query.thicknessMin) {
    return false;
  }
  if (query.thicknessMax !== undefined && row.thickness > query.thicknessMax) {
    return false;
  }
  if (hasValues(query.widths) && !query.widths.includes(row.width)) {
    return false;
  }
  if (query.widthMin !== undefined && row.width < query.widthMin) {
    return false;
  }
  if (query.widthMax !== undefined && row.width > query.widthMax) {
    return false;
  }

  return true;
}

export function matchesGrindingPriceQuery(row: GrindingPrice, query: GrindingPriceQuery) {
  if (query.activeOnly && !row.isActive) {
    return false;
  }
  if (hasValues(query.providers) && !query.providers.includes(row.provider)) {
    return false;
  }
  if (query.thickness !== undefined && row.thickness !== query.thickness) {
    return false;
  }
  if (query.thicknessMin !== undefined && row.thickness < query.thicknessMin) {
    return false;
  }
  if (query.thicknessMax !== undefined && row.thickness > query.thicknessMax) {
    return false;
  }
  if (query.grit !== undefined && row.grit !== query.grit) {
    return false;
  }
  if (query.widthVariant !== undefined && row.widthVariant !== query.widthVariant) {
    return false;
  }
  if (query.withSb !== undefined && row.withSb !== query.withSb) {
    return false;
  }

  return true;
}

export function matchesFilmPriceQuery(row: FilmPrice, query: FilmPriceQuery) {
  if (query.activeOnly && !row.isActive) {
    return false;
  }
  if (hasValues(query.filmTypes) && !query.filmTypes.includes(row.filmType)) {
    return false;
  }
  if (query.thickness !== undefined && row.thickness !== query.thickness) {
    return false;
  }
  if (query.thicknessMin !== undefined && row.thickness < query.thicknessMin) {
    return false;
  }
  if (query.thicknessMax !== undefined && row.thickness > query.thicknessMax) {
    return false;
  }

  return true;
}

export function compareBasePriceRows(left: BasePriceRow, right: BasePriceRow) {
  return (
    left.material.grade.localeCompare(right.material.grade) ||
    left.surfaceFinish.localeCompare(right.surfaceFinish) ||
    left.thickness - right.thickness ||
    left.width - right.width ||
    left.validFrom.localeCompare(right.validFrom)
  );
}

/** Of two rows for the same key, the one in force: a strictly later `validFrom` wins. */
export function supersedes(candidate: { validFrom: string }, current: { validFrom: string }) {
  return candidate.validFrom > current.validFrom;
}

export function compareGrindingPrices(left: GrindingPrice, right: GrindingPrice) {
  return (
    left.provider.localeCompare(right.provider) ||
    (left.grit ?? "").localeCompare(right.grit ?? "") ||
    (left.widthVariant ?? "").localeCompare(right.widthVariant ?? "") ||
    Number(left.withSb) - Number(right.withSb) ||
    left.thickness - right.thickness
  );
}

export function compareFilmPrices(left: FilmPrice, right: FilmPrice) {
  return left.filmType.localeCompare(right.filmType) || left.thickness - right.thickness;
}
