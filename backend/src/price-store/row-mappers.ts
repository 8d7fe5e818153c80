import {
  type BasePrice,
  type BasePriceRow,
  type ExchangeRate,
  type FilmPrice,
  type GrindingPrice,
  type ImportExportAudit,
  type Material,
  type MaterialGroup,
  type PriceChangeAudit,
  type ProcessingOption,
  type ThicknessModifier,
  type WidthModifier,
  isFilmType,
  isGrindingProvider,
  isMaterialCategory,
} from "./price-store.types";

type DbRow = Record<string, unknown>;

export class RowShapeError extends Error {
  constructor(table: string, column: string, detail: string) {
    super(`Unexpected ${table}.${column}: ${detail}`);
    this.name = "RowShapeError";
  }
}

export function isDbRow(value: unknown): value is DbRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toDbRows(table: string, value: unknown): DbRow[] {
  if (value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new RowShapeError(table, "*", "expected an array of rows");
  }

  return value.map((entry) => {
    if (!isDbRow(entry)) {
      throw new RowShapeError(table, "*", "expected an object row");
    }
    return entry;
  });
}

function text(table: string, row: DbRow, column: string) {
  const value = row[column];
  if (typeof value !== "string") {
    throw new RowShapeError(table, column, `expected text, got ${typeof value}`);
  }
  return value;
}

function optionalText(table: string, row: DbRow, column: string) {
  const value = row[column];
  if (value === null || value === undefined) {
    return null;
  }
  return text(table, row, column);
}

// numeric columns come back as JSON numbers or, for large precision, strings
function numeric(table: string, row: DbRow, column: string) {
  const value = row[column];
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    throw new RowShapeError(table, column, `expected a number, got ${String(value)}`);
  }
  return parsed;
}

function optionalNumeric(table: string, row: DbRow, column: string) {
  const value = row[column];
  if (value === null || value === undefined) {
    return null;
  }
  return numeric(table, row, column);
}

function flag(table: string, row: DbRow, column: string) {
  const value = row[column];
  if (typeof value !== "boolean") {
    throw new RowShapeError(table, column, `expected a boolean, got ${String(value)}`);
  }
  return value;
}

function category(table: string, row: DbRow) {
  const value = text(table, row, "category");
  if (!isMaterialCategory(value)) {
    throw new RowShapeError(table, "category", `unknown category '${value}'`);
  }
  return value;
}

export function toMaterialGroup(row: DbRow): MaterialGroup {
  const table = "material_groups";
  return {
    id: text(table, row, "id"),
    name: text(table, row, "name"),
    category: category(table, row),
    displayOrder: numeric(table, row, "display_order"),
    isActive: flag(table, row, "is_active"),
  };
}

export function toMaterial(row: DbRow): Material {
  const table = "materials";
  return {
    id: text(table, row, "id"),
    name: text(table, row, "name"),
    grade: text(table, row, "grade"),
    category: category(table, row),
    density: numeric(table, row, "density"),
    groupId: optionalText(table, row, "group_id"),
    displayOrder: numeric(table, row, "display_order"),
    isActive: flag(table, row, "is_active"),
  };
}

export function toBasePrice(row: DbRow): BasePrice {
  const table = "base_prices";
  return {
    id: text(table, row, "id"),
    materialId: text(table, row, "material_id"),
    surfaceFinish: text(table, row, "surface_finish"),
    thickness: numeric(table, row, "thickness"),
    width: numeric(table, row, "width"),
    length: numeric(table, row, "length"),
    pricePlnPerKg: numeric(table, row, "price_pln_per_kg"),
    validFrom: text(table, row, "valid_from"),
    validTo: optionalText(table, row, "valid_to"),
    isActive: flag(table, row, "is_active"),
    notes: optionalText(table, row, "notes"),
  };
}

/**
 * Expects the row selected with `material:materials!inner(*, group:material_groups(*))`.
 */
export function toBasePriceRow(row: DbRow): BasePriceRow {
  const material = row["material"];
  if (!isDbRow(material)) {
    throw new RowShapeError("base_prices", "material", "missing joined material");
  }
  const group = material["group"];

  return {
    ...toBasePrice(row),
    material: toMaterial(material),
    group: isDbRow(group) ? toMaterialGroup(group) : null,
  };
}

export function toGrindingPrice(row: DbRow): GrindingPrice {
  const table = "grinding_prices";
  const provider = text(table, row, "provider");
  if (!isGrindingProvider(provider)) {
    throw new RowShapeError(table, "provider", `unknown provider '${provider}'`);
  }

  return {
    id: text(table, row, "id"),
    provider,
    grit: optionalText(table, row, "grit"),
    widthVariant: optionalText(table, row, "width_variant"),
    thickness: numeric(table, row, "thickness"),
    pricePlnPerKg: numeric(table, row, "price_pln_per_kg"),
    withSb: flag(table, row, "with_sb"),
    isActive: flag(table, row, "is_active"),
  };
}

export function toFilmPrice(row: DbRow): FilmPrice {
  const table = "film_prices";
  const filmType = text(table, row, "film_type");
  if (!isFilmType(filmType)) {
    throw new RowShapeError(table, "film_type", `unknown film type '${filmType}'`);
  }

  return {
    id: text(table, row, "id"),
    filmType,
    thickness: numeric(table, row, "thickness"),
    pricePlnPerKg: numeric(table, row, "price_pln_per_kg"),
    isActive: flag(table, row, "is_active"),
  };
}

export function toThicknessModifier(row: DbRow): ThicknessModifier {
  const table = "thickness_modifiers";
  return {
    id: text(table, row, "id"),
    grade: text(table, row, "grade"),
    surfaceFinish: text(table, row, "surface_finish"),
    baseWidth: numeric(table, row, "base_width"),
    thickness: numeric(table, row, "thickness"),
    priceModifier: numeric(table, row, "price_modifier"),
  };
}

export function toWidthModifier(row: DbRow): WidthModifier {
  const table = "width_modifiers";
  return {
    id: text(table, row, "id"),
    grade: optionalText(table, row, "grade"),
    width: numeric(table, row, "width"),
    priceModifier: numeric(table, row, "price_modifier"),
  };
}

export function toExchangeRate(row: DbRow): ExchangeRate {
  const table = "exchange_rates";
  return {
    id: text(table, row, "id"),
    currencyFrom: text(table, row, "currency_from"),
    currencyTo: text(table, row, "currency_to"),
    rate: numeric(table, row, "rate"),
    validFrom: text(table, row, "valid_from"),
    validTo: optionalText(table, row, "valid_to"),
    isActive: flag(table, row, "is_active"),
  };
}

export function toProcessingOption(row: DbRow): ProcessingOption {
  const table = "processing_options";
  return {
    id: text(table, row, "id"),
    grade: optionalText(table, row, "grade"),
    surfaceFinish: optionalText(table, row, "surface_finish"),
    thicknessMin: optionalNumeric(table, row, "thickness_min"),
    thicknessMax: optionalNumeric(table, row, "thickness_max"),
    widthMin: optionalNumeric(table, row, "width_min"),
    widthMax: optionalNumeric(table, row, "width_max"),
    grindingProvider: optionalText(table, row, "grinding_provider"),
    grindingAllowed: flag(table, row, "grinding_allowed"),
    filmType: optionalText(table, row, "film_type"),
    filmAllowed: flag(table, row, "film_allowed"),
    notes: optionalText(table, row, "notes"),
  };
}

export function toPriceChangeAudit(row: DbRow): PriceChangeAudit {
  const table = "price_change_audits";
  return {
    id: text(table, row, "id"),
    changeType: text(table, row, "change_type"),
    filtersJson: text(table, row, "filters_json"),
    changeValue: numeric(table, row, "change_value"),
    affectedCount: numeric(table, row, "affected_count"),
    previousTotal: numeric(table, row, "previous_total"),
    newTotal: numeric(table, row, "new_total"),
    userId: text(table, row, "user_id"),
    notes: optionalText(table, row, "notes"),
    createdAt: text(table, row, "created_at"),
  };
}

export function toImportExportAudit(row: DbRow): ImportExportAudit {
  const table = "import_export_audits";
  const operationType = text(table, row, "operation_type");
  if (operationType !== "import" && operationType !== "export") {
    throw new RowShapeError(table, "operation_type", `unknown operation '${operationType}'`);
  }
  const status = text(table, row, "status");
  if (status !== "success" && status !== "partial" && status !== "failed") {
    throw new RowShapeError(table, "status", `unknown status '${status}'`);
  }

  return {
    id: text(table, row, "id"),
    operationType,
    fileName: text(table, row, "file_name"),
    fileType: text(table, row, "file_type"),
    dataType: text(table, row, "data_type"),
    filtersJson: optionalText(table, row, "filters_json"),
    recordsCount: numeric(table, row, "records_count"),
    recordsAdded: numeric(table, row, "records_added"),
    recordsUpdated: numeric(table, row, "records_updated"),
    recordsSkipped: numeric(table, row, "records_skipped"),
    recordsFailed: numeric(table, row, "records_failed"),
    userId: text(table, row, "user_id"),
    status,
    errorMessage: optionalText(table, row, "error_message"),
    createdAt: text(table, row, "created_at"),
  };
}

export function fromMaterial(material: Material): DbRow {
  return {
    id: material.id,
    name: material.name,
    grade: material.grade,
    category: material.category,
    density: material.density,
    group_id: material.groupId,
    display_order: material.displayOrder,
    is_active: material.isActive,
  };
}

export function fromBasePrice(price: BasePrice): DbRow {
  return {
    id: price.id,
    material_id: price.materialId,
    surface_finish: price.surfaceFinish,
    thickness: price.thickness,
    width: price.width,
    length: price.length,
    price_pln_per_kg: price.pricePlnPerKg,
    valid_from: price.validFrom,
    valid_to: price.validTo,
    is_active: price.isActive,
    notes: price.notes,
  };
}

export function fromGrindingPrice(price: GrindingPrice): DbRow {
  return {
    id: price.id,
    provider: price.provider,
    grit: price.grit,
    width_variant: price.widthVariant,
    thickness: price.thickness,
    price_pln_per_kg: price.pricePlnPerKg,
    with_sb: price.withSb,
    is_active: price.isActive,
  };
}

export function fromFilmPrice(price: FilmPrice): DbRow {
  return {
    id: price.id,
    film_type: price.filmType,
    thickness: price.thickness,
    price_pln_per_kg: price.pricePlnPerKg,
    is_active: price.isActive,
  };
}

export function fromPriceChangeAudit(audit: PriceChangeAudit): DbRow {
  return {
    id: audit.id,
    change_type: audit.changeType,
    filters_json: audit.filtersJson,
    change_value: audit.changeValue,
    affected_count: audit.affectedCount,
    previous_total: audit.previousTotal,
    new_total: audit.newTotal,
    user_id: audit.userId,
    notes: audit.notes,
    created_at: audit.createdAt,
  };
}

export function fromImportExportAudit(audit: ImportExportAudit): DbRow {
  return {
    id: audit.id,
    operation_type: audit.operationType,
    file_name: audit.fileName,
    file_type: audit.fileType,
    data_type: audit.dataType,
    filters_json: audit.filtersJson,
    records_count: audit.recordsCount,
    records_added: audit.recordsAdded,
    records_updated: audit.recordsUpdated,
    records_skipped: audit.recordsSkipped,
    records_failed: audit.recordsFailed,
    user_id: audit.userId,
    status: audit.status,
    error_message: audit.errorMessage,
    created_at: audit.createdAt,
  };
}
