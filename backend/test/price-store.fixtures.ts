import type {
  BasePrice,
  ExchangeRate,
  FilmPrice,
  GrindingPrice,
  Material,
  MaterialGroup,
  ProcessingOption,
} from "../src/price-store/price-store.types";

export function buildGroup(overrides: Partial<MaterialGroup> & Pick<MaterialGroup, "id">): MaterialGroup {
  return {
    name: "Nierdzewne austenityczne",
    category: "stal_nierdzewna",
    displayOrder: 1,
    isActive: true,
    ...overrides,
  };
}

export function buildMaterial(
  overrides: Partial<Material> & Pick<Material, "id" | "grade">
): Material {
  return {
    name: `Materiał ${overrides.grade}`,
    category: "stal_nierdzewna",
    density: 7.9,
    groupId: null,
    displayOrder: 0,
    isActive: true,
    ...overrides,
  };
}

export function buildBasePrice(
  overrides: Partial<BasePrice> & Pick<BasePrice, "id" | "materialId" | "pricePlnPerKg">
): BasePrice {
  return {
    surfaceFinish: "2B",
    thickness: 1,
    width: 1250,
    length: 2500,
    validFrom: "2026-01-01T00:00:00.000Z",
    validTo: null,
    isActive: true,
    notes: null,
    ...overrides,
  };
}

export function buildGrindingPrice(
  overrides: Partial<GrindingPrice> & Pick<GrindingPrice, "id" | "provider" | "pricePlnPerKg">
): GrindingPrice {
  return {
    grit: "K320/K400",
    widthVariant: null,
    thickness: 1,
    withSb: false,
    isActive: true,
    ...overrides,
  };
}

export function buildFilmPrice(
  overrides: Partial<FilmPrice> & Pick<FilmPrice, "id" | "filmType" | "pricePlnPerKg">
): FilmPrice {
  return {
    thickness: 1,
    isActive: true,
    ...overrides,
  };
}

export function buildExchangeRate(
  overrides: Partial<ExchangeRate> & Pick<ExchangeRate, "id" | "rate">
): ExchangeRate {
  return {
    currencyFrom: "EUR",
    currencyTo: "PLN",
    validFrom: "2026-01-01T00:00:00.000Z",
    validTo: null,
    isActive: true,
    ...overrides,
  };
}

export function buildProcessingOption(
  overrides: Partial<ProcessingOption> & Pick<ProcessingOption, "id">
): ProcessingOption {
  return {
    grade: null,
    surfaceFinish: null,
    thicknessMin: null,
    thicknessMax: null,
    widthMin: null,
    widthMax: null,
    grindingProvider: null,
    grindingAllowed: true,
    filmType: null,
    filmAllowed: true,
    notes: null,
    ...overrides,
  };
}
