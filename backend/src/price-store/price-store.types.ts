export const MATERIAL_CATEGORIES = [
  "stal_nierdzewna",
  "stal_czarna",
  "aluminium",
] as const;
export type MaterialCategory = (typeof MATERIAL_CATEGORIES)[number];

export const MATERIAL_CATEGORY_LABELS: Record<MaterialCategory, string> = {
  stal_nierdzewna: "Stal nierdzewna",
  stal_czarna: "Stal czarna",
  aluminium: "Aluminium",
};

export const GRINDING_PROVIDERS = ["CAMU", "BABCIA", "BORYS", "COSTA"] as const;
export type GrindingProvider = (typeof GRINDING_PROVIDERS)[number];

export const GRINDING_GRITS = ["K80/K120", "K240/K180", "K320/K400"] as const;
export type GrindingGrit = (typeof GRINDING_GRITS)[number];

/** BORYS prices by source-coil width instead of grit. */
export const BORYS_WIDTH_VARIANTS = ["x1000/1250/1500", "x2000"] as const;
export type BorysWidthVariant = (typeof BORYS_WIDTH_VARIANTS)[number];

export const FILM_TYPES = [
  "FOLIA_ZWYKLA",
  "FOLIA_FIBER",
  "Novacel 4228",
  "Nitto 3100",
  "Nitto 3067M",
  "NITTO AFP585",
  "NITTO 224PR",
] as const;
export type FilmType = (typeof FILM_TYPES)[number];

export type MaterialGroup = {
  id: string;
  name: string;
  category: MaterialCategory;
  displayOrder: number;
  isActive: boolean;
};

export type Material = {
  id: string;
  name: string;
  grade: string;
  category: MaterialCategory;
  /** g/cm³ */
  density: number;
  groupId: string | null;
  displayOrder: number;
  isActive: boolean;
};

export type BasePrice = {
  id: string;
  materialId: string;
  surfaceFinish: string;
  thickness: number;
  width: number;
  length: number;
  pricePlnPerKg: number;
  validFrom: string;
  validTo: string | null;
  isActive: boolean;
  notes: string | null;
};

export type BasePriceRow = BasePrice & {
  material: Material;
  group: MaterialGroup | null;
};

/**
 * A price of 0 marks the combination as disabled; it is never "free".
 */
export type GrindingPrice = {
  id: string;
  provider: GrindingProvider;
  grit: string | null;
  widthVariant: string | null;
  thickness: number;
  pricePlnPerKg: number;
  withSb: boolean;
  isActive: boolean;
};

export type FilmPrice = {
  id: string;
  filmType: FilmType;
  thickness: number;
  pricePlnPerKg: number;
  isActive: boolean;
};

export type ThicknessModifier = {
  id: string;
  grade: string;
  surfaceFinish: string;
  baseWidth: number;
  thickness: number;
  priceModifier: number;
};

export type WidthModifier = {
  id: string;
  /** null applies to every grade */
  grade: string | null;
  width: number;
  priceModifier: number;
};

export type ExchangeRate = {
  id: string;
  currencyFrom: string;
  currencyTo: string;
  rate: number;
  validFrom: string;
  validTo: string | null;
  isActive: boolean;
};

export type ProcessingOption = {
  id: string;
  grade: string | null;
  surfaceFinish: string | null;
  thicknessMin: number | null;
  thicknessMax: number | null;
  widthMin: number | null;
  widthMax: number | null;
  grindingProvider: string | null;
  grindingAllowed: boolean;
  filmType: string | null;
  filmAllowed: boolean;
  notes: string | null;
};

export type PriceChangeAudit = {
  id: string;
  changeType: string;
  filtersJson: string;
  changeValue: number;
  affectedCount: number;
  previousTotal: number;
  newTotal: number;
  userId: string;
  notes: string | null;
  createdAt: string;
};

export type ImportExportAudit = {
  id: string;
  operationType: "import" | "export";
  fileName: string;
  fileType: string;
  dataType: string;
  filtersJson: string | null;
  recordsCount: number;
  recordsAdded: number;
  recordsUpdated: number;
  recordsSkipped: number;
  recordsFailed: number;
  userId: string;
  status: "success" | "partial" | "failed";
  errorMessage: string | null;
  createdAt: string;
};

export type NewMaterial = Omit<Material, "id">;
export type NewBasePrice = Omit<BasePrice, "id">;
export type NewGrindingPrice = Omit<GrindingPrice, "id">;
export type NewFilmPrice = Omit<FilmPrice, "id">;
export type NewPriceChangeAudit = Omit<PriceChangeAudit, "id" | "createdAt">;
export type NewImportExportAudit = Omit<ImportExportAudit, "id" | "createdAt">;

export function isMaterialCategory(value: string): value is MaterialCategory {
  return (MATERIAL_CATEGORIES as readonly string[]).includes(value);
}

export function isGrindingProvider(value: string): value is GrindingProvider {
  return (GRINDING_PROVIDERS as readonly string[]).includes(value);
}

export function isFilmType(value: string): value is FilmType {
  return (FILM_TYPES as readonly string[]).includes(value);
}
