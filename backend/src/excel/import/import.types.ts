import type { FilmType, GrindingProvider } from "../../price-store/price-store.types";

export const IMPORT_MODES = ["update_existing", "add_new", "full_sync"] as const;
export type ImportMode = (typeof IMPORT_MODES)[number];

export type ImportDataType = "base_price" | "grinding" | "film";
export type DiffChangeType = "added" | "updated" | "unchanged" | "error";

export type DiffItem = {
  rowNumber: number;
  sheet: string;
  changeType: DiffChangeType;
  dataType: ImportDataType;
  grade: string | null;
  surfaceFinish: string | null;
  thickness: number | null;
  width: number | null;
  provider: GrindingProvider | null;
  grit: string | null;
  widthVariant: string | null;
  withSb: boolean | null;
  filmType: FilmType | null;
  currentPrice: number | null;
  newPrice: number | null;
  priceChange: number | null;
  errorMessage: string | null;
};

export type RowError = {
  sheet: string;
  row: number;
  error: string;
};

export type NewBasePriceChange = {
  action: "add";
  dataType: "base_price";
  grade: string;
  /** null when the grade has no material yet; apply creates it */
  materialId: string | null;
  surfaceFinish: string;
  thickness: number;
  width: number;
  length: number;
  price: number;
};

export type NewGrindingPriceChange = {
  action: "add";
  dataType: "grinding";
  provider: GrindingProvider;
  grit: string | null;
  widthVariant: string | null;
  withSb: boolean;
  thickness: number;
  price: number;
};

export type NewFilmPriceChange = {
  action: "add";
  dataType: "film";
  filmType: FilmType;
  thickness: number;
  price: number;
};

export type PriceUpdateChange = {
  action: "update";
  dataType: ImportDataType;
  targetId: string;
  price: number;
};

export type NewPriceChange = NewBasePriceChange | NewGrindingPriceChange | NewFilmPriceChange;

export type PendingChangeDraft = NewPriceChange | PriceUpdateChange;

export type PendingChange = PendingChangeDraft & {
  seq: number;
  applied: boolean;
};

export type ImportCounts = {
  totalRows: number;
  validRows: number;
  errorRows: number;
  added: number;
  updated: number;
  unchanged: number;
};

export type ImportAnalysis = {
  importId: string;
  fileName: string;
  counts: ImportCounts;
  diffItems: DiffItem[];
  errors: RowError[];
  warnings: string[];
};

/** What the pending-import store keeps between analyze and apply. */
export type PendingImport = ImportAnalysis & {
  changes: PendingChange[];
  createdAt: string;
  expiresAt: string;
};

export type ImportApplyResult = {
  success: boolean;
  importId: string;
  mode: ImportMode;
  applied: {
    basePrices: number;
    grinding: number;
    film: number;
    materialsCreated: number;
  };
  recordsAdded: number;
  recordsUpdated: number;
  recordsSkipped: number;
  recordsFailed: number;
  /** Changes left for a later apply under another mode. */
  remaining: number;
  errors: Array<{ seq: number; error: string }>;
};

export type ImportPreviewPage = Omit<ImportAnalysis, "diffItems"> & {
  items: DiffItem[];
  page: number;
  perPage: number;
  totalPages: number;
  expiresAt: string;
};
