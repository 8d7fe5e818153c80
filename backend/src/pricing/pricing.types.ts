import type { UnavailableReason } from "../availability/availability";
import type {
  FilmType,
  GrindingProvider,
  MaterialCategory,
} from "../price-store/price-store.types";

export type GrindingRequest = {
  provider: GrindingProvider;
  grit?: string | null;
  /** BORYS only; derived from the sheet width when omitted */
  widthVariant?: string | null;
  withSb?: boolean;
};

export type PriceRequest = {
  materialId: string;
  surfaceFinish: string;
  thickness: number;
  width: number;
  length: number;
  filmType?: FilmType;
  grinding?: GrindingRequest;
};

/**
 * How a surcharge line ended up in the total. Only `applied` adds cost;
 * the other states keep it at zero.
 */
export type SurchargeLine =
  | { status: "not_requested"; cost: 0 }
  | { status: "applied"; cost: number }
  | { status: "unavailable"; cost: 0; reason: UnavailableReason }
  | { status: "blocked"; cost: 0; note: string };

export type UnappliedModifier =
  | { kind: "thickness"; id: string; baseWidth: number; priceModifier: number }
  | { kind: "width"; id: string; grade: string | null; priceModifier: number };

export type PriceBreakdown = {
  basePricePlnPerKg: number;
  filmCostPlnPerKg: number;
  grindingCostPlnPerKg: number;
  totalPricePlnPerKg: number;
  totalPriceEurPerKg: number;
  exchangeRate: number;
  sheetPricePln: number;
  sheetPriceEur: number;
  pricePerM2Pln: number;
  dimensions: {
    thicknessMm: number;
    widthMm: number;
    lengthMm: number;
  };
  weightKg: number;
  areaM2: number;
  configuration: {
    material: string;
    surface: string;
    film: FilmType | null;
    grinding: GrindingProvider | null;
    grit: string | null;
    widthVariant: string | null;
    withSb: boolean;
  };
  film: SurchargeLine;
  grinding: SurchargeLine;
  unappliedModifiers: UnappliedModifier[];
  notes: string | null;
};

export type AvailableOptions = {
  processingAllowed: boolean;
  notes: string | null;
  films: Array<{ type: FilmType; pricePlnPerKg: number }>;
  grindings: Array<{
    provider: GrindingProvider;
    grit: string | null;
    widthVariant: string | null;
    withSb: boolean;
    pricePlnPerKg: number;
  }>;
};

export type PriceTableFilters = {
  category?: MaterialCategory;
  grade?: string;
  surfaceFinish?: string;
  thicknessMin?: number;
  thicknessMax?: number;
  width?: number;
};

export type PriceTableRow = {
  id: string;
  materialId: string;
  materialName: string;
  grade: string;
  category: MaterialCategory;
  surfaceFinish: string;
  thickness: number;
  width: number;
  length: number;
  pricePlnPerKg: number;
  priceEurPerKg: number;
  notes: string | null;
};
