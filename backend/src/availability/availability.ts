import type {
  BorysWidthVariant,
  FilmType,
  GrindingPrice,
  GrindingProvider,
} from "../price-store/price-store.types";

export type UnavailableReason = "missing" | "blocked" | "inactive";

export type Availability =
  | { available: true; price: number }
  | { available: false; price: null; reason: UnavailableReason };

export type GrindingSelector = {
  provider: GrindingProvider;
  thickness: number;
  /** null for BORYS, which prices by width variant */
  grit: string | null;
  widthVariant: string | null;
  withSb: boolean;
};

export type FilmSelector = {
  filmType: FilmType;
  thickness: number;
};

export type AvailabilitySelector =
  | ({ kind: "grinding" } & GrindingSelector)
  | ({ kind: "film" } & FilmSelector);

type PricedRow = {
  pricePlnPerKg: number;
  isActive: boolean;
};

/** A non-positive price marks the combination as switched off. */
export function isBlockedPrice(price: number) {
  return !(price > 0);
}

/**
 * Resolves the rows stored under one selector. An active row wins over
 * inactive duplicates.
 */
export function availabilityOf(rows: PricedRow[]): Availability {
  if (rows.length === 0) {
    return { available: false, price: null, reason: "missing" };
  }

  const active = rows.find((row) => row.isActive);
  if (!active) {
    return { available: false, price: null, reason: "inactive" };
  }

  if (isBlockedPrice(active.pricePlnPerKg)) {
    return { available: false, price: null, reason: "blocked" };
  }

  return { available: true, price: active.pricePlnPerKg };
}

export function borysWidthVariant(width: number): BorysWidthVariant {
  return width <= 1500 ? "x1000/1250/1500" : "x2000";
}

export function grindingColumnKey(price: Pick<GrindingPrice, "grit" | "widthVariant" | "withSb">) {
  const axis = price.grit ?? price.widthVariant ?? "-";
  return price.withSb ? `${axis}_sb` : axis;
}
