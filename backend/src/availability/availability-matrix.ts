import type { PriceStoreSession } from "../price-store/price-store";
import {
  FILM_TYPES,
  type FilmType,
  GRINDING_PROVIDERS,
  type GrindingProvider,
} from "../price-store/price-store.types";
import {
  type Availability,
  type AvailabilitySelector,
  type FilmSelector,
  type GrindingSelector,
  availabilityOf,
  borysWidthVariant,
  grindingColumnKey,
  isBlockedPrice,
} from "./availability";

export type AvailableGrindingOption = {
  grit: string | null;
  withSb: boolean;
  price: number;
};

export type AvailableGrindingProvider = {
  provider: GrindingProvider;
  widthVariant: string | null;
  options: AvailableGrindingOption[];
};

export type MatrixCell = {
  id: string;
  price: number;
  blocked: boolean;
};

export type GrindingMatrixCell = MatrixCell & {
  grit: string | null;
  widthVariant: string | null;
  withSb: boolean;
};

export type GrindingMatrix = {
  provider: GrindingProvider;
  widthVariant: string | null;
  thicknesses: number[];
  columns: string[];
  rows: Array<{ thickness: number; cells: Record<string, GrindingMatrixCell> }>;
};

export type FilmMatrix = {
  filmTypes: FilmType[];
  thicknesses: number[];
  rows: Array<{ thickness: number; cells: Partial<Record<FilmType, MatrixCell>> }>;
};

/**
 * Availability queries over one price store session. Every lookup goes
 * through `availabilityOf`, so a stored price of 0 never reads as free.
 */
export class AvailabilityMatrix {
  constructor(private readonly session: PriceStoreSession) {}

  async isAvailable(selector: AvailabilitySelector): Promise<Availability> {
    if (selector.kind === "film") {
      return this.isFilmAvailable(selector);
    }

    return this.isGrindingAvailable(selector);
  }

  async isGrindingAvailable(selector: GrindingSelector) {
    const rows = await this.session.listGrindingPrices({
      providers: [selector.provider],
      thickness: selector.thickness,
      grit: selector.grit,
      widthVariant: selector.widthVariant,
      withSb: selector.withSb,
    });

    return availabilityOf(rows);
  }

  async isFilmAvailable(selector: FilmSelector) {
    const rows = await this.session.listFilmPrices({
      filmTypes: [selector.filmType],
      thickness: selector.thickness,
    });

    return availabilityOf(rows);
  }

  /**
   * Sheet-level check: BORYS takes its width variant from the sheet width and
   * has no grit axis; other providers ignore the width.
   */
  async checkGrindingAvailability(
    provider: GrindingProvider,
    thickness: number,
    width: number,
    grit: string | null,
    withSb: boolean
  ) {
    return this.isGrindingAvailable(this.resolveGrindingSelector(provider, thickness, width, grit, withSb));
  }

  resolveGrindingSelector(
    provider: GrindingProvider,
    thickness: number,
    width: number,
    grit: string | null,
    withSb: boolean
  ): GrindingSelector {
    if (provider === "BORYS") {
      return { provider, thickness, grit: null, widthVariant: borysWidthVariant(width), withSb };
    }

    return { provider, thickness, grit, widthVariant: null, withSb };
  }

  async listAvailable(thickness: number, width: number, grit?: string) {
    const prices = await this.session.listGrindingPrices({ activeOnly: true, thickness });
    const results: AvailableGrindingProvider[] = [];

    for (const provider of GRINDING_PROVIDERS) {
      const widthVariant = provider === "BORYS" ? borysWidthVariant(width) : null;
      const options = prices
        .filter(
          (price) =>
            price.provider === provider &&
            !isBlockedPrice(price.pricePlnPerKg) &&
            (widthVariant === null || price.widthVariant === widthVariant) &&
            (grit === undefined || provider === "BORYS" || price.grit === grit)
        )
        .map((price) => ({ grit: price.grit, withSb: price.withSb, price: price.pricePlnPerKg }));

      if (options.length > 0) {
        results.push({ provider, widthVariant, options });
      }
    }

    return results;
  }

  async getGrindingMatrix(provider: GrindingProvider, widthVariant?: string): Promise<GrindingMatrix> {
    const prices = await this.session.listGrindingPrices({
      activeOnly: true,
      providers: [provider],
      widthVariant,
    });

    const rowsByThickness = new Map<number, Record<string, GrindingMatrixCell>>();
    const columns = new Set<string>();

    for (const price of prices) {
      const column = grindingColumnKey(price);
      columns.add(column);

      const cells = rowsByThickness.get(price.thickness) ?? {};
      cells[column] = {
        id: price.id,
        price: price.pricePlnPerKg,
        blocked: isBlockedPrice(price.pricePlnPerKg),
        grit: price.grit,
        widthVariant: price.widthVariant,
        withSb: price.withSb,
      };
      rowsByThickness.set(price.thickness, cells);
    }

    const thicknesses = [...rowsByThickness.keys()].sort((left, right) => left - right);

    return {
      provider,
      widthVariant: widthVariant ?? null,
      thicknesses,
      columns: [...columns].sort(),
      rows: thicknesses.map((thickness) => ({
        thickness,
        cells: rowsByThickness.get(thickness) ?? {},
      })),
    };
  }

  async getFilmMatrix(): Promise<FilmMatrix> {
    const prices = await this.session.listFilmPrices({ activeOnly: true });

    const rowsByThickness = new Map<number, Partial<Record<FilmType, MatrixCell>>>();
    const presentTypes = new Set<FilmType>();

    for (const price of prices) {
      presentTypes.add(price.filmType);
      const cells = rowsByThickness.get(price.thickness) ?? {};
      cells[price.filmType] = {
        id: price.id,
        price: price.pricePlnPerKg,
        blocked: isBlockedPrice(price.pricePlnPerKg),
      };
      rowsByThickness.set(price.thickness, cells);
    }

    const thicknesses = [...rowsByThickness.keys()].sort((left, right) => left - right);

    return {
      filmTypes: FILM_TYPES.filter((filmType) => presentTypes.has(filmType)),
      thicknesses,
      rows: thicknesses.map((thickness) => ({
        thickness,
        cells: rowsByThickness.get(thickness) ?? {},
      })),
    };
  }
}
