import type { PriceStoreSession } from "../../price-store/price-store";
import { supersedes } from "../../price-store/price-store.queries";
import type {
  BasePriceRow,
  FilmPrice,
  GrindingPrice,
  Material,
} from "../../price-store/price-store.types";

/**
 * Current prices keyed the way workbook rows are matched. Loaded once per
 * analysis; classification never queries the store per row. A base price key
 * with several active rows maps to the one the calculator prices from.
 */
export type PriceIndex = {
  materialsByGrade: Map<string, Material>;
  basePrices: Map<string, BasePriceRow>;
  grindingPrices: Map<string, GrindingPrice>;
  filmPrices: Map<string, FilmPrice>;
};

export function basePriceKey(key: {
  grade: string;
  surfaceFinish: string;
  thickness: number;
  width: number;
}) {
  return [key.grade, key.surfaceFinish, key.thickness, key.width].join("|");
}

export function grindingPriceKey(key: {
  provider: string;
  thickness: number;
  grit: string | null;
  withSb: boolean;
  widthVariant: string | null;
}) {
  return [key.provider, key.thickness, key.grit ?? "", key.withSb ? "sb" : "", key.widthVariant ?? ""].join(
    "|"
  );
}

export function filmPriceKey(key: { filmType: string; thickness: number }) {
  return [key.filmType, key.thickness].join("|");
}

function indexBy<T>(
  rows: T[],
  keyOf: (row: T) => string,
  prefer: (candidate: T, current: T) => boolean = () => false
) {
  const index = new Map<string, T>();
  for (const row of rows) {
    const key = keyOf(row);
    const current = index.get(key);
    if (current === undefined || prefer(row, current)) {
      index.set(key, row);
    }
  }

  return index;
}

export async function loadPriceIndex(session: PriceStoreSession): Promise<PriceIndex> {
  const [materials, basePrices, grindingPrices, filmPrices] = await Promise.all([
    session.listMaterials(),
    session.listBasePrices({ activeOnly: true }),
    session.listGrindingPrices({ activeOnly: true }),
    session.listFilmPrices({ activeOnly: true }),
  ]);

  return {
    materialsByGrade: indexBy(materials, (material) => material.grade),
    basePrices: indexBy(basePrices, (row) =>
      basePriceKey({
        grade: row.material.grade,
        surfaceFinish: row.surfaceFinish,
        thickness: row.thickness,
        width: row.width,
      }),
      supersedes
    ),
    grindingPrices: indexBy(grindingPrices, grindingPriceKey),
    filmPrices: indexBy(filmPrices, filmPriceKey),
  };
}
