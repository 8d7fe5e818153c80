import type { MaterialCategory, NewMaterial } from "./price-store.types";

type CatalogueEntry = {
  name: string;
  category: MaterialCategory;
  density: number;
};

const MATERIAL_CATALOGUE: Record<string, CatalogueEntry> = {
  "1.4301": { name: "Stal nierdzewna 304", category: "stal_nierdzewna", density: 7.9 },
  "1.4404": { name: "Stal nierdzewna 316L", category: "stal_nierdzewna", density: 8.0 },
  "1.4016": { name: "Stal nierdzewna 430", category: "stal_nierdzewna", density: 7.7 },
  DC01: { name: "Stal czarna DC01", category: "stal_czarna", density: 7.85 },
  S235JR: { name: "Stal konstrukcyjna S235JR", category: "stal_czarna", density: 7.85 },
  S355JR: { name: "Stal konstrukcyjna S355JR", category: "stal_czarna", density: 7.85 },
  "1050": { name: "Aluminium 1050", category: "aluminium", density: 2.71 },
  "5754": { name: "Aluminium 5754", category: "aluminium", density: 2.66 },
  "6061": { name: "Aluminium 6061", category: "aluminium", density: 2.7 },
};

/**
 * Material row for a grade seen for the first time. Unlisted grades are
 * assumed to be stainless.
 */
export function describeNewMaterial(grade: string): NewMaterial {
  const entry: CatalogueEntry = MATERIAL_CATALOGUE[grade] ?? {
    name: `Materiał ${grade}`,
    category: "stal_nierdzewna",
    density: 7.9,
  };

  return {
    ...entry,
    grade,
    groupId: null,
    displayOrder: 0,
    isActive: true,
  };
}
