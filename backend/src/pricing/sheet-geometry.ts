const STANDARD_SHEET_LENGTHS: Record<number, number> = {
  1000: 2000,
  1250: 2500,
  1500: 3000,
  2000: 6000,
};

/** Sheet weight in kg; density in g/cm³, dimensions in mm. */
export function sheetWeightKg(density: number, thickness: number, width: number, length: number) {
  const volumeCm3 = (thickness / 10) * (width / 10) * (length / 10);
  return (density * volumeCm3) / 1000;
}

export function sheetAreaM2(width: number, length: number) {
  return (width / 1000) * (length / 1000);
}

export function standardSheetLength(width: number) {
  return STANDARD_SHEET_LENGTHS[width] ?? width * 2;
}
