import type { ProcessingOption } from "../price-store/price-store.types";

export type ProcessingGate =
  | { allowed: true; note: string | null }
  | { allowed: false; note: string };

/**
 * Range checks run in a fixed order (thickness, then width, then the
 * grinding flag) and the first failing one supplies the note.
 */
export function evaluateProcessingOption(
  option: ProcessingOption | null,
  thickness: number,
  width: number,
  grindingRequested: boolean
): ProcessingGate {
  if (!option) {
    return { allowed: true, note: null };
  }

  if (option.thicknessMin !== null && thickness < option.thicknessMin) {
    return { allowed: false, note: `Grubość poniżej minimum (${option.thicknessMin}mm)` };
  }
  if (option.thicknessMax !== null && thickness > option.thicknessMax) {
    return { allowed: false, note: `Grubość powyżej maksimum (${option.thicknessMax}mm)` };
  }
  if (option.widthMin !== null && width < option.widthMin) {
    return { allowed: false, note: `Szerokość poniżej minimum (${option.widthMin}mm)` };
  }
  if (option.widthMax !== null && width > option.widthMax) {
    return { allowed: false, note: `Szerokość powyżej maksimum (${option.widthMax}mm)` };
  }
  if (grindingRequested && !option.grindingAllowed) {
    return { allowed: false, note: option.notes ?? "Szlifowanie niedostępne" };
  }

  return { allowed: true, note: option.notes };
}
