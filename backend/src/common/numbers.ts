export function roundTo(value: number, digits: number) {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function roundTo2(value: number) {
  return roundTo(value, 2);
}

/**
 * Reads a spreadsheet cell as a number. Accepts numeric cells and text in
 * either "1 234,56", "1.234,56", "1,234.56" or "1234.56" notation; anything
 * else is null.
 */
export function parseDecimal(rawValue: unknown): number | null {
  if (typeof rawValue === "number") {
    return Number.isFinite(rawValue) ? rawValue : null;
  }

  if (typeof rawValue !== "string") {
    return null;
  }

  const trimmed = rawValue.trim();
  if (!trimmed) {
    return null;
  }

  let normalized = trimmed.replace(/\s+/g, "");
  if (normalized.includes(",") && normalized.includes(".")) {
    // the later separator is the decimal point, the other groups thousands
    normalized =
      normalized.lastIndexOf(",") > normalized.lastIndexOf(".")
        ? normalized.replace(/\./g, "").replace(",", ".")
        : normalized.replace(/,/g, "");
  } else if (normalized.includes(",")) {
    normalized = normalized.replace(",", ".");
  }

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}

export function sameNumber(left: number, right: number, tolerance = 1e-9) {
  return Math.abs(left - right) < tolerance;
}
