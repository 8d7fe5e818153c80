/** Accepts repeated query keys as well as a comma-separated value. */
export function toList({ value }: { value: unknown }) {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }

  const values = Array.isArray(value) ? value : [value];
  return values.flatMap((entry) => String(entry).split(",")).map((entry) => entry.trim()).filter(Boolean);
}

export function toNumberList(params: { value: unknown }) {
  return toList(params)?.map(Number);
}
