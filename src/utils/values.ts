/**
 * Whether `value` counts as empty for the predicate-less filter.
 * Falsy values, the string "0" and empty arrays are empty.
 */
export function is_empty_value(value: unknown): boolean {
  if (!value) return true;
  if (value === "0") return true;
  return Array.isArray(value) && value.length === 0;
}
