import type { ArrayKey } from "../type_primitives";
import { CANONICAL_INTEGER_PATTERN } from "./constants";

/**
 * Map a property name to the collection key it addresses.
 * Canonical decimal integers ("0", "42", "-3") become numbers,
 * everything else ("01", "1.5", "foo") stays a string.
 */
export function property_to_key(name: string): ArrayKey {
  if (CANONICAL_INTEGER_PATTERN.test(name)) {
    const n = Number(name);
    if (Number.isSafeInteger(n)) return n;
  }
  return name;
}
