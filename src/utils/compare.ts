/***
 * Compare — Equality and ordering used by Collection.
 *
 * strict_equals backs contains / key / remove_element: no coercion,
 * objects match by identity.
 *
 * compare_regular is the default sort order. When either side is a
 * boolean, both sides compare by truthiness (is_empty_value), false first.
 * null and undefined equal each other, compare as "" against a string and
 * by truthiness against anything else. Numbers, bigints and numeric
 * strings order numerically against each other; other strings order by
 * code unit; arrays order by length, then element-wise. Pairs it has no
 * rule for compare equal, so a stable sort leaves them where they were.
 *
 ***/

import { NUMERIC_STRING_PATTERN } from "./constants";
import { is_empty_value } from "./values";

export type Comparator<T> = (a: T, b: T) => number;

export const strict_equals = (a: unknown, b: unknown): boolean => a === b;

export const is_numeric_string = (v: string): boolean =>
  NUMERIC_STRING_PATTERN.test(v);

function as_number(v: unknown): number | bigint | undefined {
  if (typeof v === "number" || typeof v === "bigint") return v;
  if (typeof v === "string" && is_numeric_string(v)) return Number(v);
  return undefined;
}

function is_scalar(v: unknown): v is string | number | bigint {
  return typeof v === "string" || typeof v === "number" || typeof v === "bigint";
}

function order<T extends string | number | bigint>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function order_truthiness(a: unknown, b: unknown): number {
  return Number(!is_empty_value(a)) - Number(!is_empty_value(b));
}

export function compare_regular(a: unknown, b: unknown): number {
  if (a === b) return 0;

  if (typeof a === "boolean" || typeof b === "boolean") {
    return order_truthiness(a, b);
  }

  const a_nil = a === null || a === undefined;
  const b_nil = b === null || b === undefined;
  if (a_nil || b_nil) {
    if (a_nil && b_nil) return 0;
    if (typeof a === "string") return order(a, "");
    if (typeof b === "string") return order("", b);
    return order_truthiness(a, b);
  }

  const na = as_number(a);
  const nb = as_number(b);
  if (na !== undefined && nb !== undefined) return order(na, nb);

  if (is_scalar(a) && is_scalar(b)) return order(String(a), String(b));

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return a.length < b.length ? -1 : 1;
    for (let i = 0; i < a.length; i++) {
      const cmp = compare_regular(a[i], b[i]);
      if (cmp !== 0) return cmp;
    }
    return 0;
  }

  return 0;
}
