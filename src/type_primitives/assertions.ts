/***
 * Assertions — Dev-only runtime validation.
 *
 * All checks are guarded by __DEV__ and tree-shaken in production builds.
 * validate is the entry point for keys crossing into a collection: the
 * static types already promise an array key, the check catches callers
 * that reach the library from untyped code.
 *
 * unsafe_cast bypasses all checks (used when the caller guarantees validity).
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export type ArrayKey = number | string;

export const is_safe_integer = (v: unknown): v is number =>
  Number.isSafeInteger(v);

export const is_array_key = (v: unknown): v is ArrayKey =>
  typeof v === "string" || is_safe_integer(v);

export function validate<T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): T {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
