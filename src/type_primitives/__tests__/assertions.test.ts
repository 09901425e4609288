import { describe, expect, it } from "vitest";
import {
  is_array_key,
  is_safe_integer,
  unsafe_cast,
  validate,
} from "../assertions";
import { TypeError, TYPE_ERROR } from "../error";

describe("assertions", () => {
  //=========================================================
  // is_safe_integer / is_array_key
  //=========================================================

  it("is_safe_integer accepts integers within the safe range", () => {
    expect(is_safe_integer(0)).toBe(true);
    expect(is_safe_integer(-42)).toBe(true);
    expect(is_safe_integer(Number.MAX_SAFE_INTEGER)).toBe(true);
  });

  it("is_safe_integer rejects fractions, NaN, infinities and non-numbers", () => {
    expect(is_safe_integer(1.5)).toBe(false);
    expect(is_safe_integer(Number.NaN)).toBe(false);
    expect(is_safe_integer(Infinity)).toBe(false);
    expect(is_safe_integer(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
    expect(is_safe_integer("1")).toBe(false);
  });

  it("is_array_key accepts strings and safe integers", () => {
    expect(is_array_key("")).toBe(true);
    expect(is_array_key("foo")).toBe(true);
    expect(is_array_key(7)).toBe(true);
  });

  it("is_array_key rejects other values", () => {
    expect(is_array_key(0.5)).toBe(false);
    expect(is_array_key(null)).toBe(false);
    expect(is_array_key(undefined)).toBe(false);
    expect(is_array_key(true)).toBe(false);
    expect(is_array_key(Symbol("k"))).toBe(false);
    expect(is_array_key(1n)).toBe(false);
  });

  //=========================================================
  // validate
  //=========================================================

  it("validate returns the value when validation passes", () => {
    expect(validate(42, (v) => v > 0, "positive number")).toBe(42);
  });

  it("validate throws TypeError when validation fails", () => {
    expect(() => validate(-1, (v) => v > 0, "positive number")).toThrow(
      TypeError,
    );
  });

  it("validate error carries category, message and value", () => {
    try {
      validate(-1, (v) => v > 0, "positive number");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(TypeError);
      expect((e as TypeError).category).toBe(
        TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      );
      expect((e as TypeError).message).toBe(
        "Expected value to meet validation: positive number",
      );
      expect((e as TypeError).context).toEqual({ value: -1 });
      expect((e as TypeError).is_operational).toBe(false);
    }
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the value unchanged", () => {
    const obj = { a: 1 };
    expect(unsafe_cast<{ a: number }>(obj)).toBe(obj);
    expect(unsafe_cast<number>(5)).toBe(5);
  });
});
