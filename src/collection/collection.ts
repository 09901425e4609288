/***
 *
 * Collection — Ordered key/value collection with array keys
 *
 * Keys are strings or safe integers, values are anything. Entries live in
 * a native Map, so insertion order is iteration order; overwriting a key
 * keeps its position. Each value sits in a one-field slot, which lets a
 * lookup tell "absent" from "present and undefined" without a second lookup.
 *
 * Mutators (set, add, sort, clear) return the collection for chaining.
 * Everything that builds a collection (keys, values, filter, map, sorted,
 * usort, copy) returns a fresh instance with its own Map and slots, and
 * inherits the receiver's options.
 *
 * Usage:
 *
 *   const c = Collection.of("a", "b");
 *   c.add("c").set(10, "z");
 *   c.get(2);              // "c"
 *   c.is_list();           // false, key 10 breaks the run
 *   c.add("d");            // throws LIST_REQUIRED, use set()
 *
 *   const loose = Collection.from(["a"], { add_policy: ADD_POLICY.PERMISSIVE });
 *
 ***/

import {
  is_array_key,
  is_safe_integer,
  unsafe_cast,
  validate,
  type ArrayKey,
} from "type_primitives";
import { compare_regular, strict_equals, type Comparator } from "../utils/compare";
import { FIRST_LIST_INDEX, LIST_REQUIRED_MESSAGE } from "../utils/constants";
import { COLLECTION_ERROR, CollectionError } from "../utils/error";
import { property_to_key } from "../utils/keys";
import { is_empty_value } from "../utils/values";

export enum ADD_POLICY {
  /** add() only on list-shaped collections, otherwise LIST_REQUIRED */
  LIST_ONLY = "LIST_ONLY",
  /** add() appends after the largest integer key, whatever the shape */
  PERMISSIVE = "PERMISSIVE",
}

export interface CollectionOptions {
  add_policy?: ADD_POLICY;
}

export type Predicate<K, V> = (value: V, key: K) => boolean;

interface Slot<V> {
  value: V;
}

const KEY_VALIDATION = "array key (string or safe integer)";

function is_array<V>(values: Iterable<V>): values is readonly V[] {
  return Array.isArray(values);
}

export class Collection<K extends ArrayKey = ArrayKey, V = unknown>
  implements Iterable<[K, V]>
{
  private _elements: Map<K, Slot<V>> = new Map();
  private readonly _add_policy: ADD_POLICY;

  constructor(entries?: Iterable<readonly [K, V]>, options?: CollectionOptions) {
    this._add_policy = options?.add_policy ?? ADD_POLICY.LIST_ONLY;
    if (entries === undefined) return;
    for (const [key, value] of entries) this.set(key, value);
  }

  //=========================================================
  // Construction
  //=========================================================

  /**
   * Build a collection keyed by position. Arrays keep their own indices,
   * so holes in a sparse array leave gaps in the keys.
   */
  static from<V>(
    values: Iterable<V>,
    options?: CollectionOptions,
  ): Collection<number, V> {
    const c = new Collection<number, V>(undefined, options);
    if (is_array(values)) {
      values.forEach((value, index) => c._elements.set(index, { value }));
      return c;
    }
    let index = FIRST_LIST_INDEX;
    for (const value of values) c._elements.set(index++, { value });
    return c;
  }

  static of<V>(...values: V[]): Collection<number, V> {
    return Collection.from(values);
  }

  /**
   * Build a collection from an object's own enumerable properties, in the
   * object's key order. JS objects list integer-like names first, ascending.
   * Canonical integer names become integer keys.
   */
  static from_record<V>(
    record: Readonly<Record<string, V>>,
    options?: CollectionOptions,
  ): Collection<ArrayKey, V> {
    const c = new Collection<ArrayKey, V>(undefined, options);
    for (const name of Object.keys(record)) {
      c._elements.set(property_to_key(name), { value: record[name] });
    }
    return c;
  }

  get options(): Readonly<Required<CollectionOptions>> {
    return { add_policy: this._add_policy };
  }

  //=========================================================
  // Mutation
  //=========================================================

  /** Returns the value at `key`. Throws KEY_NOT_FOUND when absent. */
  get(key: K): V {
    const slot = this._elements.get(key);
    if (slot === undefined) {
      throw new CollectionError(
        COLLECTION_ERROR.KEY_NOT_FOUND,
        `Key "${String(key)}" does not exist in the collection`,
        { key },
      );
    }
    return slot.value;
  }

  /** Non-throwing get: `fallback` when `key` is absent. */
  get_or<F>(key: K, fallback: F): V | F {
    const slot = this._elements.get(key);
    return slot === undefined ? fallback : slot.value;
  }

  set(key: K, value: V): this {
    const checked = validate(key, is_array_key, KEY_VALIDATION);
    const slot = this._elements.get(checked);
    if (slot !== undefined) {
      slot.value = value;
    } else {
      this._elements.set(checked, { value });
    }
    return this;
  }

  /**
   * Append values under fresh integer keys. Under ADD_POLICY.LIST_ONLY the
   * collection must be a list; nothing is appended when it is not. Keys are
   * integers, so a collection typed with string keys should use set().
   */
  add(...values: V[]): this {
    let next = this._next_index();
    if (values.length > 0 && !is_safe_integer(next + values.length - 1)) {
      throw new CollectionError(
        COLLECTION_ERROR.KEY_OVERFLOW,
        `Cannot add ${values.length} value(s): the next integer key would pass Number.MAX_SAFE_INTEGER`,
        { next_key: next, count: values.length },
      );
    }
    // integer keys are valid for every K that includes number
    for (const value of values) {
      this._elements.set(unsafe_cast<K>(next++), { value });
    }
    return this;
  }

  /** Removes `key` and returns its value, or undefined if it was absent. */
  remove(key: K): V | undefined {
    const slot = this._elements.get(key);
    if (slot === undefined) return undefined;
    this._elements.delete(key);
    return slot.value;
  }

  /** Removes the first entry holding `value`. */
  remove_element(value: V): boolean {
    const key = this.key(value);
    if (key === undefined) return false;
    this._elements.delete(key);
    return true;
  }

  clear(): this {
    this._elements.clear();
    return this;
  }

  //=========================================================
  // Query
  //=========================================================

  contains_key(key: K): boolean {
    return this._elements.has(key);
  }

  contains(value: V): boolean {
    return this.key(value) !== undefined;
  }

  /** First key holding `value` (strict equality), or undefined. */
  key(value: V): K | undefined {
    for (const [key, slot] of this._elements) {
      if (strict_equals(slot.value, value)) return key;
    }
    return undefined;
  }

  is_empty(): boolean {
    return this._elements.size === 0;
  }

  count(): number {
    return this._elements.size;
  }

  get size(): number {
    return this._elements.size;
  }

  /** True iff the keys are exactly 0..n-1 in order. */
  is_list(): boolean {
    let expected = FIRST_LIST_INDEX;
    for (const key of this._elements.keys()) {
      if (key !== expected) return false;
      expected++;
    }
    return true;
  }

  first_key(): K | undefined {
    const first = this._elements.keys().next();
    return first.done ? undefined : first.value;
  }

  last_key(): K | undefined {
    let last: K | undefined;
    for (const key of this._elements.keys()) last = key;
    return last;
  }

  first(): V | undefined {
    const first = this._elements.values().next();
    return first.done ? undefined : first.value.value;
  }

  last(): V | undefined {
    let last: Slot<V> | undefined;
    for (const slot of this._elements.values()) last = slot;
    return last?.value;
  }

  //=========================================================
  // Transformation
  //=========================================================

  keys(): Collection<number, K> {
    return Collection.from(this._elements.keys(), this.options);
  }

  values(): Collection<number, V> {
    return Collection.from(this._iterate_values(), this.options);
  }

  /**
   * Entries for which `predicate(value, key)` holds, keys preserved.
   * Without a predicate, drops empty values (see is_empty_value).
   */
  filter(predicate?: Predicate<K, V>): Collection<K, V> {
    const test = predicate ?? ((value: V) => !is_empty_value(value));
    const out = new Map<K, Slot<V>>();
    for (const [key, slot] of this._elements) {
      if (test(slot.value, key)) out.set(key, { value: slot.value });
    }
    return this._derive(out);
  }

  map<U>(callback: (value: V, key: K) => U): Collection<K, U> {
    const out = new Map<K, Slot<U>>();
    for (const [key, slot] of this._elements) {
      out.set(key, { value: callback(slot.value, key) });
    }
    return this._derive(out);
  }

  /** Left fold over the values; keys are not passed. */
  reduce<R>(callback: (carry: R, value: V) => R, initial: R): R {
    let carry = initial;
    for (const slot of this._elements.values()) {
      carry = callback(carry, slot.value);
    }
    return carry;
  }

  find(predicate: Predicate<K, V>): V | undefined {
    for (const [key, slot] of this._elements) {
      if (predicate(slot.value, key)) return slot.value;
    }
    return undefined;
  }

  some(predicate: Predicate<K, V>): boolean {
    for (const [key, slot] of this._elements) {
      if (predicate(slot.value, key)) return true;
    }
    return false;
  }

  every(predicate: Predicate<K, V>): boolean {
    for (const [key, slot] of this._elements) {
      if (!predicate(slot.value, key)) return false;
    }
    return true;
  }

  for_each(fn: (value: V, key: K) => void): void {
    for (const [key, slot] of this._elements) fn(slot.value, key);
  }

  /**
   * Stable in-place sort by value. Keys travel with their values.
   * Defaults to compare_regular.
   */
  sort(comparator: Comparator<V> = compare_regular): this {
    const entries = [...this._elements];
    entries.sort(([, a], [, b]) => comparator(a.value, b.value));
    this._elements.clear();
    for (const [key, slot] of entries) this._elements.set(key, slot);
    return this;
  }

  sorted(comparator?: Comparator<V>): Collection<K, V> {
    return this.copy().sort(comparator);
  }

  usort(comparator: Comparator<V>): Collection<K, V> {
    return this.copy().sort(comparator);
  }

  copy(): Collection<K, V> {
    const out = new Map<K, Slot<V>>();
    for (const [key, slot] of this._elements) out.set(key, { value: slot.value });
    return this._derive(out);
  }

  //=========================================================
  // Export / iteration
  //=========================================================

  *entries(): Generator<[K, V], void, undefined> {
    for (const [key, slot] of this._elements) yield [key, slot.value];
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.entries();
  }

  to_map(): Map<K, V> {
    return new Map(this.entries());
  }

  to_array(): V[] {
    return [...this._iterate_values()];
  }

  to_entries(): [K, V][] {
    return [...this.entries()];
  }

  //=========================================================
  // Offset access (backs the indexed view)
  //=========================================================

  offset_exists(key: K): boolean {
    return this.contains_key(key);
  }

  offset_get(key: K): V {
    return this.get(key);
  }

  /** A null or undefined key appends, like add(). */
  offset_set(key: K | null | undefined, value: V): void {
    if (key === null || key === undefined) {
      this.add(value);
      return;
    }
    this.set(key, value);
  }

  offset_unset(key: K): void {
    this.remove(key);
  }

  //=========================================================
  // Internal
  //=========================================================

  private _next_index(): number {
    if (this._add_policy === ADD_POLICY.LIST_ONLY) {
      if (!this.is_list()) {
        throw new CollectionError(
          COLLECTION_ERROR.LIST_REQUIRED,
          LIST_REQUIRED_MESSAGE,
          { add_policy: this._add_policy },
        );
      }
      return this._elements.size;
    }

    let max: number | undefined;
    for (const key of this._elements.keys()) {
      if (typeof key === "number" && (max === undefined || key > max)) max = key;
    }
    return max === undefined ? FIRST_LIST_INDEX : max + 1;
  }

  private *_iterate_values(): Generator<V, void, undefined> {
    for (const slot of this._elements.values()) yield slot.value;
  }

  private _derive<K2 extends ArrayKey, U>(
    elements: Map<K2, Slot<U>>,
  ): Collection<K2, U> {
    const c = new Collection<K2, U>(undefined, this.options);
    c._elements = elements;
    return c;
  }
}
