/***
 * Indexed — Bracket-syntax view over a Collection.
 *
 * The view is a Proxy whose traps forward to the collection's offset_*
 * methods. Property names are strings, so a canonical integer name
 * ("0", "-3") addresses the integer key and any other name the string key.
 * A string key spelled like a canonical integer (set("1", v)) therefore
 * has no property name: the view neither reads nor lists it.
 * Symbols are never keys: reads give undefined, writes are refused.
 *
 * "then" and "toJSON" read as undefined unless the collection holds them,
 * so await and JSON.stringify treat the view as a plain object.
 *
 *   const view = indexed(new Collection<ArrayKey, string>());
 *   view.foo = "bar";        // set("foo", "bar")
 *   view[0] = "zero";        // set(0, "zero")
 *   "foo" in view;           // contains_key("foo")
 *   delete view.foo;         // remove("foo")
 *   view.missing;            // throws KEY_NOT_FOUND
 *
 * Appending has no bracket form; use add() or offset_set(null, value).
 *
 ***/

import type { ArrayKey } from "type_primitives";
import { property_to_key } from "../utils/keys";
import type { Collection } from "./collection";

// looked up by await and JSON.stringify
const PROTOCOL_PROPERTIES: ReadonlySet<string> = new Set(["then", "toJSON"]);

export type IndexedCollection<V> = {
  [key: string]: V;
  [index: number]: V;
};

export function indexed<V>(
  collection: Collection<ArrayKey, V>,
): IndexedCollection<V> {
  const target: IndexedCollection<V> = {};

  return new Proxy(target, {
    get(_target, prop) {
      if (typeof prop === "symbol") return undefined;
      const key = property_to_key(prop);
      if (PROTOCOL_PROPERTIES.has(prop) && !collection.offset_exists(key)) {
        return undefined;
      }
      return collection.offset_get(key);
    },

    set(_target, prop, value: V) {
      if (typeof prop === "symbol") return false;
      collection.offset_set(property_to_key(prop), value);
      return true;
    },

    has(_target, prop) {
      if (typeof prop === "symbol") return false;
      return collection.offset_exists(property_to_key(prop));
    },

    deleteProperty(_target, prop) {
      if (typeof prop === "symbol") return true;
      collection.offset_unset(property_to_key(prop));
      return true;
    },

    // 1 and "1" share a property name; report it once
    ownKeys() {
      const names = new Set<string>();
      for (const [key] of collection) names.add(String(key));
      return [...names];
    },

    getOwnPropertyDescriptor(_target, prop) {
      if (typeof prop === "symbol") return undefined;
      const key = property_to_key(prop);
      if (!collection.offset_exists(key)) return undefined;
      return {
        value: collection.offset_get(key),
        writable: true,
        enumerable: true,
        configurable: true,
      };
    },
  });
}
