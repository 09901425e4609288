import { describe, expect, it } from "vitest";
import { Collection } from "../collection";
import { indexed } from "../indexed";
import { COLLECTION_ERROR, CollectionError } from "../../utils/error";
import type { ArrayKey } from "../../type_primitives/assertions";

describe("indexed", () => {
  //=========================================================
  // Writes
  //=========================================================

  it("property writes set entries in order", () => {
    const c = new Collection<ArrayKey, string>();
    const view = indexed(c);
    view.foo = "bar";
    view.baz = "qux";
    expect(c.to_entries()).toEqual([
      ["foo", "bar"],
      ["baz", "qux"],
    ]);
  });

  it("numeric property writes use integer keys", () => {
    const c = new Collection<ArrayKey, string>();
    const view = indexed(c);
    view[0] = "zero";
    view["1"] = "one";
    expect(c.to_entries()).toEqual([
      [0, "zero"],
      [1, "one"],
    ]);
    expect(c.is_list()).toBe(true);
  });

  it("non-canonical numeric names stay string keys", () => {
    const c = new Collection<ArrayKey, string>();
    const view = indexed(c);
    view["01"] = "a";
    view["1.5"] = "b";
    expect(c.to_entries()).toEqual([
      ["01", "a"],
      ["1.5", "b"],
    ]);
  });

  it("negative integer names use integer keys", () => {
    const c = new Collection<ArrayKey, string>();
    const view = indexed(c);
    view[-3] = "neg";
    expect(c.get(-3)).toBe("neg");
  });

  //=========================================================
  // Reads
  //=========================================================

  it("property reads return the stored value", () => {
    const c = new Collection<ArrayKey, string>([
      ["baz", "qux"],
      [2, "two"],
    ]);
    const view = indexed(c);
    expect(view.baz).toBe("qux");
    expect(view[2]).toBe("two");
  });

  it("reading an absent key throws KEY_NOT_FOUND", () => {
    const view = indexed(new Collection<ArrayKey, string>());
    expect(() => view.missing).toThrow(CollectionError);
    try {
      void view.missing;
    } catch (e) {
      expect((e as CollectionError).category).toBe(
        COLLECTION_ERROR.KEY_NOT_FOUND,
      );
    }
  });

  it("symbol reads are undefined", () => {
    const view = indexed(Collection.of("a"));
    expect(Reflect.get(view, Symbol.iterator)).toBeUndefined();
  });

  it("JSON.stringify serialises the entries", () => {
    const c = new Collection<ArrayKey, number>([
      ["x", 1],
      [3, 2],
    ]);
    expect(JSON.stringify(indexed(c))).toBe('{"x":1,"3":2}');
  });

  it("a view can be awaited", async () => {
    const view = indexed(new Collection<ArrayKey, string>([["foo", "bar"]]));
    const resolved = await Promise.resolve(view);
    expect(resolved === view).toBe(true);
    expect(resolved.foo).toBe("bar");
  });

  it("stored then and toJSON entries are read normally", () => {
    const view = indexed(
      new Collection<ArrayKey, string>([
        ["then", "a"],
        ["toJSON", "b"],
      ]),
    );
    expect(view.then).toBe("a");
    expect(view.toJSON).toBe("b");
  });

  //=========================================================
  // in / delete
  //=========================================================

  it("in checks for a key", () => {
    const view = indexed(
      new Collection<ArrayKey, string>([
        ["foo", "bar"],
        [0, "zero"],
      ]),
    );
    expect("foo" in view).toBe(true);
    expect(0 in view).toBe(true);
    expect("bar" in view).toBe(false);
  });

  it("delete removes the entry", () => {
    const c = new Collection<ArrayKey, string>([
      ["foo", "bar"],
      ["baz", "qux"],
    ]);
    const view = indexed(c);
    delete view.foo;
    expect(c.contains_key("foo")).toBe(false);
    expect(view.baz).toBe("qux");
  });

  it("delete of an absent key is a no-op", () => {
    const c = new Collection<ArrayKey, string>([["foo", "bar"]]);
    const view = indexed(c);
    expect(Reflect.deleteProperty(view, "nope")).toBe(true);
    expect(c.count()).toBe(1);
  });

  it("symbol writes are refused", () => {
    const c = new Collection<ArrayKey, string>();
    const view = indexed(c);
    expect(Reflect.set(view, Symbol("k"), "v")).toBe(false);
    expect(c.count()).toBe(0);
  });

  //=========================================================
  // Enumeration
  //=========================================================

  it("Object.keys lists keys in collection order", () => {
    const c = new Collection<ArrayKey, string>([
      ["b", "1"],
      [3, "2"],
      ["a", "3"],
    ]);
    expect(Object.keys(indexed(c))).toEqual(["b", "3", "a"]);
  });

  it("Object.entries reads through the collection", () => {
    const c = new Collection<ArrayKey, number>([
      ["x", 1],
      ["y", 2],
    ]);
    expect(Object.entries(indexed(c))).toEqual([
      ["x", 1],
      ["y", 2],
    ]);
  });

  it("an integer key and its string twin are listed once", () => {
    const c = new Collection<ArrayKey, string>([
      [1, "int"],
      ["1", "str"],
    ]);
    expect(Object.keys(indexed(c))).toEqual(["1"]);
  });

  it("a string key spelled as an integer is not visible", () => {
    const c = new Collection<ArrayKey, string>([["1", "str"]]);
    const view = indexed(c);
    expect("1" in view).toBe(false);
    expect(Object.keys(view)).toEqual([]);
  });

  it("the view is live", () => {
    const c = new Collection<ArrayKey, string>();
    const view = indexed(c);
    c.set("late", "value");
    expect(view.late).toBe("value");
    expect(Object.keys(view)).toEqual(["late"]);
  });
});
