// tests/path/response-path.test.ts
import { describe, expect, it } from "vitest";

import { PathMap, ResponsePath } from "../../src/path";

describe("ResponsePath", () => {
  describe("construction", () => {
    it("should create a single-segment root path", () => {
      const path = ResponsePath.root("name");
      expect(path.segments).toEqual(["name"]);
      expect(path.length).toBe(1);
    });

    it("should append segments without modifying the original", () => {
      const address = ResponsePath.root("address");
      const street = address.child("street");

      expect(street.segments).toEqual(["address", "street"]);
      expect(address.segments).toEqual(["address"]);
    });

    it("should return the same path for an empty child segment", () => {
      const path = ResponsePath.root("name");
      expect(path.child("")).toBe(path);
    });

    it("should start from the empty path", () => {
      const path = ResponsePath.empty().child("name");
      expect(path.equals(ResponsePath.root("name"))).toBe(true);
      expect(ResponsePath.empty().isEmpty()).toBe(true);
    });

    it("should split hand-typed dotted keys", () => {
      expect(ResponsePath.fromDotted("address.location.city").segments).toEqual(["address", "location", "city"]);
    });

    it("should concatenate paths", () => {
      const joined = ResponsePath.root("server").concat(ResponsePath.of("tls", "cert"));
      expect(joined.display()).toBe("server.tls.cert");
    });
  });

  describe("equality", () => {
    it("should compare separately built paths structurally", () => {
      const a = ResponsePath.root("a").child("b");
      const b = ResponsePath.root("a").child("b");

      expect(a.equals(b)).toBe(true);
      expect(a.key).toBe(b.key);
    });

    it("should tell apart paths differing in the last segment", () => {
      expect(ResponsePath.root("a").child("b").equals(ResponsePath.root("a").child("c"))).toBe(false);
    });

    it("should not confuse a dotted segment with two segments", () => {
      const dotted = ResponsePath.root("a.b");
      const nested = ResponsePath.of("a", "b");

      expect(dotted.display()).toBe(nested.display());
      expect(dotted.equals(nested)).toBe(false);
    });
  });

  describe("stripPrefix", () => {
    it("should drop a matching leading segment", () => {
      const stripped = ResponsePath.of("address", "street").stripPrefix("address");
      expect(stripped?.segments).toEqual(["street"]);
    });

    it("should return undefined when the leading segment differs", () => {
      expect(ResponsePath.of("address", "street").stripPrefix("other")).toBeUndefined();
    });

    it("should not match a partial segment", () => {
      expect(ResponsePath.of("addresses", "street").stripPrefix("address")).toBeUndefined();
    });

    it("should give the empty path on an exact match", () => {
      expect(ResponsePath.root("name").stripPrefix("name")?.isEmpty()).toBe(true);
    });

    it("should test for a leading path", () => {
      const path = ResponsePath.of("server", "tls", "cert");
      expect(path.startsWith(ResponsePath.of("server", "tls"))).toBe(true);
      expect(path.startsWith(ResponsePath.of("server", "tl"))).toBe(false);
      expect(path.startsWith(ResponsePath.empty())).toBe(true);
    });

    it("should strip a multi-segment prefix", () => {
      const stripped = ResponsePath.of("a", "b", "c").stripPathPrefix(ResponsePath.of("a", "b"));
      expect(stripped?.segments).toEqual(["c"]);
      expect(ResponsePath.of("a", "b").stripPathPrefix(ResponsePath.of("a", "c"))).toBeUndefined();
    });
  });

  describe("navigation", () => {
    it("should expose first, last and parent", () => {
      const path = ResponsePath.of("address", "location", "city");

      expect(path.first()).toBe("address");
      expect(path.last()).toBe("city");
      expect(path.parent().display()).toBe("address.location");
      expect(ResponsePath.root("name").parent().isEmpty()).toBe(true);
    });

    it("should render a dot-joined display form", () => {
      expect(String(ResponsePath.of("address", "street"))).toBe("address.street");
    });
  });
});

describe("PathMap", () => {
  it("should key entries by segments, not identity", () => {
    const map = new PathMap<number>();
    map.set(ResponsePath.of("x", "y"), 1);

    expect(map.get(ResponsePath.of("x", "y"))).toBe(1);
    expect(map.has(ResponsePath.of("x"))).toBe(false);
  });

  it("should overwrite and keep insertion order", () => {
    const map = new PathMap<string>();
    map.set(ResponsePath.root("a"), "first");
    map.set(ResponsePath.root("b"), "second");
    map.set(ResponsePath.root("a"), "third");

    expect(map.size).toBe(2);
    expect(map.toRecord()).toEqual({ a: "third", b: "second" });
    expect([...map.keys()].map((k) => k.display())).toEqual(["a", "b"]);
  });

  it("should delete entries", () => {
    const map = PathMap.from<number>([[ResponsePath.root("a"), 1]]);
    expect(map.delete(ResponsePath.root("a"))).toBe(true);
    expect(map.size).toBe(0);
  });
});
