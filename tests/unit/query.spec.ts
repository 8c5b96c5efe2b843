import { describe, it, expect } from "vitest";
import {
  createQuery,
  formatQuery,
  parseQuery,
  queryDelete,
  queryEquals,
  querySet,
  sortedEntries,
} from "../../src/query";
import { InvalidEncodingError, InvalidQueryError } from "../../src/errors";

describe("parseQuery", () => {
  it("parses key/value pairs", () => {
    const query = parseQuery("a=123&b=xyz");
    expect(query.get("a")).toBe("123");
    expect(query.get("b")).toBe("xyz");
    expect(query.size).toBe(2);
  });

  it("treats empty text as the empty query", () => {
    expect(parseQuery("").size).toBe(0);
  });

  it("splits each pair on the first '='", () => {
    expect(parseQuery("a=b=c").get("a")).toBe("b=c");
    expect(parseQuery("a=").get("a")).toBe("");
    expect(parseQuery("=v").get("")).toBe("v");
  });

  it("lets the last occurrence of a key win", () => {
    const query = parseQuery("a=1&b=2&a=3");
    expect(query.get("a")).toBe("3");
    expect(query.size).toBe(2);
  });

  it("decodes keys and values without treating '+' as space", () => {
    const query = parseQuery("k%20x=v%2Bw+z");
    expect(query.get("k x")).toBe("v+w+z");
  });

  it("rejects a pair without '='", () => {
    try {
      parseQuery("a=1&flag");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidQueryError);
      if (error instanceof InvalidQueryError) {
        expect(error.pair).toBe("flag");
        expect(error.code).toBe("ERR_INVALID_QUERY");
      }
    }
  });

  it("rejects an empty pair", () => {
    expect(() => parseQuery("a=1&&b=2")).toThrow(InvalidQueryError);
  });

  it("propagates malformed escapes", () => {
    expect(() => parseQuery("a%2=1")).toThrow(InvalidEncodingError);
    expect(() => parseQuery("a=1%")).toThrow(InvalidEncodingError);
  });
});

describe("formatQuery", () => {
  it("is empty for the empty query", () => {
    expect(formatQuery(createQuery())).toBe("");
  });

  it("encodes delimiters in keys and values", () => {
    const query = createQuery({
      "key with spaces": "val&with&ampersands",
      "key=with=equals": "val#with#hashtag",
    });
    expect(formatQuery(query)).toBe(
      "key%20with%20spaces=val%26with%26ampersands&key%3Dwith%3Dequals=val%23with%23hashtag",
    );
  });

  it("sorts by key regardless of insertion order", () => {
    const forward = new Map([
      ["b", "2"],
      ["a", "1"],
      ["c", "3"],
    ]);
    const backward = new Map([
      ["c", "3"],
      ["a", "1"],
      ["b", "2"],
    ]);
    expect(formatQuery(forward)).toBe("a=1&b=2&c=3");
    expect(formatQuery(backward)).toBe("a=1&b=2&c=3");
  });

  it("inverts parseQuery for canonical text", () => {
    const raw = "a=1&b=x%20y&c=%C3%A9";
    expect(formatQuery(parseQuery(raw))).toBe(raw);
  });
});

describe("query helpers", () => {
  it("createQuery stores entries in key order", () => {
    const query = createQuery([
      ["b", "2"],
      ["a", "1"],
    ]);
    expect([...query.keys()]).toEqual(["a", "b"]);
  });

  it("sortedEntries orders any map", () => {
    const map = new Map([
      ["z", "1"],
      ["A", "2"],
      ["a", "3"],
    ]);
    expect(sortedEntries(map)).toEqual([
      ["A", "2"],
      ["a", "3"],
      ["z", "1"],
    ]);
  });

  it("querySet and queryDelete return new queries", () => {
    const base = createQuery({ a: "1" });
    const added = querySet(base, "b", "2");
    const replaced = querySet(added, "a", "9");
    const removed = queryDelete(replaced, "b");
    expect(base.size).toBe(1);
    expect(added.get("b")).toBe("2");
    expect(replaced.get("a")).toBe("9");
    expect(removed.has("b")).toBe(false);
    expect(removed.get("a")).toBe("9");
  });

  it("queryEquals ignores order", () => {
    const a = new Map([
      ["x", "1"],
      ["y", "2"],
    ]);
    const b = new Map([
      ["y", "2"],
      ["x", "1"],
    ]);
    expect(queryEquals(a, b)).toBe(true);
    expect(queryEquals(a, new Map([["x", "1"]]))).toBe(false);
    expect(queryEquals(a, new Map([["x", "1"], ["y", "3"]]))).toBe(false);
  });
});
