import { describe, expect, it } from "vitest";
import {
  compactUri,
  createCurie,
  curieFromUri,
  curieToUri,
  curieToUrl,
  EMPTY_CURIE,
  lookupNamespace,
  type Namespaces,
  parseCurieOrThrow,
} from "./index.ts";

const WIKI: Namespaces = { wiki: "http://en.wikipedia.org/wiki/" };

describe("lookupNamespace", () => {
  it("should find registered stem", () => {
    expect(lookupNamespace(WIKI, "wiki")).toBe("http://en.wikipedia.org/wiki/");
  });

  it("should miss unknown and inherited keys", () => {
    expect(lookupNamespace(WIKI, "x")).toBeUndefined();
    expect(lookupNamespace(WIKI, "toString")).toBeUndefined();
  });
});

describe("curieToUri", () => {
  it("should expand registered scheme", () => {
    expect(curieToUri(WIKI, createCurie("wiki", "CURIE"))).toBe(
      "http://en.wikipedia.org/wiki/CURIE"
    );
  });

  it("should return empty for empty CURIE", () => {
    expect(curieToUri(WIKI, EMPTY_CURIE)).toBe("");
  });

  it("should pass unknown schemes through", () => {
    expect(curieToUri(WIKI, createCurie("x", "y"))).toBe("x:y");
    expect(curieToUri(WIKI, parseCurieOrThrow("https://example.com/a"))).toBe(
      "https://example.com/a"
    );
  });

  const ns: Namespaces = { a: "https://example.com/" };
  const cases: [string, string][] = [
    ["a:", "https://example.com/"],
    ["a:b", "https://example.com/b"],
    ["a:b/c/d/e", "https://example.com/b/c/d/e"],
    ["b", "b"],
    ["b/c/d/e", "b/c/d/e"],
  ];

  for (const [text, uri] of cases) {
    it(`should expand "${text}"`, () => {
      expect(curieToUri(ns, parseCurieOrThrow(text))).toBe(uri);
    });
  }

  it("should append the reference to fragment stems", () => {
    expect(curieToUri({ a: "https://example.com#" }, createCurie("a", "b/c/d/e"))).toBe(
      "https://example.com#b/c/d/e"
    );
  });
});

describe("compactUri", () => {
  it("should compact matching URI", () => {
    expect(compactUri(WIKI, "http://en.wikipedia.org/wiki/CURIE")).toBe("wiki:CURIE");
    expect(curieFromUri(WIKI, "http://en.wikipedia.org/wiki/CURIE")).toBe(
      createCurie("wiki", "CURIE")
    );
  });

  it("should compact the stem itself to namespace-only CURIE", () => {
    expect(compactUri(WIKI, "http://en.wikipedia.org/wiki/")).toBe("wiki:");
  });

  it("should decode the reference", () => {
    expect(compactUri(WIKI, "http://en.wikipedia.org/wiki/%CE%B1")).toBe("wiki:α");
    expect(compactUri(WIKI, "http://en.wikipedia.org/wiki/a%2Fb")).toBe("wiki:a%2Fb");
  });

  it("should return unmatched URI unchanged", () => {
    expect(compactUri(WIKI, "https://example.com/a%CE%B1")).toBe("https://example.com/a%CE%B1");
  });

  it("should prefer the longest stem", () => {
    const ns: Namespaces = {
      ex: "https://example.com/",
      exa: "https://example.com/a/",
    };
    expect(compactUri(ns, "https://example.com/a/b")).toBe("exa:b");
    expect(compactUri(ns, "https://example.com/b")).toBe("ex:b");
  });

  it("should break ties by scheme name", () => {
    const ns: Namespaces = { b: "https://x.org/", a: "https://x.org/" };
    expect(compactUri(ns, "https://x.org/y")).toBe("a:y");
  });

  it("should break ties by code point", () => {
    const ns: Namespaces = { "\u{1F600}": "https://x.org/", "\uFF21": "https://x.org/" };
    expect(compactUri(ns, "https://x.org/y")).toBe("\uFF21:y");
  });

  it("should ignore empty stems", () => {
    expect(compactUri({ any: "" }, "foo")).toBe("foo");
  });

  it("should round-trip through curieToUri", () => {
    const curie = createCurie("wiki", "CURIE/x");
    expect(compactUri(WIKI, curieToUri(WIKI, curie))).toBe(curie);
  });
});

describe("curieToUrl", () => {
  it("should parse expanded URL", () => {
    const result = curieToUrl(WIKI, createCurie("wiki", "CURIE"));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.href).toBe("http://en.wikipedia.org/wiki/CURIE");
    }
  });

  it("should parse CURIE holding an absolute URI", () => {
    const uri = "https://example.com/a/b/c?de=fg&foo=bar";
    const curie = parseCurieOrThrow(uri);
    const result = curieToUrl({}, curie);

    expect(curie).toBe(uri);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.href).toBe(uri);
      expect(result.value.searchParams.get("foo")).toBe("bar");
    }
  });

  it("should propagate parser error for relative result", () => {
    const result = curieToUrl(WIKI, createCurie("", "b/c"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("invalid_url");
      expect(result.error.cause).toBeInstanceOf(TypeError);
    }
  });
});
