import { afterEach, describe, expect, it, vi } from "vitest";
import { mergeNamespaces, parseNamespaceConfig, parseNamespaceConfigOrThrow } from "./index.ts";

describe("parseNamespaceConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should parse YAML prefix table", () => {
    const result = parseNamespaceConfig(
      ["prefixes:", "  wiki: http://en.wikipedia.org/wiki/", "  schema: https://schema.org/"].join(
        "\n"
      )
    );
    expect(result).toEqual({
      ok: true,
      value: {
        wiki: "http://en.wikipedia.org/wiki/",
        schema: "https://schema.org/",
      },
    });
  });

  it("should parse JSON prefix table", () => {
    const result = parseNamespaceConfig(`{"prefixes":{"a":"https://example.com/"}}`);
    expect(result).toEqual({ ok: true, value: { a: "https://example.com/" } });
  });

  it("should reject malformed YAML", () => {
    const result = parseNamespaceConfig("prefixes: [unclosed");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("invalid_yaml");
    }
  });

  it("should reject missing prefixes", () => {
    const result = parseNamespaceConfig("{}");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("invalid_config");
    }
  });

  it("should reject scheme with a colon", () => {
    const result = parseNamespaceConfig(`prefixes:\n  "a:b": https://example.com/\n`);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("invalid_config");
      expect(result.error.message).toContain("Scheme must not contain");
    }
  });

  it("should reject empty stem", () => {
    const result = parseNamespaceConfig(`prefixes:\n  a: ""\n`);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain("Namespace stem must not be empty");
    }
  });

  it("should warn about schemes sharing a stem", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = parseNamespaceConfig(
      `prefixes:\n  b: https://x.org/\n  a: https://x.org/\n  c: https://y.org/\n`
    );

    expect(result.ok).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[NamespaceConfig] Schemes a, b share stem https://x.org/; compacting uses "a"'
    );
  });

  it("should list shared-stem schemes in code point order", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    parseNamespaceConfig(`{"prefixes":{"\u{1F600}":"https://x.org/","\uFF21":"https://x.org/"}}`);

    expect(warn).toHaveBeenCalledWith(
      '[NamespaceConfig] Schemes \uFF21, \u{1F600} share stem https://x.org/; compacting uses "\uFF21"'
    );
  });

  it("should throw with parseNamespaceConfigOrThrow", () => {
    expect(() => parseNamespaceConfigOrThrow("{}")).toThrow("Failed to parse namespace config");
  });
});

describe("mergeNamespaces", () => {
  it("should let later tables win", () => {
    expect(mergeNamespaces({ a: "https://1/" }, { a: "https://2/", b: "https://3/" })).toEqual({
      a: "https://2/",
      b: "https://3/",
    });
  });

  it("should return empty table for no input", () => {
    expect(mergeNamespaces()).toEqual({});
  });
});
