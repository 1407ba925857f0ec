import { describe, expect, it } from "vitest";
import { ConfigValue, cloneConfig, isAbsentConfigValue, isConfigMapping } from "../src/config/config-value.js";
import { deepMerge } from "../src/config/deep-merge.js";
import { ConfigDefinitionError } from "../src/core/errors.js";

describe("ConfigValue", () => {
  it("wraps every leaf with source and key path", () => {
    const tree = ConfigValue.convertLeavesToConfigValues(
      { url: "https://registry.test", tls: { verify: false } },
      "pipeline.yml",
      ["tssc-config", "global-defaults"],
    );

    const url = tree.url;
    expect(url).toBeInstanceOf(ConfigValue);
    if (!(url instanceof ConfigValue)) return;
    expect(url.value).toBe("https://registry.test");
    expect(url.source).toBe("pipeline.yml");
    expect(url.path).toBe("tssc-config.global-defaults.url");

    const tls = tree.tls;
    expect(isConfigMapping(tls)).toBe(true);
    if (!isConfigMapping(tls)) return;
    const verify = tls.verify;
    expect(verify).toBeInstanceOf(ConfigValue);
    if (!(verify instanceof ConfigValue)) return;
    expect(verify.value).toBe(false);
    expect(verify.path).toBe("tssc-config.global-defaults.tls.verify");
  });

  it("keeps the provenance of leaves that are already wrapped", () => {
    const original = new ConfigValue("a", "first.yml", ["x"]);
    const tree = ConfigValue.convertLeavesToConfigValues({ x: original }, "second.yml");

    const x = tree.x;
    expect(x).toBeInstanceOf(ConfigValue);
    if (!(x instanceof ConfigValue)) return;
    expect(x.source).toBe("first.yml");
    expect(x).not.toBe(original);
  });

  it("treats arrays as leaves", () => {
    const tree = ConfigValue.convertLeavesToConfigValues({ tags: ["a", "b"] }, "dict");
    const tags = tree.tags;
    expect(tags).toBeInstanceOf(ConfigValue);
    if (!(tags instanceof ConfigValue)) return;
    expect(tags.value).toEqual(["a", "b"]);
  });

  it("strips provenance at any depth", () => {
    const tree = {
      a: new ConfigValue(1, "dict"),
      b: { c: new ConfigValue({ d: new ConfigValue("deep", "dict") }, "dict") },
      e: [new ConfigValue("x", "dict"), "y"],
      f: "plain",
    };
    expect(ConfigValue.convertLeavesToValues(tree)).toEqual({
      a: 1,
      b: { c: { d: "deep" } },
      e: ["x", "y"],
      f: "plain",
    });
  });

  it("leaves plain data unchanged when stripping", () => {
    const plain = { a: { b: [1, 2] }, c: null };
    const stripped = ConfigValue.convertLeavesToValues(plain);
    expect(stripped).toEqual(plain);
    expect(ConfigValue.convertLeavesToValues(stripped)).toEqual(plain);
    expect(ConfigValue.convertLeavesToValues("text")).toBe("text");
  });

  it("unwraps a single value or returns the argument", () => {
    expect(ConfigValue.unwrapForValue(new ConfigValue(0, "dict"))).toBe(0);
    expect(ConfigValue.unwrapForValue("bare")).toBe("bare");
    expect(ConfigValue.unwrapForValue(null)).toBeNull();
  });

  it("renders path, value and source", () => {
    expect(String(new ConfigValue("v", "a.yml", ["k", "j"]))).toBe('k.j="v" (from a.yml)');
    expect(String(new ConfigValue(1))).toBe("<root>=1 (from unknown)");
  });

  it("treats null and undefined as absent, bare or wrapped", () => {
    expect(isAbsentConfigValue(null)).toBe(true);
    expect(isAbsentConfigValue(undefined)).toBe(true);
    expect(isAbsentConfigValue(new ConfigValue(null, "dict"))).toBe(true);
    expect(isAbsentConfigValue(false)).toBe(false);
    expect(isAbsentConfigValue(new ConfigValue("", "dict"))).toBe(false);
  });

  it("clones deeply", () => {
    const original = { a: { b: [1, { c: 2 }] } };
    const copy = cloneConfig(original);
    expect(copy).toEqual(original);
    copy.a.b.push(3);
    expect(original.a.b).toHaveLength(2);
  });
});

describe("deepMerge", () => {
  it("unions keys and lets the override win on scalars", () => {
    expect(deepMerge({ a: 1, b: { x: 1, y: 2 } }, { b: { y: 3, z: 4 }, c: 5 })).toEqual({
      a: 1,
      b: { x: 1, y: 3, z: 4 },
      c: 5,
    });
  });

  it("replaces arrays wholesale", () => {
    expect(deepMerge({ tags: ["a", "b"] }, { tags: ["c"] })).toEqual({ tags: ["c"] });
  });

  it("replaces a mapping with a scalar and a scalar with a mapping", () => {
    expect(deepMerge({ a: { x: 1 } }, { a: "flat" })).toEqual({ a: "flat" });
    expect(deepMerge({ a: "flat" }, { a: { x: 1 } })).toEqual({ a: { x: 1 } });
  });

  it("does not mutate either input", () => {
    const base = { a: { x: 1 } };
    const override = { a: { y: 2 } };
    const merged = deepMerge(base, override);
    expect(base).toEqual({ a: { x: 1 } });
    expect(override).toEqual({ a: { y: 2 } });
    expect(merged.a).not.toBe(base.a);
  });

  it("skips null overrides only when asked to", () => {
    expect(deepMerge({ a: 1 }, { a: null })).toEqual({ a: null });
    expect(deepMerge({ a: 1 }, { a: null }, { nullIsAbsent: true })).toEqual({ a: 1 });
  });

  it("throws on a conflicting key in error mode, naming the key path", () => {
    expect(() =>
      deepMerge({ a: { b: 1 } }, { a: { b: 2 } }, { onConflict: "error", pathParts: ["tssc-config", "global-defaults"] }),
    ).toThrow(new ConfigDefinitionError("Conflicting configuration value for key: tssc-config.global-defaults.a.b"));
  });

  it("merges disjoint keys in error mode", () => {
    expect(deepMerge({ a: { b: 1 } }, { a: { c: 2 } }, { onConflict: "error" })).toEqual({ a: { b: 1, c: 2 } });
  });
});
