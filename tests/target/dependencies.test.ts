import { describe, it, expect } from "vitest";
import {
  resolveDependencies,
  inputsOf,
  dependenciesOf,
  type TargetLookup,
} from "../../src/target/dependencies.js";
import { hasName, hasAlternateNames } from "../../src/target/names.js";
import { mixedTarget, splitTarget } from "../helpers/fakes.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Lookup over a fixed table: name → canonical name. */
function tableLookup(table: Record<string, string>): TargetLookup {
  return (name) => {
    const canonical = table[name];
    if (canonical === undefined) return undefined;
    return canonical === name ? {} : { canonical };
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("resolveDependencies", () => {
  it("partitions a mixed list into inputs and dependencies, keeping order", () => {
    const lookup = tableLookup({ lib: "lib", gen: "gen" });
    const result = resolveDependencies(
      { kind: "mixed", names: ["main.c", "lib", "util.h", "gen"] },
      lookup,
      "app",
    );

    expect(result).toEqual({
      ok: true,
      value: { kind: "split", inputs: ["main.c", "util.h"], dependencies: ["lib", "gen"] },
    });
  });

  it("substitutes the canonical name when a name refers to a target by alias", () => {
    const lookup = tableLookup({ "lib.a": "lib" });
    const result = resolveDependencies({ kind: "mixed", names: ["lib.a"] }, lookup, "app");

    expect(result.ok && result.value.dependencies).toEqual(["lib"]);
  });

  it("passes inputs of a split list through and canonicalizes its dependencies", () => {
    const lookup = tableLookup({ "lib.a": "lib", gen: "gen" });
    const result = resolveDependencies(
      { kind: "split", inputs: ["lib.a", "x.c"], dependencies: ["lib.a", "gen"] },
      lookup,
      "app",
    );

    expect(result).toEqual({
      ok: true,
      value: { kind: "split", inputs: ["lib.a", "x.c"], dependencies: ["lib", "gen"] },
    });
  });

  it("fails on a split dependency that is not a known target", () => {
    const lookup = tableLookup({ gen: "gen" });
    const result = resolveDependencies(
      { kind: "split", inputs: [], dependencies: ["gen", "nope"] },
      lookup,
      "app",
    );

    expect(result).toEqual({
      ok: false,
      error: {
        type: "unresolved_dependency",
        message: 'Target "app" depends on unknown target "nope"',
        name: "nope",
        target: "app",
      },
    });
  });

  it("resolves an empty mixed list to empty halves", () => {
    const result = resolveDependencies({ kind: "mixed", names: [] }, () => undefined, "t");
    expect(result).toEqual({ ok: true, value: { kind: "split", inputs: [], dependencies: [] } });
  });
});

describe("inputsOf / dependenciesOf", () => {
  it("return the resolved halves of a split target", () => {
    const target = splitTarget("t", ["a.txt"], ["u"]);
    expect(inputsOf(target)).toEqual(["a.txt"]);
    expect(dependenciesOf(target)).toEqual(["u"]);
  });

  it("throw while dependencies are still mixed", () => {
    const target = mixedTarget("t", ["a.txt"]);
    expect(() => inputsOf(target)).toThrow('Input files of "t" are still mixed');
    expect(() => dependenciesOf(target)).toThrow('Dependencies of "t" are still mixed');
  });
});

describe("hasName", () => {
  it("matches the primary name of any target", () => {
    expect(hasName(mixedTarget("t", []), "t")).toBe(true);
    expect(hasName(mixedTarget("t", []), "u")).toBe(false);
  });

  it("matches every target word of a makefile rule", () => {
    const target = mixedTarget("a.o", [], {
      extra: { format: "makefile", names: ["a.o", "b.o"] },
    });
    expect(hasName(target, "b.o")).toBe(true);
    expect(hasName(target, "c.o")).toBe(false);
    expect(hasAlternateNames(target)).toBe(true);
  });

  it("matches declared aliases of a YAML target", () => {
    const target = splitTarget("docs", [], [], { extra: { format: "yaml", aliases: ["site"] } });
    expect(hasName(target, "site")).toBe(true);
    expect(hasAlternateNames(target)).toBe(true);
  });

  it("reports no alternate names for a single-word makefile rule", () => {
    const target = mixedTarget("all", [], {
      extra: { format: "makefile", names: ["all"] },
    });
    expect(hasAlternateNames(target)).toBe(false);
  });
});
