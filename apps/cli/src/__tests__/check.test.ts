import { StaticsCache, createTermBuilder } from "@gradus/statics";
import { describe, expect, it } from "vitest";
import { checkSource } from "../check.js";

describe("checkSource", () => {
  it("checks a term read from JSON", () => {
    const b = createTermBuilder();
    const source = JSON.stringify(b.exp.binOp("+", b.exp.var("y"), b.exp.int(1)));
    const result = checkSource(source, { cache: new StaticsCache(), warnings: true });
    expect(result.hasErrors).toBe(true);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["ST0002"]);
  });

  it("passes warnings through without failing", () => {
    const b = createTermBuilder();
    const source = JSON.stringify(b.exp.let(b.pat.var("x"), b.exp.int(1), b.exp.unit()));
    const result = checkSource(source, { cache: new StaticsCache(), warnings: true });
    expect(result.hasErrors).toBe(false);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["ST1001"]);
  });

  it("reuses cached results for the same source", () => {
    const b = createTermBuilder();
    const source = JSON.stringify(b.exp.int(1));
    const cache = new StaticsCache();
    const first = checkSource(source, { cache, warnings: false });
    expect(checkSource(source, { cache, warnings: false }).map).toBe(first.map);
  });

  it("throws on malformed terms", () => {
    expect(() =>
      checkSource('{"kind":"int"}', { cache: new StaticsCache(), warnings: true })
    ).toThrow("$.ids: expected a non-empty array");
  });
});
