import { describe, expect, it } from "vitest";
import { synMode } from "../../statics/mode.js";
import { arrowTyp, boolTyp, intTyp, varTyp } from "../../types/typ.js";
import { singletonCoCtx, unionCoCtx, usesOf, withoutBindings } from "../co-ctx.js";
import { Ctx } from "../ctx.js";

describe("Ctx", () => {
  it("returns the innermost binding of a name", () => {
    const ctx = Ctx.empty.extendVar("x", "1", intTyp).extendVar("x", "2", boolTyp);
    expect(ctx.lookupVar("x")).toEqual({ kind: "var", name: "x", id: "2", ty: boolTyp });
    expect(ctx.size).toBe(2);
  });

  it("keeps the parent context unchanged", () => {
    const base = Ctx.empty.extendVar("x", "1", intTyp);
    base.extendVar("y", "2", boolTyp);
    expect(base.lookupVar("y")).toBeUndefined();
  });

  it("binds sum variants as constructors into the sum", () => {
    const ctx = Ctx.empty.addTags(varTyp("Opt"), "5", [{ tag: "None" }, { tag: "Some", arg: intTyp }]);
    expect(ctx.lookupTag("Some")?.ty).toEqual(arrowTyp(intTyp, varTyp("Opt")));
    expect(ctx.lookupTag("None")?.ty).toEqual(varTyp("Opt"));
  });

  it("resolves aliases but not abstract type variables", () => {
    const ctx = Ctx.empty.extendAbstract("T", "1").extendAlias("N", "2", intTyp);
    expect(ctx.lookupAlias("N")).toEqual(intTyp);
    expect(ctx.lookupAlias("T")).toBeUndefined();
    expect(ctx.lookupTVar("T")?.tvarKind).toEqual({ kind: "abstract" });
  });

  it("lists entries added on top of a base, innermost first", () => {
    const base = Ctx.empty.extendVar("a", "1", intTyp);
    const next = base.extendVar("b", "2", intTyp).extendAbstract("T", "3");
    expect(next.addedSince(base).map((entry) => entry.id)).toEqual(["3", "2"]);
  });

  it("builds from outermost to innermost", () => {
    const ctx = Ctx.of([
      { kind: "var", name: "a", id: "1", ty: intTyp },
      { kind: "var", name: "b", id: "2", ty: intTyp },
    ]);
    expect(ctx.entries().map((entry) => entry.id)).toEqual(["2", "1"]);
  });
});

describe("co-contexts", () => {
  it("merges uses by name", () => {
    const merged = unionCoCtx([
      singletonCoCtx("x", "1", synMode),
      singletonCoCtx("y", "2", synMode),
      singletonCoCtx("x", "3", synMode),
    ]);
    expect(usesOf(merged, "x").map((use) => use.id)).toEqual(["1", "3"]);
    expect(usesOf(merged, "z")).toEqual([]);
  });

  it("drops uses of variables bound in between", () => {
    const before = Ctx.empty;
    const after = before.extendVar("x", "9", intTyp);
    const coCtx = unionCoCtx([
      singletonCoCtx("x", "1", synMode),
      singletonCoCtx("y", "2", synMode),
    ]);
    expect(Array.from(withoutBindings(before, after, coCtx).keys())).toEqual(["y"]);
  });
});
