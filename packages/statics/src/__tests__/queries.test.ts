import { describe, expect, it } from "vitest";
import { StaticsInvariantError, repId } from "../ids.js";
import {
  expSelfType,
  expTypeAfterFix,
  lookupInfo,
  patSelfType,
  terms,
  unusedBindings,
} from "../queries.js";
import { computeInfoMap } from "../statics/compute.js";
import { createTermBuilder } from "../term/builder.js";
import { intTyp, unknownTyp } from "../types/typ.js";

describe("queries", () => {
  it("separates the self type from the fixed type", () => {
    const b = createTermBuilder();
    const hole = b.exp.hole();
    const map = computeInfoMap(b.exp.binOp("*", b.exp.int(2), hole));
    expect(expSelfType(map, repId(hole))).toEqual(unknownTyp());
    expect(expTypeAfterFix(map, repId(hole))).toEqual(intTyp);
  });

  it("answers undefined for ids of another sort", () => {
    const b = createTermBuilder();
    const x = b.pat.var("x");
    const map = computeInfoMap(b.exp.fun(x, b.exp.var("x")));
    expect(expTypeAfterFix(map, repId(x))).toBeUndefined();
    expect(patSelfType(map, repId(x))).toEqual(unknownTyp());
  });

  it("throws for an id it never saw", () => {
    const b = createTermBuilder();
    const map = computeInfoMap(b.exp.unit());
    expect(() => lookupInfo(map, "missing")).toThrow(StaticsInvariantError);
  });

  it("indexes terms by representative id", () => {
    const b = createTermBuilder();
    const one = b.exp.int(1);
    const exp = b.exp.tuple([one, b.exp.int(2)]);
    const index = terms(computeInfoMap(exp));
    expect(index.get(repId(one))).toBe(one);
    expect(index.get(repId(exp))).toBe(exp);
    expect(index.size).toBe(3);
  });

  it("finds bindings that are never used", () => {
    const b = createTermBuilder();
    const a = b.pat.var("a");
    const exp = b.exp.match(b.exp.tuple([b.exp.int(1), b.exp.int(2), b.exp.int(3)]), [
      b.rule(b.pat.tuple([a, b.pat.var("_skip"), b.pat.var("c")]), b.exp.var("c")),
    ]);
    expect(unusedBindings(computeInfoMap(exp))).toEqual([{ id: repId(a), name: "a" }]);
  });
});
