import { describe, expect, it } from "vitest";
import { Ctx } from "../../ctx/ctx.js";
import {
  consistent,
  join,
  joinAll,
  matchedArrow,
  matchedProd,
  weakHeadNormalize,
} from "../join.js";
import {
  arrowTyp,
  boolTyp,
  floatTyp,
  intTyp,
  listTyp,
  prodTyp,
  recTyp,
  stringTyp,
  sumTyp,
  unknownTyp,
  varTyp,
} from "../typ.js";

const ctx = Ctx.empty;

describe("join", () => {
  it("treats unknown as a wildcard on either side", () => {
    expect(join(ctx, intTyp, unknownTyp())).toEqual(intTyp);
    expect(join(ctx, unknownTyp(), boolTyp)).toEqual(boolTyp);
  });

  it("absorbs an internal unknown before a syn-switch one", () => {
    expect(join(ctx, unknownTyp("syn-switch"), unknownTyp())).toEqual(
      unknownTyp("syn-switch")
    );
  });

  it("rejects distinct base types", () => {
    expect(join(ctx, intTyp, boolTyp)).toBeUndefined();
    expect(join(ctx, listTyp(intTyp), listTyp(floatTyp))).toBeUndefined();
  });

  it("refines arrows componentwise", () => {
    expect(
      join(ctx, arrowTyp(unknownTyp(), intTyp), arrowTyp(boolTyp, unknownTyp()))
    ).toEqual(arrowTyp(boolTyp, intTyp));
  });

  it("requires products of the same length", () => {
    expect(join(ctx, prodTyp([intTyp]), prodTyp([intTyp, intTyp]))).toBeUndefined();
    expect(join(ctx, prodTyp([intTyp, unknownTyp()]), prodTyp([unknownTyp(), stringTyp]))).toEqual(
      prodTyp([intTyp, stringTyp])
    );
  });

  it("keeps the alias name when the join does not refine it", () => {
    const aliased = ctx.extendAlias("N", "t1", intTyp);
    expect(join(aliased, varTyp("N"), intTyp)).toEqual(varTyp("N"));
    expect(join(aliased, varTyp("N"), boolTyp)).toBeUndefined();
  });

  it("stops unfolding an alias it is already unfolding", () => {
    const cyclic = ctx.extendAlias("A", "t1", varTyp("B")).extendAlias("B", "t2", varTyp("A"));
    expect(join(cyclic, varTyp("A"), intTyp)).toBeUndefined();
    expect(join(cyclic, varTyp("A"), varTyp("B"))).toBeUndefined();
  });

  it("rejects distinct unbound type variables", () => {
    expect(join(ctx, varTyp("A"), varTyp("B"))).toBeUndefined();
    expect(join(ctx, varTyp("A"), varTyp("A"))).toEqual(varTyp("A"));
  });

  it("unrolls a recursive type against its unfolding", () => {
    const list = recTyp(
      "L",
      sumTyp([{ tag: "Nil" }, { tag: "Cons", arg: prodTyp([intTyp, varTyp("L")]) }])
    );
    const partial = sumTyp([{ tag: "Nil" }, { tag: "Cons", arg: unknownTyp() }]);
    expect(consistent(ctx, list, partial)).toBe(true);
    expect(consistent(ctx, list, sumTyp([{ tag: "Nil" }]))).toBe(false);
  });
});

describe("joinAll", () => {
  it("has no join for an empty sequence", () => {
    expect(joinAll(ctx, [])).toBeUndefined();
  });

  it("folds left to right", () => {
    expect(joinAll(ctx, [intTyp, unknownTyp(), intTyp])).toEqual(intTyp);
    expect(joinAll(ctx, [intTyp, unknownTyp(), stringTyp])).toBeUndefined();
  });
});

describe("matched types", () => {
  it("keeps the syn-switch flavor of an unknown", () => {
    expect(matchedArrow(ctx, unknownTyp("syn-switch"))).toEqual([
      unknownTyp("syn-switch"),
      unknownTyp("syn-switch"),
    ]);
  });

  it("yields internal unknowns for a mismatched shape", () => {
    expect(matchedArrow(ctx, intTyp)).toEqual([unknownTyp(), unknownTyp()]);
    expect(matchedProd(ctx, 2, prodTyp([intTyp]))).toEqual([unknownTyp(), unknownTyp()]);
  });

  it("looks through aliases", () => {
    const aliased = ctx.extendAlias("F", "t1", arrowTyp(intTyp, boolTyp));
    expect(matchedArrow(aliased, varTyp("F"))).toEqual([intTyp, boolTyp]);
  });
});

describe("weakHeadNormalize", () => {
  it("follows alias chains", () => {
    const aliased = ctx.extendAlias("B", "t1", intTyp).extendAlias("A", "t2", varTyp("B"));
    expect(weakHeadNormalize(aliased, varTyp("A"))).toEqual(intTyp);
  });

  it("stops on a self-referential alias", () => {
    const looping = ctx.extendAlias("A", "t1", varTyp("A"));
    expect(weakHeadNormalize(looping, varTyp("A"))).toEqual(varTyp("A"));
  });
});
