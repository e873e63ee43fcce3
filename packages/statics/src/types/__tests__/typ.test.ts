import { describe, expect, it } from "vitest";
import { formatTyp } from "../format.js";
import {
  arrowTyp,
  boolTyp,
  containsSynSwitch,
  eraseSynSwitch,
  floatTyp,
  freeTypeVars,
  intTyp,
  listTyp,
  prodTyp,
  recTyp,
  subst,
  sumTyp,
  typEq,
  unitTyp,
  unknownTyp,
  varTyp,
} from "../typ.js";

describe("subst", () => {
  it("renames a binder that would capture the replacement", () => {
    const ty = recTyp("T", arrowTyp(varTyp("X"), varTyp("T")));
    expect(subst(varTyp("T"), "X", ty)).toEqual(
      recTyp("T'", arrowTyp(varTyp("T"), varTyp("T'")))
    );
  });

  it("leaves a shadowed name alone", () => {
    const ty = recTyp("X", listTyp(varTyp("X")));
    expect(subst(intTyp, "X", ty)).toBe(ty);
  });
});

describe("typEq", () => {
  it("compares recursive types up to renaming", () => {
    expect(typEq(recTyp("A", listTyp(varTyp("A"))), recTyp("B", listTyp(varTyp("B"))))).toBe(
      true
    );
    expect(typEq(recTyp("A", listTyp(varTyp("A"))), recTyp("B", listTyp(varTyp("A"))))).toBe(
      false
    );
  });

  it("ignores the order of sum variants", () => {
    const left = sumTyp([{ tag: "A" }, { tag: "B", arg: intTyp }]);
    const right = sumTyp([{ tag: "B", arg: intTyp }, { tag: "A" }]);
    expect(typEq(left, right)).toBe(true);
    expect(typEq(left, sumTyp([{ tag: "A" }, { tag: "B" }]))).toBe(false);
  });
});

describe("syn-switch erasure", () => {
  it("replaces nested syn-switch unknowns", () => {
    const ty = arrowTyp(unknownTyp("syn-switch"), listTyp(unknownTyp("syn-switch")));
    expect(containsSynSwitch(ty)).toBe(true);
    expect(eraseSynSwitch(ty)).toEqual(arrowTyp(unknownTyp(), listTyp(unknownTyp())));
    expect(containsSynSwitch(eraseSynSwitch(ty))).toBe(false);
  });
});

describe("freeTypeVars", () => {
  it("skips names bound by rec", () => {
    expect(freeTypeVars(recTyp("T", prodTyp([varTyp("T"), varTyp("U")])))).toEqual(["U"]);
  });
});

describe("formatTyp", () => {
  it("parenthesizes arrows on the left only", () => {
    expect(formatTyp(arrowTyp(arrowTyp(intTyp, boolTyp), intTyp))).toBe(
      "(Int -> Bool) -> Int"
    );
    expect(formatTyp(arrowTyp(intTyp, arrowTyp(boolTyp, intTyp)))).toBe(
      "Int -> Bool -> Int"
    );
  });

  it("prints compound types", () => {
    expect(formatTyp(unitTyp)).toBe("Unit");
    expect(formatTyp(prodTyp([intTyp, listTyp(floatTyp)]))).toBe("(Int, [Float])");
    expect(formatTyp(unknownTyp("syn-switch"))).toBe("?");
  });

  it("prints sums and recursive types", () => {
    const sum = sumTyp([{ tag: "A" }, { tag: "B", arg: intTyp }]);
    expect(formatTyp(sum)).toBe("A + B(Int)");
    expect(formatTyp(arrowTyp(sum, intTyp))).toBe("(A + B(Int)) -> Int");
    expect(
      formatTyp(
        recTyp(
          "T",
          sumTyp([{ tag: "Nil" }, { tag: "Cons", arg: prodTyp([intTyp, varTyp("T")]) }])
        )
      )
    ).toBe("rec T. Nil + Cons((Int, T))");
  });
});
