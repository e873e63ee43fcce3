import { describe, expect, it } from "vitest";
import { createTermBuilder } from "../builder.js";
import { TermDecodeError, decodeAny, decodeExp } from "../decode.js";
import { termKey } from "../key.js";
import { termIds } from "../walk.js";

describe("createTermBuilder", () => {
  it("gives multi-token forms one id per token", () => {
    const b = createTermBuilder({ prefix: "e" });
    const exp = b.exp.let(b.pat.var("x"), b.exp.int(1), b.exp.var("x"));
    expect(exp.ids).toEqual(["e4", "e5", "e6"]);
    expect(termIds(exp)).toEqual(["e4", "e5", "e6", "e1", "e2", "e3"]);
  });

  it("gives tuples one id per separator", () => {
    const b = createTermBuilder();
    const exp = b.exp.tuple([b.exp.int(1), b.exp.int(2), b.exp.int(3)]);
    expect(exp.ids).toEqual(["4", "5"]);
  });
});

describe("decodeExp", () => {
  it("reads nested terms", () => {
    const exp = decodeExp({
      kind: "bin-op",
      ids: ["1"],
      op: "+",
      left: { kind: "int", ids: ["2"], value: 1 },
      right: { kind: "var", ids: ["3"], name: "x" },
    });
    expect(exp).toEqual({
      kind: "bin-op",
      ids: ["1"],
      op: "+",
      left: { kind: "int", ids: ["2"], value: 1 },
      right: { kind: "var", ids: ["3"], name: "x" },
    });
  });

  it("reports the path of a malformed field", () => {
    expect(() => decodeExp({ kind: "int", ids: ["1"], value: "1" })).toThrow(
      "$.value: expected a number"
    );
    expect(() => decodeExp({ kind: "int", ids: [], value: 1 })).toThrow(
      "$.ids: expected a non-empty array"
    );
  });

  it("rejects unknown kinds and operators", () => {
    expect(() =>
      decodeExp({ kind: "parens", ids: ["1"], body: { kind: "oops", ids: ["2"] } })
    ).toThrow('$.body.kind: unknown expression kind "oops"');
    expect(() =>
      decodeExp({
        kind: "bin-op",
        ids: ["1"],
        op: "%",
        left: { kind: "int", ids: ["2"], value: 1 },
        right: { kind: "int", ids: ["3"], value: 2 },
      })
    ).toThrow(TermDecodeError);
  });

  it("reads round trips of builder output", () => {
    const b = createTermBuilder();
    const exp = b.exp.match(b.exp.var("xs"), [
      b.rule(b.pat.cons(b.pat.var("h"), b.pat.wild()), b.exp.var("h")),
      b.rule(b.pat.list([]), b.exp.int(0)),
    ]);
    expect(decodeExp(JSON.parse(JSON.stringify(exp)))).toEqual(exp);
  });
});

describe("decodeAny", () => {
  it("reads multi-hole pieces of every sort", () => {
    const piece = decodeAny({ sort: "token", ids: ["7"], text: "%%" });
    expect(piece).toEqual({ sort: "token", ids: ["7"], text: "%%" });
  });
});

describe("termKey", () => {
  it("ignores property order", () => {
    expect(termKey({ kind: "int", ids: ["1"], value: 1 })).toBe(
      termKey(decodeExp({ value: 1, ids: ["1"], kind: "int" }))
    );
  });

  it("distinguishes ids", () => {
    expect(termKey({ kind: "int", ids: ["1"], value: 1 })).not.toBe(
      termKey({ kind: "int", ids: ["2"], value: 1 })
    );
  });
});
