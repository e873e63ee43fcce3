import { describe, expect, it } from "vitest";
import { repId } from "../../ids.js";
import { lookupInfo, patCtx, patMode, patTypeAfterFix } from "../../queries.js";
import { createTermBuilder } from "../../term/builder.js";
import { boolTyp, intTyp, listTyp, unknownTyp } from "../../types/typ.js";
import { computeInfoMap } from "../compute.js";

describe("patterns", () => {
  it("binds the head and tail of a cons", () => {
    const b = createTermBuilder();
    const head = b.pat.var("h");
    const tail = b.pat.var("t");
    const exp = b.exp.match(b.exp.list([b.exp.int(1)]), [
      b.rule(b.pat.cons(head, tail), b.exp.tuple([b.exp.var("h"), b.exp.var("t")])),
    ]);
    const map = computeInfoMap(exp);
    expect(patTypeAfterFix(map, repId(head))).toEqual(intTyp);
    expect(patTypeAfterFix(map, repId(tail))).toEqual(listTyp(intTyp));
    expect(patCtx(map, repId(tail))?.lookupVar("h")?.ty).toEqual(intTyp);
  });

  it("takes a wildcard at the expected type", () => {
    const b = createTermBuilder();
    const wild = b.pat.wild();
    const map = computeInfoMap(b.exp.fun(b.pat.ann(wild, b.typ.bool()), b.exp.unit()));
    expect(patMode(map, repId(wild))).toEqual({ kind: "ana", ty: boolTyp });
    expect(patTypeAfterFix(map, repId(wild))).toEqual(boolTyp);
  });

  it("synthesizes unknown for an unannotated variable", () => {
    const b = createTermBuilder();
    const x = b.pat.var("x");
    const map = computeInfoMap(b.exp.fun(x, b.exp.var("x")));
    expect(patTypeAfterFix(map, repId(x))).toEqual(unknownTyp());
  });

  it("checks constructor applications against the scrutinee sum", () => {
    const b = createTermBuilder();
    const n = b.pat.var("n");
    const exp = b.exp.typeAlias(
      b.tpat.var("Opt"),
      b.typ.sum([b.variant("None"), b.variant("Some", b.typ.int())]),
      b.exp.match(b.exp.ap(b.exp.ctr("Some"), b.exp.int(1)), [
        b.rule(b.pat.ap(b.pat.ctr("Some"), n), b.exp.var("n")),
        b.rule(b.pat.ctr("None"), b.exp.int(0)),
      ])
    );
    const map = computeInfoMap(exp);
    expect(patTypeAfterFix(map, repId(n))).toEqual(intTyp);
  });

  it("reports a nullary constructor applied to an argument", () => {
    const b = createTermBuilder();
    const none = b.pat.ctr("None");
    const exp = b.exp.typeAlias(
      b.tpat.var("Opt"),
      b.typ.sum([b.variant("None"), b.variant("Some", b.typ.int())]),
      b.exp.fun(b.pat.ap(none, b.pat.wild()), b.exp.unit())
    );
    const info = lookupInfo(computeInfoMap(exp), repId(none));
    expect(info.kind === "pat" && info.status.kind).toBe("in-hole");
  });
});
