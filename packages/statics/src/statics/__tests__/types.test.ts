import { describe, expect, it } from "vitest";
import { repId } from "../../ids.js";
import { expTypeAfterFix, lookupInfo } from "../../queries.js";
import { createTermBuilder } from "../../term/builder.js";
import {
  arrowTyp,
  boolTyp,
  intTyp,
  prodTyp,
  recTyp,
  sumTyp,
  unknownTyp,
  varTyp,
} from "../../types/typ.js";
import { computeInfoMap } from "../compute.js";
import { isError, type Info } from "../info.js";

const termStatus = (info: Info) =>
  info.kind === "typ" || info.kind === "tpat" || info.kind === "variant"
    ? info.status
    : undefined;

describe("type aliases", () => {
  it("binds sum variants as constructors", () => {
    const b = createTermBuilder();
    const exp = b.exp.typeAlias(
      b.tpat.var("Opt"),
      b.typ.sum([b.variant("None"), b.variant("Some", b.typ.int())]),
      b.exp.ap(b.exp.ctr("Some"), b.exp.int(1))
    );
    expect(expTypeAfterFix(computeInfoMap(exp), repId(exp))).toEqual(
      sumTyp([{ tag: "None" }, { tag: "Some", arg: intTyp }])
    );
  });

  it("makes a self-referencing definition recursive", () => {
    const b = createTermBuilder();
    const exp = b.exp.typeAlias(
      b.tpat.var("L"),
      b.typ.sum([
        b.variant("Nil"),
        b.variant("Cons", b.typ.tuple([b.typ.int(), b.typ.var("L")])),
      ]),
      b.exp.ap(b.exp.ctr("Cons"), b.exp.tuple([b.exp.int(1), b.exp.ctr("Nil")]))
    );
    const map = computeInfoMap(exp);
    expect(expTypeAfterFix(map, repId(exp))).toEqual(
      recTyp(
        "L",
        sumTyp([{ tag: "Nil" }, { tag: "Cons", arg: prodTyp([intTyp, varTyp("L")]) }])
      )
    );
    expect(Array.from(map.values()).some(isError)).toBe(false);
  });

  it("substitutes the alias out of the body type", () => {
    const b = createTermBuilder();
    const exp = b.exp.typeAlias(
      b.tpat.var("F"),
      b.typ.arrow(b.typ.int(), b.typ.int()),
      b.exp.fun(b.pat.ann(b.pat.var("x"), b.typ.var("F")), b.exp.int(1))
    );
    expect(expTypeAfterFix(computeInfoMap(exp), repId(exp))).toEqual(
      arrowTyp(arrowTyp(intTyp, intTyp), intTyp)
    );
  });

  it("resolves an alias chain against the names bound before it", () => {
    const b = createTermBuilder();
    const z = b.exp.var("z");
    const exp = b.exp.typeAlias(
      b.tpat.var("Y"),
      b.typ.int(),
      b.exp.typeAlias(
        b.tpat.var("X"),
        b.typ.var("Y"),
        b.exp.typeAlias(
          b.tpat.var("Y"),
          b.typ.var("X"),
          b.exp.let(b.pat.ann(b.pat.var("z"), b.typ.var("Y")), b.exp.int(1), z)
        )
      )
    );
    const map = computeInfoMap(exp);
    expect(expTypeAfterFix(map, repId(z))).toEqual(intTyp);
    expect(expTypeAfterFix(map, repId(exp))).toEqual(intTyp);
    expect(Array.from(map.values()).some(isError)).toBe(false);
  });

  it("keeps a variable's type when its alias name is shadowed", () => {
    const b = createTermBuilder();
    const x = b.exp.var("x");
    const exp = b.exp.typeAlias(
      b.tpat.var("T"),
      b.typ.int(),
      b.exp.let(
        b.pat.ann(b.pat.var("x"), b.typ.var("T")),
        b.exp.int(1),
        b.exp.typeAlias(
          b.tpat.var("T"),
          b.typ.bool(),
          b.exp.binOp("&&", x, b.exp.bool(true))
        )
      )
    );
    const info = lookupInfo(computeInfoMap(exp), repId(x));
    expect(info.kind === "exp" && info.status).toEqual({
      kind: "in-hole",
      error: { kind: "type-inconsistent", syn: intTyp, ana: boolTyp },
    });
  });

  it("rejects redefining a base type", () => {
    const b = createTermBuilder();
    const tpat = b.tpat.var("Int");
    const map = computeInfoMap(b.exp.typeAlias(tpat, b.typ.bool(), b.exp.unit()));
    expect(termStatus(lookupInfo(map, repId(tpat)))).toEqual({
      kind: "in-hole",
      error: { kind: "shadows-base-type", name: "Int" },
    });
  });

  it("reports duplicate constructors and keeps the first", () => {
    const b = createTermBuilder();
    const first = b.variant("A");
    const second = b.variant("A", b.typ.int());
    const exp = b.exp.typeAlias(b.tpat.var("T"), b.typ.sum([first, second]), b.exp.ctr("A"));
    const map = computeInfoMap(exp);
    expect(termStatus(lookupInfo(map, repId(first)))).toEqual({ kind: "not-in-hole" });
    expect(termStatus(lookupInfo(map, repId(second)))).toEqual({
      kind: "in-hole",
      error: { kind: "duplicate-tag", tag: "A" },
    });
    expect(expTypeAfterFix(map, repId(exp))).toEqual(sumTyp([{ tag: "A" }]));
  });

  it("rejects a sum entry that is not a constructor", () => {
    const b = createTermBuilder();
    const bad = b.badEntry(b.typ.int());
    const map = computeInfoMap(
      b.exp.typeAlias(b.tpat.var("T"), b.typ.sum([b.variant("A"), bad]), b.exp.unit())
    );
    expect(termStatus(lookupInfo(map, repId(bad)))).toEqual({
      kind: "in-hole",
      error: { kind: "bad-sum-entry" },
    });
  });
});

describe("type terms", () => {
  it("reports unbound type variables as unknown", () => {
    const b = createTermBuilder();
    const typ = b.typ.var("T");
    const map = computeInfoMap(b.exp.fun(b.pat.ann(b.pat.var("x"), typ), b.exp.var("x")));
    const info = lookupInfo(map, repId(typ));
    expect(termStatus(info)).toEqual({
      kind: "in-hole",
      error: { kind: "free", free: "type-variable", name: "T" },
    });
    expect(info.kind === "typ" && info.ty).toEqual(unknownTyp());
  });

  it("reports an unbound constructor", () => {
    const b = createTermBuilder();
    const ctr = b.exp.ctr("Foo");
    const info = lookupInfo(computeInfoMap(ctr), repId(ctr));
    expect(info.kind === "exp" && info.status).toEqual({
      kind: "in-hole",
      error: { kind: "free", free: "tag", name: "Foo" },
    });
  });
});
