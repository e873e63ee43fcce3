import { describe, expect, it } from "vitest";
import { repId } from "../../ids.js";
import { expTypeAfterFix, lookupInfo } from "../../queries.js";
import { createTermBuilder } from "../../term/builder.js";
import { intTyp, unknownTyp } from "../../types/typ.js";
import { computeInfoMap } from "../compute.js";
import { isError } from "../info.js";

describe("error tolerance", () => {
  it("checks every piece of a multi-hole independently", () => {
    const b = createTermBuilder();
    const one = b.exp.int(1);
    const token = b.any.token("%%");
    const z = b.exp.var("z");
    const exp = b.exp.multi([b.any.exp(one), token, b.any.exp(z)]);
    const map = computeInfoMap(exp);

    expect(expTypeAfterFix(map, repId(exp))).toEqual(unknownTyp());
    expect(expTypeAfterFix(map, repId(one))).toEqual(intTyp);
    expect(lookupInfo(map, "2")).toMatchObject({ kind: "invalid", cls: "token:invalid" });
    expect(isError(lookupInfo(map, repId(z)))).toBe(true);
    expect(isError(lookupInfo(map, repId(exp)))).toBe(false);
  });

  it("does not count layout tokens as errors", () => {
    const b = createTermBuilder();
    const exp = b.exp.multi([b.any.exp(b.exp.int(1)), b.any.token("  ")]);
    const map = computeInfoMap(exp);
    expect(Array.from(map.values()).some(isError)).toBe(false);
  });

  it("records invalid expressions and carries on", () => {
    const b = createTermBuilder();
    const bad = b.exp.invalid("@@");
    const exp = b.exp.binOp("+", bad, b.exp.int(1));
    const map = computeInfoMap(exp);
    expect(lookupInfo(map, repId(bad))).toMatchObject({ kind: "invalid", sort: "exp" });
    expect(expTypeAfterFix(map, repId(exp))).toEqual(intTyp);
  });

  it("records an info for every id in the term", () => {
    const b = createTermBuilder();
    const exp = b.exp.let(
      b.pat.ann(b.pat.tuple([b.pat.var("a"), b.pat.wild()]), b.typ.hole()),
      b.exp.tuple([b.exp.hole(), b.exp.list([])]),
      b.exp.match(b.exp.var("a"), [b.rule(b.pat.hole(), b.exp.invalid("?!"))])
    );
    const map = computeInfoMap(exp);
    const ids: string[] = [];
    const collect = (value: unknown): void => {
      if (Array.isArray(value)) {
        value.forEach(collect);
        return;
      }
      if (typeof value !== "object" || value === null) return;
      Object.entries(value).forEach(([key, entry]) => {
        if (key === "ids" && Array.isArray(entry)) {
          entry.forEach((id) => {
            if (typeof id === "string") ids.push(id);
          });
          return;
        }
        collect(entry);
      });
    };
    collect(exp);
    expect(ids.length).toBeGreaterThan(10);
    ids.forEach((id) => expect(map.has(id)).toBe(true));
  });
});
