import { encode } from "@msgpack/msgpack";
import { describe, expect, it } from "vitest";
import { builtinCtx } from "../builtins.js";
import {
  decodeExportedInfoMap,
  encodeInfoMap,
  exportInfoMap,
} from "../serialize.js";
import { computeInfoMap } from "../statics/compute.js";
import { createTermBuilder } from "../term/builder.js";
import { intTyp } from "../types/typ.js";

describe("exportInfoMap", () => {
  it("exports one entry per node with the bindings it adds", () => {
    const b = createTermBuilder();
    const exp = b.exp.let(b.pat.var("x"), b.exp.int(1), b.exp.var("x"));
    const exported = exportInfoMap(computeInfoMap(exp), { base: builtinCtx });

    expect(Object.keys(exported.infos)).toEqual(["1", "2", "3", "4"]);
    expect(exported.infos["3"]).toEqual({
      kind: "exp",
      ids: ["3"],
      cls: "exp:var",
      ancestors: ["4"],
      ctx: [{ kind: "var", name: "x", id: "1", ty: intTyp }],
      mode: { kind: "syn" },
      self: { kind: "just", ty: intTyp },
      status: { kind: "not-in-hole", ok: { kind: "syn", ty: intTyp } },
      ty: intTyp,
      coCtx: [{ name: "x", uses: [{ id: "3", mode: { kind: "syn" } }] }],
    });
  });
});

describe("msgpack encoding", () => {
  it("decodes what it encodes", () => {
    const b = createTermBuilder();
    const exp = b.exp.typeAlias(
      b.tpat.var("L"),
      b.typ.sum([
        b.variant("Nil"),
        b.variant("Cons", b.typ.tuple([b.typ.int(), b.typ.var("L")])),
        b.variant("Nil"),
      ]),
      b.exp.multi([
        b.any.exp(b.exp.ap(b.exp.ctr("Cons"), b.exp.hole())),
        b.any.token("%%"),
        b.any.exp(b.exp.if(b.exp.bool(true), b.exp.int(1), b.exp.string("a"))),
      ])
    );
    const map = computeInfoMap(exp);
    expect(decodeExportedInfoMap(encodeInfoMap(map, { base: builtinCtx }))).toEqual(
      exportInfoMap(map, { base: builtinCtx })
    );
  });

  it("rejects other versions", () => {
    expect(() => decodeExportedInfoMap(encode({ version: 2, infos: {} }))).toThrow(
      "$.version: unsupported version"
    );
  });
});
