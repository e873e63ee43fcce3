import type { TPat, TypTerm, VariantTerm } from "../term/nodes.js";
import {
  arrowTyp,
  baseTypByName,
  boolTyp,
  floatTyp,
  intTyp,
  isBaseTypName,
  listTyp,
  prodTyp,
  stringTyp,
  sumTyp,
  unitTyp,
  unknownTyp,
  varTyp,
  type SumVariant,
  type Typ,
} from "../types/typ.js";
import { multiToInfoMap, recordInvalid } from "./holes.js";
import { addInfo } from "./info.js";
import { clsOf, enter, type StaticsState } from "./state.js";
import { termError, termOk, type StaticsError, type TermStatus } from "./status.js";

const recordTyp = (
  typ: TypTerm,
  state: StaticsState,
  ty: Typ,
  status: TermStatus = termOk
): Typ => {
  addInfo(state.infos, typ.ids, {
    kind: "typ",
    cls: clsOf("typ", typ.kind),
    term: typ,
    ancestors: state.ancestors,
    ctx: state.ctx,
    status,
    ty,
  });
  return ty;
};

const resolveTypVar = (
  name: string,
  state: StaticsState
): { ty: Typ; status: TermStatus } => {
  const base = baseTypByName(name);
  if (base) {
    return { ty: base, status: termOk };
  }
  const tvar = state.ctx.lookupTVar(name);
  if (tvar) {
    // an alias stands for its definition as of its binding site
    const ty = tvar.tvarKind.kind === "singleton" ? tvar.tvarKind.ty : varTyp(name);
    return { ty, status: termOk };
  }
  return {
    ty: unknownTyp(),
    status: termError({ kind: "free", free: "type-variable", name }),
  };
};

/** Elaborates a surface type, recording an info for it and every subterm. */
export const typToInfoMap = (typ: TypTerm, state: StaticsState): Typ => {
  const inner = enter(state, typ);
  const go = (child: TypTerm) => typToInfoMap(child, inner);

  switch (typ.kind) {
    case "invalid":
      recordInvalid(state, "typ", typ);
      return unknownTyp();
    case "empty-hole":
      return recordTyp(typ, state, unknownTyp());
    case "multi-hole":
      multiToInfoMap(typ.children, inner);
      return recordTyp(typ, state, unknownTyp());
    case "int":
      return recordTyp(typ, state, intTyp);
    case "float":
      return recordTyp(typ, state, floatTyp);
    case "bool":
      return recordTyp(typ, state, boolTyp);
    case "string":
      return recordTyp(typ, state, stringTyp);
    case "unit":
      return recordTyp(typ, state, unitTyp);
    case "list":
      return recordTyp(typ, state, listTyp(go(typ.elem)));
    case "arrow": {
      const input = go(typ.input);
      const output = go(typ.output);
      return recordTyp(typ, state, arrowTyp(input, output));
    }
    case "tuple":
      return recordTyp(typ, state, prodTyp(typ.elements.map(go)));
    case "parens":
      return recordTyp(typ, state, go(typ.body));
    case "var": {
      const { ty, status } = resolveTypVar(typ.name, state);
      return recordTyp(typ, state, ty, status);
    }
    case "sum": {
      const seen = new Set<string>();
      const variants = typ.variants.flatMap((entry) => {
        const variant = variantToInfoMap(entry, inner, seen);
        return variant ? [variant] : [];
      });
      return recordTyp(typ, state, sumTyp(variants));
    }
  }
};

/**
 * Checks one entry of a sum definition. Returns the variant it contributes,
 * or `undefined` for a bad entry or a tag already in `seen`.
 */
export const variantToInfoMap = (
  entry: VariantTerm,
  state: StaticsState,
  seen: Set<string>
): SumVariant | undefined => {
  const inner = enter(state, entry);
  const record = (status: TermStatus) =>
    addInfo(state.infos, entry.ids, {
      kind: "variant",
      cls: clsOf("variant", entry.kind),
      term: entry,
      ancestors: state.ancestors,
      ctx: state.ctx,
      status,
    });

  if (entry.kind === "bad-entry") {
    typToInfoMap(entry.typ, inner);
    record(termError({ kind: "bad-sum-entry" }));
    return undefined;
  }

  const arg = entry.arg && typToInfoMap(entry.arg, inner);
  if (seen.has(entry.tag)) {
    record(termError({ kind: "duplicate-tag", tag: entry.tag }));
    return undefined;
  }
  seen.add(entry.tag);
  record(termOk);
  return arg ? { tag: entry.tag, arg } : { tag: entry.tag };
};

const tpatError = (tpat: TPat): StaticsError | undefined => {
  switch (tpat.kind) {
    case "var":
      return isBaseTypName(tpat.name)
        ? { kind: "shadows-base-type", name: tpat.name }
        : undefined;
    case "empty-hole":
      return undefined;
    case "invalid":
    case "multi-hole":
      return { kind: "not-a-name" };
  }
};

/** Checks a type pattern; yields the name it binds when it is a usable one. */
export const tpatToInfoMap = (tpat: TPat, state: StaticsState): string | undefined => {
  if (tpat.kind === "multi-hole") {
    multiToInfoMap(tpat.children, enter(state, tpat));
  }
  const error = tpatError(tpat);
  addInfo(state.infos, tpat.ids, {
    kind: "tpat",
    cls: clsOf("tpat", tpat.kind),
    term: tpat,
    ancestors: state.ancestors,
    ctx: state.ctx,
    status: error ? termError(error) : termOk,
  });
  return tpat.kind === "var" && !error ? tpat.name : undefined;
};
