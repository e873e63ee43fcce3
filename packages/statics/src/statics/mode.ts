import type { Ctx } from "../ctx/ctx.js";
import {
  matchedArrow,
  matchedList,
  matchedProd,
  sumVariants,
} from "../types/join.js";
import {
  arrowTyp,
  eraseSynSwitch,
  isSynSwitch,
  listTyp,
  unknownTyp,
  type Typ,
} from "../types/typ.js";

/**
 * How a node is checked. `syn` infers; `ana` checks against an expected
 * type; `syn-fun` infers a term in function position, where an unknown type
 * is read as an arrow between unknowns.
 */
export type Mode =
  | { readonly kind: "syn" }
  | { readonly kind: "syn-fun" }
  | { readonly kind: "ana"; readonly ty: Typ };

export const synMode: Mode = { kind: "syn" };
export const synFunMode: Mode = { kind: "syn-fun" };

/** Analysis against a `syn-switch` unknown degrades to synthesis. */
export const anaMode = (ty: Typ): Mode =>
  isSynSwitch(ty) ? synMode : { kind: "ana", ty };

/** The type a mode expects, with synthesis read as a `syn-switch` unknown. */
export const typOfMode = (mode: Mode): Typ => {
  switch (mode.kind) {
    case "syn":
      return unknownTyp("syn-switch");
    case "syn-fun":
      return arrowTyp(unknownTyp("syn-switch"), unknownTyp("syn-switch"));
    case "ana":
      return mode.ty;
  }
};

export const eraseMode = (mode: Mode): Mode =>
  mode.kind === "ana" ? { kind: "ana", ty: eraseSynSwitch(mode.ty) } : mode;

export const ofArrow = (ctx: Ctx, mode: Mode): [Mode, Mode] => {
  if (mode.kind !== "ana") {
    return [synMode, synMode];
  }
  const [input, output] = matchedArrow(ctx, mode.ty);
  return [anaMode(input), anaMode(output)];
};

export const ofProd = (ctx: Ctx, mode: Mode, length: number): Mode[] => {
  if (mode.kind !== "ana") {
    return Array.from({ length }, () => synMode);
  }
  return matchedProd(ctx, length, mode.ty).map(anaMode);
};

export const ofList = (ctx: Ctx, mode: Mode): Mode =>
  mode.kind === "ana" ? anaMode(matchedList(ctx, mode.ty)) : synMode;

export const ofListLit = (ctx: Ctx, length: number, mode: Mode): Mode[] =>
  Array.from({ length }, () => ofList(ctx, mode));

export const ofConsHead = ofList;

export const ofConsTail = (ctx: Ctx, mode: Mode, headTy: Typ): Mode =>
  mode.kind === "ana"
    ? anaMode(listTyp(matchedList(ctx, mode.ty)))
    : anaMode(listTyp(headTy));

export const ofListConcat = (ctx: Ctx, mode: Mode): Mode =>
  mode.kind === "ana"
    ? anaMode(listTyp(matchedList(ctx, mode.ty)))
    : anaMode(listTyp(unknownTyp("syn-switch")));

/**
 * The type a constructor has when the mode expects a sum carrying it (or an
 * arrow into one). The expected sum wins over whatever the context binds.
 */
export const ctrAnaTyp = (ctx: Ctx, mode: Mode, tag: string): Typ | undefined => {
  if (mode.kind !== "ana") {
    return undefined;
  }
  const target = (sum: Typ): Typ | undefined => {
    const variant = sumVariants(ctx, sum)?.find((entry) => entry.tag === tag);
    if (!variant) return undefined;
    return variant.arg ? arrowTyp(variant.arg, sum) : sum;
  };
  const direct = target(mode.ty);
  if (direct) {
    return direct;
  }
  return mode.ty.kind === "arrow" ? target(mode.ty.output) : undefined;
};

/** Mode for the function position of an application. */
export const ofAp = (ctx: Ctx, mode: Mode, tag: string | undefined): Mode => {
  if (tag === undefined) {
    return synFunMode;
  }
  const expected = ctrAnaTyp(ctx, mode, tag);
  // A nullary constructor in function position is synthesized and reported
  // as a non-function.
  return expected?.kind === "arrow" ? anaMode(expected) : synFunMode;
};
