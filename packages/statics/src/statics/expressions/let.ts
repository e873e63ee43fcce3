import {
  emptyCoCtx,
  unionCoCtx,
  withoutBindings,
} from "../../ctx/co-ctx.js";
import type { Ctx } from "../../ctx/ctx.js";
import type { Exp, ExpLet, Pat } from "../../term/nodes.js";
import { weakHeadNormalize } from "../../types/join.js";
import type { Typ } from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import { anaMode, synMode } from "../mode.js";
import { patToInfoMap } from "../patterns.js";
import { just } from "../self.js";
import {
  enter,
  provisional,
  type ExpDerivation,
  type ExpState,
} from "../state.js";

const sumCounts = (counts: (number | undefined)[]): number | undefined =>
  counts.reduce<number | undefined>(
    (total, count) =>
      total === undefined || count === undefined ? undefined : total + count,
    0
  );

/** Number of variables in a pattern made only of variables and tuples. */
const countVars = (pat: Pat): number | undefined => {
  switch (pat.kind) {
    case "var":
      return 1;
    case "parens":
      return countVars(pat.body);
    case "type-ann":
      return countVars(pat.pat);
    case "tuple":
      return sumCounts(pat.elements.map(countVars));
    default:
      return undefined;
  }
};

/** Number of function literals in a definition made only of them and tuples. */
const countFuns = (exp: Exp): number | undefined => {
  switch (exp.kind) {
    case "fun":
      return 1;
    case "parens":
      return countFuns(exp.body);
    case "tuple":
      return sumCounts(exp.elements.map(countFuns));
    default:
      return undefined;
  }
};

/**
 * A let is recursive when it binds one variable per function literal of its
 * definition and each variable may have a function type.
 */
export const isRecursiveLet = (
  ctx: Ctx,
  pat: Pat,
  def: Exp,
  patTy: Typ
): boolean => {
  const vars = countVars(pat);
  if (!vars || vars !== countFuns(def)) {
    return false;
  }
  const mayBeFunction = (ty: Typ) => {
    const normalized = weakHeadNormalize(ctx, ty);
    return normalized.kind === "unknown" || normalized.kind === "arrow";
  };
  if (vars === 1) {
    return mayBeFunction(patTy);
  }
  const normalized = weakHeadNormalize(ctx, patTy);
  return (
    normalized.kind === "prod" &&
    normalized.elements.length === vars &&
    normalized.elements.every(mayBeFunction)
  );
};

/**
 * The pattern is checked three times: in synthesis to learn its annotation,
 * against the definition's type to build the body's context, and once more
 * with the variable uses attached. Only the last pass is recorded.
 */
export const typeLetExp = (exp: ExpLet, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const annotated = patToInfoMap(
    exp.pat,
    provisional({ ...inner, mode: synMode, coCtx: emptyCoCtx })
  );
  const recursive = isRecursiveLet(state.ctx, exp.pat, exp.def, annotated.ty);
  const def = expToInfoMap(exp.def, {
    ...inner,
    ctx: recursive ? annotated.ctx : state.ctx,
    mode: anaMode(annotated.ty),
  });
  const patMode = anaMode(def.ty);
  const bound = patToInfoMap(
    exp.pat,
    provisional({ ...inner, mode: patMode, coCtx: emptyCoCtx })
  );
  const body = expToInfoMap(exp.body, { ...inner, ctx: bound.ctx, mode: state.mode });
  // a recursive definition's own uses count as uses of the bindings
  const patCoCtx = recursive ? unionCoCtx([def.coCtx, body.coCtx]) : body.coCtx;
  const pat = patToInfoMap(exp.pat, { ...inner, mode: patMode, coCtx: patCoCtx });

  const defCoCtx = recursive
    ? withoutBindings(state.ctx, annotated.ctx, def.coCtx)
    : def.coCtx;
  return {
    self: just(body.ty),
    coCtx: unionCoCtx([defCoCtx, withoutBindings(state.ctx, pat.ctx, body.coCtx)]),
  };
};
