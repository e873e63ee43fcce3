import { emptyCoCtx, withoutBindings } from "../../ctx/co-ctx.js";
import type { ExpFun } from "../../term/nodes.js";
import { arrowTyp } from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import { ofArrow } from "../mode.js";
import { patToInfoMap } from "../patterns.js";
import { just } from "../self.js";
import {
  enter,
  provisional,
  type ExpDerivation,
  type ExpState,
} from "../state.js";

export const typeFunExp = (exp: ExpFun, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const [patMode, bodyMode] = ofArrow(state.ctx, state.mode);
  const bound = patToInfoMap(
    exp.pat,
    provisional({ ...inner, mode: patMode, coCtx: emptyCoCtx })
  );
  const body = expToInfoMap(exp.body, { ...inner, ctx: bound.ctx, mode: bodyMode });
  const pat = patToInfoMap(exp.pat, { ...inner, mode: patMode, coCtx: body.coCtx });
  return {
    self: just(arrowTyp(pat.ty, body.ty)),
    coCtx: withoutBindings(state.ctx, pat.ctx, body.coCtx),
  };
};
