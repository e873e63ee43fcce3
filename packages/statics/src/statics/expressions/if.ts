import { unionCoCtx } from "../../ctx/co-ctx.js";
import { repId } from "../../ids.js";
import type { ExpIf } from "../../term/nodes.js";
import { boolTyp } from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import { anaMode } from "../mode.js";
import { joinSelf } from "../self.js";
import { enter, type ExpDerivation, type ExpState } from "../state.js";

export const typeIfExp = (exp: ExpIf, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const cond = expToInfoMap(exp.cond, { ...inner, mode: anaMode(boolTyp) });
  const then = expToInfoMap(exp.then, { ...inner, mode: state.mode });
  const otherwise = expToInfoMap(exp.else, { ...inner, mode: state.mode });
  return {
    self: joinSelf(state.ctx, "none", [
      { id: repId(exp.then), ty: then.ty },
      { id: repId(exp.else), ty: otherwise.ty },
    ]),
    coCtx: unionCoCtx([cond.coCtx, then.coCtx, otherwise.coCtx]),
  };
};
