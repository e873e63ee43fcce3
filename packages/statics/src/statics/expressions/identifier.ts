import { emptyCoCtx, singletonCoCtx } from "../../ctx/co-ctx.js";
import { repId } from "../../ids.js";
import type { ExpConstructor, ExpVar } from "../../term/nodes.js";
import { eraseMode } from "../mode.js";
import { ctrSelf, freeSelf, just } from "../self.js";
import type { ExpDerivation, ExpState } from "../state.js";

export const typeVarExp = (exp: ExpVar, state: ExpState): ExpDerivation => {
  const entry = state.ctx.lookupVar(exp.name);
  if (!entry) {
    return { self: freeSelf("variable", exp.name), coCtx: emptyCoCtx };
  }
  return {
    self: just(entry.ty),
    coCtx: singletonCoCtx(exp.name, repId(exp), eraseMode(state.mode)),
  };
};

export const typeConstructorExp = (
  exp: ExpConstructor,
  state: ExpState
): ExpDerivation => ({
  self: ctrSelf(state.ctx, state.mode, exp.tag),
  coCtx: emptyCoCtx,
});
