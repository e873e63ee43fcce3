import { unionCoCtx } from "../../ctx/co-ctx.js";
import { repId } from "../../ids.js";
import type {
  ExpCons,
  ExpListConcat,
  ExpListLit,
  ExpTuple,
} from "../../term/nodes.js";
import { listTyp, prodTyp } from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import {
  ofConsHead,
  ofConsTail,
  ofListConcat,
  ofListLit,
  ofProd,
} from "../mode.js";
import { joinSelf, just } from "../self.js";
import { enter, type ExpDerivation, type ExpState } from "../state.js";

export const typeListLitExp = (exp: ExpListLit, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const modes = ofListLit(state.ctx, exp.elements.length, state.mode);
  const results = exp.elements.map((element, index) => ({
    id: repId(element),
    ...expToInfoMap(element, { ...inner, mode: modes[index] ?? state.mode }),
  }));
  return {
    self: joinSelf(state.ctx, "list", results),
    coCtx: unionCoCtx(results.map((result) => result.coCtx)),
  };
};

export const typeTupleExp = (exp: ExpTuple, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const modes = ofProd(state.ctx, state.mode, exp.elements.length);
  const results = exp.elements.map((element, index) =>
    expToInfoMap(element, { ...inner, mode: modes[index] ?? state.mode })
  );
  return {
    self: just(prodTyp(results.map((result) => result.ty))),
    coCtx: unionCoCtx(results.map((result) => result.coCtx)),
  };
};

export const typeConsExp = (exp: ExpCons, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const head = expToInfoMap(exp.head, { ...inner, mode: ofConsHead(state.ctx, state.mode) });
  const tail = expToInfoMap(exp.tail, {
    ...inner,
    mode: ofConsTail(state.ctx, state.mode, head.ty),
  });
  return {
    self: just(listTyp(head.ty)),
    coCtx: unionCoCtx([head.coCtx, tail.coCtx]),
  };
};

export const typeListConcatExp = (
  exp: ExpListConcat,
  state: ExpState
): ExpDerivation => {
  const inner = enter(state, exp);
  const mode = ofListConcat(state.ctx, state.mode);
  const left = expToInfoMap(exp.left, { ...inner, mode });
  const right = expToInfoMap(exp.right, { ...inner, mode });
  return {
    self: joinSelf(state.ctx, "none", [
      { id: repId(exp.left), ty: left.ty },
      { id: repId(exp.right), ty: right.ty },
    ]),
    coCtx: unionCoCtx([left.coCtx, right.coCtx]),
  };
};
