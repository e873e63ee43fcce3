import type { ExpParens, ExpSeq, ExpTest } from "../../term/nodes.js";
import { unionCoCtx } from "../../ctx/co-ctx.js";
import { boolTyp, unitTyp } from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import { anaMode, synMode } from "../mode.js";
import { just } from "../self.js";
import { enter, type ExpDerivation, type ExpState } from "../state.js";

export const typeSeqExp = (exp: ExpSeq, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const first = expToInfoMap(exp.first, { ...inner, mode: synMode });
  const second = expToInfoMap(exp.second, { ...inner, mode: state.mode });
  return { self: just(second.ty), coCtx: unionCoCtx([first.coCtx, second.coCtx]) };
};

export const typeTestExp = (exp: ExpTest, state: ExpState): ExpDerivation => {
  const body = expToInfoMap(exp.body, { ...enter(state, exp), mode: anaMode(boolTyp) });
  return { self: just(unitTyp), coCtx: body.coCtx };
};

export const typeParensExp = (exp: ExpParens, state: ExpState): ExpDerivation => {
  const body = expToInfoMap(exp.body, { ...enter(state, exp), mode: state.mode });
  return { self: just(body.ty), coCtx: body.coCtx };
};
