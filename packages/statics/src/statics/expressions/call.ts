import { unionCoCtx } from "../../ctx/co-ctx.js";
import type { Exp, ExpAp } from "../../term/nodes.js";
import { matchedArrow } from "../../types/join.js";
import { expToInfoMap } from "../expressions.js";
import { anaMode, ofAp } from "../mode.js";
import { just } from "../self.js";
import { enter, type ExpDerivation, type ExpState } from "../state.js";

/** The constructor tag of a callee, if the callee is a bare constructor. */
const ctrName = (exp: Exp): string | undefined =>
  exp.kind === "constructor" ? exp.tag : undefined;

export const typeApExp = (exp: ExpAp, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const fn = expToInfoMap(exp.fn, {
    ...inner,
    mode: ofAp(state.ctx, state.mode, ctrName(exp.fn)),
  });
  const [input, output] = matchedArrow(state.ctx, fn.ty);
  const arg = expToInfoMap(exp.arg, { ...inner, mode: anaMode(input) });
  return { self: just(output), coCtx: unionCoCtx([fn.coCtx, arg.coCtx]) };
};
