import { emptyCoCtx, unionCoCtx, withoutBindings } from "../../ctx/co-ctx.js";
import { repId, type Id } from "../../ids.js";
import type { ExpMatch, Rule } from "../../term/nodes.js";
import type { Typ } from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import { addInfo } from "../info.js";
import { anaMode, synMode, type Mode } from "../mode.js";
import { patToInfoMap } from "../patterns.js";
import { joinSelf } from "../self.js";
import {
  clsOf,
  enter,
  provisional,
  type ExpDerivation,
  type ExpResult,
  type ExpState,
  type StaticsState,
} from "../state.js";

export interface RuleResult extends ExpResult {
  /** Representative id of the arm's body. */
  readonly id: Id;
}

/**
 * Checks one arm: the pattern against the scrutinee type, then the body in
 * the pattern's bindings. The pattern is checked twice, the second time with
 * the body's variable uses attached.
 */
export const ruleToInfoMap = (
  rule: Rule,
  state: StaticsState,
  scrutineeTy: Typ,
  mode: Mode
): RuleResult => {
  addInfo(state.infos, rule.ids, {
    kind: "rule",
    cls: clsOf("rule", rule.kind),
    term: rule,
    ancestors: state.ancestors,
    ctx: state.ctx,
  });
  const inner = enter(state, rule);
  const patMode = anaMode(scrutineeTy);
  const bound = patToInfoMap(
    rule.pat,
    provisional({ ...inner, mode: patMode, coCtx: emptyCoCtx })
  );
  const body = expToInfoMap(rule.body, { ...inner, ctx: bound.ctx, mode });
  patToInfoMap(rule.pat, { ...inner, mode: patMode, coCtx: body.coCtx });
  return {
    id: repId(rule.body),
    ty: body.ty,
    coCtx: withoutBindings(state.ctx, bound.ctx, body.coCtx),
  };
};

export const typeMatchExp = (exp: ExpMatch, state: ExpState): ExpDerivation => {
  const inner = enter(state, exp);
  const scrutinee = expToInfoMap(exp.scrutinee, { ...inner, mode: synMode });
  const arms = exp.rules.map((rule) =>
    ruleToInfoMap(rule, inner, scrutinee.ty, state.mode)
  );
  return {
    self: joinSelf(
      state.ctx,
      "none",
      arms.map(({ id, ty }) => ({ id, ty }))
    ),
    coCtx: unionCoCtx([scrutinee.coCtx, ...arms.map((arm) => arm.coCtx)]),
  };
};
