import { emptyCoCtx } from "../ctx/co-ctx.js";
import type { Exp } from "../term/nodes.js";
import { eraseSynSwitch, unknownTyp } from "../types/typ.js";
import {
  typeApExp,
  typeBinOpExp,
  typeConsExp,
  typeConstructorExp,
  typeFunExp,
  typeIfExp,
  typeLetExp,
  typeListConcatExp,
  typeListLitExp,
  typeLiteralExp,
  typeMatchExp,
  typeParensExp,
  typeSeqExp,
  typeTestExp,
  typeTupleExp,
  typeTypeAliasExp,
  typeUnOpExp,
  typeVarExp,
} from "./expressions/index.js";
import { multiToInfoMap, recordInvalid } from "./holes.js";
import { addInfo } from "./info.js";
import { eraseMode } from "./mode.js";
import { eraseSelf, multiSelf } from "./self.js";
import {
  clsOf,
  enter,
  type ExpDerivation,
  type ExpResult,
  type ExpState,
} from "./state.js";
import { eraseStatus, fixedTyp, statusOf } from "./status.js";

/**
 * Checks `exp` in `state.mode`, recording an info for it and every subterm.
 * Never fails: errors are recorded as statuses and patched over with
 * unknown types so checking continues around them.
 */
export const expToInfoMap = (exp: Exp, state: ExpState): ExpResult => {
  if (exp.kind === "invalid") {
    recordInvalid(state, "exp", exp);
    return { ty: unknownTyp(), coCtx: emptyCoCtx };
  }

  const { self, coCtx } = deriveExp(exp, state);
  const status = statusOf(state.ctx, state.mode, self);
  const ty = fixedTyp(state.mode, status);
  addInfo(state.infos, exp.ids, {
    kind: "exp",
    cls: clsOf("exp", exp.kind),
    term: exp,
    ancestors: state.ancestors,
    ctx: state.ctx,
    mode: eraseMode(state.mode),
    self: eraseSelf(self),
    coCtx,
    status: eraseStatus(status),
    ty: eraseSynSwitch(ty),
  });
  return { ty, coCtx };
};

const deriveExp = (
  exp: Exclude<Exp, { kind: "invalid" }>,
  state: ExpState
): ExpDerivation => {
  switch (exp.kind) {
    case "empty-hole":
    case "unit":
    case "bool":
    case "int":
    case "float":
    case "string":
      return typeLiteralExp(exp);
    case "multi-hole":
      return {
        self: multiSelf,
        coCtx: multiToInfoMap(exp.children, enter(state, exp)),
      };
    case "var":
      return typeVarExp(exp, state);
    case "constructor":
      return typeConstructorExp(exp, state);
    case "list-lit":
      return typeListLitExp(exp, state);
    case "tuple":
      return typeTupleExp(exp, state);
    case "cons":
      return typeConsExp(exp, state);
    case "list-concat":
      return typeListConcatExp(exp, state);
    case "un-op":
      return typeUnOpExp(exp, state);
    case "bin-op":
      return typeBinOpExp(exp, state);
    case "fun":
      return typeFunExp(exp, state);
    case "ap":
      return typeApExp(exp, state);
    case "if":
      return typeIfExp(exp, state);
    case "match":
      return typeMatchExp(exp, state);
    case "let":
      return typeLetExp(exp, state);
    case "type-alias":
      return typeTypeAliasExp(exp, state);
    case "seq":
      return typeSeqExp(exp, state);
    case "test":
      return typeTestExp(exp, state);
    case "parens":
      return typeParensExp(exp, state);
  }
};
