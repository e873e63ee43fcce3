import type { Ctx } from "../ctx/ctx.js";
import { repId } from "../ids.js";
import type { Pat } from "../term/nodes.js";
import { matchedArrow } from "../types/join.js";
import {
  boolTyp,
  eraseSynSwitch,
  floatTyp,
  intTyp,
  listTyp,
  prodTyp,
  stringTyp,
  unitTyp,
  unknownTyp,
  type Typ,
} from "../types/typ.js";
import { multiToInfoMap, recordInvalid } from "./holes.js";
import { addInfo } from "./info.js";
import {
  anaMode,
  eraseMode,
  ofAp,
  ofConsHead,
  ofConsTail,
  ofListLit,
  ofProd,
  type Mode,
} from "./mode.js";
import { ctrSelf, eraseSelf, joinSelf, just, multiSelf } from "./self.js";
import {
  clsOf,
  enter,
  type PatDerivation,
  type PatResult,
  type PatState,
} from "./state.js";
import { eraseStatus, fixedTyp, statusOf, typAfterFix } from "./status.js";
import { typToInfoMap } from "./typ-terms.js";

/**
 * Checks a pattern. Bindings are threaded left to right through the returned
 * context, so a later binding of a name shadows an earlier one.
 */
export const patToInfoMap = (pat: Pat, state: PatState): PatResult => {
  if (pat.kind === "invalid") {
    recordInvalid(state, "pat", pat);
    return { ty: unknownTyp(), ctx: state.ctx };
  }

  const { self, ctx } = derivePat(pat, state);
  const status = statusOf(state.ctx, state.mode, self);
  const ty = fixedTyp(state.mode, status);
  addInfo(state.infos, pat.ids, {
    kind: "pat",
    cls: clsOf("pat", pat.kind),
    term: pat,
    ancestors: state.ancestors,
    ctx,
    mode: eraseMode(state.mode),
    self: eraseSelf(self),
    coCtx: state.coCtx,
    status: eraseStatus(status),
    ty: eraseSynSwitch(ty),
  });
  return { ty, ctx };
};

/** The constructor tag of a pattern in function position, if it is one. */
const ctrName = (pat: Pat): string | undefined =>
  pat.kind === "constructor" ? pat.tag : undefined;

const derivePat = (pat: Exclude<Pat, { kind: "invalid" }>, state: PatState): PatDerivation => {
  const inner = enter(state, pat);
  const atomic = (ty: Typ): PatDerivation => ({ self: just(ty), ctx: state.ctx });
  /** Checks `child` in `ctx`, so earlier siblings' bindings are visible. */
  const go = (child: Pat, mode: Mode, ctx: Ctx): PatResult =>
    patToInfoMap(child, { ...inner, ctx, mode, coCtx: state.coCtx });

  switch (pat.kind) {
    case "empty-hole":
      return atomic(unknownTyp());
    case "multi-hole":
      multiToInfoMap(pat.children, inner);
      return { self: multiSelf, ctx: state.ctx };
    case "wild":
      return atomic(unknownTyp("syn-switch"));
    case "int":
      return atomic(intTyp);
    case "float":
      return atomic(floatTyp);
    case "bool":
      return atomic(boolTyp);
    case "string":
      return atomic(stringTyp);
    case "unit":
      return atomic(unitTyp);
    case "constructor":
      return { self: ctrSelf(state.ctx, state.mode, pat.tag), ctx: state.ctx };
    case "var": {
      const bound = eraseSynSwitch(typAfterFix(state.ctx, state.mode, just(unknownTyp())));
      return {
        self: just(unknownTyp("syn-switch")),
        ctx: state.ctx.extendVar(pat.name, repId(pat), bound),
      };
    }
    case "list-lit": {
      const modes = ofListLit(state.ctx, pat.elements.length, state.mode);
      let ctx = state.ctx;
      const sources = pat.elements.map((element, index) => {
        const result = go(element, modes[index] ?? state.mode, ctx);
        ctx = result.ctx;
        return { id: repId(element), ty: result.ty };
      });
      return { self: joinSelf(state.ctx, "list", sources), ctx };
    }
    case "cons": {
      const head = go(pat.head, ofConsHead(state.ctx, state.mode), state.ctx);
      const tail = go(
        pat.tail,
        ofConsTail(state.ctx, state.mode, head.ty),
        head.ctx
      );
      return { self: just(listTyp(head.ty)), ctx: tail.ctx };
    }
    case "tuple": {
      const modes = ofProd(state.ctx, state.mode, pat.elements.length);
      let ctx = state.ctx;
      const tys = pat.elements.map((element, index) => {
        const result = go(element, modes[index] ?? state.mode, ctx);
        ctx = result.ctx;
        return result.ty;
      });
      return { self: just(prodTyp(tys)), ctx };
    }
    case "parens": {
      const body = go(pat.body, state.mode, state.ctx);
      return { self: just(body.ty), ctx: body.ctx };
    }
    case "ap": {
      const fn = go(pat.fn, ofAp(state.ctx, state.mode, ctrName(pat.fn)), state.ctx);
      const [input, output] = matchedArrow(state.ctx, fn.ty);
      const arg = go(pat.arg, anaMode(input), fn.ctx);
      return { self: just(output), ctx: arg.ctx };
    }
    case "type-ann": {
      const ann = typToInfoMap(pat.typ, inner);
      const body = go(pat.pat, anaMode(ann), state.ctx);
      return { self: just(ann), ctx: body.ctx };
    }
  }
};
