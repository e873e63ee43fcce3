import { emptyCoCtx, unionCoCtx, type CoCtx } from "../ctx/co-ctx.js";
import type { Id } from "../ids.js";
import type { AnyTerm, Sort } from "../term/nodes.js";
import { unknownTyp } from "../types/typ.js";
import { expToInfoMap } from "./expressions.js";
import { ruleToInfoMap } from "./expressions/index.js";
import { addInfo } from "./info.js";
import { synMode } from "./mode.js";
import { patToInfoMap } from "./patterns.js";
import { clsOf, type StaticsState } from "./state.js";
import { tpatToInfoMap, typToInfoMap } from "./typ-terms.js";

export const recordInvalid = (
  state: StaticsState,
  sort: Sort | "token",
  term: { readonly ids: readonly Id[]; readonly text: string }
): void => {
  addInfo(state.infos, term.ids, {
    kind: "invalid",
    cls: clsOf(sort, "invalid"),
    sort,
    term,
    ancestors: state.ancestors,
    ctx: state.ctx,
  });
};

/**
 * Checks the pieces of a multi-hole independently, each in synthesis and in
 * the enclosing context. Returns the free variable uses of the pieces.
 */
export const multiToInfoMap = (
  children: readonly AnyTerm[],
  state: StaticsState
): CoCtx =>
  unionCoCtx(
    children.map((child): CoCtx => {
      switch (child.sort) {
        case "exp":
          return expToInfoMap(child.term, { ...state, mode: synMode }).coCtx;
        case "pat":
          patToInfoMap(child.term, { ...state, mode: synMode, coCtx: emptyCoCtx });
          return emptyCoCtx;
        case "typ":
          typToInfoMap(child.term, state);
          return emptyCoCtx;
        case "tpat":
          tpatToInfoMap(child.term, state);
          return emptyCoCtx;
        case "rule":
          return ruleToInfoMap(child.term, state, unknownTyp(), synMode).coCtx;
        case "token":
          recordInvalid(state, "token", child);
          return emptyCoCtx;
      }
    })
  );
