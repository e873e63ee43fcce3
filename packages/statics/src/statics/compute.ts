import { builtinCtx } from "../builtins.js";
import type { Ctx } from "../ctx/ctx.js";
import type { Id } from "../ids.js";
import type { Exp } from "../term/nodes.js";
import { expToInfoMap } from "./expressions.js";
import type { Info, InfoMap } from "./info.js";
import { synMode } from "./mode.js";

/**
 * Checks a whole program in synthesis mode and returns the info of every
 * node, keyed by each of the node's ids.
 */
export const computeInfoMap = (exp: Exp, ctx: Ctx = builtinCtx): InfoMap => {
  const infos = new Map<Id, Info>();
  expToInfoMap(exp, { ctx, mode: synMode, ancestors: [], infos });
  return infos;
};
