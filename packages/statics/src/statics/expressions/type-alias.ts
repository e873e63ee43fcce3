import { repId } from "../../ids.js";
import type { ExpTypeAlias } from "../../term/nodes.js";
import { sumVariants } from "../../types/join.js";
import { occursFree, recTyp, subst } from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import { just } from "../self.js";
import {
  enter,
  provisional,
  type ExpDerivation,
  type ExpState,
} from "../state.js";
import { tpatToInfoMap, typToInfoMap } from "../typ-terms.js";

/**
 * `type name = def in body`. A definition that mentions its own name becomes
 * a recursive type. References to the alias resolve to its definition, so
 * types bound under it never mention the name. Sum variants are bound as
 * constructors of the definition in the body.
 */
export const typeTypeAliasExp = (
  exp: ExpTypeAlias,
  state: ExpState
): ExpDerivation => {
  const inner = enter(state, exp);
  const name = tpatToInfoMap(exp.tpat, inner);
  if (name === undefined) {
    const body = expToInfoMap(exp.body, { ...inner, mode: state.mode });
    typToInfoMap(exp.def, inner);
    return { self: just(body.ty), coCtx: body.coCtx };
  }

  const id = repId(exp.tpat);
  const unfolded = typToInfoMap(
    exp.def,
    provisional({ ...inner, ctx: state.ctx.extendAbstract(name, id) })
  );
  const recursive = occursFree(name, unfolded);
  const defTy = recursive ? recTyp(name, unfolded) : unfolded;
  const aliasCtx = state.ctx.extendAlias(name, id, defTy);
  const defCtx = recursive ? state.ctx.extendAbstract(name, id) : state.ctx;

  const variants = sumVariants(aliasCtx, defTy);
  const bodyCtx = variants
    ? aliasCtx.addTags(defTy, repId(exp.def), variants)
    : aliasCtx;
  const body = expToInfoMap(exp.body, { ...inner, ctx: bodyCtx, mode: state.mode });
  typToInfoMap(exp.def, { ...inner, ctx: defCtx });

  return { self: just(subst(defTy, name, body.ty)), coCtx: body.coCtx };
};
