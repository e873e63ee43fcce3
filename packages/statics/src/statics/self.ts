import type { Ctx } from "../ctx/ctx.js";
import type { Id } from "../ids.js";
import { joinAll } from "../types/join.js";
import { eraseSynSwitch, listTyp, unknownTyp, type Typ } from "../types/typ.js";
import { ctrAnaTyp, type Mode } from "./mode.js";

export type FreeKind = "variable" | "tag" | "type-variable";

/** How a joined self re-embeds its branch join. Data, so infos serialize. */
export type Wrap = "none" | "list";

/** A branch that contributed to a joined self. */
export interface Source {
  readonly id: Id;
  readonly ty: Typ;
}

/** What a node's type is, judged without its mode. */
export type Self =
  | { readonly kind: "just"; readonly ty: Typ }
  | { readonly kind: "joined"; readonly wrap: Wrap; readonly sources: readonly Source[] }
  | { readonly kind: "multi" }
  | { readonly kind: "free"; readonly free: FreeKind; readonly name: string };

export const just = (ty: Typ): Self => ({ kind: "just", ty });

export const multiSelf: Self = { kind: "multi" };

export const freeSelf = (free: FreeKind, name: string): Self => ({
  kind: "free",
  free,
  name,
});

/** A constructor takes its type from the expected sum, then from `ctx`. */
export const ctrSelf = (ctx: Ctx, mode: Mode, tag: string): Self => {
  const expected = ctrAnaTyp(ctx, mode, tag);
  if (expected) {
    return just(expected);
  }
  const entry = ctx.lookupTag(tag);
  return entry ? just(entry.ty) : freeSelf("tag", tag);
};

export const applyWrap = (wrap: Wrap, ty: Typ): Typ =>
  wrap === "list" ? listTyp(ty) : ty;

/**
 * Self for a form whose type is the join of its branches. Consistent
 * branches collapse to `just`; otherwise the decision is deferred to the
 * status computation, which attributes the disagreement per branch.
 */
export const joinSelf = (
  ctx: Ctx,
  wrap: Wrap,
  sources: readonly Source[]
): Self => {
  if (sources.length === 0) {
    return just(applyWrap(wrap, unknownTyp()));
  }
  const joined = joinAll(
    ctx,
    sources.map((source) => source.ty)
  );
  return joined
    ? just(applyWrap(wrap, joined))
    : { kind: "joined", wrap, sources };
};

/** The self type as a single type: joins collapse, errors become unknown. */
export const selfTyp = (ctx: Ctx, self: Self): Typ => {
  switch (self.kind) {
    case "just":
      return self.ty;
    case "joined": {
      const joined = joinAll(
        ctx,
        self.sources.map((source) => source.ty)
      );
      return joined ? applyWrap(self.wrap, joined) : unknownTyp();
    }
    case "multi":
    case "free":
      return unknownTyp();
  }
};

export const eraseSelf = (self: Self): Self => {
  switch (self.kind) {
    case "just":
      return just(eraseSynSwitch(self.ty));
    case "joined":
      return {
        kind: "joined",
        wrap: self.wrap,
        sources: self.sources.map(({ id, ty }) => ({ id, ty: eraseSynSwitch(ty) })),
      };
    case "multi":
    case "free":
      return self;
  }
};
