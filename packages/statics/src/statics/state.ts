import type { CoCtx } from "../ctx/co-ctx.js";
import type { Ctx } from "../ctx/ctx.js";
import { repId, type Id } from "../ids.js";
import type { Typ } from "../types/typ.js";
import type { Info } from "./info.js";
import type { Mode } from "./mode.js";
import type { Self } from "./self.js";

/** What every traversal threads downward. */
export interface StaticsState {
  readonly ctx: Ctx;
  readonly ancestors: readonly Id[];
  /** Destination for infos. Provisional passes get a scratch map. */
  readonly infos: Map<Id, Info>;
}

export interface ExpState extends StaticsState {
  readonly mode: Mode;
}

export interface PatState extends ExpState {
  /** Uses, in the pattern's scope, of the variables it binds. */
  readonly coCtx: CoCtx;
}

/** What an expression form decides about itself before classification. */
export interface ExpDerivation {
  readonly self: Self;
  readonly coCtx: CoCtx;
}

export interface ExpResult {
  /** Fixed type, possibly still carrying `syn-switch` unknowns. */
  readonly ty: Typ;
  readonly coCtx: CoCtx;
}

export interface PatDerivation {
  readonly self: Self;
  /** Context after the pattern's bindings. */
  readonly ctx: Ctx;
}

export interface PatResult {
  readonly ty: Typ;
  readonly ctx: Ctx;
}

/** State for the children of `parent`. */
export const enter = (
  state: StaticsState,
  parent: { readonly ids: readonly Id[] },
  ctx: Ctx = state.ctx
): StaticsState => ({
  ctx,
  ancestors: [repId(parent), ...state.ancestors],
  infos: state.infos,
});

/** The same position, recorded into a throwaway map. */
export const provisional = <S extends StaticsState>(state: S): S => ({
  ...state,
  infos: new Map<Id, Info>(),
});

export const clsOf = (sort: string, kind: string): string => `${sort}:${kind}`;
