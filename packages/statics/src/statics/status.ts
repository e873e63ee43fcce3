import type { Ctx } from "../ctx/ctx.js";
import { isArrowConsistent, join, joinAll } from "../types/join.js";
import {
  arrowTyp,
  eraseSynSwitch,
  unknownTyp,
  type Typ,
} from "../types/typ.js";
import type { Mode } from "./mode.js";
import { applyWrap, type FreeKind, type Self, type Source } from "./self.js";

/** Every way a well-formed node can be in error. */
export type StaticsError =
  | { readonly kind: "free"; readonly free: FreeKind; readonly name: string }
  | { readonly kind: "syn-inconsistent-branches"; readonly sources: readonly Source[] }
  | { readonly kind: "type-inconsistent"; readonly syn: Typ; readonly ana: Typ }
  | { readonly kind: "inconsistent-with-arrow"; readonly ty: Typ }
  | { readonly kind: "duplicate-tag"; readonly tag: string }
  | { readonly kind: "bad-sum-entry" }
  | { readonly kind: "shadows-base-type"; readonly name: string }
  | { readonly kind: "not-a-name" };

export type StaticsErrorKind = StaticsError["kind"];

export type Ok =
  | { readonly kind: "syn"; readonly ty: Typ }
  | {
      readonly kind: "ana-consistent";
      readonly ana: Typ;
      readonly syn: Typ;
      readonly join: Typ;
    }
  /** Branches agree with each other but not with the expected type. */
  | { readonly kind: "ana-external-inconsistent"; readonly ana: Typ; readonly syn: Typ }
  /** Branches disagree among themselves; each is checked against `ana`. */
  | {
      readonly kind: "ana-internal-inconsistent";
      readonly ana: Typ;
      readonly sources: readonly Source[];
    };

/** Status of an expression or pattern. */
export type Status =
  | { readonly kind: "not-in-hole"; readonly ok: Ok }
  | { readonly kind: "in-hole"; readonly error: StaticsError };

/** Status of a type, type pattern or sum entry. */
export type TermStatus =
  | { readonly kind: "not-in-hole" }
  | { readonly kind: "in-hole"; readonly error: StaticsError };

export const notInHole = (ok: Ok): Status => ({ kind: "not-in-hole", ok });
export const inHole = (error: StaticsError): Status => ({ kind: "in-hole", error });

export const termOk: TermStatus = { kind: "not-in-hole" };
export const termError = (error: StaticsError): TermStatus => ({
  kind: "in-hole",
  error,
});

const checkSyn = (ctx: Ctx, mode: Mode, ty: Typ): Status => {
  if (mode.kind === "syn-fun" && !isArrowConsistent(ctx, ty)) {
    return inHole({ kind: "inconsistent-with-arrow", ty });
  }
  return notInHole({ kind: "syn", ty });
};

const checkAna = (ctx: Ctx, ana: Typ, syn: Typ): Status => {
  const joined = join(ctx, ana, syn);
  return joined
    ? notInHole({ kind: "ana-consistent", ana, syn, join: joined })
    : inHole({ kind: "type-inconsistent", syn, ana });
};

/** Classifies a node given what it is (`self`) and what is expected (`mode`). */
export const statusOf = (ctx: Ctx, mode: Mode, self: Self): Status => {
  switch (self.kind) {
    case "free":
      return inHole({ kind: "free", free: self.free, name: self.name });
    case "multi":
      return notInHole({ kind: "syn", ty: unknownTyp() });
    case "just":
      return mode.kind === "ana"
        ? checkAna(ctx, mode.ty, self.ty)
        : checkSyn(ctx, mode, self.ty);
    case "joined": {
      const joined = joinAll(
        ctx,
        self.sources.map((source) => source.ty)
      );
      if (mode.kind !== "ana") {
        return joined
          ? checkSyn(ctx, mode, applyWrap(self.wrap, joined))
          : inHole({ kind: "syn-inconsistent-branches", sources: self.sources });
      }
      if (!joined) {
        return notInHole({
          kind: "ana-internal-inconsistent",
          ana: mode.ty,
          sources: self.sources,
        });
      }
      const syn = applyWrap(self.wrap, joined);
      const outer = join(ctx, mode.ty, syn);
      return outer
        ? notInHole({ kind: "ana-consistent", ana: mode.ty, syn, join: outer })
        : notInHole({ kind: "ana-external-inconsistent", ana: mode.ty, syn });
    }
  }
};

/** The type a node contributes to its parent once errors are patched over. */
export const fixedTyp = (mode: Mode, status: Status): Typ => {
  if (status.kind === "in-hole") {
    return unknownTyp();
  }
  const { ok } = status;
  switch (ok.kind) {
    case "syn":
      return mode.kind === "syn-fun" && ok.ty.kind === "unknown"
        ? arrowTyp(unknownTyp("syn-switch"), unknownTyp("syn-switch"))
        : ok.ty;
    case "ana-consistent":
      return ok.join;
    case "ana-external-inconsistent":
    case "ana-internal-inconsistent":
      return ok.ana;
  }
};

export const typAfterFix = (ctx: Ctx, mode: Mode, self: Self): Typ =>
  fixedTyp(mode, statusOf(ctx, mode, self));

const eraseSources = (sources: readonly Source[]): Source[] =>
  sources.map(({ id, ty }) => ({ id, ty: eraseSynSwitch(ty) }));

const eraseError = (error: StaticsError): StaticsError => {
  switch (error.kind) {
    case "syn-inconsistent-branches":
      return { kind: error.kind, sources: eraseSources(error.sources) };
    case "type-inconsistent":
      return {
        kind: error.kind,
        syn: eraseSynSwitch(error.syn),
        ana: eraseSynSwitch(error.ana),
      };
    case "inconsistent-with-arrow":
      return { kind: error.kind, ty: eraseSynSwitch(error.ty) };
    default:
      return error;
  }
};

const eraseOk = (ok: Ok): Ok => {
  switch (ok.kind) {
    case "syn":
      return { kind: "syn", ty: eraseSynSwitch(ok.ty) };
    case "ana-consistent":
      return {
        kind: ok.kind,
        ana: eraseSynSwitch(ok.ana),
        syn: eraseSynSwitch(ok.syn),
        join: eraseSynSwitch(ok.join),
      };
    case "ana-external-inconsistent":
      return { kind: ok.kind, ana: eraseSynSwitch(ok.ana), syn: eraseSynSwitch(ok.syn) };
    case "ana-internal-inconsistent":
      return { kind: ok.kind, ana: eraseSynSwitch(ok.ana), sources: eraseSources(ok.sources) };
  }
};

export const eraseStatus = (status: Status): Status =>
  status.kind === "in-hole"
    ? inHole(eraseError(status.error))
    : notInHole(eraseOk(status.ok));
