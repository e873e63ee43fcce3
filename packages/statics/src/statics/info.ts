import type { CoCtx } from "../ctx/co-ctx.js";
import type { Ctx } from "../ctx/ctx.js";
import type { Id } from "../ids.js";
import type {
  Exp,
  Pat,
  Rule,
  Sort,
  TPat,
  TypTerm,
  VariantTerm,
} from "../term/nodes.js";
import type { Typ } from "../types/typ.js";
import type { Mode } from "./mode.js";
import type { Self } from "./self.js";
import type { Status, TermStatus } from "./status.js";

interface InfoBase {
  /** Syntactic class, `sort:kind`. */
  readonly cls: string;
  /** Representative ids of the enclosing nodes, innermost first. */
  readonly ancestors: readonly Id[];
  readonly ctx: Ctx;
}

/** An unparseable token or invalid node. */
export interface InfoInvalid extends InfoBase {
  readonly kind: "invalid";
  readonly sort: Sort | "token";
  readonly term: { readonly ids: readonly Id[]; readonly text: string };
}

export interface InfoExp extends InfoBase {
  readonly kind: "exp";
  readonly term: Exp;
  readonly mode: Mode;
  readonly self: Self;
  /** Free variable uses inside the expression. */
  readonly coCtx: CoCtx;
  readonly status: Status;
  /** The type after error fixing. */
  readonly ty: Typ;
}

export interface InfoPat extends InfoBase {
  readonly kind: "pat";
  readonly term: Pat;
  readonly mode: Mode;
  readonly self: Self;
  /** Uses of the pattern's bindings in their scope. */
  readonly coCtx: CoCtx;
  readonly status: Status;
  readonly ty: Typ;
}

export interface InfoTyp extends InfoBase {
  readonly kind: "typ";
  readonly term: TypTerm;
  readonly status: TermStatus;
  readonly ty: Typ;
}

export interface InfoRule extends InfoBase {
  readonly kind: "rule";
  readonly term: Rule;
}

export interface InfoTPat extends InfoBase {
  readonly kind: "tpat";
  readonly term: TPat;
  readonly status: TermStatus;
}

export interface InfoVariant extends InfoBase {
  readonly kind: "variant";
  readonly term: VariantTerm;
  readonly status: TermStatus;
}

export type Info =
  | InfoInvalid
  | InfoExp
  | InfoPat
  | InfoTyp
  | InfoRule
  | InfoTPat
  | InfoVariant;

export type InfoMap = ReadonlyMap<Id, Info>;

/** Whitespace-only text is layout, not a bad token. */
const isLayout = (text: string) => text.trim() === "";

export const isError = (info: Info): boolean => {
  switch (info.kind) {
    case "invalid":
      return !isLayout(info.term.text);
    case "rule":
      return false;
    case "exp":
    case "pat":
    case "typ":
    case "tpat":
    case "variant":
      return info.status.kind === "in-hole";
  }
};

/** Stores `info` under every id of its term. */
export const addInfo = (
  infos: Map<Id, Info>,
  ids: readonly Id[],
  info: Info
): void => {
  ids.forEach((id) => infos.set(id, info));
};
