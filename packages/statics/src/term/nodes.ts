import type { Id } from "../ids.js";

interface TermNode<K extends string> {
  readonly kind: K;
  /** Every token of the form. The first id is the representative one. */
  readonly ids: readonly Id[];
}

export type IntBinOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "**"
  | "<"
  | ">"
  | "<="
  | ">="
  | "=="
  | "!=";

export type FloatBinOp =
  | "+."
  | "-."
  | "*."
  | "/."
  | "**."
  | "<."
  | ">."
  | "<=."
  | ">=."
  | "==."
  | "!=.";

export type BoolBinOp = "&&" | "||";

export type StringBinOp = "++" | "$==";

export type BinOp = IntBinOp | FloatBinOp | BoolBinOp | StringBinOp;

export type UnOp = "-" | "-." | "!";

/* Expressions */

export interface ExpInvalid extends TermNode<"invalid"> {
  readonly text: string;
}
export type ExpEmptyHole = TermNode<"empty-hole">;
export interface ExpMultiHole extends TermNode<"multi-hole"> {
  readonly children: readonly AnyTerm[];
}
export type ExpUnit = TermNode<"unit">;
export interface ExpBool extends TermNode<"bool"> {
  readonly value: boolean;
}
export interface ExpInt extends TermNode<"int"> {
  readonly value: number;
}
export interface ExpFloat extends TermNode<"float"> {
  readonly value: number;
}
export interface ExpString extends TermNode<"string"> {
  readonly value: string;
}
export interface ExpListLit extends TermNode<"list-lit"> {
  readonly elements: readonly Exp[];
}
export interface ExpConstructor extends TermNode<"constructor"> {
  readonly tag: string;
}
export interface ExpFun extends TermNode<"fun"> {
  readonly pat: Pat;
  readonly body: Exp;
}
export interface ExpTuple extends TermNode<"tuple"> {
  readonly elements: readonly Exp[];
}
export interface ExpVar extends TermNode<"var"> {
  readonly name: string;
}
export interface ExpLet extends TermNode<"let"> {
  readonly pat: Pat;
  readonly def: Exp;
  readonly body: Exp;
}
export interface ExpTypeAlias extends TermNode<"type-alias"> {
  readonly tpat: TPat;
  readonly def: TypTerm;
  readonly body: Exp;
}
export interface ExpAp extends TermNode<"ap"> {
  readonly fn: Exp;
  readonly arg: Exp;
}
export interface ExpIf extends TermNode<"if"> {
  readonly cond: Exp;
  readonly then: Exp;
  readonly else: Exp;
}
export interface ExpSeq extends TermNode<"seq"> {
  readonly first: Exp;
  readonly second: Exp;
}
export interface ExpTest extends TermNode<"test"> {
  readonly body: Exp;
}
export interface ExpParens extends TermNode<"parens"> {
  readonly body: Exp;
}
export interface ExpCons extends TermNode<"cons"> {
  readonly head: Exp;
  readonly tail: Exp;
}
export interface ExpListConcat extends TermNode<"list-concat"> {
  readonly left: Exp;
  readonly right: Exp;
}
export interface ExpUnOp extends TermNode<"un-op"> {
  readonly op: UnOp;
  readonly operand: Exp;
}
export interface ExpBinOp extends TermNode<"bin-op"> {
  readonly op: BinOp;
  readonly left: Exp;
  readonly right: Exp;
}
export interface ExpMatch extends TermNode<"match"> {
  readonly scrutinee: Exp;
  readonly rules: readonly Rule[];
}

export type Exp =
  | ExpInvalid
  | ExpEmptyHole
  | ExpMultiHole
  | ExpUnit
  | ExpBool
  | ExpInt
  | ExpFloat
  | ExpString
  | ExpListLit
  | ExpConstructor
  | ExpFun
  | ExpTuple
  | ExpVar
  | ExpLet
  | ExpTypeAlias
  | ExpAp
  | ExpIf
  | ExpSeq
  | ExpTest
  | ExpParens
  | ExpCons
  | ExpListConcat
  | ExpUnOp
  | ExpBinOp
  | ExpMatch;

/** One `| pat => body` arm of a match. */
export interface Rule extends TermNode<"rule"> {
  readonly pat: Pat;
  readonly body: Exp;
}

/* Patterns */

export interface PatInvalid extends TermNode<"invalid"> {
  readonly text: string;
}
export type PatEmptyHole = TermNode<"empty-hole">;
export interface PatMultiHole extends TermNode<"multi-hole"> {
  readonly children: readonly AnyTerm[];
}
export type PatWild = TermNode<"wild">;
export interface PatInt extends TermNode<"int"> {
  readonly value: number;
}
export interface PatFloat extends TermNode<"float"> {
  readonly value: number;
}
export interface PatBool extends TermNode<"bool"> {
  readonly value: boolean;
}
export interface PatString extends TermNode<"string"> {
  readonly value: string;
}
export type PatUnit = TermNode<"unit">;
export interface PatListLit extends TermNode<"list-lit"> {
  readonly elements: readonly Pat[];
}
export interface PatConstructor extends TermNode<"constructor"> {
  readonly tag: string;
}
export interface PatCons extends TermNode<"cons"> {
  readonly head: Pat;
  readonly tail: Pat;
}
export interface PatVar extends TermNode<"var"> {
  readonly name: string;
}
export interface PatTuple extends TermNode<"tuple"> {
  readonly elements: readonly Pat[];
}
export interface PatParens extends TermNode<"parens"> {
  readonly body: Pat;
}
export interface PatAp extends TermNode<"ap"> {
  readonly fn: Pat;
  readonly arg: Pat;
}
export interface PatTypeAnn extends TermNode<"type-ann"> {
  readonly pat: Pat;
  readonly typ: TypTerm;
}

export type Pat =
  | PatInvalid
  | PatEmptyHole
  | PatMultiHole
  | PatWild
  | PatInt
  | PatFloat
  | PatBool
  | PatString
  | PatUnit
  | PatListLit
  | PatConstructor
  | PatCons
  | PatVar
  | PatTuple
  | PatParens
  | PatAp
  | PatTypeAnn;

/* Surface types */

export interface TypInvalid extends TermNode<"invalid"> {
  readonly text: string;
}
export type TypEmptyHole = TermNode<"empty-hole">;
export interface TypMultiHole extends TermNode<"multi-hole"> {
  readonly children: readonly AnyTerm[];
}
export type TypInt = TermNode<"int">;
export type TypFloat = TermNode<"float">;
export type TypBool = TermNode<"bool">;
export type TypString = TermNode<"string">;
export type TypUnit = TermNode<"unit">;
export interface TypList extends TermNode<"list"> {
  readonly elem: TypTerm;
}
export interface TypVar extends TermNode<"var"> {
  readonly name: string;
}
export interface TypArrow extends TermNode<"arrow"> {
  readonly input: TypTerm;
  readonly output: TypTerm;
}
export interface TypTuple extends TermNode<"tuple"> {
  readonly elements: readonly TypTerm[];
}
export interface TypParens extends TermNode<"parens"> {
  readonly body: TypTerm;
}
export interface TypSum extends TermNode<"sum"> {
  readonly variants: readonly VariantTerm[];
}

export type TypTerm =
  | TypInvalid
  | TypEmptyHole
  | TypMultiHole
  | TypInt
  | TypFloat
  | TypBool
  | TypString
  | TypUnit
  | TypList
  | TypVar
  | TypArrow
  | TypTuple
  | TypParens
  | TypSum;

/* Sum definition entries */

export interface Variant extends TermNode<"variant"> {
  readonly tag: string;
  readonly arg?: TypTerm;
}
export interface BadEntry extends TermNode<"bad-entry"> {
  readonly typ: TypTerm;
}

export type VariantTerm = Variant | BadEntry;

/* Type patterns */

export interface TPatInvalid extends TermNode<"invalid"> {
  readonly text: string;
}
export type TPatEmptyHole = TermNode<"empty-hole">;
export interface TPatMultiHole extends TermNode<"multi-hole"> {
  readonly children: readonly AnyTerm[];
}
export interface TPatVar extends TermNode<"var"> {
  readonly name: string;
}

export type TPat = TPatInvalid | TPatEmptyHole | TPatMultiHole | TPatVar;

/** A child of a multi-hole, tagged with its sort. */
export type AnyTerm =
  | { readonly sort: "exp"; readonly term: Exp }
  | { readonly sort: "pat"; readonly term: Pat }
  | { readonly sort: "typ"; readonly term: TypTerm }
  | { readonly sort: "tpat"; readonly term: TPat }
  | { readonly sort: "rule"; readonly term: Rule }
  | { readonly sort: "token"; readonly ids: readonly Id[]; readonly text: string };

export type Sort = "exp" | "pat" | "typ" | "tpat" | "rule" | "variant";
