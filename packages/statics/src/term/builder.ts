import type { Id } from "../ids.js";
import type {
  AnyTerm,
  BadEntry,
  BinOp,
  Exp,
  Pat,
  Rule,
  TPat,
  TypTerm,
  UnOp,
  Variant,
  VariantTerm,
} from "./nodes.js";

export interface TermBuilderOptions {
  /** Prepended to every generated id. */
  prefix?: string;
}

/**
 * Builds terms with fresh ids. Multi-token forms receive one id per
 * delimiter token (e.g. `let`, `=` and `in`), mirroring how an editor fans a
 * single node out across its tokens.
 */
export const createTermBuilder = ({ prefix = "" }: TermBuilderOptions = {}) => {
  let nextId = 1;
  const ids = (count = 1): Id[] =>
    Array.from({ length: Math.max(1, count) }, () => `${prefix}${nextId++}`);
  const separators = (elements: readonly unknown[]): Id[] =>
    ids(elements.length - 1);

  const exp = {
    invalid: (text: string): Exp => ({ kind: "invalid", ids: ids(), text }),
    hole: (): Exp => ({ kind: "empty-hole", ids: ids() }),
    multi: (children: readonly AnyTerm[]): Exp => ({
      kind: "multi-hole",
      ids: separators(children),
      children,
    }),
    unit: (): Exp => ({ kind: "unit", ids: ids() }),
    bool: (value: boolean): Exp => ({ kind: "bool", ids: ids(), value }),
    int: (value: number): Exp => ({ kind: "int", ids: ids(), value }),
    float: (value: number): Exp => ({ kind: "float", ids: ids(), value }),
    string: (value: string): Exp => ({ kind: "string", ids: ids(), value }),
    list: (elements: readonly Exp[]): Exp => ({
      kind: "list-lit",
      ids: ids(2),
      elements,
    }),
    ctr: (tag: string): Exp => ({ kind: "constructor", ids: ids(), tag }),
    fun: (pat: Pat, body: Exp): Exp => ({ kind: "fun", ids: ids(2), pat, body }),
    tuple: (elements: readonly Exp[]): Exp => ({
      kind: "tuple",
      ids: separators(elements),
      elements,
    }),
    var: (name: string): Exp => ({ kind: "var", ids: ids(), name }),
    let: (pat: Pat, def: Exp, body: Exp): Exp => ({
      kind: "let",
      ids: ids(3),
      pat,
      def,
      body,
    }),
    typeAlias: (tpat: TPat, def: TypTerm, body: Exp): Exp => ({
      kind: "type-alias",
      ids: ids(3),
      tpat,
      def,
      body,
    }),
    ap: (fn: Exp, arg: Exp): Exp => ({ kind: "ap", ids: ids(2), fn, arg }),
    if: (cond: Exp, then: Exp, otherwise: Exp): Exp => ({
      kind: "if",
      ids: ids(3),
      cond,
      then,
      else: otherwise,
    }),
    seq: (first: Exp, second: Exp): Exp => ({
      kind: "seq",
      ids: ids(),
      first,
      second,
    }),
    test: (body: Exp): Exp => ({ kind: "test", ids: ids(2), body }),
    parens: (body: Exp): Exp => ({ kind: "parens", ids: ids(2), body }),
    cons: (head: Exp, tail: Exp): Exp => ({
      kind: "cons",
      ids: ids(),
      head,
      tail,
    }),
    concat: (left: Exp, right: Exp): Exp => ({
      kind: "list-concat",
      ids: ids(),
      left,
      right,
    }),
    unOp: (op: UnOp, operand: Exp): Exp => ({
      kind: "un-op",
      ids: ids(),
      op,
      operand,
    }),
    binOp: (op: BinOp, left: Exp, right: Exp): Exp => ({
      kind: "bin-op",
      ids: ids(),
      op,
      left,
      right,
    }),
    match: (scrutinee: Exp, rules: readonly Rule[]): Exp => ({
      kind: "match",
      ids: ids(2),
      scrutinee,
      rules,
    }),
  };

  const rule = (pat: Pat, body: Exp): Rule => ({
    kind: "rule",
    ids: ids(2),
    pat,
    body,
  });

  const pat = {
    invalid: (text: string): Pat => ({ kind: "invalid", ids: ids(), text }),
    hole: (): Pat => ({ kind: "empty-hole", ids: ids() }),
    multi: (children: readonly AnyTerm[]): Pat => ({
      kind: "multi-hole",
      ids: separators(children),
      children,
    }),
    wild: (): Pat => ({ kind: "wild", ids: ids() }),
    int: (value: number): Pat => ({ kind: "int", ids: ids(), value }),
    float: (value: number): Pat => ({ kind: "float", ids: ids(), value }),
    bool: (value: boolean): Pat => ({ kind: "bool", ids: ids(), value }),
    string: (value: string): Pat => ({ kind: "string", ids: ids(), value }),
    unit: (): Pat => ({ kind: "unit", ids: ids() }),
    list: (elements: readonly Pat[]): Pat => ({
      kind: "list-lit",
      ids: ids(2),
      elements,
    }),
    ctr: (tag: string): Pat => ({ kind: "constructor", ids: ids(), tag }),
    cons: (head: Pat, tail: Pat): Pat => ({
      kind: "cons",
      ids: ids(),
      head,
      tail,
    }),
    var: (name: string): Pat => ({ kind: "var", ids: ids(), name }),
    tuple: (elements: readonly Pat[]): Pat => ({
      kind: "tuple",
      ids: separators(elements),
      elements,
    }),
    parens: (body: Pat): Pat => ({ kind: "parens", ids: ids(2), body }),
    ap: (fn: Pat, arg: Pat): Pat => ({ kind: "ap", ids: ids(2), fn, arg }),
    ann: (inner: Pat, typ: TypTerm): Pat => ({
      kind: "type-ann",
      ids: ids(),
      pat: inner,
      typ,
    }),
  };

  const typ = {
    invalid: (text: string): TypTerm => ({ kind: "invalid", ids: ids(), text }),
    hole: (): TypTerm => ({ kind: "empty-hole", ids: ids() }),
    multi: (children: readonly AnyTerm[]): TypTerm => ({
      kind: "multi-hole",
      ids: separators(children),
      children,
    }),
    int: (): TypTerm => ({ kind: "int", ids: ids() }),
    float: (): TypTerm => ({ kind: "float", ids: ids() }),
    bool: (): TypTerm => ({ kind: "bool", ids: ids() }),
    string: (): TypTerm => ({ kind: "string", ids: ids() }),
    unit: (): TypTerm => ({ kind: "unit", ids: ids() }),
    list: (elem: TypTerm): TypTerm => ({ kind: "list", ids: ids(2), elem }),
    var: (name: string): TypTerm => ({ kind: "var", ids: ids(), name }),
    arrow: (input: TypTerm, output: TypTerm): TypTerm => ({
      kind: "arrow",
      ids: ids(),
      input,
      output,
    }),
    tuple: (elements: readonly TypTerm[]): TypTerm => ({
      kind: "tuple",
      ids: separators(elements),
      elements,
    }),
    parens: (body: TypTerm): TypTerm => ({ kind: "parens", ids: ids(2), body }),
    sum: (variants: readonly VariantTerm[]): TypTerm => ({
      kind: "sum",
      ids: separators(variants),
      variants,
    }),
  };

  const variant = (tag: string, arg?: TypTerm): Variant =>
    arg
      ? { kind: "variant", ids: ids(), tag, arg }
      : { kind: "variant", ids: ids(), tag };

  const badEntry = (entry: TypTerm): BadEntry => ({
    kind: "bad-entry",
    ids: ids(),
    typ: entry,
  });

  const tpat = {
    invalid: (text: string): TPat => ({ kind: "invalid", ids: ids(), text }),
    hole: (): TPat => ({ kind: "empty-hole", ids: ids() }),
    multi: (children: readonly AnyTerm[]): TPat => ({
      kind: "multi-hole",
      ids: separators(children),
      children,
    }),
    var: (name: string): TPat => ({ kind: "var", ids: ids(), name }),
  };

  const any = {
    exp: (term: Exp): AnyTerm => ({ sort: "exp", term }),
    pat: (term: Pat): AnyTerm => ({ sort: "pat", term }),
    typ: (term: TypTerm): AnyTerm => ({ sort: "typ", term }),
    tpat: (term: TPat): AnyTerm => ({ sort: "tpat", term }),
    rule: (term: Rule): AnyTerm => ({ sort: "rule", term }),
    token: (text: string): AnyTerm => ({ sort: "token", ids: ids(), text }),
  };

  return { exp, pat, typ, tpat, rule, variant, badEntry, any, ids };
};

export type TermBuilder = ReturnType<typeof createTermBuilder>;
