import type { Id } from "../ids.js";
import type {
  AnyTerm,
  Exp,
  Pat,
  Rule,
  TPat,
  TypTerm,
  VariantTerm,
} from "./nodes.js";

export type TermVisitor = (ids: readonly Id[], sort: AnyTerm["sort"] | "variant") => void;

export const walkAny = (term: AnyTerm, onNode: TermVisitor): void => {
  switch (term.sort) {
    case "exp":
      return walkExp(term.term, onNode);
    case "pat":
      return walkPat(term.term, onNode);
    case "typ":
      return walkTyp(term.term, onNode);
    case "tpat":
      return walkTPat(term.term, onNode);
    case "rule":
      return walkRule(term.term, onNode);
    case "token":
      onNode(term.ids, "token");
      return;
  }
};

export const walkExp = (exp: Exp, onNode: TermVisitor): void => {
  onNode(exp.ids, "exp");
  const visit = (child: Exp) => walkExp(child, onNode);

  switch (exp.kind) {
    case "invalid":
    case "empty-hole":
    case "unit":
    case "bool":
    case "int":
    case "float":
    case "string":
    case "constructor":
    case "var":
      return;
    case "multi-hole":
      exp.children.forEach((child) => walkAny(child, onNode));
      return;
    case "list-lit":
    case "tuple":
      exp.elements.forEach(visit);
      return;
    case "fun":
      walkPat(exp.pat, onNode);
      visit(exp.body);
      return;
    case "let":
      walkPat(exp.pat, onNode);
      visit(exp.def);
      visit(exp.body);
      return;
    case "type-alias":
      walkTPat(exp.tpat, onNode);
      walkTyp(exp.def, onNode);
      visit(exp.body);
      return;
    case "ap":
      visit(exp.fn);
      visit(exp.arg);
      return;
    case "if":
      visit(exp.cond);
      visit(exp.then);
      visit(exp.else);
      return;
    case "seq":
      visit(exp.first);
      visit(exp.second);
      return;
    case "test":
    case "parens":
      visit(exp.body);
      return;
    case "cons":
      visit(exp.head);
      visit(exp.tail);
      return;
    case "list-concat":
    case "bin-op":
      visit(exp.left);
      visit(exp.right);
      return;
    case "un-op":
      visit(exp.operand);
      return;
    case "match":
      visit(exp.scrutinee);
      exp.rules.forEach((rule) => walkRule(rule, onNode));
      return;
  }
};

export const walkRule = (rule: Rule, onNode: TermVisitor): void => {
  onNode(rule.ids, "rule");
  walkPat(rule.pat, onNode);
  walkExp(rule.body, onNode);
};

export const walkPat = (pat: Pat, onNode: TermVisitor): void => {
  onNode(pat.ids, "pat");
  const visit = (child: Pat) => walkPat(child, onNode);

  switch (pat.kind) {
    case "invalid":
    case "empty-hole":
    case "wild":
    case "int":
    case "float":
    case "bool":
    case "string":
    case "unit":
    case "constructor":
    case "var":
      return;
    case "multi-hole":
      pat.children.forEach((child) => walkAny(child, onNode));
      return;
    case "list-lit":
    case "tuple":
      pat.elements.forEach(visit);
      return;
    case "cons":
      visit(pat.head);
      visit(pat.tail);
      return;
    case "parens":
      visit(pat.body);
      return;
    case "ap":
      visit(pat.fn);
      visit(pat.arg);
      return;
    case "type-ann":
      visit(pat.pat);
      walkTyp(pat.typ, onNode);
      return;
  }
};

export const walkTyp = (typ: TypTerm, onNode: TermVisitor): void => {
  onNode(typ.ids, "typ");
  const visit = (child: TypTerm) => walkTyp(child, onNode);

  switch (typ.kind) {
    case "invalid":
    case "empty-hole":
    case "int":
    case "float":
    case "bool":
    case "string":
    case "unit":
    case "var":
      return;
    case "multi-hole":
      typ.children.forEach((child) => walkAny(child, onNode));
      return;
    case "list":
      visit(typ.elem);
      return;
    case "arrow":
      visit(typ.input);
      visit(typ.output);
      return;
    case "tuple":
      typ.elements.forEach(visit);
      return;
    case "parens":
      visit(typ.body);
      return;
    case "sum":
      typ.variants.forEach((variant) => walkVariant(variant, onNode));
      return;
  }
};

export const walkVariant = (variant: VariantTerm, onNode: TermVisitor): void => {
  onNode(variant.ids, "variant");
  if (variant.kind === "variant") {
    if (variant.arg) {
      walkTyp(variant.arg, onNode);
    }
    return;
  }
  walkTyp(variant.typ, onNode);
};

export const walkTPat = (tpat: TPat, onNode: TermVisitor): void => {
  onNode(tpat.ids, "tpat");
  if (tpat.kind === "multi-hole") {
    tpat.children.forEach((child) => walkAny(child, onNode));
  }
};

/** Every id reachable from `exp`, in pre-order. */
export const termIds = (exp: Exp): Id[] => {
  const ids: Id[] = [];
  walkExp(exp, (nodeIds) => {
    ids.push(...nodeIds);
  });
  return ids;
};
