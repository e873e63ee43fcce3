import type { Ctx } from "../ctx/ctx.js";
import {
  arrowTyp,
  listTyp,
  prodTyp,
  recTyp,
  sameTags,
  subst,
  sumTyp,
  typEq,
  unknownTyp,
  unroll,
  varTyp,
  type SumVariant,
  type Typ,
} from "./typ.js";

/** A rec type whose body is not itself a variable or rec unrolls productively. */
const isContractive = (ty: Extract<Typ, { kind: "rec" }>): boolean =>
  ty.body.kind !== "var" && ty.body.kind !== "rec";

/** Unfolds aliases and recursive types until the head is a type constructor. */
export const weakHeadNormalize = (ctx: Ctx, ty: Typ): Typ => {
  const seen = new Set<string>();
  let current = ty;
  for (;;) {
    if (current.kind === "var" && !seen.has(current.name)) {
      const alias = ctx.lookupAlias(current.name);
      if (!alias) return current;
      seen.add(current.name);
      current = alias;
      continue;
    }
    if (current.kind === "rec" && isContractive(current)) {
      return unroll(current);
    }
    return current;
  }
};

/** Alias names already being unfolded on the current join path. */
type Unfolding = ReadonlySet<string>;

const joinVariants = (
  ctx: Ctx,
  left: readonly SumVariant[],
  right: readonly SumVariant[],
  unfolding: Unfolding
): SumVariant[] | undefined => {
  if (!sameTags(left, right)) {
    return undefined;
  }
  const joined: SumVariant[] = [];
  for (const variant of left) {
    const other = right.find((candidate) => candidate.tag === variant.tag);
    if (!other) return undefined;
    if (!variant.arg || !other.arg) {
      if (variant.arg || other.arg) return undefined;
      joined.push({ tag: variant.tag });
      continue;
    }
    const arg = joinUnder(ctx, variant.arg, other.arg, unfolding);
    if (!arg) return undefined;
    joined.push({ tag: variant.tag, arg });
  }
  return joined;
};

const joinPairwise = (
  ctx: Ctx,
  left: readonly Typ[],
  right: readonly Typ[],
  unfolding: Unfolding
): Typ[] | undefined => {
  if (left.length !== right.length) {
    return undefined;
  }
  const joined: Typ[] = [];
  for (const [index, element] of left.entries()) {
    const other = right[index];
    const next = other && joinUnder(ctx, element, other, unfolding);
    if (!next) return undefined;
    joined.push(next);
  }
  return joined;
};

/** The alias `name` stands for, unless it is already being unfolded. */
const unfoldAlias = (ctx: Ctx, name: string, unfolding: Unfolding): Typ | undefined =>
  unfolding.has(name) ? undefined : ctx.lookupAlias(name);

const joinUnder = (
  ctx: Ctx,
  left: Typ,
  right: Typ,
  unfolding: Unfolding
): Typ | undefined => {
  if (left.kind === "unknown" && left.flavor === "internal") return right;
  if (right.kind === "unknown" && right.flavor === "internal") return left;
  if (left.kind === "unknown") return right;
  if (right.kind === "unknown") return left;

  if (left.kind === "var" && right.kind === "var") {
    if (left.name === right.name) return left;
    const leftAlias = unfoldAlias(ctx, left.name, unfolding);
    const rightAlias = unfoldAlias(ctx, right.name, unfolding);
    if (!leftAlias && !rightAlias) return undefined;
    const next = new Set(unfolding);
    if (leftAlias) next.add(left.name);
    if (rightAlias) next.add(right.name);
    const joined = joinUnder(ctx, leftAlias ?? left, rightAlias ?? right, next);
    if (!joined) return undefined;
    if (leftAlias && typEq(leftAlias, joined)) return left;
    if (rightAlias && typEq(rightAlias, joined)) return right;
    return joined;
  }

  if (left.kind === "var" || right.kind === "var") {
    const named = left.kind === "var" ? left : right;
    const other = left.kind === "var" ? right : left;
    if (named.kind !== "var") return undefined;
    const alias = unfoldAlias(ctx, named.name, unfolding);
    if (!alias) return undefined;
    const next = new Set(unfolding).add(named.name);
    const joined =
      left.kind === "var"
        ? joinUnder(ctx, alias, other, next)
        : joinUnder(ctx, other, alias, next);
    if (!joined) return undefined;
    return typEq(alias, joined) ? named : joined;
  }

  if (left.kind === "rec" && right.kind === "rec") {
    const inner = ctx.extendAbstract(left.name, "");
    const body = joinUnder(
      inner,
      left.body,
      subst(varTyp(left.name), right.name, right.body),
      unfolding
    );
    return body && recTyp(left.name, body);
  }

  if (left.kind === "rec" || right.kind === "rec") {
    const recursive = left.kind === "rec" ? left : right;
    if (recursive.kind !== "rec" || !isContractive(recursive)) return undefined;
    return left.kind === "rec"
      ? joinUnder(ctx, unroll(recursive), right, unfolding)
      : joinUnder(ctx, left, unroll(recursive), unfolding);
  }

  switch (left.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
      return right.kind === left.kind ? left : undefined;
    case "arrow": {
      if (right.kind !== "arrow") return undefined;
      const input = joinUnder(ctx, left.input, right.input, unfolding);
      const output = input && joinUnder(ctx, left.output, right.output, unfolding);
      return input && output ? arrowTyp(input, output) : undefined;
    }
    case "prod": {
      if (right.kind !== "prod") return undefined;
      const elements = joinPairwise(ctx, left.elements, right.elements, unfolding);
      return elements && prodTyp(elements);
    }
    case "list": {
      if (right.kind !== "list") return undefined;
      const elem = joinUnder(ctx, left.elem, right.elem, unfolding);
      return elem && listTyp(elem);
    }
    case "sum": {
      if (right.kind !== "sum") return undefined;
      const variants = joinVariants(ctx, left.variants, right.variants, unfolding);
      return variants && sumTyp(variants);
    }
  }
};

/**
 * The most specific type consistent with both arguments, or `undefined` when
 * they are inconsistent. `unknown` is a wildcard on either side; aliases and
 * recursive types bound in `ctx` are unfolded as needed, and alias names are
 * kept in the result when the join does not refine them. An alias met again
 * while it is being unfolded stays opaque.
 */
export const join = (ctx: Ctx, left: Typ, right: Typ): Typ | undefined =>
  joinUnder(ctx, left, right, new Set());

export const consistent = (ctx: Ctx, left: Typ, right: Typ): boolean =>
  join(ctx, left, right) !== undefined;

/** Folds {@link join} over `tys`. An empty sequence has no join. */
export const joinAll = (ctx: Ctx, tys: readonly Typ[]): Typ | undefined => {
  const [first, ...rest] = tys;
  if (!first) {
    return undefined;
  }
  let acc: Typ = first;
  for (const ty of rest) {
    const next = join(ctx, acc, ty);
    if (!next) return undefined;
    acc = next;
  }
  return acc;
};

/** Unknown of the same flavor as `ty` when it is unknown, else internal. */
const unknownLike = (ty: Typ): Typ =>
  ty.kind === "unknown" ? unknownTyp(ty.flavor) : unknownTyp();

export const matchedArrow = (ctx: Ctx, ty: Typ): [Typ, Typ] => {
  const normalized = weakHeadNormalize(ctx, ty);
  return normalized.kind === "arrow"
    ? [normalized.input, normalized.output]
    : [unknownLike(normalized), unknownLike(normalized)];
};

export const matchedList = (ctx: Ctx, ty: Typ): Typ => {
  const normalized = weakHeadNormalize(ctx, ty);
  return normalized.kind === "list" ? normalized.elem : unknownLike(normalized);
};

export const matchedProd = (ctx: Ctx, length: number, ty: Typ): Typ[] => {
  const normalized = weakHeadNormalize(ctx, ty);
  if (normalized.kind === "prod" && normalized.elements.length === length) {
    return [...normalized.elements];
  }
  return Array.from({ length }, () => unknownLike(normalized));
};

export const sumVariants = (ctx: Ctx, ty: Typ): readonly SumVariant[] | undefined => {
  const normalized = weakHeadNormalize(ctx, ty);
  return normalized.kind === "sum" ? normalized.variants : undefined;
};

export const isArrowConsistent = (ctx: Ctx, ty: Typ): boolean =>
  consistent(ctx, ty, arrowTyp(unknownTyp(), unknownTyp()));
