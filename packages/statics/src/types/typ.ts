/**
 * Semantic types.
 *
 * `unknown` comes in two flavors: `internal` marks a genuine gap (a hole, an
 * error recovery point) while `syn-switch` only redirects an analytic
 * position to synthesis. The latter never escapes the traversal; see
 * {@link eraseSynSwitch}.
 */
export type UnknownFlavor = "internal" | "syn-switch";

export interface SumVariant {
  readonly tag: string;
  readonly arg?: Typ;
}

export type Typ =
  | { readonly kind: "int" }
  | { readonly kind: "float" }
  | { readonly kind: "bool" }
  | { readonly kind: "string" }
  | { readonly kind: "unknown"; readonly flavor: UnknownFlavor }
  | { readonly kind: "arrow"; readonly input: Typ; readonly output: Typ }
  | { readonly kind: "prod"; readonly elements: readonly Typ[] }
  | { readonly kind: "list"; readonly elem: Typ }
  | { readonly kind: "var"; readonly name: string }
  | { readonly kind: "rec"; readonly name: string; readonly body: Typ }
  | { readonly kind: "sum"; readonly variants: readonly SumVariant[] };

export type TypKind = Typ["kind"];

export const intTyp: Typ = { kind: "int" };
export const floatTyp: Typ = { kind: "float" };
export const boolTyp: Typ = { kind: "bool" };
export const stringTyp: Typ = { kind: "string" };
export const unitTyp: Typ = { kind: "prod", elements: [] };

export const unknownTyp = (flavor: UnknownFlavor = "internal"): Typ => ({
  kind: "unknown",
  flavor,
});

export const arrowTyp = (input: Typ, output: Typ): Typ => ({
  kind: "arrow",
  input,
  output,
});

export const prodTyp = (elements: readonly Typ[]): Typ => ({
  kind: "prod",
  elements,
});

export const listTyp = (elem: Typ): Typ => ({ kind: "list", elem });

export const varTyp = (name: string): Typ => ({ kind: "var", name });

export const recTyp = (name: string, body: Typ): Typ => ({
  kind: "rec",
  name,
  body,
});

export const sumTyp = (variants: readonly SumVariant[]): Typ => ({
  kind: "sum",
  variants,
});

export const isUnknown = (
  ty: Typ
): ty is Extract<Typ, { kind: "unknown" }> => ty.kind === "unknown";

export const isSynSwitch = (ty: Typ): boolean =>
  ty.kind === "unknown" && ty.flavor === "syn-switch";

/** The base type named by an identifier, if it is one of the built-in names. */
export const baseTypByName = (name: string): Typ | undefined => {
  switch (name) {
    case "Int":
      return intTyp;
    case "Float":
      return floatTyp;
    case "Bool":
      return boolTyp;
    case "String":
      return stringTyp;
    case "Unit":
      return unitTyp;
    default:
      return undefined;
  }
};

export const isBaseTypName = (name: string): boolean =>
  baseTypByName(name) !== undefined;

const mapVariants = (
  variants: readonly SumVariant[],
  f: (ty: Typ) => Typ
): SumVariant[] =>
  variants.map((variant) =>
    variant.arg ? { tag: variant.tag, arg: f(variant.arg) } : { tag: variant.tag }
  );

export const freeTypeVars = (
  ty: Typ,
  bound: ReadonlySet<string> = new Set()
): string[] => {
  switch (ty.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
    case "unknown":
      return [];
    case "var":
      return bound.has(ty.name) ? [] : [ty.name];
    case "arrow":
      return [...freeTypeVars(ty.input, bound), ...freeTypeVars(ty.output, bound)];
    case "prod":
      return ty.elements.flatMap((element) => freeTypeVars(element, bound));
    case "list":
      return freeTypeVars(ty.elem, bound);
    case "rec":
      return freeTypeVars(ty.body, new Set([...bound, ty.name]));
    case "sum":
      return ty.variants.flatMap((variant) =>
        variant.arg ? freeTypeVars(variant.arg, bound) : []
      );
  }
};

export const occursFree = (name: string, ty: Typ): boolean =>
  freeTypeVars(ty).includes(name);

const freshName = (base: string, avoid: readonly Typ[]): string => {
  let candidate = `${base}'`;
  while (avoid.some((ty) => occursFree(candidate, ty))) {
    candidate = `${candidate}'`;
  }
  return candidate;
};

/** Capture-avoiding substitution of `replacement` for `name` in `ty`. */
export const subst = (replacement: Typ, name: string, ty: Typ): Typ => {
  const go = (inner: Typ): Typ => subst(replacement, name, inner);

  switch (ty.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
    case "unknown":
      return ty;
    case "var":
      return ty.name === name ? replacement : ty;
    case "arrow":
      return arrowTyp(go(ty.input), go(ty.output));
    case "prod":
      return prodTyp(ty.elements.map(go));
    case "list":
      return listTyp(go(ty.elem));
    case "sum":
      return sumTyp(mapVariants(ty.variants, go));
    case "rec": {
      if (ty.name === name) {
        return ty;
      }
      if (!occursFree(ty.name, replacement)) {
        return recTyp(ty.name, go(ty.body));
      }
      const renamed = freshName(ty.name, [replacement, ty.body]);
      const body = subst(varTyp(renamed), ty.name, ty.body);
      return recTyp(renamed, go(body));
    }
  }
};

/** One step of unrolling: `rec t. body` becomes `body[rec t. body / t]`. */
export const unroll = (ty: Extract<Typ, { kind: "rec" }>): Typ =>
  subst(ty, ty.name, ty.body);

const findVariant = (
  variants: readonly SumVariant[],
  tag: string
): SumVariant | undefined => variants.find((variant) => variant.tag === tag);

export const sameTags = (
  left: readonly SumVariant[],
  right: readonly SumVariant[]
): boolean =>
  left.length === right.length &&
  left.every((variant) => findVariant(right, variant.tag) !== undefined);

/** Alpha-equivalence. Sum variants compare without regard to order. */
export const typEq = (
  left: Typ,
  right: Typ,
  renaming: ReadonlyMap<string, string> = new Map()
): boolean => {
  const go = (a: Typ, b: Typ) => typEq(a, b, renaming);

  switch (left.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
      return right.kind === left.kind;
    case "unknown":
      return right.kind === "unknown";
    case "var": {
      if (right.kind !== "var") {
        return false;
      }
      const bound = renaming.get(left.name);
      if (bound !== undefined) {
        return bound === right.name;
      }
      return (
        left.name === right.name &&
        !Array.from(renaming.values()).includes(right.name)
      );
    }
    case "arrow":
      return right.kind === "arrow" && go(left.input, right.input) && go(left.output, right.output);
    case "prod":
      return (
        right.kind === "prod" &&
        left.elements.length === right.elements.length &&
        left.elements.every((element, index) => {
          const other = right.elements[index];
          return other !== undefined && go(element, other);
        })
      );
    case "list":
      return right.kind === "list" && go(left.elem, right.elem);
    case "rec": {
      if (right.kind !== "rec") {
        return false;
      }
      const next = new Map(renaming);
      next.set(left.name, right.name);
      return typEq(left.body, right.body, next);
    }
    case "sum":
      return (
        right.kind === "sum" &&
        sameTags(left.variants, right.variants) &&
        left.variants.every((variant) => {
          const other = findVariant(right.variants, variant.tag);
          if (!other) return false;
          if (!variant.arg || !other.arg) return !variant.arg && !other.arg;
          return go(variant.arg, other.arg);
        })
      );
  }
};

/** Replaces every `syn-switch` unknown with an `internal` one. */
export const eraseSynSwitch = (ty: Typ): Typ => {
  switch (ty.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
    case "var":
      return ty;
    case "unknown":
      return ty.flavor === "syn-switch" ? unknownTyp("internal") : ty;
    case "arrow":
      return arrowTyp(eraseSynSwitch(ty.input), eraseSynSwitch(ty.output));
    case "prod":
      return prodTyp(ty.elements.map(eraseSynSwitch));
    case "list":
      return listTyp(eraseSynSwitch(ty.elem));
    case "rec":
      return recTyp(ty.name, eraseSynSwitch(ty.body));
    case "sum":
      return sumTyp(mapVariants(ty.variants, eraseSynSwitch));
  }
};

export const containsSynSwitch = (ty: Typ): boolean => {
  switch (ty.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
    case "var":
      return false;
    case "unknown":
      return ty.flavor === "syn-switch";
    case "arrow":
      return containsSynSwitch(ty.input) || containsSynSwitch(ty.output);
    case "prod":
      return ty.elements.some(containsSynSwitch);
    case "list":
      return containsSynSwitch(ty.elem);
    case "rec":
      return containsSynSwitch(ty.body);
    case "sum":
      return ty.variants.some((variant) =>
        variant.arg ? containsSynSwitch(variant.arg) : false
      );
  }
};
