import type { SumVariant, Typ } from "./typ.js";

/** Binding strength: sums and recursive types bind loosest. */
const precedence = (ty: Typ): number => {
  switch (ty.kind) {
    case "sum":
    case "rec":
      return 0;
    case "arrow":
      return 1;
    default:
      return 2;
  }
};

const formatVariant = (variant: SumVariant): string =>
  variant.arg ? `${variant.tag}(${formatTyp(variant.arg)})` : variant.tag;

/** Renders a type the way it would be written in a program. */
export const formatTyp = (ty: Typ): string => {
  const atLeast = (inner: Typ, min: number) =>
    precedence(inner) >= min ? formatTyp(inner) : `(${formatTyp(inner)})`;

  switch (ty.kind) {
    case "int":
      return "Int";
    case "float":
      return "Float";
    case "bool":
      return "Bool";
    case "string":
      return "String";
    case "unknown":
      return "?";
    case "var":
      return ty.name;
    case "list":
      return `[${formatTyp(ty.elem)}]`;
    case "prod":
      return ty.elements.length === 0
        ? "Unit"
        : `(${ty.elements.map(formatTyp).join(", ")})`;
    case "arrow":
      return `${atLeast(ty.input, 2)} -> ${atLeast(ty.output, 1)}`;
    case "rec":
      return `rec ${ty.name}. ${formatTyp(ty.body)}`;
    case "sum":
      return ty.variants.map(formatVariant).join(" + ");
  }
};
