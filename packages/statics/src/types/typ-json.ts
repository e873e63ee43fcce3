import { readArray, readObject, readString } from "../json.js";
import { TermDecodeError } from "../term/decode.js";
import {
  arrowTyp,
  boolTyp,
  floatTyp,
  intTyp,
  listTyp,
  prodTyp,
  recTyp,
  stringTyp,
  sumTyp,
  unknownTyp,
  varTyp,
  type SumVariant,
  type Typ,
} from "./typ.js";

const decodeVariant = (value: unknown, path: string): SumVariant => {
  const json = readObject(value, path);
  const tag = readString(json, "tag", path);
  return json.arg === undefined || json.arg === null
    ? { tag }
    : { tag, arg: decodeTypJson(json.arg, `${path}.arg`) };
};

/** Reads a {@link Typ} from its plain JSON shape. */
export const decodeTypJson = (value: unknown, path = "$"): Typ => {
  const json = readObject(value, path);
  const kind = readString(json, "kind", path);
  switch (kind) {
    case "int":
      return intTyp;
    case "float":
      return floatTyp;
    case "bool":
      return boolTyp;
    case "string":
      return stringTyp;
    case "unknown": {
      const flavor = json.flavor ?? "internal";
      if (flavor !== "internal" && flavor !== "syn-switch") {
        throw new TermDecodeError(`${path}.flavor`, "expected an unknown flavor");
      }
      return unknownTyp(flavor);
    }
    case "arrow":
      return arrowTyp(
        decodeTypJson(json.input, `${path}.input`),
        decodeTypJson(json.output, `${path}.output`)
      );
    case "prod":
      return prodTyp(
        readArray(json, "elements", path).map((element, index) =>
          decodeTypJson(element, `${path}.elements[${index}]`)
        )
      );
    case "list":
      return listTyp(decodeTypJson(json.elem, `${path}.elem`));
    case "var":
      return varTyp(readString(json, "name", path));
    case "rec":
      return recTyp(readString(json, "name", path), decodeTypJson(json.body, `${path}.body`));
    case "sum":
      return sumTyp(
        readArray(json, "variants", path).map((variant, index) =>
          decodeVariant(variant, `${path}.variants[${index}]`)
        )
      );
    default:
      throw new TermDecodeError(`${path}.kind`, `unknown type kind "${kind}"`);
  }
};
