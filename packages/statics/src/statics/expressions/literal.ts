import { emptyCoCtx } from "../../ctx/co-ctx.js";
import type {
  ExpBool,
  ExpEmptyHole,
  ExpFloat,
  ExpInt,
  ExpString,
  ExpUnit,
} from "../../term/nodes.js";
import {
  boolTyp,
  floatTyp,
  intTyp,
  stringTyp,
  unitTyp,
  unknownTyp,
  type Typ,
} from "../../types/typ.js";
import { just } from "../self.js";
import type { ExpDerivation } from "../state.js";

type LiteralExp = ExpEmptyHole | ExpUnit | ExpBool | ExpInt | ExpFloat | ExpString;

const literalTyp = (exp: LiteralExp): Typ => {
  switch (exp.kind) {
    case "empty-hole":
      return unknownTyp();
    case "unit":
      return unitTyp;
    case "bool":
      return boolTyp;
    case "int":
      return intTyp;
    case "float":
      return floatTyp;
    case "string":
      return stringTyp;
  }
};

export const typeLiteralExp = (exp: LiteralExp): ExpDerivation => ({
  self: just(literalTyp(exp)),
  coCtx: emptyCoCtx,
});
