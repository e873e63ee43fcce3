import { unionCoCtx } from "../../ctx/co-ctx.js";
import type { BinOp, ExpBinOp, ExpUnOp, UnOp } from "../../term/nodes.js";
import {
  boolTyp,
  floatTyp,
  intTyp,
  stringTyp,
  type Typ,
} from "../../types/typ.js";
import { expToInfoMap } from "../expressions.js";
import { anaMode } from "../mode.js";
import { just } from "../self.js";
import { enter, type ExpDerivation, type ExpState } from "../state.js";

/** Operand and result types of a binary operator. */
interface BinOpSignature {
  readonly left: Typ;
  readonly right: Typ;
  readonly result: Typ;
}

const signature = (operand: Typ, result: Typ): BinOpSignature => ({
  left: operand,
  right: operand,
  result,
});

export const binOpSignature = (op: BinOp): BinOpSignature => {
  switch (op) {
    case "&&":
    case "||":
      return signature(boolTyp, boolTyp);
    case "+":
    case "-":
    case "*":
    case "/":
    case "**":
      return signature(intTyp, intTyp);
    case "<":
    case ">":
    case "<=":
    case ">=":
    case "==":
    case "!=":
      return signature(intTyp, boolTyp);
    case "+.":
    case "-.":
    case "*.":
    case "/.":
    case "**.":
      return signature(floatTyp, floatTyp);
    case "<.":
    case ">.":
    case "<=.":
    case ">=.":
    case "==.":
    case "!=.":
      return signature(floatTyp, boolTyp);
    case "++":
      return signature(stringTyp, stringTyp);
    case "$==":
      return signature(stringTyp, boolTyp);
  }
};

/** Unary operators take and return the same type. */
export const unOpTyp = (op: UnOp): Typ => {
  switch (op) {
    case "-":
      return intTyp;
    case "-.":
      return floatTyp;
    case "!":
      return boolTyp;
  }
};

export const typeUnOpExp = (exp: ExpUnOp, state: ExpState): ExpDerivation => {
  const ty = unOpTyp(exp.op);
  const operand = expToInfoMap(exp.operand, { ...enter(state, exp), mode: anaMode(ty) });
  return { self: just(ty), coCtx: operand.coCtx };
};

export const typeBinOpExp = (exp: ExpBinOp, state: ExpState): ExpDerivation => {
  const { left, right, result } = binOpSignature(exp.op);
  const inner = enter(state, exp);
  const l = expToInfoMap(exp.left, { ...inner, mode: anaMode(left) });
  const r = expToInfoMap(exp.right, { ...inner, mode: anaMode(right) });
  return { self: just(result), coCtx: unionCoCtx([l.coCtx, r.coCtx]) };
};
