export { typeBinOpExp, typeUnOpExp, binOpSignature, unOpTyp } from "./operators.js";
export { typeParensExp, typeSeqExp, typeTestExp } from "./block.js";
export { typeApExp } from "./call.js";
export {
  typeConsExp,
  typeListConcatExp,
  typeListLitExp,
  typeTupleExp,
} from "./collections.js";
export { typeConstructorExp, typeVarExp } from "./identifier.js";
export { typeIfExp } from "./if.js";
export { typeFunExp } from "./lambda.js";
export { isRecursiveLet, typeLetExp } from "./let.js";
export { typeLiteralExp } from "./literal.js";
export { ruleToInfoMap, typeMatchExp, type RuleResult } from "./match.js";
export { typeTypeAliasExp } from "./type-alias.js";
