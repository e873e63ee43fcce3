export { StaticsInvariantError, repId, type Id } from "./ids.js";
export * from "./term/nodes.js";
export { createTermBuilder, type TermBuilder, type TermBuilderOptions } from "./term/builder.js";
export {
  TermDecodeError,
  decodeAny,
  decodeExp,
  decodePat,
  decodeRule,
  decodeTPat,
  decodeTyp,
  decodeVariant,
} from "./term/decode.js";
export { termKey } from "./term/key.js";
export { termIds, walkExp, type TermVisitor } from "./term/walk.js";

export * from "./types/typ.js";
export {
  consistent,
  isArrowConsistent,
  join,
  joinAll,
  matchedArrow,
  matchedList,
  matchedProd,
  sumVariants,
  weakHeadNormalize,
} from "./types/join.js";
export { formatTyp } from "./types/format.js";
export { decodeTypJson } from "./types/typ-json.js";

export {
  Ctx,
  type ConstructorEntry,
  type CtxEntry,
  type TVarEntry,
  type TVarKind,
  type VarEntry,
} from "./ctx/ctx.js";
export {
  emptyCoCtx,
  singletonCoCtx,
  unionCoCtx,
  usesOf,
  withoutBindings,
  type CoCtx,
  type CoCtxEntry,
} from "./ctx/co-ctx.js";

export * from "./statics/mode.js";
export * from "./statics/self.js";
export * from "./statics/status.js";
export * from "./statics/info.js";
export { computeInfoMap } from "./statics/compute.js";
export { binOpSignature, unOpTyp } from "./statics/expressions/index.js";

export { builtinCtx, builtinEntries } from "./builtins.js";
export {
  DEFAULT_CACHE_CAPACITY,
  StaticsCache,
  type StaticsCacheOptions,
} from "./cache.js";
export * from "./queries.js";
export * from "./serialize.js";
