import { usesOf } from "./ctx/co-ctx.js";
import type { Ctx } from "./ctx/ctx.js";
import { repId, StaticsInvariantError, type Id } from "./ids.js";
import type { Info, InfoExp, InfoMap, InfoPat } from "./statics/info.js";
import type { Mode } from "./statics/mode.js";
import { selfTyp } from "./statics/self.js";
import type { Typ } from "./types/typ.js";

/** The info for `id`, which the caller knows to be in the map. */
export const lookupInfo = (map: InfoMap, id: Id): Info => {
  const info = map.get(id);
  if (!info) {
    throw new StaticsInvariantError(`no info recorded for id ${id}`);
  }
  return info;
};

const expInfo = (map: InfoMap, id: Id): InfoExp | undefined => {
  const info = map.get(id);
  return info?.kind === "exp" ? info : undefined;
};

const patInfo = (map: InfoMap, id: Id): InfoPat | undefined => {
  const info = map.get(id);
  return info?.kind === "pat" ? info : undefined;
};

export const expTypeAfterFix = (map: InfoMap, id: Id): Typ | undefined =>
  expInfo(map, id)?.ty;

export const expSelfType = (map: InfoMap, id: Id): Typ | undefined => {
  const info = expInfo(map, id);
  return info && selfTyp(info.ctx, info.self);
};

export const expMode = (map: InfoMap, id: Id): Mode | undefined =>
  expInfo(map, id)?.mode;

export const patTypeAfterFix = (map: InfoMap, id: Id): Typ | undefined =>
  patInfo(map, id)?.ty;

export const patSelfType = (map: InfoMap, id: Id): Typ | undefined => {
  const info = patInfo(map, id);
  return info && selfTyp(info.ctx, info.self);
};

export const patMode = (map: InfoMap, id: Id): Mode | undefined =>
  patInfo(map, id)?.mode;

/** Context after the pattern's bindings. */
export const patCtx = (map: InfoMap, id: Id): Ctx | undefined =>
  patInfo(map, id)?.ctx;

/** Each distinct info once, in the order the traversal recorded them. */
export const distinctInfos = (map: InfoMap): Info[] => Array.from(new Set(map.values()));

/** Every checked term, keyed by its representative id. */
export const terms = (map: InfoMap): Map<Id, Info["term"]> =>
  new Map(distinctInfos(map).map((info) => [repId(info.term), info.term]));

export interface UnusedBinding {
  readonly id: Id;
  readonly name: string;
}

/** Variable patterns whose scope never refers to them. `_`-prefixed names are exempt. */
export const unusedBindings = (map: InfoMap): UnusedBinding[] =>
  distinctInfos(map).flatMap((info) => {
    if (info.kind !== "pat" || info.term.kind !== "var") return [];
    const { name } = info.term;
    if (name.startsWith("_") || usesOf(info.coCtx, name).length > 0) return [];
    return [{ id: repId(info.term), name }];
  });
