import type { Id } from "../ids.js";
import type { Mode } from "../statics/mode.js";
import type { Ctx } from "./ctx.js";

/** One reference to a variable: where it occurs and what was expected there. */
export interface CoCtxEntry {
  readonly id: Id;
  readonly mode: Mode;
}

/** Free variable uses of an expression, by variable name. */
export type CoCtx = ReadonlyMap<string, readonly CoCtxEntry[]>;

export const emptyCoCtx: CoCtx = new Map();

export const singletonCoCtx = (name: string, id: Id, mode: Mode): CoCtx =>
  new Map([[name, [{ id, mode }]]]);

export const unionCoCtx = (coCtxs: readonly CoCtx[]): CoCtx => {
  const merged = new Map<string, CoCtxEntry[]>();
  coCtxs.forEach((coCtx) => {
    coCtx.forEach((uses, name) => {
      const bucket = merged.get(name) ?? [];
      bucket.push(...uses);
      merged.set(name, bucket);
    });
  });
  return merged;
};

/**
 * Drops the uses of every variable bound between `before` and `after`. This
 * is how a binder removes its own variables from the free set of its scope.
 */
export const withoutBindings = (before: Ctx, after: Ctx, coCtx: CoCtx): CoCtx => {
  const bound = new Set(
    after
      .addedSince(before)
      .flatMap((entry) => (entry.kind === "var" ? [entry.name] : []))
  );
  if (bound.size === 0) {
    return coCtx;
  }
  return new Map(Array.from(coCtx).filter(([name]) => !bound.has(name)));
};

export const usesOf = (coCtx: CoCtx, name: string): readonly CoCtxEntry[] =>
  coCtx.get(name) ?? [];
