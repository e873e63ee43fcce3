import type { Id } from "../ids.js";
import { arrowTyp, type SumVariant, type Typ } from "../types/typ.js";

export type TVarKind =
  | { readonly kind: "abstract" }
  | { readonly kind: "singleton"; readonly ty: Typ };

export interface VarEntry {
  readonly kind: "var";
  readonly name: string;
  readonly id: Id;
  readonly ty: Typ;
}

export interface ConstructorEntry {
  readonly kind: "constructor";
  readonly tag: string;
  readonly id: Id;
  readonly ty: Typ;
}

export interface TVarEntry {
  readonly kind: "tvar";
  readonly name: string;
  readonly id: Id;
  readonly tvarKind: TVarKind;
}

export type CtxEntry = VarEntry | ConstructorEntry | TVarEntry;

/**
 * Typing context. A persistent, prepend-only list: `extend` shares the
 * existing bindings and lookups return the innermost match, so a later
 * binding shadows an earlier one of the same name.
 */
export class Ctx implements Iterable<CtxEntry> {
  static readonly empty = new Ctx(undefined, undefined);

  readonly entry?: CtxEntry;
  readonly parent?: Ctx;
  readonly size: number;

  private constructor(entry: CtxEntry | undefined, parent: Ctx | undefined) {
    this.entry = entry;
    this.parent = parent;
    this.size = parent ? parent.size + 1 : 0;
  }

  /** Builds a context from outermost to innermost. */
  static of(entries: Iterable<CtxEntry>): Ctx {
    let ctx = Ctx.empty;
    for (const entry of entries) {
      ctx = ctx.extend(entry);
    }
    return ctx;
  }

  *[Symbol.iterator](): Iterator<CtxEntry> {
    let node: Ctx | undefined = this;
    while (node?.entry) {
      yield node.entry;
      node = node.parent;
    }
  }

  extend(entry: CtxEntry): Ctx {
    return new Ctx(entry, this);
  }

  extendVar(name: string, id: Id, ty: Typ): Ctx {
    return this.extend({ kind: "var", name, id, ty });
  }

  extendAlias(name: string, id: Id, ty: Typ): Ctx {
    return this.extend({
      kind: "tvar",
      name,
      id,
      tvarKind: { kind: "singleton", ty },
    });
  }

  extendAbstract(name: string, id: Id): Ctx {
    return this.extend({ kind: "tvar", name, id, tvarKind: { kind: "abstract" } });
  }

  /** Binds each variant of `sum` as a constructor returning `sum`. */
  addTags(sum: Typ, id: Id, variants: readonly SumVariant[]): Ctx {
    return variants.reduce<Ctx>(
      (ctx, variant) =>
        ctx.extend({
          kind: "constructor",
          tag: variant.tag,
          id,
          ty: variant.arg ? arrowTyp(variant.arg, sum) : sum,
        }),
      this
    );
  }

  lookupVar(name: string): VarEntry | undefined {
    for (const entry of this) {
      if (entry.kind === "var" && entry.name === name) return entry;
    }
    return undefined;
  }

  lookupTag(tag: string): ConstructorEntry | undefined {
    for (const entry of this) {
      if (entry.kind === "constructor" && entry.tag === tag) return entry;
    }
    return undefined;
  }

  lookupTVar(name: string): TVarEntry | undefined {
    for (const entry of this) {
      if (entry.kind === "tvar" && entry.name === name) return entry;
    }
    return undefined;
  }

  lookupAlias(name: string): Typ | undefined {
    const entry = this.lookupTVar(name);
    return entry?.tvarKind.kind === "singleton" ? entry.tvarKind.ty : undefined;
  }

  /**
   * Entries pushed on top of `before`, innermost first. `this` must be an
   * extension of `before`.
   */
  addedSince(before: Ctx): CtxEntry[] {
    return this.entries().slice(0, Math.max(0, this.size - before.size));
  }

  /** All entries, innermost first. */
  entries(): CtxEntry[] {
    return Array.from(this);
  }
}
