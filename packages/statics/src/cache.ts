import { builtinCtx } from "./builtins.js";
import type { Ctx } from "./ctx/ctx.js";
import { computeInfoMap } from "./statics/compute.js";
import type { InfoMap } from "./statics/info.js";
import { termKey } from "./term/key.js";
import type { Exp } from "./term/nodes.js";

export interface StaticsCacheOptions {
  /** Most info maps kept before the least recently used is evicted. */
  capacity?: number;
  /** Context programs are checked in. Defaults to the built-ins. */
  ctx?: Ctx;
}

export const DEFAULT_CACHE_CAPACITY = 1000;

const debug = (message: string, details?: Record<string, unknown>) => {
  if (process.env.DEBUG_STATICS === "1") {
    if (details) {
      console.log(`[statics] ${message}`, details);
    } else {
      console.log(`[statics] ${message}`);
    }
  }
};

/**
 * Memoizes {@link computeInfoMap} by term structure. Structurally equal
 * programs, ids included, share one info map.
 */
export class StaticsCache {
  #entries = new Map<string, InfoMap>();
  #capacity: number;
  #ctx: Ctx;
  #hits = 0;
  #misses = 0;

  constructor({ capacity = DEFAULT_CACHE_CAPACITY, ctx = builtinCtx }: StaticsCacheOptions = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`cache capacity must be a positive integer, got ${capacity}`);
    }
    this.#capacity = capacity;
    this.#ctx = ctx;
  }

  compute(exp: Exp): InfoMap {
    const key = termKey(exp);
    const cached = this.#entries.get(key);
    if (cached) {
      this.#hits += 1;
      debug("hit");
      // Re-insert to mark as most recently used.
      this.#entries.delete(key);
      this.#entries.set(key, cached);
      return cached;
    }

    this.#misses += 1;
    debug("miss", { size: this.#entries.size });
    const map = computeInfoMap(exp, this.#ctx);
    this.#entries.set(key, map);
    this.#evict();
    return map;
  }

  #evict(): void {
    for (const key of this.#entries.keys()) {
      if (this.#entries.size <= this.#capacity) return;
      this.#entries.delete(key);
      debug("evicted", { capacity: this.#capacity });
    }
  }

  get hits(): number {
    return this.#hits;
  }

  get misses(): number {
    return this.#misses;
  }

  get size(): number {
    return this.#entries.size;
  }

  get capacity(): number {
    return this.#capacity;
  }

  clear(): void {
    this.#entries.clear();
    this.#hits = 0;
    this.#misses = 0;
  }
}
