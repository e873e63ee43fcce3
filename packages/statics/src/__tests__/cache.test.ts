import { afterEach, describe, expect, it, vi } from "vitest";
import { builtinCtx } from "../builtins.js";
import { StaticsCache } from "../cache.js";
import { exportInfoMap } from "../serialize.js";
import { computeInfoMap } from "../statics/compute.js";
import { createTermBuilder } from "../term/builder.js";
import { decodeExp } from "../term/decode.js";

const program = (prefix: string) => {
  const b = createTermBuilder({ prefix });
  return b.exp.let(b.pat.var("x"), b.exp.int(1), b.exp.binOp("+", b.exp.var("x"), b.exp.hole()));
};

describe("StaticsCache", () => {
  it("returns the same map for structurally equal terms", () => {
    const cache = new StaticsCache();
    const exp = program("a");
    const first = cache.compute(exp);
    const copy = decodeExp(JSON.parse(JSON.stringify(exp)));
    expect(cache.compute(copy)).toBe(first);
    expect(cache.hits).toBe(1);
    expect(cache.misses).toBe(1);
  });

  it("computes the same infos as an uncached run", () => {
    const exp = program("a");
    const cached = new StaticsCache().compute(exp);
    expect(exportInfoMap(cached, { base: builtinCtx })).toEqual(
      exportInfoMap(computeInfoMap(exp), { base: builtinCtx })
    );
  });

  it("evicts the least recently used map", () => {
    const cache = new StaticsCache({ capacity: 2 });
    const [a, b, c] = [program("a"), program("b"), program("c")];
    cache.compute(a);
    cache.compute(b);
    cache.compute(a);
    const mapC = cache.compute(c);
    cache.compute(b);
    expect(cache.compute(c)).toBe(mapC);
    expect(cache.size).toBe(2);
    expect(cache.hits).toBe(2);
    expect(cache.misses).toBe(4);
  });

  it("resets its counters on clear", () => {
    const cache = new StaticsCache();
    cache.compute(program("a"));
    cache.clear();
    expect([cache.size, cache.hits, cache.misses]).toEqual([0, 0, 0]);
  });

  it("rejects a capacity below one", () => {
    expect(() => new StaticsCache({ capacity: 0 })).toThrow(RangeError);
  });

  describe("with DEBUG_STATICS=1", () => {
    const originalDebug = process.env.DEBUG_STATICS;

    afterEach(() => {
      if (originalDebug === undefined) {
        delete process.env.DEBUG_STATICS;
      } else {
        process.env.DEBUG_STATICS = originalDebug;
      }
      vi.restoreAllMocks();
    });

    it("logs misses with details and hits without", () => {
      process.env.DEBUG_STATICS = "1";
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const cache = new StaticsCache();
      const exp = program("a");
      cache.compute(exp);
      cache.compute(exp);
      expect(log.mock.calls).toEqual([["[statics] miss", { size: 0 }], ["[statics] hit"]]);
    });
  });
});
