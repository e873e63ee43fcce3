import { afterEach, describe, expect, it, vi } from "vitest";
import { printJson, stringifyOutput } from "../output.js";

describe("cli output", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("serializes maps and typed arrays", () => {
    const value = {
      table: new Map([["entry", { bytes: new Uint8Array([1, 2, 3]) }]]),
    };
    expect(JSON.parse(stringifyOutput(value))).toEqual({
      table: { entry: { bytes: [1, 2, 3] } },
    });
  });

  it("prints indented JSON", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    printJson({ ok: true });
    expect(log).toHaveBeenCalledWith('{\n  "ok": true\n}');
  });
});
