import { describe, expect, it } from "vitest";
import { getConfigFromCli } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("getConfigFromCli", () => {
  it("defaults index to ./term.json", () => {
    const config = runWithArgv(["node", "gradus"]);
    expect(config).toEqual({
      index: "./term.json",
      emitInfo: undefined,
      emitMsgpack: undefined,
      warnings: true,
      color: true,
    });
  });

  it("reads the term path and flags", () => {
    const config = runWithArgv([
      "node",
      "gradus",
      "./program.json",
      "--emit-info",
      "--no-warnings",
      "--no-color",
    ]);
    expect(config.index).toBe("./program.json");
    expect(config.emitInfo).toBe(true);
    expect(config.warnings).toBe(false);
    expect(config.color).toBe(false);
  });

  it("reads the msgpack flag", () => {
    const config = runWithArgv(["node", "gradus", "--emit-msgpack"]);
    expect(config.emitMsgpack).toBe(true);
    expect(config.index).toBe("./term.json");
  });
});

