import { Command } from "commander";
import { createRequire } from "node:module";
import type { GradusConfig } from "./types.js";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const pkg: unknown = require("../../package.json");
  return typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
};

type CliOptions = {
  emitInfo?: boolean;
  emitMsgpack?: boolean;
  warnings: boolean;
  color: boolean;
};

export const getConfigFromCli = (): GradusConfig => {
  const program = new Command()
    .name("gradus")
    .description("Type check a gradually typed program with holes")
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

  program
    .argument("[index]", "term file (default: ./term.json)")
    .option("--emit-info", "write the info map as JSON to stdout")
    .option("--emit-msgpack", "write the info map as msgpack to stdout")
    .option("--no-warnings", "do not report unused bindings")
    .option("--no-color", "disable colored diagnostics");

  program.parse(["node", "gradus", ...process.argv.slice(2)]);
  const opts = program.opts<CliOptions>();
  const [indexArg] = program.args;

  return {
    index: indexArg ?? "./term.json",
    emitInfo: opts.emitInfo,
    emitMsgpack: opts.emitMsgpack,
    warnings: opts.warnings,
    color: opts.color,
  };
};
