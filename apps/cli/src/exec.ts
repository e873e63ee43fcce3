import { readFile } from "node:fs/promises";
import { stdout } from "node:process";
import {
  StaticsCache,
  TermDecodeError,
  builtinCtx,
  encodeInfoMap,
  exportInfoMap,
} from "@gradus/statics";
import { checkSource } from "./check.js";
import { getConfig } from "./config/index.js";
import { formatCliDiagnostic, formatSummary } from "./diagnostics.js";
import { printJson } from "./output.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const source = await readFile(config.index, { encoding: "utf8" });
  const cache = new StaticsCache();
  const result = checkSource(source, { cache, warnings: config.warnings });

  if (config.emitInfo) {
    return printJson(exportInfoMap(result.map, { base: builtinCtx }));
  }

  if (config.emitMsgpack) {
    stdout.write(encodeInfoMap(result.map, { base: builtinCtx }));
    return;
  }

  result.diagnostics.forEach((diagnostic) =>
    console.log(formatCliDiagnostic(diagnostic, { color: config.color }))
  );
  console.log(formatSummary(result.diagnostics));
  if (result.hasErrors) {
    process.exitCode = 1;
  }
}

function errorHandler(error: unknown) {
  if (error instanceof TermDecodeError) {
    console.error(`invalid term: ${error.message}`);
    process.exit(1);
  }

  if (error instanceof SyntaxError) {
    console.error(`invalid JSON: ${error.message}`);
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}
