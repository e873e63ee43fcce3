import {
  StaticsCache,
  decodeExp,
  type InfoMap,
} from "@gradus/statics";
import {
  collectDiagnostics,
  type Diagnostic,
} from "@gradus/statics/diagnostics";

export type CheckResult = {
  map: InfoMap;
  diagnostics: readonly Diagnostic[];
  hasErrors: boolean;
};

/** Decodes a JSON term and checks it. */
export const checkSource = (
  source: string,
  { cache, warnings }: { cache: StaticsCache; warnings: boolean }
): CheckResult => {
  const json: unknown = JSON.parse(source);
  const map = cache.compute(decodeExp(json));
  const diagnostics = collectDiagnostics(map, { warnings });
  return {
    map,
    diagnostics,
    hasErrors: diagnostics.some((diagnostic) => diagnostic.severity === "error"),
  };
};
