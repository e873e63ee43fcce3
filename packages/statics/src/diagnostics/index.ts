export * from "./types.js";
export * from "./registry.js";

import { repId } from "../ids.js";
import { distinctInfos, unusedBindings } from "../queries.js";
import type { Info, InfoMap } from "../statics/info.js";
import { isError } from "../statics/info.js";
import type { StaticsError } from "../statics/status.js";
import { formatTyp } from "../types/format.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";
import type { Diagnostic, DiagnosticInput, DiagnosticSeverity } from "./types.js";

export const createDiagnostic = ({ severity, ...input }: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  id: string;
  related?: readonly string[];
  severity?: DiagnosticSeverity;
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    id: options.id,
    related: options.related,
    severity: options.severity ?? definition.severity,
  });
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const severity = diagnostic.severity.toUpperCase();
  return `${diagnostic.id} ${severity} ${diagnostic.code}: ${diagnostic.message}`;
};

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report(input: DiagnosticInput): Diagnostic {
    const diagnostic = createDiagnostic(input);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }

  get hasErrors(): boolean {
    return this.#diagnostics.some((diagnostic) => diagnostic.severity === "error");
  }
}

const fromFree = (id: string, error: Extract<StaticsError, { kind: "free" }>): Diagnostic => {
  switch (error.free) {
    case "variable":
      return diagnosticFromCode({ code: "ST0002", params: { name: error.name }, id });
    case "tag":
      return diagnosticFromCode({ code: "ST0003", params: { tag: error.name }, id });
    case "type-variable":
      return diagnosticFromCode({ code: "ST0004", params: { name: error.name }, id });
  }
};

const fromError = (id: string, error: StaticsError): Diagnostic => {
  switch (error.kind) {
    case "free":
      return fromFree(id, error);
    case "syn-inconsistent-branches":
      return diagnosticFromCode({
        code: "ST0005",
        params: { types: error.sources.map((source) => formatTyp(source.ty)) },
        id,
        related: error.sources.map((source) => source.id),
      });
    case "type-inconsistent":
      return diagnosticFromCode({
        code: "ST0006",
        params: { syn: formatTyp(error.syn), ana: formatTyp(error.ana) },
        id,
      });
    case "inconsistent-with-arrow":
      return diagnosticFromCode({ code: "ST0007", params: { ty: formatTyp(error.ty) }, id });
    case "duplicate-tag":
      return diagnosticFromCode({ code: "ST0008", params: { tag: error.tag }, id });
    case "bad-sum-entry":
      return diagnosticFromCode({ code: "ST0009", params: {}, id });
    case "shadows-base-type":
      return diagnosticFromCode({ code: "ST0010", params: { name: error.name }, id });
    case "not-a-name":
      return diagnosticFromCode({ code: "ST0011", params: {}, id });
  }
};

const diagnosticOf = (info: Info): Diagnostic | undefined => {
  if (!isError(info)) {
    return undefined;
  }
  const id = repId(info.term);
  switch (info.kind) {
    case "invalid":
      return diagnosticFromCode({ code: "ST0001", params: { text: info.term.text }, id });
    case "rule":
      return undefined;
    default:
      return info.status.kind === "in-hole" ? fromError(id, info.status.error) : undefined;
  }
};

export interface CollectDiagnosticsOptions {
  /** Report unused bindings. Defaults to true. */
  warnings?: boolean;
}

/**
 * Every error recorded in `map`, once per node and in traversal order,
 * followed by unused binding warnings.
 */
export const collectDiagnostics = (
  map: InfoMap,
  { warnings = true }: CollectDiagnosticsOptions = {}
): readonly Diagnostic[] => {
  const emitter = new DiagnosticEmitter();
  distinctInfos(map).forEach((info) => {
    const diagnostic = diagnosticOf(info);
    if (diagnostic) emitter.report(diagnostic);
  });
  if (warnings) {
    unusedBindings(map).forEach(({ id, name }) =>
      emitter.report(diagnosticFromCode({ code: "ST1001", params: { name }, id }))
    );
  }
  return emitter.diagnostics;
};
