import type { DiagnosticSeverity } from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity: DiagnosticSeverity;
};

type DiagnosticParamsMap = {
  ST0001: { text: string };
  ST0002: { name: string };
  ST0003: { tag: string };
  ST0004: { name: string };
  ST0005: { types: readonly string[] };
  ST0006: { syn: string; ana: string };
  ST0007: { ty: string };
  ST0008: { tag: string };
  ST0009: Record<string, never>;
  ST0010: { name: string };
  ST0011: Record<string, never>;
  ST1001: { name: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  ST0001: {
    code: "ST0001",
    message: (params) => `unrecognized token '${params.text}'`,
    severity: "error",
  },
  ST0002: {
    code: "ST0002",
    message: (params) => `variable ${params.name} is not bound`,
    severity: "error",
  },
  ST0003: {
    code: "ST0003",
    message: (params) => `constructor ${params.tag} is not defined`,
    severity: "error",
  },
  ST0004: {
    code: "ST0004",
    message: (params) => `type variable ${params.name} is not bound`,
    severity: "error",
  },
  ST0005: {
    code: "ST0005",
    message: (params) =>
      `branches have inconsistent types: ${params.types.join(", ")}`,
    severity: "error",
  },
  ST0006: {
    code: "ST0006",
    message: (params) => `expected ${params.ana} but found ${params.syn}`,
    severity: "error",
  },
  ST0007: {
    code: "ST0007",
    message: (params) => `expected a function but found ${params.ty}`,
    severity: "error",
  },
  ST0008: {
    code: "ST0008",
    message: (params) => `duplicate constructor ${params.tag} in sum type`,
    severity: "error",
  },
  ST0009: {
    code: "ST0009",
    message: () => "sum type entries must be constructors",
    severity: "error",
  },
  ST0010: {
    code: "ST0010",
    message: (params) => `cannot redefine base type ${params.name}`,
    severity: "error",
  },
  ST0011: {
    code: "ST0011",
    message: () => "expected a type name",
    severity: "error",
  },
  ST1001: {
    code: "ST1001",
    message: (params) => `${params.name} is never used`,
    severity: "warning",
  },
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];
