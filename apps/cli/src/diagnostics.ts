import type {
  Diagnostic,
  DiagnosticSeverity,
} from "@gradus/statics/diagnostics";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const header = `${diagnostic.id} ${color.severityLabel(
    diagnostic.severity
  )} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const related =
    diagnostic.related && diagnostic.related.length > 0
      ? color.muted(`  related: ${diagnostic.related.join(", ")}`)
      : undefined;

  return [header, related].filter(Boolean).join("\n");
};

export const formatSummary = (diagnostics: readonly Diagnostic[]): string => {
  const errors = diagnostics.filter((diagnostic) => diagnostic.severity === "error").length;
  const warnings = diagnostics.length - errors;
  const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? "" : "s"}`;
  return `${plural(errors, "error")}, ${plural(warnings, "warning")}`;
};
