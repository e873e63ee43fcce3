import type { Id } from "../ids.js";

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  /** Representative id of the offending node. */
  id: Id;
  /** Other nodes that take part, such as disagreeing branches. */
  related?: readonly Id[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  id: Id;
  severity?: DiagnosticSeverity;
  related?: readonly Id[];
};
