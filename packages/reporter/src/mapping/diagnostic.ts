/**
 * Compiler problems → protocol diagnostics
 */
import { DiagnosticSeverity, type Diagnostic } from "@compile-reporter/protocol";
import type { Problem, ProblemSeverity } from "../problem.js";
import { toProtocolRange } from "./position.js";

/** Value of `Diagnostic.source` on everything this reporter publishes. */
export const DIAGNOSTIC_SOURCE = "compile-reporter";

export function toProtocolSeverity(severity: ProblemSeverity): DiagnosticSeverity {
  switch (severity) {
    case "info":
      return DiagnosticSeverity.Information;
    case "warning":
      return DiagnosticSeverity.Warning;
    case "error":
      return DiagnosticSeverity.Error;
  }
}

export function toDiagnostic(problem: Problem): Diagnostic {
  return {
    range: toProtocolRange(problem.position),
    message: problem.message,
    severity: toProtocolSeverity(problem.severity),
    source: DIAGNOSTIC_SOURCE,
    ...(problem.diagnosticCode !== undefined && { code: problem.diagnosticCode }),
  };
}
