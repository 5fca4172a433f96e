import type { Coordinate } from "../coordinate.js";

export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "reader" | "config";

export interface SourceSpan {
  file: string;
  start: Coordinate;
  end: Coordinate;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};
