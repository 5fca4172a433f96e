import { readFileSync } from "node:fs";
import {
  type Diagnostic,
  type DiagnosticSeverity,
  formatCoordinate,
} from "@tinysexpr/reader";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const readSource = (file: string): string | undefined => {
  try {
    return readFileSync(file, "utf8");
  } catch {
    return undefined;
  }
};

const lineTextAt = (source: string, line: number): string | undefined =>
  source.split("\n")[line - 1]?.replace(/\r$/, "");

const formatSnippet = ({
  diagnostic,
  lineText,
  color,
}: {
  diagnostic: Diagnostic;
  lineText: string;
  color: Colorizer;
}): string => {
  const { start, end } = diagnostic.span;
  const pointerLength =
    end.line === start.line ? Math.max(1, end.column - start.column + 1) : 1;
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column - 1)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength)
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

/**
 * Renders a diagnostic with the offending source line underneath. The line
 * comes from `source` when given, otherwise from the file the span names.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; source?: string } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const location = `${diagnostic.span.file}:${formatCoordinate(
    diagnostic.span.start
  )}`;
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${color.severityLabel(
    diagnostic.severity
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;

  const source = options.source ?? readSource(diagnostic.span.file);
  const lineText =
    source === undefined ? undefined : lineTextAt(source, diagnostic.span.start.line);
  const snippet =
    lineText === undefined
      ? undefined
      : formatSnippet({ diagnostic, lineText, color });
  const hints = (diagnostic.hints ?? []).map(
    (hint) => `${" ".repeat(String(diagnostic.span.start.line).length)} = help: ${hint.message}`
  );

  return [header, snippet, ...hints].filter(Boolean).join("\n");
};
