import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

type DiagnosticParamsMap = {
  RD0001:
    | { kind: "unclosed-list" }
    | { kind: "unclosed-delimiter"; delimiter: string }
    | { kind: "dangling-escape"; escapeChar: string }
    | { kind: "missing-form" };
  RD0002: { kind: "unexpected-char"; expected: string; found: string };
  RD0003: { kind: "invalid-escape"; char: string; escapeChar: string };
  CF0001:
    | { kind: "delimiter-length"; delimiter: string }
    | { kind: "comment-length"; commentChar: string }
    | {
        kind: "reserved-char";
        role: "delimiter" | "comment character";
        char: string;
      }
    | { kind: "comment-delimiter-overlap"; commentChar: string }
    | { kind: "escape-length"; delimiter: string; escapeChar: string }
    | { kind: "escape-is-delimiter"; delimiter: string }
    | { kind: "escape-key-length"; delimiter: string; key: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

/** Renders a character for messages, spelling out control characters */
export const displayChar = (char: string): string => {
  switch (char) {
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    default:
      return char;
  }
};

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  RD0001: {
    code: "RD0001",
    message: (params) => {
      switch (params.kind) {
        case "unclosed-list":
          return "unexpected end of file, expected ')'";
        case "unclosed-delimiter":
          return `unexpected end of file, expected closing '${displayChar(
            params.delimiter
          )}'`;
        case "dangling-escape":
          return `unexpected end of file after escape character '${displayChar(
            params.escapeChar
          )}'`;
        case "missing-form":
          return "unexpected end of file, expected '('";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "reader",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RD0001"]>,
  RD0002: {
    code: "RD0002",
    message: (params) =>
      `expected '${displayChar(params.expected)}', got '${displayChar(
        params.found
      )}'`,
    severity: "error",
    phase: "reader",
    hints: [
      {
        message:
          "Top level input may only contain lists, whitespace and comments.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RD0002"]>,
  RD0003: {
    code: "RD0003",
    message: (params) => `invalid escape character '${displayChar(params.char)}'`,
    severity: "error",
    phase: "reader",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RD0003"]>,
  CF0001: {
    code: "CF0001",
    message: (params) => {
      switch (params.kind) {
        case "delimiter-length":
          return `delimiter '${params.delimiter}' must be a single character`;
        case "comment-length":
          return `comment character '${params.commentChar}' must be a single character`;
        case "reserved-char":
          return `${params.role} '${displayChar(
            params.char
          )}' cannot be whitespace or a bracket`;
        case "comment-delimiter-overlap":
          return `comment character '${params.commentChar}' is also configured as a delimiter`;
        case "escape-length":
          return `escape character '${params.escapeChar}' of delimiter '${params.delimiter}' must be a single character`;
        case "escape-is-delimiter":
          return `delimiter '${params.delimiter}' cannot be its own escape character`;
        case "escape-key-length":
          return `escape sequence '${params.key}' of delimiter '${params.delimiter}' must be a single character`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "config",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CF0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];

const exhaustive = (_value: never): never => _value;
