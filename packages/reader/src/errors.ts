import { type Coordinate, formatCoordinate } from "./coordinate.js";
import {
  type Diagnostic,
  type DiagnosticParams,
  diagnosticFromCode,
  formatDiagnosticMessage,
} from "./diagnostics/index.js";

type ErrorSite = {
  coordinate: Coordinate;
  filePath: string;
};

const spanAt = ({ coordinate, filePath }: ErrorSite) => ({
  file: filePath,
  start: coordinate,
  end: coordinate,
});

/** Malformed input. Fatal to the read session that raised it. */
export class ReaderSyntaxError extends Error {
  readonly coordinate: Coordinate;
  readonly filePath: string;
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(`${formatCoordinate(diagnostic.span.start)}: ${diagnostic.message}`);
    this.name = "ReaderSyntaxError";
    this.coordinate = diagnostic.span.start;
    this.filePath = diagnostic.span.file;
    this.diagnostic = diagnostic;
  }
}

/** The input ended while a list, delimited atom or form was still expected */
export class UnexpectedEOFError extends ReaderSyntaxError {
  constructor(site: ErrorSite, params: DiagnosticParams<"RD0001">) {
    super(diagnosticFromCode({ code: "RD0001", params, span: spanAt(site) }));
    this.name = "UnexpectedEOFError";
  }
}

export class UnexpectedCharError extends ReaderSyntaxError {
  readonly expected: string;
  readonly found: string;

  constructor(site: ErrorSite, expected: string, found: string) {
    super(
      diagnosticFromCode({
        code: "RD0002",
        params: { kind: "unexpected-char", expected, found },
        span: spanAt(site),
      })
    );
    this.name = "UnexpectedCharError";
    this.expected = expected;
    this.found = found;
  }
}

/** An escape character was followed by a character missing from its map */
export class InvalidEscapeError extends ReaderSyntaxError {
  readonly char: string;
  readonly escapeChar: string;

  constructor(site: ErrorSite, char: string, escapeChar: string) {
    super(
      diagnosticFromCode({
        code: "RD0003",
        params: { kind: "invalid-escape", char, escapeChar },
        span: spanAt(site),
      })
    );
    this.name = "InvalidEscapeError";
    this.char = char;
    this.escapeChar = escapeChar;
  }
}

/** Rejected reader options, raised before any input is read */
export class ReaderConfigError extends Error {
  readonly code = "CF0001";
  readonly params: DiagnosticParams<"CF0001">;

  constructor(params: DiagnosticParams<"CF0001">) {
    super(formatDiagnosticMessage("CF0001", params));
    this.name = "ReaderConfigError";
    this.params = params;
  }
}

export const syntaxErrorCoordinate = (
  error: unknown
): Coordinate | undefined =>
  error instanceof ReaderSyntaxError ? error.coordinate : undefined;
