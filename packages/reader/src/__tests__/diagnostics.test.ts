import { describe, expect, it } from "vitest";
import {
  createDiagnostic,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
  formatDiagnosticMessage,
} from "../diagnostics/index.js";

const span = {
  file: "file.sx",
  start: { line: 1, column: 1 },
  end: { line: 1, column: 1 },
};

describe("diagnostic utilities", () => {
  it("formats diagnostics with their phase and location", () => {
    const diagnostic = diagnosticFromCode({
      code: "RD0002",
      params: { kind: "unexpected-char", expected: "(", found: "a" },
      span,
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "file.sx:1:1 ERROR [reader] RD0002: expected '(', got 'a'"
    );
  });

  it("prints a span range when start and end differ", () => {
    const diagnostic = createDiagnostic({
      code: "RD0001",
      message: "unexpected end of file, expected ')'",
      span: { ...span, end: { line: 2, column: 4 } },
    });
    expect(diagnostic.phase).toBe("reader");
    expect(formatDiagnostic(diagnostic)).toBe(
      "file.sx:1:1-2:4 ERROR [reader] RD0001: unexpected end of file, expected ')'"
    );
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "RD0002",
      params: { kind: "unexpected-char", expected: "(", found: "x" },
      span,
    });
    expect(diagnostic.hints?.[0]?.message).toBe(
      "Top level input may only contain lists, whitespace and comments."
    );
  });

  it("spells out control characters", () => {
    expect(
      formatDiagnosticMessage("RD0002", {
        kind: "unexpected-char",
        expected: "(",
        found: "\t",
      })
    ).toBe("expected '(', got '\\t'");
    expect(
      formatDiagnosticMessage("RD0003", {
        kind: "invalid-escape",
        char: "\n",
        escapeChar: "\\",
      })
    ).toBe("invalid escape character '\\n'");
  });

  it("lists every registered code", () => {
    expect(diagnosticCodes()).toEqual(["RD0001", "RD0002", "RD0003", "CF0001"]);
  });
});
