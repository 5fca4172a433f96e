import { describe, expect, it } from "vitest";
import {
  InvalidEscapeError,
  ReaderSyntaxError,
  syntaxErrorCoordinate,
  UnexpectedCharError,
  UnexpectedEOFError,
} from "../errors.js";
import { readAll, readOne } from "../reader.js";

const failure = (source: string): unknown => {
  try {
    readAll(source);
  } catch (error) {
    return error;
  }
  throw new Error(`expected ${JSON.stringify(source)} to fail`);
};

describe("syntax errors", () => {
  it.each([
    ["(", "1:2"],
    ["(  ", "1:4"],
    ["(a  ", "1:5"],
    ["(a", "1:3"],
    ["(1 (2 3) (4 5) 6 (7 (8 9))", "1:27"],
    ["(a\n(b", "2:3"],
  ])("reports an unclosed list in %j at %s", (source, at) => {
    const error = failure(source);
    expect(error).toBeInstanceOf(UnexpectedEOFError);
    expect(error).toBeInstanceOf(ReaderSyntaxError);
    expect(String(error)).toBe(
      `UnexpectedEOFError: ${at}: unexpected end of file, expected ')'`
    );
  });

  it("reports an unclosed delimiter where the input ran out", () => {
    const error = failure("(|a b c");
    expect(error).toBeInstanceOf(UnexpectedEOFError);
    expect(syntaxErrorCoordinate(error)).toEqual({ line: 1, column: 8 });
    expect(String(error)).toBe(
      "UnexpectedEOFError: 1:8: unexpected end of file, expected closing '|'"
    );
  });

  it("does not let a bare atom close a string", () => {
    const error = failure('("abc"cde"');
    expect(error).toBeInstanceOf(UnexpectedEOFError);
    expect(syntaxErrorCoordinate(error)).toEqual({ line: 1, column: 11 });
  });

  it("reports an escape character at the end of input", () => {
    const error = failure('("ab\\');
    expect(error).toBeInstanceOf(UnexpectedEOFError);
    expect(String(error)).toBe(
      "UnexpectedEOFError: 1:6: unexpected end of file after escape character '\\'"
    );
  });

  it("reports the character after an escape that has no mapping", () => {
    const error = failure('("abc\\9cde"');
    expect(error).toBeInstanceOf(InvalidEscapeError);
    if (!(error instanceof InvalidEscapeError)) return;
    expect(error.char).toBe("9");
    expect(error.escapeChar).toBe("\\");
    expect(error.coordinate).toEqual({ line: 1, column: 7 });
    expect(error.message).toBe("1:7: invalid escape character '9'");
  });

  it("requires top level input to start with a list", () => {
    const error = failure("abc");
    expect(error).toBeInstanceOf(UnexpectedCharError);
    if (!(error instanceof UnexpectedCharError)) return;
    expect(error.expected).toBe("(");
    expect(error.found).toBe("a");
    expect(error.coordinate).toEqual({ line: 1, column: 1 });
    expect(error.message).toBe("1:1: expected '(', got 'a'");
  });

  it("rejects a stray closing bracket like any other character", () => {
    const error = failure("(a))");
    expect(error).toBeInstanceOf(UnexpectedCharError);
    if (!(error instanceof UnexpectedCharError)) return;
    expect(error.found).toBe(")");
    expect(error.coordinate).toEqual({ line: 1, column: 4 });
  });

  it("rejects a stray atom after a comment line", () => {
    const error = failure("; intro\n  \"text\"");
    expect(error).toBeInstanceOf(UnexpectedCharError);
    expect(syntaxErrorCoordinate(error)).toEqual({ line: 2, column: 3 });
  });

  it("carries a diagnostic naming the file", () => {
    try {
      readAll("(a", { filePath: "demo.sx" });
    } catch (error) {
      expect(error).toBeInstanceOf(UnexpectedEOFError);
      if (!(error instanceof UnexpectedEOFError)) return;
      expect(error.filePath).toBe("demo.sx");
      expect(error.diagnostic).toEqual({
        code: "RD0001",
        message: "unexpected end of file, expected ')'",
        severity: "error",
        phase: "reader",
        hints: undefined,
        span: {
          file: "demo.sx",
          start: { line: 1, column: 3 },
          end: { line: 1, column: 3 },
        },
      });
      return;
    }
    throw new Error("expected a syntax error");
  });

  it("reports empty input to readOne as a missing form", () => {
    expect(() => readOne("  ; nothing here\n")).toThrow(
      "2:1: unexpected end of file, expected '('"
    );
  });

  it("returns no coordinate for other errors", () => {
    expect(syntaxErrorCoordinate(new Error("boom"))).toBeUndefined();
  });
});
