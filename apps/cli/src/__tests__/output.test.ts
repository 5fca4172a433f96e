import { readOne } from "@tinysexpr/reader";
import { describe, expect, it } from "vitest";
import { formatForm, stringifyOutput } from "../output.js";

describe("formatForm", () => {
  const form = readOne("(a (b))");

  it("prints text", () => {
    expect(formatForm(form, { format: "text" })).toBe("(a (b))");
  });

  it("labels text with spans", () => {
    expect(formatForm(form, { format: "text", spans: true })).toBe(
      "(a@1:2 (b@1:5)@1:4-1:6)@1:1-1:7"
    );
  });

  it("prints compact json", () => {
    expect(formatForm(form, { format: "json" })).toBe('["a",["b"]]');
  });

  it("prints verbose json with spans", () => {
    const output = formatForm(form, { format: "verbose" });
    expect(output.startsWith('{\n  "type": "list",')).toBe(true);
    expect(JSON.parse(output)).toEqual(form.toVerboseJSON());
  });
});

describe("stringifyOutput", () => {
  it("indents by two spaces", () => {
    expect(stringifyOutput({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}');
  });
});
