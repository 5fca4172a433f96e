import { describe, expect, it } from "vitest";
import { type CharSource, chunkSource, stringSource } from "../char-source.js";
import { CharStream } from "../char-stream.js";

const drain = (source: CharSource): string[] => {
  const chars: string[] = [];
  for (let char = source.read(); char !== undefined; char = source.read()) {
    chars.push(char);
  }
  return chars;
};

describe("CharStream", () => {
  it("tracks the coordinate of the current and the consumed character", () => {
    const file = new CharStream("ab\nc");
    expect(file.next).toBe("a");
    expect(file.coordinate).toEqual({ line: 1, column: 1 });

    expect(file.consumeChar()).toBe("a");
    expect(file.lastCoordinate).toEqual({ line: 1, column: 1 });
    expect(file.coordinate).toEqual({ line: 1, column: 2 });

    file.consumeChar();
    expect(file.consumeChar()).toBe("\n");
    expect(file.lastCoordinate).toEqual({ line: 1, column: 3 });
    expect(file.coordinate).toEqual({ line: 2, column: 1 });

    expect(file.consumeChar()).toBe("c");
    expect(file.lastCoordinate).toEqual({ line: 2, column: 1 });
    expect(file.coordinate).toEqual({ line: 2, column: 2 });
    expect(file.hasCharacters).toBe(false);
    expect(file.next).toBeUndefined();
  });

  it("refuses to consume past the end", () => {
    const file = new CharStream("");
    expect(file.hasCharacters).toBe(false);
    expect(() => file.consumeChar()).toThrow("Out of characters");
  });

  it("steps over astral characters in one move", () => {
    const file = new CharStream("😀x");
    expect(file.consumeChar()).toBe("😀");
    expect(file.coordinate).toEqual({ line: 1, column: 2 });
    expect(file.next).toBe("x");
  });

  it("keeps the error of a failing source", () => {
    const failure = new Error("unreadable");
    const file = new CharStream({
      read: () => {
        throw failure;
      },
    });
    expect(file.hasCharacters).toBe(false);
    expect(file.sourceError).toBe(failure);
  });
});

describe("char sources", () => {
  it("splits strings by code point", () => {
    expect(drain(stringSource("a😀b"))).toEqual(["a", "😀", "b"]);
    expect(drain(stringSource(""))).toEqual([]);
  });

  it("joins surrogate pairs split across chunks", () => {
    expect(drain(chunkSource(["x\uD83D", "\uDE00!"]))).toEqual(["x", "😀", "!"]);
  });

  it("skips empty chunks", () => {
    expect(drain(chunkSource(["", "ab", "", "c"]))).toEqual(["a", "b", "c"]);
  });

  it("keeps reporting exhaustion", () => {
    const source = chunkSource(["a"]);
    expect(source.read()).toBe("a");
    expect(source.read()).toBeUndefined();
    expect(source.read()).toBeUndefined();
  });
});
