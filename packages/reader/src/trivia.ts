import type { CharStream } from "./char-stream.js";
import { isWhitespace } from "./grammar.js";

/**
 * Consumes whitespace and line comments. Returns the first character that is
 * neither, or `undefined` at the end of the stream.
 */
export const skipTrivia = (
  file: CharStream,
  commentChar: string
): string | undefined => {
  while (file.hasCharacters) {
    const char = file.next;
    if (char === undefined) break;

    if (isWhitespace(char)) {
      file.consumeChar();
      continue;
    }

    if (char === commentChar) {
      skipComment(file);
      continue;
    }

    return char;
  }

  return undefined;
};

/** The newline ending the comment is left for the whitespace loop */
const skipComment = (file: CharStream) => {
  while (file.hasCharacters) {
    if (file.next === "\n") break;
    file.consumeChar();
  }
};
