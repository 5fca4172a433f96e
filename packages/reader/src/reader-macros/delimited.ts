import { atomElement } from "../ast/form.js";
import type { CharStream } from "../char-stream.js";
import type { ResolvedDelimiter } from "../config.js";
import { type Span, spanOf } from "../coordinate.js";
import { InvalidEscapeError, UnexpectedEOFError } from "../errors.js";
import type { ReaderContext, ReaderMacro } from "./types.js";

/**
 * Reads from the opening delimiter under the cursor through the next
 * occurrence of the same character. Escapes are decoded; the delimiters are
 * kept at both ends of the returned text.
 */
export const readDelimited = (
  file: CharStream,
  delimiter: ResolvedDelimiter,
  filePath: string
): { text: string; span: Span } => {
  file.consumeChar();
  const start = file.lastCoordinate;
  let text = delimiter.char;

  while (file.hasCharacters) {
    const char = file.consumeChar();

    if (char === delimiter.escapeChar) {
      if (!file.hasCharacters) {
        throw new UnexpectedEOFError(
          { coordinate: file.coordinate, filePath },
          { kind: "dangling-escape", escapeChar: char }
        );
      }

      const escaped = file.consumeChar();
      const replacement = delimiter.escapes.get(escaped);
      if (replacement === undefined) {
        throw new InvalidEscapeError(
          { coordinate: file.lastCoordinate, filePath },
          escaped,
          char
        );
      }

      text += replacement;
      continue;
    }

    text += char;
    if (char === delimiter.char) {
      return { text, span: spanOf(start, file.lastCoordinate) };
    }
  }

  throw new UnexpectedEOFError(
    { coordinate: file.coordinate, filePath },
    { kind: "unclosed-delimiter", delimiter: delimiter.char }
  );
};

export const delimitedReader: ReaderMacro = {
  match: (char, config) => config.delimiters.has(char),
  macro: <T>(file: CharStream, { char, config }: ReaderContext<T>) => {
    const delimiter = config.delimiters.get(char);
    if (!delimiter) {
      throw new Error(`'${char}' is not a configured delimiter`);
    }

    const { text, span } = readDelimited(file, delimiter, config.filePath);
    return atomElement(config.atomHandler(text, span), span);
  },
};
