import { Form, type FormElement } from "./ast/form.js";
import type { CharStream } from "./char-stream.js";
import type { ReaderConfig } from "./config.js";
import { type Coordinate, spanOf } from "./coordinate.js";
import { UnexpectedEOFError } from "./errors.js";
import { CLOSE_PAREN } from "./grammar.js";
import { getReaderMacroForChar } from "./reader-macros/index.js";
import { skipTrivia } from "./trivia.js";

/**
 * Reads list elements until the `)` matching the `(` consumed at `open`.
 * Nested lists recurse through the list reader macro.
 */
export const parseForm = <T>(
  file: CharStream,
  config: ReaderConfig<T>,
  open: Coordinate
): Form<T> => {
  const elements: FormElement<T>[] = [];
  const readList = (stream: CharStream, start: Coordinate) =>
    parseForm(stream, config, start);

  while (true) {
    const char = skipTrivia(file, config.commentChar);
    if (char === undefined) {
      throw new UnexpectedEOFError(
        { coordinate: file.coordinate, filePath: config.filePath },
        { kind: "unclosed-list" }
      );
    }

    if (char === CLOSE_PAREN) {
      file.consumeChar();
      return new Form({ elements, span: spanOf(open, file.lastCoordinate) });
    }

    const readerMacro = getReaderMacroForChar(char, config);
    if (!readerMacro) {
      throw new Error(`No reader macro matches '${char}'`);
    }

    elements.push(readerMacro(file, { char, config, readList }));
  }
};
