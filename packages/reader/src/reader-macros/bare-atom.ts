import { atomElement } from "../ast/form.js";
import type { CharStream } from "../char-stream.js";
import type { ReaderConfig } from "../config.js";
import { type Span, spanOf } from "../coordinate.js";
import { isWhitespace } from "../grammar.js";
import type { ReaderContext, ReaderMacro } from "./types.js";

/**
 * Reads up to, but not including, the next whitespace or reserved character.
 * Only called when the current character starts an atom, so never empty.
 */
export const readBareAtom = <T>(
  file: CharStream,
  config: ReaderConfig<T>
): { text: string; span: Span } => {
  const start = file.coordinate;
  let text = "";

  while (file.hasCharacters) {
    const char = file.next;
    if (char === undefined || isWhitespace(char) || config.reserved.has(char)) {
      break;
    }
    text += file.consumeChar();
  }

  return { text, span: spanOf(start, file.lastCoordinate) };
};

export const bareAtomReader: ReaderMacro = {
  match: () => true,
  macro: <T>(file: CharStream, { config }: ReaderContext<T>) => {
    const { text, span } = readBareAtom(file, config);
    return atomElement(config.atomHandler(text, span), span);
  },
};
