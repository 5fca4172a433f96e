import { listElement } from "../ast/form.js";
import type { CharStream } from "../char-stream.js";
import { OPEN_PAREN } from "../grammar.js";
import type { ReaderContext, ReaderMacro } from "./types.js";

export const listReader: ReaderMacro = {
  match: (char) => char === OPEN_PAREN,
  macro: <T>(file: CharStream, { readList }: ReaderContext<T>) => {
    file.consumeChar();
    return listElement(readList(file, file.lastCoordinate));
  },
};
