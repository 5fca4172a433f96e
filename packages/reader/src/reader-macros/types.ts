import type { Form, FormElement } from "../ast/form.js";
import type { CharStream } from "../char-stream.js";
import type { ReaderConfig } from "../config.js";
import type { Coordinate } from "../coordinate.js";

export type ReaderContext<T> = {
  /** The character under the cursor that selected this macro */
  char: string;
  config: ReaderConfig<T>;
  /** Reads the remainder of a list whose `(` was consumed at `open` */
  readList: (file: CharStream, open: Coordinate) => Form<T>;
};

export interface ReaderMacro {
  match: <T>(char: string, config: ReaderConfig<T>) => boolean;
  macro: <T>(file: CharStream, ctx: ReaderContext<T>) => FormElement<T>;
}
