import type { ReaderConfig } from "../config.js";
import { bareAtomReader } from "./bare-atom.js";
import { delimitedReader } from "./delimited.js";
import { listReader } from "./list.js";
import type { ReaderMacro } from "./types.js";

/** Tried in order. The bare atom reader matches anything left over. */
const MACROS: readonly ReaderMacro[] = [
  listReader,
  delimitedReader,
  bareAtomReader,
];

export const getReaderMacroForChar = <T>(
  char: string,
  config: ReaderConfig<T>
): ReaderMacro["macro"] | undefined =>
  MACROS.find((m) => m.match(char, config))?.macro;
