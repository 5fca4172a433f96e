export * from "./ast/form.js";
export * from "./char-source.js";
export { CharStream } from "./char-stream.js";
export * from "./config.js";
export * from "./coordinate.js";
export * from "./diagnostics/index.js";
export * from "./errors.js";
export { parseForm } from "./parse-form.js";
export * from "./print.js";
export * from "./reader.js";
export { readBareAtom } from "./reader-macros/bare-atom.js";
export { readDelimited } from "./reader-macros/delimited.js";
export { skipTrivia } from "./trivia.js";
