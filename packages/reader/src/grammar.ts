export const OPEN_PAREN = "(";
export const CLOSE_PAREN = ")";

export const isWhitespace = (char: string) => /^\s$/u.test(char);

export const isParen = (char: string) =>
  char === OPEN_PAREN || char === CLOSE_PAREN;

/** True when `text` is exactly one Unicode code point */
export const isSingleChar = (text: string) => Array.from(text).length === 1;
