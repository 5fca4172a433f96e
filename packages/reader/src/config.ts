import type { Span } from "./coordinate.js";
import { ReaderConfigError } from "./errors.js";
import {
  CLOSE_PAREN,
  isParen,
  isSingleChar,
  isWhitespace,
  OPEN_PAREN,
} from "./grammar.js";

/** Maps the character after an escape character to its replacement */
export type EscapeMap = Readonly<Record<string, string>>;

export type DelimiterRule = {
  /** Without an escape character the delimited text is taken verbatim */
  escapeChar?: string;
  escapes?: EscapeMap;
};

/** Keyed by the single delimiter character that opens and closes the atom */
export type DelimiterConfig = Readonly<Record<string, DelimiterRule>>;

export type AtomHandler<T> = (text: string, span: Span) => T;

export type ReaderOptions<T> = {
  delimiters?: DelimiterConfig;
  commentChar?: string;
  atomHandler?: AtomHandler<T>;
  /** Reported in diagnostics. Defaults to `<input>`. */
  filePath?: string;
};

/** Options whose atom handler turns atom text into `T` */
export type TransformingReaderOptions<T> = ReaderOptions<T> & {
  atomHandler: AtomHandler<T>;
};

export type ResolvedDelimiter = {
  readonly char: string;
  readonly escapeChar?: string;
  readonly escapes: ReadonlyMap<string, string>;
};

export type ReaderConfig<T> = {
  readonly delimiters: ReadonlyMap<string, ResolvedDelimiter>;
  readonly commentChar: string;
  /** Characters that terminate a bare atom, whitespace aside */
  readonly reserved: ReadonlySet<string>;
  readonly atomHandler: AtomHandler<T>;
  readonly filePath: string;
};

export const DEFAULT_DELIMITERS: DelimiterConfig = {
  '"': {
    escapeChar: "\\",
    escapes: { n: "\n", t: "\t", r: "\r", "\\": "\\", '"': '"' },
  },
  "|": {},
};

export const DEFAULT_COMMENT_CHAR = ";";

export const DEFAULT_FILE_PATH = "<input>";

export const identityAtomHandler: AtomHandler<string> = (text) => text;

const checkReservable = (role: "delimiter" | "comment character", char: string) => {
  if (isWhitespace(char) || isParen(char)) {
    throw new ReaderConfigError({ kind: "reserved-char", role, char });
  }
};

const resolveDelimiter = (
  char: string,
  rule: DelimiterRule,
  commentChar: string
): ResolvedDelimiter => {
  if (!isSingleChar(char)) {
    throw new ReaderConfigError({ kind: "delimiter-length", delimiter: char });
  }
  checkReservable("delimiter", char);
  if (char === commentChar) {
    throw new ReaderConfigError({ kind: "comment-delimiter-overlap", commentChar });
  }

  const { escapeChar } = rule;
  if (escapeChar !== undefined && !isSingleChar(escapeChar)) {
    throw new ReaderConfigError({ kind: "escape-length", delimiter: char, escapeChar });
  }
  if (escapeChar === char) {
    throw new ReaderConfigError({ kind: "escape-is-delimiter", delimiter: char });
  }

  const escapes = new Map<string, string>();
  for (const [key, replacement] of Object.entries(rule.escapes ?? {})) {
    if (!isSingleChar(key)) {
      throw new ReaderConfigError({ kind: "escape-key-length", delimiter: char, key });
    }
    escapes.set(key, replacement);
  }

  return { char, escapeChar, escapes };
};

const buildReaderConfig = <T>(
  options: ReaderOptions<T>,
  defaultAtomHandler: AtomHandler<T>
): ReaderConfig<T> => {
  const commentChar = options.commentChar ?? DEFAULT_COMMENT_CHAR;
  if (!isSingleChar(commentChar)) {
    throw new ReaderConfigError({ kind: "comment-length", commentChar });
  }
  checkReservable("comment character", commentChar);

  const delimiters = new Map<string, ResolvedDelimiter>();
  for (const [char, rule] of Object.entries(
    options.delimiters ?? DEFAULT_DELIMITERS
  )) {
    delimiters.set(char, resolveDelimiter(char, rule, commentChar));
  }

  return {
    delimiters,
    commentChar,
    reserved: new Set([OPEN_PAREN, CLOSE_PAREN, commentChar, ...delimiters.keys()]),
    atomHandler: options.atomHandler ?? defaultAtomHandler,
    filePath: options.filePath ?? DEFAULT_FILE_PATH,
  };
};

/**
 * Resolves options that may omit the atom handler. Without one, atoms stay
 * raw text, so the atom type widens to include `string`.
 */
export const resolveOptions = <T>(
  options: ReaderOptions<T | string> = {}
): ReaderConfig<T | string> =>
  buildReaderConfig<T | string>(options, identityAtomHandler);

/**
 * Validates reader options and fills in defaults. Throws
 * {@link ReaderConfigError} when the delimiters, the comment character and
 * the brackets are not pairwise distinct single characters.
 */
export function resolveReaderConfig(
  options?: ReaderOptions<string>
): ReaderConfig<string>;
export function resolveReaderConfig<T>(
  options: TransformingReaderOptions<T>
): ReaderConfig<T>;
export function resolveReaderConfig<T>(
  options: ReaderOptions<T | string> = {}
): ReaderConfig<T | string> {
  return resolveOptions(options);
}
