import type { Form } from "./ast/form.js";
import { type CharInput, fileSource } from "./char-source.js";
import { CharStream } from "./char-stream.js";
import {
  type ReaderConfig,
  type ReaderOptions,
  resolveOptions,
  type TransformingReaderOptions,
} from "./config.js";
import { UnexpectedCharError, UnexpectedEOFError } from "./errors.js";
import { OPEN_PAREN } from "./grammar.js";
import { parseForm } from "./parse-form.js";
import { skipTrivia } from "./trivia.js";

export type Forms<T> = Generator<Form<T>, void, undefined>;

/**
 * One read session over one character source. Forms are pulled one at a
 * time; after a syntax error every further read rethrows that error.
 */
export class Reader<T> implements Iterable<Form<T>> {
  readonly config: ReaderConfig<T>;
  private readonly file: CharStream;
  private failure?: { error: unknown };

  constructor(input: CharInput, config: ReaderConfig<T>) {
    this.config = config;
    this.file = new CharStream(input);
  }

  /** Set when the source threw while being read; reading stopped there */
  get sourceError(): unknown {
    return this.file.sourceError;
  }

  /** The next top-level form, or `undefined` once the input is exhausted */
  readForm(): Form<T> | undefined {
    if (this.failure) throw this.failure.error;

    try {
      return this.readTopLevel();
    } catch (error) {
      this.failure = { error };
      throw error;
    }
  }

  /** Like {@link readForm}, but running out of input is an error */
  expectForm(): Form<T> {
    const form = this.readForm();
    if (form) return form;

    const error = new UnexpectedEOFError(
      { coordinate: this.file.coordinate, filePath: this.config.filePath },
      { kind: "missing-form" }
    );
    this.failure = { error };
    throw error;
  }

  *forms(): Forms<T> {
    while (true) {
      const form = this.readForm();
      if (!form) return;
      yield form;
    }
  }

  [Symbol.iterator](): Forms<T> {
    return this.forms();
  }

  private readTopLevel(): Form<T> | undefined {
    const char = skipTrivia(this.file, this.config.commentChar);
    if (char === undefined) return undefined;

    if (char !== OPEN_PAREN) {
      throw new UnexpectedCharError(
        { coordinate: this.file.coordinate, filePath: this.config.filePath },
        OPEN_PAREN,
        char
      );
    }

    this.file.consumeChar();
    return parseForm(this.file, this.config, this.file.lastCoordinate);
  }
}

export function createReader(
  input: CharInput,
  options?: ReaderOptions<string>
): Reader<string>;
export function createReader<T>(
  input: CharInput,
  options: TransformingReaderOptions<T>
): Reader<T>;
export function createReader<T>(
  input: CharInput,
  options: ReaderOptions<T | string> = {}
): Reader<T | string> {
  return new Reader(input, resolveOptions(options));
}

/**
 * Lazily reads every top-level form. Options are validated immediately;
 * input is only consumed as forms are requested.
 */
export function read(
  input: CharInput,
  options?: ReaderOptions<string>
): Forms<string>;
export function read<T>(
  input: CharInput,
  options: TransformingReaderOptions<T>
): Forms<T>;
export function read<T>(
  input: CharInput,
  options: ReaderOptions<T | string> = {}
): Forms<T | string> {
  return new Reader(input, resolveOptions(options)).forms();
}

export function readAll(
  input: CharInput,
  options?: ReaderOptions<string>
): Form<string>[];
export function readAll<T>(
  input: CharInput,
  options: TransformingReaderOptions<T>
): Form<T>[];
export function readAll<T>(
  input: CharInput,
  options: ReaderOptions<T | string> = {}
): Form<T | string>[] {
  return [...new Reader(input, resolveOptions(options))];
}

/** Reads the first top-level form. Empty input is an unexpected end of file. */
export function readOne(
  input: CharInput,
  options?: ReaderOptions<string>
): Form<string>;
export function readOne<T>(
  input: CharInput,
  options: TransformingReaderOptions<T>
): Form<T>;
export function readOne<T>(
  input: CharInput,
  options: ReaderOptions<T | string> = {}
): Form<T | string> {
  return new Reader(input, resolveOptions(options)).expectForm();
}

/**
 * Lazily reads the forms of a UTF-8 file. The file is opened on the first
 * request and closed when iteration ends, fails or is abandoned. A read
 * failure is rethrown once the forms read before it have been yielded.
 */
export function readFile(
  path: string,
  options?: ReaderOptions<string>
): Forms<string>;
export function readFile<T>(
  path: string,
  options: TransformingReaderOptions<T>
): Forms<T>;
export function readFile<T>(
  path: string,
  options: ReaderOptions<T | string> = {}
): Forms<T | string> {
  return readFileForms(
    path,
    resolveOptions({ ...options, filePath: options.filePath ?? path })
  );
}

function* readFileForms<T>(path: string, config: ReaderConfig<T>): Forms<T> {
  const source = fileSource(path);
  try {
    const reader = new Reader(source, config);
    yield* reader.forms();
    if (reader.sourceError !== undefined) throw reader.sourceError;
  } finally {
    source.close();
  }
}
