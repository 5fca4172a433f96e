import { closeSync, openSync, readSync } from "node:fs";
import { StringDecoder } from "node:string_decoder";

/**
 * Pull-based character source owned by the caller. Each call to `read`
 * returns one Unicode code point, or `undefined` once the source is exhausted.
 */
export interface CharSource {
  read(): string | undefined;
}

export interface ClosableCharSource extends CharSource {
  /** Releases the underlying resource. Further reads report exhaustion. */
  close(): void;
}

export type CharInput = string | CharSource;

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/** Splits string chunks into code points as they are pulled */
class ChunkedCharSource implements CharSource {
  private chars: string[] = [];
  private index = 0;
  /** High surrogate waiting for its pair from the next chunk */
  private pending = "";
  private exhausted = false;

  constructor(private readonly pull: () => string | undefined) {}

  read(): string | undefined {
    while (this.index >= this.chars.length) {
      if (this.exhausted) return undefined;
      this.fill();
    }

    const char = this.chars[this.index];
    this.index += 1;
    return char;
  }

  private fill() {
    const chunk = this.pull();
    this.index = 0;

    if (chunk === undefined) {
      this.exhausted = true;
      this.chars = this.pending ? [this.pending] : [];
      this.pending = "";
      return;
    }

    let text = this.pending + chunk;
    this.pending = "";
    if (text.length && isHighSurrogate(text.charCodeAt(text.length - 1))) {
      this.pending = text.slice(-1);
      text = text.slice(0, -1);
    }

    this.chars = Array.from(text);
  }
}

export const stringSource = (text: string): CharSource => {
  let consumed = false;
  return new ChunkedCharSource(() => {
    if (consumed) return undefined;
    consumed = true;
    return text;
  });
};

/** Lazily pulls chunks from any iterable of strings */
export const chunkSource = (chunks: Iterable<string>): CharSource => {
  const iterator = chunks[Symbol.iterator]();
  return new ChunkedCharSource(() => {
    const result = iterator.next();
    return result.done ? undefined : result.value;
  });
};

export type FileSourceOpts = {
  /** Bytes read from the file per pull. Defaults to 64KiB. */
  chunkSize?: number;
};

/**
 * Reads a UTF-8 file synchronously, one chunk at a time. The descriptor is
 * closed once the file is exhausted or `close` is called.
 */
export const fileSource = (
  path: string,
  { chunkSize = 64 * 1024 }: FileSourceOpts = {}
): ClosableCharSource => {
  let fd: number | undefined = openSync(path, "r");
  const decoder = new StringDecoder("utf8");
  const buffer = Buffer.alloc(chunkSize);

  const close = () => {
    if (fd === undefined) return;
    closeSync(fd);
    fd = undefined;
  };

  const pull = (): string | undefined => {
    if (fd === undefined) return undefined;

    const bytesRead = readSync(fd, buffer, 0, buffer.length, null);
    if (bytesRead === 0) {
      close();
      const rest = decoder.end();
      return rest.length ? rest : undefined;
    }

    return decoder.write(buffer.subarray(0, bytesRead));
  };

  const chars = new ChunkedCharSource(pull);
  return { read: () => chars.read(), close };
};

export const toCharSource = (input: CharInput): CharSource =>
  typeof input === "string" ? stringSource(input) : input;
