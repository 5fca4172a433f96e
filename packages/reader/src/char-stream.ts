import { type CharInput, type CharSource, toCharSource } from "./char-source.js";
import {
  advanceCoordinate,
  type Coordinate,
  startCoordinate,
} from "./coordinate.js";

/**
 * Single-lookahead cursor over a {@link CharSource}. Holds exactly one
 * character of lookahead and tracks the coordinate of both the current
 * character and the character consumed last.
 */
export class CharStream {
  private readonly source: CharSource;
  private current: string | undefined;
  private location: Coordinate = startCoordinate();
  private consumed?: Coordinate;

  /** Error thrown by the source, which is then treated as exhausted */
  sourceError?: unknown;

  constructor(input: CharInput) {
    this.source = toCharSource(input);
    this.current = this.pull();
  }

  /** The character under the cursor, `undefined` at the end of the stream */
  get next(): string | undefined {
    return this.current;
  }

  get hasCharacters(): boolean {
    return this.current !== undefined;
  }

  /** Coordinate of the current character, or of the end of the stream */
  get coordinate(): Coordinate {
    return this.location;
  }

  /** Coordinate of the character most recently consumed */
  get lastCoordinate(): Coordinate {
    return this.consumed ?? this.location;
  }

  /** Returns the current character and moves the cursor past it */
  consumeChar(): string {
    const char = this.current;
    if (char === undefined) {
      throw new Error("Out of characters");
    }

    this.consumed = this.location;
    this.location = advanceCoordinate(this.location, char);
    this.current = this.pull();
    return char;
  }

  private pull(): string | undefined {
    if (this.sourceError !== undefined) return undefined;

    try {
      return this.source.read();
    } catch (error) {
      this.sourceError = error;
      return undefined;
    }
  }
}
