/** A position in the source. Both fields are 1-indexed. */
export type Coordinate = {
  readonly line: number;
  readonly column: number;
};

/** First and last character of an atom or list, inclusive of its delimiters */
export type Span = {
  readonly start: Coordinate;
  readonly end: Coordinate;
};

export const startCoordinate = (): Coordinate => ({ line: 1, column: 1 });

/** Coordinate of the character that follows `char` */
export const advanceCoordinate = (
  coordinate: Coordinate,
  char: string
): Coordinate =>
  char === "\n"
    ? { line: coordinate.line + 1, column: 1 }
    : { line: coordinate.line, column: coordinate.column + 1 };

export const spanOf = (start: Coordinate, end: Coordinate): Span => ({
  start,
  end,
});

export const sameCoordinate = (a: Coordinate, b: Coordinate): boolean =>
  a.line === b.line && a.column === b.column;

export const formatCoordinate = (coordinate: Coordinate): string =>
  `${coordinate.line}:${coordinate.column}`;

export const formatSpan = (span: Span): string =>
  sameCoordinate(span.start, span.end)
    ? formatCoordinate(span.start)
    : `${formatCoordinate(span.start)}-${formatCoordinate(span.end)}`;
