export enum ParseErrorKind {
  UnexpectedCharacter = "UnexpectedCharacter",
  UnexpectedEnd = "UnexpectedEnd",
  LiteralMismatch = "LiteralMismatch",
  InvalidEscape = "InvalidEscape",
  InvalidNumber = "InvalidNumber",
  TrailingData = "TrailingData",
  UnterminatedString = "UnterminatedString",
  UnterminatedContainer = "UnterminatedContainer",
  NestingTooDeep = "NestingTooDeep",
}

export type SourcePosition = {
  /** Byte offset into the input. */
  offset: number;
  /** 1-based line. */
  row: number;
  /** 1-based column, counted in bytes. */
  column: number;
};

export type ParseErrorDetails = SourcePosition & {
  expected: string;
  actual: string;
};

/**
 * Fatal parse failure. Nothing is returned from a parse that throws this;
 * there is no partial tree.
 */
export class JsonParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly offset: number;
  readonly row: number;
  readonly column: number;
  readonly expected: string;
  readonly actual: string;

  constructor(kind: ParseErrorKind, details: ParseErrorDetails) {
    super(
      `${kind}: expected ${details.expected}, got ${details.actual} ` +
        `at ${details.row}:${details.column} (offset ${details.offset})`
    );
    this.name = "JsonParseError";
    this.kind = kind;
    this.offset = details.offset;
    this.row = details.row;
    this.column = details.column;
    this.expected = details.expected;
    this.actual = details.actual;
  }
}

const LINE_FEED = 0x0a;

export const positionAt = (input: Uint8Array, offset: number): SourcePosition => {
  let row = 1;
  let lineStart = 0;
  const end = Math.min(offset, input.length);
  for (let i = 0; i < end; i += 1) {
    if (input[i] === LINE_FEED) {
      row += 1;
      lineStart = i + 1;
    }
  }
  return { offset, row, column: offset - lineStart + 1 };
};

/** Human-readable rendering of the byte at a failure point. */
export const describeByte = (byte: number | undefined): string => {
  if (byte === undefined) {
    return "end of input";
  }
  if (byte >= 0x20 && byte < 0x7f) {
    return `'${String.fromCharCode(byte)}'`;
  }
  return `0x${byte.toString(16).padStart(2, "0")}`;
};
